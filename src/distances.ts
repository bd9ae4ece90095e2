import { ValveRecord } from './types';
import { ConfigurationError } from './utils';

// Sentinel for valves with no path between them; sums saturate here
export const UNREACHABLE = 0xffff;

const saturatingAdd = (a: number, b: number): number =>
  Math.min(a + b, UNREACHABLE);

/**
 * All-pairs step counts over the full valve graph (Floyd-Warshall, one
 * minute per tunnel). Tunnels count both ways.
 */
export const computeDistances = (
  records: readonly ValveRecord[]
): number[][] => {
  const size = records.length;
  if (size >= UNREACHABLE) {
    throw new ConfigurationError(
      `Too many valves for the distance table: ${size} (limit ${UNREACHABLE - 1})`
    );
  }

  const indexByName = new Map(records.map((r, i) => [r.name, i]));
  const distances: number[][] = Array.from({ length: size }, (_, i) =>
    Array.from({ length: size }, (_, j) => (i === j ? 0 : UNREACHABLE))
  );

  records.forEach((record, i) => {
    for (const neighbor of record.neighbors) {
      const j = indexByName.get(neighbor);
      if (j === undefined) {
        throw new ConfigurationError(
          `Valve ${record.name} has a tunnel to unknown valve ${neighbor}`
        );
      }
      if (i !== j) {
        distances[i][j] = 1;
        distances[j][i] = 1;
      }
    }
  });

  for (let k = 0; k < size; k++) {
    const throughK = distances[k];
    for (let i = 0; i < size; i++) {
      const fromI = distances[i];
      const toK = fromI[k];
      if (toK === UNREACHABLE) continue;
      for (let j = 0; j < size; j++) {
        const candidate = saturatingAdd(toK, throughK[j]);
        if (candidate < fromI[j]) {
          fromI[j] = candidate;
        }
      }
    }
  }

  return distances;
};
