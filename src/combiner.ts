import { BestForMask, PairResult } from './types';

interface MaskEntry {
  mask: number;
  pressure: number;
}

/**
 * Best sum of two disjoint masks from a filled table. Entries are scanned
 * by descending pressure, so the first disjoint partner of an entry is its
 * best one and the scan stops once no pair can beat the current answer.
 */
export const combineBestPair = (table: BestForMask): PairResult => {
  const entries: MaskEntry[] = [];
  table.forEach((pressure, mask) => {
    if (pressure > 0) {
      entries.push({ mask, pressure });
    }
  });
  entries.sort((a, b) => b.pressure - a.pressure || a.mask - b.mask);

  let best: PairResult = { pressure: 0, masks: [0, 0] };
  for (let i = 0; i < entries.length; i++) {
    const first = entries[i];
    if (2 * first.pressure <= best.pressure) break;

    for (let j = i + 1; j < entries.length; j++) {
      const second = entries[j];
      const sum = first.pressure + second.pressure;
      if (sum <= best.pressure) break;
      if ((first.mask & second.mask) !== 0) continue;

      best = { pressure: sum, masks: [first.mask, second.mask] };
      break;
    }
  }

  return best;
};
