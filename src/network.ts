import { ValveRecord, ReducedNetwork } from './types';
import { computeDistances } from './distances';
import { ConfigurationError } from './utils';
import { DEFAULT_CONFIG, MASK_WIDTH_LIMIT } from './config';

export interface ReduceOptions {
  start?: string;
  maxValves?: number;
}

export const EMPTY_NETWORK: ReducedNetwork = {
  names: [],
  flows: [],
  distances: [],
  startIndex: 0,
  byFlow: []
};

/**
 * Keep the valves with positive flow plus the start, renumbered in input
 * order, with their slice of the all-pairs distance table.
 */
export const reduceNetwork = (
  records: readonly ValveRecord[],
  options: ReduceOptions = {}
): ReducedNetwork => {
  const start = options.start ?? DEFAULT_CONFIG.start;
  const maxValves = Math.min(
    options.maxValves ?? DEFAULT_CONFIG.maxValves,
    MASK_WIDTH_LIMIT
  );

  if (records.length === 0) {
    return EMPTY_NETWORK;
  }

  const full = computeDistances(records);

  const kept: number[] = [];
  let startIndex = -1;
  records.forEach((record, i) => {
    if (record.name === start) {
      startIndex = kept.length;
      kept.push(i);
    } else if (record.flow > 0) {
      kept.push(i);
    }
  });

  if (startIndex < 0) {
    throw new ConfigurationError(`Start valve ${start} is not defined`);
  }
  if (kept.length > maxValves) {
    throw new ConfigurationError(
      `Too many interesting valves: ${kept.length} (limit ${maxValves})`
    );
  }

  const flows = kept.map((i) => records[i].flow);
  const byFlow = kept
    .map((_, index) => index)
    .sort((a, b) => flows[b] - flows[a] || a - b);

  return {
    names: kept.map((i) => records[i].name),
    flows,
    distances: kept.map((i) => kept.map((j) => full[i][j])),
    startIndex,
    byFlow
  };
};
