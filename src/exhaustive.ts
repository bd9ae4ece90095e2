import { ReducedNetwork, SearchState, BestForMask } from './types';
import { branch, rootState } from './search';

/**
 * Exhaustive search for the best pressure: every legal sequence of openings
 * is walked, nothing is pruned. Slow, but the answer needs no bound.
 */
export const exhaustiveBest = (
  network: ReducedNetwork,
  state: SearchState
): number => {
  let best = state.pressure;
  for (const child of branch(network, state)) {
    best = Math.max(best, exhaustiveBest(network, child));
  }
  return best;
};

export const exhaustiveMaxPressure = (
  network: ReducedNetwork,
  timeBudget: number
): number => {
  if (network.names.length === 0) return 0;
  return exhaustiveBest(network, rootState(network, timeBudget));
};

const fillTable = (
  network: ReducedNetwork,
  state: SearchState,
  table: BestForMask
): void => {
  table[state.visited] = Math.max(table[state.visited], state.pressure);
  for (const child of branch(network, state)) {
    fillTable(network, child, table);
  }
};

export const exhaustiveBestForMask = (
  network: ReducedNetwork,
  timeBudget: number
): BestForMask => {
  const table = new Float64Array(1 << network.names.length);
  if (network.names.length > 0) {
    fillTable(network, rootState(network, timeBudget), table);
  }
  return table;
};

// Every pair of disjoint masks, the empty one included
export const exhaustiveMaxPressureWithHelper = (
  network: ReducedNetwork,
  timeBudget: number
): number => {
  const table = exhaustiveBestForMask(network, timeBudget);
  let best = 0;
  for (let a = 0; a < table.length; a++) {
    for (let b = a; b < table.length; b++) {
      if ((a & b) === 0) {
        best = Math.max(best, table[a] + table[b]);
      }
    }
  }
  return best;
};
