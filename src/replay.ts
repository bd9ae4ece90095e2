import { ReducedNetwork } from './types';
import { openValve, rootState } from './search';
import { RouteError } from './utils';

export interface ReplayResult {
  pressure: number;
  remaining: number;
  visited: number;
}

/**
 * Replays a route of valve names from the start valve, opening each one on
 * arrival. Throws RouteError on the first valve that cannot be opened.
 */
export const replayRoute = (
  network: ReducedNetwork,
  route: readonly string[],
  timeBudget: number
): ReplayResult => {
  const indexByName = new Map(network.names.map((name, i) => [name, i]));
  let state = rootState(network, timeBudget);

  for (const name of route) {
    const target = indexByName.get(name);
    if (target === undefined || network.flows[target] === 0) {
      throw new RouteError(`Valve ${name} releases no pressure`, name);
    }
    if ((state.visited & (1 << target)) !== 0) {
      throw new RouteError(`Valve ${name} is opened twice`, name);
    }

    const next = openValve(network, state, target);
    if (!next) {
      throw new RouteError(
        `Valve ${name} cannot be opened with ${state.remaining} minute(s) left`,
        name
      );
    }
    state = next;
  }

  return {
    pressure: state.pressure,
    remaining: state.remaining,
    visited: state.visited
  };
};
