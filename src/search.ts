import {
  ReducedNetwork,
  SearchState,
  BestForMask,
  ProgressReporter
} from './types';

// Every bit set: no valve is excluded
export const ALL_VALVES = -1;

export const rootState = (
  network: ReducedNetwork,
  timeBudget: number
): SearchState => ({
  position: network.startIndex,
  remaining: timeBudget,
  visited: 0,
  pressure: 0
});

/**
 * Walk to `target` and open it. Returns null when the valve is already open,
 * releases nothing, or cannot be opened with at least one minute to spare.
 */
export const openValve = (
  network: ReducedNetwork,
  state: SearchState,
  target: number
): SearchState | null => {
  const bit = 1 << target;
  const flow = network.flows[target];
  if ((state.visited & bit) !== 0 || flow === 0) {
    return null;
  }

  const cost = network.distances[state.position][target] + 1;
  if (state.remaining <= cost) {
    return null;
  }

  const remaining = state.remaining - cost;
  return {
    position: target,
    remaining,
    visited: state.visited | bit,
    pressure: state.pressure + flow * remaining
  };
};

// Pure function listing every legal next state
export const branch = (
  network: ReducedNetwork,
  state: SearchState,
  allowed: number = ALL_VALVES
): SearchState[] => {
  const children: SearchState[] = [];
  for (let target = 0; target < network.flows.length; target++) {
    if ((allowed & (1 << target)) === 0) continue;
    const child = openValve(network, state, target);
    if (child) {
      children.push(child);
    }
  }
  return children;
};

/**
 * Optimistic total reachable from `state`: forget the tunnels and open the
 * remaining valves by descending flow, the j-th one with `remaining - 2j`
 * minutes left (every opening needs a step and a minute). Standing on a
 * closed valve saves the first step.
 */
export const bound = (
  network: ReducedNetwork,
  state: SearchState,
  allowed: number = ALL_VALVES
): number => {
  const here = state.position;
  const standingOnClosed =
    network.flows[here] > 0 && (state.visited & (1 << here)) === 0;

  let total = state.pressure;
  let minutes = state.remaining - (standingOnClosed ? 1 : 2);
  for (const valve of network.byFlow) {
    if (minutes <= 0) break;
    const flow = network.flows[valve];
    if (flow === 0) break; // sorted, so nothing after this releases anything
    const bit = 1 << valve;
    if ((state.visited & bit) !== 0 || (allowed & bit) === 0) continue;
    total += flow * minutes;
    minutes -= 2;
  }
  return total;
};

export interface SearchOptions {
  /** Children survive when `bound > pruneFactor * best`. 1 is strict. */
  pruneFactor?: number;
  allowed?: number;
  /** Filled in place with the best pressure per exact visited mask. */
  table?: BestForMask;
  /** Advanced once per child of the root. */
  progress?: ProgressReporter;
}

export interface SearchResult {
  best: number;
  route: number[]; // valve indices in opening order
}

interface SearchContext {
  network: ReducedNetwork;
  pruneFactor: number;
  allowed: number;
  table: BestForMask | undefined;
  best: number;
  bestRoute: number[];
  path: number[];
}

interface Candidate {
  state: SearchState;
  bound: number;
}

const threshold = (ctx: SearchContext): number => ctx.pruneFactor * ctx.best;

const record = (ctx: SearchContext, state: SearchState): void => {
  if (state.pressure > ctx.best) {
    ctx.best = state.pressure;
    ctx.bestRoute = [...ctx.path];
  }
  if (ctx.table && state.pressure > ctx.table[state.visited]) {
    ctx.table[state.visited] = state.pressure;
  }
};

const candidates = (ctx: SearchContext, state: SearchState): Candidate[] =>
  branch(ctx.network, state, ctx.allowed)
    .map((child) => ({
      state: child,
      bound: bound(ctx.network, child, ctx.allowed)
    }))
    .filter((candidate) => candidate.bound > threshold(ctx))
    .sort((a, b) => b.bound - a.bound);

const descend = (ctx: SearchContext, candidate: Candidate): void => {
  // best may have grown since the candidate was bounded
  if (candidate.bound <= threshold(ctx)) return;
  ctx.path.push(candidate.state.position);
  explore(ctx, candidate.state);
  ctx.path.pop();
};

const explore = (ctx: SearchContext, state: SearchState): void => {
  record(ctx, state);
  for (const candidate of candidates(ctx, state)) {
    descend(ctx, candidate);
  }
};

/**
 * Depth-first branch-and-bound from `root`, most promising children first.
 * Terminates because every transition spends at least one minute.
 */
export const branchAndBound = (
  network: ReducedNetwork,
  root: SearchState,
  options: SearchOptions = {}
): SearchResult => {
  const ctx: SearchContext = {
    network,
    pruneFactor: options.pruneFactor ?? 1,
    allowed: options.allowed ?? ALL_VALVES,
    table: options.table,
    best: 0,
    bestRoute: [],
    path: []
  };

  record(ctx, root);
  const rootCandidates = candidates(ctx, root);

  const progress = options.progress;
  progress?.start(rootCandidates.length, 0);
  for (const candidate of rootCandidates) {
    descend(ctx, candidate);
    progress?.increment();
  }
  progress?.stop();

  return { best: ctx.best, route: ctx.bestRoute };
};
