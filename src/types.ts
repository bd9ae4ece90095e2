export interface ValveRecord {
  name: string;
  flow: number;
  neighbors: string[];
}

export type DistanceMatrix = ReadonlyArray<ReadonlyArray<number>>;

/**
 * Compact view of a valve network: only the valves worth opening, plus the
 * start. Valve `i` owns bit `1 << i` of every visited mask.
 */
export interface ReducedNetwork {
  names: readonly string[];
  flows: readonly number[];
  distances: DistanceMatrix;
  startIndex: number;
  byFlow: readonly number[]; // indices, highest flow first (bound only)
}

export interface SearchState {
  position: number;
  remaining: number;
  visited: number;
  pressure: number;
}

/** Highest pressure seen for each exact visited mask, indexed by mask. */
export type BestForMask = Float64Array;

export interface Plan {
  pressure: number;
  route: string[];
}

export interface HelperPlan {
  pressure: number;
  self: Plan;
  helper: Plan;
}

export interface PairResult {
  pressure: number;
  masks: [number, number];
}

/** Shape shared with cli-progress bars. */
export interface ProgressReporter {
  start(total: number, startValue: number): void;
  increment(): void;
  stop(): void;
}
