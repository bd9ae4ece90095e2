import {
  ValveRecord,
  ReducedNetwork,
  Plan,
  HelperPlan,
  ProgressReporter
} from './types';
import { DEFAULT_CONFIG, MASK_WIDTH_LIMIT } from './config';
import { NetworkValidator } from './validator';
import { ReduceOptions, reduceNetwork } from './network';
import { ALL_VALVES, branchAndBound, rootState } from './search';
import { combineBestPair } from './combiner';
import { ConfigurationError } from './utils';

export interface AloneOptions {
  allowed?: number;
  progress?: ProgressReporter;
}

export interface HelperOptions {
  pruneFactor?: number;
  exhaustiveBelow?: number;
  progress?: ProgressReporter;
}

const EMPTY_PLAN: Plan = { pressure: 0, route: [] };

const maskOf = (route: readonly number[]): number =>
  route.reduce((mask, valve) => mask | (1 << valve), 0);

/**
 * Validate parsed records and build the reduced network the solver runs on.
 * All record problems are reported together in one ConfigurationError.
 */
export const createNetwork = (
  records: readonly ValveRecord[],
  options: ReduceOptions = {}
): ReducedNetwork => {
  const start = options.start ?? DEFAULT_CONFIG.start;
  const validation = NetworkValidator.validate(records, start);
  if (!validation.isValid) {
    throw new ConfigurationError(
      NetworkValidator.formatErrors(validation.errors)
    );
  }
  return reduceNetwork(records, options);
};

export const planAlone = (
  network: ReducedNetwork,
  timeBudget: number,
  options: AloneOptions = {}
): Plan => {
  if (network.names.length === 0) {
    return EMPTY_PLAN;
  }

  const result = branchAndBound(network, rootState(network, timeBudget), {
    allowed: options.allowed ?? ALL_VALVES,
    progress: options.progress
  });
  return {
    pressure: result.best,
    route: result.route.map((valve) => network.names[valve])
  };
};

export const maxPressure = (
  network: ReducedNetwork,
  timeBudget: number
): number => planAlone(network, timeBudget).pressure;

/**
 * Two agents walk at the same time over disjoint valves. One loosely pruned
 * search records the best pressure per opened set, the combiner pairs the
 * sets, and each agent's route is rebuilt from its share of the valves.
 */
export const planWithHelper = (
  network: ReducedNetwork,
  timeBudget: number,
  options: HelperOptions = {}
): HelperPlan => {
  const size = network.names.length;
  if (size === 0) {
    return { pressure: 0, self: EMPTY_PLAN, helper: EMPTY_PLAN };
  }
  if (size > MASK_WIDTH_LIMIT) {
    throw new ConfigurationError(
      `Too many interesting valves: ${size} (limit ${MASK_WIDTH_LIMIT})`
    );
  }

  const exhaustiveBelow = options.exhaustiveBelow ?? DEFAULT_CONFIG.exhaustiveBelow;
  const pruneFactor =
    size <= exhaustiveBelow
      ? 0
      : options.pruneFactor ?? DEFAULT_CONFIG.pruneFactor;

  const table = new Float64Array(1 << size);
  const search = branchAndBound(network, rootState(network, timeBudget), {
    pruneFactor,
    table,
    progress: options.progress
  });

  const pair = combineBestPair(table);
  // the helper may as well stay put when no pair beats walking alone
  const masks: [number, number] =
    pair.pressure > search.best ? pair.masks : [maskOf(search.route), 0];

  const self = planAlone(network, timeBudget, { allowed: masks[0] });
  const helper = planAlone(network, timeBudget, { allowed: masks[1] });
  return { pressure: self.pressure + helper.pressure, self, helper };
};

export const maxPressureWithHelper = (
  network: ReducedNetwork,
  timeBudget: number
): number => planWithHelper(network, timeBudget).pressure;
