import { ConfigurationError } from './utils';

// The two-agent table holds 2^width doubles: 24 valves take 128 MiB
export const MASK_WIDTH_LIMIT = 24;

export interface SolverConfig {
  start: string; // valve both agents start from
  timeBudget: number; // minutes for the lone walk
  helperTimeBudget: number; // minutes for each agent when working in pairs
  pruneFactor: number; // loose threshold for the two-agent table pass
  exhaustiveBelow: number; // networks this small fill the table without pruning
  maxValves: number; // interesting valves allowed, start included
}

export const DEFAULT_CONFIG: Readonly<SolverConfig> = {
  start: 'AA',
  timeBudget: 30,
  helperTimeBudget: 26,
  pruneFactor: 0.75,
  exhaustiveBelow: 10,
  maxValves: 16
};

const isNonNegativeInteger = (value: number): boolean =>
  Number.isInteger(value) && value >= 0;

/**
 * Merge user settings over the defaults and check every range.
 * Throws ConfigurationError on the first setting out of range.
 */
export const resolveConfig = (
  overrides: Partial<SolverConfig> = {}
): SolverConfig => {
  const config: SolverConfig = { ...DEFAULT_CONFIG, ...overrides };

  if (!config.start.trim()) {
    throw new ConfigurationError('Start valve name cannot be empty');
  }
  if (!isNonNegativeInteger(config.timeBudget)) {
    throw new ConfigurationError(
      `Time budget must be a non-negative integer, got ${config.timeBudget}`
    );
  }
  if (!isNonNegativeInteger(config.helperTimeBudget)) {
    throw new ConfigurationError(
      `Helper time budget must be a non-negative integer, got ${config.helperTimeBudget}`
    );
  }
  if (
    Number.isNaN(config.pruneFactor) ||
    config.pruneFactor < 0 ||
    config.pruneFactor > 1
  ) {
    throw new ConfigurationError(
      `Prune factor must lie between 0 and 1, got ${config.pruneFactor}`
    );
  }
  if (!isNonNegativeInteger(config.exhaustiveBelow)) {
    throw new ConfigurationError(
      `Exhaustive threshold must be a non-negative integer, got ${config.exhaustiveBelow}`
    );
  }
  if (
    !Number.isInteger(config.maxValves) ||
    config.maxValves < 1 ||
    config.maxValves > MASK_WIDTH_LIMIT
  ) {
    throw new ConfigurationError(
      `Valve limit must be an integer between 1 and ${MASK_WIDTH_LIMIT}, got ${config.maxValves}`
    );
  }

  return config;
};
