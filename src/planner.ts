#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as cliProgress from 'cli-progress';
import * as fs from 'fs';
import * as path from 'path';
import { Parser } from './parser';
import { SolverConfig, DEFAULT_CONFIG, resolveConfig } from './config';
import { createNetwork, planAlone, planWithHelper } from './solver';
import {
  exhaustiveMaxPressure,
  exhaustiveMaxPressureWithHelper
} from './exhaustive';
import { formatRouteLog, printHelperResult, printPlanResult } from './output';
import { ConfigurationError, ErrorManager, NetworkPrinter } from './utils';
import { ValveRecord, ReducedNetwork, Plan, HelperPlan } from './types';

/**
 * Planner - command line front end
 * Parses a valve file, runs both searches and writes the route log
 */
class Planner {
  private config: SolverConfig = { ...DEFAULT_CONFIG };
  private records: ValveRecord[] = []; // Valves as read from the file
  private network: ReducedNetwork | null = null; // Valves worth visiting
  private exhaustive = false; // Skip pruning entirely (slow, for checking)
  private fileName = ''; // Input file name (without path)
  private startTime: number;

  constructor(startTime: number) {
    this.startTime = startTime;
  }

  /**
   * Parse command line arguments and the valve file
   */
  private argumentParser(): void {
    const argv = yargs(hideBin(process.argv))
      .usage('Usage: planner <file> [options]')
      .option('t', {
        alias: 'time',
        type: 'number',
        default: DEFAULT_CONFIG.timeBudget,
        describe: 'minutes available when walking alone'
      })
      .option('e', {
        alias: 'helper-time',
        type: 'number',
        default: DEFAULT_CONFIG.helperTimeBudget,
        describe: 'minutes available to each agent when walking with a helper'
      })
      .option('s', {
        alias: 'start',
        type: 'string',
        default: DEFAULT_CONFIG.start,
        describe: 'valve both agents start from'
      })
      .option('p', {
        alias: 'prune-factor',
        type: 'number',
        default: DEFAULT_CONFIG.pruneFactor,
        describe: 'loose pruning threshold for the helper search'
      })
      .option('x', {
        alias: 'exhaustive-below',
        type: 'number',
        default: DEFAULT_CONFIG.exhaustiveBelow,
        describe: 'networks this small are searched for a helper without pruning'
      })
      .option('w', {
        alias: 'max-valves',
        type: 'number',
        default: DEFAULT_CONFIG.maxValves,
        describe: 'max number of interesting valves'
      })
      .option('exhaustive', {
        type: 'boolean',
        default: false,
        describe: 'try every route without pruning'
      })
      .help()
      .parseSync();

    const file = argv._[0];
    if (typeof file !== 'string') {
      console.error('Usage: planner <file> [options]');
      process.exit(1);
    }

    try {
      this.config = resolveConfig({
        start: argv.s,
        timeBudget: argv.t,
        helperTimeBudget: argv.e,
        pruneFactor: argv.p,
        exhaustiveBelow: argv.x,
        maxValves: argv.w
      });
    } catch (error) {
      ErrorManager.errorType(
        'bad_config',
        error instanceof Error ? error.message : String(error)
      );
    }

    this.exhaustive = argv.exhaustive;
    this.fileName = path.basename(file);

    try {
      this.records = new Parser().parse(file);
    } catch (error) {
      ErrorManager.errorType(
        'bad_file',
        error instanceof Error ? error.message : String(error)
      );
    }

    try {
      this.network = createNetwork(this.records, {
        start: this.config.start,
        maxValves: this.config.maxValves
      });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        ErrorManager.errorType('bad_network', error.message);
      }
      throw error;
    }
  }

  private requireNetwork(): ReducedNetwork {
    const network = this.network;
    if (!network) {
      ErrorManager.errorType('bad_network', 'Network was not loaded');
    }
    return network;
  }

  private createProgressBar(label: string): cliProgress.SingleBar {
    return new cliProgress.SingleBar({
      format: `${label} |{bar}| {percentage}%`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true
    });
  }

  /**
   * Run the lone search, then the helper search, each behind a progress bar
   */
  private execute(network: ReducedNetwork): [Plan, HelperPlan] {
    const plan = planAlone(network, this.config.timeBudget, {
      progress: this.createProgressBar('Walking alone  ')
    });
    const helperPlan = planWithHelper(network, this.config.helperTimeBudget, {
      pruneFactor: this.config.pruneFactor,
      exhaustiveBelow: this.config.exhaustiveBelow,
      progress: this.createProgressBar('Walking in pair')
    });
    console.log('============================================================');
    return [plan, helperPlan];
  }

  private executeExhaustive(network: ReducedNetwork): void {
    console.log('[EXHAUSTIVE MODE] Every route is tried, nothing is pruned.');
    console.log(
      `🚶 Alone for ${this.config.timeBudget} minutes => ${exhaustiveMaxPressure(
        network,
        this.config.timeBudget
      )}`
    );
    console.log(
      `🐘 With a helper for ${this.config.helperTimeBudget} minutes => ${exhaustiveMaxPressureWithHelper(
        network,
        this.config.helperTimeBudget
      )}`
    );
    console.log('============================================================');
  }

  private displayResult(plan: Plan, helperPlan: HelperPlan): void {
    printPlanResult(this.config.start, this.config.timeBudget, plan);
    printHelperResult(this.config.start, this.config.helperTimeBudget, helperPlan);
    console.log(`⏱️  Execution time: ${(Date.now() - this.startTime) / 1000}s`);
    console.log('============================================================');

    // Write route log to file
    const logPath = `resources/${this.fileName}.log`;
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fs.writeFileSync(
      logPath,
      formatRouteLog(
        this.config.timeBudget,
        plan,
        this.config.helperTimeBudget,
        helperPlan
      ),
      'utf-8'
    );
    console.log(`📝 Routes written to ${logPath}`);
  }

  /**
   * Main runner
   */
  public run(): void {
    this.argumentParser(); // Step 1: Parse arguments and valves
    const network = this.requireNetwork();
    NetworkPrinter.displayParsing({
      fileName: this.fileName,
      start: this.config.start,
      records: this.records,
      network
    }); // Step 2: Show what will be searched
    if (this.exhaustive) {
      this.executeExhaustive(network);
      return;
    }
    const [plan, helperPlan] = this.execute(network); // Step 3: Search
    this.displayResult(plan, helperPlan); // Step 4: Report and log
  }
}

function main(): void {
  const planner = new Planner(Date.now());
  planner.run();
}

if (require.main === module) {
  main();
}
