#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as fs from 'fs';
import { Parser } from './parser';
import { DEFAULT_CONFIG, MASK_WIDTH_LIMIT } from './config';
import { createNetwork } from './solver';
import { ReplayResult, replayRoute } from './replay';
import { RouteAgent, RouteLine, parseRouteLine } from './output';
import { ErrorManager, RouteError } from './utils';
import { ReducedNetwork } from './types';

interface VerifiedRoute {
  budget: number;
  agent: RouteAgent;
  route: string[];
  pressure: number;
  remaining: number;
  visited: number;
}

class Verification {
  private file: string; // Valve file path
  private log: string; // Route log path
  private start: string; // Start valve
  private routes: VerifiedRoute[] = []; // Routes replayed so far
  private pairMask = 0; // Valves opened by you and the helper together
  private pairPressure = 0;

  constructor(file: string, log: string, start: string) {
    this.file = file;
    this.log = log;
    this.start = start;
  }

  public execute(): void {
    const logLines = fs
      .readFileSync(this.log, 'utf-8')
      .split('\n')
      .filter((line) => line.trim());

    if (logLines.length === 0) {
      ErrorManager.errorType('empty_log');
    }

    const network = this.loadNetwork();
    logLines.forEach((line, i) => this.readLine(network, line.trim(), i + 1));
  }

  private loadNetwork(): ReducedNetwork {
    try {
      return createNetwork(new Parser().parse(this.file), {
        start: this.start,
        maxValves: MASK_WIDTH_LIMIT
      });
    } catch (error) {
      return ErrorManager.errorType(
        'bad_network',
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  private replay(
    network: ReducedNetwork,
    route: string[],
    budget: number,
    line: string,
    lineNumber: number
  ): ReplayResult {
    try {
      return replayRoute(network, route, budget);
    } catch (error) {
      if (error instanceof RouteError) {
        ErrorManager.errorRoute(lineNumber, line, error.message);
      }
      throw error;
    }
  }

  private parseLine(line: string, lineNumber: number): RouteLine {
    try {
      return parseRouteLine(line);
    } catch (error) {
      return ErrorManager.errorRoute(
        lineNumber,
        line,
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  private readLine(network: ReducedNetwork, line: string, lineNumber: number): void {
    const { budget, agent, route } = this.parseLine(line, lineNumber);
    const replayed = this.replay(network, route, budget, line, lineNumber);

    // you and the helper must split the valves between them
    if (agent === 'you' || agent === 'helper') {
      if ((this.pairMask & replayed.visited) !== 0) {
        ErrorManager.errorRoute(
          lineNumber,
          line,
          'helper and you open the same valve'
        );
      }
      this.pairMask |= replayed.visited;
      this.pairPressure += replayed.pressure;
    }

    this.routes.push({ budget, agent, route, ...replayed });
  }

  public displayResult(): void {
    console.log('✅ VERIFICATION COMPLETE!');
    console.log('============================================================');
    for (const entry of this.routes) {
      console.log(
        `${entry.agent} (${entry.budget} min): ${[this.start, ...entry.route].join(
          ' -> '
        )}`
      );
      console.log(
        `     pressure => ${entry.pressure}, minutes left => ${entry.remaining}`
      );
    }
    if (this.routes.some((entry) => entry.agent === 'helper')) {
      console.log(`🐘 Pair pressure => ${this.pairPressure}`);
    }
    console.log('============================================================');
  }
}

function main(): void {
  const argv = yargs(hideBin(process.argv))
    .usage('Usage: pressure-verif <file> <route.log>')
    .option('s', {
      alias: 'start',
      type: 'string',
      default: DEFAULT_CONFIG.start,
      describe: 'valve every route starts from'
    })
    .demandCommand(2)
    .help()
    .parseSync();

  const file = argv._[0]; // Valve file
  const log = argv._[1]; // Route log file

  if (typeof file !== 'string' || typeof log !== 'string') {
    console.error('Usage: pressure-verif <valve-file> <route-log>');
    process.exit(1);
  }

  const verifier = new Verification(file, log, argv.s);
  verifier.execute();
  verifier.displayResult();
}

if (require.main === module) {
  main();
}
