import { ValveRecord, ReducedNetwork } from './types';

/**
 * Raised when the input cannot form a searchable network or when solver
 * settings are out of range. Nothing is searched after one of these.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class RouteError extends Error {
  constructor(
    message: string,
    public readonly valve: string
  ) {
    super(message);
    this.name = 'RouteError';
  }
}

export class NetworkPrinter {
  static displayParsing(info: {
    fileName: string;
    start: string;
    records: readonly ValveRecord[];
    network: ReducedNetwork;
  }): void {
    const { fileName, start, records, network } = info;
    console.log('============================================================');
    console.log(`📁 File: ${fileName}`);
    console.log(`🚩 Start valve: ${start}`);
    console.log(
      `🔧 Valves: ${records.length} parsed, ${network.names.length} worth visiting`
    );
    console.log('');
    this.printValves(network, '💨 Interesting valves:');
    console.log('============================================================');
  }

  static printValves(network: ReducedNetwork, msg: string): void {
    console.log(msg);
    for (const index of network.byFlow) {
      const name = network.names[index];
      const flow = network.flows[index];
      const steps = network.distances[network.startIndex][index];
      console.log(`     ${name} => flow ${flow}, ${steps} step(s) from start`);
    }
    console.log('');
  }
}

export class ErrorManager {
  static errorRoute(lineNumber: number, line: string, reason: string): never {
    console.log(`\nError: Route on line ${lineNumber} is invalid: ${reason}`);
    console.log(`Line: "${line}"\n`);
    process.exit(1);
  }

  static errorType(error: string, details?: string): never {
    const errorMessages: { [key: string]: string } = {
      bad_file: 'Bad file',
      bad_config: 'Invalid solver settings',
      bad_network: 'Network cannot be searched',
      empty_log: 'The route log is empty'
    };
    console.log(`Error: ${errorMessages[error] ?? error}`);
    if (details) {
      console.log(details);
    }
    process.exit(1);
  }
}
