import * as fs from 'fs';
import { ValveRecord } from './types';

export class Parser {
  constructor() {}

  parse(filePath: string): ValveRecord[] {
    const content = fs.readFileSync(filePath, 'utf8');
    return this.parseText(content);
  }

  parseText(content: string): ValveRecord[] {
    const lines = content.split('\n');
    const records: ValveRecord[] = [];

    for (let i = 0; i < lines.length; i++) {
      const trimmedLine = lines[i].trim();
      if (trimmedLine === '' || trimmedLine.startsWith('#')) continue;

      // Valve AA has flow rate=0; tunnels lead to valves DD, II, BB
      // Valve JJ has flow rate=21; tunnel leads to valve II
      const matches = trimmedLine.match(
        /^Valve (\w+) has flow rate=(\d+); tunnels? leads? to valves? (\w+(?:\s*,\s*\w+)*)$/
      );
      if (!matches) {
        throw new Error(`Invalid valve description on line ${i + 1}: "${trimmedLine}"`);
      }

      const [, name, flowStr, neighborsStr] = matches;
      records.push({
        name,
        flow: parseInt(flowStr, 10),
        neighbors: neighborsStr.split(',').map((n) => n.trim())
      });
    }

    return records;
  }
}
