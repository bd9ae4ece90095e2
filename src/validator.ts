import { ValveRecord } from './types';

export interface ValidationError {
  type: string;
  message: string;
  valve?: string;
  details?: string;
}

export class NetworkValidator {
  private errors: ValidationError[] = [];
  private names = new Set<string>();

  /**
   * Checks a list of valve records before any distance is computed.
   * Every problem is collected, not only the first one.
   */
  static validate(
    records: readonly ValveRecord[],
    start: string
  ): {
    isValid: boolean;
    errors: ValidationError[];
  } {
    const validator = new NetworkValidator();
    return validator.validateRecords(records, start);
  }

  static formatErrors(errors: readonly ValidationError[]): string {
    let output = '🔴 Network validation failed:\n';
    for (const error of errors) {
      output += `   - [${error.type}] ${error.message}`;
      if (error.details) {
        output += ` (${error.details})`;
      }
      output += '\n';
    }
    return output;
  }

  private validateRecords(
    records: readonly ValveRecord[],
    start: string
  ): {
    isValid: boolean;
    errors: ValidationError[];
  } {
    for (const record of records) {
      this.validateRecord(record);
    }

    // An empty network is degenerate but valid
    if (records.length > 0) {
      this.validateTunnels(records);
      this.validateStart(start);
    }

    return {
      isValid: this.errors.length === 0,
      errors: this.errors
    };
  }

  private validateRecord(record: ValveRecord): void {
    if (this.names.has(record.name)) {
      this.errors.push({
        type: 'duplicate_valve',
        message: `Duplicate valve definition: ${record.name}`,
        valve: record.name
      });
      return;
    }
    this.names.add(record.name);

    if (!Number.isInteger(record.flow) || record.flow < 0) {
      this.errors.push({
        type: 'invalid_flow',
        message: `Valve ${record.name} has an invalid flow rate`,
        valve: record.name,
        details: `Flow must be a non-negative integer, got ${record.flow}`
      });
    }
  }

  private validateTunnels(records: readonly ValveRecord[]): void {
    for (const record of records) {
      for (const neighbor of record.neighbors) {
        if (neighbor === record.name) {
          this.errors.push({
            type: 'self_tunnel',
            message: `Valve ${record.name} has a tunnel to itself`,
            valve: record.name
          });
        } else if (!this.names.has(neighbor)) {
          this.errors.push({
            type: 'unknown_valve',
            message: `Valve ${record.name} has a tunnel to unknown valve ${neighbor}`,
            valve: record.name,
            details: `Known valves: ${[...this.names].join(', ')}`
          });
        }
      }
    }
  }

  private validateStart(start: string): void {
    if (!this.names.has(start)) {
      this.errors.push({
        type: 'missing_start',
        message: `Start valve ${start} is not defined`,
        valve: start
      });
    }
  }
}
