import { expect } from 'chai';
import { NetworkValidator } from '../../src/validator';
import { loadExample } from './fixtures/networks';

describe('NetworkValidator', () => {
  it('should accept the example network', () => {
    expect(NetworkValidator.validate(loadExample(), 'AA')).to.deep.equal({
      isValid: true,
      errors: []
    });
  });

  it('should accept an empty network', () => {
    expect(NetworkValidator.validate([], 'AA').isValid).to.equal(true);
  });

  it('should collect every problem in order', () => {
    const result = NetworkValidator.validate(
      [
        { name: 'AA', flow: 0, neighbors: ['BB', 'AA'] },
        { name: 'AA', flow: 1, neighbors: [] },
        { name: 'CC', flow: 1.5, neighbors: ['AA'] }
      ],
      'ZZ'
    );
    expect(result.isValid).to.equal(false);
    expect(result.errors.map((error) => error.type)).to.deep.equal([
      'duplicate_valve',
      'invalid_flow',
      'unknown_valve',
      'self_tunnel',
      'missing_start'
    ]);
  });

  it('should format errors one per line', () => {
    const output = NetworkValidator.formatErrors([
      { type: 'missing_start', message: 'Start valve ZZ is not defined', valve: 'ZZ' },
      {
        type: 'invalid_flow',
        message: 'Valve CC has an invalid flow rate',
        valve: 'CC',
        details: 'Flow must be a non-negative integer, got 1.5'
      }
    ]);
    expect(output).to.equal(
      '🔴 Network validation failed:\n' +
        '   - [missing_start] Start valve ZZ is not defined\n' +
        '   - [invalid_flow] Valve CC has an invalid flow rate (Flow must be a non-negative integer, got 1.5)\n'
    );
  });
});
