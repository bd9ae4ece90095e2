import { expect } from 'chai';
import { Parser } from '../../src/parser';
import { EXAMPLE_FILE } from './fixtures/networks';

describe('Parser', () => {
  const parser = new Parser();

  it('should read every valve of the example file', () => {
    const records = parser.parse(EXAMPLE_FILE);
    expect(records.map((record) => record.name)).to.deep.equal([
      'AA', 'BB', 'CC', 'DD', 'EE', 'FF', 'GG', 'HH', 'II', 'JJ'
    ]);
  });

  it('should read a list of tunnels', () => {
    const [valve] = parser.parseText(
      'Valve AA has flow rate=0; tunnels lead to valves DD, II, BB'
    );
    expect(valve).to.deep.equal({ name: 'AA', flow: 0, neighbors: ['DD', 'II', 'BB'] });
  });

  it('should read a single tunnel', () => {
    const [valve] = parser.parseText('Valve JJ has flow rate=21; tunnel leads to valve II');
    expect(valve).to.deep.equal({ name: 'JJ', flow: 21, neighbors: ['II'] });
  });

  it('should skip blank lines and comments', () => {
    const records = parser.parseText(
      '# two valves\n\nValve AA has flow rate=0; tunnel leads to valve BB\n  \nValve BB has flow rate=5; tunnel leads to valve AA\n'
    );
    expect(records).to.have.lengthOf(2);
  });

  it('should name the line it cannot read', () => {
    expect(() =>
      parser.parseText('Valve AA has flow rate=0; tunnel leads to valve BB\nValve BB is broken')
    ).to.throw('Invalid valve description on line 2: "Valve BB is broken"');
  });

  it('should reject a negative flow rate as text', () => {
    expect(() => parser.parseText('Valve AA has flow rate=-3; tunnel leads to valve BB')).to.throw(
      'Invalid valve description on line 1'
    );
  });
});
