import { expect } from 'chai';
import {
  createNetwork,
  maxPressure,
  maxPressureWithHelper,
  planAlone,
  planWithHelper
} from '../../src/solver';
import {
  exhaustiveMaxPressure,
  exhaustiveMaxPressureWithHelper
} from '../../src/exhaustive';
import { replayRoute } from '../../src/replay';
import { ConfigurationError } from '../../src/utils';
import {
  chain,
  corridor,
  islands,
  loadExample,
  pair,
  wetStart
} from './fixtures/networks';

describe('solver', () => {
  const example = createNetwork(loadExample());

  describe('createNetwork()', () => {
    it('should report every record problem at once', () => {
      const records = [
        { name: 'AA', flow: -1, neighbors: ['QQ'] },
        { name: 'AA', flow: 3, neighbors: [] }
      ];
      expect(() => createNetwork(records)).to.throw(
        ConfigurationError,
        '[invalid_flow] Valve AA has an invalid flow rate'
      );
      expect(() => createNetwork(records)).to.throw(
        ConfigurationError,
        '[unknown_valve] Valve AA has a tunnel to unknown valve QQ'
      );
    });

    it('should reject a missing start valve', () => {
      expect(() => createNetwork(corridor)).to.throw(
        ConfigurationError,
        '[missing_start] Start valve AA is not defined'
      );
    });

    it('should accept an empty list of valves', () => {
      expect(createNetwork([]).names).to.deep.equal([]);
    });

    it('should accept as many interesting valves as a mask can hold', () => {
      expect(createNetwork(chain(23), { maxValves: 24 }).names).to.have.length(24);
    });

    it('should cap a larger valve limit at the mask width', () => {
      expect(() => createNetwork(chain(24), { maxValves: 30 })).to.throw(
        ConfigurationError,
        'Too many interesting valves: 25 (limit 24)'
      );
    });
  });

  describe('maxPressure()', () => {
    it('should release 1651 in 30 minutes on the example', () => {
      expect(maxPressure(example, 30)).to.equal(1651);
    });

    it('should release nothing without time', () => {
      expect(maxPressure(example, 0)).to.equal(0);
      expect(maxPressure(createNetwork(wetStart, { start: 'X' }), 0)).to.equal(0);
    });

    it('should open the nearest big valve when time is short', () => {
      expect(maxPressure(example, 2)).to.equal(0);
      expect(maxPressure(example, 3)).to.equal(20);
      expect(maxPressure(example, 4)).to.equal(40);
    });

    it('should never release less with more time', () => {
      let previous = 0;
      for (let budget = 0; budget <= 30; budget++) {
        const pressure = maxPressure(example, budget);
        expect(pressure).to.be.at.least(previous);
        previous = pressure;
      }
    });

    it('should return the same answer every time', () => {
      expect(maxPressure(example, 30)).to.equal(maxPressure(example, 30));
      expect(planAlone(example, 30)).to.deep.equal(planAlone(example, 30));
    });

    it('should return zero for an empty network', () => {
      expect(maxPressure(createNetwork([]), 30)).to.equal(0);
    });
  });

  describe('planAlone()', () => {
    it('should return a route that replays to its pressure', () => {
      const plan = planAlone(example, 30);
      expect(plan.pressure).to.equal(1651);
      expect(replayRoute(example, plan.route, 30).pressure).to.equal(1651);
    });

    it('should open a flowing start valve first when it pays', () => {
      expect(planAlone(createNetwork(pair, { start: 'X' }), 5)).to.deep.equal({
        pressure: 36,
        route: ['X', 'Y']
      });
    });
  });

  describe('maxPressureWithHelper()', () => {
    it('should release 1707 in 26 minutes on the example', () => {
      expect(maxPressureWithHelper(example, 26)).to.equal(1707);
    });

    it('should find 1707 with loose pruning too', () => {
      const plan = planWithHelper(example, 26, { exhaustiveBelow: 0, pruneFactor: 0.75 });
      expect(plan.pressure).to.equal(1707);
    });

    it('should never do worse than walking alone', () => {
      for (const network of [
        example,
        createNetwork(corridor, { start: 'S' }),
        createNetwork(wetStart, { start: 'X' }),
        createNetwork(islands, { start: 'S' })
      ]) {
        for (let budget = 0; budget <= 26; budget += 2) {
          expect(maxPressureWithHelper(network, budget)).to.be.at.least(
            maxPressure(network, budget)
          );
        }
      }
    });

    it('should send both agents out when two valves sit apart', () => {
      const plan = planWithHelper(createNetwork(pair, { start: 'X' }), 5);
      expect(plan).to.deep.equal({
        pressure: 40,
        self: { pressure: 28, route: ['X'] },
        helper: { pressure: 12, route: ['Y'] }
      });
    });

    it('should let the helper rest when there is one valve', () => {
      const network = createNetwork([
        { name: 'AA', flow: 0, neighbors: ['BB'] },
        { name: 'BB', flow: 9, neighbors: ['AA'] }
      ]);
      expect(planWithHelper(network, 10)).to.deep.equal({
        pressure: 72,
        self: { pressure: 72, route: ['BB'] },
        helper: { pressure: 0, route: [] }
      });
    });

    it('should give the agents disjoint routes', () => {
      const plan = planWithHelper(example, 26);
      const self = replayRoute(example, plan.self.route, 26);
      const helper = replayRoute(example, plan.helper.route, 26);
      expect(self.visited & helper.visited).to.equal(0);
      expect(self.pressure + helper.pressure).to.equal(1707);
    });

    it('should match the exhaustive answer on small networks', () => {
      for (const [records, start] of [
        [corridor, 'S'],
        [wetStart, 'X'],
        [islands, 'S']
      ] as const) {
        const network = createNetwork(records, { start });
        for (let budget = 0; budget <= 16; budget += 4) {
          expect(maxPressureWithHelper(network, budget)).to.equal(
            exhaustiveMaxPressureWithHelper(network, budget)
          );
          expect(maxPressure(network, budget)).to.equal(
            exhaustiveMaxPressure(network, budget)
          );
        }
      }
    });

    it('should return zero for an empty network', () => {
      expect(planWithHelper(createNetwork([]), 26).pressure).to.equal(0);
    });

    it('should refuse a network wider than the per-mask table', () => {
      const network = createNetwork(chain(23), { maxValves: 24 });
      const oversized = { ...network, names: [...network.names, 'W1'] };
      expect(() => planWithHelper(oversized, 3)).to.throw(
        ConfigurationError,
        'Too many interesting valves: 25 (limit 24)'
      );
    });
  });
});
