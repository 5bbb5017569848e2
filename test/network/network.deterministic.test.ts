import seedrandom from 'seedrandom';
import Network from '../../src/architecture/network';
import { config } from '../../src/config';
import { thrownCode } from '../utils/test-helpers';

const weightsOf = (net: Network) => net.connections.map((c) => c.weight);

function denseNet(options?: ConstructorParameters<typeof Network>[2]): Network {
  const net = new Network([2, 3, 1], undefined, options);
  net.fullyConnectFeedforward();
  return net;
}

/** Random source injection, seeding and weight randomization. */
describe('Network.deterministic', () => {
  describe('randomizeWeights(min, max)', () => {
    describe('Scenario: valid range with a seeded source', () => {
      it('keeps every weight inside [min, max)', () => {
        // Arrange
        const net = denseNet({ random: seedrandom('test-seed') });
        // Act
        net.randomizeWeights(-0.5, 0.25);
        // Assert
        expect(weightsOf(net).every((w) => w >= -0.5 && w < 0.25)).toBe(true);
      });
      it('touches every connection', () => {
        // Arrange
        const net = denseNet({ random: seedrandom('test-seed') });
        // Act
        net.randomizeWeights(10, 20);
        // Assert
        expect(weightsOf(net).filter((w) => w >= 10)).toHaveLength(9);
      });
    });

    describe('Scenario: min >= max', () => {
      [
        [1, 1],
        [2, -2],
      ].forEach(([min, max]) => {
        it(`fails with InvalidRange for [${min}, ${max})`, () => {
          // Arrange
          const net = new Network([1, 1], { sources: [0], targets: [1], weights: [0.3] });
          // Act
          const code = thrownCode(() => net.randomizeWeights(min, max));
          // Assert
          expect(code).toBe('InvalidRange');
        });
        it(`leaves weights unchanged for [${min}, ${max})`, () => {
          // Arrange
          const net = new Network([1, 1], { sources: [0], targets: [1], weights: [0.3] });
          // Act
          thrownCode(() => net.randomizeWeights(min, max));
          // Assert
          expect(weightsOf(net)).toEqual([0.3]);
        });
      });
    });

    describe('Scenario: non-finite bound', () => {
      it('fails with InvalidRange', () => {
        const net = denseNet();
        expect(thrownCode(() => net.randomizeWeights(NaN, 1))).toBe('InvalidRange');
      });
    });

    describe('Scenario: constant injected source', () => {
      it('maps 0.5 to the middle of the range', () => {
        // Arrange
        const net = denseNet({ random: () => 0.5 });
        // Act
        net.randomizeWeights(-1, 1);
        // Assert
        expect(weightsOf(net).every((w) => w === 0)).toBe(true);
      });
      it('maps 0 to the lower bound', () => {
        // Arrange
        const net = denseNet({ random: () => 0 });
        // Act
        net.randomizeWeights(-3, 5);
        // Assert
        expect(weightsOf(net).every((w) => w === -3)).toBe(true);
      });
    });
  });

  describe('randomizeWeights() defaults', () => {
    afterEach(() => {
      config.defaultWeightRange = [-1, 1];
    });
    it('uses [-1, 1) without arguments', () => {
      // Arrange
      const net = denseNet({ seed: 7 });
      // Act
      net.randomizeWeights();
      // Assert
      expect(weightsOf(net).every((w) => w >= -1 && w < 1)).toBe(true);
    });
    it('follows config.defaultWeightRange', () => {
      // Arrange
      config.defaultWeightRange = [2, 3];
      const net = denseNet({ seed: 7 });
      // Act
      net.randomizeWeights();
      // Assert
      expect(weightsOf(net).every((w) => w >= 2 && w < 3)).toBe(true);
    });
  });

  describe('Scenario: reproducible seeding', () => {
    it('produces identical weights for the same built-in seed', () => {
      // Arrange
      const a = denseNet({ seed: 123 });
      const b = denseNet({ seed: 123 });
      // Act
      a.randomizeWeights();
      b.randomizeWeights();
      // Assert
      expect(weightsOf(a)).toEqual(weightsOf(b));
    });
    it('produces identical weights for the same seedrandom seed', () => {
      // Arrange
      const a = denseNet({ random: seedrandom('test-seed') });
      const b = denseNet({ random: seedrandom('test-seed') });
      // Act
      a.randomizeWeights(-2, 2);
      b.randomizeWeights(-2, 2);
      // Assert
      expect(weightsOf(a)).toEqual(weightsOf(b));
    });
    it('prefers an injected source over a seed', () => {
      // Arrange
      const net = denseNet({ random: () => 0.25, seed: 99 });
      // Act
      net.randomizeWeights(0, 4);
      // Assert
      expect(weightsOf(net).every((w) => w === 1)).toBe(true);
    });
  });

  describe('Scenario: snapshot & restore raw state', () => {
    it('snapshot contains numeric state after seeding', () => {
      // Arrange
      const net = new Network([1, 1], undefined, { seed: 9 });
      // Act
      const snap = net.snapshotRNG();
      // Assert
      expect(typeof snap.state).toBe('number');
    });
    it('replays the same weights after setRNGState', () => {
      // Arrange
      const net = denseNet({ seed: 9 });
      const snap = net.snapshotRNG();
      net.randomizeWeights();
      const first = weightsOf(net);
      // Act
      net.setRNGState(snap.state ?? 0);
      net.randomizeWeights();
      // Assert
      expect(weightsOf(net)).toEqual(first);
    });
    it('reports the restored state word', () => {
      // Arrange
      const net = new Network([1, 1], undefined, { seed: 9 });
      const snap = net.snapshotRNG();
      net.getRandomFn()();
      // Act
      net.setRNGState(snap.state ?? 0);
      // Assert
      expect(net.getRNGState()).toBe(snap.state);
    });
  });

  describe('Scenario: restoreRNG custom implementation', () => {
    it('uses the injected function', () => {
      // Arrange
      const net = new Network([1, 1], undefined, { seed: 42 });
      // Act
      net.restoreRNG(() => 0.5);
      // Assert
      expect(net.getRandomFn()()).toBe(0.5);
    });
    it('clears the built-in state word', () => {
      // Arrange
      const net = new Network([1, 1], undefined, { seed: 42 });
      // Act
      net.restoreRNG(() => 0.5);
      // Assert
      expect(net.getRNGState()).toBeUndefined();
    });
  });

  describe('Scenario: unseeded network', () => {
    it('has no state word', () => {
      expect(new Network([1, 1]).getRNGState()).toBeUndefined();
    });
  });
});
