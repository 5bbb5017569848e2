import type Network from '../network';
import { AnnError } from '../../errors';
import { config } from '../../config';

/**
 * Random source management and weight randomization for {@link Network}.
 *
 * Every network carries its own random function (`_rand`) instead of sharing process-wide state.
 * By default it is `Math.random`; callers may inject any `() => number` producing values in
 * [0, 1) (for example a `seedrandom` generator) or seed the built-in generator with
 * {@link setSeed}.
 *
 * Implementation notes:
 *  - The built-in generator is a 32-bit Weyl-sequence / xorshift mix. Not cryptographically secure.
 *  - Its whole state is one unsigned 32-bit word (`_rngState`), which {@link snapshotRNG} and
 *    {@link setRNGState} expose for exact replay.
 *
 * @module network.deterministic
 */

/** Function producing pseudo-random numbers in [0, 1). */
export type RandomSource = () => number;

/** Shape of an RNG snapshot object. */
export interface RNGSnapshot {
  state: number | undefined;
}

/**
 * Seed the built-in generator and install it as the network's random source.
 *
 * Process:
 *  1. Coerce the seed to an unsigned 32-bit integer (>>> 0).
 *  2. Each call adds the Weyl constant 0x6D2B79F5 to the state, runs two rounds of xorshift /
 *     `Math.imul` mixing, and divides the final unsigned word by 2^32.
 *
 * @param this - Bound {@link Network} instance.
 * @param seed - Any finite number; only its lower 32 bits are used.
 * @example
 * net.setSeed(1234);
 * const a = net.getRandomFn()();
 * net.setSeed(1234);
 * const b = net.getRandomFn()(); // a === b
 */
export function setSeed(this: Network, seed: number): void {
  this._rngState = seed >>> 0;
  this._rand = () => {
    const state = ((this._rngState ?? 0) + 0x6d2b79f5) >>> 0;
    this._rngState = state;
    let r = Math.imul(state ^ (state >>> 15), 1 | state);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296; // 2^32
  };
}

/**
 * Capture the built-in generator's state word.
 *
 * @returns Snapshot whose `state` is undefined when the network is unseeded or uses an injected
 *   source.
 */
export function snapshotRNG(this: Network): RNGSnapshot {
  return { state: this._rngState };
}

/**
 * Install an external random source (for tests, or a shared seeded generator).
 * Clears the built-in generator's state word.
 *
 * @example
 * net.restoreRNG(seedrandom('test-seed'));
 */
export function restoreRNG(this: Network, fn: RandomSource): void {
  this._rand = fn;
  this._rngState = undefined;
}

/** Current built-in generator state word, or undefined when not seeded. */
export function getRNGState(this: Network): number | undefined {
  return this._rngState;
}

/**
 * Overwrite the built-in generator's state word without replacing the generator, resuming the
 * stream exactly where a {@link snapshotRNG} was taken. Only affects a seeded network.
 */
export function setRNGState(this: Network, state: number): void {
  this._rngState = state >>> 0;
}

/** The active random source. */
export function getRandomFn(this: Network): RandomSource {
  return this._rand;
}

/**
 * Assign every connection a weight drawn uniformly from `[min, max)`.
 *
 * Bounds default to `config.defaultWeightRange` (`[-1, 1)` unless reconfigured).
 *
 * @param this - Bound {@link Network} instance.
 * @throws AnnError `InvalidRange` when `min >= max` or a bound is not finite; weights are left
 *   untouched.
 * @example
 * net.randomizeWeights(-0.5, 0.5);
 */
export function randomizeWeights(this: Network, min?: number, max?: number): void {
  const [defaultMin, defaultMax] = config.defaultWeightRange;
  const lo = min ?? defaultMin;
  const hi = max ?? defaultMax;
  if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo >= hi) {
    throw new AnnError(
      'InvalidRange',
      `weight range requires finite min < max, got [${lo}, ${hi})`
    );
  }
  const span = hi - lo;
  for (const connection of this.connections) {
    const weight = lo + span * this._rand();
    // Rounding can land exactly on the upper bound.
    connection.weight = weight < hi ? weight : lo;
  }
}

export default {
  setSeed,
  snapshotRNG,
  restoreRNG,
  getRNGState,
  setRNGState,
  getRandomFn,
  randomizeWeights,
};
