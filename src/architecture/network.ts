import Neuron from './neuron';
import Connection from './connection';
import {
  resolveLayerSizes,
  createNeurons,
  createConnections,
  fullyConnectFeedforward as _fullyConnectFeedforward,
} from './network/network.topology';
import type { ConnectionArrays } from './network/network.topology';
import {
  setSeed as _setSeed,
  snapshotRNG as _snapshotRNG,
  restoreRNG as _restoreRNG,
  getRNGState as _getRNGState,
  setRNGState as _setRNGState,
  getRandomFn as _getRandomFn,
  randomizeWeights as _randomizeWeights,
} from './network/network.deterministic';
import type { RandomSource, RNGSnapshot } from './network/network.deterministic';
import {
  setInput as _setInput,
  getOutput as _getOutput,
  getOutputInto as _getOutputInto,
  activate as _activate,
  run as _run,
} from './network/network.activate';
import type { OutputBuffer, RunOptions } from './network/network.activate';
import {
  toText as _toText,
  serialize as _serialize,
  deserialize as _deserialize,
  loadText as _loadText,
  toJSONImpl as _toJSONImpl,
  parseNetworkJSON,
} from './network/network.serialize';
import type { NetworkJSON } from './network/network.serialize';
import { describe as _describe } from './network/network.stats';

/** Options accepted by every way of creating a {@link Network}. */
export interface NetworkOptions {
  /** Random source used by `randomizeWeights` (numbers in [0, 1)). */
  random?: RandomSource;
  /** Seed for the built-in deterministic generator. Ignored when `random` is given. */
  seed?: number;
}

/**
 * Complete structural state of a network. Produced by the readers and swapped in as a whole so a
 * failed load never leaves a half-replaced network.
 */
export interface NetworkState {
  numInput: number;
  numHidden: number;
  numOutput: number;
  numInputPlusHidden: number;
  totalNeurons: number;
  neurons: Neuron[];
  connections: Connection[];
}

/**
 * Layered feedforward network evaluator.
 *
 * Neurons are stored in one array laid out by role:
 *
 *   [0, numInput)                       input
 *   [numInput, numInputPlusHidden)      hidden
 *   [numInputPlusHidden, totalNeurons)  output
 *
 * Connections refer to neurons by index. The class keeps the state and the public surface; the
 * work is delegated to the `network/network.*` helper modules.
 *
 * @example
 * const net = new Network([1, 1], { sources: [0], targets: [1], weights: [2] });
 * net.setInput([3]);
 * net.activate();
 * net.getOutput(); // [0.9975273768433653]
 */
export default class Network {
  numInput: number;
  numHidden: number;
  numOutput: number;
  numInputPlusHidden: number;
  totalNeurons: number;
  neurons: Neuron[];
  connections: Connection[];
  /** @internal Active random source. */
  _rand: RandomSource = Math.random;
  /** @internal State word of the built-in generator (undefined when unseeded or injected). */
  _rngState?: number;

  /**
   * @param layerSizes `[numInput, numOutput]` or `[numInput, numHidden, numOutput]`.
   * @param connections Optional explicit edges as three parallel arrays.
   * @param options Random source injection / seeding.
   * @throws AnnError `InvalidTopology`, `MismatchedConnectionArrays` or `IndexOutOfRange`.
   */
  constructor(
    layerSizes: readonly number[],
    connections?: ConnectionArrays,
    options?: NetworkOptions
  ) {
    const layers = resolveLayerSizes(layerSizes);
    const numInputPlusHidden = layers.numInput + layers.numHidden;
    const totalNeurons = numInputPlusHidden + layers.numOutput;
    // Validate edges before touching any field.
    const edges = createConnections(connections, totalNeurons);

    this.numInput = layers.numInput;
    this.numHidden = layers.numHidden;
    this.numOutput = layers.numOutput;
    this.numInputPlusHidden = numInputPlusHidden;
    this.totalNeurons = totalNeurons;
    this.neurons = createNeurons(layers);
    this.connections = edges;

    if (options?.random) this.restoreRNG(options.random);
    else if (options?.seed !== undefined) this.setSeed(options.seed);
  }

  /**
   * Load a network previously written by {@link serialize}.
   * @throws AnnError `FileReadError` or `MalformedFile`.
   */
  static fromFile(path: string, options?: NetworkOptions): Network {
    const net = new Network([0, 0], undefined, options);
    net.deserialize(path);
    return net;
  }

  /** Parse the text format in memory (see {@link toText}). */
  static fromText(text: string, options?: NetworkOptions): Network {
    const net = new Network([0, 0], undefined, options);
    net.loadText(text);
    return net;
  }

  /**
   * Rebuild a network from {@link toJSON} output. Goes through the same validation as the
   * constructor.
   */
  static fromJSON(json: unknown, options?: NetworkOptions): Network {
    const { layers, connections } = parseNetworkJSON(json);
    return new Network(layers, connections, options);
  }

  /** @internal Swap in a complete state produced by a reader. */
  _adopt(state: NetworkState): void {
    this.numInput = state.numInput;
    this.numHidden = state.numHidden;
    this.numOutput = state.numOutput;
    this.numInputPlusHidden = state.numInputPlusHidden;
    this.totalNeurons = state.totalNeurons;
    this.neurons = state.neurons;
    this.connections = state.connections;
  }

  /** Layer sizes in constructor form (`[in, out]` when there is no hidden layer). */
  get layerSizes(): number[] {
    return this.numHidden === 0
      ? [this.numInput, this.numOutput]
      : [this.numInput, this.numHidden, this.numOutput];
  }

  // --- Topology ---
  fullyConnectFeedforward(): void {
    _fullyConnectFeedforward.call(this);
  }

  // --- Randomness (network.deterministic) ---
  setSeed(seed: number): void {
    _setSeed.call(this, seed);
  }
  snapshotRNG(): RNGSnapshot {
    return _snapshotRNG.call(this);
  }
  restoreRNG(fn: RandomSource): void {
    _restoreRNG.call(this, fn);
  }
  getRNGState(): number | undefined {
    return _getRNGState.call(this);
  }
  setRNGState(state: number): void {
    _setRNGState.call(this, state);
  }
  getRandomFn(): RandomSource {
    return _getRandomFn.call(this);
  }
  randomizeWeights(min?: number, max?: number): void {
    _randomizeWeights.call(this, min, max);
  }

  // --- Evaluation (network.activate) ---
  setInput(values: readonly number[]): void {
    _setInput.call(this, values);
  }
  getOutput(): number[] {
    return _getOutput.call(this);
  }
  getOutputInto(buffer: OutputBuffer): void {
    _getOutputInto.call(this, buffer);
  }
  activate(): void {
    _activate.call(this);
  }
  run(inputs: readonly number[], options?: RunOptions): number[] {
    return _run.call(this, inputs, options);
  }

  // --- Persistence (network.serialize) ---
  toText(): string {
    return _toText.call(this);
  }
  serialize(path: string): void {
    _serialize.call(this, path);
  }
  deserialize(path: string): void {
    _deserialize.call(this, path);
  }
  loadText(text: string): void {
    _loadText.call(this, text);
  }
  toJSON(): NetworkJSON {
    return _toJSONImpl.call(this);
  }

  // --- Diagnostics (network.stats) ---
  describe(): string {
    return _describe.call(this);
  }
  toString(): string {
    return this.describe();
  }
}
