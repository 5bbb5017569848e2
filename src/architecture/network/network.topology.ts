import type Network from '../network';
import Neuron, { NeuronKind } from '../neuron';
import Connection from '../connection';
import { AnnError } from '../../errors';

/**
 * Topology helpers: layer-size validation, positional neuron allocation, explicit edge lists and
 * the fully-connected feedforward initializer.
 *
 * Exported functions:
 *  - {@link resolveLayerSizes}: normalize `[in, out]` / `[in, hidden, out]` into counts.
 *  - {@link kindAt}: role of the neuron at a given index.
 *  - {@link createNeurons}: allocate the neuron array for a set of counts.
 *  - {@link createConnections}: validate and build connections from parallel arrays.
 *  - {@link fullyConnectFeedforward}: replace all connections with a dense layered wiring.
 *
 * @module network.topology
 */

/** Explicit edge list as three parallel arrays of equal length. */
export interface ConnectionArrays {
  sources: readonly number[];
  targets: readonly number[];
  weights: readonly number[];
}

/** Neuron counts per role. */
export interface LayerCounts {
  numInput: number;
  numHidden: number;
  numOutput: number;
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Normalize a layer-size list.
 *
 * @param sizes `[numInput, numOutput]` (no hidden layer) or `[numInput, numHidden, numOutput]`.
 * @throws AnnError `InvalidTopology` for any other length or for a size that is not a
 *   non-negative integer.
 */
export function resolveLayerSizes(sizes: readonly number[]): LayerCounts {
  if (sizes.length !== 2 && sizes.length !== 3) {
    throw new AnnError(
      'InvalidTopology',
      `layer sizes must have 2 or 3 elements, got ${sizes.length}`
    );
  }
  const bad = sizes.find((size) => !isCount(size));
  if (bad !== undefined) {
    throw new AnnError(
      'InvalidTopology',
      `layer sizes must be non-negative integers, got ${bad}`
    );
  }
  return sizes.length === 2
    ? { numInput: sizes[0], numHidden: 0, numOutput: sizes[1] }
    : { numInput: sizes[0], numHidden: sizes[1], numOutput: sizes[2] };
}

/** Role of the neuron at `index` under the positional layout. */
export function kindAt(index: number, layers: LayerCounts): NeuronKind {
  if (index < layers.numInput) return NeuronKind.Input;
  if (index < layers.numInput + layers.numHidden) return NeuronKind.Hidden;
  return NeuronKind.Output;
}

/** Allocate one neuron per position, kind assigned by range. */
export function createNeurons(layers: LayerCounts): Neuron[] {
  const total = layers.numInput + layers.numHidden + layers.numOutput;
  const neurons: Neuron[] = [];
  for (let n = 0; n < total; n++) neurons.push(new Neuron(kindAt(n, layers)));
  return neurons;
}

/**
 * Build connections from parallel arrays, preserving order.
 *
 * @param arrays Edge list; omitted means no connections.
 * @param totalNeurons Exclusive upper bound for indices.
 * @throws AnnError `MismatchedConnectionArrays` when lengths differ, `IndexOutOfRange` when an
 *   index is not an integer in `[0, totalNeurons)`.
 */
export function createConnections(
  arrays: ConnectionArrays | undefined,
  totalNeurons: number
): Connection[] {
  if (!arrays) return [];
  const { sources, targets, weights } = arrays;
  if (sources.length !== targets.length || sources.length !== weights.length) {
    throw new AnnError(
      'MismatchedConnectionArrays',
      `connection arrays differ in length (sources: ${sources.length}, targets: ${targets.length}, weights: ${weights.length})`
    );
  }
  const inRange = (index: number) =>
    Number.isInteger(index) && index >= 0 && index < totalNeurons;
  const connections: Connection[] = [];
  for (let c = 0; c < sources.length; c++) {
    if (!inRange(sources[c]) || !inRange(targets[c])) {
      throw new AnnError(
        'IndexOutOfRange',
        `connection ${c} (${sources[c]} -> ${targets[c]}) is outside [0, ${totalNeurons})`
      );
    }
    connections.push(new Connection(sources[c], targets[c], weights[c]));
  }
  return connections;
}

/**
 * Replace every connection with a dense layered wiring, all weights 0.
 *
 * With a hidden layer: each input neuron feeds every hidden neuron, then each hidden neuron feeds
 * every output neuron, giving `numHidden * (numInput + numOutput)` connections. Without one, each
 * input neuron feeds every output neuron directly (`numInput * numOutput` connections).
 *
 * @param this - Bound {@link Network} instance.
 * @example
 * const net = new Network([2, 3, 1]);
 * net.fullyConnectFeedforward();
 * net.connections.length; // 9
 */
export function fullyConnectFeedforward(this: Network): void {
  const connections: Connection[] = [];
  const hiddenStart = this.numInput;
  const outputStart = this.numInputPlusHidden;
  if (this.numHidden === 0) {
    for (let i = 0; i < this.numInput; i++)
      for (let o = outputStart; o < this.totalNeurons; o++)
        connections.push(new Connection(i, o, 0));
  } else {
    for (let i = 0; i < this.numInput; i++)
      for (let h = hiddenStart; h < outputStart; h++)
        connections.push(new Connection(i, h, 0));
    for (let h = hiddenStart; h < outputStart; h++)
      for (let o = outputStart; o < this.totalNeurons; o++)
        connections.push(new Connection(h, o, 0));
  }
  this.connections = connections;
}
