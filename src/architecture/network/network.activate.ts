import type Network from '../network';
import { Activation } from '../../methods/activation';
import { AnnError } from '../../errors';
import { warnOnce } from '../../utils/warn';

/**
 * Forward evaluation for {@link Network}: input assignment, the activation pass and output
 * retrieval.
 *
 * The pass is single-sweep and order-agnostic: every connection deposits `weight * source.output`
 * into its target, then every non-input neuron squashes what it received. Nothing enforces layer
 * order, so a signal travels exactly one connection hop per call; a network with a hidden layer
 * needs two calls for inputs to reach the outputs.
 *
 * @module network.activate
 */

/** Caller-owned fixed-size buffer that {@link getOutputInto} fills. */
export type OutputBuffer = number[] | Float64Array | Float32Array;

/** Options for the one-call {@link run} helper. */
export interface RunOptions {
  /** Activation passes to perform (default 1). */
  passes?: number;
  /** Rescale each output from [0, 1] to `[low, high]`. */
  outputRange?: [number, number];
}

/**
 * Copy `values` into the outputs of the input neurons, in order.
 *
 * @param this - Bound {@link Network} instance.
 * @throws AnnError `InputSizeMismatch` when `values.length !== numInput`; no neuron is modified.
 */
export function setInput(this: Network, values: readonly number[]): void {
  if (values.length !== this.numInput) {
    throw new AnnError(
      'InputSizeMismatch',
      `expected ${this.numInput} input values, got ${values.length}`
    );
  }
  for (let n = 0; n < this.numInput; n++) this.neurons[n].output = values[n];
}

/** Outputs of the output-layer neurons, in index order, as a new array. */
export function getOutput(this: Network): number[] {
  return this.neurons
    .slice(this.numInputPlusHidden, this.totalNeurons)
    .map((neuron) => neuron.output);
}

/**
 * Fill a caller-provided buffer with the output-layer values.
 *
 * @throws AnnError `OutputSizeMismatch` when `buffer.length !== numOutput`; the buffer is untouched.
 */
export function getOutputInto(this: Network, buffer: OutputBuffer): void {
  if (buffer.length !== this.numOutput) {
    throw new AnnError(
      'OutputSizeMismatch',
      `output buffer holds ${buffer.length} values, network has ${this.numOutput} outputs`
    );
  }
  const outputs = getOutput.call(this);
  for (let i = 0; i < outputs.length; i++) buffer[i] = outputs[i];
}

/**
 * One synchronous activation pass.
 *
 * 1. Accumulation: for each connection in list order, `data = weight * source.output` is added to
 *    the target's `inputSum`.
 * 2. Activation: each neuron at index >= `numInput` takes `logistic(inputSum)` as its output and
 *    resets `inputSum` to 0. Input neurons keep their supplied values.
 *
 * Connections whose endpoints do not exist (only possible after a permissive load) carry no
 * signal.
 *
 * @param this - Bound {@link Network} instance.
 */
export function activate(this: Network): void {
  const neurons = this.neurons;
  for (const connection of this.connections) {
    const source = neurons[connection.source];
    const target = neurons[connection.target];
    if (!source || !target) {
      warnOnce(
        'activate:dangling',
        `Connection ${connection.source} -> ${connection.target} references a missing neuron; skipped during activation.`
      );
      continue;
    }
    connection.data = connection.weight * source.output;
    target.inputSum += connection.data;
  }
  for (let n = this.numInput; n < neurons.length; n++) {
    neurons[n].fire(Activation.logistic);
  }
}

/**
 * Set inputs, activate `passes` times and read the outputs in one call.
 *
 * @throws AnnError `InputSizeMismatch`, or `InvalidRange` when `passes` is not a positive integer.
 * @example
 * net.run([0.2, 0.8], { passes: 2, outputRange: [-1, 1] });
 */
export function run(
  this: Network,
  inputs: readonly number[],
  options: RunOptions = {}
): number[] {
  const passes = options.passes ?? 1;
  if (!Number.isInteger(passes) || passes < 1) {
    throw new AnnError('InvalidRange', `passes must be a positive integer, got ${passes}`);
  }
  setInput.call(this, inputs);
  for (let p = 0; p < passes; p++) activate.call(this);
  const outputs = getOutput.call(this);
  if (!options.outputRange) return outputs;
  const [low, high] = options.outputRange;
  return outputs.map((value) => low + (high - low) * value);
}
