/**
 * Role of a neuron inside the layered network.
 *
 * The numeric values are written verbatim by the text serializer, so the order
 * (Input, Output, Hidden) must not change even though it differs from the layout order.
 */
export enum NeuronKind {
  Input = 0,
  Output = 1,
  Hidden = 2,
}

/** Number of defined neuron kinds. */
export const NEURON_KIND_COUNT = 3;

/** Type guard for integers read back from a serialized network. */
export function isNeuronKind(value: number): value is NeuronKind {
  return (
    value === NeuronKind.Input ||
    value === NeuronKind.Output ||
    value === NeuronKind.Hidden
  );
}

/**
 * A single computational unit.
 *
 * Input neurons hold the value supplied by `setInput`; hidden and output neurons hold the squashed
 * sum of their weighted inputs from the most recent activation pass.
 */
export default class Neuron {
  /** Role; fixed by the neuron's position in the network. */
  readonly kind: NeuronKind;
  /** Weighted signals accumulated during the current pass. Reset to 0 once squashed. */
  inputSum: number;
  /** Last activation value (or the supplied input value for input neurons). */
  output: number;

  constructor(kind: NeuronKind) {
    this.kind = kind;
    this.inputSum = 0;
    this.output = 0;
  }

  /**
   * Squash the accumulated input through `squash` and clear the accumulator.
   * @returns The new output value.
   */
  fire(squash: (x: number) => number): number {
    this.output = squash(this.inputSum);
    this.inputSum = 0;
    return this.output;
  }
}
