import type Network from '../network';

/**
 * Human-readable multi-line summary of a network: counts by role, the kind of every neuron
 * (as its serialized integer), then one `source --> target : weight` line per connection.
 *
 * Purely diagnostic; the output is not meant to be parsed back.
 *
 * @param this - Bound {@link Network} instance.
 * @example
 * console.log(net.describe());
 * // Total number of neurons : 2
 * // Number of input neurons : 1
 * // Number of hidden neurons: 0
 * // Number of output neurons: 1
 * // 0 1
 * // Total number of connections: 1
 * // 0 --> 1 : 2
 */
export function describe(this: Network): string {
  const lines = [
    `Total number of neurons : ${this.totalNeurons}`,
    `Number of input neurons : ${this.numInput}`,
    `Number of hidden neurons: ${this.numHidden}`,
    `Number of output neurons: ${this.numOutput}`,
    this.neurons.map((neuron) => neuron.kind).join(' '),
    `Total number of connections: ${this.connections.length}`,
  ];
  for (const { source, target, weight } of this.connections) {
    lines.push(`${source} --> ${target} : ${weight}`);
  }
  return lines.join('\n');
}

export default { describe };
