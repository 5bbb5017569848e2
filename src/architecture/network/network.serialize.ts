import * as fs from 'fs';
import type Network from '../network';
import type { NetworkState } from '../network';
import Neuron, { NeuronKind, isNeuronKind } from '../neuron';
import Connection from '../connection';
import type { ConnectionJSON } from '../connection';
import { kindAt, resolveLayerSizes } from './network.topology';
import type { ConnectionArrays } from './network.topology';
import { AnnError } from '../../errors';
import { config } from '../../config';
import { warn } from '../../utils/warn';

/**
 * Serialization & deserialization helpers for Network instances.
 *
 * Provides two independent formats:
 *  1. Plain text (toText / serialize / deserialize): one value per line, compatible with files
 *     written by earlier evaluators. This is the persisted artifact.
 *  2. Verbose JSON (toJSONImpl / parseNetworkJSON): convenient for embedding a network inside
 *     other JSON documents.
 *
 * Text layout:
 *
 *   numInput
 *   numHidden
 *   numOutput
 *   numInputPlusHidden
 *   totalNeurons
 *   <kind>            x totalNeurons  (Input=0, Output=1, Hidden=2)
 *   totalConnections
 *   <source>
 *   <target>
 *   <weight>          x totalConnections
 *
 * Activation state (`output`, `inputSum`, `data`) is never written; a loaded network starts with
 * all of it at zero.
 *
 * The reader splits on any whitespace, so values need not sit on separate lines.
 */

/** Verbose JSON representation produced by {@link toJSONImpl}. */
export interface NetworkJSON {
  formatVersion: 1;
  layers: number[];
  neurons: NeuronKind[];
  connections: ConnectionJSON[];
}

/** Largest digit count `Number.prototype.toPrecision` accepts. */
const MAX_WEIGHT_PRECISION = 100;

/**
 * Weight formatter for the current `config.weightPrecision`.
 *
 * @throws AnnError `InvalidRange` when the setting is not an integer in [1, 100].
 */
function weightFormatter(): (weight: number) => string {
  const digits = config.weightPrecision;
  if (digits === undefined) return (weight) => String(weight);
  if (!Number.isInteger(digits) || digits < 1 || digits > MAX_WEIGHT_PRECISION) {
    throw new AnnError(
      'InvalidRange',
      `config.weightPrecision must be an integer in [1, ${MAX_WEIGHT_PRECISION}], got ${digits}`
    );
  }
  return (weight) => String(Number(weight.toPrecision(digits)));
}

/**
 * Render the network in the text format.
 *
 * @param this - Bound {@link Network} instance.
 * @example
 * new Network([1, 1], { sources: [0], targets: [1], weights: [2] }).toText();
 * // "1\n0\n1\n1\n2\n0\n1\n1\n0\n1\n2\n"
 */
export function toText(this: Network): string {
  const formatWeight = weightFormatter();
  const lines: string[] = [
    String(this.numInput),
    String(this.numHidden),
    String(this.numOutput),
    String(this.numInputPlusHidden),
    String(this.totalNeurons),
  ];
  for (const neuron of this.neurons) lines.push(String(neuron.kind));
  lines.push(String(this.connections.length));
  for (const connection of this.connections) {
    lines.push(
      String(connection.source),
      String(connection.target),
      formatWeight(connection.weight)
    );
  }
  return lines.join('\n') + '\n';
}

/**
 * Write the text format to `path`, replacing any existing file.
 *
 * @throws AnnError `FileWriteError` when the file cannot be written, `InvalidRange` for a bad
 *   `config.weightPrecision` (nothing is written).
 */
export function serialize(this: Network, path: string): void {
  const text = toText.call(this);
  try {
    fs.writeFileSync(path, text, 'utf8');
  } catch (err) {
    throw new AnnError('FileWriteError', `could not write network to ${path}`, err);
  }
}

/**
 * Sequential reader over whitespace-separated tokens. Every read names the field it expects so a
 * truncated or corrupted file reports where it went wrong.
 */
class TokenReader {
  private readonly tokens: string[];
  private position = 0;

  constructor(text: string) {
    const trimmed = text.trim();
    this.tokens = trimmed === '' ? [] : trimmed.split(/\s+/);
  }

  number(field: string): number {
    if (this.position >= this.tokens.length) {
      throw new AnnError('MalformedFile', `unexpected end of input while reading ${field}`);
    }
    const token = this.tokens[this.position++];
    const value = Number(token);
    if (Number.isNaN(value)) {
      throw new AnnError('MalformedFile', `expected a number for ${field}, got "${token}"`);
    }
    return value;
  }

  /** Like {@link number}, but also takes the `NaN` token the writer emits for a NaN weight. */
  weight(field: string): number {
    if (this.tokens[this.position] === 'NaN') {
      this.position++;
      return NaN;
    }
    return this.number(field);
  }

  count(field: string): number {
    const value = this.number(field);
    if (!Number.isInteger(value) || value < 0) {
      throw new AnnError(
        'MalformedFile',
        `expected a non-negative integer for ${field}, got ${value}`
      );
    }
    return value;
  }
}

/**
 * Parse the text format into a complete network state.
 *
 * Both modes require integer counts, indices and known kind values, and counts that split
 * `totalNeurons` into input, hidden and output ranges. Strict mode additionally checks that the
 * derived counts agree with the layer counts, that each neuron's kind matches its
 * position and that every connection index is in range. Permissive mode keeps what it reads.
 *
 * @param text Serialized network.
 * @param strict Validation mode; defaults to `config.strictDeserialize`.
 * @throws AnnError `MalformedFile`.
 */
export function parseText(
  text: string,
  strict: boolean = config.strictDeserialize
): NetworkState {
  const reader = new TokenReader(text);
  const numInput = reader.count('numInput');
  const numHidden = reader.count('numHidden');
  const numOutput = reader.count('numOutput');
  const numInputPlusHidden = reader.count('numInputPlusHidden');
  const totalNeurons = reader.count('totalNeurons');
  const layers = { numInput, numHidden, numOutput };

  if (numInputPlusHidden !== numInput + numHidden || totalNeurons !== numInputPlusHidden + numOutput) {
    const detail = `derived counts (${numInputPlusHidden}, ${totalNeurons}) disagree with layers [${numInput}, ${numHidden}, ${numOutput}]`;
    if (strict) throw new AnnError('MalformedFile', detail);
    // Input, hidden and output ranges must still partition the neuron array.
    if (
      numInput > numInputPlusHidden ||
      numInputPlusHidden > totalNeurons ||
      numOutput !== totalNeurons - numInputPlusHidden
    ) {
      throw new AnnError('MalformedFile', `${detail}; no layout of ${totalNeurons} neurons fits them`);
    }
    warn(`parseText: ${detail}; keeping counts as written.`);
  }

  const neurons: Neuron[] = [];
  for (let n = 0; n < totalNeurons; n++) {
    const kind = reader.count(`kind of neuron ${n}`);
    if (!isNeuronKind(kind)) {
      throw new AnnError('MalformedFile', `unknown neuron kind ${kind} at neuron ${n}`);
    }
    if (strict && kind !== kindAt(n, layers)) {
      throw new AnnError(
        'MalformedFile',
        `neuron ${n} has kind ${kind}, expected ${kindAt(n, layers)} for its position`
      );
    }
    neurons.push(new Neuron(kind));
  }

  const totalConnections = reader.count('totalConnections');
  const connections: Connection[] = [];
  for (let c = 0; c < totalConnections; c++) {
    const source = reader.count(`source of connection ${c}`);
    const target = reader.count(`target of connection ${c}`);
    const weight = reader.weight(`weight of connection ${c}`);
    if (source >= totalNeurons || target >= totalNeurons) {
      const detail = `connection ${c} (${source} -> ${target}) is outside [0, ${totalNeurons})`;
      if (strict) throw new AnnError('MalformedFile', detail);
      warn(`parseText: ${detail}; kept as written.`);
    }
    connections.push(new Connection(source, target, weight));
  }

  return {
    numInput,
    numHidden,
    numOutput,
    numInputPlusHidden,
    totalNeurons,
    neurons,
    connections,
  };
}

/** Replace the network's whole state with the parsed text. State is untouched on failure. */
export function loadText(this: Network, text: string): void {
  this._adopt(parseText(text));
}

/**
 * Read a network written by {@link serialize}, replacing all neurons and connections.
 *
 * @throws AnnError `FileReadError` when the file cannot be read, `MalformedFile` when its content
 *   does not parse.
 */
export function deserialize(this: Network, path: string): void {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf8');
  } catch (err) {
    throw new AnnError('FileReadError', `could not read network from ${path}`, err);
  }
  loadText.call(this, text);
}

/**
 * Verbose JSON export. Omits activation state; neuron kinds are informational and checked on
 * import.
 */
export function toJSONImpl(this: Network): NetworkJSON {
  return {
    formatVersion: 1,
    layers: this.layerSizes,
    neurons: this.neurons.map((neuron) => neuron.kind),
    connections: this.connections.map((connection) => connection.toJSON()),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function numberList(value: unknown, field: string): number[] {
  if (!Array.isArray(value)) {
    throw new AnnError('MalformedFile', `${field} must be an array`);
  }
  return value.map((item: unknown, i) => {
    if (typeof item !== 'number') {
      throw new AnnError('MalformedFile', `${field}[${i}] must be a number`);
    }
    return item;
  });
}

/**
 * Validate the shape of {@link NetworkJSON} and convert it to constructor arguments.
 * Index ranges are left to the constructor.
 *
 * @throws AnnError `MalformedFile` for a wrong shape or kinds that contradict the layout,
 *   `InvalidTopology` for bad layer sizes.
 */
export function parseNetworkJSON(json: unknown): {
  layers: number[];
  connections: ConnectionArrays;
} {
  if (!isRecord(json)) throw new AnnError('MalformedFile', 'network JSON must be an object');
  if (json.formatVersion !== 1) {
    warn(`fromJSON: unknown formatVersion ${String(json.formatVersion)}, attempting import.`);
  }
  const layers = numberList(json.layers, 'layers');
  const counts = resolveLayerSizes(layers);
  if (json.neurons !== undefined) {
    const kinds = numberList(json.neurons, 'neurons');
    const total = counts.numInput + counts.numHidden + counts.numOutput;
    if (kinds.length !== total || kinds.some((kind, n) => kind !== kindAt(n, counts))) {
      throw new AnnError('MalformedFile', 'neuron kinds do not match the layer sizes');
    }
  }
  if (!Array.isArray(json.connections)) {
    throw new AnnError('MalformedFile', 'connections must be an array');
  }
  const sources: number[] = [];
  const targets: number[] = [];
  const weights: number[] = [];
  json.connections.forEach((entry: unknown, c: number) => {
    if (
      !isRecord(entry) ||
      typeof entry.source !== 'number' ||
      typeof entry.target !== 'number' ||
      typeof entry.weight !== 'number'
    ) {
      throw new AnnError('MalformedFile', `connections[${c}] must have numeric source, target and weight`);
    }
    sources.push(entry.source);
    targets.push(entry.target);
    weights.push(entry.weight);
  });
  return { layers, connections: { sources, targets, weights } };
}
