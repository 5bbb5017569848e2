/**
 * Connection (aka Synapse / Link)
 * ===============================
 * A directed, weighted edge between two neurons of a network, addressed by position.
 *
 * Endpoints are indices into the owning network's neuron array. The persisted form is the
 * `(source, target, weight)` triple.
 */
export default class Connection {
  /** Index of the source (pre-synaptic) neuron. */
  source: number;
  /** Index of the target (post-synaptic) neuron. */
  target: number;
  /** Scalar multiplier applied to the source output. */
  weight: number;
  /**
   * Signal carried on the last activation pass (`weight * source.output`).
   * Informational only; recomputed every pass and never persisted.
   */
  data: number;

  /**
   * @param source Source neuron index.
   * @param target Target neuron index.
   * @param weight Initial weight (default 0).
   * @example
   * const link = new Connection(0, 3, 0.42);
   * link.weight; // 0.42
   */
  constructor(source: number, target: number, weight: number = 0) {
    this.source = source;
    this.target = target;
    this.weight = weight;
    this.data = 0;
  }

  /**
   * Minimal JSON-friendly shape used by the verbose export.
   * @example
   * new Connection(0, 2, 0.5).toJSON(); // { source: 0, target: 2, weight: 0.5 }
   */
  toJSON(): ConnectionJSON {
    return { source: this.source, target: this.target, weight: this.weight };
  }
}

/** Serialized connection triple. */
export interface ConnectionJSON {
  source: number;
  target: number;
  weight: number;
}
