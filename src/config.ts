/**
 * Global configuration contract & default instance.
 *
 * A central `config` object offers one documented surface for end-users (and tests) to tweak
 * library behaviour without digging through scattered constants.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'layered-ann';
 *   config.warnings = true;            // report failures swallowed at the registry boundary
 *   config.strictDeserialize = false;  // read malformed files the permissive way
 *
 * Fields are read at call time, so changes take effect on the next operation.
 *
 * DESIGN NOTES
 * ------------
 * - Plain serializable object: no setters, no proxies.
 * - Do NOT reassign the binding; imports retain the reference.
 */
export interface AnnConfig {
  /**
   * Emit warnings to stderr (`console.warn`) for failures the registry turns into status codes
   * and for anomalies accepted by the permissive reader.
   * Default: false
   */
  warnings: boolean;

  /**
   * Validate serialized networks before replacing any state. When false the reader trusts the
   * counts it finds and keeps out-of-range connection indices as written.
   * Default: true
   */
  strictDeserialize: boolean;

  /**
   * Significant digits used when writing weights to the text format, an integer in [1, 100]. Leave
   * undefined to write the shortest decimal that reads back to the same double.
   */
  weightPrecision?: number;

  /**
   * Range used by `randomizeWeights()` when called without bounds. Lower bound inclusive, upper
   * bound exclusive.
   * Default: [-1, 1]
   */
  defaultWeightRange: [number, number];
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 */
export const config: AnnConfig = {
  warnings: false,
  strictDeserialize: true,
  defaultWeightRange: [-1, 1],
  // weightPrecision: 6, // example: match six significant digit text dumps
};
