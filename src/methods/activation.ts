/**
 * Activation (squashing) functions applied to hidden and output neurons.
 *
 * Only the clamped logistic is used by the evaluator. The clamp thresholds are part of the
 * numeric contract: networks saved by one implementation must produce the same outputs when
 * loaded by another, so the two flat segments are reproduced exactly.
 *
 * @see {@link https://en.wikipedia.org/wiki/Logistic_function}
 */
export class Activation {
  /** Inputs at or beyond this magnitude saturate to exactly 0 or 1. */
  static readonly LOGISTIC_CLAMP = 15;

  /**
   * Clamped logistic sigmoid.
   *
   * Returns 0 for `x <= -15`, 1 for `x >= 15`, otherwise `1 / (1 + e^-x)`.
   * @param x Weighted input sum.
   * @example
   * Activation.logistic(0);   // 0.5
   * Activation.logistic(-20); // 0
   */
  static logistic(x: number): number {
    if (x <= -Activation.LOGISTIC_CLAMP) return 0;
    if (x >= Activation.LOGISTIC_CLAMP) return 1;
    return 1 / (1 + Math.exp(-x));
  }
}

export default Activation;
