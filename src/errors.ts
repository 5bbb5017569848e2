/**
 * Error taxonomy shared by every network operation.
 *
 * Failures are thrown as {@link AnnError}; the `code` discriminates the cause so callers (and the
 * handle registry) can branch without parsing messages. A failing operation never leaves a
 * partially modified network behind.
 */
export type AnnErrorCode =
  | 'InvalidTopology'
  | 'MismatchedConnectionArrays'
  | 'IndexOutOfRange'
  | 'InvalidRange'
  | 'InputSizeMismatch'
  | 'OutputSizeMismatch'
  | 'FileWriteError'
  | 'FileReadError'
  | 'MalformedFile'
  | 'UnknownHandle';

export class AnnError extends Error {
  /** Machine-readable failure category. */
  readonly code: AnnErrorCode;

  /**
   * @param code Failure category.
   * @param message Human-readable detail.
   * @param cause Underlying error (file system failures keep the original here).
   * @example
   * throw new AnnError('InputSizeMismatch', 'expected 2 input values, got 3');
   */
  constructor(code: AnnErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AnnError';
    this.code = code;
  }
}

/** Narrow an unknown thrown value to an {@link AnnError}, optionally of a given code. */
export function isAnnError(value: unknown, code?: AnnErrorCode): value is AnnError {
  return value instanceof AnnError && (code === undefined || value.code === code);
}

export default AnnError;
