/**
 * Raised when an operation that cannot fail for any input does fail.
 *
 * This marks a bug in textkit itself, never bad user input, so callers
 * should report it and stop rather than turn it into a normal result.
 */
export class InternalDefectError extends Error {
  readonly code = 'INTERNAL_DEFECT' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InternalDefectError';
    Object.setPrototypeOf(this, InternalDefectError.prototype);
  }
}
