/**
 * packages/core/src/errors.ts — Error type for caller-facing violations.
 *
 * Layout itself never throws: bad geometry is clamped and reported as data
 * (see layout/engine/clamps.ts). The only thing that can fail is reading a
 * configuration the caller asked to be validated.
 */

export type CellflexErrorCode = "CFLX_INVALID_CONFIG";

export class CellflexError extends Error {
  override readonly name = "CellflexError";
  readonly code: CellflexErrorCode;

  constructor(code: CellflexErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CellflexError);
    }
  }
}
