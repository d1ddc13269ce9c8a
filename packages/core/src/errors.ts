/**
 * packages/core/src/errors.ts — Engine error type.
 *
 * Layout itself never throws for document content: bad geometry is clamped and
 * bad style values fall back. `BoxflowError` is reserved for programmer errors
 * such as an invalid engine configuration.
 */

export type BoxflowErrorCode = "BOXFLOW_INVALID_CONFIG" | "BOXFLOW_INVALID_ARGUMENT";

export class BoxflowError extends Error {
  override readonly name = "BoxflowError";
  readonly code: BoxflowErrorCode;

  constructor(code: BoxflowErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BoxflowError);
    }
  }
}
