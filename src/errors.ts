/**
 * Error taxonomy for font loading, atlas building and drawing.
 *
 * - FatalConfig: font data unreadable, backend or rasterizer unusable. Construction aborts.
 * - MissingResource: a font name resolves to nothing. The caller degrades.
 * - PreconditionViolation: programmer error (colour count mismatch, metrics never cached).
 */

export type SdfTextErrorKind = "FatalConfig" | "MissingResource" | "PreconditionViolation";

export class SdfTextError extends Error {
  readonly kind: SdfTextErrorKind;

  constructor(kind: SdfTextErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SdfTextError";
    this.kind = kind;
  }
}

/** Outcome of an operation that can fail without throwing */
export type Result<T, E = SdfTextError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Return the value of a result or throw the carried error */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
