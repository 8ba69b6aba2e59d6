import type { FieldPath } from './FieldPath.js';
import type { ParseError } from './ParseError.js';

/** A parse failure located at one field of the tree. */
export interface FieldError {
  /** Path of the failing field. */
  readonly path: FieldPath;
  /** `formatPath(path)`, the key this error is stored under. */
  readonly key: string;
  readonly error: ParseError;
  /** `describeParseError(error)`. */
  readonly message: string;
}

/** All field errors of one evaluation, keyed by formatted path, in declaration order. */
export type FieldErrors = ReadonlyMap<string, FieldError>;

/**
 * Outcome of submitting an aggregate: the assembled model, or every field error
 * found by one full traversal.
 */
export type SubmitResult<M> = { readonly ok: true; readonly value: M } | { readonly ok: false; readonly errors: FieldErrors };
