import type { ParseError } from './ParseError.js';

/** The field holds the empty representation. Not an error until the converter says so on submit. */
export interface EmptyStatus {
  readonly type: 'empty';
}

/** The raw input parsed into a value. */
export interface ValidStatus<T> {
  readonly type: 'valid';
  readonly value: T;
}

/** The raw input failed to parse. */
export interface InvalidStatus {
  readonly type: 'invalid';
  readonly error: ParseError;
}

/** Derived state of a single field, recomputable from its raw input and converter. */
export type FieldStatus<T> = EmptyStatus | ValidStatus<T> | InvalidStatus;

const EMPTY: EmptyStatus = { type: 'empty' };

/** The shared `empty` status. */
export function emptyStatus(): EmptyStatus {
  return EMPTY;
}

/** Create a `valid` status. */
export function validStatus<T>(value: T): ValidStatus<T> {
  return { type: 'valid', value };
}

/** Create an `invalid` status. */
export function invalidStatus(error: ParseError): InvalidStatus {
  return { type: 'invalid', error };
}
