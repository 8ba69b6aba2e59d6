import type { Result } from '../model/Result.js';
import type { ParseError } from '../model/ParseError.js';

/**
 * Parse/format strategy for one value type, supplied by the caller per field.
 *
 * Implementations must be pure and satisfy the round-trip law: for every value
 * `v` that `parse` can produce, `parse(format(v))` yields a value equal to `v`.
 * `parse('')` decides what an empty field submits as: a required type returns
 * a `REQUIRED` error, an optional or defaulted type returns its empty value.
 */
export interface Converter<T> {
  parse(raw: string): Result<T, ParseError>;
  format(value: T): string;
}
