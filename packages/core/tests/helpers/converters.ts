import type { Converter } from '../../src/domain/ports/Converter.js';
import { err, ok } from '../../src/domain/model/Result.js';
import { invalidFormatError, requiredError } from '../../src/domain/model/ParseError.js';

/** Identity converter that rejects the empty string. */
export function requiredString(): Converter<string> {
  return {
    parse: (raw) => (raw === '' ? err(requiredError()) : ok(raw)),
    format: (value) => value,
  };
}

/** Plain decimal integers; empty is `REQUIRED`. */
export function int(): Converter<number> {
  return {
    parse: (raw) => {
      if (raw.trim() === '') return err(requiredError());
      return /^-?\d+$/.test(raw.trim()) ? ok(Number(raw.trim())) : err(invalidFormatError('a number'));
    },
    format: (value) => String(value),
  };
}

/** Optional text: blank parses to `undefined`. */
export function maybeString(): Converter<string | undefined> {
  return {
    parse: (raw) => (raw.trim() === '' ? ok(undefined) : ok(raw.trim())),
    format: (value) => value ?? '',
  };
}
