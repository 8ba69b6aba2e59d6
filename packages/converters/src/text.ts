import type { Converter } from '@typedform/core';
import { err, ok, requiredError } from '@typedform/core';

/** Trimmed, non-empty text. Blank input is `REQUIRED`. */
export function text(): Converter<string> {
  return {
    parse(raw) {
      const trimmed = raw.trim();
      return trimmed === '' ? err(requiredError()) : ok(trimmed);
    },
    format(value) {
      return value;
    },
  };
}

/** Text taken verbatim, whitespace included. Only the empty string is `REQUIRED`. */
export function password(): Converter<string> {
  return {
    parse(raw) {
      return raw === '' ? err(requiredError()) : ok(raw);
    },
    format(value) {
      return value;
    },
  };
}
