import type { Converter } from '@typedform/core';
import { ok } from '@typedform/core';

export interface CommaListOptions {
  /** Separator between items. Default: `','`. */
  readonly separator?: string;
}

/**
 * Several values in one input, e.g. `'red, green'`.
 *
 * Blank input without a separator is an empty array. Otherwise every part,
 * blank ones included, is trimmed and parsed by `item`, so a blank part is
 * whatever `item` makes of `''`. The first failing item's error is returned.
 * Items must not contain the separator, or they will not round-trip.
 */
export function commaList<T>(item: Converter<T>, options: CommaListOptions = {}): Converter<T[]> {
  const separator = options.separator ?? ',';
  return {
    parse(raw) {
      if (raw.trim() === '' && !raw.includes(separator)) return ok([]);
      const values: T[] = [];
      for (const part of raw.split(separator)) {
        const parsed = item.parse(part.trim());
        if (!parsed.ok) return parsed;
        values.push(parsed.value);
      }
      return ok(values);
    },
    format(values) {
      return values.map((value) => item.format(value)).join(`${separator} `);
    },
  };
}
