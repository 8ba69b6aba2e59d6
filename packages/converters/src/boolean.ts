import type { Converter } from '@typedform/core';
import { err, invalidFormatError, ok, requiredError } from '@typedform/core';

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

/** `true/yes/on/1` and `false/no/off/0`, case-insensitive. Formats as `'true'` / `'false'`. */
export function boolean(): Converter<boolean> {
  return {
    parse(raw) {
      const word = raw.trim().toLowerCase();
      if (word === '') return err(requiredError());
      if (TRUE_WORDS.has(word)) return ok(true);
      if (FALSE_WORDS.has(word)) return ok(false);
      return err(invalidFormatError('yes or no'));
    },
    format(value) {
      return value ? 'true' : 'false';
    },
  };
}
