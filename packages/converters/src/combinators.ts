import type { Converter, Result } from '@typedform/core';
import { err, fromStringError, invalidFormatError, ok, requiredError } from '@typedform/core';

/** Make any converter accept blank input as `undefined`. */
export function optionalValue<T>(inner: Converter<T>): Converter<T | undefined> {
  return {
    parse(raw) {
      return raw.trim() === '' ? ok(undefined) : inner.parse(raw);
    },
    format(value) {
      return value === undefined ? '' : inner.format(value);
    },
  };
}

/**
 * Narrow a parsed value into a stricter type, e.g. a port number from an integer.
 * A string returned by `tryFrom` becomes a `FROM_STRING` error.
 *
 * @param into - Maps the refined value back for formatting.
 */
export function refine<T, U>(
  base: Converter<T>,
  tryFrom: (value: T) => Result<U, string>,
  into: (value: U) => T,
): Converter<U> {
  return {
    parse(raw) {
      const parsed = base.parse(raw);
      if (!parsed.ok) return parsed;
      const refined = tryFrom(parsed.value);
      return refined.ok ? refined : err(fromStringError(refined.error));
    },
    format(value) {
      return base.format(into(value));
    },
  };
}

/** Add a check to a converter without changing its type. `check` returns a reason to reject, or `undefined`. */
export function ensure<T>(base: Converter<T>, check: (value: T) => string | undefined): Converter<T> {
  return refine(
    base,
    (value) => {
      const reason = check(value);
      return reason === undefined ? ok(value) : err(reason);
    },
    (value) => value,
  );
}

export interface StringOpsOptions<T> {
  /** Name used in the `INVALID_FORMAT` error, e.g. `'a URL'`. */
  readonly requiredType: string;
  /** Default: `String(value)`. */
  readonly format?: (value: T) => string;
}

/**
 * Adapt a plain parse function that throws or returns `undefined` on bad input.
 * Input is trimmed; blank input is `REQUIRED`.
 *
 * @example
 * ```typescript
 * const url = fromStringOps((s) => new URL(s), { requiredType: 'a URL', format: (u) => u.href });
 * ```
 */
export function fromStringOps<T>(parse: (trimmed: string) => T | undefined, options: StringOpsOptions<T>): Converter<T> {
  const format = options.format ?? ((value: T) => String(value));
  return {
    parse(raw) {
      const trimmed = raw.trim();
      if (trimmed === '') return err(requiredError());
      let value: T | undefined;
      try {
        value = parse(trimmed);
      } catch {
        return err(invalidFormatError(options.requiredType));
      }
      return value === undefined ? err(invalidFormatError(options.requiredType)) : ok(value);
    },
    format,
  };
}
