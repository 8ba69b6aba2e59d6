import type { Converter, ParseError, Result } from '@typedform/core';
import { err, invalidFormatError, numberOutOfRangeError, ok, requiredError } from '@typedform/core';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface IntegerOptions {
  /** Name used in error messages, e.g. `'a port'`. Default: `'a whole number'`. */
  readonly requiredType?: string;
  /** Inclusive lower bound. Default: `Number.MIN_SAFE_INTEGER`. */
  readonly min?: number;
  /** Inclusive upper bound. Default: `Number.MAX_SAFE_INTEGER`. */
  readonly max?: number;
}

export interface IntegerWithDefaultOptions extends IntegerOptions {
  /** Value an empty input parses to. Default: `0`. */
  readonly defaultValue?: number;
}

export interface FloatOptions {
  /** Name used in error messages. Default: `'a number'`. */
  readonly requiredType?: string;
}

/**
 * Whole numbers within `[min, max]`. Blank input is `REQUIRED`; anything that
 * is not an integer in range is `NUMBER_OUT_OF_RANGE` and names the bounds.
 */
export function integer(options: IntegerOptions = {}): Converter<number> {
  const parseInRange = rangedIntegerParser(options);
  return {
    parse(raw) {
      const trimmed = raw.trim();
      return trimmed === '' ? err(requiredError()) : parseInRange(trimmed);
    },
    format(value) {
      return String(value);
    },
  };
}

/** Like `integer()`, but blank input parses to `defaultValue`. */
export function integerWithDefault(options: IntegerWithDefaultOptions = {}): Converter<number> {
  const parseInRange = rangedIntegerParser(options);
  const defaultValue = options.defaultValue ?? 0;
  return {
    parse(raw) {
      const trimmed = raw.trim();
      return trimmed === '' ? ok(defaultValue) : parseInRange(trimmed);
    },
    format(value) {
      return String(value);
    },
  };
}

/** Finite decimal numbers, with optional exponent. */
export function float(options: FloatOptions = {}): Converter<number> {
  const requiredType = options.requiredType ?? 'a number';
  return {
    parse(raw) {
      const trimmed = raw.trim();
      if (trimmed === '') return err(requiredError());
      const value = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN;
      if (!Number.isFinite(value)) return err(invalidFormatError(requiredType));
      return ok(value === 0 ? 0 : value);
    },
    format(value) {
      return String(value);
    },
  };
}

function rangedIntegerParser(options: IntegerOptions): (trimmed: string) => Result<number, ParseError> {
  const requiredType = options.requiredType ?? 'a whole number';
  const min = options.min ?? Number.MIN_SAFE_INTEGER;
  const max = options.max ?? Number.MAX_SAFE_INTEGER;

  return (trimmed) => {
    const value = INTEGER_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN;
    if (!Number.isSafeInteger(value) || value < min || value > max) {
      return err(numberOutOfRangeError(requiredType, min, max));
    }
    // Number('-0') is -0, which would not round-trip through String().
    return ok(value === 0 ? 0 : value);
  };
}
