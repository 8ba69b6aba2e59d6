/** Error codes a converter can produce while parsing raw input. */
export type ParseErrorCode = 'REQUIRED' | 'INVALID_FORMAT' | 'FROM_STRING' | 'NUMBER_OUT_OF_RANGE' | 'CUSTOM';

/** The input was empty and the value type has no empty representation. */
export interface RequiredError {
  readonly code: 'REQUIRED';
}

/** The input could not be read as the expected kind of value (e.g. `'a number'`). */
export interface InvalidFormatError {
  readonly code: 'INVALID_FORMAT';
  readonly requiredType: string;
}

/** The input was readable but rejected by the value type's own rules. */
export interface FromStringError {
  readonly code: 'FROM_STRING';
  readonly reason: string;
}

/** The input was not a number within the accepted range. */
export interface NumberOutOfRangeError {
  readonly code: 'NUMBER_OUT_OF_RANGE';
  readonly requiredType: string;
  readonly min: string;
  readonly max: string;
}

/** Caller-defined failure, e.g. issues reported by a schema library. */
export interface CustomParseError {
  readonly code: 'CUSTOM';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Value-level parse failure produced by a `Converter`.
 *
 * Parse errors are data: they never halt an operation and are folded into
 * field status and submit results.
 */
export type ParseError = RequiredError | InvalidFormatError | FromStringError | NumberOutOfRangeError | CustomParseError;

/** Create a `REQUIRED` parse error. */
export function requiredError(): RequiredError {
  return { code: 'REQUIRED' };
}

/** Create an `INVALID_FORMAT` parse error. */
export function invalidFormatError(requiredType: string): InvalidFormatError {
  return { code: 'INVALID_FORMAT', requiredType };
}

/** Create a `FROM_STRING` parse error. */
export function fromStringError(reason: string): FromStringError {
  return { code: 'FROM_STRING', reason };
}

/** Create a `NUMBER_OUT_OF_RANGE` parse error. Bounds are kept as display strings. */
export function numberOutOfRangeError(requiredType: string, min: number | bigint, max: number | bigint): NumberOutOfRangeError {
  return { code: 'NUMBER_OUT_OF_RANGE', requiredType, min: String(min), max: String(max) };
}

/** Create a `CUSTOM` parse error. */
export function customParseError(message: string, cause?: unknown): CustomParseError {
  return cause !== undefined ? { code: 'CUSTOM', message, cause } : { code: 'CUSTOM', message };
}

/** Render a parse error as a sentence suitable for showing next to an input. */
export function describeParseError(error: ParseError): string {
  switch (error.code) {
    case 'REQUIRED':
      return 'This field is required.';
    case 'INVALID_FORMAT':
      return `Expected ${error.requiredType}.`;
    case 'FROM_STRING':
      return error.reason.endsWith('.') ? error.reason : `${error.reason}.`;
    case 'NUMBER_OUT_OF_RANGE':
      return `Expected ${error.requiredType} between ${error.min} and ${error.max}.`;
    case 'CUSTOM':
      return error.message;
  }
}
