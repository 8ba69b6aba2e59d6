import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Converter } from '@typedform/core';
import { customParseError, err, ok } from '@typedform/core';

/**
 * Validate the parsed value with a Standard Schema (zod, valibot, arktype…).
 *
 * The schema must validate synchronously. Its issues become one `CUSTOM`
 * error whose message joins the issue messages with `'; '`.
 */
export function standardSchema<T>(base: Converter<T>, schema: StandardSchemaV1<T, T>): Converter<T> {
  return {
    parse(raw) {
      const parsed = base.parse(raw);
      if (!parsed.ok) return parsed;

      const result = schema['~standard'].validate(parsed.value);
      if (result instanceof Promise) {
        throw new TypeError('Schema validation must be synchronous');
      }
      if (result.issues) {
        return err(customParseError(result.issues.map((issue) => issue.message).join('; '), result.issues));
      }
      return ok(result.value);
    },
    format(value) {
      return base.format(value);
    },
  };
}
