import { z } from 'zod';
import { ParseError } from '../types/errors';

/**
 * Render an input for a ParseError without throwing on cycles or undefined.
 */
export function describeInput(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Validate `value` against `schema`, raising ParseError on mismatch.
 *
 * @param entity - Name used in the error message ("container", "stats", ...)
 */
export function decode<T extends z.ZodTypeAny>(schema: T, value: unknown, entity: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ParseError(
      `Invalid ${entity} payload${where}: ${issue?.message ?? 'unknown error'}`,
      describeInput(value),
    );
  }
  return result.data;
}

/**
 * Parse one JSON document, raising ParseError instead of SyntaxError.
 */
export function parseJson(text: string, entity: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Malformed ${entity} JSON: ${reason}`, text);
  }
}

/**
 * Key-by-key equality of two string-valued records.
 */
export function recordsEqual<V>(a: Readonly<Record<string, V>>, b: Readonly<Record<string, V>>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) {
    return false;
  }
  return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}
