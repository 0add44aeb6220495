/**
 * Shared Mapper Utilities
 *
 * Helpers used by every normalizer: strict parsing of the fields a record
 * cannot exist without, and lenient reading of everything else.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { UpstreamShapeException, ErrorContext } from '../../utils/exceptions';

/**
 * Parse `value` against `schema`, or throw UpstreamShapeException naming what
 * was being read. Use only for fields whose absence makes a record meaningless.
 */
export function parseOrThrow<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  what: string,
  context: ErrorContext = {}
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new UpstreamShapeException(`Upstream ${what} is missing required fields${where}`, context);
  }
  return result.data;
}

/** A finite number, or null. Strings, booleans and NaN are not coerced. */
export function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/** Collapse `undefined` into `null` so optional upstream fields keep their key. */
export function orNull<T>(value: T | null | undefined): T | null {
  return value ?? null;
}
