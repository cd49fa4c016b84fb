import { z } from 'zod';
import { ValidationError } from '../errors';

/** Permission, group and username keys: non-blank once trimmed. */
export const entityNameSchema = z.string().trim().min(1, 'Name is required');

export const userIdSchema = z.string().trim().min(1, 'User id is required');

export const credentialHashSchema = z.string().min(1, 'Credential hash is required');

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = schema.safeParse(record);
 * assertValidated(parsed, 'Invalid group record');
 * // parsed.data is now typed
 * ```
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
}

/** Parse `value` with `schema`, throwing a ValidationError on failure. */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, message?: string): T {
  const parsed = schema.safeParse(value);
  assertValidated(parsed, message);
  return parsed.data;
}
