import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { assertValidated, parseOrThrow, entityNameSchema } from '../validation';
import { AppError, ValidationError } from '../errors';

describe('entityNameSchema', () => {
  it('trims valid names', () => {
    expect(entityNameSchema.parse('  staff ')).toBe('staff');
  });

  it('rejects whitespace-only names', () => {
    expect(entityNameSchema.safeParse('   ').success).toBe(false);
  });
});

describe('assertValidated', () => {
  const schema = z.object({ name: entityNameSchema, count: z.number().int() });

  it('passes through successful results', () => {
    const parsed = schema.safeParse({ name: 'a', count: 1 });
    assertValidated(parsed);
    expect(parsed.data).toEqual({ name: 'a', count: 1 });
  });

  it('throws a ValidationError with field details', () => {
    const parsed = schema.safeParse({ name: '', count: 1 });
    try {
      assertValidated(parsed, 'Bad record');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      if (!(err instanceof ValidationError)) throw err;
      expect(err.message).toBe('Bad record');
      expect(err.statusCode).toBe(400);
      expect(err.details).toEqual([{ field: 'name', message: 'Name is required' }]);
    }
  });
});

describe('parseOrThrow', () => {
  it('returns the parsed value', () => {
    expect(parseOrThrow(entityNameSchema, ' x ')).toBe('x');
  });

  it('throws on invalid input', () => {
    expect(() => parseOrThrow(entityNameSchema, 42)).toThrow(ValidationError);
  });
});
