import { describe, it, expect } from 'vitest';
import { normalizeName, trimOrEmpty } from '../utils/normalize';

describe('normalizeName', () => {
  it('trims and lowercases', () => {
    expect(normalizeName('  POS.Refund ')).toBe('pos.refund');
  });

  it('returns empty string for null and undefined', () => {
    expect(normalizeName(null)).toBe('');
    expect(normalizeName(undefined)).toBe('');
  });

  it('leaves an already-normalized name unchanged', () => {
    expect(normalizeName('cashier')).toBe('cashier');
  });
});

describe('trimOrEmpty', () => {
  it('trims but keeps case', () => {
    expect(trimOrEmpty('  Alice ')).toBe('Alice');
    expect(trimOrEmpty(undefined)).toBe('');
  });
});
