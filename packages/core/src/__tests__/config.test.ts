import { describe, it, expect } from 'vitest';
import { ValidationError } from '@tillgate/shared';
import { DEFAULT_CREDENTIAL_MAX_AGE_DAYS, loadAccessPolicy } from '../config';

describe('loadAccessPolicy', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(loadAccessPolicy({})).toEqual({
      lockoutThreshold: 5,
      credentialMaxAgeDays: DEFAULT_CREDENTIAL_MAX_AGE_DAYS,
    });
  });

  it('treats empty strings as unset', () => {
    expect(loadAccessPolicy({ AUTH_LOCKOUT_THRESHOLD: '', AUTH_CREDENTIAL_MAX_AGE_DAYS: '' })).toEqual({
      lockoutThreshold: 5,
      credentialMaxAgeDays: 90,
    });
  });

  it('reads numeric overrides', () => {
    expect(loadAccessPolicy({ AUTH_LOCKOUT_THRESHOLD: '3', AUTH_CREDENTIAL_MAX_AGE_DAYS: '30' })).toEqual({
      lockoutThreshold: 3,
      credentialMaxAgeDays: 30,
    });
  });

  it('rejects values that are not positive integers', () => {
    expect(() => loadAccessPolicy({ AUTH_LOCKOUT_THRESHOLD: 'five' })).toThrow(ValidationError);
    expect(() => loadAccessPolicy({ AUTH_LOCKOUT_THRESHOLD: '0' })).toThrow('Invalid access policy configuration');
    expect(() => loadAccessPolicy({ AUTH_CREDENTIAL_MAX_AGE_DAYS: '1.5' })).toThrow(ValidationError);
  });

  it('lists the offending variable in the error details', () => {
    try {
      loadAccessPolicy({ AUTH_LOCKOUT_THRESHOLD: '-1' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.details?.map((d) => d.field)).toEqual(['AUTH_LOCKOUT_THRESHOLD']);
      }
    }
  });
});
