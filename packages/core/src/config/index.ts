import { z } from 'zod';
import { parseOrThrow } from '@tillgate/shared';
import { DEFAULT_LOCKOUT_THRESHOLD } from '../identity/types';

export const DEFAULT_CREDENTIAL_MAX_AGE_DAYS = 90;

export interface AccessPolicy {
  /** Failed logins that lock an account. */
  lockoutThreshold: number;
  /** Days after which a credential counts as expired at login. */
  credentialMaxAgeDays: number;
}

const accessPolicyEnvSchema = z.object({
  AUTH_LOCKOUT_THRESHOLD: z.coerce.number().int().min(1).default(DEFAULT_LOCKOUT_THRESHOLD),
  AUTH_CREDENTIAL_MAX_AGE_DAYS: z.coerce.number().int().min(1).default(DEFAULT_CREDENTIAL_MAX_AGE_DAYS),
});

/**
 * Reads the access policy from the environment. Empty strings count as unset.
 * Not cached: callers decide how long a policy lives.
 */
export function loadAccessPolicy(env: NodeJS.ProcessEnv = process.env): AccessPolicy {
  const parsed = parseOrThrow(
    accessPolicyEnvSchema,
    {
      AUTH_LOCKOUT_THRESHOLD: env.AUTH_LOCKOUT_THRESHOLD || undefined,
      AUTH_CREDENTIAL_MAX_AGE_DAYS: env.AUTH_CREDENTIAL_MAX_AGE_DAYS || undefined,
    },
    'Invalid access policy configuration',
  );
  return {
    lockoutThreshold: parsed.AUTH_LOCKOUT_THRESHOLD,
    credentialMaxAgeDays: parsed.AUTH_CREDENTIAL_MAX_AGE_DAYS,
  };
}
