import { AuthenticationError, parseOrThrow } from '@tillgate/shared';
import type { Principal } from '../../identity/principal';
import { logger } from '../../observability/logger';
import type { AccessContext } from '../context';
import { loginSchema, type LoginInput } from '../validation';

export interface LoginResult {
  principal: Principal;
  /** The credential is older than the policy allows; the caller should force a change. */
  credentialExpired: boolean;
}

/**
 * Authenticates and persists whatever the attempt changed. Every failure
 * surfaces as the same AuthenticationError; the reason only reaches the log.
 */
export async function login(ctx: AccessContext, input: LoginInput): Promise<LoginResult> {
  const { username, credentialHash } = parseOrThrow(loginSchema, input);
  const result = ctx.access.authenticate(username, credentialHash);

  if (!result.ok) {
    // Only a wrong credential on a loginable account mutates state.
    const principal =
      result.reason === 'invalid_credentials' ? ctx.access.identities.getByUsername(username) : undefined;
    if (principal) {
      await ctx.store.persist(principal);
    }
    logger.warn('Login failed', {
      username,
      userId: principal?.id,
      outcome: result.reason,
      failedAttempts: principal?.failedAttempts,
      locked: principal?.locked,
    });
    throw new AuthenticationError();
  }

  const { principal } = result;
  await ctx.store.persist(principal);

  const credentialExpired = principal.isCredentialExpired(ctx.policy.credentialMaxAgeDays);
  logger.info('Login succeeded', {
    userId: principal.id,
    username: principal.username,
    outcome: 'success',
    credentialExpired,
  });
  return { principal, credentialExpired };
}
