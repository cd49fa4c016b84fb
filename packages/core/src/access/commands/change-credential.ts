import { AuthenticationError, NotFoundError, parseOrThrow } from '@tillgate/shared';
import type { Principal } from '../../identity/principal';
import { logger } from '../../observability/logger';
import type { AccessContext } from '../context';
import { changeCredentialSchema, type ChangeCredentialInput } from '../validation';

export async function changeCredential(ctx: AccessContext, input: ChangeCredentialInput): Promise<Principal> {
  const { userId, currentHash, nextHash } = parseOrThrow(changeCredentialSchema, input);

  const principal = ctx.access.identities.getById(userId);
  if (!principal) {
    throw new NotFoundError('User', userId);
  }

  if (!ctx.access.changePassword(userId, currentHash, nextHash)) {
    logger.warn('Credential change rejected', { userId, outcome: 'mismatch' });
    throw new AuthenticationError('Current credential does not match');
  }

  await ctx.store.persist(principal);
  logger.info('Credential changed', { userId, outcome: 'success' });
  return principal;
}
