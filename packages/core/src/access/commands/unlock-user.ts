import { NotFoundError } from '@tillgate/shared';
import type { Principal } from '../../identity/principal';
import { logger } from '../../observability/logger';
import type { AccessContext } from '../context';

/** Clears the lock and the failure counter. */
export async function unlockUser(ctx: AccessContext, userId: string): Promise<Principal> {
  const principal = ctx.access.identities.getById(userId);
  if (!principal || !ctx.access.unlockUser(userId)) {
    throw new NotFoundError('User', userId);
  }

  await ctx.store.persist(principal);
  logger.info('User unlocked', { userId: principal.id, username: principal.username });
  return principal;
}
