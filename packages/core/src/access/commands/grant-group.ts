import { NotFoundError } from '@tillgate/shared';
import type { Principal } from '../../identity/principal';
import { logger } from '../../observability/logger';
import type { AccessContext } from '../context';

export async function grantGroup(ctx: AccessContext, userId: string, groupName: string): Promise<Principal> {
  const principal = ctx.access.identities.getById(userId);
  if (!principal) {
    throw new NotFoundError('User', userId);
  }
  if (!ctx.access.groups.hasGroup(groupName)) {
    throw new NotFoundError('Group', groupName);
  }

  ctx.access.assignGroup(userId, groupName);
  await ctx.store.persist(principal);
  logger.info('Group granted', { userId, groupName });
  return principal;
}

export async function revokeGroup(ctx: AccessContext, userId: string, groupName: string): Promise<Principal> {
  const principal = ctx.access.identities.getById(userId);
  if (!principal) {
    throw new NotFoundError('User', userId);
  }

  if (ctx.access.revokeGroup(userId, groupName)) {
    await ctx.store.persist(principal);
    logger.info('Group revoked', { userId, groupName });
  }
  return principal;
}
