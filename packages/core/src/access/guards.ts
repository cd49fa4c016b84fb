import { AuthorizationError } from '@tillgate/shared';
import { logger } from '../observability/logger';
import type { AccessContext } from './context';

/**
 * Route-level guard: returns when the user holds `permission`, throws
 * AuthorizationError otherwise. Locked and inactive users always fail.
 */
export function requirePermission(permission: string) {
  return (ctx: AccessContext, userId: string): void => {
    if (ctx.access.check(userId, permission)) return;
    logger.warn('Permission denied', { userId, permission, outcome: 'denied' });
    throw new AuthorizationError(permission);
  };
}
