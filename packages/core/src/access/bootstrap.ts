import { loadAccessPolicy, type AccessPolicy } from '../config';
import { errorFields, logger } from '../observability/logger';
import type { AccessContext } from './context';
import { hydrateAccessControl, type HydrationSummary } from './hydrate';
import type { AccessControlStore } from './store';

/**
 * Loads everything from `store` under `policy` and returns the context the
 * commands run against. Call once at startup and pass the result around.
 */
export async function bootstrapAccess(
  store: AccessControlStore,
  policy: AccessPolicy = loadAccessPolicy(),
): Promise<{ ctx: AccessContext; summary: HydrationSummary }> {
  try {
    const { access, summary } = await hydrateAccessControl(store, {
      lockoutThreshold: policy.lockoutThreshold,
    });
    return { ctx: { access, store, policy }, summary };
  } catch (err) {
    logger.error('Access control load failed', { error: errorFields(err) });
    throw err;
  }
}
