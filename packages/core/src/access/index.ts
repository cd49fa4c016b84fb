export { AccessControl } from './access-control';
export type { AccessControlOptions } from './access-control';
export type { AccessContext } from './context';
export type { AccessControlStore, PersistableEntity } from './store';
export { InMemoryAccessControlStore } from './memory-store';
export { DrizzleAccessControlStore } from './drizzle-store';
export { hydrateAccessControl } from './hydrate';
export type { HydrationSummary } from './hydrate';
export { bootstrapAccess } from './bootstrap';
export { requirePermission } from './guards';
export {
  canPerform,
  canAccessCashier,
  canProcessRefunds,
  canManageInventory,
  canViewReports,
  canManageUsers,
  POS_ADMIN,
  SYSTEM_ADMIN,
  POS_PERMISSIONS,
  SYSTEM_PERMISSIONS,
} from './capabilities';

// Commands
export { login } from './commands/login';
export type { LoginResult } from './commands/login';
export { changeCredential } from './commands/change-credential';
export { unlockUser } from './commands/unlock-user';
export { grantGroup, revokeGroup } from './commands/grant-group';

// Validation
export * from './validation';
