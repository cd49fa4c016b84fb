import type { Permission } from '../permissions/permission';
import type { PermissionGroup } from '../permissions/group';
import type { Principal } from '../identity/principal';
import type { GroupRecord, PermissionRecord, UserRecord } from './validation';

export type PersistableEntity = Permission | PermissionGroup | Principal;

/**
 * Persistence collaborator. The core reads everything once through the load
 * methods and never writes on its own; commands call `persist` after each
 * mutation they make.
 */
export interface AccessControlStore {
  loadAllPermissions(): Promise<PermissionRecord[]>;
  loadAllGroups(): Promise<GroupRecord[]>;
  loadAllUsers(): Promise<UserRecord[]>;
  persist(entity: PersistableEntity): Promise<void>;
}
