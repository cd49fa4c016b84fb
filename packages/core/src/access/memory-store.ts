import { Permission } from '../permissions/permission';
import { PermissionGroup } from '../permissions/group';
import type { Principal } from '../identity/principal';
import type { AccessControlStore, PersistableEntity } from './store';
import type { GroupRecord, PermissionRecord, UserRecord } from './validation';

function toUserRecord(principal: Principal): UserRecord {
  return {
    id: principal.id,
    username: principal.username,
    firstName: principal.firstName,
    lastName: principal.lastName,
    email: principal.email,
    credentialHash: principal.credentialHash,
    active: principal.active,
    locked: principal.locked,
    failedAttempts: principal.failedAttempts,
    createdAt: principal.createdAt,
    lastLoginAt: principal.lastLoginAt,
    lastCredentialChangeAt: principal.lastCredentialChangeAt,
    groupNames: [...principal.groups],
    directPermissionNames: [...principal.directPermissions.names()],
  };
}

/**
 * Map-backed store for tests and local runs. `persist` snapshots the entity
 * into a record, so later in-memory mutations are not visible until the
 * entity is persisted again.
 */
export class InMemoryAccessControlStore implements AccessControlStore {
  private readonly permissionRecords = new Map<string, PermissionRecord>();
  private readonly groupRecords = new Map<string, GroupRecord>();
  private readonly userRecords = new Map<string, UserRecord>();

  constructor(seed: { permissions?: PermissionRecord[]; groups?: GroupRecord[]; users?: UserRecord[] } = {}) {
    for (const record of seed.permissions ?? []) this.permissionRecords.set(record.name, record);
    for (const record of seed.groups ?? []) this.groupRecords.set(record.name, record);
    for (const record of seed.users ?? []) this.userRecords.set(record.id, record);
  }

  async loadAllPermissions(): Promise<PermissionRecord[]> {
    return [...this.permissionRecords.values()];
  }

  async loadAllGroups(): Promise<GroupRecord[]> {
    return [...this.groupRecords.values()];
  }

  async loadAllUsers(): Promise<UserRecord[]> {
    return [...this.userRecords.values()];
  }

  async persist(entity: PersistableEntity): Promise<void> {
    if (entity instanceof Permission) {
      this.permissionRecords.set(entity.name, {
        name: entity.name,
        description: entity.description,
        aliases: [...entity.aliases],
        isDefault: entity.isDefault,
      });
    } else if (entity instanceof PermissionGroup) {
      this.groupRecords.set(entity.name, {
        name: entity.name,
        description: entity.description,
        isDefault: entity.isDefault,
        permissionNames: [...entity.permissions.names()],
        parentNames: [...entity.parents],
      });
    } else {
      this.userRecords.set(entity.id, toUserRecord(entity));
    }
  }

  getUserRecord(id: string): UserRecord | undefined {
    return this.userRecords.get(id);
  }

  getGroupRecord(name: string): GroupRecord | undefined {
    return this.groupRecords.get(name);
  }
}
