import { eq } from 'drizzle-orm';
import {
  db,
  permissions,
  permissionGroups,
  groupPermissions,
  groupInheritance,
  users,
  userGroups,
  userPermissions,
} from '@tillgate/db';
import type { Database } from '@tillgate/db';
import { Permission } from '../permissions/permission';
import { PermissionGroup } from '../permissions/group';
import type { Principal } from '../identity/principal';
import type { AccessControlStore, PersistableEntity } from './store';
import type { GroupRecord, PermissionRecord, UserRecord } from './validation';

type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

function groupBy<T>(rows: T[], key: (row: T) => string, value: (row: T) => string): Map<string, string[]> {
  const result = new Map<string, string[]>();
  for (const row of rows) {
    const k = key(row);
    const list = result.get(k);
    if (list) list.push(value(row));
    else result.set(k, [value(row)]);
  }
  return result;
}

/**
 * Postgres-backed store over the access tables. Each load is a few
 * plain selects stitched together in memory; persisting a group or user
 * rewrites its junction rows in one transaction.
 */
export class DrizzleAccessControlStore implements AccessControlStore {
  private database: Database;

  constructor(database: Database = db) {
    this.database = database;
  }

  async loadAllPermissions(): Promise<PermissionRecord[]> {
    const rows = await this.database.select().from(permissions);
    return rows.map((row) => ({
      name: row.name,
      description: row.description,
      aliases: row.aliases,
      isDefault: row.isDefault,
    }));
  }

  async loadAllGroups(): Promise<GroupRecord[]> {
    const [groupRows, grantRows, parentRows] = await Promise.all([
      this.database.select().from(permissionGroups),
      this.database.select().from(groupPermissions),
      this.database.select().from(groupInheritance),
    ]);
    const grants = groupBy(grantRows, (r) => r.groupName, (r) => r.permissionName);
    const parents = groupBy(parentRows, (r) => r.childGroup, (r) => r.parentGroup);

    return groupRows.map((row) => ({
      name: row.name,
      description: row.description,
      isDefault: row.isDefault,
      permissionNames: grants.get(row.name) ?? [],
      parentNames: parents.get(row.name) ?? [],
    }));
  }

  async loadAllUsers(): Promise<UserRecord[]> {
    const [userRows, membershipRows, grantRows] = await Promise.all([
      this.database.select().from(users),
      this.database.select().from(userGroups),
      this.database.select().from(userPermissions),
    ]);
    const memberships = groupBy(membershipRows, (r) => r.userId, (r) => r.groupName);
    const grants = groupBy(grantRows, (r) => r.userId, (r) => r.permissionName);

    return userRows.map((row) => ({
      id: row.id,
      username: row.username,
      firstName: row.firstName,
      lastName: row.lastName,
      email: row.email,
      credentialHash: row.credentialHash,
      active: row.isActive,
      locked: row.isLocked,
      failedAttempts: row.failedLoginAttempts,
      createdAt: row.createdAt,
      lastLoginAt: row.lastLoginAt,
      lastCredentialChangeAt: row.lastCredentialChangeAt,
      groupNames: memberships.get(row.id) ?? [],
      directPermissionNames: grants.get(row.id) ?? [],
    }));
  }

  async persist(entity: PersistableEntity): Promise<void> {
    if (entity instanceof Permission) {
      await this.upsertPermission(entity);
    } else if (entity instanceof PermissionGroup) {
      await this.persistGroup(entity);
    } else {
      await this.persistPrincipal(entity);
    }
  }

  private async upsertPermission(permission: Permission): Promise<void> {
    const values = {
      description: permission.description,
      aliases: [...permission.aliases],
      isDefault: permission.isDefault,
    };
    await this.database
      .insert(permissions)
      .values({ name: permission.name, ...values })
      .onConflictDoUpdate({ target: permissions.name, set: values });
  }

  // Grants reference permissions by FK; make sure each one has a row without
  // overwriting a description someone else saved.
  private async ensurePermissions(tx: Transaction, owned: Iterable<Permission>): Promise<void> {
    for (const permission of owned) {
      await tx
        .insert(permissions)
        .values({
          name: permission.name,
          description: permission.description,
          aliases: [...permission.aliases],
          isDefault: permission.isDefault,
        })
        .onConflictDoNothing();
    }
  }

  private async persistGroup(group: PermissionGroup): Promise<void> {
    await this.database.transaction(async (tx) => {
      const values = { description: group.description, isDefault: group.isDefault };
      await tx
        .insert(permissionGroups)
        .values({ name: group.name, ...values })
        .onConflictDoUpdate({ target: permissionGroups.name, set: values });

      const owned = group.permissions.values();
      await this.ensurePermissions(tx, owned);

      await tx.delete(groupPermissions).where(eq(groupPermissions.groupName, group.name));
      if (owned.length > 0) {
        await tx
          .insert(groupPermissions)
          .values(owned.map((p) => ({ groupName: group.name, permissionName: p.name })))
          .onConflictDoNothing();
      }

      await tx.delete(groupInheritance).where(eq(groupInheritance.childGroup, group.name));
      const parents = [...group.parents];
      if (parents.length > 0) {
        await tx
          .insert(groupInheritance)
          .values(parents.map((parentGroup) => ({ childGroup: group.name, parentGroup })))
          .onConflictDoNothing();
      }
    });
  }

  private async persistPrincipal(principal: Principal): Promise<void> {
    await this.database.transaction(async (tx) => {
      const values = {
        username: principal.username,
        firstName: principal.firstName,
        lastName: principal.lastName,
        email: principal.email,
        credentialHash: principal.credentialHash,
        isActive: principal.active,
        isLocked: principal.locked,
        failedLoginAttempts: principal.failedAttempts,
        lastLoginAt: principal.lastLoginAt,
        lastCredentialChangeAt: principal.lastCredentialChangeAt,
      };
      await tx
        .insert(users)
        .values({ id: principal.id, createdAt: principal.createdAt, ...values })
        .onConflictDoUpdate({ target: users.id, set: values });

      await tx.delete(userGroups).where(eq(userGroups.userId, principal.id));
      const groups = [...principal.groups];
      if (groups.length > 0) {
        await tx
          .insert(userGroups)
          .values(groups.map((groupName) => ({ userId: principal.id, groupName })))
          .onConflictDoNothing();
      }

      const direct = principal.directPermissions.values();
      await this.ensurePermissions(tx, direct);
      await tx.delete(userPermissions).where(eq(userPermissions.userId, principal.id));
      if (direct.length > 0) {
        await tx
          .insert(userPermissions)
          .values(direct.map((p) => ({ userId: principal.id, permissionName: p.name })))
          .onConflictDoNothing();
      }
    });
  }
}
