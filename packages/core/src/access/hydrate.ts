import { normalizeName, parseOrThrow } from '@tillgate/shared';
import { Permission } from '../permissions/permission';
import { PermissionGroup } from '../permissions/group';
import type { GroupRegistry } from '../permissions/group-registry';
import { Principal } from '../identity/principal';
import { logger, type LogEntry } from '../observability/logger';
import { AccessControl, type AccessControlOptions } from './access-control';
import type { AccessControlStore } from './store';
import { groupRecordSchema, permissionRecordSchema, userRecordSchema } from './validation';

export interface HydrationSummary {
  permissions: number;
  groups: number;
  users: number;
  /** Users whose username was already taken by an earlier record. */
  rejectedUsers: string[];
  /** Groups that can reach themselves through their parents. */
  cyclicGroups: string[];
}

/**
 * Permission names that were never registered still grant access: they become
 * bare permissions (no aliases) and are reported once each.
 */
function resolvePermissions(registry: GroupRegistry, names: string[], owner: Pick<LogEntry, 'groupName' | 'userId'>): Permission[] {
  return names.map((name) => {
    const registered = registry.getPermission(name);
    if (registered) return registered;
    logger.warn('Unregistered permission referenced', { ...owner, permission: name });
    return new Permission({ name });
  });
}

/**
 * Builds a populated AccessControl from the store. Records are validated one
 * by one; an invalid record fails the whole load with a ValidationError.
 */
export async function hydrateAccessControl(
  store: AccessControlStore,
  options: AccessControlOptions = {},
): Promise<{ access: AccessControl; summary: HydrationSummary }> {
  const access = new AccessControl(options);

  const [permissionRows, groupRows, userRows] = await Promise.all([
    store.loadAllPermissions(),
    store.loadAllGroups(),
    store.loadAllUsers(),
  ]);

  for (const row of permissionRows) {
    const record = parseOrThrow(permissionRecordSchema, row, 'Invalid permission record');
    access.registerPermission(new Permission(record));
  }

  for (const row of groupRows) {
    const record = parseOrThrow(groupRecordSchema, row, 'Invalid group record');
    const group = new PermissionGroup({
      name: record.name,
      description: record.description,
      isDefault: record.isDefault,
      permissions: resolvePermissions(access.groups, record.permissionNames, { groupName: record.name }),
    });
    for (const parent of record.parentNames) {
      if (group.name === normalizeName(parent)) {
        logger.warn('Ignoring self-referencing parent group', { groupName: group.name });
        continue;
      }
      group.addParent(parent);
    }
    access.registerGroup(group);
  }

  const rejectedUsers: string[] = [];
  for (const row of userRows) {
    const record = parseOrThrow(userRecordSchema, row, 'Invalid user record');
    const principal = Principal.restore(
      {
        id: record.id,
        username: record.username,
        firstName: record.firstName,
        lastName: record.lastName,
        email: record.email,
        credentialHash: record.credentialHash,
        active: record.active,
        locked: record.locked,
        failedAttempts: record.failedAttempts,
        createdAt: record.createdAt,
        lastLoginAt: record.lastLoginAt,
        lastCredentialChangeAt: record.lastCredentialChangeAt,
        groups: record.groupNames,
      },
      resolvePermissions(access.groups, record.directPermissionNames, { userId: record.id }),
    );
    if (!access.identities.addUser(principal)) {
      logger.warn('Duplicate user skipped', { userId: principal.id, username: principal.username });
      rejectedUsers.push(principal.id);
    }
  }

  const cyclicGroups = access.groups
    .listGroups()
    .filter((group) => access.groups.isInCycle(group.name))
    .map((group) => group.name);
  for (const groupName of cyclicGroups) {
    logger.warn('Group inheritance cycle detected', { groupName });
  }

  const summary: HydrationSummary = {
    permissions: access.groups.listPermissions().length,
    groups: access.groups.listGroups().length,
    users: access.identities.listUsers().length,
    rejectedUsers,
    cyclicGroups,
  };
  logger.info('Access control loaded', {
    permissions: summary.permissions,
    groups: summary.groups,
    users: summary.users,
  });

  return { access, summary };
}
