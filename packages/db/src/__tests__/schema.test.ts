import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import {
  permissions,
  permissionGroups,
  groupPermissions,
  groupInheritance,
  users,
  userGroups,
  userPermissions,
} from '../schema';

// ── Test 1: table names ──────────────────────────────────────────
describe('access tables', () => {
  const tables = [
    [permissions, 'permissions'],
    [permissionGroups, 'permission_groups'],
    [groupPermissions, 'group_permissions'],
    [groupInheritance, 'group_inheritance'],
    [users, 'users'],
    [userGroups, 'user_groups'],
    [userPermissions, 'user_permissions'],
  ] as const;

  for (const [table, name] of tables) {
    it(`table "${name}" is declared`, () => {
      expect(getTableConfig(table).name).toBe(name);
    });
  }
});

// ── Test 2: keys ─────────────────────────────────────────────────
describe('keys', () => {
  it('keys permissions and groups by name', () => {
    expect(getTableConfig(permissions).columns.find((c) => c.primary)?.name).toBe('name');
    expect(getTableConfig(permissionGroups).columns.find((c) => c.primary)?.name).toBe('name');
  });

  it('uses composite primary keys on junction tables', () => {
    const pk = getTableConfig(groupPermissions).primaryKeys[0];
    expect(pk?.columns.map((c) => c.name)).toEqual(['group_name', 'permission_name']);
  });

  it('makes usernames unique', () => {
    const username = getTableConfig(users).columns.find((c) => c.name === 'username');
    expect(username?.isUnique).toBe(true);
  });
});

// ── Test 3: weak parent references ──────────────────────────────
describe('group inheritance', () => {
  it('references only the child group', () => {
    const fks = getTableConfig(groupInheritance).foreignKeys;
    expect(fks).toHaveLength(1);
    expect(fks[0]?.reference().columns.map((c) => c.name)).toEqual(['child_group']);
  });

  it('references only the user from user_groups', () => {
    const fks = getTableConfig(userGroups).foreignKeys;
    expect(fks).toHaveLength(1);
    expect(fks[0]?.reference().columns.map((c) => c.name)).toEqual(['user_id']);
  });
});
