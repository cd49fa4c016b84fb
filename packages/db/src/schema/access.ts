import {
  pgTable,
  text,
  boolean,
  integer,
  timestamp,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { generateUserId } from '@tillgate/shared';

// ── Permissions ──────────────────────────────────────────────────
export const permissions = pgTable('permissions', {
  name: text('name').primaryKey(),
  description: text('description').notNull().default(''),
  aliases: text('aliases').array().notNull().default(sql`'{}'::text[]`),
  isDefault: boolean('is_default').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Permission Groups ────────────────────────────────────────────
export const permissionGroups = pgTable('permission_groups', {
  name: text('name').primaryKey(),
  description: text('description').notNull().default(''),
  isDefault: boolean('is_default').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const groupPermissions = pgTable(
  'group_permissions',
  {
    groupName: text('group_name')
      .notNull()
      .references(() => permissionGroups.name, { onDelete: 'cascade' }),
    permissionName: text('permission_name')
      .notNull()
      .references(() => permissions.name, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.groupName, table.permissionName] })],
);

// Parent names are weak references: no FK on parent_group, so a parent may be
// created or dropped without touching its children.
export const groupInheritance = pgTable(
  'group_inheritance',
  {
    childGroup: text('child_group')
      .notNull()
      .references(() => permissionGroups.name, { onDelete: 'cascade' }),
    parentGroup: text('parent_group').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.childGroup, table.parentGroup] }),
    index('idx_group_inheritance_parent').on(table.parentGroup),
  ],
);

// ── Users ────────────────────────────────────────────────────────
export const users = pgTable('users', {
  id: text('id').primaryKey().$defaultFn(generateUserId),
  username: text('username').notNull().unique(),
  firstName: text('first_name').notNull().default(''),
  lastName: text('last_name').notNull().default(''),
  email: text('email').notNull().default(''),
  credentialHash: text('credential_hash'),
  isActive: boolean('is_active').notNull().default(true),
  isLocked: boolean('is_locked').notNull().default(false),
  failedLoginAttempts: integer('failed_login_attempts').notNull().default(0),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  lastLoginAt: timestamp('last_login_at', { withTimezone: true }),
  lastCredentialChangeAt: timestamp('last_credential_change_at', { withTimezone: true }),
});

export const userGroups = pgTable(
  'user_groups',
  {
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    groupName: text('group_name').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.userId, table.groupName] }),
    index('idx_user_groups_group').on(table.groupName),
  ],
);

export const userPermissions = pgTable(
  'user_permissions',
  {
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    permissionName: text('permission_name')
      .notNull()
      .references(() => permissions.name, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.userId, table.permissionName] })],
);
