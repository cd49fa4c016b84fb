import { z } from 'zod';
import { credentialHashSchema, entityNameSchema, userIdSchema } from '@tillgate/shared';

// ── Permission Record ───────────────────────────────────────────

export const permissionRecordSchema = z.object({
  name: entityNameSchema,
  description: z.string().nullish(),
  aliases: z.array(z.string()).default([]),
  isDefault: z.boolean().default(false),
});

export type PermissionRecord = z.input<typeof permissionRecordSchema>;

// ── Group Record ────────────────────────────────────────────────

export const groupRecordSchema = z.object({
  name: entityNameSchema,
  description: z.string().nullish(),
  isDefault: z.boolean().default(false),
  permissionNames: z.array(entityNameSchema).default([]),
  parentNames: z.array(entityNameSchema).default([]),
});

export type GroupRecord = z.input<typeof groupRecordSchema>;

// ── User Record ─────────────────────────────────────────────────

export const userRecordSchema = z.object({
  id: userIdSchema,
  username: entityNameSchema,
  firstName: z.string().nullish(),
  lastName: z.string().nullish(),
  email: z.string().nullish(),
  credentialHash: credentialHashSchema.nullish(),
  active: z.boolean().default(true),
  locked: z.boolean().default(false),
  failedAttempts: z.number().int().min(0).default(0),
  createdAt: z.coerce.date().optional(),
  lastLoginAt: z.coerce.date().nullish(),
  lastCredentialChangeAt: z.coerce.date().nullish(),
  groupNames: z.array(entityNameSchema).default([]),
  directPermissionNames: z.array(entityNameSchema).default([]),
});

export type UserRecord = z.input<typeof userRecordSchema>;

// ── Command Inputs ──────────────────────────────────────────────

export const loginSchema = z.object({
  username: entityNameSchema,
  credentialHash: z.string().min(1, 'Credential is required'),
});

export type LoginInput = z.input<typeof loginSchema>;

export const changeCredentialSchema = z.object({
  userId: userIdSchema,
  currentHash: z.string().min(1, 'Current credential is required'),
  nextHash: z.string().min(1, 'New credential is required'),
});

export type ChangeCredentialInput = z.input<typeof changeCredentialSchema>;
