import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { ValidationError } from '@tillgate/shared';
import { logger } from '../observability/logger';
import { hydrateAccessControl } from '../access/hydrate';
import { bootstrapAccess } from '../access/bootstrap';
import { InMemoryAccessControlStore } from '../access/memory-store';
import type { AccessControlStore } from '../access/store';

function seededStore(): InMemoryAccessControlStore {
  return new InMemoryAccessControlStore({
    permissions: [
      { name: 'pos.refund', description: 'Refunds', aliases: ['refund'] },
      { name: 'pos.sale', isDefault: true },
    ],
    groups: [
      { name: 'staff', permissionNames: ['pos.refund'] },
      { name: 'cashier', parentNames: ['staff'] },
      { name: 'loop-a', parentNames: ['loop-b'] },
      { name: 'loop-b', parentNames: ['loop-a'] },
      { name: 'odd', permissionNames: ['pos.ghost'], parentNames: ['odd', 'staff'] },
    ],
    users: [
      { id: 'usr_1', username: 'alice', credentialHash: 'test-secret', groupNames: ['cashier', 'ghost'] },
      { id: 'usr_2', username: 'bob', locked: true, failedAttempts: 5, directPermissionNames: ['pos.admin'] },
      { id: 'usr_3', username: 'Bob' },
    ],
  });
}

describe('hydrateAccessControl', () => {
  let warn: MockInstance<typeof logger.warn>;

  beforeEach(() => {
    warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds registries that resolve inherited grants', async () => {
    const { access } = await hydrateAccessControl(seededStore());

    expect(access.check('usr_1', 'pos.refund')).toBe(true);
    expect(access.check('usr_1', 'refund')).toBe(true);
    expect(access.check('usr_2', 'pos.admin')).toBe(false);
    expect(access.identities.getById('usr_2')?.failedAttempts).toBe(5);
  });

  it('summarizes what was loaded and what was skipped', async () => {
    const { summary } = await hydrateAccessControl(seededStore());

    expect(summary).toEqual({
      permissions: 2,
      groups: 5,
      users: 2,
      rejectedUsers: ['usr_3'],
      cyclicGroups: ['loop-a', 'loop-b'],
    });
    expect(logger.info).toHaveBeenCalledWith('Access control loaded', { permissions: 2, groups: 5, users: 2 });
  });

  it('keeps the first user when a username repeats', async () => {
    const { access } = await hydrateAccessControl(seededStore());

    expect(access.identities.getByUsername('bob')?.id).toBe('usr_2');
    expect(warn).toHaveBeenCalledWith('Duplicate user skipped', { userId: 'usr_3', username: 'bob' });
  });

  it('drops a self parent and keeps the others', async () => {
    const { access } = await hydrateAccessControl(seededStore());

    expect(access.groups.getGroup('odd')?.parents).toEqual(new Set(['staff']));
    expect(warn).toHaveBeenCalledWith('Ignoring self-referencing parent group', { groupName: 'odd' });
  });

  it('turns unregistered permission names into bare grants', async () => {
    const { access } = await hydrateAccessControl(seededStore());

    expect(access.groups.getGroup('odd')?.hasPermission('pos.ghost')).toBe(true);
    expect(access.groups.getPermission('pos.ghost')).toBeUndefined();
    expect(warn).toHaveBeenCalledWith('Unregistered permission referenced', {
      groupName: 'odd',
      permission: 'pos.ghost',
    });
    expect(warn).toHaveBeenCalledWith('Unregistered permission referenced', {
      userId: 'usr_2',
      permission: 'pos.admin',
    });
  });

  it('reuses registered permission instances so aliases carry over', async () => {
    const { access } = await hydrateAccessControl(seededStore());

    const staff = access.groups.getGroup('staff');
    expect(staff?.permissions.get('pos.refund')).toBe(access.groups.getPermission('pos.refund'));
  });

  it('warns about every group on a cycle', async () => {
    await hydrateAccessControl(seededStore());

    expect(warn).toHaveBeenCalledWith('Group inheritance cycle detected', { groupName: 'loop-a' });
    expect(warn).toHaveBeenCalledWith('Group inheritance cycle detected', { groupName: 'loop-b' });
  });

  it('applies the lockout threshold it is given', async () => {
    const { access } = await hydrateAccessControl(seededStore(), { lockoutThreshold: 1 });

    expect(access.identities.lockoutThreshold).toBe(1);
    access.authenticate('alice', 'wrong');
    expect(access.identities.getById('usr_1')?.locked).toBe(true);
  });

  it('fails the load on an invalid record', async () => {
    const store = new InMemoryAccessControlStore({ groups: [{ name: '   ' }] });

    await expect(hydrateAccessControl(store)).rejects.toThrow(ValidationError);
    await expect(hydrateAccessControl(store)).rejects.toThrow('Invalid group record');
  });
});

describe('bootstrapAccess', () => {
  beforeEach(() => {
    vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns a context carrying the store and policy', async () => {
    const store = seededStore();
    const policy = { lockoutThreshold: 3, credentialMaxAgeDays: 30 };

    const { ctx, summary } = await bootstrapAccess(store, policy);

    expect(ctx.store).toBe(store);
    expect(ctx.policy).toBe(policy);
    expect(ctx.access.identities.lockoutThreshold).toBe(3);
    expect(summary.users).toBe(2);
  });

  it('logs and rethrows a failed load', async () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const failure = new Error('connection refused');
    const store: AccessControlStore = {
      loadAllPermissions: vi.fn().mockResolvedValue([]),
      loadAllGroups: vi.fn().mockResolvedValue([]),
      loadAllUsers: vi.fn().mockRejectedValue(failure),
      persist: vi.fn().mockResolvedValue(undefined),
    };

    await expect(bootstrapAccess(store, { lockoutThreshold: 5, credentialMaxAgeDays: 90 })).rejects.toBe(failure);
    expect(error).toHaveBeenCalledWith('Access control load failed', {
      error: { code: undefined, message: 'connection refused', stack: failure.stack },
    });
  });
});
