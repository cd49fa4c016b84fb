import { describe, it, expect } from 'vitest';
import { ValidationError } from '@tillgate/shared';
import { Permission } from '../permissions/permission';
import { PermissionSet } from '../permissions/permission-set';

// ── Permission ────────────────────────────────────────────────────

describe('Permission', () => {
  it('normalizes name and aliases', () => {
    const perm = new Permission({ name: '  POS.Refund ', aliases: [' Refund ', 'RETURNS'] });
    expect(perm.name).toBe('pos.refund');
    expect(perm.aliases).toEqual(['refund', 'returns']);
    expect(perm.description).toBe('');
    expect(perm.isDefault).toBe(false);
  });

  it('rejects a blank name', () => {
    expect(() => new Permission({ name: '   ' })).toThrow(ValidationError);
    expect(() => new Permission({ name: '' })).toThrow('Permission name cannot be empty');
  });

  it('matches its own name and every alias, in any case', () => {
    const perm = new Permission({ name: 'pos.void', aliases: ['void', 'cancel'] });
    expect(perm.matches('pos.void')).toBe(true);
    expect(perm.matches(' POS.VOID ')).toBe(true);
    for (const alias of perm.aliases) {
      expect(perm.matches(alias)).toBe(true);
    }
    expect(perm.matches('Cancel')).toBe(true);
  });

  it('matches nothing else', () => {
    const perm = new Permission({ name: 'pos.void', aliases: ['void'] });
    expect(perm.matches('pos.voids')).toBe(false);
    expect(perm.matches('pos')).toBe(false);
    expect(perm.matches('')).toBe(false);
    expect(perm.matches(null)).toBe(false);
    expect(perm.matches(undefined)).toBe(false);
  });

  it('distinguishes aliases from the name in isAlias', () => {
    const perm = new Permission({ name: 'pos.void', aliases: ['void'] });
    expect(perm.isAlias('VOID')).toBe(true);
    expect(perm.isAlias('pos.void')).toBe(false);
  });

  it('compares by name only', () => {
    const a = new Permission({ name: 'pos.refund', description: 'Refunds', aliases: ['refund'] });
    const b = new Permission({ name: 'POS.REFUND', description: 'Other text', isDefault: true });
    expect(a.equals(b)).toBe(true);
    expect(a.equals(new Permission({ name: 'pos.void' }))).toBe(false);
    expect(a.equals(null)).toBe(false);
  });
});

// ── PermissionSet ─────────────────────────────────────────────────

describe('PermissionSet', () => {
  it('keeps the first instance when a name is added twice', () => {
    const first = new Permission({ name: 'pos.refund', aliases: ['refund'] });
    const second = new Permission({ name: 'pos.refund', aliases: ['return'] });
    const set = new PermissionSet([first]);

    expect(set.add(second)).toBe(false);
    expect(set.size).toBe(1);
    expect(set.get('pos.refund')).toBe(first);
    expect(set.matches('refund')).toBe(true);
    expect(set.matches('return')).toBe(false);
  });

  it('removes by object or by normalized name', () => {
    const set = new PermissionSet([new Permission({ name: 'a' }), new Permission({ name: 'b' })]);
    expect(set.remove(new Permission({ name: 'A' }))).toBe(true);
    expect(set.remove(' B ')).toBe(true);
    expect(set.remove('c')).toBe(false);
    expect(set.size).toBe(0);
  });

  it('unions several sets without duplicates', () => {
    const a = new Permission({ name: 'a' });
    const b = new Permission({ name: 'b' });
    const union = PermissionSet.union([a], [b, new Permission({ name: 'a' })]);
    expect(union.names()).toEqual(new Set(['a', 'b']));
    expect(union.get('a')).toBe(a);
  });

  it('iterates its members', () => {
    const set = new PermissionSet([new Permission({ name: 'x' }), new Permission({ name: 'y' })]);
    expect([...set].map((p) => p.name)).toEqual(['x', 'y']);
    expect(set.has('X')).toBe(true);
  });
});
