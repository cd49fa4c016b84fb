import { ValidationError, normalizeName } from '@tillgate/shared';
import type { Permission } from './permission';
import { PermissionSet } from './permission-set';

export interface PermissionGroupInit {
  name: string;
  description?: string | null;
  permissions?: Iterable<Permission>;
  parents?: Iterable<string>;
  isDefault?: boolean;
}

/**
 * A role: a bundle of permissions plus parent group names. Parents are held
 * by name only and resolved through a GroupRegistry at check time.
 */
export class PermissionGroup {
  readonly name: string;
  private _description: string;
  private _isDefault: boolean;
  private readonly owned: PermissionSet;
  private readonly parentNames = new Set<string>();

  constructor(init: PermissionGroupInit) {
    const name = normalizeName(init.name);
    if (!name) {
      throw new ValidationError('Group name cannot be empty', [
        { field: 'name', message: 'Group name cannot be empty' },
      ]);
    }
    this.name = name;
    this._description = init.description ?? '';
    this._isDefault = init.isDefault ?? false;
    this.owned = new PermissionSet(init.permissions);
    for (const parent of init.parents ?? []) this.addParent(parent);
  }

  get description(): string {
    return this._description;
  }

  get isDefault(): boolean {
    return this._isDefault;
  }

  /** Snapshot of the group's own permissions. */
  get permissions(): PermissionSet {
    return new PermissionSet(this.owned);
  }

  get parents(): ReadonlySet<string> {
    return new Set(this.parentNames);
  }

  get permissionCount(): number {
    return this.owned.size;
  }

  get parentCount(): number {
    return this.parentNames.size;
  }

  isEmpty(): boolean {
    return this.owned.size === 0;
  }

  setDescription(description: string | null | undefined): void {
    this._description = description ?? '';
  }

  setDefault(isDefault: boolean): void {
    this._isDefault = isDefault;
  }

  // ── Permissions ────────────────────────────────────────────────

  addPermission(permission: Permission): boolean {
    return this.owned.add(permission);
  }

  removePermission(permission: Permission | string): boolean {
    return this.owned.remove(permission);
  }

  /** Checks this group's own permissions only; inheritance is the registry's job. */
  hasPermission(name: string | null | undefined): boolean {
    return this.owned.matches(name);
  }

  // ── Parents ────────────────────────────────────────────────────

  addParent(parent: string): boolean {
    const normalized = normalizeName(parent);
    if (!normalized) {
      throw new ValidationError('Parent group name cannot be empty', [
        { field: 'parent', message: 'Parent group name cannot be empty' },
      ]);
    }
    if (normalized === this.name) {
      throw new ValidationError(`Group ${this.name} cannot be its own parent`, [
        { field: 'parent', message: 'Group cannot be its own parent' },
      ]);
    }
    if (this.parentNames.has(normalized)) return false;
    this.parentNames.add(normalized);
    return true;
  }

  removeParent(parent: string | null | undefined): boolean {
    const normalized = normalizeName(parent);
    if (!normalized) return false;
    return this.parentNames.delete(normalized);
  }

  hasParent(parent: string): boolean {
    return this.parentNames.has(normalizeName(parent));
  }

  toString(): string {
    return `PermissionGroup(${this.name}, permissions=${this.owned.size}, parents=${this.parentNames.size})`;
  }
}
