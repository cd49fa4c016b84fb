import { normalizeName } from '@tillgate/shared';
import type { Permission } from './permission';

/**
 * Permissions keyed by normalized name. Adding a permission whose name is
 * already present keeps the existing instance and reports `false`.
 */
export class PermissionSet implements Iterable<Permission> {
  private readonly byName = new Map<string, Permission>();

  constructor(initial?: Iterable<Permission>) {
    if (initial) {
      for (const permission of initial) this.add(permission);
    }
  }

  static union(...sets: Iterable<Permission>[]): PermissionSet {
    const result = new PermissionSet();
    for (const set of sets) result.addAll(set);
    return result;
  }

  get size(): number {
    return this.byName.size;
  }

  add(permission: Permission): boolean {
    if (this.byName.has(permission.name)) return false;
    this.byName.set(permission.name, permission);
    return true;
  }

  addAll(permissions: Iterable<Permission>): void {
    for (const permission of permissions) this.add(permission);
  }

  /** Removes by identity, i.e. by name; accepts the permission or its name. */
  remove(permission: Permission | string): boolean {
    const key = typeof permission === 'string' ? normalizeName(permission) : permission.name;
    return this.byName.delete(key);
  }

  has(name: string): boolean {
    return this.byName.has(normalizeName(name));
  }

  get(name: string): Permission | undefined {
    return this.byName.get(normalizeName(name));
  }

  /** True when any member matches `query` by name or alias. */
  matches(query: string | null | undefined): boolean {
    for (const permission of this.byName.values()) {
      if (permission.matches(query)) return true;
    }
    return false;
  }

  names(): Set<string> {
    return new Set(this.byName.keys());
  }

  values(): Permission[] {
    return [...this.byName.values()];
  }

  clear(): void {
    this.byName.clear();
  }

  [Symbol.iterator](): Iterator<Permission> {
    return this.byName.values();
  }
}
