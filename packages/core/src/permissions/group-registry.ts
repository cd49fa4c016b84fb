import { normalizeName } from '@tillgate/shared';
import type { Permission } from './permission';
import type { PermissionGroup } from './group';
import { PermissionSet } from './permission-set';

/**
 * What a principal needs from the group graph. GroupRegistry is the
 * production implementation; tests may pass a stub.
 */
export interface GroupResolver {
  hasPermission(groupName: string, permission: string): boolean;
  effectivePermissions(groupName: string): PermissionSet;
}

/**
 * Index of groups and permissions by normalized name, plus the inheritance
 * resolver.
 *
 * Resolution walks parent links depth-first with an explicit stack and a
 * per-call visited set, so cycles (A → B → A) terminate instead of being
 * rejected. Nothing is cached between calls: a registry change is visible to
 * the very next check.
 */
export class GroupRegistry implements GroupResolver {
  private readonly groups = new Map<string, PermissionGroup>();
  private readonly permissions = new Map<string, Permission>();

  // ── Groups ─────────────────────────────────────────────────────

  /** Upsert keyed by the group's name. */
  addGroup(group: PermissionGroup): void {
    this.groups.set(group.name, group);
  }

  getGroup(name: string | null | undefined): PermissionGroup | undefined {
    return this.groups.get(normalizeName(name));
  }

  removeGroup(name: string | null | undefined): boolean {
    return this.groups.delete(normalizeName(name));
  }

  hasGroup(name: string | null | undefined): boolean {
    return this.groups.has(normalizeName(name));
  }

  listGroups(): PermissionGroup[] {
    return [...this.groups.values()];
  }

  defaultGroups(): PermissionGroup[] {
    return this.listGroups().filter((g) => g.isDefault);
  }

  // ── Permissions ────────────────────────────────────────────────

  /** Upsert keyed by the permission's name. */
  addPermission(permission: Permission): void {
    this.permissions.set(permission.name, permission);
  }

  getPermission(name: string | null | undefined): Permission | undefined {
    return this.permissions.get(normalizeName(name));
  }

  removePermission(name: string | null | undefined): boolean {
    return this.permissions.delete(normalizeName(name));
  }

  listPermissions(): Permission[] {
    return [...this.permissions.values()];
  }

  defaultPermissions(): Permission[] {
    return this.listPermissions().filter((p) => p.isDefault);
  }

  // ── Resolution ─────────────────────────────────────────────────

  hasPermission(groupName: string, permission: string): boolean {
    for (const group of this.walk(groupName)) {
      if (group.hasPermission(permission)) return true;
    }
    return false;
  }

  effectivePermissions(groupName: string): PermissionSet {
    const result = new PermissionSet();
    for (const group of this.walk(groupName)) {
      result.addAll(group.permissions);
    }
    return result;
  }

  /** Names of every registered group reachable through parent links, excluding the start. */
  ancestors(groupName: string): Set<string> {
    const start = normalizeName(groupName);
    const names = new Set<string>();
    for (const group of this.walk(start)) {
      if (group.name !== start) names.add(group.name);
    }
    return names;
  }

  /** True when the group can reach itself through its parents. */
  isInCycle(groupName: string): boolean {
    const start = this.getGroup(groupName);
    if (!start) return false;

    const visited = new Set<string>();
    const stack = [...start.parents];
    while (stack.length > 0) {
      const name = stack.pop();
      if (name === undefined || visited.has(name)) continue;
      if (name === start.name) return true;
      visited.add(name);
      const group = this.groups.get(name);
      if (group) stack.push(...group.parents);
    }
    return false;
  }

  /**
   * Yields the named group, then each registered ancestor once. Unknown
   * groups yield nothing; unknown parent names are skipped.
   */
  private *walk(groupName: string): Generator<PermissionGroup> {
    const start = this.getGroup(groupName);
    if (!start) return;

    const visited = new Set<string>();
    const stack: PermissionGroup[] = [start];
    while (stack.length > 0) {
      const group = stack.pop();
      if (!group || visited.has(group.name)) continue;
      visited.add(group.name);
      yield group;

      for (const parentName of group.parents) {
        if (visited.has(parentName)) continue;
        const parent = this.groups.get(parentName);
        if (parent) stack.push(parent);
      }
    }
  }
}
