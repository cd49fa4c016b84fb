import type { Permission } from '../permissions/permission';
import type { PermissionGroup } from '../permissions/group';
import { GroupRegistry } from '../permissions/group-registry';
import { IdentityRegistry, type IdentityRegistryOptions } from '../identity/identity-registry';
import type { Principal } from '../identity/principal';
import type { AuthResult } from '../identity/types';
import { canPerform } from './capabilities';

export interface AccessControlOptions extends IdentityRegistryOptions {
  groups?: GroupRegistry;
  identities?: IdentityRegistry;
}

/**
 * Request-time entry point over the group and identity registries. Every
 * method is synchronous and does no I/O; persisting changes is the caller's
 * job (see the commands in this module).
 */
export class AccessControl {
  readonly groups: GroupRegistry;
  readonly identities: IdentityRegistry;

  constructor(options: AccessControlOptions = {}) {
    this.groups = options.groups ?? new GroupRegistry();
    this.identities =
      options.identities ?? new IdentityRegistry({ lockoutThreshold: options.lockoutThreshold });
  }

  // ── Registration ───────────────────────────────────────────────

  registerPermission(permission: Permission): void {
    this.groups.addPermission(permission);
  }

  registerGroup(group: PermissionGroup): void {
    this.groups.addGroup(group);
  }

  /** Upsert by id; false when another principal already holds the username. */
  registerUser(principal: Principal): boolean {
    return this.identities.upsertUser(principal);
  }

  unregisterGroup(name: string): boolean {
    return this.groups.removeGroup(name);
  }

  unregisterUser(id: string): boolean {
    return this.identities.removeUser(id);
  }

  // ── Authorization ──────────────────────────────────────────────

  check(userId: string, permission: string): boolean {
    const principal = this.identities.getById(userId);
    return principal ? principal.hasPermission(permission, this.groups) : false;
  }

  checkAny(userId: string, permissions: readonly string[]): boolean {
    const principal = this.identities.getById(userId);
    return principal ? principal.hasAnyPermission(permissions, this.groups) : false;
  }

  checkAll(userId: string, permissions: readonly string[]): boolean {
    const principal = this.identities.getById(userId);
    return principal ? principal.hasAllPermissions(permissions, this.groups) : false;
  }

  canPerform(userId: string, operation: string): boolean {
    const principal = this.identities.getById(userId);
    return principal ? canPerform(principal, operation, this.groups) : false;
  }

  effectivePermissions(userId: string): Set<string> {
    const principal = this.identities.getById(userId);
    return principal ? principal.effectivePermissions(this.groups).names() : new Set();
  }

  // ── Identity ───────────────────────────────────────────────────

  authenticate(username: string, credentialHash: string): AuthResult {
    return this.identities.authenticate(username, credentialHash);
  }

  changePassword(userId: string, oldHash: string, newHash: string): boolean {
    return this.identities.changePassword(userId, oldHash, newHash);
  }

  unlockUser(userId: string): boolean {
    return this.identities.unlockUser(userId);
  }

  /** Adds a membership; false for an unknown user or group. */
  assignGroup(userId: string, groupName: string): boolean {
    const principal = this.identities.getById(userId);
    const group = this.groups.getGroup(groupName);
    if (!principal || !group) return false;
    principal.addToGroup(group.name);
    return true;
  }

  revokeGroup(userId: string, groupName: string): boolean {
    const principal = this.identities.getById(userId);
    return principal ? principal.removeFromGroup(groupName) : false;
  }
}
