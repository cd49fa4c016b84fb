import { ValidationError, normalizeName, trimOrEmpty } from '@tillgate/shared';
import type { Permission } from '../permissions/permission';
import { PermissionSet } from '../permissions/permission-set';
import type { GroupResolver } from '../permissions/group-registry';
import {
  DEFAULT_LOCKOUT_THRESHOLD,
  type AccountState,
  type PrincipalProfile,
  type PrincipalSnapshot,
} from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Renames a principal. Not re-exported from the package: only
 * IdentityRegistry.renameUser calls it, so the username index stays in step.
 */
export const applyUsername = Symbol('applyUsername');

export interface PrincipalInit extends PrincipalProfile {
  id: string;
  username: string;
}

function requireUsername(username: string): string {
  const normalized = normalizeName(username);
  if (!normalized) {
    throw new ValidationError('Username cannot be empty', [
      { field: 'username', message: 'Username cannot be empty' },
    ]);
  }
  return normalized;
}

/**
 * An authenticatable user: direct grants, group memberships by name, and the
 * login state machine (active / locked / failed-attempt counter).
 *
 * Group permissions are resolved through a GroupResolver passed per call; a
 * principal never holds a registry.
 */
export class Principal {
  readonly id: string;
  readonly createdAt: Date;
  private _username: string;
  private _firstName = '';
  private _lastName = '';
  private _email = '';
  private _credentialHash: string | null = null;
  private _active = true;
  private _locked = false;
  private _failedAttempts = 0;
  private _lastLoginAt: Date | null = null;
  private _lastCredentialChangeAt: Date | null = null;
  private readonly groupNames = new Set<string>();
  private readonly direct = new PermissionSet();

  constructor(init: PrincipalInit, createdAt: Date = new Date()) {
    const id = trimOrEmpty(init.id);
    if (!id) {
      throw new ValidationError('User id cannot be empty', [
        { field: 'id', message: 'User id cannot be empty' },
      ]);
    }
    this.id = id;
    this._username = requireUsername(init.username);
    this.createdAt = createdAt;
    this.setProfile(init);
  }

  /** Rebuilds persisted state without stamping any timestamps. */
  static restore(snapshot: PrincipalSnapshot, directPermissions: Iterable<Permission> = []): Principal {
    const principal = new Principal(snapshot, snapshot.createdAt ?? new Date());
    principal._credentialHash = snapshot.credentialHash ?? null;
    principal._active = snapshot.active ?? true;
    principal._locked = snapshot.locked ?? false;
    principal._failedAttempts = Math.max(0, snapshot.failedAttempts ?? 0);
    principal._lastLoginAt = snapshot.lastLoginAt ?? null;
    principal._lastCredentialChangeAt = snapshot.lastCredentialChangeAt ?? null;
    for (const group of snapshot.groups ?? []) principal.addToGroup(group);
    for (const permission of directPermissions) principal.addDirectPermission(permission);
    return principal;
  }

  // ── Profile ────────────────────────────────────────────────────

  get username(): string {
    return this._username;
  }

  [applyUsername](username: string): void {
    this._username = requireUsername(username);
  }

  get firstName(): string {
    return this._firstName;
  }

  get lastName(): string {
    return this._lastName;
  }

  get email(): string {
    return this._email;
  }

  get fullName(): string {
    const full = `${this._firstName} ${this._lastName}`.trim();
    return full || this._username;
  }

  setProfile(profile: PrincipalProfile): void {
    if (profile.firstName !== undefined) this._firstName = trimOrEmpty(profile.firstName);
    if (profile.lastName !== undefined) this._lastName = trimOrEmpty(profile.lastName);
    if (profile.email !== undefined) this._email = normalizeName(profile.email);
  }

  // ── Account state ──────────────────────────────────────────────

  get active(): boolean {
    return this._active;
  }

  get locked(): boolean {
    return this._locked;
  }

  get failedAttempts(): number {
    return this._failedAttempts;
  }

  get lastLoginAt(): Date | null {
    return this._lastLoginAt;
  }

  get lastCredentialChangeAt(): Date | null {
    return this._lastCredentialChangeAt;
  }

  get credentialHash(): string | null {
    return this._credentialHash;
  }

  state(): AccountState {
    if (!this._active) return 'inactive';
    return this._locked ? 'locked' : 'active';
  }

  canLogin(): boolean {
    return this._active && !this._locked;
  }

  setActive(active: boolean): void {
    this._active = active;
  }

  /** Unlocking clears the failure counter; locking leaves it as is. */
  setLocked(locked: boolean): void {
    this._locked = locked;
    if (!locked) this._failedAttempts = 0;
  }

  recordSuccessfulLogin(): void {
    this._failedAttempts = 0;
    this._lastLoginAt = new Date();
  }

  /** Returns true when this failure locked (or kept locked) the account. */
  recordFailedLogin(threshold: number = DEFAULT_LOCKOUT_THRESHOLD): boolean {
    this._failedAttempts += 1;
    if (this._failedAttempts >= threshold) {
      this._locked = true;
    }
    return this._locked;
  }

  setCredentialHash(hash: string): void {
    if (typeof hash !== 'string' || hash.length === 0) {
      throw new ValidationError('Credential hash cannot be empty', [
        { field: 'credentialHash', message: 'Credential hash cannot be empty' },
      ]);
    }
    this._credentialHash = hash;
    this._lastCredentialChangeAt = new Date();
  }

  isCredentialExpired(maxDays: number): boolean {
    if (!this._lastCredentialChangeAt) return true;
    return this._lastCredentialChangeAt.getTime() + maxDays * DAY_MS < Date.now();
  }

  // ── Groups ─────────────────────────────────────────────────────

  get groups(): ReadonlySet<string> {
    return new Set(this.groupNames);
  }

  addToGroup(groupName: string): boolean {
    const normalized = normalizeName(groupName);
    if (!normalized) {
      throw new ValidationError('Group name cannot be empty', [
        { field: 'group', message: 'Group name cannot be empty' },
      ]);
    }
    if (this.groupNames.has(normalized)) return false;
    this.groupNames.add(normalized);
    return true;
  }

  removeFromGroup(groupName: string | null | undefined): boolean {
    const normalized = normalizeName(groupName);
    if (!normalized) return false;
    return this.groupNames.delete(normalized);
  }

  isInGroup(groupName: string | null | undefined): boolean {
    return this.groupNames.has(normalizeName(groupName));
  }

  // ── Direct permissions ─────────────────────────────────────────

  get directPermissions(): PermissionSet {
    return new PermissionSet(this.direct);
  }

  addDirectPermission(permission: Permission): boolean {
    return this.direct.add(permission);
  }

  removeDirectPermission(permission: Permission | string): boolean {
    return this.direct.remove(permission);
  }

  hasDirectPermission(name: string | null | undefined): boolean {
    return this.direct.matches(name);
  }

  // ── Authorization ──────────────────────────────────────────────

  /**
   * Inactive or locked principals hold no usable permission. Otherwise a
   * direct grant wins, then any group (with its ancestors) that grants it.
   */
  hasPermission(name: string | null | undefined, resolver?: GroupResolver): boolean {
    if (!this.canLogin()) return false;
    if (name == null || !normalizeName(name)) return false;
    if (this.direct.matches(name)) return true;
    if (!resolver) return false;

    for (const group of this.groupNames) {
      if (resolver.hasPermission(group, name)) return true;
    }
    return false;
  }

  hasAnyPermission(names: readonly string[], resolver?: GroupResolver): boolean {
    return names.some((name) => this.hasPermission(name, resolver));
  }

  /** Vacuously true for an empty list. */
  hasAllPermissions(names: readonly string[], resolver?: GroupResolver): boolean {
    return names.every((name) => this.hasPermission(name, resolver));
  }

  /** Everything granted, directly or through groups; ignores account state. */
  effectivePermissions(resolver?: GroupResolver): PermissionSet {
    const result = new PermissionSet(this.direct);
    if (!resolver) return result;
    for (const group of this.groupNames) {
      result.addAll(resolver.effectivePermissions(group));
    }
    return result;
  }

  toString(): string {
    return `Principal(${this.id}, ${this._username}, ${this.state()})`;
  }
}
