import { ValidationError, normalizeName, trimOrEmpty } from '@tillgate/shared';
import type { GroupResolver } from '../permissions/group-registry';
import { credentialsMatch } from './credentials';
import { applyUsername, type Principal } from './principal';
import { DEFAULT_LOCKOUT_THRESHOLD, type AuthResult, type IdentityStats } from './types';

export interface IdentityRegistryOptions {
  /** Failed logins that lock an account. */
  lockoutThreshold?: number;
}

/**
 * Principals indexed by id and by normalized username. Both indices are
 * updated within one synchronous call, so no reader observes a principal in
 * one index but not the other.
 */
export class IdentityRegistry {
  readonly lockoutThreshold: number;
  private readonly byId = new Map<string, Principal>();
  private readonly byUsername = new Map<string, Principal>();

  constructor(options: IdentityRegistryOptions = {}) {
    const threshold = options.lockoutThreshold ?? DEFAULT_LOCKOUT_THRESHOLD;
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new ValidationError('Lockout threshold must be a positive integer', [
        { field: 'lockoutThreshold', message: 'Lockout threshold must be a positive integer' },
      ]);
    }
    this.lockoutThreshold = threshold;
  }

  /** Rejects a taken username (or id) and leaves the existing principal untouched. */
  addUser(principal: Principal): boolean {
    if (this.byUsername.has(principal.username) || this.byId.has(principal.id)) {
      return false;
    }
    this.byId.set(principal.id, principal);
    this.byUsername.set(principal.username, principal);
    return true;
  }

  /**
   * Inserts or replaces the principal with the same id. Fails when the
   * username is held by a different principal.
   */
  upsertUser(principal: Principal): boolean {
    const holder = this.byUsername.get(principal.username);
    if (holder && holder.id !== principal.id) return false;

    const previous = this.byId.get(principal.id);
    if (previous) this.byUsername.delete(previous.username);
    this.byId.set(principal.id, principal);
    this.byUsername.set(principal.username, principal);
    return true;
  }

  removeUser(id: string | null | undefined): boolean {
    const principal = this.byId.get(trimOrEmpty(id));
    if (!principal) return false;
    this.byId.delete(principal.id);
    this.byUsername.delete(principal.username);
    return true;
  }

  getById(id: string | null | undefined): Principal | undefined {
    return this.byId.get(trimOrEmpty(id));
  }

  getByUsername(username: string | null | undefined): Principal | undefined {
    return this.byUsername.get(normalizeName(username));
  }

  renameUser(id: string, username: string): boolean {
    const principal = this.getById(id);
    if (!principal) return false;
    const next = normalizeName(username);
    if (!next) return false;
    if (next === principal.username) return true;
    if (this.byUsername.has(next)) return false;

    this.byUsername.delete(principal.username);
    principal[applyUsername](next);
    this.byUsername.set(next, principal);
    return true;
  }

  // ── Authentication ─────────────────────────────────────────────

  /**
   * Only a wrong credential on a loginable account counts towards lockout;
   * unknown, inactive and locked accounts fail without any state change.
   */
  authenticate(username: string, credentialHash: string): AuthResult {
    const principal = this.getByUsername(username);
    if (!principal) return { ok: false, reason: 'unknown_user' };
    if (!principal.canLogin()) return { ok: false, reason: 'not_loginable' };

    if (credentialsMatch(principal.credentialHash, credentialHash)) {
      principal.recordSuccessfulLogin();
      return { ok: true, principal };
    }
    principal.recordFailedLogin(this.lockoutThreshold);
    return { ok: false, reason: 'invalid_credentials' };
  }

  changePassword(id: string, oldHash: string, newHash: string): boolean {
    const principal = this.getById(id);
    if (!principal) return false;
    if (!credentialsMatch(principal.credentialHash, oldHash)) return false;
    principal.setCredentialHash(newHash);
    return true;
  }

  unlockUser(id: string): boolean {
    const principal = this.getById(id);
    if (!principal) return false;
    principal.setLocked(false);
    return true;
  }

  // ── Queries ────────────────────────────────────────────────────

  listUsers(): Principal[] {
    return [...this.byId.values()];
  }

  activeUsers(): Principal[] {
    return this.listUsers().filter((p) => p.active);
  }

  usersInGroup(groupName: string): Principal[] {
    return this.listUsers().filter((p) => p.isInGroup(groupName));
  }

  usersWithPermission(permission: string, resolver?: GroupResolver): Principal[] {
    return this.listUsers().filter((p) => p.hasPermission(permission, resolver));
  }

  stats(): IdentityStats {
    let active = 0;
    let locked = 0;
    for (const principal of this.byId.values()) {
      if (principal.active) active++;
      if (principal.locked) locked++;
    }
    return { total: this.byId.size, active, locked };
  }
}
