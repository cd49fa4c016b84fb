import type { Principal } from './principal';

export const DEFAULT_LOCKOUT_THRESHOLD = 5;

export type AccountState = 'active' | 'locked' | 'inactive';

/**
 * Why authentication failed. Callers may show the same message for all three;
 * the distinction exists for logging and lockout handling.
 */
export type AuthFailureReason = 'unknown_user' | 'not_loginable' | 'invalid_credentials';

export interface AuthFailure {
  ok: false;
  reason: AuthFailureReason;
}

export interface AuthSuccess {
  ok: true;
  principal: Principal;
}

export type AuthResult = AuthSuccess | AuthFailure;

export interface IdentityStats {
  total: number;
  active: number;
  locked: number;
}

export interface PrincipalProfile {
  firstName?: string | null;
  lastName?: string | null;
  email?: string | null;
}

/** Persisted principal state, as handed over by a loader. */
export interface PrincipalSnapshot extends PrincipalProfile {
  id: string;
  username: string;
  credentialHash?: string | null;
  active?: boolean;
  locked?: boolean;
  failedAttempts?: number;
  createdAt?: Date;
  lastLoginAt?: Date | null;
  lastCredentialChangeAt?: Date | null;
  groups?: Iterable<string>;
}
