import type { Principal } from '../identity/principal';
import type { GroupResolver } from '../permissions/group-registry';

export const POS_ADMIN = 'pos.admin';
export const SYSTEM_ADMIN = 'system.admin';

export const POS_PERMISSIONS = {
  cashier: 'pos.cashier',
  refund: 'pos.refund',
  inventory: 'pos.inventory',
  reports: 'pos.reports',
} as const;

export const SYSTEM_PERMISSIONS = {
  users: 'system.users',
} as const;

/** `pos.<operation>`, or anything for holders of `pos.admin`. */
export function canPerform(principal: Principal, operation: string, resolver?: GroupResolver): boolean {
  return principal.hasAnyPermission([`pos.${operation.trim()}`, POS_ADMIN], resolver);
}

export function canAccessCashier(principal: Principal, resolver?: GroupResolver): boolean {
  return principal.hasAnyPermission([POS_PERMISSIONS.cashier, POS_ADMIN], resolver);
}

export function canProcessRefunds(principal: Principal, resolver?: GroupResolver): boolean {
  return principal.hasAnyPermission([POS_PERMISSIONS.refund, POS_ADMIN], resolver);
}

export function canManageInventory(principal: Principal, resolver?: GroupResolver): boolean {
  return principal.hasAnyPermission([POS_PERMISSIONS.inventory, POS_ADMIN], resolver);
}

export function canViewReports(principal: Principal, resolver?: GroupResolver): boolean {
  return principal.hasAnyPermission([POS_PERMISSIONS.reports, POS_ADMIN], resolver);
}

export function canManageUsers(principal: Principal, resolver?: GroupResolver): boolean {
  return principal.hasAnyPermission([SYSTEM_PERMISSIONS.users, SYSTEM_ADMIN], resolver);
}
