export { Principal } from './principal';
export type { PrincipalInit } from './principal';
export { IdentityRegistry } from './identity-registry';
export type { IdentityRegistryOptions } from './identity-registry';
export { credentialsMatch } from './credentials';
export { DEFAULT_LOCKOUT_THRESHOLD } from './types';
export type * from './types';
