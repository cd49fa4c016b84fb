export { Permission } from './permission';
export type { PermissionInit } from './permission';
export { PermissionSet } from './permission-set';
export { PermissionGroup } from './group';
export type { PermissionGroupInit } from './group';
export { GroupRegistry } from './group-registry';
export type { GroupResolver } from './group-registry';
