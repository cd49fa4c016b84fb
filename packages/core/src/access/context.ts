import type { AccessPolicy } from '../config';
import type { AccessControl } from './access-control';
import type { AccessControlStore } from './store';

/** What every access command needs: the live registries, where to persist, and the policy. */
export interface AccessContext {
  access: AccessControl;
  store: AccessControlStore;
  policy: AccessPolicy;
}
