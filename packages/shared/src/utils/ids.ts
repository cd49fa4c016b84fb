import { monotonicFactory } from 'ulid';

const ulid = monotonicFactory();

// Principal ids carry a prefix so they read unambiguously in logs next to usernames.
export const USER_ID_PREFIX = 'usr_';

export function generateUserId(): string {
  return `${USER_ID_PREFIX}${ulid()}`;
}
