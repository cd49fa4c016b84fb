export { generateUserId, USER_ID_PREFIX } from './ids';
export { normalizeName, trimOrEmpty } from './normalize';
