export * from './permissions';
export * from './identity';
export * from './access';
export { loadAccessPolicy, DEFAULT_CREDENTIAL_MAX_AGE_DAYS } from './config';
export type { AccessPolicy } from './config';
export { logger, log, setLogLevel, getLogLevel, errorFields } from './observability/logger';
export type { LogLevel, LogEntry } from './observability/logger';
