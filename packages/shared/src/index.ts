export {
  AppError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ValidationError,
} from './errors';
export * from './utils';
export {
  entityNameSchema,
  userIdSchema,
  credentialHashSchema,
  assertValidated,
  parseOrThrow,
} from './validation';
