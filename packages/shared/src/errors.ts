export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Invalid username or password') {
    super('AUTHENTICATION_FAILED', message, 401);
  }
}

export class AuthorizationError extends AppError {
  constructor(permission?: string) {
    super(
      'AUTHORIZATION_DENIED',
      permission ? `Missing permission: ${permission}` : 'Permission denied',
      403,
    );
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super('NOT_FOUND', id ? `${entity} ${id} not found` : `${entity} not found`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}
