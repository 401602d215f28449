/**
 * Error taxonomy for the data-access layer.
 *
 * Every error carries a stable problem type, a title and an HTTP status, and
 * renders as Problem Details (RFC 7807).
 */

export const ErrorTypes = {
  BAD_REQUEST: 'urn:problem-type:bad-request',
  NOT_FOUND: 'urn:problem-type:not-found',
  CONFLICT: 'urn:problem-type:conflict',
  SERVER_ERROR: 'urn:problem-type:server-error',
  DATABASE_ERROR: 'urn:problem-type:database-error',
  VALIDATION_ERROR: 'urn:problem-type:validation-error',
  IMPLEMENTATION_ERROR: 'urn:problem-type:implementation-error',
  INVALID_FIELD: 'urn:problem-type:invalid-field',
  SQL_SECURITY: 'urn:problem-type:sql-security',
  TIMEOUT: 'urn:problem-type:timeout',
} as const;

export const ErrorTitles = {
  BAD_REQUEST: 'Bad Request',
  NOT_FOUND: 'Not Found',
  CONFLICT: 'Conflict',
  UNPROCESSABLE_ENTITY: 'Unprocessable Entity',
  INTERNAL_SERVER_ERROR: 'Internal Server Error',
  DATABASE_ERROR: 'Database Error',
  IMPLEMENTATION_ERROR: 'Implementation Error',
  GATEWAY_TIMEOUT: 'Gateway Timeout',
} as const;

export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
  details?: string;
  instance?: string;
  timestamp: string;
}

export interface ErrorInit {
  details?: string;
  instance?: string;
  cause?: unknown;
}

export abstract class AppError extends Error {
  abstract readonly type: string;
  abstract readonly title: string;
  abstract readonly status: number;
  readonly details?: string;
  readonly instance?: string;
  readonly timestamp: string;

  constructor(message: string, init: ErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = new.target.name;
    this.details = init.details;
    this.instance = init.instance;
    this.timestamp = new Date().toISOString();
  }

  toProblemDetails(): ProblemDetails {
    return {
      type: this.type,
      title: this.title,
      status: this.status,
      detail: this.message,
      details: this.details,
      instance: this.instance,
      timestamp: this.timestamp,
    };
  }
}

export class BadRequestError extends AppError {
  readonly type: string = ErrorTypes.BAD_REQUEST;
  readonly title: string = ErrorTitles.BAD_REQUEST;
  readonly status: number = 400;
}

export class ValidationError extends AppError {
  readonly type: string = ErrorTypes.VALIDATION_ERROR;
  readonly title: string = ErrorTitles.UNPROCESSABLE_ENTITY;
  readonly status: number = 422;
}

/** A field name that is not declared on the entity. */
export class InvalidFieldError extends ValidationError {
  readonly type: string = ErrorTypes.INVALID_FIELD;
  readonly title: string = ErrorTitles.BAD_REQUEST;
  readonly status: number = 400;
}

/** Raw SQL rejected by pattern screening or placeholder checks. */
export class SqlValidationError extends ValidationError {
  readonly type: string = ErrorTypes.SQL_SECURITY;
}

export class NotFoundError extends AppError {
  readonly type: string = ErrorTypes.NOT_FOUND;
  readonly title: string = ErrorTitles.NOT_FOUND;
  readonly status: number = 404;
}

export class ConflictError extends AppError {
  readonly type: string = ErrorTypes.CONFLICT;
  readonly title: string = ErrorTitles.CONFLICT;
  readonly status: number = 409;
}

/** A store-level failure, wrapped once where it is first caught. */
export class DatabaseError extends AppError {
  readonly type: string = ErrorTypes.DATABASE_ERROR;
  readonly title: string = ErrorTitles.DATABASE_ERROR;
  readonly status: number = 500;
}

export class OperationTimeoutError extends AppError {
  readonly type: string = ErrorTypes.TIMEOUT;
  readonly title: string = ErrorTitles.GATEWAY_TIMEOUT;
  readonly status: number = 504;

  constructor(
    readonly timeoutSeconds: number,
    init: ErrorInit = {},
  ) {
    super(`Operation exceeded ${timeoutSeconds}s`, init);
  }
}

/** Our bug: a collaborator is missing something it must provide. */
export class ImplementationError extends AppError {
  readonly type: string = ErrorTypes.IMPLEMENTATION_ERROR;
  readonly title: string = ErrorTitles.IMPLEMENTATION_ERROR;
  readonly status: number = 500;
}

export class ServerError extends AppError {
  readonly type: string = ErrorTypes.SERVER_ERROR;
  readonly title: string = ErrorTitles.INTERNAL_SERVER_ERROR;
  readonly status: number = 500;
}

/**
 * Map any thrown value to Problem Details. Unknown errors become a server error.
 */
export function toProblemDetails(error: unknown): ProblemDetails {
  if (error instanceof AppError) {
    return error.toProblemDetails();
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ServerError('An unexpected error occurred', { details: message }).toProblemDetails();
}
