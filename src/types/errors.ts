// Standardized error types and handling
export interface APIError {
  error: string;
  message: string;
  code: string;
  statusCode: number;
  details?: unknown;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(message: string, code: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  toAPIError(): APIError {
    return {
      error: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      details: this.details
    };
  }
}

// Specific error classes
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND_ERROR', 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT_ERROR', 409);
    this.name = 'ConflictError';
  }
}

// Mailbox unreachable or login refused. Aborts the run before anything is persisted.
export class ConnectionError extends AppError {
  constructor(message: string, details?: unknown) {
    super(`Mailbox connection error: ${message}`, 'CONNECTION_ERROR', 502, details);
    this.name = 'ConnectionError';
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, details?: unknown) {
    super(`Persistence error: ${message}`, 'PERSISTENCE_ERROR', 500, details);
    this.name = 'PersistenceError';
  }
}

// Timeouts, connection failures and 5xx answers; always worth another attempt
export class NetworkError extends AppError {
  constructor(message: string) {
    super(message, 'NETWORK_ERROR', 502);
    this.name = 'NetworkError';
  }
}

export class UnsubscribeFailure extends AppError {
  constructor(domain: string, message: string) {
    super(`Unsubscribe failed for ${domain}: ${message}`, 'UNSUBSCRIBE_FAILURE', 502);
    this.name = 'UnsubscribeFailure';
  }
}

export class InvalidSelectionInputError extends AppError {
  public readonly row: number;

  constructor(row: number, message: string) {
    super(`Invalid selection row ${row}: ${message}`, 'INVALID_SELECTION_INPUT', 400, { row });
    this.name = 'InvalidSelectionInputError';
    this.row = row;
  }
}

// Error handler utility
export function handleError(error: unknown): APIError {
  if (error instanceof AppError) {
    return error.toAPIError();
  }

  if (error instanceof Error) {
    return {
      error: 'InternalServerError',
      message: error.message,
      code: 'INTERNAL_SERVER_ERROR',
      statusCode: 500
    };
  }

  return {
    error: 'UnknownError',
    message: 'An unknown error occurred',
    code: 'UNKNOWN_ERROR',
    statusCode: 500
  };
}
