/**
 * Base application error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestError extends AppError {
  constructor(message = 'Bad request', code = 'BAD_REQUEST') {
    super(message, 400, code);
  }
}

/**
 * 422 Unprocessable Entity
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown, code = 'VALIDATION_ERROR') {
    super(message, 422, code);
    this.details = details;
  }
}

/**
 * 500 Internal Server Error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal server error', code = 'INTERNAL_ERROR') {
    super(message, 500, code, false);
  }
}

/**
 * External API error (workflows API, usage endpoint)
 */
export class ExternalApiError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error, code = 'EXTERNAL_API_ERROR') {
    super(`${service}: ${message}`, 502, code);
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Non-2xx response or connection failure from the workflows API
 */
export class WorkflowApiError extends ExternalApiError {
  public readonly httpStatus?: number;

  constructor(message: string, httpStatus?: number, originalError?: Error, code = 'WORKFLOW_API_ERROR') {
    super('Workflows API', message, originalError, code);
    this.httpStatus = httpStatus;
  }
}

/**
 * Workflows API response lacks the expected nested specification
 */
export class MalformedWorkflowResponseError extends AppError {
  constructor(message: string) {
    super(message, 502, 'MALFORMED_WORKFLOW_RESPONSE');
  }
}
