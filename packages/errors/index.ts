/**
* Unified Error Handling Package
*
* Provides standardized error classes, error codes, and response helpers
* for consistent error handling across all API routes.
*
* Standard Error Format:
* {
*   error: string;       // Human-readable error message
*   code: string;        // Machine-readable error code
*   details?: unknown;   // Additional error details (validation issues, etc.)
*   requestId?: string;  // Request ID for tracing
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Validation Errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_PARAMS: 'INVALID_PARAMS',
  UNSUPPORTED_MEDIA_TYPE: 'UNSUPPORTED_MEDIA_TYPE',

  // Resource Errors
  NOT_FOUND: 'NOT_FOUND',
  ARTICLE_NOT_FOUND: 'ARTICLE_NOT_FOUND',
  USER_NOT_FOUND: 'USER_NOT_FOUND',

  // Search Backend Errors
  SEARCH_BACKEND_ERROR: 'SEARCH_BACKEND_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  // Service Errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

const KNOWN_ERROR_CODES: readonly string[] = Object.values(ErrorCodes);

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && KNOWN_ERROR_CODES.includes(value);
}

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * Standardized error response shape returned by all API endpoints.
 */
export interface ErrorResponse {
  /** Human-readable error message */
  error: string;
  /** Machine-readable error code from ErrorCodes */
  code: string;
  /** Additional error details (validation issues, etc.) - development only */
  details?: unknown;
  /** Request ID for distributed tracing */
  requestId?: string;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly requestId: string | undefined;
  public readonly statusCode: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    statusCode: number = 500,
    details?: unknown,
    requestId: string | undefined = undefined,
    options?: { cause?: Error }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.requestId = requestId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: unknown,
    requestId?: string
  ) {
    super(message, ErrorCodes.VALIDATION_ERROR, 400, details, requestId);
  }
}

/**
* The search engine could not be reached (connection refused, timeout,
* no living nodes). Fatal at startup, 503 at request time.
*/
export class BackendUnavailableError extends AppError {
  constructor(
    message: string = 'Search backend unavailable',
    options?: { cause?: Error }
  ) {
    super(message, ErrorCodes.SERVICE_UNAVAILABLE, 503, undefined, undefined, options);
  }
}

/**
* The search engine answered with an error, or returned a document that
* does not decode into the expected shape.
*/
export class SearchBackendError extends AppError {
  constructor(
    message: string = 'Search backend error',
    details?: unknown,
    options?: { cause?: Error }
  ) {
    super(message, ErrorCodes.SEARCH_BACKEND_ERROR, 500, details, undefined, options);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
* Check if we should expose detailed error info
* Gated solely on NODE_ENV
*/
export function shouldExposeErrorDetails(): boolean {
  return process.env['NODE_ENV'] === 'development';
}

/**
 * Extract error message from unknown catch parameter.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalize an unknown catch parameter into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export { withContext, type OperationContext } from './error-context';
export { createRouteErrorHandler } from './route-error-handler';
