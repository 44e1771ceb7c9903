import { AppError, ErrorCodes, type ErrorCode } from './index';

/**
 * Contextual information about what operation was being performed when an error occurred.
 */
export interface OperationContext {
  /** What operation was being performed, e.g., 'createArticle', 'searchArticles' */
  operation: string;
  /** What type of resource was involved, e.g., 'article', 'user' */
  resource?: string;
  /** Specific resource identifier */
  resourceId?: string;
  /** Additional key-value pairs for debugging */
  metadata?: Record<string, unknown>;
}

/**
 * Wrap any error with operational context, preserving the full cause chain.
 * Status and code of an AppError survive the wrap.
 *
 * Use:
 *   throw withContext(error, { operation: 'searchArticles', resource: 'article' });
 */
export function withContext(
  error: unknown,
  context: OperationContext
): AppError {
  const cause = error instanceof Error ? error : new Error(String(error));

  const code: ErrorCode = (error instanceof AppError)
    ? error.code
    : ErrorCodes.INTERNAL_ERROR;
  const statusCode = (error instanceof AppError) ? error.statusCode : 500;

  const message = `${context.operation} failed: ${cause.message}`;

  return new AppError(
    message,
    code,
    statusCode,
    context,
    (error instanceof AppError) ? error.requestId : undefined,
    { cause }
  );
}
