import type { FastifyReply } from 'fastify';
import { getLogger, type Logger } from '@kernel/logger';
import {
  AppError,
  ErrorCodes,
  isErrorCode,
  type ErrorCode,
  type ErrorResponse,
  shouldExposeErrorDetails,
} from './index';

interface RouteErrorHandlerOptions {
  /** Logger instance or service name string (will create a logger) */
  logger: Logger | string;
}

const GENERIC_MESSAGE = 'An error occurred processing your request';
const UNAVAILABLE_MESSAGE = 'Search backend unavailable';

/**
 * Creates a reusable error handler for Fastify route catch blocks.
 *
 * Status and code come from AppError subclasses; anything else is a 500.
 * Client messages for 5xx responses are always generic: the raw backend
 * error text is logged, never sent.
 *
 * Usage:
 *   const handleError = createRouteErrorHandler({ logger: 'documents' });
 *   app.post('/articles', async (req, res) => {
 *     try { ... } catch (error) {
 *       return handleError(res, error, 'create article');
 *     }
 *   });
 */
export function createRouteErrorHandler(options: RouteErrorHandlerOptions) {
  const log = typeof options.logger === 'string'
    ? getLogger(options.logger)
    : options.logger;

  return function handleRouteError(
    res: FastifyReply,
    error: unknown,
    operationDescription: string,
  ): FastifyReply {
    const requestId = res.request.id;
    const err = error instanceof Error ? error : new Error(String(error));

    log.error(`${operationDescription} failed`, err, {
      requestId,
      operation: operationDescription,
    });

    let statusCode = 500;
    let errorCode: ErrorCode = ErrorCodes.INTERNAL_ERROR;
    let clientMessage = GENERIC_MESSAGE;

    if (error instanceof AppError) {
      statusCode = error.statusCode;
      errorCode = isErrorCode(error.code) ? error.code : ErrorCodes.INTERNAL_ERROR;
      if (statusCode < 500) {
        clientMessage = error.message;
      } else if (statusCode === 503) {
        clientMessage = UNAVAILABLE_MESSAGE;
      }
    }

    const response: ErrorResponse = {
      error: clientMessage,
      code: errorCode,
      requestId,
    };

    // Dev mode: attach debugging context
    if (shouldExposeErrorDetails()) {
      response.details = {
        operation: operationDescription,
        originalMessage: err.message,
        ...(err.cause instanceof Error ? { cause: err.cause.message } : {}),
        ...(error instanceof AppError && error.details ? { errorDetails: error.details } : {}),
      };
    }

    return res.status(statusCode).send(response);
  };
}
