/**
 * Standardized API response helpers.
 *
 * Every error response from every route MUST conform to the canonical shape:
 * { error: string, code: string, requestId: string, details?: unknown }
 *
 * Use these helpers instead of ad-hoc res.status(...).send({ error: ... }) calls.
 */

import type { FastifyReply } from 'fastify';
import { ErrorCodes, shouldExposeErrorDetails, type ErrorCode, type ErrorResponse } from './index';

/**
 * Send a standardized error response.
 * The request ID is the one Fastify assigned (taken from X-Request-ID when present).
 * Only includes `details` in development.
 */
export function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: ErrorCode,
  message: string,
  opts?: { details?: unknown }
): FastifyReply {
  const body: ErrorResponse = {
    error: message,
    code,
    requestId: reply.request.id,
  };
  if (opts?.details !== undefined && shouldExposeErrorDetails()) {
    body.details = opts.details;
  }
  return reply.status(statusCode).send(body);
}

/** Convenience helpers for common error responses. */
export const errors = {
  badRequest: (reply: FastifyReply, msg = 'Bad request', code: ErrorCode = ErrorCodes.VALIDATION_ERROR, details?: unknown) =>
    sendError(reply, 400, code, msg, { details }),

  notFound: (reply: FastifyReply, resource = 'Resource', code: ErrorCode = ErrorCodes.NOT_FOUND) =>
    sendError(reply, 404, code, `${resource} not found`),

  validationFailed: (reply: FastifyReply, details?: unknown) =>
    sendError(reply, 400, ErrorCodes.VALIDATION_ERROR, 'Validation failed', { details }),

  unsupportedMediaType: (reply: FastifyReply, msg = 'Unsupported Media Type: Content-Type must be application/json') =>
    sendError(reply, 415, ErrorCodes.UNSUPPORTED_MEDIA_TYPE, msg),

  serviceUnavailable: (reply: FastifyReply, msg = 'Service temporarily unavailable') =>
    sendError(reply, 503, ErrorCodes.SERVICE_UNAVAILABLE, msg),
} as const;
