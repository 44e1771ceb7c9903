import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';

import { envConfig } from '@config';
import type { DocumentService } from '@domain/documents/application/DocumentService';
import { AppError, ErrorCodes, type ErrorCode } from '@errors';
import { errors, sendError } from '@errors/responses';
import { getLogger } from '@kernel/logger';
import type { SearchBackend } from '@search';

import { generateRequestId, registerRequestLogging } from './middleware/request-logger';
import { documentRoutes } from './routes/documents';
import { healthRoutes } from './routes/health';

const logger = getLogger('http');

const GENERIC_MESSAGE = 'An error occurred processing your request';

export interface AppOptions {
  service: DocumentService;
  backend: SearchBackend;
  /** Serve the OpenAPI document and UI at /docs */
  docs?: boolean | undefined;
  bodyLimit?: number | undefined;
}

/** Status codes Fastify raises itself, mapped onto the error catalogue */
function codeForStatus(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 404: return ErrorCodes.NOT_FOUND;
    case 413: return ErrorCodes.PAYLOAD_TOO_LARGE;
    case 415: return ErrorCodes.UNSUPPORTED_MEDIA_TYPE;
    default: return ErrorCodes.VALIDATION_ERROR;
  }
}

function isMalformedJson(error: FastifyError): boolean {
  return error instanceof SyntaxError || error.code === 'FST_ERR_CTP_INVALID_JSON_BODY';
}

const MUTATING_METHODS = new Set(['POST', 'PUT', 'PATCH']);

/**
* Build the HTTP application around an already wired service and backend.
* Listening is left to the caller so tests can use `inject`.
*/
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    bodyLimit: options.bodyLimit ?? 1024 * 1024,
    requestTimeout: 30000,
    connectionTimeout: 5000,
    ignoreTrailingSlash: true,
    requestIdHeader: false,
    genReqId: generateRequestId,
  });

  registerRequestLogging(app);

  if (options.docs) {
    await app.register(swagger, {
      openapi: {
        openapi: '3.1.0',
        info: {
          title: 'Document Search API',
          version: envConfig.version,
          description: 'CRUD and search over articles and users.',
        },
        tags: [
          { name: 'Articles', description: 'Article documents' },
          { name: 'Users', description: 'User documents' },
          { name: 'Health', description: 'Service health endpoints' },
        ],
      },
    });
    await app.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: { docExpansion: 'list' },
    });
  }

  // Mutating requests with a body must declare application/json
  app.addHook('preValidation', async (request, reply) => {
    if (!MUTATING_METHODS.has(request.method)) return;

    const contentLength = request.headers['content-length'];
    const transferEncoding = request.headers['transfer-encoding'];
    if (!contentLength && !transferEncoding) return;
    if (contentLength === '0') return;

    const contentType = request.headers['content-type'] ?? '';
    if (!contentType.startsWith('application/json')) {
      return errors.unsupportedMediaType(reply);
    }
  });

  // Canonical ErrorResponse shape for everything the routes did not handle
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.error('Unhandled application error', error, { url: request.url });
      }
      const message = error.statusCode < 500 ? error.message : GENERIC_MESSAGE;
      return sendError(reply, error.statusCode, error.code, message, { details: error.details });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error('Unhandled error', error, { url: request.url });
      return sendError(reply, 500, ErrorCodes.INTERNAL_ERROR, GENERIC_MESSAGE, {
        details: { message: error.message },
      });
    }

    if (isMalformedJson(error)) {
      return sendError(reply, 400, ErrorCodes.VALIDATION_ERROR, 'Request body is not valid JSON', {
        details: { message: error.message },
      });
    }

    return sendError(reply, statusCode, codeForStatus(statusCode), error.message);
  });

  app.setNotFoundHandler((_request, reply) => errors.notFound(reply, 'Route'));

  app.get('/', {
    schema: { operationId: 'getRoot', summary: 'Service banner', tags: ['Health'] },
  }, async () => ({ message: 'Document search service is running' }));

  await app.register(documentRoutes, { prefix: '/documents', service: options.service });
  await app.register(healthRoutes, { prefix: '/health', backend: options.backend });

  return app;
}
