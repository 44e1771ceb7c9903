import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import crypto from 'crypto';

import { getLogger } from '@kernel/logger';
import { createRequestContext, requestContextStorage, type RequestContext } from '@kernel/request-context';

/**
* Request ID propagation and structured request logging
*/

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Only UUIDs or bounded alphanumeric-dash strings are accepted from clients;
 * anything else would end up verbatim in log lines.
 */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

export function sanitizeRequestId(raw: string | string[] | undefined): string | undefined {
  if (typeof raw !== 'string') return undefined;
  return SAFE_REQUEST_ID_RE.test(raw) ? raw : undefined;
}

/**
* Fastify `genReqId`: the client's X-Request-ID when safe, otherwise a fresh UUID
*/
export function generateRequestId(req: { headers: Record<string, string | string[] | undefined> }): string {
  return sanitizeRequestId(req.headers[REQUEST_ID_HEADER]) ?? crypto.randomUUID();
}

export interface RequestLog {
  method: string;
  url: string;
  route: string;
  statusCode: number;
  duration: number;
}

function buildRequestLog(req: FastifyRequest, res: FastifyReply): RequestLog {
  return {
    method: req.method,
    url: req.url,
    route: req.routeOptions.url ?? req.url,
    statusCode: res.statusCode,
    duration: Math.round(res.elapsedTime),
  };
}

/**
* Opens a request context per request, echoes the request ID and logs
* one line per completed request.
*
* Body parsing runs on stream callbacks outside the context, so it is
* entered again right before the handler.
*/
export function registerRequestLogging(app: FastifyInstance): void {
  const contexts = new WeakMap<FastifyRequest, RequestContext>();

  app.addHook('onRequest', (req, res, done) => {
    void res.header(REQUEST_ID_HEADER, req.id);
    const context = createRequestContext({
      requestId: req.id,
      path: req.url,
      method: req.method,
    });
    contexts.set(req, context);
    requestContextStorage.run(context, done);
  });

  app.addHook('preHandler', (req, _res, done) => {
    const context = contexts.get(req);
    if (!context) {
      done();
      return;
    }
    requestContextStorage.run(context, done);
  });

  app.addHook('onResponse', (req, res, done) => {
    const requestLogger = getLogger({ service: 'api', correlationId: req.id });
    const entry = buildRequestLog(req, res);
    if (res.statusCode >= 500) {
      requestLogger.error('Request failed', undefined, { ...entry });
    } else if (res.statusCode >= 400) {
      requestLogger.warn('Request rejected', { ...entry });
    } else {
      requestLogger.info('Request completed', { ...entry });
    }
    done();
  });
}
