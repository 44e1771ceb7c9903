import { randomUUID } from 'crypto';

import { AsyncLocalStorage } from 'async_hooks';

/**
* Request Context Module
* Provides request ID propagation for logs and error responses
*/

export interface RequestContext {
  requestId: string;
  startTime: number;
  path?: string | undefined;
  method?: string | undefined;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
* Storage instance for request context
* Exported for the HTTP layer, which opens one context per request
*/
export const requestContextStorage = asyncLocalStorage;

/**
* Get current request context
* @returns Current request context or undefined if not in a context
*/
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
* Run function within a request context
*/
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
* Generate new request context
* @param options - Optional context properties to override defaults
*/
export function createRequestContext(options?: Partial<RequestContext>): RequestContext {
  return {
    requestId: options?.requestId || randomUUID(),
    startTime: options?.startTime ?? Date.now(),
    path: options?.path,
    method: options?.method,
  };
}
