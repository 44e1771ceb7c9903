import { getLogger } from '@kernel/logger';

import type { ClusterHealthStatus, SearchBackend } from './types';

/**
* Search backend health check.
*
* Healthy iff the cluster reports green or yellow. Errors and timeouts
* are logged and reported as unhealthy, never thrown.
*/

const logger = getLogger('health-check');

const DEFAULT_CHECK_TIMEOUT_MS = 5000;

/**
* Result of a health check
*/
export interface HealthCheckResult {
  name: string;
  healthy: boolean;
  /** Response latency in milliseconds */
  latency: number;
  status?: ClusterHealthStatus | undefined;
  error?: string | undefined;
}

export async function checkSearchBackendHealth(
  backend: SearchBackend,
  timeoutMs = DEFAULT_CHECK_TIMEOUT_MS
): Promise<HealthCheckResult> {
  const start = Date.now();
  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(
      () => reject(new Error(`Health check 'elasticsearch' timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    const status = await Promise.race([backend.clusterHealth(), timeoutPromise]);
    const healthy = status === 'green' || status === 'yellow';
    if (!healthy) {
      logger.warn('Search cluster reports unhealthy status', { status });
    }
    return { name: 'elasticsearch', healthy, latency: Date.now() - start, status };
  } catch (err: unknown) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error('Search backend health check failed', error);
    return { name: 'elasticsearch', healthy: false, latency: Date.now() - start, error: error.message };
  } finally {
    clearTimeout(timeoutHandle);
  }
}
