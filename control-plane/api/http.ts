import { ConfigValidationError, loadConfig, type AppConfig } from '@config';
import { BackendUnavailableError, getErrorMessage, toError } from '@errors';
import { getLogger } from '@kernel/logger';
import { withRetry } from '@kernel/retry';
import { registerShutdownHandler, setupShutdownHandlers } from '@shutdown';

import { createContainer } from '../services/container';
import { buildApp } from './app';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    // Logger not configured yet: stderr is acceptable for startup failure
    const message = error instanceof ConfigValidationError
      ? error.issues.join('\n  ')
      : getErrorMessage(error);
    process.stderr.write(`[startup] Environment validation failed:\n  ${message}\n`);
    process.exit(1);
  }
}

const config = readConfig();
const logger = getLogger(config.serviceName);

async function start(): Promise<void> {
  const container = createContainer({
    indexes: config.indexes,
    elasticsearch: config.elasticsearch,
  });
  const backend = container.searchBackend;

  // Refuse to serve until the cluster answers
  try {
    await withRetry(() => backend.ping(), {
      maxRetries: config.elasticsearch.connectAttempts - 1,
      shouldRetry: error => error instanceof BackendUnavailableError,
      onRetry: (error, attempt) => {
        logger.warn('Search backend not reachable yet', { attempt, error: error.message });
      },
    });
  } catch (error) {
    logger.fatal('Could not connect to the search backend', toError(error), {
      attempts: config.elasticsearch.connectAttempts,
    });
    await container.dispose();
    process.exit(1);
  }

  await container.ensureIndexes();

  const app = await buildApp({
    service: container.documentService,
    backend,
    docs: config.apiDocsEnabled,
  });

  registerShutdownHandler(async () => {
    logger.info('Closing HTTP server');
    await app.close();
  });
  registerShutdownHandler(async () => {
    await container.dispose();
  });
  setupShutdownHandlers();

  await app.listen({ host: config.server.host, port: config.server.port });
  logger.info('HTTP server listening', {
    host: config.server.host,
    port: config.server.port,
    environment: config.nodeEnv,
  });
}

start().catch((error: unknown) => {
  logger.fatal('Startup failed', toError(error));
  process.exit(1);
});
