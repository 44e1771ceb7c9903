import { getLogger } from '@kernel/logger';

/**
* Centralized Shutdown Manager Package
* Prevents multiple competing SIGTERM/SIGINT handlers
*
* All shutdown handlers (HTTP listener, search client) are registered
* through this module so they close in one coordinated pass.
*/

const logger = getLogger({ service: 'shutdown' });

/** Shutdown handler function type */
export type ShutdownHandler = () => Promise<void> | void;

export interface ShutdownOptions {
  /** Overall deadline before the process is forced down */
  timeoutMs?: number;
  /** Deadline for a single handler */
  handlerTimeoutMs?: number;
  /** Process exit, replaceable in tests */
  exit?: (code: number) => void;
}

const handlers: Set<ShutdownHandler> = new Set();

let isShuttingDown = false;

// ============================================================================
// Handler Management
// ============================================================================

/**
* Register a shutdown handler to be called during graceful shutdown
* @returns Function to unregister the handler
*/
export function registerShutdownHandler(handler: ShutdownHandler): () => void {
  handlers.add(handler);
  return () => {
    handlers.delete(handler);
  };
}

/**
* Unregister all shutdown handlers
*/
export function clearShutdownHandlers(): void {
  handlers.clear();
}

export function getHandlerCount(): number {
  return handlers.size;
}

// ============================================================================
// Shutdown Execution
// ============================================================================

function withTimeout(work: Promise<void>, ms: number, name: string): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Handler ${name} timed out`)), ms);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

/**
* Execute graceful shutdown with all registered handlers.
* A failing handler is logged and does not stop the others.
* @param signal - The signal that triggered the shutdown
* @param exitCode - Exit code to use (default: 0 for graceful, 1 for forced)
*/
export async function gracefulShutdown(
  signal: string,
  exitCode = 0,
  options: ShutdownOptions = {}
): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  const exit = options.exit ?? ((code: number) => process.exit(code));
  const handlerTimeoutMs = options.handlerTimeoutMs ?? 10_000;

  logger.info(`Received ${signal}, starting graceful shutdown...`);

  const timeout = setTimeout(() => {
    logger.error('Shutdown timeout exceeded, forcing exit');
    exit(1);
  }, options.timeoutMs ?? 30_000);

  try {
    const results = await Promise.allSettled(
      Array.from(handlers).map(async (handler, index) => {
        const handlerName = handler.name || `handler-${index}`;
        await withTimeout(Promise.resolve().then(handler), handlerTimeoutMs, handlerName);
        logger.info(`Shutdown handler ${handlerName} completed successfully`);
      })
    );

    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    for (const failure of failures) {
      const err = failure.reason instanceof Error ? failure.reason : new Error(String(failure.reason));
      logger.error('Shutdown handler failed', err);
    }
    if (failures.length > 0) {
      logger.error(`${failures.length} shutdown handlers failed`);
    }
  } finally {
    clearTimeout(timeout);
    exit(exitCode);
  }
}

/**
* Reset the shutdown state
*/
export function resetShutdownState(): void {
  isShuttingDown = false;
}

export function getIsShuttingDown(): boolean {
  return isShuttingDown;
}

// ============================================================================
// Global Handler Setup
// ============================================================================

let isRegistered = false;

function onSignal(signal: NodeJS.Signals): void {
  gracefulShutdown(signal).catch((error: unknown) => {
    logger.fatal(`${signal} shutdown error`, error instanceof Error ? error : new Error(String(error)));
    process.exit(1);
  });
}

/**
* Setup global shutdown handlers (SIGTERM/SIGINT)
* Safe to call multiple times - handlers are registered only once
*/
export function setupShutdownHandlers(): void {
  if (isRegistered) return;
  isRegistered = true;

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

/**
* Remove global shutdown handlers
*/
export function removeShutdownHandlers(): void {
  if (!isRegistered) return;
  isRegistered = false;

  process.off('SIGTERM', onSignal);
  process.off('SIGINT', onSignal);
}

export function areShutdownHandlersRegistered(): boolean {
  return isRegistered;
}
