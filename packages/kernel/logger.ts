import { getRequestContext } from './request-context';
import { sanitizeForLogging } from './redaction';

/**
* Structured Logger
*
* Provides structured logging with request context support,
* multiple log levels, and pluggable handlers.
*/

// Re-export getRequestContext for convenience
export { getRequestContext };

// ============================================================================
// Type Definitions
// ============================================================================

/** Available log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
* Log entry structure
*/
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  service?: string | undefined;
  /** Request ID / Correlation ID */
  requestId?: string | undefined;
  /** Duration since the request started, in milliseconds */
  duration?: number | undefined;
  error?: Error | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  metadata?: Record<string, unknown> | undefined;
}

/** Log handler function type */
export type LogHandler = (entry: LogEntry) => void;

/** Logger options for getLogger */
export interface LoggerOptions {
  service: string;
  /** Correlation ID (overrides request context) */
  correlationId?: string | undefined;
  /** Additional context to include in every log */
  context?: Record<string, unknown> | undefined;
}

// ============================================================================
// Handler Registry
// ============================================================================

let handlers: readonly LogHandler[] = [];

const emit = (entry: LogEntry): void => {
  for (const handler of handlers) {
    handler(entry);
  }
};

// ============================================================================
// Log Level Configuration
// ============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some(level => level === value);
}

/**
* Get configured log level from environment
* Defaults to 'info' in production, 'debug' elsewhere
*/
export function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(getConfiguredLogLevel());
}

function redactMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const result = sanitizeForLogging(metadata);
  return (typeof result === 'object' && result !== null && !Array.isArray(result))
    ? result
    : { _redacted: result };
}

// ============================================================================
// Default Handler
// ============================================================================

/**
* Default console log handler
* All logs go to stderr as one JSON object per line
*/
export function consoleHandler(entry: LogEntry): void {
  const { level, message, service, requestId, duration, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    level: level.toUpperCase(),
    message,
  };

  if (service) logOutput['service'] = service;
  if (requestId) logOutput['correlationId'] = requestId;
  if (duration !== undefined) logOutput['duration'] = duration;
  if (errorMessage) logOutput['error'] = errorMessage;
  if (errorStack && process.env['LOG_LEVEL'] === 'debug') logOutput['stack'] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) {
    logOutput['metadata'] = redactMetadata(metadata);
  }

  process.stderr.write(`${JSON.stringify(logOutput)}\n`);
}

// ============================================================================
// Handler Management
// ============================================================================

/**
* Add a log handler
* @returns Function to remove the handler
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the console handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

/**
* Restore the default console handler as the only handler
*/
export function resetLogHandlers(): void {
  handlers = [consoleHandler];
}

resetLogHandlers();

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance with bound service name and context
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    private readonly correlationId?: string,
    context?: Record<string, unknown>
  ) {
    this.context = context || {};
  }

  private createEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): LogEntry {
    const requestContext = getRequestContext();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: { ...this.context, ...metadata },
    };

    const correlationId = this.correlationId ?? requestContext?.requestId;
    if (correlationId) entry.requestId = correlationId;
    if (requestContext) entry.duration = Date.now() - requestContext.startTime;

    if (err) {
      entry.error = err;
      entry.errorMessage = err.message;
      entry.errorStack = err.stack;
    }

    return entry;
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>, err?: Error): void {
    if (shouldLog(level)) {
      emit(this.createEntry(level, message, metadata, err));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.log('error', message, metadata, err);
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, metadata, err);
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(
      this.service,
      this.correlationId,
      { ...this.context, ...additionalContext }
    );
  }
}

/**
* Get logger for service
* @param serviceOrOptions - Service name or LoggerOptions object
*/
export function getLogger(serviceOrOptions: string | LoggerOptions): Logger {
  if (typeof serviceOrOptions === 'string') {
    return new Logger(serviceOrOptions);
  }
  return new Logger(
    serviceOrOptions.service,
    serviceOrOptions.correlationId,
    serviceOrOptions.context
  );
}
