/**
 * Structured logging for design-refiner.
 *
 * Every line is written to stderr so the MCP stdio transport on stdout stays
 * clean. Request-scoped context (request ID, tool, run and slice) travels
 * through AsyncLocalStorage and is merged into each line.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Structured log context that can be passed to any log method
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Context carried across the async call chain of one request or run
 */
interface RequestContext {
  requestId: string;
  toolName?: string | undefined;
  runId?: string | undefined;
  sliceName?: string | undefined;
  iteration?: number | undefined;
  startTime: number;
}

export type RequestContextOptions = Partial<Omit<RequestContext, 'startTime'>>;

const requestStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Format: req-{8 chars of base64url}
 */
function generateRequestId(): string {
  return `req-${randomBytes(6).toString('base64url')}`;
}

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  return { errorValue: String(error) };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Minimum level, read on every call so tests and the CLI can flip LOG_LEVEL
 */
function currentLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const reqContext = requestStorage.getStore();
  const fullContext: LogContext = {};

  if (reqContext) {
    fullContext.requestId = reqContext.requestId;
    if (reqContext.toolName) fullContext.tool = reqContext.toolName;
    if (reqContext.runId) fullContext.runId = reqContext.runId;
    if (reqContext.sliceName) fullContext.slice = reqContext.sliceName;
    if (reqContext.iteration !== undefined) fullContext.iteration = reqContext.iteration;
  }

  if (context) {
    Object.assign(fullContext, context);
  }

  const contextStr = Object.keys(fullContext).length > 0
    ? ` ${JSON.stringify(fullContext)}`
    : '';

  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

function write(level: LogLevel, message: string, context?: LogContext): void {
  if (!enabled(level)) return;
  console.error(formatMessage(level, message, context));
}

function withError(error: unknown, context?: LogContext): LogContext | undefined {
  return error === undefined ? context : { ...context, ...formatError(error) };
}

export const logger = {
  debug(message: string, error?: unknown, context?: LogContext): void {
    write('debug', message, withError(error, context));
  },

  info(message: string, context?: LogContext): void {
    write('info', message, context);
  },

  warn(message: string, error?: unknown, context?: LogContext): void {
    write('warn', message, withError(error, context));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    write('error', message, withError(error, context));
  },

  /**
   * Run a function within a request context. All logs emitted inside the
   * callback carry the request ID plus whichever of tool/run/slice is known.
   *
   * @example
   * ```typescript
   * await logger.withRequestContext({ toolName: 'refiner_refine', sliceName: 'Login' }, async () => {
   *   logger.info('Refining slice'); // includes requestId, tool, slice
   * });
   * ```
   */
  async withRequestContext<T>(options: RequestContextOptions, fn: () => Promise<T>): Promise<T> {
    const parent = requestStorage.getStore();
    const context: RequestContext = {
      requestId: options.requestId ?? parent?.requestId ?? generateRequestId(),
      toolName: options.toolName ?? parent?.toolName,
      runId: options.runId ?? parent?.runId,
      sliceName: options.sliceName ?? parent?.sliceName,
      iteration: options.iteration ?? parent?.iteration,
      startTime: Date.now(),
    };

    return requestStorage.run(context, fn);
  },

  getRequestId(): string | undefined {
    return requestStorage.getStore()?.requestId;
  },

  getElapsedMs(): number | undefined {
    const reqContext = requestStorage.getStore();
    return reqContext ? Date.now() - reqContext.startTime : undefined;
  },

  /**
   * Update the current request context (e.g. the iteration number as a run advances)
   */
  updateContext(updates: Omit<RequestContextOptions, 'requestId'>): void {
    const current = requestStorage.getStore();
    if (!current) return;
    if (updates.toolName !== undefined) current.toolName = updates.toolName;
    if (updates.runId !== undefined) current.runId = updates.runId;
    if (updates.sliceName !== undefined) current.sliceName = updates.sliceName;
    if (updates.iteration !== undefined) current.iteration = updates.iteration;
  },
};

export type Logger = typeof logger;
