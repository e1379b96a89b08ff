/**
 * Structured logging utility for service-wide logging
 *
 * This module provides a centralized Logger class for consistent, structured logging
 * throughout the server. Supports multiple log levels (DEBUG, INFO, WARN, ERROR)
 * and categories for filtering and organizing logs.
 *
 * **Features**:
 * - **Environment-aware filtering**: DEBUG/INFO filtered in production (except performance logs)
 * - **Level override**: `LOG_LEVEL` (debug, info, warn, error) raises or lowers the floor
 * - **Timestamp prefixes**: All logs prefixed with HH:MM:SS [category] format
 * - **Context support**: Optional context objects logged inline as JSON
 * - **Job annotation**: While a conversion job runs, lines carry its short id
 *
 * **Usage pattern**:
 * ```
 * import { logger } from '@utils/logger';
 * logger.info('pipeline', 'Starting conversion', { sourceId, geometries });
 * logger.error('ffmpeg', 'Decoder exited', { code, stderr });
 * logger.performance('Geometry encoded', { durationMs: 25, frameCount: 42 });
 * ```
 */

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

/**
 * Maximum number of characters allowed for inline context in a single log line.
 */
const MAX_INLINE_CONTEXT_CHARS = 2000;

function trimStackForInlineLog(stack: string | undefined): string | undefined {
  if (!stack) {
    return undefined;
  }

  const lines = stack.split('\n').map((line) => line.trim());
  if (lines.length <= 3) {
    return lines.join(' | ');
  }
  return `${lines.slice(0, 3).join(' | ')} | …`;
}

function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, v: unknown): unknown => {
    if (typeof v === 'bigint') {
      return v.toString();
    }

    if (v instanceof Error) {
      return {
        name: v.name,
        message: v.message,
        stack: trimStackForInlineLog(v.stack),
      };
    }

    if (v instanceof Map) {
      return { type: 'Map', entries: Array.from(v.entries()) };
    }

    if (v instanceof Set) {
      return { type: 'Set', values: Array.from(v.values()) };
    }

    // Buffer.toJSON runs before the replacer sees the value
    if (
      typeof v === 'object' &&
      v !== null &&
      'type' in v &&
      v.type === 'Buffer' &&
      'data' in v &&
      Array.isArray(v.data)
    ) {
      return { type: 'Buffer', length: v.data.length };
    }

    if (v instanceof Uint8Array) {
      return { type: 'Uint8Array', length: v.length };
    }

    if (v instanceof Date) {
      return v.toISOString();
    }

    if (typeof v === 'object' && v !== null) {
      if (seen.has(v)) {
        return '[Circular]';
      }
      seen.add(v);
    }

    return v;
  };

  try {
    const json = JSON.stringify(value, replacer);
    return json ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Log category type union
 *
 * - **config**: Configuration loading and validation
 * - **codec**: Decoding and frame fitting
 * - **ffmpeg**: External ffmpeg/ffprobe processes
 * - **pipeline**: Per-source conversion across geometries
 * - **cache**: Artifact store writes, reads, eviction, reclamation
 * - **scheduler**: Discovery, job queue, retries
 * - **lock**: Cross-process scheduler lock
 * - **stream**: Client sessions and the TCP listener
 * - **task-pool**: Bounded concurrency pool
 * - **catalog**: Listing queries, delete and re-convert requests
 * - **app**: Startup and shutdown
 * - **general**: Everything else
 * - **performance**: Timing metrics (always logged in all environments)
 */
export type LogCategory =
  | 'config'
  | 'codec'
  | 'ffmpeg'
  | 'pipeline'
  | 'cache'
  | 'scheduler'
  | 'lock'
  | 'stream'
  | 'task-pool'
  | 'catalog'
  | 'app'
  | 'general'
  | 'performance';

function parseLevel(raw: string | undefined): LogLevel | null {
  switch (raw?.trim().toLowerCase()) {
    case 'debug':
      return 'DEBUG';
    case 'info':
      return 'INFO';
    case 'warn':
    case 'warning':
      return 'WARN';
    case 'error':
      return 'ERROR';
    default:
      return null;
  }
}

/**
 * Structured logger with filtering and categorization
 *
 * **Filtering rules**:
 * - Development: DEBUG and up unless `LOG_LEVEL` says otherwise
 * - Production (`NODE_ENV=production`): WARN and up, plus performance INFO
 * - Performance logs ignore the floor
 */
class Logger {
  private isDev = process.env.NODE_ENV !== 'production';
  private minLevel: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? (this.isDev ? 'DEBUG' : 'WARN');

  // Short id of the conversion job currently running in this process, if any.
  private activeJob: string | null = null;

  /**
   * Override the minimum level at runtime (config loading calls this).
   */
  setLevel(level: 'debug' | 'info' | 'warn' | 'error'): void {
    this.minLevel = parseLevel(level) ?? this.minLevel;
  }

  /**
   * Annotate subsequent log lines with a running job's id. Pass null to clear.
   */
  setActiveJob(jobId: string | null): void {
    this.activeJob = jobId ? jobId.slice(0, 8) : null;
  }

  private formatTimestamp(): string {
    const now = new Date();
    const hours = now.getHours().toString().padStart(2, '0');
    const minutes = now.getMinutes().toString().padStart(2, '0');
    const seconds = now.getSeconds().toString().padStart(2, '0');
    return `${hours}:${minutes}:${seconds}`;
  }

  /**
   * Internal log method for all logging operations
   *
   * **Formatting**: `[HH:MM:SS] [category] [job] message {context}`; the job
   * segment only appears while a conversion job is active.
   */
  private log(level: LogLevel, category: LogCategory, message: string, context?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel] && category !== 'performance') {
      return;
    }

    const timestamp = this.formatTimestamp();
    const prefix =
      this.activeJob === null
        ? `[${timestamp}] [${category}]`
        : `[${timestamp}] [${category}] [job ${this.activeJob}]`;

    const consoleMethod =
      level === 'ERROR' ? 'error' : level === 'WARN' ? 'warn' : level === 'INFO' ? 'info' : 'log';

    if (context !== undefined) {
      const rawContext = safeJsonStringify(context);
      const inlineContext =
        rawContext.length > MAX_INLINE_CONTEXT_CHARS
          ? `${rawContext.slice(0, MAX_INLINE_CONTEXT_CHARS)}…(truncated)`
          : rawContext;

      console[consoleMethod](`${prefix} ${message} ${inlineContext}`);
      return;
    }

    console[consoleMethod](`${prefix} ${message}`);
  }

  /**
   * Log a debug message (filtered in production)
   *
   * @example
   * logger.debug('stream', 'Frame queued', { sessionId, index: 42 });
   */
  debug(category: LogCategory, message: string, context?: unknown): void {
    this.log('DEBUG', category, message, context);
  }

  /**
   * Log an info message (filtered in production except for performance logs)
   *
   * @example
   * logger.info('scheduler', 'Scan complete', { discovered: 3, queued: 1 });
   */
  info(category: LogCategory, message: string, context?: unknown): void {
    this.log('INFO', category, message, context);
  }

  /**
   * Log a warning message. Warnings cover fallback paths and isolated
   * failures (a single geometry, a single client).
   *
   * @example
   * logger.warn('cache', 'Artifact file missing, dropping row', { sourceId, geometry });
   */
  warn(category: LogCategory, message: string, context?: unknown): void {
    this.log('WARN', category, message, context);
  }

  /**
   * Log an error message
   *
   * @example
   * logger.error('pipeline', 'Decode failed', { sourceId, error });
   */
  error(category: LogCategory, message: string, context?: unknown): void {
    this.log('ERROR', category, message, context);
  }

  /**
   * Log a performance metric (always shown)
   *
   * @example
   * logger.performance('Conversion completed', { durationMs: 3500, geometries: 3 });
   */
  performance(message: string, context?: unknown): void {
    this.log('INFO', 'performance', message, context);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
