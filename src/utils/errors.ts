/**
 * Error taxonomy
 *
 * Every failure the server reasons about has a class here with a `type`
 * discriminator. Per-geometry and per-client failures are isolated by their
 * callers; only `ConfigurationError` and `StorageError` are fatal to the process.
 *
 * A cache miss is not an error: see `CacheLookup` in `@t/cache-types`.
 */

export type PixelcastErrorType =
  | 'decode'
  | 'configuration'
  | 'capacity'
  | 'lock-contention'
  | 'stream-io'
  | 'storage'
  | 'aborted'
  | 'general';

abstract class PixelcastError extends Error {
  abstract readonly type: PixelcastErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unreadable or corrupt source data. */
export class DecodeError extends PixelcastError {
  readonly type = 'decode';
}

/** Invalid geometry, path or option. Never raised mid-run from validated config. */
export class ConfigurationError extends PixelcastError {
  readonly type = 'configuration';
}

/** An artifact that cannot fit in the configured cache bound even when empty. */
export class CapacityError extends PixelcastError {
  readonly type = 'capacity';

  constructor(
    message: string,
    readonly byteSize: number,
    readonly maxBytes: number | null
  ) {
    super(message);
  }
}

/** Another live scheduler instance holds the conversion lock. */
export class LockContentionError extends PixelcastError {
  readonly type = 'lock-contention';

  constructor(
    message: string,
    readonly holderPid: number | null
  ) {
    super(message);
  }
}

/** Client socket failure. Closes that session only. */
export class StreamIOError extends PixelcastError {
  readonly type = 'stream-io';
}

/** The metadata store could not be opened or is inconsistent beyond repair. */
export class StorageError extends PixelcastError {
  readonly type = 'storage';
}

/** Work abandoned because its AbortSignal fired. */
export class AbortedError extends PixelcastError {
  readonly type = 'aborted';

  constructor(message = 'Operation aborted') {
    super(message);
  }
}

export function isPixelcastError(error: unknown): error is PixelcastError {
  return error instanceof PixelcastError;
}

export function isErrorWithMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Extract a message from any thrown value.
 *
 * @example
 * getErrorMessage(new Error('boom')); // 'boom'
 * getErrorMessage('plain'); // 'plain'
 * getErrorMessage(null); // 'null'
 */
export function getErrorMessage(error: unknown): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Prefix an error message with context.
 *
 * @example
 * formatError(new Error('no such file'), 'Decode failed'); // 'Decode failed: no such file'
 */
export function formatError(error: unknown, context?: string): string {
  const message = getErrorMessage(error);
  return context ? `${context}: ${message}` : message;
}

/**
 * Classified failure, as recorded on a conversion outcome and shown by the
 * catalog's listing.
 */
export interface ClassifiedError {
  type: PixelcastErrorType;
  /** `<ErrorName>: <message>` */
  reason: string;
}

/**
 * Map any thrown value onto the taxonomy.
 *
 * Errors that are not ours are classified by message: filesystem "not
 * found"/"permission" errors and abort errors get their own buckets,
 * everything else is `general`.
 *
 * @example
 * classifyError(new DecodeError('bad header'));
 * // { type: 'decode', reason: 'DecodeError: bad header' }
 */
export function classifyError(error: unknown): ClassifiedError {
  if (isPixelcastError(error)) {
    return { type: error.type, reason: `${error.name}: ${error.message}` };
  }

  const message = getErrorMessage(error);
  const lower = message.toLowerCase();

  if (error instanceof Error && error.name === 'AbortError') {
    return { type: 'aborted', reason: `AbortedError: ${message}` };
  }

  if (lower.includes('sqlite') || lower.includes('database')) {
    return { type: 'storage', reason: `StorageError: ${message}` };
  }

  if (lower.includes('epipe') || lower.includes('econnreset') || lower.includes('socket')) {
    return { type: 'stream-io', reason: `StreamIOError: ${message}` };
  }

  const name = error instanceof Error ? error.name : 'Error';
  return { type: 'general', reason: `${name}: ${message}` };
}

/**
 * True for errors the process cannot continue after.
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof ConfigurationError || error instanceof StorageError;
}
