import { spawn } from 'node:child_process';
import { MAX_STDERR_CHARS } from '@utils/constants';
import { AbortedError } from '@utils/errors';
import { logger } from '@utils/logger';
import { withTimeout } from '@utils/with-timeout';

export interface ProcessResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Concatenated stdout */
  stdout: Buffer;
  /** Tail of stderr, at most MAX_STDERR_CHARS characters */
  stderr: string;
}

export interface RunProcessOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Called with each stdout chunk; when set, stdout is not accumulated */
  onStdout?: (chunk: Buffer) => void;
}

/**
 * Run an external executable (ffmpeg, ffprobe) to completion.
 *
 * Resolves with the exit status whatever it is; callers decide what a
 * non-zero code means. Rejects when the executable cannot be spawned, when
 * the timeout elapses (the child is killed) or with `AbortedError` when the
 * signal fires.
 */
export async function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions
): Promise<ProcessResult> {
  if (options.signal?.aborted) {
    throw new AbortedError(`${command} aborted before start`);
  }

  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
  const chunks: Buffer[] = [];
  let stderr = '';

  const onAbort = () => {
    child.kill('SIGKILL');
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  const completion = new Promise<ProcessResult>((resolve, reject) => {
    child.stdout.on('data', (chunk: Buffer) => {
      if (options.onStdout) {
        options.onStdout(chunk);
      } else {
        chunks.push(chunk);
      }
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8');
      if (stderr.length > MAX_STDERR_CHARS * 2) {
        stderr = stderr.slice(-MAX_STDERR_CHARS);
      }
    });
    child.on('error', (error) => {
      reject(error);
    });
    child.on('close', (code, signal) => {
      resolve({
        code,
        signal,
        stdout: Buffer.concat(chunks),
        stderr: stderr.slice(-MAX_STDERR_CHARS).trim(),
      });
    });
  });

  logger.debug('ffmpeg', `Spawned ${command}`, { pid: child.pid, args });

  try {
    const result = await withTimeout(
      completion,
      options.timeoutMs,
      `${command} timed out after ${options.timeoutMs}ms`,
      () => {
        child.kill('SIGKILL');
      }
    );

    if (options.signal?.aborted) {
      throw new AbortedError(`${command} aborted`);
    }
    return result;
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }
}
