/**
 * Client Session
 *
 * One display client: handshake, then paced playback until the client
 * disconnects or the server drains.
 *
 * State machine:
 *   connected → negotiating → streaming → draining → closed
 * A rejected handshake or a failed lookup sends ERROR and goes straight to
 * draining.
 *
 * Pacing runs on an absolute schedule: each frame is due at the previous
 * frame's due time plus its duration, so slow iterations do not accumulate
 * drift. Frames go through the bounded `OutboundQueue`; a frame that does not
 * fit is dropped and counted, the schedule carries on.
 */

import type { Duplex } from 'node:stream';
import { geometryTag } from '@services/codec/geometry';
import type {
  ConversionRequest,
  ConversionRequestResult,
} from '@services/scheduler/conversion-scheduler';
import { totalDurationMs } from '@services/shared/frame-timing';
import type { TargetGeometry } from '@t/media-types';
import type {
  SessionSnapshot,
  SessionState,
  StreamEvent,
  StreamEventType,
  StreamRequest,
} from '@t/stream-types';
import { MAX_HANDSHAKE_BYTES, PACING_RESYNC_MS, SESSION_DRAIN_TIMEOUT_MS } from '@utils/constants';
import { getErrorMessage, StreamIOError } from '@utils/errors';
import { logger } from '@utils/logger';
import { sleep, withTimeout } from '@utils/with-timeout';
import type { ContentSelector, PlaybackItem } from './content-selector';
import { OutboundQueue } from './outbound-queue';
import {
  clampRange,
  displayName,
  encodeError,
  encodeFrame,
  encodeInfo,
  encodeNotReady,
  parseHandshake,
} from './stream-protocol';

/**
 * The part of the scheduler a session needs: asking for a missing artifact.
 */
export interface ConversionRequester {
  requestConversion(sourceId: string, request?: ConversionRequest): Promise<ConversionRequestResult>;
}

export interface SessionSettings {
  geometries: readonly TargetGeometry[];
  handshakeTimeoutMs: number;
  notReadyRetryMs: number;
  pendingWaitTimeoutMs: number;
  rotationDwellMs: number;
  outboundQueueFrames: number;
}

export interface ClientSessionOptions extends SessionSettings {
  id: string;
  socket: Duplex;
  remoteAddress: string;
  content: ContentSelector;
  conversions: ConversionRequester;
  onEvent: (event: StreamEvent) => void;
  onClosed?: (session: ClientSession) => void;
}

type HandshakeLine =
  | { status: 'line'; line: string }
  | { status: 'timeout' }
  | { status: 'too-long' }
  | { status: 'closed' };

type EventDetails = Pick<StreamEvent, 'sourceId' | 'framesSent' | 'droppedFrames' | 'message'>;

/**
 * Read the first line from the socket.
 */
function readHandshakeLine(
  socket: Duplex,
  timeoutMs: number,
  signal: AbortSignal
): Promise<HandshakeLine> {
  if (signal.aborted) {
    return Promise.resolve({ status: 'closed' });
  }

  return new Promise((resolve) => {
    let buffered = Buffer.alloc(0);

    const finish = (result: HandshakeLine) => {
      clearTimeout(timer);
      socket.off('data', onData);
      socket.off('end', onClosed);
      socket.off('close', onClosed);
      signal.removeEventListener('abort', onClosed);
      resolve(result);
    };
    const onData = (chunk: Buffer | string) => {
      buffered = Buffer.concat([buffered, typeof chunk === 'string' ? Buffer.from(chunk) : chunk]);
      const newline = buffered.indexOf(0x0a);
      if (newline >= 0) {
        finish({ status: 'line', line: buffered.subarray(0, newline).toString('utf8') });
      } else if (buffered.length > MAX_HANDSHAKE_BYTES) {
        finish({ status: 'too-long' });
      }
    };
    const onClosed = () => finish({ status: 'closed' });
    const timer = setTimeout(() => finish({ status: 'timeout' }), timeoutMs);

    socket.on('data', onData);
    socket.on('end', onClosed);
    socket.on('close', onClosed);
    signal.addEventListener('abort', onClosed, { once: true });
  });
}

/**
 * Whole passes needed to play for at least `dwellMs`.
 *
 * @example
 * passesForDwell(400, 1000); // 3
 * passesForDwell(5000, 1000); // 1
 */
export function passesForDwell(passDurationMs: number, dwellMs: number): number {
  if (passDurationMs <= 0) {
    return 1;
  }
  return Math.max(1, Math.ceil(dwellMs / passDurationMs));
}

export class ClientSession {
  readonly id: string;
  readonly remoteAddress: string;
  private state: SessionState = 'connected';
  private readonly abort = new AbortController();
  private readonly outbound: OutboundQueue;
  private running: Promise<void> | null = null;
  private geometry: TargetGeometry | null = null;
  private selector: string | null = null;
  private currentSourceId: string | null = null;
  private readonly startedAt = Date.now();
  private lastActivityAt = this.startedAt;
  private framesSent = 0;
  private droppedFrames = 0;
  /** Due time of the next frame; null restarts the schedule */
  private nextDueAt: number | null = null;

  constructor(private readonly options: ClientSessionOptions) {
    this.id = options.id;
    this.remoteAddress = options.remoteAddress;
    this.outbound = new OutboundQueue(options.socket, options.outboundQueueFrames);

    options.socket.on('close', () => {
      this.abort.abort();
    });
    options.socket.on('error', (error: Error) => {
      logger.warn('stream', 'Client socket error', {
        sessionId: this.id,
        remoteAddress: this.remoteAddress,
        error: error.message,
      });
      this.emit('error', { message: error.message });
      this.outbound.close();
      this.abort.abort();
    });
  }

  /**
   * Begin the session. Completion is observable through `finished`.
   */
  start(): void {
    if (!this.running) {
      this.running = this.run();
    }
  }

  get finished(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  /**
   * Stop playback, flush what is queued and end the connection.
   */
  async stop(): Promise<void> {
    if (this.state !== 'closed') {
      this.state = 'draining';
    }
    this.abort.abort();
    await this.finished;
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      remoteAddress: this.remoteAddress,
      state: this.state,
      geometry: this.geometry?.tag ?? null,
      selector: this.selector,
      currentSourceId: this.currentSourceId,
      startedAt: this.startedAt,
      lastActivityAt: this.lastActivityAt,
      framesSent: this.framesSent,
      droppedFrames: this.droppedFrames,
    };
  }

  // ==========================================================================
  // Flow
  // ==========================================================================

  private async run(): Promise<void> {
    this.emit('connect');
    try {
      this.state = 'negotiating';
      const handshake = await readHandshakeLine(
        this.options.socket,
        this.options.handshakeTimeoutMs,
        this.abort.signal
      );
      this.touch();

      if (handshake.status === 'closed') return;
      if (handshake.status === 'timeout') {
        throw new StreamIOError('Handshake timeout');
      }
      if (handshake.status === 'too-long') {
        throw new StreamIOError('Invalid command');
      }

      const parsed = parseHandshake(handshake.line);
      if (!parsed.ok) {
        throw new StreamIOError(parsed.reason);
      }
      const request = parsed.request;

      const tag = geometryTag(request.width, request.height);
      const geometry = this.options.geometries.find((candidate) => candidate.tag === tag);
      if (!geometry) {
        throw new StreamIOError(`Unsupported geometry ${tag}`);
      }

      this.geometry = geometry;
      this.selector = request.selector;
      this.state = 'streaming';
      logger.info('stream', 'Session negotiated', {
        sessionId: this.id,
        remoteAddress: this.remoteAddress,
        geometry: tag,
        selector: request.selector,
        range: `${request.frameFrom}-${request.frameTo ?? ''}`,
      });

      if (request.selector !== null) {
        await this.streamNamed(request, request.selector, geometry);
      } else {
        await this.streamRotation(request, geometry, null);
      }
    } catch (error) {
      this.reject(error);
    } finally {
      await this.finish();
    }
  }

  private async streamNamed(
    request: StreamRequest,
    selector: string,
    geometry: TargetGeometry
  ): Promise<void> {
    const item = await this.waitForNamed(selector, geometry);
    if (!item) return;

    if (item.artifact.sequence.loop) {
      await this.play(item, request, Number.POSITIVE_INFINITY);
      return;
    }
    if (await this.play(item, request, 1)) {
      await this.streamRotation(request, geometry, item.source.id);
    }
  }

  /**
   * Resolve a named item, asking for conversion and sending NOT_READY while
   * it is pending.
   *
   * @returns null when the session was aborted while waiting
   * @throws StreamIOError for an unknown name, a failed conversion or when the
   * wait times out
   */
  private async waitForNamed(selector: string, geometry: TargetGeometry): Promise<PlaybackItem | null> {
    const deadline = Date.now() + this.options.pendingWaitTimeoutMs;

    for (;;) {
      const lookup = await this.options.content.lookupNamed(selector, geometry.tag);
      if (lookup.status === 'unknown') {
        throw new StreamIOError(`Animation '${selector}' not found`);
      }
      if (lookup.status === 'ready') {
        return lookup.item;
      }

      const name = displayName(lookup.source.filename);
      const result = await this.options.conversions.requestConversion(lookup.source.id, {
        geometry: geometry.tag,
      });
      if (result === 'unknown-source') {
        throw new StreamIOError(`Animation '${selector}' not found`);
      }
      if (result === 'failed') {
        throw new StreamIOError(`Animation '${name}' could not be converted for ${geometry.tag}`);
      }
      if (Date.now() >= deadline) {
        throw new StreamIOError(`Timed out waiting for '${name}' at ${geometry.tag}`);
      }

      this.notReady(`Converting '${name}' for ${geometry.tag}`);
      if (!(await sleep(this.options.notReadyRetryMs, this.abort.signal))) {
        return null;
      }
    }
  }

  private async streamRotation(
    request: StreamRequest,
    geometry: TargetGeometry,
    previousSourceId: string | null
  ): Promise<void> {
    let previous = previousSourceId;
    let waitingSince: number | null = null;

    while (!this.abort.signal.aborted) {
      const item = await this.options.content.next(geometry.tag, previous);

      if (!item) {
        waitingSince ??= Date.now();
        if (Date.now() - waitingSince >= this.options.pendingWaitTimeoutMs) {
          throw new StreamIOError('No suitable animations available');
        }
        this.notReady(`No content available for ${geometry.tag} yet`);
        if (!(await sleep(this.options.notReadyRetryMs, this.abort.signal))) {
          return;
        }
        continue;
      }

      waitingSince = null;
      const { sequence } = item.artifact;
      const { from, to } = clampRange(request.frameFrom, request.frameTo, sequence.frames.length);
      const passDuration = totalDurationMs(sequence.durationsMs.slice(from, to + 1));
      const passes = sequence.loop ? passesForDwell(passDuration, this.options.rotationDwellMs) : 1;

      if (!(await this.play(item, request, passes))) {
        return;
      }
      previous = item.source.id;
    }
  }

  /**
   * Play the clamped range of an item `passes` times.
   *
   * @returns false when aborted
   */
  private async play(item: PlaybackItem, request: StreamRequest, passes: number): Promise<boolean> {
    const { sequence } = item.artifact;
    const frameCount = sequence.frames.length;
    const { from, to } = clampRange(request.frameFrom, request.frameTo, frameCount);

    const messages: Buffer[] = [];
    for (let i = from; i <= to; i++) {
      messages.push(encodeFrame(sequence.durationsMs[i], sequence.frames[i]));
    }

    this.currentSourceId = item.source.id;
    this.sendControl(
      encodeInfo({
        width: sequence.width,
        height: sequence.height,
        from,
        to,
        name: displayName(item.source.filename),
        frameCount,
      })
    );
    this.emit('stream', { sourceId: item.source.id });
    logger.debug('stream', 'Playing item', {
      sessionId: this.id,
      filename: item.source.filename,
      range: `${from}-${to}`,
      passes,
    });

    const signal = this.abort.signal;
    for (let pass = 0; pass < passes; pass++) {
      for (let offset = 0; offset < messages.length; offset++) {
        const now = Date.now();
        let dueAt = this.nextDueAt ?? now;
        if (now - dueAt > PACING_RESYNC_MS) {
          dueAt = now;
        }
        if (dueAt > now && !(await sleep(dueAt - now, signal))) {
          return false;
        }
        if (signal.aborted) {
          return false;
        }

        this.sendFrame(messages[offset]);
        this.nextDueAt = dueAt + sequence.durationsMs[from + offset];
      }
    }
    return true;
  }

  // ==========================================================================
  // Output
  // ==========================================================================

  private sendFrame(message: Buffer): void {
    this.touch();
    if (this.outbound.pushFrame(message)) {
      this.framesSent++;
      return;
    }

    this.droppedFrames++;
    if (this.droppedFrames === 1 || this.droppedFrames % 100 === 0) {
      logger.debug('stream', 'Client is slow; dropping frames', {
        sessionId: this.id,
        droppedFrames: this.droppedFrames,
      });
    }
  }

  /**
   * Queue a control message. A client that left too many unread closes the
   * session.
   */
  private sendControl(message: Buffer): void {
    if (this.outbound.pushControl(message) || this.outbound.isClosed) {
      return;
    }
    logger.warn('stream', 'Client stopped reading; closing', {
      sessionId: this.id,
      remoteAddress: this.remoteAddress,
    });
    this.outbound.close();
    this.options.socket.destroy();
    this.abort.abort();
  }

  private notReady(reason: string): void {
    this.touch();
    this.nextDueAt = null;
    this.sendControl(encodeNotReady(reason));
    this.emit('not-ready', { message: reason });
  }

  private reject(error: unknown): void {
    const message = error instanceof StreamIOError ? error.message : 'Internal server error';
    if (error instanceof StreamIOError) {
      logger.info('stream', 'Session rejected', { sessionId: this.id, reason: message });
    } else {
      logger.error('stream', 'Session failed', { sessionId: this.id, error: getErrorMessage(error) });
    }

    this.sendControl(encodeError(message));
    this.emit('error', { message });
  }

  private async finish(): Promise<void> {
    this.state = 'draining';
    const { socket } = this.options;

    try {
      await withTimeout(this.outbound.flush(), SESSION_DRAIN_TIMEOUT_MS, 'Session drain timed out');
      if (!socket.destroyed) {
        socket.end();
      }
    } catch (error) {
      logger.warn('stream', 'Discarding unsent output', {
        sessionId: this.id,
        error: getErrorMessage(error),
      });
      this.outbound.close();
      socket.destroy();
    }

    this.state = 'closed';
    this.emit('disconnect', { framesSent: this.framesSent, droppedFrames: this.droppedFrames });
    logger.info('stream', 'Session closed', {
      sessionId: this.id,
      remoteAddress: this.remoteAddress,
      framesSent: this.framesSent,
      droppedFrames: this.droppedFrames,
    });
    this.options.onClosed?.(this);
  }

  private touch(): void {
    this.lastActivityAt = Date.now();
  }

  private emit(type: StreamEventType, details: EventDetails = {}): void {
    this.options.onEvent({
      type,
      at: Date.now(),
      sessionId: this.id,
      remoteAddress: this.remoteAddress,
      geometry: this.geometry?.tag,
      ...details,
    });
  }
}
