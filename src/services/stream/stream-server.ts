/**
 * Stream Server
 *
 * TCP listener for display clients. Every connection gets its own
 * `ClientSession` with its own pacing and outbound queue, so a slow or
 * vanished client only affects itself.
 *
 * Usage:
 *   const server = new StreamServer({ store, conversions: scheduler, ...config.stream, geometries });
 *   const address = await server.listen();
 *   server.sessions();          // live session snapshots
 *   server.recentActivity(50);  // newest events first
 *   await server.close();       // drain sessions, stop listening
 */

import net from 'node:net';
import type { AddressInfo } from 'node:net';
import type { CacheStore } from '@services/cache/cache-store';
import type { SessionSnapshot, StreamEvent } from '@t/stream-types';
import { createId, shortId } from '@utils/create-id';
import { getErrorMessage, StreamIOError } from '@utils/errors';
import { logger } from '@utils/logger';
import { ActivityLog } from './activity-log';
import { ClientSession, type ConversionRequester, type SessionSettings } from './client-session';
import { ContentSelector } from './content-selector';

export interface StreamServerOptions extends SessionSettings {
  host: string;
  /** 0 picks a free port */
  port: number;
  store: CacheStore;
  conversions: ConversionRequester;
  activityLogSize: number;
}

export class StreamServer {
  private readonly server: net.Server;
  private readonly live = new Map<string, ClientSession>();
  private readonly sockets = new Set<net.Socket>();
  private readonly activity: ActivityLog;
  private readonly content: ContentSelector;
  private closing = false;

  constructor(private readonly options: StreamServerOptions) {
    this.activity = new ActivityLog(options.activityLogSize);
    this.content = new ContentSelector(options.store);
    this.server = net.createServer((socket) => this.accept(socket));
  }

  /**
   * Start listening.
   *
   * @throws StreamIOError when the address cannot be bound
   */
  listen(): Promise<AddressInfo> {
    const { host, port } = this.options;

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        reject(new StreamIOError(`Cannot listen on ${host}:${port}: ${error.message}`, { cause: error }));
      };
      this.server.once('error', onError);

      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        this.server.on('error', (error) => {
          logger.error('stream', 'Listener error', { error: getErrorMessage(error) });
        });

        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new StreamIOError('Stream server has no TCP address'));
          return;
        }
        logger.info('stream', 'Stream server listening', {
          host: address.address,
          port: address.port,
          geometries: this.options.geometries.map((g) => g.tag),
        });
        resolve(address);
      });
    });
  }

  sessions(): SessionSnapshot[] {
    return [...this.live.values()].map((session) => session.snapshot());
  }

  /**
   * Newest events first.
   */
  recentActivity(limit?: number): StreamEvent[] {
    return this.activity.recent(limit);
  }

  /**
   * Stop accepting, drain every session and close the listener. Connections
   * whose peer never closes its side are destroyed once drained.
   */
  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;

    const listenerClosed = new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });
    const sessions = [...this.live.values()];
    await Promise.all(sessions.map((session) => session.stop()));
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await listenerClosed;

    logger.info('stream', 'Stream server closed', { drainedSessions: sessions.length });
  }

  private accept(socket: net.Socket): void {
    if (this.closing) {
      socket.destroy();
      return;
    }

    socket.setNoDelay(true);
    this.sockets.add(socket);
    socket.once('close', () => {
      this.sockets.delete(socket);
    });
    const session = new ClientSession({
      geometries: this.options.geometries,
      handshakeTimeoutMs: this.options.handshakeTimeoutMs,
      notReadyRetryMs: this.options.notReadyRetryMs,
      pendingWaitTimeoutMs: this.options.pendingWaitTimeoutMs,
      rotationDwellMs: this.options.rotationDwellMs,
      outboundQueueFrames: this.options.outboundQueueFrames,
      id: shortId(createId()),
      socket,
      remoteAddress: `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`,
      content: this.content,
      conversions: this.options.conversions,
      onEvent: (event) => this.activity.record(event),
      onClosed: (closed) => {
        this.live.delete(closed.id);
      },
    });

    this.live.set(session.id, session);
    logger.debug('stream', 'Client connected', {
      sessionId: session.id,
      remoteAddress: session.remoteAddress,
      activeSessions: this.live.size,
    });
    session.start();
  }
}
