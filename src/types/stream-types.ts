/**
 * Stream Types
 *
 * Session state, handshake request and activity events of the stream server.
 */

/**
 * Session state machine: connected → negotiating → streaming → (draining | closed)
 */
export type SessionState = 'connected' | 'negotiating' | 'streaming' | 'draining' | 'closed';

/**
 * Parsed client handshake
 *
 * @example
 * // "STREAM:32:32:0-:nyan\n"
 * const request: StreamRequest = { width: 32, height: 32, frameFrom: 0, frameTo: null, selector: 'nyan' };
 */
export interface StreamRequest {
  width: number;
  height: number;
  frameFrom: number;
  /** Inclusive; null means "to the end" */
  frameTo: number | null;
  /** Source id or name; null for server-chosen rotation */
  selector: string | null;
}

/**
 * Snapshot of one live session
 */
export interface SessionSnapshot {
  id: string;
  remoteAddress: string;
  state: SessionState;
  geometry: string | null;
  selector: string | null;
  currentSourceId: string | null;
  startedAt: number;
  lastActivityAt: number;
  framesSent: number;
  droppedFrames: number;
}

export type StreamEventType = 'connect' | 'not-ready' | 'stream' | 'disconnect' | 'error';

/**
 * Entry of the in-memory activity log
 */
export interface StreamEvent {
  type: StreamEventType;
  at: number;
  sessionId: string;
  remoteAddress: string;
  geometry?: string;
  sourceId?: string;
  framesSent?: number;
  droppedFrames?: number;
  message?: string;
}
