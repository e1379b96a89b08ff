import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CacheStore } from '@services/cache/cache-store';
import { createGeometry } from '@services/codec/geometry';
import type { ConversionRequestResult } from '@services/scheduler/conversion-scheduler';
import type { SourceMedia, TargetGeometry } from '@t/media-types';
import { StreamIOError } from '@utils/errors';
import { sleep } from '@utils/with-timeout';
import type { ConversionRequester } from './client-session';
import { MessageReader, type StreamMessage } from './stream-protocol';
import { StreamServer, type StreamServerOptions } from './stream-server';

const VERSION = 'test-v1';
const GEOMETRY = createGeometry(4, 2);

interface TestClient {
  socket: net.Socket;
  messages: StreamMessage[];
  ended: Promise<void>;
}

let dir: string;
let store: CacheStore;
let servers: StreamServer[];

async function addSource(filename: string): Promise<SourceMedia> {
  return store.registerSource({
    id: 'd'.repeat(64),
    filename,
    path: `/media/${filename}`,
    kind: 'animated',
    byteSize: 100,
    ingestedAt: 1,
  });
}

async function addArtifact(source: SourceMedia, geometry: TargetGeometry = GEOMETRY): Promise<void> {
  const bytes = geometry.width * geometry.height * 3;
  await store.put({
    sourceId: source.id,
    geometry: geometry.tag,
    encoderVersion: VERSION,
    sequence: {
      width: geometry.width,
      height: geometry.height,
      frames: [Buffer.alloc(bytes, 1), Buffer.alloc(bytes, 2)],
      durationsMs: [15, 15],
      loop: true,
    },
  });
}

async function startServer(
  conversions: ConversionRequester,
  overrides: Partial<StreamServerOptions> = {}
): Promise<{ server: StreamServer; port: number }> {
  const server = new StreamServer({
    host: '127.0.0.1',
    port: 0,
    store,
    conversions,
    geometries: [GEOMETRY],
    handshakeTimeoutMs: 1_000,
    notReadyRetryMs: 20,
    pendingWaitTimeoutMs: 1_000,
    rotationDwellMs: 0,
    outboundQueueFrames: 4,
    activityLogSize: 50,
    ...overrides,
  });
  servers.push(server);
  const address = await server.listen();
  return { server, port: address.port };
}

function connect(port: number, handshake: string, allowHalfOpen = false): Promise<TestClient> {
  return new Promise((resolve, reject) => {
    const reader = new MessageReader();
    const messages: StreamMessage[] = [];
    const socket = net.connect({ port, host: '127.0.0.1', allowHalfOpen });
    const ended = new Promise<void>((done) => {
      socket.on('close', () => done());
    });

    socket.on('data', (chunk: Buffer) => {
      messages.push(...reader.push(chunk));
    });
    socket.once('error', reject);
    socket.once('connect', () => {
      socket.write(handshake);
      resolve({ socket, messages, ended });
    });
  });
}

async function waitFor(condition: () => boolean, timeoutMs = 3_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await sleep(5);
  }
}

beforeEach(async () => {
  dir = await fse.mkdtemp(path.join(os.tmpdir(), 'pixelcast-server-'));
  servers = [];
  store = await CacheStore.open({
    root: path.join(dir, 'cache'),
    dbPath: path.join(dir, 'meta.sqlite3'),
    capacity: { maxArtifacts: 10, maxBytes: null },
    encoderVersion: VERSION,
  });
});

afterEach(async () => {
  for (const server of servers) {
    await server.close();
  }
  await store.close();
  await fse.remove(dir);
});

describe('StreamServer', () => {
  it('tells a client to wait while converting, then streams over TCP', async () => {
    const source = await addSource('wave.gif');
    const requested: string[] = [];
    const { server, port } = await startServer({
      async requestConversion(sourceId: string): Promise<ConversionRequestResult> {
        requested.push(sourceId);
        await addArtifact(source);
        return 'queued';
      },
    });

    const client = await connect(port, 'STREAM:4:2:-:wave\n');
    await waitFor(() => client.messages.filter((m) => m.type === 'frame').length >= 2);

    expect(requested).toEqual([source.id]);
    expect(client.messages[0]).toEqual({ type: 'not-ready', reason: "Converting 'wave' for 4x2" });
    expect(client.messages[1]).toEqual({
      type: 'info',
      info: { width: 4, height: 2, from: 0, to: 1, name: 'wave', frameCount: 2 },
    });
    expect(client.messages[2]).toEqual({ type: 'frame', durationMs: 15, pixels: Buffer.alloc(24, 1) });

    const [session] = server.sessions();
    expect(session).toMatchObject({ state: 'streaming', geometry: '4x2', selector: 'wave' });

    client.socket.destroy();
    await waitFor(() => server.sessions().length === 0);

    const activity = server.recentActivity();
    expect(activity[0].type).toBe('disconnect');
    expect(activity.map((event) => event.type).reverse().slice(0, 3)).toEqual([
      'connect',
      'not-ready',
      'stream',
    ]);
  });

  it('sends ERROR and closes for a bad handshake', async () => {
    const { port } = await startServer({ requestConversion: async () => 'queued' });

    const client = await connect(port, 'STREAM:9:9:-\n');
    await client.ended;

    expect(client.messages).toEqual([{ type: 'error', message: 'Unsupported geometry 9x9' }]);
  });

  it('close() drains live sessions and ends their connections', async () => {
    await addArtifact(await addSource('wave.gif'));
    const { server, port } = await startServer({ requestConversion: async () => 'queued' });

    const client = await connect(port, 'STREAM:4:2:-\n');
    await waitFor(() => client.messages.some((m) => m.type === 'frame'));

    await server.close();
    await client.ended;

    expect(server.sessions()).toEqual([]);
    expect(server.recentActivity(1)[0].type).toBe('disconnect');
  });

  it('close() does not wait for a client that never closes its side', async () => {
    await addArtifact(await addSource('wave.gif'));
    const { server, port } = await startServer({ requestConversion: async () => 'queued' });

    const client = await connect(port, 'STREAM:4:2:-\n', true);
    await waitFor(() => client.messages.some((m) => m.type === 'frame'));

    await server.close();

    expect(server.sessions()).toEqual([]);
    client.socket.destroy();
  });

  it('serves each client at its own geometry', async () => {
    const square = createGeometry(2, 2);
    const source = await addSource('wave.gif');
    await addArtifact(source);
    await addArtifact(source, square);
    const { server, port } = await startServer(
      { requestConversion: async () => 'queued' },
      { geometries: [GEOMETRY, square] }
    );

    const wideClient = await connect(port, 'STREAM:4:2:-:wave\n');
    const squareClient = await connect(port, 'STREAM:2:2:-:wave\n');
    await waitFor(() =>
      [wideClient, squareClient].every((client) => client.messages.some((m) => m.type === 'frame'))
    );

    expect(wideClient.messages.slice(0, 2)).toEqual([
      { type: 'info', info: { width: 4, height: 2, from: 0, to: 1, name: 'wave', frameCount: 2 } },
      { type: 'frame', durationMs: 15, pixels: Buffer.alloc(24, 1) },
    ]);
    expect(squareClient.messages.slice(0, 2)).toEqual([
      { type: 'info', info: { width: 2, height: 2, from: 0, to: 1, name: 'wave', frameCount: 2 } },
      { type: 'frame', durationMs: 15, pixels: Buffer.alloc(12, 1) },
    ]);
    expect(server.sessions().map((session) => session.geometry).sort()).toEqual(['2x2', '4x2']);
  });

  it('reports a port that is already taken', async () => {
    const { port } = await startServer({ requestConversion: async () => 'queued' });
    const second = new StreamServer({
      host: '127.0.0.1',
      port,
      store,
      conversions: { requestConversion: async () => 'queued' },
      geometries: [GEOMETRY],
      handshakeTimeoutMs: 1_000,
      notReadyRetryMs: 20,
      pendingWaitTimeoutMs: 1_000,
      rotationDwellMs: 0,
      outboundQueueFrames: 4,
      activityLogSize: 50,
    });

    await expect(second.listen()).rejects.toBeInstanceOf(StreamIOError);
  });
});
