import assert from 'node:assert/strict';
import { once } from 'node:events';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import { WebSocket, type RawData } from 'ws';
import { InMemoryThreadStore } from '../packages/chat-core/src/index.ts';
import { parseOutboundFrame, type OutboundFrame } from '../src/realtime/chat-protocol.ts';
import { startChatServer, type ChatServer } from '../src/server/chat-server.ts';
import { ImageUploadStore } from '../src/server/image-uploads.ts';
import {
  ScriptedAiClient,
  createCounterIds,
  fixedClock,
  isTerminalFrame,
  waitFor,
} from './support/chat-fakes.ts';

interface TestServer {
  readonly server: ChatServer;
  readonly store: InMemoryThreadStore;
  readonly baseUrl: string;
  readonly wsUrl: string;
}

function rawText(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

async function withServer(run: (context: TestServer) => Promise<void>): Promise<void> {
  const directory = mkdtempSync(join(tmpdir(), 'threadline-server-'));
  const store = new InMemoryThreadStore();
  const server = await startChatServer({
    host: '127.0.0.1',
    port: 0,
    store,
    aiClient: new ScriptedAiClient({ autoReply: (request) => ['You said: ', request.prompt] }),
    uploads: new ImageUploadStore({
      directory: join(directory, 'uploads'),
      maxBytes: 64,
      createId: createCounterIds('img'),
    }),
    maxFrameBytes: 4096,
    createId: createCounterIds(),
    now: fixedClock('2026-03-01T12:00:00.000Z'),
  });
  const { port } = server.address();
  try {
    await run({
      server,
      store,
      baseUrl: `http://127.0.0.1:${String(port)}`,
      wsUrl: `ws://127.0.0.1:${String(port)}`,
    });
  } finally {
    await server.close();
    rmSync(directory, { recursive: true, force: true });
  }
}

class ChatClient {
  public readonly frames: OutboundFrame[] = [];

  public constructor(public readonly socket: WebSocket) {
    socket.on('message', (data: RawData) => {
      const frame = parseOutboundFrame(rawText(data));
      if (frame !== null) {
        this.frames.push(frame);
      }
    });
  }

  public static async connect(url: string): Promise<ChatClient> {
    const socket = new WebSocket(url);
    const client = new ChatClient(socket);
    await once(socket, 'open');
    return client;
  }

  public send(frame: unknown): void {
    this.socket.send(typeof frame === 'string' ? frame : JSON.stringify(frame));
  }

  public async waitForFrames(
    predicate: (frames: readonly OutboundFrame[]) => boolean,
  ): Promise<readonly OutboundFrame[]> {
    await waitFor(() => predicate(this.frames), 2000, 'websocket frames');
    return this.frames;
  }

  public async close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return;
    }
    const closed = once(this.socket, 'close');
    this.socket.close();
    await closed;
  }
}

async function getJson(url: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, init);
  return { status: response.status, body: await response.json() };
}

void test('chat over the websocket persists the thread for the http api', async () => {
  await withServer(async ({ baseUrl, wsUrl }) => {
    const client = await ChatClient.connect(`${wsUrl}/ws/chat`);
    client.send({ text: 'hello', request_id: 'r-1' });
    const frames = await client.waitForFrames((all) => all.some(isTerminalFrame));
    assert.deepEqual(frames, [
      { thread_id: 'id-1', kind: 'accepted', payload: '', turn_id: 'id-2', request_id: 'r-1' },
      { thread_id: 'id-1', kind: 'fragment', seq: 0, payload: 'You said: ', turn_id: 'id-2' },
      { thread_id: 'id-1', kind: 'fragment', seq: 1, payload: 'hello', turn_id: 'id-2' },
      { thread_id: 'id-1', kind: 'completed', payload: 'You said: hello', turn_id: 'id-2' },
    ]);

    assert.deepEqual(await getJson(`${baseUrl}/healthz`), {
      status: 200,
      body: { ok: true, connections: 1 },
    });
    assert.deepEqual(await getJson(`${baseUrl}/api/threads`), {
      status: 200,
      body: [
        {
          threadId: 'id-1',
          title: 'hello',
          messageCount: 2,
          createdAt: '2026-03-01T12:00:00.000Z',
          updatedAt: '2026-03-01T12:00:00.000Z',
        },
      ],
    });
    assert.deepEqual(await getJson(`${baseUrl}/api/threads/id-1`), {
      status: 200,
      body: [
        { role: 'user', content: 'hello', timestamp: '2026-03-01T12:00:00.000Z' },
        { role: 'assistant', content: 'You said: hello', timestamp: '2026-03-01T12:00:00.000Z' },
      ],
    });
    await client.close();
  });
});

void test('malformed frames get protocol errors over the wire', async () => {
  await withServer(async ({ wsUrl }) => {
    const client = await ChatClient.connect(`${wsUrl}/ws/chat`);
    client.send('not json');
    client.send({ text: 'hi', shout: true });
    assert.deepEqual(await client.waitForFrames((all) => all.length >= 2), [
      { thread_id: null, kind: 'protocol_error', payload: 'frame is not valid json', code: 'malformed_frame' },
      {
        thread_id: null,
        kind: 'protocol_error',
        payload: "Unrecognized key(s) in object: 'shout'",
        code: 'invalid_frame',
      },
    ]);
    assert.equal(client.socket.readyState, WebSocket.OPEN);
    await client.close();
  });
});

void test('deleting a thread over http removes it and tombstones it for live sessions', async () => {
  await withServer(async ({ baseUrl, wsUrl, store }) => {
    const client = await ChatClient.connect(`${wsUrl}/ws/chat`);
    client.send({ text: 'keep this' });
    await client.waitForFrames((all) => all.some(isTerminalFrame));

    assert.deepEqual(await getJson(`${baseUrl}/api/threads/id-1`, { method: 'DELETE' }), {
      status: 200,
      body: { deleted: 'id-1' },
    });
    assert.equal(await store.hasThread('id-1'), false);
    assert.deepEqual(await getJson(`${baseUrl}/api/threads/id-1`), {
      status: 404,
      body: { error: 'thread not found' },
    });
    assert.deepEqual(await getJson(`${baseUrl}/api/threads/id-1`, { method: 'DELETE' }), {
      status: 404,
      body: { error: 'thread not found' },
    });

    client.send({ thread_id: 'id-1', text: 'are you still there?' });
    const frames = await client.waitForFrames((all) => all.length >= 5);
    assert.deepEqual(frames[4], {
      thread_id: 'id-1',
      kind: 'rejected',
      payload: 'thread was deleted',
      code: 'thread_deleted',
    });
    await client.close();
  });
});

void test('uploads are stored and served back', async () => {
  await withServer(async ({ baseUrl }) => {
    const bytes = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 1, 2, 3, 4]);
    assert.deepEqual(
      await getJson(`${baseUrl}/api/uploads`, {
        method: 'POST',
        headers: { 'content-type': 'image/png' },
        body: bytes,
      }),
      { status: 200, body: { imageRef: 'img-1.png', url: '/uploads/img-1.png' } },
    );

    const served = await fetch(`${baseUrl}/uploads/img-1.png`);
    assert.equal(served.status, 200);
    assert.equal(served.headers.get('content-type'), 'image/png');
    assert.deepEqual([...new Uint8Array(await served.arrayBuffer())], [...bytes]);

    assert.deepEqual(
      await getJson(`${baseUrl}/api/uploads`, {
        method: 'POST',
        headers: { 'content-type': 'text/plain' },
        body: 'hello',
      }),
      {
        status: 400,
        body: { error: 'invalid file type; allowed: image/jpeg, image/png, image/gif, image/webp' },
      },
    );
    assert.deepEqual(
      await getJson(`${baseUrl}/api/uploads`, {
        method: 'POST',
        headers: { 'content-type': 'image/png' },
        body: 'x'.repeat(65),
      }),
      { status: 413, body: { error: 'upload exceeds 64 bytes' } },
    );
    assert.deepEqual(await getJson(`${baseUrl}/uploads/img-2.png`), {
      status: 404,
      body: { error: 'file not found' },
    });
  });
});

void test('unknown routes, wrong methods and preflight requests', async () => {
  await withServer(async ({ baseUrl }) => {
    assert.deepEqual(await getJson(`${baseUrl}/nowhere`), { status: 404, body: { error: 'not found' } });
    assert.deepEqual(await getJson(`${baseUrl}/healthz`, { method: 'POST' }), {
      status: 405,
      body: { error: 'method not allowed' },
    });
    assert.deepEqual(await getJson(`${baseUrl}/api/threads/%E0%A4%A`), {
      status: 400,
      body: { error: 'invalid path encoding' },
    });

    const preflight = await fetch(`${baseUrl}/api/uploads`, { method: 'OPTIONS' });
    assert.equal(preflight.status, 204);
    assert.equal(preflight.headers.get('access-control-allow-origin'), '*');
    assert.equal(preflight.headers.get('access-control-allow-methods'), 'GET, POST, DELETE, OPTIONS');
  });
});

void test('websocket upgrades are accepted only on the chat path', async () => {
  await withServer(async ({ wsUrl }) => {
    const socket = new WebSocket(`${wsUrl}/ws/other`);
    await assert.rejects(once(socket, 'open'), { message: 'Unexpected server response: 404' });
  });
});

void test('closing the server disconnects clients and cancels their turns', async () => {
  const directory = mkdtempSync(join(tmpdir(), 'threadline-server-'));
  const aiClient = new ScriptedAiClient();
  const server = await startChatServer({
    store: new InMemoryThreadStore(),
    aiClient,
    uploads: new ImageUploadStore({ directory }),
    createId: createCounterIds(),
  });
  try {
    const client = await ChatClient.connect(`ws://127.0.0.1:${String(server.address().port)}/ws/chat`);
    const closed = once(client.socket, 'close');
    client.send({ text: 'never finishes' });
    const stream = await aiClient.stream(0);
    await waitFor(() => server.registry.size === 1, 2000, 'registered connection');

    await server.close();
    await closed;
    assert.equal(stream.abandonCalls, 1);
    assert.equal(server.registry.size, 0);
  } finally {
    rmSync(directory, { recursive: true, force: true });
  }
});
