import assert from 'node:assert/strict';
import test from 'node:test';
import { InMemoryThreadStore } from '../packages/chat-core/src/index.ts';
import { ConnectionRegistry } from '../src/realtime/connection-registry.ts';
import { serve, type ConnectionSupervisorOptions } from '../src/realtime/connection-supervisor.ts';
import {
  FakeChatConnection,
  ScriptedAiClient,
  createCounterIds,
  fixedClock,
  isTerminalFrame,
} from './support/chat-fakes.ts';

function options(
  aiClient: ScriptedAiClient,
  overrides: Partial<ConnectionSupervisorOptions> = {},
): ConnectionSupervisorOptions {
  return {
    store: new InMemoryThreadStore(),
    aiClient,
    createId: createCounterIds(),
    now: fixedClock(),
    ...overrides,
  };
}

async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

void test('supervisor parses inbound frames and writes turn frames to the connection', async () => {
  const registry = new ConnectionRegistry();
  const connection = new FakeChatConnection('connection-a');
  const supervisor = serve(connection, options(new ScriptedAiClient({ autoReply: () => ['hello'] }), { registry }));
  assert.equal(registry.size, 1);
  assert.equal(registry.get('connection-a'), supervisor);

  connection.deliver({ text: 'hi' });
  const frames = await connection.waitForFrames((all) => all.some(isTerminalFrame));
  assert.deepEqual(frames, [
    { thread_id: 'id-1', kind: 'accepted', payload: '', turn_id: 'id-2' },
    { thread_id: 'id-1', kind: 'fragment', seq: 0, payload: 'hello', turn_id: 'id-2' },
    { thread_id: 'id-1', kind: 'completed', payload: 'hello', turn_id: 'id-2' },
  ]);
  assert.equal(
    connection.rawSent[1],
    '{"thread_id":"id-1","kind":"fragment","seq":0,"payload":"hello","turn_id":"id-2"}',
  );
  supervisor.teardown('test_done');
  await supervisor.closed;
});

void test('bad frames produce protocol errors without closing the connection', async () => {
  const connection = new FakeChatConnection();
  const supervisor = serve(
    connection,
    options(new ScriptedAiClient({ autoReply: () => ['fine'] }), { maxFrameBytes: 64 }),
  );

  connection.deliver('{oops');
  connection.deliver({ text: 'x'.repeat(80) });
  connection.deliver({ thread_id: 't-9', text: '' });
  await connection.waitForFrames((all) => all.length >= 3);
  assert.deepEqual(connection.frames, [
    { thread_id: null, kind: 'protocol_error', payload: 'frame is not valid json', code: 'malformed_frame' },
    { thread_id: null, kind: 'protocol_error', payload: 'frame exceeds 64 bytes', code: 'frame_too_large' },
    {
      thread_id: 't-9',
      kind: 'protocol_error',
      payload: 'message needs text or image_ref',
      code: 'empty_message',
    },
  ]);
  assert.equal(supervisor.isLive(), true);

  connection.deliver({ text: 'still here?' });
  const frames = await connection.waitForFrames((all) => all.some(isTerminalFrame));
  assert.deepEqual(frames.at(-1), { thread_id: 'id-1', kind: 'completed', payload: 'fine', turn_id: 'id-2' });
  supervisor.teardown('test_done');
  await supervisor.closed;
});

void test('a remote close cancels running turns and unregisters the connection', async () => {
  const registry = new ConnectionRegistry();
  const aiClient = new ScriptedAiClient();
  const connection = new FakeChatConnection();
  const supervisor = serve(connection, options(aiClient, { registry }));

  connection.deliver({ text: 'take your time' });
  const stream = await aiClient.stream(0);
  connection.remoteClose('closed:1001');
  await supervisor.closed;

  assert.equal(supervisor.isLive(), false);
  assert.equal(stream.abandonCalls, 1);
  assert.equal(registry.size, 0);
  assert.deepEqual(connection.closedWith, { code: 1000, reason: 'closing' });

  connection.deliver({ text: 'too late' });
  await sleep(10);
  assert.equal(aiClient.streams.length, 1);
  assert.deepEqual(supervisor.multiplexer.activeThreadIds(), []);
});

void test('a failed send tears the connection down', async () => {
  const aiClient = new ScriptedAiClient();
  const connection = new FakeChatConnection();
  connection.failSends = true;
  const supervisor = serve(connection, options(aiClient));

  connection.deliver({ text: 'hello?' });
  await supervisor.closed;
  assert.equal(supervisor.isLive(), false);
  assert.deepEqual(connection.closedWith, { code: 1000, reason: 'closing' });
  assert.deepEqual(connection.frames, []);
  assert.equal(supervisor.multiplexer.isClosed(), true);
});

void test('a slow connection holds back the ai stream until frames are written', async () => {
  const aiClient = new ScriptedAiClient({ autoReply: () => ['1', '2', '3', '4', '5'] });
  const connection = new FakeChatConnection();
  connection.holdSends();
  const supervisor = serve(connection, options(aiClient, { queueCapacity: 2 }));

  connection.deliver({ text: 'count to five' });
  const stream = await aiClient.stream(0);
  await sleep(30);
  assert.equal(stream.pulled, 3);
  assert.deepEqual(connection.frames, []);

  connection.releaseSends();
  const frames = await connection.waitForFrames((all) => all.some(isTerminalFrame));
  assert.deepEqual(
    frames.filter((frame) => frame.kind === 'fragment').map((frame) => frame.payload),
    ['1', '2', '3', '4', '5'],
  );
  assert.equal(frames.length, 7);
  supervisor.teardown('test_done');
  await supervisor.closed;
});

void test('a websocket delete cancels the thread on other connections before the store delete', async () => {
  const registry = new ConnectionRegistry();
  const store = new InMemoryThreadStore();
  const aiClient = new ScriptedAiClient();
  const first = new FakeChatConnection('connection-1');
  const second = new FakeChatConnection('connection-2');
  const firstSupervisor = serve(first, options(aiClient, { registry, store, createId: createCounterIds('a') }));
  const secondSupervisor = serve(second, options(aiClient, { registry, store, createId: createCounterIds('b') }));

  first.deliver({ text: 'working' });
  const stream = await aiClient.stream(0);
  stream.push('x');
  await first.waitForFrames((all) => all.length >= 2);

  second.deliver({ thread_id: 'a-1', delete: true, request_id: 'd-1' });
  assert.deepEqual(await second.waitForFrames((all) => all.length >= 1), [
    { thread_id: 'a-1', kind: 'deleted', payload: '', request_id: 'd-1' },
  ]);
  const frames = await first.waitForFrames((all) => all.some(isTerminalFrame));
  assert.deepEqual(frames.at(-1), {
    thread_id: 'a-1',
    kind: 'cancelled',
    payload: 'thread_deleted',
    turn_id: 'a-2',
  });
  assert.equal(stream.abandonCalls, 1);
  assert.equal(await store.hasThread('a-1'), false);

  first.deliver({ thread_id: 'a-1', text: 'again' });
  await first.waitForFrames((all) => all.length >= 4);
  assert.deepEqual(first.frames[3], {
    thread_id: 'a-1',
    kind: 'rejected',
    payload: 'thread was deleted',
    code: 'thread_deleted',
  });

  firstSupervisor.teardown('test_done');
  secondSupervisor.teardown('test_done');
  await Promise.all([firstSupervisor.closed, secondSupervisor.closed]);
});

void test('registry cancels a thread on every connection and tombstones it everywhere', async () => {
  const registry = new ConnectionRegistry();
  const store = new InMemoryThreadStore();
  const aiClient = new ScriptedAiClient();
  const first = new FakeChatConnection('connection-1');
  const second = new FakeChatConnection('connection-2');
  const firstSupervisor = serve(first, options(aiClient, { registry, store, createId: createCounterIds('a') }));
  const secondSupervisor = serve(second, options(aiClient, { registry, store, createId: createCounterIds('b') }));
  assert.deepEqual(registry.ids(), ['connection-1', 'connection-2']);

  first.deliver({ text: 'working' });
  await aiClient.stream(0);
  assert.equal(await registry.cancelThread('a-1', 'thread_deleted'), 1);
  assert.equal(await registry.cancelThread('missing', 'thread_deleted'), 0);

  const frames = await first.waitForFrames((all) => all.some(isTerminalFrame));
  assert.deepEqual(frames.at(-1), {
    thread_id: 'a-1',
    kind: 'cancelled',
    payload: 'thread_deleted',
    turn_id: 'a-2',
  });
  assert.equal(firstSupervisor.multiplexer.isTombstoned('a-1'), true);
  assert.equal(secondSupervisor.multiplexer.isTombstoned('a-1'), true);

  second.deliver({ thread_id: 'a-1', text: 'reopen?' });
  assert.deepEqual(await second.waitForFrames((all) => all.length >= 1), [
    { thread_id: 'a-1', kind: 'rejected', payload: 'thread was deleted', code: 'thread_deleted' },
  ]);

  await registry.closeAll('server_shutdown');
  assert.equal(registry.size, 0);
  assert.deepEqual(first.closedWith, { code: 1000, reason: 'closing' });
  assert.deepEqual(second.closedWith, { code: 1000, reason: 'closing' });
});
