import assert from 'node:assert/strict';
import test from 'node:test';
import { BoundedAsyncQueue } from '../packages/chat-core/src/bounded-queue.ts';

void test('bounded queue rejects non-positive capacities', () => {
  assert.throws(() => new BoundedAsyncQueue<number>(0), /positive integer: 0/u);
  assert.throws(() => new BoundedAsyncQueue<number>(1.5), /positive integer: 1.5/u);
});

void test('bounded queue delivers values in push order', async () => {
  const queue = new BoundedAsyncQueue<string>(4);
  assert.equal(await queue.push('a'), true);
  assert.equal(queue.offer('b'), true);
  assert.equal(queue.size, 2);
  assert.deepEqual(await queue.next(), { done: false, value: 'a' });
  assert.deepEqual(await queue.next(), { done: false, value: 'b' });
  assert.equal(queue.size, 0);
});

void test('bounded queue offer refuses when full and push waits for room', async () => {
  const queue = new BoundedAsyncQueue<number>(1);
  assert.equal(queue.offer(1), true);
  assert.equal(queue.offer(2), false);

  let pushed = false;
  const pending = queue.push(2).then((result) => {
    pushed = result;
  });
  await new Promise<void>((resolve) => setImmediate(resolve));
  assert.equal(pushed, false);
  assert.equal(queue.pendingWriters, 1);

  assert.deepEqual(await queue.next(), { done: false, value: 1 });
  await pending;
  assert.equal(pushed, true);
  assert.deepEqual(await queue.next(), { done: false, value: 2 });
});

void test('bounded queue hands a value straight to a waiting reader', async () => {
  const queue = new BoundedAsyncQueue<string>(1);
  const read = queue.next();
  assert.equal(queue.offer('direct'), true);
  assert.deepEqual(await read, { done: false, value: 'direct' });
  assert.equal(queue.size, 0);
});

void test('bounded queue close drops buffered values and releases waiters', async () => {
  const queue = new BoundedAsyncQueue<number>(1);
  await queue.push(1);
  const blockedWriter = queue.push(2);
  queue.close();

  assert.equal(await blockedWriter, false);
  assert.equal(await queue.push(3), false);
  assert.equal(queue.offer(4), false);
  assert.deepEqual(await queue.next(), { done: true, value: undefined });
  assert.equal(queue.isClosed(), true);

  const reader = new BoundedAsyncQueue<number>(1);
  const pendingRead = reader.next();
  reader.close();
  assert.deepEqual(await pendingRead, { done: true, value: undefined });
});

void test('bounded queue iteration stops on close and breaking closes it', async () => {
  const queue = new BoundedAsyncQueue<number>(8);
  for (const value of [1, 2, 3]) {
    await queue.push(value);
  }
  const seen: number[] = [];
  for await (const value of queue) {
    seen.push(value);
    if (value === 2) {
      break;
    }
  }
  assert.deepEqual(seen, [1, 2]);
  assert.equal(queue.isClosed(), true);
  assert.equal(await queue.push(4), false);
});
