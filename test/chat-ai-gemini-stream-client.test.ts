import assert from 'node:assert/strict';
import test from 'node:test';
import {
  buildGeminiRequestBody,
  consumeSseEvents,
  createGeminiStreamClient,
  geminiStreamEndpoint,
  parseGeminiStreamChunk,
  readSseEvents,
  type SseEvent,
} from '../packages/chat-ai/src/index.ts';
import { UpstreamError, type AiStreamRequest } from '../packages/chat-core/src/index.ts';
import { assistantMessage, userMessage } from './support/chat-fakes.ts';

interface RecordedRequest {
  readonly url: string;
  readonly init: RequestInit;
}

function byteStream(chunks: readonly string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

function sseResponse(chunks: readonly string[]): Response {
  return new Response(byteStream(chunks), {
    status: 200,
    headers: { 'content-type': 'text/event-stream' },
  });
}

function textChunk(text: string, finishReason?: string): string {
  const candidate = {
    content: { role: 'model', parts: [{ text }] },
    ...(finishReason !== undefined ? { finishReason } : {}),
  };
  return `data: ${JSON.stringify({ candidates: [candidate] })}\n\n`;
}

function request(overrides: Partial<AiStreamRequest> = {}): AiStreamRequest {
  return {
    threadId: 'thread-1',
    turnId: 'turn-1',
    prompt: 'Tell me a joke',
    history: [],
    languageHint: 'English',
    ...overrides,
  };
}

async function collectFragments(fragments: AsyncIterable<string>): Promise<string[]> {
  const collected: string[] = [];
  for await (const fragment of fragments) {
    collected.push(fragment);
  }
  return collected;
}

void test('consumeSseEvents splits complete blocks and keeps the remainder', () => {
  const consumed = consumeSseEvents('event: a\r\ndata: 1\r\n\r\n: ping\n\ndata: x\ndata: y\n\ndata: par');
  assert.deepEqual(consumed.events, [
    { event: 'a', data: '1' },
    { event: null, data: 'x\ny' },
  ]);
  assert.equal(consumed.remainder, 'data: par');
});

void test('readSseEvents reassembles events split across chunks and flushes the tail', async () => {
  const events: SseEvent[] = [];
  for await (const event of readSseEvents(byteStream(['data: {"a"', ':1}\n', '\ndata: tail\n']))) {
    events.push(event);
  }
  assert.deepEqual(events, [
    { event: null, data: '{"a":1}' },
    { event: null, data: 'tail' },
  ]);
});

void test('buildGeminiRequestBody maps roles, merges same-role turns and adds the language', () => {
  const body = buildGeminiRequestBody({
    history: [
      assistantMessage('Welcome back.'),
      userMessage('hi'),
      userMessage(''),
      userMessage('are you there?'),
      assistantMessage('Yes.'),
    ],
    prompt: 'Describe this',
    languageHint: 'Spanish',
    image: { mimeType: 'image/png', data: 'aGVsbG8=' },
  });
  assert.deepEqual(body, {
    systemInstruction: { parts: [{ text: 'Respond in Spanish.' }] },
    contents: [
      { role: 'user', parts: [{ text: '(conversation continues)' }] },
      { role: 'model', parts: [{ text: 'Welcome back.' }] },
      { role: 'user', parts: [{ text: 'hi' }, { text: 'are you there?' }] },
      { role: 'model', parts: [{ text: 'Yes.' }] },
      {
        role: 'user',
        parts: [{ text: 'Describe this' }, { inlineData: { mimeType: 'image/png', data: 'aGVsbG8=' } }],
      },
    ],
  });
});

void test('parseGeminiStreamChunk reads text parts, finish, block and error payloads', () => {
  assert.deepEqual(
    parseGeminiStreamChunk({
      candidates: [{ content: { parts: [{ text: 'a' }, { inlineData: {} }, { text: 'b' }] }, finishReason: 'STOP' }],
    }),
    { texts: ['a', 'b'], finishReason: 'STOP', blockReason: null, error: null },
  );
  assert.deepEqual(parseGeminiStreamChunk({ promptFeedback: { blockReason: 'SAFETY' } }), {
    texts: [],
    finishReason: null,
    blockReason: 'SAFETY',
    error: null,
  });
  assert.deepEqual(parseGeminiStreamChunk({ error: { code: 503, message: 'overloaded' } }), {
    texts: [],
    finishReason: null,
    blockReason: null,
    error: { code: 503, message: 'overloaded' },
  });
  assert.equal(parseGeminiStreamChunk('nope'), null);
  assert.equal(parseGeminiStreamChunk({ candidates: 'nope' }), null);
});

void test('gemini client posts to the streaming endpoint and yields text fragments', async () => {
  const recorded: RecordedRequest[] = [];
  const client = createGeminiStreamClient({
    apiKey: 'test-secret',
    baseUrl: 'http://gemini.test/',
    fetch: async (url, init) => {
      recorded.push({ url, init });
      return sseResponse([textChunk('Why did '), textChunk(''), textChunk('the chicken', 'STOP'), 'data: [DONE]\n\n']);
    },
  });
  assert.equal(client.name, 'gemini:gemini-2.5-flash');

  const fragments = await collectFragments(
    client.startStream(request({ history: [userMessage('hi'), assistantMessage('hello')] })).fragments,
  );
  assert.deepEqual(fragments, ['Why did ', 'the chicken']);

  const sent = recorded[0];
  assert.notEqual(sent, undefined);
  assert.equal(
    sent?.url,
    'http://gemini.test/v1beta/models/gemini-2.5-flash:streamGenerateContent?alt=sse',
  );
  assert.equal(sent?.init.method, 'POST');
  const headers = new Headers(sent?.init.headers);
  assert.equal(headers.get('x-goog-api-key'), 'test-secret');
  assert.equal(headers.get('content-type'), 'application/json');
  assert.deepEqual(JSON.parse(String(sent?.init.body)), {
    systemInstruction: { parts: [{ text: 'Respond in English.' }] },
    contents: [
      { role: 'user', parts: [{ text: 'hi' }] },
      { role: 'model', parts: [{ text: 'hello' }] },
      { role: 'user', parts: [{ text: 'Tell me a joke' }] },
    ],
  });
});

void test('gemini client resolves image references into inline data', async () => {
  const bodies: unknown[] = [];
  const client = createGeminiStreamClient({
    apiKey: 'test-secret',
    resolveImage: async (imageRef) =>
      imageRef === 'cat.png' ? { mimeType: 'image/png', data: 'Y2F0' } : null,
    fetch: async (_url, init) => {
      bodies.push(JSON.parse(String(init.body)));
      return sseResponse([textChunk('A cat.')]);
    },
  });
  await collectFragments(client.startStream(request({ prompt: 'What is this?', imageRef: 'cat.png' })).fragments);
  await collectFragments(client.startStream(request({ prompt: 'And this?', imageRef: 'missing.png' })).fragments);

  assert.deepEqual(bodies.map((body) => JSON.stringify(body)), [
    JSON.stringify({
      systemInstruction: { parts: [{ text: 'Respond in English.' }] },
      contents: [
        {
          role: 'user',
          parts: [{ text: 'What is this?' }, { inlineData: { mimeType: 'image/png', data: 'Y2F0' } }],
        },
      ],
    }),
    JSON.stringify({
      systemInstruction: { parts: [{ text: 'Respond in English.' }] },
      contents: [{ role: 'user', parts: [{ text: 'And this?' }] }],
    }),
  ]);
});

void test('gemini client turns http failures into upstream errors with status', async () => {
  const client = createGeminiStreamClient({
    apiKey: 'test-secret',
    fetch: async () => new Response('slow down', { status: 429 }),
  });
  await assert.rejects(
    collectFragments(client.startStream(request()).fragments),
    (error: unknown) =>
      error instanceof UpstreamError &&
      error.message === 'gemini responded 429: slow down' &&
      error.status === 429 &&
      error.retryable,
  );

  const rejected = createGeminiStreamClient({
    apiKey: 'test-secret',
    fetch: async () => new Response('bad key', { status: 403 }),
  });
  await assert.rejects(
    collectFragments(rejected.startStream(request()).fragments),
    (error: unknown) => error instanceof UpstreamError && error.status === 403 && !error.retryable,
  );
});

void test('gemini client reports network, stream and block errors', async () => {
  const offline = createGeminiStreamClient({
    apiKey: 'test-secret',
    fetch: async () => {
      throw new Error('network down');
    },
  });
  await assert.rejects(collectFragments(offline.startStream(request()).fragments), {
    message: 'gemini request failed: network down',
  });

  const overloaded = createGeminiStreamClient({
    apiKey: 'test-secret',
    fetch: async () =>
      sseResponse([textChunk('partial'), `data: ${JSON.stringify({ error: { code: 503, message: 'overloaded' } })}\n\n`]),
  });
  const seen: string[] = [];
  await assert.rejects(
    (async () => {
      for await (const fragment of overloaded.startStream(request()).fragments) {
        seen.push(fragment);
      }
    })(),
    (error: unknown) =>
      error instanceof UpstreamError &&
      error.message === 'gemini stream error: overloaded' &&
      error.status === 503,
  );
  assert.deepEqual(seen, ['partial']);

  const blocked = createGeminiStreamClient({
    apiKey: 'test-secret',
    fetch: async () => sseResponse([`data: ${JSON.stringify({ promptFeedback: { blockReason: 'SAFETY' } })}\n\n`]),
  });
  await assert.rejects(collectFragments(blocked.startStream(request()).fragments), {
    message: 'gemini blocked the prompt: SAFETY',
  });

  const garbled = createGeminiStreamClient({
    apiKey: 'test-secret',
    fetch: async () => sseResponse(['data: {not json\n\n']),
  });
  await assert.rejects(collectFragments(garbled.startStream(request()).fragments), {
    message: 'malformed gemini stream event',
  });
});

void test('gemini client fails a response cut short by a safety finish reason', async () => {
  const client = createGeminiStreamClient({
    apiKey: 'test-secret',
    fetch: async () => sseResponse([textChunk('Once upon '), textChunk('a time', 'SAFETY')]),
  });
  const seen: string[] = [];
  await assert.rejects(
    (async () => {
      for await (const fragment of client.startStream(request()).fragments) {
        seen.push(fragment);
      }
    })(),
    (error: unknown) =>
      error instanceof UpstreamError && error.message === 'gemini stopped the response: SAFETY',
  );
  assert.deepEqual(seen, ['Once upon ', 'a time']);

  const truncated = createGeminiStreamClient({
    apiKey: 'test-secret',
    fetch: async () => sseResponse([textChunk('short', 'MAX_TOKENS')]),
  });
  assert.deepEqual(await collectFragments(truncated.startStream(request()).fragments), ['short']);
});

void test('abandoning a gemini stream aborts the request', async () => {
  let signal: AbortSignal | null = null;
  const client = createGeminiStreamClient({
    apiKey: 'test-secret',
    fetch: (_url, init) =>
      new Promise<Response>((_, reject) => {
        signal = init.signal ?? null;
        if (init.signal?.aborted === true) {
          reject(new Error('aborted'));
          return;
        }
        init.signal?.addEventListener('abort', () => {
          reject(new Error('aborted'));
        });
      }),
  });
  const handle = client.startStream(request());
  const iterator = handle.fragments[Symbol.asyncIterator]();
  const pending = iterator.next();
  handle.abandon();
  handle.abandon();
  await assert.rejects(pending, { message: 'gemini request failed: aborted' });
  assert.notEqual(signal, null);
});

void test('geminiStreamEndpoint encodes the model name', () => {
  assert.equal(
    geminiStreamEndpoint('https://example.test', 'models/custom'),
    'https://example.test/v1beta/models/models%2Fcustom:streamGenerateContent?alt=sse',
  );
});
