export * from './canned-stream-client.ts';
export * from './gemini-protocol.ts';
export * from './gemini-stream-client.ts';
export * from './sse.ts';
