import type { IncomingMessage, ServerResponse } from 'node:http';
import { errorMessage, type ThreadStore } from '../../packages/chat-core/src/index.ts';
import { recordPerfEvent, startPerfSpan } from '../perf/perf-core.ts';
import type { ConnectionRegistry } from '../realtime/connection-registry.ts';
import { UploadRejectedError, UPLOADS_URL_PREFIX, type ImageUploadStore } from './image-uploads.ts';

interface HttpRouteDependencies {
  readonly store: ThreadStore;
  readonly registry: ConnectionRegistry;
  readonly uploads: ImageUploadStore;
}

type RouteMatch =
  | { readonly route: 'health' }
  | { readonly route: 'threads' }
  | { readonly route: 'thread'; readonly threadId: string }
  | { readonly route: 'uploads' }
  | { readonly route: 'upload-file'; readonly fileName: string };

class HttpStatusError extends Error {
  public readonly statusCode: number;

  public constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'HttpStatusError';
    this.statusCode = statusCode;
  }
}

const CORS_HEADERS: Readonly<Record<string, string>> = {
  'access-control-allow-origin': '*',
  'access-control-allow-methods': 'GET, POST, DELETE, OPTIONS',
  'access-control-allow-headers': 'content-type',
};

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpStatusError(400, 'invalid path encoding');
  }
}

export function matchRoute(pathname: string): RouteMatch | null {
  if (pathname === '/healthz') {
    return { route: 'health' };
  }
  if (pathname === '/api/threads') {
    return { route: 'threads' };
  }
  if (pathname === '/api/uploads') {
    return { route: 'uploads' };
  }
  const threadMatch = /^\/api\/threads\/([^/]+)$/u.exec(pathname);
  if (threadMatch?.[1] !== undefined) {
    return { route: 'thread', threadId: decodeSegment(threadMatch[1]) };
  }
  if (pathname.startsWith(UPLOADS_URL_PREFIX)) {
    const fileName = pathname.slice(UPLOADS_URL_PREFIX.length);
    if (fileName.length > 0 && !fileName.includes('/')) {
      return { route: 'upload-file', fileName: decodeSegment(fileName) };
    }
  }
  return null;
}

function writeJson(response: ServerResponse, statusCode: number, payload: unknown): void {
  response.statusCode = statusCode;
  for (const [name, value] of Object.entries(CORS_HEADERS)) {
    response.setHeader(name, value);
  }
  response.setHeader('content-type', 'application/json; charset=utf-8');
  response.end(JSON.stringify(payload));
}

function readRequestBody(request: IncomingMessage, maxBytes: number): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let rejected = false;
    request.on('data', (chunk: Buffer | string) => {
      if (rejected) {
        return;
      }
      const normalized = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      totalBytes += normalized.length;
      if (totalBytes > maxBytes) {
        rejected = true;
        reject(new HttpStatusError(413, `upload exceeds ${String(maxBytes)} bytes`));
        request.resume();
        return;
      }
      chunks.push(normalized);
    });
    request.on('error', reject);
    request.on('end', () => {
      if (!rejected) {
        resolve(Buffer.concat(chunks));
      }
    });
  });
}

function uploadStatusCode(error: UploadRejectedError): number {
  return error.reason === 'too_large' ? 413 : 400;
}

/** Builds the `node:http` request listener for everything except the WebSocket upgrade. */
export function createHttpRequestHandler(
  dependencies: HttpRouteDependencies,
): (request: IncomingMessage, response: ServerResponse) => void {
  const { store, registry, uploads } = dependencies;

  const handle = async (
    request: IncomingMessage,
    response: ServerResponse,
    method: string,
    match: RouteMatch,
  ): Promise<void> => {
    switch (match.route) {
      case 'health':
        if (method !== 'GET') {
          throw new HttpStatusError(405, 'method not allowed');
        }
        writeJson(response, 200, { ok: true, connections: registry.size });
        return;
      case 'threads':
        if (method !== 'GET') {
          throw new HttpStatusError(405, 'method not allowed');
        }
        writeJson(response, 200, await store.listThreads());
        return;
      case 'thread':
        if (method === 'GET') {
          if (!(await store.hasThread(match.threadId))) {
            throw new HttpStatusError(404, 'thread not found');
          }
          writeJson(response, 200, await store.getHistory(match.threadId));
          return;
        }
        if (method === 'DELETE') {
          const cancelled = await registry.cancelThread(match.threadId, 'thread_deleted');
          const result = await store.delete(match.threadId);
          if (result === 'not_found' && cancelled === 0) {
            throw new HttpStatusError(404, 'thread not found');
          }
          recordPerfEvent('chat.thread.deleted', {
            threadId: match.threadId,
            result,
            cancelledTurns: cancelled,
          });
          writeJson(response, 200, { deleted: match.threadId });
          return;
        }
        throw new HttpStatusError(405, 'method not allowed');
      case 'uploads': {
        if (method !== 'POST') {
          throw new HttpStatusError(405, 'method not allowed');
        }
        const body = await readRequestBody(request, uploads.maxBytes);
        writeJson(response, 200, await uploads.save(request.headers['content-type'], body));
        return;
      }
      case 'upload-file': {
        if (method !== 'GET') {
          throw new HttpStatusError(405, 'method not allowed');
        }
        const image = await uploads.load(match.fileName);
        if (image === null) {
          throw new HttpStatusError(404, 'file not found');
        }
        response.statusCode = 200;
        response.setHeader('access-control-allow-origin', '*');
        response.setHeader('content-type', image.mimeType);
        response.setHeader('content-length', String(image.data.byteLength));
        response.end(image.data);
        return;
      }
    }
  };

  return (request, response) => {
    const method = (request.method ?? 'GET').toUpperCase();
    const pathname = new URL(request.url ?? '/', 'http://localhost').pathname;
    const span = startPerfSpan('chat.http.request', { method, path: pathname });
    const finish = (statusCode: number): void => {
      span.end({ status: statusCode });
    };

    if (method === 'OPTIONS') {
      for (const [name, value] of Object.entries(CORS_HEADERS)) {
        response.setHeader(name, value);
      }
      response.statusCode = 204;
      response.end();
      finish(204);
      return;
    }

    let match: RouteMatch | null;
    try {
      match = matchRoute(pathname);
    } catch (error: unknown) {
      const statusCode = error instanceof HttpStatusError ? error.statusCode : 400;
      writeJson(response, statusCode, { error: errorMessage(error) });
      finish(statusCode);
      return;
    }
    if (match === null) {
      writeJson(response, 404, { error: 'not found' });
      finish(404);
      return;
    }

    void handle(request, response, method, match).then(
      () => {
        finish(response.statusCode);
      },
      (error: unknown) => {
        let statusCode = 500;
        if (error instanceof HttpStatusError) {
          statusCode = error.statusCode;
        } else if (error instanceof UploadRejectedError) {
          statusCode = uploadStatusCode(error);
        } else {
          recordPerfEvent('chat.http.error', { method, path: pathname, error: errorMessage(error) });
        }
        if (!response.headersSent) {
          writeJson(response, statusCode, { error: errorMessage(error) });
        }
        finish(statusCode);
      },
    );
  };
}
