import { randomUUID } from 'node:crypto';
import { createServer, type IncomingMessage, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type WebSocket } from 'ws';
import type { AiStreamClient, ThreadStore } from '../../packages/chat-core/src/index.ts';
import { recordPerfEvent } from '../perf/perf-core.ts';
import { ConnectionRegistry } from '../realtime/connection-registry.ts';
import {
  serve,
  wrapWebSocket,
  type ConnectionSupervisorOptions,
} from '../realtime/connection-supervisor.ts';
import { createHttpRequestHandler } from './http-routes.ts';
import { ImageUploadStore } from './image-uploads.ts';

export const CHAT_WEBSOCKET_PATH = '/ws/chat';

export interface StartChatServerOptions {
  readonly host?: string;
  readonly port?: number;
  readonly store: ThreadStore;
  readonly aiClient: AiStreamClient;
  readonly uploads: ImageUploadStore;
  readonly maxFrameBytes?: number;
  readonly outboundQueueCapacity?: number;
  readonly socketHighWaterMarkBytes?: number;
  readonly turnDeadlineMs?: number | null;
  readonly finalizeAttempts?: number;
  readonly defaultLanguage?: string;
  readonly createId?: () => string;
  readonly now?: () => Date;
}

export class ChatServer {
  public readonly registry = new ConnectionRegistry();

  private readonly host: string;
  private readonly port: number;
  private readonly socketHighWaterMarkBytes: number | undefined;
  private readonly supervisorOptions: ConnectionSupervisorOptions;
  private readonly server: Server;
  private readonly webSockets: WebSocketServer;
  private listening = false;

  public constructor(options: StartChatServerOptions) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 0;
    this.socketHighWaterMarkBytes = options.socketHighWaterMarkBytes;
    this.supervisorOptions = {
      store: options.store,
      aiClient: options.aiClient,
      registry: this.registry,
      ...(options.maxFrameBytes !== undefined ? { maxFrameBytes: options.maxFrameBytes } : {}),
      ...(options.outboundQueueCapacity !== undefined
        ? { queueCapacity: options.outboundQueueCapacity }
        : {}),
      ...(options.turnDeadlineMs !== undefined ? { turnDeadlineMs: options.turnDeadlineMs } : {}),
      ...(options.finalizeAttempts !== undefined
        ? { finalizeAttempts: options.finalizeAttempts }
        : {}),
      ...(options.defaultLanguage !== undefined ? { defaultLanguage: options.defaultLanguage } : {}),
      ...(options.createId !== undefined ? { createId: options.createId } : {}),
      ...(options.now !== undefined ? { now: options.now } : {}),
    };
    this.server = createServer(
      createHttpRequestHandler({
        store: options.store,
        registry: this.registry,
        uploads: options.uploads,
      }),
    );
    this.webSockets = new WebSocketServer({
      noServer: true,
      ...(options.maxFrameBytes !== undefined ? { maxPayload: options.maxFrameBytes * 4 } : {}),
    });
    this.server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head);
    });
  }

  public async start(): Promise<void> {
    if (this.listening) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        this.server.off('listening', onListening);
        reject(error);
      };
      const onListening = (): void => {
        this.server.off('error', onError);
        this.listening = true;
        resolve();
      };

      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(this.port, this.host);
    });
  }

  public address(): AddressInfo {
    const value = this.server.address();
    if (value === null || typeof value === 'string') {
      throw new Error('chat server is not listening on tcp');
    }
    return value;
  }

  /** Tears down every connection, waits for their turns to settle, then stops listening. */
  public async close(): Promise<void> {
    await this.registry.closeAll('server_shutdown');
    for (const client of this.webSockets.clients) {
      client.terminate();
    }
    this.webSockets.close();

    if (!this.listening) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.server.close(() => {
        this.listening = false;
        resolve();
      });
      this.server.closeAllConnections();
    });
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const pathname = new URL(request.url ?? '/', 'http://localhost').pathname;
    if (pathname !== CHAT_WEBSOCKET_PATH) {
      recordPerfEvent('chat.connection.upgrade-rejected', { path: pathname });
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }
    this.webSockets.handleUpgrade(request, socket, head, (webSocket: WebSocket) => {
      this.handleConnection(webSocket);
    });
  }

  private handleConnection(webSocket: WebSocket): void {
    const connection = wrapWebSocket(webSocket, {
      id: `connection-${randomUUID()}`,
      ...(this.socketHighWaterMarkBytes !== undefined
        ? { highWaterMarkBytes: this.socketHighWaterMarkBytes }
        : {}),
    });
    serve(connection, this.supervisorOptions);
  }
}

export async function startChatServer(options: StartChatServerOptions): Promise<ChatServer> {
  const server = new ChatServer(options);
  await server.start();
  return server;
}
