import { randomUUID } from 'node:crypto';
import { WebSocket, type RawData } from 'ws';
import {
  ConnectionError,
  errorMessage,
  type AiStreamClient,
  type ThreadStore,
} from '../../packages/chat-core/src/index.ts';
import { recordPerfEvent, startPerfSpan, type PerfSpan } from '../perf/perf-core.ts';
import { encodeOutboundFrame, parseInboundFrame } from './chat-protocol.ts';
import type { ConnectionRegistry } from './connection-registry.ts';
import { SessionMultiplexer } from './session-multiplexer.ts';

export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;
export const DEFAULT_SOCKET_HIGH_WATER_MARK_BYTES = 1024 * 1024;

/** Transport seam between a supervisor and whatever carries its text frames. */
export interface ChatConnection {
  readonly id: string;
  send(text: string): Promise<void>;
  onMessage(listener: (text: string) => void): void;
  onClose(listener: (reason: string) => void): void;
  close(code: number, reason: string): void;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * Adapts a `ws` socket. `send` resolves at once while the socket's buffer is below the
 * high-water mark and otherwise waits for the frame to be flushed.
 */
export function wrapWebSocket(
  socket: WebSocket,
  options: { id?: string; highWaterMarkBytes?: number } = {},
): ChatConnection {
  const highWaterMarkBytes = options.highWaterMarkBytes ?? DEFAULT_SOCKET_HIGH_WATER_MARK_BYTES;
  return {
    id: options.id ?? `connection-${randomUUID()}`,
    send(text: string): Promise<void> {
      if (socket.readyState !== WebSocket.OPEN) {
        return Promise.reject(new ConnectionError('socket is not open'));
      }
      return new Promise<void>((resolve, reject) => {
        let settled = false;
        socket.send(text, (error?: Error) => {
          if (settled) {
            if (error !== undefined) {
              socket.terminate();
            }
            return;
          }
          settled = true;
          if (error !== undefined) {
            reject(new ConnectionError(`socket write failed: ${error.message}`, error));
            return;
          }
          resolve();
        });
        if (!settled && socket.bufferedAmount < highWaterMarkBytes) {
          settled = true;
          resolve();
        }
      });
    },
    onMessage(listener: (text: string) => void): void {
      socket.on('message', (data: RawData) => {
        listener(rawDataToString(data));
      });
    },
    onClose(listener: (reason: string) => void): void {
      socket.on('close', (code: number) => {
        listener(`closed:${String(code)}`);
      });
      socket.on('error', (error: Error) => {
        listener(`error:${error.message}`);
      });
    },
    close(code: number, reason: string): void {
      if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
        socket.close(code, reason);
      }
    },
  };
}

export interface ConnectionSupervisorOptions {
  readonly store: ThreadStore;
  readonly aiClient: AiStreamClient;
  readonly registry?: ConnectionRegistry;
  readonly maxFrameBytes?: number;
  readonly queueCapacity?: number;
  readonly turnDeadlineMs?: number | null;
  readonly finalizeAttempts?: number;
  readonly defaultLanguage?: string;
  readonly createId?: () => string;
  readonly now?: () => Date;
}

/**
 * Owns one connection's lifetime: a read side that parses frames into the multiplexer and
 * a write side that drains the multiplexer's queue. `teardown` is the only place that
 * marks the connection dead, and it runs at most once.
 */
export class ConnectionSupervisor {
  public readonly multiplexer: SessionMultiplexer;
  public readonly closed: Promise<void>;

  private readonly connection: ChatConnection;
  private readonly registry: ConnectionRegistry | null;
  private readonly maxFrameBytes: number;
  private live = true;
  private resolveClosed: () => void = () => undefined;
  private readonly lifetimeSpan: PerfSpan;
  private writeLoopDone: Promise<void> = Promise.resolve();

  public constructor(connection: ChatConnection, options: ConnectionSupervisorOptions) {
    this.connection = connection;
    const registry = options.registry;
    this.registry = registry ?? null;
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
    this.multiplexer = new SessionMultiplexer({
      connectionId: connection.id,
      store: options.store,
      aiClient: options.aiClient,
      ...(options.queueCapacity !== undefined ? { queueCapacity: options.queueCapacity } : {}),
      ...(options.turnDeadlineMs !== undefined ? { turnDeadlineMs: options.turnDeadlineMs } : {}),
      ...(options.finalizeAttempts !== undefined
        ? { finalizeAttempts: options.finalizeAttempts }
        : {}),
      ...(options.defaultLanguage !== undefined ? { defaultLanguage: options.defaultLanguage } : {}),
      ...(options.createId !== undefined ? { createId: options.createId } : {}),
      ...(options.now !== undefined ? { now: options.now } : {}),
      ...(registry !== undefined
        ? {
            forgetElsewhere: (threadId: string, reason: string) =>
              registry.cancelThread(threadId, reason),
          }
        : {}),
    });
    this.lifetimeSpan = startPerfSpan('chat.connection.lifetime', { connectionId: connection.id });
  }

  public get id(): string {
    return this.connection.id;
  }

  public isLive(): boolean {
    return this.live;
  }

  public start(): void {
    this.registry?.add(this);
    recordPerfEvent('chat.connection.open', { connectionId: this.connection.id });
    this.connection.onMessage((text) => {
      this.handleMessage(text);
    });
    this.connection.onClose((reason) => {
      this.teardown(reason);
    });
    this.writeLoopDone = this.writeLoop();
  }

  public teardown(reason: string): void {
    if (!this.live) {
      return;
    }
    this.live = false;
    this.multiplexer.close('connection_closed');
    this.registry?.remove(this.connection.id);
    this.connection.close(1000, 'closing');
    recordPerfEvent('chat.connection.closed', { connectionId: this.connection.id, reason });
    void Promise.allSettled([this.multiplexer.drain(), this.writeLoopDone]).then(() => {
      this.lifetimeSpan.end({ reason });
      this.resolveClosed();
    });
  }

  private handleMessage(text: string): void {
    if (!this.live) {
      return;
    }
    const parsed = parseInboundFrame(text, this.maxFrameBytes);
    if (!parsed.ok) {
      this.multiplexer.reportProtocolError(parsed.error);
      return;
    }
    this.multiplexer.route(parsed.frame);
  }

  private async writeLoop(): Promise<void> {
    for await (const frame of this.multiplexer.outbound()) {
      if (!this.live) {
        break;
      }
      try {
        await this.connection.send(encodeOutboundFrame(frame));
      } catch (error: unknown) {
        this.teardown(`send_failed:${errorMessage(error)}`);
        break;
      }
    }
  }
}

export function serve(
  connection: ChatConnection,
  options: ConnectionSupervisorOptions,
): ConnectionSupervisor {
  const supervisor = new ConnectionSupervisor(connection, options);
  supervisor.start();
  return supervisor;
}
