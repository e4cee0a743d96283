import { randomUUID } from 'node:crypto';
import {
  BoundedAsyncQueue,
  ConflictError,
  errorMessage,
  startTurn,
  type AiStreamClient,
  type ProtocolError,
  type ThreadMessage,
  type ThreadStore,
  type TurnHandle,
} from '../../packages/chat-core/src/index.ts';
import { recordPerfEvent } from '../perf/perf-core.ts';
import {
  protocolErrorFrame,
  rejectedFrame,
  turnEventFrame,
  type InboundFrame,
  type OutboundFrame,
  type RejectionCode,
} from './chat-protocol.ts';

export const DEFAULT_OUTBOUND_QUEUE_CAPACITY = 256;
export const DEFAULT_LANGUAGE = 'English';

export interface SessionMultiplexerOptions {
  readonly connectionId: string;
  readonly store: ThreadStore;
  readonly aiClient: AiStreamClient;
  readonly queueCapacity?: number;
  readonly turnDeadlineMs?: number | null;
  readonly finalizeAttempts?: number;
  readonly defaultLanguage?: string;
  readonly createId?: () => string;
  readonly now?: () => Date;
  /**
   * Cancels and tombstones the thread on the other live connections before a delete reaches
   * the store. Resolves with the number of turns it cancelled.
   */
  readonly forgetElsewhere?: (threadId: string, reason: string) => Promise<number>;
}

interface ActiveTurnEntry {
  readonly threadId: string;
  handle: TurnHandle | null;
  cancelReason: string | null;
  readonly released: Promise<void>;
  readonly release: () => void;
}

function createEntry(threadId: string): ActiveTurnEntry {
  let release: () => void = () => undefined;
  const released = new Promise<void>((resolve) => {
    release = resolve;
  });
  return {
    threadId,
    handle: null,
    cancelReason: null,
    released,
    release,
  };
}

/**
 * Routes the frames of one connection to per-thread turns and merges every turn's events
 * into a single bounded outbound queue. A thread has at most one active turn; the slot is
 * claimed synchronously inside `route`, before anything is awaited.
 */
export class SessionMultiplexer {
  public readonly connectionId: string;

  private readonly store: ThreadStore;
  private readonly aiClient: AiStreamClient;
  private readonly queue: BoundedAsyncQueue<OutboundFrame>;
  private readonly turnDeadlineMs: number | null;
  private readonly finalizeAttempts: number | undefined;
  private readonly defaultLanguage: string;
  private readonly createId: () => string;
  private readonly now: () => Date;
  private readonly forgetElsewhere: ((threadId: string, reason: string) => Promise<number>) | null;
  private readonly activeTurns = new Map<string, ActiveTurnEntry>();
  private readonly touchedThreads = new Set<string>();
  private readonly tombstones = new Set<string>();
  private readonly tasks = new Set<Promise<void>>();
  private closed = false;

  public constructor(options: SessionMultiplexerOptions) {
    this.connectionId = options.connectionId;
    this.store = options.store;
    this.aiClient = options.aiClient;
    this.queue = new BoundedAsyncQueue<OutboundFrame>(
      options.queueCapacity ?? DEFAULT_OUTBOUND_QUEUE_CAPACITY,
    );
    this.turnDeadlineMs = options.turnDeadlineMs ?? null;
    this.finalizeAttempts = options.finalizeAttempts;
    this.defaultLanguage = options.defaultLanguage ?? DEFAULT_LANGUAGE;
    this.createId = options.createId ?? (() => randomUUID());
    this.now = options.now ?? (() => new Date());
    this.forgetElsewhere = options.forgetElsewhere ?? null;
  }

  public outbound(): AsyncIterable<OutboundFrame> {
    return this.queue;
  }

  public activeThreadIds(): readonly string[] {
    return [...this.activeTurns.keys()];
  }

  public touchedThreadIds(): readonly string[] {
    return [...this.touchedThreads];
  }

  public isTombstoned(threadId: string): boolean {
    return this.tombstones.has(threadId);
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public route(frame: InboundFrame): void {
    if (this.closed) {
      return;
    }
    if (frame.delete === true) {
      if (frame.thread_id !== undefined) {
        this.routeDelete(frame.thread_id, frame.request_id);
      }
      return;
    }

    const requestedThreadId = frame.thread_id;
    if (requestedThreadId === undefined) {
      const threadId = this.createId();
      this.touchedThreads.add(threadId);
      const entry = this.claim(threadId);
      this.beginTurn(entry, frame);
      return;
    }

    if (this.tombstones.has(requestedThreadId)) {
      this.reject(requestedThreadId, 'thread_deleted', 'thread was deleted', frame.request_id);
      return;
    }
    if (this.activeTurns.has(requestedThreadId)) {
      const conflict = new ConflictError(requestedThreadId);
      recordPerfEvent('chat.session.turn.conflict', {
        connectionId: this.connectionId,
        threadId: conflict.threadId,
      });
      this.reject(conflict.threadId, 'turn_in_progress', conflict.message, frame.request_id);
      return;
    }

    const entry = this.claim(requestedThreadId);
    if (this.touchedThreads.has(requestedThreadId)) {
      this.beginTurn(entry, frame);
      return;
    }
    this.track(this.admitStoredThread(entry, frame));
  }

  public reportProtocolError(error: ProtocolError): void {
    if (this.closed) {
      return;
    }
    recordPerfEvent('chat.session.protocol-error', {
      connectionId: this.connectionId,
      code: error.code,
    });
    this.emit(protocolErrorFrame(error));
  }

  /** Tombstones the thread for this session and cancels its active turn, if any. */
  public forgetThread(threadId: string, reason: string): Promise<void> {
    this.tombstones.add(threadId);
    const entry = this.activeTurns.get(threadId);
    if (entry === undefined) {
      return Promise.resolve();
    }
    this.cancelEntry(entry, reason);
    return entry.released;
  }

  public cancelThread(threadId: string, reason: string): boolean {
    const entry = this.activeTurns.get(threadId);
    if (entry === undefined) {
      return false;
    }
    this.cancelEntry(entry, reason);
    return true;
  }

  /** Cancels every active turn and releases the outbound queue. Safe to call repeatedly. */
  public close(reason = 'connection_closed'): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const entry of this.activeTurns.values()) {
      this.cancelEntry(entry, reason);
    }
    this.queue.close();
  }

  public async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  private claim(threadId: string): ActiveTurnEntry {
    const entry = createEntry(threadId);
    this.activeTurns.set(threadId, entry);
    return entry;
  }

  private releaseEntry(entry: ActiveTurnEntry): void {
    if (this.activeTurns.get(entry.threadId) === entry) {
      this.activeTurns.delete(entry.threadId);
    }
    entry.release();
  }

  private cancelEntry(entry: ActiveTurnEntry, reason: string): void {
    if (entry.handle !== null) {
      entry.handle.cancel(reason);
      return;
    }
    entry.cancelReason ??= reason;
  }

  private reject(
    threadId: string,
    code: RejectionCode,
    message: string,
    requestId: string | undefined,
  ): void {
    this.emit(rejectedFrame({ threadId, code, message, requestId }));
  }

  private emit(frame: OutboundFrame): void {
    if (this.queue.offer(frame)) {
      return;
    }
    this.track(this.queue.push(frame).then(() => undefined));
  }

  private track(task: Promise<void>): void {
    const tracked = task.catch((error: unknown) => {
      recordPerfEvent('chat.session.task.error', {
        connectionId: this.connectionId,
        error: errorMessage(error),
      });
    });
    this.tasks.add(tracked);
    void tracked.finally(() => {
      this.tasks.delete(tracked);
    });
  }

  private async admitStoredThread(entry: ActiveTurnEntry, frame: InboundFrame): Promise<void> {
    let exists: boolean;
    try {
      exists = await this.store.hasThread(entry.threadId);
    } catch (error: unknown) {
      this.releaseEntry(entry);
      recordPerfEvent('chat.session.store.error', {
        connectionId: this.connectionId,
        threadId: entry.threadId,
        error: errorMessage(error),
      });
      this.emit({
        thread_id: entry.threadId,
        kind: 'failed',
        payload: `failed to look up thread: ${errorMessage(error)}`,
        code: 'persistence_error',
        ...(frame.request_id !== undefined ? { request_id: frame.request_id } : {}),
      });
      return;
    }
    if (!exists) {
      this.releaseEntry(entry);
      this.reject(entry.threadId, 'thread_not_found', 'unknown thread', frame.request_id);
      return;
    }
    this.touchedThreads.add(entry.threadId);
    this.beginTurn(entry, frame);
  }

  private beginTurn(entry: ActiveTurnEntry, frame: InboundFrame): void {
    if (this.closed || entry.cancelReason !== null) {
      this.releaseEntry(entry);
      if (this.tombstones.has(entry.threadId)) {
        this.reject(entry.threadId, 'thread_deleted', 'thread was deleted', frame.request_id);
      }
      return;
    }
    const threadId = entry.threadId;
    const turnId = this.createId();
    const userMessage: ThreadMessage = {
      role: 'user',
      content: frame.text,
      ...(frame.image_ref !== undefined ? { imageRef: frame.image_ref } : {}),
      timestamp: this.now().toISOString(),
    };
    const handle = startTurn({
      threadId,
      turnId,
      userMessage,
      languageHint: frame.language ?? this.defaultLanguage,
      loadHistory: () => this.store.getHistory(threadId),
      aiClient: this.aiClient,
      store: this.store,
      now: this.now,
      ...(this.turnDeadlineMs !== null ? { deadlineMs: this.turnDeadlineMs } : {}),
      ...(this.finalizeAttempts !== undefined ? { finalizeAttempts: this.finalizeAttempts } : {}),
    });
    entry.handle = handle;
    recordPerfEvent('chat.turn.started', {
      connectionId: this.connectionId,
      threadId,
      turnId,
      aiClient: this.aiClient.name,
    });
    this.track(this.pump(entry, handle, frame.request_id));
  }

  private async pump(
    entry: ActiveTurnEntry,
    handle: TurnHandle,
    requestId: string | undefined,
  ): Promise<void> {
    try {
      const accepted = await this.queue.push({
        thread_id: handle.threadId,
        kind: 'accepted',
        payload: '',
        turn_id: handle.turnId,
        ...(requestId !== undefined ? { request_id: requestId } : {}),
      });
      if (!accepted) {
        handle.cancel('connection_closed');
        return;
      }
      for await (const event of handle.events) {
        if (event.type === 'fragment') {
          recordPerfEvent('chat.turn.fragment', {
            threadId: handle.threadId,
            turnId: handle.turnId,
            seq: event.seq,
          });
        } else {
          this.releaseEntry(entry);
          recordPerfEvent('chat.turn.terminal', {
            connectionId: this.connectionId,
            threadId: handle.threadId,
            turnId: handle.turnId,
            state: event.type,
            ...(event.type === 'failed' ? { code: event.code } : {}),
          });
        }
        const pushed = await this.queue.push(turnEventFrame(handle.threadId, handle.turnId, event));
        if (!pushed) {
          break;
        }
      }
    } finally {
      this.releaseEntry(entry);
    }
  }

  private routeDelete(threadId: string, requestId: string | undefined): void {
    if (this.tombstones.has(threadId)) {
      this.reject(threadId, 'thread_deleted', 'thread was already deleted', requestId);
      return;
    }
    const touched = this.touchedThreads.has(threadId);
    const settled = this.forgetThread(threadId, 'thread_deleted');
    const elsewhere =
      this.forgetElsewhere === null
        ? Promise.resolve(0)
        : this.forgetElsewhere(threadId, 'thread_deleted');
    this.track(this.completeDelete(threadId, touched, settled, elsewhere, requestId));
  }

  private async completeDelete(
    threadId: string,
    touched: boolean,
    settled: Promise<void>,
    elsewhere: Promise<number>,
    requestId: string | undefined,
  ): Promise<void> {
    // Every other connection's turn must be over, or its finalize would recreate the thread.
    const [, cancelledElsewhere] = await Promise.all([settled, elsewhere]);
    const requestFields = requestId !== undefined ? { request_id: requestId } : {};
    try {
      const result = await this.store.delete(threadId);
      recordPerfEvent('chat.thread.deleted', {
        connectionId: this.connectionId,
        threadId,
        result,
      });
      if (result === 'not_found' && !touched && cancelledElsewhere === 0) {
        this.reject(threadId, 'thread_not_found', 'unknown thread', requestId);
        return;
      }
      this.emit({ thread_id: threadId, kind: 'deleted', payload: '', ...requestFields });
    } catch (error: unknown) {
      recordPerfEvent('chat.session.store.error', {
        connectionId: this.connectionId,
        threadId,
        error: errorMessage(error),
      });
      this.emit({
        thread_id: threadId,
        kind: 'failed',
        payload: `failed to delete thread: ${errorMessage(error)}`,
        code: 'persistence_error',
        ...requestFields,
      });
    }
  }
}
