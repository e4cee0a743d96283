import {
  deriveThreadTitle,
  type AppendResult,
  type DeleteResult,
  type PersistedTurn,
  type ThreadMessage,
  type ThreadRole,
  type ThreadStore,
  type ThreadSummary,
} from './contracts.ts';
import { PersistenceError, errorMessage } from './errors.ts';
import { SqliteDatabase } from './sqlite.ts';

type InMemoryThread = {
  title: string;
  createdAt: string;
  updatedAt: string;
  readonly messages: ThreadMessage[];
  readonly turnIds: Set<string>;
};

function compareSummaries(left: ThreadSummary, right: ThreadSummary): number {
  if (left.updatedAt !== right.updatedAt) {
    return left.updatedAt < right.updatedAt ? 1 : -1;
  }
  if (left.createdAt !== right.createdAt) {
    return left.createdAt < right.createdAt ? 1 : -1;
  }
  return left.threadId.localeCompare(right.threadId);
}

export class InMemoryThreadStore implements ThreadStore {
  private readonly threads = new Map<string, InMemoryThread>();

  public async listThreads(): Promise<readonly ThreadSummary[]> {
    const summaries: ThreadSummary[] = [];
    for (const [threadId, thread] of this.threads) {
      summaries.push({
        threadId,
        title: thread.title,
        messageCount: thread.messages.length,
        createdAt: thread.createdAt,
        updatedAt: thread.updatedAt,
      });
    }
    return summaries.sort(compareSummaries);
  }

  public async getHistory(threadId: string): Promise<readonly ThreadMessage[]> {
    return [...(this.threads.get(threadId)?.messages ?? [])];
  }

  public async hasThread(threadId: string): Promise<boolean> {
    return this.threads.has(threadId);
  }

  public async append(threadId: string, turn: PersistedTurn): Promise<AppendResult> {
    let thread = this.threads.get(threadId);
    if (thread === undefined) {
      thread = {
        title: deriveThreadTitle(turn.user),
        createdAt: turn.user.timestamp,
        updatedAt: turn.assistant.timestamp,
        messages: [],
        turnIds: new Set<string>(),
      };
      this.threads.set(threadId, thread);
    }
    if (thread.turnIds.has(turn.turnId)) {
      return 'already_exists';
    }
    thread.turnIds.add(turn.turnId);
    thread.messages.push(turn.user, turn.assistant);
    thread.updatedAt = turn.assistant.timestamp;
    return 'appended';
  }

  public async delete(threadId: string): Promise<DeleteResult> {
    return this.threads.delete(threadId) ? 'deleted' : 'not_found';
  }
}

const THREAD_STORE_SCHEMA_VERSION = 1;

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    throw new Error('expected sqlite row object');
  }
  return Object.fromEntries(Object.entries(value));
}

function asString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new Error(`expected string for ${field}`);
  }
  return value;
}

function asStringOrUndefined(value: unknown, field: string): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  return asString(value, field);
}

function asNonNegativeInteger(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`expected non-negative integer for ${field}`);
  }
  return value;
}

function asRole(value: unknown): ThreadRole {
  if (value === 'user' || value === 'assistant') {
    return value;
  }
  throw new Error(`expected message role, got ${String(value)}`);
}

function parseMessageRow(row: unknown): ThreadMessage {
  const value = asRecord(row);
  const imageRef = asStringOrUndefined(value['image_ref'], 'image_ref');
  return {
    role: asRole(value['role']),
    content: asString(value['content'], 'content'),
    ...(imageRef !== undefined ? { imageRef } : {}),
    timestamp: asString(value['timestamp'], 'timestamp'),
  };
}

function parseSummaryRow(row: unknown): ThreadSummary {
  const value = asRecord(row);
  return {
    threadId: asString(value['thread_id'], 'thread_id'),
    title: asString(value['title'], 'title'),
    messageCount: asNonNegativeInteger(value['message_count'], 'message_count'),
    createdAt: asString(value['created_at'], 'created_at'),
    updatedAt: asString(value['updated_at'], 'updated_at'),
  };
}

export class SqliteThreadStore implements ThreadStore {
  private readonly db: SqliteDatabase;

  public constructor(filePath = ':memory:') {
    this.db = new SqliteDatabase(filePath);
    this.configureConnection();
    this.initializeSchema();
  }

  public close(): void {
    this.db.close();
  }

  public async listThreads(): Promise<readonly ThreadSummary[]> {
    return this.guard('list threads', () => {
      const rows = this.db
        .prepare(
          `
        SELECT
          t.thread_id,
          t.title,
          t.created_at,
          t.updated_at,
          (SELECT COUNT(*) FROM thread_messages m WHERE m.thread_id = t.thread_id) AS message_count
        FROM threads t
        ORDER BY t.updated_at DESC, t.created_at DESC, t.thread_id ASC
      `,
        )
        .all();
      return rows.map((row) => parseSummaryRow(row));
    });
  }

  public async getHistory(threadId: string): Promise<readonly ThreadMessage[]> {
    return this.guard('read thread history', () => {
      const rows = this.db
        .prepare(
          `
        SELECT role, content, image_ref, timestamp
        FROM thread_messages
        WHERE thread_id = ?
        ORDER BY position ASC
      `,
        )
        .all(threadId);
      return rows.map((row) => parseMessageRow(row));
    });
  }

  public async hasThread(threadId: string): Promise<boolean> {
    return this.guard('look up thread', () => {
      const row = this.db
        .prepare('SELECT thread_id FROM threads WHERE thread_id = ? LIMIT 1')
        .get(threadId);
      return row !== undefined;
    });
  }

  public async append(threadId: string, turn: PersistedTurn): Promise<AppendResult> {
    return this.guard('append turn', () =>
      this.db.transaction((): AppendResult => {
        this.db
          .prepare(
            `
          INSERT OR IGNORE INTO threads (thread_id, title, created_at, updated_at)
          VALUES (?, ?, ?, ?)
        `,
          )
          .run(threadId, deriveThreadTitle(turn.user), turn.user.timestamp, turn.assistant.timestamp);
        const inserted = this.db
          .prepare(
            `
          INSERT OR IGNORE INTO thread_turns (thread_id, turn_id, finalized_at)
          VALUES (?, ?, ?)
        `,
          )
          .run(threadId, turn.turnId, turn.assistant.timestamp);
        if (inserted.changes === 0) {
          return 'already_exists';
        }
        const insertMessage = this.db.prepare(
          `
          INSERT INTO thread_messages (thread_id, turn_id, role, content, image_ref, timestamp)
          VALUES (?, ?, ?, ?, ?, ?)
        `,
        );
        for (const message of [turn.user, turn.assistant]) {
          insertMessage.run(
            threadId,
            turn.turnId,
            message.role,
            message.content,
            message.imageRef ?? null,
            message.timestamp,
          );
        }
        this.db
          .prepare('UPDATE threads SET updated_at = ? WHERE thread_id = ?')
          .run(turn.assistant.timestamp, threadId);
        return 'appended';
      }),
    );
  }

  public async delete(threadId: string): Promise<DeleteResult> {
    return this.guard('delete thread', () => {
      const result = this.db.prepare('DELETE FROM threads WHERE thread_id = ?').run(threadId);
      return result.changes > 0 ? 'deleted' : 'not_found';
    });
  }

  private guard<T>(operation: string, body: () => T): T {
    try {
      return body();
    } catch (error: unknown) {
      throw new PersistenceError(`failed to ${operation}: ${errorMessage(error)}`, error);
    }
  }

  private configureConnection(): void {
    this.db.exec('PRAGMA journal_mode = WAL;');
    this.db.exec('PRAGMA synchronous = NORMAL;');
    this.db.exec('PRAGMA busy_timeout = 2000;');
    this.db.exec('PRAGMA foreign_keys = ON;');
  }

  private initializeSchema(): void {
    this.db.transaction(() => {
      const currentVersion = this.readSchemaVersion();
      if (currentVersion > THREAD_STORE_SCHEMA_VERSION) {
        throw new Error(
          `thread store schema version ${String(currentVersion)} is newer than supported version ${String(THREAD_STORE_SCHEMA_VERSION)}`,
        );
      }
      if (currentVersion < 1) {
        this.applySchemaV1();
      }
      this.db.exec(`PRAGMA user_version = ${String(THREAD_STORE_SCHEMA_VERSION)};`);
    });
  }

  private applySchemaV1(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS threads (
        thread_id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_threads_updated_at
      ON threads (updated_at DESC);
    `);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS thread_turns (
        thread_id TEXT NOT NULL,
        turn_id TEXT NOT NULL,
        finalized_at TEXT NOT NULL,
        PRIMARY KEY (thread_id, turn_id),
        FOREIGN KEY (thread_id) REFERENCES threads(thread_id) ON DELETE CASCADE
      );
    `);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS thread_messages (
        position INTEGER PRIMARY KEY AUTOINCREMENT,
        thread_id TEXT NOT NULL,
        turn_id TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        image_ref TEXT,
        timestamp TEXT NOT NULL,
        FOREIGN KEY (thread_id) REFERENCES threads(thread_id) ON DELETE CASCADE
      );
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_thread_messages_thread
      ON thread_messages (thread_id, position);
    `);
  }

  private readSchemaVersion(): number {
    const row = this.db.prepare('PRAGMA user_version;').get();
    if (row === undefined) {
      throw new Error('failed to read thread store schema version');
    }
    const version = asRecord(row)['user_version'];
    if (typeof version !== 'number' || !Number.isInteger(version) || version < 0) {
      throw new Error(`invalid thread store schema version value: ${String(version)}`);
    }
    return version;
  }
}
