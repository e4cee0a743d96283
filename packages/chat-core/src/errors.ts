export type ChatErrorKind = 'protocol' | 'conflict' | 'upstream' | 'persistence' | 'connection';

export class ChatError extends Error {
  public readonly kind: ChatErrorKind;
  public readonly retryable: boolean;

  public constructor(
    kind: ChatErrorKind,
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ChatError';
    this.kind = kind;
    this.retryable = options.retryable ?? false;
  }
}

export class ProtocolError extends ChatError {
  public readonly code: string;
  public readonly threadId: string | null;

  public constructor(code: string, message: string, threadId: string | null = null) {
    super('protocol', message);
    this.name = 'ProtocolError';
    this.code = code;
    this.threadId = threadId;
  }
}

export class ConflictError extends ChatError {
  public readonly threadId: string;

  public constructor(threadId: string, message = 'a turn is already in progress for this thread') {
    super('conflict', message);
    this.name = 'ConflictError';
    this.threadId = threadId;
  }
}

export class UpstreamError extends ChatError {
  public readonly status: number | null;

  public constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('upstream', message, {
      retryable: options.status === undefined || options.status >= 500 || options.status === 429,
      ...(options.cause !== undefined ? { cause: options.cause } : {}),
    });
    this.name = 'UpstreamError';
    this.status = options.status ?? null;
  }
}

export class PersistenceError extends ChatError {
  public constructor(message: string, cause?: unknown) {
    super('persistence', message, {
      retryable: true,
      ...(cause !== undefined ? { cause } : {}),
    });
    this.name = 'PersistenceError';
  }
}

export class ConnectionError extends ChatError {
  public constructor(message: string, cause?: unknown) {
    super('connection', message, cause !== undefined ? { cause } : {});
    this.name = 'ConnectionError';
  }
}

export function asError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  if (value === null || value === undefined) {
    return new Error('unknown error');
  }
  return new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return asError(value).message;
}
