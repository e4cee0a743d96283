export type ThreadRole = 'user' | 'assistant';

export type ThreadMessage = {
  readonly role: ThreadRole;
  readonly content: string;
  readonly imageRef?: string;
  readonly timestamp: string;
};

export type PersistedTurn = {
  readonly turnId: string;
  readonly user: ThreadMessage;
  readonly assistant: ThreadMessage;
};

export type ThreadSummary = {
  readonly threadId: string;
  readonly title: string;
  readonly messageCount: number;
  readonly createdAt: string;
  readonly updatedAt: string;
};

export type AppendResult = 'appended' | 'already_exists';
export type DeleteResult = 'deleted' | 'not_found';

export interface ThreadStore {
  listThreads(): Promise<readonly ThreadSummary[]>;
  getHistory(threadId: string): Promise<readonly ThreadMessage[]>;
  hasThread(threadId: string): Promise<boolean>;
  append(threadId: string, turn: PersistedTurn): Promise<AppendResult>;
  delete(threadId: string): Promise<DeleteResult>;
}

export type AiStreamRequest = {
  readonly threadId: string;
  readonly turnId: string;
  readonly prompt: string;
  readonly history: readonly ThreadMessage[];
  readonly languageHint: string;
  readonly imageRef?: string;
};

export type AiStreamHandle = {
  readonly fragments: AsyncIterable<string>;
  abandon(): void;
};

export interface AiStreamClient {
  readonly name: string;
  startStream(request: AiStreamRequest): AiStreamHandle;
}

export type TurnState =
  | 'composing'
  | 'dispatched'
  | 'streaming'
  | 'finalizing'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type TurnTerminalState = Extract<TurnState, 'completed' | 'failed' | 'cancelled'>;

export type TurnFailureCode = 'upstream_error' | 'persistence_error' | 'deadline_exceeded';

export type TurnEvent =
  | {
      readonly type: 'fragment';
      readonly seq: number;
      readonly text: string;
    }
  | {
      readonly type: 'completed';
      readonly text: string;
    }
  | {
      readonly type: 'failed';
      readonly code: TurnFailureCode;
      readonly reason: string;
    }
  | {
      readonly type: 'cancelled';
      readonly reason: string;
    };

export type TurnResult = {
  readonly turnId: string;
  readonly threadId: string;
  readonly terminalState: TurnTerminalState;
  readonly text?: string;
  readonly failureCode?: TurnFailureCode;
};

export type TurnHandle = {
  readonly turnId: string;
  readonly threadId: string;
  state(): TurnState;
  readonly events: AsyncIterable<TurnEvent>;
  cancel(reason: string): void;
  readonly done: Promise<TurnResult>;
};

export type StartTurnInput = {
  readonly threadId: string;
  readonly turnId: string;
  readonly userMessage: ThreadMessage;
  readonly languageHint: string;
  readonly loadHistory: () => Promise<readonly ThreadMessage[]>;
  readonly aiClient: AiStreamClient;
  readonly store: ThreadStore;
  readonly deadlineMs?: number;
  readonly finalizeAttempts?: number;
  readonly now?: () => Date;
};

export const IMAGE_MESSAGE_TITLE = 'Image message';
export const THREAD_TITLE_MAX_CHARS = 30;

export function deriveThreadTitle(firstUserMessage: ThreadMessage): string {
  const trimmed = firstUserMessage.content.trim();
  if (trimmed.length === 0) {
    return IMAGE_MESSAGE_TITLE;
  }
  return trimmed.slice(0, THREAD_TITLE_MAX_CHARS);
}
