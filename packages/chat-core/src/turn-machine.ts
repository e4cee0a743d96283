import type {
  AiStreamHandle,
  AppendResult,
  PersistedTurn,
  StartTurnInput,
  ThreadMessage,
  ThreadStore,
  TurnEvent,
  TurnFailureCode,
  TurnHandle,
  TurnResult,
  TurnState,
  TurnTerminalState,
} from './contracts.ts';
import { ChatError, PersistenceError, errorMessage } from './errors.ts';

export const DEFAULT_FINALIZE_ATTEMPTS = 3;
export const IMAGE_ONLY_PROMPT = 'Describe the attached image.';

type TerminalEvent = Extract<TurnEvent, { type: 'completed' | 'failed' | 'cancelled' }>;

type Raced<T> = { readonly kind: 'value'; readonly value: T } | { readonly kind: 'interrupted' };

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((innerResolve) => {
    resolve = innerResolve;
  });
  return { promise, resolve };
}

export function isTerminalTurnState(state: TurnState): state is TurnTerminalState {
  return state === 'completed' || state === 'failed' || state === 'cancelled';
}

export function composePrompt(userMessage: ThreadMessage): string {
  const trimmed = userMessage.content.trim();
  if (trimmed.length === 0 && userMessage.imageRef !== undefined) {
    return IMAGE_ONLY_PROMPT;
  }
  return trimmed;
}

/**
 * Appends a completed turn, retrying with the same turn id. A store that already holds
 * the turn answers `already_exists`, so repeating this call never duplicates messages.
 * A `ChatError` that is not retryable ends the attempts early.
 */
export async function finalizeTurn(
  store: ThreadStore,
  threadId: string,
  turn: PersistedTurn,
  attempts = DEFAULT_FINALIZE_ATTEMPTS,
): Promise<AppendResult> {
  const maxAttempts = Math.max(1, Math.floor(attempts));
  let lastError: unknown = null;
  let made = 0;
  while (made < maxAttempts) {
    made += 1;
    try {
      return await store.append(threadId, turn);
    } catch (error: unknown) {
      lastError = error;
      if (error instanceof ChatError && !error.retryable) {
        break;
      }
    }
  }
  throw new PersistenceError(
    `failed to persist turn ${turn.turnId} after ${String(made)} attempts: ${errorMessage(lastError)}`,
    lastError,
  );
}

class TurnRun implements TurnHandle {
  public readonly turnId: string;
  public readonly threadId: string;
  public readonly events: AsyncIterable<TurnEvent>;
  public readonly done: Promise<TurnResult>;

  private currentState: TurnState = 'composing';
  private interruption: TerminalEvent | null = null;
  private readonly interrupted = deferred<void>();
  private readonly settled = deferred<TurnResult>();
  private result: TurnResult | null = null;
  private streamHandle: AiStreamHandle | null = null;
  private abandoned = false;
  private deadlineTimer: ReturnType<typeof setTimeout> | null = null;
  private eventsTaken = false;
  private readonly now: () => Date;

  public constructor(private readonly input: StartTurnInput) {
    this.turnId = input.turnId;
    this.threadId = input.threadId;
    this.now = input.now ?? (() => new Date());
    this.done = this.settled.promise;
    this.events = {
      [Symbol.asyncIterator]: () => this.takeEvents(),
    };
    if (input.deadlineMs !== undefined && input.deadlineMs > 0) {
      this.deadlineTimer = setTimeout(() => {
        this.deadlineTimer = null;
        this.interrupt(
          {
            type: 'failed',
            code: 'deadline_exceeded',
            reason: `turn exceeded deadline of ${String(input.deadlineMs)}ms`,
          },
          'failed',
        );
      }, input.deadlineMs);
      this.deadlineTimer.unref();
    }
  }

  public state(): TurnState {
    return this.currentState;
  }

  public cancel(reason: string): void {
    this.interrupt({ type: 'cancelled', reason }, 'cancelled');
  }

  private takeEvents(): AsyncIterator<TurnEvent> {
    if (this.eventsTaken) {
      throw new Error(`turn events already consumed: ${this.turnId}`);
    }
    this.eventsTaken = true;
    return this.run();
  }

  private interrupt(event: TerminalEvent, state: TurnTerminalState): void {
    if (isTerminalTurnState(this.currentState) || this.currentState === 'finalizing') {
      return;
    }
    this.interruption = event;
    this.clearDeadline();
    this.abandonStream();
    this.settle(state, event.type === 'failed' ? { failureCode: event.code } : {});
    this.interrupted.resolve();
  }

  private abandonStream(): void {
    if (this.streamHandle === null || this.abandoned) {
      return;
    }
    this.abandoned = true;
    this.streamHandle.abandon();
  }

  private clearDeadline(): void {
    if (this.deadlineTimer !== null) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = null;
    }
  }

  private settle(
    terminalState: TurnTerminalState,
    extra: { text?: string; failureCode?: TurnFailureCode },
  ): void {
    if (this.result !== null) {
      return;
    }
    this.currentState = terminalState;
    this.clearDeadline();
    this.result = {
      turnId: this.turnId,
      threadId: this.threadId,
      terminalState,
      ...(extra.text !== undefined ? { text: extra.text } : {}),
      ...(extra.failureCode !== undefined ? { failureCode: extra.failureCode } : {}),
    };
    this.settled.resolve(this.result);
  }

  private fail(code: TurnFailureCode, reason: string): TerminalEvent {
    if (this.currentState === 'dispatched' || this.currentState === 'streaming') {
      this.abandonStream();
    }
    this.settle('failed', { failureCode: code });
    return { type: 'failed', code, reason };
  }

  private async race<T>(promise: Promise<T>): Promise<Raced<T>> {
    if (this.interruption !== null) {
      return { kind: 'interrupted' };
    }
    return await Promise.race([
      promise.then((value): Raced<T> => ({ kind: 'value', value })),
      this.interrupted.promise.then((): Raced<T> => ({ kind: 'interrupted' })),
    ]);
  }

  private async *run(): AsyncGenerator<TurnEvent, void, undefined> {
    try {
      yield* this.drive();
    } finally {
      // A consumer that stops pulling before the terminal event ends the turn.
      if (this.result === null && this.currentState !== 'finalizing') {
        this.cancel('consumer_closed');
      }
    }
  }

  private async *drive(): AsyncGenerator<TurnEvent, void, undefined> {
    let history: readonly ThreadMessage[];
    try {
      const raced = await this.race(this.input.loadHistory());
      if (raced.kind === 'interrupted') {
        yield* this.emitInterruption();
        return;
      }
      history = raced.value;
    } catch (error: unknown) {
      if (this.interruption !== null) {
        yield* this.emitInterruption();
        return;
      }
      yield this.fail('persistence_error', `failed to load thread history: ${errorMessage(error)}`);
      return;
    }
    if (this.interruption !== null) {
      yield* this.emitInterruption();
      return;
    }

    this.currentState = 'dispatched';
    let iterator: AsyncIterator<string>;
    try {
      this.streamHandle = this.input.aiClient.startStream({
        threadId: this.threadId,
        turnId: this.turnId,
        prompt: composePrompt(this.input.userMessage),
        history,
        languageHint: this.input.languageHint,
        ...(this.input.userMessage.imageRef !== undefined
          ? { imageRef: this.input.userMessage.imageRef }
          : {}),
      });
      iterator = this.streamHandle.fragments[Symbol.asyncIterator]();
    } catch (error: unknown) {
      yield this.fail('upstream_error', errorMessage(error));
      return;
    }

    this.currentState = 'streaming';
    const fragments: string[] = [];
    let seq = 0;
    while (true) {
      let step: IteratorResult<string>;
      try {
        const raced = await this.race(iterator.next());
        if (raced.kind === 'interrupted') {
          yield* this.emitInterruption();
          return;
        }
        step = raced.value;
      } catch (error: unknown) {
        if (this.interruption !== null) {
          yield* this.emitInterruption();
          return;
        }
        yield this.fail('upstream_error', errorMessage(error));
        return;
      }
      if (this.interruption !== null) {
        yield* this.emitInterruption();
        return;
      }
      if (step.done === true) {
        break;
      }
      fragments.push(step.value);
      yield { type: 'fragment', seq, text: step.value };
      seq += 1;
      if (this.interruption !== null) {
        yield* this.emitInterruption();
        return;
      }
    }

    this.currentState = 'finalizing';
    this.clearDeadline();
    const text = fragments.join('');
    const turn: PersistedTurn = {
      turnId: this.turnId,
      user: this.input.userMessage,
      assistant: {
        role: 'assistant',
        content: text,
        timestamp: this.now().toISOString(),
      },
    };
    try {
      await finalizeTurn(
        this.input.store,
        this.threadId,
        turn,
        this.input.finalizeAttempts ?? DEFAULT_FINALIZE_ATTEMPTS,
      );
    } catch (error: unknown) {
      yield this.fail('persistence_error', errorMessage(error));
      return;
    }
    this.settle('completed', { text });
    yield { type: 'completed', text };
  }

  private async *emitInterruption(): AsyncGenerator<TurnEvent, void, undefined> {
    if (this.interruption !== null) {
      yield this.interruption;
    }
  }
}

export function startTurn(input: StartTurnInput): TurnHandle {
  return new TurnRun(input);
}
