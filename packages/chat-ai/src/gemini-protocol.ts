import type { ThreadMessage } from '../../chat-core/src/index.ts';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';
export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';

export interface GeminiInlineImage {
  readonly mimeType: string;
  readonly data: string;
}

type GeminiPart = { readonly text: string } | { readonly inlineData: GeminiInlineImage };

export interface GeminiContent {
  readonly role: 'user' | 'model';
  readonly parts: readonly GeminiPart[];
}

export interface GeminiStreamRequestBody {
  readonly systemInstruction: { readonly parts: readonly GeminiPart[] };
  readonly contents: readonly GeminiContent[];
}

/** Finish reasons that cut a response short instead of ending it normally. */
export const GEMINI_ABORTIVE_FINISH_REASONS: ReadonlySet<string> = new Set([
  'SAFETY',
  'RECITATION',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
]);

export interface GeminiStreamChunk {
  readonly texts: readonly string[];
  readonly finishReason: string | null;
  readonly blockReason: string | null;
  readonly error: { readonly code: number | null; readonly message: string } | null;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function asNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function languageInstruction(languageHint: string): string {
  return `Respond in ${languageHint}.`;
}

export function buildGeminiRequestBody(input: {
  readonly history: readonly ThreadMessage[];
  readonly prompt: string;
  readonly languageHint: string;
  readonly image?: GeminiInlineImage;
}): GeminiStreamRequestBody {
  const merged: Array<{ role: 'user' | 'model'; parts: GeminiPart[] }> = [];
  const pushTurn = (role: 'user' | 'model', parts: GeminiPart[]): void => {
    if (parts.length === 0) {
      return;
    }
    const previous = merged[merged.length - 1];
    if (previous !== undefined && previous.role === role) {
      previous.parts.push(...parts);
      return;
    }
    merged.push({ role, parts });
  };

  for (const message of input.history) {
    const role = message.role === 'assistant' ? 'model' : 'user';
    pushTurn(role, message.content.length > 0 ? [{ text: message.content }] : []);
  }

  const current: GeminiPart[] = [];
  if (input.prompt.length > 0) {
    current.push({ text: input.prompt });
  }
  if (input.image !== undefined) {
    current.push({ inlineData: input.image });
  }
  pushTurn('user', current);

  const first = merged[0];
  if (first !== undefined && first.role === 'model') {
    merged.unshift({ role: 'user', parts: [{ text: '(conversation continues)' }] });
  }

  return {
    systemInstruction: { parts: [{ text: languageInstruction(input.languageHint) }] },
    contents: merged,
  };
}

export function parseGeminiStreamChunk(value: unknown): GeminiStreamChunk | null {
  const record = asRecord(value);
  if (record === null) {
    return null;
  }

  const errorRecord = asRecord(record['error']);
  if (errorRecord !== null) {
    return {
      texts: [],
      finishReason: null,
      blockReason: null,
      error: {
        code: asNumber(errorRecord['code']),
        message: asString(errorRecord['message']) ?? 'gemini stream error',
      },
    };
  }

  const feedback = asRecord(record['promptFeedback']);
  const blockReason = feedback === null ? null : asString(feedback['blockReason']);

  const texts: string[] = [];
  let finishReason: string | null = null;
  const candidates = record['candidates'];
  if (candidates !== undefined && !Array.isArray(candidates)) {
    return null;
  }
  const firstCandidate = asRecord(Array.isArray(candidates) ? candidates[0] : undefined);
  if (firstCandidate !== null) {
    finishReason = asString(firstCandidate['finishReason']);
    const content = asRecord(firstCandidate['content']);
    const parts = content === null ? undefined : content['parts'];
    if (Array.isArray(parts)) {
      for (const part of parts) {
        const text = asString(asRecord(part)?.['text']);
        if (text !== null) {
          texts.push(text);
        }
      }
    }
  }

  return {
    texts,
    finishReason,
    blockReason,
    error: null,
  };
}
