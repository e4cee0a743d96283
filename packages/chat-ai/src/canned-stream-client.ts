import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type {
  AiStreamClient,
  AiStreamHandle,
  AiStreamRequest,
} from '../../chat-core/src/index.ts';

export const cannedResponsesSchema = z.record(z.string(), z.string().min(1));

export type CannedResponses = ReadonlyMap<string, string>;

export function normalizeCannedKey(text: string): string {
  return text.trim().toLowerCase();
}

export function parseCannedResponses(input: unknown): CannedResponses {
  const parsed = cannedResponsesSchema.parse(input);
  const responses = new Map<string, string>();
  for (const [key, value] of Object.entries(parsed)) {
    const normalized = normalizeCannedKey(key);
    if (normalized.length === 0 || responses.has(normalized)) {
      continue;
    }
    responses.set(normalized, value);
  }
  return responses;
}

export function loadCannedResponses(filePath: string): CannedResponses {
  const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return parseCannedResponses(parsed);
}

/** Splits text into word-sized pieces that concatenate back to the original. */
export function splitIntoFragments(text: string): string[] {
  return text.match(/\S+\s*|\s+/gu) ?? [];
}

export function streamText(text: string): AiStreamHandle {
  let abandoned = false;
  async function* fragments(): AsyncGenerator<string, void, undefined> {
    for (const fragment of splitIntoFragments(text)) {
      if (abandoned) {
        return;
      }
      await new Promise<void>((resolve) => setImmediate(resolve));
      yield fragment;
    }
  }
  return {
    fragments: {
      [Symbol.asyncIterator]: () => fragments(),
    },
    abandon(): void {
      abandoned = true;
    },
  };
}

export function createCannedResponseClient(input: {
  readonly responses: CannedResponses;
  readonly fallback: AiStreamClient;
}): AiStreamClient {
  return {
    name: `canned+${input.fallback.name}`,
    startStream(request: AiStreamRequest): AiStreamHandle {
      const canned = input.responses.get(normalizeCannedKey(request.prompt));
      if (canned !== undefined) {
        return streamText(canned);
      }
      return input.fallback.startStream(request);
    },
  };
}

export function createEchoStreamClient(): AiStreamClient {
  return {
    name: 'echo',
    startStream(request: AiStreamRequest): AiStreamHandle {
      return streamText(`echo: ${request.prompt}`);
    },
  };
}
