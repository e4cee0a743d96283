import {
  UpstreamError,
  errorMessage,
  type AiStreamClient,
  type AiStreamHandle,
  type AiStreamRequest,
} from '../../chat-core/src/index.ts';
import {
  DEFAULT_GEMINI_BASE_URL,
  DEFAULT_GEMINI_MODEL,
  GEMINI_ABORTIVE_FINISH_REASONS,
  buildGeminiRequestBody,
  parseGeminiStreamChunk,
  type GeminiInlineImage,
} from './gemini-protocol.ts';
import { readSseEvents } from './sse.ts';

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type ImageResolver = (imageRef: string) => Promise<GeminiInlineImage | null>;

export interface GeminiStreamClientOptions {
  readonly apiKey: string;
  readonly model?: string;
  readonly baseUrl?: string;
  readonly requestTimeoutMs?: number;
  readonly resolveImage?: ImageResolver;
  readonly fetch?: FetchLike;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;
const MAX_ERROR_DETAIL_CHARS = 200;

export function geminiStreamEndpoint(baseUrl: string, model: string): string {
  const base = baseUrl.replace(/\/+$/u, '');
  return `${base}/v1beta/models/${encodeURIComponent(model)}:streamGenerateContent?alt=sse`;
}

export function createGeminiStreamClient(options: GeminiStreamClientOptions): AiStreamClient {
  const model = options.model ?? DEFAULT_GEMINI_MODEL;
  const endpoint = geminiStreamEndpoint(options.baseUrl ?? DEFAULT_GEMINI_BASE_URL, model);
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  async function* streamFragments(
    request: AiStreamRequest,
    controller: AbortController,
  ): AsyncGenerator<string, void, undefined> {
    const image =
      request.imageRef !== undefined && options.resolveImage !== undefined
        ? await options.resolveImage(request.imageRef)
        : null;
    const body = buildGeminiRequestBody({
      history: request.history,
      prompt: request.prompt,
      languageHint: request.languageHint,
      ...(image !== null ? { image } : {}),
    });

    const timer = setTimeout(() => {
      controller.abort();
    }, timeoutMs);
    timer.unref();
    try {
      let response: Response;
      try {
        response = await fetchImpl(endpoint, {
          method: 'POST',
          headers: {
            'content-type': 'application/json',
            'x-goog-api-key': options.apiKey,
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error: unknown) {
        throw new UpstreamError(`gemini request failed: ${errorMessage(error)}`, { cause: error });
      }

      if (!response.ok) {
        const detail = await response
          .text()
          .catch((error: unknown) => `unreadable body: ${errorMessage(error)}`);
        throw new UpstreamError(
          `gemini responded ${String(response.status)}: ${detail.slice(0, MAX_ERROR_DETAIL_CHARS)}`,
          { status: response.status },
        );
      }
      if (response.body === null) {
        throw new UpstreamError('gemini response had no body');
      }

      for await (const event of readSseEvents(response.body)) {
        if (event.data === '[DONE]') {
          break;
        }
        let parsed: unknown;
        try {
          parsed = JSON.parse(event.data);
        } catch (error: unknown) {
          throw new UpstreamError('malformed gemini stream event', { cause: error });
        }
        const chunk = parseGeminiStreamChunk(parsed);
        if (chunk === null) {
          throw new UpstreamError('malformed gemini stream event');
        }
        if (chunk.error !== null) {
          throw new UpstreamError(
            `gemini stream error: ${chunk.error.message}`,
            chunk.error.code !== null ? { status: chunk.error.code } : {},
          );
        }
        if (chunk.blockReason !== null) {
          throw new UpstreamError(`gemini blocked the prompt: ${chunk.blockReason}`);
        }
        for (const text of chunk.texts) {
          if (text.length > 0) {
            yield text;
          }
        }
        if (chunk.finishReason !== null && GEMINI_ABORTIVE_FINISH_REASONS.has(chunk.finishReason)) {
          throw new UpstreamError(`gemini stopped the response: ${chunk.finishReason}`);
        }
      }
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    name: `gemini:${model}`,
    startStream(request: AiStreamRequest): AiStreamHandle {
      const controller = new AbortController();
      return {
        fragments: {
          [Symbol.asyncIterator]: () => streamFragments(request, controller),
        },
        abandon(): void {
          if (!controller.signal.aborted) {
            controller.abort();
          }
        },
      };
    },
  };
}
