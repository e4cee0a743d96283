import { z } from 'zod';
import { ProtocolError, type TurnEvent } from '../../packages/chat-core/src/index.ts';

export const MAX_THREAD_ID_CHARS = 128;
export const MAX_LANGUAGE_CHARS = 64;

export type ProtocolErrorCode =
  | 'malformed_frame'
  | 'invalid_frame'
  | 'frame_too_large'
  | 'empty_message'
  | 'missing_thread_id';

export type RejectionCode = 'turn_in_progress' | 'thread_not_found' | 'thread_deleted';

export const inboundFrameSchema = z
  .object({
    thread_id: z.string().trim().min(1).max(MAX_THREAD_ID_CHARS).optional(),
    text: z.string().default(''),
    image_ref: z.string().trim().min(1).optional(),
    delete: z.boolean().optional(),
    language: z.string().trim().min(1).max(MAX_LANGUAGE_CHARS).optional(),
    request_id: z.string().min(1).max(MAX_THREAD_ID_CHARS).optional(),
  })
  .strict();

export type InboundFrame = z.infer<typeof inboundFrameSchema>;

export const outboundFrameKindSchema = z.enum([
  'fragment',
  'completed',
  'failed',
  'cancelled',
  'protocol_error',
  'accepted',
  'rejected',
  'deleted',
]);

export type OutboundFrameKind = z.infer<typeof outboundFrameKindSchema>;

export const outboundFrameSchema = z
  .object({
    thread_id: z.string().min(1).nullable(),
    kind: outboundFrameKindSchema,
    seq: z.number().int().nonnegative().optional(),
    payload: z.string(),
    code: z.string().min(1).optional(),
    turn_id: z.string().min(1).optional(),
    request_id: z.string().min(1).optional(),
  })
  .strict();

export type OutboundFrame = z.infer<typeof outboundFrameSchema>;

export type ParsedInboundFrame =
  | { readonly ok: true; readonly frame: InboundFrame }
  | { readonly ok: false; readonly error: ProtocolError };

function extractThreadId(value: unknown): string | null {
  if (typeof value !== 'object' || value === null || !('thread_id' in value)) {
    return null;
  }
  const threadId = value.thread_id;
  if (typeof threadId !== 'string') {
    return null;
  }
  const trimmed = threadId.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_THREAD_ID_CHARS ? trimmed : null;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseInboundFrame(text: string, maxFrameBytes?: number): ParsedInboundFrame {
  if (maxFrameBytes !== undefined && Buffer.byteLength(text, 'utf8') > maxFrameBytes) {
    return {
      ok: false,
      error: new ProtocolError('frame_too_large', `frame exceeds ${String(maxFrameBytes)} bytes`),
    };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return {
      ok: false,
      error: new ProtocolError('malformed_frame', 'frame is not valid json'),
    };
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {
      ok: false,
      error: new ProtocolError('malformed_frame', 'frame must be a json object'),
    };
  }
  const threadId = extractThreadId(raw);
  const parsed = inboundFrameSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: new ProtocolError('invalid_frame', describeIssues(parsed.error), threadId),
    };
  }
  const frame = parsed.data;
  if (frame.delete === true) {
    if (frame.thread_id === undefined) {
      return {
        ok: false,
        error: new ProtocolError('missing_thread_id', 'delete requires thread_id'),
      };
    }
    return { ok: true, frame };
  }
  if (frame.text.trim().length === 0 && frame.image_ref === undefined) {
    return {
      ok: false,
      error: new ProtocolError('empty_message', 'message needs text or image_ref', threadId),
    };
  }
  return { ok: true, frame };
}

export function encodeOutboundFrame(frame: OutboundFrame): string {
  return JSON.stringify(frame);
}

export function parseOutboundFrame(text: string): OutboundFrame | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = outboundFrameSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function protocolErrorFrame(error: ProtocolError): OutboundFrame {
  return {
    thread_id: error.threadId,
    kind: 'protocol_error',
    payload: error.message,
    code: error.code,
  };
}

export function rejectedFrame(input: {
  readonly threadId: string;
  readonly code: RejectionCode;
  readonly message: string;
  readonly requestId?: string | undefined;
}): OutboundFrame {
  return {
    thread_id: input.threadId,
    kind: 'rejected',
    payload: input.message,
    code: input.code,
    ...(input.requestId !== undefined ? { request_id: input.requestId } : {}),
  };
}

export function turnEventFrame(threadId: string, turnId: string, event: TurnEvent): OutboundFrame {
  switch (event.type) {
    case 'fragment':
      return { thread_id: threadId, kind: 'fragment', seq: event.seq, payload: event.text, turn_id: turnId };
    case 'completed':
      return { thread_id: threadId, kind: 'completed', payload: event.text, turn_id: turnId };
    case 'failed':
      return {
        thread_id: threadId,
        kind: 'failed',
        payload: event.reason,
        code: event.code,
        turn_id: turnId,
      };
    case 'cancelled':
      return { thread_id: threadId, kind: 'cancelled', payload: event.reason, turn_id: turnId };
  }
}
