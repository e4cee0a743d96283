export interface SseEvent {
  readonly event: string | null;
  readonly data: string;
}

interface ConsumedSseEvents {
  readonly events: SseEvent[];
  readonly remainder: string;
}

function parseSseBlock(block: string): SseEvent | null {
  let event: string | null = null;
  const dataLines: string[] = [];
  for (const line of block.split('\n')) {
    if (line.length === 0 || line.startsWith(':')) {
      continue;
    }
    const colonIndex = line.indexOf(':');
    const field = colonIndex < 0 ? line : line.slice(0, colonIndex);
    let value = colonIndex < 0 ? '' : line.slice(colonIndex + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }
    if (field === 'data') {
      dataLines.push(value);
    } else if (field === 'event') {
      event = value;
    }
  }
  if (dataLines.length === 0) {
    return null;
  }
  return {
    event,
    data: dataLines.join('\n'),
  };
}

export function consumeSseEvents(buffer: string): ConsumedSseEvents {
  const normalized = buffer.replace(/\r\n?/gu, '\n');
  const blocks = normalized.split('\n\n');
  const remainder = blocks.pop() ?? '';
  const events: SseEvent[] = [];
  for (const block of blocks) {
    const parsed = parseSseBlock(block);
    if (parsed !== null) {
      events.push(parsed);
    }
  }
  return {
    events,
    remainder,
  };
}

type ResponseBody = NonNullable<Response['body']>;

export async function* readSseEvents(
  body: ResponseBody,
): AsyncGenerator<SseEvent, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let settled = false;
  try {
    while (true) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (error: unknown) {
        settled = true;
        throw error;
      }
      if (chunk.done) {
        settled = true;
        break;
      }
      buffer += decoder.decode(chunk.value, { stream: true });
      const consumed = consumeSseEvents(buffer);
      buffer = consumed.remainder;
      for (const event of consumed.events) {
        yield event;
      }
    }
    buffer += decoder.decode();
    const trailing = parseSseBlock(buffer.replace(/\r\n?/gu, '\n'));
    if (trailing !== null) {
      yield trailing;
    }
  } finally {
    // An errored or exhausted body has nothing to cancel.
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
