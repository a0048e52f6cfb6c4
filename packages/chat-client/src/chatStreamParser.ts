import { fromStreamFrame, StreamFrameSchema, type ChatStreamEvent } from '@recap/chat-contract';

export class ChatStreamParseError extends Error {
  readonly line: string;

  constructor(message: string, line: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatStreamParseError';
    this.line = line;
  }
}

export type ChatStreamDecoderOptions = {
  /** A bad line is reported here and skipped; decoding carries on with the next one. */
  onParseError?: (error: ChatStreamParseError) => void;
};

export type ChatStreamDecoder = {
  /** Events completed by this chunk. A partial trailing line waits for the next push. */
  push(bytes: Uint8Array): ChatStreamEvent[];
  /** End of stream: decodes whatever is left, newline or not. */
  flush(): ChatStreamEvent[];
};

const DATA_PREFIX = 'data:';

export function parseChatStreamLine(line: string, options?: ChatStreamDecoderOptions): ChatStreamEvent | null {
  const trimmed = line.replace(/\r$/, '');
  if (!trimmed.startsWith(DATA_PREFIX)) {
    return null;
  }
  const payload = trimmed.slice(DATA_PREFIX.length).trim();
  if (!payload) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    options?.onParseError?.(new ChatStreamParseError('Frame is not valid JSON', trimmed, { cause: error }));
    return null;
  }

  const frame = StreamFrameSchema.safeParse(json);
  if (!frame.success) {
    options?.onParseError?.(new ChatStreamParseError('Unrecognised frame', trimmed, { cause: frame.error }));
    return null;
  }
  return fromStreamFrame(frame.data);
}

export function createChatStreamDecoder(options?: ChatStreamDecoderOptions): ChatStreamDecoder {
  const decoder = new TextDecoder();
  let buffer = '';

  const drainLines = (lines: string[]): ChatStreamEvent[] => {
    const events: ChatStreamEvent[] = [];
    for (const line of lines) {
      const event = parseChatStreamLine(line, options);
      if (event) {
        events.push(event);
      }
    }
    return events;
  };

  return {
    push(bytes) {
      buffer += decoder.decode(bytes, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';
      return drainLines(lines);
    },
    flush() {
      buffer += decoder.decode();
      const lines = buffer.split('\n');
      buffer = '';
      return drainLines(lines);
    },
  };
}

type ParseStreamOptions = ChatStreamDecoderOptions & {
  signal?: AbortSignal;
  idleTimeoutMs?: number;
  onIdleTimeout?: () => void;
};

export async function* parseChatStream(
  stream: ReadableStream<Uint8Array>,
  options?: ParseStreamOptions
): AsyncGenerator<ChatStreamEvent, void, undefined> {
  const decoder = createChatStreamDecoder(options);
  const idleTimeoutMs = options?.idleTimeoutMs ?? 0;
  const reader = stream.getReader();
  let idleTimer: ReturnType<typeof setTimeout> | null = null;
  let idleTriggered = false;
  // cancel() rejects when the stream has already errored; the read loop reports that error.
  const cancelReader = (reason: unknown) => reader.cancel(reason).catch(() => undefined);
  const clearIdleTimer = () => {
    if (idleTimer) {
      clearTimeout(idleTimer);
      idleTimer = null;
    }
  };
  const resetIdleTimer = () => {
    if (!Number.isFinite(idleTimeoutMs) || idleTimeoutMs <= 0) {
      return;
    }
    clearIdleTimer();
    idleTimer = setTimeout(() => {
      idleTriggered = true;
      options?.onIdleTimeout?.();
      void cancelReader(new Error('chat_stream_idle'));
    }, idleTimeoutMs);
  };

  const abortSignal = options?.signal;
  const abortHandler = () => {
    clearIdleTimer();
    void cancelReader(abortSignal?.reason);
  };
  abortSignal?.addEventListener('abort', abortHandler, { once: true });

  let drained = false;
  try {
    resetIdleTimer();
    while (true) {
      let result: ReadableStreamReadResult<Uint8Array>;
      try {
        result = await reader.read();
      } catch (error) {
        if (idleTriggered) {
          break;
        }
        if (abortSignal?.aborted) {
          throw abortSignal.reason ?? error;
        }
        throw error;
      }
      if (result.done) {
        // Cancelling on abort resolves the pending read as done.
        if (abortSignal?.aborted) {
          throw abortSignal.reason;
        }
        break;
      }
      resetIdleTimer();
      for (const event of decoder.push(result.value)) {
        yield event;
      }
    }

    drained = true;
    for (const event of decoder.flush()) {
      yield event;
    }
  } finally {
    clearIdleTimer();
    if (!drained) {
      void cancelReader(new Error('chat_stream_closed'));
    }
    abortSignal?.removeEventListener('abort', abortHandler);
    reader.releaseLock();
  }
}
