import type { ChatMessage, ChatRequestMessage } from '@recap/chat-contract';
import { parseChatStream, type ChatStreamParseError } from './chatStreamParser';
import { initialChatStreamState, reduceChatStream, type ChatStreamState } from './chatStreamState';

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type ChatClientOptions = {
  baseUrl?: string;
  endpoint?: string;
  fetch?: FetchLike;
  /** Gives up on a stream that sends nothing for this long. 0 disables. */
  idleTimeoutMs?: number;
  onParseError?: (error: ChatStreamParseError) => void;
};

export type SendOptions = {
  sessionId?: string | null;
  signal?: AbortSignal;
  onUpdate?: (state: ChatStreamState) => void;
};

export type SendResult = {
  message: ChatMessage;
  /** Unchanged from the request when the stream ended before `done`. */
  sessionId: string | null;
};

export type ChatClient = {
  send(conversation: ChatMessage[], options?: SendOptions): Promise<SendResult>;
};

const DEFAULT_ENDPOINT = '/api/chat/stream';
const REQUEST_FAILED = 'Request failed';
const STREAM_ENDED_EARLY = 'The answer was interrupted. Please try again.';

function toRequestMessages(conversation: ChatMessage[]): ChatRequestMessage[] {
  const messages: ChatRequestMessage[] = [];
  for (const message of conversation) {
    if (message.role === 'user' || message.role === 'assistant') {
      messages.push({ role: message.role, content: message.content });
    }
  }
  return messages;
}

async function readErrorDetail(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (body && typeof body === 'object' && 'detail' in body && typeof body.detail === 'string' && body.detail) {
      return body.detail;
    }
  } catch {
    return response.statusText || REQUEST_FAILED;
  }
  return response.statusText || REQUEST_FAILED;
}

function errorMessage(content: string): ChatMessage {
  return { id: crypto.randomUUID(), role: 'error', content, sources: [], createdAt: new Date().toISOString() };
}

function describeFailure(error: unknown): string {
  return error instanceof Error && error.message ? error.message : REQUEST_FAILED;
}

export function createChatClient(options: ChatClientOptions = {}): ChatClient {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const url = `${options.baseUrl ?? ''}${options.endpoint ?? DEFAULT_ENDPOINT}`;

  return {
    async send(conversation, sendOptions) {
      const previousSessionId = sendOptions?.sessionId ?? null;
      let state = initialChatStreamState;

      try {
        const response = await fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'text/event-stream' },
          body: JSON.stringify({ messages: toRequestMessages(conversation), session_id: previousSessionId }),
          signal: sendOptions?.signal,
        });
        if (!response.ok) {
          return { message: errorMessage(await readErrorDetail(response)), sessionId: previousSessionId };
        }
        if (!response.body) {
          return { message: errorMessage(REQUEST_FAILED), sessionId: previousSessionId };
        }

        for await (const event of parseChatStream(response.body, {
          signal: sendOptions?.signal,
          idleTimeoutMs: options.idleTimeoutMs,
          onParseError: options.onParseError,
        })) {
          state = reduceChatStream(state, event);
          sendOptions?.onUpdate?.(state);
        }
      } catch (error) {
        return { message: errorMessage(describeFailure(error)), sessionId: previousSessionId };
      }

      const sessionId = state.sessionId ?? previousSessionId;
      if (state.status === 'error') {
        return { message: errorMessage(state.error ?? REQUEST_FAILED), sessionId };
      }
      if (state.status !== 'done') {
        // Keep what was shown; the turn still reads as a failure.
        const content = state.content ? `${state.content}\n\n${STREAM_ENDED_EARLY}` : STREAM_ENDED_EARLY;
        return { message: errorMessage(content), sessionId };
      }
      return {
        message: {
          id: crypto.randomUUID(),
          role: 'assistant',
          content: state.content,
          sources: state.sources,
          createdAt: new Date().toISOString(),
        },
        sessionId,
      };
    },
  };
}
