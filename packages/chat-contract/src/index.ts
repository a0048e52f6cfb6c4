import { z } from 'zod';
import type { TokenUsage } from './usage';
export * from './usage';

export type ChatRole = 'user' | 'assistant';

/** `error` is a client-side role for failed turns; it is never sent back to the service. */
export type MessageRole = ChatRole | 'error';

export type ChatRequestMessage = {
  role: ChatRole;
  content: string;
};

export type Source = {
  uri: string;
  score: number;
};

export type ChatMessage = {
  id: string;
  role: MessageRole;
  content: string;
  sources: Source[];
  createdAt?: string;
};

export type RetrievalResult = {
  text: string;
  uri: string;
  score: number;
};

export type ChatStreamEvent =
  | { type: 'chunk'; content: string }
  | { type: 'sources'; sources: Source[] }
  | { type: 'done'; sessionId: string }
  | { type: 'error'; detail: string; code?: ChatStreamErrorCode };

/** Server-side only; the wire `error` frame carries `detail` alone. */
export type ChatStreamErrorCode = 'generation_failed' | 'generation_timeout' | 'internal_error';

export const DEFAULT_TOP_K = 5;
export const MAX_TOP_K = 20;
export const DEFAULT_MIN_SCORE = 0.5;
export const MAX_CHAT_MESSAGES = 256;
export const EMPTY_QUESTION_ANSWER = 'Please provide a question.';
export const CHAT_UNAVAILABLE_DETAIL = 'Chat unavailable';

// Request body

export const ChatRequestMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export const ChatRequestBodySchema = z.object({
  messages: z.array(ChatRequestMessageSchema).max(MAX_CHAT_MESSAGES),
  session_id: z.string().nullable().optional(),
});

export type ChatRequestBody = z.infer<typeof ChatRequestBodySchema>;

// Wire frames

export const WireSourceSchema = z.object({
  source_uri: z.string(),
  score: z.number(),
});

export type WireSource = z.infer<typeof WireSourceSchema>;

export const StreamFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('chunk'), content: z.string() }),
  z.object({ type: z.literal('sources'), sources: z.array(WireSourceSchema) }),
  z.object({ type: z.literal('done'), session_id: z.string() }),
  z.object({ type: z.literal('error'), detail: z.string() }),
]);

export type StreamFrame = z.infer<typeof StreamFrameSchema>;

export type ChatResponseBody = {
  content: string;
  sources: WireSource[];
  session_id: string;
  usage?: {
    input_tokens: number;
    output_tokens: number;
  };
};

export function toWireSources(sources: Source[]): WireSource[] {
  return sources.map((source) => ({ source_uri: source.uri, score: source.score }));
}

export function fromWireSources(sources: WireSource[]): Source[] {
  return sources.map((source) => ({ uri: source.source_uri, score: source.score }));
}

export function toStreamFrame(event: ChatStreamEvent): StreamFrame {
  switch (event.type) {
    case 'chunk':
      return { type: 'chunk', content: event.content };
    case 'sources':
      return { type: 'sources', sources: toWireSources(event.sources) };
    case 'done':
      return { type: 'done', session_id: event.sessionId };
    case 'error':
      return { type: 'error', detail: event.detail };
  }
}

export function fromStreamFrame(frame: StreamFrame): ChatStreamEvent {
  switch (frame.type) {
    case 'chunk':
      return { type: 'chunk', content: frame.content };
    case 'sources':
      return { type: 'sources', sources: normalizeSources(fromWireSources(frame.sources)) };
    case 'done':
      return { type: 'done', sessionId: frame.session_id };
    case 'error':
      return { type: 'error', detail: frame.detail };
  }
}

export function toUsageBody(usage: TokenUsage): NonNullable<ChatResponseBody['usage']> {
  return { input_tokens: usage.promptTokens, output_tokens: usage.completionTokens };
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(1, Math.max(0, score));
}

/**
 * Collapse passages or sources to one entry per uri, keeping the best score.
 * Result is sorted by score descending; ties keep first-seen order.
 * Entries with an empty uri are dropped.
 */
export function normalizeSources(items: ReadonlyArray<{ uri: string; score: number }>): Source[] {
  const byUri = new Map<string, Source>();
  for (const item of items) {
    const uri = item.uri.trim();
    if (!uri) {
      continue;
    }
    const score = clampScore(item.score);
    const existing = byUri.get(uri);
    if (!existing) {
      byUri.set(uri, { uri, score });
    } else if (score > existing.score) {
      existing.score = score;
    }
  }
  // Array.prototype.sort is stable, so ties keep insertion order.
  return Array.from(byUri.values()).sort((a, b) => b.score - a.score);
}
