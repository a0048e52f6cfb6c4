export type {
  ChatRequestMessage,
  ChatStreamEvent,
  RetrievalResult,
  Source,
  TokenUsage,
} from '@recap/chat-contract';
export {
  DEFAULT_MIN_SCORE,
  DEFAULT_TOP_K,
  MAX_TOP_K,
  CHAT_UNAVAILABLE_DETAIL,
  EMPTY_QUESTION_ANSWER,
} from '@recap/chat-contract';

export type ChatLogger = (event: string, payload: Record<string, unknown>) => void;

export type GuardrailDirection = 'input' | 'output';

export type ModerationVerdict = {
  flagged: boolean;
  categories: string[];
};

export interface ModerationService {
  /**
   * Classify `text`. Rejects when the moderation backend cannot be reached;
   * the guardrail gate decides what a failure means.
   */
  moderate(text: string, direction: GuardrailDirection, options?: { signal?: AbortSignal }): Promise<ModerationVerdict>;
}
