import { mergeUsage } from '@recap/chat-contract';
import { ChatPipelineError, GenerationFailedError, RetrievalUnavailableError, formatLogValue } from '../errors';
import {
  CHAT_UNAVAILABLE_DETAIL,
  DEFAULT_MIN_SCORE,
  DEFAULT_TOP_K,
  EMPTY_QUESTION_ANSWER,
  type ChatLogger,
  type ChatRequestMessage,
  type ChatStreamEvent,
  type RetrievalResult,
  type Source,
  type TokenUsage,
} from '../pipelineTypes';
import { assembleContext, type TokenCounter } from './context';
import type { StreamingGenerator } from './generator';
import type { GuardrailGate } from './guardrail';
import type { Retriever } from './retrieval';

export const DEFAULT_CONTEXT_BUDGET_TOKENS = 12_000;
export const BLOCKED_OUTPUT_SEPARATOR = '\n\n';

export type ChatRuntimeOptions = {
  retriever: Retriever;
  guardrail: GuardrailGate;
  generator: StreamingGenerator;
  topK?: number;
  minScore?: number;
  contextBudgetTokens?: number;
  systemInstruction?: string;
  countTokens?: TokenCounter;
  logger?: ChatLogger;
};

export type ChatStreamOptions = {
  sessionId: string;
  signal?: AbortSignal;
  onUsage?: (usage: TokenUsage) => void;
};

export type ChatRunResult = {
  content: string;
  sources: Source[];
  sessionId: string;
  usage: TokenUsage | null;
};

export type ChatRuntime = {
  /**
   * Events for one exchange: chunks, then `sources`, then `done`; or chunks then a terminal `error`.
   * Ends without `done` when `signal` aborts.
   */
  stream(messages: ChatRequestMessage[], options: ChatStreamOptions): AsyncGenerator<ChatStreamEvent, void, undefined>;
  /**
   * Drains `stream` into a single answer. Throws GenerationFailedError (with the stream's code) when
   * generation fails, ChatPipelineError(`client_disconnected`) when `signal` aborts, and
   * ChatPipelineError(`internal_error`) for anything else that ended the stream in `error`.
   */
  run(messages: ChatRequestMessage[], options: ChatStreamOptions): Promise<ChatRunResult>;
};

function extractUserText(messages: ChatRequestMessage[]): string {
  const reversed = [...messages].reverse();
  const latest = reversed.find((msg) => msg.role === 'user');
  return latest?.content.trim() ?? '';
}

export function createChatRuntime(options: ChatRuntimeOptions): ChatRuntime {
  const { retriever, guardrail, generator, logger } = options;
  const topK = options.topK ?? DEFAULT_TOP_K;
  const minScore = options.minScore ?? DEFAULT_MIN_SCORE;
  const budgetTokens = options.contextBudgetTokens ?? DEFAULT_CONTEXT_BUDGET_TOKENS;

  async function retrievePassages(query: string, signal?: AbortSignal): Promise<RetrievalResult[]> {
    try {
      return await retriever.search(query, topK, minScore, { signal });
    } catch (error) {
      if (error instanceof RetrievalUnavailableError) {
        logger?.('chat.pipeline.retrieval_unavailable', { error: formatLogValue(error) });
        return [];
      }
      throw error;
    }
  }

  async function* stream(
    messages: ChatRequestMessage[],
    streamOptions: ChatStreamOptions
  ): AsyncGenerator<ChatStreamEvent, void, undefined> {
    const { sessionId, signal } = streamOptions;
    const startedAt = performance.now();
    const userText = extractUserText(messages);

    if (!userText) {
      yield { type: 'chunk', content: EMPTY_QUESTION_ANSWER };
      yield { type: 'done', sessionId };
      return;
    }

    try {
      const inputDecision = await guardrail.evaluate(userText, 'input', { signal });
      if (inputDecision.action === 'blocked') {
        logger?.('chat.pipeline.input_blocked', { categories: inputDecision.categories });
        yield { type: 'chunk', content: inputDecision.message };
        yield { type: 'done', sessionId };
        return;
      }
      if (signal?.aborted) return;

      const passages = await retrievePassages(userText, signal);
      if (signal?.aborted) return;

      const context = assembleContext({
        messages,
        passages,
        budgetTokens,
        systemInstruction: options.systemInstruction,
        countTokens: options.countTokens,
      });
      logger?.('chat.pipeline.context', {
        passages: context.passages.length,
        droppedTurns: context.droppedTurns,
        droppedPassages: context.droppedPassages,
        totalTokens: context.totalTokens,
        truncated: context.truncated,
      });

      let content = '';
      for await (const delta of generator.generate(
        { systemPrompt: context.systemPrompt, messages: context.messages },
        { signal, onUsage: streamOptions.onUsage }
      )) {
        content += delta;
        yield { type: 'chunk', content: delta };
      }
      if (signal?.aborted) {
        logger?.('chat.pipeline.cancelled', { contentLength: content.length });
        return;
      }

      const outputDecision = await guardrail.evaluate(content, 'output', { signal });
      if (signal?.aborted) return;

      if (outputDecision.action === 'blocked') {
        logger?.('chat.pipeline.output_blocked', { categories: outputDecision.categories });
        yield {
          type: 'chunk',
          content: content ? `${BLOCKED_OUTPUT_SEPARATOR}${outputDecision.message}` : outputDecision.message,
        };
      } else {
        yield { type: 'sources', sources: context.sources };
      }

      logger?.('chat.pipeline.summary', {
        contentLength: content.length,
        sources: outputDecision.action === 'blocked' ? 0 : context.sources.length,
        durationMs: Math.round(performance.now() - startedAt),
      });
      yield { type: 'done', sessionId };
    } catch (error) {
      if (signal?.aborted) return;
      if (error instanceof GenerationFailedError) {
        logger?.('chat.pipeline.error', { code: error.code, error: formatLogValue(error) });
        yield { type: 'error', detail: error.detail, code: error.code };
        return;
      }
      logger?.('chat.pipeline.error', { code: 'internal_error', error: formatLogValue(error) });
      yield { type: 'error', detail: CHAT_UNAVAILABLE_DETAIL, code: 'internal_error' };
    }
  }

  return {
    stream,
    async run(messages, runOptions) {
      let content = '';
      let sources: Source[] = [];
      let sessionId = runOptions.sessionId;
      let usage: TokenUsage | null = null;

      for await (const event of stream(messages, {
        ...runOptions,
        onUsage: (reported) => {
          usage = mergeUsage(usage, reported);
          runOptions.onUsage?.(reported);
        },
      })) {
        switch (event.type) {
          case 'chunk':
            content += event.content;
            break;
          case 'sources':
            sources = event.sources;
            break;
          case 'done':
            sessionId = event.sessionId;
            break;
          case 'error':
            if (event.code === 'generation_failed' || event.code === 'generation_timeout') {
              throw new GenerationFailedError(event.code, event.detail);
            }
            throw new ChatPipelineError('internal_error', event.detail);
        }
      }
      if (runOptions.signal?.aborted) {
        throw new ChatPipelineError('client_disconnected', 'Request aborted before the answer completed', {
          cause: runOptions.signal.reason,
        });
      }

      return { content, sources, sessionId, usage };
    },
  };
}
