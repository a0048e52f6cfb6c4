import type { BaseLlmClient } from '@recap/chat-llm';
import { parseUsage } from '@recap/chat-contract';
import { GenerationFailedError, formatLogValue } from '../errors';
import type { ChatLogger, ChatRequestMessage, TokenUsage } from '../pipelineTypes';

export type GenerationPrompt = {
  systemPrompt: string;
  messages: ChatRequestMessage[];
};

export type GenerateOptions = {
  signal?: AbortSignal;
  onUsage?: (usage: TokenUsage) => void;
};

export type StreamingGenerator = {
  /**
   * Text deltas in provider order. Finite and not restartable.
   * Stops quietly when `signal` aborts; throws GenerationFailedError on provider failure or idle timeout.
   */
  generate(prompt: GenerationPrompt, options?: GenerateOptions): AsyncGenerator<string, void, undefined>;
};

export type StreamingGeneratorOptions = {
  client: Pick<BaseLlmClient, 'streamText'>;
  model: string;
  maxOutputTokens?: number;
  temperature?: number;
  /** 0 disables the idle timeout. */
  idleTimeoutMs?: number;
  logger?: ChatLogger;
};

const GENERATION_FAILED_DETAIL = 'The answer could not be completed. Please try again.';
const GENERATION_TIMEOUT_DETAIL = 'The answer timed out. Please try again.';

class IdleTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`No delta received within ${timeoutMs}ms`);
    this.name = 'IdleTimeoutError';
  }
}

function createAbortSignal(parent?: AbortSignal): { controller: AbortController; cleanup: () => void } {
  const controller = new AbortController();
  if (!parent) {
    return { controller, cleanup: () => undefined };
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, cleanup: () => undefined };
  }
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return { controller, cleanup: () => parent.removeEventListener('abort', onAbort) };
}

/**
 * Wait for the next provider delta, but give up as soon as the signal aborts or the stream goes idle.
 * A provider that ignores its signal still releases the consumer promptly.
 */
function awaitNext<T>(pending: Promise<T>, signal: AbortSignal, idleTimeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = idleTimeoutMs > 0 ? setTimeout(() => reject(new IdleTimeoutError(idleTimeoutMs)), idleTimeoutMs) : null;
    const onAbort = () => reject(signal.reason);
    const settle = () => {
      if (timer) clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    };
    if (signal.aborted) {
      settle();
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    pending.then(
      (value) => {
        settle();
        resolve(value);
      },
      (error: unknown) => {
        settle();
        reject(error);
      }
    );
  });
}

export function createStreamingGenerator(options: StreamingGeneratorOptions): StreamingGenerator {
  const { client, model, logger } = options;
  const idleTimeoutMs =
    typeof options.idleTimeoutMs === 'number' && Number.isFinite(options.idleTimeoutMs) && options.idleTimeoutMs > 0
      ? options.idleTimeoutMs
      : 0;

  return {
    async *generate(prompt, generateOptions) {
      const parentSignal = generateOptions?.signal;
      const { controller, cleanup } = createAbortSignal(parentSignal);
      const upstream = client.streamText({
        systemPrompt: prompt.systemPrompt,
        messages: prompt.messages,
        model,
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature,
        signal: controller.signal,
        logger,
        stage: 'answer',
        onUsage: (raw) => {
          const usage = parseUsage(raw);
          if (usage) {
            generateOptions?.onUsage?.(usage);
          }
        },
      });

      let pending: Promise<IteratorResult<string, void>> | null = null;
      let deltas = 0;
      try {
        while (true) {
          if (parentSignal?.aborted) {
            logger?.('generation.cancelled', { deltas });
            return;
          }
          pending = upstream.next();
          let step: IteratorResult<string, void>;
          try {
            step = await awaitNext(pending, controller.signal, idleTimeoutMs);
            pending = null;
          } catch (error) {
            if (parentSignal?.aborted) {
              logger?.('generation.cancelled', { deltas });
              return;
            }
            if (error instanceof IdleTimeoutError) {
              logger?.('generation.timeout', { deltas, idleTimeoutMs });
              throw new GenerationFailedError('generation_timeout', GENERATION_TIMEOUT_DETAIL, { cause: error });
            }
            logger?.('generation.error', { deltas, error: formatLogValue(error) });
            throw new GenerationFailedError('generation_failed', GENERATION_FAILED_DETAIL, { cause: error });
          }

          if (step.done) {
            break;
          }
          if (!step.value) {
            continue;
          }
          deltas += 1;
          yield step.value;
        }
      } finally {
        cleanup();
        controller.abort();
        if (pending) {
          // The provider call is still in flight; it settles once the abort reaches it.
          pending.then(
            () => undefined,
            (error: unknown) => logger?.('generation.abandoned', { error: formatLogValue(error) })
          );
        } else {
          await upstream.return(undefined);
        }
      }
    },
  };
}
