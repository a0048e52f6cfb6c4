import type {
  BaseLlmClient,
  LlmStructuredPrompt,
  LlmStructuredResult,
  LlmTextPrompt,
} from '@recap/chat-llm';
import type { EmbeddingProvider, PassageIndex, PassageMatch, PassageQueryOptions } from '@recap/chat-data';
import type { GuardrailDirection, ModerationService, ModerationVerdict } from '@recap/chat-orchestrator';

export type FakeLlmScript = {
  deltas?: string[];
  /** Throw `error` once this many deltas have been yielded. */
  failAfter?: number;
  error?: Error;
  /** Stop producing after this many deltas until the request signal aborts. */
  hangAfter?: number;
  usage?: unknown;
  structured?: unknown;
  structuredError?: Error;
};

export type FakeLlmClient = BaseLlmClient & {
  textCalls: LlmTextPrompt[];
  structuredCalls: LlmStructuredPrompt[];
  /** Deltas handed to the consumer so far. */
  yielded: () => number;
  /** True once the consumer closed the upstream stream (return() or completion). */
  closed: () => boolean;
};

function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export function createFakeLlmClient(script: FakeLlmScript = {}): FakeLlmClient {
  const textCalls: LlmTextPrompt[] = [];
  const structuredCalls: LlmStructuredPrompt[] = [];
  const deltas = script.deltas ?? [];
  let yielded = 0;
  let closed = false;

  return {
    provider: 'openai',
    textCalls,
    structuredCalls,
    yielded: () => yielded,
    closed: () => closed,
    async createStructuredJson(prompt): Promise<LlmStructuredResult> {
      structuredCalls.push(prompt);
      if (script.structuredError) {
        throw script.structuredError;
      }
      return {
        rawText: JSON.stringify(script.structured ?? {}),
        structured: script.structured,
        usage: script.usage,
      };
    },
    async *streamText(prompt) {
      textCalls.push(prompt);
      try {
        for (const [index, delta] of deltas.entries()) {
          if (script.failAfter === index) {
            throw script.error ?? new Error('upstream failure');
          }
          if (script.hangAfter === index) {
            await waitForAbort(prompt.signal);
          }
          yielded += 1;
          yield delta;
        }
        if (script.failAfter === deltas.length) {
          throw script.error ?? new Error('upstream failure');
        }
        if (script.hangAfter === deltas.length) {
          await waitForAbort(prompt.signal);
        }
        prompt.onUsage?.(script.usage);
      } finally {
        closed = true;
      }
    },
  };
}

export type StaticPassageIndex = PassageIndex & {
  queries: Array<{ text: string; options: PassageQueryOptions }>;
};

export type StaticPassageIndexOptions = {
  /** Rejects every query with this error. */
  error?: Error;
  /** Never settles until the query signal aborts. */
  hang?: boolean;
};

/**
 * In-memory passage index. Applies `minScore` and `limit` the way the filesystem index does.
 */
export function createStaticPassageIndex(
  matches: PassageMatch[],
  options: StaticPassageIndexOptions = {}
): StaticPassageIndex {
  const queries: StaticPassageIndex['queries'] = [];
  return {
    queries,
    size: () => matches.length,
    async query(text, queryOptions) {
      queries.push({ text, options: queryOptions });
      if (options.error) {
        throw options.error;
      }
      if (options.hang) {
        await waitForAbort(queryOptions.signal);
      }
      return matches
        .filter((match) => match.score >= queryOptions.minScore)
        .sort((a, b) => b.score - a.score)
        .slice(0, queryOptions.limit);
    },
  };
}

export function passage(uri: string, score: number, text = `Summary of ${uri}`): PassageMatch {
  return { id: `${uri}#0`, uri, text, score };
}

export type FakeModerationService = ModerationService & {
  calls: Array<{ text: string; direction: GuardrailDirection }>;
};

export type FakeModerationOptions = {
  /** Return the categories to flag, or null to allow. */
  flag?: (text: string, direction: GuardrailDirection) => string[] | null;
  error?: Error;
};

export function createFakeModerationService(options: FakeModerationOptions = {}): FakeModerationService {
  const calls: FakeModerationService['calls'] = [];
  return {
    calls,
    async moderate(text, direction): Promise<ModerationVerdict> {
      calls.push({ text, direction });
      if (options.error) {
        throw options.error;
      }
      const categories = options.flag?.(text, direction) ?? null;
      return categories ? { flagged: true, categories } : { flagged: false, categories: [] };
    },
  };
}

/** Deterministic embeddings: each text maps to the vector registered for it, or a zero vector. */
export function createFakeEmbeddingProvider(vectors: Record<string, number[]>, dimensions = 3): EmbeddingProvider & {
  inputs: string[][];
} {
  const inputs: string[][] = [];
  return {
    inputs,
    async embedTexts(texts) {
      inputs.push(texts);
      return texts.map((text) => vectors[text] ?? new Array<number>(dimensions).fill(0));
    },
  };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export async function readStreamText(stream: ReadableStream<Uint8Array>): Promise<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let text = '';
  while (true) {
    const { value, done } = await reader.read();
    if (done) break;
    text += decoder.decode(value, { stream: true });
  }
  return text + decoder.decode();
}
