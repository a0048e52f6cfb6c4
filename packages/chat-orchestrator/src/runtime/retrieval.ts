import type { PassageIndex, PassageMatch } from '@recap/chat-data';
import { clampScore } from '@recap/chat-contract';
import { RetrievalUnavailableError } from '../errors';
import {
  DEFAULT_MIN_SCORE,
  DEFAULT_TOP_K,
  MAX_TOP_K,
  type ChatLogger,
  type RetrievalResult,
} from '../pipelineTypes';

export type Retriever = {
  /**
   * Passages for `query` ordered by score descending, at most `k`, none below `threshold`.
   * Several passages may share a uri. Throws RetrievalUnavailableError when the index fails or times out.
   */
  search(query: string, k?: number, threshold?: number, options?: { signal?: AbortSignal }): Promise<RetrievalResult[]>;
};

export type RetrieverOptions = {
  /** Null when no corpus has been ingested; every search then returns []. */
  index: PassageIndex | null;
  defaultTopK?: number;
  maxTopK?: number;
  minScore?: number;
  /** 0 disables the timeout. */
  timeoutMs?: number;
  logger?: ChatLogger;
};

const DEFAULT_TIMEOUT_MS = 10_000;

const clampTopK = (value: number | undefined, max: number, fallback: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(1, Math.min(max, Math.floor(value)));
};

const clampThreshold = (value: number | undefined, fallback: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  return clampScore(value);
};

function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  parent: AbortSignal | undefined,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return new Promise<T>((resolve, reject) => {
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            controller.abort(new Error(`Retrieval timed out after ${timeoutMs}ms`));
          }, timeoutMs)
        : null;
    const settle = () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };

    controller.signal.addEventListener(
      'abort',
      () => {
        settle();
        reject(controller.signal.reason);
      },
      { once: true }
    );
    if (controller.signal.aborted) {
      settle();
      reject(controller.signal.reason);
      return;
    }

    run(controller.signal).then(
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

export function createRetriever(options: RetrieverOptions): Retriever {
  const { index, logger } = options;
  const maxTopK = clampTopK(options.maxTopK, Number.MAX_SAFE_INTEGER, MAX_TOP_K);
  const defaultTopK = clampTopK(options.defaultTopK, maxTopK, Math.min(DEFAULT_TOP_K, maxTopK));
  const defaultMinScore = clampThreshold(options.minScore, DEFAULT_MIN_SCORE);
  const timeoutMs =
    typeof options.timeoutMs === 'number' && Number.isFinite(options.timeoutMs) && options.timeoutMs >= 0
      ? options.timeoutMs
      : DEFAULT_TIMEOUT_MS;

  return {
    async search(query, k, threshold, searchOptions): Promise<RetrievalResult[]> {
      const queryText = query.trim();
      if (!queryText) {
        return [];
      }
      if (!index) {
        logger?.('retrieval.skipped', { reason: 'index_not_configured' });
        return [];
      }

      const limit = clampTopK(k, maxTopK, defaultTopK);
      const minScore = clampThreshold(threshold, defaultMinScore);
      const startedAt = performance.now();

      let matches: PassageMatch[];
      try {
        matches = await withDeadline(
          (signal) => index.query(queryText, { limit, minScore, signal }),
          searchOptions?.signal,
          timeoutMs
        );
      } catch (error) {
        throw new RetrievalUnavailableError('Passage index unavailable', { cause: error });
      }

      const results = matches
        .map((match) => ({ text: match.text, uri: match.uri, score: clampScore(match.score) }))
        .filter((result) => result.score >= minScore)
        .sort((a, b) => b.score - a.score)
        .slice(0, limit);

      logger?.('retrieval.search', {
        queryLength: queryText.length,
        limit,
        minScore,
        numResults: results.length,
        durationMs: Math.round(performance.now() - startedAt),
      });
      logger?.('retrieval.search.raw', {
        query: queryText,
        results: results.map(({ uri, score }) => ({ uri, score })),
      });

      return results;
    },
  };
}
