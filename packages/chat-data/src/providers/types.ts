export interface EmbeddingProvider {
  /**
   * Generate embeddings for the given text chunks, one vector per input in the same order.
   * Failures reject; callers decide whether a missing embedding is fatal.
   */
  embedTexts(texts: string[], options?: { signal?: AbortSignal }): Promise<number[][]>;
}

export type PassageMatch = {
  id: string;
  uri: string;
  text: string;
  score: number;
};

export type PassageQueryOptions = {
  limit: number;
  minScore: number;
  signal?: AbortSignal;
};

export interface PassageIndex {
  /**
   * Return passages ordered by similarity to `text`, at most `limit`, none below `minScore`.
   */
  query(text: string, options: PassageQueryOptions): Promise<PassageMatch[]>;

  /**
   * Number of passages available. Zero means nothing has been ingested.
   */
  size(): number;
}
