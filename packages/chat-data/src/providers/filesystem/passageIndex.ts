import { assertCorpusIndex, type CorpusIndex } from '../../index';
import { rankPassages } from '../../search/semantic';
import type { EmbeddingProvider, PassageIndex, PassageMatch } from '../types';

export type FilesystemPassageIndexOptions = {
  /** Parsed contents of the corpus index JSON. */
  indexFile: unknown;
  embeddingProvider: EmbeddingProvider;
};

function normalizeQuery(query: string): string {
  return query.replace(/\s+/g, ' ').trim();
}

export function createFilesystemPassageIndex(options: FilesystemPassageIndexOptions): PassageIndex & {
  meta: CorpusIndex['meta'];
} {
  const index = assertCorpusIndex(options.indexFile);
  const { embeddingProvider } = options;

  return {
    meta: index.meta,
    size() {
      return index.passages.length;
    },
    async query(text, { limit, minScore, signal }): Promise<PassageMatch[]> {
      const normalized = normalizeQuery(text);
      if (!normalized || !index.passages.length) {
        return [];
      }

      const [queryVector] = await embeddingProvider.embedTexts([normalized], { signal });
      if (!queryVector?.length) {
        throw new Error('Embedding provider returned an empty query vector');
      }

      return rankPassages(index.passages, queryVector, { limit, minScore }).map(({ passage, score }) => ({
        id: passage.id,
        uri: passage.uri,
        text: passage.text,
        score,
      }));
    },
  };
}
