import { z } from 'zod';

export const CORPUS_INDEX_SCHEMA_VERSION = 1;

const corpusIndexMetaSchema = z.object({
  schemaVersion: z.number(),
  buildId: z.string(),
  embeddingModel: z.string(),
  createdAt: z.string().optional(),
});

const corpusPassageSchema = z.object({
  id: z.string(),
  uri: z.string().min(1),
  title: z.string().optional(),
  text: z.string(),
  vector: z.array(z.number()),
});

export const corpusIndexSchema = z.object({
  meta: corpusIndexMetaSchema,
  passages: z.array(corpusPassageSchema),
});

export type CorpusIndexMeta = z.infer<typeof corpusIndexMetaSchema>;
export type CorpusPassage = z.infer<typeof corpusPassageSchema>;
export type CorpusIndex = z.infer<typeof corpusIndexSchema>;

export function assertCorpusIndex(data: unknown): CorpusIndex {
  return corpusIndexSchema.parse(data);
}

export type {
  EmbeddingProvider,
  PassageIndex,
  PassageMatch,
  PassageQueryOptions,
} from './providers/types';

export { createFilesystemPassageIndex, type FilesystemPassageIndexOptions } from './providers/filesystem/passageIndex';
export { cosineSimilarity, rankPassages, type RankedPassage } from './search/semantic';
