import path from 'node:path';
import { promises as fs } from 'node:fs';
import { CORPUS_INDEX_SCHEMA_VERSION, type CorpusIndex, type CorpusPassage, type EmbeddingProvider } from '@recap/chat-data';
import { PreprocessError, PREPROCESS_ERROR_CODES } from '../errors';
import type { PreprocessContext, PreprocessTaskResult } from '../types';

const TITLE_PREFIX = '# ';

/** First `# ` heading, or `fallback` when the note has none. */
export function extractTitle(content: string, fallback: string): string {
  for (const line of content.split('\n')) {
    if (line.startsWith(TITLE_PREFIX)) {
      const title = line.slice(TITLE_PREFIX.length).trim();
      return title || fallback;
    }
  }
  return fallback;
}

/**
 * Packs blank-line separated paragraphs into passages of at most `maxChars`.
 * A single paragraph longer than that is cut into `maxChars` slices.
 */
export function splitIntoPassages(content: string, maxChars: number): string[] {
  const paragraphs = content
    .split(/\r?\n\s*\r?\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);
  const passages: string[] = [];
  let current = '';
  const flush = () => {
    if (current) {
      passages.push(current);
      current = '';
    }
  };

  for (const paragraph of paragraphs) {
    if (paragraph.length > maxChars) {
      flush();
      for (let cursor = 0; cursor < paragraph.length; cursor += maxChars) {
        const slice = paragraph.slice(cursor, cursor + maxChars).trim();
        if (slice) {
          passages.push(slice);
        }
      }
      continue;
    }
    const candidate = current ? `${current}\n\n${paragraph}` : paragraph;
    if (candidate.length > maxChars) {
      flush();
      current = paragraph;
    } else {
      current = candidate;
    }
  }
  flush();
  return passages;
}

async function embedInBatches(provider: EmbeddingProvider, texts: string[], batchSize: number): Promise<number[][]> {
  const vectors: number[][] = [];
  for (let idx = 0; idx < texts.length; idx += batchSize) {
    const batch = texts.slice(idx, idx + batchSize);
    const embedded = await provider.embedTexts(batch);
    if (embedded.length !== batch.length || embedded.some((vector) => vector.length === 0)) {
      throw new PreprocessError(
        PREPROCESS_ERROR_CODES.EMBEDDING_MISMATCH,
        `Expected ${batch.length} embeddings, received ${embedded.filter((vector) => vector.length > 0).length}`
      );
    }
    vectors.push(...embedded);
  }
  return vectors;
}

function toUri(rootDir: string, filePath: string): string {
  return path.relative(rootDir, filePath).split(path.sep).join('/');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runCorpusEmbeddingsTask(context: PreprocessContext): Promise<PreprocessTaskResult> {
  const { rootDir, notesDir, indexOutput } = context.paths;
  const { maxChars, batchSize } = context.config.chunking;
  const { log } = context;

  let entries: string[];
  try {
    entries = await fs.readdir(notesDir);
  } catch (error) {
    throw new PreprocessError(
      PREPROCESS_ERROR_CODES.NOTES_DIR_MISSING,
      `Notes directory not found at ${toUri(rootDir, notesDir)}`,
      { cause: error }
    );
  }

  const files = entries.filter((name) => name.endsWith('.md')).sort();
  if (!files.length) {
    log.info(`No markdown files found in ${toUri(rootDir, notesDir)}`);
  } else {
    log.info(`Found ${files.length} markdown files in ${toUri(rootDir, notesDir)}`);
  }

  const passages: CorpusPassage[] = [];
  const failures: NonNullable<PreprocessTaskResult['failures']> = [];
  let ingested = 0;
  let skipped = 0;

  for (const filename of files) {
    const filePath = path.join(notesDir, filename);
    const uri = toUri(rootDir, filePath);
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      if (!content.trim()) {
        log.info(`  Skipping empty file: ${filename}`);
        skipped += 1;
        continue;
      }

      const title = extractTitle(content, filename);
      const chunks = splitIntoPassages(content, maxChars);
      log.info(`  Ingesting: ${filename} (${content.length} chars, ${chunks.length} passages)`);
      const vectors = await embedInBatches(context.embeddingProvider, chunks, batchSize);
      const filePassages = chunks.map((text, index) => ({
        id: `${uri}#${index + 1}`,
        uri,
        title,
        text,
        vector: vectors[index] ?? [],
      }));
      passages.push(...filePassages);
      ingested += 1;
    } catch (error) {
      log.error(`  Error ingesting ${filename}: ${describeError(error)}`);
      failures.push({ path: uri, error: describeError(error) });
    }
  }

  const createdAt = new Date().toISOString();
  const corpusIndex: CorpusIndex = {
    meta: {
      schemaVersion: CORPUS_INDEX_SCHEMA_VERSION,
      buildId: createdAt,
      embeddingModel: context.models.embeddingModel,
      createdAt,
    },
    passages,
  };

  const artifact = await context.artifacts.writeJson({
    id: 'corpus-index',
    filePath: indexOutput,
    data: corpusIndex,
  });

  return {
    description: `Done: ${ingested} ingested, ${failures.length} failed`,
    counts: [
      { label: 'Notes', value: files.length },
      { label: 'Skipped', value: skipped },
      { label: 'Passages', value: passages.length },
    ],
    artifacts: [{ path: artifact.relativePath, note: `${passages.length} vectors` }],
    failures,
  };
}
