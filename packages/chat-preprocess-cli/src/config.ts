import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { DEFAULT_ENV_FILES } from '@recap/chat-api';
import type {
  ChatPreprocessConfig,
  ChunkingConfig,
  PreprocessModelConfig,
  PreprocessPathOverrides,
  PreprocessPaths,
  ResolvedModelConfig,
  ResolvedPreprocessConfig,
} from './types';

const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_MAX_PASSAGE_CHARS = 2000;
export const DEFAULT_EMBEDDING_BATCH_SIZE = 32;

const preprocessConfigSchema = z.object({
  envFiles: z.array(z.string()).optional(),
  paths: z
    .object({
      rootDir: z.string(),
      notesDir: z.string(),
      indexOutput: z.string(),
    })
    .partial()
    .optional(),
  models: z
    .object({
      embeddingModel: z.string(),
      embeddingDimensions: z.number(),
    })
    .partial()
    .optional(),
  chunking: z
    .object({
      maxChars: z.number(),
      batchSize: z.number(),
    })
    .partial()
    .optional(),
});

function toArray<T>(value: T | T[] | undefined): T[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return Array.isArray(value) ? value : [value];
}

export function mergeConfigs(configs: Array<ChatPreprocessConfig | undefined>): ChatPreprocessConfig {
  const merged: ChatPreprocessConfig = {};

  for (const current of configs) {
    if (!current) continue;
    if (current.envFiles) {
      merged.envFiles = current.envFiles;
    }
    if (current.paths) {
      merged.paths = { ...(merged.paths ?? {}), ...current.paths };
    }
    if (current.models) {
      merged.models = { ...(merged.models ?? {}), ...current.models };
    }
    if (current.chunking) {
      merged.chunking = { ...(merged.chunking ?? {}), ...current.chunking };
    }
  }

  return merged;
}

function pickModel(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : fallback;
}

function pickPositiveInt(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 1 ? Math.floor(value) : fallback;
}

function resolveModelConfig(config?: PreprocessModelConfig): ResolvedModelConfig {
  const dimensions = config?.embeddingDimensions;
  return {
    embeddingModel: pickModel(config?.embeddingModel, DEFAULT_EMBEDDING_MODEL),
    ...(typeof dimensions === 'number' && Number.isFinite(dimensions) && dimensions > 0
      ? { embeddingDimensions: Math.floor(dimensions) }
      : {}),
  };
}

function resolveChunking(config?: ChunkingConfig): Required<ChunkingConfig> {
  return {
    maxChars: pickPositiveInt(config?.maxChars, DEFAULT_MAX_PASSAGE_CHARS),
    batchSize: pickPositiveInt(config?.batchSize, DEFAULT_EMBEDDING_BATCH_SIZE),
  };
}

export function resolvePreprocessConfig(config?: ChatPreprocessConfig): ResolvedPreprocessConfig {
  const rootDir = path.resolve(config?.paths?.rootDir ?? process.cwd());

  function resolveOverride(key: keyof PreprocessPathOverrides, defaultPath: string): string {
    const override = config?.paths?.[key];
    if (!override) {
      return defaultPath;
    }
    return path.isAbsolute(override) ? override : path.resolve(rootDir, override);
  }

  const paths: PreprocessPaths = {
    rootDir,
    notesDir: resolveOverride('notesDir', path.resolve(rootDir, 'notes')),
    indexOutput: resolveOverride('indexOutput', path.resolve(rootDir, 'data/corpus-index.json')),
  };

  return {
    envFiles: config?.envFiles?.length ? config.envFiles : DEFAULT_ENV_FILES,
    paths,
    models: resolveModelConfig(config?.models),
    chunking: resolveChunking(config?.chunking),
  };
}

export async function loadConfigFile(configPath: string): Promise<ChatPreprocessConfig> {
  const absolute = path.resolve(process.cwd(), configPath);
  const ext = path.extname(absolute).toLowerCase();

  let parsed: unknown;
  if (ext === '.json') {
    parsed = JSON.parse(await fs.readFile(absolute, 'utf-8'));
  } else if (ext === '.yml' || ext === '.yaml') {
    parsed = YAML.parse(await fs.readFile(absolute, 'utf-8'));
  } else {
    throw new Error(`Unsupported config format for ${configPath}. Use .json or .yaml`);
  }

  const result = preprocessConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid configuration at ${configPath}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unparseable'}`);
  }
  return result.data;
}

export function coerceEnvFileList(
  cliValues?: string[] | string,
  configValues?: string[] | string
): string[] | undefined {
  const list = toArray(cliValues) ?? toArray(configValues);
  return list?.length ? list : undefined;
}
