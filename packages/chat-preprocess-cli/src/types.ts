import type { LoadedEnvFile } from '@recap/chat-api';
import type { EmbeddingProvider } from '@recap/chat-data';

export type PreprocessTaskResult = {
  description?: string;
  counts?: Array<{ label: string; value: number }>;
  artifacts?: Array<{ path: string; note?: string }>;
  /** Inputs that could not be processed; any entry makes the run fail. */
  failures?: Array<{ path: string; error: string }>;
};

export type PreprocessModelConfig = {
  /** Must match `models.embeddingModel` in chat.config.yml, or query vectors will not line up. */
  embeddingModel?: string;
  embeddingDimensions?: number;
};

export type ResolvedModelConfig = {
  embeddingModel: string;
  embeddingDimensions?: number;
};

export type ChunkingConfig = {
  maxChars?: number;
  batchSize?: number;
};

export type ChatPreprocessConfig = {
  /**
   * List of env files to load before running tasks.
   */
  envFiles?: string[];
  /**
   * File-system override knobs.
   */
  paths?: Partial<PreprocessPathOverrides>;
  models?: PreprocessModelConfig;
  chunking?: ChunkingConfig;
};

export type PreprocessPathOverrides = {
  rootDir: string;
  notesDir: string;
  indexOutput: string;
};

export type PreprocessPaths = PreprocessPathOverrides;

export type ResolvedPreprocessConfig = {
  envFiles: string[];
  paths: PreprocessPaths;
  models: ResolvedModelConfig;
  chunking: Required<ChunkingConfig>;
};

export type ArtifactWriteResult = {
  id: string;
  absolutePath: string;
  relativePath: string;
};

export type ArtifactManager = {
  writeJson: (input: { id: string; filePath: string; data: unknown }) => Promise<ArtifactWriteResult>;
};

export type PreprocessLogger = {
  info: (message: string) => void;
  error: (message: string) => void;
};

export type PreprocessContext = {
  config: ResolvedPreprocessConfig;
  paths: PreprocessPaths;
  models: ResolvedModelConfig;
  envFiles: LoadedEnvFile[];
  artifacts: ArtifactManager;
  embeddingProvider: EmbeddingProvider;
  log: PreprocessLogger;
};

export type CliTask = {
  name: string;
  label: string;
  run: (context: PreprocessContext) => Promise<PreprocessTaskResult>;
};
