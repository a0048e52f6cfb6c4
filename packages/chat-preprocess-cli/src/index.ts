import fs from 'node:fs';
import fsPromises from 'node:fs/promises';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { parseArgs } from 'node:util';
import OpenAI from 'openai';
import { createOpenAIEmbeddingProvider, loadEnvFiles } from '@recap/chat-api';
import type { EmbeddingProvider } from '@recap/chat-data';
import { coerceEnvFileList, loadConfigFile, mergeConfigs, resolvePreprocessConfig } from './config';
import { createArtifactManager } from './artifacts/manager';
import { PreprocessError, PREPROCESS_ERROR_CODES } from './errors';
import { runCorpusEmbeddingsTask } from './tasks/corpus-embeddings';
import type {
  ChatPreprocessConfig,
  CliTask,
  PreprocessContext,
  PreprocessLogger,
  PreprocessTaskResult,
  ResolvedPreprocessConfig,
} from './types';

const FAIL_PREFIX = '❌';
const OK_PREFIX = '✅';
const INFO_PREFIX = '🔍';

type ParsedCliArgs = {
  configPath?: string;
  envFiles?: string[];
  notesDir?: string;
  output?: string;
  seeOutput?: boolean;
};

const DEFAULT_CONFIG_PATHS = ['chat-preprocess.config.yml', 'chat-preprocess.config.yaml', 'chat-preprocess.config.json'];

function findDefaultConfigPath(): string | undefined {
  const cwd = process.cwd();
  for (const candidate of DEFAULT_CONFIG_PATHS) {
    const absolute = path.resolve(cwd, candidate);
    if (fs.existsSync(absolute)) {
      return absolute;
    }
  }
  return undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string' },
      env: { type: 'string', multiple: true },
      notes: { type: 'string' },
      out: { type: 'string' },
      seeOutput: { type: 'boolean' },
    },
  });

  return {
    configPath: values.config,
    envFiles: values.env,
    notesDir: values.notes ?? positionals[0] ?? process.env.NOTES_LOCAL_DIR,
    output: values.out,
    seeOutput: values.seeOutput,
  };
}

function formatDuration(durationMs: number) {
  if (durationMs < 1000) {
    return `${durationMs.toFixed(0)}ms`;
  }
  return `${(durationMs / 1000).toFixed(1)}s`;
}

type TaskSummary = {
  label: string;
  durationMs: number;
  result: PreprocessTaskResult;
};

export type PreprocessRunSummary = {
  tasks: TaskSummary[];
  failed: number;
};

export type RunPreprocessCliOptions = {
  argv?: string[];
  config?: ChatPreprocessConfig;
  seeOutput?: boolean;
  /** Replaces the OpenAI embeddings client. */
  embeddingProvider?: EmbeddingProvider;
  log?: PreprocessLogger;
};

const consoleLogger: PreprocessLogger = {
  info: (message) => console.log(message),
  error: (message) => console.error(message),
};

function buildTaskList(): CliTask[] {
  return [{ name: 'corpus-embeddings', label: 'Corpus index (markdown notes → embeddings)', run: runCorpusEmbeddingsTask }];
}

function createDefaultEmbeddingProvider(config: ResolvedPreprocessConfig): EmbeddingProvider {
  let client: OpenAI | null = null;
  return createOpenAIEmbeddingProvider({
    model: config.models.embeddingModel,
    dimensions: config.models.embeddingDimensions,
    getClient: async () => {
      if (!client) {
        const apiKey = process.env.OPENAI_API_KEY;
        if (!apiKey) {
          throw new PreprocessError(PREPROCESS_ERROR_CODES.MISSING_API_KEY, 'OPENAI_API_KEY is required to embed notes');
        }
        client = new OpenAI({ apiKey });
      }
      return client;
    },
  });
}

async function printArtifactOutputs(
  artifacts: PreprocessTaskResult['artifacts'],
  rootDir: string,
  log: PreprocessLogger
): Promise<void> {
  if (!artifacts?.length) return;
  for (const artifact of artifacts) {
    const absolutePath = path.isAbsolute(artifact.path) ? artifact.path : path.resolve(rootDir, artifact.path);
    try {
      const contents = await fsPromises.readFile(absolutePath, 'utf-8');
      log.info(`   • output ${path.relative(rootDir, absolutePath)}:`);
      log.info(contents);
    } catch (error) {
      log.error(`${INFO_PREFIX} Failed to print artifact ${artifact.path}: ${String(error)}`);
    }
  }
}

export async function runPreprocessCli(options?: RunPreprocessCliOptions): Promise<PreprocessRunSummary> {
  const log = options?.log ?? consoleLogger;
  const argv = options?.argv ?? process.argv.slice(2);
  const cliArgs = parseCliArgs(argv);
  const seeOutput = cliArgs.seeOutput ?? options?.seeOutput ?? false;
  const configPath = cliArgs.configPath ?? findDefaultConfigPath();
  const fileConfig = configPath ? await loadConfigFile(configPath) : undefined;
  const cliConfig: ChatPreprocessConfig = {
    paths: {
      ...(cliArgs.notesDir ? { notesDir: cliArgs.notesDir } : {}),
      ...(cliArgs.output ? { indexOutput: cliArgs.output } : {}),
    },
  };
  const mergedConfig = mergeConfigs([fileConfig, options?.config, cliConfig]);
  mergedConfig.envFiles = coerceEnvFileList(cliArgs.envFiles, mergedConfig.envFiles);

  const resolvedConfig = resolvePreprocessConfig(mergedConfig);
  const loadedEnv = loadEnvFiles(resolvedConfig.envFiles);
  const loadedList = loadedEnv
    .filter((entry) => entry.loaded)
    .map((entry) => entry.path)
    .join(', ');
  log.info(
    loadedList
      ? `${INFO_PREFIX} Loaded env files: ${loadedList}`
      : `${INFO_PREFIX} No env files found (falling back to process env)`
  );

  const context: PreprocessContext = {
    config: resolvedConfig,
    paths: resolvedConfig.paths,
    models: resolvedConfig.models,
    envFiles: loadedEnv,
    artifacts: createArtifactManager({ rootDir: resolvedConfig.paths.rootDir }),
    embeddingProvider: options?.embeddingProvider ?? createDefaultEmbeddingProvider(resolvedConfig),
    log,
  };

  const summaries: TaskSummary[] = [];
  let failed = 0;
  for (const task of buildTaskList()) {
    log.info(`\n${INFO_PREFIX} ${task.label}`);
    const start = performance.now();
    try {
      const result = await task.run(context);
      const durationMs = performance.now() - start;
      summaries.push({ label: task.label, durationMs, result });
      const taskFailures = result.failures?.length ?? 0;
      failed += taskFailures;
      log.info(`${taskFailures ? FAIL_PREFIX : OK_PREFIX} Completed in ${formatDuration(durationMs)}`);
      if (result.description) {
        log.info(`   ${result.description}`);
      }
      for (const count of result.counts ?? []) {
        log.info(`   • ${count.label}: ${count.value}`);
      }
      for (const artifact of result.artifacts ?? []) {
        const note = artifact.note ? ` (${artifact.note})` : '';
        log.info(`   • wrote ${artifact.path}${note}`);
      }
      for (const failure of result.failures ?? []) {
        log.error(`   • failed ${failure.path}: ${failure.error}`);
      }
      if (seeOutput) {
        await printArtifactOutputs(result.artifacts, resolvedConfig.paths.rootDir, log);
      }
    } catch (error) {
      log.error(`${FAIL_PREFIX} ${task.label} failed`);
      throw error;
    }
  }

  log.info('\nSummary');
  for (const summary of summaries) {
    const stat = summary.result.counts?.map((c) => `${c.label}: ${c.value}`).join(', ');
    const extra = stat ? ` – ${stat}` : '';
    log.info(` - ${summary.label}: ${formatDuration(summary.durationMs)}${extra}`);
  }

  return { tasks: summaries, failed };
}

export type { ChatPreprocessConfig, PreprocessContext, PreprocessTaskResult } from './types';
export { loadConfigFile, resolvePreprocessConfig };
export { extractTitle, splitIntoPassages } from './tasks/corpus-embeddings';
export { PreprocessError, PREPROCESS_ERROR_CODES, type PreprocessErrorCode } from './errors';
