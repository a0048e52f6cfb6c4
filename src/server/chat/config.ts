import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import type { GuardrailFailMode } from '@recap/chat-orchestrator';
import { DEFAULT_MIN_SCORE, DEFAULT_TOP_K, MAX_TOP_K } from '@recap/chat-contract';

export type ChatProvider = 'openai' | 'anthropic';

/**
 * Raw `chat.config.yml` contents. Recognised keys: `provider`, `models`, `tokens`, `retrieval`,
 * `moderation`, `generation`; anything else is ignored. Values are checked in `resolveChatConfig`.
 */
export type ChatConfig = Record<string, unknown>;

export type ResolvedChatConfig = {
  provider: ChatProvider;
  models: {
    answerModel: string;
    embeddingModel: string;
    moderationModel?: string;
    classifierModel?: string;
    answerTemperature?: number;
  };
  tokens: {
    answer?: number;
    contextBudget?: number;
  };
  retrieval: {
    topK: number;
    maxTopK: number;
    minScore: number;
    timeoutMs?: number;
    /** Absolute path of the corpus index JSON. */
    indexFile: string;
  };
  moderation: {
    input: { enabled: boolean; blockedMessage?: string };
    output: { enabled: boolean; blockedMessage?: string };
    topic: { enabled: boolean; policy?: string };
    failMode: GuardrailFailMode;
  };
  generation: {
    idleTimeoutMs?: number;
  };
};

const DEFAULT_CONFIG_FILES = ['chat.config.yml', 'chat.config.yaml', 'chat.config.json'];
const DEFAULT_ANSWER_MODELS: Record<ChatProvider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
};
const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
const DEFAULT_INDEX_FILE = 'data/corpus-index.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const section = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});

function readConfigFile(filePath: string): ChatConfig | undefined {
  const ext = path.extname(filePath).toLowerCase();
  const raw = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  if (ext === '.json') {
    parsed = JSON.parse(raw);
  } else if (ext === '.yml' || ext === '.yaml') {
    parsed = YAML.parse(raw);
  } else {
    return undefined;
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error(`Chat config at ${filePath} must be a mapping`);
  }
  return parsed;
}

/** `CHAT_CONFIG_PATH` wins; otherwise the first of chat.config.{yml,yaml,json} in `cwd`. */
export function loadChatConfig(cwd: string = process.cwd()): ChatConfig | undefined {
  const override = process.env.CHAT_CONFIG_PATH?.trim();
  if (override) {
    return readConfigFile(path.resolve(cwd, override));
  }
  for (const candidate of DEFAULT_CONFIG_FILES) {
    const absolute = path.resolve(cwd, candidate);
    if (fs.existsSync(absolute)) {
      return readConfigFile(absolute);
    }
  }
  return undefined;
}

const normalizeBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === 'boolean') return value;
  return undefined;
};

const normalizeString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

const normalizeProvider = (value: unknown): ChatProvider | undefined => {
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'openai') return 'openai';
  if (normalized === 'anthropic' || normalized === 'claude') return 'anthropic';
  return undefined;
};

const normalizeNumber = (value: unknown): number | undefined => {
  if (typeof value !== 'number') return undefined;
  if (!Number.isFinite(value)) return undefined;
  return value > 0 ? value : undefined;
};

const normalizeNonNegative = (value: unknown): number | undefined => {
  if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
  return value >= 0 ? value : undefined;
};

function normalizeTemperature(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  return Math.min(2, Math.max(0, value));
}

const clampTopK = (value: unknown, max: number): number | undefined => {
  const positive = normalizeNumber(value);
  if (positive === undefined) return undefined;
  return Math.max(1, Math.min(max, Math.floor(positive)));
};

const normalizeMinScore = (value: unknown): number | undefined => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
};

const normalizeFailMode = (value: unknown): GuardrailFailMode | undefined => {
  const normalized = normalizeString(value)?.toLowerCase();
  return normalized === 'open' || normalized === 'closed' ? normalized : undefined;
};

const optionalInt = (value: number | undefined): number | undefined =>
  value === undefined ? undefined : Math.floor(value);

export function resolveChatConfig(config: ChatConfig = {}, cwd: string = process.cwd()): ResolvedChatConfig {
  const provider = normalizeProvider(config.provider) ?? 'openai';
  const models = section(config.models);
  const tokens = section(config.tokens);
  const retrieval = section(config.retrieval);
  const moderation = section(config.moderation);
  const generation = section(config.generation);

  const maxTopK = clampTopK(retrieval.maxTopK, Number.MAX_SAFE_INTEGER) ?? MAX_TOP_K;
  const topK = clampTopK(retrieval.topK, maxTopK) ?? Math.min(DEFAULT_TOP_K, maxTopK);
  const indexFile = normalizeString(retrieval.indexFile) ?? DEFAULT_INDEX_FILE;

  return {
    provider,
    models: {
      answerModel: normalizeString(models.answerModel) ?? DEFAULT_ANSWER_MODELS[provider],
      embeddingModel: normalizeString(models.embeddingModel) ?? DEFAULT_EMBEDDING_MODEL,
      moderationModel: normalizeString(models.moderationModel),
      classifierModel: normalizeString(models.classifierModel),
      answerTemperature: normalizeTemperature(models.answerTemperature),
    },
    tokens: {
      answer: optionalInt(normalizeNumber(tokens.answer)),
      contextBudget: optionalInt(normalizeNumber(tokens.contextBudget)),
    },
    retrieval: {
      topK,
      maxTopK,
      minScore: normalizeMinScore(retrieval.minScore) ?? DEFAULT_MIN_SCORE,
      timeoutMs: optionalInt(normalizeNonNegative(retrieval.timeoutMs)),
      indexFile: path.resolve(cwd, indexFile),
    },
    moderation: {
      input: {
        enabled: normalizeBoolean(section(moderation.input).enabled) ?? true,
        blockedMessage: normalizeString(moderation.blockedInputMessage),
      },
      output: {
        enabled: normalizeBoolean(section(moderation.output).enabled) ?? true,
        blockedMessage: normalizeString(moderation.blockedOutputMessage),
      },
      topic: {
        enabled: normalizeBoolean(section(moderation.topic).enabled) ?? false,
        policy: normalizeString(section(moderation.topic).policy),
      },
      failMode: normalizeFailMode(moderation.failMode) ?? 'open',
    },
    generation: {
      idleTimeoutMs: optionalInt(normalizeNonNegative(generation.idleTimeoutMs)),
    },
  };
}
