import fs from 'node:fs';
import {
  createChatHandler,
  createChatServer,
  createChatServerLogger,
  createModerationService,
  createOpenAIEmbeddingProvider,
  type ChatHandler,
  type ChatServerLogger,
} from '@recap/chat-api';
import { assertCorpusIndex, type CorpusIndex } from '@recap/chat-data';
import { formatLogValue } from '@recap/chat-orchestrator';
import { getLlmClient } from '@/server/llm/client';
import { getOpenAIClient, hasOpenAIKey } from '@/server/openai/client';
import { loadChatConfig, resolveChatConfig, type ChatConfig, type ResolvedChatConfig } from './config';

export type ChatApp = {
  handler: ChatHandler;
  config: ResolvedChatConfig;
  logger: ChatServerLogger;
};

export type CreateChatAppOptions = {
  cwd?: string;
  /** Skips reading chat.config.yml. */
  config?: ChatConfig;
};

/** A missing or unreadable index leaves the service answering without context. */
function readIndexFile(filePath: string, logger: ChatServerLogger): CorpusIndex | undefined {
  if (!fs.existsSync(filePath)) {
    logger('retrieval.index_missing', { indexFile: filePath });
    return undefined;
  }
  try {
    return assertCorpusIndex(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  } catch (error) {
    logger('retrieval.index_error', { indexFile: filePath, error: formatLogValue(error) });
    return undefined;
  }
}

export async function createChatApp(options: CreateChatAppOptions = {}): Promise<ChatApp> {
  const cwd = options.cwd ?? process.cwd();
  const config = resolveChatConfig(options.config ?? loadChatConfig(cwd), cwd);
  const logger = createChatServerLogger();

  const llmClient = await getLlmClient(config.provider);
  if (!llmClient) {
    logger('chat.bootstrap.llm_unconfigured', { provider: config.provider });
  }

  const embeddingProvider = hasOpenAIKey()
    ? createOpenAIEmbeddingProvider({ model: config.models.embeddingModel, getClient: getOpenAIClient })
    : null;

  const moderation = llmClient
    ? createModerationService({
        client: llmClient,
        safety: { enabled: true, model: config.models.moderationModel },
        topic: { ...config.moderation.topic, model: config.models.classifierModel },
        logger,
      })
    : null;

  const server = createChatServer({
    indexFile: readIndexFile(config.retrieval.indexFile, logger),
    embeddingProvider,
    llmClient,
    moderation,
    models: config.models,
    tokens: config.tokens,
    retrieval: config.retrieval,
    guardrail: {
      input: config.moderation.input,
      output: config.moderation.output,
      failMode: config.moderation.failMode,
    },
    generation: config.generation,
    logger,
  });

  const handler = createChatHandler({
    getRuntime: () => server.runtime,
    health: server.health,
    onErrorLog: (event, payload) => logger(event, payload),
  });

  logger('chat.bootstrap.ready', {
    provider: config.provider,
    answerModel: config.models.answerModel,
    ...server.health(),
  });

  return { handler, config, logger };
}

let chatApp: Promise<ChatApp> | null = null;

export function getChatApp(): Promise<ChatApp> {
  chatApp ??= createChatApp();
  return chatApp;
}
