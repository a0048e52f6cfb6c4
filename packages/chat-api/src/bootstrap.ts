import type { LlmClient } from '@recap/chat-llm';
import { createFilesystemPassageIndex, type EmbeddingProvider, type PassageIndex } from '@recap/chat-data';
import {
  createChatRuntime,
  createGuardrailGate,
  createRetriever,
  createStreamingGenerator,
  type ChatRuntime,
  type GuardrailFailMode,
  type GuardrailGate,
  type ModerationService,
  type Retriever,
} from '@recap/chat-orchestrator';
import type { ChatHealth } from './chatHandler';
import type { ChatServerLogger } from './server';

export type FilesystemChatProviderOptions = {
  /** Parsed corpus index JSON; absent when nothing has been ingested yet. */
  indexFile?: unknown;
  embeddingProvider?: EmbeddingProvider | null;
};

export type ChatServerOptions = FilesystemChatProviderOptions & {
  /** Null when no provider key is configured. */
  llmClient: LlmClient | null;
  moderation: ModerationService | null;
  models: {
    answerModel: string;
    answerTemperature?: number;
  };
  tokens?: {
    answer?: number;
    contextBudget?: number;
  };
  retrieval?: {
    topK?: number;
    maxTopK?: number;
    minScore?: number;
    timeoutMs?: number;
  };
  guardrail?: {
    input?: { enabled?: boolean; blockedMessage?: string };
    output?: { enabled?: boolean; blockedMessage?: string };
    failMode?: GuardrailFailMode;
  };
  generation?: {
    idleTimeoutMs?: number;
  };
  systemInstruction?: string;
  logger?: ChatServerLogger;
};

export type BootstrapResult = {
  providers: {
    passageIndex: PassageIndex | null;
  };
  retriever: Retriever;
  guardrail: GuardrailGate;
  runtime: ChatRuntime | null;
  health: () => ChatHealth;
};

export function createFilesystemChatProviders(options: FilesystemChatProviderOptions): BootstrapResult['providers'] {
  if (options.indexFile === undefined || options.indexFile === null || !options.embeddingProvider) {
    return { passageIndex: null };
  }
  return {
    passageIndex: createFilesystemPassageIndex({
      indexFile: options.indexFile,
      embeddingProvider: options.embeddingProvider,
    }),
  };
}

export function createChatServer(options: ChatServerOptions): BootstrapResult {
  const { logger } = options;
  const providers = createFilesystemChatProviders(options);

  const retriever = createRetriever({
    index: providers.passageIndex,
    defaultTopK: options.retrieval?.topK,
    maxTopK: options.retrieval?.maxTopK,
    minScore: options.retrieval?.minScore,
    timeoutMs: options.retrieval?.timeoutMs,
    logger,
  });

  const guardrail = createGuardrailGate({
    moderation: options.moderation,
    input: options.guardrail?.input,
    output: options.guardrail?.output,
    failMode: options.guardrail?.failMode,
    logger,
  });

  const runtime = options.llmClient
    ? createChatRuntime({
        retriever,
        guardrail,
        generator: createStreamingGenerator({
          client: options.llmClient,
          model: options.models.answerModel,
          maxOutputTokens: options.tokens?.answer,
          temperature: options.models.answerTemperature,
          idleTimeoutMs: options.generation?.idleTimeoutMs,
          logger,
        }),
        topK: options.retrieval?.topK,
        minScore: options.retrieval?.minScore,
        contextBudgetTokens: options.tokens?.contextBudget,
        systemInstruction: options.systemInstruction,
        logger,
      })
    : null;

  return {
    providers,
    retriever,
    guardrail,
    runtime,
    health: () => ({
      knowledgeBaseConfigured: providers.passageIndex !== null && providers.passageIndex.size() > 0,
      guardrailConfigured: guardrail.configured,
    }),
  };
}
