export { createChatSseStream, encodeStreamEvent, SSE_HEADERS } from './stream';
export {
  createChatServer,
  createFilesystemChatProviders,
  type BootstrapResult,
  type ChatServerOptions,
  type FilesystemChatProviderOptions,
} from './bootstrap';
export {
  createChatServerLogger,
  logChatDebug,
  getChatDebugLogs,
  resetChatDebugLogs,
  runWithChatLogContext,
  chatDebugLevel,
} from './server';
export type { ChatDebugLevel, ChatDebugLogEntry, ChatServerLogger } from './server';
export { validateChatPostBody } from './validation';
export { correlateSession } from './session';
export { createModerationService, OFF_TOPIC_CATEGORY, type ModerationServiceOptions } from './moderation';
export { createOpenAIEmbeddingProvider } from './embedding';
export { DEFAULT_ENV_FILES, loadEnvFiles, parseEnvLine, requireEnv, type LoadedEnvFile } from './env';
export {
  createChatHandler,
  errorResponse,
  type ChatHandler,
  type ChatHandlerOptions,
  type ChatHealth,
} from './chatHandler';
