export * from './pipelineTypes';
export * from './pipelinePrompts';
export {
  ChatPipelineError,
  GenerationFailedError,
  RetrievalUnavailableError,
  formatLogValue,
  type ChatPipelineErrorCode,
} from './errors';
export { createRetriever, type Retriever, type RetrieverOptions } from './runtime/retrieval';
export {
  createGuardrailGate,
  DEFAULT_BLOCKED_INPUT_MESSAGE,
  DEFAULT_BLOCKED_OUTPUT_MESSAGE,
  type GuardrailDecision,
  type GuardrailFailMode,
  type GuardrailGate,
  type GuardrailGateOptions,
} from './runtime/guardrail';
export {
  assembleContext,
  countTokens,
  formatPassage,
  renderContextBlock,
  type AssembleContextInput,
  type AssembledContext,
  type Citation,
  type TokenCounter,
} from './runtime/context';
export {
  createStreamingGenerator,
  type GenerateOptions,
  type GenerationPrompt,
  type StreamingGenerator,
  type StreamingGeneratorOptions,
} from './runtime/generator';
export {
  createChatRuntime,
  BLOCKED_OUTPUT_SEPARATOR,
  DEFAULT_CONTEXT_BUDGET_TOKENS,
  type ChatRunResult,
  type ChatRuntime,
  type ChatRuntimeOptions,
  type ChatStreamOptions,
} from './runtime/pipeline';
