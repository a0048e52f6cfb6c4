import type OpenAI from 'openai';
import type { ResponseFormatTextJSONSchemaConfig, ResponseInputItem } from 'openai/resources/responses/responses';
import Anthropic from '@anthropic-ai/sdk';

export type LlmProviderId = 'openai' | 'anthropic';

export type JsonSchema = ResponseFormatTextJSONSchemaConfig;

export type LlmLogger = (event: string, payload: Record<string, unknown>) => void;

export type LlmTurn = {
  role: 'user' | 'assistant';
  content: string;
};

type LlmPromptBase = {
  systemPrompt: string;
  model: string;
  maxOutputTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  logger?: LlmLogger;
  stage?: string;
};

export type LlmStructuredPrompt = LlmPromptBase & {
  userContent: string;
  /**
   * JSON Schema object describing the expected output.
   * For OpenAI this is passed as `text.format`.
   * For Anthropic this is embedded into the prompt as guidance.
   */
  jsonSchema: JsonSchema;
};

export type LlmStructuredResult = {
  rawText: string;
  structured?: unknown;
  usage?: unknown;
};

export type LlmTextPrompt = LlmPromptBase & {
  messages: LlmTurn[];
  /** Called once with the provider's raw usage report when the stream completes. */
  onUsage?: (usage: unknown) => void;
};

export type BaseLlmClient = {
  provider: LlmProviderId;
  createStructuredJson: (prompt: LlmStructuredPrompt) => Promise<LlmStructuredResult>;
  /** Yields text deltas in provider order. Aborting `prompt.signal` cancels the upstream request. */
  streamText: (prompt: LlmTextPrompt) => AsyncGenerator<string, void, undefined>;
};

export type OpenAiLlmClient = BaseLlmClient & {
  provider: 'openai';
  openai: OpenAI;
};

export type AnthropicLlmClient = BaseLlmClient & {
  provider: 'anthropic';
  anthropic: Anthropic;
};

export type LlmClient = OpenAiLlmClient | AnthropicLlmClient;

/** `llm.request` carries sizes only; the prompt text goes to `llm.request.raw`. */
function logRequest(
  prompt: LlmPromptBase,
  provider: LlmProviderId,
  stage: string,
  turns: LlmTurn[],
  streaming: boolean
): void {
  prompt.logger?.('llm.request', {
    provider,
    stage,
    model: prompt.model,
    maxOutputTokens: prompt.maxOutputTokens ?? null,
    turns: turns.length,
    ...(streaming ? { streaming: true } : {}),
  });
  prompt.logger?.('llm.request.raw', { provider, stage, systemPrompt: prompt.systemPrompt, messages: turns });
}

export class LlmStreamError extends Error {
  readonly provider: LlmProviderId;

  constructor(provider: LlmProviderId, message: string) {
    super(message);
    this.name = 'LlmStreamError';
    this.provider = provider;
  }
}

function buildAnthropicJsonInstruction(jsonSchema: JsonSchema): string {
  // Keep it short-ish; Claude does well with explicit "JSON only" rules.
  return [
    'You MUST respond with valid JSON only (no markdown, no prose).',
    'The JSON must conform to this JSON Schema:',
    JSON.stringify(jsonSchema.schema),
  ].join('\n');
}

function extractAnthropicText(message: Anthropic.Messages.Message): string {
  const parts: string[] = [];
  for (const block of message.content) {
    if (block.type === 'text') {
      parts.push(block.text);
    }
  }
  return parts.join('').trim();
}

function parseStructuredText(rawText: string): unknown {
  const trimmed = rawText.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

function optionalSampling(prompt: LlmPromptBase): { temperature?: number } {
  return typeof prompt.temperature === 'number' && Number.isFinite(prompt.temperature)
    ? { temperature: prompt.temperature }
    : {};
}

function optionalMaxOutputTokens(prompt: LlmPromptBase): { max_output_tokens?: number } {
  return typeof prompt.maxOutputTokens === 'number' && Number.isFinite(prompt.maxOutputTokens) && prompt.maxOutputTokens > 0
    ? { max_output_tokens: Math.floor(prompt.maxOutputTokens) }
    : {};
}

function toOpenAiInput(systemPrompt: string, turns: LlmTurn[]): ResponseInputItem[] {
  return [
    { role: 'system', content: systemPrompt, type: 'message' },
    ...turns.map((turn): ResponseInputItem => ({ role: turn.role, content: turn.content, type: 'message' })),
  ];
}

export function createOpenAiLlmClient(client: OpenAI): OpenAiLlmClient {
  return {
    provider: 'openai',
    openai: client,
    async createStructuredJson(prompt): Promise<LlmStructuredResult> {
      const stage = prompt.stage ?? 'structured_json';
      logRequest(prompt, 'openai', stage, [{ role: 'user', content: prompt.userContent }], false);

      const response = await client.responses.create(
        {
          model: prompt.model,
          stream: false,
          text: { format: prompt.jsonSchema },
          input: toOpenAiInput(prompt.systemPrompt, [{ role: 'user', content: prompt.userContent }]),
          ...optionalMaxOutputTokens(prompt),
          ...optionalSampling(prompt),
        },
        prompt.signal ? { signal: prompt.signal } : undefined
      );

      const rawText = (response.output_text ?? '').trim();
      return {
        rawText,
        structured: parseStructuredText(rawText),
        usage: response.usage,
      };
    },
    async *streamText(prompt) {
      const stage = prompt.stage ?? 'answer';
      logRequest(prompt, 'openai', stage, prompt.messages, true);

      const stream = await client.responses.create(
        {
          model: prompt.model,
          stream: true,
          input: toOpenAiInput(prompt.systemPrompt, prompt.messages),
          ...optionalMaxOutputTokens(prompt),
          ...optionalSampling(prompt),
        },
        prompt.signal ? { signal: prompt.signal } : undefined
      );

      try {
        for await (const event of stream) {
          switch (event.type) {
            case 'response.output_text.delta':
              if (event.delta) {
                yield event.delta;
              }
              break;
            case 'response.completed':
              prompt.onUsage?.(event.response.usage);
              break;
            case 'response.failed':
              throw new LlmStreamError('openai', event.response.error?.message ?? 'Response failed');
            case 'error':
              throw new LlmStreamError('openai', event.message);
            default:
              break;
          }
        }
      } finally {
        // Early return() from the consumer leaves the HTTP body open otherwise.
        stream.controller.abort();
      }
    },
  };
}

export type AnthropicClientOptions = {
  apiKey: string;
  timeoutMs?: number;
};

export function createAnthropicClient(options: AnthropicClientOptions): Anthropic {
  const timeoutMs =
    typeof options.timeoutMs === 'number' && Number.isFinite(options.timeoutMs) && options.timeoutMs > 0
      ? options.timeoutMs
      : undefined;
  return new Anthropic({ apiKey: options.apiKey, timeout: timeoutMs });
}

const DEFAULT_ANTHROPIC_MAX_OUTPUT_TOKENS = 8192;

function clampAnthropicMaxTokens(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return 1024;
  }
  return Math.max(1, Math.min(DEFAULT_ANTHROPIC_MAX_OUTPUT_TOKENS, Math.floor(value)));
}

export function createAnthropicLlmClient(client: Anthropic): AnthropicLlmClient {
  return {
    provider: 'anthropic',
    anthropic: client,
    async createStructuredJson(prompt): Promise<LlmStructuredResult> {
      const stage = prompt.stage ?? 'structured_json';
      logRequest(prompt, 'anthropic', stage, [{ role: 'user', content: prompt.userContent }], false);

      const schemaInstruction = buildAnthropicJsonInstruction(prompt.jsonSchema);
      const message = await client.messages.create(
        {
          model: prompt.model,
          max_tokens: clampAnthropicMaxTokens(prompt.maxOutputTokens),
          system: `${prompt.systemPrompt}\n\n${schemaInstruction}`,
          messages: [{ role: 'user', content: prompt.userContent }],
          ...optionalSampling(prompt),
        },
        prompt.signal ? { signal: prompt.signal } : undefined
      );

      const rawText = extractAnthropicText(message);
      return {
        rawText,
        structured: parseStructuredText(rawText),
        usage: message.usage,
      };
    },
    async *streamText(prompt) {
      const stage = prompt.stage ?? 'answer';
      logRequest(prompt, 'anthropic', stage, prompt.messages, true);

      const stream = await client.messages.create(
        {
          model: prompt.model,
          max_tokens: clampAnthropicMaxTokens(prompt.maxOutputTokens),
          system: prompt.systemPrompt,
          messages: prompt.messages.map((turn) => ({ role: turn.role, content: turn.content })),
          stream: true,
          ...optionalSampling(prompt),
        },
        prompt.signal ? { signal: prompt.signal } : undefined
      );

      let inputTokens = 0;
      let outputTokens = 0;
      try {
        for await (const event of stream) {
          switch (event.type) {
            case 'message_start':
              inputTokens = event.message.usage.input_tokens;
              outputTokens = event.message.usage.output_tokens;
              break;
            case 'content_block_delta':
              if (event.delta.type === 'text_delta' && event.delta.text) {
                yield event.delta.text;
              }
              break;
            case 'message_delta':
              outputTokens = event.usage.output_tokens;
              break;
            default:
              break;
          }
        }
        prompt.onUsage?.({ input_tokens: inputTokens, output_tokens: outputTokens });
      } finally {
        stream.controller.abort();
      }
    },
  };
}
