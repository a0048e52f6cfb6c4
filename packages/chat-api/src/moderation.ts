import { z } from 'zod';
import type { JsonSchema, LlmClient } from '@recap/chat-llm';
import {
  DEFAULT_TOPIC_POLICY,
  renderTemplate,
  topicClassifierSystemPrompt,
  type ChatLogger,
  type GuardrailDirection,
  type ModerationService,
  type ModerationVerdict,
} from '@recap/chat-orchestrator';

const DEFAULT_OPENAI_MODERATION_MODEL = 'omni-moderation-latest';
const DEFAULT_ANTHROPIC_MODERATION_MODEL = 'claude-3-5-haiku-latest';
const DEFAULT_OPENAI_CLASSIFIER_MODEL = 'gpt-4o-mini';

export const OFF_TOPIC_CATEGORY = 'off_topic';

export type ModerationServiceOptions = {
  client: LlmClient;
  safety?: {
    enabled?: boolean;
    model?: string;
  };
  /** Input only: replies are not held to the topic policy. */
  topic?: {
    enabled?: boolean;
    policy?: string;
    model?: string;
  };
  logger?: ChatLogger;
};

const MODERATION_SCHEMA: JsonSchema = {
  type: 'json_schema',
  name: 'moderation_result',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['flagged', 'categories'],
    properties: {
      flagged: { type: 'boolean', description: 'True if content should be blocked for safety reasons.' },
      categories: {
        type: 'array',
        items: { type: 'string' },
        description: 'Category labels for why content was flagged.',
      },
    },
  },
};

const TOPIC_SCHEMA: JsonSchema = {
  type: 'json_schema',
  name: 'topic_result',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['onTopic', 'reason'],
    properties: {
      onTopic: { type: 'boolean' },
      reason: { type: 'string' },
    },
  },
};

const moderationResultSchema = z.object({
  flagged: z.boolean(),
  categories: z.array(z.string()).default([]),
});

const topicResultSchema = z.object({
  onTopic: z.boolean(),
  reason: z.string().optional(),
});

const SAFETY_CLASSIFIER_PROMPT =
  'You are a safety classifier for a chatbot about summarized videos. Decide whether the content should be blocked. ' +
  'Flag content that requests or contains disallowed or harmful material (explicit sexual content, hate, violence, ' +
  'self-harm encouragement, illegal wrongdoing, instructions for harm). Discussing what a video covers is typically allowed.';

function parseStructured<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, structured: unknown, stage: string): T {
  const parsed = schema.safeParse(structured);
  if (!parsed.success) {
    throw new Error(`Invalid ${stage} classifier output: ${parsed.error.issues[0]?.message ?? 'unparseable'}`);
  }
  return parsed.data;
}

function flaggedCategories(results: Array<{ flagged: boolean; categories: object }>): string[] {
  const categories = new Set<string>();
  for (const result of results) {
    if (!result.flagged) continue;
    for (const [category, value] of Object.entries(result.categories)) {
      if (value === true) {
        categories.add(category);
      }
    }
  }
  return Array.from(categories);
}

/**
 * Safety moderation (OpenAI moderation endpoint, or a Claude classifier on Anthropic) plus an
 * optional topic gate for user input. Rejects when a backend call fails or returns junk.
 */
export function createModerationService(options: ModerationServiceOptions): ModerationService {
  const { client, logger } = options;
  const safetyEnabled = options.safety?.enabled ?? true;
  const topicEnabled = options.topic?.enabled ?? false;
  const topicPolicy = options.topic?.policy?.trim() || DEFAULT_TOPIC_POLICY;
  const classifierModel =
    options.topic?.model ??
    (client.provider === 'openai' ? DEFAULT_OPENAI_CLASSIFIER_MODEL : DEFAULT_ANTHROPIC_MODERATION_MODEL);

  async function checkSafety(text: string, signal?: AbortSignal): Promise<ModerationVerdict> {
    if (client.provider === 'openai') {
      const response = await client.openai.moderations.create(
        { model: options.safety?.model ?? DEFAULT_OPENAI_MODERATION_MODEL, input: text },
        signal ? { signal } : undefined
      );
      const flagged = response.results.some((result) => result.flagged);
      return flagged ? { flagged: true, categories: flaggedCategories(response.results) } : { flagged: false, categories: [] };
    }

    const result = await client.createStructuredJson({
      model: options.safety?.model ?? DEFAULT_ANTHROPIC_MODERATION_MODEL,
      systemPrompt: SAFETY_CLASSIFIER_PROMPT,
      userContent: `Content to evaluate:\n${text}`,
      jsonSchema: MODERATION_SCHEMA,
      maxOutputTokens: 200,
      signal,
      logger,
      stage: 'moderation',
    });
    const verdict = parseStructured(moderationResultSchema, result.structured, 'moderation');
    return verdict.flagged ? verdict : { flagged: false, categories: [] };
  }

  async function checkTopic(text: string, signal?: AbortSignal): Promise<ModerationVerdict> {
    const result = await client.createStructuredJson({
      model: classifierModel,
      systemPrompt: renderTemplate(topicClassifierSystemPrompt, { TOPIC_POLICY: topicPolicy }),
      userContent: text,
      jsonSchema: TOPIC_SCHEMA,
      maxOutputTokens: 200,
      temperature: 0,
      signal,
      logger,
      stage: 'topic',
    });
    const verdict = parseStructured(topicResultSchema, result.structured, 'topic');
    if (verdict.onTopic) {
      return { flagged: false, categories: [] };
    }
    logger?.('guardrail.topic.off_topic', { reason: verdict.reason ?? null });
    return { flagged: true, categories: [OFF_TOPIC_CATEGORY] };
  }

  return {
    async moderate(text: string, direction: GuardrailDirection, moderateOptions) {
      const input = text.trim();
      if (!input) {
        return { flagged: false, categories: [] };
      }
      const signal = moderateOptions?.signal;
      if (safetyEnabled) {
        const safety = await checkSafety(input, signal);
        if (safety.flagged) {
          return safety;
        }
      }
      if (topicEnabled && direction === 'input') {
        return checkTopic(input, signal);
      }
      return { flagged: false, categories: [] };
    },
  };
}
