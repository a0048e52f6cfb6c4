import { formatLogValue } from '../errors';
import type { ChatLogger, GuardrailDirection, ModerationService } from '../pipelineTypes';

export const DEFAULT_BLOCKED_INPUT_MESSAGE =
  'I can only answer questions about the videos in my summaries. Please ask something about their content.';
export const DEFAULT_BLOCKED_OUTPUT_MESSAGE = 'The rest of this answer was withheld by my safety filters.';

export type GuardrailFailMode = 'open' | 'closed';

export type GuardrailDecision =
  | { action: 'allowed' }
  | { action: 'blocked'; direction: GuardrailDirection; message: string; categories: string[] };

export type GuardrailGate = {
  evaluate(text: string, direction: GuardrailDirection, options?: { signal?: AbortSignal }): Promise<GuardrailDecision>;
  /** True when at least one direction is enabled and a moderation service is present. */
  readonly configured: boolean;
};

type DirectionOptions = {
  enabled?: boolean;
  blockedMessage?: string;
};

export type GuardrailGateOptions = {
  moderation: ModerationService | null;
  input?: DirectionOptions;
  output?: DirectionOptions;
  failMode?: GuardrailFailMode;
  logger?: ChatLogger;
};

const ALLOWED: GuardrailDecision = { action: 'allowed' };

export function createGuardrailGate(options: GuardrailGateOptions): GuardrailGate {
  const { moderation, logger } = options;
  const failMode: GuardrailFailMode = options.failMode === 'closed' ? 'closed' : 'open';
  const directions: Record<GuardrailDirection, { enabled: boolean; message: string }> = {
    input: {
      enabled: options.input?.enabled ?? true,
      message: options.input?.blockedMessage?.trim() || DEFAULT_BLOCKED_INPUT_MESSAGE,
    },
    output: {
      enabled: options.output?.enabled ?? true,
      message: options.output?.blockedMessage?.trim() || DEFAULT_BLOCKED_OUTPUT_MESSAGE,
    },
  };

  const block = (direction: GuardrailDirection, categories: string[]): GuardrailDecision => ({
    action: 'blocked',
    direction,
    message: directions[direction].message,
    categories,
  });

  return {
    configured: Boolean(moderation) && (directions.input.enabled || directions.output.enabled),
    async evaluate(text, direction, evaluateOptions) {
      if (!moderation || !directions[direction].enabled || !text.trim()) {
        return ALLOWED;
      }

      try {
        const verdict = await moderation.moderate(text, direction, { signal: evaluateOptions?.signal });
        if (!verdict.flagged) {
          return ALLOWED;
        }
        logger?.('guardrail.blocked', { direction, categories: verdict.categories });
        return block(direction, verdict.categories);
      } catch (error) {
        logger?.('guardrail.error', { direction, failMode, error: formatLogValue(error) });
        return failMode === 'closed' ? block(direction, ['moderation_unavailable']) : ALLOWED;
      }
    },
  };
}
