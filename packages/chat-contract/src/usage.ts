export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

const PROMPT_TOKEN_KEYS = ['prompt_tokens', 'promptTokens', 'input_tokens'] as const;
const COMPLETION_TOKEN_KEYS = ['completion_tokens', 'completionTokens', 'output_tokens'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function coerceTokenCount(value: unknown): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      return null;
    }
    return value;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) {
      return null;
    }
    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed) || parsed < 0) {
      return null;
    }
    return parsed;
  }

  return null;
}

function pickTokenCount(record: Record<string, unknown>, keys: readonly string[]): number {
  for (const key of keys) {
    const parsed = coerceTokenCount(record[key]);
    if (parsed !== null) {
      return parsed;
    }
  }
  return 0;
}

export type ParseUsageOptions = {
  allowZero?: boolean;
};

/**
 * Normalise a provider usage report (OpenAI `input_tokens`/`output_tokens`,
 * chat-completions `prompt_tokens`/`completion_tokens`, Anthropic `input_tokens`/`output_tokens`).
 * Returns null for empty reports unless `allowZero` is set.
 */
export function parseUsage(usageCandidate: unknown, options: ParseUsageOptions = {}): TokenUsage | null {
  if (!isRecord(usageCandidate)) {
    return options.allowZero ? { promptTokens: 0, completionTokens: 0, totalTokens: 0 } : null;
  }

  const promptTokens = pickTokenCount(usageCandidate, PROMPT_TOKEN_KEYS);
  const completionTokens = pickTokenCount(usageCandidate, COMPLETION_TOKEN_KEYS);
  const totalTokens = promptTokens + completionTokens;

  if (!options.allowZero && totalTokens <= 0) {
    return null;
  }

  return { promptTokens, completionTokens, totalTokens };
}

export function mergeUsage(a: TokenUsage | null, b: TokenUsage | null): TokenUsage | null {
  if (!a) return b;
  if (!b) return a;
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}
