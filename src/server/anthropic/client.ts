import { requireEnv } from '@recap/chat-api';
import { createAnthropicClient, createAnthropicLlmClient, type AnthropicLlmClient } from '@recap/chat-llm';

let cached: AnthropicLlmClient | null = null;

export function hasAnthropicKey(): boolean {
  return Boolean(process.env.ANTHROPIC_API_KEY?.trim());
}

export function getAnthropicLlmClient(): AnthropicLlmClient {
  if (cached) {
    return cached;
  }
  const apiKey = requireEnv('ANTHROPIC_API_KEY').trim();
  cached = createAnthropicLlmClient(
    createAnthropicClient({ apiKey, timeoutMs: Number(process.env.ANTHROPIC_TIMEOUT_MS ?? 90000) })
  );
  return cached;
}
