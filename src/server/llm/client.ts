import { createOpenAiLlmClient, type LlmClient, type LlmProviderId, type OpenAiLlmClient } from '@recap/chat-llm';
import { getOpenAIClient, hasOpenAIKey } from '@/server/openai/client';
import { getAnthropicLlmClient, hasAnthropicKey } from '@/server/anthropic/client';

let cachedOpenAi: OpenAiLlmClient | null = null;

async function getOpenAiLlmClient(): Promise<OpenAiLlmClient> {
  if (cachedOpenAi) {
    return cachedOpenAi;
  }
  const openai = await getOpenAIClient();
  const llm = createOpenAiLlmClient(openai);
  cachedOpenAi = llm;
  return llm;
}

/** Null when the provider's API key is not set; the chat endpoints then answer 503. */
export async function getLlmClient(provider: LlmProviderId): Promise<LlmClient | null> {
  if (provider === 'anthropic') {
    return hasAnthropicKey() ? getAnthropicLlmClient() : null;
  }
  return hasOpenAIKey() ? getOpenAiLlmClient() : null;
}
