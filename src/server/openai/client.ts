import OpenAI from 'openai';
import { requireEnv } from '@recap/chat-api';

let cachedClient: OpenAI | null = null;

export function hasOpenAIKey(): boolean {
  return Boolean(process.env.OPENAI_API_KEY?.trim());
}

export async function getOpenAIClient(): Promise<OpenAI> {
  if (!cachedClient) {
    const apiKey = requireEnv('OPENAI_API_KEY').trim();
    const timeoutMs = Number(process.env.OPENAI_TIMEOUT_MS ?? 90000);
    cachedClient = new OpenAI({ apiKey, timeout: Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : undefined });
  }
  return cachedClient;
}
