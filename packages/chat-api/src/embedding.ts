import type OpenAI from 'openai';
import type { EmbeddingProvider } from '@recap/chat-data';

export function createOpenAIEmbeddingProvider(params: {
  model: string;
  getClient: () => Promise<OpenAI>;
  /** Sent as `dimensions` for models that accept it. */
  dimensions?: number;
}): EmbeddingProvider {
  const { model, getClient, dimensions } = params;
  return {
    async embedTexts(texts, options): Promise<number[][]> {
      if (!texts.length) {
        return [];
      }
      const client = await getClient();
      const response = await client.embeddings.create(
        {
          model,
          input: texts,
          ...(dimensions ? { dimensions } : {}),
        },
        options?.signal ? { signal: options.signal } : undefined
      );
      const vectors = [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
      if (vectors.length !== texts.length) {
        throw new Error(`Embedding response returned ${vectors.length} vectors for ${texts.length} inputs`);
      }
      return vectors;
    },
  };
}
