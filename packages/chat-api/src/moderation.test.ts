import Anthropic from '@anthropic-ai/sdk';
import { describe, expect, it } from 'vitest';
import type { AnthropicLlmClient } from '@recap/chat-llm';
import { DEFAULT_TOPIC_POLICY } from '@recap/chat-orchestrator';
import { createFakeLlmClient, type FakeLlmClient, type FakeLlmScript } from '@recap/test-support';
import { createModerationService, OFF_TOPIC_CATEGORY } from './moderation';

function anthropicClient(script: FakeLlmScript): AnthropicLlmClient & Pick<FakeLlmClient, 'structuredCalls'> {
  const fake = createFakeLlmClient(script);
  return { ...fake, provider: 'anthropic', anthropic: new Anthropic({ apiKey: 'test-secret' }) };
}

describe('createModerationService safety check', () => {
  it('returns the classifier categories for flagged content', async () => {
    const client = anthropicClient({ structured: { flagged: true, categories: ['violence'] } });
    const moderation = createModerationService({ client });

    expect(await moderation.moderate('something harmful', 'input')).toEqual({ flagged: true, categories: ['violence'] });
    expect(client.structuredCalls[0]).toMatchObject({
      model: 'claude-3-5-haiku-latest',
      stage: 'moderation',
      userContent: 'Content to evaluate:\nsomething harmful',
    });
  });

  it('drops categories when the content is not flagged', async () => {
    const client = anthropicClient({ structured: { flagged: false, categories: ['borderline'] } });
    const moderation = createModerationService({ client });

    expect(await moderation.moderate('what is a NAS?', 'output')).toEqual({ flagged: false, categories: [] });
  });

  it('rejects classifier output that does not match the schema', async () => {
    const client = anthropicClient({ structured: { verdict: 'fine' } });
    const moderation = createModerationService({ client });

    await expect(moderation.moderate('what is a NAS?', 'input')).rejects.toThrow(/^Invalid moderation classifier output/);
  });

  it('does not call the backend for blank text', async () => {
    const client = anthropicClient({ structured: { flagged: true, categories: [] } });
    const moderation = createModerationService({ client });

    expect(await moderation.moderate('  ', 'input')).toEqual({ flagged: false, categories: [] });
    expect(client.structuredCalls).toHaveLength(0);
  });
});

describe('createModerationService topic check', () => {
  it('flags off-topic input under the default policy', async () => {
    const client = anthropicClient({ structured: { onTopic: false, reason: 'weather question' } });
    const moderation = createModerationService({ client, safety: { enabled: false }, topic: { enabled: true } });

    expect(await moderation.moderate('will it rain tomorrow?', 'input')).toEqual({
      flagged: true,
      categories: [OFF_TOPIC_CATEGORY],
    });
    expect(client.structuredCalls[0]?.systemPrompt).toContain(DEFAULT_TOPIC_POLICY);
    expect(client.structuredCalls[0]).toMatchObject({ stage: 'topic', temperature: 0, userContent: 'will it rain tomorrow?' });
  });

  it('uses a configured policy and allows on-topic input', async () => {
    const client = anthropicClient({ structured: { onTopic: true, reason: 'about a video' } });
    const moderation = createModerationService({
      client,
      safety: { enabled: false },
      topic: { enabled: true, policy: 'Only the cooking videos.' },
    });

    expect(await moderation.moderate('which knife did they use?', 'input')).toEqual({ flagged: false, categories: [] });
    expect(client.structuredCalls[0]?.systemPrompt).toContain('Only the cooking videos.');
  });

  it('never applies the topic policy to replies', async () => {
    const client = anthropicClient({ structured: { onTopic: false, reason: 'n/a' } });
    const moderation = createModerationService({ client, safety: { enabled: false }, topic: { enabled: true } });

    expect(await moderation.moderate('a reply', 'output')).toEqual({ flagged: false, categories: [] });
    expect(client.structuredCalls).toHaveLength(0);
  });
});
