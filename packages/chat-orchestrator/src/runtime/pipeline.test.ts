import { describe, expect, it, vi } from 'vitest';
import {
  collect,
  createFakeLlmClient,
  createFakeModerationService,
  createStaticPassageIndex,
  passage,
  type FakeLlmScript,
  type FakeModerationOptions,
  type StaticPassageIndexOptions,
} from '@recap/test-support';
import type { PassageMatch } from '@recap/chat-data';
import { GenerationFailedError } from '../errors';
import { EMPTY_QUESTION_ANSWER, type ChatRequestMessage } from '../pipelineTypes';
import {
  createGuardrailGate,
  DEFAULT_BLOCKED_INPUT_MESSAGE,
  DEFAULT_BLOCKED_OUTPUT_MESSAGE,
  type GuardrailFailMode,
} from './guardrail';
import { createStreamingGenerator } from './generator';
import { createChatRuntime } from './pipeline';
import { createRetriever } from './retrieval';

type Setup = {
  llm?: FakeLlmScript;
  passages?: PassageMatch[];
  index?: StaticPassageIndexOptions;
  moderation?: FakeModerationOptions;
  failMode?: GuardrailFailMode;
  idleTimeoutMs?: number;
};

const words = (text: string) => text.split(/\s+/).filter(Boolean).length;

function setup(options: Setup = {}) {
  const client = createFakeLlmClient(options.llm ?? { deltas: ['Hello', ' world'] });
  const index = createStaticPassageIndex(
    options.passages ?? [passage('notes/a.md', 0.9), passage('notes/a.md', 0.7), passage('notes/b.md', 0.6)],
    options.index
  );
  const moderation = createFakeModerationService(options.moderation);
  const runtime = createChatRuntime({
    retriever: createRetriever({ index }),
    guardrail: createGuardrailGate({ moderation, failMode: options.failMode }),
    generator: createStreamingGenerator({ client, model: 'test-model', idleTimeoutMs: options.idleTimeoutMs }),
    countTokens: words,
  });
  return { client, index, moderation, runtime };
}

const ask = (content: string): ChatRequestMessage[] => [{ role: 'user', content }];

describe('createChatRuntime.stream', () => {
  it('streams chunks, then deduplicated sources, then done', async () => {
    const { runtime, moderation, index } = setup();

    const events = await collect(runtime.stream(ask('What is covered?'), { sessionId: 's-1' }));

    expect(events).toEqual([
      { type: 'chunk', content: 'Hello' },
      { type: 'chunk', content: ' world' },
      {
        type: 'sources',
        sources: [
          { uri: 'notes/a.md', score: 0.9 },
          { uri: 'notes/b.md', score: 0.6 },
        ],
      },
      { type: 'done', sessionId: 's-1' },
    ]);
    expect(index.queries[0]?.text).toBe('What is covered?');
    expect(moderation.calls).toEqual([
      { text: 'What is covered?', direction: 'input' },
      { text: 'Hello world', direction: 'output' },
    ]);
  });

  it('answers an empty question without calling anything', async () => {
    const { runtime, client, index } = setup();

    const events = await collect(runtime.stream(ask('   '), { sessionId: 's-2' }));

    expect(events).toEqual([
      { type: 'chunk', content: EMPTY_QUESTION_ANSWER },
      { type: 'done', sessionId: 's-2' },
    ]);
    expect(client.textCalls).toHaveLength(0);
    expect(index.queries).toHaveLength(0);
  });

  it('replies with the refusal when input is blocked', async () => {
    const { runtime, client, index } = setup({ moderation: { flag: (_text, direction) => (direction === 'input' ? ['harassment'] : null) } });

    const events = await collect(runtime.stream(ask('say something cruel'), { sessionId: 's-3' }));

    expect(events).toEqual([
      { type: 'chunk', content: DEFAULT_BLOCKED_INPUT_MESSAGE },
      { type: 'done', sessionId: 's-3' },
    ]);
    expect(client.textCalls).toHaveLength(0);
    expect(index.queries).toHaveLength(0);
  });

  it('appends the withheld notice and drops sources when output is blocked', async () => {
    const { runtime } = setup({ moderation: { flag: (_text, direction) => (direction === 'output' ? ['violence'] : null) } });

    const events = await collect(runtime.stream(ask('What is covered?'), { sessionId: 's-4' }));

    expect(events).toEqual([
      { type: 'chunk', content: 'Hello' },
      { type: 'chunk', content: ' world' },
      { type: 'chunk', content: `\n\n${DEFAULT_BLOCKED_OUTPUT_MESSAGE}` },
      { type: 'done', sessionId: 's-4' },
    ]);
  });

  it('ends with an error event and no done when generation fails', async () => {
    const { runtime } = setup({ llm: { deltas: ['partial', 'never'], failAfter: 1 } });

    const events = await collect(runtime.stream(ask('What is covered?'), { sessionId: 's-5' }));

    expect(events).toEqual([
      { type: 'chunk', content: 'partial' },
      { type: 'error', detail: 'The answer could not be completed. Please try again.', code: 'generation_failed' },
    ]);
  });

  it('still generates with empty sources when every passage is below the threshold', async () => {
    const { runtime, client } = setup({ passages: [passage('notes/a.md', 0.3), passage('notes/b.md', 0.1)] });

    const events = await collect(runtime.stream(ask('What is covered?'), { sessionId: 's-12' }));

    expect(events).toEqual([
      { type: 'chunk', content: 'Hello' },
      { type: 'chunk', content: ' world' },
      { type: 'sources', sources: [] },
      { type: 'done', sessionId: 's-12' },
    ]);
    expect(client.textCalls).toHaveLength(1);
    expect(client.textCalls[0]?.systemPrompt).toContain('No relevant context found.');
  });

  it('reports every distinct uri above the threshold, best first', async () => {
    const { runtime } = setup({
      passages: [passage('notes/c.md', 0.51), passage('notes/a.md', 0.82), passage('notes/b.md', 0.67)],
    });

    const events = await collect(runtime.stream(ask('What is covered?'), { sessionId: 's-13' }));

    expect(events.find((event) => event.type === 'sources')).toEqual({
      type: 'sources',
      sources: [
        { uri: 'notes/a.md', score: 0.82 },
        { uri: 'notes/b.md', score: 0.67 },
        { uri: 'notes/c.md', score: 0.51 },
      ],
    });
  });

  it('answers without context when retrieval is unavailable', async () => {
    const { runtime, client } = setup({ index: { error: new Error('index offline') } });

    const events = await collect(runtime.stream(ask('What is covered?'), { sessionId: 's-6' }));

    expect(events.at(-2)).toEqual({ type: 'sources', sources: [] });
    expect(events.at(-1)).toEqual({ type: 'done', sessionId: 's-6' });
    expect(client.textCalls[0]?.systemPrompt).toContain('No relevant context found.');
  });

  it('blocks input when moderation fails closed', async () => {
    const { runtime } = setup({ moderation: { error: new Error('moderation down') }, failMode: 'closed' });

    const events = await collect(runtime.stream(ask('What is covered?'), { sessionId: 's-7' }));

    expect(events).toEqual([
      { type: 'chunk', content: DEFAULT_BLOCKED_INPUT_MESSAGE },
      { type: 'done', sessionId: 's-7' },
    ]);
  });

  it('stops without further events when the request is aborted', async () => {
    const { runtime, client } = setup({ llm: { deltas: ['Hello', ' world'], hangAfter: 1 } });
    const controller = new AbortController();
    const events = runtime.stream(ask('What is covered?'), { sessionId: 's-8', signal: controller.signal });

    expect(await events.next()).toEqual({ done: false, value: { type: 'chunk', content: 'Hello' } });
    const pending = events.next();
    controller.abort();

    expect(await pending).toEqual({ done: true, value: undefined });
    expect(client.yielded()).toBe(1);
  });

  it('sends only the latest user turn to retrieval while keeping history for generation', async () => {
    const { runtime, client, index } = setup();
    const messages: ChatRequestMessage[] = [
      { role: 'user', content: 'First question' },
      { role: 'assistant', content: 'First answer' },
      { role: 'user', content: 'Follow-up' },
    ];

    await collect(runtime.stream(messages, { sessionId: 's-9' }));

    expect(index.queries.map((query) => query.text)).toEqual(['Follow-up']);
    expect(client.textCalls[0]?.messages).toEqual(messages);
  });
});

describe('createChatRuntime.run', () => {
  it('collects the streamed answer with usage', async () => {
    const { runtime } = setup({ llm: { deltas: ['Hello', ' world'], usage: { input_tokens: 3, output_tokens: 2 } } });

    const result = await runtime.run(ask('What is covered?'), { sessionId: 's-10' });

    expect(result).toEqual({
      content: 'Hello world',
      sources: [
        { uri: 'notes/a.md', score: 0.9 },
        { uri: 'notes/b.md', score: 0.6 },
      ],
      sessionId: 's-10',
      usage: { promptTokens: 3, completionTokens: 2, totalTokens: 5 },
    });
  });

  it('rejects with GenerationFailedError when generation fails', async () => {
    const { runtime } = setup({ llm: { deltas: ['partial'], failAfter: 0 } });

    await expect(runtime.run(ask('What is covered?'), { sessionId: 's-11' })).rejects.toBeInstanceOf(
      GenerationFailedError
    );
  });

  it('keeps the timeout code when the answer stalls', async () => {
    const { runtime } = setup({ llm: { deltas: ['partial', 'never'], hangAfter: 1 }, idleTimeoutMs: 20 });

    await expect(runtime.run(ask('What is covered?'), { sessionId: 's-14' })).rejects.toMatchObject({
      name: 'GenerationFailedError',
      code: 'generation_timeout',
      detail: 'The answer timed out. Please try again.',
    });
  });

  it('rejects as client_disconnected and releases the provider when the caller aborts', async () => {
    const { runtime, client } = setup({ llm: { deltas: ['Hello', ' world'], hangAfter: 1 } });
    const controller = new AbortController();

    const pending = runtime.run(ask('What is covered?'), { sessionId: 's-15', signal: controller.signal });
    await vi.waitFor(() => expect(client.yielded()).toBe(1));
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'ChatPipelineError', code: 'client_disconnected' });
    await vi.waitFor(() => expect(client.closed()).toBe(true));
    expect(client.textCalls[0]?.signal?.aborted).toBe(true);
  });
});
