import { describe, expect, it } from 'vitest';
import { initialChatStreamState, reduceChatStream } from './chatStreamState';

describe('reduceChatStream', () => {
  it('appends chunks and ignores empty ones', () => {
    const first = reduceChatStream(initialChatStreamState, { type: 'chunk', content: 'Hello' });
    const second = reduceChatStream(first, { type: 'chunk', content: '' });
    const third = reduceChatStream(second, { type: 'chunk', content: ' world' });

    expect(second).toBe(first);
    expect(third.content).toBe('Hello world');
  });

  it('replaces sources and records the session on done', () => {
    const withSources = reduceChatStream(initialChatStreamState, {
      type: 'sources',
      sources: [{ uri: 'notes/a.md', score: 0.7 }],
    });
    const done = reduceChatStream(withSources, { type: 'done', sessionId: 's-1' });

    expect(done).toEqual({
      content: '',
      sources: [{ uri: 'notes/a.md', score: 0.7 }],
      sessionId: 's-1',
      status: 'done',
      error: null,
    });
  });

  it('keeps the error status once an error arrives', () => {
    const errored = reduceChatStream(initialChatStreamState, { type: 'error', detail: 'Chat unavailable' });
    const afterDone = reduceChatStream(errored, { type: 'done', sessionId: 's-2' });

    expect(afterDone.status).toBe('error');
    expect(afterDone.error).toBe('Chat unavailable');
  });
});
