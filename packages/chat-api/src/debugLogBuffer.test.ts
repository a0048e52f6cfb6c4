import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  chatDebugLevel,
  getChatDebugLogs,
  logChatDebug,
  resetChatDebugLogs,
  runWithChatLogContext,
} from './debugLogBuffer';

describe('chatDebugLevel', () => {
  it('defaults by environment and clamps explicit values', () => {
    expect(chatDebugLevel({ NODE_ENV: 'production' })).toBe(0);
    expect(chatDebugLevel({ NODE_ENV: 'development' })).toBe(1);
    expect(chatDebugLevel({ CHAT_DEBUG_LOG: '2' })).toBe(2);
    expect(chatDebugLevel({ CHAT_DEBUG_LOG: '7' })).toBe(3);
    expect(chatDebugLevel({ CHAT_DEBUG_LOG: '-1' })).toBe(0);
  });
});

describe('logChatDebug', () => {
  beforeEach(() => {
    resetChatDebugLogs();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('keeps summaries and hides raw events at level 1', () => {
    vi.stubEnv('CHAT_DEBUG_LOG', '1');

    logChatDebug('retrieval.search', { numResults: 1 });
    logChatDebug('retrieval.search.raw', { query: 'backups' });

    expect(getChatDebugLogs().map((entry) => entry.event)).toEqual(['retrieval.search']);
  });

  it('adds raw events alongside their summaries at level 2', () => {
    vi.stubEnv('CHAT_DEBUG_LOG', '2');

    logChatDebug('retrieval.search', { numResults: 1 });
    logChatDebug('retrieval.search.raw', { query: 'backups' });
    logChatDebug('llm.request', { model: 'test-model' });
    logChatDebug('llm.request.raw', { systemPrompt: 'SYS' });

    expect(getChatDebugLogs().map((entry) => entry.event)).toEqual([
      'retrieval.search',
      'retrieval.search.raw',
      'llm.request',
      'llm.request.raw',
    ]);
  });

  it('redacts secret-looking strings at level 3', () => {
    vi.stubEnv('CHAT_DEBUG_LOG', '3');

    logChatDebug('llm.request', { apiKey: 'test-secret', model: 'test-model', promptTokens: 4 });

    expect(getChatDebugLogs()[0]?.payload).toEqual({ apiKey: '[redacted]', model: 'test-model', promptTokens: 4 });
  });

  it('tags console lines and entries with the request context', async () => {
    vi.stubEnv('CHAT_DEBUG_LOG', '1');

    await runWithChatLogContext({ correlationId: 'c-1', sessionId: 's-1' }, () =>
      logChatDebug('api.chat.request', { messages: 1 })
    );

    expect(console.info).toHaveBeenCalledWith('[chat-debug|level-1|cid:c-1|sid:s-1] [api] chat.request', { messages: 1 });
    expect(getChatDebugLogs()[0]).toMatchObject({ event: 'api.chat.request', correlationId: 'c-1', sessionId: 's-1' });
  });

  it('still reports errors when logging is off', () => {
    vi.stubEnv('CHAT_DEBUG_LOG', '0');

    logChatDebug('api.chat.error', { error: 'boom' });
    logChatDebug('api.chat.request', { messages: 1 });

    expect(console.error).toHaveBeenCalledWith('[chat-debug|level-0] [api] chat.error', { error: 'boom' });
    expect(console.info).not.toHaveBeenCalled();
    expect(getChatDebugLogs()).toEqual([]);
  });
});
