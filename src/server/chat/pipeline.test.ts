import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createChatApp } from './pipeline';

const question = JSON.stringify({ messages: [{ role: 'user', content: 'What is covered?' }], session_id: 'abc' });

function post(pathname: string): Request {
  return new Request(`http://localhost${pathname}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: question,
  });
}

function writeIndex(dir: string): void {
  fs.mkdirSync(path.join(dir, 'data'));
  fs.writeFileSync(
    path.join(dir, 'data', 'corpus-index.json'),
    JSON.stringify({
      meta: { schemaVersion: 1, buildId: 'build-1', embeddingModel: 'text-embedding-3-small' },
      passages: [{ id: 'notes/a.md#1', uri: 'notes/a.md', text: 'Backups', vector: [1, 0, 0] }],
    })
  );
}

describe('createChatApp', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'recap-app-'));
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('answers 503 and reports nothing configured without provider keys', async () => {
    writeIndex(cwd);
    const { handler } = await createChatApp({ cwd, config: { provider: 'anthropic' } });

    const response = await handler.chat(post('/api/chat'));

    expect(response.status).toBe(503);
    expect(await handler.health().json()).toEqual({
      status: 'ok',
      service: 'recap-chat',
      knowledge_base_configured: false,
      guardrail_configured: false,
    });
  });

  it('loads the corpus index and guardrail when a key is present', async () => {
    writeIndex(cwd);
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    const { handler, config } = await createChatApp({ cwd, config: {} });

    expect(config.retrieval.indexFile).toBe(path.join(cwd, 'data', 'corpus-index.json'));
    expect(await handler.health().json()).toMatchObject({
      knowledge_base_configured: true,
      guardrail_configured: true,
    });
  });

  it('starts without a knowledge base when the index file is corrupt', async () => {
    fs.mkdirSync(path.join(cwd, 'data'));
    fs.writeFileSync(path.join(cwd, 'data', 'corpus-index.json'), '{"meta": ');
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');

    const { handler } = await createChatApp({ cwd, config: {} });

    expect(await handler.health().json()).toEqual({
      status: 'ok',
      service: 'recap-chat',
      knowledge_base_configured: false,
      guardrail_configured: true,
    });
  });

  it('starts without a knowledge base when the index does not match its schema', async () => {
    fs.mkdirSync(path.join(cwd, 'data'));
    fs.writeFileSync(path.join(cwd, 'data', 'corpus-index.json'), JSON.stringify({ passages: 'none' }));
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');

    const { handler } = await createChatApp({ cwd, config: {} });

    expect(await handler.health().json()).toMatchObject({ knowledge_base_configured: false });
  });
});
