import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { coerceEnvFileList, loadConfigFile, mergeConfigs, resolvePreprocessConfig } from './config';

describe('resolvePreprocessConfig', () => {
  it('fills defaults relative to the root directory', () => {
    const rootDir = path.resolve('/srv/recap');
    expect(resolvePreprocessConfig({ paths: { rootDir } })).toEqual({
      envFiles: ['.env.local', '.env'],
      paths: {
        rootDir,
        notesDir: path.join(rootDir, 'notes'),
        indexOutput: path.join(rootDir, 'data/corpus-index.json'),
      },
      models: { embeddingModel: 'text-embedding-3-small' },
      chunking: { maxChars: 2000, batchSize: 32 },
    });
  });

  it('keeps absolute overrides and ignores invalid numbers', () => {
    const rootDir = path.resolve('/srv/recap');
    const notesDir = path.resolve('/data/notes');
    const resolved = resolvePreprocessConfig({
      paths: { rootDir, notesDir, indexOutput: 'out/index.json' },
      models: { embeddingModel: ' ', embeddingDimensions: 256 },
      chunking: { maxChars: 0, batchSize: 8.7 },
    });
    expect(resolved.paths.notesDir).toBe(notesDir);
    expect(resolved.paths.indexOutput).toBe(path.join(rootDir, 'out/index.json'));
    expect(resolved.models).toEqual({ embeddingModel: 'text-embedding-3-small', embeddingDimensions: 256 });
    expect(resolved.chunking).toEqual({ maxChars: 2000, batchSize: 8 });
  });
});

describe('mergeConfigs', () => {
  it('lets later configs win per field', () => {
    expect(
      mergeConfigs([
        { paths: { notesDir: 'a' }, chunking: { maxChars: 100 } },
        undefined,
        { paths: { indexOutput: 'b.json' }, chunking: { batchSize: 4 } },
        { paths: { notesDir: 'c' } },
      ])
    ).toEqual({
      paths: { notesDir: 'c', indexOutput: 'b.json' },
      chunking: { maxChars: 100, batchSize: 4 },
    });
  });
});

describe('loadConfigFile', () => {
  it('reads YAML and rejects invalid values', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'recap-config-'));
    const valid = path.join(dir, 'valid.yml');
    const invalid = path.join(dir, 'invalid.yml');
    await fs.writeFile(valid, 'paths:\n  notesDir: notes\nchunking:\n  maxChars: 500\n');
    await fs.writeFile(invalid, 'chunking:\n  maxChars: big\n');

    expect(await loadConfigFile(valid)).toEqual({ paths: { notesDir: 'notes' }, chunking: { maxChars: 500 } });
    await expect(loadConfigFile(invalid)).rejects.toThrow(
      `Invalid configuration at ${invalid}: chunking.maxChars Expected number, received string`
    );
    await expect(loadConfigFile(path.join(dir, 'config.toml'))).rejects.toThrow(/Unsupported config format/);
  });
});

describe('coerceEnvFileList', () => {
  it('prefers CLI values and accepts a single string', () => {
    expect(coerceEnvFileList(['.env.test'], ['.env'])).toEqual(['.env.test']);
    expect(coerceEnvFileList(undefined, '.env')).toEqual(['.env']);
    expect(coerceEnvFileList([], undefined)).toBeUndefined();
  });
});
