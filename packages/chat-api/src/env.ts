import fs from 'node:fs';
import path from 'node:path';

export const DEFAULT_ENV_FILES = ['.env.local', '.env'];

export type LoadedEnvFile = {
  path: string;
  loaded: boolean;
};

export type ParsedEntry = {
  key: string;
  value: string;
};

export function parseEnvLine(line: string): ParsedEntry | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return null;
  }

  const [rawKey, ...rest] = trimmed.replace(/^export\s+/, '').split('=');
  if (!rawKey || rest.length === 0) {
    return null;
  }

  const key = rawKey.trim();
  if (!key) {
    return null;
  }

  const value = rest.join('=').trim().replace(/^['"]|['"]$/g, '');
  return { key, value };
}

/** Values already present in `process.env` win over the files. */
export function loadEnvFiles(customPaths?: string[]): LoadedEnvFile[] {
  const envFiles = customPaths?.length ? customPaths : DEFAULT_ENV_FILES;
  const loaded: LoadedEnvFile[] = [];

  for (const relativePath of envFiles) {
    const filePath = path.resolve(process.cwd(), relativePath);
    if (!fs.existsSync(filePath)) {
      loaded.push({ path: relativePath, loaded: false });
      continue;
    }

    const contents = fs.readFileSync(filePath, 'utf-8');
    for (const line of contents.split(/\r?\n/)) {
      const parsed = parseEnvLine(line);
      if (!parsed) {
        continue;
      }

      if (process.env[parsed.key] === undefined) {
        process.env[parsed.key] = parsed.value;
      }
    }

    loaded.push({ path: relativePath, loaded: true });
  }

  return loaded;
}

export function requireEnv(key: string, errorMessage?: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(errorMessage ?? `${key} is required`);
  }
  return value;
}
