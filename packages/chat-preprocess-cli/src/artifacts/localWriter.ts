import fs from 'node:fs/promises';
import path from 'node:path';
import type { ArtifactWriter } from './types';

/** Writes beside the target and renames, so a server reading the file never sees half of it. */
export function createLocalArtifactWriter(): ArtifactWriter {
  return {
    name: 'local',
    async write(request) {
      await fs.mkdir(path.dirname(request.absolutePath), { recursive: true });
      const tempPath = `${request.absolutePath}.${process.pid}.tmp`;
      await fs.writeFile(tempPath, request.body);
      await fs.rename(tempPath, request.absolutePath);
    },
  };
}
