import path from 'node:path';
import type { ArtifactWriter } from './types';
import { createLocalArtifactWriter } from './localWriter';
import type { ArtifactManager, ArtifactWriteResult } from '../types';

type CreateArtifactManagerOptions = {
  /** Defaults to the local filesystem writer. */
  writers?: ArtifactWriter[];
  rootDir: string;
};

export function createArtifactManager(options: CreateArtifactManagerOptions): ArtifactManager {
  const writers = options.writers?.length ? options.writers : [createLocalArtifactWriter()];

  return {
    async writeJson({ id, filePath, data }): Promise<ArtifactWriteResult> {
      const json = `${JSON.stringify(data, null, 2)}\n`;
      const relativePath = path.relative(options.rootDir, filePath).split(path.sep).join('/');
      await Promise.all(
        writers.map((writer) =>
          writer.write({
            id,
            absolutePath: filePath,
            relativePath,
            contentType: 'application/json',
            body: json,
          })
        )
      );
      return { id, absolutePath: filePath, relativePath };
    },
  };
}
