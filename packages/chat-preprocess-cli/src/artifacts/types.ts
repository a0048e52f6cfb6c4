export type ArtifactWriteRequest = {
  id: string;
  absolutePath: string;
  relativePath: string;
  contentType: string;
  body: string;
};

export type ArtifactWriter = {
  name: string;
  write: (request: ArtifactWriteRequest) => Promise<void>;
};
