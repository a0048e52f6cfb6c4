export const PREPROCESS_ERROR_CODES = {
  NOTES_DIR_MISSING: 'NOTES_DIR_MISSING',
  EMBEDDING_MISMATCH: 'EMBEDDING_MISMATCH',
  MISSING_API_KEY: 'MISSING_API_KEY',
} as const;

export type PreprocessErrorCode = (typeof PREPROCESS_ERROR_CODES)[keyof typeof PREPROCESS_ERROR_CODES];

export class PreprocessError extends Error {
  readonly code: PreprocessErrorCode;

  constructor(code: PreprocessErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PreprocessError';
    this.code = code;
  }
}
