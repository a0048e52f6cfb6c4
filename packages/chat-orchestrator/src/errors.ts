export type ChatPipelineErrorCode =
  | 'retrieval_unavailable'
  | 'generation_failed'
  | 'generation_timeout'
  | 'client_disconnected'
  | 'internal_error';

export type GenerationFailureCode = Extract<ChatPipelineErrorCode, 'generation_failed' | 'generation_timeout'>;

export class ChatPipelineError extends Error {
  readonly code: ChatPipelineErrorCode;

  constructor(code: ChatPipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatPipelineError';
    this.code = code;
  }
}

/** The passage index failed or timed out. Recovered by answering without context. */
export class RetrievalUnavailableError extends ChatPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('retrieval_unavailable', message, options);
    this.name = 'RetrievalUnavailableError';
  }
}

/**
 * The generation service failed mid-stream or went idle. `detail` is safe to show to users;
 * the provider's own error is kept on `cause`.
 */
export class GenerationFailedError extends ChatPipelineError {
  override readonly code: GenerationFailureCode;
  readonly detail: string;

  constructor(code: GenerationFailureCode, detail: string, options?: { cause?: unknown }) {
    super(code, detail, options);
    this.name = 'GenerationFailedError';
    this.code = code;
    this.detail = detail;
  }
}

export function formatLogValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (typeof value === 'symbol') return value.toString();
  if (value instanceof Error) {
    const summary = [value.name, value.message].filter(Boolean).join(': ') || 'Error';
    const cause = value.cause !== undefined ? `\ncause: ${formatLogValue(value.cause)}` : '';
    return `${summary}${cause}`;
  }
  try {
    return JSON.stringify(value, (_key, val: unknown) => (typeof val === 'bigint' ? val.toString() : val));
  } catch {
    return String(value);
  }
}
