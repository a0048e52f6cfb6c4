import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * `CHAT_DEBUG_LOG`:
 * 0 errors only, 1 summaries (default outside production), 2 adds `.raw` events carrying query
 * and prompt text, 3 as 2 with secret-looking string fields redacted.
 */
export type ChatDebugLevel = 0 | 1 | 2 | 3;

export type ChatDebugLogEntry = {
  timestamp: string;
  event: string;
  payload?: unknown;
  correlationId?: string;
  sessionId?: string;
};

type ChatLogContext = {
  correlationId?: string;
  sessionId?: string;
};

declare global {
  // Survives module reloads in dev.
  var __recapChatLogs__: ChatDebugLogEntry[] | undefined;
}

const DEFAULT_LIMIT = 500;
const MIN_LIMIT = 50;
const RAW_SUFFIX = '.raw';
const ERROR_EVENT = /(?:^|[._])(?:error|failure)(?:$|[._])/;
const SENSITIVE_KEY = /api[-_]?key|token|secret|password|credential|authorization|cookie/i;

const logContext = new AsyncLocalStorage<ChatLogContext>();
const entries = (globalThis.__recapChatLogs__ ??= []);

export function chatDebugLevel(env: Record<string, string | undefined> = process.env): ChatDebugLevel {
  const parsed = Number.parseInt(env.CHAT_DEBUG_LOG ?? '', 10);
  if (!Number.isFinite(parsed)) {
    return env.NODE_ENV === 'production' ? 0 : 1;
  }
  if (parsed <= 0) return 0;
  if (parsed >= 3) return 3;
  return parsed === 1 ? 1 : 2;
}

function bufferLimit(): number {
  const configured = Number(process.env.CHAT_DEBUG_LOG_LIMIT);
  return Number.isFinite(configured) && configured > 0 ? Math.max(MIN_LIMIT, Math.floor(configured)) : DEFAULT_LIMIT;
}

const bufferEnabled = () => process.env.NODE_ENV !== 'production';
const isErrorEvent = (event: string) => ERROR_EVENT.test(event);

function visibleAt(level: ChatDebugLevel, event: string): boolean {
  if (level === 0) return false;
  return level >= 2 || !event.endsWith(RAW_SUFFIX);
}

/** Detached JSON copy, so later mutation of the payload does not rewrite history. */
function snapshot(payload: unknown, redact: boolean): unknown {
  if (payload === null || typeof payload !== 'object') {
    return payload;
  }
  try {
    const copy: unknown = JSON.parse(
      JSON.stringify(payload, (key, value: unknown) =>
        redact && typeof value === 'string' && SENSITIVE_KEY.test(key) ? '[redacted]' : value
      )
    );
    return copy;
  } catch {
    return String(payload);
  }
}

function consolePrefix(event: string, level: ChatDebugLevel, context: ChatLogContext | undefined): string {
  const dot = event.indexOf('.');
  const namespace = dot > 0 ? event.slice(0, dot) : 'chat';
  const action = dot > 0 ? event.slice(dot + 1) : event;
  const tags = ['chat-debug', `level-${level}`];
  if (context?.correlationId) tags.push(`cid:${context.correlationId}`);
  if (context?.sessionId) tags.push(`sid:${context.sessionId}`);
  return `[${tags.join('|')}] [${namespace}] ${action}`;
}

/** Error and failure events always reach the console; the buffer only keeps what the level shows. */
export function logChatDebug(event: string, payload?: unknown): void {
  const level = chatDebugLevel();
  const error = isErrorEvent(event);
  const visible = visibleAt(level, event);
  if (!visible && !error) {
    return;
  }

  const context = logContext.getStore();
  const stored = snapshot(payload, level === 3);
  if (visible && bufferEnabled()) {
    entries.push({
      timestamp: new Date().toISOString(),
      event,
      payload: stored,
      correlationId: context?.correlationId,
      sessionId: context?.sessionId,
    });
    const overflow = entries.length - bufferLimit();
    if (overflow > 0) {
      entries.splice(0, overflow);
    }
  }

  const write = error ? console.error : console.info;
  const prefix = consolePrefix(event, level, context);
  if (stored === undefined) {
    write(prefix);
  } else {
    write(prefix, stored);
  }
}

export function getChatDebugLogs(): ChatDebugLogEntry[] {
  if (!bufferEnabled()) return [];
  const level = chatDebugLevel();
  return entries.filter((entry) => visibleAt(level, entry.event));
}

export function resetChatDebugLogs(): void {
  entries.length = 0;
}

export function runWithChatLogContext<T>(context: ChatLogContext, callback: () => Promise<T> | T): Promise<T> {
  return logContext.run(context, () => Promise.resolve(callback()));
}
