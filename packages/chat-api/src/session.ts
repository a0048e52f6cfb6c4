import { randomUUID } from 'node:crypto';

/**
 * The id is pass-through metadata: a non-empty id from the client comes back unchanged,
 * anything else gets a fresh UUID. Nothing is stored under it.
 */
export function correlateSession(sessionId?: string | null): string {
  if (typeof sessionId === 'string' && sessionId.trim().length > 0) {
    return sessionId;
  }
  return randomUUID();
}
