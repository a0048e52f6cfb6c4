import { randomUUID } from 'node:crypto';
import {
  CHAT_UNAVAILABLE_DETAIL,
  toUsageBody,
  toWireSources,
  type ChatRequestMessage,
  type ChatResponseBody,
} from '@recap/chat-contract';
import { ChatPipelineError, GenerationFailedError, formatLogValue, type ChatRuntime } from '@recap/chat-orchestrator';
import { createChatSseStream, SSE_HEADERS } from './stream';
import { validateChatPostBody } from './validation';
import { correlateSession } from './session';
import { logChatDebug, resetChatDebugLogs, runWithChatLogContext } from './server';

export type ChatHealth = {
  knowledgeBaseConfigured: boolean;
  guardrailConfigured: boolean;
};

export type ChatHandlerOptions = {
  /** Null while no generation service is configured; chat requests then get 503. */
  getRuntime: () => ChatRuntime | null;
  health: () => ChatHealth;
  serviceName?: string;
  onErrorLog?: (event: string, payload: Record<string, unknown>) => void;
};

export type ChatHandler = {
  stream(request: Request): Promise<Response>;
  chat(request: Request): Promise<Response>;
  health(): Response;
};

const NOT_CONFIGURED_DETAIL = 'Generation service not configured';
const CLIENT_CLOSED_DETAIL = 'Client closed request';
// nginx's status for a request the client abandoned; nobody reads the body.
const CLIENT_CLOSED_STATUS = 499;
const DEFAULT_SERVICE_NAME = 'recap-chat';

export function errorResponse(detail: string, status: number, headers?: HeadersInit): Response {
  return Response.json({ detail }, { status, headers });
}

type ParsedRequest =
  | { ok: true; messages: ChatRequestMessage[]; sessionId: string }
  | { ok: false; response: Response };

async function readChatRequest(request: Request): Promise<ParsedRequest> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return { ok: false, response: errorResponse('Malformed JSON body', 400) };
  }
  const validation = validateChatPostBody(body);
  if (!validation.ok) {
    return { ok: false, response: errorResponse(validation.error, validation.status) };
  }
  return {
    ok: true,
    messages: validation.value.messages,
    sessionId: correlateSession(validation.value.sessionId),
  };
}

function linkAbort(signal: AbortSignal): AbortController {
  const controller = new AbortController();
  if (signal.aborted) {
    controller.abort(signal.reason);
  } else {
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }
  return controller;
}

export function createChatHandler(options: ChatHandlerOptions): ChatHandler {
  const serviceName = options.serviceName ?? DEFAULT_SERVICE_NAME;

  const reportError = (event: string, error: unknown, correlationId: string) => {
    const payload = { error: formatLogValue(error), correlationId };
    logChatDebug(event, payload);
    options.onErrorLog?.(event, payload);
  };

  return {
    async stream(request) {
      const correlationId = randomUUID();
      const parsed = await readChatRequest(request);
      if (!parsed.ok) {
        return parsed.response;
      }
      const { messages, sessionId } = parsed;
      const logContext = { correlationId, sessionId };

      return runWithChatLogContext(logContext, async () => {
        if (process.env.NODE_ENV !== 'production' && messages.length === 1) {
          resetChatDebugLogs();
        }
        logChatDebug('api.chat.stream.request', { messages: messages.length });

        const runtime = options.getRuntime();
        if (!runtime) {
          return errorResponse(NOT_CONFIGURED_DETAIL, 503);
        }

        try {
          const abortController = linkAbort(request.signal);
          const events = runtime.stream(messages, {
            sessionId,
            signal: abortController.signal,
            onUsage: (usage) => logChatDebug('api.chat.usage', { ...usage }),
          });
          const stream = createChatSseStream(events, {
            abortController,
            onError: (error) => reportError('api.chat.stream_error', error, correlationId),
            runStep: (step) => runWithChatLogContext(logContext, step),
          });
          return new Response(stream, { headers: SSE_HEADERS });
        } catch (error) {
          reportError('api.chat.error', error, correlationId);
          return errorResponse(CHAT_UNAVAILABLE_DETAIL, 500);
        }
      });
    },

    async chat(request) {
      const correlationId = randomUUID();
      const parsed = await readChatRequest(request);
      if (!parsed.ok) {
        return parsed.response;
      }
      const { messages, sessionId } = parsed;

      return runWithChatLogContext({ correlationId, sessionId }, async () => {
        logChatDebug('api.chat.request', { messages: messages.length });
        const runtime = options.getRuntime();
        if (!runtime) {
          return errorResponse(NOT_CONFIGURED_DETAIL, 503);
        }

        try {
          const result = await runtime.run(messages, { sessionId, signal: request.signal });
          const body: ChatResponseBody = {
            content: result.content,
            sources: toWireSources(result.sources),
            session_id: result.sessionId,
            ...(result.usage ? { usage: toUsageBody(result.usage) } : {}),
          };
          return Response.json(body);
        } catch (error) {
          if (error instanceof ChatPipelineError && error.code === 'client_disconnected') {
            logChatDebug('api.chat.client_disconnected', { correlationId });
            return errorResponse(CLIENT_CLOSED_DETAIL, CLIENT_CLOSED_STATUS);
          }
          if (error instanceof GenerationFailedError) {
            reportError('api.chat.generation_failure', error, correlationId);
            return errorResponse(error.detail, 502);
          }
          reportError('api.chat.error', error, correlationId);
          return errorResponse(CHAT_UNAVAILABLE_DETAIL, 500);
        }
      });
    },

    health() {
      const status = options.health();
      return Response.json({
        status: 'ok',
        service: serviceName,
        knowledge_base_configured: status.knowledgeBaseConfigured,
        guardrail_configured: status.guardrailConfigured,
      });
    },
  };
}
