import { CHAT_UNAVAILABLE_DETAIL, toStreamFrame, type ChatStreamEvent } from '@recap/chat-contract';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

export function encodeStreamEvent(event: ChatStreamEvent): string {
  return `data: ${JSON.stringify(toStreamFrame(event))}\n\n`;
}

type StreamOptions = {
  /** Aborted when the reader cancels, so the pipeline stops its upstream calls. */
  abortController?: AbortController;
  onError?: (error: unknown) => void;
  /** Wraps every pull, e.g. to re-enter a log context. */
  runStep?: <T>(step: () => Promise<T>) => Promise<T>;
};

function runDirect<T>(step: () => Promise<T>): Promise<T> {
  return step();
}

/**
 * Frames are pulled one at a time (`highWaterMark: 0`): nothing is produced ahead of the reader,
 * and a slow client holds back the pipeline instead of buffering it.
 */
export function createChatSseStream(
  events: AsyncGenerator<ChatStreamEvent, void, undefined>,
  options?: StreamOptions
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const abortSignal = options?.abortController?.signal;
  const runStep = options?.runStep ?? runDirect;
  let finished = false;

  return new ReadableStream<Uint8Array>(
    {
      async pull(controller) {
        if (finished) return;
        try {
          const next = await runStep(() => events.next());
          if (next.done) {
            finished = true;
            controller.close();
            return;
          }
          controller.enqueue(encoder.encode(encodeStreamEvent(next.value)));
          if (next.value.type === 'done' || next.value.type === 'error') {
            finished = true;
            controller.close();
          }
        } catch (error) {
          finished = true;
          if (!abortSignal?.aborted) {
            options?.onError?.(error);
            controller.enqueue(encoder.encode(encodeStreamEvent({ type: 'error', detail: CHAT_UNAVAILABLE_DETAIL })));
          }
          controller.close();
        }
      },
      async cancel(reason) {
        finished = true;
        if (abortSignal && !abortSignal.aborted) {
          options?.abortController?.abort(reason instanceof Error ? reason : undefined);
        }
        try {
          await events.return(undefined);
        } catch (error) {
          options?.onError?.(error);
        }
      },
    },
    { highWaterMark: 0 }
  );
}
