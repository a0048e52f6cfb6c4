import { describe, expect, it, vi } from 'vitest';
import { collect } from '@recap/test-support';
import { ChatStreamParseError, createChatStreamDecoder, parseChatStream, parseChatStreamLine } from './chatStreamParser';
import { initialChatStreamState, reduceChatStream, type ChatStreamState } from './chatStreamState';

const encoder = new TextEncoder();

function streamOf(chunks: string[], options: { close?: boolean } = {}): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      if (options.close ?? true) {
        controller.close();
      }
    },
  });
}

describe('parseChatStreamLine', () => {
  it('ignores comments, other fields and empty payloads', () => {
    expect(parseChatStreamLine(': keep-alive')).toBeNull();
    expect(parseChatStreamLine('event: message')).toBeNull();
    expect(parseChatStreamLine('data:   ')).toBeNull();
  });

  it('strips a trailing carriage return', () => {
    expect(parseChatStreamLine('data: {"type":"chunk","content":"x"}\r')).toEqual({ type: 'chunk', content: 'x' });
  });

  it('reports invalid JSON and unknown frames without throwing', () => {
    const errors: ChatStreamParseError[] = [];
    const onParseError = (error: ChatStreamParseError) => errors.push(error);

    expect(parseChatStreamLine('data: {not json}', { onParseError })).toBeNull();
    expect(parseChatStreamLine('data: {"type":"progress"}', { onParseError })).toBeNull();

    expect(errors.map((error) => [error.message, error.line])).toEqual([
      ['Frame is not valid JSON', 'data: {not json}'],
      ['Unrecognised frame', 'data: {"type":"progress"}'],
    ]);
  });
});

describe('createChatStreamDecoder', () => {
  it('joins frames split across chunks', () => {
    const decoder = createChatStreamDecoder();

    expect(decoder.push(encoder.encode('data: {"type":"chunk","content":"Hel'))).toEqual([]);
    expect(decoder.push(encoder.encode('lo"}\n\ndata: {"type":"done","session_id":"s-1"}\n\n'))).toEqual([
      { type: 'chunk', content: 'Hello' },
      { type: 'done', sessionId: 's-1' },
    ]);
  });

  it('decodes a multi-byte character split between chunks', () => {
    const decoder = createChatStreamDecoder();
    const bytes = encoder.encode('data: {"type":"chunk","content":"café"}\n');
    const cut = bytes.length - 4;

    expect(decoder.push(bytes.slice(0, cut))).toEqual([]);
    expect(decoder.push(bytes.slice(cut))).toEqual([{ type: 'chunk', content: 'café' }]);
  });

  it('keeps going after a malformed line', () => {
    const onParseError = vi.fn();
    const decoder = createChatStreamDecoder({ onParseError });

    const events = decoder.push(encoder.encode('data: {oops\ndata: {"type":"chunk","content":"ok"}\n'));

    expect(events).toEqual([{ type: 'chunk', content: 'ok' }]);
    expect(onParseError).toHaveBeenCalledTimes(1);
  });

  it('decodes a final line without a newline on flush', () => {
    const decoder = createChatStreamDecoder();

    expect(decoder.push(encoder.encode('data: {"type":"done","session_id":"s-2"}'))).toEqual([]);
    expect(decoder.flush()).toEqual([{ type: 'done', sessionId: 's-2' }]);
  });
});

describe('createChatStreamDecoder read boundaries', () => {
  const wire = encoder.encode(
    'data: {"type":"chunk","content":"Grüße "}\n\n' +
      'data: {"type":"chunk","content":"aus 東京 "}\n\n' +
      'data: {"type":"chunk","content":"🎉"}\n\n' +
      'data: {"type":"sources","sources":[{"source_uri":"notes/b.md","score":0.6},{"source_uri":"notes/ä.md","score":0.9}]}\n\n' +
      'data: {"type":"done","session_id":"s-9"}\n\n'
  );

  function decodeInPieces(pieces: Uint8Array[]): ChatStreamState {
    const decoder = createChatStreamDecoder();
    let state = initialChatStreamState;
    for (const piece of pieces) {
      for (const event of decoder.push(piece)) {
        state = reduceChatStream(state, event);
      }
    }
    for (const event of decoder.flush()) {
      state = reduceChatStream(state, event);
    }
    return state;
  }

  const expected: ChatStreamState = {
    content: 'Grüße aus 東京 🎉',
    sources: [
      { uri: 'notes/ä.md', score: 0.9 },
      { uri: 'notes/b.md', score: 0.6 },
    ],
    sessionId: 's-9',
    status: 'done',
    error: null,
  };

  it('gives the same result for every single split offset', () => {
    for (let offset = 0; offset <= wire.length; offset += 1) {
      expect(decodeInPieces([wire.slice(0, offset), wire.slice(offset)]), `offset ${offset}`).toEqual(expected);
    }
  });

  it('gives the same result for every fixed chunk size', () => {
    for (let size = 1; size <= wire.length; size += 1) {
      const pieces: Uint8Array[] = [];
      for (let start = 0; start < wire.length; start += size) {
        pieces.push(wire.slice(start, start + size));
      }
      expect(decodeInPieces(pieces), `size ${size}`).toEqual(expected);
    }
  });
});

describe('parseChatStream', () => {
  it('yields every event in order', async () => {
    const events = await collect(
      parseChatStream(
        streamOf([
          'data: {"type":"chunk","content":"Hi"}\n\n',
          'data: {"type":"sources","sources":[{"source_uri":"notes/a.md","score":0.8}]}\n\n',
          'data: {"type":"done","session_id":"s-3"}\n\n',
        ])
      )
    );

    expect(events).toEqual([
      { type: 'chunk', content: 'Hi' },
      { type: 'sources', sources: [{ uri: 'notes/a.md', score: 0.8 }] },
      { type: 'done', sessionId: 's-3' },
    ]);
  });

  it('stops after the idle timeout', async () => {
    const onIdleTimeout = vi.fn();
    const events = await collect(
      parseChatStream(streamOf(['data: {"type":"chunk","content":"Hi"}\n\n'], { close: false }), {
        idleTimeoutMs: 20,
        onIdleTimeout,
      })
    );

    expect(events).toEqual([{ type: 'chunk', content: 'Hi' }]);
    expect(onIdleTimeout).toHaveBeenCalledTimes(1);
  });

  it('rethrows the abort reason when the signal fires', async () => {
    const controller = new AbortController();
    const events = parseChatStream(streamOf(['data: {"type":"chunk","content":"Hi"}\n\n'], { close: false }), {
      signal: controller.signal,
    });

    expect(await events.next()).toEqual({ done: false, value: { type: 'chunk', content: 'Hi' } });
    const pending = events.next();
    controller.abort(new Error('user stopped'));

    await expect(pending).rejects.toThrow('user stopped');
  });
});
