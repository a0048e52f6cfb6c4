import type { ChatStreamEvent, Source } from '@recap/chat-contract';

export type ChatStreamStatus = 'streaming' | 'done' | 'error';

export type ChatStreamState = {
  content: string;
  sources: Source[];
  sessionId: string | null;
  status: ChatStreamStatus;
  error: string | null;
};

export const initialChatStreamState: ChatStreamState = {
  content: '',
  sources: [],
  sessionId: null,
  status: 'streaming',
  error: null,
};

export function reduceChatStream(state: ChatStreamState, event: ChatStreamEvent): ChatStreamState {
  switch (event.type) {
    case 'chunk':
      return event.content ? { ...state, content: state.content + event.content } : state;
    case 'sources':
      return { ...state, sources: event.sources };
    case 'done':
      return {
        ...state,
        sessionId: event.sessionId,
        status: state.status === 'error' ? 'error' : 'done',
      };
    case 'error':
      return { ...state, status: 'error', error: event.detail };
  }
}
