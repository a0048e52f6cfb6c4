export {
  createChatStreamDecoder,
  parseChatStream,
  parseChatStreamLine,
  ChatStreamParseError,
  type ChatStreamDecoder,
  type ChatStreamDecoderOptions,
} from './chatStreamParser';
export {
  initialChatStreamState,
  reduceChatStream,
  type ChatStreamState,
  type ChatStreamStatus,
} from './chatStreamState';
export { createChatClient, type ChatClient, type ChatClientOptions, type SendOptions, type SendResult } from './chatClient';
