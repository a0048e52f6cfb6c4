import {
  chatDebugLevel,
  getChatDebugLogs,
  logChatDebug,
  resetChatDebugLogs,
  runWithChatLogContext,
  type ChatDebugLevel,
  type ChatDebugLogEntry,
} from './debugLogBuffer';

export type ChatServerLogger = (event: string, payload: Record<string, unknown>) => void;

export function createChatServerLogger(onEvent?: ChatServerLogger): ChatServerLogger {
  return (event, payload) => {
    logChatDebug(event, payload);
    onEvent?.(event, payload);
  };
}

export {
  logChatDebug,
  getChatDebugLogs,
  resetChatDebugLogs,
  runWithChatLogContext,
  chatDebugLevel,
  type ChatDebugLevel,
  type ChatDebugLogEntry,
};
