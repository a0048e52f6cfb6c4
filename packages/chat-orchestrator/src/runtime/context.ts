import { getEncoding } from 'js-tiktoken';
import { normalizeSources } from '@recap/chat-contract';
import { answerSystemPrompt, NO_CONTEXT_PLACEHOLDER, renderTemplate } from '../pipelinePrompts';
import type { ChatRequestMessage, RetrievalResult, Source } from '../pipelineTypes';

export type TokenCounter = (text: string) => number;

export type Citation = {
  index: number;
  uri: string;
};

export type AssembleContextInput = {
  messages: ChatRequestMessage[];
  passages: RetrievalResult[];
  /** Input budget for system prompt, history and the current turn together. */
  budgetTokens: number;
  /** Template with a `{{CONTEXT}}` slot for the tagged passages. */
  systemInstruction?: string;
  countTokens?: TokenCounter;
};

export type AssembledContext = {
  systemPrompt: string;
  messages: ChatRequestMessage[];
  passages: RetrievalResult[];
  citations: Citation[];
  sources: Source[];
  truncated: boolean;
  droppedTurns: number;
  droppedPassages: number;
  totalTokens: number;
};

/** A user message and the replies after it. A reply with no user message before it opens its own turn. */
type ConversationTurn = {
  messages: ChatRequestMessage[];
  estimatedTokens: number;
};

// Lazy-loaded tiktoken encoder (o200k_base)
let _encoder: ReturnType<typeof getEncoding> | null = null;

function getEncoder(): ReturnType<typeof getEncoding> {
  if (!_encoder) {
    _encoder = getEncoding('o200k_base');
  }
  return _encoder;
}

export function countTokens(text: string): number {
  return getEncoder().encode(text).length;
}

function groupIntoTurns(messages: ChatRequestMessage[], count: TokenCounter): ConversationTurn[] {
  const turns: ConversationTurn[] = [];
  for (const msg of messages) {
    const current = turns.at(-1);
    if (msg.role === 'user' || !current) {
      turns.push({ messages: [msg], estimatedTokens: count(msg.content) });
    } else {
      current.messages.push(msg);
      current.estimatedTokens += count(msg.content);
    }
  }
  return turns;
}

export function formatPassage(passage: RetrievalResult, index: number): string {
  return `[Source ${index + 1}] (${passage.uri}, score ${passage.score.toFixed(2)})\n${passage.text}`;
}

export function renderContextBlock(passages: RetrievalResult[]): string {
  if (!passages.length) {
    return NO_CONTEXT_PLACEHOLDER;
  }
  return passages.map(formatPassage).join('\n\n---\n\n');
}

function findCurrentUserIndex(messages: ChatRequestMessage[]): number {
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    if (messages[i]?.role === 'user') {
      return i;
    }
  }
  return -1;
}

/**
 * Fit the conversation and passages into `budgetTokens`.
 * Whole history turns go first, oldest first; then the lowest-scoring passages.
 * The current user turn and the best passage are always kept, so the result may still exceed the budget.
 */
export function assembleContext(input: AssembleContextInput): AssembledContext {
  const count = input.countTokens ?? countTokens;
  const template = input.systemInstruction ?? answerSystemPrompt;
  const renderSystemPrompt = (passages: RetrievalResult[]) =>
    renderTemplate(template, { CONTEXT: renderContextBlock(passages) });

  const currentIndex = findCurrentUserIndex(input.messages);
  const currentTurn = currentIndex >= 0 ? input.messages[currentIndex] : undefined;
  const history = currentIndex >= 0 ? input.messages.slice(0, currentIndex) : input.messages;

  const turns = groupIntoTurns(history, count);
  const passages = [...input.passages].sort((a, b) => b.score - a.score);

  const currentTokens = currentTurn ? count(currentTurn.content) : 0;
  let historyTokens = turns.reduce((sum, turn) => sum + turn.estimatedTokens, 0);
  let systemPrompt = renderSystemPrompt(passages);
  let systemTokens = count(systemPrompt);
  const total = () => systemTokens + historyTokens + currentTokens;

  let droppedTurns = 0;
  while (total() > input.budgetTokens && turns.length > 0) {
    const dropped = turns.shift();
    historyTokens -= dropped?.estimatedTokens ?? 0;
    droppedTurns += 1;
  }

  let droppedPassages = 0;
  while (total() > input.budgetTokens && passages.length > 1) {
    passages.pop();
    droppedPassages += 1;
    systemPrompt = renderSystemPrompt(passages);
    systemTokens = count(systemPrompt);
  }

  const messages = turns.flatMap((turn) => turn.messages);
  if (currentTurn) {
    messages.push(currentTurn);
  }

  return {
    systemPrompt,
    messages,
    passages,
    citations: passages.map((passage, index) => ({ index: index + 1, uri: passage.uri })),
    sources: normalizeSources(passages),
    truncated: droppedTurns > 0 || droppedPassages > 0,
    droppedTurns,
    droppedPassages,
    totalTokens: total(),
  };
}
