import { textBlock } from './blocks.js';
import type { ContentBlock, Message, MessageRole, TokenUsage } from './types.js';

export const EMPTY_USAGE: TokenUsage = Object.freeze({
  inputTokens: 0,
  outputTokens: 0,
  cacheCreationInputTokens: 0,
  cacheReadInputTokens: 0,
});

export function createMessage(
  role: MessageRole,
  blocks: readonly ContentBlock[],
  usage: Partial<TokenUsage> = {},
): Message {
  return Object.freeze({
    role,
    blocks: Object.freeze([...blocks]),
    usage: Object.freeze({ ...EMPTY_USAGE, ...usage }),
  });
}

export function userMessage(text: string, ...attachments: ContentBlock[]): Message {
  return createMessage('user', [textBlock(text), ...attachments]);
}

export function withBlock(message: Message, block: ContentBlock): Message {
  return withBlocks(message, [block]);
}

export function withBlocks(message: Message, blocks: readonly ContentBlock[]): Message {
  return createMessage(message.role, [...message.blocks, ...blocks], message.usage);
}

export function addUsage(total: TokenUsage, next: TokenUsage): TokenUsage {
  return Object.freeze({
    inputTokens: total.inputTokens + next.inputTokens,
    outputTokens: total.outputTokens + next.outputTokens,
    cacheCreationInputTokens: total.cacheCreationInputTokens + next.cacheCreationInputTokens,
    cacheReadInputTokens: total.cacheReadInputTokens + next.cacheReadInputTokens,
  });
}
