/**
 * Prompt-cache breakpoint placement for Anthropic message history.
 *
 * Anthropic caches everything up to a block carrying `cache_control`, so one
 * breakpoint on the newest cacheable block covers the longest prefix. Only one
 * breakpoint is kept: any earlier one is removed before the new one is placed.
 */

import type {
  CacheControlEphemeral,
  ContentBlockParam,
  DocumentBlockParam,
  ImageBlockParam,
  MessageParam,
  TextBlockParam,
} from '@anthropic-ai/sdk/resources/messages';

type CacheableBlockParam = TextBlockParam | ImageBlockParam | DocumentBlockParam;

export type CacheBreakpoint = {
  messageIndex: number;
  blockIndex: number;
};

function isCacheableBlock(block: ContentBlockParam): block is CacheableBlockParam {
  return block.type === 'text' || block.type === 'image' || block.type === 'document';
}

function withoutCacheControl(block: CacheableBlockParam): ContentBlockParam {
  switch (block.type) {
    case 'text': {
      const { cache_control: _removed, ...text } = block;
      return text;
    }
    case 'image': {
      const { cache_control: _removed, ...image } = block;
      return image;
    }
    case 'document': {
      const { cache_control: _removed, ...document } = block;
      return document;
    }
  }
}

function hasCacheControl(block: ContentBlockParam): block is CacheableBlockParam {
  return isCacheableBlock(block) && block.cache_control != null;
}

function replaceBlock(
  message: MessageParam,
  blocks: ContentBlockParam[],
  index: number,
  block: ContentBlockParam,
): MessageParam {
  const next = [...blocks];
  next[index] = block;
  return { ...message, content: next };
}

/** Removes every cache directive, rebuilding only the messages that carried one. */
export function clearCacheBreakpoints(history: MessageParam[]): void {
  history.forEach((message, messageIndex) => {
    if (!Array.isArray(message.content) || !message.content.some(hasCacheControl)) return;
    history[messageIndex] = {
      ...message,
      content: message.content.map((block) =>
        hasCacheControl(block) ? withoutCacheControl(block) : block,
      ),
    };
  });
}

/**
 * Marks the last cacheable block of the newest message that has one.
 * Returns where the breakpoint went, or null when nothing is cacheable.
 */
export function applyCacheBreakpoint(
  history: MessageParam[],
  cacheControl: CacheControlEphemeral,
): CacheBreakpoint | null {
  clearCacheBreakpoints(history);

  for (let messageIndex = history.length - 1; messageIndex >= 0; messageIndex--) {
    const message = history[messageIndex];
    if (!Array.isArray(message.content) || message.content.length === 0) {
      continue;
    }

    const blocks = message.content;
    for (let blockIndex = blocks.length - 1; blockIndex >= 0; blockIndex--) {
      const block = blocks[blockIndex];
      if (!isCacheableBlock(block)) continue;

      history[messageIndex] = replaceBlock(message, blocks, blockIndex, {
        ...block,
        cache_control: cacheControl,
      });
      return { messageIndex, blockIndex };
    }
  }

  return null;
}

export function countCacheBreakpoints(history: readonly MessageParam[]): number {
  let count = 0;
  for (const message of history) {
    if (!Array.isArray(message.content)) continue;
    for (const block of message.content) {
      if (hasCacheControl(block)) count++;
    }
  }
  return count;
}
