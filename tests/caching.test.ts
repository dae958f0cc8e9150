import type { MessageParam } from '@anthropic-ai/sdk/resources/messages';
import { describe, expect, it } from 'vitest';
import { applyCacheBreakpoint, clearCacheBreakpoints, countCacheBreakpoints } from '../src/caching.js';

const ephemeral = { type: 'ephemeral' as const, ttl: '5m' as const };

function history(): MessageParam[] {
  return [
    { role: 'user', content: [{ type: 'text', text: 'first question' }] },
    { role: 'assistant', content: [{ type: 'text', text: 'first answer' }] },
    {
      role: 'user',
      content: [
        { type: 'text', text: 'look at this' },
        { type: 'image', source: { type: 'url', url: 'https://example.com/cat.png' } },
        { type: 'tool_result', tool_use_id: 'toolu_1', content: 'done' },
      ],
    },
  ];
}

describe('applyCacheBreakpoint', () => {
  it('marks the last cacheable block of the newest message', () => {
    const messages = history();
    const breakpoint = applyCacheBreakpoint(messages, ephemeral);

    expect(breakpoint).toEqual({ messageIndex: 2, blockIndex: 1 });
    expect(messages[2].content).toEqual([
      { type: 'text', text: 'look at this' },
      {
        type: 'image',
        source: { type: 'url', url: 'https://example.com/cat.png' },
        cache_control: ephemeral,
      },
      { type: 'tool_result', tool_use_id: 'toolu_1', content: 'done' },
    ]);
    expect(countCacheBreakpoints(messages)).toBe(1);
  });

  it('replaces the message instead of mutating the original object', () => {
    const messages = history();
    const original = messages[2];
    const originalBlocks = original.content;

    applyCacheBreakpoint(messages, ephemeral);

    expect(messages[2]).not.toBe(original);
    expect(original.content).toBe(originalBlocks);
    expect(countCacheBreakpoints([original])).toBe(0);
  });

  it('skips messages with string or empty content', () => {
    const messages: MessageParam[] = [
      { role: 'user', content: [{ type: 'text', text: 'cache this' }] },
      { role: 'assistant', content: [] },
      { role: 'user', content: 'plain string content' },
    ];

    expect(applyCacheBreakpoint(messages, ephemeral)).toEqual({ messageIndex: 0, blockIndex: 0 });
  });

  it('moves the single breakpoint forward as history grows', () => {
    const messages = history();
    applyCacheBreakpoint(messages, ephemeral);

    messages.push({ role: 'assistant', content: [{ type: 'text', text: 'an answer' }] });
    messages.push({ role: 'user', content: [{ type: 'text', text: 'follow up' }] });
    const breakpoint = applyCacheBreakpoint(messages, ephemeral);

    expect(breakpoint).toEqual({ messageIndex: 4, blockIndex: 0 });
    expect(countCacheBreakpoints(messages)).toBe(1);
  });

  it('re-targets the same block when the history has not changed', () => {
    const messages = history();

    expect(applyCacheBreakpoint(messages, ephemeral)).toEqual({ messageIndex: 2, blockIndex: 1 });
    expect(applyCacheBreakpoint(messages, ephemeral)).toEqual({ messageIndex: 2, blockIndex: 1 });
    expect(countCacheBreakpoints(messages)).toBe(1);
    expect(messages[2].content).toEqual([
      { type: 'text', text: 'look at this' },
      {
        type: 'image',
        source: { type: 'url', url: 'https://example.com/cat.png' },
        cache_control: ephemeral,
      },
      { type: 'tool_result', tool_use_id: 'toolu_1', content: 'done' },
    ]);
  });

  it('is a no-op when nothing is cacheable', () => {
    const messages: MessageParam[] = [
      { role: 'user', content: [{ type: 'tool_result', tool_use_id: 'toolu_1', content: 'x' }] },
    ];

    expect(applyCacheBreakpoint(messages, ephemeral)).toBeNull();
    expect(applyCacheBreakpoint([], ephemeral)).toBeNull();
    expect(countCacheBreakpoints(messages)).toBe(0);
  });
});

describe('clearCacheBreakpoints', () => {
  it('removes every directive and leaves other blocks alone', () => {
    const messages: MessageParam[] = [
      { role: 'user', content: [{ type: 'text', text: 'a', cache_control: ephemeral }] },
      { role: 'assistant', content: [{ type: 'text', text: 'b' }] },
    ];
    const untouched = messages[1];

    clearCacheBreakpoints(messages);

    expect(messages[0].content).toEqual([{ type: 'text', text: 'a' }]);
    expect(messages[1]).toBe(untouched);
  });
});
