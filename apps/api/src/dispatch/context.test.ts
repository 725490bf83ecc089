import { describe, expect, it } from 'vitest';
import type { Turn } from '@deskpilot/shared';
import { contextFromProvider, formatContextDigest, recentWindow } from './context.js';

const turns: Turn[] = [
  { role: 'user', text: 'first' },
  { role: 'assistant', text: 'second' },
  { role: 'user', text: 'third' },
];

describe('recentWindow', () => {
  it('keeps the most recent turns, oldest first', () => {
    expect(recentWindow(turns, 2)).toEqual([
      { role: 'assistant', text: 'second' },
      { role: 'user', text: 'third' },
    ]);
  });

  it('returns everything when the limit exceeds the history', () => {
    expect(recentWindow(turns, 30)).toHaveLength(3);
  });

  it('returns a frozen copy', () => {
    const window = recentWindow(turns, 3);

    expect(Object.isFrozen(window)).toBe(true);
    expect(window[0]).not.toBe(turns[0]);
  });

  it('returns nothing for a non-positive limit', () => {
    expect(recentWindow(turns, 0)).toEqual([]);
  });
});

describe('contextFromProvider', () => {
  it('asks the provider for the limit and trims what it returns', async () => {
    const requested: number[] = [];
    const provider = {
      getRecentTurns: async (limit: number) => {
        requested.push(limit);
        return turns;
      },
    };

    const context = await contextFromProvider(provider, 1);

    expect(requested).toEqual([1]);
    expect(context).toEqual([{ role: 'user', text: 'third' }]);
  });
});

describe('formatContextDigest', () => {
  it('labels user and assistant turns and skips system and blank turns', () => {
    const digest = formatContextDigest([
      { role: 'system', text: 'internal note' },
      { role: 'user', text: 'weather  in\nBeijing?' },
      { role: 'assistant', text: '   ' },
      { role: 'assistant', text: 'Sunny.' },
    ]);

    expect(digest).toBe('USER: weather in Beijing?\nASSISTANT: Sunny.');
  });

  it('truncates long turns', () => {
    expect(formatContextDigest([{ role: 'user', text: 'abcdefghij' }], 8)).toBe('USER: abcde...');
  });
});
