import { describe, expect, it } from 'vitest';
import { defineHandler } from '../handlers/define.js';
import { success } from '../handlers/outcome.js';
import { buildHandlerHelp, buildHelp } from './help.js';

const music = defineHandler({
  name: 'music',
  priority: 2,
  description: 'Plays local music',
  aliases: ['music'],
  actions: { play: () => success('playing'), stop: () => success('stopped') },
  keywords: { '播放音乐': 'play', 'play music': 'play', '停止': 'stop' },
});

const weather = defineHandler({
  name: 'weather',
  priority: 5,
  actions: { forecast: () => success('sunny') },
  keywords: { '天气': 'forecast' },
});

describe('buildHelp', () => {
  it('lists every handler with keywords grouped by task type', () => {
    const response = buildHelp([music, weather]);

    expect(response.handler).toBe('dispatcher');
    expect(response.taskType).toBe('help');
    expect(response.message).toBe(
      [
        'Available handlers:',
        'music (@music): Plays local music',
        '  play: 播放音乐, play music',
        '  stop: 停止',
        'weather',
        '  forecast: 天气',
      ].join('\n')
    );
    expect(response.payload).toEqual({
      handlers: [
        {
          name: 'music',
          description: 'Plays local music',
          aliases: ['music'],
          keywords: { play: ['播放音乐', 'play music'], stop: ['停止'] },
        },
        { name: 'weather', description: '', aliases: [], keywords: { forecast: ['天气'] } },
      ],
    });
  });

  it('returns only the heading when nothing is registered', () => {
    expect(buildHelp([]).message).toBe('Available handlers:');
  });
});

describe('buildHandlerHelp', () => {
  it('reports the handler itself and lists only its keywords', () => {
    const response = buildHandlerHelp(weather);

    expect(response.handler).toBe('weather');
    expect(response.message).toBe('weather\n  forecast: 天气');
  });
});
