import { describe, expect, it } from 'vitest';
import type { Turn } from '@deskpilot/shared';
import { interpretOutcome, type InterpretDeps } from './outcomeInterpreter.js';
import { defineHandler } from '../handlers/define.js';
import { cannotHandle, success } from '../handlers/outcome.js';
import { createTask } from '../handlers/task.js';
import type { Handler } from '../handlers/types.js';

const weather = defineHandler({
  name: 'weather',
  priority: 3,
  actions: { forecast: () => success('sunny') },
  extractors: { city: (text) => text.match(/\bin ([A-Z][a-z]+)/)?.[1] },
});

const search = defineHandler({
  name: 'search',
  priority: 6,
  actions: { find: () => success('found') },
});

const media = defineHandler({
  name: 'media',
  priority: 4,
  actions: { play: () => success('playing'), stop: () => success('stopped') },
  keywords: { 'stop': 'stop' },
});

const handlers = new Map<string, Handler>([weather, search, media].map((h): [string, Handler] => [h.descriptor.name, h]));
const deps: InterpretDeps = { lookup: (name) => handlers.get(name), inferTimeoutMs: 1000 };

const beijing: Turn[] = [{ role: 'user', text: 'I am in Beijing this week' }];
const forecastTask = createTask({ type: 'forecast', content: '天气怎么样', params: { unit: 'c' } });

describe('interpretOutcome', () => {
  it('returns success verbatim', async () => {
    const step = await interpretOutcome(
      { outcome: success('Sunny, 25°C', { temp: 25 }), handler: weather, task: forecastTask, context: [], retryAllowed: true },
      deps
    );

    expect(step).toEqual({
      next: 'done',
      response: { kind: 'success', handler: 'weather', taskType: 'forecast', message: 'Sunny, 25°C', payload: { temp: 25 } },
    });
  });

  it('omits an absent payload', async () => {
    const step = await interpretOutcome(
      { outcome: success('ok'), handler: weather, task: forecastTask, context: [], retryAllowed: true },
      deps
    );

    expect(step).toStrictEqual({
      next: 'done',
      response: { kind: 'success', handler: 'weather', taskType: 'forecast', message: 'ok' },
    });
  });

  it('retries the same handler once every missing key is filled from context', async () => {
    const step = await interpretOutcome(
      {
        outcome: cannotHandle('need a city', { missingInfo: { city: 'Which city?' } }),
        handler: weather,
        task: forecastTask,
        context: beijing,
        retryAllowed: true,
      },
      deps
    );

    expect(step.next).toBe('retry');
    if (step.next !== 'retry') return;
    expect(step.handler).toBe(weather);
    expect(step.filled).toEqual(['city']);
    expect(step.task.params).toEqual({ unit: 'c', city: 'Beijing' });
    expect(step.task.type).toBe('forecast');
    expect(step.task.id).not.toBe(forecastTask.id);
  });

  it('asks for exactly the unresolved fields when context has nothing', async () => {
    const task = createTask({ type: 'forecast', content: '删除文件' });
    const step = await interpretOutcome(
      {
        outcome: cannotHandle('no path given', { missingInfo: { path: 'Which file?' } }),
        handler: weather,
        task,
        context: [],
        retryAllowed: true,
      },
      deps
    );

    expect(step).toEqual({
      next: 'clarify',
      response: {
        kind: 'clarify',
        cause: 'missing_info',
        reason: 'no path given',
        missing: { path: 'Which file?' },
        handler: 'weather',
      },
    });
  });

  it('does not retry once the retry is spent', async () => {
    const step = await interpretOutcome(
      {
        outcome: cannotHandle('still no city', { missingInfo: { city: 'Which city?' } }),
        handler: weather,
        task: forecastTask,
        context: beijing,
        retryAllowed: false,
      },
      deps
    );

    expect(step).toMatchObject({ next: 'clarify', response: { cause: 'missing_info', missing: { city: 'Which city?' } } });
  });

  it('reports a fault as handler_fault without retrying', async () => {
    const step = await interpretOutcome(
      {
        outcome: cannotHandle('weather: NETWORK: fetch failed', { suggestion: 'search' }),
        handler: weather,
        task: forecastTask,
        context: [],
        retryAllowed: true,
        faulted: true,
      },
      deps
    );

    expect(step).toMatchObject({
      next: 'clarify',
      response: { cause: 'handler_fault', reason: 'weather: NETWORK: fetch failed', missing: {} },
    });
  });

  it('reports a bare refusal as handler_declined', async () => {
    const step = await interpretOutcome(
      { outcome: cannotHandle('not today'), handler: weather, task: forecastTask, context: [], retryAllowed: true },
      deps
    );

    expect(step).toMatchObject({ next: 'clarify', response: { cause: 'handler_declined', missing: {} } });
  });

  it('moves the task to a suggested handler with a single task type', async () => {
    const step = await interpretOutcome(
      {
        outcome: cannotHandle('try searching', { suggestion: 'search' }),
        handler: weather,
        task: forecastTask,
        context: [],
        retryAllowed: true,
      },
      deps
    );

    expect(step.next).toBe('retry');
    if (step.next !== 'retry') return;
    expect(step.handler).toBe(search);
    expect(step.task.type).toBe('find');
    expect(step.task.content).toBe('天气怎么样');
    expect(step.task.params).toEqual({ unit: 'c' });
  });

  it('carries partially filled params to the suggested handler', async () => {
    const step = await interpretOutcome(
      {
        outcome: cannotHandle('need more', { suggestion: 'search', missingInfo: { city: 'Which city?', date: 'Which day?' } }),
        handler: weather,
        task: forecastTask,
        context: beijing,
        retryAllowed: true,
      },
      deps
    );

    expect(step.next).toBe('retry');
    if (step.next !== 'retry') return;
    expect(step.handler).toBe(search);
    expect(step.task.params).toEqual({ unit: 'c', city: 'Beijing' });
  });

  it('uses the suggested handler keywords to pick its task type', async () => {
    const task = createTask({ type: 'forecast', content: 'Stop' });
    const step = await interpretOutcome(
      { outcome: cannotHandle('not mine', { suggestion: 'media' }), handler: weather, task, context: [], retryAllowed: true },
      deps
    );

    expect(step).toMatchObject({ next: 'retry', handler: media, task: { type: 'stop', content: 'Stop' } });
  });

  it('asks the user when the suggestion cannot take the task', async () => {
    const unknown = await interpretOutcome(
      { outcome: cannotHandle('not mine', { suggestion: 'calendar' }), handler: weather, task: forecastTask, context: [], retryAllowed: true },
      deps
    );
    const ambiguous = await interpretOutcome(
      { outcome: cannotHandle('not mine', { suggestion: 'media' }), handler: weather, task: forecastTask, context: [], retryAllowed: true },
      deps
    );

    expect(unknown).toMatchObject({ next: 'clarify', response: { cause: 'handler_declined' } });
    expect(ambiguous).toMatchObject({ next: 'clarify', response: { cause: 'handler_declined' } });
  });
});
