// apps/api/src/llm/classifier.test.ts
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LlmClassifier, parseSelection } from './classifier.js';
import { llmRouter } from './router.js';
import type { ClassifyRequest } from '../dispatch/intentResolver/index.js';

vi.mock('./router.js', () => ({
  llmRouter: {
    generate: vi.fn(),
  },
}));

const request: ClassifyRequest = {
  text: '播放一首好听的歌',
  context: [
    { role: 'user', text: '我想听周杰伦' },
    { role: 'assistant', text: '好的' },
  ],
  catalog: [
    {
      name: 'music',
      version: '1.0.0',
      description: 'Plays music',
      priority: 2,
      capabilities: ['audio'],
      taskTypes: ['play', 'pause'],
      aliases: ['music'],
    },
  ],
};

describe('LlmClassifier', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('parses a selection from the model reply', async () => {
    vi.mocked(llmRouter.generate).mockResolvedValueOnce({
      content: 'Here you go: {"handler": "music", "taskType": "play", "params": {"artist": "周杰伦"}, "confidence": 0.82}',
      finishReason: 'stop',
    });
    const classifier = new LlmClassifier({ provider: 'anthropic' });

    const selection = await classifier.classify(request, new AbortController().signal);

    expect(selection).toEqual({ handler: 'music', taskType: 'play', params: { artist: '周杰伦' }, confidence: 0.82 });
  });

  it('sends the catalog, history and signal to the provider', async () => {
    vi.mocked(llmRouter.generate).mockResolvedValueOnce({ content: '{"handler": ""}', finishReason: 'stop' });
    const signal = new AbortController().signal;
    const classifier = new LlmClassifier({ provider: 'openai', model: 'gpt-4o-mini' });

    await classifier.classify(request, signal);

    const [provider, generateRequest] = vi.mocked(llmRouter.generate).mock.calls[0];
    expect(provider).toBe('openai');
    expect(generateRequest.model).toBe('gpt-4o-mini');
    expect(generateRequest.signal).toBe(signal);
    const prompt = generateRequest.messages[0].content;
    expect(prompt).toContain('- music: Plays music\n  capabilities: audio\n  task types: play, pause');
    expect(prompt).toContain('USER: 我想听周杰伦\nASSISTANT: 好的');
    expect(prompt).toContain('REQUEST:\n播放一首好听的歌');
  });

  it('lets provider errors propagate', async () => {
    vi.mocked(llmRouter.generate).mockRejectedValueOnce(new Error('Provider anthropic is not configured. Please set the API key.'));
    const classifier = new LlmClassifier({ provider: 'anthropic' });

    await expect(classifier.classify(request, new AbortController().signal)).rejects.toThrow('not configured');
  });
});

describe('parseSelection', () => {
  it('treats an empty handler as no match', () => {
    expect(parseSelection('{"handler": "", "taskType": "play"}')).toBeNull();
    expect(parseSelection('{"handler": null}')).toBeNull();
  });

  it('returns null for replies without usable JSON', () => {
    expect(parseSelection('I am not sure.')).toBeNull();
    expect(parseSelection('{handler: music}')).toBeNull();
  });

  it('returns null when validation fails', () => {
    expect(parseSelection('{"handler": "music", "taskType": "play", "confidence": 7}')).toBeNull();
    expect(parseSelection('{"handler": "music", "taskType": "play", "params": {"song": ["a", "b"]}}')).toBeNull();
  });

  it('defaults params to an empty mapping', () => {
    expect(parseSelection('{"handler": "music", "taskType": "play"}')).toEqual({
      handler: 'music',
      taskType: 'play',
      params: {},
      confidence: undefined,
    });
  });
});
