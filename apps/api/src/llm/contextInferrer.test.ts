import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LlmContextInferrer } from './contextInferrer.js';
import { llmRouter } from './router.js';
import type { InferRequest } from '../dispatch/missingInfo.js';

vi.mock('./router.js', () => ({
  llmRouter: {
    generate: vi.fn(),
  },
}));

const request: InferRequest = {
  text: '明天天气怎么样',
  context: [{ role: 'user', text: 'I am travelling to Beijing tomorrow' }],
  missing: { city: 'Which city?' },
};

describe('LlmContextInferrer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('keeps only requested keys with non-empty values', async () => {
    vi.mocked(llmRouter.generate).mockResolvedValueOnce({
      content: '{"city": " Beijing ", "date": "tomorrow"}',
      finishReason: 'stop',
    });
    const inferrer = new LlmContextInferrer({ provider: 'anthropic' });

    await expect(inferrer.infer(request, new AbortController().signal)).resolves.toEqual({ city: 'Beijing' });
  });

  it('lists the missing fields in the prompt', async () => {
    vi.mocked(llmRouter.generate).mockResolvedValueOnce({ content: '{}', finishReason: 'stop' });
    const inferrer = new LlmContextInferrer({ provider: 'anthropic' });

    await inferrer.infer(request, new AbortController().signal);

    const [, generateRequest] = vi.mocked(llmRouter.generate).mock.calls[0];
    expect(generateRequest.messages[0].content).toContain('MISSING FIELDS:\n- city: Which city?');
    expect(generateRequest.messages[0].content).toContain('USER: I am travelling to Beijing tomorrow');
  });

  it('returns nothing for unusable replies', async () => {
    vi.mocked(llmRouter.generate).mockResolvedValueOnce({ content: 'no idea', finishReason: 'stop' });
    vi.mocked(llmRouter.generate).mockResolvedValueOnce({ content: '{"city": {"name": "Beijing"}}', finishReason: 'stop' });
    const inferrer = new LlmContextInferrer({ provider: 'anthropic' });
    const signal = new AbortController().signal;

    await expect(inferrer.infer(request, signal)).resolves.toEqual({});
    await expect(inferrer.infer(request, signal)).resolves.toEqual({});
  });
});
