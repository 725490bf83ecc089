import OpenAI from 'openai';
import { config } from '../../config.js';
import type { LLMProviderAdapter, GenerateRequest, GenerateResponse } from '../types.js';

export class OpenAIProvider implements LLMProviderAdapter {
  readonly name = 'openai' as const;
  readonly defaultModel = 'gpt-4o-mini';
  private client: OpenAI | null = null;

  constructor(private readonly apiKey: string | undefined = config.openaiApiKey) {}

  get isConfigured(): boolean {
    return !!this.apiKey;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new Error('OPENAI_API_KEY is not configured');
      }
      this.client = new OpenAI({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const client = this.getClient();

    const messages: OpenAI.ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }

    for (const m of request.messages) {
      if (m.role === 'system') continue; // Already handled above
      messages.push({ role: m.role, content: m.content });
    }

    const response = await client.chat.completions.create(
      {
        model: request.model || this.defaultModel,
        max_tokens: request.maxTokens || 1024,
        messages,
      },
      { signal: request.signal }
    );

    const choice = response.choices[0];
    if (!choice) {
      throw new Error('OpenAI returned no choices');
    }

    return {
      content: choice.message.content || '',
      finishReason: choice.finish_reason === 'length' ? 'max_tokens' : 'stop',
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
      } : undefined,
    };
  }
}
