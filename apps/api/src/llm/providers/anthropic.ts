import Anthropic from '@anthropic-ai/sdk';
import { config } from '../../config.js';
import type { LLMProviderAdapter, GenerateRequest, GenerateResponse, LLMMessage } from '../types.js';

export class AnthropicProvider implements LLMProviderAdapter {
  readonly name = 'anthropic' as const;
  readonly defaultModel = 'claude-3-5-haiku-20241022';
  private client: Anthropic | null = null;

  constructor(private readonly apiKey: string | undefined = config.anthropicApiKey) {}

  get isConfigured(): boolean {
    return !!this.apiKey;
  }

  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.apiKey) {
        throw new Error('ANTHROPIC_API_KEY is not configured');
      }
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const client = this.getClient();

    const messages: Anthropic.MessageParam[] = request.messages
      .filter((m): m is LLMMessage & { role: 'user' | 'assistant' } => m.role !== 'system')
      .map((m) => ({ role: m.role, content: m.content }));

    const response = await client.messages.create(
      {
        model: request.model || this.defaultModel,
        max_tokens: request.maxTokens || 1024,
        system: request.systemPrompt,
        messages,
      },
      { signal: request.signal }
    );

    let textContent = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        textContent += block.text;
      }
    }

    return {
      content: textContent,
      finishReason: response.stop_reason === 'max_tokens' ? 'max_tokens' : 'stop',
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}
