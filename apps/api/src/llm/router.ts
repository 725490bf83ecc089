import type { LLMProvider, LLMProviderAdapter, GenerateRequest, GenerateResponse } from './types.js';
import { AnthropicProvider } from './providers/anthropic.js';
import { OpenAIProvider } from './providers/openai.js';
import { logger } from '../logger.js';

const log = logger.child({ module: 'llm' });

export class LLMRouter {
  private providers: Map<LLMProvider, LLMProviderAdapter>;

  constructor(adapters: LLMProviderAdapter[] = [new AnthropicProvider(), new OpenAIProvider()]) {
    this.providers = new Map();
    for (const adapter of adapters) {
      this.providers.set(adapter.name, adapter);
    }
  }

  isProviderConfigured(name: LLMProvider): boolean {
    const provider = this.providers.get(name);
    return provider?.isConfigured ?? false;
  }

  async generate(providerName: LLMProvider, request: GenerateRequest): Promise<GenerateResponse> {
    const provider = this.providers.get(providerName);

    if (!provider) {
      throw new Error(`Unknown provider: ${providerName}`);
    }

    if (!provider.isConfigured) {
      throw new Error(`Provider ${providerName} is not configured. Please set the API key.`);
    }

    const start = Date.now();
    const response = await provider.generate(request);
    log.debug(
      {
        provider: providerName,
        model: request.model || provider.defaultModel,
        durationMs: Date.now() - start,
        ...response.usage,
      },
      'LLM call completed'
    );
    return response;
  }
}

// Singleton instance
export const llmRouter = new LLMRouter();
