import type { LLMProviderName } from '../config.js';

export type LLMProvider = LLMProviderName;

export interface LLMMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface GenerateRequest {
  messages: LLMMessage[];
  systemPrompt?: string;
  model?: string;
  maxTokens?: number;
  /** Aborts the underlying HTTP request. */
  signal?: AbortSignal;
}

export interface GenerateResponse {
  content: string;
  finishReason: 'stop' | 'max_tokens';
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMProviderAdapter {
  readonly name: LLMProvider;
  readonly isConfigured: boolean;
  readonly defaultModel: string;
  generate(request: GenerateRequest): Promise<GenerateResponse>;
}

/** First `{...}` block in a model reply, or null. */
export function extractJsonBlock(content: string): string | null {
  const match = content.match(/\{[\s\S]*\}/);
  return match ? match[0] : null;
}
