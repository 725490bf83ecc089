import { z } from 'zod';
import { llmRouter } from './router.js';
import { extractJsonBlock, type LLMProvider } from './types.js';
import { MISSING_INFO_SYSTEM_PROMPT, MISSING_INFO_USER_TEMPLATE } from '../prompts/index.js';
import { formatContextDigest } from '../dispatch/context.js';
import type { ContextInferrer, InferRequest } from '../dispatch/missingInfo.js';
import { logger as rootLogger, type Logger } from '../logger.js';

const InferredSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export interface LlmContextInferrerOptions {
  provider: LLMProvider;
  model?: string;
  logger?: Logger;
}

/** Asks the LLM for values of missing fields, keeping only the requested keys. */
export class LlmContextInferrer implements ContextInferrer {
  private readonly log: Logger;

  constructor(private readonly options: LlmContextInferrerOptions) {
    this.log = (options.logger ?? rootLogger).child({ module: 'context-inferrer' });
  }

  async infer(request: InferRequest, signal: AbortSignal): Promise<Record<string, string>> {
    const response = await llmRouter.generate(this.options.provider, {
      model: this.options.model,
      messages: [
        {
          role: 'user',
          content: MISSING_INFO_USER_TEMPLATE(request.text, request.missing, formatContextDigest(request.context)),
        },
      ],
      systemPrompt: MISSING_INFO_SYSTEM_PROMPT,
      maxTokens: 512,
      signal,
    });

    const json = extractJsonBlock(response.content);
    if (!json) {
      this.log.warn('No JSON found in inference response');
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      this.log.warn({ err: error }, 'Inference response is not valid JSON');
      return {};
    }

    const parsed = InferredSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn('Inference response failed validation');
      return {};
    }

    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed.data)) {
      if (!Object.hasOwn(request.missing, key)) continue;
      const text = String(value).trim();
      if (text) result[key] = text;
    }
    return result;
  }
}
