// apps/api/src/llm/classifier.ts
import { z } from 'zod';
import { llmRouter } from './router.js';
import { extractJsonBlock, type LLMProvider } from './types.js';
import { INTENT_SYSTEM_PROMPT, INTENT_USER_TEMPLATE } from '../prompts/index.js';
import { formatContextDigest } from '../dispatch/context.js';
import type { Classifier, ClassifierSelection, ClassifyRequest } from '../dispatch/intentResolver/index.js';
import { logger as rootLogger, type Logger } from '../logger.js';

const SelectionSchema = z.object({
  handler: z.string().nullable().optional(),
  taskType: z.string().optional(),
  params: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export interface LlmClassifierOptions {
  provider: LLMProvider;
  model?: string;
  logger?: Logger;
}

/**
 * Parse a classifier reply. Anything short of a well-formed selection
 * naming a handler and task type means "no match".
 */
export function parseSelection(content: string, log: Logger = rootLogger): ClassifierSelection | null {
  const json = extractJsonBlock(content);
  if (!json) {
    log.warn('No JSON found in classifier response');
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    log.warn({ err: error }, 'Classifier response is not valid JSON');
    return null;
  }

  const parsed = SelectionSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues.map((issue) => issue.message).join('; ') }, 'Classifier response failed validation');
    return null;
  }

  const { handler, taskType, params, confidence } = parsed.data;
  if (!handler || !taskType) return null;

  return { handler, taskType, params: params ?? {}, confidence };
}

/** Intent classifier backed by the configured LLM provider. */
export class LlmClassifier implements Classifier {
  private readonly log: Logger;

  constructor(private readonly options: LlmClassifierOptions) {
    this.log = (options.logger ?? rootLogger).child({ module: 'classifier' });
  }

  async classify(request: ClassifyRequest, signal: AbortSignal): Promise<ClassifierSelection | null> {
    const response = await llmRouter.generate(this.options.provider, {
      model: this.options.model,
      messages: [
        {
          role: 'user',
          content: INTENT_USER_TEMPLATE(request.text, request.catalog, formatContextDigest(request.context)),
        },
      ],
      systemPrompt: INTENT_SYSTEM_PROMPT,
      maxTokens: 512,
      signal,
    });

    return parseSelection(response.content, this.log);
  }
}
