import type { ParamValue } from '@deskpilot/shared';
import type { ConversationContext, ParamExtractor } from '../handlers/types.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { runWithDeadline, isCancellation } from './deadline.js';
import { errorMessage } from './errors.js';

export interface InferRequest {
  /** The request that produced the CannotHandle. */
  text: string;
  context: ConversationContext;
  /** Field name → description, as the handler reported it. */
  missing: Record<string, string>;
}

/** Asks a language model to pull the missing values out of the conversation. */
export interface ContextInferrer {
  infer(request: InferRequest, signal: AbortSignal): Promise<Record<string, string>>;
}

export interface MissingInfoResult {
  filled: Record<string, ParamValue>;
  /** Field name → description for everything still unknown. */
  unresolved: Record<string, string>;
}

export interface ResolveMissingInfoOptions {
  text: string;
  /** Handler that owns the extractors; tags fault logs. */
  handler?: string;
  inferrer?: ContextInferrer;
  timeoutMs: number;
  signal?: AbortSignal;
  logger?: Logger;
}

function isUsable(value: ParamValue | undefined): value is ParamValue {
  if (value === undefined || value === null) return false;
  return typeof value !== 'string' || value.trim().length > 0;
}

/** Newest turn first; the first turn the extractor finds something in wins. */
export function findInContext(
  context: ConversationContext,
  extractor: ParamExtractor
): ParamValue | undefined {
  for (let i = context.length - 1; i >= 0; i--) {
    const text = context[i].text;
    if (!text.trim()) continue;
    const value = extractor(text);
    if (isUsable(value)) return typeof value === 'string' ? value.trim() : value;
  }
  return undefined;
}

/**
 * Fill what a handler said it was missing: handler extractors over the
 * context first, then the inferrer for whatever is left.
 * Only a caller abort rejects; extractor and inferrer failures leave keys unresolved.
 */
export async function resolveMissingInfo(
  missing: Record<string, string>,
  context: ConversationContext,
  extractors: Readonly<Record<string, ParamExtractor>>,
  options: ResolveMissingInfoOptions
): Promise<MissingInfoResult> {
  const log = (options.logger ?? rootLogger).child({ module: 'missing-info' });
  const filled: Record<string, ParamValue> = {};
  const unresolved: Record<string, string> = {};

  for (const [key, description] of Object.entries(missing)) {
    const extractor = Object.hasOwn(extractors, key) ? extractors[key] : undefined;
    let value: ParamValue | undefined;
    if (extractor) {
      try {
        value = findInContext(context, extractor);
      } catch (error) {
        log.warn({ err: error, handler: options.handler, key }, `Extractor failed: ${errorMessage(error)}`);
      }
    }
    if (value !== undefined) {
      filled[key] = value;
    } else {
      unresolved[key] = description;
    }
  }

  const { inferrer } = options;
  if (!inferrer || Object.keys(unresolved).length === 0 || context.length === 0) {
    return { filled, unresolved };
  }

  try {
    const inferred = await runWithDeadline(
      'context-inference',
      options.timeoutMs,
      (signal) => inferrer.infer({ text: options.text, context, missing: { ...unresolved } }, signal),
      options.signal
    );
    for (const [key, value] of Object.entries(inferred)) {
      if (!Object.hasOwn(unresolved, key) || !value.trim()) continue;
      filled[key] = value.trim();
      delete unresolved[key];
    }
  } catch (error) {
    if (isCancellation(error)) throw error;
    log.warn({ err: error, keys: Object.keys(unresolved) }, `Context inference failed: ${errorMessage(error)}`);
  }

  return { filled, unresolved };
}
