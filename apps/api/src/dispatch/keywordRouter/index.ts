// apps/api/src/dispatch/keywordRouter/index.ts
import type { TaskParams } from '@deskpilot/shared';
import type { Handler } from '../../handlers/types.js';
import { normalizeInput } from './normalize.js';

export interface KeywordMatch {
  handler: Handler;
  taskType: string;
  params: TaskParams;
  /** Normalized phrase that matched. */
  phrase: string;
}

/**
 * Exact-key lookup across handler keyword tables.
 * `handlers` must already be in priority order (see HandlerRegistry.ordered).
 * A phrase merely contained in the text never matches.
 */
export function routeKeyword(text: string, handlers: readonly Handler[]): KeywordMatch | null {
  const phrase = normalizeInput(text);
  if (!phrase) return null;

  for (const handler of handlers) {
    const entry = handler.descriptor.keywords.get(phrase);
    if (entry) {
      return { handler, taskType: entry.taskType, params: entry.params, phrase };
    }
  }

  return null;
}

/** Keywords of one handler grouped by task type, in declaration order. */
export function keywordsByTaskType(handler: Handler): Record<string, string[]> {
  const grouped: Record<string, string[]> = {};
  for (const type of handler.taskTypes) grouped[type] = [];

  for (const [phrase, entry] of handler.descriptor.keywords) {
    grouped[entry.taskType]?.push(phrase);
  }
  return grouped;
}

export { normalizeInput, isHelpRequest, parseMention } from './normalize.js';
export type { Mention } from './normalize.js';
