// apps/api/src/dispatch/intentResolver/index.ts
import type { ConversationContext, Handler } from '../../handlers/types.js';
import { summarize } from '../../handlers/registry.js';
import { logger as rootLogger, type Logger } from '../../logger.js';
import { recentWindow } from '../context.js';
import { runWithDeadline, isCancellation } from '../deadline.js';
import { classifyError, errorMessage } from '../errors.js';
import type {
  ClassifierSelection,
  IntentResolverOptions,
  IntentResult,
  Unresolvable,
  UnresolvableReason,
} from './types.js';

function unresolvable(reason: UnresolvableReason, detail: string): Unresolvable {
  return { kind: 'unresolvable', reason, detail };
}

/**
 * Fallback routing for text no keyword matched.
 * Every failure short of a caller abort comes back as `unresolvable`.
 */
export class IntentResolver {
  private readonly log: Logger;

  constructor(private readonly options: IntentResolverOptions, logger: Logger = rootLogger) {
    this.log = logger.child({ module: 'intent-resolver' });
  }

  async resolve(
    text: string,
    context: ConversationContext,
    handlers: readonly Handler[],
    signal?: AbortSignal
  ): Promise<IntentResult> {
    const { classifier, contextTurns, minConfidence, timeoutMs } = this.options;
    if (!classifier) {
      return unresolvable('classifier_unavailable', 'no intent classifier is configured');
    }

    const request = {
      text,
      context: recentWindow(context, contextTurns),
      catalog: handlers.map((handler) => summarize(handler)),
    };

    let selection: ClassifierSelection | null;
    try {
      selection = await runWithDeadline(
        'classifier',
        timeoutMs,
        (stageSignal) => classifier.classify(request, stageSignal),
        signal
      );
    } catch (error) {
      if (isCancellation(error)) throw error;
      const detail = `${classifyError(error)}: ${errorMessage(error)}`;
      this.log.warn({ err: error, detail }, 'Intent classifier failed');
      return unresolvable('classifier_unavailable', detail);
    }

    if (!selection || !selection.handler) {
      return unresolvable('no_match', 'classifier found no matching handler');
    }

    if (selection.confidence !== undefined && selection.confidence < minConfidence) {
      return unresolvable(
        'no_match',
        `classifier confidence ${selection.confidence} is below ${minConfidence}`
      );
    }

    const name = selection.handler;
    const handler = handlers.find((candidate) => candidate.descriptor.name === name);
    if (!handler) {
      return unresolvable('unknown_handler', `classifier named unknown handler "${name}"`);
    }
    if (!handler.taskTypes.includes(selection.taskType)) {
      return unresolvable(
        'unknown_handler',
        `handler "${handler.descriptor.name}" has no task type "${selection.taskType}"`
      );
    }

    return {
      kind: 'resolved',
      handler,
      taskType: selection.taskType,
      params: Object.freeze({ ...(selection.params ?? {}) }),
      confidence: selection.confidence,
    };
  }
}

export * from './types.js';
