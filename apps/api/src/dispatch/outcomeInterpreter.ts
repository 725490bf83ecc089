// ──────────────────────────────────────────────
// Outcome Interpreter
// Decides what follows a handler's outcome: hand it back,
// retry once with filled params, or ask the user.
// ──────────────────────────────────────────────

import type { DispatchClarify, DispatchSuccess } from '@deskpilot/shared';
import type { CannotHandleOutcome, Outcome } from '../handlers/outcome.js';
import { createTask, withParams, type Task } from '../handlers/task.js';
import type { ConversationContext, Handler } from '../handlers/types.js';
import { routeKeyword } from './keywordRouter/index.js';
import { resolveMissingInfo, type ContextInferrer, type MissingInfoResult } from './missingInfo.js';
import type { Logger } from '../logger.js';

export type Step =
  | { next: 'done'; response: DispatchSuccess }
  | { next: 'retry'; handler: Handler; task: Task; filled: string[] }
  | { next: 'clarify'; response: DispatchClarify };

export interface InterpretInput {
  outcome: Outcome;
  handler: Handler;
  task: Task;
  context: ConversationContext;
  /** False once the single retry has been spent. */
  retryAllowed: boolean;
  /** The outcome was synthesized from a thrown error. */
  faulted?: boolean;
  signal?: AbortSignal;
}

export interface InterpretDeps {
  lookup: (name: string) => Handler | undefined;
  inferrer?: ContextInferrer;
  inferTimeoutMs: number;
  logger?: Logger;
}

function clarifyFrom(
  outcome: CannotHandleOutcome,
  handler: Handler,
  missing: Record<string, string>,
  faulted: boolean
): Step {
  const cause = Object.keys(missing).length > 0
    ? 'missing_info'
    : faulted ? 'handler_fault' : 'handler_declined';
  return {
    next: 'clarify',
    response: {
      kind: 'clarify',
      cause,
      reason: outcome.reason,
      missing,
      handler: handler.descriptor.name,
    },
  };
}

/**
 * Pick the task type the suggested handler should run: the same one if it
 * declares it, else whatever its own keywords make of the text, else its
 * only task type. Null when none of these apply.
 */
function taskTypeFor(target: Handler, task: Task): string | null {
  if (target.taskTypes.includes(task.type)) return task.type;
  const match = routeKeyword(task.content, [target]);
  if (match) return match.taskType;
  return target.taskTypes.length === 1 ? target.taskTypes[0] : null;
}

function suggestedHandler(
  outcome: CannotHandleOutcome,
  current: Handler,
  lookup: InterpretDeps['lookup']
): Handler | undefined {
  if (!outcome.suggestion || outcome.suggestion === current.descriptor.name) return undefined;
  return lookup(outcome.suggestion);
}

export async function interpretOutcome(input: InterpretInput, deps: InterpretDeps): Promise<Step> {
  const { outcome, handler, task, context } = input;
  const faulted = input.faulted ?? false;

  if (outcome.kind === 'success') {
    return {
      next: 'done',
      response: {
        kind: 'success',
        handler: handler.descriptor.name,
        taskType: task.type,
        message: outcome.message,
        ...(outcome.payload === undefined ? {} : { payload: outcome.payload }),
      },
    };
  }

  if (!input.retryAllowed || faulted) {
    return clarifyFrom(outcome, handler, { ...outcome.missingInfo }, faulted);
  }

  const missingKeys = Object.keys(outcome.missingInfo);
  const { filled, unresolved }: MissingInfoResult = missingKeys.length > 0
    ? await resolveMissingInfo(outcome.missingInfo, context, handler.extractors, {
        text: task.content,
        handler: handler.descriptor.name,
        inferrer: deps.inferrer,
        timeoutMs: deps.inferTimeoutMs,
        signal: input.signal,
        logger: deps.logger,
      })
    : { filled: {}, unresolved: {} };
  const filledKeys = Object.keys(filled);

  if (missingKeys.length > 0 && Object.keys(unresolved).length === 0) {
    return { next: 'retry', handler, task: withParams(task, filled), filled: filledKeys };
  }

  const alternate = suggestedHandler(outcome, handler, deps.lookup);
  if (alternate) {
    const type = taskTypeFor(alternate, task);
    if (type !== null) {
      const moved = createTask({ type, content: task.content, params: { ...task.params, ...filled } });
      return { next: 'retry', handler: alternate, task: moved, filled: filledKeys };
    }
  }

  return clarifyFrom(outcome, handler, unresolved, faulted);
}
