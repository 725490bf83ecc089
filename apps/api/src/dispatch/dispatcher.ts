// ──────────────────────────────────────────────
// Dispatcher
// NORMALIZE → KEYWORD_MATCH → (INTENT_RESOLVE) → EXECUTE → INTERPRET
//   → (RESOLVE_MISSING → EXECUTE) → success | clarify
// ──────────────────────────────────────────────

import { nanoid } from 'nanoid';
import type { ClarifyCause, DispatchClarify, DispatchResponse, TaskParams, Turn } from '@deskpilot/shared';
import { config, type Config } from '../config.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { cannotHandle, type Outcome } from '../handlers/outcome.js';
import type { HandlerRegistry } from '../handlers/registry.js';
import { createTask, type Task } from '../handlers/task.js';
import type { ConversationContext, Handler } from '../handlers/types.js';
import { recentWindow } from './context.js';
import { runWithDeadline, isCancellation } from './deadline.js';
import { DispatchCancelledError, HandlerFaultError } from './errors.js';
import { buildHandlerHelp, buildHelp } from './help.js';
import { IntentResolver, type Classifier, type UnresolvableReason } from './intentResolver/index.js';
import { isHelpRequest, normalizeInput, parseMention, routeKeyword } from './keywordRouter/index.js';
import type { ContextInferrer } from './missingInfo.js';
import { interpretOutcome } from './outcomeInterpreter.js';

export type DispatchState =
  | 'NORMALIZE'
  | 'KEYWORD_MATCH'
  | 'INTENT_RESOLVE'
  | 'EXECUTE'
  | 'INTERPRET'
  | 'RESOLVE_MISSING'
  | 'CLARIFY';

export type RouteSource = 'keyword' | 'mention' | 'intent';

export type DispatchSettings = Pick<
  Config,
  | 'contextWindow'
  | 'classifierContextTurns'
  | 'classifierMinConfidence'
  | 'classifierTimeoutMs'
  | 'handlerTimeoutMs'
>;

export interface DispatcherOptions {
  registry: HandlerRegistry;
  classifier?: Classifier;
  inferrer?: ContextInferrer;
  settings?: Partial<DispatchSettings>;
  logger?: Logger;
}

export interface DispatchOptions {
  signal?: AbortSignal;
  /** Correlates log lines; generated when absent. */
  requestId?: string;
}

interface Route {
  handler: Handler;
  taskType: string;
  params: TaskParams;
  source: RouteSource;
}

const UNRESOLVABLE_CAUSE: Record<UnresolvableReason, ClarifyCause> = {
  no_match: 'not_understood',
  unknown_handler: 'not_understood',
  classifier_unavailable: 'classifier_unavailable',
};

const UNRESOLVABLE_MESSAGE: Record<UnresolvableReason, string> = {
  no_match: 'I could not tell what you want me to do. Please rephrase or add detail.',
  unknown_handler: 'I could not tell what you want me to do. Please rephrase or add detail.',
  classifier_unavailable:
    'Your request did not match a known command and the language model service could not be reached. Please use an exact command or try again later.',
};

export function settingsFromConfig(source: Config = config): DispatchSettings {
  return {
    contextWindow: source.contextWindow,
    classifierContextTurns: source.classifierContextTurns,
    classifierMinConfidence: source.classifierMinConfidence,
    classifierTimeoutMs: source.classifierTimeoutMs,
    handlerTimeoutMs: source.handlerTimeoutMs,
  };
}

export class Dispatcher {
  private readonly registry: HandlerRegistry;
  private readonly resolver: IntentResolver;
  private readonly inferrer?: ContextInferrer;
  private readonly settings: DispatchSettings;
  private readonly log: Logger;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.registry.seal();
    this.settings = { ...settingsFromConfig(), ...options.settings };
    this.inferrer = options.inferrer;
    this.log = (options.logger ?? rootLogger).child({ module: 'dispatcher' });
    this.resolver = new IntentResolver(
      {
        classifier: options.classifier,
        contextTurns: this.settings.classifierContextTurns,
        minConfidence: this.settings.classifierMinConfidence,
        timeoutMs: this.settings.classifierTimeoutMs,
      },
      options.logger ?? rootLogger
    );
  }

  /**
   * Route one request and run it. Resolves to `success` or `clarify`;
   * rejects only with DispatchCancelledError when `options.signal` aborts.
   */
  async dispatch(
    rawText: string,
    context: readonly Turn[] = [],
    options: DispatchOptions = {}
  ): Promise<DispatchResponse> {
    const { signal } = options;
    const log = this.log.child({ requestId: options.requestId ?? nanoid(10) });
    const window = recentWindow(context, this.settings.contextWindow);

    this.ensureActive(signal, 'NORMALIZE');
    const text = rawText.trim();
    log.debug({ state: 'NORMALIZE', normalized: normalizeInput(text) }, 'Request received');

    if (isHelpRequest(text)) {
      log.info('Help listing requested');
      return buildHelp(this.registry.ordered());
    }

    const mention = parseMention(text);
    if (mention) {
      const target = this.registry.byAlias(mention.alias);
      if (target) {
        if (!mention.query || isHelpRequest(mention.query)) {
          log.info({ handler: target.descriptor.name }, 'Handler help requested');
          return buildHandlerHelp(target);
        }
        return this.routeAndRun(mention.query, [target], 'mention', window, signal, log);
      }
      log.debug({ alias: mention.alias }, 'Unknown alias; routing full text');
    }

    return this.routeAndRun(text, this.registry.ordered(), 'keyword', window, signal, log);
  }

  private async routeAndRun(
    text: string,
    candidates: readonly Handler[],
    source: RouteSource,
    context: ConversationContext,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<DispatchResponse> {
    const route = await this.route(text, candidates, source, context, signal, log);
    if ('kind' in route) return route;

    log.info(
      { handler: route.handler.descriptor.name, taskType: route.taskType, via: route.source },
      'Route selected'
    );
    const task = createTask({ type: route.taskType, content: text, params: { ...route.params } });
    return this.run(route.handler, task, candidates, context, signal, log);
  }

  private async route(
    text: string,
    candidates: readonly Handler[],
    source: RouteSource,
    context: ConversationContext,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<Route | DispatchClarify> {
    this.ensureActive(signal, 'KEYWORD_MATCH');
    const match = routeKeyword(text, candidates);
    if (match) {
      return { handler: match.handler, taskType: match.taskType, params: match.params, source };
    }

    log.debug({ state: 'INTENT_RESOLVE' }, 'No keyword match');
    const result = await this.resolver.resolve(text, context, candidates, signal);
    this.ensureActive(signal, 'INTENT_RESOLVE');

    if (result.kind === 'unresolvable') {
      log.warn({ state: 'CLARIFY', reason: result.reason, detail: result.detail }, 'Request unresolvable');
      return {
        kind: 'clarify',
        cause: UNRESOLVABLE_CAUSE[result.reason],
        reason: UNRESOLVABLE_MESSAGE[result.reason],
        missing: {},
      };
    }

    return {
      handler: result.handler,
      taskType: result.taskType,
      params: result.params,
      source: source === 'mention' ? 'mention' : 'intent',
    };
  }

  private async run(
    initialHandler: Handler,
    initialTask: Task,
    candidates: readonly Handler[],
    context: ConversationContext,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<DispatchResponse> {
    let handler = initialHandler;
    let task = initialTask;
    let retryAllowed = true;

    for (;;) {
      const { outcome, faulted } = await this.execute(handler, task, context, signal, log);
      this.ensureActive(signal, 'INTERPRET');

      const step = await interpretOutcome(
        { outcome, handler, task, context, retryAllowed, faulted, signal },
        {
          // A suggestion never leaves the candidates an @alias narrowed routing to.
          lookup: (name) => candidates.find((candidate) => candidate.descriptor.name === name),
          inferrer: this.inferrer,
          inferTimeoutMs: this.settings.classifierTimeoutMs,
          logger: log,
        }
      );
      this.ensureActive(signal, 'RESOLVE_MISSING');

      if (step.next === 'retry') {
        log.warn(
          {
            state: 'RESOLVE_MISSING',
            from: handler.descriptor.name,
            to: step.handler.descriptor.name,
            filled: step.filled,
          },
          'Retrying with supplemented task'
        );
        handler = step.handler;
        task = step.task;
        retryAllowed = false;
        continue;
      }

      if (step.next === 'clarify') {
        log.warn(
          { state: 'CLARIFY', handler: handler.descriptor.name, cause: step.response.cause, missing: Object.keys(step.response.missing) },
          'Asking for clarification'
        );
      }
      return step.response;
    }
  }

  /** EXECUTE: faults and timeouts come back as CannotHandle, aborts rethrow. */
  private async execute(
    handler: Handler,
    task: Task,
    context: ConversationContext,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<{ outcome: Outcome; faulted: boolean }> {
    const name = handler.descriptor.name;
    log.debug({ state: 'EXECUTE', handler: name, task }, 'Executing task');

    try {
      const outcome = await runWithDeadline(
        'handler',
        this.settings.handlerTimeoutMs,
        (stageSignal) => handler.execute(task, { signal: stageSignal, context }),
        signal
      );
      return { outcome, faulted: false };
    } catch (error) {
      if (isCancellation(error)) throw error;
      const fault = new HandlerFaultError(name, error);
      log.error({ err: error, handler: name, code: fault.code, taskId: task.id }, 'Handler fault');
      return { outcome: cannotHandle(fault.message), faulted: true };
    }
  }

  private ensureActive(signal: AbortSignal | undefined, state: DispatchState): void {
    if (signal?.aborted) {
      throw new DispatchCancelledError(state, { cause: signal.reason });
    }
  }
}
