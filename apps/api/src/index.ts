// ──────────────────────────────────────────────
// Deskpilot dispatch core  –  public entry point
// ──────────────────────────────────────────────

import { config as defaultConfig, validateConfig, type Config } from './config.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { Dispatcher, settingsFromConfig } from './dispatch/dispatcher.js';
import { RegistrationError } from './dispatch/errors.js';
import type { Classifier } from './dispatch/intentResolver/index.js';
import type { ContextInferrer } from './dispatch/missingInfo.js';
import { applyOverrides, loadHandlerOverrides, type HandlerOverrides } from './handlers/overrides.js';
import { HandlerRegistry } from './handlers/registry.js';
import type { Handler } from './handlers/types.js';
import { LlmClassifier } from './llm/classifier.js';
import { LlmContextInferrer } from './llm/contextInferrer.js';
import { llmRouter } from './llm/router.js';

export interface CreateDispatcherOptions {
  handlers: readonly Handler[];
  config?: Config;
  /** Omit to use the LLM classifier when its provider is configured; null disables. */
  classifier?: Classifier | null;
  /** Omit to use the LLM inferrer when its provider is configured; null disables. */
  inferrer?: ContextInferrer | null;
  /** Takes precedence over HANDLER_OVERRIDES_PATH. */
  overrides?: HandlerOverrides;
  logger?: Logger;
}

/**
 * Build a sealed dispatcher: validate config, apply overrides, register
 * handlers, and wire the LLM collaborators.
 * Throws RegistrationError on invalid config or handler definitions.
 */
export function createDispatcher(options: CreateDispatcherOptions): Dispatcher {
  const config = options.config ?? defaultConfig;
  const log = (options.logger ?? rootLogger).child({ module: 'bootstrap' });

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    log.warn({ key: warning.key }, warning.reason);
  }
  if (!validation.ok) {
    const details = validation.errors.map((issue) => `${issue.key}: ${issue.reason}`).join('; ');
    throw new RegistrationError(`Invalid configuration: ${details}`);
  }

  const overrides = options.overrides
    ?? (config.handlerOverridesPath ? loadHandlerOverrides(config.handlerOverridesPath) : undefined);
  const handlers = overrides ? applyOverrides(options.handlers, overrides, options.logger) : options.handlers;

  const registry = new HandlerRegistry({
    collisionPolicy: config.keywordCollisionPolicy,
    logger: options.logger,
  });
  for (const handler of handlers) {
    registry.register(handler);
  }

  const llmReady = llmRouter.isProviderConfigured(config.llmProvider);
  const llmOptions = { provider: config.llmProvider, model: config.llmModel, logger: options.logger };
  const classifier = options.classifier === undefined
    ? (llmReady ? new LlmClassifier(llmOptions) : undefined)
    : options.classifier ?? undefined;
  const inferrer = options.inferrer === undefined
    ? (llmReady ? new LlmContextInferrer(llmOptions) : undefined)
    : options.inferrer ?? undefined;

  log.info(
    { handlers: registry.size, classifier: classifier !== undefined, inferrer: inferrer !== undefined },
    'Dispatcher ready'
  );

  return new Dispatcher({
    registry,
    classifier,
    inferrer,
    settings: settingsFromConfig(config),
    logger: options.logger,
  });
}

export { config, loadConfig, validateConfig } from './config.js';
export type { Config, CollisionPolicy, LLMProviderName } from './config.js';
export { logger } from './logger.js';
export type { Logger } from './logger.js';

export { Dispatcher, settingsFromConfig } from './dispatch/dispatcher.js';
export type { DispatchOptions, DispatchSettings, DispatchState, DispatcherOptions } from './dispatch/dispatcher.js';
export {
  DispatchCancelledError,
  HandlerFaultError,
  RegistrationError,
  StageTimeoutError,
  classifyError,
} from './dispatch/errors.js';
export type { FaultCode } from './dispatch/errors.js';
export { contextFromProvider, recentWindow } from './dispatch/context.js';
export type { ContextProvider } from './dispatch/context.js';
export { IntentResolver } from './dispatch/intentResolver/index.js';
export type {
  Classifier,
  ClassifierSelection,
  ClassifyRequest,
  IntentResult,
  Unresolvable,
  UnresolvableReason,
} from './dispatch/intentResolver/index.js';
export { routeKeyword, normalizeInput } from './dispatch/keywordRouter/index.js';
export type { KeywordMatch } from './dispatch/keywordRouter/index.js';
export { resolveMissingInfo } from './dispatch/missingInfo.js';
export type { ContextInferrer, InferRequest, MissingInfoResult } from './dispatch/missingInfo.js';
export { interpretOutcome } from './dispatch/outcomeInterpreter.js';
export type { Step } from './dispatch/outcomeInterpreter.js';

export { defineHandler } from './handlers/define.js';
export { HandlerRegistry } from './handlers/registry.js';
export { applyOverrides, loadHandlerOverrides, parseHandlerOverrides } from './handlers/overrides.js';
export type { HandlerOverrides } from './handlers/overrides.js';
export { cannotHandle, success } from './handlers/outcome.js';
export type { Outcome, CannotHandleOutcome, SuccessOutcome } from './handlers/outcome.js';
export { createTask, withParams } from './handlers/task.js';
export type { Task } from './handlers/task.js';
export type {
  ConversationContext,
  Handler,
  HandlerContext,
  HandlerDefinition,
  HandlerDescriptor,
  ParamExtractor,
} from './handlers/types.js';

export { LlmClassifier } from './llm/classifier.js';
export { LlmContextInferrer } from './llm/contextInferrer.js';
