// apps/api/src/dispatch/intentResolver/types.ts
import type { HandlerSummary, TaskParams } from '@deskpilot/shared';
import type { ConversationContext, Handler } from '../../handlers/types.js';

export interface ClassifyRequest {
  text: string;
  context: ConversationContext;
  catalog: HandlerSummary[];
}

/** What a classifier hands back when it picks a handler. */
export interface ClassifierSelection {
  handler: string;
  taskType: string;
  params?: TaskParams;
  /** 0..1; a selection without one is taken as confident. */
  confidence?: number;
}

/** Language-model backed intent classifier. Returns null for "no idea". */
export interface Classifier {
  classify(request: ClassifyRequest, signal: AbortSignal): Promise<ClassifierSelection | null>;
}

export type UnresolvableReason = 'no_match' | 'unknown_handler' | 'classifier_unavailable';

/**
 * Resolution result - discriminated union
 */
export type IntentResult =
  | { kind: 'resolved'; handler: Handler; taskType: string; params: TaskParams; confidence?: number }
  | { kind: 'unresolvable'; reason: UnresolvableReason; detail: string };

export type Resolution = Extract<IntentResult, { kind: 'resolved' }>;
export type Unresolvable = Extract<IntentResult, { kind: 'unresolvable' }>;

export interface IntentResolverOptions {
  classifier?: Classifier;
  contextTurns: number;
  minConfidence: number;
  timeoutMs: number;
}
