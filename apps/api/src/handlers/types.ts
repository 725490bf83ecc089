import type { ParamValue, TaskParams, Turn } from '@deskpilot/shared';
import type { Outcome } from './outcome.js';
import type { Task } from './task.js';

/** Read-only view of prior turns, oldest first. */
export type ConversationContext = readonly Turn[];

/** What a handler receives alongside the task. No ambient state. */
export interface HandlerContext {
  signal: AbortSignal;
  context: ConversationContext;
}

export type TaskAction = (task: Task, ctx: HandlerContext) => Outcome | Promise<Outcome>;

export interface KeywordBinding<T extends string = string> {
  taskType: T;
  params?: TaskParams;
}

/** Pulls one param value out of a turn's text, or undefined if absent. */
export type ParamExtractor = (text: string) => ParamValue | undefined;

/**
 * What a handler module supplies at startup. `actions` is the closed set
 * of task types; every keyword must point at one of them.
 */
export interface HandlerDefinition<T extends string = string> {
  name: string;
  version?: string;
  description?: string;
  /** Lower value wins keyword collisions. */
  priority: number;
  capabilities?: readonly string[];
  /** `@mention` names, e.g. `music` for `@music play`. */
  aliases?: readonly string[];
  actions: Record<T, TaskAction>;
  /** Task types come from `actions`; a keyword may cover any subset of them. */
  keywords?: Record<string, NoInfer<T> | KeywordBinding<NoInfer<T>>>;
  extractors?: Record<string, ParamExtractor>;
}

export interface KeywordEntry {
  taskType: string;
  params: TaskParams;
}

export interface HandlerDescriptor {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly priority: number;
  readonly capabilities: readonly string[];
  readonly aliases: readonly string[];
  /** Normalized phrase → binding. */
  readonly keywords: ReadonlyMap<string, KeywordEntry>;
}

export interface Handler {
  readonly descriptor: HandlerDescriptor;
  readonly taskTypes: readonly string[];
  readonly extractors: Readonly<Record<string, ParamExtractor>>;
  /** Definition the handler was built from; overrides rebuild from it. */
  readonly definition: HandlerDefinition;
  execute(task: Task, ctx: HandlerContext): Promise<Outcome>;
}
