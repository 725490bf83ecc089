import type { DispatchSuccess } from '@deskpilot/shared';
import type { Handler } from '../handlers/types.js';
import { keywordsByTaskType } from './keywordRouter/index.js';

export const HELP_TASK_TYPE = 'help';
/** Reported as the handler of the global listing. */
export const DISPATCHER_NAME = 'dispatcher';

export interface HandlerHelp {
  name: string;
  description: string;
  aliases: string[];
  keywords: Record<string, string[]>;
}

export interface HelpPayload {
  handlers: HandlerHelp[];
}

function describe(handler: Handler): HandlerHelp {
  return {
    name: handler.descriptor.name,
    description: handler.descriptor.description,
    aliases: [...handler.descriptor.aliases],
    keywords: keywordsByTaskType(handler),
  };
}

function formatEntry(entry: HandlerHelp): string[] {
  const aliases = entry.aliases.length > 0 ? ` (${entry.aliases.map((a) => `@${a}`).join(', ')})` : '';
  const heading = entry.description
    ? `${entry.name}${aliases}: ${entry.description}`
    : `${entry.name}${aliases}`;
  const lines = [heading];
  for (const [taskType, phrases] of Object.entries(entry.keywords)) {
    if (phrases.length === 0) continue;
    lines.push(`  ${taskType}: ${phrases.join(', ')}`);
  }
  return lines;
}

/** Fixed listing of every handler's keywords, grouped by task type. */
export function buildHelp(handlers: readonly Handler[]): DispatchSuccess {
  const payload: HelpPayload = { handlers: handlers.map((handler) => describe(handler)) };
  const lines = ['Available handlers:', ...payload.handlers.flatMap((entry) => formatEntry(entry))];
  return {
    kind: 'success',
    handler: DISPATCHER_NAME,
    taskType: HELP_TASK_TYPE,
    message: lines.join('\n'),
    payload,
  };
}

export function buildHandlerHelp(handler: Handler): DispatchSuccess {
  const entry = describe(handler);
  const payload: HelpPayload = { handlers: [entry] };
  return {
    kind: 'success',
    handler: entry.name,
    taskType: HELP_TASK_TYPE,
    message: formatEntry(entry).join('\n'),
    payload,
  };
}
