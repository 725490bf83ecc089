import { z } from 'zod';
import { normalizeInput } from '../dispatch/keywordRouter/normalize.js';
import { RegistrationError } from '../dispatch/errors.js';
import { cannotHandle } from './outcome.js';
import type {
  Handler,
  HandlerContext,
  HandlerDefinition,
  KeywordBinding,
  KeywordEntry,
  TaskAction,
} from './types.js';
import type { Task } from './task.js';

export const MIN_PRIORITY = 0;
export const MAX_PRIORITY = 100;

const ParamValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const DescriptorSchema = z.object({
  name: z.string().min(1).regex(/^[a-z0-9_-]+$/, 'name must be lowercase alphanumeric with hyphens or underscores'),
  version: z.string().min(1).optional(),
  description: z.string().optional(),
  priority: z.number().int().min(MIN_PRIORITY).max(MAX_PRIORITY),
  capabilities: z.array(z.string().min(1)).optional(),
  aliases: z.array(z.string().min(1).regex(/^[^\s@　]+$/, 'alias must not contain spaces or @')).optional(),
});

const KeywordBindingSchema = z.object({
  taskType: z.string().min(1),
  params: z.record(ParamValueSchema).optional(),
});

function toBinding(value: string | KeywordBinding): KeywordBinding {
  return typeof value === 'string' ? { taskType: value } : value;
}

function buildKeywordTable(
  name: string,
  keywords: Record<string, string | KeywordBinding>,
  taskTypes: ReadonlySet<string>
): Map<string, KeywordEntry> {
  const table = new Map<string, KeywordEntry>();

  for (const [phrase, raw] of Object.entries(keywords)) {
    const parsed = KeywordBindingSchema.safeParse(toBinding(raw));
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => issue.message).join('; ');
      throw new RegistrationError(`Handler "${name}" keyword "${phrase}": ${message}`);
    }

    const { taskType, params } = parsed.data;
    if (!taskTypes.has(taskType)) {
      throw new RegistrationError(
        `Handler "${name}" keyword "${phrase}" maps to undeclared task type "${taskType}"`
      );
    }

    const normalized = normalizeInput(phrase);
    if (!normalized) {
      throw new RegistrationError(`Handler "${name}" keyword "${phrase}" is empty after normalization`);
    }

    // Two spellings of one phrase inside a handler: the first declared stays.
    if (!table.has(normalized)) {
      table.set(normalized, { taskType, params: Object.freeze({ ...(params ?? {}) }) });
    }
  }

  return table;
}

/**
 * Validate a handler definition and bind its task types to their actions.
 * Throws RegistrationError when the definition is incomplete.
 */
export function defineHandler<T extends string>(definition: HandlerDefinition<T>): Handler {
  const parsed = DescriptorSchema.safeParse(definition);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'definition'}: ${issue.message}`)
      .join('; ');
    throw new RegistrationError(`Invalid handler "${String(definition.name)}": ${message}`);
  }

  const entries: Array<[string, TaskAction]> = Object.entries(definition.actions);
  const actions = new Map(entries);
  const taskTypes = [...actions.keys()];
  if (taskTypes.length === 0) {
    throw new RegistrationError(`Handler "${definition.name}" declares no task types`);
  }
  for (const [type, action] of actions) {
    if (typeof action !== 'function') {
      throw new RegistrationError(`Handler "${definition.name}" task type "${type}" is not bound to a function`);
    }
  }

  const keywords = buildKeywordTable(definition.name, definition.keywords ?? {}, new Set(taskTypes));
  const descriptor = Object.freeze({
    name: parsed.data.name,
    version: parsed.data.version ?? '1.0.0',
    description: parsed.data.description ?? '',
    priority: parsed.data.priority,
    capabilities: Object.freeze([...new Set(parsed.data.capabilities ?? [])]),
    aliases: Object.freeze([...new Set((parsed.data.aliases ?? []).map((alias) => alias.toLowerCase()))]),
    keywords,
  });

  return Object.freeze({
    descriptor,
    taskTypes: Object.freeze(taskTypes),
    extractors: Object.freeze({ ...(definition.extractors ?? {}) }),
    definition,
    async execute(task: Task, ctx: HandlerContext) {
      const action = actions.get(task.type);
      if (!action) {
        return cannotHandle(`${descriptor.name} does not support task type "${task.type}"`);
      }
      return action(task, ctx);
    },
  });
}
