import { readFileSync } from 'fs';
import { z } from 'zod';
import { RegistrationError, errorMessage } from '../dispatch/errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { defineHandler, MAX_PRIORITY, MIN_PRIORITY } from './define.js';
import type { Handler } from './types.js';

const ParamValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const KeywordOverrideSchema = z.object({
  taskType: z.string().min(1),
  params: z.record(ParamValueSchema).optional(),
});

const HandlerOverrideSchema = z
  .object({
    enabled: z.boolean().optional(),
    priority: z.number().int().min(MIN_PRIORITY).max(MAX_PRIORITY).optional(),
    keywords: z.record(KeywordOverrideSchema).optional(),
  })
  .strict();

export const HandlerOverridesSchema = z.object({
  handlers: z.record(HandlerOverrideSchema).default({}),
});

export type HandlerOverride = z.output<typeof HandlerOverrideSchema>;
export type HandlerOverrides = z.output<typeof HandlerOverridesSchema>;

export function parseHandlerOverrides(raw: unknown, source = 'overrides'): HandlerOverrides {
  const parsed = HandlerOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new RegistrationError(`Invalid handler overrides in ${source}: ${message}`);
  }
  return parsed.data;
}

/** Read and validate the overrides JSON. Any problem is a startup error. */
export function loadHandlerOverrides(path: string): HandlerOverrides {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new RegistrationError(`Cannot read handler overrides from ${path}: ${errorMessage(error)}`);
  }
  return parseHandlerOverrides(raw, path);
}

function applyOne(handler: Handler, override: HandlerOverride): Handler {
  if (override.priority === undefined && !override.keywords) return handler;

  const { definition } = handler;
  return defineHandler({
    ...definition,
    priority: override.priority ?? definition.priority,
    keywords: { ...(definition.keywords ?? {}), ...(override.keywords ?? {}) },
  });
}

/**
 * Rebuild handlers with configured priority and keyword changes.
 * Disabled handlers are dropped. Names that match no handler are logged.
 */
export function applyOverrides(
  handlers: readonly Handler[],
  overrides: HandlerOverrides,
  logger: Logger = rootLogger
): Handler[] {
  const log = logger.child({ module: 'overrides' });
  const known = new Set(handlers.map((handler) => handler.descriptor.name));

  for (const name of Object.keys(overrides.handlers)) {
    if (!known.has(name)) {
      log.warn({ handler: name }, 'Override names an unknown handler');
    }
  }

  const result: Handler[] = [];
  for (const handler of handlers) {
    const name = handler.descriptor.name;
    const override = Object.hasOwn(overrides.handlers, name) ? overrides.handlers[name] : undefined;
    if (!override) {
      result.push(handler);
      continue;
    }
    if (override.enabled === false) {
      log.info({ handler: name }, 'Handler disabled by override');
      continue;
    }
    result.push(applyOne(handler, override));
  }
  return result;
}
