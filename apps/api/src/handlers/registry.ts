import type { HandlerSummary } from '@deskpilot/shared';
import type { CollisionPolicy } from '../config.js';
import { RegistrationError } from '../dispatch/errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { Handler } from './types.js';

export interface HandlerRegistryOptions {
  collisionPolicy?: CollisionPolicy;
  logger?: Logger;
}

/**
 * Process-wide set of handlers. Built once at startup, then sealed;
 * dispatch only ever reads it, so concurrent requests need no locking.
 */
export class HandlerRegistry {
  private handlers: Handler[] = [];
  private byName = new Map<string, Handler>();
  private aliases = new Map<string, Handler>();
  /** Phrase → priority → owning handler name. */
  private phraseOwners = new Map<string, Map<number, string>>();
  private orderedCache: readonly Handler[] | null = null;
  private sealed = false;
  private readonly collisionPolicy: CollisionPolicy;
  private readonly log: Logger;

  constructor(options: HandlerRegistryOptions = {}) {
    this.collisionPolicy = options.collisionPolicy ?? 'first-wins';
    this.log = (options.logger ?? rootLogger).child({ module: 'registry' });
  }

  register(handler: Handler): void {
    const { name, priority, aliases, keywords } = handler.descriptor;

    if (this.sealed) {
      throw new RegistrationError(`Cannot register "${name}": registry is sealed`);
    }
    if (this.byName.has(name)) {
      throw new RegistrationError(`Handler "${name}" is already registered`);
    }
    for (const alias of aliases) {
      const owner = this.aliases.get(alias);
      if (owner) {
        throw new RegistrationError(`Alias "@${alias}" of "${name}" is already used by "${owner.descriptor.name}"`);
      }
    }

    const claimed: string[] = [];
    for (const phrase of keywords.keys()) {
      const tiers = this.phraseOwners.get(phrase);
      const rival = tiers?.get(priority);
      if (rival) {
        if (this.collisionPolicy === 'reject') {
          throw new RegistrationError(
            `Keyword "${phrase}" is claimed by "${rival}" and "${name}" at priority ${priority}`
          );
        }
        this.log.warn(
          { phrase, winner: rival, loser: name, priority },
          'Keyword collision at equal priority; earlier registration wins'
        );
        continue;
      }

      if (tiers && tiers.size > 0) {
        const best = Math.min(...tiers.keys());
        this.log.debug(
          { phrase, winner: best < priority ? tiers.get(best) : name, priorities: [best, priority] },
          'Keyword shared across priorities; lower priority value wins'
        );
      }
      claimed.push(phrase);
    }

    this.handlers.push(handler);
    this.byName.set(name, handler);
    for (const alias of aliases) this.aliases.set(alias, handler);
    for (const phrase of claimed) {
      const tiers = this.phraseOwners.get(phrase) ?? new Map<number, string>();
      tiers.set(priority, name);
      this.phraseOwners.set(phrase, tiers);
    }
    this.orderedCache = null;

    this.log.info(
      { handler: name, priority, keywords: keywords.size, aliases: aliases.length },
      'Handler registered'
    );
  }

  /** Freeze the registry. Further registration throws. */
  seal(): void {
    if (this.sealed) return;
    this.orderedCache = Object.freeze(this.sortHandlers());
    this.sealed = true;
    this.log.info({ handlers: this.handlers.length }, 'Handler registry sealed');
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /** Handlers by ascending priority; equal priorities keep registration order. */
  ordered(): readonly Handler[] {
    if (!this.orderedCache) {
      this.orderedCache = Object.freeze(this.sortHandlers());
    }
    return this.orderedCache;
  }

  get(name: string): Handler | undefined {
    return this.byName.get(name);
  }

  byAlias(alias: string): Handler | undefined {
    return this.aliases.get(alias.toLowerCase());
  }

  get size(): number {
    return this.handlers.length;
  }

  catalog(): HandlerSummary[] {
    return this.ordered().map((handler) => summarize(handler));
  }

  private sortHandlers(): Handler[] {
    // Array.prototype.sort is stable, so registration order survives ties.
    return [...this.handlers].sort((a, b) => a.descriptor.priority - b.descriptor.priority);
  }
}

export function summarize(handler: Handler): HandlerSummary {
  const { descriptor } = handler;
  return {
    name: descriptor.name,
    version: descriptor.version,
    description: descriptor.description,
    priority: descriptor.priority,
    capabilities: [...descriptor.capabilities],
    taskTypes: [...handler.taskTypes],
    aliases: [...descriptor.aliases],
  };
}
