/**
 * Conversation context shaping.
 *
 * The dispatch core never stores turns. The surrounding application hands
 * over what it has, and everything here just trims and formats it.
 */
import type { Turn } from '@deskpilot/shared';
import type { ConversationContext } from '../handlers/types.js';

/** Supplied by whatever owns conversation history (memory, session store). */
export interface ContextProvider {
  getRecentTurns(limit: number): readonly Turn[] | Promise<readonly Turn[]>;
}

const DEFAULT_DIGEST_ITEM_MAX_CHARS = 240;

function normalizeContent(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function truncate(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  return `${value.slice(0, maxChars - 3)}...`;
}

/** Keep the most recent `limit` turns, oldest first. The result is frozen. */
export function recentWindow(turns: readonly Turn[], limit: number): ConversationContext {
  if (limit <= 0) return Object.freeze([]);
  const start = Math.max(0, turns.length - limit);
  return Object.freeze(turns.slice(start).map((turn) => Object.freeze({ role: turn.role, text: turn.text })));
}

export async function contextFromProvider(
  provider: ContextProvider,
  limit: number
): Promise<ConversationContext> {
  const turns = await provider.getRecentTurns(limit);
  return recentWindow(turns, limit);
}

/**
 * One line per user/assistant turn for LLM prompts.
 * System turns and blank turns are skipped.
 */
export function formatContextDigest(
  context: ConversationContext,
  itemMaxChars = DEFAULT_DIGEST_ITEM_MAX_CHARS
): string {
  const lines: string[] = [];
  for (const turn of context) {
    if (turn.role === 'system') continue;
    const normalized = normalizeContent(turn.text);
    if (!normalized) continue;
    const prefix = turn.role === 'user' ? 'USER' : 'ASSISTANT';
    lines.push(`${prefix}: ${truncate(normalized, itemMaxChars)}`);
  }
  return lines.join('\n');
}
