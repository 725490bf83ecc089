// Full-width and half-width punctuation dropped before keyword lookup.
const PUNCTUATION = /[。，！？、；：“”‘’（）【】《》.,!?;:"'()/]/g;

const HELP_PHRASES: ReadonlySet<string> = new Set(['?', '？', 'help', '帮助']);

/**
 * Normalize raw input for exact keyword lookup: punctuation stripped,
 * surrounding whitespace trimmed, ASCII lower-cased.
 */
export function normalizeInput(text: string): string {
  return text.replace(PUNCTUATION, '').trim().toLowerCase();
}

/** Help is checked on the trimmed text, since `?` is itself punctuation. */
export function isHelpRequest(text: string): boolean {
  const trimmed = text.trim().toLowerCase();
  return HELP_PHRASES.has(trimmed) || HELP_PHRASES.has(normalizeInput(trimmed));
}

export interface Mention {
  alias: string;
  query: string;
}

/**
 * Split `@alias rest of request` into its parts. The alias ends at the
 * first half-width or full-width space.
 */
export function parseMention(text: string): Mention | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('@')) return null;

  const body = trimmed.slice(1);
  const match = body.match(/[ 　]/);
  const splitAt = match?.index ?? -1;
  if (splitAt === 0) return null;

  const alias = (splitAt > 0 ? body.slice(0, splitAt) : body).trim().toLowerCase();
  const query = splitAt > 0 ? body.slice(splitAt).trim() : '';
  if (!alias) return null;

  return { alias, query };
}
