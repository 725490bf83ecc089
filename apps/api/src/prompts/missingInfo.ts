// ──────────────────────────────────────────────
// Prompt: Missing Info Inference
// Fills handler fields from earlier turns
// ──────────────────────────────────────────────

export const MISSING_INFO_SYSTEM_PROMPT = `You help a desktop assistant finish a request. A handler could not run because some fields are missing.
Look through the recent conversation and find values for those fields.

You MUST output a single JSON object mapping field names to string values, e.g. {"city": "Beijing"}.

RULES:
1. ALWAYS output valid JSON - nothing else
2. Only include fields you can take from the conversation; leave the rest out
3. Never invent values. Output {} when nothing fits`;

export const MISSING_INFO_USER_TEMPLATE = (
  text: string,
  missing: Record<string, string>,
  history: string
): string => `MISSING FIELDS:
${Object.entries(missing).map(([key, description]) => `- ${key}: ${description}`).join('\n')}

RECENT CONVERSATION:
${history || '(none)'}

CURRENT REQUEST:
${text}`;
