// ──────────────────────────────────────────────
// Prompt collection
// ──────────────────────────────────────────────

export { INTENT_SYSTEM_PROMPT, INTENT_USER_TEMPLATE } from './intent.js';
export { MISSING_INFO_SYSTEM_PROMPT, MISSING_INFO_USER_TEMPLATE } from './missingInfo.js';
