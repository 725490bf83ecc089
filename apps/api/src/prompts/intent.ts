// ──────────────────────────────────────────────
// Prompt: Intent Classifier
// Picks one handler + task type for free text
// ──────────────────────────────────────────────

import type { HandlerSummary } from '@deskpilot/shared';

export const INTENT_SYSTEM_PROMPT = `You route requests for a desktop assistant. Your ONLY job is to pick the handler that should execute the request and output structured JSON.

You MUST output valid JSON matching this exact schema:
{
  "handler": "name of one handler from the catalog, or empty string if none fits",
  "taskType": "one of that handler's task types",
  "params": { "param_name": "value extracted from the request" },
  "confidence": number between 0 and 1
}

RULES:
1. ALWAYS output valid JSON - nothing else
2. Only use handler names and task types that appear in the catalog
3. Use an empty handler when no handler fits; never guess
4. Extract params only when the request or recent conversation states them
5. Params are strings, numbers or booleans`;

function formatCatalog(catalog: HandlerSummary[]): string {
  return catalog
    .map((entry) => {
      const lines = [`- ${entry.name}: ${entry.description || '(no description)'}`];
      if (entry.capabilities.length > 0) lines.push(`  capabilities: ${entry.capabilities.join(', ')}`);
      lines.push(`  task types: ${entry.taskTypes.join(', ')}`);
      return lines.join('\n');
    })
    .join('\n');
}

export const INTENT_USER_TEMPLATE = (
  text: string,
  catalog: HandlerSummary[],
  history: string
): string => `HANDLERS:
${formatCatalog(catalog)}

RECENT CONVERSATION:
${history || '(none)'}

REQUEST:
${text}`;
