// ──────────────────────────────────────────────
// Dispatch  –  Shared Type Definitions
// ──────────────────────────────────────────────

/** One prior turn of the conversation, oldest first in a context. */
export interface Turn {
  role: 'user' | 'assistant' | 'system';
  text: string;
}

/** Scalar values a task parameter may hold. */
export type ParamValue = string | number | boolean | null;

export type TaskParams = Readonly<Record<string, ParamValue>>;

/** Serializable view of a task, as it appears in logs and payloads. */
export interface TaskSnapshot {
  id: string;
  type: string;
  content: string;
  params: TaskParams;
}

/** Why the dispatcher is asking the user for more detail. */
export type ClarifyCause =
  | 'not_understood'         // Classifier found no confident mapping
  | 'classifier_unavailable' // Language-model service could not be reached
  | 'missing_info'           // Handler needs fields the context could not supply
  | 'handler_declined'       // Handler refused without naming fields or an alternative
  | 'handler_fault';         // Handler failed and nothing could be retried

export interface DispatchSuccess {
  kind: 'success';
  handler: string;
  taskType: string;
  message: string;
  payload?: unknown;
}

export interface DispatchClarify {
  kind: 'clarify';
  cause: ClarifyCause;
  reason: string;
  /** Field name → human-readable description of what is needed. */
  missing: Record<string, string>;
  handler?: string;
}

/** The only two shapes a dispatch call resolves to. */
export type DispatchResponse = DispatchSuccess | DispatchClarify;

/** Catalog entry describing a registered handler. */
export interface HandlerSummary {
  name: string;
  version: string;
  description: string;
  priority: number;
  capabilities: string[];
  taskTypes: string[];
  aliases: string[];
}
