/**
 * Handler outcome - discriminated union, so callers branch on `kind`
 * instead of sniffing strings.
 */
export type Outcome = SuccessOutcome | CannotHandleOutcome;

export interface SuccessOutcome {
  kind: 'success';
  message: string;
  payload?: unknown;
}

export interface CannotHandleOutcome {
  kind: 'cannot_handle';
  reason: string;
  /** Name of another handler that may be able to take the task. */
  suggestion?: string;
  /** Param name → human-readable description of the missing value. */
  missingInfo: Record<string, string>;
}

export function success(message: string, payload?: unknown): SuccessOutcome {
  return payload === undefined
    ? { kind: 'success', message }
    : { kind: 'success', message, payload };
}

export function cannotHandle(
  reason: string,
  options: { suggestion?: string; missingInfo?: Record<string, string> } = {}
): CannotHandleOutcome {
  return {
    kind: 'cannot_handle',
    reason,
    ...(options.suggestion ? { suggestion: options.suggestion } : {}),
    missingInfo: { ...(options.missingInfo ?? {}) },
  };
}
