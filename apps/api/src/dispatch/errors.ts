// ──────────────────────────────────────────────
// Dispatch  –  Error taxonomy
// Faults inside a dispatch are recovered and turned into
// outcomes; only startup misuse and caller aborts throw.
// ──────────────────────────────────────────────

export type FaultCode =
  | 'TIMEOUT'
  | 'RATE_LIMIT'
  | 'NETWORK'
  | 'NOT_FOUND'
  | 'AUTH'
  | 'INTERNAL';

/** Invalid handler definition or registry misuse. Thrown at startup. */
export class RegistrationError extends Error {
  override readonly name = 'RegistrationError';
}

/** A stage ran past its configured deadline. */
export class StageTimeoutError extends Error {
  override readonly name = 'StageTimeoutError';

  constructor(readonly stage: string, readonly timeoutMs: number) {
    super(`${stage} timed out after ${timeoutMs}ms`);
  }
}

/** The caller aborted the dispatch. The only failure `dispatch` rejects with. */
export class DispatchCancelledError extends Error {
  override readonly name = 'DispatchCancelledError';

  constructor(readonly stage: string, options?: { cause?: unknown }) {
    super(`dispatch cancelled during ${stage}`, options);
  }
}

/** A handler threw while executing a task. */
export class HandlerFaultError extends Error {
  override readonly name = 'HandlerFaultError';
  readonly code: FaultCode;

  constructor(readonly handler: string, cause: unknown) {
    const code = classifyError(cause);
    super(`${handler}: ${code}: ${errorMessage(cause)}`, { cause });
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Map a cause to the nearest fault code by inspecting its message. */
export function classifyError(err: unknown): FaultCode {
  if (err instanceof StageTimeoutError) return 'TIMEOUT';
  if (!(err instanceof Error)) return 'INTERNAL';

  const msg = err.message.toLowerCase();
  if (err.name === 'TimeoutError' || msg.includes('timeout') || msg.includes('timed out')) return 'TIMEOUT';
  if (msg.includes('rate limit') || msg.includes('429')) return 'RATE_LIMIT';
  if (msg.includes('network') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('fetch')) return 'NETWORK';
  if (msg.includes('permission') || msg.includes('eacces') || msg.includes('403') || msg.includes('401')) return 'AUTH';
  if (msg.includes('not found') || msg.includes('404')) return 'NOT_FOUND';
  return 'INTERNAL';
}
