import type { Diagnostic } from './diagnostics.js';

/** Successful stage output with any non-fatal diagnostics collected on the way. */
export interface StageSuccess<T> {
  ok: true;
  value: T;
  diagnostics: Diagnostic[];
}

/** Failed stage output; `reason` says why there is no value. */
export interface StageFailure<R> {
  ok: false;
  reason: R;
  diagnostics: Diagnostic[];
}

/** Tagged result returned by every fallible pipeline stage. */
export type StageResult<T, R = string> = StageSuccess<T> | StageFailure<R>;

export function succeed<T>(value: T, diagnostics: Diagnostic[] = []): StageSuccess<T> {
  return { ok: true, value, diagnostics };
}

export function fail<R>(reason: R, diagnostics: Diagnostic[] = []): StageFailure<R> {
  return { ok: false, reason, diagnostics };
}

/** Render an unknown thrown value as message text. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
