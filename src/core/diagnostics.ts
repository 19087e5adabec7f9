/** Severity classes used by conversion and export diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Song and file context attached to a diagnostic record. */
export interface DiagnosticContext {
  songId?: number | string;
  songTitle?: string;
  path?: string;
}

/** Canonical diagnostic object emitted by every pipeline stage. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  context?: DiagnosticContext;
}

/** Build a diagnostic, omitting the context key when nothing is known. */
export function createDiagnostic(
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  context?: DiagnosticContext
): Diagnostic {
  return context ? { code, severity, message, context } : { code, severity, message };
}
