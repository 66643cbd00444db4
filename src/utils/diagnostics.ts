/**
 * Diagnostics and result helpers shared by the tagging modules.
 *
 * Public operations never throw: internal failures are raised as
 * TaggingError and folded into the diagnostics list at the boundary.
 */

import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  OperationResult,
} from '../types';

export class TaggingError extends Error {
  readonly code: DiagnosticCode;
  readonly page?: number;

  constructor(code: DiagnosticCode, message: string, page?: number) {
    super(message);
    this.name = 'TaggingError';
    this.code = code;
    this.page = page;
  }
}

export function diagnostic(
  severity: DiagnosticSeverity,
  code: DiagnosticCode,
  message: string,
  context: Pick<Diagnostic, 'page' | 'elementId' | 'nodeId'> = {},
): Diagnostic {
  return { severity, code, message, ...context };
}

export function succeed<T>(value: T, diagnostics: Diagnostic[] = []): OperationResult<T> {
  return { success: true, value, diagnostics };
}

export function fail<T>(diagnostics: Diagnostic[]): OperationResult<T> {
  return { success: false, value: null, diagnostics };
}

/**
 * Convert anything thrown into a diagnostic. TaggingError keeps its code;
 * other errors are reported under the supplied fallback code.
 */
export function diagnosticFromError(
  error: unknown,
  fallbackCode: DiagnosticCode,
  severity: DiagnosticSeverity = 'error',
  page?: number,
): Diagnostic {
  if (error instanceof TaggingError) {
    return diagnostic(severity, error.code, error.message, { page: error.page ?? page });
  }
  const message = error instanceof Error ? error.message : String(error);
  return diagnostic(severity, fallbackCode, message, page === undefined ? {} : { page });
}

export function hasFatal(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === 'fatal');
}
