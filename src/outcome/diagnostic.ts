// src/outcome/diagnostic.ts
// Structured diagnostics for reporting reader failures to callers

/** Character offsets into the source text, end exclusive. */
export interface Span {
  start: number;
  end: number;
}

// Reader failures are always errors.
export type DiagnosticSeverity = "error";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
}
