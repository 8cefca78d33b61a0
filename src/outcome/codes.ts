// src/outcome/codes.ts
// Stable diagnostic codes for reader failures

import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", template: "Unexpected end of input" },
  E0002: { code: "E0002", severity: "error", template: "Missing closing parenthesis" },
  E0003: { code: "E0003", severity: "error", template: "Unexpected closing parenthesis" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(code: DiagnosticCode, span?: Span): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];
  return {
    code: def.code,
    severity: def.severity,
    message: def.template,
    span,
  };
}
