// src/core/reader/errors.ts
// Closed set of reader failures and their diagnostic mapping

import type { Diagnostic } from "../../outcome/diagnostic";
import type { DiagnosticCode } from "../../outcome/codes";
import { makeDiagnostic } from "../../outcome/codes";

export type ParseErrorKind = "UnexpectedEOF" | "MissingClosingParen" | "UnexpectedClosingParen";

const MESSAGES: Record<ParseErrorKind, string> = {
  UnexpectedEOF: "Unexpected EOF",
  MissingClosingParen: "Missing closing parenthesis",
  UnexpectedClosingParen: "Unexpected closing parenthesis",
};

const CODES: Record<ParseErrorKind, DiagnosticCode> = {
  UnexpectedEOF: "E0001",
  MissingClosingParen: "E0002",
  UnexpectedClosingParen: "E0003",
};

export class ParseError extends Error {
  constructor(
    public readonly kind: ParseErrorKind,
    /** Character offset where the failure was detected. */
    public readonly offset: number,
  ) {
    super(MESSAGES[kind]);
    this.name = "ParseError";
  }
}

export function isParseError(e: unknown): e is ParseError {
  return e instanceof ParseError;
}

export function parseErrorToDiagnostic(e: ParseError): Diagnostic {
  const end = e.kind === "UnexpectedClosingParen" ? e.offset + 1 : e.offset;
  return makeDiagnostic(CODES[e.kind], { start: e.offset, end });
}
