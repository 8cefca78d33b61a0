// src/outcome/index.ts

export {
  type Ok,
  type Err,
  type Result,
  ok,
  err,
  isOk,
  isErr,
  mapResult,
  unwrap,
  unwrapOr,
} from "./result";

export {
  type Span,
  type Diagnostic,
  type DiagnosticSeverity,
} from "./diagnostic";

export { DIAGNOSTIC_CODES, type DiagnosticCode, makeDiagnostic } from "./codes";
