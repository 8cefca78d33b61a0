// src/core/reader/parse.ts
// Recursive-descent parser over a token array

import type { Result } from "../../outcome/result";
import { err, isErr, ok } from "../../outcome/result";
import { classifyAtom } from "./atom";
import { ParseError } from "./errors";
import type { Expression } from "./expression";
import { list } from "./expression";
import type { Tok } from "./tokenize";

/**
 * Read position over a token array. `end` is the source length, used as the
 * offset of end-of-input errors.
 */
export type Cursor = { i: number; readonly end: number };

export const cursor = (end: number): Cursor => ({ i: 0, end });

/**
 * Parse exactly one expression starting at `cur.i`, advancing the cursor past
 * it. Nesting depth is bounded only by the call stack.
 */
export function parseOne(toks: readonly Tok[], cur: Cursor): Result<Expression, ParseError> {
  const t = toks[cur.i];
  if (!t) return err(new ParseError("UnexpectedEOF", cur.end));
  cur.i++;

  if (t.tag === "LParen") {
    const items: Expression[] = [];
    while (true) {
      const u = toks[cur.i];
      if (!u) return err(new ParseError("MissingClosingParen", cur.end));
      if (u.tag === "RParen") { cur.i++; break; }
      const child = parseOne(toks, cur);
      if (isErr(child)) return child;
      items.push(child.value);
    }
    return ok(list(items));
  }

  if (t.tag === "RParen") {
    return err(new ParseError("UnexpectedClosingParen", t.slice.start));
  }

  // Atom and Quote alike; a quote reaches the classifier as the symbol `'`.
  return ok(classifyAtom(t.slice));
}

export function parseAll(toks: readonly Tok[], cur: Cursor): Result<Expression[], ParseError> {
  const out: Expression[] = [];
  while (cur.i < toks.length) {
    const r = parseOne(toks, cur);
    if (isErr(r)) return r;
    out.push(r.value);
  }
  return ok(out);
}
