// src/core/reader/read.ts
// Public entry points: tokenize, then parse

import type { ReaderConfig } from "../config/config";
import { mergeReaderConfigs } from "../config/config";
import type { Result } from "../../outcome/result";
import { unwrap } from "../../outcome/result";
import type { ParseError } from "./errors";
import type { Expression } from "./expression";
import { cursor, parseAll, parseOne } from "./parse";
import { tokenize } from "./tokenize";

/**
 * Read one expression from `src`. Tokens after the first complete
 * expression are ignored; use `readAll` when they matter.
 *
 * The returned tree holds slices of `src` rather than copies.
 */
export function read(src: string, config?: Partial<ReaderConfig>): Result<Expression, ParseError> {
  const toks = tokenize(src, mergeReaderConfigs(config));
  return parseOne(toks, cursor(src.length));
}

/** Every top-level expression in `src`, in order. Empty input gives `[]`. */
export function readAll(src: string, config?: Partial<ReaderConfig>): Result<Expression[], ParseError> {
  const toks = tokenize(src, mergeReaderConfigs(config));
  return parseAll(toks, cursor(src.length));
}

/**
 * Like `read`, but throws the `ParseError`. For trusted input and tests only.
 */
export function readUnchecked(src: string, config?: Partial<ReaderConfig>): Expression {
  return unwrap(read(src, config));
}
