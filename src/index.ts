// src/index.ts
// sexpr-reader - Public API
//
// Zero-copy S-expression reader for interpreter and compiler front ends.

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/reader";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// RESULTS AND DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";
