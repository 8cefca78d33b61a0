// src/core/config/config.ts
// Reader configuration: defaults, environment, plain objects

// =========================================================================
// Configuration Types
// =========================================================================

export type ReaderConfig = {
  /** Treat `;` as the start of a comment running to end of line */
  lineComments: boolean;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_READER_CONFIG: ReaderConfig = {
  lineComments: false,
};

// =========================================================================
// Configuration Loading
// =========================================================================

const TRUTHY = new Set(["1", "true", "yes", "on"]);

/**
 * Load configuration from environment variables.
 * `${prefix}_LINE_COMMENTS` accepts 1/true/yes/on, anything else is false.
 */
export function readerConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  prefix = "SEXPR"
): ReaderConfig {
  const raw = env[`${prefix}_LINE_COMMENTS`];
  const lineComments = raw === undefined
    ? DEFAULT_READER_CONFIG.lineComments
    : TRUTHY.has(raw.trim().toLowerCase());

  return { lineComments };
}

/**
 * Create a partial configuration from a plain object (e.g. parsed JSON).
 * Keys may be camelCase or snake_case; values of the wrong type are dropped.
 */
export function readerConfigFromObject(data: Record<string, unknown>): Partial<ReaderConfig> {
  const out: Partial<ReaderConfig> = {};
  const lineComments = data.lineComments ?? data.line_comments;
  if (typeof lineComments === "boolean") out.lineComments = lineComments;
  return out;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeReaderConfigs(...configs: (Partial<ReaderConfig> | undefined)[]): ReaderConfig {
  let result: ReaderConfig = { ...DEFAULT_READER_CONFIG };
  for (const cfg of configs) {
    if (!cfg) continue;
    if (cfg.lineComments !== undefined) {
      result = { ...result, lineComments: cfg.lineComments };
    }
  }
  return result;
}

/**
 * Priority: overrides > environment > defaults
 */
export function loadReaderConfig(options?: {
  env?: Record<string, string | undefined>;
  prefix?: string;
  overrides?: Partial<ReaderConfig>;
}): ReaderConfig {
  const fromEnv = readerConfigFromEnv(options?.env ?? process.env, options?.prefix);
  return mergeReaderConfigs(fromEnv, options?.overrides);
}
