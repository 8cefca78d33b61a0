// src/core/config/index.ts
// Configuration system exports

export {
  type ReaderConfig,
  DEFAULT_READER_CONFIG,
  readerConfigFromEnv,
  readerConfigFromObject,
  mergeReaderConfigs,
  loadReaderConfig,
} from "./config";
