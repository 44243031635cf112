export * from "./rag/index.js";
export { discoverSources, sectionNameFromFile } from "./sources/discovery.js";
export { NotebookBrowser, previewText, PREVIEW_MAX_CHARS, type NotebookListing } from "./sources/browse.js";

export {
  loadConfig,
  saveConfig,
  configExists,
  expandPath,
  getConfigDir,
  getConfigPath,
  mergeConfig,
  resolvePaths,
  DEFAULT_CONFIG,
  PageIndexConfigSchema,
  type PageIndexConfig,
  type PartialPageIndexConfig,
  type ResolvedPaths,
} from "./utils/config.js";

export {
  ErrorCode,
  PageIndexError,
  CorruptIndexError,
  EmbeddingBackendError,
  ExtractionError,
  BuildInProgressError,
  IndexIntegrityError,
  FileSystemError,
  ConfigError,
  formatErrorForUser,
  isRecoverableError,
  getRecoveryHint,
  toPageIndexError,
  type CorruptIndexReason,
  type ErrorLevel,
} from "./utils/errors.js";

export {
  Logger,
  createLogger,
  getLogger,
  resetLogger,
  trackError,
  createErrorTracker,
  type LoggerOptions,
  type ScopedLogger,
  type ErrorContext,
} from "./utils/logger.js";
