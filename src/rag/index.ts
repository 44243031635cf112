/**
 * Incremental page index: types, build pipeline, search
 */

// Types
export type {
  PageGroup,
  SourceFile,
  ExtractedPage,
  PageExtractor,
  IndexEntry,
  PendingPage,
  SearchHit,
  SearchOptions,
  IndexMetadataFile,
} from "./types.js";
export {
  DEFAULT_TOP_K,
  DEFAULT_MIN_SCORE,
  INDEX_SCHEMA_VERSION,
  IndexEntrySchema,
  IndexMetadataFileSchema,
} from "./types.js";

// Build pipeline
export { fingerprint, groupKey } from "./fingerprint.js";
export {
  resolveReuse,
  type ReuseResolution,
  type ReusedEntry,
  type ResolveOptions,
} from "./resolver.js";
export {
  EmbeddingBatcher,
  DEFAULT_EMBED_TIMEOUT_MS,
  type BatchItem,
  type BatchOptions,
} from "./batcher.js";
export { mergeIndex } from "./merger.js";
export { IndexSnapshot } from "./snapshot.js";
export { IndexStore, type IndexLoadResult, type LoadOptions } from "./store.js";

export {
  PageIndexer,
  type PageIndexerConfig,
  type BuildOptions,
  type BuildProgress,
  type BuildResult,
  type ValidationResult,
} from "./indexer.js";

// Query side
export {
  exactSearch,
  makeSnippet,
  DEFAULT_EXACT_MAX_RESULTS,
  type ExactHit,
  type ExactSearchOptions,
  type ExactSearchResult,
} from "./exactSearch.js";
export { formatSemanticResults, formatExactResults, formatNoResults } from "./format.js";

// Service
export {
  PageSearchService,
  createPageSearchService,
  type SourceProvider,
  type SearchSettings,
  type PageSearchServiceConfig,
  type PageSearchOptions,
  type PageSearchResponse,
  type SemanticSearchResponse,
  type ExactSearchResponse,
  type LastBuildInfo,
  type IndexStats,
} from "./service.js";

// Embeddings
export * from "./embeddings/index.js";
