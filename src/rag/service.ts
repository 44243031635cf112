/**
 * Page search service
 *
 * Front door for queries: refreshes the index before semantic searches,
 * embeds text queries through an LRU cache, and falls back to exact text
 * search when no embedding backend is usable. Browsing goes through
 * `browser`.
 */

import { resolvePaths, type PageIndexConfig } from "../utils/config.js";
import { EmbeddingBackendError, ErrorCode, toPageIndexError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { normalize } from "../utils/vector.js";
import { NotebookBrowser } from "../sources/browse.js";
import { discoverSources } from "../sources/discovery.js";
import { EmbeddingCache } from "./embeddings/cache.js";
import { createEmbeddingProvider } from "./embeddings/factory.js";
import type { IEmbeddingProvider } from "./embeddings/provider.js";
import { DEFAULT_EXACT_MAX_RESULTS, exactSearch, type ExactHit } from "./exactSearch.js";
import { formatExactResults, formatSemanticResults } from "./format.js";
import { PageIndexer, type BuildResult } from "./indexer.js";
import { IndexStore } from "./store.js";
import {
  DEFAULT_MIN_SCORE,
  DEFAULT_TOP_K,
  type PageExtractor,
  type SearchHit,
  type SourceFile,
} from "./types.js";

const QUERY_CACHE_SIZE = 100;

/**
 * Where sources come from and how their pages are read.
 */
export interface SourceProvider {
  discover(): Promise<SourceFile[]>;
  extract: PageExtractor;
}

export interface SearchSettings {
  topK: number;
  minScore: number;
  exactMaxResults: number;
  /** Run an incremental build before each semantic search */
  refreshOnSearch: boolean;
}

export interface PageSearchServiceConfig {
  indexer: PageIndexer;
  provider: IEmbeddingProvider;
  sources: SourceProvider;
  search?: Partial<SearchSettings>;
}

export interface PageSearchOptions {
  topK?: number;
  minScore?: number;
  /** Literal substring search over the sources instead of the index */
  exactMatch?: boolean;
}

export interface SemanticSearchResponse {
  mode: "semantic";
  query: string;
  hits: SearchHit[];
  degraded: false;
  /** Rendered result listing */
  text: string;
}

export interface ExactSearchResponse {
  mode: "exact";
  query: string;
  hits: ExactHit[];
  /** Matches before the result cap */
  total: number;
  /** True when exact search replaced a semantic search that could not run */
  degraded: boolean;
  text: string;
}

export type PageSearchResponse = SemanticSearchResponse | ExactSearchResponse;

/**
 * Summary of the last build attempt
 */
export interface LastBuildInfo {
  finishedAt: string;
  ok: boolean;
  result?: BuildResult;
  error?: string;
}

export interface IndexStats {
  entries: number;
  notebooks: number;
  sections: number;
  dimensions: number;
  modelId: string;
  lastBuild: LastBuildInfo | null;
}

export class PageSearchService {
  /** Notebook, section and page listings over the same sources */
  readonly browser: NotebookBrowser;
  private readonly indexer: PageIndexer;
  private readonly provider: IEmbeddingProvider;
  private readonly sources: SourceProvider;
  private readonly settings: SearchSettings;
  private readonly queryCache = new EmbeddingCache(QUERY_CACHE_SIZE);
  private readonly log = getLogger().child("service");

  private lastBuild: LastBuildInfo | null = null;
  private lastBuildError: unknown = null;

  constructor(config: PageSearchServiceConfig) {
    this.indexer = config.indexer;
    this.provider = config.provider;
    this.sources = config.sources;
    this.browser = new NotebookBrowser(config.sources);
    this.settings = {
      topK: config.search?.topK ?? DEFAULT_TOP_K,
      minScore: config.search?.minScore ?? DEFAULT_MIN_SCORE,
      exactMaxResults: config.search?.exactMaxResults ?? DEFAULT_EXACT_MAX_RESULTS,
      refreshOnSearch: config.search?.refreshOnSearch ?? true,
    };
  }

  /**
   * Search pages by meaning, or literally with `exactMatch`.
   */
  async search(query: string, options: PageSearchOptions = {}): Promise<PageSearchResponse> {
    if (options.exactMatch) {
      return this.searchExact(query, false);
    }

    await this.indexer.initialize();
    if (this.settings.refreshOnSearch) {
      await this.refresh();
    }

    if (this.indexer.getSnapshot().size === 0 && this.lastBuildError instanceof EmbeddingBackendError) {
      this.log.warn(`Index is empty after a failed build (${this.lastBuildError.message}), using exact search`);
      return this.searchExact(query, true);
    }

    let vector: Float32Array;
    try {
      vector = await this.embedQuery(query);
    } catch (err) {
      if (err instanceof EmbeddingBackendError && this.indexer.getSnapshot().size === 0) {
        this.log.warn(`Query embedding failed (${err.message}), using exact search`);
        return this.searchExact(query, true);
      }
      throw err;
    }

    const hits = this.indexer.search(vector, {
      topK: options.topK ?? this.settings.topK,
      minScore: options.minScore ?? this.settings.minScore,
    });
    return {
      mode: "semantic",
      query,
      hits,
      degraded: false,
      text: formatSemanticResults(query, hits),
    };
  }

  /**
   * Build the index now.
   *
   * @param options.full - Discard the prior index and embed every page
   */
  async rebuild(options: { full?: boolean; signal?: AbortSignal } = {}): Promise<BuildResult> {
    const sources = await this.sources.discover();
    try {
      const result = await this.indexer.build(sources, this.sources.extract, options);
      this.recordBuild(result);
      return result;
    } catch (err) {
      this.recordFailure(err);
      throw err;
    }
  }

  getStats(): IndexStats {
    const snapshot = this.indexer.getSnapshot();
    const notebooks = new Set<string>();
    const sections = new Set<string>();
    for (const entry of snapshot.entries) {
      notebooks.add(entry.notebook);
      sections.add(`${entry.notebook}\u0000${entry.section}`);
    }

    return {
      entries: snapshot.size,
      notebooks: notebooks.size,
      sections: sections.size,
      dimensions: snapshot.dimensions,
      modelId: snapshot.modelId || this.indexer.modelId,
      lastBuild: this.lastBuild,
    };
  }

  /**
   * Incremental build before a semantic search. A failure is logged and the
   * last good index keeps serving.
   */
  private async refresh(): Promise<void> {
    if (this.indexer.isBuilding()) {
      this.log.debug("Build already running, searching the published index");
      return;
    }

    try {
      await this.rebuild();
    } catch (err) {
      this.log.warn(`Index refresh failed, serving the previous index: ${toPageIndexError(err).message}`);
    }
  }

  private async embedQuery(query: string): Promise<Float32Array> {
    const modelId = this.provider.modelId;
    const cached = this.queryCache.get(modelId, query);
    if (cached) {
      return cached;
    }

    let raw: number[];
    try {
      raw = await this.provider.embed(query);
    } catch (err) {
      throw EmbeddingBackendError.fromError(err, 1);
    }

    const vector = normalize(raw);
    if (!vector) {
      throw new EmbeddingBackendError(
        ErrorCode.EMBEDDING_INVALID_OUTPUT,
        "Query embedding has no direction (zero or non-finite)",
        { batchSize: 1 }
      );
    }
    this.queryCache.set(modelId, query, vector);
    return vector;
  }

  private async searchExact(query: string, degraded: boolean): Promise<ExactSearchResponse> {
    const sources = await this.sources.discover();
    const result = await exactSearch(query, sources, this.sources.extract, {
      maxResults: this.settings.exactMaxResults,
    });
    return {
      mode: "exact",
      query,
      hits: result.hits,
      total: result.total,
      degraded,
      text: formatExactResults(query, result.hits, result.total),
    };
  }

  private recordBuild(result: BuildResult): void {
    this.lastBuild = { finishedAt: new Date().toISOString(), ok: true, result };
    this.lastBuildError = null;
  }

  private recordFailure(err: unknown): void {
    this.lastBuild = {
      finishedAt: new Date().toISOString(),
      ok: false,
      error: toPageIndexError(err).message,
    };
    this.lastBuildError = err;
  }
}

/**
 * Wire a service from configuration: filesystem discovery over the backup
 * directories, an OpenAI-compatible provider and an on-disk store under the
 * cache directory.
 */
export function createPageSearchService(config: PageIndexConfig, extract: PageExtractor): PageSearchService {
  const paths = resolvePaths(config);
  const provider = createEmbeddingProvider({
    model: config.embedding.model,
    baseURL: config.embedding.baseURL,
    dimensions: config.embedding.dimensions,
  });
  const indexer = new PageIndexer({
    store: new IndexStore(paths.cacheDir),
    provider,
    timeoutMs: config.embedding.timeoutMs,
  });

  return new PageSearchService({
    indexer,
    provider,
    sources: {
      discover: () => discoverSources(paths.backupDirs),
      extract,
    },
    search: config.search,
  });
}
