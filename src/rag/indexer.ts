/**
 * Page indexer: incremental builds over backup snapshot files.
 * Handles reuse resolution, batched embedding, merge, persistence and the
 * atomic publish of the new snapshot.
 *
 * Integrates with:
 * - resolveReuse: decides which prior embeddings survive
 * - EmbeddingBatcher: one backend call for everything stale
 * - IndexStore: embeddings.bin + metadata.json
 */

import { BuildInProgressError, type ExtractionError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { l2Norm } from "../utils/vector.js";
import { EmbeddingBatcher, DEFAULT_EMBED_TIMEOUT_MS } from "./batcher.js";
import type { IEmbeddingProvider } from "./embeddings/provider.js";
import { groupKey } from "./fingerprint.js";
import { mergeIndex } from "./merger.js";
import { resolveReuse } from "./resolver.js";
import { IndexSnapshot } from "./snapshot.js";
import type { IndexLoadResult, IndexStore } from "./store.js";
import type { PageExtractor, SearchHit, SearchOptions, SourceFile } from "./types.js";

const UNIT_NORM_TOLERANCE = 1e-3;
const MAX_REPORTED_ROWS = 5;

/**
 * Progress information for build operations
 */
export interface BuildProgress {
  total: number;
  processed: number;
  currentFile: string;
  status: "resolving" | "embedding" | "storing" | "complete" | "error";
}

export interface BuildOptions {
  /** Cancels the embedding call */
  signal?: AbortSignal;
  /** Overrides the indexer's embedding timeout */
  timeoutMs?: number;
  /** Ignore the prior index and embed every page */
  full?: boolean;
  onProgress?: (progress: BuildProgress) => void;
}

/**
 * Result of a completed build
 */
export interface BuildResult {
  /** Entries in the published index */
  total: number;
  reused: number;
  embedded: number;
  dropped: number;
  fastPathFiles: number;
  extractedFiles: number;
  failedFiles: ExtractionError[];
  durationMs: number;
}

/**
 * Result of index validation
 */
export interface ValidationResult {
  valid: boolean;
  totalEntries: number;
  dimensions: number;
  /** Rows whose vector is not unit length */
  nonUnitRows: number[];
  /** (notebook, section, hash) triples present more than once */
  duplicateKeys: number;
  errors: string[];
}

/**
 * Configuration for PageIndexer
 */
export interface PageIndexerConfig {
  store: IndexStore;
  provider: IEmbeddingProvider;
  /** Default bound for the embedding call (ms) */
  timeoutMs?: number;
}

/**
 * PageIndexer keeps one published IndexSnapshot and replaces it after every
 * successful build.
 *
 * @example
 * ```typescript
 * const indexer = new PageIndexer({
 *   store: new IndexStore('~/.cache/pageindex'),
 *   provider: createEmbeddingProvider(),
 * });
 * await indexer.initialize();
 *
 * const result = await indexer.build(await discoverSources(dirs), extractPages);
 * console.log(`Reused: ${result.reused}, Embedded: ${result.embedded}, Dropped: ${result.dropped}`);
 *
 * const hits = indexer.search(queryVector, { topK: 5 });
 * ```
 */
export class PageIndexer {
  private readonly store: IndexStore;
  private readonly batcher: EmbeddingBatcher;
  private readonly log = getLogger().child("indexer");
  private current: IndexSnapshot;
  private building = false;
  private published = false;
  private loading: Promise<IndexLoadResult> | null = null;

  constructor(config: PageIndexerConfig) {
    this.store = config.store;
    this.batcher = new EmbeddingBatcher(config.provider, config.timeoutMs ?? DEFAULT_EMBED_TIMEOUT_MS);
    this.current = IndexSnapshot.empty(config.provider.modelId);
  }

  get modelId(): string {
    return this.batcher.modelId;
  }

  /**
   * Load the persisted index once. Concurrent callers share the same load.
   * Unusable storage starts an empty index.
   */
  initialize(): Promise<IndexLoadResult> {
    if (!this.loading) {
      this.loading = this.store.load({ expectedModelId: this.modelId }).then(
        (result) => {
          // A build published meanwhile is newer than anything on disk
          if (!this.published) {
            this.current = result.snapshot;
          }
          return result;
        },
        (err: unknown) => {
          this.loading = null;
          throw err;
        }
      );
    }
    return this.loading;
  }

  /**
   * The currently published snapshot.
   */
  getSnapshot(): IndexSnapshot {
    return this.current;
  }

  isBuilding(): boolean {
    return this.building;
  }

  /**
   * Rebuild the index for the current sources.
   *
   * Reuses every prior embedding whose page content is unchanged, embeds the
   * rest in a single batch, saves, then publishes. On any failure the
   * previously published snapshot stays in place.
   *
   * @throws BuildInProgressError when another build is running
   * @throws EmbeddingBackendError when the embedding call fails, times out or is cancelled
   */
  async build(
    sources: readonly SourceFile[],
    extract: PageExtractor,
    options: BuildOptions = {}
  ): Promise<BuildResult> {
    if (this.building) {
      throw new BuildInProgressError();
    }
    this.building = true;
    const startedAt = Date.now();
    const onProgress = options.onProgress;

    try {
      await this.initialize();

      const prior = options.full ? IndexSnapshot.empty(this.modelId) : this.current;
      const total = sources.length;
      let processed = 0;

      onProgress?.({ total, processed, currentFile: "", status: "resolving" });
      const resolution = await resolveReuse(prior, sources, extract, {
        onFileExtracted: (file) => {
          processed++;
          onProgress?.({ total, processed, currentFile: file.path, status: "resolving" });
        },
      });

      onProgress?.({ total, processed: total, currentFile: "", status: "embedding" });
      const vectors = await this.batcher.embed(resolution.pending, {
        signal: options.signal,
        timeoutMs: options.timeoutMs,
      });

      const next = mergeIndex(prior, resolution, vectors, this.modelId);

      onProgress?.({ total, processed: total, currentFile: "", status: "storing" });
      await this.store.save(next);
      this.current = next;
      this.published = true;

      const result: BuildResult = {
        total: next.size,
        reused: resolution.reused.length,
        embedded: resolution.pending.length,
        dropped: resolution.dropped,
        fastPathFiles: resolution.fastPathFiles,
        extractedFiles: resolution.extractedFiles,
        failedFiles: resolution.failedFiles,
        durationMs: Date.now() - startedAt,
      };

      this.log.info(
        `Index: ${result.total} pages (${result.reused} reused, ${result.embedded} embedded, ${result.dropped} dropped)`
      );
      onProgress?.({ total, processed: total, currentFile: "", status: "complete" });
      return result;
    } catch (err) {
      onProgress?.({ total: sources.length, processed: 0, currentFile: "", status: "error" });
      throw err;
    } finally {
      this.building = false;
    }
  }

  /**
   * Search the published snapshot with a unit-norm query vector.
   *
   * @throws IndexIntegrityError when the query dimension differs from the index
   */
  search(query: ArrayLike<number>, options?: SearchOptions): SearchHit[] {
    return this.current.search(query, options);
  }

  /**
   * Check the published snapshot for alignment, dimension, norm and
   * duplicate-key problems.
   */
  validateIndex(): ValidationResult {
    const snapshot = this.current;
    const errors: string[] = [];

    if (snapshot.rowCount !== snapshot.size) {
      errors.push(`Alignment mismatch: ${snapshot.size} entries but ${snapshot.rowCount} matrix rows`);
    }
    if (snapshot.size > 0 && snapshot.dimensions <= 0) {
      errors.push(`Non-empty index has dimension ${snapshot.dimensions}`);
    }

    const nonUnitRows: number[] = [];
    for (let row = 0; row < snapshot.size; row++) {
      const norm = l2Norm(snapshot.row(row));
      if (Math.abs(norm - 1) > UNIT_NORM_TOLERANCE) {
        nonUnitRows.push(row);
        if (nonUnitRows.length <= MAX_REPORTED_ROWS) {
          errors.push(`Row ${row} has norm ${norm.toFixed(4)}, expected 1`);
        }
      }
    }
    if (nonUnitRows.length > MAX_REPORTED_ROWS) {
      errors.push(`... and ${nonUnitRows.length - MAX_REPORTED_ROWS} more non-unit rows`);
    }

    const seen = new Set<string>();
    let duplicateKeys = 0;
    for (const entry of snapshot.entries) {
      const key = groupKey(entry.notebook, entry.section, entry.contentHash);
      if (seen.has(key)) {
        duplicateKeys++;
        errors.push(`Duplicate entry for ${entry.notebook} / ${entry.section}: "${entry.pageTitle}"`);
      }
      seen.add(key);
    }

    return {
      valid: errors.length === 0,
      totalEntries: snapshot.size,
      dimensions: snapshot.dimensions,
      nonUnitRows,
      duplicateKeys,
      errors,
    };
  }
}
