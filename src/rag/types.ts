/**
 * pageindex type definitions
 * Source snapshot, page, index entry and persisted-layout types
 */

import { z } from "zod";

// ============================================================================
// Schema Version Management
// ============================================================================

/** Current persisted index schema version */
export const INDEX_SCHEMA_VERSION = 1;

// ============================================================================
// Sources & Pages
// ============================================================================

/**
 * Logical grouping a page belongs to. Matched case-sensitively.
 */
export interface PageGroup {
  notebook: string;
  section: string;
}

/**
 * The single current file of a group and its version token (mtime in ms).
 */
export interface SourceFile extends PageGroup {
  path: string;
  version: number;
}

export interface ExtractedPage {
  title: string;
  text: string;
}

/**
 * Turns a source file into its ordered pages. May OCR, may throw.
 */
export type PageExtractor = (filePath: string) => Promise<ExtractedPage[]>;

// ============================================================================
// Index Entries
// ============================================================================

/**
 * One indexed page. Embedding lives in the snapshot matrix at the same row.
 */
export interface IndexEntry extends PageGroup {
  pageTitle: string;
  text: string;
  contentHash: string;
  sourcePath: string;
  sourceVersion: number;
}

/**
 * A page that needs a fresh embedding this build.
 */
export interface PendingPage extends IndexEntry {
  /** Unit of embedding: title and text joined by a newline */
  embedText: string;
}

export interface SearchHit {
  entry: IndexEntry;
  score: number;
  /** Row of the entry in the snapshot it was found in */
  row: number;
}

export interface SearchOptions {
  topK?: number;
  minScore?: number;
}

export const DEFAULT_TOP_K = 20;
export const DEFAULT_MIN_SCORE = 0.1;

// ============================================================================
// Persisted layout (metadata.json)
// ============================================================================

export const IndexEntrySchema = z.object({
  notebook: z.string(),
  section: z.string(),
  pageTitle: z.string(),
  text: z.string(),
  contentHash: z.string().regex(/^[0-9a-f]{64}$/),
  sourcePath: z.string(),
  sourceVersion: z.number(),
});

export const IndexMetadataFileSchema = z.object({
  version: z.number().int(),
  modelId: z.string(),
  dimensions: z.number().int().nonnegative(),
  count: z.number().int().nonnegative(),
  /** SHA-256 of embeddings.bin as written by the same save */
  matrixSha256: z.string().regex(/^[0-9a-f]{64}$/),
  savedAt: z.string(),
  entries: z.array(IndexEntrySchema),
});

export type IndexMetadataFile = z.infer<typeof IndexMetadataFileSchema>;

/**
 * Only the version field, checked before the full schema so an old layout
 * is reported as a version mismatch rather than a parse error.
 */
export const IndexMetadataVersionSchema = z.object({
  version: z.number().int(),
});
