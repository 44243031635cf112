/**
 * Reuse resolver: decides which prior entries survive a build unchanged and
 * which pages need a fresh embedding.
 *
 * Two passes over the current sources:
 * - fast path: a file whose (path, version) is already recorded keeps all of
 *   its entries without being extracted again
 * - slow path: changed or new files are extracted and every page is matched by
 *   (notebook, section, fingerprint) against the prior entries, so pages that
 *   merely moved to a renamed snapshot file keep their embedding
 *
 * Prior rows claimed by neither pass are dropped.
 */

import { ExtractionError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { fingerprint, groupKey } from "./fingerprint.js";
import type { IndexSnapshot } from "./snapshot.js";
import type { ExtractedPage, IndexEntry, PageExtractor, PendingPage, SourceFile } from "./types.js";

/**
 * A prior entry carried into the next index.
 */
export interface ReusedEntry {
  /** Row of the entry in the prior snapshot (its embedding source) */
  priorRow: number;
  /** The entry with location metadata pointing at the current file */
  entry: IndexEntry;
  via: "fast_path" | "content_match";
}

export interface ReuseResolution {
  reused: ReusedEntry[];
  pending: PendingPage[];
  /** Files whose entries were kept without extraction */
  fastPathFiles: number;
  /** Files that were extracted (successfully or not) */
  extractedFiles: number;
  /** Prior rows that no current source re-observed */
  dropped: number;
  failedFiles: ExtractionError[];
}

export interface ResolveOptions {
  /** Called after each extracted file, for progress reporting */
  onFileExtracted?: (file: SourceFile, pageCount: number) => void;
}

export async function resolveReuse(
  prior: IndexSnapshot,
  sources: readonly SourceFile[],
  extract: PageExtractor,
  options: ResolveOptions = {}
): Promise<ReuseResolution> {
  const log = getLogger().child("resolver");
  const claimed = new Set<number>();
  const reused: ReusedEntry[] = [];
  const pending: PendingPage[] = [];
  const failedFiles: ExtractionError[] = [];

  const rowsByPath = new Map<string, number[]>();
  const versionsByPath = new Map<string, Set<number>>();
  prior.entries.forEach((entry, row) => {
    const rows = rowsByPath.get(entry.sourcePath) ?? [];
    rows.push(row);
    rowsByPath.set(entry.sourcePath, rows);

    const versions = versionsByPath.get(entry.sourcePath) ?? new Set<number>();
    versions.add(entry.sourceVersion);
    versionsByPath.set(entry.sourcePath, versions);
  });

  const liveSources = dedupeGroups(sources, (file) => {
    log.warn(`Duplicate source for ${file.notebook} / ${file.section}, ignoring ${file.path}`);
  });

  // Pass 1: unchanged files
  const changed: SourceFile[] = [];
  let fastPathFiles = 0;
  for (const file of liveSources) {
    const rows = rowsByPath.get(file.path);
    if (!rows || !versionsByPath.get(file.path)?.has(file.version)) {
      changed.push(file);
      continue;
    }

    fastPathFiles++;
    for (const row of rows) {
      if (claimed.has(row)) continue;
      claimed.add(row);
      reused.push({ priorRow: row, entry: prior.entries[row], via: "fast_path" });
    }
  }

  // Pass 2: changed or new files, matched by content
  const candidatesByKey = buildCandidateIndex(prior.entries);
  let extractedFiles = 0;

  for (const file of changed) {
    extractedFiles++;

    let pages: ExtractedPage[];
    try {
      pages = await extract(file.path);
    } catch (err) {
      const error = new ExtractionError(file.path, { cause: err instanceof Error ? err : undefined });
      log.warn(error.message);
      failedFiles.push(error);
      continue;
    }

    let pageCount = 0;
    for (const page of pages) {
      if (!page.text.trim()) continue;
      pageCount++;

      const contentHash = fingerprint(page.title, page.text);
      const candidates = candidatesByKey.get(groupKey(file.notebook, file.section, contentHash)) ?? [];
      const match = candidates.find((row) => !claimed.has(row));

      if (match !== undefined) {
        claimed.add(match);
        reused.push({
          priorRow: match,
          entry: { ...prior.entries[match], sourcePath: file.path, sourceVersion: file.version },
          via: "content_match",
        });
        continue;
      }

      pending.push({
        notebook: file.notebook,
        section: file.section,
        pageTitle: page.title,
        text: page.text,
        contentHash,
        sourcePath: file.path,
        sourceVersion: file.version,
        embedText: `${page.title}\n${page.text}`,
      });
    }

    options.onFileExtracted?.(file, pageCount);
  }

  const dropped = prior.size - claimed.size;
  log.debug(
    `Resolved ${liveSources.length} sources: ${reused.length} reused, ${pending.length} to embed, ${dropped} dropped`
  );

  return { reused, pending, fastPathFiles, extractedFiles, dropped, failedFiles };
}

/**
 * Prior rows per (notebook, section, hash), most recently observed source first.
 */
function buildCandidateIndex(entries: readonly IndexEntry[]): Map<string, number[]> {
  const byKey = new Map<string, number[]>();
  entries.forEach((entry, row) => {
    const key = groupKey(entry.notebook, entry.section, entry.contentHash);
    const rows = byKey.get(key) ?? [];
    rows.push(row);
    byKey.set(key, rows);
  });

  for (const rows of byKey.values()) {
    rows.sort((a, b) => entries[b].sourceVersion - entries[a].sourceVersion || a - b);
  }
  return byKey;
}

/**
 * Keep the first source of every (notebook, section) group.
 */
function dedupeGroups(
  sources: readonly SourceFile[],
  onDuplicate: (file: SourceFile) => void
): SourceFile[] {
  const seen = new Set<string>();
  const out: SourceFile[] = [];
  for (const file of sources) {
    const key = `${file.notebook}\u0000${file.section}`;
    if (seen.has(key)) {
      onDuplicate(file);
      continue;
    }
    seen.add(key);
    out.push(file);
  }
  return out;
}
