/**
 * Literal, case-insensitive substring search straight over the source files.
 * Bypasses the index entirely; used on request and as the fallback when no
 * embedding backend is usable.
 */

import { ExtractionError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import type { ExtractedPage, PageExtractor, SourceFile } from "./types.js";

export const SNIPPET_CONTEXT_CHARS = 80;
export const DEFAULT_EXACT_MAX_RESULTS = 30;

export interface ExactHit {
  notebook: string;
  section: string;
  pageTitle: string;
  snippet: string;
}

export interface ExactSearchResult {
  /** First `maxResults` hits in notebook/section/page order */
  hits: ExactHit[];
  /** Matching pages before the cap */
  total: number;
  failedFiles: ExtractionError[];
}

export interface ExactSearchOptions {
  maxResults?: number;
}

/**
 * Text around the first occurrence of `query`, with `...` where the text
 * was cut.
 */
export function makeSnippet(text: string, index: number, queryLength: number): string {
  const start = Math.max(0, index - SNIPPET_CONTEXT_CHARS);
  const end = Math.min(text.length, index + queryLength + SNIPPET_CONTEXT_CHARS);
  let snippet = text.slice(start, end).trim();
  if (start > 0) snippet = `...${snippet}`;
  if (end < text.length) snippet = `${snippet}...`;
  return snippet;
}

export async function exactSearch(
  query: string,
  sources: readonly SourceFile[],
  extract: PageExtractor,
  options: ExactSearchOptions = {}
): Promise<ExactSearchResult> {
  const maxResults = options.maxResults ?? DEFAULT_EXACT_MAX_RESULTS;
  const hits: ExactHit[] = [];
  const failedFiles: ExtractionError[] = [];
  let total = 0;

  if (!query) {
    return { hits, total, failedFiles };
  }

  // Matched on the original text so the offset indexes the string we cut
  const pattern = new RegExp(escapeRegExp(query), "i");

  const ordered = [...sources].sort(
    (a, b) => compare(a.notebook, b.notebook) || compare(a.section, b.section)
  );

  for (const file of ordered) {
    let pages: ExtractedPage[];
    try {
      pages = await extract(file.path);
    } catch (err) {
      const error = new ExtractionError(file.path, { cause: err instanceof Error ? err : undefined });
      getLogger().child("exact").warn(error.message);
      failedFiles.push(error);
      continue;
    }

    for (const page of pages) {
      const match = pattern.exec(page.text);
      if (!match) continue;

      total++;
      if (hits.length < maxResults) {
        hits.push({
          notebook: file.notebook,
          section: file.section,
          pageTitle: page.title,
          snippet: makeSnippet(page.text, match.index, match[0].length),
        });
      }
    }
  }

  return { hits, total, failedFiles };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
