/**
 * Plain-text rendering of search results
 */

import type { ExactHit } from "./exactSearch.js";
import type { SearchHit } from "./types.js";

const SEMANTIC_SNIPPET_CHARS = 200;

export function formatNoResults(query: string): string {
  return `No results found for '${query}'.`;
}

export function formatSemanticResults(query: string, hits: readonly SearchHit[]): string {
  if (hits.length === 0) {
    return formatNoResults(query);
  }

  const blocks = hits.map(({ entry, score }) => {
    const text = entry.text;
    const snippet =
      text.length > SEMANTIC_SNIPPET_CHARS ? `${text.slice(0, SEMANTIC_SNIPPET_CHARS)}...` : text;
    return `[${entry.notebook} / ${entry.section} / "${entry.pageTitle}"]  (score: ${score.toFixed(2)})\n  ${snippet}`;
  });

  return [`Found ${hits.length} match(es) for '${query}' (semantic search):`, ...blocks].join("\n\n");
}

/**
 * @param total - Matches before the result cap; defaults to `hits.length`
 */
export function formatExactResults(query: string, hits: readonly ExactHit[], total: number = hits.length): string {
  if (total === 0) {
    return formatNoResults(query);
  }

  const blocks = hits.map(
    (hit) => `[${hit.notebook} / ${hit.section} / "${hit.pageTitle}"]\n  ${hit.snippet}`
  );
  return `Found ${total} match(es) for '${query}' (exact match):\n\n${blocks.join("\n\n")}`;
}
