import crypto from "node:crypto";

/** Never produced by page-title extraction, which strips NUL characters */
const FIELD_SEPARATOR = "\u0000";

/**
 * SHA-256 of a page's title and text. Stable across file renames.
 */
export function fingerprint(title: string, text: string): string {
  return crypto
    .createHash("sha256")
    .update(`${title}${FIELD_SEPARATOR}${text}`, "utf8")
    .digest("hex");
}

/**
 * Composite identity of an entry within the index.
 */
export function groupKey(notebook: string, section: string, contentHash: string): string {
  return [notebook, section, contentHash].join(FIELD_SEPARATOR);
}
