/**
 * Read-only browsing of the backup tree: notebooks, sections, pages.
 *
 * Every operation rediscovers the sources, so listings follow the backup
 * directories without an index. Names are matched exactly first, then
 * case-insensitively. Misses are answered with the available names rather
 * than thrown.
 */

import fs from "node:fs/promises";
import { ExtractionError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import type { SourceProvider } from "../rag/service.js";
import type { ExtractedPage, SourceFile } from "../rag/types.js";

export const PREVIEW_MAX_CHARS = 200;

const NO_TEXT = "(no text content)";

export interface NotebookListing {
  name: string;
  /** Sorted by section name */
  sections: SourceFile[];
}

type Lookup<T> = { found: true; value: T } | { found: false; message: string };

export class NotebookBrowser {
  private readonly sources: SourceProvider;
  private readonly log = getLogger().child("browse");

  constructor(sources: SourceProvider) {
    this.sources = sources;
  }

  /**
   * Notebooks with at least one section, sorted by name.
   */
  async catalog(): Promise<NotebookListing[]> {
    const files = await this.sources.discover();
    const byName = new Map<string, SourceFile[]>();
    for (const file of files) {
      const sections = byName.get(file.notebook) ?? [];
      sections.push(file);
      byName.set(file.notebook, sections);
    }

    return Array.from(byName, ([name, sections]) => ({
      name,
      sections: [...sections].sort((a, b) => compare(a.section, b.section)),
    })).sort((a, b) => compare(a.name, b.name));
  }

  async listNotebooks(): Promise<string> {
    const notebooks = await this.catalog();
    if (notebooks.length === 0) {
      return "No notebooks found.";
    }
    return notebooks.map((nb) => `- ${nb.name}  (${nb.sections.length} sections)`).join("\n");
  }

  async listSections(notebookName: string): Promise<string> {
    const notebook = this.findNotebook(await this.catalog(), notebookName);
    if (!notebook.found) {
      return notebook.message;
    }

    const lines: string[] = [];
    for (const file of notebook.value.sections) {
      lines.push(`- ${file.section}${await this.sizeLabel(file)}`);
    }
    return lines.join("\n");
  }

  /**
   * Every section of every notebook, grouped under a heading per notebook.
   */
  async listAllSections(): Promise<string> {
    const notebooks = await this.catalog();
    if (notebooks.length === 0) {
      return "No notebooks found.";
    }

    const blocks: string[] = [];
    for (const notebook of notebooks) {
      const lines = [`## ${notebook.name}`];
      for (const file of notebook.sections) {
        lines.push(`  - ${file.section}${await this.sizeLabel(file)}`);
      }
      blocks.push(lines.join("\n"));
    }
    return blocks.join("\n\n");
  }

  /**
   * Full text of every page in a section.
   *
   * @throws ExtractionError when the section file cannot be read
   */
  async readSection(notebookName: string, sectionName: string): Promise<string> {
    const section = this.findSection(await this.catalog(), notebookName, sectionName);
    if (!section.found) {
      return section.message;
    }

    const pages = await this.extract(section.value);
    if (pages.length === 0) {
      return `No text content found in section '${sectionName}'.`;
    }
    return pages.map((page) => `## ${page.title}\n\n${hasText(page) ? page.text : NO_TEXT}`).join("\n\n");
  }

  /**
   * @throws ExtractionError when the section file cannot be read
   */
  async readPage(notebookName: string, sectionName: string, pageTitle: string): Promise<string> {
    const section = this.findSection(await this.catalog(), notebookName, sectionName);
    if (!section.found) {
      return section.message;
    }

    const pages = await this.extract(section.value);
    const page = findByName(pages, pageTitle, (p) => p.title);
    if (!page) {
      return `Page '${pageTitle}' not found. Available pages: ${available(pages.map((p) => p.title))}`;
    }
    if (!hasText(page)) {
      return `Page '${page.title}' exists but has no text content.`;
    }
    return `# ${page.title}\n\n${page.text}`;
  }

  /**
   * Sections of a notebook with a short preview of each.
   * Unreadable sections are reported inline.
   */
  async getNotebookSummary(notebookName: string): Promise<string> {
    const notebook = this.findNotebook(await this.catalog(), notebookName);
    if (!notebook.found) {
      return notebook.message;
    }

    const lines = [`# ${notebook.value.name}`];
    for (const file of notebook.value.sections) {
      lines.push("", `## ${file.section}`);

      let pages: ExtractedPage[];
      try {
        pages = await this.extract(file);
      } catch (err) {
        if (!(err instanceof ExtractionError)) throw err;
        this.log.warn(err.message);
        lines.push("  (section file could not be read)");
        continue;
      }

      const preview = previewText(pages);
      lines.push(preview ? `  Preview: ${preview}` : `  ${NO_TEXT}`);
    }
    return lines.join("\n");
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  private findNotebook(notebooks: readonly NotebookListing[], name: string): Lookup<NotebookListing> {
    const notebook = findByName(notebooks, name, (nb) => nb.name);
    if (!notebook) {
      return {
        found: false,
        message: `Notebook '${name}' not found. Available: ${available(notebooks.map((nb) => nb.name))}`,
      };
    }
    return { found: true, value: notebook };
  }

  private findSection(
    notebooks: readonly NotebookListing[],
    notebookName: string,
    sectionName: string
  ): Lookup<SourceFile> {
    const notebook = this.findNotebook(notebooks, notebookName);
    if (!notebook.found) {
      return notebook;
    }

    const sections = notebook.value.sections;
    const section = findByName(sections, sectionName, (file) => file.section);
    if (!section) {
      return {
        found: false,
        message: `Section '${sectionName}' not found. Available: ${available(sections.map((file) => file.section))}`,
      };
    }
    return { found: true, value: section };
  }

  private async extract(file: SourceFile): Promise<ExtractedPage[]> {
    try {
      return await this.sources.extract(file.path);
    } catch (err) {
      throw new ExtractionError(file.path, { cause: err instanceof Error ? err : undefined });
    }
  }

  /**
   * "  (12 KB)", or nothing when the file cannot be stat'ed.
   */
  private async sizeLabel(file: SourceFile): Promise<string> {
    try {
      const { size } = await fs.stat(file.path);
      return `  (${Math.round(size / 1024)} KB)`;
    } catch (err) {
      this.log.debug(`Could not stat ${file.path}: ${err instanceof Error ? err.message : String(err)}`);
      return "";
    }
  }
}

/**
 * Exact match first, then case-insensitive.
 */
function findByName<T>(items: readonly T[], name: string, nameOf: (item: T) => string): T | undefined {
  const exact = items.find((item) => nameOf(item) === name);
  if (exact) {
    return exact;
  }
  const lower = name.toLowerCase();
  return items.find((item) => nameOf(item).toLowerCase() === lower);
}

/**
 * Non-empty page texts joined by " | ", cut to PREVIEW_MAX_CHARS.
 */
export function previewText(pages: readonly ExtractedPage[]): string {
  const joined = pages
    .map((page) => page.text.trim())
    .filter((text) => text.length > 0)
    .join(" | ");
  return joined.length > PREVIEW_MAX_CHARS ? `${joined.slice(0, PREVIEW_MAX_CHARS)}...` : joined;
}

function hasText(page: ExtractedPage): boolean {
  return page.text.trim().length > 0;
}

function available(names: readonly string[]): string {
  return names.length > 0 ? names.join(", ") : "(none)";
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
