/**
 * Backup directory discovery.
 *
 * Layout scanned under every backup root:
 *
 *   <root>/<notebook>/[sub/dirs/]<Section> (On 1-4-2026).one
 *
 * Each section can have many dated snapshot files; only the most recently
 * modified one is reported, with its mtime as the version token.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { glob } from "glob";
import { getLogger } from "../utils/logger.js";
import type { SourceFile } from "../rag/types.js";

const SECTION_FILE_PATTERN = "**/*.one";
const RECYCLE_BIN_MARKER = "RecycleBin";
const UNNAMED_SECTION = "(unnamed)";

/**
 * Section name from a snapshot file name.
 *
 * "Algorithm (On 1-4-2026).one" -> "Algorithm"
 * "Daily.one (On 02.02.26).one" -> "Daily"
 */
export function sectionNameFromFile(fileName: string): string {
  const name = fileName
    .replace(/\.one$/, "")
    .replace(/\s*\(On [\d.\-]+\)$/, "")
    .replace(/\.one$/, "")
    .trim();
  return name || UNNAMED_SECTION;
}

interface Candidate {
  path: string;
  mtimeMs: number;
}

/**
 * One SourceFile per (notebook, section), sorted by notebook then section.
 * Missing backup roots are skipped. A notebook present under several roots
 * is merged into one.
 */
export async function discoverSources(backupDirs: readonly string[]): Promise<SourceFile[]> {
  const log = getLogger().child("discovery");
  const sections = new Map<string, Map<string, Candidate[]>>();

  for (const root of backupDirs) {
    let notebookDirs: string[];
    try {
      const entries = await fs.readdir(root, { withFileTypes: true });
      notebookDirs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (err) {
      log.debug(`Skipping backup directory ${root}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }

    for (const notebook of notebookDirs) {
      const notebookDir = path.join(root, notebook);
      const bySection = sections.get(notebook) ?? new Map<string, Candidate[]>();
      sections.set(notebook, bySection);

      const files = await glob(SECTION_FILE_PATTERN, {
        cwd: notebookDir,
        nodir: true,
        posix: true,
        absolute: false,
      });

      for (const relative of files) {
        if (relative.includes(RECYCLE_BIN_MARKER)) continue;

        const filePath = path.join(notebookDir, relative);
        let mtimeMs: number;
        try {
          mtimeMs = (await fs.stat(filePath)).mtimeMs;
        } catch (err) {
          log.warn(`Could not stat ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
          continue;
        }

        const section = sectionKey(relative);
        const candidates = bySection.get(section) ?? [];
        candidates.push({ path: filePath, mtimeMs });
        bySection.set(section, candidates);
      }
    }
  }

  const sources: SourceFile[] = [];
  for (const [notebook, bySection] of sections) {
    for (const [section, candidates] of bySection) {
      const latest = pickLatest(candidates);
      sources.push({ notebook, section, path: latest.path, version: latest.mtimeMs });
    }
  }

  sources.sort((a, b) => compare(a.notebook, b.notebook) || compare(a.section, b.section));
  log.debug(`Discovered ${sources.length} sections in ${sections.size} notebooks`);
  return sources;
}

/**
 * "sub/dir/Name (On 1-4-2026).one" -> "sub/dir/Name"
 */
function sectionKey(relativePath: string): string {
  const dir = path.posix.dirname(relativePath);
  const name = sectionNameFromFile(path.posix.basename(relativePath));
  return dir === "." ? name : `${dir}/${name}`;
}

/**
 * Newest mtime; ties go to the lexicographically smaller path.
 */
function pickLatest(candidates: readonly Candidate[]): Candidate {
  return candidates.reduce((best, candidate) => {
    if (candidate.mtimeMs > best.mtimeMs) return candidate;
    if (candidate.mtimeMs === best.mtimeMs && candidate.path < best.path) return candidate;
    return best;
  });
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
