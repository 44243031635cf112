/**
 * Tests for the reuse resolver
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { resolveReuse } from "../../src/rag/resolver.js";
import { fingerprint } from "../../src/rag/fingerprint.js";
import { IndexSnapshot } from "../../src/rag/snapshot.js";
import { ExtractionError } from "../../src/utils/errors.js";
import type { IndexEntry } from "../../src/rag/types.js";
import { FakeExtractor, page, source } from "../helpers.js";

function priorEntry(
  section: string,
  title: string,
  text: string,
  sourcePath: string,
  sourceVersion: number
): IndexEntry {
  return {
    notebook: "nb",
    section,
    pageTitle: title,
    text,
    contentHash: fingerprint(title, text),
    sourcePath,
    sourceVersion,
  };
}

function snapshotOf(entries: IndexEntry[]): IndexSnapshot {
  const matrix = new Float32Array(entries.length * 2);
  entries.forEach((_, i) => {
    matrix[i * 2] = 1;
  });
  return new IndexSnapshot(entries, matrix, 2, "test-model");
}

describe("resolveReuse", () => {
  let extractor: FakeExtractor;

  beforeEach(() => {
    extractor = new FakeExtractor();
  });

  it("should queue every page when there is no prior index", async () => {
    extractor.set("/b/s1.one", [page("A", "alpha"), page("B", "beta")]);

    const result = await resolveReuse(IndexSnapshot.empty(), [source("nb", "s", "/b/s1.one", 1)], extractor.extract);

    expect(result.reused).toEqual([]);
    expect(result.pending.map((p) => p.embedText)).toEqual(["A\nalpha", "B\nbeta"]);
    expect(result.pending[0]).toMatchObject({
      notebook: "nb",
      section: "s",
      pageTitle: "A",
      text: "alpha",
      contentHash: fingerprint("A", "alpha"),
      sourcePath: "/b/s1.one",
      sourceVersion: 1,
    });
    expect(result.extractedFiles).toBe(1);
    expect(result.dropped).toBe(0);
  });

  it("should keep all entries of an unchanged file without extracting it", async () => {
    const prior = snapshotOf([
      priorEntry("s", "A", "alpha", "/b/s1.one", 1),
      priorEntry("s", "B", "beta", "/b/s1.one", 1),
    ]);

    const result = await resolveReuse(prior, [source("nb", "s", "/b/s1.one", 1)], extractor.extract);

    expect(extractor.calls).toEqual([]);
    expect(result.fastPathFiles).toBe(1);
    expect(result.reused.map((r) => [r.priorRow, r.via])).toEqual([
      [0, "fast_path"],
      [1, "fast_path"],
    ]);
    expect(result.reused[0].entry).toBe(prior.entries[0]);
    expect(result.pending).toEqual([]);
  });

  it("should reuse pages of a renamed file and point them at the new file", async () => {
    const prior = snapshotOf([priorEntry("s", "A", "alpha", "/b/s (On 1-1-2026).one", 1)]);
    extractor.set("/b/s (On 2-1-2026).one", [page("A", "alpha")]);

    const result = await resolveReuse(
      prior,
      [source("nb", "s", "/b/s (On 2-1-2026).one", 2)],
      extractor.extract
    );

    expect(result.pending).toEqual([]);
    expect(result.reused).toHaveLength(1);
    expect(result.reused[0].via).toBe("content_match");
    expect(result.reused[0].priorRow).toBe(0);
    expect(result.reused[0].entry.sourcePath).toBe("/b/s (On 2-1-2026).one");
    expect(result.reused[0].entry.sourceVersion).toBe(2);
    expect(prior.entries[0].sourcePath).toBe("/b/s (On 1-1-2026).one");
    expect(prior.entries[0].sourceVersion).toBe(1);
  });

  it("should extract a file again when only its version changed", async () => {
    const prior = snapshotOf([priorEntry("s", "A", "alpha", "/b/s1.one", 1)]);
    extractor.set("/b/s1.one", [page("A", "alpha edited")]);

    const result = await resolveReuse(prior, [source("nb", "s", "/b/s1.one", 2)], extractor.extract);

    expect(extractor.calls).toEqual(["/b/s1.one"]);
    expect(result.reused).toEqual([]);
    expect(result.pending.map((p) => p.embedText)).toEqual(["A\nalpha edited"]);
    expect(result.dropped).toBe(1);
  });

  it("should skip pages whose text is blank", async () => {
    extractor.set("/b/s1.one", [page("Empty", "   \n"), page("A", "alpha")]);

    const result = await resolveReuse(IndexSnapshot.empty(), [source("nb", "s", "/b/s1.one", 1)], extractor.extract);

    expect(result.pending.map((p) => p.pageTitle)).toEqual(["A"]);
  });

  it("should reuse a prior row at most once", async () => {
    const prior = snapshotOf([priorEntry("s", "A", "alpha", "/b/old.one", 1)]);
    extractor.set("/b/new.one", [page("A", "alpha"), page("A", "alpha")]);

    const result = await resolveReuse(prior, [source("nb", "s", "/b/new.one", 2)], extractor.extract);

    expect(result.reused).toHaveLength(1);
    expect(result.pending).toHaveLength(1);
    expect(result.pending[0].contentHash).toBe(fingerprint("A", "alpha"));
  });

  it("should prefer the most recently observed prior row", async () => {
    const prior = snapshotOf([
      priorEntry("s", "A", "alpha", "/b/older.one", 1),
      priorEntry("s", "A", "alpha", "/b/newer.one", 5),
    ]);
    extractor.set("/b/current.one", [page("A", "alpha")]);

    const result = await resolveReuse(prior, [source("nb", "s", "/b/current.one", 9)], extractor.extract);

    expect(result.reused.map((r) => r.priorRow)).toEqual([1]);
    expect(result.dropped).toBe(1);
  });

  it("should not reuse identical content from another section", async () => {
    const prior = snapshotOf([priorEntry("other", "A", "alpha", "/b/other.one", 1)]);
    extractor.set("/b/s.one", [page("A", "alpha")]);

    const result = await resolveReuse(
      prior,
      [source("nb", "s", "/b/s.one", 1), source("nb", "other", "/b/other.one", 1)],
      extractor.extract
    );

    expect(result.pending.map((p) => p.section)).toEqual(["s"]);
    expect(result.reused.map((r) => r.entry.section)).toEqual(["other"]);
  });

  it("should drop entries of groups that are gone", async () => {
    const prior = snapshotOf([
      priorEntry("s1", "A", "alpha", "/b/s1.one", 1),
      priorEntry("s2", "B", "beta", "/b/s2.one", 1),
    ]);

    const result = await resolveReuse(prior, [source("nb", "s1", "/b/s1.one", 1)], extractor.extract);

    expect(result.reused.map((r) => r.entry.section)).toEqual(["s1"]);
    expect(result.dropped).toBe(1);
  });

  it("should record extraction failures and continue with other files", async () => {
    const prior = snapshotOf([priorEntry("bad", "A", "alpha", "/b/bad-old.one", 1)]);
    extractor.set("/b/good.one", [page("B", "beta")]);
    extractor.set("/b/bad.one", [page("A", "alpha")]);
    extractor.failing.add("/b/bad.one");

    const result = await resolveReuse(
      prior,
      [source("nb", "bad", "/b/bad.one", 2), source("nb", "good", "/b/good.one", 1)],
      extractor.extract
    );

    expect(result.failedFiles).toHaveLength(1);
    expect(result.failedFiles[0]).toBeInstanceOf(ExtractionError);
    expect(result.failedFiles[0].message).toBe(
      "Failed to extract pages from /b/bad.one: unreadable section file"
    );
    expect(result.pending.map((p) => p.pageTitle)).toEqual(["B"]);
    expect(result.extractedFiles).toBe(2);
    expect(result.dropped).toBe(1);
  });

  it("should use only the first source listed for a group", async () => {
    extractor.set("/b/first.one", [page("A", "alpha")]);
    extractor.set("/b/second.one", [page("B", "beta")]);

    const result = await resolveReuse(
      IndexSnapshot.empty(),
      [source("nb", "s", "/b/first.one", 1), source("nb", "s", "/b/second.one", 2)],
      extractor.extract
    );

    expect(extractor.calls).toEqual(["/b/first.one"]);
    expect(result.pending.map((p) => p.pageTitle)).toEqual(["A"]);
  });

  it("should report each extracted file with its page count", async () => {
    extractor.set("/b/s1.one", [page("A", "alpha"), page("Blank", ""), page("B", "beta")]);
    const seen: Array<[string, number]> = [];

    await resolveReuse(IndexSnapshot.empty(), [source("nb", "s", "/b/s1.one", 1)], extractor.extract, {
      onFileExtracted: (file, count) => seen.push([file.path, count]),
    });

    expect(seen).toEqual([["/b/s1.one", 2]]);
  });
});
