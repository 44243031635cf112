/**
 * Tests for the index merger
 */

import { describe, it, expect } from "@jest/globals";
import { mergeIndex } from "../../src/rag/merger.js";
import { IndexSnapshot } from "../../src/rag/snapshot.js";
import { IndexIntegrityError } from "../../src/utils/errors.js";
import type { IndexEntry, PendingPage } from "../../src/rag/types.js";
import type { ReusedEntry } from "../../src/rag/resolver.js";

function entry(title: string, hash: string, sourcePath = "/b/s.one", sourceVersion = 1): IndexEntry {
  return {
    notebook: "nb",
    section: "s",
    pageTitle: title,
    text: title,
    contentHash: hash.repeat(64),
    sourcePath,
    sourceVersion,
  };
}

function pending(title: string, hash: string, sourcePath = "/b/s.one", sourceVersion = 2): PendingPage {
  return { ...entry(title, hash, sourcePath, sourceVersion), embedText: `${title}\n${title}` };
}

const prior = new IndexSnapshot(
  [entry("A", "a"), entry("B", "b"), entry("C", "c")],
  new Float32Array([1, 0, 0, 1, 0.6, 0.8]),
  2,
  "test-model"
);

describe("mergeIndex", () => {
  it("should place reused rows first, then fresh rows", () => {
    const reused: ReusedEntry[] = [
      { priorRow: 2, entry: prior.entries[2], via: "fast_path" },
      { priorRow: 0, entry: prior.entries[0], via: "fast_path" },
    ];
    const fresh = [pending("D", "d")];

    const merged = mergeIndex(prior, { reused, pending: fresh }, [new Float32Array([0, -1])], "test-model");

    expect(merged.entries.map((e) => e.pageTitle)).toEqual(["C", "A", "D"]);
    expect(Array.from(merged.row(0))).toEqual([Math.fround(0.6), Math.fround(0.8)]);
    expect(Array.from(merged.row(1))).toEqual([1, 0]);
    expect(Array.from(merged.row(2))).toEqual([0, -1]);
    expect(merged.rowCount).toBe(merged.size);
  });

  it("should not carry the embedding text into the index", () => {
    const merged = mergeIndex(IndexSnapshot.empty(), { reused: [], pending: [pending("D", "d")] }, [new Float32Array([1, 0])], "m");
    expect(Object.keys(merged.entries[0]).sort()).toEqual([
      "contentHash",
      "notebook",
      "pageTitle",
      "section",
      "sourcePath",
      "sourceVersion",
      "text",
    ]);
  });

  it("should leave the prior snapshot untouched", () => {
    const before = prior.toMatrix();
    mergeIndex(prior, { reused: [{ priorRow: 1, entry: prior.entries[1], via: "fast_path" }], pending: [] }, [], "test-model");
    expect(prior.toMatrix()).toEqual(before);
    expect(prior.size).toBe(3);
  });

  it("should return an empty snapshot when nothing survives", () => {
    const merged = mergeIndex(prior, { reused: [], pending: [] }, [], "test-model");
    expect(merged.size).toBe(0);
    expect(merged.dimensions).toBe(0);
    expect(merged.modelId).toBe("test-model");
  });

  it("should keep the most recently observed entry for a duplicate key", () => {
    const fresh = [pending("A1", "x", "/b/old.one", 3), pending("A2", "x", "/b/new.one", 7)];

    const merged = mergeIndex(
      IndexSnapshot.empty(),
      { reused: [], pending: fresh },
      [new Float32Array([1, 0]), new Float32Array([0, 1])],
      "m"
    );

    expect(merged.size).toBe(1);
    expect(merged.entries[0].pageTitle).toBe("A2");
    expect(Array.from(merged.row(0))).toEqual([0, 1]);
  });

  it("should keep the later entry on a version tie and hold the first position", () => {
    const fresh = [pending("X1", "x"), pending("Y", "y"), pending("X2", "x")];

    const merged = mergeIndex(
      IndexSnapshot.empty(),
      { reused: [], pending: fresh },
      [new Float32Array([1, 0]), new Float32Array([0, 1]), new Float32Array([-1, 0])],
      "m"
    );

    expect(merged.entries.map((e) => e.pageTitle)).toEqual(["X2", "Y"]);
    expect(Array.from(merged.row(0))).toEqual([-1, 0]);
  });

  it("should keep an older duplicate when the later one has a lower version", () => {
    const fresh = [pending("New", "x", "/b/a.one", 9), pending("Old", "x", "/b/b.one", 2)];

    const merged = mergeIndex(
      IndexSnapshot.empty(),
      { reused: [], pending: fresh },
      [new Float32Array([1, 0]), new Float32Array([0, 1])],
      "m"
    );

    expect(merged.entries.map((e) => e.pageTitle)).toEqual(["New"]);
  });

  it("should reject a vector count that does not match the pending pages", () => {
    expect(() =>
      mergeIndex(IndexSnapshot.empty(), { reused: [], pending: [pending("D", "d")] }, [], "m")
    ).toThrow(IndexIntegrityError);
  });

  it("should reject fresh vectors of a different dimension than reused ones", () => {
    expect(() =>
      mergeIndex(
        prior,
        { reused: [{ priorRow: 0, entry: prior.entries[0], via: "fast_path" }], pending: [pending("D", "d")] },
        [new Float32Array([1, 0, 0])],
        "test-model"
      )
    ).toThrow(IndexIntegrityError);
  });
});
