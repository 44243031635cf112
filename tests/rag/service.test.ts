/**
 * Tests for PageSearchService
 */

import fs from "node:fs/promises";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { PageSearchService, type SearchSettings } from "../../src/rag/service.js";
import { PageIndexer } from "../../src/rag/indexer.js";
import { IndexStore } from "../../src/rag/store.js";
import { EmbeddingBackendError } from "../../src/utils/errors.js";
import type { SourceFile } from "../../src/rag/types.js";
import { FakeEmbeddingProvider, FakeExtractor, makeTempDir, page, source, textVector } from "../helpers.js";

describe("PageSearchService", () => {
  let tempDir: string;
  let provider: FakeEmbeddingProvider;
  let extractor: FakeExtractor;
  let sources: SourceFile[];
  let indexer: PageIndexer;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    provider = new FakeEmbeddingProvider();
    extractor = new FakeExtractor();
    extractor.set("/b/baking.one", [page("Rye", "Dark rye loaf"), page("Focaccia", "Olive oil and salt")]);
    extractor.set("/b/travel.one", [page("Lisbon", "Trams and tiles")]);
    sources = [
      source("Kitchen", "Baking", "/b/baking.one", 1),
      source("Notes", "Travel", "/b/travel.one", 1),
    ];
    indexer = new PageIndexer({ store: new IndexStore(path.join(tempDir, "index")), provider });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createService(search: Partial<SearchSettings> = {}): PageSearchService {
    return new PageSearchService({
      indexer,
      provider,
      sources: {
        discover: async () => sources,
        extract: extractor.extract,
      },
      search,
    });
  }

  describe("exact search", () => {
    it("should bypass the index", async () => {
      const service = createService();

      const response = await service.search("RYE", { exactMatch: true });

      expect(response.mode).toBe("exact");
      expect(response.degraded).toBe(false);
      expect(response.text).toBe(
        "Found 1 match(es) for 'RYE' (exact match):\n\n[Kitchen / Baking / \"Rye\"]\n  Dark rye loaf"
      );
      expect(provider.calls).toEqual([]);
    });

    it("should use the configured result cap", async () => {
      extractor.set("/b/baking.one", [page("A", "salt"), page("B", "salt"), page("C", "salt")]);
      const service = createService({ exactMaxResults: 2 });

      const response = await service.search("salt", { exactMatch: true });

      expect(response.mode === "exact" && response.total).toBe(3);
      expect(response.hits).toHaveLength(2);
    });
  });

  describe("semantic search", () => {
    it("should build the index before searching", async () => {
      const service = createService();

      const response = await service.search("Rye\nDark rye loaf");

      expect(response.mode).toBe("semantic");
      expect(provider.calls[0]).toEqual(["Rye\nDark rye loaf", "Focaccia\nOlive oil and salt", "Lisbon\nTrams and tiles"]);
      expect(provider.calls[1]).toEqual(["Rye\nDark rye loaf"]);
      expect(response.mode === "semantic" && response.hits[0].entry.pageTitle).toBe("Rye");
      expect(response.text.startsWith("Found ")).toBe(true);
    });

    it("should reuse cached query embeddings and the unchanged index", async () => {
      const service = createService();

      await service.search("bread");
      await service.search("bread");

      expect(provider.calls).toHaveLength(2);
    });

    it("should apply topK and minScore", async () => {
      const service = createService();

      const response = await service.search("Rye\nDark rye loaf", { topK: 1, minScore: 0 });

      expect(response.hits).toHaveLength(1);
    });

    it("should not refresh when disabled", async () => {
      const service = createService({ refreshOnSearch: false });

      const response = await service.search("bread");

      expect(provider.calls).toEqual([["bread"]]);
      expect(response.hits).toEqual([]);
      expect(response.text).toBe("No results found for 'bread'.");
    });

    it("should fall back to exact search when the backend is down and the index is empty", async () => {
      provider.failure = new Error("connection refused");
      const service = createService();

      const response = await service.search("tiles");

      expect(response.mode).toBe("exact");
      expect(response.degraded).toBe(true);
      expect(response.hits.map((h) => h.pageTitle)).toEqual(["Lisbon"]);
    });

    it("should fall back when only the query embedding fails on an empty index", async () => {
      provider.failure = new Error("connection refused");
      const service = createService({ refreshOnSearch: false });

      const response = await service.search("tiles");

      expect(response.mode).toBe("exact");
      expect(response.degraded).toBe(true);
    });

    it("should surface query embedding failures when an index exists", async () => {
      const service = createService({ refreshOnSearch: false });
      await service.rebuild();
      provider.failure = new Error("connection refused");

      await expect(service.search("bread")).rejects.toBeInstanceOf(EmbeddingBackendError);
    });

    it("should keep serving the last good index when a refresh fails", async () => {
      const service = createService();
      await service.rebuild();

      extractor.set("/b/new.one", [page("Porto", "Bridges"), page("Braga", "Churches")]);
      sources = [...sources, source("Notes", "Portugal", "/b/new.one", 1)];
      provider.output = (texts) => (texts.length > 1 ? [] : texts.map((text) => textVector(text)));

      const response = await service.search("Lisbon\nTrams and tiles");

      expect(response.mode).toBe("semantic");
      expect(response.mode === "semantic" && response.hits[0].entry.pageTitle).toBe("Lisbon");
      expect(service.getStats().entries).toBe(3);
      expect(service.getStats().lastBuild?.ok).toBe(false);
    });

    it("should skip the refresh while a build is running", async () => {
      const service = createService();
      provider.hang = true;
      const controller = new AbortController();
      const running = service.rebuild({ signal: controller.signal });
      while (provider.calls.length === 0) {
        await new Promise((resolve) => setImmediate(resolve));
      }
      provider.hang = false;

      const response = await service.search("bread");

      expect(response.mode).toBe("semantic");
      expect(provider.calls).toHaveLength(2);
      expect(provider.calls[1]).toEqual(["bread"]);

      controller.abort();
      await expect(running).rejects.toBeInstanceOf(EmbeddingBackendError);
    });
  });

  describe("rebuild and stats", () => {
    it("should report index statistics", async () => {
      const service = createService();
      await service.rebuild();

      const stats = service.getStats();

      expect(stats).toMatchObject({
        entries: 3,
        notebooks: 2,
        sections: 2,
        dimensions: 8,
        modelId: "test-model",
      });
      expect(stats.lastBuild?.ok).toBe(true);
      expect(stats.lastBuild?.result?.embedded).toBe(3);
    });

    it("should re-embed everything on a full rebuild", async () => {
      const service = createService();
      await service.rebuild();

      const result = await service.rebuild({ full: true });

      expect(result.embedded).toBe(3);
      expect(result.reused).toBe(0);
      expect(provider.embeddedCount).toBe(6);
    });

    it("should report empty statistics before any build", () => {
      expect(createService().getStats()).toEqual({
        entries: 0,
        notebooks: 0,
        sections: 0,
        dimensions: 0,
        modelId: "test-model",
        lastBuild: null,
      });
    });
  });

  describe("browsing", () => {
    it("should browse the same sources without touching the index", async () => {
      const service = createService();

      await expect(service.browser.listNotebooks()).resolves.toBe("- Kitchen  (1 sections)\n- Notes  (1 sections)");
      await expect(service.browser.readPage("kitchen", "baking", "focaccia")).resolves.toBe(
        "# Focaccia\n\nOlive oil and salt"
      );
      expect(provider.calls).toEqual([]);
      expect(indexer.getSnapshot().size).toBe(0);
    });
  });
});
