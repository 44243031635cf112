/**
 * In-process stand-ins for the embedding backend and the page extractor
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { IEmbeddingProvider } from "../src/rag/embeddings/provider.js";
import type { EmbeddingProviderStatus, EmbedOptions } from "../src/rag/embeddings/types.js";
import type { ExtractedPage, PageExtractor, SourceFile } from "../src/rag/types.js";

export const TEST_MODEL = "test-model";
export const TEST_DIMENSIONS = 8;

/**
 * Deterministic, never-zero vector derived from the character codes of a text.
 */
export function textVector(text: string, dimensions: number = TEST_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (let i = 0; i < text.length; i++) {
    vector[i % dimensions] += text.charCodeAt(i) % 17;
  }
  vector[0] += 1;
  return vector;
}

export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly modelId: string;
  readonly dimensions: number;

  /** Texts of every embedBatch call, in call order */
  readonly calls: string[][] = [];
  /** Thrown from the next calls while set */
  failure: Error | null = null;
  /** Never answer; settle only when the request signal aborts */
  hang = false;
  /** Replaces the default vectors */
  output: ((texts: string[]) => number[][]) | null = null;

  constructor(modelId: string = TEST_MODEL, dimensions: number = TEST_DIMENSIONS) {
    this.modelId = modelId;
    this.dimensions = dimensions;
  }

  async initialize(): Promise<void> {}

  isReady(): boolean {
    return true;
  }

  async embed(text: string, options?: EmbedOptions): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options);
    return vector;
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.failure) {
      throw this.failure;
    }
    if (this.hang) {
      const signal = options.signal;
      return new Promise<number[][]>((_, reject) => {
        signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
      });
    }
    return this.output ? this.output(texts) : texts.map((text) => textVector(text, this.dimensions));
  }

  getStatus(): EmbeddingProviderStatus {
    return { name: this.name, modelId: this.modelId, isReady: true, dimensions: this.dimensions };
  }

  async dispose(): Promise<void> {}

  /** Total number of texts sent to the backend */
  get embeddedCount(): number {
    return this.calls.reduce((sum, batch) => sum + batch.length, 0);
  }
}

/**
 * Extractor over an in-memory path -> pages table. Unknown paths throw.
 */
export class FakeExtractor {
  readonly files = new Map<string, ExtractedPage[]>();
  readonly calls: string[] = [];
  readonly failing = new Set<string>();

  set(filePath: string, pages: ExtractedPage[]): this {
    this.files.set(filePath, pages);
    return this;
  }

  readonly extract: PageExtractor = async (filePath) => {
    this.calls.push(filePath);
    if (this.failing.has(filePath)) {
      throw new Error("unreadable section file");
    }
    const pages = this.files.get(filePath);
    if (!pages) {
      throw new Error(`no such file: ${filePath}`);
    }
    return pages;
  };
}

export function source(notebook: string, section: string, filePath: string, version: number): SourceFile {
  return { notebook, section, path: filePath, version };
}

export function page(title: string, text: string): ExtractedPage {
  return { title, text };
}

export async function makeTempDir(prefix: string = "pageindex-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
