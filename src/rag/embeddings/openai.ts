/**
 * OpenAI-compatible embedding provider
 *
 * Works against api.openai.com or any server exposing the same /embeddings
 * endpoint (Ollama, llama.cpp server, LM Studio) through `baseURL`.
 * The client is created lazily on first use.
 */

import OpenAI from "openai";
import { EmbeddingBackendError, ErrorCode } from "../../utils/errors.js";
import type { IEmbeddingProvider } from "./provider.js";
import type { EmbeddingProviderStatus, EmbedOptions } from "./types.js";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

/**
 * The slice of the OpenAI client this provider calls. Lets tests pass a fake.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string[]; dimensions?: number; encoding_format?: "float" },
      options?: { signal?: AbortSignal }
    ): Promise<{ data: Array<{ index: number; embedding: number[] }> }>;
  };
}

export interface OpenAIProviderOptions {
  model?: string;
  apiKey?: string;
  baseURL?: string;
  /** Requested output dimension (text-embedding-3 models only) */
  dimensions?: number;
  /** Prebuilt client; skips construction in initialize() */
  client?: EmbeddingsClient;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  public readonly name = "openai";
  public readonly modelId: string;

  private readonly options: OpenAIProviderOptions;
  private client: EmbeddingsClient | null;
  private observedDimensions: number;

  constructor(options: OpenAIProviderOptions = {}) {
    this.options = options;
    this.modelId = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.client = options.client ?? null;
    this.observedDimensions = options.dimensions ?? 0;
  }

  get dimensions(): number {
    return this.observedDimensions;
  }

  async initialize(): Promise<void> {
    if (this.client) return;

    const apiKey = this.options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey && !this.options.baseURL) {
      throw new EmbeddingBackendError(ErrorCode.EMBEDDING_NOT_CONFIGURED);
    }

    // Local OpenAI-compatible servers ignore the key but the SDK requires one
    this.client = new OpenAI({
      apiKey: apiKey ?? "unused",
      baseURL: this.options.baseURL,
    });
  }

  isReady(): boolean {
    return this.client !== null;
  }

  async embed(text: string, options?: EmbedOptions): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options);
    return vector;
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    await this.initialize();
    const client = this.client;
    if (!client) {
      throw new EmbeddingBackendError(ErrorCode.EMBEDDING_NOT_CONFIGURED);
    }

    const response = await client.embeddings.create(
      {
        model: this.modelId,
        input: texts,
        dimensions: this.options.dimensions,
        encoding_format: "float",
      },
      { signal: options.signal }
    );

    const vectors = [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);

    if (vectors.length > 0) {
      this.observedDimensions = vectors[0].length;
    }
    return vectors;
  }

  getStatus(): EmbeddingProviderStatus {
    return {
      name: this.name,
      modelId: this.modelId,
      isReady: this.isReady(),
      dimensions: this.dimensions,
    };
  }

  async dispose(): Promise<void> {
    this.client = this.options.client ?? null;
  }
}
