/**
 * Embedding provider interface
 *
 * Abstraction over embedding backends (OpenAI, OpenAI-compatible local
 * servers, test fakes). Every backend implements this interface.
 */

import type { EmbeddingProviderStatus, EmbedOptions } from "./types.js";

export interface IEmbeddingProvider {
  /**
   * Provider name
   * @example 'openai'
   */
  readonly name: string;

  /**
   * Model the vectors come from. Stored alongside the index; a different
   * model id on load forces a full rebuild.
   * @example 'text-embedding-3-small'
   */
  readonly modelId: string;

  /**
   * Vector dimension, or 0 when it is only known after the first response
   */
  readonly dimensions: number;

  /**
   * Prepare the backend (client construction, model load).
   * Safe to call more than once.
   */
  initialize(): Promise<void>;

  isReady(): boolean;

  /**
   * Embed a single text
   */
  embed(text: string, options?: EmbedOptions): Promise<number[]>;

  /**
   * Embed many texts in one request.
   *
   * @returns One vector per input text, in input order
   */
  embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;

  getStatus(): EmbeddingProviderStatus;

  /**
   * Release clients and cached state
   */
  dispose(): Promise<void>;
}
