/**
 * Embedding Provider Factory
 */

import type { IEmbeddingProvider } from "./provider.js";
import type { ProviderType } from "./types.js";
import { OpenAIEmbeddingProvider, DEFAULT_EMBEDDING_MODEL } from "./openai.js";

/**
 * Provider creation options
 */
export interface ProviderOptions {
  /** Provider type (default: 'openai') */
  type?: ProviderType;
  /** Model id (default: DEFAULT_EMBEDDING_MODEL) */
  model?: string;
  /** OpenAI-compatible endpoint */
  baseURL?: string;
  /** API key; falls back to OPENAI_API_KEY */
  apiKey?: string;
  /** Requested vector dimension */
  dimensions?: number;
}

/**
 * Create an embedding provider
 *
 * @example
 * ```typescript
 * // Default OpenAI provider, key from OPENAI_API_KEY
 * const provider = createEmbeddingProvider();
 *
 * // Local Ollama server
 * const local = createEmbeddingProvider({
 *   model: 'nomic-embed-text',
 *   baseURL: 'http://localhost:11434/v1',
 * });
 * ```
 */
export function createEmbeddingProvider(options: ProviderOptions = {}): IEmbeddingProvider {
  const { type = "openai", model = DEFAULT_EMBEDDING_MODEL, baseURL, apiKey, dimensions } = options;

  switch (type) {
    case "openai":
      return new OpenAIEmbeddingProvider({ model, baseURL, apiKey, dimensions });

    default:
      throw new Error(`Unsupported embedding provider type: ${String(type)}`);
  }
}
