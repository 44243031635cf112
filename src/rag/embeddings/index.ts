// Factory
export { createEmbeddingProvider, type ProviderOptions } from "./factory.js";

// Provider interface
export type { IEmbeddingProvider } from "./provider.js";

// Types
export type {
  EmbeddingProviderStatus,
  EmbedOptions,
  ProviderType,
} from "./types.js";

// OpenAI-compatible provider
export {
  OpenAIEmbeddingProvider,
  DEFAULT_EMBEDDING_MODEL,
  type EmbeddingsClient,
  type OpenAIProviderOptions,
} from "./openai.js";

// Query cache
export { EmbeddingCache, type CacheStats } from "./cache.js";
