/**
 * Embedding backend types
 */

/**
 * Per-call options for a backend request
 */
export interface EmbedOptions {
  /** Aborts the underlying request */
  signal?: AbortSignal;
}

/**
 * Embedding provider status
 */
export interface EmbeddingProviderStatus {
  /** Provider name */
  name: string;
  /** Model in use */
  modelId: string;
  /** Whether initialize() has completed */
  isReady: boolean;
  /** Vector dimension, 0 until the first response when not configured */
  dimensions: number;
}

export type ProviderType = "openai";
