/**
 * Embedding batcher: one backend call for every page that needs a vector.
 *
 * All-or-nothing. Any failure (backend error, timeout, cancellation, malformed
 * output) surfaces as a single EmbeddingBackendError for the batch.
 */

import { EmbeddingBackendError, ErrorCode } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { normalize } from "../utils/vector.js";
import type { IEmbeddingProvider } from "./embeddings/provider.js";

export const DEFAULT_EMBED_TIMEOUT_MS = 120_000;

export interface BatchItem {
  embedText: string;
}

export interface BatchOptions {
  /** Caller cancellation */
  signal?: AbortSignal;
  /** Upper bound for the backend call */
  timeoutMs?: number;
}

export class EmbeddingBatcher {
  private readonly provider: IEmbeddingProvider;
  private readonly defaultTimeoutMs: number;

  constructor(provider: IEmbeddingProvider, defaultTimeoutMs: number = DEFAULT_EMBED_TIMEOUT_MS) {
    this.provider = provider;
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  get modelId(): string {
    return this.provider.modelId;
  }

  /**
   * Unit-norm vectors for the items, in input order.
   */
  async embed(items: readonly BatchItem[], options: BatchOptions = {}): Promise<Float32Array[]> {
    if (items.length === 0) {
      return [];
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const texts = items.map((item) => item.embedText);
    getLogger().child("batcher").info(`Embedding ${texts.length} new/changed pages...`);

    const raw = await this.callWithDeadline(texts, timeoutMs, options.signal);
    return this.validate(raw, items.length);
  }

  private async callWithDeadline(
    texts: string[],
    timeoutMs: number,
    callerSignal?: AbortSignal
  ): Promise<number[][]> {
    const batchSize = texts.length;

    if (callerSignal?.aborted) {
      throw new EmbeddingBackendError(ErrorCode.EMBEDDING_CANCELLED, undefined, { batchSize });
    }

    const controller = new AbortController();
    let rejectDeadline: (error: EmbeddingBackendError) => void = () => {};
    const deadline = new Promise<never>((_, reject) => {
      rejectDeadline = reject;
    });

    const timer = setTimeout(() => {
      const error = new EmbeddingBackendError(
        ErrorCode.EMBEDDING_TIMEOUT,
        `Embedding backend did not answer within ${timeoutMs}ms`,
        { batchSize }
      );
      controller.abort(error);
      rejectDeadline(error);
    }, timeoutMs);

    const onCallerAbort = () => {
      const error = new EmbeddingBackendError(ErrorCode.EMBEDDING_CANCELLED, undefined, { batchSize });
      controller.abort(error);
      rejectDeadline(error);
    };
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const call = this.provider.embedBatch(texts, { signal: controller.signal });
      return await Promise.race([call, deadline]);
    } catch (err) {
      // The provider may reject with its own abort error before the deadline settles
      const reason: unknown = controller.signal.reason;
      if (controller.signal.aborted && reason instanceof EmbeddingBackendError) {
        throw reason;
      }
      throw EmbeddingBackendError.fromError(err, batchSize);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private validate(raw: number[][], expected: number): Float32Array[] {
    if (raw.length !== expected) {
      throw new EmbeddingBackendError(
        ErrorCode.EMBEDDING_INVALID_OUTPUT,
        `Embedding backend returned ${raw.length} vectors for ${expected} texts`,
        { batchSize: expected }
      );
    }

    const dimensions = raw[0].length;
    if (dimensions === 0) {
      throw new EmbeddingBackendError(
        ErrorCode.EMBEDDING_INVALID_OUTPUT,
        "Embedding backend returned empty vectors",
        { batchSize: expected }
      );
    }

    return raw.map((vector, i) => {
      if (vector.length !== dimensions) {
        throw new EmbeddingBackendError(
          ErrorCode.EMBEDDING_INVALID_OUTPUT,
          `Vector ${i} has ${vector.length} dimensions, expected ${dimensions}`,
          { batchSize: expected }
        );
      }
      const unit = normalize(vector);
      if (!unit) {
        throw new EmbeddingBackendError(
          ErrorCode.EMBEDDING_INVALID_OUTPUT,
          `Vector ${i} has no direction (zero or non-finite)`,
          { batchSize: expected }
        );
      }
      return unit;
    });
  }
}
