/**
 * Immutable index snapshot: entries plus a row-aligned embedding matrix.
 *
 * A snapshot is never modified after construction. Builds produce a new one
 * and the indexer swaps its reference, so searches holding the old snapshot
 * finish against consistent data.
 */

import { ErrorCode, IndexIntegrityError } from "../utils/errors.js";
import {
  DEFAULT_MIN_SCORE,
  DEFAULT_TOP_K,
  type IndexEntry,
  type SearchHit,
  type SearchOptions,
} from "./types.js";

export class IndexSnapshot {
  readonly entries: readonly IndexEntry[];
  readonly dimensions: number;
  readonly modelId: string;
  private readonly matrix: Float32Array;

  /**
   * @param matrix - Row-major, `entries.length * dimensions` values. Taken
   *   over by the snapshot; callers must not write to it afterwards.
   */
  constructor(entries: readonly IndexEntry[], matrix: Float32Array, dimensions: number, modelId: string) {
    if (entries.length > 0 && dimensions <= 0) {
      throw new IndexIntegrityError(
        ErrorCode.INDEX_DIMENSION_MISMATCH,
        `Non-empty index needs a positive dimension, got ${dimensions}`
      );
    }
    if (matrix.length !== entries.length * dimensions) {
      throw new IndexIntegrityError(
        ErrorCode.INDEX_MISALIGNED,
        `Matrix holds ${matrix.length} values, expected ${entries.length} rows x ${dimensions}`
      );
    }

    // Entries are handed on to later snapshots and to search hits
    this.entries = Object.freeze(
      entries.map((entry) => (Object.isFrozen(entry) ? entry : Object.freeze({ ...entry })))
    );
    this.matrix = matrix;
    this.dimensions = entries.length === 0 ? 0 : dimensions;
    this.modelId = modelId;
  }

  static empty(modelId: string = ""): IndexSnapshot {
    return new IndexSnapshot([], new Float32Array(0), 0, modelId);
  }

  get size(): number {
    return this.entries.length;
  }

  get rowCount(): number {
    return this.dimensions === 0 ? 0 : this.matrix.length / this.dimensions;
  }

  /**
   * Copy of one embedding row.
   */
  row(index: number): Float32Array {
    if (index < 0 || index >= this.entries.length) {
      throw new RangeError(`Row ${index} out of range (size ${this.entries.length})`);
    }
    return this.matrix.slice(index * this.dimensions, (index + 1) * this.dimensions);
  }

  /**
   * Copy of the full matrix, for persistence.
   */
  toMatrix(): Float32Array {
    return this.matrix.slice();
  }

  /**
   * Rank entries by cosine similarity to a unit-norm query vector.
   *
   * Sorted by descending score, ties by ascending row; truncated to topK and
   * cut off at the first score below minScore.
   */
  search(query: ArrayLike<number>, options: SearchOptions = {}): SearchHit[] {
    const topK = options.topK ?? DEFAULT_TOP_K;
    const minScore = options.minScore ?? DEFAULT_MIN_SCORE;

    if (this.entries.length === 0 || topK <= 0) {
      return [];
    }
    if (query.length !== this.dimensions) {
      throw new IndexIntegrityError(
        ErrorCode.INDEX_DIMENSION_MISMATCH,
        `Query has ${query.length} dimensions, index has ${this.dimensions}`
      );
    }

    const scores = new Float64Array(this.entries.length);
    for (let r = 0; r < this.entries.length; r++) {
      const offset = r * this.dimensions;
      let sum = 0;
      for (let c = 0; c < this.dimensions; c++) {
        sum += this.matrix[offset + c] * query[c];
      }
      scores[r] = sum;
    }

    const order = Array.from(scores.keys());
    order.sort((a, b) => scores[b] - scores[a] || a - b);

    const hits: SearchHit[] = [];
    for (const row of order) {
      if (hits.length >= topK) break;
      const score = scores[row];
      if (score < minScore) break;
      hits.push({ entry: this.entries[row], score, row });
    }
    return hits;
  }
}
