/**
 * Index merger: reused rows first (copied from the prior matrix), then the
 * freshly embedded rows, as one new snapshot. Never touches the prior one.
 */

import { ErrorCode, IndexIntegrityError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { groupKey } from "./fingerprint.js";
import type { ReuseResolution } from "./resolver.js";
import { IndexSnapshot } from "./snapshot.js";
import type { IndexEntry } from "./types.js";

interface Row {
  entry: IndexEntry;
  vector: Float32Array;
}

export function mergeIndex(
  prior: IndexSnapshot,
  resolution: Pick<ReuseResolution, "reused" | "pending">,
  vectors: readonly Float32Array[],
  modelId: string
): IndexSnapshot {
  if (vectors.length !== resolution.pending.length) {
    throw new IndexIntegrityError(
      ErrorCode.INDEX_MISALIGNED,
      `${resolution.pending.length} pending pages but ${vectors.length} vectors`
    );
  }

  const rows: Row[] = [];
  for (const { priorRow, entry } of resolution.reused) {
    rows.push({ entry, vector: prior.row(priorRow) });
  }
  resolution.pending.forEach((page, i) => {
    const { embedText: _embedText, ...entry } = page;
    rows.push({ entry, vector: vectors[i] });
  });

  const kept = dedupeByKey(rows);
  if (kept.length < rows.length) {
    getLogger().child("merger").debug(`Collapsed ${rows.length - kept.length} duplicate entries`);
  }

  if (kept.length === 0) {
    return IndexSnapshot.empty(modelId);
  }

  const dimensions = kept[0].vector.length;
  const matrix = new Float32Array(kept.length * dimensions);
  kept.forEach((row, i) => {
    if (row.vector.length !== dimensions) {
      throw new IndexIntegrityError(
        ErrorCode.INDEX_DIMENSION_MISMATCH,
        `Entry "${row.entry.pageTitle}" has ${row.vector.length} dimensions, index has ${dimensions}`
      );
    }
    matrix.set(row.vector, i * dimensions);
  });

  return new IndexSnapshot(kept.map((row) => row.entry), matrix, dimensions, modelId);
}

/**
 * One row per (notebook, section, hash). The most recently observed source
 * wins: higher sourceVersion, or the later row on a tie. Survivors keep the
 * position of the first row with their key.
 */
function dedupeByKey(rows: Row[]): Row[] {
  const slotByKey = new Map<string, number>();
  const out: Row[] = [];

  for (const row of rows) {
    const key = groupKey(row.entry.notebook, row.entry.section, row.entry.contentHash);
    const slot = slotByKey.get(key);
    if (slot === undefined) {
      slotByKey.set(key, out.length);
      out.push(row);
    } else if (row.entry.sourceVersion >= out[slot].entry.sourceVersion) {
      out[slot] = row;
    }
  }
  return out;
}
