/**
 * On-disk index store.
 *
 * Two co-located artifacts in one directory:
 * - embeddings.bin: row-major little-endian float32 matrix
 * - metadata.json: entries in matrix row order plus model id, dimensions and
 *   the SHA-256 of the matrix file it belongs to
 *
 * NOTE: single-process access is assumed. Two processes saving into the same
 * directory can interleave their renames.
 */

import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import {
  CorruptIndexError,
  FileSystemError,
  isErrnoException,
  type CorruptIndexReason,
} from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { IndexSnapshot } from "./snapshot.js";
import {
  INDEX_SCHEMA_VERSION,
  IndexMetadataFileSchema,
  IndexMetadataVersionSchema,
  type IndexMetadataFile,
} from "./types.js";

const EMBEDDINGS_FILE = "embeddings.bin";
const METADATA_FILE = "metadata.json";
const BYTES_PER_FLOAT = 4;

export interface IndexLoadResult {
  snapshot: IndexSnapshot;
  /** Whether a stored index was loaded */
  loaded: boolean;
  entryCount: number;
  /** Reason if not loaded */
  reason?: CorruptIndexReason;
  /** Set whenever nothing was loaded */
  error?: CorruptIndexError;
}

export interface LoadOptions {
  /** Reject stored vectors from any other model */
  expectedModelId?: string;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && isErrnoException(err) && err.code === "ENOENT";
}

export class IndexStore {
  readonly dir: string;
  private readonly log = getLogger().child("store");

  constructor(dir: string) {
    this.dir = dir;
  }

  get embeddingsPath(): string {
    return path.join(this.dir, EMBEDDINGS_FILE);
  }

  get metadataPath(): string {
    return path.join(this.dir, METADATA_FILE);
  }

  /**
   * Write both artifacts. The matrix is renamed into place first and the
   * metadata last. An interrupted save leaves a matrix whose checksum differs
   * from the one in metadata.json, which load rejects.
   */
  async save(snapshot: IndexSnapshot): Promise<void> {
    const matrixBytes = encodeMatrix(snapshot.toMatrix());
    const metadata: IndexMetadataFile = {
      version: INDEX_SCHEMA_VERSION,
      modelId: snapshot.modelId,
      dimensions: snapshot.dimensions,
      count: snapshot.size,
      matrixSha256: sha256(matrixBytes),
      savedAt: new Date().toISOString(),
      entries: snapshot.entries.map((entry) => ({
        notebook: entry.notebook,
        section: entry.section,
        pageTitle: entry.pageTitle,
        text: entry.text,
        contentHash: entry.contentHash,
        sourcePath: entry.sourcePath,
        sourceVersion: entry.sourceVersion,
      })),
    };

    try {
      await fs.mkdir(this.dir, { recursive: true });
    } catch (err) {
      throw this.fsError(err, this.dir, "mkdir");
    }

    await this.writeAtomic(this.embeddingsPath, matrixBytes);
    await this.writeAtomic(this.metadataPath, JSON.stringify(metadata));

    this.log.info(`Saved index to ${this.dir} (${snapshot.size} entries)`);
  }

  /**
   * Read the stored index. Never throws for missing or unusable data: the
   * result carries an empty snapshot and a CorruptIndexError.
   */
  async load(options: LoadOptions = {}): Promise<IndexLoadResult> {
    const emptyModel = options.expectedModelId ?? "";

    let metadataText: string;
    let matrixBytes: Buffer;
    try {
      [metadataText, matrixBytes] = await Promise.all([
        fs.readFile(this.metadataPath, "utf-8"),
        fs.readFile(this.embeddingsPath),
      ]);
    } catch (err) {
      if (isNotFound(err) && !(await this.anyArtifactExists())) {
        this.log.info(`No stored index in ${this.dir}, starting from an empty index`);
        const error = new CorruptIndexError("file_not_found", undefined, { path: this.dir });
        return { snapshot: IndexSnapshot.empty(emptyModel), loaded: false, entryCount: 0, reason: error.reason, error };
      }
      return this.corrupt("parse_error", `Index files unreadable: ${describe(err)}`, emptyModel, err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(metadataText);
    } catch (err) {
      return this.corrupt("parse_error", `metadata.json is not valid JSON: ${describe(err)}`, emptyModel, err);
    }

    const versionCheck = IndexMetadataVersionSchema.safeParse(raw);
    if (versionCheck.success && versionCheck.data.version !== INDEX_SCHEMA_VERSION) {
      return this.corrupt(
        "version_mismatch",
        `Index format version ${versionCheck.data.version}, expected ${INDEX_SCHEMA_VERSION}`,
        emptyModel
      );
    }

    const parsed = IndexMetadataFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown";
      return this.corrupt("parse_error", `metadata.json failed validation (${where})`, emptyModel);
    }
    const metadata = parsed.data;

    if (options.expectedModelId !== undefined && metadata.modelId !== options.expectedModelId) {
      return this.corrupt(
        "model_mismatch",
        `Index built with "${metadata.modelId}", configured model is "${options.expectedModelId}"`,
        emptyModel
      );
    }

    const expectedBytes = metadata.count * metadata.dimensions * BYTES_PER_FLOAT;
    if (
      metadata.entries.length !== metadata.count ||
      matrixBytes.byteLength !== expectedBytes ||
      (metadata.count > 0 && metadata.dimensions === 0)
    ) {
      return this.corrupt(
        "size_mismatch",
        `Expected ${metadata.count} entries and ${expectedBytes} matrix bytes, found ${metadata.entries.length} entries and ${matrixBytes.byteLength} bytes`,
        emptyModel
      );
    }

    if (sha256(matrixBytes) !== metadata.matrixSha256) {
      return this.corrupt(
        "size_mismatch",
        "embeddings.bin does not match the checksum recorded in metadata.json",
        emptyModel
      );
    }

    const snapshot = new IndexSnapshot(
      metadata.entries,
      decodeMatrix(matrixBytes),
      metadata.dimensions,
      metadata.modelId
    );
    this.log.info(`Loaded index from ${this.dir} (${snapshot.size} entries)`);
    return { snapshot, loaded: true, entryCount: snapshot.size };
  }

  /**
   * Remove both artifacts. Missing files are fine.
   */
  async clear(): Promise<void> {
    await Promise.all([
      fs.rm(this.embeddingsPath, { force: true }),
      fs.rm(this.metadataPath, { force: true }),
    ]);
  }

  private async writeAtomic(target: string, data: string | Uint8Array): Promise<void> {
    const tempPath = `${target}.tmp`;
    try {
      await fs.writeFile(tempPath, data);
    } catch (err) {
      throw this.fsError(err, tempPath, "write");
    }
    try {
      await fs.rename(tempPath, target);
    } catch (err) {
      throw this.fsError(err, target, "rename");
    }
  }

  private async anyArtifactExists(): Promise<boolean> {
    const checks = await Promise.all(
      [this.metadataPath, this.embeddingsPath].map((p) =>
        fs.access(p).then(
          () => true,
          () => false
        )
      )
    );
    return checks.some(Boolean);
  }

  private corrupt(
    reason: CorruptIndexReason,
    message: string,
    modelId: string,
    cause?: unknown
  ): IndexLoadResult {
    const error = new CorruptIndexError(reason, message, {
      path: this.dir,
      cause: cause instanceof Error ? cause : undefined,
    });
    this.log.warn(`Failed to load index: ${message} (starting from an empty index)`);
    return { snapshot: IndexSnapshot.empty(modelId), loaded: false, entryCount: 0, reason, error };
  }

  private fsError(err: unknown, target: string, operation: FileSystemError["operation"]): Error {
    if (err instanceof Error && isErrnoException(err)) {
      return FileSystemError.fromNodeError(err, target, operation);
    }
    return err instanceof Error ? err : new Error(String(err));
  }
}

function sha256(bytes: Uint8Array): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function encodeMatrix(matrix: Float32Array): Uint8Array {
  const bytes = new Uint8Array(matrix.length * BYTES_PER_FLOAT);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < matrix.length; i++) {
    view.setFloat32(i * BYTES_PER_FLOAT, matrix[i], true);
  }
  return bytes;
}

function decodeMatrix(bytes: Uint8Array): Float32Array {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const matrix = new Float32Array(bytes.byteLength / BYTES_PER_FLOAT);
  for (let i = 0; i < matrix.length; i++) {
    matrix[i] = view.getFloat32(i * BYTES_PER_FLOAT, true);
  }
  return matrix;
}
