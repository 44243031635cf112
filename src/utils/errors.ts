/**
 * pageindex error classes
 *
 * Provides hierarchical error classes with:
 * - Error codes (enum)
 * - User-friendly messages
 * - Original cause tracking
 * - Recovery hints
 * - Recoverability indicators
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Base errors (1000-1099)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Index storage errors (2000-2099)
  INDEX_CORRUPT = 2000,
  INDEX_VERSION_MISMATCH = 2001,
  INDEX_SIZE_MISMATCH = 2002,
  INDEX_MODEL_MISMATCH = 2003,
  INDEX_NOT_FOUND = 2004,

  // Index integrity errors (2100-2199)
  INDEX_DIMENSION_MISMATCH = 2100,
  INDEX_MISALIGNED = 2101,

  // Embedding backend errors (3000-3099)
  EMBEDDING_FAILED = 3000,
  EMBEDDING_TIMEOUT = 3001,
  EMBEDDING_CANCELLED = 3002,
  EMBEDDING_INVALID_OUTPUT = 3003,
  EMBEDDING_NOT_CONFIGURED = 3004,

  // Extraction errors (3100-3199)
  EXTRACTION_FAILED = 3100,

  // Build errors (3200-3299)
  BUILD_IN_PROGRESS = 3200,

  // File system errors (4000-4099)
  FS_FILE_NOT_FOUND = 4000,
  FS_PERMISSION_DENIED = 4001,
  FS_NO_SPACE = 4002,
  FS_PATH_TOO_LONG = 4003,
  FS_DIRECTORY_NOT_FOUND = 4004,
  FS_FILE_EXISTS = 4005,
  FS_READ_ERROR = 4006,
  FS_WRITE_ERROR = 4007,

  // Config errors (5000-5099)
  CONFIG_PARSE_ERROR = 5000,
  CONFIG_INVALID_VALUE = 5001,
}

// ============================================================================
// User-friendly error messages
// ============================================================================

interface ErrorMessages {
  minimal: string;
  medium: string;
  detailed: string;
}

const ERROR_MESSAGES: Record<ErrorCode, ErrorMessages> = {
  [ErrorCode.UNKNOWN]: {
    minimal: "Something went wrong.",
    medium: "An unexpected error occurred.",
    detailed: "An unexpected error occurred. See the log for details.",
  },
  [ErrorCode.INTERNAL]: {
    minimal: "Internal error.",
    medium: "An internal error occurred.",
    detailed: "An internal error occurred. This is a bug in pageindex.",
  },
  [ErrorCode.INDEX_CORRUPT]: {
    minimal: "Search index unreadable.",
    medium: "The stored search index could not be read and will be rebuilt.",
    detailed: "The stored search index could not be parsed. A full rebuild will run on the next build.",
  },
  [ErrorCode.INDEX_VERSION_MISMATCH]: {
    minimal: "Search index outdated.",
    medium: "The stored search index uses an old format and will be rebuilt.",
    detailed: "The stored search index has an unsupported format version. A full rebuild will run on the next build.",
  },
  [ErrorCode.INDEX_SIZE_MISMATCH]: {
    minimal: "Search index incomplete.",
    medium: "The stored embeddings do not match the stored page list; the index will be rebuilt.",
    detailed: "The embedding matrix size does not match the metadata entry count. The last save was probably interrupted.",
  },
  [ErrorCode.INDEX_MODEL_MISMATCH]: {
    minimal: "Embedding model changed.",
    medium: "The stored index was built with a different embedding model and will be rebuilt.",
    detailed: "The stored index model id differs from the configured embedding model. Vectors from different models cannot be compared.",
  },
  [ErrorCode.INDEX_NOT_FOUND]: {
    minimal: "No search index yet.",
    medium: "No stored search index was found; it will be built from the source files.",
    detailed: "No stored search index was found in the cache directory. The next build embeds every page.",
  },
  [ErrorCode.INDEX_DIMENSION_MISMATCH]: {
    minimal: "Vector size mismatch.",
    medium: "A vector does not have the dimension of the index.",
    detailed: "A vector does not have the dimension of the index. Query and index must come from the same embedding model.",
  },
  [ErrorCode.INDEX_MISALIGNED]: {
    minimal: "Index misaligned.",
    medium: "The page list and the embedding matrix are out of step.",
    detailed: "The page list and the embedding matrix have different row counts.",
  },
  [ErrorCode.EMBEDDING_FAILED]: {
    minimal: "Embedding failed.",
    medium: "The embedding backend failed; the previous index is still in use.",
    detailed: "The embedding backend call failed. No partial index was published; the previous index is still in use.",
  },
  [ErrorCode.EMBEDDING_TIMEOUT]: {
    minimal: "Embedding timed out.",
    medium: "The embedding backend did not answer in time.",
    detailed: "The embedding backend did not answer within the configured timeout. The build was aborted.",
  },
  [ErrorCode.EMBEDDING_CANCELLED]: {
    minimal: "Embedding cancelled.",
    medium: "The build was cancelled while embedding pages.",
    detailed: "The build was cancelled while waiting for the embedding backend. The previous index is still in use.",
  },
  [ErrorCode.EMBEDDING_INVALID_OUTPUT]: {
    minimal: "Bad embedding output.",
    medium: "The embedding backend returned unusable vectors.",
    detailed: "The embedding backend returned the wrong number of vectors, inconsistent dimensions, or zero vectors.",
  },
  [ErrorCode.EMBEDDING_NOT_CONFIGURED]: {
    minimal: "Embedding backend not configured.",
    medium: "No embedding backend is configured.",
    detailed: "No embedding backend is configured. Set OPENAI_API_KEY or an embedding baseURL.",
  },
  [ErrorCode.EXTRACTION_FAILED]: {
    minimal: "Could not read file.",
    medium: "Pages could not be extracted from a source file.",
    detailed: "Pages could not be extracted from a source file. The file contributes no pages to this build.",
  },
  [ErrorCode.BUILD_IN_PROGRESS]: {
    minimal: "Index build running.",
    medium: "An index build is already in progress.",
    detailed: "An index build is already in progress. Wait for it to finish before starting another.",
  },
  [ErrorCode.FS_FILE_NOT_FOUND]: {
    minimal: "File not found.",
    medium: "The file does not exist.",
    detailed: "The file does not exist or was moved.",
  },
  [ErrorCode.FS_PERMISSION_DENIED]: {
    minimal: "Permission denied.",
    medium: "Permission denied while accessing a file.",
    detailed: "Permission denied while accessing a file. Check the directory permissions.",
  },
  [ErrorCode.FS_NO_SPACE]: {
    minimal: "Disk full.",
    medium: "There is no space left on the device.",
    detailed: "There is no space left on the device. Free some space and retry.",
  },
  [ErrorCode.FS_PATH_TOO_LONG]: {
    minimal: "Path too long.",
    medium: "The file path is too long.",
    detailed: "The file path exceeds the operating system limit.",
  },
  [ErrorCode.FS_DIRECTORY_NOT_FOUND]: {
    minimal: "Directory not found.",
    medium: "The directory does not exist.",
    detailed: "The directory does not exist or was moved.",
  },
  [ErrorCode.FS_FILE_EXISTS]: {
    minimal: "File exists.",
    medium: "The file already exists.",
    detailed: "The file already exists and cannot be overwritten.",
  },
  [ErrorCode.FS_READ_ERROR]: {
    minimal: "Read failed.",
    medium: "A file could not be read.",
    detailed: "A file could not be read.",
  },
  [ErrorCode.FS_WRITE_ERROR]: {
    minimal: "Write failed.",
    medium: "A file could not be written.",
    detailed: "A file could not be written.",
  },
  [ErrorCode.CONFIG_PARSE_ERROR]: {
    minimal: "Bad config file.",
    medium: "The configuration file is not valid YAML.",
    detailed: "The configuration file is not valid YAML. Fix or delete config.yaml.",
  },
  [ErrorCode.CONFIG_INVALID_VALUE]: {
    minimal: "Bad config value.",
    medium: "The configuration file contains an invalid value.",
    detailed: "The configuration file contains an invalid value.",
  },
};

const RECOVERY_HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.INDEX_CORRUPT]: "Run a rebuild; the index is recreated from the source files.",
  [ErrorCode.INDEX_MODEL_MISMATCH]: "Run a full rebuild after changing the embedding model.",
  [ErrorCode.EMBEDDING_TIMEOUT]: "Retry later or raise embedding.timeoutMs in config.yaml.",
  [ErrorCode.EMBEDDING_NOT_CONFIGURED]: "Set OPENAI_API_KEY or embedding.baseURL in config.yaml.",
  [ErrorCode.BUILD_IN_PROGRESS]: "Wait for the running build to finish.",
  [ErrorCode.FS_NO_SPACE]: "Free disk space in the cache directory.",
  [ErrorCode.FS_PERMISSION_DENIED]: "Check permissions of the cache directory.",
};

// Recoverability flags
const RECOVERABLE_ERRORS = new Set<ErrorCode>([
  ErrorCode.INDEX_CORRUPT,
  ErrorCode.INDEX_VERSION_MISMATCH,
  ErrorCode.INDEX_SIZE_MISMATCH,
  ErrorCode.INDEX_MODEL_MISMATCH,
  ErrorCode.INDEX_NOT_FOUND,
  ErrorCode.EMBEDDING_TIMEOUT,
  ErrorCode.EXTRACTION_FAILED,
  ErrorCode.BUILD_IN_PROGRESS,
  ErrorCode.FS_NO_SPACE,
]);

export interface ErrorOptions {
  cause?: Error;
  recoverable?: boolean;
  recoveryHint?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

export class PageIndexError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly recoveryHint?: string;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(code: ErrorCode, message?: string, options?: ErrorOptions) {
    super(message || ERROR_MESSAGES[code].medium);

    this.name = "PageIndexError";
    this.code = code;
    this.cause = options?.cause;
    this.recoverable = options?.recoverable ?? RECOVERABLE_ERRORS.has(code);
    this.recoveryHint = options?.recoveryHint ?? RECOVERY_HINTS[code];
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-friendly message at specified detail level
   */
  getUserMessage(level: ErrorLevel = "medium"): string {
    return ERROR_MESSAGES[this.code][level] || this.message;
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      recoveryHint: this.recoveryHint,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
      } : undefined,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

export type CorruptIndexReason =
  | "file_not_found"
  | "parse_error"
  | "version_mismatch"
  | "size_mismatch"
  | "model_mismatch";

const CORRUPT_REASON_CODES: Record<CorruptIndexReason, ErrorCode> = {
  file_not_found: ErrorCode.INDEX_NOT_FOUND,
  parse_error: ErrorCode.INDEX_CORRUPT,
  version_mismatch: ErrorCode.INDEX_VERSION_MISMATCH,
  size_mismatch: ErrorCode.INDEX_SIZE_MISMATCH,
  model_mismatch: ErrorCode.INDEX_MODEL_MISMATCH,
};

/**
 * Stored index missing or unusable. Always recoverable: the caller starts from
 * an empty index and the next build re-embeds everything.
 */
export class CorruptIndexError extends PageIndexError {
  public readonly reason: CorruptIndexReason;
  public readonly path?: string;

  constructor(
    reason: CorruptIndexReason,
    message?: string,
    options?: ErrorOptions & { path?: string }
  ) {
    super(CORRUPT_REASON_CODES[reason], message, { ...options, recoverable: true });
    this.name = "CorruptIndexError";
    this.reason = reason;
    this.path = options?.path;
  }
}

/**
 * The embedding backend failed for a whole batch.
 */
export class EmbeddingBackendError extends PageIndexError {
  public readonly batchSize: number;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: ErrorOptions & { batchSize?: number }
  ) {
    super(code, message, options);
    this.name = "EmbeddingBackendError";
    this.batchSize = options?.batchSize ?? 0;
  }

  static fromError(error: unknown, batchSize: number): EmbeddingBackendError {
    if (error instanceof EmbeddingBackendError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new EmbeddingBackendError(ErrorCode.EMBEDDING_FAILED, `Embedding backend failed: ${message}`, {
      cause: error instanceof Error ? error : undefined,
      batchSize,
    });
  }
}

/**
 * A single source file could not be turned into pages.
 */
export class ExtractionError extends PageIndexError {
  public readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    const detail = options?.cause ? `: ${options.cause.message}` : "";
    super(ErrorCode.EXTRACTION_FAILED, `Failed to extract pages from ${path}${detail}`, options);
    this.name = "ExtractionError";
    this.path = path;
  }
}

export class BuildInProgressError extends PageIndexError {
  constructor() {
    super(ErrorCode.BUILD_IN_PROGRESS);
    this.name = "BuildInProgressError";
  }
}

/**
 * Alignment or dimensionality invariant violated.
 */
export class IndexIntegrityError extends PageIndexError {
  constructor(code: ErrorCode, message?: string, options?: ErrorOptions) {
    super(code, message, { ...options, recoverable: false });
    this.name = "IndexIntegrityError";
  }
}

/**
 * File system errors
 */
export class FileSystemError extends PageIndexError {
  public readonly path?: string;
  public readonly operation?: "read" | "write" | "delete" | "rename" | "mkdir";

  constructor(
    code: ErrorCode,
    message?: string,
    options?: ErrorOptions & {
      path?: string;
      operation?: FileSystemError["operation"];
    }
  ) {
    super(code, message, options);
    this.name = "FileSystemError";
    this.path = options?.path;
    this.operation = options?.operation;
  }

  /**
   * Create FileSystemError from Node.js error
   */
  static fromNodeError(
    error: NodeJS.ErrnoException,
    path?: string,
    operation?: FileSystemError["operation"]
  ): FileSystemError {
    const options = { cause: error, path, operation };

    switch (error.code) {
      case "ENOENT":
        return new FileSystemError(
          operation === "mkdir" ? ErrorCode.FS_DIRECTORY_NOT_FOUND : ErrorCode.FS_FILE_NOT_FOUND,
          undefined,
          options
        );
      case "EACCES":
      case "EPERM":
        return new FileSystemError(ErrorCode.FS_PERMISSION_DENIED, undefined, options);
      case "ENOSPC":
        return new FileSystemError(ErrorCode.FS_NO_SPACE, undefined, options);
      case "ENAMETOOLONG":
        return new FileSystemError(ErrorCode.FS_PATH_TOO_LONG, undefined, options);
      case "EEXIST":
        return new FileSystemError(ErrorCode.FS_FILE_EXISTS, undefined, options);
      default:
        return new FileSystemError(
          operation === "read" ? ErrorCode.FS_READ_ERROR : ErrorCode.FS_WRITE_ERROR,
          error.message,
          options
        );
    }
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends PageIndexError {
  public readonly configKey?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: ErrorOptions & { configKey?: string }
  ) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

// ============================================================================
// Error Formatter Utilities
// ============================================================================

export type ErrorLevel = "minimal" | "medium" | "detailed";

/**
 * Format error for user display based on detail level
 */
export function formatErrorForUser(error: unknown, level: ErrorLevel = "medium"): string {
  if (error instanceof PageIndexError) {
    let message = error.getUserMessage(level);

    if (level !== "minimal" && error.recoveryHint) {
      message += `\n\nHint: ${error.recoveryHint}`;
    }

    if (level === "detailed") {
      message += `\n\n[Error code: ${error.code}]`;
      if (error.cause) {
        message += `\n[Cause: ${error.cause.message}]`;
      }
      if ((error instanceof FileSystemError || error instanceof CorruptIndexError) && error.path) {
        message += `\n[Path: ${error.path}]`;
      }
    }

    return message;
  }

  if (error instanceof Error) {
    switch (level) {
      case "minimal":
        return "Something went wrong.";
      case "medium":
        return `Error: ${error.message}`;
      case "detailed":
        return `Error: ${error.message}\n\n${error.stack || ""}`;
    }
  }

  return level === "minimal" ? "Something went wrong." : `Error: ${String(error)}`;
}

/**
 * Check if an error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof PageIndexError) {
    return error.recoverable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnrefused") ||
      message.includes("econnreset") ||
      message.includes("etimedout")
    );
  }

  return false;
}

/**
 * Get recovery hint for an error
 */
export function getRecoveryHint(error: unknown): string | null {
  if (error instanceof PageIndexError) {
    return error.recoveryHint || null;
  }
  return null;
}

export function isErrnoException(error: Error): error is NodeJS.ErrnoException {
  return "code" in error && typeof error.code === "string";
}

const FS_ERRNO_CODES = new Set(["ENOENT", "EACCES", "EPERM", "ENOSPC", "EEXIST", "ENAMETOOLONG"]);

/**
 * Convert any error to a PageIndexError
 */
export function toPageIndexError(error: unknown): PageIndexError {
  if (error instanceof PageIndexError) {
    return error;
  }

  if (error instanceof Error && isErrnoException(error) && error.code && FS_ERRNO_CODES.has(error.code)) {
    return FileSystemError.fromNodeError(error);
  }

  return new PageIndexError(ErrorCode.UNKNOWN, error instanceof Error ? error.message : String(error), {
    cause: error instanceof Error ? error : undefined,
  });
}
