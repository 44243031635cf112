import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { parse, stringify } from "yaml";
import { z } from "zod";
import { ConfigError, ErrorCode, FileSystemError, isErrnoException } from "./errors.js";

/**
 * Expand tilde (~) to home directory in a path.
 * Also handles Windows %USERPROFILE% environment variable.
 *
 * @example
 * expandPath("~/OneNote"); // "/Users/username/OneNote" on macOS
 * expandPath("%USERPROFILE%/OneNote"); // "C:\\Users\\username\\OneNote" on Windows
 */
export function expandPath(inputPath: string): string {
  if (!inputPath) return inputPath;

  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return os.homedir();
  }

  if (process.platform === "win32" && inputPath.includes("%USERPROFILE%")) {
    return inputPath.replace(/%USERPROFILE%/gi, os.homedir());
  }

  return path.resolve(inputPath);
}

// ============================================================================
// Schema
// ============================================================================

const EmbeddingSettingsSchema = z.object({
  model: z.string().min(1),
  baseURL: z.string().url().optional(),
  dimensions: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive(),
});

const SearchSettingsSchema = z.object({
  topK: z.number().int().positive(),
  minScore: z.number().min(-1).max(1),
  exactMaxResults: z.number().int().positive(),
  refreshOnSearch: z.boolean(),
});

export const PageIndexConfigSchema = z.object({
  backupDirs: z.array(z.string()),
  cacheDir: z.string().min(1),
  embedding: EmbeddingSettingsSchema,
  search: SearchSettingsSchema,
});

/**
 * Shape accepted from config.yaml: every key optional, nested sections too.
 */
const PartialConfigSchema = z.object({
  backupDirs: PageIndexConfigSchema.shape.backupDirs.optional(),
  cacheDir: PageIndexConfigSchema.shape.cacheDir.optional(),
  embedding: EmbeddingSettingsSchema.partial().optional(),
  search: SearchSettingsSchema.partial().optional(),
}).strict();

export type PageIndexConfig = z.infer<typeof PageIndexConfigSchema>;
export type PartialPageIndexConfig = z.infer<typeof PartialConfigSchema>;

export const DEFAULT_CONFIG: PageIndexConfig = {
  backupDirs: [],
  cacheDir: "~/.cache/pageindex",
  embedding: {
    model: "text-embedding-3-small",
    timeoutMs: 120_000,
  },
  search: {
    topK: 20,
    minScore: 0.1,
    exactMaxResults: 30,
    refreshOnSearch: true,
  },
};

// ============================================================================
// Paths
// ============================================================================

/**
 * Get the configuration directory path.
 * In test mode (PAGEINDEX_TEST_CONFIG_DIR env var set), uses the test directory.
 * Otherwise uses ~/.pageindex
 */
export function getConfigDir(): string {
  if (process.env.PAGEINDEX_TEST_CONFIG_DIR) {
    return process.env.PAGEINDEX_TEST_CONFIG_DIR;
  }
  return path.join(os.homedir(), ".pageindex");
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

// ============================================================================
// Load / Save
// ============================================================================

/**
 * Merge a partial config over a base, one level deep for the nested sections.
 */
export function mergeConfig(base: PageIndexConfig, updates: PartialPageIndexConfig): PageIndexConfig {
  return {
    backupDirs: updates.backupDirs ?? base.backupDirs,
    cacheDir: updates.cacheDir ?? base.cacheDir,
    embedding: { ...base.embedding, ...updates.embedding },
    search: { ...base.search, ...updates.search },
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Load the configuration from disk.
 *
 * A missing file yields the defaults. Partial files are merged with defaults.
 *
 * @throws {ConfigError} If the file is malformed YAML or holds invalid values
 * @throws {FileSystemError} If the file exists but cannot be read
 */
export async function loadConfig(): Promise<PageIndexConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && isErrnoException(err) && err.code === "ENOENT") {
      return mergeConfig(DEFAULT_CONFIG, {});
    }
    throw err instanceof Error && isErrnoException(err)
      ? FileSystemError.fromNodeError(err, configPath, "read")
      : err;
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, undefined, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  // An empty file parses to null
  const parsed = PartialConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ConfigError(
      ErrorCode.CONFIG_INVALID_VALUE,
      `Invalid config.yaml: ${describeIssues(parsed.error)}`,
      { configKey: first ? first.path.join(".") : undefined }
    );
  }

  return mergeConfig(DEFAULT_CONFIG, parsed.data);
}

/**
 * Save the configuration to disk.
 */
export async function saveConfig(config: PageIndexConfig): Promise<void> {
  const valid = PageIndexConfigSchema.parse(config);
  await fs.mkdir(getConfigDir(), { recursive: true });
  await fs.writeFile(getConfigPath(), stringify(valid), "utf-8");
}

/**
 * Check if the configuration file exists.
 */
export async function configExists(): Promise<boolean> {
  try {
    await fs.access(getConfigPath());
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolved on-disk locations derived from a config.
 */
export interface ResolvedPaths {
  backupDirs: string[];
  cacheDir: string;
}

export function resolvePaths(config: PageIndexConfig): ResolvedPaths {
  return {
    backupDirs: config.backupDirs.map(expandPath),
    cacheDir: expandPath(config.cacheDir),
  };
}
