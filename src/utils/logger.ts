import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
  stack?: string;
}

interface LoggerOptions {
  debug?: boolean;
  logToFile?: boolean;
  logDir?: string;
}

/**
 * Logger bound to a component name. Shares level and sinks with its parent.
 */
export interface ScopedLogger {
  readonly scope: string;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

class Logger {
  private debugMode: boolean;
  private logToFile: boolean;
  private logDir: string;
  private logQueue: LogEntry[] = [];
  private flushInterval: NodeJS.Timeout | null = null;
  private initialized: boolean = false;

  constructor(options: LoggerOptions = {}) {
    this.debugMode = options.debug ?? (process.env.PAGEINDEX_DEBUG === "true");
    this.logToFile = options.logToFile ?? false;
    this.logDir = options.logDir ?? path.join(os.homedir(), ".pageindex", "logs");
  }

  async init(): Promise<void> {
    if (this.initialized) return;

    if (this.logToFile) {
      await fs.mkdir(this.logDir, { recursive: true });
      this.flushInterval = setInterval(() => {
        void this.flush();
      }, 5000);
      // Must not keep the process alive on its own
      this.flushInterval.unref();
    }
    this.initialized = true;
  }

  private createEntry(level: LogLevel, message: string, data?: unknown, scope?: string): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (scope) {
      entry.scope = scope;
    }

    if (data !== undefined) {
      entry.data = data instanceof Error ? { name: data.name, message: data.message } : data;
    }

    if (data instanceof Error) {
      entry.stack = data.stack;
    }

    return entry;
  }

  private formatConsoleOutput(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      debug: "\x1b[36m", // cyan
      info: "\x1b[32m",  // green
      warn: "\x1b[33m",  // yellow
      error: "\x1b[31m", // red
    };
    const reset = "\x1b[0m";
    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);
    const scopeStr = entry.scope ? `[${entry.scope}] ` : "";
    let output = `${levelColors[entry.level]}${levelStr}${reset} ${scopeStr}${entry.message}`;

    if (entry.data !== undefined && !entry.stack) {
      output += ` ${JSON.stringify(entry.data)}`;
    }

    if (entry.stack) {
      output += `\n${entry.stack}`;
    }

    return output;
  }

  private log(level: LogLevel, message: string, data?: unknown, scope?: string): void {
    if (level === "debug" && !this.debugMode) {
      return;
    }

    const entry = this.createEntry(level, message, data, scope);
    const output = this.formatConsoleOutput(entry);

    if (level === "error") {
      console.error(output);
    } else if (level === "warn") {
      console.warn(output);
    } else {
      console.log(output);
    }

    if (this.logToFile) {
      this.logQueue.push(entry);
    }
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown): void {
    this.log("error", message, error);
  }

  /**
   * Scoped view of this logger; messages are prefixed with `[scope]`.
   */
  child(scope: string): ScopedLogger {
    return {
      scope,
      debug: (message, data) => this.log("debug", message, data, scope),
      info: (message, data) => this.log("info", message, data, scope),
      warn: (message, data) => this.log("warn", message, data, scope),
      error: (message, error) => this.log("error", message, error, scope),
    };
  }

  private getLogFilePath(): string {
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.logDir, `pageindex-${date}.log`);
  }

  async flush(): Promise<void> {
    if (!this.logToFile || this.logQueue.length === 0) {
      return;
    }

    const entries = [...this.logQueue];
    this.logQueue = [];

    try {
      const lines = entries.map((entry) => JSON.stringify(entry)).join("\n") + "\n";
      await fs.appendFile(this.getLogFilePath(), lines, "utf-8");
    } catch (err) {
      // Fallback to console if file write fails
      console.error("Failed to write to log file:", err);
    }
  }

  async close(): Promise<void> {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    await this.flush();
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

export function createLogger(options?: LoggerOptions): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(options);
  }
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

/**
 * Drop the singleton so the next getLogger() picks up fresh options.
 */
export function resetLogger(): void {
  loggerInstance = null;
}

// Error tracking utilities
export interface ErrorContext {
  component?: string;
  action?: string;
  metadata?: Record<string, unknown>;
}

export function trackError(error: Error, context?: ErrorContext): void {
  const logger = getLogger();
  const message = context?.component
    ? `[${context.component}] ${error.message}`
    : error.message;

  logger.error(message, {
    error: {
      name: error.name,
      message: error.message,
    },
    context,
  });
}

export function createErrorTracker(component: string) {
  return (error: Error, action?: string, metadata?: Record<string, unknown>) => {
    trackError(error, { component, action, metadata });
  };
}

export { Logger };
export type { LoggerOptions };
export default getLogger;
