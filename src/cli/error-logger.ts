import path from "node:path";

export type SyncFileSystem = {
  appendFileSync(file: string, data: string): void;
  existsSync(path: string): boolean;
  mkdirSync(path: string, options?: { recursive?: boolean }): void;
  renameSync(oldPath: string, newPath: string): void;
  statSync(path: string): { size: number };
  unlinkSync(path: string): void;
  writeFileSync(path: string, data: string, options?: { encoding?: BufferEncoding }): void;
};

export interface ErrorContext {
  operation?: string;
  component?: string;
  filePath?: string;
  instrumentation?: string;
  [key: string]: unknown;
}

export interface ErrorLogEntry {
  timestamp: string;
  level: "ERROR" | "WARN";
  message: string;
  stack?: string;
  context?: ErrorContext;
}

export interface ErrorLoggerOptions {
  fs: SyncFileSystem;
  logDir: string;
  logToStderr?: boolean;
  maxSize?: number;
  maxBackups?: number;
  now?: () => Date;
}

const DEFAULT_MAX_SIZE = 5 * 1024 * 1024; // 5MB
const DEFAULT_MAX_BACKUPS = 3;

export class ErrorLogger {
  private readonly fs: SyncFileSystem;
  private readonly logFilePath: string;
  private readonly logToStderr: boolean;
  private readonly maxSize: number;
  private readonly maxBackups: number;
  private readonly now: () => Date;
  private fileLoggingAvailable: boolean;

  constructor(options: ErrorLoggerOptions) {
    this.fs = options.fs;
    this.logFilePath = path.join(options.logDir, "errors.log");
    this.logToStderr = options.logToStderr ?? true;
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
    this.maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;
    this.now = options.now ?? (() => new Date());

    this.fileLoggingAvailable = this.ensureLogDirectory();
  }

  get filePath(): string {
    return this.logFilePath;
  }

  logError(error: Error | string, context?: ErrorContext): void {
    const entry = this.createEntry(error, "ERROR", context);
    this.writeEntry(entry);

    if (this.logToStderr) {
      this.writeToStderr(entry);
    }
  }

  logWarning(message: string, context?: ErrorContext): void {
    const entry = this.createEntry(message, "WARN", context);
    entry.stack = undefined;
    this.writeEntry(entry);

    if (this.logToStderr) {
      this.writeToStderr(entry);
    }
  }

  logErrorWithStackTrace(
    error: Error,
    operation: string,
    context?: ErrorContext
  ): void {
    this.logError(error, { ...context, operation });
  }

  /**
   * Records the per-instrumentation failures of one run under a shared
   * operation name; each keeps its own context.
   */
  logFailures(
    failures: Error[],
    operation: string,
    contextOf: (error: Error) => ErrorContext | undefined
  ): void {
    for (const failure of failures) {
      this.logError(failure, { ...contextOf(failure), operation });
    }
  }

  private createEntry(
    error: Error | string,
    level: "ERROR" | "WARN",
    context?: ErrorContext
  ): ErrorLogEntry {
    const errorObj = typeof error === "string" ? new Error(error) : error;

    return {
      timestamp: this.now().toISOString(),
      level,
      message: errorObj.message,
      stack: errorObj.stack,
      context
    };
  }

  private writeEntry(entry: ErrorLogEntry): void {
    if (!this.fileLoggingAvailable) {
      this.writeToStderr(entry, true);
      return;
    }

    this.rotateIfNeeded();

    const formattedEntry = this.formatEntry(entry);
    try {
      this.fs.appendFileSync(this.logFilePath, formattedEntry + "\n");
    } catch {
      this.fileLoggingAvailable = false;
      this.writeToStderr(entry, true);
    }
  }

  private formatEntry(entry: ErrorLogEntry): string {
    const parts = [`[${entry.timestamp}] ${entry.level}: ${entry.message}`];

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(`Context: ${JSON.stringify(entry.context)}`);
    }

    if (entry.stack) {
      parts.push(`Stack trace:\n${entry.stack}`);
    }

    return parts.join("\n");
  }

  private writeToStderr(entry: ErrorLogEntry, force = false): void {
    if (!this.logToStderr && !force) {
      return;
    }

    console.error(this.formatEntry(entry));
  }

  private rotateIfNeeded(): void {
    try {
      if (!this.fs.existsSync(this.logFilePath)) {
        return;
      }
      if (this.fs.statSync(this.logFilePath).size < this.maxSize) {
        return;
      }
      this.performRotation();
    } catch (error) {
      console.error("Error during log rotation:", error);
    }
  }

  private performRotation(): void {
    if (this.maxBackups < 1) {
      this.fs.unlinkSync(this.logFilePath);
      return;
    }

    const oldestPath = this.buildBackupPath(this.maxBackups);
    if (this.fs.existsSync(oldestPath)) {
      this.fs.unlinkSync(oldestPath);
    }

    for (let i = this.maxBackups - 1; i >= 1; i--) {
      const source = this.buildBackupPath(i);
      if (this.fs.existsSync(source)) {
        this.fs.renameSync(source, this.buildBackupPath(i + 1));
      }
    }

    this.fs.renameSync(this.logFilePath, this.buildBackupPath(1));
  }

  private buildBackupPath(index: number): string {
    return `${this.logFilePath}.${index}`;
  }

  private ensureLogDirectory(): boolean {
    const directory = path.dirname(this.logFilePath);
    try {
      if (!this.fs.existsSync(directory)) {
        this.fs.mkdirSync(directory, { recursive: true });
      }
      if (!this.fs.existsSync(this.logFilePath)) {
        this.fs.writeFileSync(this.logFilePath, "", { encoding: "utf8" });
      }
      return true;
    } catch {
      // Read-only homes (CI sandboxes, containers) fall back to stderr.
      return false;
    }
  }
}
