import * as nodeFsSync from "node:fs";
import type { FileSystem } from "../utils/file-system.js";
import type { TimestampProvider } from "../utils/backup.js";
import {
  createFilesystemDetector,
  type FrameworkDetector
} from "../instrumentation/detection.js";
import type { InstrumentationObservers } from "../instrumentation/batch.js";
import { createCliEnvironment, type CliEnvironment } from "./environment.js";
import {
  createCommandContextFactory,
  type CommandContextFactory
} from "./context.js";
import { createLoggerFactory, type LoggerFactory } from "./logger.js";
import { ErrorLogger, type SyncFileSystem } from "./error-logger.js";
import type { LoggerFn } from "./types.js";

export interface CliDependencies {
  fs: FileSystem;
  env: {
    cwd: string;
    homeDir: string;
    platform?: NodeJS.Platform;
    variables?: Record<string, string | undefined>;
  };
  logger?: LoggerFn;
  /** Synchronous filesystem for the error log; node:fs by default. */
  errorLogFs?: SyncFileSystem;
  detector?: FrameworkDetector;
  timestamp?: TimestampProvider;
  signal?: AbortSignal;
  /** Notified alongside the console reporter for every mutation. */
  observers?: InstrumentationObservers;
  exitOverride?: boolean;
  suppressCommanderOutput?: boolean;
}

export interface CliContainer {
  readonly env: CliEnvironment;
  readonly fs: FileSystem;
  readonly loggerFactory: LoggerFactory;
  readonly errorLogger: ErrorLogger;
  readonly contextFactory: CommandContextFactory;
  readonly detector: FrameworkDetector;
  readonly timestamp?: TimestampProvider;
  readonly signal?: AbortSignal;
  readonly observers?: InstrumentationObservers;
  readonly dependencies: CliDependencies;
}

export function createCliContainer(
  dependencies: CliDependencies
): CliContainer {
  const environment = createCliEnvironment({
    cwd: dependencies.env.cwd,
    homeDir: dependencies.env.homeDir,
    platform: dependencies.env.platform,
    variables: dependencies.env.variables
  });

  const loggerFactory = createLoggerFactory(
    dependencies.logger ?? ((message) => console.log(message))
  );

  // File only; commands print their own failures.
  const errorLogger = new ErrorLogger({
    fs: dependencies.errorLogFs ?? nodeFsSync,
    logDir: environment.logDir,
    logToStderr: false
  });

  loggerFactory.setErrorLogger(errorLogger);

  const contextFactory = createCommandContextFactory({
    fs: dependencies.fs
  });

  return {
    env: environment,
    fs: dependencies.fs,
    loggerFactory,
    errorLogger,
    contextFactory,
    detector: dependencies.detector ?? createFilesystemDetector(dependencies.fs),
    timestamp: dependencies.timestamp,
    signal: dependencies.signal,
    observers: dependencies.observers,
    dependencies
  };
}
