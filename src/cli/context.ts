import {
  DryRunRecorder,
  createDryRunFileSystem,
  formatDryRunOperations
} from "../utils/dry-run.js";
import type { FileSystem } from "../utils/file-system.js";
import type { ScopedLogger } from "./logger.js";

export interface CommandContextOptions {
  dryRun: boolean;
  logger: ScopedLogger;
}

export interface CommandContextComplete {
  success: string;
  dry: string;
}

export interface CommandContext {
  fs: FileSystem;
  readonly dryRun: boolean;
  flushDryRun(options?: { emitIfEmpty?: boolean }): void;
  complete(messages: CommandContextComplete): void;
}

export interface CommandContextFactoryInit {
  fs: FileSystem;
}

export interface CommandContextFactory {
  create(options: CommandContextOptions): CommandContext;
}

export function createCommandContextFactory(
  init: CommandContextFactoryInit
): CommandContextFactory {
  const { fs } = init;

  const create = (options: CommandContextOptions): CommandContext => {
    if (!options.dryRun) {
      return {
        fs,
        dryRun: false,
        flushDryRun() {},
        complete(messages) {
          options.logger.success(messages.success);
        }
      };
    }

    const recorder = new DryRunRecorder();
    const proxyFs = createDryRunFileSystem(fs, recorder);
    let hasEmittedOperations = false;

    const flush = (emitIfEmpty = false): void => {
      const operations = recorder.drain();
      if (operations.length === 0) {
        if (emitIfEmpty && !hasEmittedOperations) {
          for (const line of formatDryRunOperations(operations)) {
            options.logger.info(line);
          }
        }
        return;
      }
      hasEmittedOperations = true;
      for (const line of formatDryRunOperations(operations)) {
        options.logger.info(line);
      }
    };

    return {
      fs: proxyFs,
      dryRun: true,
      flushDryRun({ emitIfEmpty }: { emitIfEmpty?: boolean } = {}) {
        flush(Boolean(emitIfEmpty));
      },
      complete(messages) {
        options.logger.dryRun(messages.dry);
        flush(true);
      }
    };
  };

  return { create };
}
