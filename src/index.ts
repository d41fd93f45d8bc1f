#!/usr/bin/env node
import * as nodeFs from "node:fs/promises";
import * as nodeFsSync from "node:fs";
import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { pathToFileURL } from "node:url";
import { createProgram } from "./cli/program.js";
import type { FileSystem } from "./utils/file-system.js";
import { resolveLogDir } from "./cli/environment.js";
import { ErrorLogger } from "./cli/error-logger.js";
import { isUserFacingError } from "./cli/errors.js";

const fsAdapter = nodeFs as unknown as FileSystem;

async function main(): Promise<void> {
  const homeDir = homedir();
  const logDir = resolveLogDir(homeDir);

  // Global error logger for failures outside any command
  const errorLogger = new ErrorLogger({
    fs: nodeFsSync,
    logDir,
    logToStderr: false // Only log to file at this level
  });

  const interrupt = new AbortController();
  const onSigint = (): void => {
    if (interrupt.signal.aborted) {
      process.exit(130);
    }
    console.error("Interrupt received; finishing in-flight instrumentations.");
    interrupt.abort();
  };
  process.on("SIGINT", onSigint);

  const program = createProgram({
    fs: fsAdapter,
    env: {
      cwd: process.cwd(),
      homeDir,
      platform: process.platform,
      variables: process.env
    },
    logger: (message) => {
      console.log(message);
    },
    signal: interrupt.signal,
    exitOverride: false
  });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      errorLogger.logErrorWithStackTrace(error, "CLI execution", {
        component: "main",
        argv: process.argv
      });

      if (isUserFacingError(error)) {
        console.error(error.message);
      } else {
        console.error(`Error: ${error.message}`);
        console.error(`See logs at ${errorLogger.filePath} for more details.`);
      }

      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

if (isCliInvocation(process.argv, import.meta.url)) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}

function isCliInvocation(
  argv: string[],
  moduleUrl: string,
  realpath: (path: string) => string = realpathSync
): boolean {
  const entry = argv.at(1);
  if (typeof entry !== "string") {
    return false;
  }

  const candidates = [pathToFileURL(entry).href];

  try {
    candidates.push(pathToFileURL(realpath(entry)).href);
  } catch {
    // Ignore resolution errors; fall back to direct comparison.
  }

  return candidates.includes(moduleUrl);
}

export { main, isCliInvocation };
