import { Volume, createFsFromVolume, type DirectoryJSON } from "memfs";
import { Command } from "commander";
import type { FileSystem } from "../src/utils/file-system.js";
import type { TimestampProvider } from "../src/utils/backup.js";
import type { SyncFileSystem } from "../src/cli/error-logger.js";
import { createProgram, type CliDependencies } from "../src/cli/program.js";
import {
  createTargetContext,
  type TargetContext
} from "../src/instrumentation/target-context.js";

export const PROJECT_ROOT = "/srv/shop";
export const WEBROOT_DIR = `${PROJECT_ROOT}/webroot`;
export const APP_DIR = `${PROJECT_ROOT}/src`;
export const FRAMEWORK_DIR = `${PROJECT_ROOT}/vendor/cakephp/cakephp`;
export const HOME_DIR = "/home/test";
export const SETTINGS_PATH = `${PROJECT_ROOT}/instrumentation.toml`;
export const ERROR_LOG_PATH = `${HOME_DIR}/.cake-instrument/logs/errors.log`;

export interface MemoryFs {
  vol: Volume;
  fs: FileSystem;
  read(path: string): string;
  exists(path: string): boolean;
  list(dir: string): string[];
}

export function createMemoryFs(files: DirectoryJSON = {}): MemoryFs {
  const vol = Volume.fromJSON(files);
  return {
    vol,
    fs: createFsFromVolume(vol).promises as unknown as FileSystem,
    read: (path) => vol.readFileSync(path, "utf8").toString(),
    exists: (path) => vol.existsSync(path),
    list: (dir) => {
      const entries: unknown[] = vol.readdirSync(dir);
      return entries.map(String).sort();
    }
  };
}

export function createSyncFs(files: DirectoryJSON = {}): {
  fs: SyncFileSystem;
  vol: Volume;
} {
  const vol = Volume.fromJSON(files);
  return { fs: createFsFromVolume(vol) as unknown as SyncFileSystem, vol };
}

/**
 * A CakePHP 4 project laid out as `<root>/{src,webroot,vendor/cakephp/cakephp}`.
 */
export function cakeProjectFiles(version = "4.4.17"): DirectoryJSON {
  return {
    [`${WEBROOT_DIR}/index.php`]: "<?php\nrequire dirname(__DIR__) . '/config/bootstrap.php';\n",
    [`${APP_DIR}/Controller/AppController.php`]: [
      "<?php",
      "class AppController",
      "{",
      "    #[\\ReturnTypeWillChange]",
      "    public function initialize() {}",
      "}",
      ""
    ].join("\n"),
    [`${FRAMEWORK_DIR}/VERSION.txt`]: `// CakePHP(tm) : Rapid Development Framework\n//\n${version}\n`,
    [`${FRAMEWORK_DIR}/src/Routing/Dispatcher.php`]: [
      "<?php",
      "class Dispatcher",
      "{",
      "    public function dispatch()",
      "    {",
      "        return $this->run();",
      "    }",
      "}",
      ""
    ].join("\n")
  };
}

export function createProjectContext(
  fs: FileSystem,
  version = "4.4.17"
): Promise<TargetContext> {
  return createTargetContext(fs, {
    applicationDir: APP_DIR,
    frameworkDir: FRAMEWORK_DIR,
    webrootDir: WEBROOT_DIR,
    frameworkVersion: version
  });
}

/**
 * Deterministic, lexically increasing backup timestamps.
 */
export function createSequentialTimestamps(): TimestampProvider {
  let counter = 0;
  return () => {
    counter += 1;
    return `2024-01-01T00-00-00-${String(counter).padStart(3, "0")}Z`;
  };
}

export function createTestProgram(argv: string[] = ["node", "cli"]): Command {
  const program = new Command();
  program.exitOverride();
  program
    .name("cake-instrument")
    .option("--webroot <dir>")
    .option("--config <file>")
    .option("--dry-run")
    .option("--verbose")
    .option("--json");
  program.parse(argv);
  return program;
}

export interface CliHarness {
  memory: MemoryFs;
  logs: string[];
  errorLog: Volume;
  run(args: string[]): Promise<void>;
}

/**
 * Runs the real program against an in-memory project rooted at PROJECT_ROOT.
 * Each `run` builds a fresh program; files and backups persist across runs.
 */
export function createCliHarness(
  files: DirectoryJSON,
  overrides: Partial<CliDependencies> = {}
): CliHarness {
  const memory = createMemoryFs(files);
  const errorLog = createSyncFs();
  const logs: string[] = [];
  const timestamp = createSequentialTimestamps();
  return {
    memory,
    logs,
    errorLog: errorLog.vol,
    async run(args) {
      const program = createProgram({
        fs: memory.fs,
        env: { cwd: PROJECT_ROOT, homeDir: HOME_DIR, variables: {} },
        logger: (message) => {
          logs.push(message);
        },
        errorLogFs: errorLog.fs,
        timestamp,
        suppressCommanderOutput: true,
        ...overrides
      });
      await program.parseAsync(["node", "cli", ...args]);
    }
  };
}
