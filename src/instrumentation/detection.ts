import path from "node:path";
import { coerce } from "semver";
import { DetectionError } from "../cli/errors.js";
import {
  isDirectory,
  pathExists,
  readFileIfExists,
  type FileSystem
} from "../utils/file-system.js";

export interface DetectedFramework {
  applicationDir: string;
  frameworkDir: string;
  frameworkVersion: string;
}

export interface FrameworkDetector {
  detect(webrootDir: string): Promise<DetectedFramework>;
}

export type DetectionOverrides = Partial<DetectedFramework>;

const LEGACY_FRAMEWORK_CANDIDATES = [
  ["lib", "Cake"],
  ["vendors", "cakephp", "cakephp", "lib", "Cake"],
  ["vendor", "cakephp", "cakephp", "lib", "Cake"]
] as const;

const MODERN_FRAMEWORK_SEGMENTS = ["vendor", "cakephp", "cakephp"] as const;

/**
 * Reads the CakePHP layout from disk. A webroot whose parent holds
 * `Config/core.php` is a 2.x `app/webroot`; anything else is treated as the
 * 3.x+ `<root>/webroot` layout.
 */
export function createFilesystemDetector(fs: FileSystem): FrameworkDetector {
  return {
    async detect(webrootDir) {
      const webroot = path.resolve(webrootDir);
      if (!(await isDirectory(fs, webroot))) {
        throw new DetectionError(`Webroot ${webroot} is not a directory.`, {
          webrootDir: webroot
        });
      }

      const parent = path.dirname(webroot);
      const legacy = await pathExists(fs, path.join(parent, "Config", "core.php"));
      const applicationDir = legacy ? parent : path.join(parent, "src");
      const frameworkDir = legacy
        ? await findFirstDirectory(
            fs,
            LEGACY_FRAMEWORK_CANDIDATES.map((segments) =>
              path.join(path.dirname(parent), ...segments)
            )
          )
        : await findFirstDirectory(fs, [path.join(parent, ...MODERN_FRAMEWORK_SEGMENTS)]);

      if (!frameworkDir) {
        throw new DetectionError(
          `Unable to locate the CakePHP installation for webroot ${webroot}.`,
          { webrootDir: webroot }
        );
      }
      if (!(await isDirectory(fs, applicationDir))) {
        throw new DetectionError(
          `Application directory ${applicationDir} does not exist.`,
          { webrootDir: webroot }
        );
      }

      return {
        applicationDir,
        frameworkDir,
        frameworkVersion: await readFrameworkVersion(fs, frameworkDir)
      };
    }
  };
}

/**
 * Explicit values win field by field; the wrapped detector only runs when
 * something is still missing.
 */
export function withDetectionOverrides(
  detector: FrameworkDetector,
  overrides: DetectionOverrides
): FrameworkDetector {
  return {
    async detect(webrootDir) {
      const { applicationDir, frameworkDir, frameworkVersion } = overrides;
      if (applicationDir && frameworkDir && frameworkVersion) {
        return { applicationDir, frameworkDir, frameworkVersion };
      }
      const detected = await detector.detect(webrootDir);
      return {
        applicationDir: applicationDir ?? detected.applicationDir,
        frameworkDir: frameworkDir ?? detected.frameworkDir,
        frameworkVersion: frameworkVersion ?? detected.frameworkVersion
      };
    }
  };
}

/**
 * CakePHP ships `VERSION.txt` with `//` comment lines followed by the version
 * on its last line.
 */
export function parseVersionFile(content: string): string | null {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("//"));
  const last = lines.at(-1);
  if (!last) {
    return null;
  }
  return coerce(last)?.version ?? null;
}

async function readFrameworkVersion(
  fs: FileSystem,
  frameworkDir: string
): Promise<string> {
  const versionFile = path.join(frameworkDir, "VERSION.txt");
  const content = await readFileIfExists(fs, versionFile);
  if (content === null) {
    throw new DetectionError(`Missing ${versionFile}.`);
  }
  const version = parseVersionFile(content);
  if (!version) {
    throw new DetectionError(`Unable to parse CakePHP version from ${versionFile}.`);
  }
  return version;
}

async function findFirstDirectory(
  fs: FileSystem,
  candidates: string[]
): Promise<string | null> {
  for (const candidate of candidates) {
    if (await isDirectory(fs, candidate)) {
      return candidate;
    }
  }
  return null;
}
