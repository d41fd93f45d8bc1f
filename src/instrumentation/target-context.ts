import path from "node:path";
import { DetectionError } from "../cli/errors.js";
import { isDirectory, type FileSystem } from "../utils/file-system.js";

export interface TargetContext {
  readonly applicationDir: string;
  readonly frameworkDir: string;
  readonly webrootDir: string;
  readonly frameworkVersion: string;
  readonly frameworkMajorVersion: number;
}

export interface TargetContextInit {
  applicationDir: string;
  frameworkDir: string;
  webrootDir: string;
  frameworkVersion: string;
}

/**
 * Builds the frozen context for one run. All three roots must be existing,
 * distinct directories.
 */
export async function createTargetContext(
  fs: FileSystem,
  init: TargetContextInit
): Promise<TargetContext> {
  const roots = {
    applicationDir: path.resolve(init.applicationDir),
    frameworkDir: path.resolve(init.frameworkDir),
    webrootDir: path.resolve(init.webrootDir)
  };

  for (const [name, dir] of Object.entries(roots)) {
    if (!(await isDirectory(fs, dir))) {
      throw new DetectionError(`${name} ${dir} is not an existing directory.`, {
        webrootDir: roots.webrootDir
      });
    }
  }

  const distinct = new Set(Object.values(roots));
  if (distinct.size !== 3) {
    throw new DetectionError(
      "Application, framework and webroot directories must be distinct.",
      { webrootDir: roots.webrootDir, context: { ...roots } }
    );
  }

  return Object.freeze({
    ...roots,
    frameworkVersion: init.frameworkVersion,
    frameworkMajorVersion: parseMajorVersion(init.frameworkVersion)
  });
}

/**
 * The major version is the text before the first dot, as a positive integer.
 */
export function parseMajorVersion(version: string): number {
  const head = version.trim().split(".")[0];
  if (!/^\d+$/.test(head)) {
    throw new DetectionError(`Unable to parse framework major version from "${version}".`);
  }
  const major = Number.parseInt(head, 10);
  if (major < 1) {
    throw new DetectionError(`Framework major version must be positive, got "${version}".`);
  }
  return major;
}
