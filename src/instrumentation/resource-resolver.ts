import path from "node:path";
import { ResolutionError } from "../cli/errors.js";
import { listFilesRecursive, type FileSystem } from "../utils/file-system.js";
import {
  copyInstrumentation,
  patchInstrumentation,
  type CopyInstrumentation,
  type PatchInstrumentation
} from "./operation.js";
import type { TargetContext } from "./target-context.js";

export type ResourceRootKind = "application" | "framework" | "webroot";

/**
 * Subtree names under `<base>/cakephp/<major>/`, in discovery order.
 */
export const RESOURCE_ROOTS: ReadonlyArray<{
  kind: ResourceRootKind;
  directory: string;
}> = [
  { kind: "application", directory: "APP_DIR" },
  { kind: "framework", directory: "CAKEPHP_PATH" },
  { kind: "webroot", directory: "WEBROOT" }
];

export const PATCH_SUFFIX = ".patch";
export const COPY_SUFFIX = ".php";

export interface ResolvedResources {
  patches: PatchInstrumentation[];
  copies: CopyInstrumentation[];
  rejected: ResolutionError[];
}

export function versionResourceDirectory(
  baseDir: string,
  majorVersion: number
): string {
  return path.join(baseDir, "cakephp", String(majorVersion));
}

export function resourceRootDirectory(
  baseDir: string,
  majorVersion: number,
  rootKind: ResourceRootKind
): string {
  const root = RESOURCE_ROOTS.find((entry) => entry.kind === rootKind);
  if (!root) {
    throw new Error(`Unknown resource root: ${rootKind}`);
  }
  return path.join(versionResourceDirectory(baseDir, majorVersion), root.directory);
}

/**
 * Relative paths of the resources under one root subtree. A version or root
 * with no directory yields nothing.
 */
export function listRelativeResources(
  fs: FileSystem,
  baseDir: string,
  majorVersion: number,
  rootKind: ResourceRootKind,
  suffix: string
): Promise<string[]> {
  return listFilesRecursive(
    fs,
    resourceRootDirectory(baseDir, majorVersion, rootKind),
    suffix
  );
}

export function liveRootOf(
  rootKind: ResourceRootKind,
  context: TargetContext
): string {
  switch (rootKind) {
    case "application":
      return context.applicationDir;
    case "framework":
      return context.frameworkDir;
    case "webroot":
      return context.webrootDir;
    default: {
      const neverKind: never = rootKind;
      throw new Error(`Unknown resource root: ${String(neverKind)}`);
    }
  }
}

/**
 * Maps a resource's relative path onto the live tree, dropping `stripSuffix`
 * from the last segment when given. The result must sit strictly inside the
 * live root.
 */
export function resolveTargetPath(
  relativePath: string,
  rootKind: ResourceRootKind,
  context: TargetContext,
  stripSuffix?: string
): string {
  const root = liveRootOf(rootKind, context);
  let relative = relativePath;
  if (stripSuffix) {
    if (!relative.endsWith(stripSuffix)) {
      throw new ResolutionError(
        `Resource ${relativePath} does not end with ${stripSuffix}.`,
        { resourcePath: relativePath, root }
      );
    }
    relative = relative.slice(0, -stripSuffix.length);
  }

  const resolved = path.resolve(root, relative);
  const fromRoot = path.relative(root, resolved);
  if (
    fromRoot.length === 0 ||
    fromRoot === ".." ||
    fromRoot.startsWith(`..${path.sep}`) ||
    path.isAbsolute(fromRoot)
  ) {
    throw new ResolutionError(
      `Resource ${relativePath} resolves outside ${root}.`,
      { resourcePath: relativePath, root }
    );
  }
  return resolved;
}

export async function resolveVersionResources(
  fs: FileSystem,
  baseDir: string,
  context: TargetContext
): Promise<ResolvedResources> {
  const resolved: ResolvedResources = { patches: [], copies: [], rejected: [] };
  const major = context.frameworkMajorVersion;

  for (const { kind } of RESOURCE_ROOTS) {
    const rootDir = resourceRootDirectory(baseDir, major, kind);

    const patchFiles = await listRelativeResources(fs, baseDir, major, kind, PATCH_SUFFIX);
    for (const relative of patchFiles) {
      const target = tryResolve(resolved, relative, kind, context, PATCH_SUFFIX);
      if (target) {
        resolved.patches.push(
          patchInstrumentation({
            patch: path.join(rootDir, relative),
            original: target
          })
        );
      }
    }

    const copyFiles = await listRelativeResources(fs, baseDir, major, kind, COPY_SUFFIX);
    for (const relative of copyFiles) {
      const target = tryResolve(resolved, relative, kind, context);
      if (target) {
        resolved.copies.push(
          copyInstrumentation({ src: path.join(rootDir, relative), dst: target })
        );
      }
    }
  }

  return resolved;
}

function tryResolve(
  resolved: ResolvedResources,
  relative: string,
  kind: ResourceRootKind,
  context: TargetContext,
  stripSuffix?: string
): string | null {
  try {
    return resolveTargetPath(relative, kind, context, stripSuffix);
  } catch (error) {
    if (error instanceof ResolutionError) {
      resolved.rejected.push(error);
      return null;
    }
    throw error;
  }
}
