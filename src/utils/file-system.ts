import path from "node:path";
import type { Stats } from "node:fs";

export interface FileSystem {
  readFile(path: string, encoding: BufferEncoding): Promise<string>;
  readFile(path: string): Promise<Buffer>;
  writeFile(
    path: string,
    data: string | NodeJS.ArrayBufferView,
    options?: { encoding?: BufferEncoding }
  ): Promise<void>;
  mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;
  stat(path: string): Promise<Stats>;
  unlink(path: string): Promise<void>;
  readdir(path: string): Promise<string[]>;
  copyFile?(src: string, dest: string): Promise<void>;
}

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error as { code?: string }).code === "ENOENT"
  );
}

export async function pathExists(fs: FileSystem, target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(fs: FileSystem, target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export async function readFileIfExists(
  fs: FileSystem,
  target: string
): Promise<string | null> {
  try {
    return await fs.readFile(target, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function copyFileContents(
  fs: FileSystem,
  from: string,
  to: string
): Promise<void> {
  if (typeof fs.copyFile === "function") {
    await fs.copyFile(from, to);
    return;
  }
  const content = await fs.readFile(from);
  await fs.writeFile(to, content);
}

export async function removeFileIfExists(
  fs: FileSystem,
  target: string
): Promise<void> {
  try {
    await fs.unlink(target);
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
}

export async function ensureParentDirectory(
  fs: FileSystem,
  target: string
): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
}

/**
 * Lists regular files below `root` whose name ends with `suffix`, as sorted
 * forward-slash paths relative to `root`. A missing root yields no entries.
 */
export async function listFilesRecursive(
  fs: FileSystem,
  root: string,
  suffix: string
): Promise<string[]> {
  if (!(await isDirectory(fs, root))) {
    return [];
  }
  const found: string[] = [];
  await collectFiles(fs, root, [], suffix, found);
  return found.sort();
}

async function collectFiles(
  fs: FileSystem,
  directory: string,
  segments: string[],
  suffix: string,
  found: string[]
): Promise<void> {
  const entries = (await fs.readdir(directory)).map(String).sort();
  for (const entry of entries) {
    const absolute = path.join(directory, entry);
    const stats = await fs.stat(absolute);
    if (stats.isDirectory()) {
      await collectFiles(fs, absolute, [...segments, entry], suffix, found);
      continue;
    }
    if (stats.isFile() && entry.endsWith(suffix)) {
      found.push([...segments, entry].join("/"));
    }
  }
}
