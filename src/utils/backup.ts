import path from "node:path";
import {
  copyFileContents,
  ensureParentDirectory,
  isNotFound,
  pathExists,
  removeFileIfExists,
  type FileSystem
} from "./file-system.js";

export type TimestampProvider = () => string;

export const DEFAULT_TIMESTAMP: TimestampProvider = () =>
  new Date().toISOString().replace(/[:.]/g, "-");

export interface BackupOptions {
  tag: string;
  timestamp?: TimestampProvider;
}

/**
 * Backups live beside their target as `<name>.backup.<tag>.<timestamp>`, so
 * each mutation kind sees only its own history for a file.
 */
export function backupPrefix(targetPath: string, tag: string): string {
  return `${path.basename(targetPath)}.backup.${tag}.`;
}

export async function createBackup(
  fs: FileSystem,
  targetPath: string,
  options: BackupOptions
): Promise<string | null> {
  if (!(await pathExists(fs, targetPath))) {
    return null;
  }

  const timestamp = options.timestamp ?? DEFAULT_TIMESTAMP;
  const backupPath = path.join(
    path.dirname(targetPath),
    `${backupPrefix(targetPath, options.tag)}${timestamp()}`
  );
  await copyFileContents(fs, targetPath, backupPath);
  return backupPath;
}

export async function findLatestBackup(
  fs: FileSystem,
  targetPath: string,
  tag: string
): Promise<string | null> {
  const dir = path.dirname(targetPath);
  const prefix = backupPrefix(targetPath, tag);

  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }

  const backups = entries
    .map(String)
    .filter((name) => name.startsWith(prefix))
    .sort()
    .reverse();

  if (backups.length === 0) {
    return null;
  }
  return path.join(dir, backups[0]);
}

/**
 * Copies the most recent backup over the target and removes that backup.
 * Resolves to false when there was nothing to restore.
 */
export async function restoreLatestBackup(
  fs: FileSystem,
  targetPath: string,
  tag: string
): Promise<boolean> {
  const latest = await findLatestBackup(fs, targetPath, tag);
  if (!latest) {
    return false;
  }
  await copyFileContents(fs, latest, targetPath);
  await fs.unlink(latest);
  return true;
}

export async function discardBackup(
  fs: FileSystem,
  backupPath: string | null
): Promise<void> {
  if (!backupPath) {
    return;
  }
  await removeFileIfExists(fs, backupPath);
}

/**
 * An empty `<name>.created.<tag>` file beside a target that a mutation created
 * from nothing.
 */
export function creationMarkerPath(targetPath: string, tag: string): string {
  return path.join(
    path.dirname(targetPath),
    `${path.basename(targetPath)}.created.${tag}`
  );
}

/**
 * Records how to undo a mutation of `targetPath` before it happens: a backup
 * when the file exists, a creation marker otherwise. Resolves to the path
 * written, for `discardBackup` when the mutation itself fails.
 */
export async function createRestorePoint(
  fs: FileSystem,
  targetPath: string,
  options: BackupOptions
): Promise<string> {
  const backupPath = await createBackup(fs, targetPath, options);
  if (backupPath) {
    return backupPath;
  }
  const markerPath = creationMarkerPath(targetPath, options.tag);
  await ensureParentDirectory(fs, markerPath);
  await fs.writeFile(markerPath, "", { encoding: "utf8" });
  return markerPath;
}

export async function hasRestorePoint(
  fs: FileSystem,
  targetPath: string,
  tag: string
): Promise<boolean> {
  if ((await findLatestBackup(fs, targetPath, tag)) !== null) {
    return true;
  }
  return pathExists(fs, creationMarkerPath(targetPath, tag));
}

/**
 * Restores the latest backup, or deletes a target its creation marker says
 * was created. Resolves to false when `tag` left neither behind.
 */
export async function restoreFromRestorePoint(
  fs: FileSystem,
  targetPath: string,
  tag: string
): Promise<boolean> {
  if (await restoreLatestBackup(fs, targetPath, tag)) {
    return true;
  }
  const markerPath = creationMarkerPath(targetPath, tag);
  if (!(await pathExists(fs, markerPath))) {
    return false;
  }
  await removeFileIfExists(fs, targetPath);
  await fs.unlink(markerPath);
  return true;
}
