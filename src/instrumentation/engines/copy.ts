import {
  createRestorePoint,
  discardBackup,
  hasRestorePoint,
  restoreFromRestorePoint
} from "../../utils/backup.js";
import {
  copyFileContents,
  ensureParentDirectory,
  pathExists
} from "../../utils/file-system.js";
import type {
  CopyInstrumentation,
  InstrumentationCapability
} from "../operation.js";
import { guardMutation, mutationFailure } from "./failure.js";

export const COPY_BACKUP_TAG = "copy";

export const copyCapability: InstrumentationCapability<CopyInstrumentation> = {
  async check(operation, { fs }) {
    return (await hasRestorePoint(fs, operation.destinationPath, COPY_BACKUP_TAG))
      ? "applied"
      : "not-applied";
  },

  async apply(operation, { fs, timestamp }) {
    await guardMutation(operation, "apply", async () => {
      if (!(await pathExists(fs, operation.sourcePath))) {
        throw mutationFailure(
          operation,
          "apply",
          `Copy source ${operation.sourcePath} does not exist.`
        );
      }
      const restorePoint = await createRestorePoint(fs, operation.destinationPath, {
        tag: COPY_BACKUP_TAG,
        timestamp
      });
      try {
        await ensureParentDirectory(fs, operation.destinationPath);
        await copyFileContents(fs, operation.sourcePath, operation.destinationPath);
      } catch (error) {
        await discardBackup(fs, restorePoint);
        throw error;
      }
    });
  },

  async revert(operation, { fs }) {
    await guardMutation(operation, "revert", async () => {
      const restored = await restoreFromRestorePoint(
        fs,
        operation.destinationPath,
        COPY_BACKUP_TAG
      );
      if (!restored) {
        throw mutationFailure(
          operation,
          "revert",
          `No copy backup or creation marker found for ${operation.destinationPath}.`
        );
      }
    });
  }
};
