import {
  createRestorePoint,
  discardBackup,
  hasRestorePoint,
  restoreFromRestorePoint
} from "../../utils/backup.js";
import {
  ensureParentDirectory,
  readFileIfExists,
  type FileSystem
} from "../../utils/file-system.js";
import type {
  InstrumentationCapability,
  OverrideInstrumentation
} from "../operation.js";
import { guardMutation, mutationFailure } from "./failure.js";

export const OVERRIDE_BACKUP_TAG = "override";

/**
 * Applied means an `override` backup or creation marker sits beside the
 * target. Later groups may rewrite the target, so its bytes are not compared.
 */
export const overrideCapability: InstrumentationCapability<OverrideInstrumentation> = {
  async check(operation, { fs }) {
    return (await hasRestorePoint(fs, operation.targetPath, OVERRIDE_BACKUP_TAG))
      ? "applied"
      : "not-applied";
  },

  async apply(operation, { fs, timestamp }) {
    await guardMutation(operation, "apply", async () => {
      const desired = await readDesiredContent(fs, operation);
      if (desired === null) {
        throw mutationFailure(
          operation,
          "apply",
          `Override source ${describeSource(operation)} does not exist.`
        );
      }
      const restorePoint = await createRestorePoint(fs, operation.targetPath, {
        tag: OVERRIDE_BACKUP_TAG,
        timestamp
      });
      try {
        await ensureParentDirectory(fs, operation.targetPath);
        await fs.writeFile(operation.targetPath, desired, { encoding: "utf8" });
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
        operation.targetPath,
        OVERRIDE_BACKUP_TAG
      );
      if (!restored) {
        throw mutationFailure(
          operation,
          "revert",
          `No override backup or creation marker found for ${operation.targetPath}.`
        );
      }
    });
  }
};

async function readDesiredContent(
  fs: FileSystem,
  operation: OverrideInstrumentation
): Promise<string | null> {
  if (operation.content.type === "inline") {
    return operation.content.value;
  }
  return readFileIfExists(fs, operation.content.path);
}

function describeSource(operation: OverrideInstrumentation): string {
  return operation.content.type === "file" ? operation.content.path : "content";
}
