import {
  createBackup,
  discardBackup,
  findLatestBackup,
  restoreLatestBackup
} from "../../utils/backup.js";
import { readFileIfExists } from "../../utils/file-system.js";
import type {
  AnnotationRemovalInstrumentation,
  InstrumentationCapability
} from "../operation.js";
import { guardMutation, mutationFailure } from "./failure.js";

export const ANNOTATION_BACKUP_TAG = "annotation";

/**
 * Applied means an `annotation` backup holds the pre-removal content. The
 * stripped text may still match, for example `ab` inside `aabb`.
 */
export const annotationRemovalCapability: InstrumentationCapability<AnnotationRemovalInstrumentation> = {
  async check(operation, { fs }) {
    const backup = await findLatestBackup(
      fs,
      operation.targetPath,
      ANNOTATION_BACKUP_TAG
    );
    return backup ? "applied" : "not-applied";
  },

  async apply(operation, { fs, timestamp }) {
    await guardMutation(operation, "apply", async () => {
      const content = await readFileIfExists(fs, operation.targetPath);
      if (content === null) {
        throw mutationFailure(
          operation,
          "apply",
          `Annotation target ${operation.targetPath} does not exist.`
        );
      }
      const stripped = content.replace(operation.annotationPattern, "");
      const backupPath = await createBackup(fs, operation.targetPath, {
        tag: ANNOTATION_BACKUP_TAG,
        timestamp
      });
      try {
        await fs.writeFile(operation.targetPath, stripped, { encoding: "utf8" });
      } catch (error) {
        await discardBackup(fs, backupPath);
        throw error;
      }
    });
  },

  async revert(operation, { fs }) {
    await guardMutation(operation, "revert", async () => {
      const restored = await restoreLatestBackup(
        fs,
        operation.targetPath,
        ANNOTATION_BACKUP_TAG
      );
      if (!restored) {
        throw mutationFailure(
          operation,
          "revert",
          `No annotation backup found for ${operation.targetPath}.`
        );
      }
    });
  }
};
