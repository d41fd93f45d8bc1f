import path from "node:path";
import { readFileIfExists, type FileSystem } from "../../utils/file-system.js";
import {
  applyUnifiedDiff,
  parseSingleFileDiff,
  reverseUnifiedDiff,
  type UnifiedDiff
} from "../../utils/unified-diff.js";
import type {
  InstrumentationCapability,
  PatchInstrumentation
} from "../operation.js";
import { guardMutation, mutationFailure } from "./failure.js";

/**
 * A patch counts as applied when its reverse applies cleanly to the current
 * file, the same test `patch --dry-run -R` makes.
 */
export const patchCapability: InstrumentationCapability<PatchInstrumentation> = {
  async check(operation, { fs }) {
    const content = await readFileIfExists(fs, operation.originalFile);
    if (content === null) {
      return "not-applied";
    }
    const diff = await loadDiff(fs, operation);
    if (diff === null) {
      return "not-applied";
    }
    return applyUnifiedDiff(content, reverseUnifiedDiff(diff)) === null
      ? "not-applied"
      : "applied";
  },

  async apply(operation, { fs }) {
    await guardMutation(operation, "apply", async () => {
      const { content, diff } = await loadInputs(fs, operation, "apply");
      const next = applyUnifiedDiff(content, diff);
      if (next === null) {
        throw mutationFailure(
          operation,
          "apply",
          `Patch ${path.basename(operation.patchFile)} does not apply cleanly to ${operation.originalFile}.`
        );
      }
      await fs.writeFile(operation.originalFile, next, { encoding: "utf8" });
    });
  },

  async revert(operation, { fs }) {
    await guardMutation(operation, "revert", async () => {
      const { content, diff } = await loadInputs(fs, operation, "revert");
      const previous = applyUnifiedDiff(content, reverseUnifiedDiff(diff));
      if (previous === null) {
        throw mutationFailure(
          operation,
          "revert",
          `Patch ${path.basename(operation.patchFile)} cannot be reverted cleanly from ${operation.originalFile}.`
        );
      }
      await fs.writeFile(operation.originalFile, previous, { encoding: "utf8" });
    });
  }
};

async function loadDiff(
  fs: FileSystem,
  operation: PatchInstrumentation
): Promise<UnifiedDiff | null> {
  const source = await readFileIfExists(fs, operation.patchFile);
  if (source === null) {
    return null;
  }
  return parseSingleFileDiff(source, operation.patchFile);
}

async function loadInputs(
  fs: FileSystem,
  operation: PatchInstrumentation,
  action: "apply" | "revert"
): Promise<{ content: string; diff: UnifiedDiff }> {
  const content = await readFileIfExists(fs, operation.originalFile);
  if (content === null) {
    throw mutationFailure(
      operation,
      action,
      `Patch target ${operation.originalFile} does not exist.`
    );
  }
  const diff = await loadDiff(fs, operation);
  if (diff === null) {
    throw mutationFailure(
      operation,
      action,
      `Patch file ${operation.patchFile} does not exist.`
    );
  }
  return { content, diff };
}
