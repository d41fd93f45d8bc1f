import { applyPatch, parsePatch, type ParsedDiff } from "diff";

export type UnifiedDiff = ParsedDiff;

export function parseSingleFileDiff(source: string, label: string): UnifiedDiff {
  const parsed = parsePatch(source);
  const withHunks = parsed.filter((entry) => entry.hunks.length > 0);
  if (withHunks.length !== 1) {
    throw new Error(
      `Expected exactly one file diff in ${label}, found ${withHunks.length}.`
    );
  }
  return withHunks[0];
}

/**
 * Swaps the pre- and post-image of every hunk so the diff undoes itself.
 */
export function reverseUnifiedDiff(diff: UnifiedDiff): UnifiedDiff {
  return {
    ...diff,
    oldFileName: diff.newFileName,
    newFileName: diff.oldFileName,
    oldHeader: diff.newHeader,
    newHeader: diff.oldHeader,
    hunks: diff.hunks.map((hunk) => ({
      ...hunk,
      oldStart: hunk.newStart,
      oldLines: hunk.newLines,
      newStart: hunk.oldStart,
      newLines: hunk.oldLines,
      lines: hunk.lines.map(invertLine)
    }))
  };
}

/**
 * Returns the patched content, or null when a hunk's context does not match.
 */
export function applyUnifiedDiff(
  content: string,
  diff: UnifiedDiff
): string | null {
  const result = applyPatch(content, diff);
  return result === false ? null : result;
}

function invertLine(line: string): string {
  if (line.startsWith("+")) {
    return `-${line.slice(1)}`;
  }
  if (line.startsWith("-")) {
    return `+${line.slice(1)}`;
  }
  return line;
}
