import path from "node:path";
import type { FileSystem } from "../utils/file-system.js";
import type { TimestampProvider } from "../utils/backup.js";

export type CheckState = "applied" | "not-applied";

export type OverrideContent =
  | { type: "inline"; value: string }
  | { type: "file"; path: string };

export interface OverrideInstrumentation {
  kind: "override";
  targetPath: string;
  content: OverrideContent;
  label?: string;
}

export interface PatchInstrumentation {
  kind: "patch";
  patchFile: string;
  originalFile: string;
  label?: string;
}

export interface CopyInstrumentation {
  kind: "copy";
  sourcePath: string;
  destinationPath: string;
  label?: string;
}

export interface AnnotationRemovalInstrumentation {
  kind: "annotationRemoval";
  targetPath: string;
  annotationPattern: RegExp;
  label?: string;
}

export type Instrumentation =
  | OverrideInstrumentation
  | PatchInstrumentation
  | CopyInstrumentation
  | AnnotationRemovalInstrumentation;

export type InstrumentationKind = Instrumentation["kind"];

export interface OperationContext {
  fs: FileSystem;
  timestamp?: TimestampProvider;
}

/**
 * What every instrumentation kind implements. `apply` is only called after
 * `check` reported "not-applied" and `revert` after "applied"; both throw a
 * MutationError when they cannot complete.
 */
export interface InstrumentationCapability<Op extends Instrumentation> {
  check(operation: Op, context: OperationContext): Promise<CheckState>;
  apply(operation: Op, context: OperationContext): Promise<void>;
  revert(operation: Op, context: OperationContext): Promise<void>;
}

export function overrideInstrumentation(config: {
  target: string;
  content?: string;
  source?: string;
  label?: string;
}): OverrideInstrumentation {
  if (config.content !== undefined && config.source !== undefined) {
    throw new Error("override accepts either content or source, not both.");
  }
  let content: OverrideContent;
  if (config.content !== undefined) {
    content = { type: "inline", value: config.content };
  } else if (config.source !== undefined) {
    content = { type: "file", path: path.resolve(config.source) };
  } else {
    throw new Error("override requires content or source.");
  }
  return {
    kind: "override",
    targetPath: path.resolve(config.target),
    content,
    label: config.label
  };
}

export function patchInstrumentation(config: {
  patch: string;
  original: string;
  label?: string;
}): PatchInstrumentation {
  return {
    kind: "patch",
    patchFile: path.resolve(config.patch),
    originalFile: path.resolve(config.original),
    label: config.label
  };
}

export function copyInstrumentation(config: {
  src: string;
  dst: string;
  label?: string;
}): CopyInstrumentation {
  return {
    kind: "copy",
    sourcePath: path.resolve(config.src),
    destinationPath: path.resolve(config.dst),
    label: config.label
  };
}

export function annotationRemovalInstrumentation(config: {
  target: string;
  pattern: RegExp | string;
  flags?: string;
  label?: string;
}): AnnotationRemovalInstrumentation {
  return {
    kind: "annotationRemoval",
    targetPath: path.resolve(config.target),
    annotationPattern: toGlobalPattern(config.pattern, config.flags),
    label: config.label
  };
}

/**
 * The file an instrumentation mutates.
 */
export function targetPathOf(operation: Instrumentation): string {
  switch (operation.kind) {
    case "override":
    case "annotationRemoval":
      return operation.targetPath;
    case "patch":
      return operation.originalFile;
    case "copy":
      return operation.destinationPath;
    default: {
      const neverOperation: never = operation;
      throw new Error(`Unsupported instrumentation: ${String(neverOperation)}`);
    }
  }
}

/**
 * Instrumentations have no identity beyond their attributes; equal keys mean
 * equal operations.
 */
export function instrumentationKey(operation: Instrumentation): string {
  switch (operation.kind) {
    case "override": {
      const content =
        operation.content.type === "inline"
          ? `inline:${operation.content.value}`
          : `file:${operation.content.path}`;
      return `override|${operation.targetPath}|${content}`;
    }
    case "patch":
      return `patch|${operation.patchFile}|${operation.originalFile}`;
    case "copy":
      return `copy|${operation.sourcePath}|${operation.destinationPath}`;
    case "annotationRemoval":
      return `annotationRemoval|${operation.targetPath}|${operation.annotationPattern.toString()}`;
    default: {
      const neverOperation: never = operation;
      throw new Error(`Unsupported instrumentation: ${String(neverOperation)}`);
    }
  }
}

export function describeInstrumentation(operation: Instrumentation): string {
  if (operation.label) {
    return operation.label;
  }
  switch (operation.kind) {
    case "override":
      return `Override ${operation.targetPath}`;
    case "patch":
      return `Patch ${operation.originalFile} with ${path.basename(operation.patchFile)}`;
    case "copy":
      return `Copy ${path.basename(operation.sourcePath)} to ${operation.destinationPath}`;
    case "annotationRemoval":
      return `Remove ${operation.annotationPattern.source} from ${operation.targetPath}`;
    default: {
      const neverOperation: never = operation;
      throw new Error(`Unsupported instrumentation: ${String(neverOperation)}`);
    }
  }
}

function toGlobalPattern(pattern: RegExp | string, flags?: string): RegExp {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  const baseFlags =
    flags ?? (typeof pattern === "string" ? "" : pattern.flags);
  const unique = new Set(`${baseFlags}g`.split(""));
  return new RegExp(source, [...unique].join(""));
}
