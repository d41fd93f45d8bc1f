import path from "node:path";
import { ConfigurationError } from "../cli/errors.js";
import {
  targetPathOf,
  type AnnotationRemovalInstrumentation,
  type CopyInstrumentation,
  type Instrumentation,
  type OverrideInstrumentation,
  type PatchInstrumentation
} from "./operation.js";

export interface InstrumentationSet {
  overrides: OverrideInstrumentation[];
  patches: PatchInstrumentation[];
  copies: CopyInstrumentation[];
  annotationRemovals: AnnotationRemovalInstrumentation[];
}

export type InstrumentationGroup = keyof InstrumentationSet;

/** Declaration order, used by `status`. */
export const INSTRUMENTATION_GROUPS: readonly InstrumentationGroup[] = [
  "overrides",
  "patches",
  "copies",
  "annotationRemovals"
];

export const GROUP_TITLES: Record<InstrumentationGroup, string> = {
  overrides: "Overrides",
  patches: "Patches",
  copies: "Copies",
  annotationRemovals: "Annotation removals"
};

export interface InstrumentationSetInput {
  declared: Partial<InstrumentationSet>;
  discovered: Pick<Partial<InstrumentationSet>, "patches" | "copies">;
}

/**
 * Declared operations come first in every group; discovery only contributes
 * patches and copies.
 */
export function buildInstrumentationSet(
  input: InstrumentationSetInput
): InstrumentationSet {
  const set: InstrumentationSet = {
    overrides: [...(input.declared.overrides ?? [])],
    patches: [
      ...(input.declared.patches ?? []),
      ...(input.discovered.patches ?? [])
    ],
    copies: [
      ...(input.declared.copies ?? []),
      ...(input.discovered.copies ?? [])
    ],
    annotationRemovals: [...(input.declared.annotationRemovals ?? [])]
  };

  for (const group of INSTRUMENTATION_GROUPS) {
    assertDisjointTargets(group, set[group]);
  }
  return set;
}

export function assertDisjointTargets(
  group: InstrumentationGroup,
  operations: readonly Instrumentation[]
): void {
  const seen = new Set<string>();
  for (const operation of operations) {
    const target = path.normalize(path.resolve(targetPathOf(operation)));
    if (seen.has(target)) {
      throw new ConfigurationError(
        `Duplicate target ${target} in ${group}; each file may be mutated once per group.`,
        { group, filePath: target }
      );
    }
    seen.add(target);
  }
}

export function countInstrumentations(set: InstrumentationSet): number {
  return INSTRUMENTATION_GROUPS.reduce(
    (total, group) => total + set[group].length,
    0
  );
}
