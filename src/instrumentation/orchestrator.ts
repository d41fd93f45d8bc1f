import type { MutationError, ResolutionError } from "../cli/errors.js";
import {
  applyInstrumentations,
  checkInstrumentations,
  revertInstrumentations,
  type InstrumentationAction,
  type InstrumentationObservers
} from "./batch.js";
import {
  INSTRUMENTATION_GROUPS,
  type InstrumentationGroup,
  type InstrumentationSet
} from "./instrumentation-set.js";
import type { Instrumentation, OperationContext } from "./operation.js";

/** Overrides land first so later groups see the overridden files. */
export const APPLY_SEQUENCE = [
  "overrides",
  "patches",
  "copies",
  "annotationRemovals"
] as const satisfies readonly InstrumentationGroup[];

export const REVERT_SEQUENCE = [
  "annotationRemovals",
  "overrides",
  "patches",
  "copies"
] as const satisfies readonly InstrumentationGroup[];

export type OrchestrationFailure = MutationError | ResolutionError;

export type OrchestrationResult = "complete" | "partial" | "none";

export interface GroupOutcome {
  group: InstrumentationGroup;
  total: number;
  /** Operations that were already in the target state before this run. */
  alreadyInState: number;
  changed: number;
  failed: number;
}

export interface OrchestrationSummary {
  action: InstrumentationAction;
  groups: GroupOutcome[];
  failures: OrchestrationFailure[];
  aborted: boolean;
  result: OrchestrationResult;
}

export interface GroupStatus {
  group: InstrumentationGroup;
  applied: number;
  unapplied: number;
  failed: number;
}

export interface StatusReport {
  groups: GroupStatus[];
  failures: OrchestrationFailure[];
}

export interface OrchestrationRunOptions {
  signal?: AbortSignal;
  /** Defaults to true; dry runs pass false. */
  verify?: boolean;
}

export interface OrchestratorInit {
  set: InstrumentationSet;
  context: OperationContext;
  /** Resources the resolver turned away; reported with every summary. */
  rejected?: ResolutionError[];
  observers?: InstrumentationObservers;
}

export interface Orchestrator {
  readonly set: InstrumentationSet;
  apply(options?: OrchestrationRunOptions): Promise<OrchestrationSummary>;
  revert(options?: OrchestrationRunOptions): Promise<OrchestrationSummary>;
  status(): Promise<StatusReport>;
}

export function createOrchestrator(init: OrchestratorInit): Orchestrator {
  const rejected = init.rejected ?? [];

  const run = async (
    action: InstrumentationAction,
    sequence: readonly InstrumentationGroup[],
    options: OrchestrationRunOptions = {}
  ): Promise<OrchestrationSummary> => {
    const groups: GroupOutcome[] = [];
    const failures: OrchestrationFailure[] = [...rejected];
    let aborted = false;

    for (const group of sequence) {
      const operations: readonly Instrumentation[] = init.set[group];
      if (options.signal?.aborted) {
        aborted = true;
        groups.push({
          group,
          total: operations.length,
          alreadyInState: 0,
          changed: 0,
          failed: 0
        });
        continue;
      }

      const partition = await checkInstrumentations(operations, init.context, {
        group
      });
      const pending = action === "apply" ? partition.unapplied : partition.applied;
      const settled = action === "apply" ? partition.applied : partition.unapplied;
      const batchOptions = {
        group,
        observers: init.observers,
        signal: options.signal,
        verify: options.verify
      };
      const batch =
        action === "apply"
          ? await applyInstrumentations(pending, init.context, batchOptions)
          : await revertInstrumentations(pending, init.context, batchOptions);

      if (batch.skipped.length > 0) {
        aborted = true;
      }
      failures.push(...partition.failures, ...batch.failures);
      groups.push({
        group,
        total: operations.length,
        alreadyInState: settled.length,
        changed: batch.succeeded.length,
        failed: partition.failures.length + batch.failures.length
      });
    }

    return {
      action,
      groups,
      failures,
      aborted,
      result: summarizeResult(groups, failures.length, aborted)
    };
  };

  return {
    set: init.set,
    apply(options) {
      return run("apply", APPLY_SEQUENCE, options);
    },
    revert(options) {
      return run("revert", REVERT_SEQUENCE, options);
    },
    async status() {
      const groups: GroupStatus[] = [];
      const failures: OrchestrationFailure[] = [...rejected];
      for (const group of INSTRUMENTATION_GROUPS) {
        const operations: readonly Instrumentation[] = init.set[group];
        const partition = await checkInstrumentations(operations, init.context, {
          group
        });
        failures.push(...partition.failures);
        groups.push({
          group,
          applied: partition.applied.length,
          unapplied: partition.unapplied.length,
          failed: partition.failures.length
        });
      }
      return { groups, failures };
    }
  };
}

export function summarizeResult(
  groups: readonly GroupOutcome[],
  failureCount: number,
  aborted: boolean
): OrchestrationResult {
  if (failureCount === 0 && !aborted) {
    return "complete";
  }
  const inState = groups.reduce(
    (total, outcome) => total + outcome.alreadyInState + outcome.changed,
    0
  );
  return inState > 0 ? "partial" : "none";
}
