import { CliError, MutationError, describeError } from "../cli/errors.js";
import {
  applyInstrumentation,
  checkInstrumentation,
  revertInstrumentation
} from "./engines/index.js";
import {
  describeInstrumentation,
  targetPathOf,
  type CheckState,
  type Instrumentation,
  type InstrumentationKind,
  type OperationContext
} from "./operation.js";

export type InstrumentationAction = "apply" | "revert";

export interface InstrumentationLogDetails {
  action: InstrumentationAction | "check";
  group?: string;
  kind: InstrumentationKind;
  label: string;
  targetPath: string;
}

export interface InstrumentationObservers {
  onStart?(details: InstrumentationLogDetails): void;
  onComplete?(details: InstrumentationLogDetails): void;
  onError?(details: InstrumentationLogDetails, error: unknown): void;
}

export interface CheckPartition<Op extends Instrumentation> {
  applied: Op[];
  unapplied: Op[];
  failures: MutationError[];
}

type CheckOutcome<Op extends Instrumentation> =
  | { operation: Op; state: CheckState }
  | { operation: Op; state: "failed"; error: MutationError };

export interface BatchResult<Op extends Instrumentation> {
  succeeded: Op[];
  failures: MutationError[];
  skipped: Op[];
}

export interface BatchOptions {
  group?: string;
  observers?: InstrumentationObservers;
  signal?: AbortSignal;
  /**
   * Re-run `check` after each mutation and record a failure when the state
   * did not flip. Off for dry runs, where nothing is written.
   */
  verify?: boolean;
}

/**
 * Checks every operation concurrently and partitions them by state. A check
 * that throws is recorded as a failure and the operation lands in neither
 * partition.
 */
export async function checkInstrumentations<Op extends Instrumentation>(
  operations: readonly Op[],
  context: OperationContext,
  options: Pick<BatchOptions, "group"> = {}
): Promise<CheckPartition<Op>> {
  const results = await Promise.all(
    operations.map(async (operation): Promise<CheckOutcome<Op>> => {
      try {
        return { operation, state: await checkInstrumentation(operation, context) };
      } catch (error) {
        return {
          operation,
          state: "failed",
          error: new MutationError(
            `Failed to check ${operation.kind} on ${targetPathOf(operation)}: ${describeError(error)}`,
            {
              action: "check",
              kind: operation.kind,
              targetPath: targetPathOf(operation),
              cause: error,
              context: { group: options.group }
            }
          )
        };
      }
    })
  );

  const partition: CheckPartition<Op> = { applied: [], unapplied: [], failures: [] };
  for (const result of results) {
    if (result.state === "failed") {
      partition.failures.push(result.error);
    } else if (result.state === "applied") {
      partition.applied.push(result.operation);
    } else {
      partition.unapplied.push(result.operation);
    }
  }
  return partition;
}

export function applyInstrumentations<Op extends Instrumentation>(
  operations: readonly Op[],
  context: OperationContext,
  options: BatchOptions = {}
): Promise<BatchResult<Op>> {
  return runBatch("apply", operations, context, options);
}

export function revertInstrumentations<Op extends Instrumentation>(
  operations: readonly Op[],
  context: OperationContext,
  options: BatchOptions = {}
): Promise<BatchResult<Op>> {
  return runBatch("revert", operations, context, options);
}

async function runBatch<Op extends Instrumentation>(
  action: InstrumentationAction,
  operations: readonly Op[],
  context: OperationContext,
  options: BatchOptions
): Promise<BatchResult<Op>> {
  const outcomes = await Promise.all(
    operations.map((operation) => runOne(action, operation, context, options))
  );

  const result: BatchResult<Op> = { succeeded: [], failures: [], skipped: [] };
  outcomes.forEach((outcome, index) => {
    const operation = operations[index];
    if (outcome === "skipped") {
      result.skipped.push(operation);
    } else if (outcome === "ok") {
      result.succeeded.push(operation);
    } else {
      result.failures.push(outcome);
    }
  });
  return result;
}

async function runOne(
  action: InstrumentationAction,
  operation: Instrumentation,
  context: OperationContext,
  options: BatchOptions
): Promise<"ok" | "skipped" | MutationError> {
  if (options.signal?.aborted) {
    return "skipped";
  }

  const details: InstrumentationLogDetails = {
    action,
    group: options.group,
    kind: operation.kind,
    label: describeInstrumentation(operation),
    targetPath: targetPathOf(operation)
  };
  options.observers?.onStart?.(details);

  try {
    if (action === "apply") {
      await applyInstrumentation(operation, context);
    } else {
      await revertInstrumentation(operation, context);
    }
    if (options.verify ?? true) {
      await verifyState(action, operation, context);
    }
    options.observers?.onComplete?.(details);
    return "ok";
  } catch (error) {
    const failure = toMutationError(action, operation, error);
    options.observers?.onError?.(details, failure);
    return failure;
  }
}

/**
 * A failed apply check rolls the mutation back through the engine's revert so
 * the file keeps its prior bytes. A failed revert check leaves the operation
 * "applied", which is already its prior state.
 */
async function verifyState(
  action: InstrumentationAction,
  operation: Instrumentation,
  context: OperationContext
): Promise<void> {
  const expected = action === "apply" ? "applied" : "not-applied";
  const state = await checkInstrumentation(operation, context);
  if (state === expected) {
    return;
  }
  let message = `${describeInstrumentation(operation)} completed ${action} but still reports ${state}.`;
  if (action === "apply") {
    message += await rollBack(operation, context);
  }
  throw new MutationError(message, {
    action,
    kind: operation.kind,
    targetPath: targetPathOf(operation)
  });
}

async function rollBack(
  operation: Instrumentation,
  context: OperationContext
): Promise<string> {
  try {
    await revertInstrumentation(operation, context);
    return " The change was rolled back.";
  } catch (error) {
    return ` Rollback failed: ${describeError(error)}`;
  }
}

function toMutationError(
  action: InstrumentationAction,
  operation: Instrumentation,
  error: unknown
): MutationError {
  if (error instanceof MutationError) {
    return error;
  }
  return new MutationError(describeError(error), {
    action,
    kind: operation.kind,
    targetPath: targetPathOf(operation),
    cause: error,
    context: error instanceof CliError ? error.context : undefined
  });
}
