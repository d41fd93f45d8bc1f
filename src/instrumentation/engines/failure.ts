import { MutationError, describeError } from "../../cli/errors.js";
import type { Instrumentation } from "../operation.js";
import { targetPathOf } from "../operation.js";

export function mutationFailure(
  operation: Instrumentation,
  action: "apply" | "revert",
  message: string,
  cause?: unknown
): MutationError {
  return new MutationError(message, {
    action,
    kind: operation.kind,
    targetPath: targetPathOf(operation),
    cause
  });
}

/**
 * Runs one mutation step, wrapping anything it throws in a MutationError for
 * the operation.
 */
export async function guardMutation(
  operation: Instrumentation,
  action: "apply" | "revert",
  step: () => Promise<void>
): Promise<void> {
  try {
    await step();
  } catch (error) {
    if (error instanceof MutationError) {
      throw error;
    }
    throw mutationFailure(
      operation,
      action,
      `Failed to ${action} ${operation.kind} on ${targetPathOf(operation)}: ${describeError(error)}`,
      error
    );
  }
}
