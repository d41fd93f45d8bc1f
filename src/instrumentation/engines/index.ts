import type {
  CheckState,
  Instrumentation,
  OperationContext
} from "../operation.js";
import { annotationRemovalCapability } from "./annotation-removal.js";
import { copyCapability } from "./copy.js";
import { overrideCapability } from "./override.js";
import { patchCapability } from "./patch.js";

export { ANNOTATION_BACKUP_TAG } from "./annotation-removal.js";
export { COPY_BACKUP_TAG } from "./copy.js";
export { OVERRIDE_BACKUP_TAG } from "./override.js";

export function checkInstrumentation(
  operation: Instrumentation,
  context: OperationContext
): Promise<CheckState> {
  switch (operation.kind) {
    case "override":
      return overrideCapability.check(operation, context);
    case "patch":
      return patchCapability.check(operation, context);
    case "copy":
      return copyCapability.check(operation, context);
    case "annotationRemoval":
      return annotationRemovalCapability.check(operation, context);
    default: {
      const neverOperation: never = operation;
      throw new Error(`Unsupported instrumentation: ${String(neverOperation)}`);
    }
  }
}

export function applyInstrumentation(
  operation: Instrumentation,
  context: OperationContext
): Promise<void> {
  switch (operation.kind) {
    case "override":
      return overrideCapability.apply(operation, context);
    case "patch":
      return patchCapability.apply(operation, context);
    case "copy":
      return copyCapability.apply(operation, context);
    case "annotationRemoval":
      return annotationRemovalCapability.apply(operation, context);
    default: {
      const neverOperation: never = operation;
      throw new Error(`Unsupported instrumentation: ${String(neverOperation)}`);
    }
  }
}

export function revertInstrumentation(
  operation: Instrumentation,
  context: OperationContext
): Promise<void> {
  switch (operation.kind) {
    case "override":
      return overrideCapability.revert(operation, context);
    case "patch":
      return patchCapability.revert(operation, context);
    case "copy":
      return copyCapability.revert(operation, context);
    case "annotationRemoval":
      return annotationRemovalCapability.revert(operation, context);
    default: {
      const neverOperation: never = operation;
      throw new Error(`Unsupported instrumentation: ${String(neverOperation)}`);
    }
  }
}
