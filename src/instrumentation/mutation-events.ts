import type { ScopedLogger } from "../cli/logger.js";
import { describeError } from "../cli/errors.js";
import type {
  InstrumentationLogDetails,
  InstrumentationObservers
} from "./batch.js";

export function createMutationReporter(
  logger: ScopedLogger
): InstrumentationObservers {
  return {
    onStart(details) {
      logger.verbose(`Starting ${details.action}: ${details.label}`);
    },
    onComplete(details) {
      logger.verbose(formatCompletion(details));
    },
    onError(details, error) {
      logger.verbose(`${details.label} failed: ${describeError(error)}`);
    }
  };
}

export function combineMutationObservers(
  ...observers: Array<InstrumentationObservers | undefined>
): InstrumentationObservers | undefined {
  const active = observers.filter(
    (observer): observer is InstrumentationObservers => observer != null
  );
  if (active.length === 0) {
    return undefined;
  }
  return {
    onStart(details) {
      for (const observer of active) {
        observer.onStart?.(details);
      }
    },
    onComplete(details) {
      for (const observer of active) {
        observer.onComplete?.(details);
      }
    },
    onError(details, error) {
      for (const observer of active) {
        observer.onError?.(details, error);
      }
    }
  };
}

function formatCompletion(details: InstrumentationLogDetails): string {
  const verb = details.action === "revert" ? "reverted" : "applied";
  return `${details.label}: ${verb}`;
}
