import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import type { CommandContext } from "../context.js";
import type { ScopedLogger } from "../logger.js";
import {
  CliError,
  MutationError,
  ResolutionError,
  extractErrorContext
} from "../errors.js";
import {
  loadInstrumentationPlan,
  type InstrumentationPlan
} from "../../instrumentation/plan.js";
import {
  createOrchestrator,
  type OrchestrationFailure,
  type OrchestrationSummary,
  type Orchestrator
} from "../../instrumentation/orchestrator.js";
import { GROUP_TITLES } from "../../instrumentation/instrumentation-set.js";
import type { InstrumentationAction } from "../../instrumentation/batch.js";
import {
  combineMutationObservers,
  createMutationReporter
} from "../../instrumentation/mutation-events.js";

export interface CommandFlags {
  dryRun: boolean;
  verbose: boolean;
  json: boolean;
  webroot?: string;
  config?: string;
}

export interface ExecutionResources {
  logger: ScopedLogger;
  context: CommandContext;
}

export interface PreparedOrchestration {
  plan: InstrumentationPlan;
  orchestrator: Orchestrator;
}

export function resolveCommandFlags(program: Command): CommandFlags {
  const opts = program.optsWithGlobals();
  return {
    dryRun: Boolean(opts.dryRun),
    verbose: Boolean(opts.verbose),
    json: Boolean(opts.json),
    webroot: typeof opts.webroot === "string" ? opts.webroot : undefined,
    config: typeof opts.config === "string" ? opts.config : undefined
  };
}

export function createExecutionResources(
  container: CliContainer,
  flags: CommandFlags,
  scope: string
): ExecutionResources {
  const baseLogger = container.loggerFactory.create({
    dryRun: flags.dryRun,
    verbose: flags.verbose,
    scope
  });
  const context = container.contextFactory.create({
    dryRun: flags.dryRun,
    logger: baseLogger
  });

  return {
    logger: baseLogger,
    context
  };
}

export function resolveWebrootDir(
  container: CliContainer,
  flags: CommandFlags
): string {
  return container.env.resolveCwdPath(flags.webroot ?? ".");
}

export async function prepareOrchestration(
  container: CliContainer,
  flags: CommandFlags,
  resources: ExecutionResources
): Promise<PreparedOrchestration> {
  const plan = await loadInstrumentationPlan({
    fs: resources.context.fs,
    detector: container.detector,
    settingsPath: container.env.resolveSettingsPath(flags.config),
    webrootDir: resolveWebrootDir(container, flags)
  });
  resources.logger.verbose(
    `CakePHP ${plan.context.frameworkVersion} at ${plan.context.frameworkDir}`
  );
  resources.logger.verbose(`Application: ${plan.context.applicationDir}`);
  resources.logger.verbose(`Webroot: ${plan.context.webrootDir}`);

  const orchestrator = createOrchestrator({
    set: plan.set,
    context: { fs: resources.context.fs, timestamp: container.timestamp },
    rejected: plan.rejected,
    observers: combineMutationObservers(
      createMutationReporter(resources.logger),
      container.observers
    )
  });
  return { plan, orchestrator };
}

export function describeFailure(failure: OrchestrationFailure): string {
  if (failure instanceof ResolutionError) {
    return `rejected ${failure.resourcePath}: ${failure.message}`;
  }
  return `${failure.action} ${failure.kind} ${failure.targetPath}: ${failure.message}`;
}

export function serializeFailure(
  failure: OrchestrationFailure
): Record<string, string> {
  if (failure instanceof MutationError) {
    return {
      type: "mutation",
      action: failure.action,
      kind: failure.kind,
      targetPath: failure.targetPath,
      message: failure.message
    };
  }
  return {
    type: "resolution",
    resourcePath: failure.resourcePath,
    root: failure.root,
    message: failure.message
  };
}

/**
 * Prints one line per failure, records them in the error log and fails the
 * command when there were any.
 */
export function reportFailures(
  container: CliContainer,
  resources: ExecutionResources,
  failures: readonly OrchestrationFailure[],
  operation: string,
  options: { quiet?: boolean } = {}
): void {
  if (failures.length === 0) {
    return;
  }
  if (!options.quiet) {
    for (const failure of failures) {
      resources.logger.error(describeFailure(failure));
    }
  }
  container.errorLogger.logFailures([...failures], operation, extractErrorContext);
  throw new CliError(
    `${failures.length} instrumentation failure(s) during ${operation}. See ${container.errorLogger.filePath} for details.`,
    { operation },
    { isUserError: true }
  );
}

export function emitJson(container: CliContainer, value: unknown): void {
  container.loggerFactory.base(JSON.stringify(value, null, 2));
}

export function totalChanged(summary: OrchestrationSummary): number {
  return summary.groups.reduce((total, outcome) => total + outcome.changed, 0);
}

export function renderSummaryLines(summary: OrchestrationSummary): string[] {
  const verb = summary.action === "apply" ? "applied" : "reverted";
  return summary.groups.map(
    (outcome) => `${GROUP_TITLES[outcome.group]} ${verb}: ${outcome.changed}`
  );
}

export function serializeSummary(summary: OrchestrationSummary): unknown {
  return {
    action: summary.action,
    result: summary.result,
    aborted: summary.aborted,
    groups: summary.groups,
    failures: summary.failures.map(serializeFailure)
  };
}

/**
 * Shared body of `apply` and `revert`: plan, run, print counts, then fail the
 * command when anything was recorded.
 */
export async function executeOrchestration(
  program: Command,
  container: CliContainer,
  action: InstrumentationAction
): Promise<OrchestrationSummary> {
  const flags = resolveCommandFlags(program);
  const resources = createExecutionResources(container, flags, action);
  const { orchestrator } = await prepareOrchestration(container, flags, resources);

  const runOptions = { signal: container.signal, verify: !flags.dryRun };
  const summary =
    action === "apply"
      ? await orchestrator.apply(runOptions)
      : await orchestrator.revert(runOptions);

  if (flags.json) {
    emitJson(container, serializeSummary(summary));
  } else {
    for (const line of renderSummaryLines(summary)) {
      resources.logger.info(line);
    }
    if (summary.aborted) {
      resources.logger.warn("Interrupted; remaining instrumentations were skipped.");
    } else if (flags.dryRun || summary.failures.length === 0) {
      const verb = action === "apply" ? "applied" : "reverted";
      resources.context.complete({
        success: `Instrumentation ${verb}.`,
        dry: `Dry run: would ${action} ${totalChanged(summary)} instrumentation(s).`
      });
    }
  }

  reportFailures(container, resources, summary.failures, action, {
    quiet: flags.json
  });
  return summary;
}
