import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import {
  GROUP_TITLES,
  countInstrumentations
} from "../../instrumentation/instrumentation-set.js";
import type { StatusReport } from "../../instrumentation/orchestrator.js";
import {
  createExecutionResources,
  emitJson,
  prepareOrchestration,
  reportFailures,
  resolveCommandFlags,
  serializeFailure
} from "./shared.js";

export function registerStatusCommand(
  program: Command,
  container: CliContainer
): Command {
  return program
    .command("status")
    .description("Report applied and unapplied instrumentations per group.")
    .action(async () => {
      await executeStatus(program, container);
    });
}

export async function executeStatus(
  program: Command,
  container: CliContainer
): Promise<StatusReport> {
  const flags = resolveCommandFlags(program);
  const resources = createExecutionResources(container, flags, "status");
  const { plan, orchestrator } = await prepareOrchestration(
    container,
    flags,
    resources
  );
  const report = await orchestrator.status();

  if (flags.json) {
    emitJson(container, {
      frameworkVersion: plan.context.frameworkVersion,
      groups: report.groups,
      failures: report.failures.map(serializeFailure)
    });
  } else {
    resources.logger.verbose(
      `${countInstrumentations(plan.set)} instrumentation(s) for CakePHP ${plan.context.frameworkVersion}`
    );
    resources.logger.info("Applied / Unapplied");
    for (const group of report.groups) {
      resources.logger.info(
        `${GROUP_TITLES[group.group]}: ${group.applied}/${group.unapplied}`
      );
    }
  }

  reportFailures(container, resources, report.failures, "status", {
    quiet: flags.json
  });
  return report;
}
