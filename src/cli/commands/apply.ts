import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import type { OrchestrationSummary } from "../../instrumentation/orchestrator.js";
import { executeOrchestration } from "./shared.js";

export function registerApplyCommand(
  program: Command,
  container: CliContainer
): Command {
  return program
    .command("apply")
    .description("Apply every instrumentation that is not yet in place.")
    .action(async () => {
      await executeApply(program, container);
    });
}

export function executeApply(
  program: Command,
  container: CliContainer
): Promise<OrchestrationSummary> {
  return executeOrchestration(program, container, "apply");
}
