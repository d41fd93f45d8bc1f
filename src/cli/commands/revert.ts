import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import type { OrchestrationSummary } from "../../instrumentation/orchestrator.js";
import { executeOrchestration } from "./shared.js";

export function registerRevertCommand(
  program: Command,
  container: CliContainer
): Command {
  return program
    .command("revert")
    .description("Restore every applied instrumentation to the original tree.")
    .action(async () => {
      await executeRevert(program, container);
    });
}

export function executeRevert(
  program: Command,
  container: CliContainer
): Promise<OrchestrationSummary> {
  return executeOrchestration(program, container, "revert");
}
