import { Command } from "commander";
import {
  createCliContainer,
  type CliContainer,
  type CliDependencies
} from "./container.js";
import { registerApplyCommand } from "./commands/apply.js";
import { registerRevertCommand } from "./commands/revert.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerInitCommand } from "./commands/init.js";

export function createProgram(dependencies: CliDependencies): Command {
  const container = createCliContainer(dependencies);
  const program = bootstrapProgram(container);

  if (dependencies.exitOverride ?? true) {
    applyExitOverride(program);
  }

  if (dependencies.suppressCommanderOutput) {
    suppressCommanderOutput(program);
  }

  return program;
}

function bootstrapProgram(container: CliContainer): Command {
  const program = new Command();
  program
    .name("cake-instrument")
    .description(
      "Apply, revert and inspect reversible instrumentation of a CakePHP tree."
    )
    .option("--webroot <dir>", "CakePHP webroot directory (defaults to the current directory).")
    .option("--config <file>", "Settings file (defaults to ./instrumentation.toml).")
    .option("--dry-run", "Simulate commands without writing changes.")
    .option("--verbose", "Log every instrumentation as it runs.")
    .option("--json", "Print results as JSON.");

  registerApplyCommand(program, container);
  registerRevertCommand(program, container);
  registerStatusCommand(program, container);
  registerInitCommand(program, container);

  return program;
}

export type { CliDependencies };

function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const child of command.commands) {
    applyExitOverride(child);
  }
}

function suppressCommanderOutput(command: Command): void {
  command.configureOutput({
    writeOut: () => {},
    writeErr: () => {}
  });
  for (const child of command.commands) {
    suppressCommanderOutput(child);
  }
}
