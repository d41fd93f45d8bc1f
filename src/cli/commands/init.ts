import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import { DetectionError, ValidationError } from "../errors.js";
import type { DetectedFramework } from "../../instrumentation/detection.js";
import { renderTemplate } from "../../utils/templates.js";
import { ensureParentDirectory, pathExists } from "../../utils/file-system.js";
import { DEFAULT_PATCH_DIR } from "../../utils/paths.js";
import {
  createExecutionResources,
  resolveCommandFlags,
  resolveWebrootDir
} from "./shared.js";

export const SETTINGS_TEMPLATE = "instrumentation.toml.hbs";

export interface InitCommandOptions {
  force?: boolean;
}

export function registerInitCommand(
  program: Command,
  container: CliContainer
): Command {
  return program
    .command("init")
    .description("Write a starter instrumentation.toml for the detected application.")
    .option("--force", "Overwrite an existing settings file.")
    .action(async (options: InitCommandOptions) => {
      await executeInit(program, container, options);
    });
}

export async function executeInit(
  program: Command,
  container: CliContainer,
  options: InitCommandOptions
): Promise<string> {
  const flags = resolveCommandFlags(program);
  const resources = createExecutionResources(container, flags, "init");
  const settingsPath = container.env.resolveSettingsPath(flags.config);

  if (!options.force && (await pathExists(container.fs, settingsPath))) {
    throw new ValidationError(
      `${settingsPath} already exists. Pass --force to overwrite it.`,
      { filePath: settingsPath }
    );
  }

  const webrootDir = resolveWebrootDir(container, flags);
  let detected: DetectedFramework | null = null;
  try {
    detected = await container.detector.detect(webrootDir);
  } catch (error) {
    if (!(error instanceof DetectionError)) {
      throw error;
    }
    resources.logger.warn(
      `${error.message} Fill in [target] by hand.`
    );
    container.errorLogger.logWarning(error.message, {
      ...error.context,
      operation: "init"
    });
  }

  const content = await renderTemplate(SETTINGS_TEMPLATE, {
    patchDir: DEFAULT_PATCH_DIR,
    detected: detected !== null,
    applicationDir: detected?.applicationDir,
    frameworkDir: detected?.frameworkDir,
    frameworkVersion: detected?.frameworkVersion
  });

  await ensureParentDirectory(resources.context.fs, settingsPath);
  await resources.context.fs.writeFile(settingsPath, content, {
    encoding: "utf8"
  });
  resources.context.complete({
    success: `Wrote ${settingsPath}.`,
    dry: `Dry run: would write ${settingsPath}.`
  });
  return content;
}
