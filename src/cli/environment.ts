import path from "node:path";
import {
  DEFAULT_SETTINGS_FILENAME,
  LOG_DIR_SEGMENTS,
  SETTINGS_PATH_VARIABLE
} from "../utils/paths.js";

export interface CliEnvironmentInit {
  cwd: string;
  homeDir: string;
  platform?: NodeJS.Platform;
  variables?: Record<string, string | undefined>;
}

export interface CliEnvironment {
  readonly cwd: string;
  readonly homeDir: string;
  readonly platform: NodeJS.Platform;
  readonly logDir: string;
  readonly variables: Record<string, string | undefined>;
  resolveHomePath: (...segments: string[]) => string;
  resolveCwdPath: (target: string) => string;
  getVariable: (name: string) => string | undefined;
  resolveSettingsPath: (explicit?: string) => string;
}

export function createCliEnvironment(init: CliEnvironmentInit): CliEnvironment {
  const platform = init.platform ?? process.platform;
  const variables = init.variables ?? process.env;
  const logDir = resolveLogDir(init.homeDir);

  const resolveHomePath = (...segments: string[]): string =>
    path.join(init.homeDir, ...segments);

  const resolveCwdPath = (target: string): string =>
    path.resolve(init.cwd, target);

  const getVariable = (name: string): string | undefined => variables[name];

  const resolveSettingsPath = (explicit?: string): string => {
    const fromVariable = getVariable(SETTINGS_PATH_VARIABLE);
    const candidate =
      explicit ??
      (fromVariable && fromVariable.length > 0
        ? fromVariable
        : DEFAULT_SETTINGS_FILENAME);
    return resolveCwdPath(candidate);
  };

  return {
    cwd: init.cwd,
    homeDir: init.homeDir,
    platform,
    logDir,
    variables,
    resolveHomePath,
    resolveCwdPath,
    getVariable,
    resolveSettingsPath
  };
}

export function resolveLogDir(homeDir: string): string {
  return path.join(homeDir, ...LOG_DIR_SEGMENTS);
}
