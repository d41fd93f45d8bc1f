/**
 * Central location for the path constants used across the application.
 */

/**
 * The directory under the home directory where the tool keeps its own files.
 */
export const TOOL_HOME_DIR = ".cake-instrument";

/**
 * The relative path segments from the home directory to the log directory.
 * Usage: path.join(homeDir, ...LOG_DIR_SEGMENTS)
 */
export const LOG_DIR_SEGMENTS = [TOOL_HOME_DIR, "logs"] as const;

/**
 * The settings file looked up in the working directory when none is given.
 */
export const DEFAULT_SETTINGS_FILENAME = "instrumentation.toml";

/**
 * Environment variable naming a settings file.
 */
export const SETTINGS_PATH_VARIABLE = "CAKE_INSTRUMENT_CONFIG";

/**
 * Base resource directory, relative to the settings file, when `patch_dir` is absent.
 */
export const DEFAULT_PATCH_DIR = "resources";
