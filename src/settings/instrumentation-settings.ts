import path from "node:path";
import { ConfigurationError, describeError } from "../cli/errors.js";
import type { DetectionOverrides } from "../instrumentation/detection.js";
import {
  annotationRemovalInstrumentation,
  copyInstrumentation,
  overrideInstrumentation,
  patchInstrumentation,
  type AnnotationRemovalInstrumentation,
  type CopyInstrumentation,
  type OverrideInstrumentation,
  type PatchInstrumentation
} from "../instrumentation/operation.js";
import type { TargetContext } from "../instrumentation/target-context.js";
import { readFileIfExists, type FileSystem } from "../utils/file-system.js";
import { DEFAULT_PATCH_DIR } from "../utils/paths.js";
import {
  isTomlTable,
  isTomlTableArray,
  parseTomlDocument,
  type TomlTable
} from "../utils/toml.js";

export interface DeclaredOverride {
  path: string;
  content?: string;
  source?: string;
  label?: string;
}

export interface DeclaredPatch {
  patch: string;
  original: string;
  label?: string;
}

export interface DeclaredCopy {
  src: string;
  dst: string;
  label?: string;
}

export interface DeclaredAnnotationRemoval {
  path: string;
  pattern: string;
  flags?: string;
  label?: string;
}

export interface InstrumentationSettings {
  settingsPath: string;
  /** Absolute base resource directory. */
  patchDir: string;
  target: DetectionOverrides;
  overrides: DeclaredOverride[];
  patches: DeclaredPatch[];
  copies: DeclaredCopy[];
  annotationRemovals: DeclaredAnnotationRemoval[];
}

export interface DeclaredInstrumentations {
  overrides: OverrideInstrumentation[];
  patches: PatchInstrumentation[];
  copies: CopyInstrumentation[];
  annotationRemovals: AnnotationRemovalInstrumentation[];
}

export const SETTINGS_PLACEHOLDERS = ["APP_DIR", "CAKEPHP_PATH", "WEBROOT_DIR"] as const;

export type SettingsPlaceholder = (typeof SETTINGS_PLACEHOLDERS)[number];

const PLACEHOLDER_PATTERN = /\$\{([^}]*)\}/g;

export async function loadInstrumentationSettings(
  fs: FileSystem,
  settingsPath: string
): Promise<InstrumentationSettings> {
  const absolute = path.resolve(settingsPath);
  const content = await readFileIfExists(fs, absolute);
  if (content === null) {
    throw new ConfigurationError(
      `Settings file ${absolute} not found. Run "cake-instrument init" to create one.`,
      { filePath: absolute }
    );
  }

  let document: TomlTable;
  try {
    document = parseTomlDocument(content);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${absolute}: ${describeError(error)}`,
      { filePath: absolute }
    );
  }

  return parseInstrumentationSettings(document, absolute);
}

export function parseInstrumentationSettings(
  document: TomlTable,
  settingsPath: string
): InstrumentationSettings {
  const reader = new SettingsReader(settingsPath);
  const baseDir = path.dirname(settingsPath);

  const patchDir = reader.optionalString(document, "patch_dir");
  const target = reader.optionalTable(document, "target");

  return {
    settingsPath,
    patchDir: path.resolve(baseDir, patchDir ?? DEFAULT_PATCH_DIR),
    target: target ? readTargetOverrides(reader, target, baseDir) : {},
    overrides: reader.tables(document, "overrides").map((table, index) => {
      const where = `overrides[${index}]`;
      const override: DeclaredOverride = {
        path: reader.requiredString(table, "path", where),
        content: reader.optionalString(table, "content", where),
        source: reader.optionalString(table, "source", where),
        label: reader.optionalString(table, "label", where)
      };
      if ((override.content === undefined) === (override.source === undefined)) {
        throw reader.invalid(`${where} needs exactly one of "content" or "source".`);
      }
      return override;
    }),
    patches: reader.tables(document, "patches").map((table, index) => {
      const where = `patches[${index}]`;
      return {
        patch: reader.requiredString(table, "patch", where),
        original: reader.requiredString(table, "original", where),
        label: reader.optionalString(table, "label", where)
      };
    }),
    copies: reader.tables(document, "copies").map((table, index) => {
      const where = `copies[${index}]`;
      return {
        src: reader.requiredString(table, "src", where),
        dst: reader.requiredString(table, "dst", where),
        label: reader.optionalString(table, "label", where)
      };
    }),
    annotationRemovals: reader
      .tables(document, "remove_annotations")
      .map((table, index) => {
        const where = `remove_annotations[${index}]`;
        const removal: DeclaredAnnotationRemoval = {
          path: reader.requiredString(table, "path", where),
          pattern: reader.requiredString(table, "pattern", where),
          flags: reader.optionalString(table, "flags", where),
          label: reader.optionalString(table, "label", where)
        };
        try {
          new RegExp(removal.pattern, removal.flags);
        } catch (error) {
          throw reader.invalid(`${where}.pattern: ${describeError(error)}`);
        }
        return removal;
      })
  };
}

/**
 * Turns declared entries into operations for one Target Context. Resource
 * paths resolve against the settings directory; targets must be absolute once
 * placeholders are expanded.
 */
export function materializeDeclaredInstrumentations(
  settings: InstrumentationSettings,
  context: TargetContext
): DeclaredInstrumentations {
  const baseDir = path.dirname(settings.settingsPath);
  const resource = (value: string): string =>
    path.resolve(baseDir, expandPlaceholders(value, context, settings.settingsPath));
  const target = (value: string, where: string): string => {
    const expanded = expandPlaceholders(value, context, settings.settingsPath);
    if (!path.isAbsolute(expanded)) {
      throw new ConfigurationError(
        `Invalid settings in ${settings.settingsPath}: ${where} must be an absolute path, got "${expanded}".`,
        { filePath: settings.settingsPath }
      );
    }
    return path.normalize(expanded);
  };

  return {
    overrides: settings.overrides.map((entry, index) =>
      overrideInstrumentation({
        target: target(entry.path, `overrides[${index}].path`),
        content: entry.content,
        source: entry.source === undefined ? undefined : resource(entry.source),
        label: entry.label
      })
    ),
    patches: settings.patches.map((entry, index) =>
      patchInstrumentation({
        patch: resource(entry.patch),
        original: target(entry.original, `patches[${index}].original`),
        label: entry.label
      })
    ),
    copies: settings.copies.map((entry, index) =>
      copyInstrumentation({
        src: resource(entry.src),
        dst: target(entry.dst, `copies[${index}].dst`),
        label: entry.label
      })
    ),
    annotationRemovals: settings.annotationRemovals.map((entry, index) =>
      annotationRemovalInstrumentation({
        target: target(entry.path, `remove_annotations[${index}].path`),
        pattern: entry.pattern,
        flags: entry.flags,
        label: entry.label
      })
    )
  };
}

export function placeholderValues(
  context: TargetContext
): Record<SettingsPlaceholder, string> {
  return {
    APP_DIR: context.applicationDir,
    CAKEPHP_PATH: context.frameworkDir,
    WEBROOT_DIR: context.webrootDir
  };
}

export function expandPlaceholders(
  value: string,
  context: TargetContext,
  settingsPath: string
): string {
  const values = placeholderValues(context);
  return value.replace(PLACEHOLDER_PATTERN, (match, name: string) => {
    if (!isSettingsPlaceholder(name)) {
      throw new ConfigurationError(
        `Unknown placeholder ${match} in ${settingsPath}. Known placeholders: ${SETTINGS_PLACEHOLDERS.map((entry) => `\${${entry}}`).join(", ")}.`,
        { filePath: settingsPath }
      );
    }
    return values[name];
  });
}

function isSettingsPlaceholder(name: string): name is SettingsPlaceholder {
  return SETTINGS_PLACEHOLDERS.some((entry) => entry === name);
}

function readTargetOverrides(
  reader: SettingsReader,
  table: TomlTable,
  baseDir: string
): DetectionOverrides {
  const appDir = reader.optionalString(table, "app_dir", "target");
  const frameworkDir = reader.optionalString(table, "framework_dir", "target");
  const frameworkVersion = reader.optionalString(table, "framework_version", "target");
  const overrides: DetectionOverrides = {};
  if (appDir !== undefined) {
    overrides.applicationDir = path.resolve(baseDir, appDir);
  }
  if (frameworkDir !== undefined) {
    overrides.frameworkDir = path.resolve(baseDir, frameworkDir);
  }
  if (frameworkVersion !== undefined) {
    overrides.frameworkVersion = frameworkVersion;
  }
  return overrides;
}

class SettingsReader {
  constructor(private readonly settingsPath: string) {}

  invalid(detail: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid settings in ${this.settingsPath}: ${detail}`,
      { filePath: this.settingsPath }
    );
  }

  optionalString(table: TomlTable, key: string, where?: string): string | undefined {
    const value = table[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== "string") {
      throw this.invalid(`${where ? `${where}.${key}` : key} must be a string.`);
    }
    return value;
  }

  requiredString(table: TomlTable, key: string, where: string): string {
    const value = this.optionalString(table, key, where);
    if (value === undefined || value.length === 0) {
      throw this.invalid(`${where}.${key} is required.`);
    }
    return value;
  }

  optionalTable(table: TomlTable, key: string): TomlTable | undefined {
    const value = table[key];
    if (value === undefined) {
      return undefined;
    }
    if (!isTomlTable(value)) {
      throw this.invalid(`[${key}] must be a table.`);
    }
    return value;
  }

  tables(table: TomlTable, key: string): TomlTable[] {
    const value = table[key];
    if (value === undefined) {
      return [];
    }
    if (!isTomlTableArray(value)) {
      throw this.invalid(`${key} must be an array of tables ([[${key}]]).`);
    }
    return value;
  }
}
