import { describe, it, expect } from "vitest";
import {
  loadInstrumentationSettings,
  materializeDeclaredInstrumentations
} from "../src/settings/instrumentation-settings.js";
import { ConfigurationError } from "../src/cli/errors.js";
import {
  APP_DIR,
  FRAMEWORK_DIR,
  PROJECT_ROOT,
  WEBROOT_DIR,
  cakeProjectFiles,
  createMemoryFs,
  createProjectContext
} from "./test-helpers.js";

const settingsPath = `${PROJECT_ROOT}/instrumentation.toml`;

const fullSettings = [
  'patch_dir = "res"',
  "",
  "[target]",
  'framework_version = "4.5.1"',
  'app_dir = "src"',
  "",
  "[[overrides]]",
  'path = "${WEBROOT_DIR}/index.php"',
  'content = "<?php // instrumented"',
  'label = "Front controller"',
  "",
  "[[overrides]]",
  'path = "${APP_DIR}/Config/app_local.php"',
  'source = "overrides/app_local.php"',
  "",
  "[[patches]]",
  'patch = "patches/Dispatcher.php.patch"',
  'original = "${CAKEPHP_PATH}/src/Routing/Dispatcher.php"',
  "",
  "[[copies]]",
  'src = "stubs/tracer.php"',
  'dst = "${WEBROOT_DIR}/tracer.php"',
  "",
  "[[remove_annotations]]",
  'path = "${APP_DIR}/Controller/AppController.php"',
  "pattern = '#\\[\\\\ReturnTypeWillChange\\]\\s*'",
  'flags = "m"',
  ""
].join("\n");

async function loadFrom(content: string) {
  const { fs } = createMemoryFs({
    ...cakeProjectFiles(),
    [settingsPath]: content
  });
  return {
    fs,
    settings: await loadInstrumentationSettings(fs, settingsPath)
  };
}

async function expectInvalid(content: string, message: string): Promise<void> {
  const { fs } = createMemoryFs({ [settingsPath]: content });
  const result = loadInstrumentationSettings(fs, settingsPath);
  await expect(result).rejects.toBeInstanceOf(ConfigurationError);
  await expect(result).rejects.toThrow(
    `Invalid settings in ${settingsPath}: ${message}`
  );
}

describe("loadInstrumentationSettings", () => {
  it("reads every section and resolves paths against the settings file", async () => {
    const { settings } = await loadFrom(fullSettings);

    expect(settings.patchDir).toBe(`${PROJECT_ROOT}/res`);
    expect(settings.target).toEqual({
      applicationDir: APP_DIR,
      frameworkVersion: "4.5.1"
    });
    expect(settings.overrides).toHaveLength(2);
    expect(settings.patches).toEqual([
      {
        patch: "patches/Dispatcher.php.patch",
        original: "${CAKEPHP_PATH}/src/Routing/Dispatcher.php",
        label: undefined
      }
    ]);
    expect(settings.annotationRemovals[0]).toEqual({
      path: "${APP_DIR}/Controller/AppController.php",
      pattern: "#\\[\\\\ReturnTypeWillChange\\]\\s*",
      flags: "m",
      label: undefined
    });
  });

  it("defaults to an empty plan with the resources directory", async () => {
    const { settings } = await loadFrom("");

    expect(settings).toEqual({
      settingsPath,
      patchDir: `${PROJECT_ROOT}/resources`,
      target: {},
      overrides: [],
      patches: [],
      copies: [],
      annotationRemovals: []
    });
  });

  it("points at init when the file is missing", async () => {
    const { fs } = createMemoryFs({ [`${PROJECT_ROOT}/README.md`]: "" });

    await expect(loadInstrumentationSettings(fs, settingsPath)).rejects.toThrow(
      `Settings file ${settingsPath} not found. Run "cake-instrument init" to create one.`
    );
  });

  it("wraps TOML syntax errors", async () => {
    const { fs } = createMemoryFs({ [settingsPath]: "patch_dir = \n" });

    await expect(loadInstrumentationSettings(fs, settingsPath)).rejects.toThrow(
      `Failed to parse ${settingsPath}:`
    );
  });

  it("rejects values of the wrong type", async () => {
    await expectInvalid("patch_dir = 3\n", "patch_dir must be a string.");
    await expectInvalid(
      'overrides = "index.php"\n',
      "overrides must be an array of tables ([[overrides]])."
    );
  });

  it("requires exactly one override content source", async () => {
    await expectInvalid(
      '[[overrides]]\npath = "/srv/a.php"\ncontent = "a"\nsource = "b.php"\n',
      'overrides[0] needs exactly one of "content" or "source".'
    );
  });

  it("requires the keys of every entry", async () => {
    await expectInvalid(
      '[[patches]]\npatch = "a.patch"\n',
      "patches[0].original is required."
    );
  });

  it("rejects annotation patterns that do not compile", async () => {
    const { fs } = createMemoryFs({
      [settingsPath]: '[[remove_annotations]]\npath = "/srv/a.php"\npattern = "(["\n'
    });

    await expect(loadInstrumentationSettings(fs, settingsPath)).rejects.toThrow(
      /remove_annotations\[0\]\.pattern: Invalid regular expression/
    );
  });
});

describe("materializeDeclaredInstrumentations", () => {
  it("expands placeholders into concrete operations", async () => {
    const { fs, settings } = await loadFrom(fullSettings);
    const context = await createProjectContext(fs);

    const declared = materializeDeclaredInstrumentations(settings, context);

    expect(declared.overrides).toEqual([
      {
        kind: "override",
        targetPath: `${WEBROOT_DIR}/index.php`,
        content: { type: "inline", value: "<?php // instrumented" },
        label: "Front controller"
      },
      {
        kind: "override",
        targetPath: `${APP_DIR}/Config/app_local.php`,
        content: { type: "file", path: `${PROJECT_ROOT}/overrides/app_local.php` },
        label: undefined
      }
    ]);
    expect(declared.patches).toEqual([
      {
        kind: "patch",
        patchFile: `${PROJECT_ROOT}/patches/Dispatcher.php.patch`,
        originalFile: `${FRAMEWORK_DIR}/src/Routing/Dispatcher.php`,
        label: undefined
      }
    ]);
    expect(declared.copies).toEqual([
      {
        kind: "copy",
        sourcePath: `${PROJECT_ROOT}/stubs/tracer.php`,
        destinationPath: `${WEBROOT_DIR}/tracer.php`,
        label: undefined
      }
    ]);
    expect(declared.annotationRemovals).toHaveLength(1);
    expect(declared.annotationRemovals[0].targetPath).toBe(
      `${APP_DIR}/Controller/AppController.php`
    );
    expect(declared.annotationRemovals[0].annotationPattern.flags).toBe("gm");
  });

  it("rejects unknown placeholders", async () => {
    const { fs, settings } = await loadFrom(
      '[[copies]]\nsrc = "a.php"\ndst = "${DOCROOT}/a.php"\n'
    );
    const context = await createProjectContext(fs);

    expect(() => materializeDeclaredInstrumentations(settings, context)).toThrow(
      `Unknown placeholder \${DOCROOT} in ${settingsPath}. Known placeholders: \${APP_DIR}, \${CAKEPHP_PATH}, \${WEBROOT_DIR}.`
    );
  });

  it("requires absolute targets after expansion", async () => {
    const { fs, settings } = await loadFrom(
      '[[copies]]\nsrc = "a.php"\ndst = "webroot/a.php"\n'
    );
    const context = await createProjectContext(fs);

    expect(() => materializeDeclaredInstrumentations(settings, context)).toThrow(
      `Invalid settings in ${settingsPath}: copies[0].dst must be an absolute path, got "webroot/a.php".`
    );
  });
});
