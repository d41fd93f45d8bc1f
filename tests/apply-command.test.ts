import { describe, it, expect, vi, afterEach } from "vitest";
import {
  APP_DIR,
  ERROR_LOG_PATH,
  FRAMEWORK_DIR,
  PROJECT_ROOT,
  SETTINGS_PATH,
  WEBROOT_DIR,
  cakeProjectFiles,
  createCliHarness,
  createTestProgram
} from "./test-helpers.js";
import { resolveCommandFlags } from "../src/cli/commands/shared.js";
import { CliError } from "../src/cli/errors.js";

const dispatcherPath = `${FRAMEWORK_DIR}/src/Routing/Dispatcher.php`;
const controllerPath = `${APP_DIR}/Controller/AppController.php`;
const versionResources = `${PROJECT_ROOT}/resources/cakephp/4`;

const settings = [
  'patch_dir = "resources"',
  "",
  "[[copies]]",
  'src = "stubs/tracer.php"',
  'dst = "${WEBROOT_DIR}/tracer.php"',
  ""
].join("\n");

const dispatcherPatch = [
  "--- a/src/Routing/Dispatcher.php",
  "+++ b/src/Routing/Dispatcher.php",
  "@@ -3,6 +3,7 @@",
  " {",
  "     public function dispatch()",
  "     {",
  "+        instrumentation_hook();",
  "         return $this->run();",
  "     }",
  " }",
  ""
].join("\n");

const stalePatch = [
  "--- a/Controller/AppController.php",
  "+++ b/Controller/AppController.php",
  "@@ -1,3 +1,3 @@",
  " <?php",
  "-class LegacyController",
  "+class InstrumentedController",
  " {",
  ""
].join("\n");

function projectFiles(extra: Record<string, string> = {}) {
  return {
    ...cakeProjectFiles(),
    [SETTINGS_PATH]: settings,
    [`${PROJECT_ROOT}/resources/stubs/tracer.php`]: "<?php tracer();\n",
    [`${versionResources}/CAKEPHP_PATH/src/Routing/Dispatcher.php.patch`]:
      dispatcherPatch,
    ...extra
  };
}

describe("apply command", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies declared and discovered instrumentations", async () => {
    const harness = createCliHarness(projectFiles());

    await harness.run(["--webroot", "webroot", "apply"]);

    expect(harness.logs).toEqual([
      "[apply] Overrides applied: 0",
      "[apply] Patches applied: 1",
      "[apply] Copies applied: 1",
      "[apply] Annotation removals applied: 0",
      "[apply] Instrumentation applied."
    ]);
    expect(harness.memory.read(`${WEBROOT_DIR}/tracer.php`)).toBe(
      "<?php tracer();\n"
    );
    expect(harness.memory.read(dispatcherPath)).toContain(
      "        instrumentation_hook();\n"
    );
  });

  it("changes nothing on a second run", async () => {
    const harness = createCliHarness(projectFiles());

    await harness.run(["--webroot", "webroot", "apply"]);
    harness.logs.length = 0;
    await harness.run(["--webroot", "webroot", "apply"]);

    expect(harness.logs.slice(0, 4)).toEqual([
      "[apply] Overrides applied: 0",
      "[apply] Patches applied: 0",
      "[apply] Copies applied: 0",
      "[apply] Annotation removals applied: 0"
    ]);
  });

  it("logs each mutation in verbose mode", async () => {
    const harness = createCliHarness(projectFiles());

    await harness.run(["--webroot", "webroot", "--verbose", "apply"]);

    expect(harness.logs.slice(0, 3)).toEqual([
      `[apply] CakePHP 4.4.17 at ${FRAMEWORK_DIR}`,
      `[apply] Application: ${APP_DIR}`,
      `[apply] Webroot: ${WEBROOT_DIR}`
    ]);
    expect(harness.logs).toContain(
      `[apply] Starting apply: Copy tracer.php to ${WEBROOT_DIR}/tracer.php`
    );
    expect(harness.logs).toContain(
      `[apply] Copy tracer.php to ${WEBROOT_DIR}/tracer.php: applied`
    );
  });

  it("previews changes without writing in dry-run mode", async () => {
    const harness = createCliHarness(projectFiles());
    const dispatcherBefore = harness.memory.read(dispatcherPath);

    await harness.run(["--webroot", "webroot", "--dry-run", "apply"]);

    expect(harness.logs).toContain(
      "[apply] Dry run: would apply 2 instrumentation(s)."
    );
    expect(harness.logs).toContain(
      `[apply] cp ${PROJECT_ROOT}/resources/stubs/tracer.php ${WEBROOT_DIR}/tracer.php # copy`
    );
    expect(harness.memory.read(dispatcherPath)).toBe(dispatcherBefore);
    expect(harness.memory.exists(`${WEBROOT_DIR}/tracer.php`)).toBe(false);
  });

  it("reports failures, logs them and fails the command", async () => {
    const harness = createCliHarness(
      projectFiles({
        [`${versionResources}/APP_DIR/Controller/AppController.php.patch`]:
          stalePatch
      })
    );

    const failure = await harness
      .run(["--webroot", "webroot", "apply"])
      .then(
        () => null,
        (error: unknown) => error
      );

    expect(failure).toBeInstanceOf(CliError);
    expect(failure).toMatchObject({
      message: `1 instrumentation failure(s) during apply. See ${ERROR_LOG_PATH} for details.`,
      isUserError: true
    });
    expect(harness.logs).toContain(
      `[apply] apply patch ${controllerPath}: Patch AppController.php.patch does not apply cleanly to ${controllerPath}.`
    );
    expect(harness.logs).toContain("[apply] Patches applied: 1");
    expect(harness.logs).not.toContain("[apply] Instrumentation applied.");
    expect(
      String(harness.errorLog.readFileSync(ERROR_LOG_PATH, "utf8"))
    ).toContain(
      `ERROR: Patch AppController.php.patch does not apply cleanly to ${controllerPath}.`
    );
  });

  it("prints a JSON summary", async () => {
    const harness = createCliHarness(projectFiles());

    await harness.run(["--webroot", "webroot", "--json", "apply"]);

    expect(harness.logs).toHaveLength(1);
    expect(JSON.parse(harness.logs[0])).toEqual({
      action: "apply",
      result: "complete",
      aborted: false,
      groups: [
        { group: "overrides", total: 0, alreadyInState: 0, changed: 0, failed: 0 },
        { group: "patches", total: 1, alreadyInState: 0, changed: 1, failed: 0 },
        { group: "copies", total: 1, alreadyInState: 0, changed: 1, failed: 0 },
        {
          group: "annotationRemovals",
          total: 0,
          alreadyInState: 0,
          changed: 0,
          failed: 0
        }
      ],
      failures: []
    });
  });

  it("skips remaining groups once interrupted", async () => {
    const controller = new AbortController();
    controller.abort();
    const harness = createCliHarness(projectFiles(), {
      signal: controller.signal
    });

    await harness.run(["--webroot", "webroot", "apply"]);

    expect(harness.logs.at(-1)).toBe(
      "[apply] Interrupted; remaining instrumentations were skipped."
    );
    expect(harness.memory.exists(`${WEBROOT_DIR}/tracer.php`)).toBe(false);
  });

  it("fails when the settings file is missing", async () => {
    const harness = createCliHarness(cakeProjectFiles());

    await expect(
      harness.run(["--webroot", "webroot", "apply"])
    ).rejects.toThrow(
      `Settings file ${SETTINGS_PATH} not found. Run "cake-instrument init" to create one.`
    );
  });

  it("leaves the annotated controller alone", async () => {
    const harness = createCliHarness(projectFiles());
    const before = harness.memory.read(controllerPath);

    await harness.run(["--webroot", "webroot", "apply"]);

    expect(harness.memory.read(controllerPath)).toBe(before);
  });
});

describe("revert command", () => {
  it("undoes a previous apply", async () => {
    const harness = createCliHarness(projectFiles());
    const dispatcherBefore = harness.memory.read(dispatcherPath);

    await harness.run(["--webroot", "webroot", "apply"]);
    harness.logs.length = 0;
    await harness.run(["--webroot", "webroot", "revert"]);

    expect(harness.logs).toEqual([
      "[revert] Annotation removals reverted: 0",
      "[revert] Overrides reverted: 0",
      "[revert] Patches reverted: 1",
      "[revert] Copies reverted: 1",
      "[revert] Instrumentation reverted."
    ]);
    expect(harness.memory.read(dispatcherPath)).toBe(dispatcherBefore);
    expect(harness.memory.exists(`${WEBROOT_DIR}/tracer.php`)).toBe(false);
  });
});

describe("global flags", () => {
  it("reads flags from the root command", () => {
    const program = createTestProgram([
      "node",
      "cli",
      "--dry-run",
      "--webroot",
      "public",
      "--config",
      "ci.toml"
    ]);

    expect(resolveCommandFlags(program)).toEqual({
      dryRun: true,
      verbose: false,
      json: false,
      webroot: "public",
      config: "ci.toml"
    });
  });
});
