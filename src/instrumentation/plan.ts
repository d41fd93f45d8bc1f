import path from "node:path";
import type { ResolutionError } from "../cli/errors.js";
import {
  loadInstrumentationSettings,
  materializeDeclaredInstrumentations,
  type InstrumentationSettings
} from "../settings/instrumentation-settings.js";
import type { FileSystem } from "../utils/file-system.js";
import { withDetectionOverrides, type FrameworkDetector } from "./detection.js";
import {
  buildInstrumentationSet,
  type InstrumentationSet
} from "./instrumentation-set.js";
import { resolveVersionResources } from "./resource-resolver.js";
import { createTargetContext, type TargetContext } from "./target-context.js";

export interface InstrumentationPlan {
  settings: InstrumentationSettings;
  context: TargetContext;
  set: InstrumentationSet;
  rejected: ResolutionError[];
}

export interface InstrumentationPlanInit {
  fs: FileSystem;
  detector: FrameworkDetector;
  settingsPath: string;
  webrootDir: string;
}

/**
 * Everything an orchestrator needs, computed once: settings, detected roots,
 * declared and discovered operations.
 */
export async function loadInstrumentationPlan(
  init: InstrumentationPlanInit
): Promise<InstrumentationPlan> {
  const settings = await loadInstrumentationSettings(init.fs, init.settingsPath);
  const webrootDir = path.resolve(init.webrootDir);
  const detected = await withDetectionOverrides(
    init.detector,
    settings.target
  ).detect(webrootDir);

  const context = await createTargetContext(init.fs, {
    ...detected,
    webrootDir
  });
  const declared = materializeDeclaredInstrumentations(settings, context);
  const discovered = await resolveVersionResources(
    init.fs,
    settings.patchDir,
    context
  );

  return {
    settings,
    context,
    set: buildInstrumentationSet({
      declared,
      discovered: { patches: discovered.patches, copies: discovered.copies }
    }),
    rejected: discovered.rejected
  };
}
