import fs from "node:fs";
import { updateBaselineFromReports, type BaselineUpdateSummary } from "../baseline/updater.js";

export type UpdateBaselineResult =
  | { ok: true; summary: BaselineUpdateSummary }
  | { ok: false; error: string };

/**
 * Update a model test suite baseline file from the test reports Gradle wrote
 * while running the suite.
 */
export function updateBaseline(opts: { reportFiles: string[]; baselineFile: string }): UpdateBaselineResult {
  if (opts.reportFiles.length === 0) {
    return { ok: false, error: "At least one test report file is required" };
  }

  const missing = opts.reportFiles.filter((f) => !fs.existsSync(f));
  if (missing.length > 0) {
    return { ok: false, error: `Test report not found: ${missing.join(", ")}` };
  }

  if (fs.existsSync(opts.baselineFile) && fs.statSync(opts.baselineFile).isDirectory()) {
    return { ok: false, error: `Baseline file is a directory: ${opts.baselineFile}` };
  }

  try {
    return { ok: true, summary: updateBaselineFromReports(opts.reportFiles, opts.baselineFile) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
