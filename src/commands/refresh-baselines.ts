import fs from "node:fs";
import path from "node:path";
import { findFiles } from "../fs/glob.js";
import { findBaselineProjects, filterProjects, resolveLayout, type RefreshLayout } from "../baseline/projects.js";
import { updateBaselineFromReports } from "../baseline/updater.js";
import { runInherited, type CommandRunner, type CommandSpec } from "../process/runner.js";
import type { RefreshConfig } from "../types/config.js";
import type { BaselineProject } from "../types/baseline.js";

export type ProjectRefresh = {
  project: string;
  baselineFile: string;
  deletedReports: number;
  testExitCode: number;
  /** Exit code of the updater task, or 0/1 for the in-process updater. */
  updateExitCode: number;
  reportFiles: string[];
};

export type RefreshResult = { ok: true; projects: ProjectRefresh[] };

export type RefreshOptions = {
  /** Project names to refresh; empty refreshes every discovered project. */
  projects: string[];
  config: RefreshConfig;
  layout?: RefreshLayout;
  runner?: CommandRunner;
  log?: (line: string) => void;
  warn?: (line: string) => void;
};

/** Build the `--args` value for the updater task: quoted report paths, then the baseline file. */
export function updaterArgs(reportFiles: string[], baselineFile: string): string {
  const reports = reportFiles.map((f) => `'${f}'`).join(" ");
  return `--args=${reports} --baseline-file '${baselineFile}'`;
}

/**
 * Regenerate baseline files: for each project wipe its old test reports and
 * baseline, rerun its tests and rebuild the baseline from the new reports.
 *
 * Exit codes of the test and updater runs are recorded but never stop the loop;
 * a failing project still leaves the remaining ones to be refreshed.
 */
export async function refreshBaselines(opts: RefreshOptions): Promise<RefreshResult> {
  const { config } = opts;
  const layout = opts.layout ?? resolveLayout(config);
  const runner = opts.runner ?? runInherited;
  const log = opts.log ?? ((line: string) => console.log(line));
  const warn = opts.warn ?? ((line: string) => console.error(line));

  const projects = filterProjects(findBaselineProjects(layout.metalavaDir, config), opts.projects);

  const refreshed: ProjectRefresh[] = [];
  for (const project of projects) {
    refreshed.push(await refreshProject(project, { config, layout, runner, log, warn }));
  }
  return { ok: true, projects: refreshed };
}

type RefreshContext = {
  config: RefreshConfig;
  layout: RefreshLayout;
  runner: CommandRunner;
  log: (line: string) => void;
  warn: (line: string) => void;
};

async function refreshProject(project: BaselineProject, ctx: RefreshContext): Promise<ProjectRefresh> {
  const { config, layout, runner, log, warn } = ctx;
  const { name, baselineFile } = project;
  const testReportsDir = path.join(layout.metalavaOutDir, name, config.test_results_dir);

  log(`Deleting test report files for ${name}`);
  const staleReports = findFiles(testReportsDir, config.test_report_pattern);
  for (const f of staleReports) fs.unlinkSync(f);

  log(`Deleting baseline file - ${baselineFile}`);
  fs.rmSync(baselineFile, { force: true });

  log(`Running all tests in ${name}`);
  const test: CommandSpec = {
    command: config.gradle_wrapper,
    args: [`:${name}:test`, "--continue"],
    cwd: layout.metalavaDir,
  };
  const { exitCode: testExitCode } = await runner(test);
  if (testExitCode !== 0) {
    warn(`Tests in ${name} exited with code ${testExitCode}`);
  }

  log(`Updating baseline file - ${baselineFile}`);
  const reportFiles = findFiles(testReportsDir, config.test_report_pattern);
  const updateExitCode =
    config.baseline_updater === "builtin"
      ? updateInProcess(reportFiles, baselineFile, warn)
      : await updateWithGradle(reportFiles, baselineFile, ctx);

  return {
    project: name,
    baselineFile,
    deletedReports: staleReports.length,
    testExitCode,
    updateExitCode,
    reportFiles,
  };
}

async function updateWithGradle(reportFiles: string[], baselineFile: string, ctx: RefreshContext): Promise<number> {
  const update: CommandSpec = {
    command: ctx.config.gradle_wrapper,
    args: [ctx.config.updater_task, updaterArgs(reportFiles, baselineFile)],
    cwd: ctx.layout.metalavaDir,
  };
  const { exitCode } = await ctx.runner(update);
  if (exitCode !== 0) {
    ctx.warn(`Updating ${baselineFile} exited with code ${exitCode}`);
  }
  return exitCode;
}

function updateInProcess(reportFiles: string[], baselineFile: string, warn: (line: string) => void): number {
  try {
    updateBaselineFromReports(reportFiles, baselineFile);
    return 0;
  } catch (err) {
    warn(`Updating ${baselineFile} failed: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
