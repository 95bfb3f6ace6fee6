import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { RefreshConfig } from "../types/config.js";
import type { BaselineProject } from "../types/baseline.js";

/** Directory layout the refresher works against. */
export type RefreshLayout = {
  /** Root of the Metalava checkout; contains one directory per Gradle project. */
  metalavaDir: string;
  /** Gradle build output for the checkout (`<out>/metalava`). */
  metalavaOutDir: string;
};

/** Root of this package, two levels above a module in src/<dir>/ or dist/<dir>/. */
export function packageRootFrom(moduleUrl: string): string {
  return path.resolve(path.dirname(fileURLToPath(moduleUrl)), "../..");
}

// This package lives at <metalavaDir>/scripts.
const PACKAGE_ROOT = packageRootFrom(import.meta.url);

export function resolveLayout(refresh: RefreshConfig, packageRoot: string = PACKAGE_ROOT): RefreshLayout {
  const metalavaDir = refresh.metalava_dir
    ? path.resolve(refresh.metalava_dir)
    : path.resolve(packageRoot, "..");
  const outDir = refresh.out_dir ? path.resolve(refresh.out_dir) : path.resolve(metalavaDir, "..", "..", "out");
  return { metalavaDir, metalavaOutDir: path.join(outDir, "metalava") };
}

function resourcePath(refresh: RefreshConfig, projectDir: string, resource: string): string {
  return path.join(projectDir, refresh.resources_dir, resource);
}

function declaresMarker(buildFile: string, marker: string): boolean {
  return fs
    .readFileSync(buildFile, "utf8")
    .split(/\r?\n/)
    .some((line) => line.includes(marker));
}

/**
 * Find the projects with a baseline file to refresh: every immediate
 * subdirectory whose build file applies the model provider plugin, followed by
 * the primary project.
 */
export function findBaselineProjects(metalavaDir: string, refresh: RefreshConfig): BaselineProject[] {
  const primary = refresh.primary_project;
  const projects: BaselineProject[] = [];

  const dirs = fs
    .readdirSync(metalavaDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort();

  for (const name of dirs) {
    if (name === primary.name) continue;
    const projectDir = path.join(metalavaDir, name);
    const buildFile = path.join(projectDir, refresh.build_file);
    if (!fs.existsSync(buildFile) || !declaresMarker(buildFile, refresh.marker)) continue;
    projects.push({
      name,
      baselineFile: resourcePath(refresh, projectDir, refresh.project_baseline),
    });
  }

  projects.push({
    name: primary.name,
    baselineFile: resourcePath(refresh, path.join(metalavaDir, primary.name), primary.baseline),
  });

  return projects;
}

/** Keep only the named projects, in discovery order. No names keeps everything. */
export function filterProjects(projects: BaselineProject[], names: string[]): BaselineProject[] {
  if (names.length === 0) return projects;
  const wanted = new Set(names);
  return projects.filter((p) => wanted.has(p.name));
}
