/** Configuration types for the layered config (base.yaml ← env overlay ← env vars). */

export type DefaultTargets = {
  stubs: string[];
  jdiff: string[];
  api_versions: string[];
};

export type GatherConfig = {
  build_top_env: string;
  build_command: string[];
  default_targets: DefaultTargets;
};

export type BaselineUpdaterMode = "gradle" | "builtin";

export type PrimaryProjectConfig = {
  name: string;
  baseline: string;
};

export type RefreshConfig = {
  metalava_dir?: string;
  out_dir?: string;
  gradle_wrapper: string;
  build_file: string;
  marker: string;
  resources_dir: string;
  project_baseline: string;
  primary_project: PrimaryProjectConfig;
  test_results_dir: string;
  test_report_pattern: string;
  baseline_updater: BaselineUpdaterMode;
  updater_task: string;
};

export type ScriptsConfig = {
  schema_version: string;
  gather: GatherConfig;
  refresh: RefreshConfig;
};
