import { loadAjv } from "../schema/ajv.js";
import type { ScriptsConfig } from "../types/config.js";

const STRING_LIST = { type: "array", items: { type: "string", minLength: 1 } };

/** Every section the commands read must be present and well typed. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "gather", "refresh"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    gather: {
      type: "object",
      required: ["build_top_env", "build_command", "default_targets"],
      additionalProperties: false,
      properties: {
        build_top_env: { type: "string", minLength: 1 },
        build_command: { ...STRING_LIST, minItems: 1 },
        default_targets: {
          type: "object",
          required: ["stubs", "jdiff", "api_versions"],
          additionalProperties: false,
          properties: {
            stubs: STRING_LIST,
            jdiff: STRING_LIST,
            api_versions: STRING_LIST,
          },
        },
      },
    },
    refresh: {
      type: "object",
      required: [
        "gradle_wrapper",
        "build_file",
        "marker",
        "resources_dir",
        "project_baseline",
        "primary_project",
        "test_results_dir",
        "test_report_pattern",
        "baseline_updater",
        "updater_task",
      ],
      additionalProperties: false,
      properties: {
        metalava_dir: { type: "string", minLength: 1 },
        out_dir: { type: "string", minLength: 1 },
        gradle_wrapper: { type: "string", minLength: 1 },
        build_file: { type: "string", minLength: 1 },
        marker: { type: "string", minLength: 1 },
        resources_dir: { type: "string", minLength: 1 },
        project_baseline: { type: "string", minLength: 1 },
        primary_project: {
          type: "object",
          required: ["name", "baseline"],
          additionalProperties: false,
          properties: {
            name: { type: "string", minLength: 1 },
            baseline: { type: "string", minLength: 1 },
          },
        },
        test_results_dir: { type: "string", minLength: 1 },
        test_report_pattern: { type: "string", minLength: 1 },
        baseline_updater: { type: "string", enum: ["gradle", "builtin"] },
        updater_task: { type: "string", minLength: 1 },
      },
    },
  },
};

function isSchemaNode(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Whether a config path, e.g. `["refresh", "metalava_dir"]`, names a setting in the schema. */
export function isKnownSetting(segments: string[]): boolean {
  let node: unknown = CONFIG_SCHEMA;
  for (const segment of segments) {
    const properties = isSchemaNode(node) ? node.properties : undefined;
    if (!isSchemaNode(properties) || !Object.hasOwn(properties, segment)) return false;
    node = properties[segment];
  }
  return segments.length > 0;
}

export type ConfigValidationResult =
  | { valid: true; config: ScriptsConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = ajv.compile<ScriptsConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
