import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { isKnownSetting, validateConfig } from "./validator.js";
import type { ScriptsConfig } from "../types/config.js";

/** The package's config/ directory, seen from a module in src/config/ or dist/config/. */
export function configDirFrom(moduleUrl: string): string {
  return path.resolve(path.dirname(fileURLToPath(moduleUrl)), "../../config");
}

const CONFIG_DIR = configDirFrom(import.meta.url);

export const ENV_PREFIX = "METALAVA_SCRIPTS_";

/** Names the overlay file (`config/<name>.yaml`); never treated as a setting. */
export const CONFIG_ENV_VAR = `${ENV_PREFIX}CONFIG_ENV`;

export type ConfigTree = Record<string, unknown>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two trees. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isTree(val)) {
      const current = result[key];
      result[key] = deepMerge(isTree(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed tree, or an empty tree if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Apply METALAVA_SCRIPTS_ prefixed environment variable overrides. Variables
 * that name no known setting are ignored.
 */
function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv): ConfigTree {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || key === CONFIG_ENV_VAR || value === undefined) continue;
    // METALAVA_SCRIPTS_REFRESH__METALAVA_DIR → refresh.metalava_dir
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const leaf = segments.pop();
    if (!leaf || !isKnownSetting([...segments, leaf])) continue;
    let node = config;
    for (const segment of segments) {
      const child = node[segment];
      if (isTree(child)) {
        node = child;
      } else {
        const created: ConfigTree = {};
        node[segment] = created;
        node = created;
      }
    }
    node[leaf] = value;
  }
  return config;
}

/**
 * Load layered config: base.yaml ← <envName>.yaml ← environment variables.
 * The result is unvalidated; see {@link loadScriptsConfig}.
 */
export function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): ConfigTree {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}

/** Load and validate the config, throwing when it does not match the schema. */
export function loadScriptsConfig(
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): ScriptsConfig {
  const raw = loadConfig(env[CONFIG_ENV_VAR], configDir, env);
  const res = validateConfig(raw);
  if (!res.valid) {
    throw new ConfigError(`Invalid configuration: ${res.errors}`);
  }
  return res.config;
}
