import { CONFIG_ENV_VAR, loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";

export type ValidateResult = { ok: true } | { ok: false; errors: string[] };

/** Load the layered config and check it against the schema. */
export function validateAll(opts: { configDir?: string; env?: NodeJS.ProcessEnv } = {}): ValidateResult {
  const env = opts.env ?? process.env;
  let raw: Record<string, unknown>;
  try {
    raw = loadConfig(env[CONFIG_ENV_VAR], opts.configDir, env);
  } catch (err) {
    return { ok: false, errors: [err instanceof Error ? err.message : String(err)] };
  }

  const res = validateConfig(raw);
  if (!res.valid) {
    return { ok: false, errors: res.errors.split(", ") };
  }
  return { ok: true };
}
