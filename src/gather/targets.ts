import type { DefaultTargets } from "../types/config.js";

/**
 * Flatten the default target groups in build order: stub source jars, then
 * API signature XML files, then api-versions files.
 */
export function defaultTargetList(defaults: DefaultTargets): string[] {
  return [...defaults.stubs, ...defaults.jdiff, ...defaults.api_versions];
}

/** Custom targets replace the defaults entirely; otherwise all defaults are built. */
export function resolveTargets(custom: readonly string[] | undefined, defaults: DefaultTargets): string[] {
  if (custom && custom.length > 0) return [...custom];
  return defaultTargetList(defaults);
}
