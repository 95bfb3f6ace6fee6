import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, configDirFrom, loadConfig, loadScriptsConfig } from "../src/config/loader.js";
import { isKnownSetting, validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config");

describe("config loader", () => {
  it("loads base config with every section", () => {
    const config = loadScriptsConfig(CONFIG_DIR, {});
    expect(config.schema_version).toBe("1.0.0");
    expect(config.gather.build_top_env).toBe("ANDROID_BUILD_TOP");
    expect(config.gather.build_command).toEqual(["build/soong/soong_ui.bash", "--make-mode"]);
    expect(config.refresh.marker).toBe('id("metalava-model-provider-plugin")');
    expect(config.refresh.primary_project).toEqual({
      name: "metalava",
      baseline: "source-model-provider-baseline.txt",
    });
    expect(config.refresh.baseline_updater).toBe("gradle");
    expect(config.refresh.metalava_dir).toBeUndefined();
  });

  it("has thirteen default targets: four stubs, five API files, four api-versions files", () => {
    const { default_targets } = loadScriptsConfig(CONFIG_DIR, {}).gather;
    expect(default_targets.stubs).toHaveLength(4);
    expect(default_targets.jdiff).toHaveLength(5);
    expect(default_targets.api_versions).toHaveLength(4);
  });

  it("merges the selected overlay over base", () => {
    const config = loadScriptsConfig(CONFIG_DIR, { METALAVA_SCRIPTS_CONFIG_ENV: "builtin-updater" });
    expect(config.refresh.baseline_updater).toBe("builtin");
    // base fields still present
    expect(config.refresh.updater_task).toBe(":metalava-model-testsuite-cli:run");
    expect(config.gather.default_targets.jdiff).toContain("out/target/common/obj/api.xml");
  });

  it("returns base config when the overlay does not exist", () => {
    const config = loadScriptsConfig(CONFIG_DIR, { METALAVA_SCRIPTS_CONFIG_ENV: "nonexistent-env" });
    expect(config.refresh.baseline_updater).toBe("gradle");
  });

  it("applies nested environment variable overrides", () => {
    const config = loadScriptsConfig(CONFIG_DIR, {
      METALAVA_SCRIPTS_REFRESH__METALAVA_DIR: "/tmp/metalava",
      METALAVA_SCRIPTS_GATHER__BUILD_TOP_ENV: "MY_TOP",
    });
    expect(config.refresh.metalava_dir).toBe("/tmp/metalava");
    expect(config.gather.build_top_env).toBe("MY_TOP");
  });

  it("env vars override the overlay", () => {
    const config = loadScriptsConfig(CONFIG_DIR, {
      METALAVA_SCRIPTS_CONFIG_ENV: "builtin-updater",
      METALAVA_SCRIPTS_REFRESH__BASELINE_UPDATER: "gradle",
    });
    expect(config.refresh.baseline_updater).toBe("gradle");
  });

  it("ignores variables without the prefix", () => {
    const raw = loadConfig(undefined, CONFIG_DIR, { REFRESH__MARKER: "other" });
    expect(validateConfig(raw).valid).toBe(true);
    expect(loadScriptsConfig(CONFIG_DIR, { REFRESH__MARKER: "other" }).refresh.marker).toBe(
      'id("metalava-model-provider-plugin")',
    );
  });

  it("ignores prefixed variables that name no setting", () => {
    const env = {
      METALAVA_SCRIPTS_DEBUG: "1",
      METALAVA_SCRIPTS_REFRESH__BOGUS: "x",
      METALAVA_SCRIPTS_REFRESH__PRIMARY_PROJECT__NAME__EXTRA: "y",
    };
    const config = loadScriptsConfig(CONFIG_DIR, env);
    expect(config.refresh.primary_project.name).toBe("metalava");
    expect(loadConfig(undefined, CONFIG_DIR, env)).toEqual(loadConfig(undefined, CONFIG_DIR, {}));
  });

  it("knows settings by their full path", () => {
    expect(isKnownSetting(["refresh", "metalava_dir"])).toBe(true);
    expect(isKnownSetting(["refresh", "primary_project", "name"])).toBe(true);
    expect(isKnownSetting(["gather"])).toBe(true);
    expect(isKnownSetting(["debug"])).toBe(false);
    expect(isKnownSetting(["refresh", "primary_project", "name", "extra"])).toBe(false);
    expect(isKnownSetting([])).toBe(false);
  });

  it("still applies an override for an optional setting", () => {
    expect(loadScriptsConfig(CONFIG_DIR, { METALAVA_SCRIPTS_REFRESH__METALAVA_DIR: "/work/metalava" }).refresh.metalava_dir).toBe(
      "/work/metalava",
    );
  });

  it("locates the config directory from a percent-escaped module location", () => {
    expect(configDirFrom("file:///tmp/my%20src/scripts/src/config/loader.ts")).toBe("/tmp/my src/scripts/config");
  });

  it("rejects an override with the wrong type", () => {
    expect(() =>
      loadScriptsConfig(CONFIG_DIR, { METALAVA_SCRIPTS_GATHER__BUILD_COMMAND: "make" }),
    ).toThrow(/^Invalid configuration: /);
  });
});

describe("config loader with a custom directory", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "mscripts-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns an empty tree when base.yaml is missing", () => {
    expect(loadConfig(undefined, tmpDir, {})).toEqual({});
    expect(() => loadScriptsConfig(tmpDir, {})).toThrow(ConfigError);
  });

  it("throws when a config file is not a mapping", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "- a\n- b\n");
    expect(() => loadConfig(undefined, tmpDir, {})).toThrow(
      `Config file must contain a mapping: ${path.join(tmpDir, "base.yaml")}`,
    );
  });

  it("replaces arrays instead of concatenating them", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "gather:\n  build_command: [a, b]\n  build_top_env: TOP\n");
    fs.writeFileSync(path.join(tmpDir, "ci.yaml"), "gather:\n  build_command: [c]\n");
    expect(loadConfig("ci", tmpDir, {})).toEqual({ gather: { build_command: ["c"], build_top_env: "TOP" } });
  });
});

describe("config validator", () => {
  it("validates the base config", () => {
    const res = validateConfig(loadConfig(undefined, CONFIG_DIR, {}));
    expect(res.valid).toBe(true);
    expect(res.errors).toBeNull();
  });

  it("rejects config missing required sections", () => {
    const res = validateConfig({ schema_version: "1.0.0" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("must have required property 'gather'");
  });

  it("rejects an unknown baseline updater", () => {
    const raw = loadConfig(undefined, CONFIG_DIR, { METALAVA_SCRIPTS_REFRESH__BASELINE_UPDATER: "maven" });
    expect(validateConfig(raw).valid).toBe(false);
  });
});
