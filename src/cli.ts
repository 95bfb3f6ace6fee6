#!/usr/bin/env node

import { Command } from "commander";
import { ConfigError, loadScriptsConfig } from "./config/loader.js";
import { gatherArtifacts, exitCodeForGatherError } from "./commands/gather-artifacts.js";
import { refreshBaselines } from "./commands/refresh-baselines.js";
import { updateBaseline } from "./commands/update-baseline.js";
import { validateAll } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import type { ScriptsConfig } from "./types/config.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function configOrExit(): ScriptsConfig {
  try {
    return loadScriptsConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(EXIT.INVALID_CONFIG);
    }
    throw err;
  }
}

const program = new Command();

program
  .name("metalava-scripts")
  .description("Developer scripts for Metalava: artifact gathering and test baseline refresh")
  .version("0.1.0");

program
  .command("gather-artifacts")
  .description(
    "Gather Android artifacts created by Metalava. Builds a set of targets and copies them into " +
      "the output directory. Without custom targets the defaults cover stub generation, signature " +
      "to JDiff conversion and api-versions.xml generation. Run before and after a change into two " +
      "directories and compare them. Signature files are not covered; use `m checkapi` for those.",
  )
  .argument("<directory>", "Output directory into which artifacts will be copied")
  .option("--stub-src-jar <path>", "Additional stub jar to gather (repeatable)", collect, [])
  .action(async (directory: string, opts: { stubSrcJar: string[] }) => {
    const config = configOrExit();
    const res = await gatherArtifacts({
      directory,
      stubSrcJars: opts.stubSrcJar,
      config: config.gather,
    });
    if (!res.ok) {
      console.error(res.error.message);
      process.exit(exitCodeForGatherError(res.error.code));
    }
  });

program
  .command("refresh-baselines")
  .description("Refresh the model test suite baseline files")
  .argument("[projects...]", "Only refresh these projects")
  .action(async (projects: string[]) => {
    const config = configOrExit();
    await refreshBaselines({ projects, config: config.refresh });
  });

program
  .command("update-baseline")
  .description("Update a model test suite baseline file from test reports")
  .argument("<test-report-files...>", "Test report files generated by Gradle when running the model test suite")
  .requiredOption("--baseline-file <file>", "Baseline file that is to be updated")
  .action((reportFiles: string[], opts: { baselineFile: string }) => {
    const res = updateBaseline({ reportFiles, baselineFile: opts.baselineFile });
    if (!res.ok) {
      console.error(res.error);
      process.exit(EXIT.FAILED);
    }
  });

program
  .command("validate")
  .description("Validate the layered configuration")
  .action(() => {
    const res = validateAll();
    if (!res.ok) {
      for (const err of res.errors) console.error(err);
      process.exit(EXIT.INVALID_CONFIG);
    }
    console.log("OK");
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
