import fs from "node:fs";
import path from "node:path";
import { resolveTargets } from "../gather/targets.js";
import { runInherited, formatCommand, type CommandRunner, type CommandSpec } from "../process/runner.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import type { GatherConfig } from "../types/config.js";

export type GatherErrorCode =
  | "NO_BUILD_TOP"
  | "OUTPUT_EXISTS"
  | "BUILD_FAILED"
  | "OUTPUT_DIR_FAILED"
  | "COPY_FAILED";

export type GatherResult =
  | { ok: true; outputDir: string; targets: string[]; copied: string[] }
  | { ok: false; error: { code: GatherErrorCode; message: string } };

export type GatherOptions = {
  /** Output directory, relative to the build root unless absolute. Must not exist. */
  directory: string;
  /** Custom targets; when empty the configured defaults are built. */
  stubSrcJars?: string[];
  config: GatherConfig;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  log?: (line: string) => void;
};

const EXIT_FOR_ERROR: Record<GatherErrorCode, ExitCode> = {
  NO_BUILD_TOP: EXIT.PRECONDITION_FAILED,
  OUTPUT_EXISTS: EXIT.PRECONDITION_FAILED,
  BUILD_FAILED: EXIT.BUILD_FAILED,
  OUTPUT_DIR_FAILED: EXIT.FAILED,
  COPY_FAILED: EXIT.FAILED,
};

export function exitCodeForGatherError(code: GatherErrorCode): ExitCode {
  return EXIT_FOR_ERROR[code];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function fail(code: GatherErrorCode, message: string): GatherResult {
  return { ok: false, error: { code, message } };
}

/**
 * Build a set of targets and copy the results into a new output directory.
 *
 * Run once before and once after a change, into two directories, and diff them
 * to see what the change did to the generated stubs, API XML files and
 * api-versions files.
 */
export async function gatherArtifacts(opts: GatherOptions): Promise<GatherResult> {
  const env = opts.env ?? process.env;
  const runner = opts.runner ?? runInherited;
  const log = opts.log ?? ((line: string) => console.log(line));
  const { config } = opts;

  const top = env[config.build_top_env];
  if (!top) {
    return fail("NO_BUILD_TOP", `${config.build_top_env} not specified`);
  }

  const outputDir = path.resolve(top, opts.directory);
  if (fs.existsSync(outputDir)) {
    return fail("OUTPUT_EXISTS", `${opts.directory} exists, please delete or change`);
  }

  const targets = resolveTargets(opts.stubSrcJars, config.default_targets);

  log("");
  log("Building the following targets:");
  for (const t of targets) log(`    ${t}`);
  log("");

  const [command, ...baseArgs] = config.build_command;
  const build: CommandSpec = { command, args: [...baseArgs, ...targets], cwd: top };
  try {
    const { exitCode } = await runner(build);
    if (exitCode !== 0) {
      return fail("BUILD_FAILED", `Build failed with exit code ${exitCode}: ${formatCommand(build)}`);
    }
  } catch (err) {
    return fail("BUILD_FAILED", `Could not run build: ${errorMessage(err)}`);
  }
  log("");

  log(`Making output directory: '${opts.directory}'`);
  try {
    fs.mkdirSync(outputDir);
  } catch (err) {
    return fail("OUTPUT_DIR_FAILED", `Could not create ${opts.directory}: ${errorMessage(err)}`);
  }
  log("");

  log(`Copying the following targets into '${opts.directory}':`);
  const copied: string[] = [];
  for (const t of targets) {
    log(`    ${t}`);
    const dest = path.join(outputDir, path.basename(t));
    try {
      fs.copyFileSync(path.resolve(top, t), dest);
    } catch (err) {
      return fail("COPY_FAILED", `Could not copy ${t}: ${errorMessage(err)}`);
    }
    copied.push(dest);
  }
  log("");

  return { ok: true, outputDir, targets, copied };
}
