import { spawn } from "node:child_process";

export type CommandSpec = {
  command: string;
  args: string[];
  cwd: string;
};

export type CommandOutcome = {
  exitCode: number;
  signal: NodeJS.Signals | null;
};

/**
 * Runs one external command to completion. Rejects only when the process
 * could not be started; a non-zero exit resolves with its code.
 */
export type CommandRunner = (spec: CommandSpec) => Promise<CommandOutcome>;

/** Run a command with the console inherited, so its output streams straight through. */
export const runInherited: CommandRunner = (spec) =>
  new Promise<CommandOutcome>((resolve, reject) => {
    const child = spawn(spec.command, spec.args, { cwd: spec.cwd, stdio: "inherit" });
    child.once("error", reject);
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      // Killed by a signal: no exit code, report as failure.
      resolve({ exitCode: code ?? 1, signal });
    });
  });

/** Render a command line for log output. */
export function formatCommand(spec: Pick<CommandSpec, "command" | "args">): string {
  return [spec.command, ...spec.args].join(" ");
}
