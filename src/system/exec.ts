import { spawn } from "child_process";

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs a command to completion and captures its output.
 * Rejects only when the process cannot be spawned; a non-zero exit resolves.
 */
export type CommandRunner = (
  spec: CommandSpec,
  options?: RunOptions,
) => Promise<CommandResult>;

/**
 * Split a command line such as `dpkg -L` into program and arguments.
 * No shell quoting is supported.
 */
export function parseCommand(commandLine: string): CommandSpec {
  const parts = commandLine.trim().split(/\s+/).filter(Boolean);
  const [command, ...args] = parts;
  if (!command) {
    throw new Error(`Empty command: "${commandLine}"`);
  }
  return { command, args };
}

export function withArgs(spec: CommandSpec, ...extra: string[]): CommandSpec {
  return { command: spec.command, args: [...spec.args, ...extra] };
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(" ");
}

export const runCommand: CommandRunner = (spec, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(spec.command, spec.args, {
      env: options.env ?? process.env,
      stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout?.setEncoding("utf-8");
    child.stderr?.setEncoding("utf-8");
    child.stdout?.on("data", (data: string) => {
      stdout += data;
    });
    child.stderr?.on("data", (data: string) => {
      stderr += data;
    });

    child.on("error", reject);
    child.on("close", (code) => {
      resolve({ code, stdout, stderr });
    });

    if (options.input !== undefined && child.stdin) {
      // EPIPE from a filter that exits early surfaces through its exit code.
      child.stdin.on("error", () => undefined);
      child.stdin.end(options.input);
    }
  });
