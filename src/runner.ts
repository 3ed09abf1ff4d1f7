import { spawnSync } from "node:child_process";
import { CommandError } from "./errors.js";

export type RunOptions = {
  cwd?: string;
};

export type CommandRunner = (command: string[], opts?: RunOptions) => string;

export const runCommand: CommandRunner = (command, opts = {}) => {
  const [program, ...args] = command;
  if (!program) {
    throw new Error("Empty command");
  }

  const result = spawnSync(program, args, {
    cwd: opts.cwd,
    encoding: "utf8",
    env: process.env
  });
  if (result.error) {
    throw new CommandError(command, 127, `${program}: ${result.error.message}`);
  }
  if (result.status !== 0) {
    throw new CommandError(command, result.status ?? 1, result.stderr || result.stdout || "");
  }
  return (result.stdout ?? "").trim();
};

export function commandExists(program: string): boolean {
  const result = spawnSync("sh", ["-c", `command -v ${program}`], { stdio: "ignore" });
  return result.status === 0;
}
