import { spawn } from "node:child_process";

export interface LaunchOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface LaunchResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Starts `command` and settles once it exits. Rejects only when the process
 * cannot be started at all.
 */
export type ProcessLauncher = (command: string, args: string[], options: LaunchOptions) => Promise<LaunchResult>;

export const spawnProcess: ProcessLauncher = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: "inherit"
    });

    child.once("error", reject);
    child.once("close", (exitCode, signal) => {
      resolve({ exitCode, signal });
    });
  });
