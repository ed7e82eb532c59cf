import { performance } from "node:perf_hooks";
import { InvocationError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/log.js";
import type { ExecutionResult, Invocation, Outcome } from "../core/types.js";
import { formatCommand } from "./invocation.js";
import { spawnProcess, type LaunchResult, type ProcessLauncher } from "./process.js";

/** Exit status the analysis tool uses when some targets could not be parsed. */
export const PARTIAL_SUCCESS_EXIT = 3;

export function classifyExit(exitCode: number | null): Outcome {
  if (exitCode === 0) return "success";
  if (exitCode === PARTIAL_SUCCESS_EXIT) return "partial";
  return "fatal";
}

export interface RunnerOptions {
  launcher?: ProcessLauncher;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  baseEnv?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class Runner {
  private readonly launcher: ProcessLauncher;
  private readonly now: () => number;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(options: RunnerOptions = {}) {
    this.launcher = options.launcher ?? spawnProcess;
    this.now = options.now ?? (() => performance.now());
    this.baseEnv = options.baseEnv ?? process.env;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Runs one invocation to completion in `cwd`. Throws `InvocationError`
   * for any exit status other than success or partial success.
   */
  async execute(invocation: Invocation, cwd: string): Promise<ExecutionResult> {
    const [command, ...args] = invocation.argv;
    const rendered = formatCommand(invocation);
    if (!command) {
      throw new InvocationError({ command: rendered, exitCode: null, cause: new Error("empty argument vector") });
    }

    this.logger.debug(`running in ${cwd}: ${rendered}`);
    const env = { ...this.baseEnv, ...invocation.env };
    const start = this.now();
    let launched: LaunchResult;
    try {
      launched = await this.launcher(command, args, { cwd, env });
    } catch (error) {
      throw new InvocationError({ command: rendered, exitCode: null, cause: error });
    }
    const durationSeconds = (this.now() - start) / 1000;

    const outcome = classifyExit(launched.exitCode);
    if (outcome === "fatal") {
      throw new InvocationError({
        command: rendered,
        exitCode: launched.exitCode,
        durationSeconds,
        cause: launched.signal ? new Error(`terminated by ${launched.signal}`) : undefined
      });
    }
    if (outcome === "partial") {
      this.logger.warn(`some targets could not be analyzed (exit ${PARTIAL_SUCCESS_EXIT}): ${rendered}`);
    }

    return { durationSeconds, exitCode: launched.exitCode, outcome };
  }
}
