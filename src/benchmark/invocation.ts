import path from "node:path";
import type { Corpus, Invocation, Variant } from "../core/types.js";

export const CONTAINER_RULES_PATH = "/rules";
export const CONTAINER_TARGETS_PATH = "/targets";

/** Flags every benchmark run carries, whichever way the tool is launched. */
export const REQUIRED_FLAGS: readonly string[] = [
  "--strict",
  "--timeout",
  "0",
  "--verbose",
  // benchmark inputs are git-ignored on purpose
  "--no-git-ignore"
];

export interface BuildInvocationOptions {
  /** Directory relative corpus paths are resolved against. */
  cwd: string;
  /** Container image; when set the tool runs through `docker run`. */
  image?: string;
  toolCommand: string;
  engineEnvVar: string;
}

export function buildInvocation(corpus: Corpus, variant: Variant, options: BuildInvocationOptions): Invocation {
  // docker -v and the tool's own native mode both need absolute paths
  const rules = path.resolve(options.cwd, corpus.ruleDir);
  const targets = path.resolve(options.cwd, corpus.targetDir);

  const argv = options.image
    ? [
        "docker",
        "run",
        "--rm",
        "-v",
        `${rules}:${CONTAINER_RULES_PATH}`,
        "-v",
        `${targets}:${CONTAINER_TARGETS_PATH}`,
        "-e",
        options.engineEnvVar,
        "-t",
        options.image,
        "semgrep",
        "--config",
        CONTAINER_RULES_PATH,
        CONTAINER_TARGETS_PATH
      ]
    : [options.toolCommand, "--config", rules, targets];

  argv.push(...REQUIRED_FLAGS);
  if (variant.toolExtraArgs) {
    argv.push(variant.toolExtraArgs);
  }

  return {
    argv,
    env: { [options.engineEnvVar]: variant.engineExtraArgs }
  };
}

function shellQuote(value: string): string {
  if (value.length === 0) {
    return "''";
  }
  if (/^[A-Za-z0-9_./:=@%+-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * One-line rendering for logs, e.g. `SEMGREP_CORE_EXTRA=-no_opt_cache semgrep --config ...`.
 */
export function formatCommand(invocation: Invocation): string {
  const env = Object.entries(invocation.env).map(([key, value]) => `${key}=${shellQuote(value)}`);
  return [...env, ...invocation.argv.map((arg) => shellQuote(arg))].join(" ");
}
