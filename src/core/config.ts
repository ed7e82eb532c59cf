import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { HarnessConfig } from "./types.js";

export const DEFAULT_CONFIG: HarnessConfig = {
  dashboardUrl: "https://dashboard.semgrep.dev",
  namespace: "semgrep.bench",
  benchRoot: "bench",
  toolCommand: "semgrep",
  engineEnvVar: "SEMGREP_CORE_EXTRA",
  prepCommand: "./prep"
};

const ENV_KEYS: Array<[keyof HarnessConfig, string]> = [
  ["dashboardUrl", "BENCH_DASHBOARD_URL"],
  ["namespace", "BENCH_NAMESPACE"],
  ["benchRoot", "BENCH_ROOT"],
  ["toolCommand", "BENCH_TOOL"],
  ["engineEnvVar", "BENCH_ENGINE_ENV"],
  ["prepCommand", "BENCH_PREP"]
];

const HarnessConfigSchema = z.object({
  dashboardUrl: z.string().url(),
  namespace: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*(\.[A-Za-z0-9][A-Za-z0-9_-]*)*$/, "must be dot-separated plain names"),
  benchRoot: z.string().min(1),
  toolCommand: z.string().min(1),
  engineEnvVar: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a valid environment variable name"),
  prepCommand: z.string().min(1)
});

function fromEnv(env: NodeJS.ProcessEnv): Partial<HarnessConfig> {
  const picked: Partial<HarnessConfig> = {};
  for (const [key, envName] of ENV_KEYS) {
    const value = (env[envName] ?? "").trim();
    if (value) {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Defaults, then `BENCH_*` environment overrides, then explicit overrides.
 */
export function loadHarnessConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<HarnessConfig> = {}
): HarnessConfig {
  const merged = { ...DEFAULT_CONFIG, ...fromEnv(env), ...overrides };
  const parsed = HarnessConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid harness configuration: ${issues.join("; ")}`, parsed.error);
  }
  return parsed.data;
}

export function corpusDir(config: HarnessConfig, corpusName: string): string {
  return path.join(config.benchRoot, corpusName);
}
