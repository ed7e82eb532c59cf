export type CorpusSet = "std" | "dummy" | "gitlab" | "internal";
export type Outcome = "success" | "partial" | "fatal";

export const CORPUS_SETS: readonly CorpusSet[] = ["std", "dummy", "gitlab", "internal"];

export interface Corpus {
  name: string;
  ruleDir: string;
  targetDir: string;
}

export interface Variant {
  name: string;
  /** Raw argument string handed to the analysis engine through the environment. */
  engineExtraArgs: string;
  /** Appended to the tool command line as a single argument when non-empty. */
  toolExtraArgs: string;
}

export interface Registry {
  corpora: Readonly<Record<CorpusSet, readonly Corpus[]>>;
  variants: readonly Variant[];
}

export interface Invocation {
  argv: string[];
  env: Record<string, string>;
}

export interface ExecutionResult {
  durationSeconds: number;
  exitCode: number | null;
  outcome: Outcome;
}

export interface BenchmarkResult {
  corpusName: string;
  variantName: string;
  metricName: string;
  durationSeconds: number;
  outcome: Outcome;
}

export interface BenchmarkReport {
  status: "completed";
  corpusSet: CorpusSet;
  results: BenchmarkResult[];
  messages: string[];
}

export interface HarnessConfig {
  dashboardUrl: string;
  namespace: string;
  benchRoot: string;
  toolCommand: string;
  engineEnvVar: string;
  prepCommand: string;
}
