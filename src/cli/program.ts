import { Command, Option } from "commander";
import { loadHarnessConfig } from "../core/config.js";
import { BenchError } from "../core/errors.js";
import { createConsoleLogger, type Logger } from "../core/log.js";
import { CORPUS_SETS, type CorpusSet, type Registry } from "../core/types.js";
import { MetricReporter } from "../benchmark/metrics.js";
import { runBenchmarks } from "../benchmark/orchestrator.js";
import { loadRegistry, selectCorpusSet } from "../benchmark/registry.js";

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  loadRegistry?: (filePath?: string) => Promise<Registry>;
  runBenchmarks?: typeof runBenchmarks;
  createLogger?: (verbose: boolean) => Logger;
  write?: (line: string) => void;
}

interface RunFlags {
  std?: boolean;
  dummy?: boolean;
  gitlab?: boolean;
  internal?: boolean;
  upload: boolean;
  docker?: string;
  skipPrep: boolean;
  registry?: string;
  json: boolean;
  verbose: boolean;
}

const SET_DESCRIPTIONS: Record<CorpusSet, string> = {
  std: "standard public corpora (default)",
  dummy: "small corpus for quick local checks",
  gitlab: "corpora from the GitLab rule sets",
  internal: "internal-only corpora"
};

function setOption(set: CorpusSet): Option {
  return new Option(`--${set}`, SET_DESCRIPTIONS[set]).conflicts(CORPUS_SETS.filter((other) => other !== set));
}

function errorPayload(error: unknown): Record<string, unknown> {
  if (error instanceof BenchError) return error.toJSON();
  return { message: error instanceof Error ? error.message : String(error) };
}

export function buildProgram(deps: CliDeps = {}): Command {
  const env = deps.env ?? process.env;
  const load = deps.loadRegistry ?? loadRegistry;
  const run = deps.runBenchmarks ?? runBenchmarks;
  const createLogger = deps.createLogger ?? ((verbose: boolean) => createConsoleLogger({ verbose }));
  const write = deps.write ?? ((line: string) => console.log(line));

  function emit(data: unknown, asJson: boolean): void {
    if (!asJson && typeof data === "string") {
      write(data);
      return;
    }
    write(JSON.stringify(data, null, 2));
  }

  const program = new Command();
  program.name("semgrep-bench").description("Time Semgrep across benchmark corpora and engine variants").version("0.3.0");

  const runCommand = program.command("run", { isDefault: true }).description("Run every variant against the selected corpus set");
  for (const set of CORPUS_SETS) {
    runCommand.addOption(setOption(set));
  }
  runCommand
    .option("--upload", "send durations to the metrics dashboard", false)
    .option("--docker <image>", "run the tool inside this container image")
    .option("--skip-prep", "assume corpus inputs are already prepared", false)
    .option("--registry <file>", "corpus/variant registry file")
    .option("--json", "json output", false)
    .option("-v, --verbose", "debug logging", false)
    .action(async (opts: RunFlags) => {
      const logger = createLogger(opts.verbose);
      let corpusSet: CorpusSet | undefined;

      try {
        const config = loadHarnessConfig(env);
        const registry = await load(opts.registry);
        corpusSet = selectCorpusSet(opts);
        const reporter = opts.upload ? new MetricReporter({ dashboardUrl: config.dashboardUrl, logger }) : undefined;
        const report = await run({
          registry,
          corpusSet,
          config,
          image: opts.docker,
          reporter,
          skipPrep: opts.skipPrep,
          logger,
          print: opts.json ? () => undefined : write
        });
        if (opts.json) {
          emit({ ok: true, ...report }, true);
        }
      } catch (error) {
        if (opts.json) {
          emit({ ok: false, status: "aborted", corpusSet, error: errorPayload(error) }, true);
        }
        throw error;
      }
    });

  program
    .command("list")
    .description("Show the corpus sets and variants in the registry")
    .option("--registry <file>", "corpus/variant registry file")
    .option("--json", "json output", false)
    .action(async (opts: { registry?: string; json: boolean }) => {
      const registry = await load(opts.registry);
      if (opts.json) {
        emit(registry, true);
        return;
      }
      const lines: string[] = [];
      for (const set of CORPUS_SETS) {
        lines.push(`${set}:`);
        for (const corpus of registry.corpora[set]) {
          lines.push(`  ${corpus.name}  rules=${corpus.ruleDir} targets=${corpus.targetDir}`);
        }
      }
      lines.push("variants:");
      for (const variant of registry.variants) {
        const extras = [variant.engineExtraArgs, variant.toolExtraArgs].filter(Boolean).join(" ");
        lines.push(`  ${variant.name}${extras ? `  ${extras}` : ""}`);
      }
      emit(lines.join("\n"), false);
    });

  return program;
}
