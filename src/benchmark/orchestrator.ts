import { corpusDir } from "../core/config.js";
import { PreparationError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/log.js";
import { DirectoryScope } from "../core/paths.js";
import type {
  BenchmarkReport,
  BenchmarkResult,
  Corpus,
  CorpusSet,
  HarnessConfig,
  Registry
} from "../core/types.js";
import { buildInvocation } from "./invocation.js";
import type { MetricReporter } from "./metrics.js";
import { spawnProcess, type ProcessLauncher } from "./process.js";
import { corporaFor } from "./registry.js";
import { Runner } from "./runner.js";

export interface RunBenchmarksOptions {
  registry: Registry;
  corpusSet: CorpusSet;
  config: HarnessConfig;
  /** Container image; native execution when absent. */
  image?: string;
  /** Upload is enabled exactly when a reporter is given. */
  reporter?: MetricReporter;
  skipPrep?: boolean;
  scope?: DirectoryScope;
  runner?: Runner;
  launcher?: ProcessLauncher;
  logger?: Logger;
  /** Receives the final report lines. */
  print?: (line: string) => void;
}

export function metricName(namespace: string, corpusName: string, variantName: string): string {
  return `${namespace}.${corpusName}.${variantName}.duration`;
}

export function formatResultMessage(result: BenchmarkResult): string {
  return `${result.metricName} = ${result.durationSeconds.toFixed(3)} s`;
}

async function prepareCorpus(
  corpus: Corpus,
  cwd: string,
  config: HarnessConfig,
  launcher: ProcessLauncher
): Promise<void> {
  let exitCode: number | null;
  try {
    ({ exitCode } = await launcher(config.prepCommand, [], { cwd, env: process.env }));
  } catch (error) {
    throw new PreparationError(corpus.name, null, error);
  }
  if (exitCode !== 0) {
    throw new PreparationError(corpus.name, exitCode);
  }
}

/**
 * Runs every variant against every corpus of the selected set, one process
 * at a time. The first preparation, invocation or upload failure aborts the
 * whole run; the report is printed only once every pair has completed.
 */
export async function runBenchmarks(options: RunBenchmarksOptions): Promise<BenchmarkReport> {
  const { registry, corpusSet, config } = options;
  const logger = options.logger ?? silentLogger;
  const launcher = options.launcher ?? spawnProcess;
  const scope = options.scope ?? new DirectoryScope();
  const runner = options.runner ?? new Runner({ launcher, logger });
  const print = options.print ?? ((line: string) => console.log(line));

  const corpora = corporaFor(registry, corpusSet);
  const results: BenchmarkResult[] = [];
  const messages: string[] = [];

  logger.info(
    `${corpora.length} corpora x ${registry.variants.length} variants (${corpusSet}, ${options.image ? `docker ${options.image}` : "native"})`
  );

  for (const corpus of corpora) {
    await scope.withDirectory(corpusDir(config, corpus.name), async (cwd) => {
      if (options.skipPrep) {
        logger.debug(`skipping preparation for ${corpus.name}`);
      } else {
        logger.info(`preparing ${corpus.name}`);
        await prepareCorpus(corpus, cwd, config, launcher);
      }

      for (const variant of registry.variants) {
        const name = metricName(config.namespace, corpus.name, variant.name);
        logger.info(`running ${corpus.name} / ${variant.name}`);
        const invocation = buildInvocation(corpus, variant, {
          cwd,
          image: options.image,
          toolCommand: config.toolCommand,
          engineEnvVar: config.engineEnvVar
        });
        const execution = await runner.execute(invocation, cwd);

        const result: BenchmarkResult = {
          corpusName: corpus.name,
          variantName: variant.name,
          metricName: name,
          durationSeconds: execution.durationSeconds,
          outcome: execution.outcome
        };
        results.push(result);
        messages.push(formatResultMessage(result));

        if (options.reporter) {
          await options.reporter.report(name, execution.durationSeconds);
        }
      }
    });
  }

  for (const message of messages) {
    print(message);
  }

  return { status: "completed", corpusSet, results, messages };
}
