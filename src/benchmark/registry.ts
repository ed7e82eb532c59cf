import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import { CORPUS_SETS, type Corpus, type CorpusSet, type Registry, type Variant } from "../core/types.js";

export const DEFAULT_REGISTRY_PATH = fileURLToPath(new URL("../../config/registry.yaml", import.meta.url));

const CorpusSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, "must be a plain directory name"),
  ruleDir: z.string().min(1),
  targetDir: z.string().min(1)
});

const VariantSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, "must not contain '.' or whitespace"),
  engineExtraArgs: z.string().default(""),
  toolExtraArgs: z.string().default("")
});

const RegistrySchema = z.object({
  corpora: z.object({
    std: z.array(CorpusSchema).min(1),
    dummy: z.array(CorpusSchema).default([]),
    gitlab: z.array(CorpusSchema).default([]),
    internal: z.array(CorpusSchema).default([])
  }),
  variants: z.array(VariantSchema).min(1)
});

function duplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) dupes.add(name);
    seen.add(name);
  }
  return Array.from(dupes);
}

function freezeAll<T extends object>(items: T[]): readonly Readonly<T>[] {
  return Object.freeze(items.map((item) => Object.freeze({ ...item })));
}

/**
 * Validates raw registry data and returns a frozen registry. Corpus names
 * must be unique across all four sets, variant names within the list.
 */
export function parseRegistry(raw: unknown, source = "registry"): Registry {
  const parsed = RegistrySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join("; ")}`, parsed.error);
  }

  const { corpora, variants } = parsed.data;
  const corpusDupes = duplicates(CORPUS_SETS.flatMap((set) => corpora[set].map((corpus) => corpus.name)));
  if (corpusDupes.length > 0) {
    throw new ConfigError(`Invalid ${source}: duplicate corpus names ${corpusDupes.join(", ")}`);
  }
  const variantDupes = duplicates(variants.map((variant) => variant.name));
  if (variantDupes.length > 0) {
    throw new ConfigError(`Invalid ${source}: duplicate variant names ${variantDupes.join(", ")}`);
  }

  const frozen: Record<CorpusSet, readonly Corpus[]> = {
    std: freezeAll(corpora.std),
    dummy: freezeAll(corpora.dummy),
    gitlab: freezeAll(corpora.gitlab),
    internal: freezeAll(corpora.internal)
  };
  const frozenVariants: readonly Variant[] = freezeAll(variants);

  return Object.freeze({
    corpora: Object.freeze(frozen),
    variants: frozenVariants
  });
}

export async function loadRegistry(filePath = DEFAULT_REGISTRY_PATH): Promise<Registry> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read registry file ${filePath}`, error);
  }

  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Malformed YAML in ${filePath}`, error);
  }
  return parseRegistry(data, path.basename(filePath));
}

export type CorpusSetFlags = Partial<Record<CorpusSet, boolean>>;

/**
 * Maps the mutually exclusive corpus-set flags to a single set. `std` when
 * nothing is selected.
 */
export function selectCorpusSet(flags: CorpusSetFlags): CorpusSet {
  const chosen = CORPUS_SETS.filter((set) => flags[set] === true);
  if (chosen.length > 1) {
    throw new ConfigError(`Corpus set flags are mutually exclusive, got: ${chosen.map((set) => `--${set}`).join(" ")}`);
  }
  return chosen[0] ?? "std";
}

export function corporaFor(registry: Registry, set: CorpusSet): readonly Corpus[] {
  return registry.corpora[set];
}
