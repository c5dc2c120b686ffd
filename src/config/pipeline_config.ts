import path from "node:path";
import { loadValidatedJson } from "../shared/json.ts";
import { SchemaPaths } from "../shared/schema_paths.ts";
import { ConfigurationError } from "../shared/errors.ts";
import { normalizeLogLevel, type LogLevel } from "../shared/logger.ts";
import { RESERVED_DATA_NAMES } from "../pipeline/layout.ts";
import type {
  DispatchSettings,
  ExternalStageSettings,
  LeafGaussianCounts,
  PathRewrite,
  PipelineContext,
  ResourceTier,
  SubsetSpec,
  TrainingSettings
} from "../shared/types.ts";

export const DEFAULT_CONFIG_FILE = "pipeline.config.json";

export const DEFAULT_CONFIG_RULES: Record<ResourceTier, string[]> = {
  limited: ["{item}-*limitedLP*.conf", "{item}-*LLP*.conf"],
  full: ["{item}-*fullLP*.conf", "{item}-*FLP*.conf"]
};

const DEFAULT_DISPATCH: DispatchSettings = {
  shell: "bash",
  trainCmd: "run.pl",
  trainJobs: 32,
  maxParallelItems: 4
};

const DEFAULT_TRAINING: TrainingSettings = {
  boostSilence: 1.5,
  oovSymbol: "<unk>",
  subsets: [
    { name: "train_sub1", size: 5000 },
    { name: "train_sub2", size: 10000 },
    { name: "train_sub3", size: 20000 }
  ],
  tri1: { leaves: 1000, gaussians: 10000 },
  tri2: { leaves: 1000, gaussians: 20000 },
  tri3: { leaves: 6000, gaussians: 75000 },
  mllt: { leaves: 6000, gaussians: 75000 },
  sat: { leaves: 6000, gaussians: 75000 },
  cleanup: {
    script: "./local/run_cleanup_segmentation.sh",
    args: [],
    langFromStep: "tri5",
    outputDir: "exp/tri5_cleaned"
  },
  model: {
    script: "./local/chain/run_tdnn.sh",
    args: ["--stage", "4"],
    langFromStep: "tri5_ali",
    outputDir: "exp/chain_cleaned"
  }
};

export interface PipelineContextOverrides {
  logLevel?: string;
  workRoot?: string;
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function recordField(raw: RawRecord | undefined, key: string): RawRecord | undefined {
  const value = raw?.[key];
  return isRecord(value) ? value : undefined;
}

function stringField(raw: RawRecord | undefined, key: string, fallback: string): string {
  const value = raw?.[key];
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function stringListField(raw: RawRecord | undefined, key: string, fallback: readonly string[]): string[] {
  const value = raw?.[key];
  if (!Array.isArray(value)) {
    return [...fallback];
  }
  return value.filter((entry): entry is string => typeof entry === "string");
}

function coerceNumber(value: unknown, fallback: number): number {
  if (typeof value !== "number" && typeof value !== "string") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function coercePositiveInteger(value: unknown, fallback: number): number {
  return Math.max(1, Math.floor(coerceNumber(value, fallback)));
}

function normalizeLeafGaussian(raw: RawRecord | undefined, fallback: LeafGaussianCounts): LeafGaussianCounts {
  return {
    leaves: coercePositiveInteger(raw?.leaves, fallback.leaves),
    gaussians: coercePositiveInteger(raw?.gaussians, fallback.gaussians)
  };
}

function normalizeExternalStage(
  raw: RawRecord | undefined,
  fallback: ExternalStageSettings
): ExternalStageSettings {
  return {
    script: stringField(raw, "script", fallback.script),
    args: stringListField(raw, "args", fallback.args),
    langFromStep: stringField(raw, "langFromStep", fallback.langFromStep),
    outputDir: stringField(raw, "outputDir", fallback.outputDir)
  };
}

function normalizeSubsets(raw: unknown): SubsetSpec[] {
  if (!Array.isArray(raw)) {
    return DEFAULT_TRAINING.subsets.map((subset) => ({ ...subset }));
  }
  const subsets: SubsetSpec[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) {
      continue;
    }
    subsets.push({
      name: stringField(entry, "name", ""),
      size: coercePositiveInteger(entry.size, 1)
    });
  }
  if (subsets.length !== 3) {
    throw new ConfigurationError(
      `training.subsets must define exactly three nested subsets (small, medium, large), got ${subsets.length}`
    );
  }
  for (let index = 1; index < subsets.length; index += 1) {
    if (subsets[index].size <= subsets[index - 1].size) {
      throw new ConfigurationError(
        `training.subsets must grow in size: ${subsets[index].name} (${subsets[index].size}) is not larger than ${subsets[index - 1].name} (${subsets[index - 1].size})`
      );
    }
  }
  return subsets;
}

function normalizeTraining(raw: RawRecord | undefined): TrainingSettings {
  return {
    boostSilence: coerceNumber(raw?.boostSilence, DEFAULT_TRAINING.boostSilence),
    oovSymbol: stringField(raw, "oovSymbol", DEFAULT_TRAINING.oovSymbol),
    subsets: normalizeSubsets(raw?.subsets),
    tri1: normalizeLeafGaussian(recordField(raw, "tri1"), DEFAULT_TRAINING.tri1),
    tri2: normalizeLeafGaussian(recordField(raw, "tri2"), DEFAULT_TRAINING.tri2),
    tri3: normalizeLeafGaussian(recordField(raw, "tri3"), DEFAULT_TRAINING.tri3),
    mllt: normalizeLeafGaussian(recordField(raw, "mllt"), DEFAULT_TRAINING.mllt),
    sat: normalizeLeafGaussian(recordField(raw, "sat"), DEFAULT_TRAINING.sat),
    cleanup: normalizeExternalStage(recordField(raw, "cleanup"), DEFAULT_TRAINING.cleanup),
    model: normalizeExternalStage(recordField(raw, "model"), DEFAULT_TRAINING.model)
  };
}

function normalizeDispatch(raw: RawRecord | undefined): DispatchSettings {
  return {
    shell: stringField(raw, "shell", DEFAULT_DISPATCH.shell),
    trainCmd: stringField(raw, "trainCmd", DEFAULT_DISPATCH.trainCmd),
    trainJobs: coercePositiveInteger(raw?.trainJobs, DEFAULT_DISPATCH.trainJobs),
    maxParallelItems: coercePositiveInteger(raw?.maxParallelItems, DEFAULT_DISPATCH.maxParallelItems)
  };
}

function normalizeRewrites(raw: unknown): PathRewrite[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const rewrites: PathRewrite[] = [];
  for (const entry of raw) {
    if (isRecord(entry) && typeof entry.from === "string" && typeof entry.to === "string") {
      rewrites.push({ from: entry.from, to: entry.to });
    }
  }
  return rewrites;
}

function normalizeItems(raw: unknown, delimiter: string): string[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigurationError("items must list at least one item identifier");
  }
  const items: string[] = [];
  const seen = new Set<string>();
  for (const entry of raw) {
    if (typeof entry !== "string" || entry.length === 0) {
      throw new ConfigurationError("items must contain non-empty strings");
    }
    if (seen.has(entry)) {
      throw new ConfigurationError(`Duplicate item identifier "${entry}" in items`);
    }
    if (entry.includes(delimiter)) {
      throw new ConfigurationError(
        `Item identifier "${entry}" contains the identifier delimiter "${delimiter}"`
      );
    }
    seen.add(entry);
    items.push(entry);
  }
  return items;
}

/**
 * Items and subsets each own a directory under `data/`, next to the merged
 * corpus and models, so their names must not meet.
 */
function checkDataNames(items: readonly string[], subsets: readonly SubsetSpec[]): void {
  const owners = new Map<string, string>(RESERVED_DATA_NAMES.map((name) => [name, "the merged layout"]));
  for (const item of items) {
    const owner = owners.get(item);
    if (owner !== undefined) {
      throw new ConfigurationError(`Item identifier "${item}" collides with ${owner} under data/`);
    }
    owners.set(item, `item "${item}"`);
  }
  for (const subset of subsets) {
    const owner = owners.get(subset.name);
    if (owner !== undefined) {
      throw new ConfigurationError(`Subset name "${subset.name}" collides with ${owner} under data/`);
    }
    owners.set(subset.name, `subset "${subset.name}"`);
  }
}

function normalizeTier(raw: unknown): ResourceTier {
  if (raw === "limited" || raw === "full") {
    return raw;
  }
  throw new ConfigurationError(`tier must be "limited" or "full", got ${JSON.stringify(raw)}`);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Turn a schema-validated configuration object into the immutable pipeline
 * context. Relative paths resolve against `baseDir`.
 */
export function normalizePipelineConfig(
  raw: unknown,
  baseDir: string,
  overrides: PipelineContextOverrides = {},
  configPath: string = path.join(baseDir, DEFAULT_CONFIG_FILE)
): PipelineContext {
  if (!isRecord(raw)) {
    throw new ConfigurationError("Pipeline configuration must be a JSON object");
  }

  const identifierDelimiter = stringField(raw, "identifierDelimiter", ":");
  const workRoot = path.resolve(baseDir, overrides.workRoot ?? stringField(raw, "workRoot", "."));
  const rawRules = recordField(raw, "configRules");
  const rawPhoneMaps = recordField(raw, "phoneMaps");
  const logLevel: LogLevel = normalizeLogLevel(overrides.logLevel ?? stringField(raw, "logLevel", "info"));

  const items = normalizeItems(raw.items, identifierDelimiter);
  const training = normalizeTraining(recordField(raw, "training"));
  checkDataNames(items, training.subsets);

  const context: PipelineContext = {
    configPath: path.resolve(configPath),
    workRoot,
    items,
    tier: normalizeTier(raw.tier),
    configDir: path.resolve(workRoot, stringField(raw, "configDir", "conf/lang")),
    configRules: {
      limited: stringListField(rawRules, "limited", DEFAULT_CONFIG_RULES.limited),
      full: stringListField(rawRules, "full", DEFAULT_CONFIG_RULES.full)
    },
    configPathRewrites: normalizeRewrites(raw.configPathRewrites),
    sharedResources: stringListField(raw, "sharedResources", ["local", "utils", "steps", "conf"]),
    copiedResources: stringListField(raw, "copiedResources", ["cmd.sh", "path.sh"]),
    phoneMaps: {
      diphthongsDir: path.resolve(
        workRoot,
        stringField(rawPhoneMaps, "diphthongs", "universal_phone_maps/diphthongs")
      ),
      tonesDir: path.resolve(workRoot, stringField(rawPhoneMaps, "tones", "universal_phone_maps/tones"))
    },
    identifierDelimiter,
    dispatch: normalizeDispatch(recordField(raw, "dispatch")),
    training,
    logLevel
  };

  return deepFreeze(context);
}

export async function loadPipelineContext(
  configPath: string = DEFAULT_CONFIG_FILE,
  overrides: PipelineContextOverrides = {}
): Promise<PipelineContext> {
  const resolvedConfigPath = path.resolve(configPath);
  const raw = await loadValidatedJson(resolvedConfigPath, SchemaPaths.pipelineConfig);
  return normalizePipelineConfig(raw, path.dirname(resolvedConfigPath), overrides, resolvedConfigPath);
}
