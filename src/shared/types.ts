import type { LogLevel } from "./logger.ts";

export type ResourceTier = "limited" | "full";

export const RESOURCE_TIERS: readonly ResourceTier[] = ["limited", "full"];

export interface PathRewrite {
  from: string;
  to: string;
}

export interface DispatchSettings {
  shell: string;
  trainCmd: string;
  trainJobs: number;
  maxParallelItems: number;
}

export interface SubsetSpec {
  name: string;
  size: number;
}

export interface LeafGaussianCounts {
  leaves: number;
  gaussians: number;
}

export interface ExternalStageSettings {
  script: string;
  args: string[];
  /** Training step whose re-estimated linguistic model the script consumes. */
  langFromStep: string;
  /** Directory (relative to workRoot) that carries the completion marker. */
  outputDir: string;
}

export interface TrainingSettings {
  boostSilence: number;
  oovSymbol: string;
  subsets: SubsetSpec[];
  tri1: LeafGaussianCounts;
  tri2: LeafGaussianCounts;
  tri3: LeafGaussianCounts;
  mllt: LeafGaussianCounts;
  sat: LeafGaussianCounts;
  cleanup: ExternalStageSettings;
  model: ExternalStageSettings;
}

/**
 * Immutable process-wide configuration, built once at startup and passed
 * explicitly to every stage and step.
 */
export interface PipelineContext {
  readonly configPath: string;
  readonly workRoot: string;
  readonly items: readonly string[];
  readonly tier: ResourceTier;
  readonly configDir: string;
  readonly configRules: Readonly<Record<ResourceTier, readonly string[]>>;
  readonly configPathRewrites: readonly PathRewrite[];
  readonly sharedResources: readonly string[];
  readonly copiedResources: readonly string[];
  readonly phoneMaps: {
    readonly diphthongsDir: string;
    readonly tonesDir: string;
  };
  readonly identifierDelimiter: string;
  readonly dispatch: Readonly<DispatchSettings>;
  readonly training: Readonly<TrainingSettings>;
  readonly logLevel: LogLevel;
}

export interface LexiconEntry {
  word: string;
  phones: string[];
}

/**
 * One item's (or the combined) pronunciation dictionary.
 * Phone inventory and clustering questions are derived from the lexicons.
 */
export interface Dictionary {
  silenceLexicon: LexiconEntry[];
  nonsilenceLexicon: LexiconEntry[];
}

export interface PhoneInventory {
  silencePhones: string[];
  optionalSilence: string;
  /** One group per root phone: the root and every tagged variant. */
  nonsilencePhones: string[][];
  /** One question per tag, plus the silence question first. */
  extraQuestions: string[][];
}
