import { ConfigurationError, StateError, withErrorContext } from "../shared/errors.ts";
import { banner, type Logger } from "../shared/logger.ts";
import type { LeafGaussianCounts, PipelineContext, TrainingSettings } from "../shared/types.ts";
import type { CommandDispatcher, CommandSpec } from "./command_runner.ts";
import { Layout, resolveLayoutPath } from "./layout.ts";
import { pathExists, type StateStore } from "./state_store.ts";

export const REESTIMATE_SCRIPT = "./local/reestimate_langp.sh";

type CorpusChoice = "small" | "medium" | "large" | "full";
type TrainerKind = "mono" | "deltas" | "lda_mllt" | "sat";
type AlignerKind = "si" | "fmllr";
type JobCount = number | "train";

export interface TrainingStepDefinition {
  id: string;
  title: string;
  corpus: CorpusChoice;
  /** Align the corpus with the previous step's model before training. */
  align?: {
    kind: AlignerKind;
    jobs: JobCount;
    /** Alignment directory name; when there is no trainer it is the step's model. */
    output: string;
  };
  train?: {
    kind: TrainerKind;
    jobs?: JobCount;
    counts?: (settings: TrainingSettings) => LeafGaussianCounts;
  };
  /** Re-estimate pronunciation/silence probabilities from the step's model. */
  reestimate: boolean;
}

export const TRAINING_CHAIN: readonly TrainingStepDefinition[] = [
  {
    id: "mono",
    title: "(small) monophone training",
    corpus: "small",
    train: { kind: "mono", jobs: 8 },
    reestimate: false
  },
  {
    id: "tri1",
    title: "(small) triphone training",
    corpus: "medium",
    align: { kind: "si", jobs: 12, output: "mono_ali_sub2" },
    train: { kind: "deltas", counts: (settings) => settings.tri1 },
    reestimate: false
  },
  {
    id: "tri2",
    title: "(medium) triphone training",
    corpus: "large",
    align: { kind: "si", jobs: 24, output: "tri1_ali_sub3" },
    train: { kind: "deltas", counts: (settings) => settings.tri2 },
    reestimate: true
  },
  {
    id: "tri3",
    title: "(full) triphone training",
    corpus: "full",
    align: { kind: "si", jobs: "train", output: "tri2_ali" },
    train: { kind: "deltas", counts: (settings) => settings.tri3 },
    reestimate: true
  },
  {
    id: "tri4",
    title: "(lda_mllt) triphone training",
    corpus: "full",
    align: { kind: "si", jobs: "train", output: "tri3_ali" },
    train: { kind: "lda_mllt", counts: (settings) => settings.mllt },
    reestimate: true
  },
  {
    id: "tri5",
    title: "(SAT) triphone training",
    corpus: "full",
    align: { kind: "si", jobs: "train", output: "tri4_ali" },
    train: { kind: "sat", counts: (settings) => settings.sat },
    reestimate: true
  },
  {
    id: "tri5_ali",
    title: "fMLLR alignment",
    corpus: "full",
    align: { kind: "fmllr", jobs: "train", output: "tri5_ali" },
    reestimate: true
  }
];

const ALIGN_SCRIPTS: Record<AlignerKind, string> = {
  si: "steps/align_si.sh",
  fmllr: "steps/align_fmllr.sh"
};

const TRAIN_SCRIPTS: Record<TrainerKind, string> = {
  mono: "steps/train_mono.sh",
  deltas: "steps/train_deltas.sh",
  lda_mllt: "steps/train_lda_mllt.sh",
  sat: "steps/train_sat.sh"
};

export interface PlannedTrainingStep {
  definition: TrainingStepDefinition;
  corpusDir: string;
  /** Linguistic model the step aligns and trains against. */
  langDir: string;
  previousModelDir?: string;
  modelDir: string;
  /** Linguistic model produced for the next step, when re-estimating. */
  reestimatedLangDir?: string;
  commands: CommandSpec[];
}

function corpusDirFor(context: PipelineContext, choice: CorpusChoice): string {
  const [small, medium, large] = context.training.subsets;
  switch (choice) {
    case "small":
      return Layout.subset(small.name);
    case "medium":
      return Layout.subset(medium.name);
    case "large":
      return Layout.subset(large.name);
    case "full":
      return Layout.combinedCorpus;
  }
}

function jobCount(context: PipelineContext, jobs: JobCount | undefined): string[] {
  if (jobs === undefined) {
    return [];
  }
  return ["--nj", String(jobs === "train" ? context.dispatch.trainJobs : jobs)];
}

function commonArgs(context: PipelineContext): string[] {
  return ["--boost-silence", String(context.training.boostSilence)];
}

/**
 * Resolve every step's inputs and commands up front. The linguistic model
 * each step consumes is the one re-estimated by the closest earlier step, so
 * the plan is the same whether or not earlier steps run in this invocation.
 */
export function planTrainingChain(
  context: PipelineContext,
  chain: readonly TrainingStepDefinition[] = TRAINING_CHAIN
): PlannedTrainingStep[] {
  const plan: PlannedTrainingStep[] = [];
  let langDir: string = Layout.baseLang;
  let previousModelDir: string | undefined;

  for (const definition of chain) {
    const corpusDir = corpusDirFor(context, definition.corpus);
    const commands: CommandSpec[] = [];
    let trainInput = previousModelDir;
    let modelDir = Layout.model(definition.id);

    if (definition.align) {
      if (!previousModelDir) {
        throw new ConfigurationError(`Training step ${definition.id} aligns but has no previous model`);
      }
      const alignDir = Layout.model(definition.align.output);
      commands.push({
        label: `${definition.id} align`,
        script: ALIGN_SCRIPTS[definition.align.kind],
        args: [
          ...commonArgs(context),
          ...jobCount(context, definition.align.jobs),
          "--cmd",
          context.dispatch.trainCmd,
          corpusDir,
          langDir,
          previousModelDir,
          alignDir
        ],
        cwd: context.workRoot
      });
      trainInput = alignDir;
      modelDir = alignDir;
    }

    if (definition.train) {
      modelDir = Layout.model(definition.id);
      const counts = definition.train.counts?.(context.training);
      const positional = counts ? [String(counts.leaves), String(counts.gaussians)] : [];
      const inputs = definition.train.kind !== "mono" && trainInput ? [trainInput] : [];
      commands.push({
        label: `${definition.id} train`,
        script: TRAIN_SCRIPTS[definition.train.kind],
        args: [
          ...commonArgs(context),
          ...jobCount(context, definition.train.jobs),
          "--cmd",
          context.dispatch.trainCmd,
          ...positional,
          corpusDir,
          langDir,
          ...inputs,
          modelDir
        ],
        cwd: context.workRoot
      });
    }

    let reestimatedLangDir: string | undefined;
    if (definition.reestimate) {
      reestimatedLangDir = Layout.reestimatedLang(definition.id);
      commands.push({
        label: `${definition.id} reestimate`,
        script: REESTIMATE_SCRIPT,
        args: [
          "--cmd",
          context.dispatch.trainCmd,
          "--unk",
          context.training.oovSymbol,
          corpusDir,
          Layout.baseLang,
          Layout.combinedDictionary,
          modelDir,
          Layout.reestimatedDictionary(definition.id),
          Layout.reestimatedLangProbabilities(definition.id),
          reestimatedLangDir
        ],
        cwd: context.workRoot
      });
    }

    plan.push({
      definition,
      corpusDir,
      langDir,
      previousModelDir,
      modelDir,
      reestimatedLangDir,
      commands
    });

    previousModelDir = modelDir;
    if (reestimatedLangDir) {
      langDir = reestimatedLangDir;
    }
  }
  return plan;
}

/**
 * Linguistic model re-estimated by the named step.
 */
export function langDirForStep(plan: readonly PlannedTrainingStep[], stepId: string): string {
  const step = plan.find((entry) => entry.definition.id === stepId);
  if (!step) {
    throw new ConfigurationError(`Unknown training step "${stepId}"`);
  }
  if (!step.reestimatedLangDir) {
    throw new ConfigurationError(`Training step "${stepId}" does not re-estimate a linguistic model`);
  }
  return step.reestimatedLangDir;
}

export interface TrainerDeps {
  dispatcher: CommandDispatcher;
  store: StateStore;
  logger: Logger;
}

async function requireInput(context: PipelineContext, relativePath: string, step: string): Promise<void> {
  if (!(await pathExists(resolveLayoutPath(context.workRoot, relativePath)))) {
    throw new StateError(`Training step ${step} needs ${relativePath}, which does not exist`, { step });
  }
}

export async function runTrainingStep(
  context: PipelineContext,
  deps: TrainerDeps,
  step: PlannedTrainingStep
): Promise<boolean> {
  const stepId = step.modelDir;
  const name = step.definition.id;
  if (await deps.store.isComplete(stepId)) {
    deps.logger.info(`Training step ${name}: already done, skipping`);
    return false;
  }

  if (step.previousModelDir && !(await deps.store.isComplete(step.previousModelDir))) {
    throw new StateError(
      `Training step ${name} needs ${step.previousModelDir}, which is not marked complete`,
      { step: name }
    );
  }
  await requireInput(context, step.corpusDir, name);
  await requireInput(context, step.langDir, name);

  banner(deps.logger, `Starting ${step.definition.title} in ${step.modelDir}`);
  try {
    for (const command of step.commands) {
      await deps.dispatcher.run(command);
    }
  } catch (error) {
    throw withErrorContext(error, { step: name });
  }
  await deps.store.markComplete(stepId);
  return true;
}

export async function runTrainingChain(
  context: PipelineContext,
  deps: TrainerDeps,
  plan: readonly PlannedTrainingStep[] = planTrainingChain(context)
): Promise<string[]> {
  const executed: string[] = [];
  for (const step of plan) {
    if (await runTrainingStep(context, deps, step)) {
      executed.push(step.definition.id);
    }
  }
  return executed;
}
