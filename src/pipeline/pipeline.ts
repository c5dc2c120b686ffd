import { StateError, withErrorContext } from "../shared/errors.ts";
import type { Logger } from "../shared/logger.ts";
import type { ExternalStageSettings, PipelineContext } from "../shared/types.ts";
import type { CommandDispatcher } from "./command_runner.ts";
import { Layout, resolveLayoutPath } from "./layout.ts";
import { mergeItems } from "./merger.ts";
import { prefixItemCorpus } from "./prefixer.ts";
import { prepareItemData, standardizeItemLexicon } from "./preparer.ts";
import { runStages, type PipelineStage, type StageOutcome } from "./stage_runner.ts";
import { pathExists, type StateStore } from "./state_store.ts";
import { createSubsets } from "./subset.ts";
import { langDirForStep, planTrainingChain, runTrainingChain, type PlannedTrainingStep } from "./trainer.ts";
import { runWithConcurrency } from "./worker_pool.ts";
import { setupItemWorkspace } from "./workspace.ts";

export interface PipelineDeps {
  dispatcher: CommandDispatcher;
  store: StateStore;
  logger: Logger;
}

async function forEachItem(
  context: PipelineContext,
  task: (item: string) => Promise<unknown>
): Promise<void> {
  await runWithConcurrency(
    context.items.map((item) => async () => {
      try {
        await task(item);
      } catch (error) {
        throw withErrorContext(error, { item });
      }
    }),
    context.dispatch.maxParallelItems
  );
}

async function runExternalStage(
  context: PipelineContext,
  deps: PipelineDeps,
  plan: readonly PlannedTrainingStep[],
  name: string,
  settings: ExternalStageSettings
): Promise<void> {
  if (await deps.store.isComplete(settings.outputDir)) {
    deps.logger.info(`${name}: already done, skipping`);
    return;
  }

  const langDir = langDirForStep(plan, settings.langFromStep);
  if (!(await pathExists(resolveLayoutPath(context.workRoot, langDir)))) {
    throw new StateError(`${name} needs ${langDir}, which does not exist`, { step: name });
  }

  try {
    await deps.dispatcher.run({
      label: name,
      script: settings.script,
      args: ["--langdir", langDir, ...settings.args],
      cwd: context.workRoot
    });
  } catch (error) {
    throw withErrorContext(error, { step: name });
  }
  await deps.store.markComplete(settings.outputDir);
}

export const STAGE_LABELS = [
  "set up item workspaces",
  "prepare item data",
  "standardize item lexicons",
  "prefix item identifiers",
  "merge corpora and dictionaries",
  "sequential training",
  "cleanup and segmentation",
  "final model training"
] as const;

/**
 * The eight pipeline stages, in order. Per-item stages fan out over the
 * bounded worker pool and finish only when every item has.
 */
export function buildPipelineStages(context: PipelineContext, deps: PipelineDeps): PipelineStage[] {
  const plan = planTrainingChain(context);
  return [
    {
      ordinal: 0,
      label: STAGE_LABELS[0],
      run: () => forEachItem(context, (item) => setupItemWorkspace(context, item, deps.logger))
    },
    {
      ordinal: 1,
      label: STAGE_LABELS[1],
      run: () => forEachItem(context, (item) => prepareItemData(context, deps, item))
    },
    {
      ordinal: 2,
      label: STAGE_LABELS[2],
      run: () => forEachItem(context, (item) => standardizeItemLexicon(context, deps, item))
    },
    {
      ordinal: 3,
      label: STAGE_LABELS[3],
      run: () => forEachItem(context, (item) => prefixItemCorpus(context, deps, item))
    },
    {
      ordinal: 4,
      label: STAGE_LABELS[4],
      run: async () => {
        await mergeItems(context, deps);
      }
    },
    {
      ordinal: 5,
      label: STAGE_LABELS[5],
      run: async () => {
        await createSubsets(context, deps);
        await runTrainingChain(context, deps, plan);
      }
    },
    {
      ordinal: 6,
      label: STAGE_LABELS[6],
      run: () => runExternalStage(context, deps, plan, "cleanup", context.training.cleanup)
    },
    {
      ordinal: 7,
      label: STAGE_LABELS[7],
      run: () => runExternalStage(context, deps, plan, "final model", context.training.model)
    }
  ];
}

export interface RunPipelineOptions {
  fromStage?: number;
  deps: PipelineDeps;
}

export async function runPipeline(
  context: PipelineContext,
  { fromStage = 0, deps }: RunPipelineOptions
): Promise<StageOutcome[]> {
  deps.logger.info(`Items: ${context.items.join(" ")} (${context.tier} tier)`);
  const outcomes = await runStages(buildPipelineStages(context, deps), {
    fromStage,
    store: deps.store,
    logger: deps.logger
  });
  const completed = outcomes.filter((outcome) => outcome.status === "completed").length;
  deps.logger.info(`Pipeline finished: ${completed} stage(s) run, ${outcomes.length - completed} skipped`);
  return outcomes;
}

export interface StatusEntry {
  id: string;
  label: string;
  complete: boolean;
}

/**
 * Marker state of every stage and every training step.
 */
export async function describePipelineStatus(
  context: PipelineContext,
  store: StateStore
): Promise<StatusEntry[]> {
  const entries: StatusEntry[] = [];
  for (const [ordinal, label] of STAGE_LABELS.entries()) {
    const id = Layout.stageMarker(ordinal);
    entries.push({ id, label: `stage ${ordinal}: ${label}`, complete: await store.isComplete(id) });
  }
  for (const step of planTrainingChain(context)) {
    entries.push({
      id: step.modelDir,
      label: `training step ${step.definition.id}`,
      complete: await store.isComplete(step.modelDir)
    });
  }
  for (const [name, settings] of [
    ["cleanup", context.training.cleanup],
    ["final model", context.training.model]
  ] as const) {
    entries.push({ id: settings.outputDir, label: name, complete: await store.isComplete(settings.outputDir) });
  }
  return entries;
}
