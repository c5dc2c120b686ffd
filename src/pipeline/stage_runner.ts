import { ConfigurationError, withErrorContext } from "../shared/errors.ts";
import { banner, type Logger } from "../shared/logger.ts";
import { Layout } from "./layout.ts";
import type { StateStore } from "./state_store.ts";

export interface PipelineStage {
  ordinal: number;
  label: string;
  run(): Promise<void>;
}

export type StageSkipReason = "below-threshold" | "marker-present";

export interface StageOutcome {
  ordinal: number;
  label: string;
  status: "completed" | "skipped";
  reason?: StageSkipReason;
}

export interface RunStagesOptions {
  /** Resume threshold: stages below it are taken as already complete. */
  fromStage?: number;
  store: StateStore;
  logger: Logger;
}

export function validateStageOrder(stages: readonly PipelineStage[]): void {
  for (let index = 1; index < stages.length; index += 1) {
    if (stages[index].ordinal <= stages[index - 1].ordinal) {
      throw new ConfigurationError(
        `Stage ordinals must be strictly increasing: ${stages[index - 1].ordinal} is followed by ${stages[index].ordinal}`
      );
    }
  }
}

/**
 * Run stages in ascending order. A stage runs only when it is at or above
 * the resume threshold and its marker is absent; a present marker is always
 * trusted. Stages below the threshold are assumed complete. The first
 * failure aborts the run and no later stage starts.
 */
export async function runStages(
  stages: readonly PipelineStage[],
  { fromStage = 0, store, logger }: RunStagesOptions
): Promise<StageOutcome[]> {
  validateStageOrder(stages);
  const lastStage = stages.at(-1);
  if (lastStage && fromStage > lastStage.ordinal) {
    throw new ConfigurationError(
      `Resume threshold ${fromStage} is beyond the last stage (${lastStage.ordinal})`
    );
  }

  const outcomes: StageOutcome[] = [];
  for (const stage of stages) {
    const markerId = Layout.stageMarker(stage.ordinal);
    if (stage.ordinal < fromStage) {
      if (await store.isComplete(markerId)) {
        logger.info(`Stage ${stage.ordinal} (${stage.label}): below resume threshold, skipping`);
      } else {
        logger.warn(
          `Stage ${stage.ordinal} (${stage.label}): below resume threshold and not marked complete, assuming it is`
        );
      }
      outcomes.push({ ordinal: stage.ordinal, label: stage.label, status: "skipped", reason: "below-threshold" });
      continue;
    }

    if (await store.isComplete(markerId)) {
      logger.info(`Stage ${stage.ordinal} (${stage.label}): marker present, skipping`);
      outcomes.push({ ordinal: stage.ordinal, label: stage.label, status: "skipped", reason: "marker-present" });
      continue;
    }

    banner(logger, `Stage ${stage.ordinal}: ${stage.label}`);
    try {
      await stage.run();
    } catch (error) {
      throw withErrorContext(error, { stage: stage.ordinal });
    }
    await store.markComplete(markerId);
    outcomes.push({ ordinal: stage.ordinal, label: stage.label, status: "completed" });
  }
  return outcomes;
}
