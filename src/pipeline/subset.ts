import { lstat, mkdir, rm, symlink } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../shared/logger.ts";
import type { PipelineContext, SubsetSpec } from "../shared/types.ts";
import {
  firstToken,
  readCorpus,
  tableSchema,
  utteranceIds,
  writeCorpus,
  type Corpus,
  type CorpusTable,
  type CorpusTableName
} from "./corpus.ts";
import { Layout, resolveLayoutPath } from "./layout.ts";
import type { StateStore } from "./state_store.ts";

/**
 * Indices `0..total-1` in bit-reversed (van der Corput) order: every prefix
 * of the order is spread evenly over the range.
 */
export function spreadOrder(total: number): number[] {
  let span = 1;
  while (span < total) {
    span *= 2;
  }
  const bits = Math.log2(span);
  const order: number[] = [];
  const seen = new Set<number>();
  for (let step = 0; step < span && order.length < total; step += 1) {
    let reversed = 0;
    for (let bit = 0; bit < bits; bit += 1) {
      reversed = (reversed << 1) | ((step >> bit) & 1);
    }
    const index = Math.floor((reversed * total) / span);
    if (!seen.has(index)) {
      seen.add(index);
      order.push(index);
    }
  }
  return order;
}

/**
 * Deterministic, evenly spread selection of `size` ids from the sorted id
 * list, returned in sorted order. Smaller selections are always contained
 * in larger ones. Returns every id when `size` is not smaller than the list.
 */
export function selectSubset(sortedIds: readonly string[], size: number): string[] {
  if (size >= sortedIds.length) {
    return [...sortedIds];
  }
  return spreadOrder(sortedIds.length)
    .slice(0, size)
    .sort((a, b) => a - b)
    .map((index) => sortedIds[index]);
}

/**
 * Restrict a corpus to the given utterances, keeping only the speakers and
 * recordings those utterances reference.
 */
export function subsetCorpus(corpus: Corpus, keep: ReadonlySet<string>): Corpus {
  const utt2spk = corpus.tables.get("utt2spk") ?? new Map<string, string>();
  const speakers = new Set<string>();
  for (const utterance of keep) {
    const speaker = utt2spk.get(utterance);
    if (speaker !== undefined) {
      speakers.add(firstToken(speaker));
    }
  }

  const segments = corpus.tables.get("segments");
  const recordings = new Set<string>();
  if (segments) {
    for (const [utterance, value] of segments) {
      if (keep.has(utterance)) {
        recordings.add(firstToken(value));
      }
    }
  }

  const allowed: Record<"utterance" | "speaker" | "recording", ReadonlySet<string>> = {
    utterance: keep,
    speaker: speakers,
    // Without segments, recordings are keyed by utterance id.
    recording: segments ? recordings : keep
  };

  const tables = new Map<CorpusTableName, CorpusTable>();
  for (const [name, table] of corpus.tables) {
    const ids = allowed[tableSchema(name).key];
    tables.set(name, new Map([...table].filter(([key]) => ids.has(key))));
  }
  return { tables };
}

export interface SubsetResult {
  name: string;
  size: number;
  utteranceCount: number;
  /** True when the subset is a link to the full corpus. */
  alias: boolean;
}

async function removeExisting(target: string): Promise<void> {
  try {
    await lstat(target);
  } catch {
    return;
  }
  await rm(target, { recursive: true, force: true });
}

export async function writeSubset(
  context: PipelineContext,
  corpus: Corpus,
  spec: SubsetSpec
): Promise<SubsetResult> {
  const ids = utteranceIds(corpus);
  const target = resolveLayoutPath(context.workRoot, Layout.subset(spec.name));
  await removeExisting(target);

  if (ids.length <= spec.size) {
    await mkdir(path.dirname(target), { recursive: true });
    await symlink(path.basename(Layout.combinedCorpus), target);
    return { name: spec.name, size: spec.size, utteranceCount: ids.length, alias: true };
  }

  const selected = selectSubset(ids, spec.size);
  await writeCorpus(target, subsetCorpus(corpus, new Set(selected)));
  return { name: spec.name, size: spec.size, utteranceCount: selected.length, alias: false };
}

export interface SubsetDeps {
  store: StateStore;
  logger: Logger;
}

/**
 * Derive the small, medium and large training subsets of the combined corpus.
 */
export async function createSubsets(context: PipelineContext, deps: SubsetDeps): Promise<SubsetResult[] | null> {
  if (await deps.store.isComplete(Layout.subsetsMarker)) {
    deps.logger.info("Subsets: already done, skipping");
    return null;
  }

  deps.logger.info(`Subsetting training data in ${context.training.subsets.map((s) => s.name).join(", ")}`);
  const corpus = await readCorpus(resolveLayoutPath(context.workRoot, Layout.combinedCorpus));
  const results: SubsetResult[] = [];
  for (const spec of context.training.subsets) {
    const result = await writeSubset(context, corpus, spec);
    deps.logger.info(
      result.alias
        ? `Subset ${spec.name}: corpus has ${result.utteranceCount} utterances (<= ${spec.size}), linked to ${Layout.combinedCorpus}`
        : `Subset ${spec.name}: ${result.utteranceCount} utterances`
    );
    results.push(result);
  }
  await deps.store.markComplete(Layout.subsetsMarker);
  return results;
}
