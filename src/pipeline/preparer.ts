import { readFile } from "node:fs/promises";
import path from "node:path";
import { StateError } from "../shared/errors.ts";
import type { Logger } from "../shared/logger.ts";
import type { PipelineContext } from "../shared/types.ts";
import type { CommandDispatcher } from "./command_runner.ts";
import { Layout, resolveLayoutPath } from "./layout.ts";
import {
  buildItemDictionary,
  parseDiphthongTable,
  parseLexicon,
  parseToneTable,
  writeDictionary,
  type PhoneRuleTables
} from "./lexicon.ts";
import { pathExists, type StateStore } from "./state_store.ts";

export const PREPARE_DATA_SCRIPT = "./local/prepare_data.sh";

export interface PreparerDeps {
  dispatcher: CommandDispatcher;
  store: StateStore;
  logger: Logger;
}

/**
 * Run the toolkit's data preparation inside the item workspace; it produces
 * the item's raw corpus under data/train.
 */
export async function prepareItemData(
  context: PipelineContext,
  deps: PreparerDeps,
  item: string
): Promise<boolean> {
  const stepId = Layout.itemRawCorpus(item);
  if (await deps.store.isComplete(stepId)) {
    deps.logger.info(`Prepare data ${item}: already done, skipping`);
    return false;
  }

  const workspaceDir = resolveLayoutPath(context.workRoot, Layout.itemDir(item));
  if (!(await pathExists(workspaceDir))) {
    throw new StateError(`Workspace for item ${item} does not exist: ${workspaceDir}`, { item });
  }

  deps.logger.info(`Prepare data ${item}`);
  await deps.dispatcher.run({
    label: `prepare data ${item}`,
    script: PREPARE_DATA_SCRIPT,
    args: [],
    cwd: workspaceDir
  });

  const corpusDir = resolveLayoutPath(context.workRoot, stepId);
  if (!(await pathExists(corpusDir))) {
    throw new StateError(`Data preparation for ${item} produced no corpus at ${corpusDir}`, { item });
  }
  await deps.store.markComplete(stepId);
  return true;
}

export async function loadPhoneRuleTables(context: PipelineContext, item: string): Promise<PhoneRuleTables> {
  const diphthongPath = path.join(context.phoneMaps.diphthongsDir, item);
  const tonePath = path.join(context.phoneMaps.tonesDir, item);

  const diphthongs = (await pathExists(diphthongPath))
    ? parseDiphthongTable(await readFile(diphthongPath, "utf-8"), { item, filePath: diphthongPath })
    : new Map<string, string[]>();
  const tones = (await pathExists(tonePath))
    ? parseToneTable(await readFile(tonePath, "utf-8"), { item, filePath: tonePath })
    : null;
  return { diphthongs, tones };
}

/**
 * Partition the item's lexicon into silence and non-silence words, apply
 * its diphthong and tone rules, and write the item dictionary.
 */
export async function standardizeItemLexicon(
  context: PipelineContext,
  deps: PreparerDeps,
  item: string
): Promise<boolean> {
  const stepId = Layout.itemDictionary(item);
  if (await deps.store.isComplete(stepId)) {
    deps.logger.info(`Dictionary ${item}: already done, skipping`);
    return false;
  }

  const lexiconPath = resolveLayoutPath(context.workRoot, Layout.itemLexicon(item));
  if (!(await pathExists(lexiconPath))) {
    throw new StateError(`Lexicon for item ${item} not found: ${lexiconPath}`, { item });
  }

  deps.logger.info(`Dictionary ${item}`);
  const location = { item, filePath: lexiconPath };
  const rawLexicon = parseLexicon(await readFile(lexiconPath, "utf-8"), location);
  const rules = await loadPhoneRuleTables(context, item);
  const dictionary = buildItemDictionary(rawLexicon, rules, location);
  const inventory = await writeDictionary(resolveLayoutPath(context.workRoot, stepId), dictionary);
  deps.logger.debug(
    `Dictionary ${item}: ${dictionary.nonsilenceLexicon.length} words, ${inventory.nonsilencePhones.length} root phones`
  );
  await deps.store.markComplete(stepId);
  return true;
}
