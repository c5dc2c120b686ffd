import { writeFile } from "node:fs/promises";
import path from "node:path";
import { DataError, StateError } from "../shared/errors.ts";
import type { Logger } from "../shared/logger.ts";
import type { Dictionary, LexiconEntry, PipelineContext } from "../shared/types.ts";
import type { CommandDispatcher } from "./command_runner.ts";
import {
  compareCodeUnits,
  readCorpus,
  validateCorpus,
  writeCorpus,
  type Corpus,
  type CorpusTable,
  type CorpusTableName
} from "./corpus.ts";
import { Layout, resolveLayoutPath } from "./layout.ts";
import { formatLexiconEntry, readDictionary, sortLexicon, writeDictionary } from "./lexicon.ts";
import type { StateStore } from "./state_store.ts";

export const PREPARE_LANG_SCRIPT = "./utils/prepare_lang.sh";
export const CONFLICTS_FILE = "lexicon_conflicts.txt";

export interface ItemCorpus {
  item: string;
  corpus: Corpus;
}

export interface ItemDictionary {
  item: string;
  dictionary: Dictionary;
}

export interface PronunciationSource {
  phones: string[];
  items: string[];
}

export interface LexiconConflict {
  word: string;
  pronunciations: PronunciationSource[];
}

export interface CombinedDictionary {
  dictionary: Dictionary;
  conflicts: LexiconConflict[];
}

/**
 * Union of item corpora. Any id that appears in two items is an error, since
 * prefixing should already have made every id unique.
 */
export function combineCorpora(sources: readonly ItemCorpus[]): Corpus {
  const tables = new Map<CorpusTableName, CorpusTable>();
  const owners = new Map<CorpusTableName, Map<string, string>>();

  for (const { item, corpus } of sources) {
    for (const [name, table] of corpus.tables) {
      const combined = tables.get(name) ?? new Map<string, string>();
      const ownerByKey = owners.get(name) ?? new Map<string, string>();
      for (const [key, value] of table) {
        const owner = ownerByKey.get(key);
        if (owner !== undefined) {
          throw new DataError(`Duplicate id "${key}" in ${name} of items ${owner} and ${item}`, { item });
        }
        ownerByKey.set(key, item);
        combined.set(key, value);
      }
      tables.set(name, combined);
      owners.set(name, ownerByKey);
    }
  }

  const corpus: Corpus = { tables };
  validateCorpus(corpus, "combined corpus");
  return corpus;
}

function silenceSignature(entries: readonly LexiconEntry[]): string {
  return sortLexicon(entries).map(formatLexiconEntry).join("\n");
}

/**
 * Merge item dictionaries. Silence lexicons must agree exactly; non-silence
 * words keep every distinct pronunciation, and words pronounced differently
 * by different items are reported as conflicts.
 */
export function combineDictionaries(sources: readonly ItemDictionary[]): CombinedDictionary {
  if (sources.length === 0) {
    throw new DataError("No dictionaries to combine");
  }

  const [first] = sources;
  const expectedSilence = silenceSignature(first.dictionary.silenceLexicon);
  for (const { item, dictionary } of sources.slice(1)) {
    if (silenceSignature(dictionary.silenceLexicon) !== expectedSilence) {
      throw new DataError(`Silence lexicon of item ${item} differs from that of item ${first.item}`, {
        item
      });
    }
  }

  const byWord = new Map<string, Map<string, PronunciationSource>>();
  for (const { item, dictionary } of sources) {
    for (const entry of dictionary.nonsilenceLexicon) {
      const pronunciations = byWord.get(entry.word) ?? new Map<string, PronunciationSource>();
      const key = entry.phones.join(" ");
      const source = pronunciations.get(key) ?? { phones: [...entry.phones], items: [] };
      if (!source.items.includes(item)) {
        source.items.push(item);
      }
      pronunciations.set(key, source);
      byWord.set(entry.word, pronunciations);
    }
  }

  const nonsilenceLexicon: LexiconEntry[] = [];
  const conflicts: LexiconConflict[] = [];
  for (const [word, pronunciations] of byWord) {
    const sourcesForWord = [...pronunciations.values()];
    for (const source of sourcesForWord) {
      nonsilenceLexicon.push({ word, phones: source.phones });
    }
    const contributingItems = new Set(sourcesForWord.flatMap((source) => source.items));
    if (sourcesForWord.length > 1 && contributingItems.size > 1) {
      conflicts.push({
        word,
        pronunciations: sourcesForWord.sort((a, b) => compareCodeUnits(a.phones.join(" "), b.phones.join(" ")))
      });
    }
  }
  conflicts.sort((a, b) => compareCodeUnits(a.word, b.word));

  return {
    dictionary: {
      silenceLexicon: sortLexicon(first.dictionary.silenceLexicon),
      nonsilenceLexicon: sortLexicon(nonsilenceLexicon)
    },
    conflicts
  };
}

export function formatConflicts(conflicts: readonly LexiconConflict[]): string {
  const rows: string[] = [];
  for (const conflict of conflicts) {
    for (const source of conflict.pronunciations) {
      rows.push(`${conflict.word}\t${source.items.join(",")}\t${source.phones.join(" ")}`);
    }
  }
  return rows.length > 0 ? `${rows.join("\n")}\n` : "";
}

export interface MergeDeps {
  dispatcher: CommandDispatcher;
  store: StateStore;
  logger: Logger;
}

export interface MergeResult {
  utteranceCount: number;
  wordCount: number;
  conflicts: LexiconConflict[];
}

/**
 * Combine every item's prefixed corpus and dictionary, then build the shared
 * linguistic model from the combined dictionary.
 */
export async function mergeItems(context: PipelineContext, deps: MergeDeps): Promise<MergeResult | null> {
  const stepId = Layout.baseLang;
  if (await deps.store.isComplete(stepId)) {
    deps.logger.info("Merge: already done, skipping");
    return null;
  }

  for (const item of context.items) {
    for (const upstream of [Layout.itemPrefixedCorpus(item), Layout.itemDictionary(item)]) {
      if (!(await deps.store.isComplete(upstream))) {
        throw new StateError(`Merge needs ${upstream}, which is not marked complete`, { item });
      }
    }
  }

  const corpora: ItemCorpus[] = [];
  const dictionaries: ItemDictionary[] = [];
  for (const item of context.items) {
    corpora.push({
      item,
      corpus: await readCorpus(resolveLayoutPath(context.workRoot, Layout.itemPrefixedCorpus(item)))
    });
    dictionaries.push({
      item,
      dictionary: await readDictionary(resolveLayoutPath(context.workRoot, Layout.itemDictionary(item)), item)
    });
  }

  const corpus = combineCorpora(corpora);
  const { dictionary, conflicts } = combineDictionaries(dictionaries);

  const corpusDir = resolveLayoutPath(context.workRoot, Layout.combinedCorpus);
  const dictionaryDir = resolveLayoutPath(context.workRoot, Layout.combinedDictionary);
  await writeCorpus(corpusDir, corpus);
  await writeDictionary(dictionaryDir, dictionary);
  await writeFile(path.join(dictionaryDir, CONFLICTS_FILE), formatConflicts(conflicts), "utf-8");
  if (conflicts.length > 0) {
    deps.logger.warn(
      `${conflicts.length} word(s) have different pronunciations across items; all kept (see ${Layout.combinedDictionary}/${CONFLICTS_FILE})`
    );
  }

  await deps.dispatcher.run({
    label: "prepare lang",
    script: PREPARE_LANG_SCRIPT,
    args: [
      "--share-silence-phones",
      "true",
      Layout.combinedDictionary,
      context.training.oovSymbol,
      `${Layout.combinedDictionary}/tmp.lang`,
      Layout.baseLang
    ],
    cwd: context.workRoot
  });

  await deps.store.markComplete(stepId);
  const utt2spk = corpus.tables.get("utt2spk");
  return {
    utteranceCount: utt2spk ? utt2spk.size : 0,
    wordCount: dictionary.nonsilenceLexicon.length,
    conflicts
  };
}
