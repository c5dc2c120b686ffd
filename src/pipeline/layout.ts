import path from "node:path";

/**
 * Directory layout under the work root. Every value is relative to
 * `workRoot` and uses forward slashes, so it doubles as a step id for the
 * state store.
 */
export const Layout = {
  stageMarker: (ordinal: number) => `.stages/stage-${ordinal}`,
  itemDir: (item: string) => `data/${item}`,
  itemLexicon: (item: string) => `data/${item}/data/local/lexicon.txt`,
  itemRawCorpus: (item: string) => `data/${item}/data/train`,
  itemDictionary: (item: string) => `data/${item}/data/dict_universal`,
  itemPrefixedCorpus: (item: string) => `data/${item}/data/train_${item}`,
  combinedCorpus: "data/train",
  combinedDictionary: "data/dict_universal",
  baseLang: "data/lang_universal",
  subsetsMarker: "data/.subsets",
  subset: (name: string) => `data/${name}`,
  model: (step: string) => `exp/${step}`,
  reestimatedDictionary: (step: string) => `data/dict_universal/dictp/${step}`,
  reestimatedLangProbabilities: (step: string) => `data/dict_universal/langp/${step}`,
  reestimatedLang: (step: string) => `data/lang_universalp/${step}`
} as const;

/**
 * Names under `data/` owned by the merged corpus and models. Item
 * workspaces and subsets share that directory and must avoid them.
 */
export const RESERVED_DATA_NAMES: readonly string[] = [
  Layout.combinedCorpus,
  Layout.combinedDictionary,
  Layout.baseLang,
  Layout.subsetsMarker,
  path.posix.dirname(Layout.reestimatedLang("step"))
].map((relativePath) => path.posix.basename(relativePath));

export function resolveLayoutPath(workRoot: string, relativePath: string): string {
  return path.join(workRoot, ...relativePath.split("/"));
}
