import { DataError } from "../shared/errors.ts";
import type { Logger } from "../shared/logger.ts";
import type { PipelineContext } from "../shared/types.ts";
import type { StateStore } from "./state_store.ts";
import {
  firstToken,
  readCorpus,
  tableSchema,
  writeCorpus,
  type Corpus,
  type CorpusTable,
  type CorpusTableName,
  type IdentifierKind
} from "./corpus.ts";
import { Layout, resolveLayoutPath } from "./layout.ts";

export function isPrefixed(item: string, id: string, delimiter: string): boolean {
  const prefix = `${item}${delimiter}`;
  return id.startsWith(prefix) && id.length > prefix.length && !id.slice(prefix.length).includes(delimiter);
}

/**
 * Prepend the item identifier to `id`. Applying it to an id that already
 * carries this item's prefix returns the id unchanged.
 */
export function prefixIdentifier(item: string, id: string, delimiter: string): string {
  if (isPrefixed(item, id, delimiter)) {
    return id;
  }
  if (!id) {
    throw new DataError("Cannot prefix an empty identifier", { item });
  }
  if (id.includes(delimiter)) {
    throw new DataError(
      `Identifier "${id}" contains the delimiter "${delimiter}" and cannot be prefixed with "${item}"`,
      { item }
    );
  }
  return `${item}${delimiter}${id}`;
}

function prefixValue(value: string, kind: IdentifierKind | undefined, rename: (id: string) => string): string {
  if (!kind) {
    return value;
  }
  const id = firstToken(value);
  if (!id) {
    return value;
  }
  return `${rename(id)}${value.slice(id.length)}`;
}

/**
 * Rename every utterance, speaker and recording id of a corpus. Row payloads
 * (features, transcripts, audio commands) are left untouched.
 */
export function prefixCorpus(corpus: Corpus, item: string, delimiter: string): Corpus {
  const rename = (id: string) => prefixIdentifier(item, id, delimiter);
  const tables = new Map<CorpusTableName, CorpusTable>();
  for (const [name, table] of corpus.tables) {
    const schema = tableSchema(name);
    const renamed: CorpusTable = new Map();
    for (const [key, value] of table) {
      const newKey = rename(key);
      if (renamed.has(newKey)) {
        throw new DataError(`Prefixing "${key}" in ${name} produced a duplicate id "${newKey}"`, { item });
      }
      renamed.set(newKey, prefixValue(value, schema.firstValue, rename));
    }
    tables.set(name, renamed);
  }
  return { tables };
}

export interface PrefixItemDeps {
  store: StateStore;
  logger: Logger;
}

/**
 * Write the item's prefixed corpus copy next to its raw corpus.
 * Returns false when the marker shows the work was already done.
 */
export async function prefixItemCorpus(
  context: PipelineContext,
  deps: PrefixItemDeps,
  item: string
): Promise<boolean> {
  const stepId = Layout.itemPrefixedCorpus(item);
  if (await deps.store.isComplete(stepId)) {
    deps.logger.info(`Prefix ${item}: already done, skipping`);
    return false;
  }

  deps.logger.info(`Prepend ${item} to data dir`);
  const corpus = await readCorpus(resolveLayoutPath(context.workRoot, Layout.itemRawCorpus(item)));
  const prefixed = prefixCorpus(corpus, item, context.identifierDelimiter);
  await writeCorpus(resolveLayoutPath(context.workRoot, stepId), prefixed);
  await deps.store.markComplete(stepId);
  return true;
}
