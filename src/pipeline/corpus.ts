import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { DataError, StateError } from "../shared/errors.ts";
import { pathExists } from "./state_store.ts";

export type IdentifierKind = "utterance" | "speaker" | "recording";

export interface CorpusTableSchema {
  key: IdentifierKind;
  /** Identifier kind stored in the first value column, if any. */
  firstValue?: IdentifierKind;
}

/**
 * Table files of a corpus directory and the identifier namespaces they
 * reference. `spk2utt` is not listed: it is always regenerated from
 * `utt2spk`.
 */
export const CORPUS_TABLES = {
  utt2spk: { key: "utterance", firstValue: "speaker" },
  text: { key: "utterance" },
  "feats.scp": { key: "utterance" },
  segments: { key: "utterance", firstValue: "recording" },
  utt2dur: { key: "utterance" },
  "cmvn.scp": { key: "speaker" },
  spk2gender: { key: "speaker" },
  "wav.scp": { key: "recording" },
  reco2file_and_channel: { key: "recording" }
} as const satisfies Record<string, CorpusTableSchema>;

export type CorpusTableName = keyof typeof CORPUS_TABLES;

export const CORPUS_TABLE_NAMES = Object.keys(CORPUS_TABLES).filter(
  (name): name is CorpusTableName => name in CORPUS_TABLES
);

export type CorpusTable = Map<string, string>;

/**
 * A corpus: for every table file present, a map from the row key to the rest
 * of the row, kept verbatim.
 */
export interface Corpus {
  tables: Map<CorpusTableName, CorpusTable>;
}

export function tableSchema(name: CorpusTableName): CorpusTableSchema {
  return CORPUS_TABLES[name];
}

export function createCorpus(rows: Partial<Record<CorpusTableName, Array<[string, string]>>> = {}): Corpus {
  const tables = new Map<CorpusTableName, CorpusTable>();
  for (const name of CORPUS_TABLE_NAMES) {
    const entries = rows[name];
    if (entries) {
      tables.set(name, new Map(entries));
    }
  }
  return { tables };
}

export function compareCodeUnits(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function utteranceIds(corpus: Corpus): string[] {
  return [...(corpus.tables.get("utt2spk")?.keys() ?? [])].sort(compareCodeUnits);
}

export function splitRow(line: string): [string, string] {
  const match = line.match(/^(\S+)\s*(.*)$/);
  if (!match) {
    return ["", ""];
  }
  return [match[1], match[2]];
}

export function firstToken(value: string): string {
  return value.split(/\s+/, 1)[0] ?? "";
}

export function parseTable(content: string, filePath: string): CorpusTable {
  const table: CorpusTable = new Map();
  const lines = content.split(/\r?\n/);
  for (const [index, rawLine] of lines.entries()) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    const [key, value] = splitRow(line);
    if (table.has(key)) {
      throw new DataError(`Duplicate key "${key}" in ${path.basename(filePath)}`, {
        filePath,
        lineNumber: index + 1
      });
    }
    table.set(key, value);
  }
  return table;
}

/**
 * Every utterance must be owned by exactly one speaker: keys of
 * utterance tables must all appear in utt2spk.
 */
export function validateCorpus(corpus: Corpus, label: string): void {
  const utt2spk = corpus.tables.get("utt2spk");
  if (!utt2spk) {
    throw new DataError(`${label} has no utt2spk table`);
  }
  for (const [name, table] of corpus.tables) {
    if (tableSchema(name).key !== "utterance") {
      continue;
    }
    for (const key of table.keys()) {
      if (!utt2spk.has(key)) {
        throw new DataError(`${label}: utterance "${key}" in ${name} has no speaker in utt2spk`);
      }
    }
  }
}

export async function readCorpus(dir: string): Promise<Corpus> {
  if (!(await pathExists(dir))) {
    throw new StateError(`Corpus directory not found: ${dir}`);
  }
  const tables = new Map<CorpusTableName, CorpusTable>();
  for (const name of CORPUS_TABLE_NAMES) {
    const filePath = path.join(dir, name);
    if (!(await pathExists(filePath))) {
      continue;
    }
    tables.set(name, parseTable(await readFile(filePath, "utf-8"), filePath));
  }
  const corpus: Corpus = { tables };
  validateCorpus(corpus, dir);
  return corpus;
}

function formatTable(table: CorpusTable): string {
  const rows = [...table.entries()]
    .sort(([a], [b]) => compareCodeUnits(a, b))
    .map(([key, value]) => (value ? `${key} ${value}` : key));
  return rows.length > 0 ? `${rows.join("\n")}\n` : "";
}

export function buildSpk2utt(corpus: Corpus): CorpusTable {
  const bySpeaker = new Map<string, string[]>();
  for (const [utterance, speaker] of corpus.tables.get("utt2spk") ?? []) {
    const utterances = bySpeaker.get(speaker) ?? [];
    utterances.push(utterance);
    bySpeaker.set(speaker, utterances);
  }
  const spk2utt: CorpusTable = new Map();
  for (const [speaker, utterances] of bySpeaker) {
    spk2utt.set(speaker, utterances.sort(compareCodeUnits).join(" "));
  }
  return spk2utt;
}

/**
 * Write a corpus directory from scratch: rows sorted by key, spk2utt
 * regenerated.
 */
export async function writeCorpus(dir: string, corpus: Corpus): Promise<void> {
  await rm(dir, { recursive: true, force: true });
  await mkdir(dir, { recursive: true });
  for (const [name, table] of corpus.tables) {
    await writeFile(path.join(dir, name), formatTable(table), "utf-8");
  }
  await writeFile(path.join(dir, "spk2utt"), formatTable(buildSpk2utt(corpus)), "utf-8");
}
