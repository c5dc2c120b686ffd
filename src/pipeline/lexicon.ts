import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { DataError, StateError } from "../shared/errors.ts";
import type { Dictionary, LexiconEntry, PhoneInventory } from "../shared/types.ts";
import { compareCodeUnits } from "./corpus.ts";
import { pathExists } from "./state_store.ts";

/**
 * Closed silence vocabulary shared by every item.
 */
export const SILENCE_LEXICON: readonly LexiconEntry[] = [
  { word: "<silence>", phones: ["SIL"] },
  { word: "<unk>", phones: ["<oov>"] },
  { word: "<noise>", phones: ["<sss>"] },
  { word: "<v-noise>", phones: ["<vns>"] }
];

export const OPTIONAL_SILENCE = "SIL";

const SILENCE_WORDS = new Set(SILENCE_LEXICON.map((entry) => entry.word));

export const PHONE_TAG_SEPARATOR = "_";

export const DictionaryFiles = {
  lexicon: "lexicon.txt",
  silenceLexicon: "silence_lexicon.txt",
  nonsilenceLexicon: "nonsilence_lexicon.txt",
  silencePhones: "silence_phones.txt",
  optionalSilence: "optional_silence.txt",
  nonsilencePhones: "nonsilence_phones.txt",
  extraQuestions: "extra_questions.txt"
} as const;

export interface ToneRule {
  standardized: string;
  /** Emit the tag as a phone of its own instead of a clustering question. */
  separate: boolean;
}

export interface PhoneRuleTables {
  /** Root phone → the phones it splits into. */
  diphthongs: Map<string, string[]>;
  /** Raw tag → standardized tag. `null` keeps tags as they are. */
  tones: Map<string, ToneRule> | null;
}

export interface ParsedPhone {
  root: string;
  tags: string[];
}

interface SourceLocation {
  item?: string;
  filePath?: string;
  lineNumber?: number;
}

export function formatLexiconEntry(entry: LexiconEntry): string {
  return `${entry.word}\t${entry.phones.join(" ")}`;
}

export function parseLexiconLine(line: string, location: SourceLocation = {}): LexiconEntry {
  const tabIndex = line.indexOf("\t");
  const word = (tabIndex >= 0 ? line.slice(0, tabIndex) : line.split(/\s+/, 1)[0] ?? "").trim();
  const pronunciation = tabIndex >= 0 ? line.slice(tabIndex + 1) : line.slice(word.length);
  const phones = pronunciation.trim().split(/\s+/).filter(Boolean);
  if (!word || phones.length === 0) {
    throw new DataError(`Malformed lexicon line: "${line}"`, location);
  }
  return { word, phones };
}

export function parseLexicon(content: string, location: SourceLocation = {}): LexiconEntry[] {
  const entries: LexiconEntry[] = [];
  for (const [index, rawLine] of content.split(/\r?\n/).entries()) {
    if (!rawLine.trim()) {
      continue;
    }
    entries.push(parseLexiconLine(rawLine, { ...location, lineNumber: index + 1 }));
  }
  return entries;
}

export function isSilenceWord(word: string): boolean {
  return SILENCE_WORDS.has(word);
}

export function partitionLexicon(entries: readonly LexiconEntry[]): {
  silence: LexiconEntry[];
  nonsilence: LexiconEntry[];
} {
  const nonsilence = entries.filter((entry) => !isSilenceWord(entry.word));
  return {
    silence: SILENCE_LEXICON.map((entry) => ({ word: entry.word, phones: [...entry.phones] })),
    nonsilence
  };
}

export function parsePhone(token: string, location: SourceLocation = {}): ParsedPhone {
  const [root, ...tags] = token.split(PHONE_TAG_SEPARATOR);
  if (!root || tags.some((tag) => !tag)) {
    throw new DataError(`Unresolvable phone "${token}"`, location);
  }
  return { root, tags };
}

export function formatPhone(root: string, tags: readonly string[]): string {
  return [root, ...tags].join(PHONE_TAG_SEPARATOR);
}

function tableRows(content: string): Array<{ fields: string[]; lineNumber: number }> {
  const rows: Array<{ fields: string[]; lineNumber: number }> = [];
  for (const [index, rawLine] of content.split(/\r?\n/).entries()) {
    const line = rawLine.replace(/#.*$/, "").trim();
    if (line) {
      rows.push({ fields: line.split(/\s+/), lineNumber: index + 1 });
    }
  }
  return rows;
}

export function parseDiphthongTable(content: string, location: SourceLocation = {}): Map<string, string[]> {
  const table = new Map<string, string[]>();
  for (const { fields, lineNumber } of tableRows(content)) {
    const [phone, ...parts] = fields;
    if (parts.length === 0) {
      throw new DataError(`Diphthong rule for "${phone}" lists no component phones`, {
        ...location,
        lineNumber
      });
    }
    table.set(phone, parts);
  }
  return table;
}

export function parseToneTable(content: string, location: SourceLocation = {}): Map<string, ToneRule> {
  const table = new Map<string, ToneRule>();
  for (const { fields, lineNumber } of tableRows(content)) {
    const [tag, standardized, flag] = fields;
    if (!standardized || (flag !== undefined && flag !== "separate")) {
      throw new DataError(`Malformed tone rule: "${fields.join(" ")}"`, { ...location, lineNumber });
    }
    table.set(tag, { standardized, separate: flag === "separate" });
  }
  return table;
}

/**
 * Split diphthongs and standardize tone tags of one pronunciation. Tags of a
 * split root are carried by every component phone; tags marked `separate`
 * become phones following the root.
 */
export function standardizePronunciation(
  phones: readonly string[],
  rules: PhoneRuleTables,
  location: SourceLocation = {}
): string[] {
  const standardized: string[] = [];
  for (const token of phones) {
    const { root, tags } = parsePhone(token, location);
    const keptTags: string[] = [];
    const separatePhones: string[] = [];
    for (const tag of tags) {
      if (!rules.tones) {
        keptTags.push(tag);
        continue;
      }
      const rule = rules.tones.get(tag);
      if (!rule) {
        throw new DataError(`Unresolvable phone "${token}": tag "${tag}" has no tone rule`, location);
      }
      if (rule.separate) {
        separatePhones.push(rule.standardized);
      } else {
        keptTags.push(rule.standardized);
      }
    }
    const roots = rules.diphthongs.get(root) ?? [root];
    for (const component of roots) {
      standardized.push(formatPhone(component, keptTags));
    }
    standardized.push(...separatePhones);
  }
  return standardized;
}

/**
 * Drop exact duplicate entries and sort by the formatted line.
 */
export function sortLexicon(entries: readonly LexiconEntry[]): LexiconEntry[] {
  const byLine = new Map<string, LexiconEntry>();
  for (const entry of entries) {
    byLine.set(formatLexiconEntry(entry), entry);
  }
  return [...byLine.entries()]
    .sort(([a], [b]) => compareCodeUnits(a, b))
    .map(([, entry]) => entry);
}

export function buildItemDictionary(
  rawLexicon: readonly LexiconEntry[],
  rules: PhoneRuleTables,
  location: SourceLocation = {}
): Dictionary {
  const { silence, nonsilence } = partitionLexicon(rawLexicon);
  const standardized = nonsilence.map((entry) => ({
    word: entry.word,
    phones: standardizePronunciation(entry.phones, rules, location)
  }));
  return {
    silenceLexicon: sortLexicon(silence),
    nonsilenceLexicon: sortLexicon(standardized)
  };
}

function sortedGroups(groups: Map<string, Set<string>>): string[][] {
  return [...groups.entries()]
    .sort(([a], [b]) => compareCodeUnits(a, b))
    .map(([, members]) => [...members].sort(compareCodeUnits));
}

/**
 * Phone inventory and clustering questions implied by a dictionary: phones
 * sharing a root share a line of nonsilence_phones.txt, and every tag becomes
 * an extra question over the phones that carry it.
 */
export function derivePhoneInventory(dictionary: Dictionary): PhoneInventory {
  const silencePhones = new Set<string>();
  for (const entry of dictionary.silenceLexicon) {
    for (const phone of entry.phones) {
      silencePhones.add(phone);
    }
  }

  const byRoot = new Map<string, Set<string>>();
  const byTag = new Map<string, Set<string>>();
  for (const entry of dictionary.nonsilenceLexicon) {
    for (const phone of entry.phones) {
      if (silencePhones.has(phone)) {
        continue;
      }
      const { root, tags } = parsePhone(phone);
      const rootGroup = byRoot.get(root) ?? new Set<string>();
      rootGroup.add(phone);
      byRoot.set(root, rootGroup);
      for (const tag of tags) {
        const tagGroup = byTag.get(tag) ?? new Set<string>();
        tagGroup.add(phone);
        byTag.set(tag, tagGroup);
      }
    }
  }

  const silenceList = [...silencePhones].sort(compareCodeUnits);
  return {
    silencePhones: silenceList,
    optionalSilence: OPTIONAL_SILENCE,
    nonsilencePhones: sortedGroups(byRoot),
    extraQuestions: [silenceList, ...sortedGroups(byTag)]
  };
}

function linesOf(rows: readonly string[]): string {
  return rows.length > 0 ? `${rows.join("\n")}\n` : "";
}

export async function writeDictionary(dir: string, dictionary: Dictionary): Promise<PhoneInventory> {
  const inventory = derivePhoneInventory(dictionary);
  const combined = sortLexicon([...dictionary.silenceLexicon, ...dictionary.nonsilenceLexicon]);

  await rm(dir, { recursive: true, force: true });
  await mkdir(dir, { recursive: true });
  const files: Array<[string, string]> = [
    [DictionaryFiles.silenceLexicon, linesOf(dictionary.silenceLexicon.map(formatLexiconEntry))],
    [DictionaryFiles.nonsilenceLexicon, linesOf(dictionary.nonsilenceLexicon.map(formatLexiconEntry))],
    [DictionaryFiles.lexicon, linesOf(combined.map(formatLexiconEntry))],
    [DictionaryFiles.silencePhones, linesOf(inventory.silencePhones)],
    [DictionaryFiles.optionalSilence, linesOf([inventory.optionalSilence])],
    [DictionaryFiles.nonsilencePhones, linesOf(inventory.nonsilencePhones.map((group) => group.join(" ")))],
    [DictionaryFiles.extraQuestions, linesOf(inventory.extraQuestions.map((group) => group.join(" ")))]
  ];
  for (const [fileName, content] of files) {
    await writeFile(path.join(dir, fileName), content, "utf-8");
  }
  return inventory;
}

export async function readDictionary(dir: string, item?: string): Promise<Dictionary> {
  const silencePath = path.join(dir, DictionaryFiles.silenceLexicon);
  const nonsilencePath = path.join(dir, DictionaryFiles.nonsilenceLexicon);
  if (!(await pathExists(silencePath)) || !(await pathExists(nonsilencePath))) {
    throw new StateError(`Dictionary directory is incomplete: ${dir}`, { item });
  }
  return {
    silenceLexicon: parseLexicon(await readFile(silencePath, "utf-8"), { item, filePath: silencePath }),
    nonsilenceLexicon: parseLexicon(await readFile(nonsilencePath, "utf-8"), {
      item,
      filePath: nonsilencePath
    })
  };
}
