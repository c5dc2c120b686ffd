import assert from "node:assert/strict";
import { test } from "node:test";
import { createCorpus, utteranceIds } from "../../src/pipeline/corpus.ts";
import { SILENCE_LEXICON } from "../../src/pipeline/lexicon.ts";
import { combineCorpora, combineDictionaries, formatConflicts, mergeItems } from "../../src/pipeline/merger.ts";
import { MemoryStateStore } from "../../src/pipeline/state_store.ts";
import { DataError, StateError } from "../../src/shared/errors.ts";
import { createRecordingLogger } from "../../src/shared/logger.ts";
import type { Dictionary, LexiconEntry } from "../../src/shared/types.ts";
import { FakeDispatcher } from "../helpers/fake_dispatcher.ts";
import { makeContext } from "../helpers/context.ts";

function dictionary(nonsilenceLexicon: LexiconEntry[]): Dictionary {
  return { silenceLexicon: [...SILENCE_LEXICON], nonsilenceLexicon };
}

test("combineCorpora keeps every utterance of every item", () => {
  const alpha = createCorpus({
    utt2spk: [
      ["alpha:u1", "alpha:s1"],
      ["alpha:u2", "alpha:s1"]
    ],
    text: [
      ["alpha:u1", "one"],
      ["alpha:u2", "two"]
    ]
  });
  const beta = createCorpus({
    utt2spk: [["beta:u1", "beta:s9"]],
    text: [["beta:u1", "drei"]]
  });

  const combined = combineCorpora([
    { item: "alpha", corpus: alpha },
    { item: "beta", corpus: beta }
  ]);
  assert.deepEqual(utteranceIds(combined), ["alpha:u1", "alpha:u2", "beta:u1"]);
  assert.equal(combined.tables.get("text")?.get("beta:u1"), "drei");
});

test("combineCorpora rejects an id shared by two items", () => {
  const corpus = createCorpus({ utt2spk: [["u1", "s1"]] });
  assert.throws(
    () =>
      combineCorpora([
        { item: "alpha", corpus },
        { item: "beta", corpus }
      ]),
    (error: unknown) =>
      error instanceof DataError &&
      error.item === "beta" &&
      error.message === 'Duplicate id "u1" in utt2spk of items alpha and beta'
  );
});

test("combineDictionaries keeps conflicting pronunciations and reports them", () => {
  const { dictionary: combined, conflicts } = combineDictionaries([
    { item: "alpha", dictionary: dictionary([{ word: "hello", phones: ["h", "e", "l", "o"] }]) },
    { item: "beta", dictionary: dictionary([{ word: "hello", phones: ["h", "a", "l", "o"] }]) }
  ]);

  assert.deepEqual(combined.nonsilenceLexicon, [
    { word: "hello", phones: ["h", "a", "l", "o"] },
    { word: "hello", phones: ["h", "e", "l", "o"] }
  ]);
  assert.deepEqual(conflicts, [
    {
      word: "hello",
      pronunciations: [
        { phones: ["h", "a", "l", "o"], items: ["beta"] },
        { phones: ["h", "e", "l", "o"], items: ["alpha"] }
      ]
    }
  ]);
  assert.equal(formatConflicts(conflicts), "hello\tbeta\th a l o\nhello\talpha\th e l o\n");
});

test("combineDictionaries collapses identical pronunciations", () => {
  const { dictionary: combined, conflicts } = combineDictionaries([
    { item: "alpha", dictionary: dictionary([{ word: "ok", phones: ["o", "k"] }]) },
    { item: "beta", dictionary: dictionary([{ word: "ok", phones: ["o", "k"] }]) }
  ]);
  assert.deepEqual(combined.nonsilenceLexicon, [{ word: "ok", phones: ["o", "k"] }]);
  assert.deepEqual(conflicts, []);
  assert.equal(formatConflicts(conflicts), "");
});

test("combineDictionaries does not report variants contributed by a single item", () => {
  const { dictionary: combined, conflicts } = combineDictionaries([
    {
      item: "alpha",
      dictionary: dictionary([
        { word: "either", phones: ["i", "th", "r"] },
        { word: "either", phones: ["ai", "th", "r"] }
      ])
    },
    { item: "beta", dictionary: dictionary([{ word: "ja", phones: ["j", "a"] }]) }
  ]);
  assert.equal(combined.nonsilenceLexicon.length, 3);
  assert.deepEqual(conflicts, []);
});

test("combineDictionaries rejects silence lexicons that differ", () => {
  const beta: Dictionary = {
    silenceLexicon: [{ word: "<silence>", phones: ["SIL"] }],
    nonsilenceLexicon: []
  };
  assert.throws(
    () =>
      combineDictionaries([
        { item: "alpha", dictionary: dictionary([]) },
        { item: "beta", dictionary: beta }
      ]),
    /Silence lexicon of item beta differs from that of item alpha/
  );
});

test("mergeItems needs every item's prefixed corpus and dictionary", async () => {
  const context = makeContext("/nonexistent-work-root");
  const store = new MemoryStateStore(["data/alpha/data/train_alpha", "data/alpha/data/dict_universal"]);
  const dispatcher = new FakeDispatcher();

  await assert.rejects(
    () => mergeItems(context, { dispatcher, store, logger: createRecordingLogger() }),
    (error: unknown) =>
      error instanceof StateError &&
      error.item === "beta" &&
      error.message === "Merge needs data/beta/data/train_beta, which is not marked complete"
  );
  assert.equal(dispatcher.calls.length, 0);
});

test("mergeItems skips when the linguistic model is already marked", async () => {
  const context = makeContext("/nonexistent-work-root");
  const store = new MemoryStateStore(["data/lang_universal"]);
  const result = await mergeItems(context, {
    dispatcher: new FakeDispatcher(),
    store,
    logger: createRecordingLogger()
  });
  assert.equal(result, null);
});
