import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { createCorpus } from "../../src/pipeline/corpus.ts";
import { isPrefixed, prefixCorpus, prefixIdentifier, prefixItemCorpus } from "../../src/pipeline/prefixer.ts";
import { MemoryStateStore } from "../../src/pipeline/state_store.ts";
import { DataError } from "../../src/shared/errors.ts";
import { createRecordingLogger } from "../../src/shared/logger.ts";
import { writeItemSource } from "../helpers/fake_dispatcher.ts";
import { makeContext, makeWorkRoot, removeWorkRoot } from "../helpers/context.ts";

test("prefixIdentifier prepends the item and is idempotent", () => {
  const once = prefixIdentifier("alpha", "u1", ":");
  assert.equal(once, "alpha:u1");
  assert.equal(prefixIdentifier("alpha", once, ":"), once);
  assert.ok(isPrefixed("alpha", once, ":"));
  assert.ok(!isPrefixed("alpha", "alpha:", ":"));
});

test("prefixIdentifier keeps distinct (item, id) pairs distinct", () => {
  const pairs: Array<[string, string]> = [
    ["alpha", "u1"],
    ["alpha", "u2"],
    ["beta", "u1"],
    ["alph", "au1"],
    ["alpha-b", "u1"]
  ];
  const prefixed = pairs.map(([item, id]) => prefixIdentifier(item, id, ":"));
  assert.equal(new Set(prefixed).size, pairs.length);
});

test("prefixIdentifier rejects ids it cannot prefix unambiguously", () => {
  assert.throws(() => prefixIdentifier("alpha", "beta:u1", ":"), DataError);
  assert.throws(() => prefixIdentifier("alpha", "", ":"), /Cannot prefix an empty identifier/);
});

test("prefixCorpus renames keys and referenced ids but not payloads", () => {
  const corpus = createCorpus({
    utt2spk: [["u1", "s1"]],
    text: [["u1", "s1 said this"]],
    segments: [["u1", "r1 0.00 1.20"]],
    "wav.scp": [["r1", "sox r1.wav -t wav - |"]],
    spk2gender: [["s1", "f"]]
  });

  const prefixed = prefixCorpus(corpus, "alpha", ":");
  assert.deepEqual([...(prefixed.tables.get("utt2spk") ?? [])], [["alpha:u1", "alpha:s1"]]);
  assert.deepEqual([...(prefixed.tables.get("text") ?? [])], [["alpha:u1", "s1 said this"]]);
  assert.deepEqual([...(prefixed.tables.get("segments") ?? [])], [["alpha:u1", "alpha:r1 0.00 1.20"]]);
  assert.deepEqual([...(prefixed.tables.get("wav.scp") ?? [])], [["alpha:r1", "sox r1.wav -t wav - |"]]);
  assert.deepEqual([...(prefixed.tables.get("spk2gender") ?? [])], [["alpha:s1", "f"]]);

  assert.deepEqual(prefixCorpus(prefixed, "alpha", ":"), prefixed);
});

test("prefixCorpus reports ids that collide after prefixing", () => {
  const corpus = createCorpus({
    utt2spk: [
      ["u1", "s1"],
      ["alpha:u1", "s1"]
    ]
  });
  assert.throws(
    () => prefixCorpus(corpus, "alpha", ":"),
    /Prefixing "alpha:u1" in utt2spk produced a duplicate id "alpha:u1"/
  );
});

test("prefixItemCorpus writes the prefixed copy once", async () => {
  const workRoot = await makeWorkRoot();
  try {
    const context = makeContext(workRoot);
    await writeItemSource(path.join(workRoot, "data", "alpha"), {
      utterances: [
        ["u2", "s1", "b"],
        ["u1", "s1", "a"]
      ],
      lexicon: "a\tA\n"
    });
    const store = new MemoryStateStore();
    const deps = { store, logger: createRecordingLogger() };

    assert.equal(await prefixItemCorpus(context, deps, "alpha"), true);
    const outputDir = path.join(workRoot, "data", "alpha", "data", "train_alpha");
    assert.equal(await readFile(path.join(outputDir, "utt2spk"), "utf-8"), "alpha:u1 alpha:s1\nalpha:u2 alpha:s1\n");
    assert.equal(await readFile(path.join(outputDir, "spk2utt"), "utf-8"), "alpha:s1 alpha:u1 alpha:u2\n");
    assert.ok(store.completed.has("data/alpha/data/train_alpha"));

    assert.equal(await prefixItemCorpus(context, deps, "alpha"), false);
  } finally {
    await removeWorkRoot(workRoot);
  }
});
