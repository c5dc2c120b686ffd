import assert from "node:assert/strict";
import path from "node:path";
import { test } from "node:test";
import { compileConfigRule, matchItemConfig, resolveItemConfigPath } from "../../src/config/config_matcher.ts";
import { DEFAULT_CONFIG_RULES } from "../../src/config/pipeline_config.ts";
import { ConfigurationError } from "../../src/shared/errors.ts";
import { makeContext, makeWorkRoot, removeWorkRoot, writeItemConfig } from "../helpers/context.ts";

test("compileConfigRule treats the item literally and * as a wildcard", () => {
  const pattern = compileConfigRule("{item}-*LLP*.conf", "a.b");
  assert.ok(pattern.test("a.b-build-LLP.official.conf"));
  assert.ok(!pattern.test("aXb-build-LLP.official.conf"));
  assert.ok(!pattern.test("a.b-build-LLP.conf.bak"));
});

test("matchItemConfig prefers the first rule over later ones", () => {
  const match = matchItemConfig(
    ["201-x-LLP.conf", "201-x-limitedLP.official.conf", "201-x-fullLP.official.conf"],
    DEFAULT_CONFIG_RULES,
    "201",
    "limited"
  );
  assert.equal(match, "201-x-limitedLP.official.conf");
});

test("matchItemConfig falls back to later rules and picks the first name within a rule", () => {
  assert.equal(matchItemConfig(["201-x-LLP.conf"], DEFAULT_CONFIG_RULES, "201", "limited"), "201-x-LLP.conf");
  assert.equal(
    matchItemConfig(["alpha-b-limitedLP.conf", "alpha-a-limitedLP.conf"], DEFAULT_CONFIG_RULES, "alpha", "limited"),
    "alpha-a-limitedLP.conf"
  );
});

test("matchItemConfig does not confuse items sharing a prefix", () => {
  assert.equal(matchItemConfig(["101-x-limitedLP.conf"], DEFAULT_CONFIG_RULES, "10", "limited"), undefined);
});

test("matchItemConfig matches files in nested directories by base name", () => {
  assert.equal(
    matchItemConfig(["babel/alpha-limitedLP.conf"], DEFAULT_CONFIG_RULES, "alpha", "limited"),
    "babel/alpha-limitedLP.conf"
  );
});

test("resolveItemConfigPath returns the matched file and names the item when none matches", async () => {
  const workRoot = await makeWorkRoot();
  try {
    const expected = await writeItemConfig(workRoot, "alpha-dev-limitedLP.official.conf");
    await writeItemConfig(workRoot, "alpha-dev-fullLP.official.conf");
    const context = makeContext(workRoot);

    assert.equal(await resolveItemConfigPath(context, "alpha"), expected);
    assert.equal(
      await resolveItemConfigPath(context, "alpha", "full"),
      path.join(workRoot, "conf", "lang", "alpha-dev-fullLP.official.conf")
    );
    await assert.rejects(
      () => resolveItemConfigPath(context, "beta"),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.item === "beta" &&
        error.message.includes('matches item "beta" for tier "limited"')
    );
  } finally {
    await removeWorkRoot(workRoot);
  }
});
