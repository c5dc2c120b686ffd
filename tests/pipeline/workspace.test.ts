import assert from "node:assert/strict";
import { lstat, mkdir, readFile, readlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { pathExists } from "../../src/pipeline/state_store.ts";
import { applyPathRewrites, setupItemWorkspace } from "../../src/pipeline/workspace.ts";
import { ConfigurationError } from "../../src/shared/errors.ts";
import { createRecordingLogger } from "../../src/shared/logger.ts";
import { makeContext, makeWorkRoot, removeWorkRoot, writeItemConfig } from "../helpers/context.ts";

test("applyPathRewrites replaces every occurrence in order", () => {
  assert.equal(
    applyPathRewrites("a=/old/x\nb=/old/y\n", [
      { from: "/old", to: "/new" },
      { from: "/new/y", to: "/moved/y" }
    ]),
    "a=/new/x\nb=/moved/y\n"
  );
});

test("setupItemWorkspace links shared resources, copies files and links the config", async () => {
  const workRoot = await makeWorkRoot();
  try {
    await mkdir(path.join(workRoot, "local"), { recursive: true });
    await writeFile(path.join(workRoot, "cmd.sh"), "export train_cmd=run.pl\n", "utf-8");
    const configPath = await writeItemConfig(workRoot, "alpha-dev-limitedLP.official.conf");
    const context = makeContext(workRoot, { sharedResources: ["local"], copiedResources: ["cmd.sh"] });

    const workspace = await setupItemWorkspace(context, "alpha", createRecordingLogger());
    const dir = path.join(workRoot, "data", "alpha");
    assert.deepEqual(workspace, { item: "alpha", dir, configPath, configLinked: true });
    assert.equal(await readlink(path.join(dir, "local")), path.join(workRoot, "local"));
    assert.ok(!(await lstat(path.join(dir, "cmd.sh"))).isSymbolicLink());
    assert.equal(await readFile(path.join(dir, "cmd.sh"), "utf-8"), "export train_cmd=run.pl\n");
    assert.equal(await readlink(path.join(dir, "lang.conf")), configPath);

    await setupItemWorkspace(context, "alpha", createRecordingLogger());
    assert.equal(await readlink(path.join(dir, "lang.conf")), configPath);
  } finally {
    await removeWorkRoot(workRoot);
  }
});

test("setupItemWorkspace writes a rewritten copy of the config when rewrites are set", async () => {
  const workRoot = await makeWorkRoot();
  try {
    await writeItemConfig(workRoot, "alpha-dev-limitedLP.conf", "train_data_dir=/export/corpora/alpha\n");
    const context = makeContext(workRoot, {
      configPathRewrites: [{ from: "/export/corpora", to: "/data/corpora" }]
    });

    const workspace = await setupItemWorkspace(context, "alpha", createRecordingLogger());
    const target = path.join(workspace.dir, "lang.conf");
    assert.equal(workspace.configLinked, false);
    assert.ok(!(await lstat(target)).isSymbolicLink());
    assert.equal(await readFile(target, "utf-8"), "train_data_dir=/data/corpora/alpha\n");
  } finally {
    await removeWorkRoot(workRoot);
  }
});

test("setupItemWorkspace creates nothing for an item without a config", async () => {
  const workRoot = await makeWorkRoot();
  try {
    await writeItemConfig(workRoot, "alpha-dev-limitedLP.conf");
    const context = makeContext(workRoot);

    await assert.rejects(
      () => setupItemWorkspace(context, "beta", createRecordingLogger()),
      (error: unknown) => error instanceof ConfigurationError && error.item === "beta"
    );
    assert.equal(await pathExists(path.join(workRoot, "data", "beta")), false);
  } finally {
    await removeWorkRoot(workRoot);
  }
});

test("setupItemWorkspace reports a missing shared resource", async () => {
  const workRoot = await makeWorkRoot();
  try {
    await writeItemConfig(workRoot, "alpha-dev-limitedLP.conf");
    const context = makeContext(workRoot, { sharedResources: ["steps"] });

    await assert.rejects(
      () => setupItemWorkspace(context, "alpha", createRecordingLogger()),
      /Shared resource not found: .*steps$/
    );
  } finally {
    await removeWorkRoot(workRoot);
  }
});
