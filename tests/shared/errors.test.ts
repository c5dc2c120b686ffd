import assert from "node:assert/strict";
import { test } from "node:test";
import {
  ConfigurationError,
  DataError,
  PipelineError,
  StateError,
  StepFailure,
  describeError,
  withErrorContext
} from "../../src/shared/errors.ts";

test("describeError names the failing stage and item", () => {
  const error = new StateError("data/train is missing", { stage: 4, item: "alpha" });
  assert.equal(describeError(error), "StateError (stage=4, item=alpha): data/train is missing");
});

test("describeError falls back to the plain message", () => {
  assert.equal(describeError(new Error("boom")), "boom");
  assert.equal(describeError("text"), "text");
  assert.equal(describeError(new ConfigurationError("bad tier")), "ConfigurationError: bad tier");
});

test("withErrorContext fills only missing fields", () => {
  const error = new DataError("Malformed lexicon line", { item: "beta", lineNumber: 3 });
  const result = withErrorContext(error, { item: "alpha", stage: 2 });

  assert.equal(result, error);
  assert.equal(error.item, "beta");
  assert.equal(error.stage, 2);
  assert.equal(error.lineNumber, 3);
});

test("withErrorContext leaves foreign errors untouched", () => {
  const error = new TypeError("nope");
  assert.equal(withErrorContext(error, { stage: 1 }), error);
});

test("StepFailure carries the command and exit code", () => {
  const failure = new StepFailure("train failed", { command: "steps/train_mono.sh", exitCode: 2, step: "mono" });
  assert.ok(failure instanceof PipelineError);
  assert.equal(failure.name, "StepFailure");
  assert.equal(failure.command, "steps/train_mono.sh");
  assert.equal(failure.exitCode, 2);
  assert.equal(describeError(failure), "StepFailure (step=mono): train failed");
});
