import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { formatSchemaErrors, validateAgainstSchema } from "../../src/quality/schema_validator.ts";
import { ConfigurationError } from "../../src/shared/errors.ts";
import { SchemaPaths } from "../../src/shared/schema_paths.ts";

async function loadJson(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, "utf-8");
  return JSON.parse(raw);
}

test("example pipeline config matches schema", async () => {
  const data = await loadJson(path.resolve("pipeline.config.example.json"));
  await validateAgainstSchema(data, SchemaPaths.pipelineConfig);
});

test("pipeline config schema rejects unknown fields and bad identifiers", async () => {
  await assert.rejects(
    () =>
      validateAgainstSchema(
        { items: ["alpha", "be ta"], tier: "limited", colour: "blue" },
        SchemaPaths.pipelineConfig,
        "pipeline.config.json"
      ),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message.startsWith("Schema validation failed (pipeline.config.json): ") &&
      error.message.includes("/items/1 must match pattern") &&
      error.message.includes("must NOT have additional properties")
  );
});

test("pipeline config schema requires exactly three subsets", async () => {
  await assert.rejects(
    () =>
      validateAgainstSchema(
        { items: ["alpha"], tier: "full", training: { subsets: [{ name: "train_sub1", size: 10 }] } },
        SchemaPaths.pipelineConfig
      ),
    /\/training\/subsets must NOT have fewer than 3 items/
  );
});

test("pipeline config schema rejects delimiters that could appear inside ids", async () => {
  for (const identifierDelimiter of [" ", "\t", "_", "x"]) {
    await assert.rejects(
      () => validateAgainstSchema({ items: ["alpha"], tier: "full", identifierDelimiter }, SchemaPaths.pipelineConfig),
      /\/identifierDelimiter must match pattern/
    );
  }
  await validateAgainstSchema({ items: ["alpha"], tier: "full", identifierDelimiter: "::" }, SchemaPaths.pipelineConfig);
});

test("formatSchemaErrors uses / for the document root", () => {
  assert.equal(
    formatSchemaErrors([
      { instancePath: "", schemaPath: "#/required", keyword: "required", params: {}, message: "must have required property 'tier'" }
    ]),
    "/ must have required property 'tier'"
  );
  assert.equal(formatSchemaErrors(null), "");
});
