import { readFile } from "node:fs/promises";
import path from "node:path";
import { validateAgainstSchema } from "../quality/schema_validator.ts";
import { ConfigurationError } from "./errors.ts";

export async function readJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read ${filePath}: ${reason}`);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${path.basename(filePath)} is not valid JSON: ${reason}`);
  }
}

/**
 * Read a JSON document and validate it against a schema before handing it back.
 */
export async function loadValidatedJson(filePath: string, schemaPath: string): Promise<unknown> {
  const data = await readJson(filePath);
  await validateAgainstSchema(data, schemaPath, path.basename(filePath));
  return data;
}
