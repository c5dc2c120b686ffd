import { readFile } from "node:fs/promises";
import path from "node:path";
import Ajv2020 from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv";
import { ConfigurationError } from "../shared/errors.ts";

const ajv = new Ajv2020({
  allErrors: true,
  strict: false,
  validateFormats: false
});
const validatorBySchemaPath = new Map<string, ValidateFunction>();

async function compileSchema(schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorBySchemaPath.get(schemaPath);
  if (cached) {
    return cached;
  }
  const raw = await readFile(schemaPath, "utf-8");
  const schema: unknown = JSON.parse(raw);
  if (typeof schema !== "object" || schema === null) {
    throw new ConfigurationError(`Schema ${path.basename(schemaPath)} is not a JSON object`);
  }
  const validate = ajv.compile(schema);
  validatorBySchemaPath.set(schemaPath, validate);
  return validate;
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((error) => {
      const where = error.instancePath || "/";
      return `${where} ${error.message ?? "validation error"}`;
    })
    .join("; ");
}

export async function validateAgainstSchema(
  data: unknown,
  schemaPath: string,
  sourceLabel?: string
): Promise<void> {
  const resolvedSchemaPath = path.resolve(schemaPath);
  const validate = await compileSchema(resolvedSchemaPath);
  if (validate(data)) {
    return;
  }

  const subject = sourceLabel ?? path.basename(resolvedSchemaPath);
  throw new ConfigurationError(
    `Schema validation failed (${subject}): ${formatSchemaErrors(validate.errors)}`
  );
}
