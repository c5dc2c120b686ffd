import path from "node:path";
import { fileURLToPath } from "node:url";

const SCHEMAS_DIR = fileURLToPath(new URL("../../schemas/", import.meta.url));

export const SchemaPaths = {
  pipelineConfig: path.join(SCHEMAS_DIR, "pipeline-config.schema.json")
} as const;
