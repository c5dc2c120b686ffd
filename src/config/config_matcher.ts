import { readdir } from "node:fs/promises";
import path from "node:path";
import { ConfigurationError } from "../shared/errors.ts";
import type { PipelineContext, ResourceTier } from "../shared/types.ts";

const REGEX_SPECIAL_RE = /[.+^${}()|[\]\\]/g;

/**
 * Compile a rule such as `{item}-*limitedLP*.conf` into a regular expression
 * anchored on the whole file name. `*` matches any run of characters,
 * `?` a single one.
 */
export function compileConfigRule(rule: string, item: string): RegExp {
  const withItem = rule.replaceAll("{item}", "\u0000");
  let source = "";
  for (const char of withItem) {
    if (char === "\u0000") {
      source += item.replace(REGEX_SPECIAL_RE, "\\$&");
    } else if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else {
      source += char.replace(REGEX_SPECIAL_RE, "\\$&");
    }
  }
  return new RegExp(`^${source}$`);
}

/**
 * Ranked-rule lookup of an item's configuration file. Rules are tried in
 * order; within a rule the alphabetically first matching name wins.
 */
export function matchItemConfig(
  fileNames: readonly string[],
  rules: Readonly<Record<ResourceTier, readonly string[]>>,
  item: string,
  tier: ResourceTier
): string | undefined {
  const candidates = [...fileNames].sort();
  for (const rule of rules[tier]) {
    const pattern = compileConfigRule(rule, item);
    const match = candidates.find((fileName) => pattern.test(path.posix.basename(fileName)));
    if (match) {
      return match;
    }
  }
  return undefined;
}

async function walkFiles(rootDir: string, relativeDir = ""): Promise<string[]> {
  const entries = await readdir(path.join(rootDir, relativeDir), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await walkFiles(rootDir, relativePath)));
    } else if (entry.isFile() || entry.isSymbolicLink()) {
      files.push(relativePath);
    }
  }
  return files;
}

async function listConfigFiles(configDir: string): Promise<string[]> {
  try {
    return await walkFiles(configDir);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot list configuration directory ${configDir}: ${reason}`);
  }
}

export async function resolveItemConfigPath(
  context: PipelineContext,
  item: string,
  tier: ResourceTier = context.tier
): Promise<string> {
  const fileNames = await listConfigFiles(context.configDir);
  const match = matchItemConfig(fileNames, context.configRules, item, tier);
  if (!match) {
    throw new ConfigurationError(
      `No configuration file in ${context.configDir} matches item "${item}" for tier "${tier}" (rules: ${context.configRules[tier].join(", ")})`,
      { item }
    );
  }
  return path.join(context.configDir, match);
}
