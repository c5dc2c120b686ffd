import { copyFile, lstat, mkdir, readFile, rm, symlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { resolveItemConfigPath } from "../config/config_matcher.ts";
import { ConfigurationError } from "../shared/errors.ts";
import type { Logger } from "../shared/logger.ts";
import type { PathRewrite, PipelineContext } from "../shared/types.ts";
import { Layout, resolveLayoutPath } from "./layout.ts";
import { pathExists } from "./state_store.ts";

export const ITEM_CONFIG_LINK = "lang.conf";

export interface ItemWorkspace {
  item: string;
  dir: string;
  /** Configuration file selected for the item. */
  configPath: string;
  /** Whether lang.conf is a link (true) or a rewritten copy (false). */
  configLinked: boolean;
}

async function removeIfPresent(target: string): Promise<void> {
  try {
    await lstat(target);
  } catch {
    return;
  }
  await rm(target, { recursive: true, force: true });
}

async function linkResource(source: string, target: string): Promise<void> {
  if (!(await pathExists(source))) {
    throw new ConfigurationError(`Shared resource not found: ${source}`);
  }
  await removeIfPresent(target);
  await symlink(source, target);
}

export function applyPathRewrites(text: string, rewrites: readonly PathRewrite[]): string {
  return rewrites.reduce((current, rewrite) => current.replaceAll(rewrite.from, rewrite.to), text);
}

/**
 * Create (or refresh) an item's isolated workspace: shared resources are
 * linked, small resource files copied, and the item's configuration file
 * placed as lang.conf.
 */
export async function setupItemWorkspace(
  context: PipelineContext,
  item: string,
  logger: Logger
): Promise<ItemWorkspace> {
  const configPath = await resolveItemConfigPath(context, item);
  const dir = resolveLayoutPath(context.workRoot, Layout.itemDir(item));
  await mkdir(dir, { recursive: true });

  for (const resource of context.sharedResources) {
    await linkResource(path.resolve(context.workRoot, resource), path.join(dir, path.basename(resource)));
  }
  for (const resource of context.copiedResources) {
    const source = path.resolve(context.workRoot, resource);
    if (!(await pathExists(source))) {
      throw new ConfigurationError(`Resource file not found: ${source}`, { item });
    }
    await copyFile(source, path.join(dir, path.basename(resource)));
  }

  const configTarget = path.join(dir, ITEM_CONFIG_LINK);
  const configLinked = context.configPathRewrites.length === 0;
  await removeIfPresent(configTarget);
  if (configLinked) {
    await symlink(configPath, configTarget);
  } else {
    const original = await readFile(configPath, "utf-8");
    await writeFile(configTarget, applyPathRewrites(original, context.configPathRewrites), "utf-8");
  }

  logger.info(`Workspace ${item}: ${path.relative(context.workRoot, configPath)}`);
  return { item, dir, configPath, configLinked };
}
