#!/usr/bin/env -S node --import tsx
import path from "node:path";
import { resolveItemConfigPath } from "../config/config_matcher.ts";
import { DEFAULT_CONFIG_FILE, loadPipelineContext } from "../config/pipeline_config.ts";
import { ShellCommandDispatcher } from "../pipeline/command_runner.ts";
import { describePipelineStatus, runPipeline } from "../pipeline/pipeline.ts";
import { FileMarkerStore } from "../pipeline/state_store.ts";
import {
  ensureOption,
  optionAsStageOrdinal,
  optionAsString,
  parseCliArgs,
  type CliOptions
} from "../shared/cli_args.ts";
import { ConfigurationError, describeError } from "../shared/errors.ts";
import { createConsoleLogger } from "../shared/logger.ts";
import { RESOURCE_TIERS, type PipelineContext, type ResourceTier } from "../shared/types.ts";

type CommandName = "run" | "status" | "resolve-config";
type CommandHandler = (options: CliOptions) => Promise<void>;

const usageByCommand: Record<CommandName, string> = {
  run: "Usage:\n  universal-am run [--stage N] [--config pipeline.config.json] [--work-root <dir>] [--log-level debug|info|warn|error]",
  status: "Usage:\n  universal-am status [--config pipeline.config.json]",
  "resolve-config":
    "Usage:\n  universal-am resolve-config --item <id> [--tier limited|full] [--config pipeline.config.json]"
};

function isCommandName(value: string): value is CommandName {
  return Object.hasOwn(usageByCommand, value);
}

function printUsage(command?: string) {
  if (command && isCommandName(command)) {
    console.log(usageByCommand[command]);
    return;
  }

  console.log(`Usage:
  ${usageByCommand.run.replace("Usage:\n  ", "")}
  ${usageByCommand.status.replace("Usage:\n  ", "")}
  ${usageByCommand["resolve-config"].replace("Usage:\n  ", "")}
`);
}

async function loadContext(options: CliOptions): Promise<PipelineContext> {
  return loadPipelineContext(optionAsString(options, "config") ?? DEFAULT_CONFIG_FILE, {
    logLevel: optionAsString(options, "log-level"),
    workRoot: optionAsString(options, "work-root")
  });
}

function optionAsTier(options: CliOptions): ResourceTier | undefined {
  const value = optionAsString(options, "tier");
  if (value === undefined) {
    return undefined;
  }
  const tier = RESOURCE_TIERS.find((candidate) => candidate === value);
  if (!tier) {
    throw new ConfigurationError(`Option --tier must be one of: ${RESOURCE_TIERS.join(", ")}`);
  }
  return tier;
}

const commandHandlers: Record<CommandName, CommandHandler> = {
  run: async (options) => {
    const fromStage = optionAsStageOrdinal(options, "stage") ?? 0;
    const context = await loadContext(options);
    const logger = createConsoleLogger(context.logLevel);
    const outcomes = await runPipeline(context, {
      fromStage,
      deps: {
        dispatcher: new ShellCommandDispatcher(context.dispatch.shell, logger),
        store: new FileMarkerStore(context.workRoot),
        logger
      }
    });

    const ran = outcomes.filter((outcome) => outcome.status === "completed").map((outcome) => outcome.ordinal);
    console.log(`Run done: stages run=${ran.length > 0 ? ran.join(",") : "none"}`);
    console.log(`- work root: ${path.relative(process.cwd(), context.workRoot) || "."}`);
  },
  status: async (options) => {
    const context = await loadContext(options);
    const entries = await describePipelineStatus(context, new FileMarkerStore(context.workRoot));
    for (const entry of entries) {
      console.log(`${entry.complete ? "[done]" : "[    ]"} ${entry.label} (${entry.id})`);
    }
  },
  "resolve-config": async (options) => {
    const item = ensureOption(options, "item", "resolve-config");
    const context = await loadContext(options);
    const configPath = await resolveItemConfigPath(context, item, optionAsTier(options));
    console.log(path.relative(process.cwd(), configPath));
  }
};

async function main() {
  const command = process.argv[2] ?? "";
  const options = parseCliArgs(process.argv.slice(3));

  if (!command || command === "--help" || command === "-h") {
    printUsage();
    return;
  }
  if (options.help || options.h) {
    printUsage(command);
    return;
  }

  if (!isCommandName(command)) {
    printUsage();
    throw new ConfigurationError(`Unknown command: ${command}`);
  }
  await commandHandlers[command](options);
}

main().catch((error) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
