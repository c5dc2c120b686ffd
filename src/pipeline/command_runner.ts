import { spawn } from "node:child_process";
import { StepFailure } from "../shared/errors.ts";
import type { Logger } from "../shared/logger.ts";

/**
 * One unit of delegated work: a toolkit script with its arguments, run from
 * `cwd`. The script itself may fan out sub-jobs through the cluster command
 * it receives in `args`.
 */
export interface CommandSpec {
  label: string;
  script: string;
  args: string[];
  cwd: string;
}

/**
 * Submit work and resolve once every sub-job reported success. Any failure
 * rejects with StepFailure; retries are the dispatcher's own concern.
 */
export interface CommandDispatcher {
  run(spec: CommandSpec): Promise<void>;
}

export function formatCommand(spec: Pick<CommandSpec, "script" | "args">): string {
  return [spec.script, ...spec.args].join(" ");
}

const COMMAND_ERROR_EXCERPT_LINES = 40;

function createLineBuffer(onLine: (line: string) => void): {
  push: (chunk: string) => void;
  flush: () => void;
} {
  let buffer = "";
  return {
    push: (chunk: string) => {
      buffer += chunk;
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? "";
      for (const line of parts) {
        const trimmed = line.trim();
        if (trimmed) {
          onLine(trimmed);
        }
      }
    },
    flush: () => {
      const trimmed = buffer.trim();
      if (trimmed) {
        onLine(trimmed);
      }
      buffer = "";
    }
  };
}

export interface RunCommandOptions {
  command: string;
  args: string[];
  cwd: string;
  label: string;
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
}

export async function runCommand(options: RunCommandOptions): Promise<void> {
  const child = spawn(options.command, options.args, {
    cwd: options.cwd,
    env: process.env,
    stdio: "pipe"
  });

  const stderrExcerpt: string[] = [];
  const stdoutBuffer = createLineBuffer((line) => options.onStdoutLine?.(line));
  const stderrBuffer = createLineBuffer((line) => {
    stderrExcerpt.push(line);
    if (stderrExcerpt.length > COMMAND_ERROR_EXCERPT_LINES) {
      stderrExcerpt.shift();
    }
    options.onStderrLine?.(line);
  });

  child.stdout.on("data", (chunk: Buffer) => stdoutBuffer.push(chunk.toString()));
  child.stderr.on("data", (chunk: Buffer) => stderrBuffer.push(chunk.toString()));

  const commandLine = [options.command, ...options.args].join(" ");
  await new Promise<void>((resolve, reject) => {
    child.on("error", (error) => {
      reject(
        new StepFailure(`${options.label}: could not start ${commandLine}: ${error.message}`, {
          command: commandLine
        })
      );
    });

    child.on("close", (code, signal) => {
      stdoutBuffer.flush();
      stderrBuffer.flush();
      if (code === 0) {
        resolve();
        return;
      }
      const status = code === null ? `signal ${signal ?? "unknown"}` : `code ${code}`;
      const stderrDetail = stderrExcerpt.length > 0 ? `\nstderr: ${stderrExcerpt.join(" | ")}` : "";
      reject(
        new StepFailure(`${options.label}: command failed with ${status}: ${commandLine}${stderrDetail}`, {
          command: commandLine,
          exitCode: code ?? undefined
        })
      );
    });
  });
}

/**
 * Runs toolkit scripts through a shell, streaming their output to the logger.
 */
export class ShellCommandDispatcher implements CommandDispatcher {
  readonly shell: string;
  readonly logger: Logger;

  constructor(shell: string, logger: Logger) {
    this.shell = shell;
    this.logger = logger;
  }

  async run(spec: CommandSpec): Promise<void> {
    this.logger.debug(`[${spec.label}] ${formatCommand(spec)} (cwd=${spec.cwd})`);
    await runCommand({
      command: this.shell,
      args: [spec.script, ...spec.args],
      cwd: spec.cwd,
      label: spec.label,
      onStdoutLine: (line) => this.logger.debug(`[${spec.label}] ${line}`),
      onStderrLine: (line) => this.logger.debug(`[${spec.label}] ${line}`)
    });
  }
}
