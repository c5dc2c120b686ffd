export interface PipelineErrorContext {
  item?: string;
  stage?: number;
  step?: string;
}

export class PipelineError extends Error {
  item?: string;
  stage?: number;
  step?: string;

  constructor(message: string, context: PipelineErrorContext = {}) {
    super(message);
    this.name = "PipelineError";
    this.item = context.item;
    this.stage = context.stage;
    this.step = context.step;
  }
}

/** No matching per-item configuration, or an unusable configuration value. */
export class ConfigurationError extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}) {
    super(message, context);
    this.name = "ConfigurationError";
  }
}

/** Malformed lexicon entry, duplicate identifier, silence lexicon mismatch. */
export class DataError extends PipelineError {
  readonly filePath?: string;
  readonly lineNumber?: number;

  constructor(
    message: string,
    context: PipelineErrorContext & { filePath?: string; lineNumber?: number } = {}
  ) {
    super(message, context);
    this.name = "DataError";
    this.filePath = context.filePath;
    this.lineNumber = context.lineNumber;
  }
}

export interface StepFailureOptions extends PipelineErrorContext {
  command: string;
  exitCode?: number;
}

/** A delegated preparation, alignment or training command reported failure. */
export class StepFailure extends PipelineError {
  readonly command: string;
  readonly exitCode?: number;

  constructor(message: string, options: StepFailureOptions) {
    super(message, options);
    this.name = "StepFailure";
    this.command = options.command;
    this.exitCode = options.exitCode;
  }
}

/** An upstream artifact or completion marker is missing. */
export class StateError extends PipelineError {
  constructor(message: string, context: PipelineErrorContext = {}) {
    super(message, context);
    this.name = "StateError";
  }
}

export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (!(error instanceof PipelineError)) {
    return error.message;
  }

  const where: string[] = [];
  if (error.stage !== undefined) {
    where.push(`stage=${error.stage}`);
  }
  if (error.item) {
    where.push(`item=${error.item}`);
  }
  if (error.step) {
    where.push(`step=${error.step}`);
  }
  const location = where.length > 0 ? ` (${where.join(", ")})` : "";
  return `${error.name}${location}: ${error.message}`;
}

/**
 * Attach stage/item context to an error raised deeper in the call stack
 * without replacing the original error class.
 */
export function withErrorContext(error: unknown, context: PipelineErrorContext): unknown {
  if (!(error instanceof PipelineError)) {
    return error;
  }
  if (context.stage !== undefined && error.stage === undefined) {
    error.stage = context.stage;
  }
  if (context.item && !error.item) {
    error.item = context.item;
  }
  if (context.step && !error.step) {
    error.step = context.step;
  }
  return error;
}
