export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function normalizeLogLevel(value: string | undefined): LogLevel {
  const normalized = String(value ?? "info").toLowerCase();
  if (normalized === "debug") {
    return "debug";
  }
  if (normalized === "warn" || normalized === "warning") {
    return "warn";
  }
  if (normalized === "error") {
    return "error";
  }
  return "info";
}

export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const shouldLog = (entryLevel: LogLevel): boolean => LEVEL_WEIGHT[entryLevel] >= LEVEL_WEIGHT[level];

  return {
    debug(message) {
      if (shouldLog("debug")) {
        console.log(message);
      }
    },
    info(message) {
      if (shouldLog("info")) {
        console.log(message);
      }
    },
    warn(message) {
      if (shouldLog("warn")) {
        console.error(`warning: ${message}`);
      }
    },
    error(message) {
      if (shouldLog("error")) {
        console.error(message);
      }
    }
  };
}

export interface RecordedLogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Logger that keeps entries in memory instead of printing them.
 */
export function createRecordingLogger(): Logger & { entries: RecordedLogEntry[] } {
  const entries: RecordedLogEntry[] = [];
  return {
    entries,
    debug: (message) => entries.push({ level: "debug", message }),
    info: (message) => entries.push({ level: "info", message }),
    warn: (message) => entries.push({ level: "warn", message }),
    error: (message) => entries.push({ level: "error", message })
  };
}

export function banner(logger: Logger, title: string, now: Date = new Date()): void {
  logger.info("---------------------------------------------------------------------");
  logger.info(`${title} on ${now.toISOString()}`);
  logger.info("---------------------------------------------------------------------");
}
