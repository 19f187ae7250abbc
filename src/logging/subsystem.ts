export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVEL_ENV = "LEEDFIT_LOG_LEVEL";

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type SubsystemLoggerOptions = {
  level?: LogLevel | "silent";
  write?: (line: string) => void;
};

export function parseLogLevel(raw: string | undefined): LogLevel | "silent" {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }
  return "info";
}

/**
 * Logger scoped to one subsystem. Everything goes to stderr so that stdout stays free for
 * `--json` output.
 */
export function createSubsystemLogger(
  subsystem: string,
  opts?: SubsystemLoggerOptions,
): SubsystemLogger {
  const threshold = LEVEL_RANK[opts?.level ?? parseLogLevel(process.env[LOG_LEVEL_ENV])];
  const write =
    opts?.write ??
    ((line: string) => {
      process.stderr.write(`${line}\n`);
    });

  const emit = (level: LogLevel, message: string) => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    const tag = level === "info" ? "" : ` ${level}`;
    write(`[${subsystem}]${tag} ${message}`);
  };

  return {
    subsystem,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}
