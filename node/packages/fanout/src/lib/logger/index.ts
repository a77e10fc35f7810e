/**
 * Structured logger for fanout
 * Writes to stderr so that reports printed on stdout stay parseable
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

// Read on every call so the CLI and tests can change LOG_LEVEL at runtime
function currentLevel(): LogLevel {
  const level = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(level) ? level : "info";
}

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

function formatContext(context: LogContext | undefined): string {
  if (!context || Object.keys(context).length === 0) {
    return "";
  }
  const entries = Object.entries(context).map(([key, value]) => [
    key,
    serialize(value),
  ]);
  try {
    return " " + JSON.stringify(Object.fromEntries(entries));
  } catch {
    return " [unserializable context]";
  }
}

/**
 * Create a named logger, e.g. createLogger("fanout:scheduler")
 */
export function createLogger(name: string): Logger {
  const write = (level: Exclude<LogLevel, "silent">) => {
    return (message: string, context?: LogContext): void => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) {
        return;
      }
      const line = `${new Date().toISOString()} ${level.toUpperCase()} [${name}] ${message}${formatContext(context)}`;
      console.error(line);
    };
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
