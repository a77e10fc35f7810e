import { join } from "path";

function required(name: string): string {
  const value = process.env[name];
  if (value === undefined || value === "") {
    console.error(`ERROR: Required environment variable ${name} is not set`);
    process.exit(1);
  }
  return value;
}

function optional(name: string, defaultValue: string): string {
  const value = process.env[name];
  return value !== undefined && value !== "" ? value : defaultValue;
}

function optionalInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    console.error(`ERROR: Environment variable ${name} must be a non-negative integer`);
    process.exit(1);
  }
  return parsed;
}

/**
 * Executor settings; shared by `fanout run` and the server
 */
export function loadExecutorConfig() {
  return {
    workspace: optional("FANOUT_WORKSPACE", process.cwd()),
    maxLogCapture: optionalInt("FANOUT_MAX_LOG_CAPTURE", 8192),
    maxParallelJobs: optionalInt("FANOUT_MAX_PARALLEL_JOBS", 0),
    killGraceMs: optionalInt("FANOUT_KILL_GRACE_MS", 5000),
  };
}

/**
 * Full server configuration; exits when a required variable is missing
 */
export function loadConfig() {
  const dataDir = required("FANOUT_DATA_DIR");

  return {
    server: {
      host: optional("FANOUT_SERVER_HOST", "127.0.0.1"),
      port: optionalInt("FANOUT_SERVER_PORT", 5004),
    },
    db: {
      dataDir,
      dbPath: join(dataDir, "fanout.db"),
    },
    workflowsRoot: required("FANOUT_WORKFLOWS_ROOT"),
    executor: loadExecutorConfig(),
    logging: {
      level: optional("LOG_LEVEL", "info"),
    },
  };
}

export type Config = ReturnType<typeof loadConfig>;
