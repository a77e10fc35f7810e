/**
 * Security utilities for safe process execution
 * Prevents path traversal and malformed environment variables
 */

import { resolve, sep } from "path";
import { access, constants } from "fs/promises";
import { createLogger } from "../lib/logger/index.js";

const logger = createLogger("fanout:executor:security");

// Workflow names double as file names
const SAFE_NAME_REGEX = /^[a-zA-Z0-9_-]+$/;

const SAFE_ENV_KEY_REGEX = /^[A-Z_][A-Z0-9_]*$/i;

/**
 * Validate that a workflow name is safe to use as a file name
 *
 * @throws Error if name is invalid
 */
export function validateName(name: string): void {
  if (!name) {
    throw new Error("workflow name must be a non-empty string");
  }

  if (!SAFE_NAME_REGEX.test(name)) {
    logger.error("Invalid name detected", { name });
    throw new Error(
      `Invalid workflow name: "${name}". Only alphanumeric, underscore, and hyphen allowed.`,
    );
  }
}

/**
 * Resolve a path inside a base directory. The base directory itself is
 * allowed, anything outside it is not.
 *
 * @throws Error if the resolved path escapes the base directory
 */
export function resolveSafePath(basePath: string, ...parts: string[]): string {
  const resolvedBase = resolve(basePath);
  const resolvedPath = resolve(basePath, ...parts);

  if (
    resolvedPath !== resolvedBase &&
    !resolvedPath.startsWith(resolvedBase + sep)
  ) {
    logger.error("Path traversal attempt detected", {
      basePath,
      parts,
      resolvedPath,
    });
    throw new Error(`Path escapes workspace: ${parts.join("/")}`);
  }

  return resolvedPath;
}

/**
 * Validate that a command given as a path exists and is executable.
 * Bare command names are looked up on PATH by the spawn itself.
 *
 * @throws Error if the file is missing or not executable
 */
export async function validateExecutable(commandPath: string): Promise<void> {
  try {
    await access(commandPath, constants.F_OK);
  } catch {
    throw new Error(`Command does not exist: ${commandPath}`);
  }

  try {
    await access(commandPath, constants.X_OK);
  } catch {
    throw new Error(`Command exists but is not executable: ${commandPath}`);
  }
}

/**
 * Build a name usable as an environment variable from an axis name,
 * e.g. "node-version" -> "NODE_VERSION"
 */
export function toEnvKey(name: string): string {
  const key = name.toUpperCase().replace(/[^A-Z0-9_]/g, "_");
  return /^[0-9]/.test(key) ? `_${key}` : key;
}

/**
 * Ensure environment variable names are safe
 *
 * @throws Error if any env var name is invalid
 */
export function sanitizeEnv(
  env: Readonly<Record<string, string>>,
): Record<string, string> {
  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!SAFE_ENV_KEY_REGEX.test(key)) {
      logger.error("Invalid environment variable name", { key });
      throw new Error(
        `Invalid environment variable name: "${key}". Only alphanumeric and underscore allowed, must start with letter or underscore.`,
      );
    }
    sanitized[key] = value;
  }

  return sanitized;
}
