import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

export async function createTempDir(prefix = "fanout-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write `<name>.yaml` into a workflows directory
 *
 * @returns Path of the written file
 */
export async function writeWorkflowFile(
  dir: string,
  name: string,
  source: string,
): Promise<string> {
  const path = join(dir, `${name}.yaml`);
  await writeFile(path, source, "utf8");
  return path;
}

/**
 * Poll until a condition holds
 * @throws Error if the timeout elapses first
 */
export async function waitFor<T>(
  probe: () => T | Promise<T>,
  condition: (value: T) => boolean,
  options: { timeout?: number; interval?: number } = {},
): Promise<T> {
  const timeout = options.timeout ?? 5000;
  const interval = options.interval ?? 25;
  const startTime = Date.now();

  for (;;) {
    const value = await probe();
    if (condition(value)) {
      return value;
    }
    if (Date.now() - startTime > timeout) {
      throw new Error(
        `waitFor timeout after ${timeout}ms. Last value: ${JSON.stringify(value)}`,
      );
    }
    await new Promise((resolve) => setTimeout(resolve, interval));
  }
}
