/**
 * Registry for tracking running step processes per run and job
 * Allows killing processes on job timeout or server shutdown
 */

import type { ChildProcess } from "child_process";
import { createLogger } from "../lib/logger/index.js";

const logger = createLogger("fanout:executor:process-registry");

function processKey(runId: string, jobIndex: number): string {
  return `${runId}:job:${jobIndex}`;
}

export class JobProcessRegistry {
  private processes = new Map<string, ChildProcess>();

  /**
   * Register the running step process of a job (a job runs one at a time)
   */
  register(runId: string, jobIndex: number, process: ChildProcess): void {
    this.processes.set(processKey(runId, jobIndex), process);
    logger.debug("Registered process", { runId, jobIndex, pid: process.pid });
  }

  unregister(runId: string, jobIndex: number): void {
    const removed = this.processes.delete(processKey(runId, jobIndex));
    if (removed) {
      logger.debug("Unregistered process", { runId, jobIndex });
    }
  }

  /**
   * Kill the running process of one job: SIGTERM, then SIGKILL once the
   * grace period has passed if it is still alive
   */
  async killJob(runId: string, jobIndex: number, graceMs: number): Promise<void> {
    const process = this.processes.get(processKey(runId, jobIndex));
    if (!process) {
      logger.debug("No process to kill for job", { runId, jobIndex });
      return;
    }
    await this.terminate([[jobIndex, process]], runId, graceMs);
    this.unregister(runId, jobIndex);
  }

  /**
   * Kill every running process of a run
   */
  async killProcessesForRun(runId: string, graceMs: number): Promise<void> {
    const prefix = `${runId}:job:`;
    const targets: Array<[number, ChildProcess]> = [];
    for (const [key, process] of this.processes.entries()) {
      if (key.startsWith(prefix)) {
        targets.push([Number(key.substring(prefix.length)), process]);
      }
    }

    if (targets.length === 0) {
      logger.debug("No processes to kill for run", { runId });
      return;
    }

    logger.info("Killing processes for run", {
      runId,
      count: targets.length,
      graceMs,
    });

    await this.terminate(targets, runId, graceMs);

    for (const [jobIndex] of targets) {
      this.unregister(runId, jobIndex);
    }
  }

  /**
   * Kill every registered process (server shutdown)
   */
  async killAll(graceMs: number): Promise<void> {
    const runIds = new Set(
      Array.from(this.processes.keys()).map((key) => key.split(":job:")[0] ?? key),
    );
    await Promise.all(
      Array.from(runIds).map((runId) => this.killProcessesForRun(runId, graceMs)),
    );
  }

  getProcessCount(): number {
    return this.processes.size;
  }

  private async terminate(
    targets: Array<[number, ChildProcess]>,
    runId: string,
    graceMs: number,
  ): Promise<void> {
    const isAlive = (process: ChildProcess) =>
      process.exitCode === null && process.signalCode === null;

    for (const [jobIndex, process] of targets) {
      try {
        if (process.pid && isAlive(process)) {
          logger.debug("Sending SIGTERM", { runId, jobIndex, pid: process.pid });
          process.kill("SIGTERM");
        }
      } catch (error) {
        logger.warn("Failed to send SIGTERM", { runId, jobIndex, error });
      }
    }

    const alive = targets.filter(([, process]) => isAlive(process));
    if (alive.length === 0) {
      return;
    }

    // Wait for the grace period, or until every target has exited
    await new Promise<void>((resolve) => {
      let remaining = alive.length;
      const timer = setTimeout(resolve, graceMs);
      for (const [, process] of alive) {
        process.once("exit", () => {
          remaining--;
          if (remaining === 0) {
            clearTimeout(timer);
            resolve();
          }
        });
      }
    });

    for (const [jobIndex, process] of targets) {
      try {
        if (process.pid && isAlive(process)) {
          logger.warn("Escalating to SIGKILL", {
            runId,
            jobIndex,
            pid: process.pid,
          });
          process.kill("SIGKILL");
        }
      } catch (error) {
        logger.warn("Failed to send SIGKILL", { runId, jobIndex, error });
      }
    }
  }
}
