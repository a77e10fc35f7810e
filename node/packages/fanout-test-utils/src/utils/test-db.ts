import { existsSync, unlinkSync } from "fs";
import { tmpdir } from "os";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import {
  createConnection,
  closeConnection,
  runMigrations,
  type RunRecordStatus,
  type JobRecordStatus,
} from "fanout";
import type { Database } from "better-sqlite3";
import { type Logger, consoleLogger } from "./test-logger.js";

export interface TestDatabaseConfig {
  dbPath?: string; // Path to SQLite database file
  logger?: Logger;
}

export class TestDatabase {
  private db: Database | null = null;
  private logger: Logger;
  private dbPath: string;

  constructor(config: TestDatabaseConfig = {}) {
    // Use a unique temporary file for each test database instance
    this.dbPath =
      config.dbPath ?? path.join(tmpdir(), `fanout_test_${uuidv4()}.db`);
    this.logger = config.logger ?? consoleLogger;
  }

  public async setup(): Promise<void> {
    this.logger.info(`Setting up test database ${this.dbPath}...`);
    this.removeFiles();

    await runMigrations(this.dbPath);
    this.db = createConnection(this.dbPath);

    this.logger.info(`Test database ${this.dbPath} ready with fresh schema`);
  }

  public truncateAllTables(): void {
    const db = this.getDb();
    // Jobs cascade with their run
    db.prepare("DELETE FROM run").run();
  }

  public async cleanup(): Promise<void> {
    if (this.db) {
      closeConnection(this.db);
      this.db = null;
    }
    this.removeFiles();
  }

  public getDb(): Database {
    if (!this.db) throw new Error("Database not initialized");
    return this.db;
  }

  public getPath(): string {
    return this.dbPath;
  }

  /**
   * Insert a run row directly, bypassing the domain layer
   */
  public insertRun(run: {
    id: string;
    workflowName: string;
    status: RunRecordStatus;
    createdAt?: number;
    startedAt?: number;
  }): void {
    this.getDb()
      .prepare<{
        id: string;
        workflowName: string;
        status: string;
        createdAt: number;
        startedAt: number | null;
      }>(
        `INSERT INTO run (id, workflow_name, event_kind, status, created_at, started_at)
         VALUES (@id, @workflowName, 'push', @status, @createdAt, @startedAt)`,
      )
      .run({
        id: run.id,
        workflowName: run.workflowName,
        status: run.status,
        createdAt: run.createdAt ?? Date.now(),
        startedAt: run.startedAt ?? null,
      });
  }

  /**
   * Insert a job row directly, bypassing the domain layer
   */
  public insertJob(job: {
    runId: string;
    index: number;
    status: JobRecordStatus;
    tolerant?: boolean;
  }): void {
    this.getDb()
      .prepare<{
        id: string;
        runId: string;
        index: number;
        key: string;
        status: string;
        tolerant: number;
        createdAt: number;
      }>(
        `INSERT INTO job (id, run_id, job_index, job_key, name, axes, tolerant, status, created_at)
         VALUES (@id, @runId, @index, @key, @key, '{}', @tolerant, @status, @createdAt)`,
      )
      .run({
        id: uuidv4(),
        runId: job.runId,
        index: job.index,
        key: `job-${job.index}`,
        status: job.status,
        tolerant: job.tolerant ? 1 : 0,
        createdAt: Date.now(),
      });
  }

  private removeFiles(): void {
    for (const suffix of ["", "-wal", "-shm"]) {
      const file = `${this.dbPath}${suffix}`;
      if (existsSync(file)) {
        unlinkSync(file);
      }
    }
  }
}
