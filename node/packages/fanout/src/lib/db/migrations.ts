/**
 * Database migrations
 * Runs Knex migrations programmatically from an in-code migration source
 */

import knex, { type Knex } from "knex";
import { createLogger } from "../logger/index.js";

const logger = createLogger("fanout:db:migrations");

const migrations: Record<string, Knex.Migration> = {
  "20250301000000_create_run_and_job": {
    async up(db: Knex): Promise<void> {
      await db.schema.createTable("run", (table) => {
        table.string("id").primary();
        table.string("workflow_name").notNullable();
        table.string("event_kind").notNullable();
        table.string("event_ref");
        table.string("event_sha");
        table.string("status").notNullable();
        table.text("error");
        table.integer("job_count").notNullable().defaultTo(0);
        table.integer("failed_count").notNullable().defaultTo(0);
        table.integer("tolerated_count").notNullable().defaultTo(0);
        table.bigInteger("created_at").notNullable();
        table.bigInteger("started_at");
        table.bigInteger("completed_at");
        table.bigInteger("duration_ms");
        table.index(["workflow_name"]);
        table.index(["status"]);
      });

      await db.schema.createTable("job", (table) => {
        table.string("id").primary();
        table
          .string("run_id")
          .notNullable()
          .references("id")
          .inTable("run")
          .onDelete("CASCADE");
        table.integer("job_index").notNullable();
        table.string("job_key").notNullable();
        table.string("name").notNullable();
        table.text("axes").notNullable();
        table.integer("tolerant").notNullable();
        table.string("status").notNullable();
        table.string("reason");
        table.integer("failed_step_index");
        table.string("failed_step_name");
        table.text("error");
        table.text("steps");
        table.bigInteger("created_at").notNullable();
        table.bigInteger("started_at");
        table.bigInteger("completed_at");
        table.bigInteger("duration_ms");
        table.unique(["run_id", "job_index"]);
        table.unique(["run_id", "job_key"]);
      });
    },
    async down(db: Knex): Promise<void> {
      await db.schema.dropTableIfExists("job");
      await db.schema.dropTableIfExists("run");
    },
  },
};

class InlineMigrationSource implements Knex.MigrationSource<string> {
  getMigrations(): Promise<string[]> {
    return Promise.resolve(Object.keys(migrations).sort());
  }

  getMigrationName(migration: string): string {
    return migration;
  }

  getMigration(migration: string): Promise<Knex.Migration> {
    const found = migrations[migration];
    if (!found) {
      return Promise.reject(new Error(`Unknown migration: ${migration}`));
    }
    return Promise.resolve(found);
  }
}

/**
 * Run pending database migrations
 * @param sqlitePath - Path to SQLite database file
 */
export async function runMigrations(sqlitePath: string): Promise<void> {
  const db = knex({
    client: "better-sqlite3",
    connection: {
      filename: sqlitePath,
    },
    useNullAsDefault: true,
    migrations: {
      migrationSource: new InlineMigrationSource(),
      tableName: "knex_migrations",
    },
  });

  try {
    const [batchNo, log]: [number, string[]] = await db.migrate.latest();

    if (log.length === 0) {
      logger.debug("Database is up to date", { sqlitePath });
    } else {
      logger.info("Ran database migrations", { batchNo, migrations: log });
    }
  } finally {
    await db.destroy();
  }
}
