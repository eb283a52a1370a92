import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import type { QueryExecutor } from "../executors/query-executor.js";
import { postgresTableNames } from "../tables.js";

export interface PostgresMigration {
  readonly id: string;
  readonly filename: string;
  readonly description: string;
}

export const postgresMigrations: ReadonlyArray<PostgresMigration> = [
  {
    id: "0001_audit_events",
    filename: "0001_audit_events.sql",
    description: "Audit event table keyed by event id, with agent/time and trace indexes",
  },
];

const splitStatements = (sql: string): string[] =>
  sql
    .split(/;\s*(?:\n|$)/)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

export const readMigrationSql = (migration: PostgresMigration): Promise<string> =>
  readFile(fileURLToPath(new URL(`./${migration.filename}`, import.meta.url)), "utf8");

/**
 * Applies pending migrations in order and records each id, so reruns are no-ops.
 * Returns the ids applied by this call.
 */
export const runPostgresMigrations = async (executor: QueryExecutor): Promise<string[]> => {
  const table = postgresTableNames.migrations;
  await executor.query(
    `CREATE TABLE IF NOT EXISTS ${table} (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )`,
  );

  const { rows } = await executor.query<{ id: string }>(`SELECT id FROM ${table}`);
  const applied = new Set(rows.map((row) => row.id));
  const newlyApplied: string[] = [];

  for (const migration of postgresMigrations) {
    if (applied.has(migration.id)) {
      continue;
    }
    for (const statement of splitStatements(await readMigrationSql(migration))) {
      await executor.query(statement);
    }
    await executor.query(`INSERT INTO ${table} (id) VALUES ($1)`, [migration.id]);
    newlyApplied.push(migration.id);
  }

  return newlyApplied;
};
