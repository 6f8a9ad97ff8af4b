import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";

export interface Migration {
  name: string;
  sql: string;
}

/** Narrow view of a pg client, enough to run plain statements. */
export interface SqlRunner {
  query(text: string): Promise<unknown>;
}

export const MIGRATIONS_DIR = join(__dirname, "..", "..", "sql");

export function readMigrations(dir: string = MIGRATIONS_DIR): Migration[] {
  return readdirSync(dir)
    .filter((file) => file.endsWith(".sql"))
    .sort()
    .map((file) => ({ name: file, sql: readFileSync(join(dir, file), "utf8") }));
}

// Every script is written to be re-runnable, so the whole set is applied each time.
export async function applyMigrations(
  runner: SqlRunner,
  migrations: Migration[],
): Promise<string[]> {
  await runner.query("BEGIN");
  try {
    for (const migration of migrations) {
      await runner.query(migration.sql);
    }
    await runner.query("COMMIT");
  } catch (error) {
    await runner.query("ROLLBACK");
    throw error;
  }
  return migrations.map((migration) => migration.name);
}
