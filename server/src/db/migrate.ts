import { z } from "zod";
import { closeDatabase, openDatabase, type SqliteDatabase, withTransaction } from "./connection";
import { env } from "../config/env";
import { StorageError } from "../http/api-error";

export const READINGS_TABLE = "readings";

export type Migration = {
  name: string;
  isApplied: (db: SqliteDatabase) => boolean;
  apply: (db: SqliteDatabase) => void;
};

const namedRowSchema = z.object({ name: z.string() });

export function tableExists(db: SqliteDatabase, table: string): boolean {
  const row = db.get(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
    [table],
    namedRowSchema
  );
  return row !== undefined;
}

export function listColumns(db: SqliteDatabase, table: string): string[] {
  return db.all(`PRAGMA table_info(${table})`, [], namedRowSchema).map((column) => column.name);
}

function listIndexes(db: SqliteDatabase, table: string): string[] {
  return db.all(`PRAGMA index_list(${table})`, [], namedRowSchema).map((index) => index.name);
}

// Additive only: every entry must leave existing rows valid without a rewrite.
export const migrations: readonly Migration[] = [
  {
    name: "create_readings_table",
    isApplied: (db) => tableExists(db, READINGS_TABLE),
    apply: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS ${READINGS_TABLE} (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          timestamp TEXT NOT NULL,
          device_id TEXT NOT NULL,
          cpm TEXT NOT NULL,
          acpm TEXT NOT NULL,
          usv TEXT NOT NULL,
          dose TEXT NOT NULL,
          raw_data TEXT NOT NULL,
          client_ip TEXT NOT NULL DEFAULT 'UNKNOWN'
        )
      `);
    }
  },
  {
    name: "add_readings_client_ip",
    isApplied: (db) => listColumns(db, READINGS_TABLE).includes("client_ip"),
    apply: (db) => {
      db.exec(
        `ALTER TABLE ${READINGS_TABLE} ADD COLUMN client_ip TEXT NOT NULL DEFAULT 'UNKNOWN'`
      );
    }
  },
  {
    name: "index_readings_timestamp",
    isApplied: (db) => listIndexes(db, READINGS_TABLE).includes("idx_readings_timestamp"),
    apply: (db) => {
      db.exec(
        `CREATE INDEX IF NOT EXISTS idx_readings_timestamp ON ${READINGS_TABLE} (timestamp)`
      );
    }
  }
];

/**
 * Brings the live schema up to date. Each pending migration runs in its own
 * transaction; returns the names of the migrations that were applied.
 */
export function runMigrations(
  db: SqliteDatabase,
  list: readonly Migration[] = migrations
): string[] {
  const applied: string[] = [];

  for (const migration of list) {
    try {
      const didApply = withTransaction(db, () => {
        if (migration.isApplied(db)) {
          return false;
        }
        migration.apply(db);
        return true;
      });
      if (didApply) {
        applied.push(migration.name);
      }
    } catch (error) {
      throw new StorageError(`Migration failed: ${migration.name}`, { cause: error });
    }
  }

  return applied;
}

async function main(): Promise<void> {
  const db = await openDatabase(env.DB_FILE);
  try {
    const applied = runMigrations(db);
    // eslint-disable-next-line no-console
    console.log(
      applied.length > 0 ? `Applied migrations: ${applied.join(", ")}` : "Schema already up to date."
    );
  } finally {
    closeDatabase(db);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(error);
    process.exitCode = 1;
  });
}
