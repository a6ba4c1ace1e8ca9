import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import path from "node:path";
import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from "sql.js";
import type { z } from "zod";
import { StorageError } from "../http/api-error";

export type SqlParams = SqlValue[];

export type RunResult = {
  changes: number;
  lastInsertRowid: number;
};

const IN_MEMORY = ":memory:";

let engine: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
  if (!engine) {
    engine = initSqlJs();
  }
  return engine;
}

/**
 * One in-process SQLite database backed by a file. The whole image is written
 * back to disk after every committed write, through a temp file and a rename.
 */
export class SqliteDatabase {
  private closed = false;
  private transactionDepth = 0;

  constructor(
    private readonly db: Database,
    readonly file: string
  ) {}

  get open(): boolean {
    return !this.closed;
  }

  get inTransaction(): boolean {
    return this.transactionDepth > 0;
  }

  exec(sql: string): void {
    this.assertOpen();
    this.db.exec(sql);
    this.flush();
  }

  run(sql: string, params: SqlParams = []): RunResult {
    this.assertOpen();
    this.db.run(sql, params);
    const changes = this.db.getRowsModified();
    // Read before flushing: exporting the image reopens the handle.
    const lastInsertRowid = this.scalar("SELECT last_insert_rowid()");
    this.flush();
    return { changes, lastInsertRowid };
  }

  all<T>(sql: string, params: SqlParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    return [...this.iterate(sql, params, schema)];
  }

  get<T>(sql: string, params: SqlParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    for (const row of this.iterate(sql, params, schema)) {
      return row;
    }
    return undefined;
  }

  /** Holds a statement open until exhausted; consume it without awaiting. */
  *iterate<T>(sql: string, params: SqlParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Generator<T> {
    this.assertOpen();
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      while (statement.step()) {
        yield schema.parse(statement.getAsObject());
      }
    } finally {
      statement.free();
    }
  }

  transaction<T>(fn: () => T): T {
    this.assertOpen();
    if (this.transactionDepth > 0) {
      return fn();
    }

    this.db.exec("BEGIN");
    this.transactionDepth = 1;
    try {
      const result = fn();
      this.db.exec("COMMIT");
      this.transactionDepth = 0;
      this.flush();
      return result;
    } catch (error) {
      this.transactionDepth = 0;
      this.db.exec("ROLLBACK");
      throw error;
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }

  private scalar(sql: string): number {
    const [result] = this.db.exec(sql);
    const value = result?.values[0]?.[0];
    return typeof value === "number" ? value : 0;
  }

  private flush(): void {
    if (this.transactionDepth > 0 || this.file === IN_MEMORY) {
      return;
    }
    const temp = `${this.file}.tmp`;
    writeFileSync(temp, this.db.export());
    renameSync(temp, this.file);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Database connection is closed.");
    }
  }
}

export async function openDatabase(file: string): Promise<SqliteDatabase> {
  try {
    const SQL = await loadEngine();
    if (file === IN_MEMORY) {
      return new SqliteDatabase(new SQL.Database(), IN_MEMORY);
    }

    const resolved = path.resolve(process.cwd(), file);
    mkdirSync(path.dirname(resolved), { recursive: true });
    const image = existsSync(resolved) ? readFileSync(resolved) : null;
    return new SqliteDatabase(new SQL.Database(image), resolved);
  } catch (error) {
    throw new StorageError(`Unable to open database file: ${file}`, { cause: error });
  }
}

export function withTransaction<T>(db: SqliteDatabase, fn: () => T): T {
  return db.transaction(fn);
}

export function closeDatabase(db: SqliteDatabase): void {
  db.close();
}
