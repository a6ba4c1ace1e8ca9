import { z } from "zod";
import { closeDatabase, openDatabase, type SqliteDatabase, withTransaction } from "./connection";
import { READINGS_TABLE, runMigrations } from "./migrate";
import { StorageError } from "../http/api-error";
import { andPredicate, type Predicate, UNFILTERED } from "../services/query-filter";

// Legacy files may hold numbers in these columns; they are read back as text.
const textColumn = z.coerce.string();

const readingRowSchema = z.object({
  id: z.number().int(),
  timestamp: textColumn,
  device_id: textColumn,
  cpm: textColumn,
  acpm: textColumn,
  usv: textColumn,
  dose: textColumn,
  raw_data: textColumn,
  client_ip: textColumn
});

const seriesRowSchema = readingRowSchema.pick({ timestamp: true, cpm: true, acpm: true });

const countRowSchema = z.object({ total: z.number() });

export type Reading = z.infer<typeof readingRowSchema>;

export type NewReading = Omit<Reading, "id">;

export type SeriesPoint = Pick<Reading, "timestamp" | "cpm" | "acpm">;

const EXPORT_PAGE_SIZE = 500;

const READING_COLUMNS =
  "id, timestamp, device_id, cpm, acpm, usv, dose, raw_data, client_ip";

function whereSql(predicate: Predicate): string {
  return predicate.clause.length > 0 ? ` WHERE ${predicate.clause}` : "";
}

function toStorageError(action: string, error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(`Reading store ${action} failed.`, { cause: error });
}

function wrap<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw toStorageError(action, error);
  }
}

/**
 * Owns the single connection to the readings file for the life of the process.
 */
export class ReadingStore {
  constructor(private readonly db: SqliteDatabase) {}

  static async open(file: string): Promise<ReadingStore> {
    return new ReadingStore(await openDatabase(file));
  }

  ensureSchema(): string[] {
    return runMigrations(this.db);
  }

  insert(reading: NewReading): number {
    return wrap("insert", () => {
      const result = this.db.run(
        `INSERT INTO ${READINGS_TABLE} (timestamp, device_id, cpm, acpm, usv, dose, raw_data, client_ip)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          reading.timestamp,
          reading.device_id,
          reading.cpm,
          reading.acpm,
          reading.usv,
          reading.dose,
          reading.raw_data,
          reading.client_ip
        ]
      );
      return result.lastInsertRowid;
    });
  }

  /** Inserts in one transaction, so the data file is written once. */
  insertMany(readings: Iterable<NewReading>): number[] {
    return wrap("insert", () =>
      withTransaction(this.db, () => [...readings].map((reading) => this.insert(reading)))
    );
  }

  query(options: { predicate?: Predicate; limit?: number } = {}): Reading[] {
    const predicate = options.predicate ?? UNFILTERED;
    const values: Array<string | number> = [...predicate.params];
    let sql = `SELECT ${READING_COLUMNS} FROM ${READINGS_TABLE}${whereSql(predicate)} ORDER BY id DESC`;
    if (options.limit !== undefined) {
      values.push(Math.max(1, Math.floor(options.limit)));
      sql += " LIMIT ?";
    }

    return wrap("query", () => this.db.all(sql, values, readingRowSchema));
  }

  /**
   * Walks matching rows newest first in id-keyed pages, so the connection is
   * never held by an open cursor between pulls. The first page is read before
   * this returns; later pages load as the caller pulls.
   */
  iterate(predicate: Predicate = UNFILTERED, pageSize = EXPORT_PAGE_SIZE): Generator<Reading> {
    const firstPage = this.query({ predicate, limit: pageSize });
    return this.pagesFrom(firstPage, predicate, pageSize);
  }

  private *pagesFrom(firstPage: Reading[], predicate: Predicate, pageSize: number): Generator<Reading> {
    let page = firstPage;
    for (;;) {
      yield* page;
      const last = page[page.length - 1];
      if (page.length < pageSize || last === undefined) {
        return;
      }
      page = this.query({ predicate: andPredicate(predicate, "id < ?", last.id), limit: pageSize });
    }
  }

  /**
   * Projection for aggregation; consume it synchronously, since the cursor
   * keeps the connection busy until it is exhausted.
   */
  *iterateSeries(predicate: Predicate = UNFILTERED): Generator<SeriesPoint> {
    try {
      yield* this.db.iterate(
        `SELECT timestamp, cpm, acpm FROM ${READINGS_TABLE}${whereSql(predicate)} ORDER BY id ASC`,
        predicate.params,
        seriesRowSchema
      );
    } catch (error) {
      throw toStorageError("query", error);
    }
  }

  count(): number {
    return wrap("count", () => {
      const row = this.db.get(`SELECT COUNT(*) AS total FROM ${READINGS_TABLE}`, [], countRowSchema);
      return row?.total ?? 0;
    });
  }

  ping(): void {
    wrap("ping", () => this.db.get("SELECT 1 AS ok", [], z.object({ ok: z.number() })));
  }

  close(): void {
    closeDatabase(this.db);
  }
}
