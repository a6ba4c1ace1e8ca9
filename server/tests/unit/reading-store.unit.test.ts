import assert from "node:assert/strict";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { closeDatabase, openDatabase } from "../../src/db/connection";
import { listColumns, migrations, runMigrations } from "../../src/db/migrate";
import { ReadingStore } from "../../src/db/reading-store";
import { StorageError } from "../../src/http/api-error";
import { buildPredicate, parseDateRange } from "../../src/services/query-filter";
import { createTempStore, sampleReading } from "../support/temp-store";

test("reading store: opening creates the data directory and schema", async () => {
  const temp = await createTempStore();
  try {
    assert.equal(existsSync(temp.file), true);
    assert.equal(temp.store.count(), 0);
    assert.deepEqual(temp.store.ensureSchema(), []);
  } finally {
    temp.cleanup();
  }
});

test("reading store: fresh schema applies create and index only", async () => {
  const db = await openDatabase(":memory:");
  try {
    assert.deepEqual(runMigrations(db), ["create_readings_table", "index_readings_timestamp"]);
    assert.deepEqual(listColumns(db, "readings"), [
      "id",
      "timestamp",
      "device_id",
      "cpm",
      "acpm",
      "usv",
      "dose",
      "raw_data",
      "client_ip"
    ]);
    assert.deepEqual(runMigrations(db), []);
    assert.equal(migrations.every((migration) => migration.isApplied(db)), true);
  } finally {
    closeDatabase(db);
  }
});

test("reading store: legacy table gains client_ip without rewriting rows", async () => {
  const db = await openDatabase(":memory:");
  try {
    db.exec(`
      CREATE TABLE readings (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        device_id TEXT NOT NULL,
        cpm TEXT NOT NULL,
        acpm TEXT NOT NULL,
        usv TEXT NOT NULL,
        dose TEXT NOT NULL,
        raw_data TEXT NOT NULL
      )
    `);
    db.run(
      "INSERT INTO readings (timestamp, device_id, cpm, acpm, usv, dose, raw_data) VALUES (?, ?, ?, ?, ?, ?, ?)",
      ["2025-12-31 23:00:00", "OLD", 11, "10", "0.07", "1", "{\"CPM\":\"11\"}"]
    );

    assert.deepEqual(runMigrations(db), ["add_readings_client_ip", "index_readings_timestamp"]);

    const store = new ReadingStore(db);
    const [legacy] = store.query();
    assert.equal(legacy.device_id, "OLD");
    assert.equal(legacy.cpm, "11");
    assert.equal(legacy.client_ip, "UNKNOWN");
    assert.equal(legacy.raw_data, "{\"CPM\":\"11\"}");
  } finally {
    closeDatabase(db);
  }
});

test("reading store: ids increase and query returns newest first", async () => {
  const temp = await createTempStore();
  try {
    const first = temp.store.insert(sampleReading({ device_id: "A", timestamp: "2026-02-10 12:00:05" }));
    const second = temp.store.insert(sampleReading({ device_id: "B", timestamp: "2026-02-10 12:00:00" }));
    const third = temp.store.insert(sampleReading({ device_id: "C", timestamp: "2026-02-10 12:00:00" }));
    assert.deepEqual([first, second, third], [1, 2, 3]);

    assert.deepEqual(
      temp.store.query().map((row) => row.device_id),
      ["C", "B", "A"]
    );
    assert.deepEqual(
      temp.store.query({ limit: 2 }).map((row) => row.id),
      [3, 2]
    );
    assert.deepEqual(
      temp.store.query({ limit: 0 }).map((row) => row.id),
      [3]
    );
    assert.equal(temp.store.count(), 3);
  } finally {
    temp.cleanup();
  }
});

test("reading store: iterate pages through every matching row newest first", async () => {
  const temp = await createTempStore();
  try {
    for (let i = 1; i <= 7; i += 1) {
      temp.store.insert(sampleReading({ timestamp: `2026-02-0${i} 10:00:00`, cpm: String(i) }));
    }

    const all = [...temp.store.iterate(buildPredicate(parseDateRange(null, null)), 3)];
    assert.deepEqual(all.map((row) => row.id), [7, 6, 5, 4, 3, 2, 1]);

    const filtered = [...temp.store.iterate(buildPredicate(parseDateRange("2026-02-03", "2026-02-05")), 2)];
    assert.deepEqual(filtered.map((row) => row.cpm), ["5", "4", "3"]);
  } finally {
    temp.cleanup();
  }
});

test("reading store: iterateSeries projects oldest first", async () => {
  const temp = await createTempStore();
  try {
    temp.store.insert(sampleReading({ timestamp: "2026-02-01 00:00:00", cpm: "1", acpm: "2" }));
    temp.store.insert(sampleReading({ timestamp: "2026-02-02 00:00:00", cpm: "3", acpm: "4" }));
    assert.deepEqual(
      [...temp.store.iterateSeries()],
      [
        { timestamp: "2026-02-01 00:00:00", cpm: "1", acpm: "2" },
        { timestamp: "2026-02-02 00:00:00", cpm: "3", acpm: "4" }
      ]
    );
  } finally {
    temp.cleanup();
  }
});

test("reading store: failures surface as StorageError", async () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), "readings-test-"));
  const store = await ReadingStore.open(path.join(dir, "readings.sqlite"));
  try {
    // Schema never created, so every statement fails to prepare.
    assert.throws(() => store.insert(sampleReading()), StorageError);
    assert.throws(() => store.query(), StorageError);
    assert.throws(() => [...store.iterateSeries()], StorageError);
    assert.throws(() => store.count(), StorageError);
  } finally {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  }
});

test("reading store: rows survive closing and reopening the data file", async () => {
  const temp = await createTempStore();
  try {
    temp.store.insertMany([
      sampleReading({ device_id: "A" }),
      sampleReading({ device_id: "B" })
    ]);
    temp.store.close();

    const reopened = await ReadingStore.open(temp.file);
    try {
      assert.deepEqual(reopened.ensureSchema(), []);
      assert.deepEqual(
        reopened.query().map((row) => [row.id, row.device_id]),
        [
          [2, "B"],
          [1, "A"]
        ]
      );
      assert.equal(reopened.insert(sampleReading({ device_id: "C" })), 3);
    } finally {
      reopened.close();
    }
  } finally {
    temp.cleanup();
  }
});

test("reading store: iterate reads its first page before returning", async () => {
  const temp = await createTempStore();
  try {
    temp.store.insert(sampleReading());
    temp.store.close();
    assert.throws(() => temp.store.iterate(), StorageError);
  } finally {
    temp.cleanup();
  }
});

test("reading store: a closed store raises StorageError", async () => {
  const temp = await createTempStore();
  try {
    temp.store.close();
    assert.throws(() => temp.store.insert(sampleReading()), StorageError);
    assert.throws(() => temp.store.ping(), StorageError);
  } finally {
    temp.cleanup();
  }
});
