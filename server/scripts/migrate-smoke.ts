import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { closeDatabase, openDatabase } from "../src/db/connection";
import { listColumns, runMigrations } from "../src/db/migrate";

async function main(): Promise<void> {
  const dir = mkdtempSync(path.join(os.tmpdir(), "readings-migrate-"));
  const db = await openDatabase(path.join(dir, "nested", "readings.sqlite"));

  try {
    // Layout written before client_ip existed.
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
      ["2026-01-01 00:00:00", "LEGACY", "10", "10", "0.06", "0", "{}"]
    );

    const first = runMigrations(db);
    const second = runMigrations(db);
    if (second.length > 0) {
      throw new Error(`Migrations not idempotent: ${second.join(", ")}`);
    }
    if (!listColumns(db, "readings").includes("client_ip")) {
      throw new Error("client_ip column missing after migration.");
    }

    // eslint-disable-next-line no-console
    console.log(`Migration smoke completed (applied: ${first.join(", ")}).`);
  } finally {
    closeDatabase(db);
    rmSync(dir, { recursive: true, force: true });
  }
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
