import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { type NewReading, ReadingStore } from "../../src/db/reading-store";

export type TempStore = {
  dir: string;
  file: string;
  store: ReadingStore;
  writeFile: (name: string, contents: string) => string;
  cleanup: () => void;
};

export async function createTempStore(): Promise<TempStore> {
  const dir = mkdtempSync(path.join(os.tmpdir(), "readings-test-"));
  const file = path.join(dir, "data", "readings.sqlite");
  const store = await ReadingStore.open(file);
  store.ensureSchema();

  return {
    dir,
    file,
    store,
    writeFile: (name, contents) => {
      const target = path.join(dir, name);
      writeFileSync(target, contents, "utf8");
      return target;
    },
    cleanup: () => {
      store.close();
      rmSync(dir, { recursive: true, force: true });
    }
  };
}

export function sampleReading(overrides: Partial<NewReading> = {}): NewReading {
  return {
    timestamp: "2026-02-10 12:00:00",
    device_id: "DEV-1",
    cpm: "20",
    acpm: "19",
    usv: "0.13",
    dose: "0",
    raw_data: "{}",
    client_ip: "192.0.2.10",
    ...overrides
  };
}
