import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import { DeviceAuthorizer } from "../../src/services/device-authorizer";
import { extractReading, ReadingIngestor } from "../../src/services/reading-ingestor";
import { createTempStore } from "../support/temp-store";

const FIXED_NOW = new Date("2026-02-14T09:05:07.250Z");

test("ingestor: extracts aliases and substitutes defaults", () => {
  const reading = extractReading({ AID: "gmc-7", cpm: "25", uSv: "0.16" }, "192.0.2.1", FIXED_NOW);
  assert.deepEqual(reading, {
    timestamp: "2026-02-14 09:05:07",
    device_id: "gmc-7",
    cpm: "25",
    acpm: "0",
    usv: "0.16",
    dose: "0",
    raw_data: "{\"AID\":\"gmc-7\",\"cpm\":\"25\",\"uSv\":\"0.16\"}",
    client_ip: "192.0.2.1"
  });

  const empty = extractReading({}, "UNKNOWN", FIXED_NOW);
  assert.equal(empty.device_id, "UNKNOWN");
  assert.equal(empty.usv, "0.0");
  assert.equal(empty.raw_data, "{}");
});

test("ingestor: alias priority follows the declared order", () => {
  const reading = extractReading(
    { gid: "g", AID: "a", id: "", ACPM: "7", acpm: "8", DOSE: "3", dose: " 2 ", USV: "0.5", usv: "0.9" },
    "UNKNOWN",
    FIXED_NOW
  );
  assert.equal(reading.device_id, "a");
  assert.equal(reading.acpm, "7");
  assert.equal(reading.dose, "2");
  assert.equal(reading.usv, "0.5");
});

test("ingestor: accepted call writes exactly one row with receipt time", async () => {
  const temp = await createTempStore();
  try {
    const ingestor = new ReadingIngestor({
      store: temp.store,
      authorizer: new DeviceAuthorizer(path.join(temp.dir, "absent.txt"))
    });

    const before = Date.now();
    const outcome = await ingestor.ingest(
      { ID: "DEV-1", CPM: "abc", ACPM: "19.5", DOSE: "4" },
      { headers: { "x-forwarded-for": "203.0.113.9" }, remoteAddress: "127.0.0.1" }
    );
    const after = Date.now();

    assert.equal(outcome.status, "accepted");
    const rows = temp.store.query();
    assert.equal(rows.length, 1);
    const [row] = rows;
    assert.equal(row.device_id, "DEV-1");
    assert.equal(row.cpm, "abc");
    assert.equal(row.acpm, "19.5");
    assert.equal(row.usv, "0.0");
    assert.equal(row.dose, "4");
    assert.equal(row.client_ip, "203.0.113.9");

    const storedAt = Date.parse(`${row.timestamp.replace(" ", "T")}Z`);
    assert.ok(storedAt >= Math.floor(before / 1000) * 1000);
    assert.ok(storedAt <= after);
  } finally {
    temp.cleanup();
  }
});

test("ingestor: rejected device writes nothing", async () => {
  const temp = await createTempStore();
  try {
    const file = temp.writeFile("allowlist.txt", "ABC123\n");
    const ingestor = new ReadingIngestor({
      store: temp.store,
      authorizer: new DeviceAuthorizer(file),
      now: () => FIXED_NOW
    });

    const rejected = await ingestor.ingest({ ID: "xyz999", CPM: "30" }, { headers: {} });
    assert.deepEqual(rejected, { status: "forbidden", deviceId: "xyz999" });
    assert.equal(temp.store.count(), 0);

    const accepted = await ingestor.ingest({ ID: "abc123", CPM: "30" }, { headers: {} });
    assert.equal(accepted.status, "accepted");
    assert.equal(temp.store.count(), 1);
    assert.equal(temp.store.query()[0].client_ip, "UNKNOWN");
  } finally {
    temp.cleanup();
  }
});
