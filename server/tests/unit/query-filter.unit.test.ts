import assert from "node:assert/strict";
import test from "node:test";
import {
  andPredicate,
  buildPredicate,
  parseDateRange,
  readDateRange
} from "../../src/services/query-filter";
import { createTempStore, sampleReading } from "../support/temp-store";

test("query filter: full range becomes inclusive day bounds", () => {
  const range = parseDateRange("2026-02-01", "2026-02-20");
  assert.deepEqual(range, { from: "2026-02-01 00:00:00", to: "2026-02-20 23:59:59", supplied: true });

  const predicate = buildPredicate(range);
  assert.equal(predicate.clause, "timestamp >= ? AND timestamp <= ?");
  assert.deepEqual(predicate.params, ["2026-02-01 00:00:00", "2026-02-20 23:59:59"]);
});

test("query filter: unparseable or missing sides are dropped", () => {
  assert.deepEqual(parseDateRange("garbage", "2026-02-20"), {
    from: null,
    to: "2026-02-20 23:59:59",
    supplied: true
  });
  assert.deepEqual(parseDateRange("2026-02-30", undefined), { from: null, to: null, supplied: true });
  assert.deepEqual(parseDateRange(" 2026-03-01 ", "2026/03/02"), {
    from: "2026-03-01 00:00:00",
    to: null,
    supplied: true
  });
  assert.deepEqual(parseDateRange("  ", null), { from: null, to: null, supplied: false });

  const predicate = buildPredicate(parseDateRange(null, null));
  assert.equal(predicate.clause, "");
  assert.deepEqual(predicate.params, []);
});

test("query filter: reads the filter parameters from the request", () => {
  const range = readDateRange({ f_timestamp_from: "2026-01-05", f_timestamp_to: "nope" });
  assert.deepEqual(range, { from: "2026-01-05 00:00:00", to: null, supplied: true });
});

test("query filter: andPredicate appends to empty and non-empty clauses", () => {
  assert.deepEqual(andPredicate(buildPredicate(parseDateRange(null, null)), "id < ?", 9), {
    clause: "id < ?",
    params: [9]
  });
  assert.deepEqual(andPredicate(buildPredicate(parseDateRange("2026-01-01", null)), "id < ?", 9), {
    clause: "timestamp >= ? AND id < ?",
    params: ["2026-01-01 00:00:00", 9]
  });
});

test("query filter: bounds are inclusive and exclude one second outside", async () => {
  const temp = await createTempStore();
  try {
    for (const timestamp of [
      "2026-01-31 23:59:59",
      "2026-02-01 00:00:00",
      "2026-02-10 08:30:00",
      "2026-02-20 23:59:59",
      "2026-02-21 00:00:00"
    ]) {
      temp.store.insert(sampleReading({ timestamp }));
    }

    const rows = temp.store.query({
      predicate: buildPredicate(parseDateRange("2026-02-01", "2026-02-20"))
    });
    assert.deepEqual(
      rows.map((row) => row.timestamp),
      ["2026-02-20 23:59:59", "2026-02-10 08:30:00", "2026-02-01 00:00:00"]
    );
  } finally {
    temp.cleanup();
  }
});
