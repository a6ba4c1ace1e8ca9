import type { ReadingStore, SeriesPoint } from "../db/reading-store";
import { daysBeforeUtcTimestamp } from "../utils/time";
import { andPredicate, buildPredicate, type DateRange, type Predicate } from "./query-filter";

export const CHART_BUCKETS = ["minute", "hourly", "daily", "weekly", "monthly"] as const;

export type ChartBucket = (typeof CHART_BUCKETS)[number];

export type ChartSeries = {
  labels: string[];
  cpm: number[];
  acpm: number[];
};

type BucketGroup = {
  label: string;
  firstTimestamp: string;
  cpmSum: number;
  acpmSum: number;
  count: number;
};

const DAY_MS = 24 * 60 * 60 * 1000;
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Week of year with Monday as the first day; days before the first Monday
 * fall in week 00.
 */
export function mondayWeekOfYear(year: number, month: number, day: number): number {
  const date = new Date(Date.UTC(year, month - 1, day));
  const yearDay = Math.round((date.getTime() - Date.UTC(year, 0, 1)) / DAY_MS);
  const weekdayFromMonday = (date.getUTCDay() + 6) % 7;
  return Math.floor((yearDay + 7 - weekdayFromMonday) / 7);
}

export function bucketKey(timestamp: string, bucket: ChartBucket): string | null {
  const match = TIMESTAMP_PATTERN.exec(timestamp);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute] = match;

  switch (bucket) {
    case "minute":
      return `${year}-${month}-${day} ${hour}:${minute}`;
    case "hourly":
      return `${year}-${month}-${day} ${hour}:00`;
    case "daily":
      return `${year}-${month}-${day}`;
    case "weekly":
      return `${year}-W${pad2(mondayWeekOfYear(Number(year), Number(month), Number(day)))}`;
    case "monthly":
      return `${year}-${month}`;
  }
}

/** Leading-number parse; anything non-numeric or non-finite counts as zero. */
export function coerceNumber(value: string): number {
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/** Two decimals, halves away from zero. */
export function roundTwo(value: number): number {
  const scaled = Number((Math.abs(value) * 100).toPrecision(15));
  const rounded = Math.round(scaled) / 100;
  if (rounded === 0) {
    return 0;
  }
  return value < 0 ? -rounded : rounded;
}

export function aggregatePoints(points: Iterable<SeriesPoint>, bucket: ChartBucket): ChartSeries {
  const groups = new Map<string, BucketGroup>();

  for (const point of points) {
    const label = bucketKey(point.timestamp, bucket);
    if (label === null) {
      continue;
    }

    const group = groups.get(label);
    if (group) {
      group.cpmSum += coerceNumber(point.cpm);
      group.acpmSum += coerceNumber(point.acpm);
      group.count += 1;
      if (point.timestamp < group.firstTimestamp) {
        group.firstTimestamp = point.timestamp;
      }
    } else {
      groups.set(label, {
        label,
        firstTimestamp: point.timestamp,
        cpmSum: coerceNumber(point.cpm),
        acpmSum: coerceNumber(point.acpm),
        count: 1
      });
    }
  }

  // Ordered by first reading, not by label: weekly labels misorder around new year.
  const ordered = [...groups.values()].sort((a, b) =>
    a.firstTimestamp < b.firstTimestamp ? -1 : a.firstTimestamp > b.firstTimestamp ? 1 : 0
  );

  return {
    labels: ordered.map((group) => group.label),
    cpm: ordered.map((group) => roundTwo(group.cpmSum / group.count)),
    acpm: ordered.map((group) => roundTwo(group.acpmSum / group.count))
  };
}

export class ChartAggregator {
  private readonly now: () => Date;

  constructor(
    private readonly store: ReadingStore,
    now?: () => Date
  ) {
    this.now = now ?? (() => new Date());
  }

  /**
   * Minute buckets only look at the trailing 24 hours when no date filter was
   * sent. A filter that was sent but did not parse still lifts the window.
   */
  effectivePredicate(range: DateRange, bucket: ChartBucket): Predicate {
    const predicate = buildPredicate(range);
    if (bucket === "minute" && !range.supplied) {
      return andPredicate(predicate, "timestamp >= ?", daysBeforeUtcTimestamp(this.now(), 1));
    }
    return predicate;
  }

  aggregate(range: DateRange, bucket: ChartBucket): ChartSeries {
    return aggregatePoints(this.store.iterateSeries(this.effectivePredicate(range, bucket)), bucket);
  }

  aggregateAll(range: DateRange): Record<ChartBucket, ChartSeries> {
    return {
      minute: this.aggregate(range, "minute"),
      hourly: this.aggregate(range, "hourly"),
      daily: this.aggregate(range, "daily"),
      weekly: this.aggregate(range, "weekly"),
      monthly: this.aggregate(range, "monthly")
    };
  }
}
