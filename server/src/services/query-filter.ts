import { z } from "zod";
import { type RequestParams, readTrimmed } from "../http/request-params";

export type DateRange = {
  from: string | null;
  to: string | null;
  /** Either filter was sent non-blank, whether or not it parsed. */
  supplied: boolean;
};

export type Predicate = {
  clause: string;
  params: Array<string | number>;
};

export const UNFILTERED: Predicate = { clause: "", params: [] };

export const FILTER_FROM_PARAM = "f_timestamp_from";
export const FILTER_TO_PARAM = "f_timestamp_to";

// zod's date() checks both the YYYY-MM-DD shape and the calendar (no 2026-02-30).
const calendarDateSchema = z.string().date();

function normalizeDateInput(value: string | null | undefined): string | null {
  const trimmed = (value ?? "").trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = calendarDateSchema.safeParse(trimmed);
  return parsed.success ? parsed.data : null;
}

/**
 * Unparseable sides are treated as absent rather than rejected.
 */
export function parseDateRange(fromText?: string | null, toText?: string | null): DateRange {
  const from = normalizeDateInput(fromText);
  const to = normalizeDateInput(toText);
  return {
    from: from === null ? null : `${from} 00:00:00`,
    to: to === null ? null : `${to} 23:59:59`,
    supplied: (fromText ?? "").trim().length > 0 || (toText ?? "").trim().length > 0
  };
}

export function readDateRange(params: RequestParams): DateRange {
  return parseDateRange(readTrimmed(params, FILTER_FROM_PARAM), readTrimmed(params, FILTER_TO_PARAM));
}

export function buildPredicate(range: DateRange): Predicate {
  const conditions: string[] = [];
  const params: string[] = [];

  if (range.from !== null) {
    conditions.push("timestamp >= ?");
    params.push(range.from);
  }
  if (range.to !== null) {
    conditions.push("timestamp <= ?");
    params.push(range.to);
  }

  if (conditions.length === 0) {
    return UNFILTERED;
  }
  return { clause: conditions.join(" AND "), params };
}

export function andPredicate(left: Predicate, condition: string, value: string | number): Predicate {
  return {
    clause: left.clause.length > 0 ? `${left.clause} AND ${condition}` : condition,
    params: [...left.params, value]
  };
}
