import { isIP } from "node:net";
import type { IncomingHttpHeaders } from "node:http";

export type RequestParams = Record<string, string>;

export const UNKNOWN = "UNKNOWN";

/**
 * Flattens a parsed query string into a plain mapping. Repeated keys keep
 * their last value; non-string values are dropped. Every key becomes an own
 * property, `__proto__` included.
 */
export function normalizeParams(query: unknown): RequestParams {
  if (!query || typeof query !== "object" || Array.isArray(query)) {
    return {};
  }

  const entries: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(query)) {
    const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
    if (typeof last === "string") {
      entries.push([key, last]);
    }
  }
  return Object.fromEntries(entries);
}

export function hasParam(params: RequestParams, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(params, key);
}

export function readTrimmed(params: RequestParams, key: string): string {
  return hasParam(params, key) ? params[key].trim() : "";
}

/**
 * First alias whose value is non-empty after trimming wins.
 */
export function readParam(params: RequestParams, keys: readonly string[], fallback: string): string {
  for (const key of keys) {
    const value = readTrimmed(params, key);
    if (value.length > 0) {
      return value;
    }
  }
  return fallback;
}

function firstHeaderValue(value: string | string[] | undefined): string {
  const raw = Array.isArray(value) ? value[0] : value;
  return (raw ?? "").trim();
}

export function resolveClientIp(
  headers: IncomingHttpHeaders,
  remoteAddress: string | undefined
): string {
  const candidates = [
    firstHeaderValue(headers["x-forwarded-for"]).split(",")[0]?.trim() ?? "",
    firstHeaderValue(headers["client-ip"]),
    (remoteAddress ?? "").trim()
  ];

  for (const candidate of candidates) {
    if (candidate.length > 0 && isIP(candidate) !== 0) {
      return candidate;
    }
  }
  return UNKNOWN;
}
