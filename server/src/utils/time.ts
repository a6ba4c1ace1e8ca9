const DAY_MS = 24 * 60 * 60 * 1000;

export function nowIso(): string {
  return new Date().toISOString();
}

/** `YYYY-MM-DD HH:MM:SS` in UTC, the stored timestamp form. */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function daysBeforeUtcTimestamp(date: Date, days: number): string {
  return formatUtcTimestamp(new Date(date.getTime() - days * DAY_MS));
}

/** `YYYYMMDD_HHMMSS` in UTC, used in export filenames. */
export function fileStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
}
