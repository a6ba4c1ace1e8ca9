import { Readable } from "node:stream";
import type { Reading, ReadingStore } from "../db/reading-store";
import { fileStamp } from "../utils/time";
import { buildPredicate, type DateRange } from "./query-filter";
import type { ExportFormat } from "./request-classifier";

export type ExportPayload = {
  format: ExportFormat;
  contentType: string;
  filename: string;
  stream: Readable;
};

const UTF8_BOM = "\uFEFF";

export const EXPORT_HEADERS = ["Timestamp", "DeviceID", "CPM", "ACPM", "uSv/h", "Dose", "RawData"];

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: "text/csv; charset=utf-8",
  // Tab-separated text under the spreadsheet type.
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet; charset=utf-8"
};

export function exportFields(row: Reading): string[] {
  return [row.timestamp, row.device_id, row.cpm, row.acpm, row.usv, row.dose, row.raw_data];
}

export function csvField(value: string): string {
  if (/[,"\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function tsvField(value: string): string {
  return value.replace(/[\t\r\n]/g, " ").trim();
}

export function formatLine(format: ExportFormat, fields: string[]): string {
  if (format === "csv") {
    return `${fields.map(csvField).join(",")}\n`;
  }
  return `${fields.map(tsvField).join("\t")}\n`;
}

function* exportLines(format: ExportFormat, rows: Iterable<Reading>): Generator<string> {
  yield UTF8_BOM;
  yield formatLine(format, EXPORT_HEADERS);
  for (const row of rows) {
    yield formatLine(format, exportFields(row));
  }
}

export class ReadingExporter {
  constructor(private readonly store: ReadingStore) {}

  /**
   * Every matching row, newest first, with no row cap. Storage failures on the
   * first page throw from here rather than from the stream.
   */
  export(format: ExportFormat, range: DateRange, exportedAt: Date = new Date()): ExportPayload {
    const rows = this.store.iterate(buildPredicate(range));
    return {
      format,
      contentType: CONTENT_TYPES[format],
      filename: `radiation_readings_${fileStamp(exportedAt)}.${format}`,
      stream: Readable.from(exportLines(format, rows))
    };
  }
}
