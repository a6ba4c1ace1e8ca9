import { hasParam, readTrimmed, type RequestParams } from "../http/request-params";

export type ExportFormat = "csv" | "xlsx";

export type RequestKind =
  | { kind: "write" }
  | { kind: "export"; format: ExportFormat }
  | { kind: "view" };

// Exact spellings only: `Cpm` or `Id` do not mark a write.
export const WRITE_KEYS = ["CPM", "cpm", "ID", "id", "AID", "aid", "GID", "gid"] as const;

export const EXPORT_PARAM = "export";

export function readExportFormat(params: RequestParams): ExportFormat | null {
  const value = readTrimmed(params, EXPORT_PARAM).toLowerCase();
  return value === "csv" || value === "xlsx" ? value : null;
}

export function classify(params: RequestParams): RequestKind {
  if (WRITE_KEYS.some((key) => hasParam(params, key))) {
    return { kind: "write" };
  }
  const format = readExportFormat(params);
  if (format !== null) {
    return { kind: "export", format };
  }
  return { kind: "view" };
}
