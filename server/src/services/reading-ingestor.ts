import type { IncomingHttpHeaders } from "node:http";
import type { NewReading, ReadingStore } from "../db/reading-store";
import { readParam, type RequestParams, resolveClientIp, UNKNOWN } from "../http/request-params";
import { formatUtcTimestamp } from "../utils/time";
import type { DeviceAuthorizer } from "./device-authorizer";

export const DEVICE_ID_KEYS = ["ID", "id", "AID", "aid", "GID", "gid"] as const;
export const CPM_KEYS = ["CPM", "cpm"] as const;
export const ACPM_KEYS = ["ACPM", "acpm"] as const;
export const USV_KEYS = ["USV", "uSV", "uSv", "usv"] as const;
export const DOSE_KEYS = ["dose", "DOSE"] as const;

export type AckOutcome =
  | { status: "accepted"; id: number; reading: NewReading }
  | { status: "forbidden"; deviceId: string };

export type ClientAddress = {
  headers: IncomingHttpHeaders;
  remoteAddress?: string;
};

export type ReadingIngestorDeps = {
  store: ReadingStore;
  authorizer: DeviceAuthorizer;
  now?: () => Date;
};

export function extractReading(
  params: RequestParams,
  clientIp: string,
  receivedAt: Date
): NewReading {
  return {
    timestamp: formatUtcTimestamp(receivedAt),
    device_id: readParam(params, DEVICE_ID_KEYS, UNKNOWN),
    cpm: readParam(params, CPM_KEYS, "0"),
    acpm: readParam(params, ACPM_KEYS, "0"),
    usv: readParam(params, USV_KEYS, "0.0"),
    dose: readParam(params, DOSE_KEYS, "0"),
    raw_data: JSON.stringify(params),
    client_ip: clientIp
  };
}

export class ReadingIngestor {
  private readonly store: ReadingStore;
  private readonly authorizer: DeviceAuthorizer;
  private readonly now: () => Date;

  constructor(deps: ReadingIngestorDeps) {
    this.store = deps.store;
    this.authorizer = deps.authorizer;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Persists one reading unless the device is rejected by the allow-list.
   * Storage and allow-list failures propagate to the caller.
   */
  async ingest(params: RequestParams, client: ClientAddress): Promise<AckOutcome> {
    const clientIp = resolveClientIp(client.headers, client.remoteAddress);
    const reading = extractReading(params, clientIp, this.now());

    if (!(await this.authorizer.isAllowed(reading.device_id))) {
      return { status: "forbidden", deviceId: reading.device_id };
    }

    const id = this.store.insert(reading);
    return { status: "accepted", id, reading };
  }
}
