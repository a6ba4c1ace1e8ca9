import type { Reading, ReadingStore } from "../db/reading-store";
import { readTrimmed, type RequestParams } from "../http/request-params";
import type { ChartAggregator, ChartBucket, ChartSeries } from "./chart-aggregator";
import { buildPredicate, FILTER_FROM_PARAM, FILTER_TO_PARAM, readDateRange } from "./query-filter";

export const THEME_KEYS = ["light", "dark", "forest", "ocean", "sunset", "lavender", "mono"] as const;

export type Theme = (typeof THEME_KEYS)[number];

const THEME_LABELS: Record<Theme, string> = {
  light: "White",
  dark: "Dark",
  forest: "Forest",
  ocean: "Ocean",
  sunset: "Sunset",
  lavender: "Lavender",
  mono: "Monochrome"
};

export const DEFAULT_THEME: Theme = "light";

export function resolveTheme(params: RequestParams): Theme {
  const requested = readTrimmed(params, "theme").toLowerCase();
  return THEME_KEYS.find((key) => key === requested) ?? DEFAULT_THEME;
}

export type ViewerModel = {
  theme: Theme;
  themes: Array<{ key: Theme; label: string }>;
  filters: { timestamp_from: string; timestamp_to: string };
  readings: Array<Omit<Reading, "id" | "client_ip">>;
  row_limit: number;
  charts: Record<ChartBucket, ChartSeries>;
  has_data: boolean;
};

export class Viewer {
  constructor(
    private readonly store: ReadingStore,
    private readonly aggregator: ChartAggregator,
    private readonly maxRows: number
  ) {}

  build(params: RequestParams): ViewerModel {
    const range = readDateRange(params);
    const rows = this.store.query({ predicate: buildPredicate(range), limit: this.maxRows });
    const charts = this.aggregator.aggregateAll(range);

    return {
      theme: resolveTheme(params),
      themes: THEME_KEYS.map((key) => ({ key, label: THEME_LABELS[key] })),
      filters: {
        timestamp_from: readTrimmed(params, FILTER_FROM_PARAM),
        timestamp_to: readTrimmed(params, FILTER_TO_PARAM)
      },
      readings: rows.map((row) => ({
        timestamp: row.timestamp,
        device_id: row.device_id,
        cpm: row.cpm,
        acpm: row.acpm,
        usv: row.usv,
        dose: row.dose,
        raw_data: row.raw_data
      })),
      row_limit: this.maxRows,
      charts,
      has_data: Object.values(charts).some((series) => series.labels.length > 0)
    };
  }
}
