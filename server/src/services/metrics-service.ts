type IngestResult = "accepted" | "forbidden";
type ExportFormatLabel = "csv" | "xlsx";

const LATENCY_BUCKETS_MS = [1, 5, 10, 25, 50, 100, 250, 1_000];

type ApiErrorKey = `${number}|${string}`;

type LatencyHistogram = {
  buckets: number[];
  count: number;
  sum: number;
};

function apiErrorKey(statusCode: number, code: string): ApiErrorKey {
  return `${statusCode}|${code}`;
}

function escapeLabel(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/\n/g, "\\n")
    .replace(/"/g, '\\"');
}

function emptyHistogram(): LatencyHistogram {
  return {
    buckets: new Array<number>(LATENCY_BUCKETS_MS.length).fill(0),
    count: 0,
    sum: 0
  };
}

export class MetricsService {
  private readonly ingestTotals = new Map<IngestResult, number>();
  private readonly exportTotals = new Map<ExportFormatLabel, number>();
  private readonly apiErrors = new Map<ApiErrorKey, number>();
  private ingestLatency = emptyHistogram();

  observeIngest(params: { result: IngestResult; latencyMs: number }): void {
    this.ingestTotals.set(params.result, (this.ingestTotals.get(params.result) ?? 0) + 1);

    const boundedLatency = Math.max(0, params.latencyMs);
    this.ingestLatency.count += 1;
    this.ingestLatency.sum += boundedLatency;
    for (let i = 0; i < LATENCY_BUCKETS_MS.length; i += 1) {
      if (boundedLatency <= LATENCY_BUCKETS_MS[i]) {
        this.ingestLatency.buckets[i] += 1;
      }
    }
  }

  observeExport(format: ExportFormatLabel): void {
    this.exportTotals.set(format, (this.exportTotals.get(format) ?? 0) + 1);
  }

  observeApiError(params: { statusCode: number; code: string }): void {
    const key = apiErrorKey(params.statusCode, params.code);
    this.apiErrors.set(key, (this.apiErrors.get(key) ?? 0) + 1);
  }

  snapshot(): {
    ingest: { accepted: number; forbidden: number };
    exports: { csv: number; xlsx: number };
    api_errors: Array<{
      status_code: number;
      code: string;
      total: number;
    }>;
  } {
    return {
      ingest: {
        accepted: this.ingestTotals.get("accepted") ?? 0,
        forbidden: this.ingestTotals.get("forbidden") ?? 0
      },
      exports: {
        csv: this.exportTotals.get("csv") ?? 0,
        xlsx: this.exportTotals.get("xlsx") ?? 0
      },
      api_errors: [...this.apiErrors.entries()].map(([key, total]) => {
        const [statusCode, code] = key.split("|");
        return {
          status_code: Number(statusCode),
          code,
          total
        };
      })
    };
  }

  reset(): void {
    this.ingestTotals.clear();
    this.exportTotals.clear();
    this.apiErrors.clear();
    this.ingestLatency = emptyHistogram();
  }

  renderPrometheus(): string {
    const lines: string[] = [];
    const snapshot = this.snapshot();

    lines.push("# HELP radlog_ingest_total Ingest outcomes by result.");
    lines.push("# TYPE radlog_ingest_total counter");
    lines.push(`radlog_ingest_total{result="accepted"} ${snapshot.ingest.accepted}`);
    lines.push(`radlog_ingest_total{result="forbidden"} ${snapshot.ingest.forbidden}`);

    lines.push("# HELP radlog_ingest_latency_ms Ingest handling latency histogram in milliseconds.");
    lines.push("# TYPE radlog_ingest_latency_ms histogram");
    for (let i = 0; i < LATENCY_BUCKETS_MS.length; i += 1) {
      lines.push(
        `radlog_ingest_latency_ms_bucket{le="${LATENCY_BUCKETS_MS[i]}"} ${this.ingestLatency.buckets[i]}`
      );
    }
    lines.push(`radlog_ingest_latency_ms_bucket{le="+Inf"} ${this.ingestLatency.count}`);
    lines.push(`radlog_ingest_latency_ms_sum ${this.ingestLatency.sum.toFixed(3)}`);
    lines.push(`radlog_ingest_latency_ms_count ${this.ingestLatency.count}`);

    lines.push("# HELP radlog_export_total Export downloads by format.");
    lines.push("# TYPE radlog_export_total counter");
    lines.push(`radlog_export_total{format="csv"} ${snapshot.exports.csv}`);
    lines.push(`radlog_export_total{format="xlsx"} ${snapshot.exports.xlsx}`);

    lines.push("# HELP radlog_api_errors_total Error responses by status/code.");
    lines.push("# TYPE radlog_api_errors_total counter");
    for (const [key, value] of this.apiErrors) {
      const [statusCode, code] = key.split("|");
      lines.push(
        `radlog_api_errors_total{status_code="${escapeLabel(statusCode)}",code="${escapeLabel(code)}"} ${value}`
      );
    }

    return lines.join("\n");
  }
}

export const metricsService = new MetricsService();
