import fastify, { type FastifyServerOptions } from "fastify";
import type { ReadingStore } from "./db/reading-store";
import { errorCode, sendPlainError } from "./http/api-error";
import { readingRoutes } from "./modules/readings/routes";
import { ChartAggregator } from "./services/chart-aggregator";
import type { DeviceAuthorizer } from "./services/device-authorizer";
import { metricsService } from "./services/metrics-service";
import { ReadingExporter } from "./services/reading-exporter";
import { ReadingIngestor } from "./services/reading-ingestor";
import { Viewer } from "./services/viewer";
import { nowIso } from "./utils/time";

export type AppDeps = {
  store: ReadingStore;
  authorizer: DeviceAuthorizer;
  maxViewRows?: number;
  logger?: FastifyServerOptions["logger"];
  now?: () => Date;
};

const DEFAULT_MAX_VIEW_ROWS = 100;

export function buildApp(deps: AppDeps) {
  const app = fastify({
    logger: deps.logger ?? true,
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "request_id"
  });

  const ingestor = new ReadingIngestor({
    store: deps.store,
    authorizer: deps.authorizer,
    now: deps.now
  });
  const aggregator = new ChartAggregator(deps.store, deps.now);
  const exporter = new ReadingExporter(deps.store);
  const viewer = new Viewer(deps.store, aggregator, deps.maxViewRows ?? DEFAULT_MAX_VIEW_ROWS);

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "request failed");
    return sendPlainError(reply, 500, errorCode(error), "ERROR");
  });

  app.get("/health", async () => {
    deps.store.ping();
    return {
      status: "ok",
      uptime_seconds: process.uptime(),
      db_engine: "sqlite",
      now: nowIso()
    };
  });

  app.get("/metrics", async (_request, reply) => {
    const readingsTotal = deps.store.count();
    const uptime = process.uptime().toFixed(3);

    reply.type("text/plain; version=0.0.4");
    return [
      "# HELP radlog_uptime_seconds Process uptime in seconds.",
      "# TYPE radlog_uptime_seconds gauge",
      `radlog_uptime_seconds ${uptime}`,
      "# HELP radlog_readings_total Stored readings.",
      "# TYPE radlog_readings_total gauge",
      `radlog_readings_total ${readingsTotal}`,
      metricsService.renderPrometheus()
    ].join("\n");
  });

  app.register(readingRoutes, { ingestor, exporter, viewer });

  return app;
}
