import type { FastifyInstance } from "fastify";
import { normalizeParams } from "../../http/request-params";
import { metricsService } from "../../services/metrics-service";
import { readDateRange } from "../../services/query-filter";
import type { ReadingExporter } from "../../services/reading-exporter";
import type { ReadingIngestor } from "../../services/reading-ingestor";
import { classify } from "../../services/request-classifier";
import type { Viewer } from "../../services/viewer";

export type ReadingRouteOptions = {
  ingestor: ReadingIngestor;
  exporter: ReadingExporter;
  viewer: Viewer;
};

const PLAIN_TEXT = "text/plain; charset=utf-8";

export async function readingRoutes(
  server: FastifyInstance,
  options: ReadingRouteOptions
): Promise<void> {
  // Counters send everything as query parameters on a bare GET.
  server.get("/", async (request, reply) => {
    const params = normalizeParams(request.query);
    const classified = classify(params);

    if (classified.kind === "write") {
      const started = Date.now();
      const outcome = await options.ingestor.ingest(params, {
        headers: request.headers,
        remoteAddress: request.raw.socket.remoteAddress
      });
      metricsService.observeIngest({ result: outcome.status, latencyMs: Date.now() - started });

      if (outcome.status === "forbidden") {
        request.log.info({ device_id: outcome.deviceId }, "reading rejected by allow-list");
        return reply.code(403).type(PLAIN_TEXT).send("FORBIDDEN");
      }

      request.log.info(
        { reading_id: outcome.id, device_id: outcome.reading.device_id, client_ip: outcome.reading.client_ip },
        "reading stored"
      );
      return reply.type(PLAIN_TEXT).send("OK");
    }

    if (classified.kind === "export") {
      // Throws before the reply starts when the first page cannot be read.
      const payload = options.exporter.export(classified.format, readDateRange(params));
      payload.stream.once("end", () => metricsService.observeExport(payload.format));
      payload.stream.once("error", (error) => {
        request.log.error({ err: error, format: payload.format }, "export stream failed");
      });
      return reply
        .header("Content-Disposition", `attachment; filename="${payload.filename}"`)
        .type(payload.contentType)
        .send(payload.stream);
    }

    return reply.send(options.viewer.build(params));
  });
}
