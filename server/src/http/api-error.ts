import type { FastifyReply } from "fastify";
import { metricsService } from "../services/metrics-service";

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

export function errorCode(error: unknown): string {
  if (error instanceof ConfigError) {
    return "config_error";
  }
  if (error instanceof StorageError) {
    return "storage_error";
  }
  return "internal_error";
}

// Devices parse the body literally, so errors stay plain text without detail.
export function sendPlainError(
  reply: FastifyReply,
  statusCode: number,
  code: string,
  body: string
) {
  metricsService.observeApiError({ statusCode, code });
  return reply.code(statusCode).type("text/plain; charset=utf-8").send(body);
}
