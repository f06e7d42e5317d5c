import type { FastifyInstance, FastifyRequest } from "fastify";
import type { AlertManager, ScreenshotWriter } from "@armguard/alerting";
import type { CircuitBreakerState, Logger, ServiceMetrics } from "@armguard/shared";
import type { DetectionPipeline } from "./pipeline.js";
import type { PresentationChannel } from "./presentation-channel.js";

export interface RouteDeps {
  serviceName: string;
  pipeline: DetectionPipeline;
  alertManager: AlertManager;
  channel: PresentationChannel;
  screenshotWriter: ScreenshotWriter;
  metrics: ServiceMetrics;
  logger: Logger;
  detectorBreaker?: () => CircuitBreakerState;
}

const DEFAULT_ALERT_COUNT = 10;
const MAX_ALERT_COUNT = 100;

export function parseAlertCount(raw: string | undefined): number {
  const value = raw === undefined ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    return DEFAULT_ALERT_COUNT;
  }
  return Math.min(MAX_ALERT_COUNT, Math.max(1, Math.floor(value)));
}

export function registerRoutes(app: FastifyInstance, deps: RouteDeps): void {
  const { serviceName, pipeline, alertManager, channel, screenshotWriter, metrics, logger } = deps;
  const requestStartedAt = new WeakMap<FastifyRequest, number>();

  app.addHook("onRequest", async (request) => {
    requestStartedAt.set(request, Date.now());
  });

  app.addHook("onResponse", async (request, reply) => {
    const start = requestStartedAt.get(request) ?? Date.now();
    metrics.apiLatencyMs
      .labels(serviceName, request.url.split("?")[0], request.method, String(reply.statusCode))
      .observe(Date.now() - start);
  });

  app.get("/healthz", async () => {
    const breaker = deps.detectorBreaker?.();
    return {
      status: breaker?.state === "open" ? "degraded" : "ok",
      service: serviceName,
      pipeline: pipeline.getState(),
      stats: pipeline.getStats(),
      alerts: alertManager.alertCount(),
      alertGate: alertManager.gateStatus(),
      droppedEvents: channel.droppedCount,
      circuitBreaker: breaker
    };
  });

  app.get("/metrics", async (_, reply) => {
    reply.header("content-type", metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  app.get<{ Querystring: { count?: string } }>("/alerts", async (request) => {
    const count = parseAlertCount(request.query.count);
    return {
      total: alertManager.alertCount(),
      alerts: alertManager.recentAlerts(count)
    };
  });

  app.delete("/alerts", async () => {
    alertManager.clearAlerts();
    return { status: "ok" };
  });

  app.get("/stats", async () => {
    return { state: pipeline.getState(), stats: pipeline.getStats() };
  });

  app.post("/stats/reset", async () => {
    pipeline.resetStats();
    return { status: "ok", stats: pipeline.getStats() };
  });

  app.post("/pipeline/start", async (_, reply) => {
    if (!pipeline.start()) {
      reply.code(409);
      return { status: "error", message: "pipeline not started", state: pipeline.getState() };
    }
    return { status: "ok", state: pipeline.getState() };
  });

  app.post("/pipeline/stop", async () => {
    await pipeline.stop();
    return { status: "ok", state: pipeline.getState() };
  });

  app.post("/pipeline/snapshot", async (_, reply) => {
    const frame = pipeline.latestFrame();
    if (!frame) {
      reply.code(409);
      return { status: "error", message: "no frame available" };
    }
    const result = await screenshotWriter.save(frame, new Date(), "manual_save");
    if (!result.ok) {
      logger.warn("manual snapshot failed", { reason: result.reason });
      reply.code(500);
      return { status: "error", message: result.reason };
    }
    logger.info("manual snapshot saved", { path: result.path });
    return { status: "ok", path: result.path };
  });
}
