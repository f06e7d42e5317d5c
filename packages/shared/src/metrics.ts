import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics
} from "prom-client";

export interface ServiceMetrics {
  registry: Registry;
  framesProcessedTotal: Counter<string>;
  detectionsTotal: Counter<string>;
  alertDecisionsTotal: Counter<string>;
  pipelineErrorsTotal: Counter<string>;
  screenshotFailedTotal: Counter<string>;
  notificationFailedTotal: Counter<string>;
  throughputFps: Gauge<string>;
  alertLedgerSize: Gauge<string>;
  detectLatencyMs: Histogram<string>;
  apiLatencyMs: Histogram<string>;
}

export interface ServiceMetricsOptions {
  collectDefaults?: boolean;
}

export function createServiceMetrics(serviceName: string, options: ServiceMetricsOptions = {}): ServiceMetrics {
  const registry = new Registry();
  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const framesProcessedTotal = new Counter({
    name: "armguard_frames_processed_total",
    help: "Total frames run through the detector",
    labelNames: ["service"],
    registers: [registry]
  });

  const detectionsTotal = new Counter({
    name: "armguard_detections_total",
    help: "Total detections reported by the detector",
    labelNames: ["service", "label"],
    registers: [registry]
  });

  const alertDecisionsTotal = new Counter({
    name: "armguard_alert_decisions_total",
    help: "Alert trigger outcomes (accepted, cooldown, rejected)",
    labelNames: ["service", "outcome"],
    registers: [registry]
  });

  const pipelineErrorsTotal = new Counter({
    name: "armguard_pipeline_errors_total",
    help: "Pipeline errors by kind (source, detector, alert)",
    labelNames: ["service", "kind"],
    registers: [registry]
  });

  const screenshotFailedTotal = new Counter({
    name: "armguard_screenshot_failed_total",
    help: "Alert screenshots that could not be written",
    labelNames: ["service"],
    registers: [registry]
  });

  const notificationFailedTotal = new Counter({
    name: "armguard_notification_failed_total",
    help: "Audible notifications that failed to play",
    labelNames: ["service"],
    registers: [registry]
  });

  const throughputFps = new Gauge({
    name: "armguard_pipeline_fps",
    help: "Most recent pipeline throughput sample in frames per second",
    labelNames: ["service"],
    registers: [registry]
  });

  const alertLedgerSize = new Gauge({
    name: "armguard_alert_ledger_size",
    help: "Alerts currently held in the in-memory ledger",
    labelNames: ["service"],
    registers: [registry]
  });

  const detectLatencyMs = new Histogram({
    name: "armguard_detect_latency_ms",
    help: "Detector latency in milliseconds",
    labelNames: ["service"],
    buckets: [10, 25, 50, 100, 200, 500, 1000, 2000, 5000],
    registers: [registry]
  });

  const apiLatencyMs = new Histogram({
    name: "armguard_api_latency_ms",
    help: "API latency in milliseconds",
    labelNames: ["service", "route", "method", "status"],
    buckets: [5, 10, 50, 100, 200, 500, 1000, 5000],
    registers: [registry]
  });

  throughputFps.labels(serviceName).set(0);
  alertLedgerSize.labels(serviceName).set(0);

  return {
    registry,
    framesProcessedTotal,
    detectionsTotal,
    alertDecisionsTotal,
    pipelineErrorsTotal,
    screenshotFailedTotal,
    notificationFailedTotal,
    throughputFps,
    alertLedgerSize,
    detectLatencyMs,
    apiLatencyMs
  };
}
