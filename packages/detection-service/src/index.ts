import Fastify from "fastify";
import {
  AlertManager,
  FileScreenshotWriter,
  createNotifier
} from "@armguard/alerting";
import { CircuitBreaker, createLogger, createServiceMetrics } from "@armguard/shared";
import { loadDetectionServiceConfig, type DetectionServiceConfig } from "./config.js";
import { HttpDetector } from "./detectors/http-detector.js";
import type { FrameSource } from "./frame-source.js";
import { DetectionPipeline } from "./pipeline.js";
import { PresentationChannel } from "./presentation-channel.js";
import { registerRoutes } from "./routes.js";
import { DirectoryFrameSource } from "./sources/directory-source.js";
import { HttpSnapshotFrameSource } from "./sources/snapshot-source.js";
import { createShutdownHandler } from "./shutdown.js";
import { runTerminalPresenter } from "./terminal-presenter.js";

let config: DetectionServiceConfig;
try {
  config = loadDetectionServiceConfig();
} catch (error) {
  createLogger("detection-service").error("service start failed", {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
}
const { runtime } = config;
const logger = createLogger(runtime.serviceName, { level: runtime.logLevel });
const metrics = createServiceMetrics(runtime.serviceName);
const app = Fastify({ logger: false });

function createFrameSource(settings: DetectionServiceConfig): FrameSource {
  if (settings.frameSource === "snapshot" && settings.snapshotUrl) {
    return new HttpSnapshotFrameSource({
      snapshotUrl: settings.snapshotUrl,
      username: settings.snapshotUsername,
      password: settings.snapshotPassword,
      timeoutMs: runtime.apiTimeoutMs,
      intervalMs: settings.frameIntervalMs
    });
  }
  return new DirectoryFrameSource({
    directory: settings.frameDirectory,
    loop: settings.frameLoop,
    frameIntervalMs: settings.frameIntervalMs
  });
}

const detector = new HttpDetector({
  config: {
    baseUrl: config.detectorUrl,
    confidenceThreshold: config.detectionConfidence,
    timeoutMs: runtime.apiTimeoutMs,
    retries: runtime.apiRetries,
    backoffMs: runtime.apiBackoffMs
  },
  logger,
  breaker: new CircuitBreaker(5, 5000, 30_000),
  metrics,
  serviceName: runtime.serviceName
});

const screenshotWriter = new FileScreenshotWriter(config.screenshotDir);
const alertManager = new AlertManager({
  cooldownSec: config.alertCooldownSec,
  screenshotWriter,
  notifier: createNotifier({ soundFile: config.soundFile, player: config.soundPlayer, logger }),
  logger,
  metrics,
  serviceName: runtime.serviceName
});

const channel = new PresentationChannel(config.channelCapacity);
const pipeline = new DetectionPipeline({
  createSource: () => createFrameSource(config),
  detector,
  alertManager,
  channel,
  logger,
  metrics,
  serviceName: runtime.serviceName,
  throughputEvery: config.throughputEvery,
  maxConsecutiveSourceErrors: config.maxSourceErrors,
  sourceRetryDelayMs: config.sourceRetryMs
});

registerRoutes(app, {
  serviceName: runtime.serviceName,
  pipeline,
  alertManager,
  channel,
  screenshotWriter,
  metrics,
  logger,
  detectorBreaker: () => detector.breakerState()
});

let presenter: Promise<void> | undefined;

async function start(): Promise<void> {
  presenter = runTerminalPresenter(channel, logger);
  await app.listen({ host: "0.0.0.0", port: runtime.port });
  logger.info("service started", {
    port: runtime.port,
    frameSource: config.frameSource,
    detector: config.detectorUrl,
    confidence: config.detectionConfidence,
    cooldownSec: config.alertCooldownSec
  });
  if (config.autoStart) {
    pipeline.start();
  }
}

const shutdown = createShutdownHandler({
  logger,
  close: async () => {
    await pipeline.stop();
    channel.close();
    await presenter;
    await app.close();
  }
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

start().catch((error) => {
  logger.error("service start failed", { error: String(error) });
  process.exit(1);
});
