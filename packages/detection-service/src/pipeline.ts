import type { AlertManager } from "@armguard/alerting";
import type {
  AlertRecord,
  Detection,
  DetectionResult,
  Frame,
  Logger,
  PipelineState,
  PipelineStats,
  ServiceMetrics,
  TerminationReason
} from "@armguard/shared";
import { sleep } from "@armguard/shared";
import type { Detector } from "./detector.js";
import type { FrameRead, FrameSource, FrameSourceFactory } from "./frame-source.js";
import type { PresentationChannel } from "./presentation-channel.js";

export interface DetectionPipelineOptions {
  createSource: FrameSourceFactory;
  detector: Detector;
  alertManager: AlertManager;
  channel: PresentationChannel;
  logger: Logger;
  metrics?: ServiceMetrics;
  serviceName?: string;
  throughputEvery?: number;
  maxConsecutiveSourceErrors?: number;
  sourceRetryDelayMs?: number;
  now?: () => number;
}

interface Termination {
  reason: TerminationReason;
  error?: string;
}

function emptyStats(): PipelineStats {
  return {
    framesProcessed: 0,
    totalDetections: 0,
    detectionFrames: 0,
    errorCount: 0,
    alertsAccepted: 0,
    lastFps: 0
  };
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function positiveInteger(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value > 0 ? value : fallback;
}

/**
 * Frame loop: read, detect, alert, publish. One run at a time; `stop` is
 * cooperative and waits for the current iteration to wind down.
 */
export class DetectionPipeline {
  private readonly createSource: FrameSourceFactory;
  private readonly detector: Detector;
  private readonly alertManager: AlertManager;
  private readonly channel: PresentationChannel;
  private readonly logger: Logger;
  private readonly metrics?: ServiceMetrics;
  private readonly serviceName: string;
  private readonly throughputEvery: number;
  private readonly maxConsecutiveSourceErrors: number;
  private readonly sourceRetryDelayMs: number;
  private readonly now: () => number;

  private state: PipelineState = "idle";
  private stats: PipelineStats = emptyStats();
  private latest: Frame | undefined;
  private abortController: AbortController | undefined;
  private loopPromise: Promise<void> | undefined;

  constructor(options: DetectionPipelineOptions) {
    this.createSource = options.createSource;
    this.detector = options.detector;
    this.alertManager = options.alertManager;
    this.channel = options.channel;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.serviceName = options.serviceName ?? "detection-service";
    this.throughputEvery = positiveInteger(options.throughputEvery, 30);
    this.maxConsecutiveSourceErrors = positiveInteger(options.maxConsecutiveSourceErrors, 5);
    this.sourceRetryDelayMs = Math.max(0, options.sourceRetryDelayMs ?? 500);
    this.now = options.now ?? (() => Date.now());
  }

  getState(): PipelineState {
    return this.state;
  }

  getStats(): PipelineStats {
    return { ...this.stats };
  }

  resetStats(): void {
    const startedAt = this.state === "idle" ? undefined : new Date(this.now()).toISOString();
    this.stats = { ...emptyStats(), startedAt };
  }

  latestFrame(): Frame | undefined {
    return this.latest;
  }

  start(): boolean {
    if (this.state !== "idle") {
      return false;
    }

    let source: FrameSource;
    try {
      source = this.createSource();
    } catch (error) {
      this.logger.error("frame source could not be opened", {
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }

    this.state = "running";
    this.stats = { ...emptyStats(), startedAt: new Date(this.now()).toISOString() };
    const controller = new AbortController();
    this.abortController = controller;
    this.logger.info("pipeline started", { source: source.description });
    this.loopPromise = this.run(source, controller.signal);
    return true;
  }

  async stop(): Promise<void> {
    if (this.state === "running") {
      this.state = "stopping";
      this.logger.info("pipeline stopping");
      this.abortController?.abort();
    }
    await this.loopPromise;
  }

  /** Resolves when the current run, if any, has terminated. */
  async waitForIdle(): Promise<void> {
    await this.loopPromise;
  }

  private isRunning(): boolean {
    return this.state === "running";
  }

  private async run(source: FrameSource, signal: AbortSignal): Promise<void> {
    let termination: Termination = { reason: "stopped" };
    const runStartedMs = this.now();
    let windowStartedMs = runStartedMs;
    let windowFrames = 0;
    let consecutiveSourceErrors = 0;
    let frameIndex = 0;

    try {
      while (this.isRunning()) {
        const read = await this.readSafely(source, signal);
        if (!this.isRunning()) {
          break;
        }

        if (read.kind === "end") {
          termination = { reason: "end_of_stream" };
          break;
        }

        if (read.kind === "error") {
          consecutiveSourceErrors += 1;
          this.stats.errorCount += 1;
          this.metrics?.pipelineErrorsTotal.labels(this.serviceName, "source").inc();
          this.logger.warn("frame read failed", {
            error: read.error,
            consecutive: consecutiveSourceErrors
          });
          if (consecutiveSourceErrors >= this.maxConsecutiveSourceErrors) {
            termination = { reason: "source_failure", error: read.error };
            break;
          }
          await sleep(this.sourceRetryDelayMs, signal);
          continue;
        }
        consecutiveSourceErrors = 0;

        const result = await this.detectSafely(read.frame, signal);
        if (!this.isRunning() && signal.aborted && result.error) {
          // Inference was cut short by stop(); not a detector failure.
          break;
        }
        if (result.error) {
          this.stats.errorCount += 1;
          this.metrics?.pipelineErrorsTotal.labels(this.serviceName, "detector").inc();
          this.logger.warn("detection failed", { error: result.error, frame: frameIndex });
        }

        const alert = result.hasDetection
          ? await this.triggerSafely(result.annotatedFrame, result.detections, frameIndex)
          : null;

        this.latest = result.annotatedFrame;
        this.channel.publish({
          type: "frame",
          frame: result.annotatedFrame,
          detections: result.detections,
          hasDetection: result.hasDetection,
          frameIndex,
          at: new Date(this.now()).toISOString()
        });
        if (alert) {
          this.channel.publish({ type: "alert", record: alert });
          this.stats.alertsAccepted += 1;
        }

        frameIndex += 1;
        windowFrames += 1;
        this.stats.framesProcessed += 1;
        this.stats.totalDetections += result.detections.length;
        if (result.hasDetection) {
          this.stats.detectionFrames += 1;
        }
        this.metrics?.framesProcessedTotal.labels(this.serviceName).inc();
        for (const detection of result.detections) {
          this.metrics?.detectionsTotal.labels(this.serviceName, detection.label).inc();
        }

        if (windowFrames >= this.throughputEvery) {
          const nowMs = this.now();
          const elapsedSec = (nowMs - windowStartedMs) / 1000;
          const fps = elapsedSec > 0 ? windowFrames / elapsedSec : 0;
          this.stats.lastFps = fps;
          this.metrics?.throughputFps.labels(this.serviceName).set(fps);
          this.channel.publish({
            type: "throughput",
            fps,
            framesProcessed: this.stats.framesProcessed,
            totalDetections: this.stats.totalDetections,
            at: new Date(nowMs).toISOString()
          });
          windowStartedMs = nowMs;
          windowFrames = 0;
        }

        await yieldToEventLoop();
      }
    } catch (error) {
      termination = {
        reason: "internal_error",
        error: error instanceof Error ? error.message : String(error)
      };
      this.logger.error("pipeline loop failed", { error: termination.error });
    } finally {
      await this.release(source);
      this.state = "idle";
      this.abortController = undefined;
      const stats = this.getStats();
      this.channel.publish({ type: "terminated", ...termination, stats });
      this.logSummary(termination, stats, this.now() - runStartedMs);
    }
  }

  private async readSafely(source: FrameSource, signal: AbortSignal): Promise<FrameRead> {
    try {
      return await source.next(signal);
    } catch (error) {
      return { kind: "error", error: error instanceof Error ? error.message : String(error) };
    }
  }

  private async triggerSafely(
    frame: Frame,
    detections: Detection[],
    frameIndex: number
  ): Promise<AlertRecord | null> {
    try {
      return await this.alertManager.trigger(frame, detections);
    } catch (error) {
      this.stats.errorCount += 1;
      this.metrics?.pipelineErrorsTotal.labels(this.serviceName, "alert").inc();
      this.logger.warn("alert handling failed", {
        error: error instanceof Error ? error.message : String(error),
        frame: frameIndex
      });
      return null;
    }
  }

  private async detectSafely(frame: Frame, signal: AbortSignal): Promise<DetectionResult> {
    try {
      return await this.detector.detect(frame, signal);
    } catch (error) {
      return {
        annotatedFrame: frame,
        detections: [],
        hasDetection: false,
        error: error instanceof Error ? error.message : String(error)
      };
    }
  }

  private async release(source: FrameSource): Promise<void> {
    try {
      await source.close();
    } catch (error) {
      this.logger.warn("frame source close failed", {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private logSummary(termination: Termination, stats: PipelineStats, runtimeMs: number): void {
    const runtimeSec = runtimeMs / 1000;
    this.logger.info("pipeline summary", {
      reason: termination.reason,
      error: termination.error,
      frames: stats.framesProcessed,
      detections: stats.totalDetections,
      detection_frames: stats.detectionFrames,
      alerts: stats.alertsAccepted,
      errors: stats.errorCount,
      runtime_sec: Number(runtimeSec.toFixed(2)),
      average_fps: runtimeSec > 0 ? Number((stats.framesProcessed / runtimeSec).toFixed(2)) : 0
    });
  }
}
