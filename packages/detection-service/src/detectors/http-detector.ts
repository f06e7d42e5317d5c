import {
  CircuitBreaker,
  createFrame,
  requestWithRetry,
  type Detection,
  type DetectionResult,
  type Frame,
  type Logger,
  type ServiceMetrics
} from "@armguard/shared";
import type { Detector } from "../detector.js";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

export interface HttpDetectorConfig {
  baseUrl: string;
  confidenceThreshold: number;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

interface DetectResponse {
  detections: Detection[];
  annotatedImage?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDetection(value: unknown): value is Detection {
  return (
    isRecord(value) &&
    typeof value.label === "string" &&
    typeof value.confidence === "number" &&
    Number.isFinite(value.confidence)
  );
}

function parseDetectResponse(payload: unknown): DetectResponse | undefined {
  if (!isRecord(payload) || !Array.isArray(payload.detections)) {
    return undefined;
  }
  const detections: Detection[] = [];
  for (const item of payload.detections) {
    if (!isDetection(item)) {
      return undefined;
    }
    detections.push({ label: item.label, confidence: item.confidence });
  }
  const annotated = payload.annotated_image;
  return {
    detections,
    annotatedImage: typeof annotated === "string" && annotated.length > 0 ? annotated : undefined
  };
}

export function normalizeConfidenceThreshold(value: number, logger?: Logger): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    logger?.warn("invalid confidence threshold, using default", {
      threshold: String(value),
      default: DEFAULT_CONFIDENCE_THRESHOLD
    });
    return DEFAULT_CONFIDENCE_THRESHOLD;
  }
  return value;
}

/**
 * Client for an inference service exposing `POST /detect`. The request body
 * carries the frame as base64; the response lists `{ label, confidence }`
 * pairs and may include a base64 annotated image.
 */
export class HttpDetector implements Detector {
  private readonly config: HttpDetectorConfig;
  private readonly logger: Logger;
  private readonly breaker: CircuitBreaker;
  private readonly metrics?: ServiceMetrics;
  private readonly serviceName: string;
  private readonly endpoint: string;

  constructor(args: {
    config: HttpDetectorConfig;
    logger: Logger;
    breaker?: CircuitBreaker;
    metrics?: ServiceMetrics;
    serviceName?: string;
  }) {
    this.logger = args.logger;
    this.config = {
      ...args.config,
      confidenceThreshold: normalizeConfidenceThreshold(args.config.confidenceThreshold, args.logger)
    };
    this.breaker = args.breaker ?? new CircuitBreaker(5, 5000, 30_000);
    this.metrics = args.metrics;
    this.serviceName = args.serviceName ?? "detection-service";
    this.endpoint = `${args.config.baseUrl.replace(/\/+$/, "")}/detect`;
  }

  get confidenceThreshold(): number {
    return this.config.confidenceThreshold;
  }

  breakerState() {
    return this.breaker.snapshot();
  }

  async detect(frame: Frame, signal?: AbortSignal): Promise<DetectionResult> {
    if (!this.breaker.canRequest()) {
      return this.failed(frame, "detector circuit breaker open");
    }

    const startedAt = Date.now();
    let payload: unknown;
    try {
      const response = await requestWithRetry(this.endpoint, {
        method: "POST",
        body: JSON.stringify({
          image: frame.data.toString("base64"),
          format: frame.format
        })
      }, {
        timeoutMs: this.config.timeoutMs,
        retries: this.config.retries,
        backoffMs: this.config.backoffMs,
        signal
      });
      payload = await response.json();
    } catch (error) {
      this.breaker.recordFailure(Date.now() - startedAt);
      return this.failed(frame, error instanceof Error ? error.message : String(error));
    }

    const latencyMs = Date.now() - startedAt;
    const parsed = parseDetectResponse(payload);
    if (!parsed) {
      this.breaker.recordFailure(latencyMs);
      return this.failed(frame, "detector returned an invalid response");
    }
    this.breaker.recordSuccess(latencyMs);
    this.metrics?.detectLatencyMs.labels(this.serviceName).observe(latencyMs);

    const detections = parsed.detections.filter(
      (item) => item.confidence >= this.config.confidenceThreshold
    );
    return {
      annotatedFrame: this.annotatedFrame(frame, parsed.annotatedImage),
      detections,
      hasDetection: detections.length > 0
    };
  }

  private annotatedFrame(frame: Frame, encoded?: string): Frame {
    if (!encoded) {
      return frame;
    }
    const annotated = createFrame(Buffer.from(encoded, "base64"), frame.source, new Date(frame.capturedAt));
    if (!annotated) {
      this.logger.debug("annotated image ignored", { reason: "not an image" });
      return frame;
    }
    return annotated;
  }

  private failed(frame: Frame, error: string): DetectionResult {
    return { annotatedFrame: frame, detections: [], hasDetection: false, error };
  }
}
