import type { Frame } from "./frame.js";

export interface Detection {
  readonly label: string;
  readonly confidence: number;
}

export interface DetectionResult {
  annotatedFrame: Frame;
  detections: Detection[];
  hasDetection: boolean;
  /** Set when inference failed and `annotatedFrame` is the untouched input. */
  error?: string;
}

export interface AlertRecord {
  readonly id: number;
  readonly timestamp: string;
  readonly detections: readonly Detection[];
  readonly screenshotPath: string | null;
}

export type PipelineState = "idle" | "running" | "stopping";

export type TerminationReason = "stopped" | "end_of_stream" | "source_failure" | "internal_error";

export interface PipelineStats {
  framesProcessed: number;
  totalDetections: number;
  detectionFrames: number;
  errorCount: number;
  alertsAccepted: number;
  lastFps: number;
  startedAt?: string;
}

export interface CircuitBreakerState {
  state: "closed" | "open" | "half_open";
  failureCount: number;
  lastFailureAt?: string;
  openedAt?: string;
  lastLatencyMs: number;
}
