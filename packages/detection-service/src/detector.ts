import type { DetectionResult, Frame } from "@armguard/shared";

export interface Detector {
  /**
   * Per-frame failures are reported through `DetectionResult.error` with the
   * input frame and no detections; the pipeline still guards against throws.
   */
  detect(frame: Frame, signal?: AbortSignal): Promise<DetectionResult>;
}
