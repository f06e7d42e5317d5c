import type { Detection, Logger } from "@armguard/shared";
import type { PipelineEvent, PresentationChannel } from "./presentation-channel.js";

export function formatDetection(detection: Detection): string {
  return `${detection.label.toUpperCase()}: ${(detection.confidence * 100).toFixed(2)}%`;
}

export function presentEvent(event: PipelineEvent, logger: Logger): void {
  switch (event.type) {
    case "frame":
      if (event.hasDetection) {
        logger.warn("weapon detected", {
          frame: event.frameIndex,
          detections: event.detections.map(formatDetection)
        });
      }
      return;
    case "alert":
      logger.warn("alert raised", {
        alert_id: event.record.id,
        screenshot: event.record.screenshotPath ?? "not saved"
      });
      return;
    case "throughput":
      logger.info("throughput", {
        fps: Number(event.fps.toFixed(1)),
        frames: event.framesProcessed,
        detections: event.totalDetections
      });
      return;
    case "terminated":
      logger.info("monitoring ended", {
        reason: event.reason,
        error: event.error,
        frames: event.stats.framesProcessed,
        detections: event.stats.totalDetections,
        alerts: event.stats.alertsAccepted
      });
      return;
  }
}

/** Drains the channel into operator log lines until the channel closes. */
export async function runTerminalPresenter(channel: PresentationChannel, logger: Logger): Promise<void> {
  for await (const event of channel) {
    presentEvent(event, logger);
  }
}
