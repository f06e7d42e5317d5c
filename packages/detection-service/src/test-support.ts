import type { ScreenshotResult, ScreenshotWriter } from "@armguard/alerting";
import type { DetectionResult, Frame, Logger } from "@armguard/shared";
import type { Detector } from "./detector.js";
import type { FrameRead, FrameSource } from "./frame-source.js";

export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46]);
export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);

export function jpegFrame(source = "test"): Frame {
  return {
    data: Buffer.from(JPEG_BYTES),
    format: "jpeg",
    capturedAt: "2026-05-04T10:00:00.000Z",
    source
  };
}

export function silentLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {}
  };
}

/** Plays back a fixed list of reads, then reports end of stream. */
export class ScriptedFrameSource implements FrameSource {
  readonly description = "scripted";
  closed = false;
  private index = 0;

  constructor(private readonly reads: FrameRead[]) {}

  async next(): Promise<FrameRead> {
    const read = this.reads[this.index];
    this.index += 1;
    return read ?? { kind: "end" };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Never yields a frame; a pending read settles only when aborted. */
export class BlockingFrameSource implements FrameSource {
  readonly description = "blocking";
  closed = false;
  reads = 0;

  next(signal?: AbortSignal): Promise<FrameRead> {
    this.reads += 1;
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve({ kind: "error", error: "aborted" });
        return;
      }
      signal?.addEventListener("abort", () => resolve({ kind: "error", error: "aborted" }), { once: true });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeDetector implements Detector {
  calls = 0;

  constructor(private readonly respond: (frame: Frame, call: number) => DetectionResult = (frame) => ({
    annotatedFrame: frame,
    detections: [],
    hasDetection: false
  })) {}

  async detect(frame: Frame): Promise<DetectionResult> {
    this.calls += 1;
    return this.respond(frame, this.calls);
  }
}

export class MemoryScreenshotWriter implements ScreenshotWriter {
  readonly saved: Array<{ frame: Frame; prefix: string }> = [];

  constructor(private readonly failWith?: string) {}

  async save(frame: Frame, _at: Date, prefix = "alert"): Promise<ScreenshotResult> {
    if (this.failWith) {
      return { ok: false, reason: this.failWith };
    }
    this.saved.push({ frame, prefix });
    return { ok: true, path: `${prefix}_${this.saved.length}.jpg` };
  }
}

export function frameRead(source = "test"): FrameRead {
  return { kind: "frame", frame: jpegFrame(source) };
}
