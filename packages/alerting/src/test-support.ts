import type { Frame, Logger } from "@armguard/shared";
import type { Notifier } from "./notifier.js";
import type { ScreenshotResult, ScreenshotWriter } from "./screenshot-writer.js";

export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46]);

export function jpegFrame(): Frame {
  return {
    data: Buffer.from(JPEG_BYTES),
    format: "jpeg",
    capturedAt: "2026-05-04T10:00:00.000Z",
    source: "test"
  };
}

export function createLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {}
  };
}

export class RecordingScreenshotWriter implements ScreenshotWriter {
  readonly calls: Array<{ at: Date; prefix?: string }> = [];

  constructor(private readonly respond: (call: number) => Promise<ScreenshotResult> | ScreenshotResult = (call) => ({
    ok: true,
    path: `alerts/alert_${call}.jpg`
  })) {}

  async save(_frame: Frame, at: Date, prefix?: string): Promise<ScreenshotResult> {
    this.calls.push({ at, prefix });
    return await this.respond(this.calls.length);
  }
}

export class CountingNotifier implements Notifier {
  readonly enabled = true;
  plays = 0;

  constructor(private readonly fail = false) {}

  async play(): Promise<void> {
    this.plays += 1;
    if (this.fail) {
      throw new Error("no audio device");
    }
  }
}
