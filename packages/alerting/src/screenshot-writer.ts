import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { frameExtension, type Frame } from "@armguard/shared";

export type ScreenshotResult =
  | { ok: true; path: string }
  | { ok: false; reason: string };

export interface ScreenshotWriter {
  save(frame: Frame, at: Date, prefix?: string): Promise<ScreenshotResult>;
}

const MAX_NAME_COLLISIONS = 100;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatScreenshotTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

export function buildScreenshotName(prefix: string, at: Date, frame: Frame, collision = 0): string {
  const suffix = collision > 0 ? `_${collision}` : "";
  return `${prefix}_${formatScreenshotTimestamp(at)}${suffix}.${frameExtension(frame.format)}`;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, "code") === "EEXIST";
}

export class FileScreenshotWriter implements ScreenshotWriter {
  private directoryReady = false;

  constructor(readonly outputDir: string) {}

  async save(frame: Frame, at: Date, prefix = "alert"): Promise<ScreenshotResult> {
    try {
      if (!this.directoryReady) {
        await mkdir(this.outputDir, { recursive: true });
        this.directoryReady = true;
      }

      for (let collision = 0; collision < MAX_NAME_COLLISIONS; collision += 1) {
        const target = path.join(this.outputDir, buildScreenshotName(prefix, at, frame, collision));
        try {
          await writeFile(target, frame.data, { flag: "wx" });
          return { ok: true, path: target };
        } catch (error) {
          if (!isAlreadyExists(error)) {
            throw error;
          }
        }
      }
      return { ok: false, reason: "too many screenshots with the same timestamp" };
    } catch (error) {
      this.directoryReady = false;
      return {
        ok: false,
        reason: error instanceof Error ? error.message : String(error)
      };
    }
  }
}

export class AbsentScreenshotWriter implements ScreenshotWriter {
  async save(): Promise<ScreenshotResult> {
    return { ok: false, reason: "disabled" };
  }
}
