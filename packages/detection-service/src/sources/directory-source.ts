import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { createFrame, sleep } from "@armguard/shared";
import type { FrameRead, FrameSource } from "../frame-source.js";

const IMAGE_EXTENSIONS = new Set([".jpg", ".jpeg", ".png"]);

export interface DirectoryFrameSourceConfig {
  directory: string;
  loop: boolean;
  frameIntervalMs: number;
}

/** Replays the still images of a directory in file-name order. */
export class DirectoryFrameSource implements FrameSource {
  readonly description: string;
  private files: string[] | undefined;
  private index = 0;

  constructor(private readonly config: DirectoryFrameSourceConfig) {
    this.description = `directory:${config.directory}`;
  }

  async next(signal?: AbortSignal): Promise<FrameRead> {
    if (!this.files) {
      try {
        const entries = await readdir(this.config.directory, { withFileTypes: true });
        this.files = entries
          .filter((entry) => entry.isFile() && IMAGE_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
          .map((entry) => entry.name)
          .sort((left, right) => left.localeCompare(right));
      } catch (error) {
        return { kind: "error", error: error instanceof Error ? error.message : String(error) };
      }
    }

    if (this.index >= this.files.length) {
      if (!this.config.loop || this.files.length === 0) {
        return { kind: "end" };
      }
      this.index = 0;
    }

    if (this.config.frameIntervalMs > 0) {
      await sleep(this.config.frameIntervalMs, signal);
    }

    const name = this.files[this.index];
    this.index += 1;
    if (name === undefined) {
      return { kind: "end" };
    }

    try {
      const data = await readFile(path.join(this.config.directory, name), { signal });
      const frame = createFrame(data, name);
      if (!frame) {
        return { kind: "error", error: `unsupported image data in ${name}` };
      }
      return { kind: "frame", frame };
    } catch (error) {
      return { kind: "error", error: error instanceof Error ? error.message : String(error) };
    }
  }

  async close(): Promise<void> {
    this.files = undefined;
    this.index = 0;
  }
}
