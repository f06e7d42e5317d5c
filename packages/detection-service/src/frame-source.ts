import type { Frame } from "@armguard/shared";

export type FrameRead =
  | { kind: "frame"; frame: Frame }
  | { kind: "end" }
  | { kind: "error"; error: string };

export interface FrameSource {
  readonly description: string;
  /** Must not reject: failures come back as `{ kind: "error" }`. */
  next(signal?: AbortSignal): Promise<FrameRead>;
  close(): Promise<void>;
}

export type FrameSourceFactory = () => FrameSource;
