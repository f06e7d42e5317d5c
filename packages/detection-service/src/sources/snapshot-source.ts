import { createFrame, requestWithRetry, sleep } from "@armguard/shared";
import type { FrameRead, FrameSource } from "../frame-source.js";

export interface SnapshotFrameSourceConfig {
  snapshotUrl: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  intervalMs: number;
}

function buildAuthHeader(username?: string, password?: string): Record<string, string> {
  if (!username || !password) {
    return {};
  }
  const token = Buffer.from(`${username}:${password}`).toString("base64");
  return { authorization: `Basic ${token}` };
}

function redactUrl(raw: string): string {
  try {
    const parsed = new URL(raw);
    parsed.username = "";
    parsed.password = "";
    return parsed.toString();
  } catch {
    return "invalid-url";
  }
}

/**
 * Polls a camera's still-image endpoint (the JPEG snapshot CGI most IP
 * cameras expose). Every failure is transient from the source's point of view.
 */
export class HttpSnapshotFrameSource implements FrameSource {
  readonly description: string;
  private readonly headers: Record<string, string>;
  private readonly inflight = new AbortController();
  private lastFetchAtMs: number | undefined;

  constructor(private readonly config: SnapshotFrameSourceConfig) {
    this.description = `snapshot:${redactUrl(config.snapshotUrl)}`;
    this.headers = buildAuthHeader(config.username, config.password);
  }

  async next(signal?: AbortSignal): Promise<FrameRead> {
    const forwardAbort = (): void => this.inflight.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      if (this.lastFetchAtMs !== undefined) {
        const waitMs = this.config.intervalMs - (Date.now() - this.lastFetchAtMs);
        if (waitMs > 0) {
          await sleep(waitMs, this.inflight.signal);
        }
      }
      if (this.inflight.signal.aborted) {
        return { kind: "error", error: "snapshot source closed" };
      }
      this.lastFetchAtMs = Date.now();

      const response = await requestWithRetry(this.config.snapshotUrl, {
        method: "GET",
        headers: {
          accept: "image/jpeg, image/png",
          ...this.headers
        }
      }, {
        timeoutMs: this.config.timeoutMs,
        retries: 0,
        signal: this.inflight.signal
      });

      const data = Buffer.from(await response.arrayBuffer());
      const frame = createFrame(data, this.description);
      if (!frame) {
        return { kind: "error", error: `snapshot is not an image (${data.length} bytes)` };
      }
      return { kind: "frame", frame };
    } catch (error) {
      return { kind: "error", error: error instanceof Error ? error.message : String(error) };
    } finally {
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  async close(): Promise<void> {
    this.inflight.abort();
  }
}
