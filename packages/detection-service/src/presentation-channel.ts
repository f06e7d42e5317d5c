import type {
  AlertRecord,
  Detection,
  Frame,
  PipelineStats,
  TerminationReason
} from "@armguard/shared";

export type PipelineEvent =
  | {
      type: "frame";
      frame: Frame;
      detections: Detection[];
      hasDetection: boolean;
      frameIndex: number;
      at: string;
    }
  | { type: "alert"; record: AlertRecord }
  | { type: "throughput"; fps: number; framesProcessed: number; totalDetections: number; at: string }
  | { type: "terminated"; reason: TerminationReason; error?: string; stats: PipelineStats };

export const DEFAULT_CHANNEL_CAPACITY = 32;

/**
 * Bounded single-consumer queue between the pipeline and whoever renders its
 * output. `publish` never waits: when the queue is full the oldest frame event
 * goes first, so alerts and lifecycle events survive a slow consumer.
 */
export class PresentationChannel implements AsyncIterable<PipelineEvent> {
  private readonly queue: PipelineEvent[] = [];
  private readonly waiters: Array<(event: PipelineEvent | undefined) => void> = [];
  private closed = false;
  private dropped = 0;

  constructor(readonly capacity = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid channel capacity: ${capacity}`);
    }
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  publish(event: PipelineEvent): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return true;
    }
    if (this.queue.length >= this.capacity) {
      const frameIndex = this.queue.findIndex((item) => item.type === "frame");
      this.queue.splice(frameIndex >= 0 ? frameIndex : 0, 1);
      this.dropped += 1;
    }
    this.queue.push(event);
    return true;
  }

  /** Resolves `undefined` once the channel is closed and drained. */
  next(): Promise<PipelineEvent | undefined> {
    const event = this.queue.shift();
    if (event) {
      return Promise.resolve(event);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<PipelineEvent> {
    while (true) {
      const event = await this.next();
      if (!event) {
        return;
      }
      yield event;
    }
  }
}
