import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { AbsentNotifier, AlertManager, type Notifier } from "@armguard/alerting";
import type { AlertRecord, Detection, DetectionResult, Frame } from "@armguard/shared";
import type { Detector } from "./detector.js";
import type { FrameRead, FrameSource } from "./frame-source.js";
import { DetectionPipeline } from "./pipeline.js";
import { PresentationChannel, type PipelineEvent } from "./presentation-channel.js";
import {
  BlockingFrameSource,
  FakeDetector,
  MemoryScreenshotWriter,
  ScriptedFrameSource,
  frameRead,
  jpegFrame,
  silentLogger
} from "./test-support.js";

function createPipeline(options: {
  createSource: () => FrameSource;
  detector?: Detector;
  writer?: MemoryScreenshotWriter;
  notifier?: Notifier;
  alertManager?: AlertManager;
  throughputEvery?: number;
  maxConsecutiveSourceErrors?: number;
  now?: () => number;
}) {
  const channel = new PresentationChannel(64);
  const writer = options.writer ?? new MemoryScreenshotWriter();
  const alertManager = options.alertManager ?? new AlertManager({
    cooldownSec: 5,
    screenshotWriter: writer,
    notifier: options.notifier ?? new AbsentNotifier(),
    logger: silentLogger(),
    now: () => Date.parse("2026-05-04T10:00:00.000Z")
  });
  const pipeline = new DetectionPipeline({
    createSource: options.createSource,
    detector: options.detector ?? new FakeDetector(),
    alertManager,
    channel,
    logger: silentLogger(),
    throughputEvery: options.throughputEvery,
    maxConsecutiveSourceErrors: options.maxConsecutiveSourceErrors,
    sourceRetryDelayMs: 0,
    now: options.now
  });
  return { pipeline, channel, alertManager, writer };
}

async function drain(channel: PresentationChannel): Promise<PipelineEvent[]> {
  const events: PipelineEvent[] = [];
  while (channel.pending > 0) {
    const event = await channel.next();
    if (event) {
      events.push(event);
    }
  }
  return events;
}

function lastEvent(events: PipelineEvent[]): PipelineEvent | undefined {
  return events[events.length - 1];
}

const pistol = (): Detection[] => [{ label: "pistol", confidence: 0.95 }];

const alwaysDetects = (): FakeDetector =>
  new FakeDetector((frame) => ({ annotatedFrame: frame, detections: pistol(), hasDetection: true }));

class SilentFailureNotifier implements Notifier {
  readonly enabled = true;

  play(): Promise<void> {
    throw new Error("no audio");
  }
}

class UnavailableAlertManager extends AlertManager {
  async trigger(): Promise<AlertRecord | null> {
    throw new Error("alert store unavailable");
  }
}

class FlakyFrameSource extends ScriptedFrameSource {
  private failed = false;

  async next(): Promise<FrameRead> {
    if (!this.failed) {
      this.failed = true;
      throw new Error("decoder crashed");
    }
    return super.next();
  }
}

describe("DetectionPipeline", () => {
  it("runs to end of stream, releases the source and returns to idle", async () => {
    const source = new ScriptedFrameSource([frameRead(), frameRead(), frameRead()]);
    const { pipeline, channel } = createPipeline({ createSource: () => source });

    assert.equal(pipeline.start(), true);
    assert.equal(pipeline.getState(), "running");
    await pipeline.waitForIdle();

    assert.equal(pipeline.getState(), "idle");
    assert.equal(source.closed, true);
    const events = await drain(channel);
    assert.deepEqual(events.map((event) => event.type), ["frame", "frame", "frame", "terminated"]);
    const terminated = lastEvent(events);
    assert.equal(terminated?.type, "terminated");
    if (terminated?.type === "terminated") {
      assert.equal(terminated.reason, "end_of_stream");
      assert.equal(terminated.error, undefined);
      assert.equal(terminated.stats.framesProcessed, 3);
    }
  });

  it("keeps going when the detector throws on one frame", async () => {
    const frames = [jpegFrame("a"), jpegFrame("b"), jpegFrame("c")];
    const reads = frames.map((frame): FrameRead => ({ kind: "frame", frame }));
    const detector = new FakeDetector((frame, call) => {
      if (call === 2) {
        throw new Error("inference crashed");
      }
      return { annotatedFrame: frame, detections: [], hasDetection: false };
    });
    const { pipeline, channel } = createPipeline({ createSource: () => new ScriptedFrameSource(reads), detector });

    pipeline.start();
    await pipeline.waitForIdle();

    const stats = pipeline.getStats();
    assert.equal(stats.errorCount, 1);
    assert.equal(stats.framesProcessed, 3);
    const frameEvents = (await drain(channel)).filter((event) => event.type === "frame");
    assert.equal(frameEvents.length, 3);
    const second = frameEvents[1];
    assert.equal(second?.type === "frame" ? second.frame : undefined, frames[1]);
  });

  it("terminates with source_failure after too many consecutive read errors", async () => {
    const failing: FrameRead = { kind: "error", error: "camera offline" };
    const source = new ScriptedFrameSource([failing, failing, failing, frameRead()]);
    const { pipeline, channel } = createPipeline({ createSource: () => source, maxConsecutiveSourceErrors: 3 });

    pipeline.start();
    await pipeline.waitForIdle();

    const events = await drain(channel);
    assert.deepEqual(events.map((event) => event.type), ["terminated"]);
    const terminated = lastEvent(events);
    if (terminated?.type === "terminated") {
      assert.equal(terminated.reason, "source_failure");
      assert.equal(terminated.error, "camera offline");
      assert.equal(terminated.stats.errorCount, 3);
    }
    assert.equal(source.closed, true);
    assert.equal(pipeline.getState(), "idle");
  });

  it("resets the consecutive error count after a good frame", async () => {
    const failing: FrameRead = { kind: "error", error: "timeout" };
    const source = new ScriptedFrameSource([failing, frameRead(), failing, failing]);
    const { pipeline, channel } = createPipeline({ createSource: () => source, maxConsecutiveSourceErrors: 3 });

    pipeline.start();
    await pipeline.waitForIdle();

    const terminated = lastEvent(await drain(channel));
    assert.equal(terminated?.type === "terminated" ? terminated.reason : undefined, "end_of_stream");
    assert.equal(pipeline.getStats().errorCount, 3);
    assert.equal(pipeline.getStats().framesProcessed, 1);
  });

  it("publishes the frame before its alert and lets the cooldown suppress repeats", async () => {
    const detector = new FakeDetector((frame) => ({
      annotatedFrame: { ...frame, source: "annotated" },
      detections: pistol(),
      hasDetection: true
    }));
    const { pipeline, channel, alertManager, writer } = createPipeline({
      createSource: () => new ScriptedFrameSource([frameRead(), frameRead(), frameRead()]),
      detector
    });

    pipeline.start();
    await pipeline.waitForIdle();

    const events = await drain(channel);
    assert.deepEqual(events.map((event) => event.type), ["frame", "alert", "frame", "frame", "terminated"]);
    const alert = events[1];
    assert.equal(alert?.type === "alert" ? alert.record.screenshotPath : undefined, "alert_1.jpg");

    const stats = pipeline.getStats();
    assert.equal(stats.alertsAccepted, 1);
    assert.equal(stats.totalDetections, 3);
    assert.equal(stats.detectionFrames, 3);
    assert.equal(alertManager.alertCount(), 1);
    assert.equal(writer.saved[0]?.frame.source, "annotated");
    assert.equal(pipeline.latestFrame()?.source, "annotated");
  });

  it("publishes a throughput sample every N frames", async () => {
    let nowMs = 0;
    const detector = new FakeDetector((frame): DetectionResult => {
      nowMs += 250;
      return { annotatedFrame: frame, detections: [], hasDetection: false };
    });
    const reads = Array.from({ length: 5 }, () => frameRead());
    const { pipeline, channel } = createPipeline({
      createSource: () => new ScriptedFrameSource(reads),
      detector,
      throughputEvery: 2,
      now: () => nowMs
    });

    pipeline.start();
    await pipeline.waitForIdle();

    const samples = (await drain(channel)).flatMap((event) =>
      event.type === "throughput" ? [{ fps: event.fps, frames: event.framesProcessed }] : []
    );
    assert.deepEqual(samples, [
      { fps: 4, frames: 2 },
      { fps: 4, frames: 4 }
    ]);
    assert.equal(pipeline.getStats().lastFps, 4);
  });

  it("stops while a frame read is blocked", async () => {
    const source = new BlockingFrameSource();
    const { pipeline, channel } = createPipeline({ createSource: () => source });

    pipeline.start();
    await new Promise((resolve) => setImmediate(resolve));
    assert.equal(source.reads, 1);

    await pipeline.stop();

    assert.equal(pipeline.getState(), "idle");
    assert.equal(source.closed, true);
    const events = await drain(channel);
    assert.deepEqual(events.map((event) => event.type), ["terminated"]);
    const terminated = lastEvent(events);
    if (terminated?.type === "terminated") {
      assert.equal(terminated.reason, "stopped");
      assert.equal(terminated.stats.errorCount, 0);
    }
  });

  it("refuses a second start while running and restarts with a fresh source", async () => {
    let created = 0;
    const { pipeline } = createPipeline({
      createSource: () => {
        created += 1;
        return new BlockingFrameSource();
      }
    });

    assert.equal(pipeline.start(), true);
    assert.equal(pipeline.start(), false);
    await pipeline.stop();
    assert.equal(pipeline.start(), true);
    await pipeline.stop();

    assert.equal(created, 2);
  });

  it("stays idle when the source cannot be opened", async () => {
    const { pipeline } = createPipeline({
      createSource: () => {
        throw new Error("no such directory");
      }
    });

    assert.equal(pipeline.start(), false);
    assert.equal(pipeline.getState(), "idle");
    await pipeline.stop();
    assert.equal(pipeline.getState(), "idle");
  });

  it("resets counters on request", async () => {
    const { pipeline } = createPipeline({
      createSource: () => new ScriptedFrameSource([frameRead(), frameRead()])
    });
    pipeline.start();
    await pipeline.waitForIdle();
    assert.equal(pipeline.getStats().framesProcessed, 2);

    pipeline.resetStats();

    assert.deepEqual(pipeline.getStats(), {
      framesProcessed: 0,
      totalDetections: 0,
      detectionFrames: 0,
      errorCount: 0,
      alertsAccepted: 0,
      lastFps: 0,
      startedAt: undefined
    });
  });

  it("keeps the newest annotated frame for manual snapshots", async () => {
    const { pipeline } = createPipeline({
      createSource: () => new ScriptedFrameSource([frameRead("first"), frameRead("second")])
    });
    assert.equal(pipeline.latestFrame(), undefined);

    pipeline.start();
    await pipeline.waitForIdle();

    const latest: Frame | undefined = pipeline.latestFrame();
    assert.equal(latest?.source, "second");
  });

  it("keeps monitoring when the sound cannot start", async () => {
    const { pipeline, channel, alertManager } = createPipeline({
      createSource: () => new ScriptedFrameSource(Array.from({ length: 5 }, () => frameRead())),
      detector: alwaysDetects(),
      notifier: new SilentFailureNotifier()
    });

    pipeline.start();
    await pipeline.waitForIdle();

    const terminated = lastEvent(await drain(channel));
    assert.equal(terminated?.type === "terminated" ? terminated.reason : undefined, "end_of_stream");
    assert.equal(pipeline.getStats().framesProcessed, 5);
    assert.equal(pipeline.getStats().alertsAccepted, 1);
    assert.equal(alertManager.alertCount(), 1);
  });

  it("counts a failed alert hand-off as a frame error and carries on", async () => {
    const alertManager = new UnavailableAlertManager({
      cooldownSec: 5,
      screenshotWriter: new MemoryScreenshotWriter(),
      notifier: new AbsentNotifier(),
      logger: silentLogger()
    });
    const { pipeline, channel } = createPipeline({
      createSource: () => new ScriptedFrameSource([frameRead(), frameRead()]),
      detector: alwaysDetects(),
      alertManager
    });

    pipeline.start();
    await pipeline.waitForIdle();

    const events = await drain(channel);
    assert.deepEqual(events.map((event) => event.type), ["frame", "frame", "terminated"]);
    const stats = pipeline.getStats();
    assert.equal(stats.framesProcessed, 2);
    assert.equal(stats.errorCount, 2);
    assert.equal(stats.alertsAccepted, 0);
  });

  it("treats a rejected frame read as a transient source error", async () => {
    const source = new FlakyFrameSource([frameRead()]);
    const { pipeline, channel } = createPipeline({ createSource: () => source });

    pipeline.start();
    await pipeline.waitForIdle();

    const terminated = lastEvent(await drain(channel));
    assert.equal(terminated?.type === "terminated" ? terminated.reason : undefined, "end_of_stream");
    assert.equal(pipeline.getStats().errorCount, 1);
    assert.equal(pipeline.getStats().framesProcessed, 1);
    assert.equal(source.closed, true);
  });
});
