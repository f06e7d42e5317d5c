import {
  isValidFrame,
  type AlertRecord,
  type Detection,
  type Frame,
  type Logger,
  type ServiceMetrics
} from "@armguard/shared";
import { AlertGate, type AlertGateStatus } from "./alert-gate.js";
import { ALERT_LEDGER_CAPACITY, AlertLedger } from "./alert-ledger.js";
import type { Notifier } from "./notifier.js";
import type { ScreenshotWriter } from "./screenshot-writer.js";

export interface AlertManagerOptions {
  cooldownSec: number;
  ledgerCapacity?: number;
  screenshotWriter: ScreenshotWriter;
  notifier: Notifier;
  logger: Logger;
  metrics?: ServiceMetrics;
  serviceName?: string;
  now?: () => number;
}

type AlertOutcome = "accepted" | "cooldown" | "rejected";

function copyDetections(detections: readonly Detection[]): readonly Detection[] {
  return Object.freeze(
    detections.map((detection) => Object.freeze({ label: detection.label, confidence: detection.confidence }))
  );
}

/**
 * Turns positive detections into rate-limited alerts. Owns the cooldown gate
 * and the alert ledger; screenshot and sound are best-effort side effects.
 */
export class AlertManager {
  private readonly gate: AlertGate;
  private readonly ledger: AlertLedger;
  private readonly screenshotWriter: ScreenshotWriter;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly metrics?: ServiceMetrics;
  private readonly serviceName: string;
  private readonly now: () => number;
  private nextId = 1;
  private clearGeneration = 0;
  private commitTail: Promise<unknown> = Promise.resolve();

  constructor(options: AlertManagerOptions) {
    this.now = options.now ?? (() => Date.now());
    this.gate = new AlertGate({ cooldownSec: options.cooldownSec, now: this.now, logger: options.logger });
    this.ledger = new AlertLedger(options.ledgerCapacity ?? ALERT_LEDGER_CAPACITY);
    this.screenshotWriter = options.screenshotWriter;
    this.notifier = options.notifier;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.serviceName = options.serviceName ?? "alerting";
  }

  async trigger(frame: Frame | null | undefined, detections: readonly Detection[]): Promise<AlertRecord | null> {
    if (!isValidFrame(frame)) {
      this.logger.debug("alert rejected", { reason: "invalid frame" });
      this.countOutcome("rejected");
      return null;
    }
    if (detections.length === 0) {
      this.logger.debug("alert rejected", { reason: "no detections" });
      this.countOutcome("rejected");
      return null;
    }
    const nowMs = this.now();
    if (!this.gate.tryAcquireAt(nowMs)) {
      this.logger.debug("alert suppressed by cooldown", { remaining_ms: this.gate.cooldownRemainingMs() });
      this.countOutcome("cooldown");
      return null;
    }

    // Everything up to here ran without yielding: id, instant and detections
    // are fixed at acceptance, before any side effect can be slow.
    const acceptedAt = new Date(nowMs);
    const id = this.nextId;
    this.nextId += 1;
    const copied = copyDetections(detections);
    const generation = this.clearGeneration;
    this.countOutcome("accepted");

    const screenshot = this.saveScreenshot(frame, acceptedAt);
    this.dispatchNotification();

    const committed = this.commitTail.then(async () => {
      const record: AlertRecord = Object.freeze({
        id,
        timestamp: acceptedAt.toISOString(),
        detections: copied,
        screenshotPath: await screenshot
      });
      if (generation !== this.clearGeneration) {
        // Accepted before a clear that happened while the screenshot was pending.
        this.logger.debug("alert not recorded", { alert_id: record.id, reason: "ledger cleared" });
        return record;
      }
      this.ledger.append(record);
      this.metrics?.alertLedgerSize.labels(this.serviceName).set(this.ledger.size);
      this.logger.info("alert recorded", {
        alert_id: record.id,
        detections: record.detections.map((item) => item.label).join(","),
        screenshot: record.screenshotPath
      });
      return record;
    });
    // A failed commit is reported to its own caller; later commits still run.
    this.commitTail = committed.catch(() => undefined);
    return committed;
  }

  recentAlerts(count = 10): AlertRecord[] {
    return this.ledger.recent(count);
  }

  alertCount(): number {
    return this.ledger.size;
  }

  clearAlerts(): void {
    this.clearGeneration += 1;
    this.ledger.clear();
    this.metrics?.alertLedgerSize.labels(this.serviceName).set(0);
    this.logger.info("alert log cleared");
  }

  gateStatus(): AlertGateStatus {
    return this.gate.snapshot();
  }

  private async saveScreenshot(frame: Frame, acceptedAt: Date): Promise<string | null> {
    try {
      const result = await this.screenshotWriter.save(frame, acceptedAt);
      if (result.ok) {
        return result.path;
      }
      this.metrics?.screenshotFailedTotal.labels(this.serviceName).inc();
      this.logger.warn("alert screenshot not saved", { reason: result.reason });
      return null;
    } catch (error) {
      this.metrics?.screenshotFailedTotal.labels(this.serviceName).inc();
      this.logger.warn("alert screenshot not saved", {
        reason: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }

  private dispatchNotification(): void {
    if (!this.notifier.enabled) {
      return;
    }
    const onFail = (error: unknown): void => {
      this.metrics?.notificationFailedTotal.labels(this.serviceName).inc();
      this.logger.warn("alert sound failed", {
        error: error instanceof Error ? error.message : String(error)
      });
    };
    try {
      void this.notifier.play().catch(onFail);
    } catch (error) {
      onFail(error);
    }
  }

  private countOutcome(outcome: AlertOutcome): void {
    this.metrics?.alertDecisionsTotal.labels(this.serviceName, outcome).inc();
  }
}
