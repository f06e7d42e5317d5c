import type { Logger } from "@armguard/shared";

export const DEFAULT_COOLDOWN_SEC = 5;

export interface AlertGateStatus {
  cooldownMs: number;
  lastAcceptedAt?: string;
  remainingMs: number;
}

type Now = () => number;

/**
 * Clamps a cooldown to a usable value instead of failing construction:
 * negative or non-finite input falls back to the default.
 */
export function normalizeCooldownSec(value: number, logger?: Logger): number {
  if (!Number.isFinite(value) || value < 0) {
    logger?.warn("invalid alert cooldown, using default", {
      cooldown_sec: String(value),
      default_sec: DEFAULT_COOLDOWN_SEC
    });
    return DEFAULT_COOLDOWN_SEC;
  }
  return value;
}

export class AlertGate {
  private readonly cooldownMs: number;
  private readonly now: Now;
  private lastAcceptedAtMs: number | undefined;

  constructor(args: { cooldownSec: number; now?: Now; logger?: Logger }) {
    this.cooldownMs = normalizeCooldownSec(args.cooldownSec, args.logger) * 1000;
    this.now = args.now ?? (() => Date.now());
  }

  /**
   * Check-and-set in one synchronous step: nothing can run between the
   * comparison and the update, so at most one caller wins per window.
   */
  tryAcquire(): boolean {
    return this.tryAcquireAt(this.now());
  }

  /** Same as `tryAcquire`, with the caller's reading of the clock. */
  tryAcquireAt(nowMs: number): boolean {
    if (this.lastAcceptedAtMs !== undefined && nowMs - this.lastAcceptedAtMs < this.cooldownMs) {
      return false;
    }
    this.lastAcceptedAtMs = nowMs;
    return true;
  }

  cooldownRemainingMs(): number {
    if (this.lastAcceptedAtMs === undefined) {
      return 0;
    }
    return Math.max(0, this.cooldownMs - (this.now() - this.lastAcceptedAtMs));
  }

  snapshot(): AlertGateStatus {
    return {
      cooldownMs: this.cooldownMs,
      lastAcceptedAt: this.lastAcceptedAtMs !== undefined ? new Date(this.lastAcceptedAtMs).toISOString() : undefined,
      remainingMs: this.cooldownRemainingMs()
    };
  }
}
