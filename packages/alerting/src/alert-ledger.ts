import type { AlertRecord } from "@armguard/shared";

export const ALERT_LEDGER_CAPACITY = 100;

/**
 * Fixed-capacity ring buffer of accepted alerts, oldest evicted first.
 * Every method is synchronous, so reads never observe a half-applied append.
 */
export class AlertLedger {
  private readonly slots: Array<AlertRecord | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity = ALERT_LEDGER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid alert ledger capacity: ${capacity}`);
    }
    this.slots = new Array<AlertRecord | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  append(record: AlertRecord): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = record;
    if (this.count < this.capacity) {
      this.count += 1;
      return;
    }
    this.head = (this.head + 1) % this.capacity;
  }

  /** Up to `count` newest records, newest last, in a new array. */
  recent(count: number): AlertRecord[] {
    const take = Math.max(0, Math.min(Math.floor(count), this.count));
    const result: AlertRecord[] = [];
    for (let offset = this.count - take; offset < this.count; offset += 1) {
      const record = this.slots[(this.head + offset) % this.capacity];
      if (record) {
        result.push(record);
      }
    }
    return result;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
