import type { KeyValueStore } from "./keyValueStore";
import { logger } from "./logger";

export interface LedgerState {
  customStartTimeOverride: Date | null;
  customTargetHoursOverride: number | null;
  lastEndedWindowEnd: Date | null;
  lastRecordedFastWindowEnd: Date | null;
  snoozedUntil: Date | null;
}

export type SnoozeStatus = "none" | "pending" | "justExpired" | "stale";

type Field = keyof LedgerState;

const FIELDS: Field[] = [
  "customStartTimeOverride",
  "customTargetHoursOverride",
  "lastEndedWindowEnd",
  "lastRecordedFastWindowEnd",
  "snoozedUntil"
];

const emptyState = (): LedgerState => ({
  customStartTimeOverride: null,
  customTargetHoursOverride: null,
  lastEndedWindowEnd: null,
  lastRecordedFastWindowEnd: null,
  snoozedUntil: null
});

function decodeDate(raw: string | null): Date | null {
  if (raw === null) return null;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date;
}

function decodeInteger(raw: string | null): number | null {
  if (raw === null) return null;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : null;
}

/**
 * Per-plan override state. Reads come from an in-memory cache so a 1 Hz tick never touches
 * storage; `refresh()` reloads the cache and is only called at well-defined moments.
 * Writes update the cache at once and are persisted through a serialized queue.
 */
export class OverrideLedger {
  private state: LedgerState = emptyState();
  private writeQueue: Promise<void> = Promise.resolve();
  private failures: unknown[] = [];

  constructor(private readonly store: KeyValueStore, readonly planId: string) {}

  private key(field: Field) { return `ledger:${this.planId}:${field}`; }

  async refresh() {
    await this.flush();
    const next = emptyState();
    const [customStart, customHours, ended, recorded, snoozed] = await Promise.all(FIELDS.map((field) => this.store.get(this.key(field))));
    next.customStartTimeOverride = decodeDate(customStart);
    next.customTargetHoursOverride = decodeInteger(customHours);
    next.lastEndedWindowEnd = decodeDate(ended);
    next.lastRecordedFastWindowEnd = decodeDate(recorded);
    next.snoozedUntil = decodeDate(snoozed);
    this.state = next;
  }

  get snapshot(): Readonly<LedgerState> { return { ...this.state }; }
  get customStart() { return this.state.customStartTimeOverride; }
  get customTargetHours() { return this.state.customTargetHoursOverride; }
  get lastEndedWindowEnd() { return this.state.lastEndedWindowEnd; }
  get lastRecordedFastWindowEnd() { return this.state.lastRecordedFastWindowEnd; }
  get snoozedUntil() { return this.state.snoozedUntil; }

  setCustomStart(start: Date, targetHours: number | null) {
    this.write("customStartTimeOverride", start);
    this.write("customTargetHoursOverride", targetHours);
  }

  clearCustomStart() {
    this.write("customStartTimeOverride", null);
    this.write("customTargetHoursOverride", null);
  }

  markWindowEnded(windowEnd: Date) { this.write("lastEndedWindowEnd", windowEnd); }
  clearEndedWindow() { this.write("lastEndedWindowEnd", null); }

  markWindowRecorded(windowEnd: Date) { this.write("lastRecordedFastWindowEnd", windowEnd); }
  restoreRecordedWindow(previous: Date | null) { this.write("lastRecordedFastWindowEnd", previous); }
  clearRecordedWindow() { this.write("lastRecordedFastWindowEnd", null); }

  setSnooze(until: Date) { this.write("snoozedUntil", until); }
  clearSnooze() { this.write("snoozedUntil", null); }

  snoozeStatus(now: Date, graceSeconds: number): SnoozeStatus {
    const until = this.state.snoozedUntil;
    if (!until) return "none";
    const sinceExpiry = now.getTime() - until.getTime();
    if (sinceExpiry < 0) return "pending";
    return sinceExpiry < graceSeconds * 1000 ? "justExpired" : "stale";
  }

  clearAll() { FIELDS.forEach((field) => this.write(field, null)); }

  /** Resolves once queued writes are on disk; rejects with the first failure since the last flush. */
  async flush() {
    await this.writeQueue;
    if (!this.failures.length) return;
    const [first] = this.failures;
    this.failures = [];
    throw first;
  }

  private write<F extends Field>(field: F, value: LedgerState[F]) {
    const current = this.state[field];
    if (sameValue(current, value)) return;
    this.state = { ...this.state, [field]: value };
    const key = this.key(field);
    const encoded = value === null ? null : value instanceof Date ? value.toISOString() : String(value);
    this.writeQueue = this.writeQueue
      .then(() => (encoded === null ? this.store.delete(key) : this.store.set(key, encoded)))
      .catch((error: unknown) => {
        logger.warn(`Override ledger write failed for ${key}`, error);
        this.failures.push(error);
      });
  }
}

function sameValue(a: Date | number | null, b: Date | number | null) {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b;
}
