import { addHours, addMinutes } from "date-fns";
import type { OverrideLedger } from "./overrideLedger";
import type { FastingPolicy } from "./policy";
import { currentOrNextWindow, nextWindowStart } from "./scheduleProjector";
import { type Result, ok } from "./errors";
import type { Plan, RegimeState } from "./types";

const fasting = (windowStart: Date, windowEnd: Date): RegimeState => ({ kind: "fasting", windowStart, windowEnd });

/**
 * Reconciles the plan's schedule with the override ledger at `now`.
 *
 * Precedence, first match wins: a snooze that just expired resumes the fast at its expiry;
 * a recently ended window holds the eating state; a custom start overrides the schedule
 * while it lasts; otherwise the pure schedule projection applies. Expired ledger entries
 * are cleared on the way, so repeated calls with the same `now` converge.
 */
export function currentRegimeState(plan: Plan | null, ledger: OverrideLedger, now: Date, policy: FastingPolicy): Result<RegimeState> {
  if (!plan || !plan.regimeActive) return ok({ kind: "inactive" });

  const snooze = ledger.snoozeStatus(now, policy.snoozeResumeGraceSeconds);
  const snoozedUntil = ledger.snoozedUntil;
  if (snooze === "justExpired" && snoozedUntil) {
    ledger.setCustomStart(snoozedUntil, plan.durationHours);
    ledger.clearSnooze();
    ledger.clearEndedWindow();
    return ok(fasting(snoozedUntil, addHours(snoozedUntil, plan.durationHours)));
  }
  if (snooze === "stale") ledger.clearSnooze();

  const projection = currentOrNextWindow(plan, now);
  if (!projection.ok) return projection;

  const endedAt = ledger.lastEndedWindowEnd;
  if (endedAt) {
    if (now < addMinutes(endedAt, policy.endedWindowHoldMinutes)) {
      const next = nextWindowStart(plan, now);
      if (!next.ok) return next;
      return ok({ kind: "eating", nextFastStart: next.value });
    }
    if (projection.value.kind === "fasting" && projection.value.windowStart > endedAt) ledger.clearEndedWindow();
  }

  const customStart = ledger.customStart;
  if (customStart) {
    const customEnd = addHours(customStart, ledger.customTargetHours ?? plan.durationHours);
    if (now < customEnd) return ok(fasting(customStart, customEnd));
    ledger.clearCustomStart();
  }

  return projection;
}

/** Drops a custom start whose window has passed. Called on load and on foreground. */
export function clearExpiredOverrides(plan: Plan | null, ledger: OverrideLedger, now: Date) {
  const customStart = ledger.customStart;
  if (!plan || !customStart) return;
  if (now >= addHours(customStart, ledger.customTargetHours ?? plan.durationHours)) ledger.clearCustomStart();
}
