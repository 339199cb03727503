import { isSameDay } from "date-fns";
import type { FastingPolicy } from "./policy";
import type { FastingWindow, RegimeState, Session } from "./types";

export type DuplicateReason = "alreadyRecorded" | "matchingSession" | "clockedIn" | "completedSameDay";

/** Remembers the previous tick's state and reports the window that just closed on a fasting → eating edge. */
export class RegimeTransitionDetector {
  private previous: RegimeState | null = null;

  observe(state: RegimeState): FastingWindow | null {
    const previous = this.previous;
    this.previous = state.kind === "inactive" ? null : state;
    if (previous?.kind === "fasting" && state.kind === "eating") {
      return { windowStart: previous.windowStart, windowEnd: previous.windowEnd };
    }
    return null;
  }

  reset() { this.previous = null; }

  get lastState() { return this.previous; }
}

const secondsApart = (a: Date, b: Date) => Math.abs(a.getTime() - b.getTime()) / 1000;

/**
 * Returns why a closed window must not be auto-recorded, or null when all guards pass.
 * Any reason other than `alreadyRecorded` means the window is already represented in history.
 */
export function duplicateReason(
  sessions: readonly Session[],
  window: FastingWindow,
  lastRecordedWindowEnd: Date | null,
  policy: FastingPolicy
): DuplicateReason | null {
  if (lastRecordedWindowEnd && secondsApart(lastRecordedWindowEnd, window.windowEnd) < policy.recordedWindowToleranceSeconds) {
    return "alreadyRecorded";
  }
  const proximity = policy.duplicateProximityMinutes * 60;
  const matching = sessions.some(
    (session) =>
      session.endTime !== null &&
      secondsApart(session.startTime, window.windowStart) < proximity &&
      secondsApart(session.endTime, window.windowEnd) < proximity
  );
  if (matching) return "matchingSession";
  // A fast clocked in at the window start is recorded when the user ends it.
  const clockedIn = sessions.some(
    (session) => session.completionStatus === "active" && secondsApart(session.startTime, window.windowStart) < proximity
  );
  if (clockedIn) return "clockedIn";
  const completedSameDay = sessions.some(
    (session) => session.completionStatus === "completed" && session.endTime !== null && isSameDay(session.endTime, window.windowEnd)
  );
  return completedSameDay ? "completedSameDay" : null;
}
