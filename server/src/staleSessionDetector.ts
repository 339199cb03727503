import { addHours } from "date-fns";
import type { FastingPolicy } from "./policy";
import { actualDurationHours, appendNote } from "./sessionRules";
import type { Session } from "./types";

export const RESOLVED_COMPLETED_NOTE = "[Resolved: Marked as completed]";
export const RESOLVED_EARLY_END_NOTE = "[Resolved: Marked as ended early]";

export const staleThresholdHours = (session: Session, policy: FastingPolicy) =>
  Math.min(session.targetDurationHours + policy.staleBufferHours, policy.staleMaxHours);

/** An active session that ran far past any plausible target, usually because the app was closed mid-fast. */
export const isLikelyStale = (session: Session, now: Date, policy: FastingPolicy) =>
  session.completionStatus === "active" && actualDurationHours(session, now) > staleThresholdHours(session, policy);

export const findStaleSession = (sessions: readonly Session[], now: Date, policy: FastingPolicy) =>
  sessions.find((session) => isLikelyStale(session, now, policy)) ?? null;

export function resolveStale(session: Session, resolution: "completed" | "earlyEnd"): Session {
  return {
    ...session,
    endTime: addHours(session.startTime, session.targetDurationHours),
    completionStatus: resolution,
    skipped: false,
    manuallyEdited: true,
    notes: appendNote(session.notes, resolution === "completed" ? RESOLVED_COMPLETED_NOTE : RESOLVED_EARLY_END_NOTE)
  };
}
