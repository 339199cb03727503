import { addHours, differenceInMilliseconds, subMinutes } from "date-fns";
import { z } from "zod";
import { isWeekday } from "./calendar";
import { type Result, fail, ok, preconditionError, validationError } from "./errors";
import type { FastingPolicy } from "./policy";
import type { AllowedDrinks, CompletionStatus, FastingPhase, NewSession, PlanInput, Session, Weekday } from "./types";

const HOUR_MS = 3_600_000;

export const actualDurationHours = (session: Session, now: Date) =>
  Math.max(0, differenceInMilliseconds(session.endTime ?? now, session.startTime)) / HOUR_MS;

export const progress = (session: Session, now: Date) =>
  session.targetDurationHours > 0 ? Math.min(1, actualDurationHours(session, now) / session.targetDurationHours) : 0;

export const timeRemainingMs = (session: Session, now: Date) =>
  Math.max(0, differenceInMilliseconds(addHours(session.startTime, session.targetDurationHours), session.endTime ?? now));

const phaseBands: Array<[number, FastingPhase]> = [
  [4, "postMeal"],
  [8, "fuelSwitching"],
  [12, "fatMobilization"],
  [16, "mildKetosis"],
  [20, "autophagyPotential"]
];

export function phaseFor(hours: number): FastingPhase {
  for (const [upper, phase] of phaseBands) if (hours < upper) return phase;
  return "deepAdaptive";
}

export const classify = (start: Date, end: Date, targetHours: number): CompletionStatus =>
  differenceInMilliseconds(end, start) / HOUR_MS >= targetHours ? "completed" : "earlyEnd";

/** Appends an annotation once; repeated calls leave the notes unchanged. */
export function appendNote(notes: string | null, annotation: string) {
  if (!notes) return annotation;
  return notes.includes(annotation) ? notes : `${notes}\n${annotation}`;
}

type NewSessionInput = {
  userId: string;
  planId: string | null;
  targetHours: number;
  startTime: Date;
  now: Date;
  notes?: string | null;
  originalScheduledStart?: Date | null;
  manuallyEdited?: boolean;
};

export const createSession = (input: NewSessionInput): NewSession => ({
  userId: input.userId,
  planId: input.planId,
  startTime: input.startTime,
  endTime: null,
  targetDurationHours: input.targetHours,
  completionStatus: "active",
  manuallyEdited: input.manuallyEdited ?? false,
  skipped: false,
  mergedFromEarlyEnd: false,
  originalScheduledStart: input.originalScheduledStart ?? null,
  snoozedUntil: null,
  snoozeCount: 0,
  notes: input.notes ?? null,
  createdAt: input.now
});

/** Closed record of a regime window that was never clocked into. */
export const windowRecord = (input: Omit<NewSessionInput, "startTime"> & { windowStart: Date; endTime: Date; status: CompletionStatus }): NewSession => ({
  ...createSession({ ...input, startTime: input.windowStart }),
  endTime: input.endTime,
  completionStatus: input.status,
  skipped: input.status === "skipped"
});

export function endSession(session: Session, endTime: Date, manuallyEdited = false): Session {
  return {
    ...session,
    endTime,
    completionStatus: classify(session.startTime, endTime, session.targetDurationHours),
    skipped: false,
    manuallyEdited: session.manuallyEdited || manuallyEdited
  };
}

export const skipSession = (session: Session, now: Date): Session => ({ ...session, endTime: now, completionStatus: "skipped", skipped: true });

/** Terminates a session under an explicit status, used when a regime window is skipped or snoozed. */
export const terminateSession = (session: Session, endTime: Date, status: CompletionStatus, note?: string): Session => ({
  ...session,
  endTime,
  completionStatus: status,
  skipped: status === "skipped",
  notes: note ? appendNote(session.notes, note) : session.notes
});

export const snoozeSession = (session: Session, until: Date, note: string): Session => ({
  ...session,
  snoozedUntil: until,
  snoozeCount: session.snoozeCount + 1,
  notes: appendNote(session.notes, note)
});

export function adjustSessionStartTime(session: Session, newStart: Date, now: Date): Result<Session> {
  if (newStart > now) return fail(validationError("Start time cannot be in the future"));
  if (session.endTime && newStart >= session.endTime) return fail(validationError("Start time must be before the end time"));
  return ok({ ...session, startTime: newStart, manuallyEdited: true });
}

export function editSessionTimes(session: Session, start: Date, end: Date | null, anotherActive: boolean): Result<Session> {
  if (end && end <= start) return fail(validationError("End time must be after start time"));
  if (!end) {
    if (anotherActive) return fail(preconditionError("Another fast is already active"));
    return ok({ ...session, startTime: start, endTime: null, completionStatus: "active", skipped: false, manuallyEdited: true });
  }
  return ok({
    ...session,
    startTime: start,
    endTime: end,
    completionStatus: classify(start, end, session.targetDurationHours),
    skipped: false,
    manuallyEdited: true
  });
}

export function continuePreviousFast(session: Session, now: Date, anotherActive: boolean, policy: FastingPolicy): Result<Session> {
  if (anotherActive) return fail(preconditionError("Another fast is already active"));
  if (!session.endTime) return fail(preconditionError("This fast has not ended"));
  if (session.endTime < subMinutes(now, policy.quickRestartWindowMinutes)) {
    return fail(preconditionError(`Fasts can only be continued within ${policy.quickRestartWindowMinutes} minutes of ending`));
  }
  return ok({ ...session, endTime: null, completionStatus: "active", skipped: false, mergedFromEarlyEnd: true });
}

export const clearSession = (session: Session): Session => ({
  ...session,
  endTime: session.startTime,
  completionStatus: "failed",
  skipped: false
});

export const isEarlyEnd = (session: Session, now: Date, policy: FastingPolicy) =>
  session.targetDurationHours > 0 && actualDurationHours(session, now) / session.targetDurationHours < policy.earlyEndPromptRatio;

/** Most recent session, when it ended early recently enough to be picked up again. */
export function quickRestartCandidate(sessions: readonly Session[], now: Date, policy: FastingPolicy): Session | null {
  const [latest] = [...sessions].sort((a, b) => b.startTime.getTime() - a.startTime.getTime());
  if (!latest || latest.completionStatus !== "earlyEnd" || !latest.endTime) return null;
  return latest.endTime >= subMinutes(now, policy.quickRestartWindowMinutes) ? latest : null;
}

export function planDisplayName(durationHours: number) {
  switch (durationHours) {
    case 16: return "16:8 Fasting Plan";
    case 12: return "12:12 Fasting Plan";
    case 18: return "18:6 Fasting Plan";
    case 20: return "20:4 Fasting Plan";
    case 24: return "OMAD Plan";
    default: return `${durationHours}-Hour Fast`;
  }
}

export type ValidPlanInput = {
  name: string;
  durationHours: number;
  daysOfWeek: Weekday[];
  preferredStartTime: string;
  allowedDrinks: AllowedDrinks;
  reminderEnabled: boolean;
  reminderMinutesBeforeEnd: number;
};

const planInputSchema = (policy: FastingPolicy) => {
  const durationMessage = `Fast duration must be between ${policy.minPlanDurationHours} and ${policy.maxPlanDurationHours} hours`;
  return z.object({
    name: z.string().trim().max(60, "Plan name must be at most 60 characters").optional(),
    durationHours: z.number().int(durationMessage).min(policy.minPlanDurationHours, durationMessage).max(policy.maxPlanDurationHours, durationMessage),
    daysOfWeek: z
      .array(z.string())
      .min(1, "At least one day of week must be selected")
      .superRefine((days, ctx) => {
        const invalid = days.filter((day) => !isWeekday(day));
        if (invalid.length) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid days of week: ${invalid.join(", ")}` });
      })
      .transform((days) => [...new Set(days.filter(isWeekday))]),
    preferredStartTime: z.string().regex(/^([01]\d|2[0-3]):([0-5]\d)$/, "Start time must be HH:mm"),
    allowedDrinks: z.enum(["strict", "practical", "lenient"]).default("practical"),
    reminderEnabled: z.boolean().default(true),
    reminderMinutesBeforeEnd: z.number().int().min(0, "Reminder must be between 0 and 720 minutes").max(720, "Reminder must be between 0 and 720 minutes").default(30)
  });
};

export function validatePlanInput(input: PlanInput, policy: FastingPolicy): Result<ValidPlanInput> {
  const parsed = planInputSchema(policy).safeParse(input);
  if (!parsed.success) return fail(validationError(parsed.error.issues.map((issue) => issue.message).join("; ")));
  const { name, ...rest } = parsed.data;
  return ok({ ...rest, name: name || planDisplayName(rest.durationHours) });
}
