import { addDays, addHours } from "date-fns";
import { type TimeOfDay, atTimeOfDay, parseTimeOfDay, parseWeekdays, weekdayOf } from "./calendar";
import { type Result, calendarError, fail, ok } from "./errors";
import type { FastingWindow, Plan, Weekday, WindowProjection } from "./types";

type Schedule = { days: Set<Weekday>; time: TimeOfDay; durationHours: number };

const LOOKBACK_DAYS = 2;
const LOOKAHEAD_DAYS = 7;

export type ScheduleSource = Pick<Plan, "daysOfWeek" | "preferredStartTime" | "durationHours">;

function readSchedule(plan: ScheduleSource): Result<Schedule> {
  if (!Number.isInteger(plan.durationHours) || plan.durationHours <= 0) {
    return fail(calendarError(`Invalid fast duration ${plan.durationHours}`));
  }
  const days = parseWeekdays(plan.daysOfWeek);
  if (!days.ok) return days;
  const time = parseTimeOfDay(plan.preferredStartTime);
  if (!time.ok) return time;
  return ok({ days: days.value, time: time.value, durationHours: plan.durationHours });
}

function candidateStarts(schedule: Schedule, now: Date, fromOffset: number, toOffset: number) {
  const starts: Date[] = [];
  for (let offset = fromOffset; offset <= toOffset; offset++) {
    const day = addDays(now, offset);
    // Membership is decided by the day the fast starts on, never the day it ends on.
    if (schedule.days.has(weekdayOf(day))) starts.push(atTimeOfDay(day, schedule.time));
  }
  return starts;
}

/**
 * Pure projection of the weekly schedule onto `now`, ignoring overrides and history.
 * Returns the fasting window containing `now` (latest start wins when windows overlap),
 * otherwise the next scheduled start.
 */
export function currentOrNextWindow(plan: ScheduleSource, now: Date): Result<WindowProjection> {
  const schedule = readSchedule(plan);
  if (!schedule.ok) return schedule;

  const starts = candidateStarts(schedule.value, now, -LOOKBACK_DAYS, LOOKAHEAD_DAYS);
  let active: FastingWindow | null = null;
  for (const start of starts) {
    const end = addHours(start, schedule.value.durationHours);
    if (now >= start && now < end) active = { windowStart: start, windowEnd: end };
  }
  if (active) return ok({ kind: "fasting", ...active });

  const next = starts.find((start) => start > now);
  if (!next) return fail(calendarError("No scheduled fast within the next week"));
  return ok({ kind: "eating", nextFastStart: next });
}

/** First scheduled start strictly after `now`, whether or not a window is currently open. */
export function nextWindowStart(plan: ScheduleSource, now: Date): Result<Date> {
  const schedule = readSchedule(plan);
  if (!schedule.ok) return schedule;
  const next = candidateStarts(schedule.value, now, 0, LOOKAHEAD_DAYS).find((start) => start > now);
  return next ? ok(next) : fail(calendarError("No scheduled fast within the next week"));
}

export function upcomingWindows(plan: ScheduleSource, from: Date, days: number): Result<FastingWindow[]> {
  const schedule = readSchedule(plan);
  if (!schedule.ok) return schedule;
  return ok(
    candidateStarts(schedule.value, from, 0, days)
      .filter((start) => start > from)
      .map((start) => ({ windowStart: start, windowEnd: addHours(start, schedule.value.durationHours) }))
  );
}

export const validateSchedule = (plan: ScheduleSource): Result<true> => {
  const schedule = readSchedule(plan);
  return schedule.ok ? ok(true) : schedule;
};
