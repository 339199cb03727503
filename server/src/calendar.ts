import { format, getDay, set, startOfDay } from "date-fns";
import { type Result, calendarError, fail, ok } from "./errors";
import { WEEKDAYS, type Weekday } from "./types";

export type TimeOfDay = { hours: number; minutes: number };

const timePattern = /^([01]\d|2[0-3]):([0-5]\d)$/;

export const isWeekday = (value: string): value is Weekday => WEEKDAYS.some((day) => day === value);

export function parseTimeOfDay(value: string): Result<TimeOfDay> {
  const match = timePattern.exec(value);
  if (!match) return fail(calendarError(`Invalid time of day "${value}", expected HH:mm`));
  return ok({ hours: Number(match[1]), minutes: Number(match[2]) });
}

export function parseWeekdays(values: readonly string[]): Result<Set<Weekday>> {
  if (!values.length) return fail(calendarError("Schedule has no fasting days"));
  const invalid = values.filter((value) => !isWeekday(value));
  if (invalid.length) return fail(calendarError(`Invalid days of week: ${invalid.join(", ")}`));
  return ok(new Set(values.filter(isWeekday)));
}

/** Locale-independent weekday short name. */
export const weekdayOf = (date: Date): Weekday => WEEKDAYS[getDay(date)];

export const atTimeOfDay = (day: Date, time: TimeOfDay) =>
  set(startOfDay(day), { hours: time.hours, minutes: time.minutes, seconds: 0, milliseconds: 0 });

export const formatClock = (date: Date) => format(date, "HH:mm");
