import { addDays, differenceInCalendarDays, format, startOfDay, startOfWeek, subDays } from "date-fns";
import type { FastingPolicy } from "./policy";
import { actualDurationHours, phaseFor } from "./sessionRules";
import type { FastingAnalytics, FastingPhase, Session, WeekSummary } from "./types";

const reportDate = (session: Session) => session.endTime ?? session.startTime;
const weekOf = (date: Date) => startOfWeek(date, { weekStartsOn: 1 });
const newestFirst = (a: Session, b: Session) => b.startTime.getTime() - a.startTime.getTime();

function groupBy<K, V>(items: readonly V[], keyOf: (item: V) => K) {
  const groups = new Map<K, V[]>();
  for (const item of items) {
    const key = keyOf(item);
    const bucket = groups.get(key);
    if (bucket) bucket.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}

export function summarizeWeek(weekStart: Date, sessions: Session[], now: Date): WeekSummary {
  const byDay = [...groupBy(sessions, (session) => startOfDay(reportDate(session)).getTime()).values()];
  // Zero-length records are cleared fasts: they count as skipped days only.
  const fastedDays = byDay.map((day) => day.filter((session) => actualDurationHours(session, now) > 0)).filter((day) => day.length > 0);
  const fasted = fastedDays.flat();
  const totalHours = fasted.reduce((sum, session) => sum + actualDurationHours(session, now), 0);
  return {
    weekStart,
    weekEnd: addDays(weekStart, 6),
    sessions,
    completedCount: fastedDays.filter((day) => day.some((session) => session.completionStatus === "completed")).length,
    skippedCount: byDay.filter((day) => day.some((session) => session.skipped)).length,
    totalFasts: fastedDays.length,
    averageDurationHours: fasted.length ? totalHours / fasted.length : 0,
    totalHours
  };
}

/** Monday-based weeks keyed by the day each fast ended; the current week is always present. */
export function buildWeekSummaries(sessions: readonly Session[], now: Date): WeekSummary[] {
  const weeks = groupBy(sessions, (session) => weekOf(reportDate(session)).getTime());
  const current = weekOf(now).getTime();
  if (!weeks.has(current)) weeks.set(current, []);
  return [...weeks.entries()]
    .sort(([a], [b]) => b - a)
    .map(([start, items]) => summarizeWeek(new Date(start), [...items].sort(newestFirst), now));
}

function currentStreak(completed: Session[]) {
  const [latest, ...rest] = completed;
  if (!latest) return 0;
  let streak = 1;
  let cursor = latest.startTime;
  for (const session of rest) {
    if (differenceInCalendarDays(cursor, session.startTime) > 1) break;
    streak += 1;
    cursor = session.startTime;
  }
  return streak;
}

function bestStreak(completed: Session[]) {
  const ascending = [...completed].reverse();
  let best = ascending.length ? 1 : 0;
  let run = 1;
  for (let i = 1; i < ascending.length; i++) {
    run = differenceInCalendarDays(ascending[i].startTime, ascending[i - 1].startTime) <= 1 ? run + 1 : 1;
    best = Math.max(best, run);
  }
  return best;
}

function mostConsistentDay(sessions: Session[]) {
  if (!sessions.length) return null;
  const counts = new Map<number, number>();
  for (const session of sessions) counts.set(session.startTime.getDay(), (counts.get(session.startTime.getDay()) ?? 0) + 1);
  let winner = sessions[0].startTime;
  let top = 0;
  for (const session of sessions) {
    const count = counts.get(session.startTime.getDay()) ?? 0;
    if (count > top || (count === top && session.startTime.getDay() < winner.getDay())) {
      top = count;
      winner = session.startTime;
    }
  }
  return format(winner, "EEEE");
}

export function calculateAnalytics(sessions: readonly Session[], now: Date, policy: FastingPolicy): FastingAnalytics {
  const recent = [...sessions].sort(newestFirst).slice(0, policy.analyticsLimit);
  const completed = recent.filter((session) => session.completionStatus === "completed");
  const phaseDistribution: Partial<Record<FastingPhase, number>> = {};
  for (const session of recent) {
    const phase = phaseFor(actualDurationHours(session, now));
    phaseDistribution[phase] = (phaseDistribution[phase] ?? 0) + 1;
  }
  const weekAgo = subDays(now, 7);
  const monthAgo = subDays(now, 30);
  return {
    totalFastsCompleted: completed.length,
    completionRate: recent.length ? (completed.length / recent.length) * 100 : 0,
    averageDurationHours: completed.length ? completed.reduce((sum, session) => sum + actualDurationHours(session, now), 0) / completed.length : 0,
    longestFastHours: recent.reduce((longest, session) => Math.max(longest, actualDurationHours(session, now)), 0),
    currentStreak: currentStreak(completed),
    bestStreak: bestStreak(completed),
    mostConsistentDay: mostConsistentDay(recent),
    phaseDistribution,
    last7DaysSessions: recent.filter((session) => session.startTime >= weekAgo),
    last30DaysSessions: recent.filter((session) => session.startTime >= monthAgo)
  };
}
