import { randomUUID } from "crypto";
import { addDays, addHours, subMinutes } from "date-fns";
import { type Result, ok } from "./errors";
import { logger } from "./logger";
import type { FastingPolicy } from "./policy";
import { upcomingWindows } from "./scheduleProjector";
import type { FastingWindow, NotificationIntent, NotificationKind, Plan, Session } from "./types";

/** Where fasting reminders get scheduled. Delivery is somebody else's problem. */
export interface NotificationScheduler {
  scheduleWindowBoundaryNotifications(plan: Plan): Promise<void>;
  scheduleImmediateNotifications(plan: Plan, startingAt: Date, sessionId?: string | null): Promise<void>;
  scheduleReminder(plan: Plan, at: Date, kind: NotificationKind, sessionId?: string | null): Promise<void>;
  cancelPlanNotifications(planId: string): Promise<void>;
  cancelSessionNotifications(session: Session): Promise<void>;
}

export type NotificationDraft = Pick<NotificationIntent, "planId" | "sessionId" | "kind" | "title" | "body" | "scheduledFor">;

const copy: Record<NotificationKind, (plan: Plan) => { title: string; body: string }> = {
  fastStart: (plan) => ({ title: "Time to start your fast", body: `${plan.name} • ${plan.durationHours}h` }),
  fastEnd: (plan) => ({ title: "Fast complete!", body: `You've completed your ${plan.durationHours}h fast. How did it go?` }),
  reminderBeforeEnd: (plan) => ({ title: "Almost there", body: `${plan.reminderMinutesBeforeEnd} minutes left in your fast` }),
  snoozeOver: (plan) => ({ title: "Snooze is over", body: `Your ${plan.durationHours}h fast starts again now` })
};

export const draft = (plan: Plan, kind: NotificationKind, scheduledFor: Date, sessionId: string | null = null): NotificationDraft => ({
  planId: plan.id,
  sessionId,
  kind,
  scheduledFor,
  ...copy[kind](plan)
});

function windowDrafts(plan: Plan, window: FastingWindow, sessionId: string | null, includeStart: boolean) {
  const drafts: NotificationDraft[] = [];
  if (includeStart) drafts.push(draft(plan, "fastStart", window.windowStart, sessionId));
  drafts.push(draft(plan, "fastEnd", window.windowEnd, sessionId));
  if (plan.reminderEnabled && plan.reminderMinutesBeforeEnd > 0) {
    const at = subMinutes(window.windowEnd, plan.reminderMinutesBeforeEnd);
    if (at > window.windowStart) drafts.push(draft(plan, "reminderBeforeEnd", at, sessionId));
  }
  return drafts;
}

/** Start, end and pre-end reminder intents for every scheduled window in the coming weeks. */
export function planBoundaryNotifications(plan: Plan, from: Date, policy: FastingPolicy): Result<NotificationDraft[]> {
  const windows = upcomingWindows(plan, from, policy.notificationWeeksAhead * 7);
  if (!windows.ok) return windows;
  const horizon = addDays(from, policy.notificationWeeksAhead * 7);
  return ok(windows.value.filter((window) => window.windowStart <= horizon).flatMap((window) => windowDrafts(plan, window, null, true)));
}

/** End and reminder intents for a fast clocked in outside the schedule. */
export const immediateNotifications = (plan: Plan, startingAt: Date, sessionId: string | null) =>
  windowDrafts(plan, { windowStart: startingAt, windowEnd: addHours(startingAt, plan.durationHours) }, sessionId, false);

export interface NotificationStore {
  getNotifications(userId: string): Promise<NotificationIntent[]>;
  saveNotifications(userId: string, intents: NotificationIntent[]): Promise<void>;
}

/** Persists intents in the data store so a delivery worker can pick them up later. */
export class StoredNotificationScheduler implements NotificationScheduler {
  constructor(
    private readonly store: NotificationStore,
    private readonly userId: string,
    private readonly policy: FastingPolicy,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async scheduleWindowBoundaryNotifications(plan: Plan) {
    const drafts = planBoundaryNotifications(plan, this.clock(), this.policy);
    if (!drafts.ok) {
      logger.warn(`Skipping notifications for plan ${plan.id}: ${drafts.error.message}`);
      return;
    }
    await this.replace((items) => [...items.filter((item) => !(item.planId === plan.id && item.sessionId === null)), ...this.materialize(drafts.value)]);
  }

  async scheduleImmediateNotifications(plan: Plan, startingAt: Date, sessionId: string | null = null) {
    await this.replace((items) => [...items, ...this.materialize(immediateNotifications(plan, startingAt, sessionId))]);
  }

  async scheduleReminder(plan: Plan, at: Date, kind: NotificationKind, sessionId: string | null = null) {
    await this.replace((items) => [...items, ...this.materialize([draft(plan, kind, at, sessionId)])]);
  }

  async cancelPlanNotifications(planId: string) {
    await this.replace((items) => items.filter((item) => item.planId !== planId));
  }

  async cancelSessionNotifications(session: Session) {
    await this.replace((items) => items.filter((item) => item.sessionId !== session.id));
  }

  pending() { return this.store.getNotifications(this.userId); }

  private materialize(drafts: NotificationDraft[]): NotificationIntent[] {
    const createdAt = this.clock();
    return drafts.map((item) => ({ ...item, id: `n_${randomUUID()}`, userId: this.userId, createdAt }));
  }

  private async replace(update: (items: NotificationIntent[]) => NotificationIntent[]) {
    const current = await this.store.getNotifications(this.userId);
    const now = this.clock();
    await this.store.saveNotifications(this.userId, update(current).filter((item) => item.scheduledFor > now));
  }
}
