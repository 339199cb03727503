import test from "node:test";
import assert from "node:assert/strict";
import { type NotificationStore, StoredNotificationScheduler, immediateNotifications, planBoundaryNotifications } from "./notifications";
import { defaultPolicy } from "./policy";
import type { NotificationIntent } from "./types";
import { TestClock, jan, planFixture, sessionFixture } from "./__fixtures__/fakes";

class MemoryNotificationStore implements NotificationStore {
  items: NotificationIntent[] = [];
  async getNotifications(userId: string) { return this.items.filter((item) => item.userId === userId); }
  async saveNotifications(userId: string, intents: NotificationIntent[]) {
    this.items = [...this.items.filter((item) => item.userId !== userId), ...intents];
  }
}

const plan = planFixture({ reminderEnabled: true, reminderMinutesBeforeEnd: 30 });

test("boundary intents cover start, end and reminder for two weeks of windows", () => {
  const drafts = planBoundaryNotifications(plan, jan(5, 21), defaultPolicy);
  assert.ok(drafts.ok);
  if (!drafts.ok) return;
  assert.equal(drafts.value.length, 18);
  assert.deepEqual(
    drafts.value.slice(0, 3).map((item) => [item.kind, item.scheduledFor]),
    [["fastStart", jan(7, 20)], ["fastEnd", jan(8, 12)], ["reminderBeforeEnd", jan(8, 11, 30)]]
  );
  assert.equal(drafts.value[0].title, "Time to start your fast");
  assert.equal(drafts.value[0].body, "16:8 Fasting Plan • 16h");
});

test("reminders are left out when disabled", () => {
  const drafts = planBoundaryNotifications({ ...plan, reminderEnabled: false }, jan(5, 21), defaultPolicy);
  assert.ok(drafts.ok && drafts.value.every((item) => item.kind !== "reminderBeforeEnd"));
});

test("a broken schedule yields a failure rather than intents", () => {
  assert.equal(planBoundaryNotifications({ ...plan, preferredStartTime: "25:00" }, jan(5, 21), defaultPolicy).ok, false);
});

test("immediate intents follow the clocked-in start", () => {
  assert.deepEqual(
    immediateNotifications(plan, jan(6, 9), "s1").map((item) => [item.kind, item.scheduledFor, item.sessionId]),
    [["fastEnd", jan(7, 1), "s1"], ["reminderBeforeEnd", jan(7, 0, 30), "s1"]]
  );
});

test("the stored scheduler replaces, cancels and prunes intents per user", async () => {
  const store = new MemoryNotificationStore();
  const clock = new TestClock(jan(5, 21));
  const scheduler = new StoredNotificationScheduler(store, "user-1", defaultPolicy, clock.now);
  const other = new StoredNotificationScheduler(store, "user-2", defaultPolicy, clock.now);

  await scheduler.scheduleWindowBoundaryNotifications(plan);
  await scheduler.scheduleWindowBoundaryNotifications(plan);
  await other.scheduleReminder(plan, jan(6, 8), "snoozeOver");
  assert.equal((await scheduler.pending()).length, 18);

  await scheduler.scheduleImmediateNotifications(plan, jan(5, 21), "s1");
  assert.equal((await scheduler.pending()).length, 20);
  await scheduler.cancelSessionNotifications(sessionFixture({ id: "s1" }));
  assert.equal((await scheduler.pending()).length, 18);

  clock.set(jan(8, 12, 30));
  await scheduler.scheduleReminder(plan, jan(8, 14), "snoozeOver");
  const pending = await scheduler.pending();
  assert.equal(pending.length, 16);
  assert.ok(pending.every((item) => item.scheduledFor > jan(8, 12, 30) && item.id.startsWith("n_")));

  await scheduler.cancelPlanNotifications(plan.id);
  assert.deepEqual(await scheduler.pending(), []);
  assert.equal((await other.pending()).length, 1);
});
