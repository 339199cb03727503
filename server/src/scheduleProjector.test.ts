import test from "node:test";
import assert from "node:assert/strict";
import { currentOrNextWindow, nextWindowStart, upcomingWindows, validateSchedule } from "./scheduleProjector";
import { jan, planFixture } from "./__fixtures__/fakes";

const plan = planFixture({ daysOfWeek: ["Mon", "Wed", "Fri"], preferredStartTime: "20:00", durationHours: 16 });

test("a window that started on a scheduled day is fasting until it elapses", () => {
  assert.deepEqual(currentOrNextWindow(plan, jan(5, 21)), {
    ok: true,
    value: { kind: "fasting", windowStart: jan(5, 20), windowEnd: jan(6, 12) }
  });
});

test("after the window the next scheduled start is reported", () => {
  assert.deepEqual(currentOrNextWindow(plan, jan(6, 13)), { ok: true, value: { kind: "eating", nextFastStart: jan(7, 20) } });
});

test("window bounds are inclusive of the start and exclusive of the end", () => {
  const atStart = currentOrNextWindow(plan, jan(5, 20));
  assert.ok(atStart.ok && atStart.value.kind === "fasting");
  const atEnd = currentOrNextWindow(plan, jan(6, 12));
  assert.deepEqual(atEnd, { ok: true, value: { kind: "eating", nextFastStart: jan(7, 20) } });
});

test("membership follows the start day even when the fast crosses into an unscheduled day", () => {
  const friday = currentOrNextWindow(plan, jan(10, 9));
  assert.deepEqual(friday, { ok: true, value: { kind: "fasting", windowStart: jan(9, 20), windowEnd: jan(10, 12) } });
  const sunday = currentOrNextWindow(planFixture({ daysOfWeek: ["Sun"], preferredStartTime: "08:00", durationHours: 12 }), jan(5, 7));
  assert.deepEqual(sunday, { ok: true, value: { kind: "eating", nextFastStart: jan(11, 8) } });
});

test("overlapping windows resolve to the latest start", () => {
  const daily36 = planFixture({ daysOfWeek: ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"], preferredStartTime: "08:00", durationHours: 36 });
  assert.deepEqual(currentOrNextWindow(daily36, jan(7, 10)), {
    ok: true,
    value: { kind: "fasting", windowStart: jan(7, 8), windowEnd: jan(8, 20) }
  });
});

test("projection is pure for identical inputs", () => {
  const now = jan(8, 3);
  const first = currentOrNextWindow(plan, now);
  currentOrNextWindow(plan, jan(20, 3));
  assert.deepEqual(currentOrNextWindow(plan, now), first);
});

test("malformed schedules fail instead of defaulting", () => {
  for (const bad of [
    planFixture({ daysOfWeek: ["Mon", "Thursday"] }),
    planFixture({ daysOfWeek: [] }),
    planFixture({ preferredStartTime: "8pm" }),
    planFixture({ durationHours: 0 })
  ]) {
    const result = currentOrNextWindow(bad, jan(5, 21));
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.error.kind, "calendar");
    assert.equal(validateSchedule(bad).ok, false);
  }
  const result = currentOrNextWindow(planFixture({ daysOfWeek: ["Mon", "Thursday"] }), jan(5, 21));
  if (!result.ok) assert.equal(result.error.message, "Invalid days of week: Thursday");
});

test("nextWindowStart skips the window in progress", () => {
  assert.deepEqual(nextWindowStart(plan, jan(5, 21)), { ok: true, value: jan(7, 20) });
});

test("upcomingWindows lists future windows only", () => {
  const windows = upcomingWindows(plan, jan(5, 21), 7);
  assert.ok(windows.ok);
  if (windows.ok) {
    assert.deepEqual(windows.value.map((window) => window.windowStart), [jan(7, 20), jan(9, 20), jan(12, 20)]);
    assert.deepEqual(windows.value[0].windowEnd, jan(8, 12));
  }
});
