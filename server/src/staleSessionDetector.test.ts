import test from "node:test";
import assert from "node:assert/strict";
import { defaultPolicy } from "./policy";
import { findStaleSession, isLikelyStale, resolveStale, staleThresholdHours } from "./staleSessionDetector";
import { jan, sessionFixture } from "./__fixtures__/fakes";

test("the stale threshold is target plus a day, capped at a week", () => {
  assert.equal(staleThresholdHours(sessionFixture({ targetDurationHours: 16 }), defaultPolicy), 40);
  assert.equal(staleThresholdHours(sessionFixture({ targetDurationHours: 160 }), defaultPolicy), 168);
});

test("only active sessions past the threshold are stale", () => {
  const session = sessionFixture({ startTime: jan(5, 20), targetDurationHours: 16 });
  assert.equal(isLikelyStale(session, jan(7, 12), defaultPolicy), false);
  assert.equal(isLikelyStale(session, jan(7, 12, 1), defaultPolicy), true);
  assert.equal(isLikelyStale({ ...session, completionStatus: "completed", endTime: jan(6, 12) }, jan(20), defaultPolicy), false);
  assert.equal(findStaleSession([session], jan(15), defaultPolicy)?.id, "session-1");
});

test("resolving as completed estimates the end from the target and annotates once", () => {
  const session = sessionFixture({ startTime: jan(5, 20), notes: "Felt good" });
  const resolved = resolveStale(session, "completed");
  assert.deepEqual(resolved.endTime, jan(6, 12));
  assert.equal(resolved.completionStatus, "completed");
  assert.equal(resolved.manuallyEdited, true);
  assert.equal(resolved.notes, "Felt good\n[Resolved: Marked as completed]");
  assert.deepEqual(resolveStale(resolved, "completed"), resolved);
});

test("resolving as ended early uses its own annotation", () => {
  const resolved = resolveStale(sessionFixture(), "earlyEnd");
  assert.equal(resolved.completionStatus, "earlyEnd");
  assert.equal(resolved.notes, "[Resolved: Marked as ended early]");
});
