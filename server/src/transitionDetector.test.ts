import test from "node:test";
import assert from "node:assert/strict";
import { defaultPolicy } from "./policy";
import { RegimeTransitionDetector, duplicateReason } from "./transitionDetector";
import type { RegimeState } from "./types";
import { jan, sessionFixture } from "./__fixtures__/fakes";

const fasting: RegimeState = { kind: "fasting", windowStart: jan(5, 20), windowEnd: jan(6, 12) };
const eating: RegimeState = { kind: "eating", nextFastStart: jan(7, 20) };
const window = { windowStart: jan(5, 20), windowEnd: jan(6, 12) };

test("only a fasting to eating edge yields the closed window", () => {
  const detector = new RegimeTransitionDetector();
  assert.equal(detector.observe(eating), null);
  assert.equal(detector.observe(fasting), null);
  assert.equal(detector.observe(fasting), null);
  assert.deepEqual(detector.observe(eating), window);
  assert.equal(detector.observe(eating), null);
});

test("inactive and reset forget the previous state", () => {
  const detector = new RegimeTransitionDetector();
  detector.observe(fasting);
  detector.observe({ kind: "inactive" });
  assert.equal(detector.observe(eating), null);

  detector.observe(fasting);
  detector.reset();
  assert.equal(detector.lastState, null);
  assert.equal(detector.observe(eating), null);
});

test("a window recorded within the tolerance is a duplicate", () => {
  assert.equal(duplicateReason([], window, jan(6, 12, 0, 59), defaultPolicy), "alreadyRecorded");
  assert.equal(duplicateReason([], window, jan(6, 12, 1), defaultPolicy), null);
});

test("a session matching both bounds within five minutes is a duplicate", () => {
  const near = sessionFixture({ startTime: jan(5, 20, 4), endTime: jan(6, 11, 56), completionStatus: "earlyEnd" });
  assert.equal(duplicateReason([near], window, null, defaultPolicy), "matchingSession");
  const startOnly = sessionFixture({ startTime: jan(5, 20, 4), endTime: jan(6, 9), completionStatus: "earlyEnd" });
  assert.equal(duplicateReason([startOnly], window, null, defaultPolicy), null);
});

test("a fast still clocked in at the window start is left to its owner", () => {
  const running = sessionFixture({ startTime: jan(5, 20), endTime: null, completionStatus: "active" });
  assert.equal(duplicateReason([running], window, null, defaultPolicy), "clockedIn");
});

test("a completed fast ending the same day blocks another", () => {
  const morning = sessionFixture({ startTime: jan(5, 8), endTime: jan(6, 0, 30), completionStatus: "completed" });
  assert.equal(duplicateReason([morning], window, null, defaultPolicy), "completedSameDay");
  const early = sessionFixture({ ...morning, completionStatus: "earlyEnd" });
  assert.equal(duplicateReason([early], window, null, defaultPolicy), null);
});
