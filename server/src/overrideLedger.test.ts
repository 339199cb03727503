import test from "node:test";
import assert from "node:assert/strict";
import { MemoryKeyValueStore } from "./keyValueStore";
import { OverrideLedger } from "./overrideLedger";
import { FlakyStore, jan } from "./__fixtures__/fakes";

test("setters update the cache at once and persist under plan-scoped keys", async () => {
  const store = new MemoryKeyValueStore();
  const ledger = new OverrideLedger(store, "plan-1");
  ledger.setCustomStart(jan(5, 18), 20);
  ledger.markWindowEnded(jan(6, 12));
  assert.deepEqual(ledger.customStart, jan(5, 18));
  assert.equal(ledger.customTargetHours, 20);
  await ledger.flush();
  assert.deepEqual(store.snapshot(), {
    "ledger:plan-1:customStartTimeOverride": jan(5, 18).toISOString(),
    "ledger:plan-1:customTargetHoursOverride": "20",
    "ledger:plan-1:lastEndedWindowEnd": jan(6, 12).toISOString()
  });
});

test("refresh reloads what another ledger instance wrote", async () => {
  const store = new MemoryKeyValueStore();
  const writer = new OverrideLedger(store, "plan-1");
  writer.setSnooze(jan(5, 22));
  writer.markWindowRecorded(jan(6, 12));
  await writer.flush();

  const reader = new OverrideLedger(store, "plan-1");
  assert.equal(reader.snoozedUntil, null);
  await reader.refresh();
  assert.deepEqual(reader.snoozedUntil, jan(5, 22));
  assert.deepEqual(reader.lastRecordedFastWindowEnd, jan(6, 12));

  const otherPlan = new OverrideLedger(store, "plan-2");
  await otherPlan.refresh();
  assert.equal(otherPlan.snoozedUntil, null);
});

test("clearing removes keys and clearAll empties every field", async () => {
  const store = new MemoryKeyValueStore();
  const ledger = new OverrideLedger(store, "plan-1");
  ledger.setCustomStart(jan(5, 18), null);
  ledger.setSnooze(jan(5, 22));
  ledger.clearAll();
  await ledger.flush();
  assert.deepEqual(store.snapshot(), {});
  assert.deepEqual(ledger.snapshot, {
    customStartTimeOverride: null,
    customTargetHoursOverride: null,
    lastEndedWindowEnd: null,
    lastRecordedFastWindowEnd: null,
    snoozedUntil: null
  });
});

test("snoozeStatus distinguishes pending, just expired and stale snoozes", () => {
  const ledger = new OverrideLedger(new MemoryKeyValueStore(), "plan-1");
  assert.equal(ledger.snoozeStatus(jan(5, 21), 300), "none");
  ledger.setSnooze(jan(5, 22));
  assert.equal(ledger.snoozeStatus(jan(5, 21, 59, 59), 300), "pending");
  assert.equal(ledger.snoozeStatus(jan(5, 22), 300), "justExpired");
  assert.equal(ledger.snoozeStatus(jan(5, 22, 4, 59), 300), "justExpired");
  assert.equal(ledger.snoozeStatus(jan(5, 22, 5), 300), "stale");
});

test("flush rejects with the first write failure and then recovers", async () => {
  const store = new FlakyStore();
  store.failingWrites = 1;
  const ledger = new OverrideLedger(store, "plan-1");
  ledger.markWindowEnded(jan(6, 12));
  ledger.markWindowRecorded(jan(6, 12));
  await assert.rejects(ledger.flush(), /disk full/);
  await ledger.flush();
  assert.deepEqual(store.snapshot(), { "ledger:plan-1:lastRecordedFastWindowEnd": jan(6, 12).toISOString() });
});

test("unparseable stored values read back as unset", async () => {
  const store = new MemoryKeyValueStore();
  await store.set("ledger:plan-1:snoozedUntil", "not a date");
  await store.set("ledger:plan-1:customTargetHoursOverride", "-4");
  const ledger = new OverrideLedger(store, "plan-1");
  await ledger.refresh();
  assert.equal(ledger.snoozedUntil, null);
  assert.equal(ledger.customTargetHours, null);
});
