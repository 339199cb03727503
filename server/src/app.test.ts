import test from "node:test";
import assert from "node:assert/strict";
import { once } from "events";
import { z } from "zod";
import { createApp } from "./app";
import { MemoryKeyValueStore } from "./keyValueStore";
import { setLogLevel } from "./logger";
import type { NotificationStore } from "./notifications";
import { withPolicy } from "./policy";
import { ManualTickScheduler } from "./ticker";
import type { NotificationIntent } from "./types";
import { MemoryRepository, TestClock, jan } from "./__fixtures__/fakes";

setLogLevel("silent");

class MemoryNotificationStore implements NotificationStore {
  private readonly byUser = new Map<string, NotificationIntent[]>();
  async getNotifications(userId: string) { return this.byUser.get(userId) ?? []; }
  async saveNotifications(userId: string, intents: NotificationIntent[]) { this.byUser.set(userId, intents); }
}

const idBody = z.object({ id: z.string() });
const errorBody = z.object({ error: z.string(), kind: z.string().optional() });

async function startServer(clock: TestClock) {
  const { app, registry } = createApp({
    config: { defaultUserId: "user-1", corsOrigin: "*", policy: withPolicy({ retryDelayMs: 1 }), logLevel: "silent" },
    repository: new MemoryRepository(),
    keyValueStore: new MemoryKeyValueStore(),
    notificationStore: new MemoryNotificationStore(),
    clock: clock.now,
    createTicker: () => new ManualTickScheduler()
  });
  const server = app.listen(0);
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server has no port");
  const base = `http://127.0.0.1:${address.port}`;

  const call = async (method: string, path: string, body?: unknown, headers: Record<string, string> = {}) => {
    const res = await fetch(`${base}${path}`, {
      method,
      headers: { "content-type": "application/json", ...headers },
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body)
    });
    const text = await res.text();
    const parsed: unknown = text ? JSON.parse(text) : null;
    return { status: res.status, body: parsed };
  };

  const close = async () => {
    await registry.disposeAll();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  };
  return { call, close };
}

test("plans and fasts round-trip through the HTTP API", async (t) => {
  const clock = new TestClock(jan(6, 9));
  const { call, close } = await startServer(clock);
  t.after(close);

  assert.deepEqual(await call("GET", "/api/health"), { status: 200, body: { ok: true } });

  const plan = await call("POST", "/api/plans", { durationHours: 16, daysOfWeek: ["Mon", "Wed", "Fri"], preferredStartTime: "20:00", reminderEnabled: false });
  assert.equal(plan.status, 201);
  assert.equal(idBody.parse(plan.body).id, "plan-1-new");

  const started = await call("POST", "/api/sessions", {});
  assert.equal(started.status, 201);
  const sessionId = idBody.parse(started.body).id;
  assert.equal(sessionId, "session-2-new");

  assert.deepEqual(await call("POST", "/api/sessions", {}), {
    status: 409,
    body: { error: "A fast is already active", kind: "precondition" }
  });

  const state = await call("GET", "/api/state");
  assert.equal(z.object({ activeSession: idBody }).parse(state.body).activeSession.id, sessionId);

  clock.set(jan(7, 1));
  const ended = await call("POST", "/api/sessions/active/end", {});
  assert.equal(ended.status, 200);
  assert.equal(z.object({ completionStatus: z.string() }).parse(ended.body).completionStatus, "completed");

  const regime = await call("POST", "/api/regime/start", {});
  assert.equal(z.object({ regimeActive: z.boolean() }).parse(regime.body).regimeActive, true);
  const regimeState = z.object({ regimeState: z.object({ kind: z.string(), nextFastStart: z.string() }) }).parse((await call("GET", "/api/state")).body);
  assert.deepEqual(regimeState.regimeState, { kind: "eating", nextFastStart: jan(7, 20).toISOString() });

  const pending = z.array(z.object({ kind: z.string() })).parse((await call("GET", "/api/notifications")).body);
  assert.equal(pending.length, 12);
  assert.equal(pending[0].kind, "fastStart");
});

test("errors map to status codes and users are kept apart", async (t) => {
  const { call, close } = await startServer(new TestClock(jan(6, 9)));
  t.after(close);

  const invalid = await call("POST", "/api/plans", { durationHours: "sixteen", daysOfWeek: ["Mon"], preferredStartTime: "20:00" });
  assert.equal(invalid.status, 400);
  assert.equal(errorBody.parse(invalid.body).kind, "validation");

  const rejected = await call("POST", "/api/plans", { durationHours: 8, daysOfWeek: ["Mon"], preferredStartTime: "20:00" });
  assert.deepEqual(rejected, { status: 400, body: { error: "Fast duration must be between 12 and 168 hours", kind: "validation" } });

  assert.deepEqual(await call("POST", "/api/plans", "{"), { status: 400, body: { error: "Malformed JSON body" } });
  assert.deepEqual(await call("DELETE", "/api/sessions/missing"), { status: 404, body: { error: "Fast missing not found", kind: "notFound" } });
  assert.deepEqual(await call("POST", "/api/sessions", {}), { status: 409, body: { error: "No active fasting plan", kind: "precondition" } });

  await call("POST", "/api/plans", { durationHours: 16, daysOfWeek: ["Mon"], preferredStartTime: "20:00" });
  assert.equal(z.array(idBody).parse((await call("GET", "/api/plans")).body).length, 1);
  assert.deepEqual(await call("GET", "/api/plans", undefined, { "x-user-id": "user-2" }), { status: 200, body: [] });
});
