import { add, type Duration } from "date-fns";
import type { FastingRepository } from "../dataStore";
import { FastingService } from "../fastingService";
import { HistoryChannel } from "../historyChannel";
import { MemoryKeyValueStore } from "../keyValueStore";
import type { NotificationScheduler } from "../notifications";
import { type FastingPolicy, withPolicy } from "../policy";
import { ManualTickScheduler } from "../ticker";
import type { NewPlan, NewSession, NotificationKind, Plan, Session } from "../types";

/** Local-time instant in January 2026. Jan 5 2026 is a Monday. */
export const jan = (day: number, hours = 0, minutes = 0, seconds = 0) => new Date(2026, 0, day, hours, minutes, seconds);

export class TestClock {
  constructor(public current: Date) {}
  now = () => this.current;
  set(date: Date) { this.current = date; }
  advance(duration: Duration) { this.current = add(this.current, duration); }
}

export const planFixture = (overrides: Partial<Plan> = {}): Plan => ({
  id: "plan-1",
  userId: "user-1",
  name: "16:8 Fasting Plan",
  durationHours: 16,
  daysOfWeek: ["Mon", "Wed", "Fri"],
  preferredStartTime: "20:00",
  allowedDrinks: "practical",
  reminderEnabled: false,
  reminderMinutesBeforeEnd: 30,
  active: true,
  regimeActive: false,
  regimeStartedAt: null,
  createdAt: jan(1, 9),
  ...overrides
});

export const sessionFixture = (overrides: Partial<Session> = {}): Session => ({
  id: "session-1",
  userId: "user-1",
  planId: "plan-1",
  startTime: jan(5, 20),
  endTime: null,
  targetDurationHours: 16,
  completionStatus: "active",
  manuallyEdited: false,
  skipped: false,
  mergedFromEarlyEnd: false,
  originalScheduledStart: null,
  snoozedUntil: null,
  snoozeCount: 0,
  notes: null,
  createdAt: jan(5, 20),
  ...overrides
});

type Operation = keyof FastingRepository;

/** In-memory repository with scripted failures per operation. */
export class MemoryRepository implements FastingRepository {
  readonly plans = new Map<string, Plan>();
  readonly sessions = new Map<string, Session>();
  readonly calls: Operation[] = [];
  private readonly failures = new Map<Operation, { after: number; times: number }>();
  private nextId = 1;

  constructor(seed: { plans?: Plan[]; sessions?: Session[] } = {}) {
    seed.plans?.forEach((plan) => this.plans.set(plan.id, plan));
    seed.sessions?.forEach((session) => this.sessions.set(session.id, session));
  }

  /** Fails the next `times` calls of `operation`, once `after` calls have gone through. */
  failOn(operation: Operation, times = 1, after = 0) { this.failures.set(operation, { after, times }); }

  storedSessions() { return [...this.sessions.values()].sort((a, b) => b.startTime.getTime() - a.startTime.getTime()); }

  async getPlans(userId: string) {
    this.track("getPlans");
    return [...this.plans.values()].filter((plan) => plan.userId === userId);
  }

  async savePlan(plan: NewPlan) {
    this.track("savePlan");
    const id = `plan-${this.nextId++}-new`;
    this.plans.set(id, { ...plan, id });
    return id;
  }

  async updatePlan(plan: Plan) {
    this.track("updatePlan");
    this.plans.set(plan.id, plan);
  }

  async deletePlan(id: string) {
    this.track("deletePlan");
    this.plans.delete(id);
  }

  async getSessions(userId: string, limit?: number) {
    this.track("getSessions");
    const sessions = this.storedSessions().filter((session) => session.userId === userId);
    return limit === undefined ? sessions : sessions.slice(0, limit);
  }

  async saveSession(session: NewSession) {
    this.track("saveSession");
    const id = `session-${this.nextId++}-new`;
    this.sessions.set(id, { ...session, id });
    return id;
  }

  async updateSession(session: Session) {
    this.track("updateSession");
    this.sessions.set(session.id, session);
  }

  async deleteSession(id: string) {
    this.track("deleteSession");
    this.sessions.delete(id);
  }

  private track(operation: Operation) {
    this.calls.push(operation);
    const plan = this.failures.get(operation);
    if (!plan) return;
    if (plan.after > 0) {
      plan.after -= 1;
      return;
    }
    if (plan.times > 0) {
      plan.times -= 1;
      throw new Error(`${operation} unavailable`);
    }
  }
}

/** Key-value store whose next `failingWrites` sets and `failingReads` gets throw. */
export class FlakyStore extends MemoryKeyValueStore {
  failingWrites = 0;
  failingReads = 0;

  async get(key: string) {
    if (this.failingReads > 0) {
      this.failingReads -= 1;
      throw new Error("disk unreadable");
    }
    return super.get(key);
  }

  async set(key: string, value: string) {
    if (this.failingWrites > 0) {
      this.failingWrites -= 1;
      throw new Error("disk full");
    }
    await super.set(key, value);
  }
}

export type NotificationCall =
  | { method: "boundary"; planId: string }
  | { method: "immediate"; planId: string; at: Date; sessionId: string | null }
  | { method: "reminder"; planId: string; at: Date; kind: NotificationKind }
  | { method: "cancelPlan"; planId: string }
  | { method: "cancelSession"; sessionId: string };

export class RecordingNotificationScheduler implements NotificationScheduler {
  readonly calls: NotificationCall[] = [];
  failing = false;

  async scheduleWindowBoundaryNotifications(plan: Plan) { this.record({ method: "boundary", planId: plan.id }); }
  async scheduleImmediateNotifications(plan: Plan, startingAt: Date, sessionId: string | null = null) {
    this.record({ method: "immediate", planId: plan.id, at: startingAt, sessionId });
  }
  async scheduleReminder(plan: Plan, at: Date, kind: NotificationKind) { this.record({ method: "reminder", planId: plan.id, at, kind }); }
  async cancelPlanNotifications(planId: string) { this.record({ method: "cancelPlan", planId }); }
  async cancelSessionNotifications(session: Session) { this.record({ method: "cancelSession", sessionId: session.id }); }

  private record(call: NotificationCall) {
    if (this.failing) throw new Error("notifications unavailable");
    this.calls.push(call);
  }
}

export type Harness = {
  service: FastingService;
  repository: MemoryRepository;
  keyValueStore: MemoryKeyValueStore;
  notifications: RecordingNotificationScheduler;
  history: HistoryChannel;
  clock: TestClock;
  ticker: ManualTickScheduler;
  policy: FastingPolicy;
};

export async function loadedService(options: {
  now: Date;
  plans?: Plan[];
  sessions?: Session[];
  policy?: Partial<FastingPolicy>;
  keyValueStore?: MemoryKeyValueStore;
  history?: HistoryChannel;
  repository?: MemoryRepository;
}): Promise<Harness> {
  const clock = new TestClock(options.now);
  const repository = options.repository ?? new MemoryRepository({ plans: options.plans, sessions: options.sessions });
  const keyValueStore = options.keyValueStore ?? new MemoryKeyValueStore();
  const notifications = new RecordingNotificationScheduler();
  const history = options.history ?? new HistoryChannel();
  const ticker = new ManualTickScheduler();
  const policy = withPolicy({ retryDelayMs: 1, ...options.policy });
  const service = new FastingService({ userId: "user-1", repository, keyValueStore, notifications, history, policy, clock: clock.now, ticker });
  await service.load();
  return { service, repository, keyValueStore, notifications, history, clock, ticker, policy };
}
