import { randomUUID } from "crypto";
import { addMinutes, differenceInMilliseconds, differenceInMinutes } from "date-fns";
import { formatClock } from "./calendar";
import type { FastingRepository } from "./dataStore";
import {
  type FastingError,
  type Result,
  isFastingError,
  notFoundError,
  persistenceError,
  preconditionError,
  unwrap,
  validationError
} from "./errors";
import type { HistoryChannel, HistoryEvent } from "./historyChannel";
import type { KeyValueStore } from "./keyValueStore";
import { logger } from "./logger";
import type { NotificationScheduler } from "./notifications";
import { OverrideLedger } from "./overrideLedger";
import { type FastingPolicy, defaultPolicy } from "./policy";
import { clearExpiredOverrides, currentRegimeState } from "./regimeStateMachine";
import { buildWeekSummaries, calculateAnalytics } from "./reporting";
import { withRetry } from "./retry";
import { validateSchedule } from "./scheduleProjector";
import * as rules from "./sessionRules";
import { findStaleSession, isLikelyStale, resolveStale } from "./staleSessionDetector";
import { ManualTickScheduler, type TickScheduler } from "./ticker";
import { RegimeTransitionDetector, duplicateReason } from "./transitionDetector";
import type { FastingWindow, NewSession, Plan, PlanInput, RegimeState, Session, StaleResolution } from "./types";

export const AUTO_RECORD_NOTE = "Auto-recorded from regime";
export const REGIME_STOPPED_NOTE = "Regime stopped early";

const HOUR_MS = 3_600_000;
const INACTIVE: RegimeState = { kind: "inactive" };

export type FastingServiceOptions = {
  userId: string;
  repository: FastingRepository;
  keyValueStore: KeyValueStore;
  notifications: NotificationScheduler;
  history: HistoryChannel;
  policy?: FastingPolicy;
  clock?: () => Date;
  ticker?: TickScheduler;
};

const newestFirst = (a: Session, b: Session) => b.startTime.getTime() - a.startTime.getTime();

/**
 * Sequential owner of one user's fasting state: plans, session history, the override ledger
 * of the active plan and the regime tick. All mutations go through here and are reflected
 * in memory only after the store accepted them.
 */
export class FastingService {
  readonly origin = `svc_${randomUUID()}`;
  readonly userId: string;
  readonly policy: FastingPolicy;

  plans: Plan[] = [];
  /** Most recent first, capped at `historyLimit`. */
  sessions: Session[] = [];
  staleSession: Session | null = null;
  regimeState: RegimeState = INACTIVE;
  scheduleError: FastingError | null = null;
  lastError: FastingError | null = null;

  private readonly repository: FastingRepository;
  private readonly keyValueStore: KeyValueStore;
  private readonly notifications: NotificationScheduler;
  private readonly history: HistoryChannel;
  private readonly clock: () => Date;
  private readonly ticker: TickScheduler;
  private readonly detector = new RegimeTransitionDetector();
  private readonly observers = new Set<string>();
  private readonly unsubscribe: () => void;
  private ledger: OverrideLedger | null = null;
  private recording: Promise<void> = Promise.resolve();
  private reloading: Promise<void> = Promise.resolve();

  constructor(options: FastingServiceOptions) {
    this.userId = options.userId;
    this.repository = options.repository;
    this.keyValueStore = options.keyValueStore;
    this.notifications = options.notifications;
    this.history = options.history;
    this.policy = options.policy ?? defaultPolicy;
    this.clock = options.clock ?? (() => new Date());
    this.ticker = options.ticker ?? new ManualTickScheduler();
    this.unsubscribe = this.history.subscribe((event) => this.onHistoryEvent(event));
  }

  get activePlan() { return this.plans.find((plan) => plan.active) ?? null; }

  get activeSession() {
    return this.sessions.find((session) => session.completionStatus === "active" && session.id !== this.staleSession?.id) ?? null;
  }

  get recentSessions() { return this.sessions.slice(0, this.policy.recentLimit); }

  get weekSummaries() { return buildWeekSummaries(this.sessions, this.clock()); }

  get analytics() { return calculateAnalytics(this.sessions, this.clock(), this.policy); }

  get ledgerSnapshot() { return this.ledger?.snapshot ?? null; }

  // ---- loading and ticking ----

  async load() {
    if (!this.userId) throw preconditionError("Sign in required");
    const [plans, sessions] = await this.write("Load fasting data", () =>
      Promise.all([this.repository.getPlans(this.userId), this.repository.getSessions(this.userId, this.policy.historyLimit)])
    );
    this.plans = plans;
    this.sessions = [...sessions].sort(newestFirst);
    await this.syncLedger();
    const now = this.clock();
    if (this.ledger) {
      clearExpiredOverrides(this.activePlan, this.ledger, now);
      await this.syncOverrides();
    }
    this.detectStaleSession(now);
    this.tick(now);
  }

  /** In-memory evaluation only: plan, ledger cache and detector. May queue an auto-record. */
  tick(now = this.clock()): RegimeState {
    const plan = this.activePlan;
    if (!plan || !plan.regimeActive) {
      this.detector.reset();
      this.regimeState = INACTIVE;
      return this.regimeState;
    }
    const state = this.evaluate(plan, now);
    if (!state.ok) {
      if (this.scheduleError?.message !== state.error.message) logger.warn(`Regime schedule for plan ${plan.id} is invalid: ${state.error.message}`);
      this.scheduleError = state.error;
      this.detector.reset();
      this.regimeState = INACTIVE;
      return this.regimeState;
    }
    this.scheduleError = null;
    this.regimeState = state.value;
    const closed = this.detector.observe(state.value);
    if (closed) this.recording = this.recording.then(() => this.recordCompletedWindow(plan, closed));
    this.recording = this.recording.then(() => this.syncOverrides());
    return this.regimeState;
  }

  /** Resolves once queued auto-records, ledger writes and history reloads have finished. */
  async settled() {
    await this.recording;
    await this.reloading;
    await this.ledger?.flush();
  }

  async observe(observerId: string) {
    const first = this.observers.size === 0;
    this.observers.add(observerId);
    if (!first) return;
    const ledger = this.ledger;
    try {
      if (ledger) await this.write("Load regime overrides", () => ledger.refresh());
    } catch (error) {
      this.observers.delete(observerId);
      throw error;
    }
    this.ticker.start(() => this.tick(), this.policy.tickIntervalMs);
  }

  unobserve(observerId: string) {
    this.observers.delete(observerId);
    if (this.observers.size === 0) this.ticker.stop();
  }

  get observerCount() { return this.observers.size; }

  dispose() {
    this.ticker.stop();
    this.observers.clear();
    this.unsubscribe();
  }

  // ---- manual sessions ----

  async startSession(options: { targetHours?: number; startTime?: Date } = {}) {
    const plan = this.requireActivePlan();
    this.requireNoActiveSession();
    const now = this.clock();
    const startTime = options.startTime ?? now;
    if (startTime > now) throw validationError("Start time cannot be in the future");
    const targetHours = this.checkTargetHours(options.targetHours ?? plan.durationHours);

    const session = await this.insertSession(
      rules.createSession({ userId: this.userId, planId: plan.id, targetHours, startTime, now }),
      "Start fast"
    );
    if (plan.regimeActive) {
      const ledger = this.ledgerFor(plan);
      ledger.setCustomStart(startTime, targetHours);
      ledger.clearEndedWindow();
      await this.syncOverrides();
    }
    if (plan.reminderEnabled) {
      await this.notify("schedule fast notifications", () => this.notifications.scheduleImmediateNotifications(plan, startTime, session.id));
    }
    return this.committed(session, now);
  }

  async endActiveSession(options: { endTime?: Date } = {}) {
    const session = this.activeSession;
    if (!session) throw preconditionError("No active fast to end");
    const now = this.clock();
    const endTime = options.endTime ?? now;
    if (endTime > now) throw validationError("End time cannot be in the future");
    if (endTime <= session.startTime) throw validationError("End time must be after start time");

    const updated = await this.replaceSession(rules.endSession(session, endTime, options.endTime !== undefined), "End fast");
    await this.closeRegimeWindow(now);
    await this.notify("cancel fast notifications", () => this.notifications.cancelSessionNotifications(updated));
    return this.committed(updated, now);
  }

  async skipActiveSession() {
    const session = this.activeSession;
    if (!session) throw preconditionError("No active fast to skip");
    const now = this.clock();
    const updated = await this.replaceSession(rules.skipSession(session, now), "Skip fast");
    await this.closeRegimeWindow(now);
    await this.notify("cancel fast notifications", () => this.notifications.cancelSessionNotifications(updated));
    return this.committed(updated, now);
  }

  async snoozeSession(id: string, minutes: number) {
    if (!Number.isInteger(minutes) || minutes < 1 || minutes > 24 * 60) throw validationError("Snooze must be between 1 and 1440 minutes");
    const session = this.requireSession(id);
    const now = this.clock();
    const until = addMinutes(now, minutes);
    const updated = await this.replaceSession(rules.snoozeSession(session, until, `Snoozed until ${formatClock(until)}`), "Snooze fast");
    const plan = this.plans.find((candidate) => candidate.id === session.planId) ?? this.activePlan;
    if (plan) await this.notify("schedule snooze reminder", () => this.notifications.scheduleReminder(plan, until, "snoozeOver", updated.id));
    return this.committed(updated, now);
  }

  async adjustSessionStartTime(id: string, newStart: Date) {
    const session = this.requireSession(id);
    const now = this.clock();
    const updated = await this.replaceSession(unwrap(rules.adjustSessionStartTime(session, newStart, now)), "Adjust start time");
    await this.followActiveSession(updated);
    return this.committed(updated, now);
  }

  async editSessionTimes(id: string, start: Date, end: Date | null) {
    const session = this.requireSession(id);
    const now = this.clock();
    const anotherActive = this.sessions.some((other) => other.id !== id && other.completionStatus === "active");
    const updated = await this.replaceSession(unwrap(rules.editSessionTimes(session, start, end, anotherActive)), "Edit fast");
    if (session.completionStatus === "active" && updated.completionStatus !== "active") {
      await this.closeRegimeWindow(now);
      await this.notify("cancel fast notifications", () => this.notifications.cancelSessionNotifications(updated));
    }
    await this.followActiveSession(updated);
    return this.committed(updated, now);
  }

  /** Edits the running fast, or only the regime's current window when nothing is clocked in. */
  async editActiveFast(startTime: Date, targetHours: number) {
    const now = this.clock();
    if (startTime > now) throw validationError("Start time cannot be in the future");
    const hours = this.checkTargetHours(targetHours);
    const session = this.activeSession;
    if (session) {
      const adjusted = unwrap(rules.adjustSessionStartTime(session, startTime, now));
      const updated = await this.replaceSession({ ...adjusted, targetDurationHours: hours }, "Edit active fast");
      await this.followActiveSession(updated);
      return this.committed(updated, now);
    }
    const plan = this.requireActivePlan();
    if (!plan.regimeActive) throw preconditionError("No active fast to edit");
    const ledger = this.ledgerFor(plan);
    await this.recording;
    ledger.setCustomStart(startTime, hours);
    ledger.clearEndedWindow();
    await this.write("Save regime overrides", () => ledger.flush());
    this.tick(now);
    this.publishHistory();
    return null;
  }

  async continuePreviousFast(id: string) {
    const session = this.requireSession(id);
    const now = this.clock();
    const anotherActive = this.sessions.some((other) => other.id !== id && other.completionStatus === "active");
    const updated = await this.replaceSession(unwrap(rules.continuePreviousFast(session, now, anotherActive, this.policy)), "Continue fast");
    await this.followActiveSession(updated);
    return this.committed(updated, now);
  }

  async clearSession(id: string) {
    const session = this.requireSession(id);
    const now = this.clock();
    const updated = await this.replaceSession(rules.clearSession(session), "Clear fast");
    if (session.completionStatus === "active") {
      await this.notify("cancel fast notifications", () => this.notifications.cancelSessionNotifications(updated));
    }
    return this.committed(updated, now);
  }

  async deleteSession(id: string) {
    const session = this.requireSession(id);
    await this.write("Delete fast", () => this.repository.deleteSession(id));
    this.sessions = this.sessions.filter((candidate) => candidate.id !== id);
    if (this.staleSession?.id === id) this.staleSession = null;
    await this.notify("cancel fast notifications", () => this.notifications.cancelSessionNotifications(session));
    this.tick();
    this.publishHistory();
  }

  /** Clock-in from a start notification, optionally at a time other than the scheduled one. */
  async startFromConfirmation(options: { scheduledTime: Date; durationHours: number; customStartTime?: Date }) {
    const plan = this.requireActivePlan();
    this.requireNoActiveSession();
    const now = this.clock();
    const startTime = options.customStartTime ?? options.scheduledTime;
    if (startTime > now) throw validationError("Start time cannot be in the future");
    const targetHours = this.checkTargetHours(options.durationHours);

    const session = await this.insertSession(
      rules.createSession({
        userId: this.userId,
        planId: plan.id,
        targetHours,
        startTime,
        now,
        originalScheduledStart: options.scheduledTime,
        manuallyEdited: options.customStartTime !== undefined
      }),
      "Confirm fast start"
    );
    if (plan.regimeActive) {
      const ledger = this.ledgerFor(plan);
      ledger.setCustomStart(startTime, targetHours);
      ledger.clearEndedWindow();
      await this.syncOverrides();
    }
    if (plan.reminderEnabled) {
      await this.notify("schedule fast notifications", () => this.notifications.scheduleImmediateNotifications(plan, startTime, session.id));
    }
    return this.committed(session, now);
  }

  quickRestartCandidate() { return rules.quickRestartCandidate(this.sessions, this.clock(), this.policy); }

  /** True while the running fast is short enough that ending it should be confirmed first. */
  shouldConfirmEarlyEnd() {
    const session = this.activeSession;
    return session !== null && rules.isEarlyEnd(session, this.clock(), this.policy);
  }

  // ---- stale sessions ----

  async resolveStaleSession(id: string, resolution: StaleResolution) {
    const session = this.sessions.find((candidate) => candidate.id === id);
    if (resolution === "discarded") {
      if (!session) return null;
      await this.deleteSession(id);
      return null;
    }
    if (!session) throw notFoundError(`Fast ${id} not found`);
    if (session.completionStatus !== "active") return session;
    const now = this.clock();
    if (!isLikelyStale(session, now, this.policy)) throw preconditionError("This fast is not stale");
    const updated = await this.replaceSession(resolveStale(session, resolution), "Resolve stale fast");
    if (this.staleSession?.id === id) this.staleSession = null;
    this.detectStaleSession(now);
    return this.committed(updated, now);
  }

  // ---- regime ----

  async startRegime(options: { startFromNow?: boolean } = {}) {
    const plan = this.requireActivePlan();
    unwrap(validateSchedule(plan));
    const now = this.clock();
    const updated = await this.savePlanChange({ ...plan, regimeActive: true, regimeStartedAt: now }, "Start regime");
    const ledger = this.ledgerFor(updated);
    ledger.clearAll();
    if (options.startFromNow) ledger.setCustomStart(now, null);
    this.detector.reset();
    await this.syncOverrides();
    await this.notify("schedule regime notifications", () => this.notifications.scheduleWindowBoundaryNotifications(updated));
    this.tick(now);
    this.publishHistory();
    return updated;
  }

  async stopRegime() {
    const plan = this.requireActivePlan();
    if (!plan.regimeActive) throw preconditionError("Regime is not running");
    const now = this.clock();
    const window = this.currentFastingWindow(plan, now);
    const active = this.activeSession;

    const updated = await this.savePlanChange({ ...plan, regimeActive: false, regimeStartedAt: null }, "Stop regime");
    if (active) {
      await this.replaceSession(rules.endSession(active, now), "End fast");
      await this.notify("cancel fast notifications", () => this.notifications.cancelSessionNotifications(active));
    }
    if (window && !(active && this.beganInside(active, window)) && now > window.windowStart) {
      await this.insertSession(this.windowSession(window, now, "earlyEnd", REGIME_STOPPED_NOTE), "Record stopped fast");
    }
    this.ledgerFor(updated).clearAll();
    this.detector.reset();
    await this.syncOverrides();
    await this.notify("cancel regime notifications", () => this.notifications.cancelPlanNotifications(plan.id));
    this.tick(now);
    this.publishHistory();
    return updated;
  }

  async skipCurrentRegimeFast() {
    const { plan, window, now } = this.requireRegimeWindow();
    const withinThreshold = differenceInMilliseconds(now, window.windowStart) <= this.policy.skipThresholdMinutes * 60_000;
    const status = withinThreshold ? "skipped" : "earlyEnd";
    const session = await this.terminateWindow(window, now, status, null, null);
    await this.markWindowClosed(plan, window);
    await this.notify("reschedule regime notifications", async () => {
      await this.notifications.cancelPlanNotifications(plan.id);
      await this.notifications.scheduleWindowBoundaryNotifications(plan);
    });
    return this.committed(session, now);
  }

  async snoozeCurrentRegimeFast(until: Date) {
    const { plan, window, now } = this.requireRegimeWindow();
    if (until <= now) throw validationError("Snooze time must be in the future");
    const session = await this.terminateWindow(window, now, "earlyEnd", `Snoozed until ${formatClock(until)}`, until);
    this.ledgerFor(plan).setSnooze(until);
    await this.markWindowClosed(plan, window);
    await this.notify("schedule snooze reminder", () => this.notifications.scheduleReminder(plan, until, "snoozeOver"));
    return this.committed(session, now);
  }

  // ---- plans ----

  async createPlan(input: PlanInput) {
    if (!this.userId) throw preconditionError("Sign in required");
    const valid = unwrap(rules.validatePlanInput(input, this.policy));
    const now = this.clock();
    const previous = this.activePlan;
    if (previous) await this.savePlanChange({ ...previous, active: false, regimeActive: false }, "Deactivate plan");

    const plan = { ...valid, userId: this.userId, active: true, regimeActive: false, regimeStartedAt: null, createdAt: now };
    let id: string;
    try {
      id = await this.write("Save plan", () => this.repository.savePlan(plan), true);
    } catch (error) {
      if (previous) await this.restorePlan(previous);
      throw error;
    }
    const created: Plan = { ...plan, id };
    this.plans = [...this.plans, created];
    if (previous?.regimeActive) await this.notify("cancel regime notifications", () => this.notifications.cancelPlanNotifications(previous.id));
    await this.syncLedger();
    this.detector.reset();
    this.tick(now);
    this.publishHistory();
    return created;
  }

  async setActivePlan(id: string) {
    const target = this.requirePlan(id);
    if (target.active) return target;
    const previous = this.activePlan;
    if (previous) await this.savePlanChange({ ...previous, active: false, regimeActive: false }, "Deactivate plan");
    let activated: Plan;
    try {
      activated = await this.savePlanChange({ ...target, active: true }, "Activate plan");
    } catch (error) {
      if (previous) await this.restorePlan(previous);
      throw error;
    }
    if (previous?.regimeActive) await this.notify("cancel regime notifications", () => this.notifications.cancelPlanNotifications(previous.id));
    await this.syncLedger();
    this.detector.reset();
    this.tick();
    this.publishHistory();
    return activated;
  }

  async updatePlan(id: string, patch: Partial<PlanInput>) {
    const plan = this.requirePlan(id);
    const valid = unwrap(
      rules.validatePlanInput(
        {
          name: plan.name,
          durationHours: plan.durationHours,
          daysOfWeek: plan.daysOfWeek,
          preferredStartTime: plan.preferredStartTime,
          allowedDrinks: plan.allowedDrinks,
          reminderEnabled: plan.reminderEnabled,
          reminderMinutesBeforeEnd: plan.reminderMinutesBeforeEnd,
          ...patch
        },
        this.policy
      )
    );
    const updated = await this.savePlanChange({ ...plan, ...valid }, "Update plan");
    if (updated.regimeActive) {
      await this.notify("reschedule regime notifications", async () => {
        await this.notifications.cancelPlanNotifications(updated.id);
        await this.notifications.scheduleWindowBoundaryNotifications(updated);
      });
    }
    if (updated.active) await this.syncLedger();
    this.tick();
    this.publishHistory();
    return updated;
  }

  async deletePlan(id: string) {
    const plan = this.requirePlan(id);
    await this.write("Delete plan", () => this.repository.deletePlan(id));
    this.plans = this.plans.filter((candidate) => candidate.id !== id);
    await this.notify("cancel plan notifications", () => this.notifications.cancelPlanNotifications(id));
    const ledger = this.ledger?.planId === id ? this.ledger : new OverrideLedger(this.keyValueStore, id);
    ledger.clearAll();
    await this.syncOverrides(ledger);
    if (plan.active) {
      this.ledger = null;
      this.detector.reset();
    }
    this.tick();
    this.publishHistory();
  }

  // ---- display helpers ----

  hoursIntoCurrentFast(now = this.clock()) {
    if (this.regimeState.kind === "fasting") return Math.max(0, differenceInMilliseconds(now, this.regimeState.windowStart)) / HOUR_MS;
    const session = this.activeSession;
    return session ? rules.actualDurationHours(session, now) : 0;
  }

  currentRegimePhase(now = this.clock()) {
    return this.regimeState.kind === "fasting" ? rules.phaseFor(this.hoursIntoCurrentFast(now)) : null;
  }

  timeUntilNextFast(now = this.clock()) {
    return this.regimeState.kind === "eating" ? Math.max(0, differenceInMilliseconds(this.regimeState.nextFastStart, now)) : null;
  }

  timeUntilFastEnds(now = this.clock()) {
    return this.regimeState.kind === "fasting" ? Math.max(0, differenceInMilliseconds(this.regimeState.windowEnd, now)) : null;
  }

  snapshot(now = this.clock()) {
    const activeSession = this.activeSession;
    return {
      activePlan: this.activePlan,
      plans: this.plans,
      activeSession,
      activeSessionProgress: activeSession ? rules.progress(activeSession, now) : null,
      activeSessionRemainingMs: activeSession ? rules.timeRemainingMs(activeSession, now) : null,
      staleSession: this.staleSession,
      regimeState: this.regimeState,
      scheduleError: this.scheduleError?.message ?? null,
      hoursIntoCurrentFast: this.hoursIntoCurrentFast(now),
      currentPhase: this.currentRegimePhase(now),
      timeUntilNextFastMs: this.timeUntilNextFast(now),
      timeUntilFastEndsMs: this.timeUntilFastEnds(now),
      shouldConfirmEarlyEnd: this.shouldConfirmEarlyEnd(),
      quickRestartCandidate: this.quickRestartCandidate(),
      recentSessions: this.recentSessions
    };
  }

  // ---- internals ----

  private evaluate(plan: Plan, now: Date): Result<RegimeState> {
    return currentRegimeState(plan, this.ledgerFor(plan), now, this.policy);
  }

  private currentFastingWindow(plan: Plan, now: Date): FastingWindow | null {
    if (!plan.regimeActive) return null;
    const state = unwrap(this.evaluate(plan, now));
    return state.kind === "fasting" ? { windowStart: state.windowStart, windowEnd: state.windowEnd } : null;
  }

  private requireRegimeWindow() {
    const plan = this.requireActivePlan();
    if (!plan.regimeActive) throw preconditionError("Regime is not running");
    const now = this.clock();
    const window = this.currentFastingWindow(plan, now);
    if (!window) throw preconditionError("No fasting window in progress");
    return { plan, window, now };
  }

  private beganInside(session: Session, window: FastingWindow) {
    return session.startTime >= window.windowStart && session.startTime < window.windowEnd;
  }

  private windowSession(window: FastingWindow, endTime: Date, status: "completed" | "earlyEnd" | "skipped", notes: string | null): NewSession {
    const plan = this.activePlan;
    return rules.windowRecord({
      userId: this.userId,
      planId: plan?.id ?? null,
      targetHours: Math.max(1, Math.round(differenceInMinutes(window.windowEnd, window.windowStart) / 60)),
      windowStart: window.windowStart,
      endTime,
      status,
      notes,
      now: this.clock()
    });
  }

  /** Ends the clocked-in fast when it belongs to this window, otherwise records the window itself. */
  private async terminateWindow(window: FastingWindow, now: Date, status: "earlyEnd" | "skipped", note: string | null, snoozedUntil: Date | null) {
    const active = this.activeSession;
    const snooze = (session: Session) =>
      snoozedUntil && note ? rules.snoozeSession(session, snoozedUntil, note) : session;
    if (active && this.beganInside(active, window)) {
      const updated = await this.replaceSession(rules.terminateSession(snooze(active), now, status), "End regime fast");
      await this.notify("cancel fast notifications", () => this.notifications.cancelSessionNotifications(updated));
      return updated;
    }
    const record = this.windowSession(window, now, status, note);
    return this.insertSession(snoozedUntil ? { ...record, snoozedUntil, snoozeCount: 1 } : record, "Record regime fast");
  }

  private async markWindowClosed(plan: Plan, window: FastingWindow) {
    const ledger = this.ledgerFor(plan);
    ledger.markWindowEnded(window.windowEnd);
    ledger.markWindowRecorded(window.windowEnd);
    ledger.clearCustomStart();
    await this.syncOverrides();
  }

  private async closeRegimeWindow(now: Date) {
    const plan = this.activePlan;
    if (!plan?.regimeActive) return;
    const window = this.currentFastingWindow(plan, now);
    if (window) await this.markWindowClosed(plan, window);
  }

  /** Keeps the regime's custom window in step with an edited clocked-in fast. */
  private async followActiveSession(session: Session) {
    const plan = this.activePlan;
    if (session.completionStatus !== "active" || !plan?.regimeActive) return;
    const ledger = this.ledgerFor(plan);
    ledger.setCustomStart(session.startTime, session.targetDurationHours);
    ledger.clearEndedWindow();
    await this.syncOverrides();
  }

  private async recordCompletedWindow(plan: Plan, window: FastingWindow) {
    const ledger = this.ledgerFor(plan);
    const reason = duplicateReason(this.sessions, window, ledger.lastRecordedFastWindowEnd, this.policy);
    if (reason) {
      if (reason !== "alreadyRecorded") ledger.markWindowRecorded(window.windowEnd);
      logger.debug(`Skipping auto-record for window ending ${window.windowEnd.toISOString()}: ${reason}`);
      return;
    }
    const previous = ledger.lastRecordedFastWindowEnd;
    ledger.markWindowRecorded(window.windowEnd);
    const record = rules.windowRecord({
      userId: this.userId,
      planId: plan.id,
      targetHours: plan.durationHours,
      windowStart: window.windowStart,
      endTime: window.windowEnd,
      status: "completed",
      notes: AUTO_RECORD_NOTE,
      now: this.clock()
    });
    try {
      const id = await withRetry(() => this.repository.saveSession(record), {
        attempts: 2,
        delayMs: this.policy.retryDelayMs,
        label: "Auto-record completed fast"
      });
      this.sessions = [{ ...record, id }, ...this.sessions].sort(newestFirst);
      logger.info(`Auto-recorded fast ${id} for plan ${plan.id}`);
      this.publishHistory();
    } catch (error) {
      ledger.restoreRecordedWindow(previous);
      const failure = persistenceError("Could not record the completed fast", error);
      this.lastError = failure;
      logger.error(failure.message, error);
      this.history.publish({ type: "autoRecordFailed", userId: this.userId, origin: this.origin, error: failure });
    }
  }

  private detectStaleSession(now: Date) {
    const stale = findStaleSession(this.sessions, now, this.policy);
    const changed = stale?.id !== this.staleSession?.id;
    this.staleSession = stale;
    if (stale && changed) {
      logger.warn(`Fast ${stale.id} has been active since ${stale.startTime.toISOString()} and needs resolving`);
      this.history.publish({ type: "staleSessionDetected", userId: this.userId, origin: this.origin, session: stale });
    }
  }

  private onHistoryEvent(event: HistoryEvent) {
    if (event.type !== "historyUpdated" || event.userId !== this.userId || event.origin === this.origin) return;
    this.reloading = this.reloading.then(() =>
      this.load().catch((error: unknown) => {
        logger.error(`Reload after history update failed for ${this.userId}`, error);
      })
    );
  }

  private publishHistory() {
    this.history.publish({ type: "historyUpdated", userId: this.userId, origin: this.origin });
  }

  private committed(session: Session, now: Date) {
    this.tick(now);
    this.publishHistory();
    return session;
  }

  private requireActivePlan() {
    if (!this.userId) throw preconditionError("Sign in required");
    const plan = this.activePlan;
    if (!plan) throw preconditionError("No active fasting plan");
    return plan;
  }

  private requireNoActiveSession() {
    const running = this.sessions.find((session) => session.completionStatus === "active");
    if (!running) return;
    throw preconditionError(running.id === this.staleSession?.id ? "Resolve the unfinished fast first" : "A fast is already active");
  }

  private requirePlan(id: string) {
    const plan = this.plans.find((candidate) => candidate.id === id);
    if (!plan) throw notFoundError(`Plan ${id} not found`);
    return plan;
  }

  private requireSession(id: string) {
    const session = this.sessions.find((candidate) => candidate.id === id);
    if (!session) throw notFoundError(`Fast ${id} not found`);
    return session;
  }

  private checkTargetHours(hours: number) {
    if (!Number.isInteger(hours) || hours < 1 || hours > this.policy.maxPlanDurationHours) {
      throw validationError(`Target must be a whole number of hours between 1 and ${this.policy.maxPlanDurationHours}`);
    }
    return hours;
  }

  private ledgerFor(plan: Plan) {
    const current = this.ledger;
    if (current && current.planId === plan.id) return current;
    const ledger = new OverrideLedger(this.keyValueStore, plan.id);
    this.ledger = ledger;
    return ledger;
  }

  private async syncLedger() {
    const plan = this.activePlan;
    if (!plan) {
      this.ledger = null;
      return;
    }
    const ledger = this.ledgerFor(plan);
    await this.write("Load regime overrides", () => ledger.refresh());
  }

  /** Runs after a committed change or a tick, so a failed override write is reported rather than thrown. */
  private async syncOverrides(ledger = this.ledger) {
    if (!ledger) return;
    try {
      await ledger.flush();
    } catch (error) {
      const failure = persistenceError("Save regime overrides failed", error);
      this.lastError = failure;
      logger.error(`${failure.message} for plan ${ledger.planId}`, error);
      this.history.publish({ type: "overrideWriteFailed", userId: this.userId, origin: this.origin, error: failure });
    }
  }

  private async insertSession(session: NewSession, label: string) {
    const id = await this.write(label, () => this.repository.saveSession(session));
    const saved: Session = { ...session, id };
    this.sessions = [saved, ...this.sessions].sort(newestFirst);
    return saved;
  }

  private async replaceSession(session: Session, label: string) {
    await this.write(label, () => this.repository.updateSession(session));
    this.sessions = this.sessions.map((candidate) => (candidate.id === session.id ? session : candidate)).sort(newestFirst);
    return session;
  }

  private async savePlanChange(plan: Plan, label: string) {
    await this.write(label, () => this.repository.updatePlan(plan), true);
    this.plans = this.plans.map((candidate) => (candidate.id === plan.id ? plan : candidate));
    return plan;
  }

  private async restorePlan(plan: Plan) {
    try {
      await this.repository.updatePlan(plan);
      this.plans = this.plans.map((candidate) => (candidate.id === plan.id ? plan : candidate));
    } catch (error) {
      logger.error(`Could not restore plan ${plan.id} after a failed save`, error);
    }
  }

  private async write<T>(label: string, action: () => Promise<T>, retry = false): Promise<T> {
    try {
      return retry ? await withRetry(action, { attempts: 2, delayMs: this.policy.retryDelayMs, label }) : await action();
    } catch (error) {
      const failure = isFastingError(error) ? error : persistenceError(`${label} failed`, error);
      this.lastError = failure;
      throw failure;
    }
  }

  private async notify(label: string, action: () => Promise<void>) {
    try {
      await action();
    } catch (error) {
      logger.warn(`Could not ${label}`, error);
    }
  }
}
