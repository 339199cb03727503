export interface FastingPolicy {
  skipThresholdMinutes: number;
  snoozeResumeGraceSeconds: number;
  endedWindowHoldMinutes: number;
  recordedWindowToleranceSeconds: number;
  duplicateProximityMinutes: number;
  earlyEndPromptRatio: number;
  quickRestartWindowMinutes: number;
  staleBufferHours: number;
  staleMaxHours: number;
  retryDelayMs: number;
  tickIntervalMs: number;
  minPlanDurationHours: number;
  maxPlanDurationHours: number;
  historyLimit: number;
  recentLimit: number;
  analyticsLimit: number;
  defaultTargetHours: number;
  notificationWeeksAhead: number;
}

export const defaultPolicy: FastingPolicy = {
  skipThresholdMinutes: 60,
  snoozeResumeGraceSeconds: 300,
  endedWindowHoldMinutes: 60,
  recordedWindowToleranceSeconds: 60,
  duplicateProximityMinutes: 5,
  earlyEndPromptRatio: 0.25,
  quickRestartWindowMinutes: 60,
  staleBufferHours: 24,
  staleMaxHours: 168,
  retryDelayMs: 500,
  tickIntervalMs: 1000,
  minPlanDurationHours: 12,
  maxPlanDurationHours: 168,
  historyLimit: 365,
  recentLimit: 10,
  analyticsLimit: 100,
  defaultTargetHours: 16,
  notificationWeeksAhead: 2
};

export const withPolicy = (overrides: Partial<FastingPolicy> = {}): FastingPolicy => ({ ...defaultPolicy, ...overrides });
