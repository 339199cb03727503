export const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type AllowedDrinks = "strict" | "practical" | "lenient";

export type CompletionStatus = "active" | "completed" | "earlyEnd" | "skipped" | "failed";

export interface Plan {
  id: string;
  userId: string;
  name: string;
  durationHours: number;
  /** Weekday short names ("Mon".."Sun") on which a fast starts. Stored as written; validated on use. */
  daysOfWeek: string[];
  /** "HH:mm" */
  preferredStartTime: string;
  allowedDrinks: AllowedDrinks;
  reminderEnabled: boolean;
  reminderMinutesBeforeEnd: number;
  active: boolean;
  regimeActive: boolean;
  regimeStartedAt: Date | null;
  createdAt: Date;
}

export interface Session {
  id: string;
  userId: string;
  planId: string | null;
  startTime: Date;
  endTime: Date | null;
  targetDurationHours: number;
  completionStatus: CompletionStatus;
  manuallyEdited: boolean;
  skipped: boolean;
  mergedFromEarlyEnd: boolean;
  originalScheduledStart: Date | null;
  snoozedUntil: Date | null;
  snoozeCount: number;
  notes: string | null;
  createdAt: Date;
}

export type NewPlan = Omit<Plan, "id">;
export type NewSession = Omit<Session, "id">;

export type FastingWindow = { windowStart: Date; windowEnd: Date };

export type WindowProjection =
  | ({ kind: "fasting" } & FastingWindow)
  | { kind: "eating"; nextFastStart: Date };

export type RegimeState = { kind: "inactive" } | WindowProjection;

export interface PlanInput {
  name?: string;
  durationHours: number;
  daysOfWeek: string[];
  preferredStartTime: string;
  allowedDrinks?: AllowedDrinks;
  reminderEnabled?: boolean;
  reminderMinutesBeforeEnd?: number;
}

export type FastingPhase =
  | "postMeal"
  | "fuelSwitching"
  | "fatMobilization"
  | "mildKetosis"
  | "autophagyPotential"
  | "deepAdaptive";

export interface WeekSummary {
  weekStart: Date;
  weekEnd: Date;
  sessions: Session[];
  completedCount: number;
  skippedCount: number;
  totalFasts: number;
  averageDurationHours: number;
  totalHours: number;
}

export interface FastingAnalytics {
  totalFastsCompleted: number;
  completionRate: number;
  averageDurationHours: number;
  longestFastHours: number;
  currentStreak: number;
  bestStreak: number;
  mostConsistentDay: string | null;
  phaseDistribution: Partial<Record<FastingPhase, number>>;
  last7DaysSessions: Session[];
  last30DaysSessions: Session[];
}

export type StaleResolution = "completed" | "earlyEnd" | "discarded";

export type NotificationKind = "fastStart" | "fastEnd" | "reminderBeforeEnd" | "snoozeOver";

export interface NotificationIntent {
  id: string;
  userId: string;
  planId: string;
  sessionId: string | null;
  kind: NotificationKind;
  title: string;
  body: string;
  scheduledFor: Date;
  createdAt: Date;
}
