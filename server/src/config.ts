import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { type FastingPolicy, defaultPolicy } from "./policy";

dotenv.config();

const numeric = z.string().regex(/^\d+(\.\d+)?$/, "must be numeric").optional();

const envSchema = z.object({
  PORT: numeric,
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  DATA_DIR: z.string().optional(),
  DEFAULT_USER_ID: z.string().min(1).optional(),
  CORS_ORIGIN: z.string().optional(),

  FASTING_SKIP_THRESHOLD_MINUTES: numeric,
  FASTING_SNOOZE_RESUME_GRACE_SECONDS: numeric,
  FASTING_ENDED_WINDOW_HOLD_MINUTES: numeric,
  FASTING_RECORDED_WINDOW_TOLERANCE_SECONDS: numeric,
  FASTING_DUPLICATE_PROXIMITY_MINUTES: numeric,
  FASTING_EARLY_END_PROMPT_RATIO: numeric,
  FASTING_QUICK_RESTART_WINDOW_MINUTES: numeric,
  FASTING_STALE_BUFFER_HOURS: numeric,
  FASTING_STALE_MAX_HOURS: numeric,
  FASTING_RETRY_DELAY_MS: numeric,
  FASTING_TICK_INTERVAL_MS: numeric
});

type Env = z.infer<typeof envSchema>;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const policyFromEnv = (env: Env): FastingPolicy => {
  const pick = (value: string | undefined, fallback: number) => (value === undefined ? fallback : Number(value));
  return {
    ...defaultPolicy,
    skipThresholdMinutes: pick(env.FASTING_SKIP_THRESHOLD_MINUTES, defaultPolicy.skipThresholdMinutes),
    snoozeResumeGraceSeconds: pick(env.FASTING_SNOOZE_RESUME_GRACE_SECONDS, defaultPolicy.snoozeResumeGraceSeconds),
    endedWindowHoldMinutes: pick(env.FASTING_ENDED_WINDOW_HOLD_MINUTES, defaultPolicy.endedWindowHoldMinutes),
    recordedWindowToleranceSeconds: pick(env.FASTING_RECORDED_WINDOW_TOLERANCE_SECONDS, defaultPolicy.recordedWindowToleranceSeconds),
    duplicateProximityMinutes: pick(env.FASTING_DUPLICATE_PROXIMITY_MINUTES, defaultPolicy.duplicateProximityMinutes),
    earlyEndPromptRatio: pick(env.FASTING_EARLY_END_PROMPT_RATIO, defaultPolicy.earlyEndPromptRatio),
    quickRestartWindowMinutes: pick(env.FASTING_QUICK_RESTART_WINDOW_MINUTES, defaultPolicy.quickRestartWindowMinutes),
    staleBufferHours: pick(env.FASTING_STALE_BUFFER_HOURS, defaultPolicy.staleBufferHours),
    staleMaxHours: pick(env.FASTING_STALE_MAX_HOURS, defaultPolicy.staleMaxHours),
    retryDelayMs: pick(env.FASTING_RETRY_DELAY_MS, defaultPolicy.retryDelayMs),
    tickIntervalMs: pick(env.FASTING_TICK_INTERVAL_MS, defaultPolicy.tickIntervalMs)
  };
};

const buildConfig = (env: Env) => ({
  port: parseInt(env.PORT || "5174", 10),
  nodeEnv: env.NODE_ENV || "development",
  logLevel: env.LOG_LEVEL ?? "info",
  dataDir: path.resolve(env.DATA_DIR || path.resolve(__dirname, "../data")),
  defaultUserId: env.DEFAULT_USER_ID || "local-user",
  corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(",") : "*",
  policy: policyFromEnv(env)
});

export type AppConfig = ReturnType<typeof buildConfig>;

let cachedConfig: AppConfig | null = null;

export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  if (cachedConfig && source === process.env) return cachedConfig;
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const config = buildConfig(parsed.data);
  if (source === process.env) cachedConfig = config;
  return config;
};
