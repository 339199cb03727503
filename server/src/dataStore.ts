import fs from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import { z } from "zod";
import { notFoundError } from "./errors";
import type { KeyValueStore } from "./keyValueStore";
import type { NotificationStore } from "./notifications";
import type { NewPlan, NewSession, NotificationIntent, Plan, Session } from "./types";

export interface FastingRepository {
  getPlans(userId: string): Promise<Plan[]>;
  savePlan(plan: NewPlan): Promise<string>;
  updatePlan(plan: Plan): Promise<void>;
  deletePlan(id: string): Promise<void>;
  /** Most recent first. */
  getSessions(userId: string, limit?: number): Promise<Session[]>;
  saveSession(session: NewSession): Promise<string>;
  updateSession(session: Session): Promise<void>;
  deleteSession(id: string): Promise<void>;
}

const nullableDate = z.coerce.date().nullable();

export const planSchema = z.object({
  id: z.string(),
  userId: z.string(),
  name: z.string(),
  durationHours: z.number(),
  daysOfWeek: z.array(z.string()),
  preferredStartTime: z.string(),
  allowedDrinks: z.enum(["strict", "practical", "lenient"]).default("practical"),
  reminderEnabled: z.boolean().default(false),
  reminderMinutesBeforeEnd: z.number().int().min(0).default(0),
  active: z.boolean().default(false),
  regimeActive: z.boolean().default(false),
  regimeStartedAt: nullableDate.default(null),
  createdAt: z.coerce.date()
});

export const sessionSchema = z.object({
  id: z.string(),
  userId: z.string(),
  planId: z.string().nullable().default(null),
  startTime: z.coerce.date(),
  endTime: nullableDate.default(null),
  targetDurationHours: z.number().positive(),
  completionStatus: z.enum(["active", "completed", "earlyEnd", "skipped", "failed"]),
  manuallyEdited: z.boolean().default(false),
  skipped: z.boolean().default(false),
  mergedFromEarlyEnd: z.boolean().default(false),
  originalScheduledStart: nullableDate.default(null),
  snoozedUntil: nullableDate.default(null),
  snoozeCount: z.number().int().min(0).default(0),
  notes: z.string().nullable().default(null),
  createdAt: z.coerce.date()
});

const notificationSchema = z.object({
  id: z.string(),
  userId: z.string(),
  planId: z.string(),
  sessionId: z.string().nullable(),
  kind: z.enum(["fastStart", "fastEnd", "reminderBeforeEnd", "snoozeOver"]),
  title: z.string(),
  body: z.string(),
  scheduledFor: z.coerce.date(),
  createdAt: z.coerce.date()
});

const ledgerSchema = z.record(z.string(), z.string());

const isMissingFile = (error: unknown) => error instanceof Error && "code" in error && error.code === "ENOENT";

async function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S, fallback: z.infer<S>): Promise<z.infer<S>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return fallback;
    throw error;
  }
  return schema.parse(JSON.parse(raw));
}

async function writeJsonAtomic(filePath: string, data: unknown) {
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, JSON.stringify(data, null, 2), "utf-8");
  await fs.rename(tempPath, filePath);
}

export type FileDataStore = FastingRepository & NotificationStore & { keyValueStore: KeyValueStore; dataDir: string };

/** JSON files under `dataDir`; every write goes through one serialized queue. */
export function createFileDataStore(dataDir: string): FileDataStore {
  const plansPath = path.join(dataDir, "plans.json");
  const sessionsPath = path.join(dataDir, "sessions.json");
  const ledgerPath = path.join(dataDir, "ledger.json");
  const notificationsPath = path.join(dataDir, "notifications.json");

  let writeQueue: Promise<void> = Promise.resolve();

  function queueWrite(action: () => Promise<void>) {
    const run = writeQueue.then(async () => {
      await fs.mkdir(dataDir, { recursive: true });
      await action();
    });
    // The caller observes the failure through `run`; later writes still go ahead.
    writeQueue = run.catch(() => undefined);
    return run;
  }

  const readPlans = () => readJsonFile(plansPath, z.array(planSchema), []);
  const readSessions = () => readJsonFile(sessionsPath, z.array(sessionSchema), []);
  const readLedger = () => readJsonFile(ledgerPath, ledgerSchema, {});
  const readNotifications = () => readJsonFile(notificationsPath, z.array(notificationSchema), []);

  const replaceById = async <T extends { id: string }>(items: T[], item: T, kind: string) => {
    const idx = items.findIndex((existing) => existing.id === item.id);
    if (idx < 0) throw notFoundError(`${kind} ${item.id} not found`);
    items[idx] = item;
    return items;
  };

  const keyValueStore: KeyValueStore = {
    get: async (key) => (await readLedger())[key] ?? null,
    set: (key, value) => queueWrite(async () => writeJsonAtomic(ledgerPath, { ...(await readLedger()), [key]: value })),
    delete: (key) =>
      queueWrite(async () => {
        const { [key]: _removed, ...rest } = await readLedger();
        await writeJsonAtomic(ledgerPath, rest);
      })
  };

  return {
    dataDir,
    keyValueStore,

    getPlans: async (userId) => (await readPlans()).filter((plan) => plan.userId === userId),
    savePlan: async (plan) => {
      const id = `fp_${randomUUID()}`;
      await queueWrite(async () => writeJsonAtomic(plansPath, [...(await readPlans()), { ...plan, id }]));
      return id;
    },
    updatePlan: (plan) => queueWrite(async () => writeJsonAtomic(plansPath, await replaceById(await readPlans(), plan, "Plan"))),
    deletePlan: (id) => queueWrite(async () => writeJsonAtomic(plansPath, (await readPlans()).filter((plan) => plan.id !== id))),

    getSessions: async (userId, limit) => {
      const sessions = (await readSessions())
        .filter((session) => session.userId === userId)
        .sort((a, b) => b.startTime.getTime() - a.startTime.getTime());
      return limit === undefined ? sessions : sessions.slice(0, limit);
    },
    saveSession: async (session) => {
      const id = `fs_${randomUUID()}`;
      await queueWrite(async () => writeJsonAtomic(sessionsPath, [...(await readSessions()), { ...session, id }]));
      return id;
    },
    updateSession: (session) => queueWrite(async () => writeJsonAtomic(sessionsPath, await replaceById(await readSessions(), session, "Session"))),
    deleteSession: (id) => queueWrite(async () => writeJsonAtomic(sessionsPath, (await readSessions()).filter((session) => session.id !== id))),

    getNotifications: async (userId) => (await readNotifications()).filter((item) => item.userId === userId),
    saveNotifications: (userId, intents: NotificationIntent[]) =>
      queueWrite(async () => {
        const others = (await readNotifications()).filter((item) => item.userId !== userId);
        await writeJsonAtomic(notificationsPath, [...others, ...intents]);
      })
  };
}
