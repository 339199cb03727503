import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import morgan from "morgan";
import chalk from "chalk";
import { z } from "zod";
import type { AppConfig } from "./config";
import type { FastingRepository } from "./dataStore";
import { type FastingErrorKind, isFastingError, validationError } from "./errors";
import { FastingService } from "./fastingService";
import { HistoryChannel } from "./historyChannel";
import type { KeyValueStore } from "./keyValueStore";
import { logger } from "./logger";
import { type NotificationStore, StoredNotificationScheduler } from "./notifications";
import { IntervalTickScheduler, type TickScheduler } from "./ticker";

export type AppDeps = {
  config: Pick<AppConfig, "defaultUserId" | "corsOrigin" | "policy" | "logLevel">;
  repository: FastingRepository;
  keyValueStore: KeyValueStore;
  notificationStore: NotificationStore;
  history?: HistoryChannel;
  clock?: () => Date;
  createTicker?: () => TickScheduler;
};

type UserContext = { service: FastingService; notifications: StoredNotificationScheduler };

const SERVER_OBSERVER = "http-server";

/** One loaded, ticking service per user, created on first request. */
export class ServiceRegistry {
  private readonly contexts = new Map<string, Promise<UserContext>>();
  private readonly history: HistoryChannel;

  constructor(private readonly deps: AppDeps) {
    this.history = deps.history ?? new HistoryChannel();
  }

  get(userId: string) {
    const existing = this.contexts.get(userId);
    if (existing) return existing;
    const created = this.create(userId);
    this.contexts.set(userId, created);
    return created;
  }

  async disposeAll() {
    const contexts = await Promise.allSettled(this.contexts.values());
    this.contexts.clear();
    for (const context of contexts) if (context.status === "fulfilled") context.value.service.dispose();
  }

  private async create(userId: string): Promise<UserContext> {
    const { config, clock } = this.deps;
    const notifications = new StoredNotificationScheduler(this.deps.notificationStore, userId, config.policy, clock);
    const service = new FastingService({
      userId,
      repository: this.deps.repository,
      keyValueStore: this.deps.keyValueStore,
      notifications,
      history: this.history,
      policy: config.policy,
      clock,
      ticker: this.deps.createTicker ? this.deps.createTicker() : new IntervalTickScheduler()
    });
    try {
      await service.load();
    } catch (error) {
      service.dispose();
      this.contexts.delete(userId);
      throw error;
    }
    await service.observe(SERVER_OBSERVER);
    logger.debug(`Loaded fasting service for ${userId}`);
    return { service, notifications };
  }
}

morgan.token("colored-method", (req) => {
  switch (req.method) {
    case "GET": return chalk.green(req.method);
    case "POST": return chalk.yellow(req.method);
    case "PUT": return chalk.blue(req.method);
    case "DELETE": return chalk.red(req.method);
    default: return chalk.white(req.method ?? "");
  }
});

morgan.token("colored-status", (_req, res) => {
  const status = res.statusCode;
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  return chalk.green(status);
});

const statusByKind: Record<FastingErrorKind, number> = {
  validation: 400,
  notFound: 404,
  precondition: 409,
  calendar: 422,
  persistence: 503
};

const dateField = z.coerce.date();
const planPayloadSchema = z.object({
  name: z.string().optional(),
  durationHours: z.number(),
  daysOfWeek: z.array(z.string()),
  preferredStartTime: z.string(),
  allowedDrinks: z.enum(["strict", "practical", "lenient"]).optional(),
  reminderEnabled: z.boolean().optional(),
  reminderMinutesBeforeEnd: z.number().optional()
});
const planPatchSchema = planPayloadSchema.partial();
const regimeStartSchema = z.object({ startFromNow: z.boolean().optional().default(false) });
const regimeSnoozeSchema = z.object({ until: dateField });
const sessionStartSchema = z.object({ targetHours: z.number().optional(), startTime: dateField.optional() });
const sessionEndSchema = z.object({ endTime: dateField.optional() });
const activeFastEditSchema = z.object({ startTime: dateField, targetHours: z.number() });
const snoozeSchema = z.object({ minutes: z.number() });
const startTimeSchema = z.object({ startTime: dateField });
const sessionTimesSchema = z.object({ startTime: dateField, endTime: dateField.nullable() });
const resolveSchema = z.object({ resolution: z.enum(["completed", "earlyEnd", "discarded"]) });
const confirmationSchema = z.object({ scheduledTime: dateField, durationHours: z.number(), customStartTime: dateField.optional() });

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw validationError(parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join(", "));
  return parsed.data;
}

type Handler = (req: Request, res: Response) => Promise<unknown>;
const route = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export function errorMiddleware(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isFastingError(err)) {
    const status = statusByKind[err.kind];
    if (status >= 500) logger.error(err.message, err.cause);
    return res.status(status).json({ error: err.message, kind: err.kind });
  }
  if (err instanceof SyntaxError) return res.status(400).json({ error: "Malformed JSON body" });
  logger.error("Unhandled error", err);
  return res.status(500).json({ error: "Internal Server Error" });
}

export function createApp(deps: AppDeps) {
  const { config } = deps;
  const registry = new ServiceRegistry(deps);
  const app = express();

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: "1mb" }));
  app.use(
    morgan(`${chalk.gray(":date[iso]")} :colored-method ${chalk.cyan(":url")} :colored-status - ${chalk.magenta(":response-time ms")}`, {
      skip: () => config.logLevel === "silent"
    })
  );

  app.use("/api", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, proxy-revalidate");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });

  const userOf = (req: Request) => req.header("x-user-id") || config.defaultUserId;
  const serviceFor = async (req: Request) => (await registry.get(userOf(req))).service;

  app.get("/api/health", (_req, res) => res.json({ ok: true }));
  app.get("/api/state", route(async (req, res) => res.json((await serviceFor(req)).snapshot())));

  app.get("/api/plans", route(async (req, res) => res.json((await serviceFor(req)).plans)));
  app.post("/api/plans", route(async (req, res) => {
    const service = await serviceFor(req);
    res.status(201).json(await service.createPlan(parseBody(planPayloadSchema, req.body)));
  }));
  app.put("/api/plans/:id", route(async (req, res) => {
    const service = await serviceFor(req);
    res.json(await service.updatePlan(req.params.id, parseBody(planPatchSchema, req.body)));
  }));
  app.post("/api/plans/:id/activate", route(async (req, res) => res.json(await (await serviceFor(req)).setActivePlan(req.params.id))));
  app.delete("/api/plans/:id", route(async (req, res) => {
    await (await serviceFor(req)).deletePlan(req.params.id);
    res.status(204).send();
  }));

  app.post("/api/regime/start", route(async (req, res) => {
    const service = await serviceFor(req);
    res.json(await service.startRegime(parseBody(regimeStartSchema, req.body)));
  }));
  app.post("/api/regime/stop", route(async (req, res) => res.json(await (await serviceFor(req)).stopRegime())));
  app.post("/api/regime/skip", route(async (req, res) => res.json(await (await serviceFor(req)).skipCurrentRegimeFast())));
  app.post("/api/regime/snooze", route(async (req, res) => {
    const service = await serviceFor(req);
    res.json(await service.snoozeCurrentRegimeFast(parseBody(regimeSnoozeSchema, req.body).until));
  }));

  app.get("/api/sessions", route(async (req, res) => res.json((await serviceFor(req)).sessions)));
  app.post("/api/sessions", route(async (req, res) => {
    const service = await serviceFor(req);
    res.status(201).json(await service.startSession(parseBody(sessionStartSchema, req.body)));
  }));
  app.post("/api/sessions/active/end", route(async (req, res) => {
    const service = await serviceFor(req);
    res.json(await service.endActiveSession(parseBody(sessionEndSchema, req.body)));
  }));
  app.post("/api/sessions/active/skip", route(async (req, res) => res.json(await (await serviceFor(req)).skipActiveSession())));
  app.put("/api/sessions/active", route(async (req, res) => {
    const service = await serviceFor(req);
    const { startTime, targetHours } = parseBody(activeFastEditSchema, req.body);
    res.json(await service.editActiveFast(startTime, targetHours));
  }));
  app.get("/api/sessions/quick-restart", route(async (req, res) => res.json((await serviceFor(req)).quickRestartCandidate())));
  app.post("/api/sessions/:id/snooze", route(async (req, res) => {
    const service = await serviceFor(req);
    res.json(await service.snoozeSession(req.params.id, parseBody(snoozeSchema, req.body).minutes));
  }));
  app.put("/api/sessions/:id/start", route(async (req, res) => {
    const service = await serviceFor(req);
    res.json(await service.adjustSessionStartTime(req.params.id, parseBody(startTimeSchema, req.body).startTime));
  }));
  app.put("/api/sessions/:id", route(async (req, res) => {
    const service = await serviceFor(req);
    const { startTime, endTime } = parseBody(sessionTimesSchema, req.body);
    res.json(await service.editSessionTimes(req.params.id, startTime, endTime));
  }));
  app.post("/api/sessions/:id/continue", route(async (req, res) => res.json(await (await serviceFor(req)).continuePreviousFast(req.params.id))));
  app.post("/api/sessions/:id/clear", route(async (req, res) => res.json(await (await serviceFor(req)).clearSession(req.params.id))));
  app.post("/api/sessions/:id/resolve", route(async (req, res) => {
    const service = await serviceFor(req);
    const resolved = await service.resolveStaleSession(req.params.id, parseBody(resolveSchema, req.body).resolution);
    if (!resolved) return res.status(204).send();
    return res.json(resolved);
  }));
  app.delete("/api/sessions/:id", route(async (req, res) => {
    await (await serviceFor(req)).deleteSession(req.params.id);
    res.status(204).send();
  }));

  app.post("/api/confirmations", route(async (req, res) => {
    const service = await serviceFor(req);
    res.status(201).json(await service.startFromConfirmation(parseBody(confirmationSchema, req.body)));
  }));

  app.get("/api/weeks", route(async (req, res) => res.json((await serviceFor(req)).weekSummaries)));
  app.get("/api/analytics", route(async (req, res) => res.json((await serviceFor(req)).analytics)));
  app.get("/api/notifications", route(async (req, res) => res.json(await (await registry.get(userOf(req))).notifications.pending())));

  app.use(errorMiddleware);

  return { app, registry };
}
