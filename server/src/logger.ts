import chalk from "chalk";
import type { LogLevel } from "./config";

const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const label: Record<Exclude<LogLevel, "silent">, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.green("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR")
};

const isLogLevel = (value: string | undefined): value is LogLevel => value !== undefined && value in order;

const fromEnv = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(fromEnv) ? fromEnv : "info";

export const setLogLevel = (level: LogLevel) => { threshold = level; };

function write(level: Exclude<LogLevel, "silent">, message: string, meta?: unknown) {
  if (order[level] < order[threshold]) return;
  const line = `${chalk.gray(new Date().toISOString())} ${label[level]} ${message}`;
  const out = level === "error" || level === "warn" ? console.error : console.log;
  if (meta === undefined) out(line);
  else out(line, meta instanceof Error ? chalk.red(meta.stack ?? meta.message) : meta);
}

export const logger = {
  debug: (message: string, meta?: unknown) => write("debug", message, meta),
  info: (message: string, meta?: unknown) => write("info", message, meta),
  warn: (message: string, meta?: unknown) => write("warn", message, meta),
  error: (message: string, meta?: unknown) => write("error", message, meta)
};
