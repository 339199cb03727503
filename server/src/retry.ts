import { setTimeout as sleep } from "timers/promises";
import { logger } from "./logger";

export type RetryOptions = { attempts: number; delayMs: number; label: string };

/** Runs `action` up to `attempts` times with a fixed delay in between; rethrows the last failure. */
export async function withRetry<T>(action: () => Promise<T>, { attempts, delayMs, label }: RetryOptions): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await action();
    } catch (error) {
      lastError = error;
      if (attempt < attempts) {
        logger.warn(`${label} failed (attempt ${attempt}/${attempts}), retrying in ${delayMs}ms`, error);
        await sleep(delayMs);
      }
    }
  }
  throw lastError;
}
