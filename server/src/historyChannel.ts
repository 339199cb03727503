import { EventEmitter } from "events";
import type { FastingError } from "./errors";
import type { Session } from "./types";

export type HistoryEvent =
  | { type: "historyUpdated"; userId: string; origin: string }
  | { type: "staleSessionDetected"; userId: string; origin: string; session: Session }
  | { type: "autoRecordFailed"; userId: string; origin: string; error: FastingError }
  | { type: "overrideWriteFailed"; userId: string; origin: string; error: FastingError };

export type HistoryListener = (event: HistoryEvent) => void;

/** In-process fan-out of history changes between service instances of the same user. */
export class HistoryChannel {
  private readonly emitter = new EventEmitter();

  subscribe(listener: HistoryListener) {
    this.emitter.on("event", listener);
    return () => { this.emitter.off("event", listener); };
  }

  publish(event: HistoryEvent) { this.emitter.emit("event", event); }

  get listenerCount() { return this.emitter.listenerCount("event"); }
}
