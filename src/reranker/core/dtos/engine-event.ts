import { RankDocument } from "@reranker/domain";

export interface StatusEvent {
  type: "status";
  text: string;
}

export interface ModelReadyEvent {
  type: "model-ready";
}

export interface RankUpdateEvent {
  type: "rank-update";
  requestId: number;
  snapshot: RankDocument[];
}

export interface RankCompleteEvent {
  type: "rank-complete";
  requestId: number;
  snapshot: RankDocument[];
}

export interface EngineErrorEvent {
  type: "error";
  code: string;
  text: string;
}

/**
 * Events travelling engine → host.
 */
export type EngineEvent =
  | StatusEvent
  | ModelReadyEvent
  | RankUpdateEvent
  | RankCompleteEvent
  | EngineErrorEvent;

const EVENT_TYPES: ReadonlySet<string> = new Set([
  "status",
  "model-ready",
  "rank-update",
  "rank-complete",
  "error",
]);

/**
 * Shape check for events arriving over a transport that loses types
 * (worker messages).
 */
export function isEngineEvent(value: unknown): value is EngineEvent {
  if (typeof value !== "object" || value === null || !("type" in value)) {
    return false;
  }
  if (typeof value.type !== "string" || !EVENT_TYPES.has(value.type)) {
    return false;
  }
  if (value.type === "rank-update" || value.type === "rank-complete") {
    return (
      "requestId" in value &&
      typeof value.requestId === "number" &&
      "snapshot" in value &&
      Array.isArray(value.snapshot)
    );
  }
  return true;
}

/**
 * The request an event belongs to, if any.
 */
export function requestIdOf(event: EngineEvent): number | null {
  return event.type === "rank-update" || event.type === "rank-complete"
    ? event.requestId
    : null;
}
