import type { PropertyName, EntityRegistration, EntityGroup } from "./types.js";

export const PROTOCOL_VERSION = 1;

// ── Parent → Child Messages ─────────────────────────────────────────────────

export interface InitMessage {
  type: "init";
  protocolVersion: number;
  adapterId: string;
  adapterType: string;
  config: Record<string, unknown>;
}

export interface ObserveMessage {
  type: "observe";
  requestId: string;
  entityId: string;
  property: PropertyName;
}

export interface ExecuteMessage {
  type: "execute";
  requestId: string;
  entityId: string;
  property: PropertyName;
  command: Record<string, unknown>;
}

export interface PingMessage {
  type: "ping";
  requestId: string;
}

export interface PairMessage {
  type: "pair";
  requestId: string;
  params: Record<string, unknown>;
}

export interface ShutdownMessage {
  type: "shutdown";
}

export type ParentMessage =
  | InitMessage
  | ObserveMessage
  | ExecuteMessage
  | PingMessage
  | PairMessage
  | ShutdownMessage;

// ── Child → Parent Messages ─────────────────────────────────────────────────

export interface ReadyMessage {
  type: "ready";
  entities: EntityRegistration[];
  groups?: EntityGroup[];
}

export interface ObserveResultMessage {
  type: "observe_result";
  requestId: string;
  state: Record<string, unknown>;
}

export interface ExecuteResultMessage {
  type: "execute_result";
  requestId: string;
  success: boolean;
  error?: string;
}

export interface StateChangedMessage {
  type: "state_changed";
  entityId: string;
  property: PropertyName;
  state: Record<string, unknown>;
}

export interface EntitiesChangedMessage {
  type: "entities_changed";
  entities: EntityRegistration[];
  groups?: EntityGroup[];
}

export interface PongMessage {
  type: "pong";
  requestId: string;
}

export interface ErrorMessage {
  type: "error";
  requestId?: string;
  message: string;
}

export interface LogMessage {
  type: "log";
  level: "debug" | "info" | "warn" | "error";
  message: string;
}

export interface PairResultMessage {
  type: "pair_result";
  requestId: string;
  success: boolean;
  credentials?: Record<string, unknown>;
  error?: string;
  message?: string;
}

export type ChildMessage =
  | ReadyMessage
  | ObserveResultMessage
  | ExecuteResultMessage
  | StateChangedMessage
  | EntitiesChangedMessage
  | PongMessage
  | ErrorMessage
  | LogMessage
  | PairResultMessage;

const PARENT_MESSAGE_TYPES: ReadonlySet<string> = new Set<ParentMessage["type"]>([
  "init",
  "observe",
  "execute",
  "ping",
  "pair",
  "shutdown",
]);

/** Decode one NDJSON line from the host. Returns null for anything that is not a known message. */
export function decodeParentMessage(line: string): ParentMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return null;
  if (!("type" in raw) || typeof raw.type !== "string" || !PARENT_MESSAGE_TYPES.has(raw.type)) {
    return null;
  }
  return raw as ParentMessage;
}
