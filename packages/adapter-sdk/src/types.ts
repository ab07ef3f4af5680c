// ── Property Names ──────────────────────────────────────────────────────────

export type PropertyName =
  | "vibration"
  | "position"
  | "stroke"
  | "thrusting"
  | "battery"
  | "connectivity";

// ── Command Field Definition ──────────────────────────────────────────────

export interface CommandFieldDef {
  type: "boolean" | "number" | "string" | "object";
  description?: string;
  values?: (number | string)[];
  min?: number;
  max?: number;
}

// ── Entity Registration ────────────────────────────────────────────────────

export interface EntityRegistration {
  entityId: string;
  displayName?: string;
  properties: Array<{
    property: PropertyName;
    features: string[];
    readOnly?: boolean;
    commandHints?: Record<string, CommandFieldDef>;
  }>;
}

// ── Entity Grouping ──────────────────────────────────────────────────────

export interface EntityGroup {
  id: string;
  name: string;
  type: "device" | "account";
  entityIds: string[];
}

export interface RegistrationResult {
  entities: EntityRegistration[];
  groups?: EntityGroup[];
}

// ── Pair Result ─────────────────────────────────────────────────────────

export interface PairResult {
  success: boolean;
  credentials?: Record<string, unknown>;
  error?: string;
  message?: string;
}

// ── Callbacks ─────────────────────────────────────────────────────────────

export type StateChangeCallback = (
  entityId: string,
  property: PropertyName,
  state: Record<string, unknown>,
) => void;

/** Fired when the set of entities changes after `register()` has run. */
export type RegistrationChangeCallback = (result: RegistrationResult) => void;

// ── Adapter Interface ──────────────────────────────────────────────────────

export interface Adapter {
  register(): Promise<RegistrationResult>;
  execute(
    entityId: string,
    property: PropertyName,
    command: Record<string, unknown>,
  ): Promise<void>;
  observe(
    entityId: string,
    property: PropertyName,
  ): Promise<Record<string, unknown>>;
  subscribe(cb: StateChangeCallback): Promise<void>;
  onRegistrationChange?(cb: RegistrationChangeCallback): void;
  ping(): Promise<boolean>;
  destroy(): Promise<void>;
  pair?(params: Record<string, unknown>): Promise<PairResult>;
}

export type AdapterFactory = (config: Record<string, unknown>) => Adapter;
