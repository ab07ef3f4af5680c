import { z } from "zod";
import type { CommandFieldDef, EntityRegistration } from "@toylink/adapter-sdk";
import { ConfigError } from "./errors.js";
import { supportsPosition, supportsThrusting } from "./inventory.js";
import {
  DEFAULT_STROKE_BOTTOM,
  DEFAULT_STROKE_TOP,
  POSITION_MAX,
  POSITION_MIN,
  PRESETS,
  THRUST_MAX,
  THRUST_MIN,
  VIBRATE_MAX,
  VIBRATE_MIN,
  type Accessory,
  type CommandBody,
  type DesiredState,
  type EndpointInfo,
  type PairingCode,
  type PairingState,
  type PartialSettings,
  type PresetName,
  type StrokeRange,
  type VendorCommand,
} from "./types.js";

export function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.round(value)));
}

// ── Desired State → Vendor Command ─────────────────────────────────────────

/**
 * Pick the one vendor command that realizes a desired state.
 * Position wins over the combined Function command; with nothing
 * active the toy is told to stop.
 */
export function translate(state: DesiredState): VendorCommand {
  if (state.position !== undefined) {
    return { command: "Position", value: String(Math.round(state.position)) };
  }

  const actions: string[] = [];
  if (state.vibration > 0) actions.push(`Vibrate:${state.vibration}`);
  if (state.strokeRange) actions.push(`Stroke:${state.strokeRange[0]}-${state.strokeRange[1]}`);
  if (state.thrusting > 0) actions.push(`Thrusting:${state.thrusting}`);

  return {
    command: "Function",
    action: actions.length > 0 ? actions.join(",") : "Stop",
    timeSec: 0,
  };
}

export function toCommandBody(command: VendorCommand, toyId?: string): CommandBody {
  const apiVer = command.command === "Pattern" ? 2 : 1;
  return toyId === undefined ? { ...command, apiVer } : { ...command, toy: toyId, apiVer };
}

export function patternCommand(strengths: number[], intervalMs = 1000, durationSec = 10): VendorCommand {
  const interval = clampInt(intervalMs, 100, 5000);
  return {
    command: "Pattern",
    rule: `V:1;F:v;S:${interval}#`,
    strength: strengths.map((s) => clampInt(s, VIBRATE_MIN, VIBRATE_MAX)).join(";"),
    timeSec: clampInt(durationSec, 0, 300),
  };
}

export function presetCommand(name: PresetName): VendorCommand {
  return { command: "Preset", name, timeSec: 0 };
}

const VENDOR_CODES: Record<number, string> = {
  400: "Invalid Command",
  401: "Toy Not Found",
  402: "Toy Not Connected",
  403: "Toy Doesn't Support This Command",
  404: "Invalid Parameter",
  500: "HTTP Server Not Started or Disabled",
  501: "Invalid Token",
  502: "No Permission to Use This API",
  503: "Invalid User ID",
  506: "Server Error - Restart Lovense Connect",
  507: "Lovense APP is Offline",
};

export function describeVendorCode(code: number): string {
  return VENDOR_CODES[code] ?? `Unknown error code: ${code}`;
}

// ── Host Command → Partial Settings ────────────────────────────────────────

const vibrationCommandSchema = z.object({
  on: z.boolean().optional(),
  level: z.number().finite().optional(),
  brightness: z.number().min(0).max(255).optional(),
  preset: z.enum(PRESETS).optional(),
  pattern: z.string().regex(/^\d+(;\d+)*$/, "pattern must be ';'-separated integers").optional(),
  interval: z.number().positive().optional(),
  duration: z.number().min(0).optional(),
});

const positionCommandSchema = z.object({
  value: z.number().finite().nullable(),
});

const strokeCommandSchema = z.object({
  top: z.number().finite().optional(),
  bottom: z.number().finite().optional(),
  clear: z.boolean().optional(),
});

const thrustingCommandSchema = z.object({
  level: z.number().finite(),
});

function parseCommand<T>(schema: z.ZodType<T>, property: string, cmd: Record<string, unknown>): T {
  const result = schema.safeParse(cmd);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid ${property} command: ${detail}`);
  }
  return result.data;
}

export type VibrationAction =
  | { kind: "settings"; settings: PartialSettings }
  | { kind: "preset"; name: PresetName }
  | { kind: "pattern"; strengths: number[]; intervalMs?: number; durationSec?: number };

/** Host brightness (0–255) to vendor intensity; any non-zero brightness vibrates. */
export function brightnessToLevel(brightness: number): number {
  if (brightness <= 0) return 0;
  return Math.max(1, Math.round((brightness / 255) * VIBRATE_MAX));
}

export function vibrationCommandToAction(
  cmd: Record<string, unknown>,
  current: DesiredState,
): VibrationAction {
  const parsed = parseCommand(vibrationCommandSchema, "vibration", cmd);

  if (parsed.preset) {
    return { kind: "preset", name: parsed.preset };
  }
  if (parsed.pattern) {
    return {
      kind: "pattern",
      strengths: parsed.pattern.split(";").map(Number),
      intervalMs: parsed.interval,
      durationSec: parsed.duration,
    };
  }
  if (parsed.on === false) {
    return { kind: "settings", settings: { vibration: 0 } };
  }
  if (parsed.level !== undefined) {
    return { kind: "settings", settings: { vibration: clampInt(parsed.level, VIBRATE_MIN, VIBRATE_MAX) } };
  }
  if (parsed.brightness !== undefined) {
    return { kind: "settings", settings: { vibration: brightnessToLevel(parsed.brightness) } };
  }
  if (parsed.on === true) {
    return {
      kind: "settings",
      settings: { vibration: current.vibration > 0 ? current.vibration : VIBRATE_MAX },
    };
  }
  throw new ConfigError("Invalid vibration command: expected one of on, level, brightness, preset, pattern");
}

export function positionCommandToSettings(cmd: Record<string, unknown>): PartialSettings {
  const { value } = parseCommand(positionCommandSchema, "position", cmd);
  return { position: value === null ? null : clampInt(value, POSITION_MIN, POSITION_MAX) };
}

/**
 * Resolve a stroke-top/stroke-bottom change against the stored range.
 * The side that was set is nudged so top always stays above bottom.
 */
export function strokeCommandToSettings(
  cmd: Record<string, unknown>,
  current: StrokeRange | undefined,
): PartialSettings {
  const parsed = parseCommand(strokeCommandSchema, "stroke", cmd);

  if (parsed.clear) {
    return { strokeRange: null };
  }
  if (parsed.top === undefined && parsed.bottom === undefined) {
    throw new ConfigError("Invalid stroke command: expected top, bottom or clear");
  }

  let bottom = parsed.bottom === undefined
    ? current?.[0] ?? DEFAULT_STROKE_BOTTOM
    : clampInt(parsed.bottom, POSITION_MIN, POSITION_MAX);
  let top = parsed.top === undefined
    ? current?.[1] ?? DEFAULT_STROKE_TOP
    : clampInt(parsed.top, POSITION_MIN, POSITION_MAX);

  if (top <= bottom) {
    if (parsed.top !== undefined && parsed.bottom !== undefined) {
      throw new ConfigError(`Invalid stroke command: top (${top}) must be above bottom (${bottom})`);
    }
    // A stored range always has bottom < 100 and top > 0, so one nudge is enough.
    if (parsed.top !== undefined) {
      top = bottom + 1;
    } else {
      bottom = top - 1;
    }
  }

  return { strokeRange: [bottom, top] };
}

export function thrustingCommandToSettings(cmd: Record<string, unknown>): PartialSettings {
  const { level } = parseCommand(thrustingCommandSchema, "thrusting", cmd);
  return { thrusting: clampInt(level, THRUST_MIN, THRUST_MAX) };
}

// ── Desired State / Accessory → Host State ─────────────────────────────────

export function vibrationToState(state: DesiredState): Record<string, unknown> {
  return {
    on: state.vibration > 0,
    level: state.vibration,
    brightness: Math.round((state.vibration / VIBRATE_MAX) * 255),
  };
}

export function positionToState(state: DesiredState): Record<string, unknown> {
  return { active: state.position !== undefined, value: state.position ?? null };
}

export function strokeToState(state: DesiredState): Record<string, unknown> {
  return {
    active: state.strokeRange !== undefined,
    bottom: state.strokeRange?.[0] ?? DEFAULT_STROKE_BOTTOM,
    top: state.strokeRange?.[1] ?? DEFAULT_STROKE_TOP,
  };
}

export function thrustingToState(state: DesiredState): Record<string, unknown> {
  return { level: state.thrusting };
}

export function accessoryToBattery(accessory: Accessory): Record<string, unknown> {
  return { level: accessory.battery ?? null };
}

export function accessoryToConnectivity(accessory: Accessory): Record<string, unknown> {
  return {
    connected: accessory.connected,
    status: accessory.connected ? "connected" : "disconnected",
    toy_type: accessory.toyType,
    firmware_version: accessory.firmwareVersion ?? null,
  };
}

export function bridgeToState(
  state: PairingState,
  endpoint: EndpointInfo | null,
  code: PairingCode | null,
): Record<string, unknown> {
  return {
    state,
    domain: endpoint?.domain ?? null,
    https_port: endpoint?.httpsPort ?? null,
    qr_code: code?.qrCodeUrl ?? null,
    code: code?.code ?? null,
  };
}

// ── Entity Registration ────────────────────────────────────────────────────

const VIBRATION_HINTS: Record<string, CommandFieldDef> = {
  on: { type: "boolean" },
  level: { type: "number", min: VIBRATE_MIN, max: VIBRATE_MAX, description: "Vibration intensity" },
  brightness: { type: "number", min: 0, max: 255, description: "Intensity on a light-style 0–255 scale" },
  preset: { type: "string", values: [...PRESETS], description: "Built-in preset, runs until stopped" },
  pattern: { type: "string", description: "';'-separated intensities, e.g. \"20;20;5;20;10\"" },
  interval: { type: "number", min: 100, max: 5000, description: "Pattern step in ms" },
  duration: { type: "number", min: 0, max: 300, description: "Pattern duration in s (0 = indefinite)" },
};

const POSITION_HINTS: Record<string, CommandFieldDef> = {
  value: { type: "number", min: POSITION_MIN, max: POSITION_MAX, description: "Absolute stroker position; null returns to function mode" },
};

const STROKE_HINTS: Record<string, CommandFieldDef> = {
  top: { type: "number", min: POSITION_MIN, max: POSITION_MAX, description: "Upper limit of the stroke range" },
  bottom: { type: "number", min: POSITION_MIN, max: POSITION_MAX, description: "Lower limit of the stroke range" },
  clear: { type: "boolean", description: "Stop ranged stroking" },
};

const THRUSTING_HINTS: Record<string, CommandFieldDef> = {
  level: { type: "number", min: THRUST_MIN, max: THRUST_MAX },
};

export function accessoryToRegistration(accessory: Accessory): EntityRegistration {
  const properties: EntityRegistration["properties"] = [
    { property: "vibration", features: ["intensity", "preset", "pattern"], commandHints: VIBRATION_HINTS },
  ];

  if (supportsPosition(accessory)) {
    properties.push(
      { property: "position", features: ["absolute"], commandHints: POSITION_HINTS },
      { property: "stroke", features: ["range"], commandHints: STROKE_HINTS },
    );
  }
  if (supportsThrusting(accessory)) {
    properties.push({ property: "thrusting", features: ["intensity"], commandHints: THRUSTING_HINTS });
  }

  properties.push(
    { property: "battery", features: ["level"], readOnly: true },
    { property: "connectivity", features: ["status"], readOnly: true },
  );

  return { entityId: accessory.id, displayName: accessory.displayName, properties };
}
