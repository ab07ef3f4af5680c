// ── Vendor Constants ───────────────────────────────────────────────────────

export const API_BASE_URL = "https://api.lovense-api.com/api";
export const API_GET_QRCODE = `${API_BASE_URL}/lan/getQrCode`;
export const API_COMMAND_SERVER = `${API_BASE_URL}/lan/v2/command`;
export const LOCAL_COMMAND_PATH = "/command";

export const DEFAULT_PLATFORM_NAME = "toylink Lovense Adapter";
export const DEFAULT_CALLBACK_PATH = "/api/lovense/callback";

export const VIBRATE_MIN = 0;
export const VIBRATE_MAX = 20;
export const THRUST_MIN = 0;
export const THRUST_MAX = 20;
export const POSITION_MIN = 0;
export const POSITION_MAX = 100;

export const DEFAULT_STROKE_BOTTOM = 25;
export const DEFAULT_STROKE_TOP = 75;

/** The vendor QR code stays scannable for four hours. */
export const PAIRING_CODE_TTL_MS = 4 * 60 * 60 * 1000;

export const PRESETS = ["pulse", "wave", "fireworks", "earthquake"] as const;
export type PresetName = (typeof PRESETS)[number];

// ── Desired State ──────────────────────────────────────────────────────────

export type StrokeRange = readonly [low: number, high: number];

export interface DesiredState {
  vibration: number;
  position?: number;
  strokeRange?: StrokeRange;
  thrusting: number;
}

/**
 * Absent key: leave the stored value alone.
 * `null` on position/strokeRange: clear it.
 */
export interface PartialSettings {
  vibration?: number;
  position?: number | null;
  strokeRange?: StrokeRange | null;
  thrusting?: number;
}

// ── Vendor Commands ────────────────────────────────────────────────────────

export type VendorCommand =
  | { command: "Function"; action: string; timeSec: number }
  | { command: "Position"; value: string }
  | { command: "Pattern"; rule: string; strength: string; timeSec: number }
  | { command: "Preset"; name: PresetName; timeSec: number }
  | { command: "GetToys" };

export type CommandBody = VendorCommand & { toy?: string; apiVer: number };

export interface VendorResponse {
  code: number;
  type?: string;
  message?: string;
  data?: unknown;
}

// ── Endpoint / Pairing ─────────────────────────────────────────────────────

export interface EndpointInfo {
  domain: string;
  httpsPort: number;
}

export interface PairingRecord {
  developerToken: string;
  callbackUrl: string;
  userId: string;
  userName: string;
}

export type PairingState = "unpaired" | "awaiting_callback" | "paired";

export interface PairingCode {
  qrCodeUrl: string | null;
  code: string | null;
  issuedAt: number;
  expiresAt: number;
}

// ── Accessories ────────────────────────────────────────────────────────────

export interface Accessory {
  id: string;
  name: string;
  displayName: string;
  toyType: string;
  battery?: number;
  connected: boolean;
  firmwareVersion?: string;
  functions: string[];
}

export type AccessoryInventory = Map<string, Accessory>;

/** Callback body after boundary decoding. */
export interface PairingCallback {
  uid?: string;
  endpoint?: EndpointInfo;
  inventory: AccessoryInventory;
}
