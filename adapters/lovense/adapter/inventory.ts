import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { Accessory, AccessoryInventory, EndpointInfo, PairingCallback } from "./types.js";

// The vendor app, the local GetToys call and older relay responses all
// describe toys differently. Everything is normalized here, before the
// coordinator sees it.

const DEFAULT_TOY_NAME = "Lovense Device";

const SHORT_FUNCTION_NAMES: Record<string, string> = {
  v: "Vibrate",
  r: "Rotate",
  p: "Pump",
  t: "Thrusting",
  f: "Fingering",
  s: "Suction",
  d: "Depth",
  o: "Oscillate",
};

const POSITION_KEYWORDS = ["position", "stroke", "linear", "depth"];

const numeric = z.union([
  z.number().finite(),
  z.string().regex(/^-?\d+(\.\d+)?$/).transform(Number),
]);

const toyDescriptorSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().optional(),
  nickName: z.string().optional(),
  toyType: z.string().optional(),
  status: z.union([z.number(), z.string(), z.boolean()]).nullable().optional(),
  connected: z.boolean().nullable().optional(),
  battery: numeric.nullable().optional(),
  fVersion: z.union([z.string(), z.number()]).nullable().optional(),
  hVersion: z.union([z.string(), z.number()]).nullable().optional(),
  shortFunctionNames: z.array(z.string()).optional(),
  fullFunctionNames: z.array(z.string()).optional(),
});

type ToyDescriptor = z.infer<typeof toyDescriptorSchema>;

// ── Shape Variants ─────────────────────────────────────────────────────────

type RawInventory =
  | { kind: "empty" }
  | { kind: "json"; text: string }
  | { kind: "list"; items: unknown[] }
  | { kind: "map"; entries: Array<[string, unknown]> }
  | { kind: "invalid"; description: string };

type RawEntry =
  | { kind: "bare"; id: string }
  | { kind: "descriptor"; id: string | undefined; value: unknown }
  | { kind: "invalid"; label: string; description: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function classifyInventory(raw: unknown): RawInventory {
  if (raw === null || raw === undefined || raw === "") return { kind: "empty" };
  if (typeof raw === "string") return { kind: "json", text: raw };
  if (Array.isArray(raw)) return { kind: "list", items: raw };
  if (isRecord(raw)) return { kind: "map", entries: Object.entries(raw) };
  return { kind: "invalid", description: `unexpected ${typeof raw}` };
}

function classifyListItem(item: unknown, index: number): RawEntry {
  if (typeof item === "string" && item.length > 0) return { kind: "bare", id: item };
  if (isRecord(item)) {
    return { kind: "descriptor", id: typeof item.id === "string" ? item.id : undefined, value: item };
  }
  return { kind: "invalid", label: `#${index}`, description: "expected a toy id or descriptor object" };
}

function classifyMapEntry(key: string, value: unknown): RawEntry {
  if (typeof value === "string") return { kind: "bare", id: key };
  if (isRecord(value)) return { kind: "descriptor", id: key, value };
  return { kind: "invalid", label: key, description: "expected a descriptor object" };
}

// ── Descriptor Normalization ───────────────────────────────────────────────

export function parseFunctions(shortNames: string[] = [], fullNames: string[] = []): string[] {
  const functions: string[] = [];
  for (const short of shortNames) {
    const mapped = SHORT_FUNCTION_NAMES[short];
    if (mapped) functions.push(mapped);
  }
  functions.push(...fullNames);
  return [...new Set(functions)];
}

export function formatDisplayName(name: string, nickName?: string): string {
  return nickName && nickName !== name ? `${name} (${nickName})` : name;
}

function isConnected(desc: ToyDescriptor): boolean {
  if (desc.status !== undefined && desc.status !== null) {
    return String(desc.status) === "1" || desc.status === true;
  }
  return desc.connected ?? false;
}

function firmwareVersion(desc: ToyDescriptor): string | undefined {
  if (desc.fVersion !== undefined && desc.fVersion !== null && desc.fVersion !== "") {
    return String(desc.fVersion);
  }
  if (desc.hVersion !== undefined && desc.hVersion !== null && desc.hVersion !== "") {
    return `HW ${desc.hVersion}`;
  }
  return undefined;
}

function toAccessory(id: string, desc: ToyDescriptor): Accessory {
  const name = desc.name || DEFAULT_TOY_NAME;
  const accessory: Accessory = {
    id,
    name,
    displayName: formatDisplayName(name, desc.nickName),
    toyType: (desc.toyType ?? "").toLowerCase(),
    connected: isConnected(desc),
    functions: parseFunctions(desc.shortFunctionNames, desc.fullFunctionNames),
  };
  if (desc.battery !== undefined && desc.battery !== null) {
    accessory.battery = Math.max(0, Math.min(100, Math.round(desc.battery)));
  }
  const version = firmwareVersion(desc);
  if (version !== undefined) accessory.firmwareVersion = version;
  return accessory;
}

function bareAccessory(id: string): Accessory {
  return {
    id,
    name: DEFAULT_TOY_NAME,
    displayName: DEFAULT_TOY_NAME,
    toyType: "",
    connected: true,
    functions: [],
  };
}

// ── Public API ─────────────────────────────────────────────────────────────

export interface InventoryParseResult {
  inventory: AccessoryInventory;
  skipped: ConfigError[];
}

/**
 * Decode any known inventory shape. Entries that do not validate are
 * reported in `skipped` and left out; the remaining entries are kept.
 */
export function parseInventory(raw: unknown): InventoryParseResult {
  return decodeInventory(raw, true);
}

function decodeInventory(raw: unknown, allowJson: boolean): InventoryParseResult {
  const inventory: AccessoryInventory = new Map();
  const skipped: ConfigError[] = [];
  const shape = classifyInventory(raw);

  let entries: RawEntry[];
  switch (shape.kind) {
    case "empty":
      return { inventory, skipped };
    case "json": {
      let parsed: unknown;
      try {
        parsed = JSON.parse(shape.text);
      } catch (err) {
        skipped.push(new ConfigError("Inventory is not valid JSON", { cause: err }));
        return { inventory, skipped };
      }
      if (!allowJson || typeof parsed === "string") {
        skipped.push(new ConfigError("Inventory JSON is doubly encoded"));
        return { inventory, skipped };
      }
      return decodeInventory(parsed, false);
    }
    case "list":
      entries = shape.items.map((item, index) => classifyListItem(item, index));
      break;
    case "map":
      entries = shape.entries.map(([key, value]) => classifyMapEntry(key, value));
      break;
    case "invalid":
      skipped.push(new ConfigError(`Inventory has an unsupported shape: ${shape.description}`));
      return { inventory, skipped };
  }

  for (const entry of entries) {
    switch (entry.kind) {
      case "bare":
        inventory.set(entry.id, bareAccessory(entry.id));
        break;
      case "descriptor": {
        if (!entry.id) {
          skipped.push(new ConfigError("Toy descriptor has no id"));
          break;
        }
        const result = toyDescriptorSchema.safeParse(entry.value);
        if (!result.success) {
          const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
          skipped.push(new ConfigError(`Toy ${entry.id} skipped: ${detail}`));
          break;
        }
        inventory.set(entry.id, toAccessory(entry.id, result.data));
        break;
      }
      case "invalid":
        skipped.push(new ConfigError(`Toy ${entry.label} skipped: ${entry.description}`));
        break;
    }
  }

  return { inventory, skipped };
}

const port = z.union([
  z.number().int(),
  z.string().regex(/^\d+$/).transform(Number),
]).refine((p) => p > 0 && p < 65536, "port out of range");

const callbackSchema = z.object({
  uid: z.union([z.string(), z.number()]).transform(String).optional(),
  domain: z.string().optional(),
  httpsPort: port.optional(),
  toys: z.unknown().optional(),
});

export interface CallbackParseResult {
  callback: PairingCallback;
  skipped: ConfigError[];
}

/** Decode the body the vendor app posts to the callback URL. */
export function parseCallbackPayload(raw: unknown): CallbackParseResult {
  if (!isRecord(raw)) {
    throw new ConfigError("Callback payload must be a JSON object");
  }
  const result = callbackSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid callback payload: ${detail}`);
  }

  const { uid, domain, httpsPort, toys } = result.data;
  const { inventory, skipped } = parseInventory(toys);

  let endpoint: EndpointInfo | undefined;
  if (domain && httpsPort !== undefined) {
    endpoint = { domain, httpsPort };
  }

  return {
    callback: { uid: uid || undefined, endpoint, inventory },
    skipped,
  };
}

// ── Capabilities ───────────────────────────────────────────────────────────

export function supportsPosition(accessory: Accessory): boolean {
  if (accessory.toyType.includes("solace") || accessory.name.toLowerCase().includes("solace")) {
    return true;
  }
  const joined = accessory.functions.join(" ").toLowerCase();
  return POSITION_KEYWORDS.some((keyword) => joined.includes(keyword));
}

export function supportsThrusting(accessory: Accessory): boolean {
  return accessory.functions.some((f) => f.toLowerCase() === "thrusting");
}
