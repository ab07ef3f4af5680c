import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_CALLBACK_PATH, DEFAULT_PLATFORM_NAME, type PairingRecord } from "./types.js";

export interface LovenseAdapterConfig {
  record: PairingRecord;
  refreshIntervalMs: number;
  requestTimeoutMs: number;
  callbackPort: number;
  callbackPath: string;
  platformName: string;
}

function intFromEnv(name: string, fallback: number, env: NodeJS.ProcessEnv): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/** Built-in defaults; the environment wins over these, the host config over both. */
export function defaultsFromEnv(env: NodeJS.ProcessEnv = process.env) {
  return {
    developerToken: env.LOVENSE_DEVELOPER_TOKEN ?? "",
    refreshInterval: intFromEnv("LOVENSE_REFRESH_INTERVAL", 30, env),
    requestTimeout: 10,
    callbackPort: intFromEnv("LOVENSE_CALLBACK_PORT", 8127, env),
  };
}

export function buildConfigSchema(env: NodeJS.ProcessEnv = process.env) {
  const defaults = defaultsFromEnv(env);
  return z.object({
    developer_token: z.string().default(defaults.developerToken)
      .describe("Vendor developer token; defaults to the shared token from LOVENSE_DEVELOPER_TOKEN"),
    callback_url: z.string().url().optional()
      .describe("Public URL the vendor app posts pairing callbacks to"),
    user_id: z.string().default("")
      .describe("User id sent with the pairing request and matched against callbacks"),
    user_name: z.string().default(""),
    refresh_interval: z.number().int().min(10).default(Math.max(10, defaults.refreshInterval))
      .describe("Seconds between refresh ticks"),
    request_timeout: z.number().positive().max(60).default(defaults.requestTimeout)
      .describe("Seconds before a vendor request is abandoned"),
    callback_port: z.number().int().min(0).max(65535).default(defaults.callbackPort)
      .describe("Port of the callback receiver; 0 disables it"),
    callback_path: z.string().startsWith("/").default(DEFAULT_CALLBACK_PATH),
    platform_name: z.string().min(1).default(DEFAULT_PLATFORM_NAME)
      .describe("Value of the X-platform header on local calls"),
  });
}

export type LovenseConfigInput = z.input<ReturnType<typeof buildConfigSchema>>;

/**
 * Validate the host-supplied config. Returns null when the account is not
 * set up yet (no user id or token), which leaves the adapter in onboarding
 * mode; throws ConfigError for values that are present but invalid.
 */
export function loadConfig(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): LovenseAdapterConfig | null {
  const result = buildConfigSchema(env).safeParse(config);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid adapter config: ${detail}`);
  }

  const cfg = result.data;
  const missing = [
    cfg.user_id ? null : "user_id",
    cfg.developer_token ? null : "developer_token",
  ].filter((k): k is string => k !== null);
  if (missing.length > 0) {
    console.warn(`Missing config fields: ${missing.join(", ")}. Received keys: ${Object.keys(config).join(", ") || "(empty)"}`);
    return null;
  }

  return {
    record: {
      developerToken: cfg.developer_token,
      callbackUrl: cfg.callback_url ?? "",
      userId: cfg.user_id,
      userName: cfg.user_name,
    },
    refreshIntervalMs: cfg.refresh_interval * 1000,
    requestTimeoutMs: Math.round(cfg.request_timeout * 1000),
    callbackPort: cfg.callback_port,
    callbackPath: cfg.callback_path,
    platformName: cfg.platform_name,
  };
}
