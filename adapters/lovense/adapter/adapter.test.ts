/**
 * Adapter Tests
 * Host-facing behavior: onboarding mode, registration, execute/observe
 * dispatch per facet, state notifications and pairing.
 */

import http from "node:http";
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import type { RegistrationResult, StateChangeCallback } from "@toylink/adapter-sdk";
import { BRIDGE_ENTITY_ID, LovenseAdapter } from "./adapter.js";
import { CallbackRouter, CoordinatorRegistry } from "./callback-router.js";
import type { CallbackServer } from "./callback-server.js";
import { ConfigError, PairingError } from "./errors.js";
import type { QrCodeData } from "./relay-client.js";
import type { InventoryFetch, VendorTransport } from "./transport.js";
import type { EndpointInfo, VendorCommand, VendorResponse } from "./types.js";

const CONFIG = { user_id: "u1", developer_token: "test-token", callback_port: 0 };

class FakeTransport implements VendorTransport {
  sent: Array<{ command: VendorCommand; toyId: string }> = [];
  qrFailure: Error | null = null;
  destroyed = false;

  async send(command: VendorCommand, toyId: string): Promise<VendorResponse> {
    this.sent.push({ command, toyId });
    return { code: 200 };
  }

  async fetchInventory(_endpoint: EndpointInfo): Promise<InventoryFetch> {
    return { source: "local", toys: {} };
  }

  async requestPairingCode(): Promise<QrCodeData> {
    if (this.qrFailure) throw this.qrFailure;
    return { qr: "https://example.test/qr.png", code: "ABC123" };
  }

  destroy(): void {
    this.destroyed = true;
  }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("LovenseAdapter", () => {
  let transport: FakeTransport;
  let registry: CoordinatorRegistry;
  let router: CallbackRouter;
  let adapter: LovenseAdapter;

  function deliver(toys: unknown): void {
    const result = router.route({ uid: "u1", domain: "1.2.3.4", httpsPort: 443, toys });
    expect(result.status).toBe(200);
  }

  beforeEach(() => {
    for (const level of ["info", "warn", "error", "debug"] as const) {
      vi.spyOn(console, level).mockImplementation(() => {});
    }
    transport = new FakeTransport();
    registry = new CoordinatorRegistry();
    router = new CallbackRouter(registry);
    adapter = new LovenseAdapter(CONFIG, { registry, transport, env: {} });
  });

  afterEach(async () => {
    await adapter.destroy();
  });

  describe("onboarding mode", () => {
    let onboarding: LovenseAdapter;

    beforeEach(() => {
      onboarding = new LovenseAdapter({}, { env: {} });
    });

    it("registers nothing and stays healthy", async () => {
      expect(onboarding.configured).toBe(false);
      await expect(onboarding.register()).resolves.toEqual({ entities: [] });
      await expect(onboarding.ping()).resolves.toBe(true);
      await expect(onboarding.subscribe(() => {})).resolves.toBeUndefined();
    });

    it("refuses observe, execute and pair", async () => {
      await expect(onboarding.observe("t1", "vibration")).rejects.toThrow("Adapter not configured");
      await expect(onboarding.execute("t1", "vibration", { level: 5 })).rejects.toThrow("Adapter not configured");
      await expect(onboarding.pair()).resolves.toEqual({
        success: false,
        error: "user_id and developer_token must be configured before pairing",
      });
    });

    it("takes the developer token from the environment", () => {
      const fromEnv = new LovenseAdapter({ user_id: "u2" }, { env: { LOVENSE_DEVELOPER_TOKEN: "test-secret" } });
      expect(fromEnv.configured).toBe(true);
    });
  });

  it("rejects config values that are present but invalid", () => {
    expect(() => new LovenseAdapter({ ...CONFIG, refresh_interval: 5 }, { env: {} })).toThrow(ConfigError);
  });

  it("registers the bridge and an account group before any toy is known", async () => {
    await expect(adapter.register()).resolves.toEqual({
      entities: [{
        entityId: BRIDGE_ENTITY_ID,
        displayName: "Lovense Connect",
        properties: [{ property: "connectivity", features: ["pairing"], readOnly: true }],
      }],
      groups: [{ id: "account:u1", name: "u1", type: "account", entityIds: [BRIDGE_ENTITY_ID] }],
    });
  });

  it("registers itself for callback routing", () => {
    expect(registry.get("u1")).toBeDefined();
  });

  describe("subscribe", () => {
    let states: Mock<StateChangeCallback>;
    let registrations: RegistrationResult[];

    beforeEach(async () => {
      states = vi.fn<StateChangeCallback>();
      registrations = [];
      adapter.onRegistrationChange((result) => registrations.push(result));
      await adapter.subscribe(states);
      await flush();
    });

    it("publishes the pairing code on the bridge", () => {
      expect(states).toHaveBeenCalledWith(BRIDGE_ENTITY_ID, "connectivity", {
        state: "awaiting_callback",
        domain: null,
        https_port: null,
        qr_code: "https://example.test/qr.png",
        code: "ABC123",
      });
    });

    it("announces new toys and their read-only state after a callback", () => {
      deliver({ t1: { name: "Max", toyType: "max", status: 1, battery: 80, shortFunctionNames: ["v"] } });

      expect(states).toHaveBeenCalledWith(BRIDGE_ENTITY_ID, "connectivity", {
        state: "paired",
        domain: "1.2.3.4",
        https_port: 443,
        qr_code: null,
        code: null,
      });
      expect(states).toHaveBeenCalledWith("t1", "battery", { level: 80 });
      expect(states).toHaveBeenCalledWith("t1", "connectivity", {
        connected: true,
        status: "connected",
        toy_type: "max",
        firmware_version: null,
      });
      expect(registrations).toHaveLength(1);
      expect(registrations[0]?.entities.map((e) => e.entityId)).toEqual([BRIDGE_ENTITY_ID, "t1"]);
    });

    it("does not repeat unchanged state", () => {
      deliver({ t1: { name: "Max", status: 1, battery: 80 } });
      deliver({ t1: { name: "Max", status: 1, battery: 80 } });
      const batteryCalls = states.mock.calls.filter(([entityId, property]) => entityId === "t1" && property === "battery");
      expect(batteryCalls).toHaveLength(1);
      expect(registrations).toHaveLength(1);
    });

    it("reports the desired state after a command", async () => {
      deliver({ t1: { name: "Max", status: 1, shortFunctionNames: ["v"] } });
      await adapter.execute("t1", "vibration", { level: 10 });
      expect(states).toHaveBeenCalledWith("t1", "vibration", { on: true, level: 10, brightness: 128 });
    });
  });

  describe("execute", () => {
    beforeEach(() => {
      deliver({
        t1: { name: "Max", toyType: "max", status: 1, shortFunctionNames: ["v"] },
        s1: { name: "Solace", toyType: "solace", status: 1, fullFunctionNames: ["Thrusting", "Stroke"] },
      });
    });

    it("sends vibration levels", async () => {
      await adapter.execute("t1", "vibration", { level: 10 });
      expect(transport.sent).toEqual([
        { command: { command: "Function", action: "Vibrate:10", timeSec: 0 }, toyId: "t1" },
      ]);
    });

    it("sends presets and patterns directly", async () => {
      await adapter.execute("t1", "vibration", { preset: "fireworks" });
      await adapter.execute("t1", "vibration", { pattern: "20;5", interval: 300, duration: 4 });
      expect(transport.sent.map((s) => s.command)).toEqual([
        { command: "Preset", name: "fireworks", timeSec: 0 },
        { command: "Pattern", rule: "V:1;F:v;S:300#", strength: "20;5", timeSec: 4 },
      ]);
    });

    it("keeps stroke sides consistent through the store", async () => {
      await adapter.execute("s1", "stroke", { top: 60 });
      await adapter.execute("s1", "stroke", { bottom: 70 });

      expect(transport.sent.map((s) => s.command)).toEqual([
        { command: "Function", action: "Stroke:25-60", timeSec: 0 },
        { command: "Function", action: "Stroke:59-60", timeSec: 0 },
      ]);
      await expect(adapter.observe("s1", "stroke")).resolves.toEqual({ active: true, bottom: 59, top: 60 });
    });

    it("combines facets of one toy into one command", async () => {
      await adapter.execute("s1", "thrusting", { level: 8 });
      await adapter.execute("s1", "vibration", { level: 4 });
      await adapter.execute("s1", "position", { value: 30 });

      expect(transport.sent.map((s) => s.command)).toEqual([
        { command: "Function", action: "Thrusting:8", timeSec: 0 },
        { command: "Function", action: "Vibrate:4,Thrusting:8", timeSec: 0 },
        { command: "Position", value: "30" },
      ]);
      await expect(adapter.observe("s1", "position")).resolves.toEqual({ active: true, value: 30 });
    });

    it("rejects facets the toy does not have", async () => {
      await expect(adapter.execute("t1", "position", { value: 30 })).rejects.toThrow("Max does not support position");
    });

    it("rejects read-only facets and entities", async () => {
      await expect(adapter.execute("t1", "battery", {})).rejects.toThrow("battery is read-only on t1");
      await expect(adapter.execute(BRIDGE_ENTITY_ID, "connectivity", {})).rejects.toThrow("bridge is read-only");
    });

    it("rejects unknown toys", async () => {
      await expect(adapter.execute("t9", "vibration", { level: 1 })).rejects.toThrow("Unknown entity: t9");
    });

    it("rejects malformed commands without sending anything", async () => {
      await expect(adapter.execute("t1", "vibration", {})).rejects.toThrow(ConfigError);
      expect(transport.sent).toEqual([]);
    });
  });

  describe("observe", () => {
    it("reads facets from the store and the inventory", async () => {
      deliver({ t1: { name: "Max", status: 0, battery: "55", fVersion: "241" } });

      await expect(adapter.observe("t1", "vibration")).resolves.toEqual({ on: false, level: 0, brightness: 0 });
      await expect(adapter.observe("t1", "battery")).resolves.toEqual({ level: 55 });
      await expect(adapter.observe("t1", "connectivity")).resolves.toEqual({
        connected: false,
        status: "disconnected",
        toy_type: "",
        firmware_version: "241",
      });
    });

    it("reads the bridge", async () => {
      await expect(adapter.observe(BRIDGE_ENTITY_ID, "connectivity")).resolves.toEqual({
        state: "unpaired",
        domain: null,
        https_port: null,
        qr_code: null,
        code: null,
      });
    });
  });

  describe("pair", () => {
    it("returns the QR code to scan", async () => {
      await expect(adapter.pair()).resolves.toEqual({
        success: true,
        message: "Scan https://example.test/qr.png (code ABC123) with the Lovense Remote app",
      });
    });

    it("reports a failed request", async () => {
      transport.qrFailure = new PairingError("relay down");
      await expect(adapter.pair()).resolves.toEqual({
        success: false,
        error: "Pairing code request failed: relay down",
      });
    });

    it("does nothing once paired", async () => {
      deliver({});
      await expect(adapter.pair()).resolves.toEqual({ success: true, message: "Already paired with 1.2.3.4:443" });
    });
  });

  describe("ping", () => {
    it("is healthy before the first refresh and after a good one", async () => {
      await expect(adapter.ping()).resolves.toBe(true);
      await adapter.pair();
      await expect(adapter.ping()).resolves.toBe(true);
    });

    it("is unhealthy after a failed refresh", async () => {
      transport.qrFailure = new PairingError("relay down");
      await adapter.pair();
      await expect(adapter.ping()).resolves.toBe(false);
    });
  });

  describe("callback receiver", () => {
    it("starts on the configured port and closes on destroy", async () => {
      const close = vi.fn(async () => {});
      const startServer = vi.fn(async (): Promise<CallbackServer> => ({
        server: http.createServer(),
        port: 8127,
        close,
      }));
      const withReceiver = new LovenseAdapter({ ...CONFIG, callback_port: 8127 }, {
        registry,
        transport,
        env: {},
        startServer,
      });

      await withReceiver.subscribe(() => {});
      expect(startServer).toHaveBeenCalledWith(expect.any(CallbackRouter), {
        port: 8127,
        path: "/api/lovense/callback",
      });

      await withReceiver.destroy();
      expect(close).toHaveBeenCalledTimes(1);
      expect(registry.get("u1")).toBeUndefined();
      expect(transport.destroyed).toBe(true);
    });

    it("keeps running when the receiver cannot start", async () => {
      const startServer = vi.fn(async (): Promise<CallbackServer> => {
        throw new Error("listen EADDRINUSE");
      });
      const withReceiver = new LovenseAdapter({ ...CONFIG, callback_port: 8127 }, {
        registry,
        transport,
        env: {},
        startServer,
      });

      await expect(withReceiver.subscribe(() => {})).resolves.toBeUndefined();
      expect(console.error).toHaveBeenCalledWith("Callback receiver failed to start on port 8127: listen EADDRINUSE");
      await withReceiver.destroy();
    });
  });

  describe("teardown", () => {
    it("leaves a newer adapter for the same account routable", async () => {
      const replacement = new LovenseAdapter(CONFIG, { registry, transport: new FakeTransport(), env: {} });

      await adapter.destroy();
      deliver({ t1: { name: "Max", status: 1 } });

      await expect(replacement.register()).resolves.toMatchObject({
        entities: [{ entityId: BRIDGE_ENTITY_ID }, { entityId: "t1" }],
      });
      await replacement.destroy();
    });
  });
});
