import type {
  Adapter,
  EntityGroup,
  EntityRegistration,
  PairResult,
  PropertyName,
  RegistrationChangeCallback,
  RegistrationResult,
  StateChangeCallback,
} from "@toylink/adapter-sdk";
import { CallbackRouter, CoordinatorRegistry } from "./callback-router.js";
import { startCallbackServer, type CallbackServer } from "./callback-server.js";
import { loadConfig, type LovenseAdapterConfig } from "./config.js";
import { LovenseCoordinator } from "./coordinator.js";
import { LocalApiClient } from "./local-client.js";
import { RelayApiClient } from "./relay-client.js";
import { LovenseTransport, type VendorTransport } from "./transport.js";
import {
  accessoryToBattery,
  accessoryToConnectivity,
  accessoryToRegistration,
  bridgeToState,
  positionCommandToSettings,
  positionToState,
  strokeCommandToSettings,
  strokeToState,
  thrustingCommandToSettings,
  thrustingToState,
  vibrationCommandToAction,
  vibrationToState,
} from "./translators.js";
import type { Accessory, AccessoryInventory, DesiredState } from "./types.js";

export const BRIDGE_ENTITY_ID = "bridge";

const BRIDGE_REGISTRATION: EntityRegistration = {
  entityId: BRIDGE_ENTITY_ID,
  displayName: "Lovense Connect",
  properties: [{ property: "connectivity", features: ["pairing"], readOnly: true }],
};

/** Collaborators a host process shares between adapters, or a test replaces. */
export interface AdapterServices {
  registry?: CoordinatorRegistry;
  transport?: VendorTransport;
  startServer?: typeof startCallbackServer;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class LovenseAdapter implements Adapter {
  private config: LovenseAdapterConfig | null;
  private coordinator: LovenseCoordinator | null = null;
  private registry: CoordinatorRegistry;
  private startServer: typeof startCallbackServer;
  private server: CallbackServer | null = null;
  private stateCallback: StateChangeCallback | null = null;
  private registrationCallback: RegistrationChangeCallback | null = null;

  /** entity ID → property → last state sent to the host */
  private stateCache = new Map<string, Map<PropertyName, Record<string, unknown>>>();

  constructor(config: Record<string, unknown>, services: AdapterServices = {}) {
    this.registry = services.registry ?? new CoordinatorRegistry();
    this.startServer = services.startServer ?? startCallbackServer;
    // Onboarding mode: no account yet, only pair() is useful
    this.config = loadConfig(config, services.env);
    if (!this.config) return;

    const cfg = this.config;
    const transport = services.transport ?? new LovenseTransport(
      new RelayApiClient(cfg.record, cfg.requestTimeoutMs),
      (endpoint) => new LocalApiClient(endpoint, {
        platformName: cfg.platformName,
        timeoutMs: cfg.requestTimeoutMs,
      }),
    );
    this.coordinator = new LovenseCoordinator(cfg.record, transport, {
      refreshIntervalMs: cfg.refreshIntervalMs,
      now: services.now,
    });
    this.registry.register(this.coordinator);
  }

  get configured(): boolean {
    return this.coordinator !== null;
  }

  async register(): Promise<RegistrationResult> {
    if (!this.coordinator) return { entities: [] };
    return this.buildRegistration(this.coordinator);
  }

  async observe(entityId: string, property: PropertyName): Promise<Record<string, unknown>> {
    const coordinator = this.requireCoordinator();
    if (entityId === BRIDGE_ENTITY_ID) {
      if (property !== "connectivity") throw new Error(`Unknown property ${property} on ${entityId}`);
      return bridgeToState(coordinator.state, coordinator.endpoint, coordinator.pairingCode);
    }

    const accessory = this.requireAccessory(coordinator, entityId);
    this.requireProperty(accessory, property);
    return this.facetState(property, accessory, coordinator.getDesiredState(entityId));
  }

  async execute(
    entityId: string,
    property: PropertyName,
    command: Record<string, unknown>,
  ): Promise<void> {
    const coordinator = this.requireCoordinator();
    if (entityId === BRIDGE_ENTITY_ID) {
      throw new Error(`${entityId} is read-only`);
    }

    const accessory = this.requireAccessory(coordinator, entityId);
    const { readOnly } = this.requireProperty(accessory, property);
    if (readOnly) {
      throw new Error(`${property} is read-only on ${entityId}`);
    }

    const current = coordinator.getDesiredState(entityId);
    switch (property) {
      case "vibration": {
        const action = vibrationCommandToAction(command, current);
        if (action.kind === "preset") {
          await coordinator.sendPreset(entityId, action.name);
        } else if (action.kind === "pattern") {
          await coordinator.sendPattern(entityId, action.strengths, action.intervalMs, action.durationSec);
        } else {
          await coordinator.applyPartial(entityId, action.settings);
        }
        return;
      }
      case "position":
        await coordinator.applyPartial(entityId, positionCommandToSettings(command));
        return;
      case "stroke":
        await coordinator.applyPartial(entityId, strokeCommandToSettings(command, current.strokeRange));
        return;
      case "thrusting":
        await coordinator.applyPartial(entityId, thrustingCommandToSettings(command));
        return;
      default:
        throw new Error(`No controllable facet for ${entityId}/${property}`);
    }
  }

  async subscribe(cb: StateChangeCallback): Promise<void> {
    const coordinator = this.coordinator;
    if (!coordinator) return; // no-op in onboarding mode
    this.stateCallback = cb;

    coordinator.on("inventory:changed", (inventory) => this.emitInventory(inventory));
    coordinator.on("desired:changed", (accessoryId, state) => {
      const accessory = coordinator.inventory.get(accessoryId);
      if (accessory) this.emitDesired(accessory, state);
    });
    coordinator.on("pairing:state", () => this.emitBridge(coordinator));
    coordinator.on("pairing:code", () => this.emitBridge(coordinator));
    coordinator.on("accessories:added", () => {
      this.registrationCallback?.(this.buildRegistration(coordinator));
    });

    await this.startReceiver();
    coordinator.start();
  }

  onRegistrationChange(cb: RegistrationChangeCallback): void {
    this.registrationCallback = cb;
  }

  async ping(): Promise<boolean> {
    if (!this.coordinator) return true; // process is alive
    return this.coordinator.lastUpdateAt === null || this.coordinator.lastUpdateSuccess;
  }

  async destroy(): Promise<void> {
    if (this.coordinator) {
      this.registry.unregister(this.coordinator);
      this.coordinator.destroy();
    }
    if (this.server) {
      await this.server.close();
      this.server = null;
    }
    this.stateCallback = null;
    this.registrationCallback = null;
    this.stateCache.clear();
  }

  /** Request a pairing QR code for the user to scan in the vendor app. */
  async pair(): Promise<PairResult> {
    const coordinator = this.coordinator;
    if (!coordinator) {
      return { success: false, error: "user_id and developer_token must be configured before pairing" };
    }

    const endpoint = coordinator.endpoint;
    if (coordinator.state === "paired" && endpoint) {
      return { success: true, message: `Already paired with ${endpoint.domain}:${endpoint.httpsPort}` };
    }

    try {
      await coordinator.refresh();
    } catch (err) {
      return { success: false, error: describe(err) };
    }

    const code = coordinator.pairingCode;
    if (!code?.qrCodeUrl) {
      return { success: false, error: "The relay returned no QR code" };
    }
    const suffix = code.code ? ` (code ${code.code})` : "";
    return {
      success: true,
      message: `Scan ${code.qrCodeUrl}${suffix} with the Lovense Remote app`,
    };
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private requireCoordinator(): LovenseCoordinator {
    if (!this.coordinator) throw new Error("Adapter not configured");
    return this.coordinator;
  }

  private requireAccessory(coordinator: LovenseCoordinator, entityId: string): Accessory {
    const accessory = coordinator.inventory.get(entityId);
    if (!accessory) throw new Error(`Unknown entity: ${entityId}`);
    return accessory;
  }

  private requireProperty(accessory: Accessory, property: PropertyName): EntityRegistration["properties"][number] {
    const registered = accessoryToRegistration(accessory).properties.find((p) => p.property === property);
    if (!registered) {
      throw new Error(`${accessory.displayName} does not support ${property}`);
    }
    return registered;
  }

  private facetState(property: PropertyName, accessory: Accessory, desired: DesiredState): Record<string, unknown> {
    switch (property) {
      case "vibration": return vibrationToState(desired);
      case "position": return positionToState(desired);
      case "stroke": return strokeToState(desired);
      case "thrusting": return thrustingToState(desired);
      case "battery": return accessoryToBattery(accessory);
      case "connectivity": return accessoryToConnectivity(accessory);
    }
  }

  private buildRegistration(coordinator: LovenseCoordinator): RegistrationResult {
    const entities = [
      BRIDGE_REGISTRATION,
      ...[...coordinator.inventory.values()].map(accessoryToRegistration),
    ];
    const record = coordinator.record;
    const groups: EntityGroup[] = [{
      id: `account:${record.userId}`,
      name: record.userName || record.userId,
      type: "account",
      entityIds: entities.map((e) => e.entityId),
    }];
    return { entities, groups };
  }

  private async startReceiver(): Promise<void> {
    const cfg = this.config;
    if (!cfg || cfg.callbackPort === 0 || this.server) return;
    try {
      this.server = await this.startServer(new CallbackRouter(this.registry), {
        port: cfg.callbackPort,
        path: cfg.callbackPath,
      });
    } catch (err) {
      // Pairing callbacks will not arrive; commands still work once paired elsewhere
      console.error(`Callback receiver failed to start on port ${cfg.callbackPort}: ${describe(err)}`);
    }
  }

  private emit(entityId: string, property: PropertyName, state: Record<string, unknown>): void {
    const entityCache = this.stateCache.get(entityId) ?? new Map<PropertyName, Record<string, unknown>>();
    const previous = entityCache.get(property);
    // Only emit if something actually changed
    if (previous && JSON.stringify(previous) === JSON.stringify(state)) return;
    entityCache.set(property, state);
    this.stateCache.set(entityId, entityCache);
    this.stateCallback?.(entityId, property, state);
  }

  private emitInventory(inventory: AccessoryInventory): void {
    for (const accessory of inventory.values()) {
      this.emit(accessory.id, "battery", accessoryToBattery(accessory));
      this.emit(accessory.id, "connectivity", accessoryToConnectivity(accessory));
    }
  }

  private emitDesired(accessory: Accessory, desired: DesiredState): void {
    for (const { property, readOnly } of accessoryToRegistration(accessory).properties) {
      if (readOnly) continue;
      this.emit(accessory.id, property, this.facetState(property, accessory, desired));
    }
  }

  private emitBridge(coordinator: LovenseCoordinator): void {
    this.emit(BRIDGE_ENTITY_ID, "connectivity", bridgeToState(coordinator.state, coordinator.endpoint, coordinator.pairingCode));
  }
}
