import { DesiredStateStore } from "./desired-state.js";
import { CommandError, LovenseError, UpdateFailed } from "./errors.js";
import { EventBus, type CoordinatorEvents, type InventorySource } from "./event-bus.js";
import { parseInventory } from "./inventory.js";
import { PairingStateMachine } from "./pairing.js";
import { patternCommand, presetCommand, translate } from "./translators.js";
import type { QrCodeData } from "./relay-client.js";
import type { InventoryFetch, VendorTransport } from "./transport.js";
import {
  PAIRING_CODE_TTL_MS,
  type AccessoryInventory,
  type DesiredState,
  type EndpointInfo,
  type PairingCallback,
  type PairingCode,
  type PairingRecord,
  type PairingState,
  type PartialSettings,
  type PresetName,
  type VendorCommand,
  type VendorResponse,
} from "./types.js";

export interface CoordinatorOptions {
  refreshIntervalMs: number;
  now?: () => number;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One per configured account. Owns the desired state of every accessory,
 * the pairing lifecycle and the accessory inventory; everything that talks
 * to the vendor goes through the injected transport.
 */
export class LovenseCoordinator {
  private store = new DesiredStateStore();
  private pairing = new PairingStateMachine();
  private events = new EventBus();
  private _inventory: AccessoryInventory = new Map();
  private _pairingCode: PairingCode | null = null;
  private _lastUpdateSuccess = false;
  private _lastUpdateAt: number | null = null;
  private inFlight: Promise<void> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private now: () => number;

  constructor(
    readonly record: PairingRecord,
    private transport: VendorTransport,
    private options: CoordinatorOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.pairing.onChange((state, previous) => {
      console.info(`Pairing state: ${previous} → ${state}`);
      this.events.emit("pairing:state", state, previous);
    });
  }

  get userId(): string {
    return this.record.userId;
  }

  get state(): PairingState {
    return this.pairing.state;
  }

  get endpoint(): EndpointInfo | null {
    return this.pairing.endpoint;
  }

  get lastUpdateSuccess(): boolean {
    return this._lastUpdateSuccess;
  }

  /** When the last refresh finished, successfully or not; null before the first. */
  get lastUpdateAt(): number | null {
    return this._lastUpdateAt;
  }

  get refreshing(): boolean {
    return this.inFlight !== null;
  }

  /** The last QR code, or null once it has expired. */
  get pairingCode(): PairingCode | null {
    if (this._pairingCode && this._pairingCode.expiresAt <= this.now()) {
      this._pairingCode = null;
    }
    return this._pairingCode;
  }

  get inventory(): AccessoryInventory {
    return new Map(this._inventory);
  }

  getDesiredState(accessoryId: string): DesiredState {
    return this.store.get(accessoryId);
  }

  on<K extends keyof CoordinatorEvents>(event: K, listener: CoordinatorEvents[K]): void {
    this.events.on(event, listener);
  }

  off<K extends keyof CoordinatorEvents>(event: K, listener: CoordinatorEvents[K]): void {
    this.events.off(event, listener);
  }

  // ── Refresh ───────────────────────────────────────────────────────────────

  /**
   * Unpaired: request a fresh QR code. Paired: reload the toy list.
   * Concurrent callers share the refresh that is already running.
   */
  refresh(): Promise<void> {
    if (this.inFlight) return this.inFlight;
    const run = this.runRefresh().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  /** One scheduler tick. Skipped while a refresh is running; never rejects. */
  async tick(): Promise<void> {
    if (this.inFlight) {
      console.debug("Refresh still in flight, skipping tick");
      return;
    }
    try {
      await this.refresh();
    } catch (err) {
      console.warn(`Refresh failed, retrying next tick: ${describe(err)}`);
    }
  }

  start(): void {
    if (this.timer) return;
    this.tick().catch((err) => console.error("Refresh tick error:", err));
    this.timer = setInterval(() => {
      this.tick().catch((err) => console.error("Refresh tick error:", err));
    }, this.options.refreshIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async runRefresh(): Promise<void> {
    try {
      if (this.pairing.needsPairingCode) {
        await this.requestPairingCode();
      } else {
        await this.reloadInventory();
      }
      this._lastUpdateSuccess = true;
      this._lastUpdateAt = this.now();
    } catch (err) {
      this._lastUpdateSuccess = false;
      this._lastUpdateAt = this.now();
      if (err instanceof UpdateFailed) throw err;
      throw new UpdateFailed(`Error communicating with API: ${describe(err)}`, { cause: err });
    }
  }

  private async requestPairingCode(): Promise<void> {
    this.pairing.beginPairingRequest();
    let data: QrCodeData;
    try {
      data = await this.transport.requestPairingCode();
    } catch (err) {
      throw new UpdateFailed(`Pairing code request failed: ${describe(err)}`, { cause: err });
    }
    if (!this.pairing.needsPairingCode) {
      console.debug("Paired while the code request was in flight, discarding the code");
      return;
    }

    const issuedAt = this.now();
    const code: PairingCode = {
      qrCodeUrl: typeof data.qr === "string" ? data.qr : null,
      code: typeof data.code === "string" ? data.code : null,
      issuedAt,
      expiresAt: issuedAt + PAIRING_CODE_TTL_MS,
    };
    this._pairingCode = code;
    console.info("QR code generated successfully");
    this.events.emit("pairing:code", code);
  }

  private async reloadInventory(): Promise<void> {
    const endpoint = this.pairing.endpoint;
    if (!endpoint) {
      throw new UpdateFailed("Paired without a local endpoint");
    }

    let fetched: InventoryFetch;
    try {
      fetched = await this.transport.fetchInventory(endpoint);
    } catch (err) {
      throw new UpdateFailed(`Toy list request failed: ${describe(err)}`, { cause: err });
    }

    const { inventory, skipped } = parseInventory(fetched.toys);
    for (const error of skipped) {
      console.warn(error.message);
    }
    this.replaceInventory(inventory, fetched.source);
  }

  // ── Commands ──────────────────────────────────────────────────────────────

  /**
   * Merge a facet's change into the accessory's desired state and send the
   * one command that realizes the whole state. Merge and translate run
   * before the first await, so concurrent calls never interleave there.
   */
  async applyPartial(accessoryId: string, partial: PartialSettings): Promise<DesiredState> {
    const state = this.store.merge(accessoryId, partial);
    const command = translate(state);
    this.events.emit("desired:changed", accessoryId, state);

    await this.sendToAccessory(accessoryId, command);
    return state;
  }

  async sendPattern(
    accessoryId: string,
    strengths: number[],
    intervalMs?: number,
    durationSec?: number,
  ): Promise<void> {
    await this.sendToAccessory(accessoryId, patternCommand(strengths, intervalMs, durationSec));
  }

  async sendPreset(accessoryId: string, name: PresetName): Promise<void> {
    await this.sendToAccessory(accessoryId, presetCommand(name));
  }

  private async sendToAccessory(accessoryId: string, command: VendorCommand): Promise<VendorResponse> {
    const endpoint = this.pairing.endpoint;
    if (!endpoint) {
      throw new CommandError(accessoryId, "No local connection available; scan the pairing QR code first");
    }

    try {
      return await this.transport.send(command, accessoryId, endpoint);
    } catch (err) {
      console.error(`Command ${command.command} failed for ${accessoryId}: ${describe(err)}`);
      if (err instanceof LovenseError) {
        throw new CommandError(accessoryId, `Command failed: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  // ── Callback ──────────────────────────────────────────────────────────────

  /**
   * Apply a decoded vendor callback. Returns without waiting for any
   * refresh; the next scheduler tick picks up from the new state.
   */
  onPairingCallback(callback: PairingCallback): void {
    if (callback.endpoint) {
      // The code has been scanned
      this._pairingCode = null;
      this.pairing.completePairing(callback.endpoint);
      console.info(`Device info updated: ${callback.endpoint.domain}:${callback.endpoint.httpsPort}`);
    }
    this.replaceInventory(callback.inventory, "callback");
  }

  private replaceInventory(inventory: AccessoryInventory, source: InventorySource): void {
    const previous = this._inventory;
    this._inventory = new Map(inventory);

    const added = [...inventory.keys()].filter((id) => !previous.has(id));
    this.events.emit("inventory:changed", this.inventory, source);
    if (added.length > 0) {
      console.info(`New toys detected: ${added.join(", ")}`);
      this.events.emit("accessories:added", added);
    }
  }

  destroy(): void {
    this.stop();
    this.transport.destroy();
    this.store.clear();
    this.pairing.reset();
    this.events.clear();
  }
}
