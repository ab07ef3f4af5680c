import { EventEmitter } from "node:events";
import type {
  AccessoryInventory,
  DesiredState,
  PairingCode,
  PairingState,
} from "./types.js";

export type InventorySource = "callback" | "local" | "relay";

export interface CoordinatorEvents {
  "pairing:state": (state: PairingState, previous: PairingState) => void;
  "pairing:code": (code: PairingCode) => void;
  "inventory:changed": (inventory: AccessoryInventory, source: InventorySource) => void;
  "accessories:added": (accessoryIds: string[]) => void;
  "desired:changed": (accessoryId: string, state: DesiredState) => void;
}

export class EventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends keyof CoordinatorEvents>(
    event: K,
    listener: CoordinatorEvents[K],
  ): void {
    this.emitter.on(event, listener as (...args: unknown[]) => void);
  }

  off<K extends keyof CoordinatorEvents>(
    event: K,
    listener: CoordinatorEvents[K],
  ): void {
    this.emitter.off(event, listener as (...args: unknown[]) => void);
  }

  emit<K extends keyof CoordinatorEvents>(
    event: K,
    ...args: Parameters<CoordinatorEvents[K]>
  ): void {
    this.emitter.emit(event, ...args);
  }

  clear(): void {
    this.emitter.removeAllListeners();
  }
}
