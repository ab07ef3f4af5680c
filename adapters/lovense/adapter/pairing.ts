import type { EndpointInfo, PairingState } from "./types.js";

export type PairingListener = (state: PairingState, previous: PairingState) => void;

/**
 * Tracks whether a local endpoint is known.
 *
 *   unpaired ──request──▶ awaiting_callback ──callback──▶ paired
 *
 * Polling can only ever request a new QR code. The `paired` state is
 * entered from the vendor callback alone, and command failures never
 * leave it.
 */
export class PairingStateMachine {
  private _state: PairingState = "unpaired";
  private _endpoint: EndpointInfo | null = null;
  private callbackSinceRequest = false;
  private listeners = new Set<PairingListener>();

  get state(): PairingState {
    return this._state;
  }

  get endpoint(): EndpointInfo | null {
    return this._endpoint ? { ...this._endpoint } : null;
  }

  /** True until a callback has supplied an endpoint after the latest request. */
  get needsPairingCode(): boolean {
    return !(this._state === "paired" && this.callbackSinceRequest);
  }

  onChange(listener: PairingListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Called right before a QR-code request goes out. */
  beginPairingRequest(): void {
    if (!this.needsPairingCode) {
      throw new Error("Pairing request while paired and current");
    }
    this.callbackSinceRequest = false;
    this.transition("awaiting_callback");
  }

  completePairing(endpoint: EndpointInfo): void {
    this._endpoint = { ...endpoint };
    this.callbackSinceRequest = true;
    this.transition("paired");
  }

  reset(): void {
    this._endpoint = null;
    this.callbackSinceRequest = false;
    this.transition("unpaired");
  }

  private transition(next: PairingState): void {
    const previous = this._state;
    this._state = next;
    if (previous === next) return;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
