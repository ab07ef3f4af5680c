import { TransportError } from "./errors.js";
import { toCommandBody } from "./translators.js";
import type { QrCodeData } from "./relay-client.js";
import type { CommandBody, EndpointInfo, VendorCommand, VendorResponse } from "./types.js";

export interface LocalClient {
  readonly endpoint: EndpointInfo;
  command(body: CommandBody): Promise<VendorResponse>;
  getToys(): Promise<unknown>;
  destroy(): void;
}

export interface RelayClient {
  getQrCode(): Promise<QrCodeData>;
  getToys(): Promise<unknown>;
}

export type LocalClientFactory = (endpoint: EndpointInfo) => LocalClient;

export interface InventoryFetch {
  source: "local" | "relay";
  toys: unknown;
}

export interface VendorTransport {
  send(command: VendorCommand, toyId: string, endpoint: EndpointInfo): Promise<VendorResponse>;
  fetchInventory(endpoint: EndpointInfo): Promise<InventoryFetch>;
  requestPairingCode(): Promise<QrCodeData>;
  destroy(): void;
}

/** GetToys answers either `{ toys: ... }` or the toy mapping itself. */
export function extractToys(data: unknown): unknown {
  if (typeof data === "object" && data !== null && !Array.isArray(data) && "toys" in data) {
    return data.toys;
  }
  return data;
}

function sameEndpoint(a: EndpointInfo, b: EndpointInfo): boolean {
  return a.domain === b.domain && a.httpsPort === b.httpsPort;
}

/**
 * Routes vendor calls. Commands only ever go to the local endpoint;
 * the toy list falls back to the relay when the local call fails.
 */
export class LovenseTransport implements VendorTransport {
  private local: LocalClient | null = null;

  constructor(
    private relay: RelayClient,
    private createLocal: LocalClientFactory,
  ) {}

  async send(command: VendorCommand, toyId: string, endpoint: EndpointInfo): Promise<VendorResponse> {
    return this.localFor(endpoint).command(toCommandBody(command, toyId));
  }

  async fetchInventory(endpoint: EndpointInfo): Promise<InventoryFetch> {
    try {
      const data = await this.localFor(endpoint).getToys();
      return { source: "local", toys: extractToys(data) };
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      console.warn(`Local API unavailable, using relay: ${err.message}`);
    }

    const data = await this.relay.getToys();
    return { source: "relay", toys: extractToys(data) };
  }

  requestPairingCode(): Promise<QrCodeData> {
    return this.relay.getQrCode();
  }

  destroy(): void {
    this.local?.destroy();
    this.local = null;
  }

  private localFor(endpoint: EndpointInfo): LocalClient {
    if (this.local && sameEndpoint(this.local.endpoint, endpoint)) {
      return this.local;
    }
    this.local?.destroy();
    this.local = this.createLocal(endpoint);
    return this.local;
  }
}
