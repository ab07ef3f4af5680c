import { z } from "zod";
import { PairingError, TransportError } from "./errors.js";
import { classifyResponse } from "./local-client.js";
import { API_COMMAND_SERVER, API_GET_QRCODE, type PairingRecord, type VendorResponse } from "./types.js";

const QR_SUCCESS_CODE = 0;
const RELAY_SUCCESS_CODES = [200, 0] as const;

const qrCodeDataSchema = z.object({
  qr: z.string().optional(),
  code: z.union([z.string(), z.number()]).transform(String).optional(),
}).passthrough();

export type QrCodeData = z.infer<typeof qrCodeDataSchema>;

/** Vendor cloud API: pairing codes and the server-side command channel. */
export class RelayApiClient {
  constructor(
    private record: PairingRecord,
    private timeoutMs: number,
  ) {}

  /** Ask the relay for a fresh pairing QR code. Repeating this is harmless. */
  async getQrCode(): Promise<QrCodeData> {
    let response: VendorResponse;
    try {
      response = await this.post("QR code request", API_GET_QRCODE, {
        token: this.record.developerToken,
        uid: this.record.userId,
        uname: this.record.userName,
        v: 2,
      }, [QR_SUCCESS_CODE]);
    } catch (err) {
      if (err instanceof TransportError) {
        throw new PairingError(err.message, { cause: err, vendorCode: err.vendorCode });
      }
      throw err;
    }

    const parsed = qrCodeDataSchema.safeParse(response.data);
    return parsed.success ? parsed.data : {};
  }

  async getToys(): Promise<unknown> {
    const response = await this.post("Relay GetToys", API_COMMAND_SERVER, {
      token: this.record.developerToken,
      uid: this.record.userId,
      command: "GetToys",
      apiVer: 1,
    }, RELAY_SUCCESS_CODES);
    return response.data ?? null;
  }

  private async post(
    label: string,
    url: string,
    body: Record<string, unknown>,
    successCodes: readonly number[],
  ): Promise<VendorResponse> {
    let status: number;
    let raw: string;
    try {
      const res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = res.status;
      raw = await res.text();
    } catch (err) {
      const reason = err instanceof Error && err.name === "TimeoutError"
        ? `timed out after ${this.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new TransportError(`${label}: ${reason}`, { cause: err });
    }

    return classifyResponse(label, status, raw, successCodes);
  }
}
