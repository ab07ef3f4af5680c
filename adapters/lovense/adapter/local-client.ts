import https from "node:https";
import { z } from "zod";
import { TransportError } from "./errors.js";
import { describeVendorCode } from "./translators.js";
import { LOCAL_COMMAND_PATH, type CommandBody, type EndpointInfo, type VendorResponse } from "./types.js";

export const LOCAL_SUCCESS_CODE = 200;

const vendorResponseSchema = z.object({
  code: z.number(),
  type: z.string().optional().catch(undefined),
  message: z.string().optional().catch(undefined),
  data: z.unknown().optional(),
});

/**
 * Turn a raw HTTP exchange into a vendor response, or a TransportError
 * describing which layer failed.
 */
export function classifyResponse(
  label: string,
  statusCode: number | undefined,
  raw: string,
  successCodes: readonly number[],
): VendorResponse {
  if (statusCode !== undefined && statusCode >= 400) {
    throw new TransportError(`${label}: HTTP ${statusCode}${raw ? `: ${raw.slice(0, 200)}` : ""}`, { statusCode });
  }

  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (err) {
    throw new TransportError(`${label}: invalid JSON response`, { statusCode, cause: err });
  }
  const parsed = vendorResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new TransportError(`${label}: response has no status code`, { statusCode });
  }

  const response: VendorResponse = parsed.data;
  if (!successCodes.includes(response.code)) {
    const detail = response.message ?? describeVendorCode(response.code);
    throw new TransportError(`${label}: vendor code ${response.code} (${detail})`, {
      statusCode,
      vendorCode: response.code,
    });
  }
  return response;
}

export interface LocalClientOptions {
  platformName: string;
  timeoutMs: number;
}

/**
 * Talks to the vendor companion app on the same network. The app serves
 * a self-signed certificate, so verification is off; the timeout bounds
 * every call from request to last byte.
 */
export class LocalApiClient {
  private agent: https.Agent;
  private url: URL;

  constructor(
    readonly endpoint: EndpointInfo,
    private options: LocalClientOptions,
  ) {
    this.agent = new https.Agent({ rejectUnauthorized: false, keepAlive: true });
    this.url = new URL(LOCAL_COMMAND_PATH, `https://${endpoint.domain}:${endpoint.httpsPort}`);
  }

  async command(body: CommandBody): Promise<VendorResponse> {
    const label = `Local ${body.command}`;
    const raw = await this.post(label, JSON.stringify(body));
    return classifyResponse(label, raw.statusCode, raw.body, [LOCAL_SUCCESS_CODE]);
  }

  async getToys(): Promise<unknown> {
    const response = await this.command({ command: "GetToys", apiVer: 1 });
    return response.data ?? null;
  }

  destroy(): void {
    this.agent.destroy();
  }

  /** The deadline covers the whole exchange, not just socket idle time. */
  private post(label: string, payload: string): Promise<{ statusCode: number | undefined; body: string }> {
    return new Promise((resolve, reject) => {
      const timeoutMs = this.options.timeoutMs;
      const fail = (err: Error): void => {
        clearTimeout(timer);
        reject(err instanceof TransportError ? err : new TransportError(`${label}: ${err.message}`, { cause: err }));
      };

      const req = https.request(
        this.url,
        {
          method: "POST",
          agent: this.agent,
          headers: {
            "Content-Type": "application/json",
            "Content-Length": Buffer.byteLength(payload),
            "X-platform": this.options.platformName,
          },
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => chunks.push(chunk));
          res.on("end", () => {
            clearTimeout(timer);
            resolve({ statusCode: res.statusCode, body: Buffer.concat(chunks).toString("utf-8") });
          });
          res.on("error", fail);
        },
      );
      const timer = setTimeout(() => {
        fail(new TransportError(`${label}: timed out after ${timeoutMs}ms`));
        req.destroy();
      }, timeoutMs);
      req.on("error", fail);
      req.write(payload);
      req.end();
    });
  }
}
