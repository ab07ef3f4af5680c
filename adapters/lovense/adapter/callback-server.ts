import http from "node:http";
import type { CallbackRouter } from "./callback-router.js";

const MAX_BODY_BYTES = 1024 * 1024;

export interface CallbackServerOptions {
  port: number;
  path: string;
  host?: string;
  /** Defaults to 1 MiB */
  maxBodyBytes?: number;
}

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

export interface CallbackServer {
  server: http.Server;
  port: number;
  close(): Promise<void>;
}

function reply(res: http.ServerResponse, status: number, message: string): void {
  res.writeHead(status, { "Content-Type": "text/plain; charset=utf-8" });
  res.end(message);
}

function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflowed = false;
    req.on("data", (chunk: Buffer) => {
      if (overflowed) return;
      size += chunk.length;
      if (size > limit) {
        overflowed = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

async function handle(
  router: CallbackRouter,
  options: CallbackServerOptions,
  req: http.IncomingMessage,
  res: http.ServerResponse,
): Promise<void> {
  const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
  if (pathname !== options.path) {
    reply(res, 404, "Not found");
    return;
  }
  if (req.method !== "POST") {
    res.setHeader("Allow", "POST");
    reply(res, 405, "Method not allowed");
    return;
  }

  let body: string;
  try {
    body = await readBody(req, options.maxBodyBytes ?? MAX_BODY_BYTES);
  } catch (err) {
    if (!(err instanceof PayloadTooLargeError)) throw err;
    console.warn(`[CallbackServer] Rejected callback: ${err.message}`);
    // Drop the rest of the upload once the status is out
    res.on("finish", () => req.destroy());
    res.setHeader("Connection", "close");
    reply(res, 413, "Payload too large");
    return;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    console.warn("[CallbackServer] Rejected callback with invalid JSON");
    reply(res, 400, "Invalid JSON");
    return;
  }

  const result = router.route(payload);
  reply(res, result.status, result.message);
}

/** HTTP receiver for the vendor app's pairing callbacks. */
export function startCallbackServer(
  router: CallbackRouter,
  options: CallbackServerOptions,
): Promise<CallbackServer> {
  const server = http.createServer((req, res) => {
    handle(router, options, req, res).catch((err) => {
      console.error("[CallbackServer] Error handling callback:", err);
      if (!res.headersSent) {
        reply(res, 500, "Internal error");
      } else {
        res.end();
      }
    });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port;
      console.info(`[CallbackServer] Listening on port ${port}${options.path}`);
      resolve({
        server,
        port,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
            server.closeAllConnections();
          }),
      });
    });
  });
}
