import { createInterface } from "node:readline";
import type { AdapterFactory, Adapter } from "./types.js";
import type { ParentMessage, ChildMessage, LogMessage } from "./protocol.js";
import { PROTOCOL_VERSION, decodeParentMessage } from "./protocol.js";

export interface HarnessIO {
  send(msg: ChildMessage): void;
  exit(code: number): void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatLogArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (typeof a === "string") return a;
      if (a instanceof Error) return a.message;
      return JSON.stringify(a);
    })
    .join(" ");
}

/**
 * Routes host messages to a single adapter instance. Every request that
 * carries a requestId gets exactly one reply.
 */
export class AdapterHarness {
  private adapter: Adapter | null = null;

  constructor(
    private factory: AdapterFactory,
    private io: HarnessIO,
  ) {}

  get initialized(): boolean {
    return this.adapter !== null;
  }

  async handle(msg: ParentMessage): Promise<void> {
    switch (msg.type) {
      case "init": {
        if (msg.protocolVersion !== PROTOCOL_VERSION) {
          this.io.send({
            type: "error",
            message: `Protocol version mismatch: expected ${PROTOCOL_VERSION}, got ${msg.protocolVersion}`,
          });
          this.io.exit(1);
          return;
        }
        try {
          const adapter = this.factory(msg.config);
          this.adapter = adapter;
          const { entities, groups } = await adapter.register();

          adapter.onRegistrationChange?.((result) => {
            this.io.send({ type: "entities_changed", entities: result.entities, groups: result.groups });
          });

          await adapter.subscribe((entityId, property, state) => {
            this.io.send({ type: "state_changed", entityId, property, state });
          });

          this.io.send({ type: "ready", entities, groups });
        } catch (err) {
          this.io.send({ type: "error", message: `Init failed: ${errorMessage(err)}` });
          this.io.exit(1);
        }
        return;
      }

      case "observe": {
        if (!this.adapter) {
          this.io.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        try {
          const state = await this.adapter.observe(msg.entityId, msg.property);
          this.io.send({ type: "observe_result", requestId: msg.requestId, state });
        } catch (err) {
          this.io.send({ type: "error", requestId: msg.requestId, message: errorMessage(err) });
        }
        return;
      }

      case "execute": {
        if (!this.adapter) {
          this.io.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        try {
          await this.adapter.execute(msg.entityId, msg.property, msg.command);
          this.io.send({ type: "execute_result", requestId: msg.requestId, success: true });
        } catch (err) {
          this.io.send({
            type: "execute_result",
            requestId: msg.requestId,
            success: false,
            error: errorMessage(err),
          });
        }
        return;
      }

      case "ping": {
        if (!this.adapter) {
          this.io.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        try {
          const alive = await this.adapter.ping();
          if (alive) {
            this.io.send({ type: "pong", requestId: msg.requestId });
          } else {
            this.io.send({ type: "error", requestId: msg.requestId, message: "Adapter reports unhealthy" });
          }
        } catch (err) {
          this.io.send({ type: "error", requestId: msg.requestId, message: errorMessage(err) });
        }
        return;
      }

      case "pair": {
        if (!this.adapter) {
          this.io.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        if (!this.adapter.pair) {
          this.io.send({
            type: "pair_result",
            requestId: msg.requestId,
            success: false,
            error: "This adapter does not support pairing",
          });
          return;
        }
        try {
          const result = await this.adapter.pair(msg.params);
          this.io.send({
            type: "pair_result",
            requestId: msg.requestId,
            success: result.success,
            credentials: result.credentials,
            error: result.error,
            message: result.message,
          });
        } catch (err) {
          this.io.send({
            type: "pair_result",
            requestId: msg.requestId,
            success: false,
            error: errorMessage(err),
          });
        }
        return;
      }

      case "shutdown": {
        if (this.adapter) {
          await this.adapter.destroy();
          this.adapter = null;
        }
        this.io.exit(0);
        return;
      }
    }
  }
}

/** Intercept console.* so adapter authors can use them normally. */
function interceptConsole(send: (msg: ChildMessage) => void): void {
  const log = (level: LogMessage["level"]) => (...args: unknown[]) =>
    send({ type: "log", level, message: formatLogArgs(args) });
  console.log = log("info");
  console.info = log("info");
  console.warn = log("warn");
  console.error = log("error");
  console.debug = log("debug");
}

/**
 * Entry point for adapter processes. Call this with your adapter factory
 * at the top level of your entry file:
 *
 * ```ts
 * import { runAdapter } from "@toylink/adapter-sdk";
 * runAdapter((config) => new MyAdapter(config));
 * ```
 */
export function runAdapter(factory: AdapterFactory): void {
  const send = (msg: ChildMessage): void => {
    process.stdout.write(JSON.stringify(msg) + "\n");
  };
  interceptConsole(send);

  const harness = new AdapterHarness(factory, {
    send,
    exit: (code) => process.exit(code),
  });

  const rl = createInterface({ input: process.stdin });

  rl.on("line", (line) => {
    const msg = decodeParentMessage(line);
    if (!msg) {
      process.stderr.write(`[adapter-sdk] Failed to parse message: ${line}\n`);
      return;
    }

    harness.handle(msg).catch((err) => {
      send({ type: "error", message: `Unhandled error: ${errorMessage(err)}` });
    });
  });

  rl.on("close", () => {
    // stdin closed, parent is gone
    process.exit(0);
  });
}
