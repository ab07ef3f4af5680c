import { ConfigError, RoutingError } from "./errors.js";
import { parseCallbackPayload, type CallbackParseResult } from "./inventory.js";
import type { LovenseCoordinator } from "./coordinator.js";

export type CallbackTarget = Pick<LovenseCoordinator, "userId" | "onPairingCallback">;

export interface RouteResult {
  status: 200 | 400 | 404;
  message: string;
}

/** userId → coordinator for every configured account in this process. */
export class CoordinatorRegistry {
  private coordinators = new Map<string, CallbackTarget>();

  register(coordinator: CallbackTarget): void {
    if (this.coordinators.has(coordinator.userId)) {
      console.warn(`[CallbackRouter] Replacing coordinator for user ${coordinator.userId}`);
    }
    this.coordinators.set(coordinator.userId, coordinator);
  }

  /** Removes the entry only while it still belongs to this coordinator. */
  unregister(coordinator: CallbackTarget): void {
    if (this.coordinators.get(coordinator.userId) === coordinator) {
      this.coordinators.delete(coordinator.userId);
    }
  }

  get(userId: string): CallbackTarget | undefined {
    return this.coordinators.get(userId);
  }

  get size(): number {
    return this.coordinators.size;
  }
}

export class CallbackRouter {
  constructor(private registry: CoordinatorRegistry) {}

  /** Route one decoded JSON body. Routing failures map to a status; anything else propagates. */
  route(raw: unknown): RouteResult {
    try {
      this.dispatch(raw);
      return { status: 200, message: "OK" };
    } catch (err) {
      if (err instanceof RoutingError) {
        console.warn(`[CallbackRouter] ${err.status} ${err.message}`);
        return { status: err.status, message: err.message };
      }
      throw err;
    }
  }

  private dispatch(raw: unknown): void {
    let decoded: CallbackParseResult;
    try {
      decoded = parseCallbackPayload(raw);
    } catch (err) {
      if (err instanceof ConfigError) {
        console.warn(`[CallbackRouter] ${err.message}`);
        throw new RoutingError(400, "Invalid payload");
      }
      throw err;
    }

    const { callback, skipped } = decoded;
    if (!callback.uid) {
      throw new RoutingError(400, "Missing user ID");
    }

    const coordinator = this.registry.get(callback.uid);
    if (!coordinator) {
      throw new RoutingError(404, "User not found");
    }

    for (const error of skipped) {
      console.warn(`[CallbackRouter] ${error.message}`);
    }
    console.info(`[CallbackRouter] Callback for user ${callback.uid} with ${callback.inventory.size} toy(s)`);
    coordinator.onPairingCallback(callback);
  }
}
