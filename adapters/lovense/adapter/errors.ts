/**
 * Failure taxonomy for the Lovense adapter. Every vendor-communication
 * failure is caught at the coordinator boundary and re-thrown as one of
 * these, so callers can branch on the class instead of parsing messages.
 */
export class LovenseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LovenseError";
  }
}

/** QR-code request to the relay failed (network, bad token, bad response code). */
export class PairingError extends LovenseError {
  readonly vendorCode?: number;

  constructor(message: string, options?: { cause?: unknown; vendorCode?: number }) {
    super(message, options);
    this.name = "PairingError";
    this.vendorCode = options?.vendorCode;
  }
}

/** A single HTTP exchange with the device or relay failed. */
export class TransportError extends LovenseError {
  readonly statusCode?: number;
  readonly vendorCode?: number;

  constructor(
    message: string,
    options?: { cause?: unknown; statusCode?: number; vendorCode?: number },
  ) {
    super(message, options);
    this.name = "TransportError";
    this.statusCode = options?.statusCode;
    this.vendorCode = options?.vendorCode;
  }
}

export class CommandError extends LovenseError {
  readonly accessoryId: string;

  constructor(accessoryId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CommandError";
    this.accessoryId = accessoryId;
  }
}

/** A refresh tick failed; retried on the next tick. */
export class UpdateFailed extends LovenseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpdateFailed";
  }
}

export class RoutingError extends LovenseError {
  readonly status: 400 | 404;

  constructor(status: 400 | 404, message: string) {
    super(message);
    this.name = "RoutingError";
    this.status = status;
  }
}

/** Malformed input data: adapter config, inventory entries, partial updates. */
export class ConfigError extends LovenseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
