import { describeError } from "../../shared/errors";

/** Raised when both connect attempts are exhausted. */
export class ConnectionError extends Error {
  readonly address: string;

  constructor(address: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
    this.address = address;
  }

  static fromCause(address: string, cause: unknown): ConnectionError {
    return new ConnectionError(
      address,
      `Failed to connect to ${address}: ${describeError(cause)}`,
      { cause }
    );
  }
}

/**
 * The transport handed back a session that is not actually connected. Callers
 * handle it exactly like a ConnectionError.
 */
export class NotConnectedError extends ConnectionError {
  constructor(address: string) {
    super(address, `Transport reported ${address} as not connected after connect.`);
    this.name = "NotConnectedError";
  }
}

export type TransportOperation =
  | "scan"
  | "listServices"
  | "subscribe"
  | "unsubscribe"
  | "disconnect";

export class TransportCallError extends Error {
  readonly operation: TransportOperation;

  constructor(operation: TransportOperation, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportCallError";
    this.operation = operation;
  }

  static wrap(operation: TransportOperation, cause: unknown): TransportCallError {
    if (cause instanceof TransportCallError) return cause;
    return new TransportCallError(operation, `${operation} failed: ${describeError(cause)}`, {
      cause,
    });
  }
}
