// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

/**
 * Error codes, wire error objects and the error classes thrown by this package.
 *
 * Two families live here:
 * - JSON-RPC error objects (`ErrorObject`), which are serialized to the client.
 * - `EgressError` subclasses, which are thrown to local callers (channel closure, capacity
 *   overflow, serialization failure) and never leave the process as-is.
 */

// ============================================================================
// JSON-RPC Error Codes
// ============================================================================

/**
 * JSON-RPC error codes produced by the response and delivery core.
 * Codes in -32768..-32000 are reserved by the JSON-RPC 2.0 specification.
 */
export const ErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,

  /** A method handler returned an error. */
  CALL_EXECUTION_FAILED: -32000,
  /** A thrown value that is not an `Error`. */
  UNKNOWN_ERROR: -32001,

  /** Subscription stream ended normally. */
  SUBSCRIPTION_CLOSED: -32003,
  /** Subscription stream ended because of a server-side failure. */
  SUBSCRIPTION_CLOSED_WITH_ERROR: -32004,

  OVERSIZED_REQUEST: -32007,
  OVERSIZED_RESPONSE: -32008,
  SERVER_IS_BUSY: -32009,
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Canonical message text for each code.
 */
export const ErrorMessage: Record<ErrorCodeType, string> = {
  [ErrorCode.PARSE_ERROR]: "Parse error",
  [ErrorCode.INVALID_REQUEST]: "Invalid request",
  [ErrorCode.METHOD_NOT_FOUND]: "Method not found",
  [ErrorCode.INVALID_PARAMS]: "Invalid params",
  [ErrorCode.INTERNAL_ERROR]: "Internal error",
  [ErrorCode.CALL_EXECUTION_FAILED]: "Call execution failed",
  [ErrorCode.UNKNOWN_ERROR]: "Unknown error",
  [ErrorCode.SUBSCRIPTION_CLOSED]: "Subscription was completed by the server",
  [ErrorCode.SUBSCRIPTION_CLOSED_WITH_ERROR]: "Subscription was closed with an error",
  [ErrorCode.OVERSIZED_REQUEST]: "Request is too big",
  [ErrorCode.OVERSIZED_RESPONSE]: "Response is too big",
  [ErrorCode.SERVER_IS_BUSY]: "Server is busy, try again later",
};

export const OVERSIZED_RESPONSE_CODE = ErrorCode.OVERSIZED_RESPONSE;
export const OVERSIZED_RESPONSE_MSG = ErrorMessage[ErrorCode.OVERSIZED_RESPONSE];

/**
 * A JSON-RPC error object as it appears under the `error` member of a response.
 */
export type ErrorObject = {
  code: number;
  message: string;
  data?: unknown;
};

/**
 * Builds the error object for one of the standard codes, using its canonical message.
 */
export function errorObject(code: ErrorCodeType, data?: unknown): ErrorObject {
  const obj: ErrorObject = { code, message: ErrorMessage[code] };
  if (data !== undefined) {
    obj.data = data;
  }
  return obj;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for every error this package throws.
 *
 * @example
 * ```typescript
 * try {
 *   await sink.send(message);
 * } catch (error) {
 *   if (error instanceof EgressError) {
 *     console.log(`[${error.codeName}] ${error.message}`);
 *   }
 * }
 * ```
 */
export class EgressError extends Error {
  constructor(
    message: string,
    public readonly codeName: string
  ) {
    super(message);
    this.name = "EgressError";
  }

  toJSON(): { name: string; message: string; codeName: string } {
    return {
      name: this.name,
      message: this.message,
      codeName: this.codeName,
    };
  }
}

// ============================================================================
// Specific Error Types
// ============================================================================

/**
 * Thrown by a bounded writer when a write would take it past its capacity.
 * The write is not applied.
 */
export class CapacityExceededError extends EgressError {
  constructor(
    public readonly capacity: number,
    public readonly attempted: number
  ) {
    super(`Memory capacity exceeded: ${attempted} > ${capacity}`, "CAPACITY_EXCEEDED");
    this.name = "CapacityExceededError";
  }
}

/**
 * Thrown when a value cannot be encoded as JSON (BigInt, cycles).
 */
export class SerializationError extends EgressError {
  constructor(message: string) {
    super(message, "SERIALIZATION_ERROR");
    this.name = "SerializationError";
  }
}

/**
 * The receiving side of a channel is gone. Carries the value that could not be delivered,
 * if there was one.
 */
export class DisconnectError<T = undefined> extends EgressError {
  constructor(public readonly value: T) {
    super("Channel is closed", "DISCONNECTED");
    this.name = "DisconnectError";
  }
}

export type TrySendErrorKind = "full" | "closed";

/**
 * A non-blocking send failed. The value is handed back so the caller may drop, log or retry it.
 */
export class TrySendError<T> extends EgressError {
  constructor(
    public readonly kind: TrySendErrorKind,
    public readonly value: T
  ) {
    super(kind === "full" ? "Channel is full" : "Channel is closed", kind === "full" ? "FULL" : "DISCONNECTED");
    this.name = "TrySendError";
  }

  isFull(): boolean {
    return this.kind === "full";
  }

  isClosed(): boolean {
    return this.kind === "closed";
  }
}

/**
 * A permit was used after it had already been sent or released.
 */
export class PermitConsumedError extends EgressError {
  constructor() {
    super("Permit has already been consumed", "PERMIT_CONSUMED");
    this.name = "PermitConsumedError";
  }
}

/**
 * A pending subscription could not be accepted.
 */
export class SubscriptionRejectedError extends EgressError {
  constructor(message: string) {
    super(message, "SUBSCRIPTION_REJECTED");
    this.name = "SubscriptionRejectedError";
  }
}

/**
 * Invalid server configuration.
 */
export class ConfigError extends EgressError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/**
 * Thrown by method handlers to send a specific JSON-RPC error object to the client.
 *
 * @example
 * ```typescript
 * throw new CallError(errorObject(ErrorCode.INVALID_PARAMS, "expected a positive integer"));
 * ```
 */
export class CallError extends EgressError {
  constructor(public readonly errorObject: ErrorObject) {
    super(errorObject.message, "CALL_ERROR");
    this.name = "CallError";
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Converts anything a method handler may throw into the error object sent to the client.
 */
export function toErrorObject(error: unknown): ErrorObject {
  if (error instanceof CallError) {
    return error.errorObject;
  }
  if (error instanceof Error) {
    return { code: ErrorCode.CALL_EXECUTION_FAILED, message: error.message };
  }
  return { code: ErrorCode.UNKNOWN_ERROR, message: String(error) };
}
