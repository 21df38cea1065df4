// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import {
  CapacityExceededError,
  ErrorCode,
  OVERSIZED_RESPONSE_CODE,
  OVERSIZED_RESPONSE_MSG,
  errorObject,
  type ErrorObject,
} from "./errors.js";
import type { Id } from "./id.js";
import { createLogger, type Logger } from "./logging.js";
import { BoundedWriter } from "./serialize/bounded-writer.js";
import { toJsonString, writeJson } from "./serialize/json-writer.js";

const defaultLogger = createLogger("egress:response");
const utf8 = new TextDecoder("utf-8", { fatal: true });

// ============================================================================
// Envelopes
// ============================================================================

/**
 * Result envelope. Member order is part of the wire format.
 */
export function successEnvelope(id: Id, result: unknown): { jsonrpc: "2.0"; result: unknown; id: Id } {
  return { jsonrpc: "2.0", result: result === undefined ? null : result, id };
}

/**
 * Error envelope. `data` is left out of the error object when absent.
 */
export function errorEnvelope(id: Id, error: ErrorObject): { jsonrpc: "2.0"; error: ErrorObject; id: Id } {
  const err: ErrorObject = { code: error.code, message: error.message };
  if (error.data !== undefined) {
    err.data = error.data;
  }
  return { jsonrpc: "2.0", error: err, id };
}

/**
 * Serialize an error envelope. Falls back to the internal-error envelope if `data` cannot be
 * encoded, so it always produces valid JSON.
 */
export function serializeError(id: Id, error: ErrorObject, logger: Logger = defaultLogger): string {
  try {
    return toJsonString(errorEnvelope(id, error));
  } catch (err) {
    logger.error("Error serializing error response", { error: String(err) });
    return toJsonString(errorEnvelope(id, errorObject(ErrorCode.INTERNAL_ERROR)));
  }
}

// ============================================================================
// MethodResponse
// ============================================================================

/**
 * Outcome of one method call, as handed over by dispatch.
 */
export type CallOutcome<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: ErrorObject };

/**
 * The serialized response to one method call.
 */
export class MethodResponse {
  private constructor(
    /** Serialized JSON-RPC envelope. */
    readonly body: string,
    /**
     * False when the envelope is an error: either the call failed, or its result could not
     * be sent as requested.
     */
    readonly success: boolean
  ) {}

  /**
   * Serialize a successful result. If the envelope would be larger than `maxResponseSize`
   * bytes, an oversized-response error envelope is produced instead; any other serialization
   * failure produces an internal-error envelope.
   */
  static response(id: Id, result: unknown, maxResponseSize: number, logger: Logger = defaultLogger): MethodResponse {
    const writer = new BoundedWriter(maxResponseSize);

    try {
      writeJson(successEnvelope(id, result), writer);
      return new MethodResponse(utf8.decode(writer.intoBytes()), true);
    } catch (err) {
      logger.error("Error serializing response", { error: String(err) });

      if (err instanceof CapacityExceededError) {
        const data = `Exceeded max limit of ${maxResponseSize}`;
        const oversized: ErrorObject = { code: OVERSIZED_RESPONSE_CODE, message: OVERSIZED_RESPONSE_MSG, data };
        return new MethodResponse(serializeError(id, oversized, logger), false);
      }
      return new MethodResponse(serializeError(id, errorObject(ErrorCode.INTERNAL_ERROR), logger), false);
    }
  }

  /**
   * Serialize an error response for a call that failed before producing a result.
   */
  static error(id: Id, error: ErrorObject, logger: Logger = defaultLogger): MethodResponse {
    return new MethodResponse(serializeError(id, error, logger), false);
  }

  /**
   * Serialize whichever envelope a dispatch outcome calls for.
   */
  static fromOutcome(id: Id, outcome: CallOutcome, maxResponseSize: number, logger: Logger = defaultLogger): MethodResponse {
    return outcome.ok
      ? MethodResponse.response(id, outcome.value, maxResponseSize, logger)
      : MethodResponse.error(id, outcome.error, logger);
  }
}
