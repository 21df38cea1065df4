// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { ErrorCode, errorObject, type ErrorObject } from "./errors.js";
import type { Id } from "./id.js";
import { createLogger, type Logger } from "./logging.js";
import { MethodResponse, serializeError, type CallOutcome } from "./response.js";

const defaultLogger = createLogger("egress:batch");

/**
 * Response to a batch request: either a JSON array of member envelopes, or a single error
 * envelope when the batch as a whole could not be answered.
 */
export class BatchResponse {
  constructor(
    readonly body: string,
    readonly success: boolean
  ) {}

  static error(id: Id, error: ErrorObject): BatchResponse {
    return new BatchResponse(serializeError(id, error), false);
  }
}

const invalidBatch = () => BatchResponse.error(null, errorObject(ErrorCode.INVALID_REQUEST));

/**
 * Assembles a batch response under a single byte limit for the whole array.
 *
 * JSON arrays cannot be truncated into something valid, so once the limit is hit the batch
 * is abandoned and the caller gets an `Invalid request` error to send instead. Callers should
 * stop executing the remaining calls at that point.
 */
export class BatchResponseBuilder {
  #parts: string[] = [];
  // Bytes used so far, starting with the opening bracket.
  #size = 1;
  #maxResponseSize: number;
  #aborted = false;

  private constructor(maxResponseSize: number) {
    this.#maxResponseSize = maxResponseSize;
  }

  static newWithLimit(limit: number): BatchResponseBuilder {
    return new BatchResponseBuilder(limit);
  }

  /**
   * Append one member response.
   *
   * @returns the error response to send instead of the batch when the limit is exceeded,
   *     otherwise `undefined`
   */
  append(response: MethodResponse): BatchResponse | undefined {
    // Each entry is followed by one byte: a comma, or the closing bracket after the last one.
    const size = this.#size + Buffer.byteLength(response.body, "utf8") + 1;

    if (this.#aborted || size > this.#maxResponseSize) {
      this.#aborted = true;
      this.#parts = [];
      return invalidBatch();
    }
    this.#parts.push(response.body);
    this.#size = size;
    return undefined;
  }

  isEmpty(): boolean {
    return this.#parts.length === 0;
  }

  finish(): BatchResponse {
    if (this.#aborted || this.isEmpty()) {
      return invalidBatch();
    }
    return new BatchResponse(`[${this.#parts.join(",")}]`, true);
  }
}

/**
 * One call of a batch, in request order.
 */
export type BatchEntry = { id: Id; outcome: CallOutcome };

/**
 * Serialize the outcomes of a batch of calls into one response.
 *
 * `entries` is consumed lazily: if the limit is exceeded no further entries are pulled, so
 * a generator that executes calls on demand does no wasted work.
 */
export async function buildBatchResponse(
    entries: Iterable<BatchEntry> | AsyncIterable<BatchEntry>,
    maxResponseSize: number,
    logger: Logger = defaultLogger): Promise<BatchResponse> {
  const builder = BatchResponseBuilder.newWithLimit(maxResponseSize);

  for await (const { id, outcome } of entries) {
    const rejected = builder.append(MethodResponse.fromOutcome(id, outcome, maxResponseSize, logger));
    if (rejected) {
      logger.debug("Batch response exceeded limit", { maxResponseSize });
      return rejected;
    }
  }

  return builder.finish();
}
