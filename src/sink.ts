// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { UNLIMITED } from "./config.js";
import { toErrorObject, type ErrorObject } from "./errors.js";
import type { Sender, Permit } from "./channel.js";
import type { Id } from "./id.js";
import { createLogger, txLog, type Logger } from "./logging.js";
import { serializeError } from "./response.js";

const defaultLogger = createLogger("egress:sink");

export interface MethodSinkOptions {
  /**
   * Maximum size in bytes of a response built for this connection. Default: unlimited.
   */
  maxResponseSize?: number;

  /**
   * Maximum bytes of each outgoing message shown in the trace log. Default: unlimited.
   */
  maxLogLength?: number;

  logger?: Logger;
}

/**
 * Where responses and notifications for one client connection are sent.
 *
 * Every call and subscription task of the connection holds its own clone; all clones feed the
 * same bounded queue, which the transport drains. Every message sent through any path is
 * recorded in the trace log, cut to `maxLogLength` bytes.
 */
export class MethodSink {
  #tx: Sender<string>;
  #maxResponseSize: number;
  #maxLogLength: number;
  #logger: Logger;

  constructor(tx: Sender<string>, options: MethodSinkOptions = {}) {
    this.#tx = tx;
    this.#maxResponseSize = options.maxResponseSize ?? UNLIMITED;
    this.#maxLogLength = options.maxLogLength ?? UNLIMITED;
    this.#logger = options.logger ?? defaultLogger;
  }

  /**
   * A handle on the same queue, with the same limits.
   */
  clone(): MethodSink {
    return new MethodSink(this.#tx.clone(), {
      maxResponseSize: this.#maxResponseSize,
      maxLogLength: this.#maxLogLength,
      logger: this.#logger,
    });
  }

  get maxResponseSize(): number {
    return this.#maxResponseSize;
  }

  get maxLogLength(): number {
    return this.#maxLogLength;
  }

  get logger(): Logger {
    return this.#logger;
  }

  /**
   * Whether the connection is gone. Once true, stays true.
   */
  isClosed(): boolean {
    return this.#tx.isClosed();
  }

  /**
   * Resolves once the connection is gone; every later call resolves immediately.
   */
  closed(): Promise<void> {
    return this.#tx.closed();
  }

  /**
   * Call `listener` once the connection is gone. Returns a function that detaches it.
   */
  onClose(listener: () => void): () => void {
    return this.#tx.onClose(listener);
  }

  /**
   * Send without waiting.
   *
   * @throws TrySendError carrying `msg` if the queue is full or the connection is gone
   */
  trySend(msg: string): void {
    txLog(this.#logger, msg, this.#maxLogLength);
    this.#tx.trySend(msg);
  }

  /**
   * Send, waiting for room in the queue if needed.
   *
   * @throws DisconnectError carrying `msg` if the connection is gone
   */
  async send(msg: string): Promise<void> {
    txLog(this.#logger, msg, this.#maxLogLength);
    await this.#tx.send(msg);
  }

  /**
   * Wait for room for one message and hold it. Lets a caller find out that delivery is still
   * possible before it builds the message.
   *
   * @throws DisconnectError if the connection is gone
   */
  async reserve(): Promise<MethodSinkPermit> {
    const permit = await this.#tx.reserve();
    return new MethodSinkPermit(permit, this.#maxLogLength, this.#logger);
  }
}

/**
 * Room for exactly one message on a `MethodSink`. Each send method consumes it;
 * `release()` hands the room back unused, as does leaving a `using` block:
 *
 * ```typescript
 * using permit = await sink.reserve();
 * permit.sendRaw(await buildResponse());
 * ```
 */
export class MethodSinkPermit {
  #tx: Permit<string>;
  #maxLogLength: number;
  #logger: Logger;

  constructor(tx: Permit<string>, maxLogLength: number, logger: Logger) {
    this.#tx = tx;
    this.#maxLogLength = maxLogLength;
    this.#logger = logger;
  }

  /**
   * Send a JSON-RPC error response.
   */
  sendError(id: Id, error: ErrorObject): void {
    this.sendRaw(serializeError(id, error, this.#logger));
  }

  /**
   * Send whatever a method handler threw as a JSON-RPC error response.
   */
  sendCallError(id: Id, err: unknown): void {
    this.sendError(id, toErrorObject(err));
  }

  /**
   * Send a message as-is. The text is not checked to be valid JSON.
   *
   * @throws PermitConsumedError if the permit was already used
   */
  sendRaw(json: string): void {
    if (!this.#tx.send(json)) {
      this.#logger.debug("Connection closed after reservation; message dropped");
    }
    txLog(this.#logger, json, this.#maxLogLength);
  }

  release(): void {
    this.#tx.release();
  }

  [Symbol.dispose](): void {
    this.#tx.release();
  }
}
