// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { DisconnectError, ErrorCode, SubscriptionRejectedError, errorObject, type ErrorObject } from "./errors.js";
import type { Id, SubscriptionId } from "./id.js";
import { MethodResponse, errorEnvelope } from "./response.js";
import { toJsonString } from "./serialize/json-writer.js";
import type { MethodSink, MethodSinkPermit } from "./sink.js";

// ============================================================================
// Close reasons
// ============================================================================

/**
 * Why the server ended a subscription.
 */
export type SubscriptionClosed =
  | { kind: "success" }
  | { kind: "error"; error: ErrorObject };

export const SubscriptionClosed = {
  /** The stream ran out of items. */
  success(): SubscriptionClosed {
    return { kind: "success" };
  },

  /** The server gave up on the stream. */
  error(error: ErrorObject): SubscriptionClosed {
    return { kind: "error", error };
  },
};

function closeReasonObject(reason: SubscriptionClosed): ErrorObject {
  return reason.kind === "success" ? errorObject(ErrorCode.SUBSCRIPTION_CLOSED) : reason.error;
}

// ============================================================================
// PendingSubscriptionSink
// ============================================================================

export interface PendingSubscriptionOptions {
  /** Id of the subscribe request, answered by `accept()` or `reject()`. */
  requestId: Id;
  /** Method name of the notifications. */
  method: string;
  subscriptionId: SubscriptionId;
  /** Fires when the client unsubscribes. */
  unsubscribe?: AbortSignal;
}

/**
 * A subscribe request that has not been answered yet.
 */
export class PendingSubscriptionSink {
  #sink: MethodSink;
  #options: PendingSubscriptionOptions;
  #settled = false;

  constructor(sink: MethodSink, options: PendingSubscriptionOptions) {
    this.#sink = sink;
    this.#options = options;
  }

  get requestId(): Id {
    return this.#options.requestId;
  }

  get method(): string {
    return this.#options.method;
  }

  get subscriptionId(): SubscriptionId {
    return this.#options.subscriptionId;
  }

  /**
   * Answer the subscribe request with the subscription id and start the subscription.
   *
   * @throws SubscriptionRejectedError if the client is gone or has already unsubscribed, or
   *     the answer could not be sent
   */
  async accept(): Promise<SubscriptionSink> {
    const { requestId, method, subscriptionId, unsubscribe } = this.#options;

    if (this.#settled) {
      throw new SubscriptionRejectedError("Subscription was already accepted or rejected");
    }
    this.#settled = true;

    if (unsubscribe?.aborted) {
      throw new SubscriptionRejectedError("Client unsubscribed before the subscription was accepted");
    }

    // Only build the response once we know it can be delivered.
    let permit: MethodSinkPermit;
    try {
      permit = await this.#sink.reserve();
    } catch (err) {
      if (err instanceof DisconnectError) {
        throw new SubscriptionRejectedError("Connection closed before the subscription was accepted");
      }
      throw err;
    }

    const response = MethodResponse.response(requestId, subscriptionId, this.#sink.maxResponseSize, this.#sink.logger);
    permit.sendRaw(response.body);

    if (!response.success) {
      throw new SubscriptionRejectedError("Subscription id response could not be serialized");
    }
    return new SubscriptionSink(this.#sink, method, subscriptionId, unsubscribe);
  }

  /**
   * Answer the subscribe request with an error. Does nothing if already answered or if the
   * client is gone.
   */
  async reject(error: ErrorObject): Promise<void> {
    if (this.#settled) return;
    this.#settled = true;

    try {
      await this.#sink.send(MethodResponse.error(this.#options.requestId, error, this.#sink.logger).body);
    } catch (err) {
      if (!(err instanceof DisconnectError)) throw err;
      this.#sink.logger.debug("Connection closed before the subscription was rejected");
    }
  }
}

// ============================================================================
// SubscriptionSink
// ============================================================================

/**
 * An accepted subscription. Sends notifications until it is closed, either by the server
 * (`close()`) or by the client (disconnect or unsubscribe).
 */
export class SubscriptionSink {
  #sink: MethodSink;
  #method: string;
  #subscriptionId: SubscriptionId;
  #unsubscribe?: AbortSignal;
  #closedSignal?: Promise<void>;
  #settleClosed?: () => void;
  #terminated = false;

  constructor(sink: MethodSink, method: string, subscriptionId: SubscriptionId, unsubscribe?: AbortSignal) {
    this.#sink = sink;
    this.#method = method;
    this.#subscriptionId = subscriptionId;
    this.#unsubscribe = unsubscribe;
  }

  get method(): string {
    return this.#method;
  }

  get subscriptionId(): SubscriptionId {
    return this.#subscriptionId;
  }

  /**
   * True once the client disconnected or unsubscribed.
   */
  isClosed(): boolean {
    return this.#sink.isClosed() || (this.#unsubscribe?.aborted ?? false);
  }

  /**
   * Resolves once the client disconnected or unsubscribed, or once `close()` ended the
   * subscription; immediately on later calls.
   */
  closed(): Promise<void> {
    if (this.#closedSignal === undefined) {
      this.#closedSignal = new Promise<void>(resolve => {
        if (this.#terminated) {
          resolve();
          return;
        }
        const detach = this.onClose(() => {
          this.#settleClosed = undefined;
          resolve();
        });
        this.#settleClosed = () => {
          detach();
          resolve();
        };
      });
    }
    return this.#closedSignal;
  }

  /**
   * Call `listener` once, when the client disconnects or unsubscribes (right away if it
   * already has). Returns a function that detaches it from both sources.
   */
  onClose(listener: () => void): () => void {
    if (this.isClosed()) {
      listener();
      return () => {};
    }

    const signal = this.#unsubscribe;
    let detachSink = () => {};
    const detach = () => {
      detachSink();
      signal?.removeEventListener("abort", fire);
    };
    const fire = () => {
      detach();
      listener();
    };

    detachSink = this.#sink.onClose(fire);
    signal?.addEventListener("abort", fire, { once: true });
    return detach;
  }

  /**
   * True once a terminal frame was sent, or the server gave up sending one.
   */
  isTerminated(): boolean {
    return this.#terminated;
  }

  /**
   * Serialize one item as a notification.
   *
   * @throws SerializationError if the item cannot be encoded
   */
  buildMessage(item: unknown): string {
    return toJsonString({
      jsonrpc: "2.0",
      method: this.#method,
      params: { subscription: this.#subscriptionId, result: item === undefined ? null : item },
    });
  }

  /**
   * Send a notification built with `buildMessage`.
   *
   * @throws DisconnectError if the subscription is closed or terminated
   */
  async send(message: string): Promise<void> {
    if (this.#terminated || this.isClosed()) {
      throw new DisconnectError(message);
    }
    await this.#sink.send(message);
  }

  /**
   * End the subscription with a terminal frame. Only the first call does anything, and
   * nothing is sent to a client that is already gone.
   *
   * @returns whether the terminal frame was queued
   */
  async close(reason: SubscriptionClosed = SubscriptionClosed.success()): Promise<boolean> {
    if (this.#terminated) return false;
    this.#terminated = true;
    this.#settleClosed?.();
    this.#settleClosed = undefined;

    if (this.isClosed()) return false;

    const error = errorEnvelope(null, closeReasonObject(reason)).error;
    let frame: string;
    try {
      frame = toJsonString({
        jsonrpc: "2.0",
        method: this.#method,
        params: { subscription: this.#subscriptionId, error },
      });
    } catch (err) {
      this.#sink.logger.error("Error serializing subscription close reason", { error: String(err) });
      frame = toJsonString({
        jsonrpc: "2.0",
        method: this.#method,
        params: { subscription: this.#subscriptionId, error: errorObject(ErrorCode.INTERNAL_ERROR) },
      });
    }

    try {
      await this.#sink.send(frame);
      return true;
    } catch (err) {
      if (err instanceof DisconnectError) return false;
      throw err;
    }
  }
}
