// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { DisconnectError, ErrorCode, SubscriptionRejectedError } from "./errors.js";
import { createLogger, type Logger } from "./logging.js";
import { SubscriptionClosed, type PendingSubscriptionSink, type SubscriptionSink } from "./subscription.js";

/**
 * How a piped subscription ended.
 *
 * - "rejected": the subscription could not be accepted; nothing was sent.
 * - "disconnected": the client went away; no terminal frame was sent.
 * - "completed": the stream ended and the success frame was sent.
 * - "failed": the stream or an item failed and the error frame was sent.
 */
export type PipeOutcome = "rejected" | "disconnected" | "completed" | "failed";

export interface PipeOptions {
  logger?: Logger;
}

const CLOSED = Symbol("closed");

const defaultLogger = createLogger("egress:pipe");

/**
 * Accept `pending` and forward every item of `stream` to it as a notification.
 *
 * The client going away always wins over the next item: if both are ready at once, the item
 * is dropped. At most one terminal frame is sent, and nothing follows it.
 */
export async function pipeFromStream<T>(
    stream: AsyncIterable<T>, pending: PendingSubscriptionSink, options: PipeOptions = {}): Promise<PipeOutcome> {
  let sink: SubscriptionSink;
  try {
    sink = await pending.accept();
  } catch (err) {
    if (err instanceof SubscriptionRejectedError) return "rejected";
    throw err;
  }

  const logger = options.logger ?? defaultLogger;
  const iterator = stream[Symbol.asyncIterator]();

  while (true) {
    if (sink.isClosed()) {
      abandon(iterator, logger);
      return "disconnected";
    }

    let next: IteratorResult<T> | typeof CLOSED;
    try {
      next = await nextOrClosed(sink, iterator);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn("Subscription stream failed", { method: sink.method, error: message });
      return await fail(sink, message);
    }

    // Checked again: the client may have left while the item was being produced.
    if (next === CLOSED || sink.isClosed()) {
      abandon(iterator, logger);
      return "disconnected";
    }

    if (next.done) {
      return (await sink.close(SubscriptionClosed.success())) ? "completed" : "disconnected";
    }

    let message: string;
    try {
      message = sink.buildMessage(next.value);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.error("Error serializing subscription item", { method: sink.method, error: reason });
      await finish(iterator, logger);
      return await fail(sink, reason);
    }

    try {
      await sink.send(message);
    } catch (err) {
      if (!(err instanceof DisconnectError)) throw err;
      await finish(iterator, logger);
      return "disconnected";
    }
  }
}

async function fail(sink: SubscriptionSink, message: string): Promise<PipeOutcome> {
  const sent = await sink.close(SubscriptionClosed.error({ code: ErrorCode.SUBSCRIPTION_CLOSED_WITH_ERROR, message }));
  return sent ? "failed" : "disconnected";
}

/**
 * Wait for the next item, or for the client to go away. The close listener only lives for
 * this one wait.
 */
function nextOrClosed<T>(sink: SubscriptionSink, iterator: AsyncIterator<T>): Promise<IteratorResult<T> | typeof CLOSED> {
  return new Promise((resolve, reject) => {
    const detach = sink.onClose(() => resolve(CLOSED));
    void iterator.next().then(
      result => {
        detach();
        resolve(result);
      },
      (err: unknown) => {
        detach();
        reject(err);
      });
  });
}

/**
 * Let the stream run its cleanup. Failures in that cleanup are logged, not thrown.
 */
async function finish<T>(iterator: AsyncIterator<T>, logger: Logger): Promise<void> {
  if (iterator.return === undefined) return;
  try {
    await iterator.return();
  } catch (err) {
    logger.debug("Error while finishing subscription stream", { error: String(err) });
  }
}

/**
 * Ask the stream to finish without waiting: a `next()` may still be pending, and an async
 * generator only runs `return()` once that settles.
 */
function abandon<T>(iterator: AsyncIterator<T>, logger: Logger): void {
  void finish(iterator, logger);
}
