// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import WebSocket from "ws";
import type { Receiver } from "../channel.js";
import { createLogger, type Logger } from "../logging.js";

const defaultLogger = createLogger("egress:ws");

/**
 * The part of a `ws` WebSocket the outgoing side needs.
 */
export interface OutgoingSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  once(event: "close", listener: () => void): unknown;
}

export interface ServeWebSocketOptions {
  logger?: Logger;
}

/**
 * Write every message of a connection's queue to its WebSocket, one at a time.
 *
 * Each send is awaited before the next message is taken, so a slow socket fills the queue and
 * producers start waiting in `MethodSink.send()`/`reserve()`. The queue is closed when the
 * socket closes or a send fails, which ends every subscription of the connection.
 *
 * Resolves when there is nothing more to write.
 */
export async function serveWebSocket(
    receiver: Receiver<string>, socket: OutgoingSocket, options: ServeWebSocketOptions = {}): Promise<void> {
  const logger = options.logger ?? defaultLogger;

  socket.once("close", () => {
    logger.debug("WebSocket closed");
    receiver.close();
  });

  for await (const message of receiver) {
    if (socket.readyState !== WebSocket.OPEN) {
      receiver.close();
      return;
    }

    try {
      await sendMessage(socket, message);
    } catch (err) {
      logger.warn("WebSocket send failed", { error: err instanceof Error ? err.message : String(err) });
      receiver.close();
      return;
    }
  }
}

function sendMessage(socket: OutgoingSocket, message: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(message, err => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
