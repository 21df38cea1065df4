// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { createBoundedChannel, type Receiver } from "./channel.js";
import { resolveConfig, type ServerConfig } from "./config.js";
import type { Logger } from "./logging.js";
import { MethodSink } from "./sink.js";

export interface Connection {
  /** Cloned into every call and subscription task of the connection. */
  sink: MethodSink;
  /** Drained by the transport. */
  receiver: Receiver<string>;
  config: ServerConfig;
}

/**
 * Set up the outgoing side of a newly accepted connection.
 */
export function openConnection(config: Partial<ServerConfig> = {}, logger?: Logger): Connection {
  const resolved = resolveConfig(config);
  const [tx, receiver] = createBoundedChannel<string>(resolved.channelCapacity);
  const sink = new MethodSink(tx, {
    maxResponseSize: resolved.maxResponseSize,
    maxLogLength: resolved.maxLogLength,
    logger,
  });
  return { sink, receiver, config: resolved };
}
