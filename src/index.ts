// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

// Re-export error codes and error types
export {
  ErrorCode,
  ErrorMessage,
  OVERSIZED_RESPONSE_CODE,
  OVERSIZED_RESPONSE_MSG,
  EgressError,
  CapacityExceededError,
  SerializationError,
  DisconnectError,
  TrySendError,
  PermitConsumedError,
  SubscriptionRejectedError,
  ConfigError,
  CallError,
  errorObject,
  toErrorObject,
} from "./errors.js";
export type { ErrorCodeType, ErrorObject, TrySendErrorKind } from "./errors.js";

// Identifiers
export { isId, RandomIntegerIdProvider, RandomStringIdProvider } from "./id.js";
export type { Id, SubscriptionId, IdProvider } from "./id.js";

// Configuration and logging
export { UNLIMITED, DEFAULT_CONFIG, resolveConfig, parseConfig, loadConfig } from "./config.js";
export type { ServerConfig } from "./config.js";
export { createLogger, silentLogger, isNamespaceEnabled, truncateAtCharBoundary, txLog } from "./logging.js";
export type { Logger, LoggerOptions } from "./logging.js";

// Serialization
export { BoundedWriter } from "./serialize/bounded-writer.js";
export type { ByteSink } from "./serialize/bounded-writer.js";
export { writeJson, toJsonString } from "./serialize/json-writer.js";

// Responses
export { MethodResponse, successEnvelope, errorEnvelope, serializeError } from "./response.js";
export type { CallOutcome } from "./response.js";
export { BatchResponse, BatchResponseBuilder, buildBatchResponse } from "./batch.js";
export type { BatchEntry } from "./batch.js";

// Delivery
export { createBoundedChannel, Sender, Receiver, Permit } from "./channel.js";
export { MethodSink, MethodSinkPermit } from "./sink.js";
export type { MethodSinkOptions } from "./sink.js";
export { openConnection } from "./connection.js";
export type { Connection } from "./connection.js";

// Subscriptions
export { PendingSubscriptionSink, SubscriptionSink, SubscriptionClosed } from "./subscription.js";
export type { PendingSubscriptionOptions } from "./subscription.js";
export { pipeFromStream } from "./pipe.js";
export type { PipeOutcome, PipeOptions } from "./pipe.js";

// Transports
export { serveWebSocket } from "./transports/websocket.js";
export type { OutgoingSocket, ServeWebSocketOptions } from "./transports/websocket.js";
