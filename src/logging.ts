// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

// Console logging for the delivery core.
//
// `trace` and `debug` output is gated by the DEBUG environment variable, using the same
// pattern syntax as npm's `debug` package ("egress:*", "*", "-egress:sink").

import pc from "picocolors";

export interface Logger {
  /**
   * Whether `trace` output goes anywhere. Lets callers skip building expensive previews.
   */
  isTraceEnabled(): boolean;
  trace(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /**
   * Debug pattern to match against. Defaults to `process.env.DEBUG`.
   */
  debug?: string;

  /**
   * Where lines go. Defaults to the global console.
   */
  console?: Pick<Console, "debug" | "warn" | "error">;
}

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Later patterns win, so "egress:*,-egress:sink" enables everything except the sink.
 */
export function isNamespaceEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a console-backed logger for a namespace.
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const out = options.console ?? console;
  const verbose = isNamespaceEnabled(namespace, options.debug ?? process.env.DEBUG);
  const prefix = pc.dim(namespace);

  const emit = (line: string, fields: Record<string, unknown> | undefined, write: (...args: unknown[]) => void) => {
    if (fields === undefined) {
      write(line);
    } else {
      write(line, fields);
    }
  };

  return {
    isTraceEnabled() {
      return verbose;
    },
    trace(message, fields) {
      if (verbose) emit(`${prefix} ${pc.gray("TRACE")} ${message}`, fields, out.debug);
    },
    debug(message, fields) {
      if (verbose) emit(`${prefix} ${pc.blue("DEBUG")} ${message}`, fields, out.debug);
    },
    warn(message, fields) {
      emit(`${prefix} ${pc.yellow("WARN")} ${message}`, fields, out.warn);
    },
    error(message, fields) {
      emit(`${prefix} ${pc.red("ERROR")} ${message}`, fields, out.error);
    },
  };
}

/**
 * A logger that drops everything.
 */
export const silentLogger: Logger = {
  isTraceEnabled() {
    return false;
  },
  trace() {},
  debug() {},
  warn() {},
  error() {},
};

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Cut `text` to at most `maxBytes` UTF-8 bytes without splitting a character.
 */
export function truncateAtCharBoundary(text: string, maxBytes: number): string {
  // Every UTF-16 code unit encodes to at most 3 bytes.
  if (text.length * 3 <= maxBytes) return text;

  const bytes = encoder.encode(text);
  if (bytes.length <= maxBytes) return text;

  let end = Math.max(0, maxBytes);
  // Step back over continuation bytes (10xxxxxx) to the start of a character.
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }
  return decoder.decode(bytes.subarray(0, end));
}

/**
 * Record a preview of an outgoing message at trace level. Does no work when tracing is off.
 */
export function txLog(logger: Logger, message: string, maxLogLength: number): void {
  if (!logger.isTraceEnabled()) return;
  logger.trace("send", { message: truncateAtCharBoundary(message, maxLogLength) });
}
