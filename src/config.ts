// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import * as fs from "node:fs";
import * as yaml from "js-yaml";
import { ConfigError } from "./errors.js";

/**
 * Largest value of the 32-bit size settings; means "no limit".
 */
export const UNLIMITED = 0xffff_ffff;

/**
 * Per-connection delivery settings.
 */
export interface ServerConfig {
  /**
   * Maximum size in bytes of one response, or of one whole batch response.
   */
  maxResponseSize: number;

  /**
   * Maximum number of bytes of each outgoing message recorded in the trace log.
   * Independent of `maxResponseSize`.
   */
  maxLogLength: number;

  /**
   * Depth of the bounded outgoing queue of each connection.
   */
  channelCapacity: number;
}

export const DEFAULT_CONFIG: Readonly<ServerConfig> = Object.freeze({
  maxResponseSize: UNLIMITED,
  maxLogLength: UNLIMITED,
  channelCapacity: 1024,
});

const FIELDS = ["maxResponseSize", "maxLogLength", "channelCapacity"] as const;

/**
 * Validate a partial configuration and fill in defaults.
 *
 * @throws ConfigError naming the first invalid field
 */
export function resolveConfig(partial: Partial<Record<keyof ServerConfig, unknown>> = {}): ServerConfig {
  const config: ServerConfig = { ...DEFAULT_CONFIG };

  for (const field of FIELDS) {
    const value: unknown = partial[field];
    if (value === undefined) continue;

    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw new ConfigError(`'${field}' must be an integer, got ${JSON.stringify(value)}`, field);
    }
    if (value < 0 || value > UNLIMITED) {
      throw new ConfigError(`'${field}' must be between 0 and ${UNLIMITED}, got ${value}`, field);
    }
    config[field] = value;
  }

  if (config.channelCapacity < 1) {
    throw new ConfigError(`'channelCapacity' must be at least 1`, "channelCapacity");
  }

  return config;
}

/**
 * Parse YAML (or JSON) configuration text.
 *
 * @param source - Where the text came from, used in error messages
 */
export function parseConfig(text: string, source = "<inline>"): ServerConfig {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML in ${source}: ${reason}`);
  }

  if (doc === undefined || doc === null) {
    return resolveConfig();
  }
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigError(`Configuration in ${source} must be a mapping`);
  }

  const partial: Partial<Record<keyof ServerConfig, unknown>> = {};
  for (const [key, value] of Object.entries(doc)) {
    if (!isConfigField(key)) {
      throw new ConfigError(`Unknown configuration key '${key}' in ${source}`, key);
    }
    partial[key] = value;
  }

  return resolveConfig(partial);
}

/**
 * Load a configuration file.
 */
export function loadConfig(filePath: string): ServerConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Configuration file does not exist: ${filePath}`);
  }
  return parseConfig(fs.readFileSync(filePath, "utf-8"), filePath);
}

function isConfigField(key: string): key is (typeof FIELDS)[number] {
  return FIELDS.some((field) => field === key);
}
