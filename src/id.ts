// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { randomBytes, randomInt } from "node:crypto";

/**
 * A JSON-RPC request identifier, echoed back in the response.
 * `null` is used when the request id could not be determined.
 */
export type Id = number | string | null;

/**
 * Identifier of an active subscription, carried in every notification it produces.
 */
export type SubscriptionId = number | string;

export function isId(value: unknown): value is Id {
  return value === null || typeof value === "string" || (typeof value === "number" && Number.isFinite(value));
}

/**
 * Source of fresh subscription ids.
 */
export interface IdProvider {
  nextId(): SubscriptionId;
}

/**
 * Random integers in the safe-integer range, so they survive a round trip through any JSON
 * parser.
 */
export class RandomIntegerIdProvider implements IdProvider {
  nextId(): SubscriptionId {
    // randomInt's range is limited to 2^48.
    return randomInt(0, 2 ** 48 - 1) * 32 + randomInt(0, 32);
  }
}

const ALPHANUMERIC = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

/**
 * Random alphanumeric strings of a fixed length.
 */
export class RandomStringIdProvider implements IdProvider {
  #length: number;

  constructor(length = 16) {
    if (!Number.isInteger(length) || length < 1) {
      throw new RangeError(`Subscription id length must be a positive integer, got ${length}`);
    }
    this.#length = length;
  }

  nextId(): SubscriptionId {
    let out = "";
    // 248 = 4 * 62: values at or above it are rejected to keep the distribution uniform.
    while (out.length < this.#length) {
      for (const byte of randomBytes(this.#length)) {
        if (byte < 248 && out.length < this.#length) {
          out += ALPHANUMERIC[byte % ALPHANUMERIC.length];
        }
      }
    }
    return out;
  }
}
