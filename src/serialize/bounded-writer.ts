// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { CapacityExceededError } from "../errors.js";

/**
 * Anything bytes can be written into.
 */
export interface ByteSink {
  /**
   * Append `bytes`, returning how many were written.
   */
  write(bytes: Uint8Array): number;
  flush(): void;
}

const encoder = new TextEncoder();
const INITIAL_SIZE = 128;

/**
 * In-memory byte sink that holds at most `capacity` bytes.
 *
 * A write that would go past the capacity is rejected as a whole and leaves the buffer as it
 * was, so a serializer that aborts mid-value never leaves half a token behind.
 *
 * @example
 * ```typescript
 * const writer = new BoundedWriter(10);
 * writer.writeString("hello");
 * new TextDecoder().decode(writer.intoBytes()); // "hello"
 * ```
 */
export class BoundedWriter implements ByteSink {
  #capacity: number;
  #buf: Uint8Array;
  #len = 0;
  #consumed = false;

  constructor(capacity: number) {
    this.#capacity = capacity;
    this.#buf = new Uint8Array(Math.min(INITIAL_SIZE, Math.max(capacity, 0)));
  }

  get capacity(): number {
    return this.#capacity;
  }

  /** Bytes written so far. */
  get length(): number {
    return this.#len;
  }

  /**
   * @throws CapacityExceededError if the write would exceed the capacity
   */
  write(bytes: Uint8Array): number {
    if (this.#consumed) {
      throw new Error("BoundedWriter has already been consumed");
    }

    const len = this.#len + bytes.length;
    if (len > this.#capacity) {
      throw new CapacityExceededError(this.#capacity, len);
    }

    this.#ensure(len);
    this.#buf.set(bytes, this.#len);
    this.#len = len;
    return bytes.length;
  }

  writeString(text: string): number {
    return this.write(encoder.encode(text));
  }

  flush(): void {}

  /**
   * Consume the writer and return the bytes written.
   */
  intoBytes(): Uint8Array {
    if (this.#consumed) {
      throw new Error("BoundedWriter has already been consumed");
    }
    this.#consumed = true;
    const out = this.#buf.slice(0, this.#len);
    this.#buf = new Uint8Array(0);
    return out;
  }

  #ensure(needed: number): void {
    if (needed <= this.#buf.length) return;

    let size = Math.max(this.#buf.length, INITIAL_SIZE);
    while (size < needed) {
      size *= 2;
    }
    const next = new Uint8Array(Math.min(size, this.#capacity));
    next.set(this.#buf.subarray(0, this.#len));
    this.#buf = next;
  }
}
