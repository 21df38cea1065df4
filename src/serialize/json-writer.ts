// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

// Incremental JSON encoder.
//
// `JSON.stringify` only hands back text once the whole value has been encoded, which is too
// late to enforce a memory ceiling. This encoder emits the same text token by token, so a
// bounded sink can stop it as soon as the output would grow past its capacity.

import { SerializationError } from "../errors.js";
import type { ByteSink } from "./bounded-writer.js";

const encoder = new TextEncoder();

type Emit = (text: string) => void;

// Longer strings are escaped and emitted in slices of this many UTF-16 code units, so a
// bounded sink rejects an oversized string before it is copied in full.
const STRING_SLICE_LENGTH = 4096;

/**
 * Write the JSON text of `value` into `sink`.
 *
 * The output matches `JSON.stringify(value)`, except that a top-level value `JSON.stringify`
 * would drop (undefined, a function, a symbol) is written as `null`.
 *
 * Errors thrown by the sink propagate unchanged.
 *
 * @throws SerializationError for BigInt values and circular structures
 */
export function writeJson(value: unknown, sink: ByteSink): void {
  new JsonEncoder(text => {
    sink.write(encoder.encode(text));
  }).top(value);
}

/**
 * Encode `value` without any size limit.
 */
export function toJsonString(value: unknown): string {
  const parts: string[] = [];
  new JsonEncoder(text => {
    parts.push(text);
  }).top(value);
  return parts.join("");
}

class JsonEncoder {
  #emit: Emit;
  #stack: object[] = [];

  constructor(emit: Emit) {
    this.#emit = emit;
  }

  top(value: unknown): void {
    const prepared = prepare("", value);
    if (isOmitted(prepared)) {
      this.#emit("null");
    } else {
      this.#write(prepared);
    }
  }

  #write(value: unknown): void {
    switch (typeof value) {
      case "string":
        this.#string(value);
        return;
      case "number":
        this.#emit(Number.isFinite(value) ? JSON.stringify(value) : "null");
        return;
      case "boolean":
        this.#emit(value ? "true" : "false");
        return;
      case "bigint":
        throw new SerializationError("Do not know how to serialize a BigInt");
      case "object":
        if (value === null) {
          this.#emit("null");
        } else if (Array.isArray(value)) {
          const items: unknown[] = value;
          this.#enter(items, () => this.#array(items));
        } else {
          const obj: object = value;
          this.#enter(obj, () => this.#object(obj));
        }
        return;
      default:
        // Callers filter these out before getting here.
        this.#emit("null");
    }
  }

  #array(items: unknown[]): void {
    this.#emit("[");
    for (let i = 0; i < items.length; i++) {
      if (i > 0) this.#emit(",");
      const item = prepare(String(i), items[i]);
      if (isOmitted(item)) {
        this.#emit("null");
      } else {
        this.#write(item);
      }
    }
    this.#emit("]");
  }

  #object(obj: object): void {
    this.#emit("{");
    let first = true;
    for (const key of Object.keys(obj)) {
      const member = prepare(key, Reflect.get(obj, key));
      if (isOmitted(member)) continue;

      if (!first) this.#emit(",");
      this.#string(key);
      this.#emit(":");
      first = false;
      this.#write(member);
    }
    this.#emit("}");
  }

  #string(text: string): void {
    if (text.length <= STRING_SLICE_LENGTH) {
      this.#emit(JSON.stringify(text));
      return;
    }

    this.#emit('"');
    let start = 0;
    while (start < text.length) {
      let end = Math.min(start + STRING_SLICE_LENGTH, text.length);
      // Keep surrogate pairs together; a lone surrogate is escaped the same either way.
      if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1)) && isLowSurrogate(text.charCodeAt(end))) {
        end--;
      }
      const escaped = JSON.stringify(text.slice(start, end));
      this.#emit(escaped.slice(1, -1));
      start = end;
    }
    this.#emit('"');
  }

  #enter(value: object, body: () => void): void {
    if (this.#stack.includes(value)) {
      throw new SerializationError("Converting circular structure to JSON");
    }
    this.#stack.push(value);
    try {
      body();
    } finally {
      this.#stack.pop();
    }
  }
}

/**
 * Apply `toJSON` and unwrap boxed primitives, the way `JSON.stringify` does before encoding
 * a value.
 */
function prepare(key: string, value: unknown): unknown {
  if ((typeof value === "object" && value !== null) || typeof value === "bigint") {
    const toJSON: unknown = Reflect.get(Object(value), "toJSON");
    if (typeof toJSON === "function") {
      value = Reflect.apply(toJSON, value, [key]);
    }
  }

  if (value instanceof Number) return Number(value);
  if (value instanceof String) return String(value);
  if (value instanceof Boolean) return value.valueOf();
  if (value instanceof BigInt) {
    throw new SerializationError("Do not know how to serialize a BigInt");
  }
  return value;
}

function isOmitted(value: unknown): boolean {
  return typeof value === "undefined" || typeof value === "function" || typeof value === "symbol";
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}
