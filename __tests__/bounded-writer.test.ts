// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { expect, it, describe } from "vitest"
import { BoundedWriter, CapacityExceededError, writeJson } from "../src/index.js"

const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);
const encode = (text: string) => new TextEncoder().encode(text);

describe("BoundedWriter", () => {
  it("returns exactly what was written when within capacity", () => {
    const writer = new BoundedWriter(10);
    expect(writer.write(encode("hello"))).toBe(5);
    expect(writer.length).toBe(5);
    expect(decode(writer.intoBytes())).toBe("hello");
  });

  it("accepts a write that fills the capacity exactly", () => {
    const writer = new BoundedWriter(10);
    writer.writeString("hello");
    writer.writeString("world");
    expect(decode(writer.intoBytes())).toBe("helloworld");
  });

  it("rejects a write past the capacity and keeps the buffer unchanged", () => {
    const writer = new BoundedWriter(8);
    writer.writeString("hello");

    expect(() => writer.writeString("world")).toThrow(CapacityExceededError);
    expect(writer.length).toBe(5);
    expect(decode(writer.intoBytes())).toBe("hello");
  });

  it("leaves the writer empty when the first write is too large", () => {
    const writer = new BoundedWriter(100);
    // The quotes are part of the output, so this is 101 bytes.
    expect(() => writeJson("x".repeat(99), writer)).toThrow(CapacityExceededError);
    expect(writer.length).toBe(0);
    expect(writer.intoBytes().length).toBe(0);
  });

  it("reports the capacity and attempted size on overflow", () => {
    const writer = new BoundedWriter(4);
    try {
      writer.writeString("abcdef");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CapacityExceededError);
      if (err instanceof CapacityExceededError) {
        expect(err.capacity).toBe(4);
        expect(err.attempted).toBe(6);
      }
    }
  });

  it("counts UTF-8 bytes, not characters", () => {
    const writer = new BoundedWriter(2);
    expect(() => writer.writeString("✓")).toThrow(CapacityExceededError);
  });

  it("grows beyond its initial buffer", () => {
    const writer = new BoundedWriter(1000);
    const chunk = "a".repeat(300);
    writer.writeString(chunk);
    writer.writeString(chunk);
    writer.writeString(chunk);
    expect(decode(writer.intoBytes())).toBe(chunk.repeat(3));
  });

  it("accepts empty writes at zero capacity", () => {
    const writer = new BoundedWriter(0);
    expect(writer.write(new Uint8Array(0))).toBe(0);
    expect(() => writer.writeString("a")).toThrow(CapacityExceededError);
  });

  it("can only be consumed once", () => {
    const writer = new BoundedWriter(10);
    writer.writeString("a");
    writer.flush();
    writer.intoBytes();
    expect(() => writer.intoBytes()).toThrow();
    expect(() => writer.writeString("b")).toThrow();
  });
});
