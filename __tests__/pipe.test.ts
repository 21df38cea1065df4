// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { expect, it, describe, vi } from "vitest"
import { getEventListeners } from "node:events";
import {
  MethodSink,
  PendingSubscriptionSink,
  createBoundedChannel,
  pipeFromStream,
  silentLogger,
  Receiver,
  Sender,
} from "../src/index.js"
import { ChannelCore } from "../src/channel.js"

const ACCEPTED = '{"jsonrpc":"2.0","result":"sub1","id":1}';
const COMPLETED = '{"jsonrpc":"2.0","method":"news","params":{"subscription":"sub1","error":{"code":-32003,"message":"Subscription was completed by the server"}}}';

const item = (value: string) =>
  `{"jsonrpc":"2.0","method":"news","params":{"subscription":"sub1","result":${value}}}`;
const failed = (message: string) =>
  `{"jsonrpc":"2.0","method":"news","params":{"subscription":"sub1","error":{"code":-32004,"message":"${message}"}}}`;

function setup(capacity = 16, unsubscribe?: AbortSignal) {
  const [tx, rx] = createBoundedChannel<string>(capacity);
  const sink = new MethodSink(tx, { logger: silentLogger });
  const pending = new PendingSubscriptionSink(sink, {
    requestId: 1,
    method: "news",
    subscriptionId: "sub1",
    unsubscribe,
  });
  return { pending, rx };
}

/**
 * Counts close listeners that are still attached.
 */
class CountingSender extends Sender<string> {
  attached = 0;

  onClose(listener: () => void): () => void {
    this.attached++;
    const detach = super.onClose(listener);
    let detached = false;
    return () => {
      if (detached) return;
      detached = true;
      this.attached--;
      detach();
    };
  }
}

function drain(rx: Receiver<string>): string[] {
  const out: string[] = [];
  for (let next = rx.tryRecv(); next !== undefined; next = rx.tryRecv()) {
    out.push(next.value);
  }
  return out;
}

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const value of items) {
    yield value;
  }
}

describe("pipeFromStream", () => {
  it("forwards every item, then completes", async () => {
    const { pending, rx } = setup();

    expect(await pipeFromStream(fromArray([1, 2, 3]), pending)).toBe("completed");
    expect(drain(rx)).toEqual([ACCEPTED, item("1"), item("2"), item("3"), COMPLETED]);
  });

  it("completes an empty stream right after accepting", async () => {
    const { pending, rx } = setup();

    expect(await pipeFromStream(fromArray([]), pending)).toBe("completed");
    expect(drain(rx)).toEqual([ACCEPTED, COMPLETED]);
  });

  it("does nothing when the subscription cannot be accepted", async () => {
    const { pending, rx } = setup();
    rx.close();
    const next = vi.fn();

    expect(await pipeFromStream({ [Symbol.asyncIterator]: () => ({ next }) }, pending)).toBe("rejected");
    expect(next).not.toHaveBeenCalled();
    expect(drain(rx)).toEqual([]);
  });

  it("drops an item produced as the client unsubscribes", async () => {
    const controller = new AbortController();
    const { pending, rx } = setup(16, controller.signal);
    let finished = false;

    async function* stream(): AsyncGenerator<number> {
      try {
        yield 1;
        yield 2;
        controller.abort();
        yield 3;
        yield 4;
      } finally {
        finished = true;
      }
    }

    expect(await pipeFromStream(stream(), pending)).toBe("disconnected");
    expect(drain(rx)).toEqual([ACCEPTED, item("1"), item("2")]);
    await vi.waitFor(() => expect(finished).toBe(true));
  });

  it("stops waiting on the stream when the connection closes", async () => {
    const { pending, rx } = setup();
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });

    async function* stream(): AsyncGenerator<string> {
      await gate;
      yield "too late";
    }

    const outcome = pipeFromStream(stream(), pending);
    await vi.waitFor(() => expect(rx.length).toBe(1));
    rx.close();

    expect(await outcome).toBe("disconnected");
    expect(drain(rx)).toEqual([ACCEPTED]);
    release();
  });

  it("ends with an error frame when the stream throws", async () => {
    const { pending, rx } = setup();

    async function* stream(): AsyncGenerator<number> {
      yield 1;
      throw new Error("feed lost");
    }

    expect(await pipeFromStream(stream(), pending, { logger: silentLogger })).toBe("failed");
    expect(drain(rx)).toEqual([ACCEPTED, item("1"), failed("feed lost")]);
  });

  it("ends with an error frame when an item cannot be serialized", async () => {
    const { pending, rx } = setup();
    let finished = false;

    async function* stream(): AsyncGenerator<unknown> {
      try {
        yield "ok";
        yield 1n;
        yield "never";
      } finally {
        finished = true;
      }
    }

    expect(await pipeFromStream(stream(), pending, { logger: silentLogger })).toBe("failed");
    expect(drain(rx)).toEqual([ACCEPTED, item('"ok"'), failed("Do not know how to serialize a BigInt")]);
    expect(finished).toBe(true);
  });

  it("waits for the consumer when the queue is full", async () => {
    const { pending, rx } = setup(1);

    const outcome = pipeFromStream(fromArray(["a", "b", "c"]), pending);
    const received: (string | null)[] = [];
    for (let i = 0; i < 5; i++) {
      received.push(await rx.recv());
    }

    expect(await outcome).toBe("completed");
    expect(received).toEqual([ACCEPTED, item('"a"'), item('"b"'), item('"c"'), COMPLETED]);
  });

  it("reports a disconnect when the connection closes before the completion frame is queued", async () => {
    const { pending, rx } = setup(1);

    // The id response fills the queue, so the completion frame has to wait for room.
    const outcome = pipeFromStream(fromArray([]), pending);
    await vi.waitFor(() => expect(rx.length).toBe(1));
    rx.close();

    expect(await outcome).toBe("disconnected");
    expect(drain(rx)).toEqual([ACCEPTED]);
  });

  it("holds one close listener at a time however many items pass", async () => {
    const core = new ChannelCore<string>(4);
    const tx = new CountingSender(core);
    const rx = new Receiver(core);
    const controller = new AbortController();
    const pending = new PendingSubscriptionSink(new MethodSink(tx, { logger: silentLogger }), {
      requestId: 1,
      method: "news",
      subscriptionId: "sub1",
      unsubscribe: controller.signal,
    });
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });

    async function* stream(): AsyncGenerator<number> {
      for (let i = 0; i < 10_000; i++) {
        yield i;
      }
      await gate;
    }

    const outcome = pipeFromStream(stream(), pending, { logger: silentLogger });
    for (let received = 0; received < 10_001; received++) {
      await rx.recv();
    }

    // The pump now waits on the gate with the subscription still open.
    await vi.waitFor(() => expect(tx.attached).toBe(1));
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(1);

    controller.abort();
    expect(await outcome).toBe("disconnected");
    expect(tx.attached).toBe(0);
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
    release();
  });

  it("still sends the error frame when the stream's cleanup throws", async () => {
    const { pending, rx } = setup();

    async function* stream(): AsyncGenerator<unknown> {
      try {
        yield 1n;
      } finally {
        throw new Error("cleanup failed");
      }
    }

    expect(await pipeFromStream(stream(), pending, { logger: silentLogger })).toBe("failed");
    expect(drain(rx)).toEqual([ACCEPTED, failed("Do not know how to serialize a BigInt")]);
  });
});
