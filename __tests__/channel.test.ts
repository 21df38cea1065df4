// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { expect, it, describe, vi } from "vitest"
import { DisconnectError, PermitConsumedError, TrySendError, createBoundedChannel } from "../src/index.js"

// Lets pending promise callbacks run.
const tick = () => new Promise<void>(resolve => setTimeout(resolve, 0));

describe("createBoundedChannel", () => {
  it("rejects a capacity below one", () => {
    expect(() => createBoundedChannel<string>(0)).toThrow(RangeError);
    expect(() => createBoundedChannel<string>(1.5)).toThrow(RangeError);
  });

  it("delivers messages in send order", async () => {
    const [tx, rx] = createBoundedChannel<string>(4);
    await tx.send("a");
    tx.trySend("b");
    await tx.send("c");

    expect(await rx.recv()).toBe("a");
    expect(await rx.recv()).toBe("b");
    expect(await rx.recv()).toBe("c");
  });

  it("hands a message straight to a waiting receiver", async () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    const received = rx.recv();
    tx.trySend("hello");

    expect(await received).toBe("hello");
    expect(tx.capacity()).toBe(1);
  });

  it("shares one queue between clones", async () => {
    const [tx, rx] = createBoundedChannel<number>(2);
    const other = tx.clone();
    tx.trySend(1);
    other.trySend(2);

    expect(() => tx.trySend(3)).toThrow(TrySendError);
    expect(rx.length).toBe(2);
    expect(await rx.recv()).toBe(1);
    expect(await rx.recv()).toBe(2);
  });
});

describe("Sender.trySend", () => {
  it("hands the value back when the queue is full", () => {
    const [tx] = createBoundedChannel<string>(1);
    tx.trySend("first");

    try {
      tx.trySend("second");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TrySendError);
      if (!(err instanceof TrySendError)) return;
      expect(err.isFull()).toBe(true);
      expect(err.isClosed()).toBe(false);
      expect(err.value).toBe("second");
    }
  });

  it("hands the value back when the channel is closed", () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    rx.close();

    try {
      tx.trySend("late");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TrySendError);
      if (!(err instanceof TrySendError)) return;
      expect(err.kind).toBe("closed");
      expect(err.value).toBe("late");
    }
  });
});

describe("Sender.send", () => {
  it("waits for room and completes once a message is received", async () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    await tx.send("a");

    let done = false;
    const pending = tx.send("b").then(() => {
      done = true;
    });
    await tick();
    expect(done).toBe(false);

    expect(await rx.recv()).toBe("a");
    await pending;
    expect(done).toBe(true);
    expect(await rx.recv()).toBe("b");
  });

  it("completes waiting senders in arrival order", async () => {
    const [tx, rx] = createBoundedChannel<number>(1);
    tx.trySend(0);
    const sends = [tx.send(1), tx.send(2), tx.send(3)];

    const received: (number | null)[] = [];
    for (let i = 0; i < 4; i++) {
      received.push(await rx.recv());
    }
    await Promise.all(sends);
    expect(received).toEqual([0, 1, 2, 3]);
  });

  it("fails with the value when the channel is closed", async () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    rx.close();

    const err = await tx.send("lost").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DisconnectError);
    if (err instanceof DisconnectError) {
      expect(err.value).toBe("lost");
    }
  });

  it("fails a sender that was waiting when the channel closes", async () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    tx.trySend("a");
    const waiting = tx.send("b");

    rx.close();
    await expect(waiting).rejects.toBeInstanceOf(DisconnectError);
  });
});

describe("Permit", () => {
  it("counts toward capacity while held", () => {
    const [tx] = createBoundedChannel<string>(2);
    const permit = tx.tryReserve();

    expect(tx.capacity()).toBe(1);
    tx.trySend("a");
    expect(() => tx.trySend("b")).toThrow(TrySendError);

    expect(permit.send("c")).toBe(true);
  });

  it("returns its slot on release", () => {
    const [tx] = createBoundedChannel<string>(1);
    const permit = tx.tryReserve();
    expect(tx.capacity()).toBe(0);

    permit.release();
    permit.release();
    expect(tx.capacity()).toBe(1);
    expect(permit.consumed).toBe(true);
  });

  it("can only be used once", async () => {
    const [tx, rx] = createBoundedChannel<string>(2);
    const permit = await tx.reserve();
    permit.send("once");

    expect(() => permit.send("twice")).toThrow(PermitConsumedError);
    expect(rx.length).toBe(1);
  });

  it("drops the value if the channel closed after reservation", () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    const permit = tx.tryReserve();
    rx.close();

    expect(permit.send("dropped")).toBe(false);
    expect(rx.tryRecv()).toBeUndefined();
  });

  it("waits for room when reserving on a full channel", async () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    tx.trySend("a");

    let reserved = false;
    const pending = tx.reserve().then(permit => {
      reserved = true;
      return permit;
    });
    await tick();
    expect(reserved).toBe(false);

    await rx.recv();
    const permit = await pending;
    expect(permit.send("b")).toBe(true);
    expect(await rx.recv()).toBe("b");
  });

  it("releases an unused slot at the end of a using block", () => {
    const [tx] = createBoundedChannel<string>(1);
    {
      using permit = tx.tryReserve();
      expect(permit.consumed).toBe(false);
      expect(tx.capacity()).toBe(0);
    }
    expect(tx.capacity()).toBe(1);
  });

  it("keeps a sent value when disposed afterwards", async () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    const permit = tx.tryReserve();
    permit.send("kept");
    permit[Symbol.dispose]();

    expect(await rx.recv()).toBe("kept");
    expect(tx.capacity()).toBe(1);
  });

  it("cannot be reserved without waiting on a full or closed channel", () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    tx.trySend("a");
    expect(() => tx.tryReserve()).toThrow(TrySendError);

    rx.close();
    expect(() => tx.tryReserve()).toThrow("Channel is closed");
  });
});

describe("Receiver", () => {
  it("drains queued messages after close, then ends", async () => {
    const [tx, rx] = createBoundedChannel<string>(3);
    tx.trySend("a");
    tx.trySend("b");
    rx.close();

    expect(tx.isClosed()).toBe(true);
    expect(await rx.recv()).toBe("a");
    expect(await rx.recv()).toBe("b");
    expect(await rx.recv()).toBeNull();
  });

  it("wakes a waiting receive on close", async () => {
    const [, rx] = createBoundedChannel<string>(1);
    const pending = rx.recv();
    rx.close();
    expect(await pending).toBeNull();
  });

  it("iterates until closed", async () => {
    const [tx, rx] = createBoundedChannel<string>(2);
    tx.trySend("a");
    tx.trySend("b");
    rx.close();

    const seen: string[] = [];
    for await (const msg of rx) {
      seen.push(msg);
    }
    expect(seen).toEqual(["a", "b"]);
  });

  it("signals senders when closed", async () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    let signalled = false;
    const closed = tx.closed().then(() => {
      signalled = true;
    });

    await tick();
    expect(signalled).toBe(false);

    rx.close();
    rx.close();
    await closed;
    expect(signalled).toBe(true);
    await tx.clone().closed();
  });

  it("calls close listeners once and lets them detach", () => {
    const [tx, rx] = createBoundedChannel<string>(1);
    const kept = vi.fn();
    const dropped = vi.fn();

    tx.onClose(kept);
    const detach = tx.onClose(dropped);
    detach();
    rx.close();
    rx.close();

    expect(kept).toHaveBeenCalledTimes(1);
    expect(dropped).not.toHaveBeenCalled();

    const late = vi.fn();
    tx.onClose(late);
    expect(late).toHaveBeenCalledTimes(1);
  });
});
