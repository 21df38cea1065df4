// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

// Bounded multi-producer, single-consumer async channel.
//
// Capacity is counted in slots. A slot is taken either by a queued message or by an
// outstanding Permit, so a producer that holds a permit can always enqueue without waiting.

import { DisconnectError, PermitConsumedError, TrySendError } from "./errors.js";

type Waiter = {
  grant: () => void;
  fail: () => void;
};

/**
 * Shared state behind a channel's handles.
 * @internal
 */
export class ChannelCore<T> {
  readonly capacity: number;
  #queue: { value: T }[] = [];
  #used = 0;
  #closed = false;
  #reserveWaiters: Waiter[] = [];
  #recvWaiters: ((value: T | null) => void)[] = [];
  #closeListeners = new Set<() => void>();
  #resolveClosed: () => void = () => {};
  readonly closedSignal: Promise<void>;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.closedSignal = new Promise<void>(resolve => {
      this.#resolveClosed = resolve;
    });
  }

  get closed(): boolean {
    return this.#closed;
  }

  get available(): number {
    return this.capacity - this.#used;
  }

  get queued(): number {
    return this.#queue.length;
  }

  /**
   * Call `listener` once when the channel closes, or right away if it already has.
   * Returns a function that removes the listener.
   */
  onClose(listener: () => void): () => void {
    if (this.#closed) {
      listener();
      return () => {};
    }
    const entry = () => listener();
    this.#closeListeners.add(entry);
    return () => {
      this.#closeListeners.delete(entry);
    };
  }

  /**
   * Claim a slot without waiting. Waiting reservations are served first.
   */
  tryAcquire(): boolean {
    if (this.#used < this.capacity && this.#reserveWaiters.length === 0) {
      this.#used++;
      return true;
    }
    return false;
  }

  acquire(): Promise<void> {
    if (this.#closed) {
      return Promise.reject(new DisconnectError(undefined));
    }
    if (this.tryAcquire()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.#reserveWaiters.push({
        grant: resolve,
        fail: () => reject(new DisconnectError(undefined)),
      });
    });
  }

  releaseSlot(): void {
    this.#used--;
    // Hand freed slots to waiting producers in arrival order.
    while (this.#used < this.capacity && this.#reserveWaiters.length > 0) {
      const waiter = this.#reserveWaiters.shift();
      if (waiter === undefined) break;
      this.#used++;
      waiter.grant();
    }
  }

  /**
   * Deliver a value into an already claimed slot.
   * Returns false if the channel closed in the meantime; the value is then dropped.
   */
  deliver(value: T): boolean {
    if (this.#closed) {
      this.releaseSlot();
      return false;
    }

    const receiver = this.#recvWaiters.shift();
    if (receiver) {
      this.releaseSlot();
      receiver(value);
    } else {
      this.#queue.push({ value });
    }
    return true;
  }

  tryTake(): { value: T } | undefined {
    const entry = this.#queue.shift();
    if (entry === undefined) return undefined;
    this.releaseSlot();
    return entry;
  }

  take(): Promise<T | null> {
    const next = this.tryTake();
    if (next) {
      return Promise.resolve(next.value);
    }
    if (this.#closed) {
      return Promise.resolve(null);
    }
    return new Promise(resolve => {
      this.#recvWaiters.push(resolve);
    });
  }

  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    const reserveWaiters = this.#reserveWaiters;
    this.#reserveWaiters = [];
    for (const waiter of reserveWaiters) {
      waiter.fail();
    }

    // The queue is empty whenever a receiver is waiting.
    const recvWaiters = this.#recvWaiters;
    this.#recvWaiters = [];
    for (const receiver of recvWaiters) {
      receiver(null);
    }

    const closeListeners = [...this.#closeListeners];
    this.#closeListeners.clear();
    for (const listener of closeListeners) {
      listener();
    }

    this.#resolveClosed();
  }
}

// ============================================================================
// Handles
// ============================================================================

/**
 * Producer handle. Cheap to clone; every clone feeds the same queue.
 */
export class Sender<T> {
  #core: ChannelCore<T>;

  constructor(core: ChannelCore<T>) {
    this.#core = core;
  }

  clone(): Sender<T> {
    return new Sender(this.#core);
  }

  /**
   * True once the receiver has closed the channel. Never becomes false again.
   */
  isClosed(): boolean {
    return this.#core.closed;
  }

  /**
   * Resolves when the channel is closed. Resolves immediately on every call after that.
   */
  closed(): Promise<void> {
    return this.#core.closedSignal;
  }

  /**
   * Call `listener` once the channel is closed. Unlike `closed()`, the returned function
   * detaches it again, so short waits do not pile up on a long-lived channel.
   */
  onClose(listener: () => void): () => void {
    return this.#core.onClose(listener);
  }

  /** Free slots right now. */
  capacity(): number {
    return this.#core.available;
  }

  get maxCapacity(): number {
    return this.#core.capacity;
  }

  /**
   * Enqueue without waiting.
   *
   * @throws TrySendError carrying `value` if the channel is full or closed
   */
  trySend(value: T): void {
    if (this.#core.closed) {
      throw new TrySendError("closed", value);
    }
    if (!this.#core.tryAcquire()) {
      throw new TrySendError("full", value);
    }
    this.#core.deliver(value);
  }

  /**
   * Wait for a free slot, then enqueue.
   *
   * @throws DisconnectError carrying `value` if the channel is or becomes closed
   */
  async send(value: T): Promise<void> {
    let permit: Permit<T>;
    try {
      permit = await this.reserve();
    } catch (err) {
      if (err instanceof DisconnectError) {
        throw new DisconnectError(value);
      }
      throw err;
    }
    if (!permit.send(value)) {
      throw new DisconnectError(value);
    }
  }

  /**
   * Wait for a free slot and claim it.
   *
   * @throws DisconnectError if the channel is or becomes closed while waiting
   */
  async reserve(): Promise<Permit<T>> {
    await this.#core.acquire();
    return new Permit(this.#core);
  }

  /**
   * Claim a slot without waiting.
   *
   * @throws TrySendError if the channel is full or closed
   */
  tryReserve(): Permit<T> {
    if (this.#core.closed) {
      throw new TrySendError("closed", undefined);
    }
    if (!this.#core.tryAcquire()) {
      throw new TrySendError("full", undefined);
    }
    return new Permit(this.#core);
  }
}

/**
 * One reserved slot. Use it exactly once: `send()` fills the slot, `release()` gives it back.
 */
export class Permit<T> {
  #core: ChannelCore<T>;
  #consumed = false;

  constructor(core: ChannelCore<T>) {
    this.#core = core;
  }

  get consumed(): boolean {
    return this.#consumed;
  }

  /**
   * Enqueue `value` into the reserved slot. Never waits.
   *
   * @returns false if the channel was closed after the slot was reserved (the value is
   *     dropped)
   * @throws PermitConsumedError if the permit was already used
   */
  send(value: T): boolean {
    if (this.#consumed) {
      throw new PermitConsumedError();
    }
    this.#consumed = true;
    return this.#core.deliver(value);
  }

  /**
   * Give the slot back without sending. Does nothing if the permit was already used.
   */
  release(): void {
    if (this.#consumed) return;
    this.#consumed = true;
    this.#core.releaseSlot();
  }

  /**
   * Releases an unused permit at the end of a `using` block.
   */
  [Symbol.dispose](): void {
    this.release();
  }
}

/**
 * Consumer handle.
 */
export class Receiver<T> {
  #core: ChannelCore<T>;

  constructor(core: ChannelCore<T>) {
    this.#core = core;
  }

  /**
   * Next message in order, or `null` once the channel is closed and drained.
   */
  recv(): Promise<T | null> {
    return this.#core.take();
  }

  tryRecv(): { value: T } | undefined {
    return this.#core.tryTake();
  }

  /** Messages waiting to be received. */
  get length(): number {
    return this.#core.queued;
  }

  isClosed(): boolean {
    return this.#core.closed;
  }

  /**
   * Stop accepting messages. Producers see the channel as closed right away; messages that
   * were already queued can still be received.
   */
  close(): void {
    this.#core.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const next = await this.#core.take();
      if (next === null) return;
      yield next;
    }
  }
}

/**
 * Create a bounded channel.
 *
 * @param capacity - Number of messages (plus outstanding permits) the channel holds
 */
export function createBoundedChannel<T>(capacity: number): [Sender<T>, Receiver<T>] {
  const core = new ChannelCore<T>(capacity);
  return [new Sender(core), new Receiver(core)];
}
