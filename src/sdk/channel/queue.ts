/**
 * Unbounded single-producer / single-consumer queue with explicit end
 * ownership.
 *
 * Each end can be closed independently ("dropped"). A closed receiver makes
 * every later `send` fail; a closed sender lets the receiver drain whatever
 * is buffered and then report `disconnected`. Nothing here ever waits.
 */

import { ChannelClosedError } from "../errors.js";

/** Result of a non-blocking receive. */
export type RecvResult<T> =
  | { status: "item"; value: T }
  | { status: "empty" }
  | { status: "disconnected" };

/** Producer end of a queue. */
export interface Sender<T> {
  /** Enqueue a value. Throws {@link ChannelClosedError} if the receiver is gone. */
  send(value: T): void;
  /** Drop this end. Idempotent. */
  close(): void;
  /** Whether the receiving end has been dropped. */
  readonly disconnected: boolean;
}

/** Consumer end of a queue. */
export interface Receiver<T> {
  /** Dequeue one value without waiting. */
  tryRecv(): RecvResult<T>;
  /** Drop this end and discard anything still buffered. Idempotent. */
  close(): void;
  /** Number of values buffered and not yet received. */
  readonly size: number;
}

/** Shared buffer both ends point at. */
class QueueState<T> {
  readonly items: T[] = [];
  senderClosed = false;
  receiverClosed = false;
}

class QueueSender<T> implements Sender<T> {
  readonly #state: QueueState<T>;
  #closed = false;

  constructor(state: QueueState<T>) {
    this.#state = state;
  }

  get disconnected(): boolean {
    return this.#closed || this.#state.receiverClosed;
  }

  send(value: T): void {
    if (this.#closed) throw new ChannelClosedError("Sender is closed");
    if (this.#state.receiverClosed) {
      throw new ChannelClosedError("Receiving end of the channel is gone");
    }
    this.#state.items.push(value);
  }

  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#state.senderClosed = true;
  }
}

class QueueReceiver<T> implements Receiver<T> {
  readonly #state: QueueState<T>;

  constructor(state: QueueState<T>) {
    this.#state = state;
  }

  get size(): number {
    return this.#state.items.length;
  }

  tryRecv(): RecvResult<T> {
    if (this.#state.receiverClosed) return { status: "disconnected" };
    if (this.#state.items.length > 0) {
      const value = this.#state.items[0];
      this.#state.items.shift();
      return { status: "item", value };
    }
    return this.#state.senderClosed ? { status: "disconnected" } : { status: "empty" };
  }

  close(): void {
    if (this.#state.receiverClosed) return;
    this.#state.receiverClosed = true;
    this.#state.items.length = 0;
  }
}

/** Create a linked sender/receiver pair. */
export function createChannel<T>(): [Sender<T>, Receiver<T>] {
  const state = new QueueState<T>();
  return [new QueueSender(state), new QueueReceiver(state)];
}

/** A sender whose receiver is already gone: every `send` throws. */
export function inertSender<T>(): Sender<T> {
  const [tx, rx] = createChannel<T>();
  rx.close();
  return tx;
}

/** A receiver whose sender is already gone: always reports `disconnected`. */
export function inertReceiver<T>(): Receiver<T> {
  const [tx, rx] = createChannel<T>();
  tx.close();
  return rx;
}
