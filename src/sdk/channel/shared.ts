/**
 * Mutex-guarded slot holding the event receiver of the current generation.
 *
 * Both the dispatch loop and the owning connection reach the receiver
 * through this slot. Access is "try lock, treat failure as gone": a slot
 * that is already held, or whose previous holder threw while holding it
 * (poisoned), yields `undefined` and the caller treats the worker as gone.
 */

import type { Receiver } from "./queue.js";

/** Exclusive access to the guarded receiver, valid until `release()`. */
export interface ReceiverGuard<T> {
  readonly receiver: Receiver<T>;
  release(): void;
}

export class SharedReceiver<T> {
  #receiver: Receiver<T>;
  #locked = false;
  #poisoned = false;

  constructor(receiver: Receiver<T>) {
    this.#receiver = receiver;
  }

  /** Whether a holder threw while the lock was held. */
  get poisoned(): boolean {
    return this.#poisoned;
  }

  /** Acquire the lock without waiting. `undefined` when held or poisoned. */
  tryLock(): ReceiverGuard<T> | undefined {
    if (this.#locked || this.#poisoned) return undefined;
    this.#locked = true;
    let released = false;
    return {
      receiver: this.#receiver,
      release: () => {
        if (released) return;
        released = true;
        this.#locked = false;
      },
    };
  }

  /**
   * Run `fn` with the receiver locked. Returns `undefined` if the lock could
   * not be taken. A throwing `fn` poisons the slot and the error propagates.
   */
  withLock<R>(fn: (receiver: Receiver<T>) => R): { value: R } | undefined {
    const guard = this.tryLock();
    if (!guard) return undefined;
    try {
      return { value: fn(guard.receiver) };
    } catch (err) {
      this.#poisoned = true;
      throw err;
    } finally {
      guard.release();
    }
  }

  /**
   * Swap in a new receiver and close the previous one. Clears poisoning,
   * since the state it guarded is discarded.
   */
  replace(receiver: Receiver<T>): void {
    const previous = this.#receiver;
    this.#receiver = receiver;
    this.#poisoned = false;
    previous.close();
  }
}
