/**
 * Dispatch loop: runs once per host scheduler tick.
 *
 * Takes at most one event from each registered connection and turns it into
 * a callback. Entries whose worker is gone are retired. A failing callback
 * is reported and never stops the loop.
 */

import type { CallbackError, CallbackName } from "./errors.js";
import { invokeCallback, type CallbackResult, type Connection } from "./connection.js";
import type { Logger } from "./log.js";
import { assertNever } from "./match.js";
import type { BridgeEvent } from "./protocol.js";
import { DISPATCH_TIMER_NAME } from "./protocol.js";
import type { ConnectionRegistry } from "./registry.js";
import type { HostScheduler } from "./scheduler.js";

export interface DispatcherOptions {
  registry: ConnectionRegistry;
  scheduler: HostScheduler;
  intervalSeconds: number;
  logger: Logger;
  onCallbackError: (err: CallbackError) => void;
}

export class Dispatcher {
  readonly #registry: ConnectionRegistry;
  readonly #scheduler: HostScheduler;
  readonly #intervalSeconds: number;
  readonly #logger: Logger;
  readonly #onCallbackError: (err: CallbackError) => void;
  #scheduled = false;

  constructor(opts: DispatcherOptions) {
    this.#registry = opts.registry;
    this.#scheduler = opts.scheduler;
    this.#intervalSeconds = opts.intervalSeconds;
    this.#logger = opts.logger;
    this.#onCallbackError = opts.onCallbackError;
  }

  get scheduled(): boolean {
    return this.#scheduled;
  }

  /** Register {@link tick} with the host scheduler, once. */
  ensureScheduled(): void {
    if (this.#scheduled) return;
    this.#scheduler.createPeriodicTimer(DISPATCH_TIMER_NAME, this.#intervalSeconds, () =>
      this.tick(),
    );
    this.#scheduled = true;
  }

  /** Remove the timer. A later {@link ensureScheduled} registers it again. */
  unschedule(): void {
    if (!this.#scheduled) return;
    this.#scheduler.removeTimer(DISPATCH_TIMER_NAME);
    this.#scheduled = false;
  }

  /** Service every registered connection once. */
  tick(): void {
    for (const conn of this.#registry.snapshot()) {
      // Retired by an earlier callback during this tick
      if (!this.#registry.has(conn)) continue;

      const poll = conn.receive();
      switch (poll.status) {
        case "empty":
          break;
        case "unavailable":
          this.#logger.debug(`${conn}: event queue unavailable, retiring`);
          this.#registry.retire(conn);
          break;
        case "disconnected":
          this.#logger.debug(`${conn}: worker ended, retiring`);
          this.#registry.retire(conn);
          break;
        case "item":
          this.#deliver(conn, poll.value);
          break;
        default:
          assertNever(poll);
      }
    }
  }

  #deliver(conn: Connection, event: BridgeEvent): void {
    switch (event.type) {
      case "connected":
        this.#invoke(conn, "onConnect", () => conn.onConnect?.());
        break;
      case "message":
        this.#invoke(conn, "onMessage", () => conn.onMessage?.(event.text));
        break;
      case "error":
        this.#invoke(conn, "onError", () => conn.onError?.(event.message));
        break;
      case "disconnected":
        // Retire first so a callback that reopens the handle stays registered
        conn.markDisconnected();
        this.#registry.retire(conn);
        this.#invoke(conn, "onDisconnect", () => conn.onDisconnect?.(event.reason));
        break;
      default:
        assertNever(event);
    }
  }

  #invoke(
    conn: Connection,
    name: CallbackName,
    run: () => CallbackResult,
  ): void {
    invokeCallback(conn, name, run, this.#onCallbackError);
  }
}
