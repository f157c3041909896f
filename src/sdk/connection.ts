/**
 * Connection: the host-visible handle for one WebSocket URL.
 *
 * Holds the command sender and the shared event receiver of the current
 * generation. Identity and URL survive reopening; the channel pair does not.
 *
 * Handles must be released with {@link Connection.dispose} (or `using`)
 * once the host is done with them; that is what guarantees the worker is
 * cut loose and the registry entry removed.
 *
 * @example
 * ```ts
 * const conn = bridge.connect("wss://echo.example");
 * conn.onConnect = () => conn.send("hello");
 * conn.onMessage = (text) => console.log("received", text);
 * conn.onDisconnect = (reason) => console.log("disconnected", reason);
 * ```
 */

import type { HostEnds } from "./channel/duplex.js";
import { inertReceiver, inertSender, type RecvResult, type Sender } from "./channel/queue.js";
import { SharedReceiver } from "./channel/shared.js";
import { CallbackError, ChannelClosedError, toError, type CallbackName } from "./errors.js";
import { USER_CLOSE_REASON, type BridgeEvent, type Command } from "./protocol.js";

/** Callback return: plain, or a promise whose rejection is reported too. */
export type CallbackResult = void | Promise<void>;

/** Optional host callbacks. Each runs with `this` bound to the connection. */
export interface ConnectionCallbacks {
  onConnect?: (this: Connection) => CallbackResult;
  onMessage?: (this: Connection, text: string) => CallbackResult;
  onError?: (this: Connection, message: string) => CallbackResult;
  onDisconnect?: (this: Connection, reason: string) => CallbackResult;
}

/** What a connection needs from the bridge that owns it. */
export interface ConnectionHost {
  /** Create a channel pair, start its worker, return the host ends. */
  spawn(url: string): HostEnds;
  /** Register if absent and make sure the dispatch loop is scheduled. */
  adopt(conn: Connection): void;
  /** Remove from the registry. False if it was not registered. */
  retire(conn: Connection): boolean;
  /** Non-fatal error channel for failing callbacks. */
  reportCallbackError(err: CallbackError): void;
}

/** Outcome of one receive attempt on the shared event queue. */
export type EventPoll = RecvResult<BridgeEvent> | { status: "unavailable" };

/**
 * Run a host callback, routing a throw or a rejected promise to `report`.
 * @internal
 */
export function invokeCallback(
  conn: Connection,
  name: CallbackName,
  run: () => CallbackResult,
  report: (err: CallbackError) => void,
): void {
  const fail = (err: unknown) => report(new CallbackError(name, conn.toString(), toError(err)));
  try {
    const result = run();
    if (result instanceof Promise) void result.catch(fail);
  } catch (err) {
    fail(err);
  }
}

export class Connection implements ConnectionCallbacks {
  readonly id: string;
  readonly url: string;

  onConnect?: (this: Connection) => CallbackResult;
  onMessage?: (this: Connection, text: string) => CallbackResult;
  onError?: (this: Connection, message: string) => CallbackResult;
  onDisconnect?: (this: Connection, reason: string) => CallbackResult;

  readonly #host: ConnectionHost;
  readonly #events: SharedReceiver<BridgeEvent>;
  #commands: Sender<Command>;
  #closed = false;
  #disconnectReported = false;
  #disposed = false;
  #generation = 0;

  /** @internal Use `bridge.connect(url)`. */
  constructor(url: string, host: ConnectionHost, ends: HostEnds) {
    this.id = crypto.randomUUID();
    this.url = url;
    this.#host = host;
    this.#commands = ends.commands;
    this.#events = new SharedReceiver(ends.events);
  }

  /** Whether a close was issued or the peer disconnected. */
  get closed(): boolean {
    return this.#closed;
  }

  /** Number of times this handle has been reopened. */
  get generation(): number {
    return this.#generation;
  }

  /** Queue a text message. Throws {@link ChannelClosedError} if the worker is gone. */
  send(text: string): void {
    this.#enqueue({ type: "message", text }, "send");
  }

  /** Alias of {@link send}. */
  write(text: string): void {
    this.send(text);
  }

  /**
   * Ask the worker to start the close handshake. The handle stays
   * registered until the worker confirms. Throws {@link ChannelClosedError}
   * if the worker is gone.
   */
  close(): void {
    this.#closed = true;
    this.#enqueue({ type: "close" }, "close");
  }

  /**
   * Cut the connection loose immediately: swap both queue ends for inert
   * ones, leave the registry and report `"closed by user"` to
   * `onDisconnect`. The worker notices the dropped queue on its next poll.
   */
  closeNow(): void {
    this.#closed = true;
    this.#commands.close();
    this.#commands = inertSender();
    this.#events.replace(inertReceiver());
    this.#host.retire(this);

    if (this.#disconnectReported) return;
    this.#disconnectReported = true;
    invokeCallback(
      this,
      "onDisconnect",
      () => this.onDisconnect?.(USER_CLOSE_REASON),
      (err) => this.#host.reportCallbackError(err),
    );
  }

  /**
   * Start a new generation if closed. Returns true; the outcome of the new
   * attempt arrives later as `onConnect` or `onError`. Throws
   * {@link ChannelClosedError} once the handle has been disposed.
   */
  open(): boolean {
    if (this.#disposed) {
      throw new ChannelClosedError(`${this}: cannot open, handle is disposed`);
    }
    if (!this.#closed) return true;

    const ends = this.#host.spawn(this.url);
    this.#commands.close();
    this.#commands = ends.commands;
    this.#events.replace(ends.events);
    this.#generation++;
    this.#closed = false;
    this.#disconnectReported = false;
    this.#host.adopt(this);
    return true;
  }

  /**
   * Release the handle for good: leave the registry, then {@link closeNow}.
   * Idempotent. A disposed handle cannot be reopened.
   */
  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    this.#host.retire(this);
    this.closeNow();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  toString(): string {
    return `wsbridge(${this.id})`;
  }

  /** Take at most one event without waiting. @internal */
  receive(): EventPoll {
    const result = this.#events.withLock((rx) => rx.tryRecv());
    return result ? result.value : { status: "unavailable" };
  }

  /** Record a peer disconnect delivered by the dispatch loop. @internal */
  markDisconnected(): void {
    this.#closed = true;
    this.#disconnectReported = true;
  }

  #enqueue(command: Command, op: string): void {
    if (this.#commands.disconnected) {
      throw new ChannelClosedError(`${this}: cannot ${op}, channel is closed`);
    }
    this.#commands.send(command);
  }
}
