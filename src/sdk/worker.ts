/**
 * Transport worker: owns one generation's live connection.
 *
 * Runs as its own task: connects, then polls every `pollIntervalMs`,
 * draining at most one command and performing one non-blocking read per
 * iteration. Events flow back to the host only through the event queue.
 * When the task ends it drops both of its queue ends, which is how the
 * host side learns the generation is over.
 *
 * Writes are best effort. A failed write is logged at debug level and
 * otherwise surfaces only through the next failing read.
 */

import type { WorkerEnds } from "./channel/duplex.js";
import { ConnectFailureError, TransportError, toError } from "./errors.js";
import type { Logger } from "./log.js";
import { silentLogger } from "./log.js";
import { UNKNOWN_CLOSE_REASON, type BridgeEvent, type WorkerOutcome } from "./protocol.js";
import type { Frame, Transport, TransportConnector } from "./transport/transport.js";
import { CLOSE_NO_STATUS, CLOSE_NORMAL } from "./transport/transport.js";

const encoder = new TextEncoder();
// fatal: false replaces invalid sequences with U+FFFD
const decoder = new TextDecoder("utf-8", { fatal: false });

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface WorkerOptions {
  connector: TransportConnector;
  pollIntervalMs: number;
  logger?: Logger;
  sleep?: Sleep;
}

export class TransportWorker {
  readonly #url: string;
  readonly #ends: WorkerEnds;
  readonly #connector: TransportConnector;
  readonly #pollIntervalMs: number;
  readonly #logger: Logger;
  readonly #sleep: Sleep;
  #started = false;

  constructor(url: string, ends: WorkerEnds, opts: WorkerOptions) {
    this.#url = url;
    this.#ends = ends;
    this.#connector = opts.connector;
    this.#pollIntervalMs = opts.pollIntervalMs;
    this.#logger = opts.logger ?? silentLogger;
    this.#sleep = opts.sleep ?? defaultSleep;
  }

  /**
   * Connect and poll until the generation ends. Resolves with how it ended.
   * May only be called once.
   */
  async run(): Promise<WorkerOutcome> {
    if (this.#started) throw new Error("Worker already started");
    this.#started = true;

    try {
      const established = await this.establish();
      if (established.kind === "failed") {
        return { kind: "connect-failed", error: established.error };
      }

      const { transport } = established;
      for (;;) {
        const outcome = this.poll(transport);
        if (outcome) return outcome;
        await this.#sleep(this.#pollIntervalMs);
      }
    } finally {
      this.#ends.events.close();
      this.#ends.commands.close();
    }
  }

  /**
   * Open the transport and report `connected`, or report `error` on
   * failure.
   */
  async establish(): Promise<
    { kind: "connected"; transport: Transport } | { kind: "failed"; error: ConnectFailureError }
  > {
    let transport: Transport;
    try {
      ({ transport } = await this.#connector.connect(this.#url));
    } catch (err) {
      const cause = toError(err);
      this.#logger.debug(`connect to ${this.#url} failed: ${cause.message}`);
      this.#emit({ type: "error", message: cause.message });
      return { kind: "failed", error: new ConnectFailureError(this.#url, cause.message, { cause }) };
    }

    try {
      transport.setNoDelay(true);
    } catch (err) {
      this.#logger.debug(`setNoDelay failed: ${toError(err).message}`);
    }

    this.#logger.debug(`connected to ${this.#url}`);
    this.#emit({ type: "connected" });
    return { kind: "connected", transport };
  }

  /**
   * One loop iteration. Returns an outcome when the generation has ended,
   * `undefined` to keep polling.
   */
  poll(transport: Transport): WorkerOutcome | undefined {
    const command = this.#ends.commands.tryRecv();
    switch (command.status) {
      case "item":
        if (command.value.type === "message") {
          this.#write(transport, { kind: "text", data: encoder.encode(command.value.text) });
        } else {
          this.#bestEffort("close", () => transport.close(CLOSE_NORMAL, ""));
        }
        break;
      case "disconnected":
        this.#logger.debug(`${this.#url}: host dropped the command queue`);
        this.#bestEffort("terminate", () => transport.terminate());
        return { kind: "host-dropped" };
      case "empty":
        break;
    }

    const read = transport.read();
    switch (read.status) {
      case "wouldBlock":
        return undefined;
      case "error": {
        const { message } = read.error;
        this.#emit({ type: "error", message });
        return { kind: "transport-error", error: new TransportError(message, { cause: read.error }) };
      }
      case "frame":
        return this.#handleFrame(transport, read.frame);
    }
  }

  #handleFrame(transport: Transport, frame: Frame): WorkerOutcome | undefined {
    switch (frame.kind) {
      case "text":
        this.#emit({ type: "message", text: decoder.decode(frame.data) });
        return undefined;
      case "ping":
        this.#write(transport, { kind: "pong", data: frame.data });
        return undefined;
      case "close": {
        const reason =
          frame.code === undefined || frame.code === CLOSE_NO_STATUS
            ? UNKNOWN_CLOSE_REASON
            : (frame.reason ?? "");
        this.#emit({ type: "disconnected", reason });
        return { kind: "peer-closed", reason };
      }
      case "binary":
      case "pong":
        return undefined;
    }
  }

  #write(transport: Transport, frame: Frame): void {
    this.#bestEffort(`write ${frame.kind}`, () => transport.send(frame));
  }

  #bestEffort(what: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.#logger.debug(`${this.#url}: ${what} dropped: ${toError(err).message}`);
    }
  }

  #emit(event: BridgeEvent): void {
    try {
      this.#ends.events.send(event);
    } catch (err) {
      // Host side is gone; nobody is left to tell.
      this.#logger.debug(`${this.#url}: ${event.type} event dropped: ${toError(err).message}`);
    }
  }
}
