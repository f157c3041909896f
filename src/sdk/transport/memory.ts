/**
 * In-memory connector for deterministic testing.
 *
 * Each accepted connection gets a {@link MemoryPeer}: the remote side, which
 * tests script directly. Frames the client writes land in `peer.received`;
 * frames the peer pushes are returned by the client's `read()` in order.
 */

import type {
  ConnectResult,
  Frame,
  ReadResult,
  Transport,
  TransportConnector,
} from "./transport.js";
import { CLOSE_NO_STATUS, CLOSE_NORMAL } from "./transport.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Behaviour of peers created by a memory connector. */
export interface MemoryPeerOptions {
  /** Send every text frame straight back. */
  echo?: boolean;
  /** Answer the client's close frame with one carrying this reason. */
  closeReply?: string;
}

/** Remote side of an in-memory connection. */
export class MemoryPeer {
  readonly url: string;
  /** Frames written by the client, in order. */
  readonly received: Frame[] = [];
  readonly #opts: MemoryPeerOptions;
  readonly #outbound: ReadResult[] = [];
  #closed = false;
  #terminated = false;
  #noDelay = false;

  constructor(url: string, opts: MemoryPeerOptions) {
    this.url = url;
    this.#opts = opts;
  }

  /** Whether either side closed or dropped the connection. */
  get closed(): boolean {
    return this.#closed || this.#terminated;
  }

  /** Whether the client dropped the connection without a handshake. */
  get terminated(): boolean {
    return this.#terminated;
  }

  /** Whether the client asked for low-latency mode. */
  get noDelay(): boolean {
    return this.#noDelay;
  }

  /** Text of every text frame the client wrote. */
  get texts(): string[] {
    return this.received.flatMap((f) => (f.kind === "text" ? [decoder.decode(f.data)] : []));
  }

  sendText(text: string): void {
    this.sendRaw(encoder.encode(text));
  }

  /** Push a text frame with arbitrary, possibly invalid UTF-8, payload. */
  sendRaw(bytes: Uint8Array): void {
    this.#push({ status: "frame", frame: { kind: "text", data: bytes } });
  }

  sendBinary(bytes: Uint8Array): void {
    this.#push({ status: "frame", frame: { kind: "binary", data: bytes } });
  }

  ping(payload: Uint8Array = new Uint8Array()): void {
    this.#push({ status: "frame", frame: { kind: "ping", data: payload } });
  }

  /** Send a close frame. Omit `code` to close without a status. */
  close(code?: number, reason = ""): void {
    this.#push({ status: "frame", frame: { kind: "close", code, reason } });
    this.#closed = true;
  }

  /** Make the next client read fail. */
  fail(message: string): void {
    this.#push({ status: "error", error: new Error(message) });
    this.#closed = true;
  }

  /** @internal */
  take(): ReadResult {
    return this.#outbound.shift() ?? { status: "wouldBlock" };
  }

  /** @internal */
  deliver(frame: Frame): void {
    if (this.closed) {
      throw new Error("Connection is closed");
    }
    this.received.push(frame);
    if (frame.kind === "text" && this.#opts.echo) {
      this.#push({ status: "frame", frame: { kind: "text", data: frame.data } });
    }
    if (frame.kind === "close" && this.#opts.closeReply !== undefined) {
      this.close(frame.code ?? CLOSE_NORMAL, this.#opts.closeReply);
    }
  }

  /** @internal */
  drop(): void {
    this.#terminated = true;
  }

  /** @internal */
  setNoDelay(enabled: boolean): void {
    this.#noDelay = enabled;
  }

  #push(result: ReadResult): void {
    if (this.#closed) return;
    this.#outbound.push(result);
  }
}

class MemoryTransport implements Transport {
  readonly #peer: MemoryPeer;

  constructor(peer: MemoryPeer) {
    this.#peer = peer;
  }

  send(frame: Frame): void {
    this.#peer.deliver(frame);
  }

  read(): ReadResult {
    if (this.#peer.terminated) {
      return { status: "frame", frame: { kind: "close", code: CLOSE_NO_STATUS } };
    }
    return this.#peer.take();
  }

  close(code: number, reason: string): void {
    this.#peer.deliver({ kind: "close", code, reason });
  }

  terminate(): void {
    this.#peer.drop();
  }

  setNoDelay(enabled: boolean): void {
    this.#peer.setNoDelay(enabled);
  }
}

/** Connector whose connections live entirely in process. */
export class MemoryConnector implements TransportConnector {
  /** Every peer created, in connection order. */
  readonly peers: MemoryPeer[] = [];
  readonly #opts: MemoryPeerOptions;
  readonly #refused = new Map<string, string>();
  readonly #pending = new Set<string>();
  readonly #waiters = new Map<string, (() => void)[]>();

  constructor(opts: MemoryPeerOptions = {}) {
    this.#opts = opts;
  }

  /** Make every connection attempt to `url` fail with `message`. */
  refuse(url: string, message: string): void {
    this.#refused.set(url, message);
  }

  /** Hold connection attempts to `url` until {@link release} is called. */
  hold(url: string): void {
    this.#pending.add(url);
  }

  /** Let held connection attempts to `url` complete. */
  release(url: string): void {
    this.#pending.delete(url);
    const waiters = this.#waiters.get(url) ?? [];
    this.#waiters.delete(url);
    for (const wake of waiters) wake();
  }

  /** Most recently created peer. */
  get lastPeer(): MemoryPeer | undefined {
    return this.peers[this.peers.length - 1];
  }

  async connect(url: string): Promise<ConnectResult> {
    if (this.#pending.has(url)) {
      await new Promise<void>((resolve) => {
        const list = this.#waiters.get(url) ?? [];
        list.push(resolve);
        this.#waiters.set(url, list);
      });
    }

    const refusal = this.#refused.get(url);
    if (refusal !== undefined) {
      throw new Error(refusal);
    }

    const peer = new MemoryPeer(url, this.#opts);
    this.peers.push(peer);
    return {
      transport: new MemoryTransport(peer),
      response: { status: 101, headers: {} },
    };
  }
}
