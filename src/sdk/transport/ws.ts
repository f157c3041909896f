/**
 * WebSocket transport over the `ws` package.
 *
 * `ws` is event driven; this adapter buffers every inbound frame and error
 * in arrival order so the worker can poll with a non-blocking `read()`.
 * Automatic pong replies and UTF-8 validation are switched off: the worker
 * answers pings itself and decodes text frames leniently.
 */

import type { IncomingMessage } from "node:http";
import type { Socket } from "node:net";
import WebSocket from "ws";
import type {
  ConnectResult,
  Frame,
  HandshakeResponse,
  ReadResult,
  Transport,
  TransportConnector,
} from "./transport.js";
import { CLOSE_ABNORMAL } from "./transport.js";

/** Options for constructing a WsConnector. */
export interface WsConnectorOptions {
  /** Abort the opening handshake after this many milliseconds. */
  handshakeTimeoutMs?: number;
  /** Extra headers sent with the upgrade request. */
  headers?: Record<string, string>;
  /** Subprotocols offered during the handshake. */
  protocols?: string[];
}

/** Opens {@link WsTransport}s. */
export class WsConnector implements TransportConnector {
  readonly #opts: WsConnectorOptions;

  constructor(opts: WsConnectorOptions = {}) {
    this.#opts = opts;
  }

  connect(url: string): Promise<ConnectResult> {
    return new Promise<ConnectResult>((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url, this.#opts.protocols, {
          autoPong: false,
          skipUTF8Validation: true,
          perMessageDeflate: false,
          handshakeTimeout: this.#opts.handshakeTimeoutMs,
          headers: this.#opts.headers,
        });
      } catch (err) {
        // Malformed URLs throw synchronously
        reject(err instanceof Error ? err : new Error(String(err)));
        return;
      }

      const transport = new WsTransport(ws);
      let response: HandshakeResponse = { status: 101, headers: {} };

      ws.once("upgrade", (res: IncomingMessage) => {
        response = { status: res.statusCode ?? 101, headers: res.headers };
        transport.attachSocket(res.socket);
      });

      const onError = (err: Error) => {
        ws.off("open", onOpen);
        reject(err);
      };
      const onOpen = () => {
        ws.off("error", onError);
        transport.listen();
        resolve({ transport, response });
      };

      ws.once("error", onError);
      ws.once("open", onOpen);
    });
  }
}

/** Transport wrapping one open `ws` client. */
export class WsTransport implements Transport {
  readonly #ws: WebSocket;
  readonly #inbound: ReadResult[] = [];
  #socket: Socket | undefined;

  constructor(ws: WebSocket) {
    this.#ws = ws;
  }

  /** @internal */
  attachSocket(socket: Socket): void {
    this.#socket = socket;
  }

  /** Start buffering inbound traffic. @internal */
  listen(): void {
    this.#ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      const bytes = toBytes(data);
      this.#push(isBinary ? { kind: "binary", data: bytes } : { kind: "text", data: bytes });
    });
    this.#ws.on("ping", (data: Buffer) => this.#push({ kind: "ping", data }));
    this.#ws.on("pong", (data: Buffer) => this.#push({ kind: "pong", data }));
    this.#ws.on("close", (code: number, reason: Buffer) => {
      // No close frame arrived: the socket died under us
      if (code === CLOSE_ABNORMAL) {
        this.#inbound.push({
          status: "error",
          error: new Error(`connection closed abnormally (${CLOSE_ABNORMAL})`),
        });
        return;
      }
      this.#push({ kind: "close", code, reason: reason.toString("utf8") });
    });
    this.#ws.on("error", (error: Error) => {
      this.#inbound.push({ status: "error", error });
    });
  }

  send(frame: Frame): void {
    switch (frame.kind) {
      case "text":
        this.#ws.send(frame.data, { binary: false });
        break;
      case "binary":
        this.#ws.send(frame.data, { binary: true });
        break;
      case "ping":
        this.#ws.ping(frame.data);
        break;
      case "pong":
        this.#ws.pong(frame.data);
        break;
      case "close":
        this.#ws.close(frame.code, frame.reason);
        break;
    }
  }

  read(): ReadResult {
    return this.#inbound.shift() ?? { status: "wouldBlock" };
  }

  close(code: number, reason: string): void {
    this.#ws.close(code, reason);
  }

  terminate(): void {
    this.#ws.terminate();
  }

  setNoDelay(enabled: boolean): void {
    this.#socket?.setNoDelay(enabled);
  }

  #push(frame: Frame): void {
    this.#inbound.push({ status: "frame", frame });
  }
}

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}
