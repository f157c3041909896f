/** A single WebSocket frame as seen by the worker. */
export type Frame =
  | { kind: "text"; data: Uint8Array }
  | { kind: "binary"; data: Uint8Array }
  | { kind: "ping"; data: Uint8Array }
  | { kind: "pong"; data: Uint8Array }
  | { kind: "close"; code?: number; reason?: string };

/** Result of a non-blocking read. */
export type ReadResult =
  | { status: "frame"; frame: Frame }
  | { status: "wouldBlock" }
  | { status: "error"; error: Error };

/** Status code for a normal closure. */
export const CLOSE_NORMAL = 1000;

/** Status code meaning "the peer sent no status". */
export const CLOSE_NO_STATUS = 1005;

/**
 * Status code a client library reports locally when the connection dropped
 * without a close frame. Never sent on the wire.
 */
export const CLOSE_ABNORMAL = 1006;

/**
 * One live WebSocket connection.
 *
 * Implementations handle framing and the handshake; the worker only moves
 * frames. `read()` must never wait: it returns `wouldBlock` when nothing has
 * arrived yet.
 */
export interface Transport {
  /** Write a frame. May throw; callers treat writes as best effort. */
  send(frame: Frame): void;

  /** Take the next inbound frame or error, in arrival order. */
  read(): ReadResult;

  /** Start the close handshake. */
  close(code: number, reason: string): void;

  /** Drop the connection without a handshake. Idempotent. */
  terminate(): void;

  /** Toggle Nagle's algorithm on the underlying socket. */
  setNoDelay(enabled: boolean): void;
}

/** Handshake response details, kept for diagnostics. */
export interface HandshakeResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
}

export interface ConnectResult {
  transport: Transport;
  response: HandshakeResponse;
}

/** Opens transports. Rejects when the connection cannot be established. */
export interface TransportConnector {
  connect(url: string): Promise<ConnectResult>;
}
