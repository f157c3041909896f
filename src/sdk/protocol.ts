/**
 * Messages that cross the boundary between a connection handle and its
 * transport worker.
 *
 * @module
 */

import type { ConnectFailureError, TransportError } from "./errors.js";

// ── Host → worker ────────────────────────────────────────────────

/** Write a text frame. */
export interface MessageCommand {
  type: "message";
  text: string;
}

/** Start the close handshake. */
export interface CloseCommand {
  type: "close";
}

export type Command = MessageCommand | CloseCommand;

// ── Worker → host ────────────────────────────────────────────────

export interface ConnectedEvent {
  type: "connected";
}

export interface MessageEvent {
  type: "message";
  text: string;
}

export interface ErrorEvent {
  type: "error";
  message: string;
}

export interface DisconnectedEvent {
  type: "disconnected";
  reason: string;
}

export type BridgeEvent = ConnectedEvent | MessageEvent | ErrorEvent | DisconnectedEvent;

// ── Worker lifecycle ─────────────────────────────────────────────

/**
 * How a worker task ended. Every worker resolves with exactly one of these.
 *
 * - `connect-failed`: the handshake never completed
 * - `peer-closed`: the remote side sent a close frame
 * - `transport-error`: a read failed mid-session
 * - `host-dropped`: the host side closed the command queue
 */
export type WorkerOutcome =
  | { kind: "connect-failed"; error: ConnectFailureError }
  | { kind: "peer-closed"; reason: string }
  | { kind: "transport-error"; error: TransportError }
  | { kind: "host-dropped" };

/** Reason reported when the peer closes without a status. */
export const UNKNOWN_CLOSE_REASON = "unknown";

/** Reason reported to `onDisconnect` when the host forces closure. */
export const USER_CLOSE_REASON = "closed by user";

/** Well-known name the dispatch loop is registered under. */
export const DISPATCH_TIMER_NAME = "wsbridge.dispatch";
