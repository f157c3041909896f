/**
 * Connection slice: what the CLI knows about its one connection.
 *
 * Folds bridge events into a status and traffic counters, and mirrors every
 * event into the log slice.
 *
 * @module
 */

import type { StateCreator } from "zustand/vanilla";
import { matchEvent } from "../sdk/match.js";
import type { BridgeEvent } from "../sdk/protocol.js";
import type { LogSlice } from "./log.js";
import type { ConnectionStatus, LogEntry } from "./types.js";

// ── Slice state + actions ────────────────────────────────────────

export interface ConnectionSlice {
  url: string | null;
  connectionId: string | null;
  status: ConnectionStatus;
  sent: number;
  received: number;
  lastError: string | null;
  disconnectReason: string | null;

  /** A connection attempt to `url` has started. */
  beginConnect: (url: string, connectionId: string) => void;
  /** Fold a dispatched event into the state. */
  recordEvent: (event: BridgeEvent) => void;
  /** A message was queued for sending. */
  recordSent: (text: string) => void;
  /** The user asked for a graceful close. */
  markClosing: () => void;
}

// ── Slice creator ────────────────────────────────────────────────

export const createConnectionSlice: StateCreator<
  ConnectionSlice & LogSlice,
  [],
  [],
  ConnectionSlice
> = (set, get) => ({
  url: null,
  connectionId: null,
  status: "idle",
  sent: 0,
  received: 0,
  lastError: null,
  disconnectReason: null,

  beginConnect: (url, connectionId) => {
    set({ url, connectionId, status: "connecting", lastError: null, disconnectReason: null });
    get().pushEntry({ direction: "local", text: `connecting to ${url}` });
  },

  recordEvent: (event) => {
    matchEvent(event, {
      connected: () => set({ status: "open" }),
      message: () => set((state) => ({ received: state.received + 1 })),
      // Error events always end the generation
      error: (e) => set({ status: "closed", lastError: e.message }),
      disconnected: (e) => set({ status: "closed", disconnectReason: e.reason }),
    });
    get().pushEntry(
      matchEvent<Omit<LogEntry, "id" | "timestamp">>(event, {
        connected: () => ({ direction: "local" as const, text: "connected" }),
        message: (e) => ({ direction: "in" as const, text: e.text }),
        error: (e) => ({ direction: "local" as const, text: `error: ${e.message}` }),
        disconnected: (e) => ({ direction: "local" as const, text: `disconnected: ${e.reason}` }),
      }),
    );
  },

  recordSent: (text) => {
    set((state) => ({ sent: state.sent + 1 }));
    get().pushEntry({ direction: "out", text });
  },

  markClosing: () => {
    set({ status: "closing" });
    get().pushEntry({ direction: "local", text: "closing" });
  },
});
