/**
 * Log slice: capped ring buffer of recent traffic and lifecycle lines.
 *
 * @module
 */

import type { StateCreator } from "zustand/vanilla";
import type { LogEntry } from "./types.js";

// ── Constants ────────────────────────────────────────────────────

export const MAX_LOG_ENTRIES = 100;

// ── Slice state + actions ────────────────────────────────────────

export interface LogSlice {
  entries: readonly LogEntry[];

  /** Append an entry; the oldest is dropped past the cap. */
  pushEntry: (entry: Omit<LogEntry, "id" | "timestamp"> & { timestamp?: number }) => void;
  /** The last `count` entries, oldest first. */
  recentEntries: (count: number) => readonly LogEntry[];
  clearLog: () => void;
}

// ── Slice creator ────────────────────────────────────────────────

export const createLogSlice: StateCreator<LogSlice, [], [], LogSlice> = (set, get) => {
  let nextId = 0;

  return {
    entries: [],

    pushEntry: (entry) => {
      const numbered: LogEntry = {
        id: ++nextId,
        timestamp: entry.timestamp ?? Date.now(),
        direction: entry.direction,
        text: entry.text,
      };
      set((state) => ({
        entries:
          state.entries.length >= MAX_LOG_ENTRIES
            ? [...state.entries.slice(-(MAX_LOG_ENTRIES - 1)), numbered]
            : [...state.entries, numbered],
      }));
    },

    recentEntries: (count) => (count <= 0 ? [] : get().entries.slice(-count)),

    clearLog: () => set({ entries: [] }),
  };
};
