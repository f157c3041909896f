/**
 * CLI store: session state via Zustand with sliced concerns.
 *
 * | Slice      | Concern                                  |
 * |------------|------------------------------------------|
 * | connection | Status, counters, last error and reason  |
 * | log        | Ring buffer of recent traffic            |
 *
 * @module
 */

import { createStore } from "zustand/vanilla";
import { createConnectionSlice, type ConnectionSlice } from "./connection.js";
import { createLogSlice, type LogSlice } from "./log.js";

export interface CliStore extends ConnectionSlice, LogSlice {}

/** Create a fresh store. One per CLI session. */
export function createCliStore() {
  return createStore<CliStore>()((...a) => ({
    ...createConnectionSlice(...a),
    ...createLogSlice(...a),
  }));
}

export type CliStoreApi = ReturnType<typeof createCliStore>;
