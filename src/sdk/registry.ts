import type { Connection } from "./connection.js";

/**
 * Live connections eligible for event dispatch, keyed by reference
 * identity. One registry per bridge.
 */
export class ConnectionRegistry {
  readonly #entries = new Set<Connection>();

  /** Add `conn`. Returns false if it was already registered. */
  add(conn: Connection): boolean {
    if (this.#entries.has(conn)) return false;
    this.#entries.add(conn);
    return true;
  }

  /** Remove `conn`. Returns false if it was not registered. */
  retire(conn: Connection): boolean {
    return this.#entries.delete(conn);
  }

  has(conn: Connection): boolean {
    return this.#entries.has(conn);
  }

  get size(): number {
    return this.#entries.size;
  }

  /** Copy of the current entries in registration order. */
  snapshot(): Connection[] {
    return [...this.#entries];
  }
}
