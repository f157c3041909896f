/**
 * `wsbridge connect <url>`: interactive session on one connection.
 *
 * Every stdin line is sent as a text message; lines starting with `/` are
 * commands (see `/help`). Events are printed as they are dispatched.
 */
import { createInterface } from "node:readline";
import { formatEntry, formatEvent } from "../lib/format.js";
import { HELP_TEXT, parseInput, type InputAction } from "../lib/input.js";
import { createBridge, type Bridge } from "../sdk/bridge.js";
import type { Connection } from "../sdk/connection.js";
import { isBridgeError } from "../sdk/errors.js";
import { assertNever } from "../sdk/match.js";
import type { BridgeEvent } from "../sdk/protocol.js";
import { createCliStore, type CliStoreApi } from "../state/store.js";

export interface ConnectSessionOptions {
  bridge: Bridge;
  url: string;
  /** Receives every line meant for the user. */
  print: (line: string) => void;
  store?: CliStoreApi;
  color?: boolean;
}

/** Glue between one connection, the CLI store and the terminal. */
export class ConnectSession {
  readonly store: CliStoreApi;
  readonly #bridge: Bridge;
  readonly #url: string;
  readonly #print: (line: string) => void;
  readonly #color: boolean;
  #conn: Connection | undefined;

  constructor(opts: ConnectSessionOptions) {
    this.#bridge = opts.bridge;
    this.#url = opts.url;
    this.#print = opts.print;
    this.#color = opts.color ?? false;
    this.store = opts.store ?? createCliStore();
  }

  get connection(): Connection | undefined {
    return this.#conn;
  }

  /** Open the connection and wire its callbacks. */
  start(): Connection {
    const conn = this.#bridge.connect(this.#url);
    const { recordEvent } = this.store.getState();
    const show = (event: BridgeEvent) => {
      recordEvent(event);
      this.#print(formatEvent(event, this.#color));
    };

    conn.onConnect = () => show({ type: "connected" });
    conn.onMessage = (text) => show({ type: "message", text });
    conn.onError = (message) => show({ type: "error", message });
    conn.onDisconnect = (reason) => show({ type: "disconnected", reason });

    this.store.getState().beginConnect(this.#url, conn.id);
    this.#conn = conn;
    return conn;
  }

  /** Handle one input line. Returns `"quit"` when the session should end. */
  handleLine(line: string): "continue" | "quit" {
    return this.handle(parseInput(line));
  }

  handle(action: InputAction): "continue" | "quit" {
    const conn = this.#conn ?? this.start();
    const state = this.store.getState();

    try {
      switch (action.kind) {
        case "empty":
          break;
        case "send":
          conn.send(action.text);
          state.recordSent(action.text);
          break;
        case "close":
          conn.close();
          state.markClosing();
          break;
        case "closeNow":
          conn.closeNow();
          break;
        case "open":
          if (!conn.closed && state.status !== "closed") {
            this.#print("already open");
            break;
          }
          // A generation that ended in an error leaves the handle open
          if (!conn.closed) conn.closeNow();
          conn.open();
          state.beginConnect(this.#url, conn.id);
          break;
        case "history":
          for (const entry of state.recentEntries(action.count)) {
            this.#print(formatEntry(entry));
          }
          break;
        case "status": {
          const s = this.store.getState();
          this.#print(`${conn} ${s.status} sent=${s.sent} received=${s.received}`);
          if (s.lastError) this.#print(`last error: ${s.lastError}`);
          break;
        }
        case "help":
          this.#print(HELP_TEXT);
          break;
        case "quit":
          return "quit";
        case "unknown":
          this.#print(`unknown command: ${action.command} (try /help)`);
          break;
        default:
          assertNever(action);
      }
    } catch (err) {
      if (!isBridgeError(err)) throw err;
      this.#print(`${err.name}: ${err.message}`);
    }
    return "continue";
  }
}

export interface RunConnectOptions {
  pollInterval?: number;
  dispatchInterval?: number;
  verbose?: boolean;
}

export async function runConnect(url: string, opts: RunConnectOptions = {}): Promise<void> {
  const bridge = createBridge({
    pollIntervalMs: opts.pollInterval,
    dispatchIntervalSeconds: opts.dispatchInterval,
    verbose: opts.verbose,
  });
  const session = new ConnectSession({
    bridge,
    url,
    print: (line) => process.stdout.write(line + "\n"),
    color: process.stdout.isTTY === true,
  });
  session.start();

  const rl = createInterface({ input: process.stdin, terminal: false });
  try {
    for await (const line of rl) {
      if (session.handleLine(line) === "quit") break;
    }
  } finally {
    rl.close();
    await bridge.shutdown();
  }
}
