/**
 * Bridge: owns one registry and one dispatch loop, and creates
 * connections against a transport connector.
 *
 * @example
 * ```ts
 * const bridge = createBridge({ verbose: true });
 * const conn = bridge.connect("wss://echo.example");
 * conn.onMessage = (text) => console.log(text);
 * // ...
 * await bridge.shutdown();
 * ```
 */

import { createDuplex, type HostEnds } from "./channel/duplex.js";
import { resolveConfig, type BridgeConfig, type ConfigOverrides } from "./config.js";
import { Connection, type ConnectionHost } from "./connection.js";
import { Dispatcher } from "./dispatch.js";
import { toError, type CallbackError } from "./errors.js";
import { createLogger, type Logger } from "./log.js";
import type { WorkerOutcome } from "./protocol.js";
import { ConnectionRegistry } from "./registry.js";
import { NodeScheduler, type HostScheduler } from "./scheduler.js";
import type { TransportConnector } from "./transport/transport.js";
import { WsConnector } from "./transport/ws.js";
import { TransportWorker, type Sleep } from "./worker.js";

/** Options for constructing a Bridge. */
export interface BridgeOptions extends ConfigOverrides {
  /** Opens transports. Default: {@link WsConnector}. */
  connector?: TransportConnector;
  /** Runs the dispatch loop. Default: {@link NodeScheduler}. */
  scheduler?: HostScheduler;
  /** Default: stderr logger at the configured level. */
  logger?: Logger;
  /** Wait between worker poll iterations. */
  sleep?: Sleep;
  /** Receives failing callbacks. Default: log at error level. */
  onCallbackError?: (err: CallbackError) => void;
  /** Environment consulted for unset options. Default: `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export class Bridge implements ConnectionHost {
  readonly registry = new ConnectionRegistry();
  readonly config: BridgeConfig;
  readonly #dispatcher: Dispatcher;
  readonly #connector: TransportConnector;
  readonly #logger: Logger;
  readonly #sleep: Sleep | undefined;
  readonly #onCallbackError: (err: CallbackError) => void;
  readonly #workers = new Set<Promise<void>>();

  constructor(opts: BridgeOptions = {}) {
    this.config = resolveConfig(opts, opts.env);
    this.#connector = opts.connector ?? new WsConnector();
    this.#logger = opts.logger ?? createLogger({ level: this.config.logLevel });
    this.#sleep = opts.sleep;
    this.#onCallbackError =
      opts.onCallbackError ??
      ((err) => {
        this.#logger.error(err.message);
        if (err.cause?.stack) this.#logger.debug(err.cause.stack);
      });
    this.#dispatcher = new Dispatcher({
      registry: this.registry,
      scheduler: opts.scheduler ?? new NodeScheduler(),
      intervalSeconds: this.config.dispatchIntervalSeconds,
      logger: this.#logger,
      onCallbackError: (err) => this.reportCallbackError(err),
    });
  }

  /** Open a connection to `url`. Events arrive on later scheduler ticks. */
  connect(url: string): Connection {
    const conn = new Connection(url, this, this.spawn(url));
    this.adopt(conn);
    this.#logger.debug(`${conn}: connecting to ${url}`);
    return conn;
  }

  /** Run the dispatch loop once, outside the scheduler. */
  tick(): void {
    this.#dispatcher.tick();
  }

  /** Whether the dispatch loop is registered with the scheduler. */
  get scheduled(): boolean {
    return this.#dispatcher.scheduled;
  }

  /** Number of worker tasks still running. */
  get activeWorkers(): number {
    return this.#workers.size;
  }

  /** Resolves once every worker spawned so far has ended. */
  async settled(): Promise<void> {
    while (this.#workers.size > 0) {
      await Promise.all([...this.#workers]);
    }
  }

  /** Dispose every registered connection, stop the loop, wait for workers. */
  async shutdown(): Promise<void> {
    for (const conn of this.registry.snapshot()) {
      conn.dispose();
    }
    this.#dispatcher.unschedule();
    await this.settled();
  }

  // ---------------------------------------------------------------------------
  // ConnectionHost
  // ---------------------------------------------------------------------------

  /** @internal */
  spawn(url: string): HostEnds {
    const { host, worker } = createDuplex();
    const task: Promise<void> = new TransportWorker(url, worker, {
      connector: this.#connector,
      pollIntervalMs: this.config.pollIntervalMs,
      logger: this.#logger,
      sleep: this.#sleep,
    })
      .run()
      .then(
        (outcome) => this.#logger.debug(`${url}: worker ended: ${describeOutcome(outcome)}`),
        (err: unknown) => this.#logger.error(`${url}: worker failed: ${toError(err).message}`),
      )
      .finally(() => this.#workers.delete(task));
    this.#workers.add(task);
    return host;
  }

  /** @internal */
  adopt(conn: Connection): void {
    this.registry.add(conn);
    this.#dispatcher.ensureScheduled();
  }

  /** @internal */
  retire(conn: Connection): boolean {
    return this.registry.retire(conn);
  }

  /** @internal */
  reportCallbackError(err: CallbackError): void {
    this.#onCallbackError(err);
  }
}

function describeOutcome(outcome: WorkerOutcome): string {
  switch (outcome.kind) {
    case "connect-failed":
    case "transport-error":
      return `${outcome.kind} (${outcome.error.message})`;
    case "peer-closed":
      return `${outcome.kind} (${outcome.reason})`;
    case "host-dropped":
      return outcome.kind;
  }
}

export function createBridge(opts: BridgeOptions = {}): Bridge {
  return new Bridge(opts);
}

let defaultBridge: Bridge | undefined;

/** The process-wide bridge behind {@link connect}, created on first use. */
export function getDefaultBridge(): Bridge {
  defaultBridge ??= createBridge();
  return defaultBridge;
}

/** Open a connection on the default bridge. */
export function connect(url: string): Connection {
  return getDefaultBridge().connect(url);
}
