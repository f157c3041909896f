/**
 * wsbridge: WebSocket connections for single-threaded hosts.
 *
 * Each connection's socket I/O runs in its own worker task; the host sees
 * it only through callbacks fired by a periodic dispatch loop.
 *
 * @example Quick start
 * ```ts
 * import { connect } from "wsbridge";
 *
 * const conn = connect("wss://echo.example");
 * conn.onConnect = () => conn.send("hello");
 * conn.onMessage = (text) => console.log("received", text);
 * conn.onDisconnect = (reason) => console.log("disconnected", reason);
 * ```
 *
 * @module
 */

// ── Primary API ─────────────────────────────────────────────────────
export { connect, createBridge, getDefaultBridge, Bridge, type BridgeOptions } from "./bridge.js";
export {
  Connection,
  type ConnectionCallbacks,
  type CallbackResult,
} from "./connection.js";

// ── Configuration & logging ─────────────────────────────────────────
export {
  resolveConfig,
  DEFAULT_CONFIG,
  ENV_POLL_INTERVAL,
  ENV_DISPATCH_INTERVAL,
  ENV_LOG_LEVEL,
  type BridgeConfig,
  type ConfigOverrides,
} from "./config.js";
export { createLogger, silentLogger, LOG_LEVELS, type Logger, type LogLevel, type LoggerOptions } from "./log.js";

// ── Errors ──────────────────────────────────────────────────────────
export {
  BridgeError,
  ChannelClosedError,
  ConnectFailureError,
  TransportError,
  CallbackError,
  ConfigError,
  isBridgeError,
  isErrorCode,
  type BridgeErrorCode,
  type CallbackName,
} from "./errors.js";

// ── Protocol & event matching ───────────────────────────────────────
export {
  DISPATCH_TIMER_NAME,
  UNKNOWN_CLOSE_REASON,
  USER_CLOSE_REASON,
  type BridgeEvent,
  type Command,
  type WorkerOutcome,
} from "./protocol.js";
export {
  matchEvent,
  matchEventPartial,
  isEventType,
  assertNever,
  type BridgeEventType,
  type EventOfType,
  type BridgeEventVisitor,
  type PartialVisitor,
} from "./match.js";

// ── Low-level (advanced usage) ──────────────────────────────────────
export { ConnectionRegistry } from "./registry.js";
export { Dispatcher, type DispatcherOptions } from "./dispatch.js";
export { TransportWorker, type WorkerOptions, type Sleep } from "./worker.js";
export { NodeScheduler, ManualScheduler, type HostScheduler } from "./scheduler.js";
export {
  createChannel,
  inertSender,
  inertReceiver,
  type Sender,
  type Receiver,
  type RecvResult,
} from "./channel/queue.js";
export { SharedReceiver, type ReceiverGuard } from "./channel/shared.js";
export { createDuplex, type DuplexChannelPair, type HostEnds, type WorkerEnds } from "./channel/duplex.js";
export {
  CLOSE_NORMAL,
  CLOSE_NO_STATUS,
  CLOSE_ABNORMAL,
  type Transport,
  type TransportConnector,
  type ConnectResult,
  type HandshakeResponse,
  type Frame,
  type ReadResult,
} from "./transport/transport.js";
export { WsConnector, WsTransport, type WsConnectorOptions } from "./transport/ws.js";
export { MemoryConnector, MemoryPeer, type MemoryPeerOptions } from "./transport/memory.js";
