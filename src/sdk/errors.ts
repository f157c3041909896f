/**
 * Structured error hierarchy for the bridge.
 *
 * All errors extend BridgeError with a `.code` discriminant for programmatic
 * handling via switch statements or type predicates.
 *
 * @example
 * ```ts
 * try {
 *   conn.send("hello");
 * } catch (e) {
 *   if (isErrorCode(e, "CHANNEL_CLOSED")) conn.open();
 * }
 * ```
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

/** Union of all error codes for exhaustive switch handling. */
export type BridgeErrorCode =
  | "CHANNEL_CLOSED"
  | "CONNECT_FAILED"
  | "TRANSPORT_ERROR"
  | "CALLBACK_FAILED"
  | "INVALID_CONFIG";

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/** Base error for all bridge errors. */
export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly cause?: Error;

  constructor(code: BridgeErrorCode, message: string, opts?: { cause?: Error }) {
    super(message);
    this.code = code;
    this.name = "BridgeError";
    if (opts?.cause) this.cause = opts.cause;
  }
}

// ---------------------------------------------------------------------------
// Concrete errors
// ---------------------------------------------------------------------------

/** The other end of a queue is gone (worker exited, or handle was force-closed). */
export class ChannelClosedError extends BridgeError {
  readonly code = "CHANNEL_CLOSED" as const;

  constructor(message: string = "Channel is closed") {
    super("CHANNEL_CLOSED", message);
    this.name = "ChannelClosedError";
  }
}

/** The transport could not establish a connection. Terminal for the generation. */
export class ConnectFailureError extends BridgeError {
  readonly code = "CONNECT_FAILED" as const;
  readonly url: string;

  constructor(url: string, message: string, opts?: { cause?: Error }) {
    super("CONNECT_FAILED", message, opts);
    this.name = "ConnectFailureError";
    this.url = url;
  }
}

/** Mid-session read failure. Terminal for the generation. */
export class TransportError extends BridgeError {
  readonly code = "TRANSPORT_ERROR" as const;

  constructor(message: string, opts?: { cause?: Error }) {
    super("TRANSPORT_ERROR", message, opts);
    this.name = "TransportError";
  }
}

/** Callback names a handle may define. */
export type CallbackName = "onConnect" | "onMessage" | "onError" | "onDisconnect";

/** A host callback threw during dispatch. Never fatal. */
export class CallbackError extends BridgeError {
  readonly code = "CALLBACK_FAILED" as const;
  readonly callback: CallbackName;
  /** String form of the connection the callback belongs to. */
  readonly connection: string;

  constructor(callback: CallbackName, connection: string, cause: Error) {
    super("CALLBACK_FAILED", `${connection} ${callback} failed: ${cause.message}`, { cause });
    this.name = "CallbackError";
    this.callback = callback;
    this.connection = connection;
  }
}

/** An option or environment variable holds an unusable value. */
export class ConfigError extends BridgeError {
  readonly code = "INVALID_CONFIG" as const;
  readonly key: string;

  constructor(key: string, message: string) {
    super("INVALID_CONFIG", `${key}: ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}

// ---------------------------------------------------------------------------
// Type predicates
// ---------------------------------------------------------------------------

/** Narrow any caught value to a {@link BridgeError}. */
export function isBridgeError(err: unknown): err is BridgeError {
  return err instanceof BridgeError;
}

/** Narrow to a specific error by code. */
export function isErrorCode<C extends BridgeErrorCode>(
  err: unknown,
  code: C,
): err is BridgeError & { code: C } {
  return err instanceof BridgeError && err.code === code;
}

/** Coerce an unknown thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
