/**
 * Type-safe matching utilities for BridgeEvent.
 *
 * @example Exhaustive matching
 * ```ts
 * const label = matchEvent(event, {
 *   connected:    () => "connected",
 *   message:      (e) => e.text,
 *   error:        (e) => `error: ${e.message}`,
 *   disconnected: (e) => `closed (${e.reason})`,
 * });
 * ```
 *
 * @example Partial matching with default
 * ```ts
 * const text = matchEventPartial(event, {
 *   message: (e) => e.text,
 *   _:       () => null,
 * });
 * ```
 */

import type { BridgeEvent } from "./protocol.js";

/** Union of all event type discriminator strings. */
export type BridgeEventType = BridgeEvent["type"];

/** Extract a specific event interface by its type string. */
export type EventOfType<T extends BridgeEventType> = Extract<BridgeEvent, { type: T }>;

/** A visitor requiring a handler for every event type. */
export type BridgeEventVisitor<R> = {
  [T in BridgeEventType]: (event: EventOfType<T>) => R;
};

/** A partial visitor with a required `_` default for unhandled types. */
export type PartialVisitor<R> = Partial<BridgeEventVisitor<R>> & {
  _: (event: BridgeEvent) => R;
};

/** Exhaustive event matcher: compile error if any event type is missing. */
export function matchEvent<R>(event: BridgeEvent, visitor: BridgeEventVisitor<R>): R {
  switch (event.type) {
    case "connected":
      return visitor.connected(event);
    case "message":
      return visitor.message(event);
    case "error":
      return visitor.error(event);
    case "disconnected":
      return visitor.disconnected(event);
    default:
      return assertNever(event);
  }
}

/** Partial event matcher: unhandled types fall through to the `_` default. */
export function matchEventPartial<R>(event: BridgeEvent, visitor: PartialVisitor<R>): R {
  switch (event.type) {
    case "connected":
      return visitor.connected ? visitor.connected(event) : visitor._(event);
    case "message":
      return visitor.message ? visitor.message(event) : visitor._(event);
    case "error":
      return visitor.error ? visitor.error(event) : visitor._(event);
    case "disconnected":
      return visitor.disconnected ? visitor.disconnected(event) : visitor._(event);
    default:
      return assertNever(event);
  }
}

/** Type predicate that narrows a `BridgeEvent` to a specific variant. */
export function isEventType<T extends BridgeEventType>(
  event: BridgeEvent,
  type: T,
): event is EventOfType<T> {
  return event.type === type;
}

/** Exhaustive-check helper: call in the `default` branch of a switch. */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
