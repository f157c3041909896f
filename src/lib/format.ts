import chalk, { Chalk } from "chalk";
import { matchEvent } from "../sdk/match.js";
import type { BridgeEvent } from "../sdk/protocol.js";
import type { LogEntry } from "../state/types.js";

const plain = new Chalk({ level: 0 });

/** Render a dispatched event as one terminal line. */
export function formatEvent(event: BridgeEvent, color = false): string {
  const paint = color ? chalk : plain;
  return matchEvent(event, {
    connected: () => paint.green("* connected"),
    message: (e) => `${paint.cyan("<")} ${e.text}`,
    error: (e) => paint.red(`! error: ${e.message}`),
    disconnected: (e) => paint.yellow(`* disconnected (${e.reason})`),
  });
}

const ARROWS: Record<LogEntry["direction"], string> = {
  in: "<",
  out: ">",
  local: "*",
};

/** Render a log entry with a UTC time prefix, e.g. `12:00:05 > hello`. */
export function formatEntry(entry: LogEntry): string {
  const time = new Date(entry.timestamp).toISOString().slice(11, 19);
  return `${time} ${ARROWS[entry.direction]} ${entry.text}`;
}
