/** Lifecycle of the CLI's connection as shown to the user. */
export type ConnectionStatus = "idle" | "connecting" | "open" | "closing" | "closed";

/** Which way a logged line travelled. */
export type LogDirection = "in" | "out" | "local";

export interface LogEntry {
  id: number;
  timestamp: number;
  direction: LogDirection;
  text: string;
}
