// Parsing of interactive `wsbridge connect` input lines.

export type InputAction =
  | { kind: "send"; text: string }
  | { kind: "close" }
  | { kind: "closeNow" }
  | { kind: "open" }
  | { kind: "history"; count: number }
  | { kind: "status" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "empty" }
  | { kind: "unknown"; command: string };

export const DEFAULT_HISTORY_COUNT = 20;

const SIMPLE_COMMANDS: Record<string, InputAction> = {
  close: { kind: "close" },
  "close-now": { kind: "closeNow" },
  open: { kind: "open" },
  status: { kind: "status" },
  help: { kind: "help" },
  quit: { kind: "quit" },
  exit: { kind: "quit" },
};

export const HELP_TEXT = [
  "Lines are sent as text messages. Commands:",
  "  /close        start the close handshake",
  "  /close-now    drop the connection immediately",
  "  /open         reconnect after a close",
  "  /history [n]  show the last n log entries (default 20)",
  "  /status       show connection status and counters",
  "  /quit         close everything and exit",
  "  //text        send a message that starts with '/'",
].join("\n");

/**
 * Map one input line to an action. A leading `/` marks a command; `//`
 * escapes a literal slash.
 */
export function parseInput(line: string): InputAction {
  const text = line.replace(/\r?\n$/, "").replace(/\r$/, "");
  if (text.trim() === "") return { kind: "empty" };

  if (text.startsWith("//")) return { kind: "send", text: text.slice(1) };
  if (!text.startsWith("/")) return { kind: "send", text };

  const [name = "", ...args] = text.slice(1).trim().split(/\s+/);
  const command = name.toLowerCase();

  if (command === "history") {
    const raw = args[0];
    if (raw === undefined) return { kind: "history", count: DEFAULT_HISTORY_COUNT };
    const count = Number.parseInt(raw, 10);
    return Number.isNaN(count) || count < 0
      ? { kind: "unknown", command: text }
      : { kind: "history", count };
  }

  return SIMPLE_COMMANDS[command] ?? { kind: "unknown", command: text };
}
