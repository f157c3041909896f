#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

// --- Parse CLI args ---

const argv = await yargs(hideBin(process.argv))
  .scriptName("wsbridge")
  .usage("Usage: $0 <command> [options]")
  .command("connect <url>", "Open an interactive WebSocket session", (y) =>
    y
      .positional("url", {
        type: "string",
        describe: "ws:// or wss:// URL to connect to",
        demandOption: true,
      })
      .option("poll-interval", {
        type: "number",
        describe: "Worker poll period in milliseconds",
      })
      .option("dispatch-interval", {
        type: "number",
        describe: "Dispatch loop period in seconds",
      })
      .option("verbose", {
        alias: "v",
        type: "boolean",
        default: false,
        describe: "Debug logging on stderr",
      }),
  )
  .command("version", "Print version information and exit")
  .demandCommand(1)
  .strict()
  .help()
  .parse();

// --- Route to subcommands ---

const command = String(argv._[0]);

if (command === "version") {
  const { runVersion } = await import("./commands/version.js");
  runVersion();
} else if (command === "connect") {
  const { runConnect } = await import("./commands/connect.js");
  const url = typeof argv.url === "string" ? argv.url : "";
  try {
    await runConnect(url, {
      pollInterval: numberArg(argv.pollInterval),
      dispatchInterval: numberArg(argv.dispatchInterval),
      verbose: argv.verbose === true,
    });
  } catch (err: unknown) {
    process.exitCode = 1;
    if (err instanceof Error && err.message) {
      process.stderr.write(err.message + "\n");
    }
  }
}

function numberArg(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}
