/**
 * Duplex channel pair: the two queues linking one worker generation to its
 * connection handle.
 */

import type { BridgeEvent, Command } from "../protocol.js";
import { createChannel, type Receiver, type Sender } from "./queue.js";

/** The ends held by the connection handle. */
export interface HostEnds {
  commands: Sender<Command>;
  events: Receiver<BridgeEvent>;
}

/** The ends held by the transport worker. */
export interface WorkerEnds {
  commands: Receiver<Command>;
  events: Sender<BridgeEvent>;
}

export interface DuplexChannelPair {
  host: HostEnds;
  worker: WorkerEnds;
}

/** Create the command and event queues for a new generation. */
export function createDuplex(): DuplexChannelPair {
  const [commandTx, commandRx] = createChannel<Command>();
  const [eventTx, eventRx] = createChannel<BridgeEvent>();
  return {
    host: { commands: commandTx, events: eventRx },
    worker: { commands: commandRx, events: eventTx },
  };
}
