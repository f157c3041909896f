import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";
import type { Transport } from "../../sdk/transport/transport.js";
import { WsConnector } from "../../sdk/transport/ws.js";
import { createBridgeHarness, record, wait, type BridgeHarness } from "../helpers/harness.js";

// Loopback server in this process; nothing leaves the machine.

let server: WebSocketServer;
let url: string;
/** Server side of the most recent connection. */
let peer: WebSocket | undefined;
let h: BridgeHarness | undefined;

beforeEach(async () => {
  server = new WebSocketServer({ host: "127.0.0.1", port: 0 });
  server.on("connection", (socket) => {
    peer = socket;
  });
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const addr = server.address();
  if (typeof addr !== "object" || addr === null) throw new Error("server not listening");
  url = `ws://127.0.0.1:${addr.port}/`;
});

afterEach(async () => {
  await h?.bridge.shutdown();
  h = undefined;
  peer = undefined;
  for (const client of server.clients) client.terminate();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

/** Bridge on the real adapter, ticking every few milliseconds. */
function harness(): BridgeHarness {
  h = createBridgeHarness(new WsConnector({ handshakeTimeoutMs: 2000 }), 5);
  return h;
}

function serverSocket(): WebSocket {
  if (!peer) throw new Error("no server connection yet");
  return peer;
}

/** Poll `read()` until it yields something other than wouldBlock. */
async function nextRead(transport: Transport) {
  for (let i = 0; i < 400; i++) {
    const result = transport.read();
    if (result.status !== "wouldBlock") return result;
    await wait(5);
  }
  throw new Error("nothing to read");
}

describe("WsConnector", () => {
  it("resolves with the handshake response", async () => {
    const { transport, response } = await new WsConnector().connect(url);

    expect(response.status).toBe(101);
    expect(() => transport.setNoDelay(true)).not.toThrow();
    expect(transport.read()).toEqual({ status: "wouldBlock" });
    transport.terminate();
  });

  it("rejects a malformed URL", async () => {
    await expect(new WsConnector().connect("not a url")).rejects.toThrow();
  });

  it("rejects when nothing listens on the port", async () => {
    const closedUrl = url;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = new WebSocketServer({ noServer: true });

    await expect(new WsConnector().connect(closedUrl)).rejects.toThrow(/ECONNREFUSED/);
  });
});

describe("WsTransport", () => {
  it("buffers server frames in arrival order", async () => {
    const { transport } = await new WsConnector().connect(url);
    const socket = serverSocket();
    socket.send("first");
    socket.send(Buffer.from([1, 2]), { binary: true });

    expect(await nextRead(transport)).toEqual({
      status: "frame",
      frame: { kind: "text", data: Buffer.from("first") },
    });
    expect(await nextRead(transport)).toEqual({
      status: "frame",
      frame: { kind: "binary", data: Buffer.from([1, 2]) },
    });
    transport.terminate();
  });

  it("surfaces a ping instead of answering it", async () => {
    const { transport } = await new WsConnector().connect(url);
    const pongs: string[] = [];
    serverSocket().on("pong", (data) => pongs.push(data.toString()));
    serverSocket().ping("hb");

    expect(await nextRead(transport)).toEqual({
      status: "frame",
      frame: { kind: "ping", data: Buffer.from("hb") },
    });
    await wait(20);
    expect(pongs).toEqual([]);
    transport.terminate();
  });

  it("reports a dropped socket as a read error", async () => {
    const { transport } = await new WsConnector().connect(url);
    serverSocket().terminate();

    const result = await nextRead(transport);
    expect(result.status).toBe("error");
    if (result.status === "error") {
      expect(result.error.message).toBe("connection closed abnormally (1006)");
    }
  });
});

describe("bridge over ws", () => {
  it("echoes text both ways", async () => {
    const { bridge, pump } = harness();
    server.on("connection", (socket) => {
      socket.on("message", (data) => socket.send(data.toString()));
    });
    const conn = bridge.connect(url);
    const rec = record(conn);
    await pump(() => rec.connects === 1);

    conn.send("hello");
    await pump(() => rec.messages.length === 1);

    expect(rec.messages).toEqual(["hello"]);
  });

  it("decodes invalid UTF-8 leniently", async () => {
    const { bridge, pump } = harness();
    const conn = bridge.connect(url);
    const rec = record(conn);
    await pump(() => rec.connects === 1);

    serverSocket().send(Buffer.from([0x68, 0xff, 0x69]), { binary: false });
    await pump(() => rec.messages.length === 1);

    expect(rec.messages).toEqual(["h\uFFFDi"]);
    expect(rec.errors).toEqual([]);
  });

  it("answers a server ping with a pong carrying the payload", async () => {
    const { bridge, pump } = harness();
    const conn = bridge.connect(url);
    const rec = record(conn);
    await pump(() => rec.connects === 1);
    const pongs: string[] = [];
    serverSocket().on("pong", (data) => pongs.push(data.toString()));

    serverSocket().ping("heartbeat");
    await pump(() => pongs.length === 1);

    expect(pongs).toEqual(["heartbeat"]);
  });

  it("delivers the server's close reason", async () => {
    const { bridge, pump } = harness();
    const conn = bridge.connect(url);
    const rec = record(conn);
    await pump(() => rec.connects === 1);

    serverSocket().close(4000, "maintenance");
    await pump(() => rec.disconnects.length === 1);

    expect(rec.calls).toEqual(["connect", "disconnect:maintenance"]);
    expect(conn.closed).toBe(true);
  });

  it("reports 'unknown' for a close without status", async () => {
    const { bridge, pump } = harness();
    const conn = bridge.connect(url);
    const rec = record(conn);
    await pump(() => rec.connects === 1);

    serverSocket().close();
    await pump(() => rec.disconnects.length === 1);

    expect(rec.disconnects).toEqual(["unknown"]);
  });

  it("runs the close handshake started by the client", async () => {
    const { bridge, pump } = harness();
    const conn = bridge.connect(url);
    const rec = record(conn);
    await pump(() => rec.connects === 1);
    const codes: number[] = [];
    serverSocket().on("close", (code) => codes.push(code));

    conn.close();
    await pump(() => rec.disconnects.length === 1);

    expect(codes).toEqual([1000]);
    expect(rec.disconnects).toEqual([""]);
  });

  it("treats an abnormal drop as an error, not a disconnect", async () => {
    const { bridge, pump, run } = harness();
    const conn = bridge.connect(url);
    const rec = record(conn);
    await pump(() => rec.connects === 1);

    serverSocket().terminate();
    await pump(() => !bridge.registry.has(conn));
    await run(3);

    expect(rec.calls).toEqual(["connect", "error:connection closed abnormally (1006)"]);
    expect(rec.disconnects).toEqual([]);
    expect(conn.closed).toBe(false);
  });

  it("reports a refused connection through onError", async () => {
    const { bridge, pump } = harness();
    const closedUrl = url;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = new WebSocketServer({ noServer: true });
    const conn = bridge.connect(closedUrl);
    const rec = record(conn);

    await pump(() => !bridge.registry.has(conn));

    expect(rec.errors).toHaveLength(1);
    expect(rec.errors[0]).toMatch(/ECONNREFUSED/);
    expect(rec.disconnects).toEqual([]);
  });
});
