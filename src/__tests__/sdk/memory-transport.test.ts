import { describe, expect, it } from "vitest";
import { MemoryConnector } from "../../sdk/transport/memory.js";

const URL_A = "ws://memory.test/a";

async function open(connector = new MemoryConnector()) {
  const { transport, response } = await connector.connect(URL_A);
  const peer = connector.lastPeer;
  if (!peer) throw new Error("no peer");
  return { transport, response, peer };
}

describe("MemoryConnector", () => {
  it("creates one peer per connection with a 101 response", async () => {
    const connector = new MemoryConnector();
    const { response, peer } = await open(connector);
    await connector.connect(URL_A);

    expect(response.status).toBe(101);
    expect(peer.url).toBe(URL_A);
    expect(connector.peers).toHaveLength(2);
  });

  it("rejects refused URLs", async () => {
    const connector = new MemoryConnector();
    connector.refuse(URL_A, "connection refused");

    await expect(connector.connect(URL_A)).rejects.toThrow("connection refused");
    expect(connector.peers).toEqual([]);
  });

  it("holds a connection attempt until released", async () => {
    const connector = new MemoryConnector();
    connector.hold(URL_A);
    let settled = false;
    const pending = connector.connect(URL_A).then(() => {
      settled = true;
    });

    await Promise.resolve();
    expect(settled).toBe(false);

    connector.release(URL_A);
    await pending;
    expect(settled).toBe(true);
  });
});

describe("MemoryTransport", () => {
  it("reads peer frames in order, then would block", async () => {
    const { transport, peer } = await open();
    peer.sendText("one");
    peer.ping(new Uint8Array([1]));

    expect(transport.read()).toEqual({
      status: "frame",
      frame: { kind: "text", data: new TextEncoder().encode("one") },
    });
    expect(transport.read()).toEqual({
      status: "frame",
      frame: { kind: "ping", data: new Uint8Array([1]) },
    });
    expect(transport.read()).toEqual({ status: "wouldBlock" });
  });

  it("records client frames on the peer", async () => {
    const { transport, peer } = await open();
    transport.send({ kind: "text", data: new TextEncoder().encode("hi") });
    transport.setNoDelay(true);

    expect(peer.texts).toEqual(["hi"]);
    expect(peer.noDelay).toBe(true);
  });

  it("echoes text frames when configured", async () => {
    const { transport } = await open(new MemoryConnector({ echo: true }));
    const data = new TextEncoder().encode("echo");
    transport.send({ kind: "text", data });

    expect(transport.read()).toEqual({ status: "frame", frame: { kind: "text", data } });
  });

  it("answers a client close when configured", async () => {
    const { transport, peer } = await open(new MemoryConnector({ closeReply: "normal" }));
    transport.close(1000, "");

    expect(peer.closed).toBe(true);
    expect(transport.read()).toEqual({
      status: "frame",
      frame: { kind: "close", code: 1000, reason: "normal" },
    });
  });

  it("rejects writes after the peer closed", async () => {
    const { transport, peer } = await open();
    peer.close(1001, "away");

    expect(() => transport.send({ kind: "text", data: new Uint8Array() })).toThrow(
      "Connection is closed",
    );
    // Nothing is queued after the close frame
    peer.sendText("late");
    expect(transport.read()).toEqual({
      status: "frame",
      frame: { kind: "close", code: 1001, reason: "away" },
    });
    expect(transport.read()).toEqual({ status: "wouldBlock" });
  });

  it("reads a status-less close after terminate", async () => {
    const { transport, peer } = await open();
    transport.terminate();

    expect(peer.terminated).toBe(true);
    expect(transport.read()).toEqual({ status: "frame", frame: { kind: "close", code: 1005 } });
  });

  it("fail queues a read error", async () => {
    const { transport, peer } = await open();
    peer.fail("reset");

    const result = transport.read();
    expect(result.status).toBe("error");
    if (result.status === "error") expect(result.error.message).toBe("reset");
  });
});
