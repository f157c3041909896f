import { describe, expect, it, vi } from "vitest";
import { createDuplex, type DuplexChannelPair } from "../../sdk/channel/duplex.js";
import { Connection, type ConnectionHost } from "../../sdk/connection.js";
import { Dispatcher } from "../../sdk/dispatch.js";
import type { CallbackError } from "../../sdk/errors.js";
import { silentLogger } from "../../sdk/log.js";
import { DISPATCH_TIMER_NAME } from "../../sdk/protocol.js";
import { ConnectionRegistry } from "../../sdk/registry.js";
import { ManualScheduler } from "../../sdk/scheduler.js";

/** Host that hands out channel pairs without starting workers. */
function setup() {
  const registry = new ConnectionRegistry();
  const scheduler = new ManualScheduler();
  const errors: CallbackError[] = [];
  const dispatcher = new Dispatcher({
    registry,
    scheduler,
    intervalSeconds: 0.05,
    logger: silentLogger,
    onCallbackError: (err) => errors.push(err),
  });
  const pairs: DuplexChannelPair[] = [];
  const host: ConnectionHost = {
    spawn: () => {
      const pair = createDuplex();
      pairs.push(pair);
      return pair.host;
    },
    adopt: (conn) => {
      registry.add(conn);
      dispatcher.ensureScheduled();
    },
    retire: (conn) => registry.retire(conn),
    reportCallbackError: (err) => errors.push(err),
  };
  const open = (url = "ws://dispatch.test/") => {
    const conn = new Connection(url, host, host.spawn(url));
    host.adopt(conn);
    const pair = pairs[pairs.length - 1];
    if (!pair) throw new Error("no pair");
    return { conn, worker: pair.worker };
  };
  return { registry, scheduler, dispatcher, errors, pairs, open };
}

describe("Dispatcher scheduling", () => {
  it("registers the timer once under its well-known name", () => {
    const { scheduler, dispatcher, open } = setup();
    open();
    open();

    expect(dispatcher.scheduled).toBe(true);
    expect(scheduler.registrations).toEqual([{ name: DISPATCH_TIMER_NAME, intervalSeconds: 0.05 }]);
  });

  it("unschedule removes the timer and allows rescheduling", () => {
    const { scheduler, dispatcher } = setup();
    dispatcher.ensureScheduled();
    dispatcher.unschedule();
    dispatcher.unschedule();

    expect(scheduler.has(DISPATCH_TIMER_NAME)).toBe(false);
    dispatcher.ensureScheduled();
    expect(scheduler.registrations).toHaveLength(2);
  });
});

describe("Dispatcher.tick", () => {
  it("delivers at most one event per connection per tick", () => {
    const { scheduler, open } = setup();
    const { conn, worker } = open();
    const onMessage = vi.fn();
    conn.onMessage = onMessage;
    worker.events.send({ type: "message", text: "a" });
    worker.events.send({ type: "message", text: "b" });

    scheduler.fire(DISPATCH_TIMER_NAME);
    expect(onMessage.mock.calls).toEqual([["a"]]);
    scheduler.fire(DISPATCH_TIMER_NAME);
    expect(onMessage.mock.calls).toEqual([["a"], ["b"]]);
  });

  it("services every registered connection in one tick", () => {
    const { dispatcher, open } = setup();
    const first = open();
    const second = open();
    const seen: string[] = [];
    first.conn.onConnect = () => void seen.push("first");
    second.conn.onConnect = () => void seen.push("second");
    first.worker.events.send({ type: "connected" });
    second.worker.events.send({ type: "connected" });

    dispatcher.tick();

    expect(seen).toEqual(["first", "second"]);
  });

  it("routes errors to onError and keeps the handle", () => {
    const { dispatcher, registry, open } = setup();
    const { conn, worker } = open();
    const onError = vi.fn();
    conn.onError = onError;
    worker.events.send({ type: "error", message: "bad frame" });

    dispatcher.tick();

    expect(onError).toHaveBeenCalledWith("bad frame");
    expect(registry.has(conn)).toBe(true);
  });

  it("retires and marks the handle closed on a disconnected event", () => {
    const { dispatcher, registry, open } = setup();
    const { conn, worker } = open();
    const onDisconnect = vi.fn();
    conn.onDisconnect = onDisconnect;
    worker.events.send({ type: "disconnected", reason: "server restart" });

    dispatcher.tick();

    expect(onDisconnect).toHaveBeenCalledWith("server restart");
    expect(conn.closed).toBe(true);
    expect(registry.has(conn)).toBe(false);
  });

  it("retires silently when the worker is gone", () => {
    const { dispatcher, registry, open } = setup();
    const { conn, worker } = open();
    const onDisconnect = vi.fn();
    conn.onDisconnect = onDisconnect;
    worker.events.close();

    dispatcher.tick();

    expect(registry.has(conn)).toBe(false);
    expect(onDisconnect).not.toHaveBeenCalled();
  });

  it("leaves an idle connection registered", () => {
    const { dispatcher, registry, open } = setup();
    const { conn } = open();

    dispatcher.tick();

    expect(registry.has(conn)).toBe(true);
  });

  it("skips a connection retired by an earlier callback in the same tick", () => {
    const { dispatcher, open } = setup();
    const first = open();
    const second = open();
    const onMessage = vi.fn();
    second.conn.onMessage = onMessage;
    first.conn.onConnect = () => second.conn.dispose();
    first.worker.events.send({ type: "connected" });
    second.worker.events.send({ type: "message", text: "never seen" });

    dispatcher.tick();

    expect(onMessage).not.toHaveBeenCalled();
  });

  it("reports a throwing callback and keeps dispatching", () => {
    const { dispatcher, errors, open } = setup();
    const first = open();
    const second = open();
    first.conn.onConnect = () => {
      throw new Error("oops");
    };
    const onConnect = vi.fn();
    second.conn.onConnect = onConnect;
    first.worker.events.send({ type: "connected" });
    second.worker.events.send({ type: "connected" });

    dispatcher.tick();

    expect(onConnect).toHaveBeenCalledTimes(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.callback).toBe("onConnect");
    expect(errors[0]?.connection).toBe(first.conn.toString());
  });

  it("events without a callback are consumed", () => {
    const { dispatcher, open } = setup();
    const { conn, worker } = open();
    worker.events.send({ type: "message", text: "dropped" });

    dispatcher.tick();

    expect(conn.receive()).toEqual({ status: "empty" });
  });
});
