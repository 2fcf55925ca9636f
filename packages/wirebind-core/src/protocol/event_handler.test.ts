import { describe, expect, it } from "vitest";
import { ScriptedChannel, fixtureRegistry, inbound, peerClosed } from "../../test/fakes.ts";
import type { RecordValue } from "../declarations/struct.ts";
import { NotImplementedError, StopEventHandler } from "../errors.ts";

const ON_PING = 9007199254740993n;

function setup() {
  const { registry, codec } = fixtureRegistry();
  const Echo = registry.load("x").protocol("Echo");
  return { Echo, codec };
}

describe("EventHandlerBase", () => {
  it("dispatches events until the peer closes", async () => {
    const { Echo, codec } = setup();
    const seen: unknown[] = [];
    class PingHandler extends Echo.EventHandler {
      onPing(event: RecordValue) {
        seen.push(event);
      }
    }
    const channel = new ScriptedChannel([
      inbound(codec, { txid: 0, ordinal: ON_PING, body: { count: 1 } }),
      inbound(codec, { txid: 0, ordinal: ON_PING, body: { count: 2 } }),
      peerClosed,
    ]);
    const handler = new PingHandler(new Echo.Client(channel));

    await handler.serve();
    expect(seen).toEqual([{ count: 1 }, { count: 2 }]);
    expect(String(handler)).toMatch(/^event_handler:PingHandler:\d+$/);
  });

  it("stops on StopEventHandler", async () => {
    const { Echo, codec } = setup();
    class OnceHandler extends Echo.EventHandler {
      onPing() {
        throw new StopEventHandler();
      }
    }
    const channel = new ScriptedChannel([
      inbound(codec, { txid: 0, ordinal: ON_PING, body: { count: 1 } }),
      inbound(codec, { txid: 0, ordinal: ON_PING, body: { count: 2 } }),
    ]);
    const handler = new OnceHandler(new Echo.Client(channel));

    await expect(handler.handleNextEvent()).resolves.toBe(false);
    expect(channel.closed).toBe(false);
  });

  it("rejects events nobody handles", async () => {
    const { Echo, codec } = setup();
    const channel = new ScriptedChannel([inbound(codec, { txid: 0, ordinal: ON_PING, body: { count: 1 } })]);
    const handler = new Echo.EventHandler(new Echo.Client(channel));

    await expect(handler.handleNextEvent()).rejects.toThrowError(new NotImplementedError("onPing"));
    expect(channel.closed).toBe(true);
  });

  it("closes the client when a handler fails", async () => {
    const { Echo, codec } = setup();
    class FailingHandler extends Echo.EventHandler {
      onPing() {
        throw new Error("boom");
      }
    }
    const channel = new ScriptedChannel([inbound(codec, { txid: 0, ordinal: ON_PING, body: { count: 1 } })]);
    const client = new Echo.Client(channel);
    const handler = new FailingHandler(client);

    await expect(handler.handleNextEvent()).rejects.toThrowError("boom");
    expect(channel.closed).toBe(true);
    expect(client.closed).toBe(true);
    expect(client.channel).toBeNull();
  });

  it("rejects events with unknown ordinals", async () => {
    const { Echo, codec } = setup();
    const channel = new ScriptedChannel([inbound(codec, { txid: 0, ordinal: 77n, body: null })]);
    const client = new Echo.Client(channel);
    const handler = new Echo.EventHandler(client);

    await expect(handler.handleNextEvent()).rejects.toThrowError(`${client} received unknown method ordinal 77`);
    expect(channel.closed).toBe(true);
  });
});
