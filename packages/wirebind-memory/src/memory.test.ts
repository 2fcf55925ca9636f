import { fileURLToPath } from "node:url";
import {
  DispatchError,
  DomainError,
  Registry,
  UnionValue,
  type RecordValue,
} from "@wirebind/core";
import { describe, expect, it } from "vitest";
import { channelPair } from "./channel.ts";
import { EnvelopeCodec } from "./envelope.ts";

const IR_ROOT = fileURLToPath(new URL("../../wirebind-core/test/fixtures/ir", import.meta.url));

function echo() {
  const registry = new Registry({ irPath: IR_ROOT, codec: new EnvelopeCodec(), env: {} });
  return registry.load("x").protocol("Echo");
}

describe("roles over a memory channel", () => {
  it("answers calls until the client closes", async () => {
    const Echo = echo();
    const received: unknown[] = [];
    class EchoServer extends Echo.Server {
      say(request: RecordValue) {
        return { value: `${String(request.value)}!` };
      }
      put(request: UnionValue) {
        received.push([request.tag, request.value]);
      }
      fail(request: RecordValue) {
        if (request.code === 1) throw new DomainError(42);
        return { value: "fine" };
      }
    }
    const [clientEnd, serverEnd] = channelPair();
    const served = new EchoServer(serverEnd).serve();
    const client = new Echo.Client(clientEnd);

    await expect(client.call("say", { value: "hi" })).resolves.toEqual({ value: "hi!" });
    expect(client.call("put", { num: 3n })).toBeUndefined();

    const failed = await client.call("fail", { code: 1 });
    expect(failed).toBeInstanceOf(UnionValue);
    expect(String(failed)).toBe("x/EchoFailResult(err=42)");
    const fine = await client.call("fail", { code: 0 });
    expect(fine instanceof UnionValue && fine.unwrap()).toEqual({ value: "fine" });

    client.close();
    await served;
    expect(received).toEqual([["num", 3n]]);
  });

  it("delivers events to an event handler", async () => {
    const Echo = echo();
    const [clientEnd, serverEnd] = channelPair();
    const server = new Echo.Server(serverEnd);
    const counts: unknown[] = [];
    class PingHandler extends Echo.EventHandler {
      onPing(event: RecordValue) {
        counts.push(event.count);
      }
    }
    const handler = new PingHandler(new Echo.Client(clientEnd));

    server.send("onPing", { count: 1 });
    server.send("onPing", { count: 2 });
    serverEnd.close();
    await handler.serve();
    expect(counts).toEqual([1, 2]);
  });

  it("rejects pending calls when the server end closes", async () => {
    const Echo = echo();
    const [clientEnd, serverEnd] = channelPair();
    const client = new Echo.Client(clientEnd);

    const pending = client.call("say", { value: "hi" });
    serverEnd.close();
    await expect(pending).rejects.toBeInstanceOf(DispatchError);
  });
});
