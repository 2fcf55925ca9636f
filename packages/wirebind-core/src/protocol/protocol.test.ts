import { DefinitionError, IrDocumentSchema, IrLibrary } from "@wirebind/ir";
import { describe, expect, it } from "vitest";
import { ScriptedChannel, fixtureRegistry } from "../../test/fakes.ts";
import { ConstructionError, NotImplementedError } from "../errors.ts";
import { compileProtocol, roleMemberName } from "./protocol.ts";

describe("ProtocolType", () => {
  const { registry } = fixtureRegistry();
  const x = registry.load("x");
  const Echo = x.protocol("Echo");

  it("carries a discovery marker", () => {
    expect(Echo.marker).toBe("x.Echo");
    expect(String(Echo)).toBe("protocol x/Echo");
  });

  it("builds one method map entry per request-bearing method", () => {
    expect([...Echo.methodMap.keys()]).toEqual([1n, 2n, 3n, 4n, 5n, 6n]);
    expect(Echo.methodMap.get(1n)).toEqual({
      name: "say",
      irName: "Say",
      ordinal: 1n,
      requestIdent: "x/EchoSayRequest",
      requiresResponse: true,
      emptyResponse: false,
      hasResult: false,
      responseIdentifier: "x/EchoSayResponse",
    });
    expect(Echo.methodMap.get(2n)).toMatchObject({
      requestIdent: "",
      requiresResponse: false,
      emptyResponse: false,
      responseIdentifier: null,
    });
    expect(Echo.methodMap.get(4n)).toMatchObject({
      requestIdent: "x/Options",
      requiresResponse: false,
      emptyResponse: true,
      responseIdentifier: null,
    });
    expect(Echo.methodMap.get(5n)).toMatchObject({
      hasResult: true,
      requiresResponse: true,
      responseIdentifier: "x/Echo_Fail_Result",
    });
    expect(Object.isFrozen(Echo.methodMap.get(1n))).toBe(true);
  });

  it("keeps requiresResponse and emptyResponse consistent with the method", () => {
    for (const info of Echo.methodMap.values()) {
      const method = Echo.signature(info.name)?.method;
      expect(info.requiresResponse).toBe(Boolean(method?.hasResponse) && info.responseIdentifier !== null);
      expect(info.emptyResponse).toBe(Boolean(method?.hasResponse) && info.responseIdentifier === null);
    }
  });

  it("builds the event map from methods without a request", () => {
    expect([...Echo.eventMap.keys()]).toEqual([9007199254740993n]);
    expect(Echo.eventMap.get(9007199254740993n)).toEqual({
      name: "onPing",
      irName: "OnPing",
      ordinal: 9007199254740993n,
      requestIdent: "x/EchoOnPingRequest",
      requiresResponse: false,
      emptyResponse: false,
      hasResult: false,
      responseIdentifier: null,
    });
  });

  it("exports role classes named after the protocol", () => {
    expect(x.get("EchoServer")).toBe(Echo.Server);
    expect(x.get("EchoClient")).toBe(Echo.Client);
    expect(x.get("EchoEventHandler")).toBe(Echo.EventHandler);
    expect(Echo.Server.name).toBe("EchoServer");
    expect(Echo.Client.name).toBe("EchoClient");
  });

  it("gives each role one member per method", () => {
    const channel = new ScriptedChannel();
    const server = new Echo.Server(channel);
    const client = new Echo.Client(new ScriptedChannel());
    const handler = new Echo.EventHandler(client);

    expect(typeof Reflect.get(server, "say")).toBe("function");
    expect(typeof Reflect.get(server, "onPing")).toBe("function");
    expect(typeof Reflect.get(client, "say")).toBe("function");
    expect(Reflect.get(client, "onPing")).toBeUndefined();
    expect(typeof Reflect.get(handler, "onPing")).toBe("function");
    expect(Reflect.get(handler, "say")).toBeUndefined();
  });

  it("defaults server handlers to NotImplementedError", () => {
    const server = new Echo.Server(new ScriptedChannel());
    const say: unknown = Reflect.get(server, "say");
    expect(typeof say).toBe("function");
    if (typeof say !== "function") return;
    expect(() => Reflect.apply(say, server, [])).toThrowError(new NotImplementedError("say"));
  });

  it("describes parameter shapes", () => {
    expect(Echo.signature("say")?.shape).toBe("struct");
    expect(Echo.signature("Ping")?.shape).toBe("none");
    expect(Echo.signature("configure")?.shape).toBe("table");
    expect(Echo.signature("put")?.shape).toBe("union");
    expect(Echo.signature("configure")?.parameters()).toEqual(["verbose", "level", "default_"]);
    expect(Echo.signature("put")?.parameters()).toEqual(["num", "text"]);
  });

  it("validates keyword arguments against the shape", () => {
    const say = Echo.signature("say");
    const ping = Echo.signature("ping");
    const put = Echo.signature("put");
    const configure = Echo.signature("configure");

    expect(() => say?.buildPayload({})).toThrowError(
      new ConstructionError("missingField", "Echo.Say missing required field value"),
    );
    expect(() => say?.buildPayload({ value: "a", extra: 1 })).toThrowError("Echo.Say has no field extra");
    expect(() => ping?.buildPayload({ a: 1 })).toThrowError("Echo.Ping has no field a");
    expect(() => put?.buildPayload({ num: 1, text: "a" })).toThrowError("Echo.Put accepts exactly one variant, got 2");
    expect(() => put?.buildPayload({})).toThrowError("Echo.Put accepts exactly one variant, got 0");

    expect(ping?.buildPayload(undefined)).toBeNull();
    expect(configure?.buildPayload({})).toEqual({ verbose: null, level: null, default_: null });
    expect(String(put?.buildPayload({ text: "a" }))).toBe("x/Value(text='a')");
  });
});

describe("roleMemberName", () => {
  it("lower camel cases and avoids base members and reserved words", () => {
    expect(roleMemberName("GetURL")).toBe("getURL");
    expect(roleMemberName("Close")).toBe("close_");
    expect(roleMemberName("Serve")).toBe("serve_");
    expect(roleMemberName("Delete")).toBe("delete_");
    expect(roleMemberName("Then")).toBe("then_");
  });
});

describe("compileProtocol", () => {
  it("rejects duplicate ordinals", () => {
    const { registry } = fixtureRegistry();
    const document = IrDocumentSchema.parse({
      name: "d",
      declarations: { "d/Dup": "protocol" },
      declaration_order: ["d/Dup"],
      protocol_declarations: [
        {
          name: "d/Dup",
          methods: [
            { ordinal: "1", name: "A", has_request: true, has_response: false },
            { ordinal: "1", name: "B", has_request: true, has_response: false },
          ],
        },
      ],
    });
    const library = new IrLibrary(document, "<memory>");
    const [decl] = library.declarationsOf("protocol");
    expect(() => compileProtocol(decl, library, registry)).toThrowError(
      new DefinitionError("duplicateOrdinal", "Protocol d/Dup declares ordinal 1 twice (A and B)"),
    );
  });

  it("keeps role instances from becoming thenables", async () => {
    const { registry } = fixtureRegistry();
    const document = IrDocumentSchema.parse({
      name: "t",
      declarations: { "t/Later": "protocol" },
      declaration_order: ["t/Later"],
      protocol_declarations: [
        { name: "t/Later", methods: [{ ordinal: "1", name: "Then", has_request: true, has_response: false }] },
      ],
    });
    const library = new IrLibrary(document, "<memory>");
    const [decl] = library.declarationsOf("protocol");
    const Later = compileProtocol(decl, library, registry);
    const client = new Later.Client(new ScriptedChannel());

    expect(Reflect.get(client, "then")).toBeUndefined();
    expect(typeof Reflect.get(client, "then_")).toBe("function");
    await expect(Promise.resolve(client)).resolves.toBe(client);
  });
});
