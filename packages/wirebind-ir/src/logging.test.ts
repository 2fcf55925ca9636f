// Tests for namespaced debug logging

import { beforeEach, describe, expect, it } from "vitest";
import { createLogger, isEnabled, matchPattern, type LogSink } from "./logging.ts";

describe("matchPattern", () => {
  it("matches wildcards", () => {
    expect(matchPattern("wirebind:server", "*")).toBe(true);
    expect(matchPattern("wirebind:server", "wirebind:*")).toBe(true);
    expect(matchPattern("wirebind:server", "wirebind:client")).toBe(false);
    expect(matchPattern("wirebind.server", "wirebind:*")).toBe(false);
  });
});

describe("isEnabled", () => {
  it("is disabled without DEBUG", () => {
    expect(isEnabled("wirebind:server", undefined)).toBe(false);
    expect(isEnabled("wirebind:server", "")).toBe(false);
  });

  it("supports lists and exclusions", () => {
    expect(isEnabled("wirebind:server", "wirebind:client, wirebind:server")).toBe(true);
    expect(isEnabled("wirebind:server", "wirebind:*,-wirebind:server")).toBe(false);
    expect(isEnabled("wirebind:loader", "wirebind:*,-wirebind:server")).toBe(true);
  });
});

describe("createLogger", () => {
  let lines: Array<{ level: string; message: string; data: Record<string, unknown> }> = [];
  const sink: LogSink = {
    debug(message, data) {
      lines.push({ level: "debug", message, data });
    },
    warn(message, data) {
      lines.push({ level: "warn", message, data });
    },
  };

  beforeEach(() => {
    lines = [];
  });

  it("logs debug lines when the namespace is enabled", () => {
    const log = createLogger("wirebind:server", { env: { DEBUG: "wirebind:*" }, sink });
    log.debug("shutting down", { server: "server:EchoServer:1" });
    expect(log.enabled).toBe(true);
    expect(lines).toEqual([
      { level: "debug", message: "wirebind:server shutting down", data: { server: "server:EchoServer:1" } },
    ]);
  });

  it("drops debug lines otherwise", () => {
    const log = createLogger("wirebind:server", { env: { DEBUG: "wirebind:client" }, sink });
    log.debug("ignored");
    expect(log.enabled).toBe(false);
    expect(lines).toEqual([]);
  });

  it("always emits warnings", () => {
    const log = createLogger("wirebind:server", { env: {}, sink });
    log.warn("channel error");
    expect(lines).toEqual([{ level: "warn", message: "wirebind:server channel error", data: {} }]);
  });

  it("reads the environment on every call", () => {
    const env: NodeJS.ProcessEnv = {};
    const log = createLogger("wirebind:loader", { env, sink });
    log.debug("before");
    env.DEBUG = "wirebind:loader";
    log.debug("after");
    expect(lines.map((l) => l.message)).toEqual(["wirebind:loader after"]);
  });
});
