import { describe, expect, it } from "vitest";
import { fixtureRegistry } from "../test/fakes.ts";
import { emitDeclarations } from "./codegen.ts";

function emit(library: string, importExtension?: string): string {
  const { registry } = fixtureRegistry();
  return emitDeclarations(registry.load(library), { importExtension });
}

describe("emitDeclarations", () => {
  it("emits records and imports other libraries by alias", () => {
    expect(emit("y")).toBe(
      [
        "// Declarations for library y.",
        'import type * as x from "./x.js";',
        "",
        "export interface Located {",
        "  where: x.Point;",
        "  shade: x.Color;",
        "}",
        "",
        "export interface Node {",
        "  value: number;",
        "  next: Node | null;",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("uses the configured import extension", () => {
    expect(emit("y", ".ts").split("\n")[1]).toBe('import type * as x from "./x.ts";');
  });

  it("emits enums as const objects with a value union", () => {
    expect(emit("x")).toContain(
      [
        "export declare const Color: {",
        "  readonly RED: 1;",
        "  readonly GREEN: 2;",
        "  readonly EMPTY__: 0;",
        "};",
        "export type Color = (typeof Color)[keyof typeof Color];",
      ].join("\n"),
    );
  });

  it("emits struct docs and optional table fields", () => {
    const text = emit("x");
    expect(text).toContain(
      ["/** A point on the grid. */", "export interface Point {", "  x: number;", "  y: number;", "}"].join("\n"),
    );
    expect(text).toContain(
      [
        "export interface Options {",
        "  verbose?: boolean | null;",
        "  level?: number | null;",
        "  default_?: string | null;",
        "}",
      ].join("\n"),
    );
    expect(text).toContain("  tags: string[];\n  note: string | null;\n");
  });

  it("emits unions as tagged alternatives", () => {
    expect(emit("x")).toContain(
      [
        "export type Value =",
        '  | { readonly tag: "num"; readonly value: bigint }',
        '  | { readonly tag: "text"; readonly value: string }',
        "  | { readonly tag: null; readonly value: null };",
      ].join("\n"),
    );
  });

  it("emits consts, aliases and resources", () => {
    const lines = emit("x").split("\n");
    expect(lines).toContain("export declare const MAX: 10;");
    expect(lines).toContain('export declare const GREETING: "hello";');
    expect(lines).toContain("export declare const BIG: 18446744073709551615n;");
    expect(lines).toContain("export type Name = string;");
    expect(lines).toContain("export type Shade = Color;");
    expect(lines).toContain("export type Handle = number;");
  });

  it("emits handler, call and event interfaces for protocols", () => {
    expect(emit("x")).toContain(
      [
        "export interface EchoHandlers {",
        "  /** Echo a value back. */",
        "  say(request: EchoSayRequest): EchoSayResponse | Promise<EchoSayResponse>;",
        "  ping(): void | Promise<void>;",
        "  notify(request: EchoNotifyRequest): void | Promise<void>;",
        "  configure(request: Options): void | Promise<void>;",
        "  fail(request: EchoFailRequest): EchoFailResponse | Promise<EchoFailResponse>;",
        "  put(request: Value): void | Promise<void>;",
        "}",
        "",
        "export interface EchoCalls {",
        "  /** Echo a value back. */",
        "  say(args: EchoSayRequest): Promise<EchoSayResponse>;",
        "  ping(): void;",
        "  notify(args: EchoNotifyRequest): void;",
        "  configure(args?: Options): Promise<null>;",
        "  fail(args: EchoFailRequest): Promise<EchoFailResult>;",
        "  put(args: { num: bigint } | { text: string }): void;",
        "}",
        "",
        "export interface EchoEvents {",
        "  onPing(event: EchoOnPingRequest): void | Promise<void>;",
        "}",
        "",
        'export declare const EchoMarker: "x.Echo";',
      ].join("\n"),
    );
  });

  it("starts a library without dependencies with its header alone", () => {
    expect(emit("x").split("\n\n")[0]).toBe("// Declarations for library x.");
  });
});
