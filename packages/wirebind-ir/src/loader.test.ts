import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { DefinitionError } from "./errors.ts";
import { IR_PATH_ENV, IrLoader } from "./loader.ts";

const IR_ROOT = fileURLToPath(new URL("../test/fixtures/ir", import.meta.url));

describe("IrLoader", () => {
  it("discovers libraries under each root", () => {
    const loader = new IrLoader({ irPath: IR_ROOT });
    const paths = loader.libraryPaths();
    expect(paths.get("x")).toBe(path.join(IR_ROOT, "x", "x.fidl.json"));
    expect(paths.get("y")).toBe(path.join(IR_ROOT, "y", "y.fidl.json"));
  });

  it("reads the root from the environment", () => {
    const loader = new IrLoader({ env: { [IR_PATH_ENV]: IR_ROOT } });
    expect(loader.load("y").name).toBe("y");
  });

  it("returns the identical instance on repeated loads", () => {
    const loader = new IrLoader({ irPath: IR_ROOT });
    const first = loader.load("x");
    expect(loader.load("x")).toBe(first);
    expect(loader.loadFile(path.join(IR_ROOT, "x", "x.fidl.json"))).toBe(first);
  });

  it("keeps 64-bit method ordinals exact", () => {
    const library = new IrLoader({ irPath: IR_ROOT }).load("x");
    const echo = library.findDeclaration("protocol", "x/Echo");
    expect(echo?.methods.map((m) => m.ordinal)).toEqual([8815148155003442185n, 2n]);
  });

  it("exposes library level details", () => {
    const library = new IrLoader({ irPath: IR_ROOT }).load("x");
    expect(library.doc).toBe("Test library x.");
    expect(library.dependencies).toEqual(["y"]);
    expect(library.declarationKind("x/Echo_Say_Response")).toBe("struct");
    expect(library.declarationKind("x/EchoSayResponse")).toBe("struct");
    expect(library.rawIdentifier("x/EchoSayResponse")).toBe("x/Echo_Say_Response");
    expect(library.declarationKind("x/Nope")).toBeUndefined();
  });

  it("orders declarations by declaration_order", () => {
    const library = new IrLoader({ irPath: IR_ROOT }).load("x");
    expect(library.declarationsOf("struct").map((d) => d.name)).toEqual([
      "x/Point",
      "x/Palette",
      "x/EchoSayRequest",
      "x/Echo_Say_Response",
    ]);
  });

  it("derives method flags", () => {
    const library = new IrLoader({ irPath: IR_ROOT }).load("x");
    const echo = library.findDeclaration("protocol", "x/Echo");
    if (!echo) throw new Error("missing protocol");
    const [say, ping] = library.methodsOf(echo);
    expect(say.hasResult).toBe(false);
    expect(say.requestIdentifier).toBe("x/EchoSayRequest");
    expect(say.responseIdentifier).toBe("x/Echo_Say_Response");
    expect(say.qualifiedName).toBe("Echo.Say");
    // flexible two-way methods carry a result
    expect(ping.hasResult).toBe(true);
    expect(ping.requestIdentifier).toBeNull();
  });

  it("fails with libraryNotFound naming the searched path", () => {
    const loader = new IrLoader({ irPath: IR_ROOT });
    expect(() => loader.load("nope")).toThrowError(DefinitionError);
    try {
      loader.load("nope");
    } catch (e) {
      expect(e).toBeInstanceOf(DefinitionError);
      if (e instanceof DefinitionError) {
        expect(e.kind).toBe("libraryNotFound");
        expect(e.message).toContain("nope");
        expect(e.message).toContain(path.join(IR_ROOT, "nope", "nope.fidl.json"));
      }
    }
  });

  it("fails with irPathNotFound when nothing is configured", () => {
    const loader = new IrLoader({ env: {} });
    expect(() => loader.load("x")).toThrowError(
      `IR path not found: no IR root configured. Set ${IR_PATH_ENV} or pass irPath explicitly.`,
    );
  });

  it("rejects a root that is not a directory", () => {
    const missing = path.join(IR_ROOT, "does-not-exist");
    const loader = new IrLoader({ irPath: missing });
    expect(() => loader.load("x")).toThrowError(`IR root '${missing}' is not a directory`);
  });

  it("prefers explicitly registered libraries", () => {
    const loader = new IrLoader({ env: {}, libraries: { other: path.join(IR_ROOT, "y", "y.fidl.json") } });
    expect(loader.load("other").name).toBe("y");
    expect([...loader.libraryPaths().keys()]).toEqual(["other"]);
  });

  it("rejects invalid documents", () => {
    const loader = new IrLoader({ irPath: IR_ROOT });
    const file = path.join(IR_ROOT, "broken", "broken.fidl.json");
    expect(() => loader.load("broken")).toThrowError(
      `Invalid IR document at ${file}: declaration_order: Required`,
    );
  });
});
