import { describe, expect, it } from "vitest";
import {
  docOf,
  libraryOf,
  markerOf,
  memberNameOf,
  memberOf,
  methodNameOf,
  normalizeIdentifier,
} from "./naming.ts";

describe("normalizeIdentifier", () => {
  it("strips underscores from result and response names", () => {
    expect(normalizeIdentifier("x/Echo_Fail_Result")).toBe("x/EchoFailResult");
    expect(normalizeIdentifier("x/Echo_Say_Response")).toBe("x/EchoSayResponse");
    expect(normalizeIdentifier("my_lib.sub/Proto_Do_Result")).toBe("mylib.sub/ProtoDoResult");
  });

  it("leaves other identifiers alone", () => {
    expect(normalizeIdentifier("x/Some_Struct")).toBe("x/Some_Struct");
    expect(normalizeIdentifier("x/Result_Thing")).toBe("x/Result_Thing");
  });

  it("is idempotent", () => {
    for (const id of ["x/A_B_Result", "x/A_B_Response", "x/Plain", "x/_Result", "a_b/C_D"]) {
      const once = normalizeIdentifier(id);
      expect(normalizeIdentifier(once)).toBe(once);
    }
  });
});

describe("identifier parts", () => {
  it("splits library and member", () => {
    expect(libraryOf("fuzz.buzz/Thing")).toBe("fuzz.buzz");
    expect(memberOf("fuzz.buzz/Thing_Do_Result")).toBe("ThingDoResult");
    expect(memberOf("Bare")).toBe("Bare");
  });

  it("builds protocol markers", () => {
    expect(markerOf("fuzz.buzz/Echo")).toBe("fuzz.buzz.Echo");
  });
});

describe("member names", () => {
  it("suffixes reserved words", () => {
    expect(memberNameOf("default")).toBe("default_");
    expect(memberNameOf("class")).toBe("class_");
    expect(memberNameOf("value")).toBe("value");
  });

  it("lower camel cases method names", () => {
    expect(methodNameOf("Say")).toBe("say");
    expect(methodNameOf("GetURL")).toBe("getURL");
    expect(methodNameOf("URLFetch")).toBe("urlFetch");
    expect(methodNameOf("OK")).toBe("ok");
    expect(methodNameOf("onPing")).toBe("onPing");
    expect(methodNameOf("Delete")).toBe("delete_");
  });
});

describe("docOf", () => {
  it("returns the trimmed doc attribute", () => {
    const doc = docOf([
      { name: "transport", arguments: [] },
      { name: "doc", arguments: [{ name: "value", value: { kind: "literal", value: " Hello.\n" } }] },
    ]);
    expect(doc).toBe("Hello.");
  });

  it("returns undefined without attributes", () => {
    expect(docOf(undefined)).toBeUndefined();
    expect(docOf([{ name: "doc", arguments: [] }])).toBeUndefined();
  });
});
