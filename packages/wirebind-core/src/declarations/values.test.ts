import type { TypeDescriptor } from "@wirebind/ir";
import { describe, expect, it } from "vitest";
import { fixtureRegistry } from "../../test/fakes.ts";
import { describeType } from "./values.ts";

const int64: TypeDescriptor = { kind: "primitive", subtype: "int64", nullable: false };
const uint8: TypeDescriptor = { kind: "primitive", subtype: "uint8", nullable: false };
const pair: TypeDescriptor = { kind: "array", element: uint8, count: 2, nullable: false };
const point: TypeDescriptor = {
  kind: "identifier",
  identifier: "x/Point",
  rawIdentifier: "x/Point",
  declKind: "struct",
  library: "x",
  nullable: true,
};

describe("defaultFor", () => {
  const { registry } = fixtureRegistry();

  it("uses zero values by type", () => {
    expect(registry.defaultFor(int64)).toBe(0n);
    expect(registry.defaultFor({ kind: "primitive", subtype: "bool", nullable: false })).toBe(false);
    expect(registry.defaultFor(pair)).toEqual([0, 0]);
    expect(registry.defaultFor({ kind: "handle", subtype: "channel", nullable: false })).toBe(0);
    expect(registry.defaultFor({ kind: "internal", subtype: "framework_error", nullable: false })).toBeNull();
  });

  it("is null for nullable types", () => {
    expect(registry.defaultFor(point)).toBeNull();
    expect(registry.defaultFor({ ...point, nullable: false })).toEqual({ x: 0, y: 0 });
  });
});

describe("construct", () => {
  const { registry } = fixtureRegistry();

  it("converts 64-bit integers to bigint", () => {
    expect(registry.construct(int64, 5)).toBe(5n);
    expect(registry.construct(int64, "-9007199254740993")).toBe(-9007199254740993n);
  });

  it("checks array lengths", () => {
    expect(registry.construct(pair, [1, "2"])).toEqual([1, 2]);
    expect(() => registry.construct(pair, [1])).toThrowError("Invalid value for array<uint8, 2>: expected 2 elements, got 1");
  });

  it("rejects null for non-nullable types", () => {
    expect(() => registry.construct(uint8, null)).toThrowError("Invalid value for uint8: null for a non-nullable type");
    expect(registry.construct(point, null)).toBeNull();
  });

  it("bounds strings by their UTF-8 length", () => {
    const short: TypeDescriptor = { kind: "string", maxLength: 4, nullable: false };
    expect(registry.construct(short, "abcd")).toBe("abcd");
    expect(registry.construct(short, "éé")).toBe("éé");
    expect(() => registry.construct(short, "éééé")).toThrowError("Invalid value for string: longer than 4 bytes");
    expect(() => registry.construct(short, "abcde")).toThrowError("Invalid value for string: longer than 4 bytes");
  });

  it("rejects integers outside their subtype's range", () => {
    expect(registry.construct(uint8, 255)).toBe(255);
    expect(() => registry.construct(uint8, 300)).toThrowError("Invalid value for uint8: 300 is out of range for uint8");
    expect(() => registry.construct(uint8, -1)).toThrowError("Invalid value for uint8: -1 is out of range for uint8");

    const int8: TypeDescriptor = { kind: "primitive", subtype: "int8", nullable: false };
    expect(registry.construct(int8, -128)).toBe(-128);
    expect(() => registry.construct(int8, "128")).toThrowError("Invalid value for int8: 128 is out of range for int8");

    const uint64: TypeDescriptor = { kind: "primitive", subtype: "uint64", nullable: false };
    expect(registry.construct(uint64, "18446744073709551615")).toBe(18446744073709551615n);
    expect(() => registry.construct(uint64, 18446744073709551616n)).toThrowError(
      "Invalid value for uint64: 18446744073709551616 is out of range for uint64",
    );
    expect(() => registry.construct(int64, 9223372036854775808n)).toThrowError(
      "Invalid value for int64: 9223372036854775808 is out of range for int64",
    );
  });

  it("rejects non-objects for records", () => {
    expect(() => registry.construct(point, 3)).toThrowError("Invalid value for x/Point?: expected an object, got number");
  });
});

describe("describeType", () => {
  it("names nested types", () => {
    expect(describeType({ kind: "vector", element: point, maxCount: null, nullable: true })).toBe("vector<x/Point?>?");
    expect(describeType({ kind: "endpoint", role: "client", protocol: "x/Echo", nullable: false })).toBe(
      "client_end:x/Echo",
    );
  });
});
