// Value interpreter: defaults and construction driven by type descriptors.
//
// Decoded payloads arrive as plain values; `construct` turns them into
// compiled values (tagged records, union values, enum and bits integers)
// recursively. Values that were already constructed pass through unchanged.

import type { TypeDescriptor } from "@wirebind/ir";
import { ConstructionError } from "../errors.ts";
import { AliasType } from "./alias.ts";
import { convertPrimitive, isRecord, isWide } from "./base.ts";
import { BitsType, EnumType } from "./enum.ts";
import { ResourceType } from "./resource.ts";
import { StructType, TableType, recordTypeOf } from "./struct.ts";
import type { CompiledDeclaration } from "./types.ts";
import { UnionType, UnionValue } from "./union.ts";

// String bounds count UTF-8 bytes.
const utf8 = new TextEncoder();

export interface ValueContext {
  lookup(identifier: string, library: string): CompiledDeclaration;
}

/** Human-readable name of a type, for error messages. */
export function describeType(type: TypeDescriptor): string {
  const suffix = type.nullable ? "?" : "";
  switch (type.kind) {
    case "primitive":
    case "handle":
      return `${type.subtype}${suffix}`;
    case "string":
      return `string${suffix}`;
    case "vector":
      return `vector<${describeType(type.element)}>${suffix}`;
    case "array":
      return `array<${describeType(type.element)}, ${type.count}>${suffix}`;
    case "identifier":
      return `${type.identifier}${suffix}`;
    case "endpoint":
      return `${type.role}_end:${type.protocol}${suffix}`;
    case "internal":
      return `internal ${type.subtype}${suffix}`;
  }
}

/** Default value of a type: null for nullable types, zero values otherwise. */
export function defaultFor(type: TypeDescriptor, ctx: ValueContext): unknown {
  if (type.nullable) return null;
  switch (type.kind) {
    case "primitive":
      if (type.subtype === "bool") return false;
      return isWide(type.subtype) ? 0n : 0;
    case "string":
      return "";
    case "vector":
      return [];
    case "array":
      return Array.from({ length: type.count }, () => defaultFor(type.element, ctx));
    case "handle":
    case "endpoint":
      return 0;
    case "internal":
      return null;
    case "identifier": {
      const decl = ctx.lookup(type.identifier, type.library);
      return decl.kind === "protocol" ? 0 : decl.makeDefault();
    }
  }
}

/** Build a compiled value of `type` from a plain or already constructed value. */
export function construct(type: TypeDescriptor, value: unknown, ctx: ValueContext): unknown {
  if (value === null || value === undefined) {
    if (type.nullable) return null;
    throw ConstructionError.invalidValue(describeType(type), "null for a non-nullable type");
  }
  const owner = describeType(type);

  switch (type.kind) {
    case "primitive":
      return convertPrimitive(owner, type.subtype, value);
    case "string":
      if (typeof value !== "string") {
        throw ConstructionError.invalidValue(owner, `expected string, got ${typeof value}`);
      }
      if (type.maxLength !== null && utf8.encode(value).length > type.maxLength) {
        throw ConstructionError.invalidValue(owner, `longer than ${type.maxLength} bytes`);
      }
      return value;
    case "vector":
    case "array": {
      if (!Array.isArray(value)) {
        throw ConstructionError.invalidValue(owner, `expected an array, got ${typeof value}`);
      }
      if (type.kind === "array" && value.length !== type.count) {
        throw ConstructionError.invalidValue(owner, `expected ${type.count} elements, got ${value.length}`);
      }
      if (type.kind === "vector" && type.maxCount !== null && value.length > type.maxCount) {
        throw ConstructionError.invalidValue(owner, `more than ${type.maxCount} elements`);
      }
      return value.map((element: unknown) => construct(type.element, element, ctx));
    }
    case "handle":
    case "endpoint":
      if (typeof value !== "number") {
        throw ConstructionError.invalidValue(owner, `expected a handle, got ${typeof value}`);
      }
      return value;
    case "internal":
      return value;
    case "identifier":
      return constructDeclared(ctx.lookup(type.identifier, type.library), value, owner);
  }
}

function constructDeclared(decl: CompiledDeclaration, value: unknown, owner: string): unknown {
  if (decl instanceof StructType || decl instanceof TableType) {
    if (decl.is(value)) return value;
    if (!isRecord(value)) {
      throw ConstructionError.invalidValue(owner, `expected an object, got ${typeof value}`);
    }
    return decl.create(value);
  }
  if (decl instanceof UnionType) {
    if (decl.is(value)) return value;
    if (value instanceof UnionValue || !isRecord(value)) {
      throw ConstructionError.invalidValue(owner, "expected a single variant object");
    }
    return decl.create(value);
  }
  if (decl instanceof EnumType || decl instanceof BitsType || decl instanceof AliasType) {
    return decl.cast(value);
  }
  if (decl instanceof ResourceType || decl.kind === "protocol") {
    if (typeof value !== "number") {
      throw ConstructionError.invalidValue(owner, `expected a handle, got ${typeof value}`);
    }
    return value;
  }
  throw ConstructionError.invalidValue(owner, `${decl.kind} ${decl.name} does not describe values`);
}

/** The compiled type a value was built by, if it is a record or union value. */
export function declarationOf(value: unknown): StructType | TableType | UnionType | undefined {
  if (value instanceof UnionValue) return value.type;
  return recordTypeOf(value);
}
