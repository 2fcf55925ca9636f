// Helpers shared by the declaration compilers.

import {
  DefinitionError,
  docOf,
  memberNameOf,
  normalizeIdentifier,
  type IrAttribute,
  type IrLibrary,
  type IrOrdinalMember,
  type IrStructMember,
} from "@wirebind/ir";
import type { WireMessage } from "../codec.ts";
import { ConstructionError } from "../errors.ts";
import type { CompileContext, DeclarationInfo, FieldInfo } from "./types.ts";

export function declarationInfo(
  decl: { name: string; maybe_attributes?: IrAttribute[] },
  library: IrLibrary,
): DeclarationInfo {
  return {
    name: normalizeIdentifier(decl.name),
    rawName: decl.name,
    library: library.name,
    doc: docOf(decl.maybe_attributes),
  };
}

export function structFields(
  members: readonly IrStructMember[],
  library: IrLibrary,
  ctx: CompileContext,
): FieldInfo[] {
  return members.map((member) =>
    Object.freeze({
      name: memberNameOf(member.name),
      irName: member.name,
      type: ctx.resolveType(member.type, library),
      ordinal: 0,
      doc: docOf(member.maybe_attributes),
    }),
  );
}

/** Table and union members, skipping reserved ordinals. */
export function ordinalFields(
  owner: string,
  members: readonly IrOrdinalMember[],
  library: IrLibrary,
  ctx: CompileContext,
): FieldInfo[] {
  const fields: FieldInfo[] = [];
  for (const member of members) {
    if (member.reserved) continue;
    if (member.name === undefined || member.type === undefined) {
      throw DefinitionError.unsupportedKind(
        library.name,
        `member with ordinal ${member.ordinal} of ${owner} without name or type`,
      );
    }
    fields.push(
      Object.freeze({
        name: memberNameOf(member.name),
        irName: member.name,
        type: ctx.resolveType(member.type, library),
        ordinal: member.ordinal,
        doc: docOf(member.maybe_attributes),
      }),
    );
  }
  return fields.sort((a, b) => a.ordinal - b.ordinal);
}

/** Encode a value through the context's codec. */
export function encodeWith(ctx: CompileContext, info: DeclarationInfo, value: unknown): WireMessage {
  if (!ctx.codec) {
    throw new TypeError(`${info.name} cannot be encoded without a wire codec`);
  }
  return ctx.codec.encodeObject(value, info.library, info.rawName);
}

/** Plain keyword-argument objects. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const WIDE_SUBTYPES = new Set(["int64", "uint64", "usize64", "uintptr64"]);

function signed(bits: bigint): readonly [bigint, bigint] {
  return [-(1n << (bits - 1n)), (1n << (bits - 1n)) - 1n];
}

function unsigned(bits: bigint): readonly [bigint, bigint] {
  return [0n, (1n << bits) - 1n];
}

/** Inclusive bounds of each integer subtype. */
const INTEGER_RANGES: ReadonlyMap<string, readonly [bigint, bigint]> = new Map([
  ["int8", signed(8n)],
  ["int16", signed(16n)],
  ["int32", signed(32n)],
  ["int64", signed(64n)],
  ["uint8", unsigned(8n)],
  ["uint16", unsigned(16n)],
  ["uint32", unsigned(32n)],
  ["uint64", unsigned(64n)],
  ["usize64", unsigned(64n)],
  ["uintptr64", unsigned(64n)],
]);

/** Whether values of a primitive subtype are carried as bigint. */
export function isWide(subtype: string): boolean {
  return WIDE_SUBTYPES.has(subtype);
}

/** Convert an IR literal or decoded value to a primitive of the given subtype. */
export function convertPrimitive(
  owner: string,
  subtype: string,
  value: unknown,
): boolean | number | bigint {
  if (subtype === "bool") {
    if (typeof value === "boolean") return value;
    if (value === "true" || value === "false") return value === "true";
    throw ConstructionError.invalidValue(owner, `expected bool, got ${typeof value}`);
  }
  if (subtype === "float32" || subtype === "float64") {
    const number = typeof value === "string" ? Number(value) : value;
    if (typeof number === "number" && !Number.isNaN(number)) return number;
    if (typeof number === "bigint") return Number(number);
    throw ConstructionError.invalidValue(owner, `expected ${subtype}, got ${typeof value}`);
  }
  if (typeof value === "string" && !/^-?\d+$/.test(value)) {
    throw ConstructionError.invalidValue(owner, `expected ${subtype}, got '${value}'`);
  }
  const integer = toInteger(subtype, value);
  if (integer === undefined) {
    throw ConstructionError.invalidValue(owner, `expected ${subtype}, got ${typeof value}`);
  }
  const range = INTEGER_RANGES.get(subtype);
  if (range) {
    const big = BigInt(integer);
    if (big < range[0] || big > range[1]) {
      throw ConstructionError.invalidValue(owner, `${big} is out of range for ${subtype}`);
    }
  }
  return integer;
}

function toInteger(subtype: string, value: unknown): number | bigint | undefined {
  if (isWide(subtype)) {
    if (typeof value === "bigint") return value;
    if (typeof value === "string") return BigInt(value);
    if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
    return undefined;
  }
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string") return Number(value);
  if (typeof value === "bigint") {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : undefined;
  }
  return undefined;
}
