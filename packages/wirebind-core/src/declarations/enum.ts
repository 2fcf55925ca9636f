// Enum and bits declarations.
//
// Both are closed sets of named integers. An enum without a zero member gains
// a synthetic `EMPTY__ = 0` member so decoding always has a default; bits
// default to zero (no flags), and empty bits gain `EMPTY__` as well.

import type { IrBits, IrEnum, IrEnumMember, IrLibrary } from "@wirebind/ir";
import { ConstructionError } from "../errors.ts";
import { convertPrimitive, declarationInfo, isWide } from "./base.ts";
import type { DeclarationInfo } from "./types.ts";

export const EMPTY_MEMBER = "EMPTY__";

export type IntegerValue = number | bigint;

abstract class IntegerSetType implements DeclarationInfo {
  readonly name: string;
  readonly rawName: string;
  readonly library: string;
  readonly doc: string | undefined;
  /** Member name -> value, in declaration order. */
  readonly members: Readonly<Record<string, IntegerValue>>;
  protected readonly byName: ReadonlyMap<string, bigint>;

  constructor(
    info: DeclarationInfo,
    /** Underlying primitive subtype, such as `uint32`. */
    readonly subtype: string,
    members: ReadonlyMap<string, bigint>,
    readonly strict: boolean,
  ) {
    this.name = info.name;
    this.rawName = info.rawName;
    this.library = info.library;
    this.doc = info.doc;
    this.byName = members;
    const exposed: Record<string, IntegerValue> = {};
    for (const [name, value] of members) exposed[name] = this.fromBig(value);
    this.members = Object.freeze(exposed);
  }

  get memberNames(): string[] {
    return [...this.byName.keys()];
  }

  valueOf(name: string): IntegerValue {
    const value = this.byName.get(name);
    if (value === undefined) throw ConstructionError.unknownField(this.name, name);
    return this.fromBig(value);
  }

  makeDefault(): IntegerValue {
    return this.fromBig(0n);
  }

  /** Convert a member name, integer or numeric string into a value of this type. */
  cast(value: unknown): IntegerValue {
    if (typeof value === "string" && this.byName.has(value)) return this.valueOf(value);
    const converted = convertPrimitive(this.name, this.subtype, value);
    if (typeof converted === "boolean") {
      throw ConstructionError.invalidValue(this.name, "expected an integer");
    }
    const big = BigInt(converted);
    this.check(big);
    return this.fromBig(big);
  }

  protected abstract check(value: bigint): void;

  protected fromBig(value: bigint): IntegerValue {
    return isWide(this.subtype) ? value : Number(value);
  }
}

export class EnumType extends IntegerSetType {
  readonly kind = "enum";

  /** Member name of a value, if any. */
  nameOf(value: IntegerValue): string | undefined {
    const wanted = BigInt(value);
    for (const [name, member] of this.byName) {
      if (member === wanted) return name;
    }
    return undefined;
  }

  protected check(value: bigint): void {
    if (this.strict && this.nameOf(value) === undefined) {
      throw ConstructionError.invalidValue(this.name, `${value} is not a member`);
    }
  }

  toString(): string {
    return `enum ${this.name}`;
  }
}

export class BitsType extends IntegerSetType {
  readonly kind = "bits";
  private readonly maskBits: bigint;

  constructor(
    info: DeclarationInfo,
    subtype: string,
    members: ReadonlyMap<string, bigint>,
    strict: boolean,
    mask: bigint,
  ) {
    super(info, subtype, members, strict);
    this.maskBits = mask;
  }

  get mask(): IntegerValue {
    return this.fromBig(this.maskBits);
  }

  /** OR together named flags. */
  combine(...names: string[]): IntegerValue {
    let value = 0n;
    for (const name of names) value |= BigInt(this.valueOf(name));
    return this.fromBig(value);
  }

  /** Whether `value` has every bit of the named flag set. */
  has(value: IntegerValue, name: string): boolean {
    const flag = BigInt(this.valueOf(name));
    return (BigInt(value) & flag) === flag;
  }

  /** Names of the flags set in `value`. */
  flagsOf(value: IntegerValue): string[] {
    const big = BigInt(value);
    return [...this.byName].filter(([, flag]) => flag !== 0n && (big & flag) === flag).map(([name]) => name);
  }

  protected check(value: bigint): void {
    if (this.strict && (value & ~this.maskBits) !== 0n) {
      throw ConstructionError.invalidValue(this.name, `${value} has bits outside mask ${this.maskBits}`);
    }
  }

  toString(): string {
    return `bits ${this.name}`;
  }
}

function memberValues(members: readonly IrEnumMember[]): Map<string, bigint> {
  return new Map(members.map((member) => [member.name, BigInt(member.value.value)]));
}

export function compileEnum(decl: IrEnum, library: IrLibrary): EnumType {
  const members = memberValues(decl.members);
  if (![...members.values()].includes(0n)) {
    members.set(EMPTY_MEMBER, 0n);
  }
  return new EnumType(declarationInfo(decl, library), decl.type, members, decl.strict);
}

export function compileBits(decl: IrBits, library: IrLibrary): BitsType {
  const members = memberValues(decl.members);
  if (members.size === 0) {
    members.set(EMPTY_MEMBER, 0n);
  }
  const subtype = decl.type.subtype ?? "uint32";
  return new BitsType(declarationInfo(decl, library), subtype, members, decl.strict, BigInt(decl.mask));
}
