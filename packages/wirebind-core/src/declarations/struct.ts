// Struct and table declarations.
//
// Values are plain records tagged with their compiled type under a
// non-enumerable symbol, so they compare and serialize like ordinary objects.

import type { IrLibrary, IrStruct, IrTable } from "@wirebind/ir";
import type { WireMessage } from "../codec.ts";
import { ConstructionError } from "../errors.ts";
import { declarationInfo, encodeWith, ordinalFields, structFields } from "./base.ts";
import type { CompileContext, DeclarationInfo, Encodable, FieldInfo } from "./types.ts";

export const DECLARATION = Symbol("wirebind.declaration");

/** A struct or table value. */
export type RecordValue = { [field: string]: unknown };

abstract class RecordType implements DeclarationInfo, Encodable {
  abstract readonly kind: "struct" | "table";
  readonly name: string;
  readonly rawName: string;
  readonly library: string;
  readonly doc: string | undefined;
  readonly fields: readonly FieldInfo[];
  private readonly byName: ReadonlyMap<string, FieldInfo>;

  constructor(
    info: DeclarationInfo,
    fields: FieldInfo[],
    protected readonly ctx: CompileContext,
  ) {
    this.name = info.name;
    this.rawName = info.rawName;
    this.library = info.library;
    this.doc = info.doc;
    this.fields = Object.freeze(fields);
    this.byName = new Map(fields.map((field) => [field.name, field]));
  }

  field(name: string): FieldInfo | undefined {
    return this.byName.get(name);
  }

  get fieldNames(): string[] {
    return this.fields.map((field) => field.name);
  }

  /** A value with every field at its default. */
  makeDefault(): RecordValue {
    const value: RecordValue = {};
    for (const field of this.fields) {
      value[field.name] = this.defaultOf(field);
    }
    return this.tag(value);
  }

  /**
   * Build a value from keyword fields, converting nested values through
   * their declared types. Unknown fields are rejected.
   */
  create(init: Readonly<Record<string, unknown>> = {}): RecordValue {
    for (const [key, given] of Object.entries(init)) {
      if (given !== undefined && !this.byName.has(key)) {
        throw ConstructionError.unknownField(this.name, key);
      }
    }
    const value: RecordValue = {};
    for (const field of this.fields) {
      const given = init[field.name];
      value[field.name] = this.isAbsent(given) ? this.absent(field) : this.ctx.construct(field.type, given);
    }
    return this.tag(value);
  }

  /** Whether a value was built by this type. */
  is(value: unknown): value is RecordValue {
    const owner: RecordType | undefined = recordTypeOf(value);
    return owner === this;
  }

  /** Read a member by name. */
  get(value: unknown, member: string): unknown {
    if (!this.is(value)) {
      throw ConstructionError.invalidValue(this.name, "not a value of this type");
    }
    const field = this.byName.get(member);
    if (!field) throw ConstructionError.unknownField(this.name, member);
    return value[field.name];
  }

  encode(value: unknown): WireMessage {
    return encodeWith(this.ctx, this, value);
  }

  toString(): string {
    return `${this.kind} ${this.name}`;
  }

  protected abstract defaultOf(field: FieldInfo): unknown;
  protected abstract absent(field: FieldInfo): unknown;
  protected abstract isAbsent(given: unknown): boolean;

  private tag(value: RecordValue): RecordValue {
    Object.defineProperty(value, DECLARATION, { value: this, enumerable: false });
    return value;
  }
}

/** Struct: every field present. */
export class StructType extends RecordType {
  readonly kind = "struct";
  readonly resource: boolean;

  constructor(info: DeclarationInfo, fields: FieldInfo[], ctx: CompileContext, resource = false) {
    super(info, fields, ctx);
    this.resource = resource;
  }

  protected defaultOf(field: FieldInfo): unknown {
    return this.ctx.defaultFor(field.type);
  }

  protected absent(field: FieldInfo): unknown {
    throw ConstructionError.missingField(this.name, field.name);
  }

  protected isAbsent(given: unknown): boolean {
    return given === undefined;
  }
}

/** Table: every field optional, absent fields are null. */
export class TableType extends RecordType {
  readonly kind = "table";
  readonly strict: boolean;

  constructor(info: DeclarationInfo, fields: FieldInfo[], ctx: CompileContext, strict = false) {
    super(info, fields, ctx);
    this.strict = strict;
  }

  protected defaultOf(): unknown {
    return null;
  }

  protected absent(): unknown {
    return null;
  }

  protected isAbsent(given: unknown): boolean {
    return given === undefined || given === null;
  }
}

/** The struct or table type a value was built by. */
export function recordTypeOf(value: unknown): StructType | TableType | undefined {
  if (typeof value !== "object" || value === null || !(DECLARATION in value)) return undefined;
  const tag: unknown = value[DECLARATION];
  return tag instanceof StructType || tag instanceof TableType ? tag : undefined;
}

export function compileStruct(decl: IrStruct, library: IrLibrary, ctx: CompileContext): StructType {
  return new StructType(
    declarationInfo(decl, library),
    structFields(decl.members, library, ctx),
    ctx,
    decl.resource,
  );
}

export function compileTable(decl: IrTable, library: IrLibrary, ctx: CompileContext): TableType {
  return new TableType(
    declarationInfo(decl, library),
    ordinalFields(decl.name, decl.members, library, ctx),
    ctx,
    decl.strict,
  );
}
