// Alias declarations: a named stand-in for an underlying type.

import {
  DefinitionError,
  normalizeIdentifier,
  type IrAlias,
  type IrLibrary,
  type TypeDescriptor,
} from "@wirebind/ir";
import { declarationInfo } from "./base.ts";
import { BitsType, EnumType, type IntegerValue } from "./enum.ts";
import type { CompileContext, DeclarationInfo } from "./types.ts";

const PRIMITIVE_NAMES = new Set([
  "bool",
  "int8",
  "int16",
  "int32",
  "int64",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "float32",
  "float64",
]);

export class AliasType implements DeclarationInfo {
  readonly kind = "alias";
  readonly name: string;
  readonly rawName: string;
  readonly library: string;
  readonly doc: string | undefined;

  constructor(
    info: DeclarationInfo,
    readonly base: TypeDescriptor,
    private readonly ctx: CompileContext,
  ) {
    this.name = info.name;
    this.rawName = info.rawName;
    this.library = info.library;
    this.doc = info.doc;
  }

  /** Members of the underlying enum or bits type, if it is one. */
  get members(): Readonly<Record<string, IntegerValue>> | undefined {
    const target = this.target();
    return target instanceof EnumType || target instanceof BitsType ? target.members : undefined;
  }

  makeDefault(): unknown {
    return this.ctx.defaultFor(this.base);
  }

  /** Convert a value to the underlying type. */
  cast(value: unknown): unknown {
    return this.ctx.construct(this.base, value);
  }

  toString(): string {
    return `alias ${this.name}`;
  }

  private target() {
    return this.base.kind === "identifier" ? this.ctx.lookup(this.base.identifier, this.base.library) : undefined;
  }
}

function baseOf(decl: IrAlias, library: IrLibrary, ctx: CompileContext): TypeDescriptor {
  if (decl.type) return ctx.resolveType(decl.type, library);

  const { name, nullable } = decl.partial_type_ctor;
  if (PRIMITIVE_NAMES.has(name)) return { kind: "primitive", subtype: name, nullable };
  if (name === "string") return { kind: "string", maxLength: null, nullable };
  if (name === "vector" || name === "array") {
    // Without a full type the element type is unknown.
    return {
      kind: "vector",
      element: { kind: "internal", subtype: "", nullable: false },
      maxCount: null,
      nullable,
    };
  }
  if (name.includes("/")) {
    const resolved = ctx.resolveIdentifier(normalizeIdentifier(name), library);
    return { ...resolved, nullable };
  }
  throw DefinitionError.unsupportedKind(library.name, `alias base ${name} (${decl.name})`);
}

export function compileAlias(decl: IrAlias, library: IrLibrary, ctx: CompileContext): AliasType {
  return new AliasType(declarationInfo(decl, library), baseOf(decl, library, ctx), ctx);
}
