// Const declarations: a name bound to a converted literal.

import { DefinitionError, type IrConst, type IrLibrary, type TypeDescriptor } from "@wirebind/ir";
import { convertPrimitive, declarationInfo } from "./base.ts";
import { AliasType } from "./alias.ts";
import { BitsType, EnumType } from "./enum.ts";
import type { CompileContext, DeclarationInfo } from "./types.ts";

export class ConstDeclaration implements DeclarationInfo {
  readonly kind = "const";
  readonly name: string;
  readonly rawName: string;
  readonly library: string;
  readonly doc: string | undefined;

  constructor(
    info: DeclarationInfo,
    readonly type: TypeDescriptor,
    readonly value: unknown,
  ) {
    this.name = info.name;
    this.rawName = info.rawName;
    this.library = info.library;
    this.doc = info.doc;
  }

  makeDefault(): unknown {
    return this.value;
  }

  toString(): string {
    return `const ${this.name}`;
  }
}

export function compileConst(decl: IrConst, library: IrLibrary, ctx: CompileContext): ConstDeclaration {
  const type = ctx.resolveType(decl.type, library);
  const literal = decl.value.value;
  const info = declarationInfo(decl, library);

  switch (type.kind) {
    case "primitive":
      return new ConstDeclaration(info, type, convertPrimitive(info.name, type.subtype, literal));
    case "string":
      return new ConstDeclaration(info, type, literal);
    case "identifier": {
      const target = ctx.lookup(type.identifier, type.library);
      if (target instanceof EnumType || target instanceof BitsType || target instanceof AliasType) {
        return new ConstDeclaration(info, type, target.cast(literal));
      }
      break;
    }
  }
  throw DefinitionError.unsupportedKind(library.name, `const type ${type.kind} (${decl.name})`);
}
