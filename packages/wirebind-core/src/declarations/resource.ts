// Resource declarations: integer-valued handles with a declared subtype.

import type { IrLibrary, IrResource } from "@wirebind/ir";
import { declarationInfo } from "./base.ts";
import type { DeclarationInfo } from "./types.ts";

export class ResourceType implements DeclarationInfo {
  readonly kind = "resource";
  readonly name: string;
  readonly rawName: string;
  readonly library: string;
  readonly doc: string | undefined;

  constructor(
    info: DeclarationInfo,
    readonly subtype: string,
  ) {
    this.name = info.name;
    this.rawName = info.rawName;
    this.library = info.library;
    this.doc = info.doc;
  }

  makeDefault(): number {
    return 0;
  }

  toString(): string {
    return `resource ${this.name}`;
  }
}

export function compileResource(decl: IrResource, library: IrLibrary): ResourceType {
  return new ResourceType(declarationInfo(decl, library), decl.type.subtype ?? "uint32");
}
