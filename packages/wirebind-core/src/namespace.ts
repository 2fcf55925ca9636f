// Library namespaces.
//
// A namespace holds every compiled declaration of one library under its
// member name. Materialization walks the kinds in a fixed order so earlier
// kinds are in place before later ones refer to them; any declaration can
// also be compiled on demand, and names already exported are skipped.

import {
  DefinitionError,
  memberOf,
  normalizeIdentifier,
  type IrDeclarationKind,
  type IrDeclarationMap,
  type IrLibrary,
} from "@wirebind/ir";
import { compileAlias, AliasType } from "./declarations/alias.ts";
import { compileConst, ConstDeclaration } from "./declarations/const.ts";
import { compileBits, compileEnum, BitsType, EnumType } from "./declarations/enum.ts";
import { compileResource, ResourceType } from "./declarations/resource.ts";
import { compileStruct, compileTable, StructType, TableType } from "./declarations/struct.ts";
import type { CompileContext, CompiledDeclaration } from "./declarations/types.ts";
import { compileUnion, UnionType } from "./declarations/union.ts";
import {
  compileProtocol,
  ProtocolType,
  type ClientClass,
  type EventHandlerClass,
  type ServerClass,
} from "./protocol/protocol.ts";

/** Kinds in the order they are exported. */
export const EXPORT_ORDER: readonly IrDeclarationKind[] = [
  "bits",
  "experimental_resource",
  "enum",
  "struct",
  "table",
  "union",
  "const",
  "alias",
  "protocol",
];

export type NamespaceExport = CompiledDeclaration | ServerClass | ClientClass | EventHandlerClass;

export type NamespaceState = "pending" | "materializing" | "complete";

/** Compile one declaration of a library by identifier. */
export function compileDeclaration(
  identifier: string,
  library: IrLibrary,
  ctx: CompileContext,
): CompiledDeclaration {
  const find = <K extends IrDeclarationKind>(kind: K): IrDeclarationMap[K] => {
    const decl = library.findDeclaration(kind, identifier);
    if (!decl) throw DefinitionError.unknownType(identifier, kind);
    return decl;
  };

  const kind = library.declarationKind(identifier);
  switch (kind) {
    case "bits":
      return compileBits(find("bits"), library);
    case "experimental_resource":
      return compileResource(find("experimental_resource"), library);
    case "enum":
      return compileEnum(find("enum"), library);
    case "struct":
      return compileStruct(find("struct"), library, ctx);
    case "table":
      return compileTable(find("table"), library, ctx);
    case "union":
      return compileUnion(find("union"), library, ctx);
    case "const":
      return compileConst(find("const"), library, ctx);
    case "alias":
      return compileAlias(find("alias"), library, ctx);
    case "protocol":
      return compileProtocol(find("protocol"), library, ctx);
    case undefined:
      throw DefinitionError.unknownType(identifier);
    default:
      throw DefinitionError.unsupportedKind(library.name, `declaration kind ${kind} (${identifier})`);
  }
}

export class LibraryNamespace {
  private readonly exported = new Map<string, NamespaceExport>();
  private readonly compiled = new Map<string, CompiledDeclaration>();
  private _state: NamespaceState = "pending";

  constructor(
    readonly library: IrLibrary,
    private readonly ctx: CompileContext,
  ) {}

  get name(): string {
    return this.library.name;
  }

  get state(): NamespaceState {
    return this._state;
  }

  /**
   * Compile and export every declaration, kind by kind in EXPORT_ORDER.
   * Does nothing when already materializing or complete.
   */
  materialize(): this {
    if (this._state !== "pending") return this;
    this._state = "materializing";
    try {
      for (const kind of EXPORT_ORDER) {
        for (const decl of this.library.declarationsOf(kind)) {
          this.declaration(decl.name);
        }
      }
    } catch (e) {
      this._state = "pending";
      throw e;
    }
    this._state = "complete";
    return this;
  }

  /** Compiled declaration by raw or normalized identifier, compiling it on first use. */
  declaration(identifier: string): CompiledDeclaration {
    const key = normalizeIdentifier(identifier);
    const cached = this.compiled.get(key);
    if (cached) return cached;

    const decl = compileDeclaration(identifier, this.library, this.ctx);
    this.compiled.set(key, decl);
    this.export(memberOf(key), decl);
    if (decl instanceof ProtocolType) {
      const member = memberOf(key);
      this.export(`${member}Client`, decl.Client);
      this.export(`${member}Server`, decl.Server);
      this.export(`${member}EventHandler`, decl.EventHandler);
    }
    return decl;
  }

  has(name: string): boolean {
    return this.exported.has(name);
  }

  get(name: string): NamespaceExport | undefined {
    return this.exported.get(name);
  }

  /** Exported names in export order. */
  names(): string[] {
    return [...this.exported.keys()];
  }

  /** Compiled declarations in export order. */
  declarations(): CompiledDeclaration[] {
    return [...this.compiled.values()];
  }

  struct(name: string): StructType {
    return this.typed(name, StructType, "struct");
  }

  table(name: string): TableType {
    return this.typed(name, TableType, "table");
  }

  union(name: string): UnionType {
    return this.typed(name, UnionType, "union");
  }

  enum(name: string): EnumType {
    return this.typed(name, EnumType, "enum");
  }

  bits(name: string): BitsType {
    return this.typed(name, BitsType, "bits");
  }

  alias(name: string): AliasType {
    return this.typed(name, AliasType, "alias");
  }

  resource(name: string): ResourceType {
    return this.typed(name, ResourceType, "resource");
  }

  protocol(name: string): ProtocolType {
    return this.typed(name, ProtocolType, "protocol");
  }

  /** Value of a const. */
  constant(name: string): unknown {
    return this.typed(name, ConstDeclaration, "const").value;
  }

  private typed<T extends CompiledDeclaration>(
    name: string,
    type: abstract new (...args: never[]) => T,
    expected: string,
  ): T {
    const found = this.exported.get(name) ?? this.compileByMember(name);
    if (found instanceof type) return found;
    throw DefinitionError.unknownType(`${this.name}/${name}`, expected);
  }

  private compileByMember(name: string): CompiledDeclaration | undefined {
    const identifier = `${this.name}/${name}`;
    return this.library.declarationKind(identifier) === undefined ? undefined : this.declaration(identifier);
  }

  private export(name: string, value: NamespaceExport): void {
    if (!this.exported.has(name)) this.exported.set(name, value);
  }
}
