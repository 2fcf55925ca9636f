// Type reference resolution.
//
// Identifier references are resolved lazily: a descriptor records which
// library declares the identifier and its kind, never the compiled type, so
// recursive and forward references need no special handling here.

import { DefinitionError } from "./errors.ts";
import type { IrDeclaration, IrLibrary } from "./library.ts";
import type { IrLoader } from "./loader.ts";
import { libraryOf, normalizeIdentifier } from "./naming.ts";
import { isDeclarationKind, type IrDeclarationKind, type IrTypeRef } from "./schema.ts";

/** A resolved type reference. Every variant carries `nullable`. */
export type TypeDescriptor =
  | { kind: "primitive"; subtype: string; nullable: boolean }
  | { kind: "string"; maxLength: number | null; nullable: boolean }
  | { kind: "vector"; element: TypeDescriptor; maxCount: number | null; nullable: boolean }
  | { kind: "array"; element: TypeDescriptor; count: number; nullable: boolean }
  | { kind: "handle"; subtype: string; nullable: boolean }
  | {
      kind: "identifier";
      /** Normalized identifier. */
      identifier: string;
      rawIdentifier: string;
      declKind: IrDeclarationKind;
      /** Name of the library that declares it. */
      library: string;
      nullable: boolean;
    }
  | { kind: "endpoint"; role: "client" | "server"; protocol: string; nullable: boolean }
  | { kind: "internal"; subtype: string; nullable: boolean };

export type TypeDescriptorKind = TypeDescriptor["kind"];

/** Where an identifier is declared. */
export interface ResolvedKind {
  kind: IrDeclarationKind;
  identifier: string;
  rawIdentifier: string;
  library: IrLibrary;
  declaration: IrDeclaration | undefined;
}

export class TypeResolver {
  constructor(private readonly loader: IrLoader) {}

  /**
   * Find the declaring library and kind of an identifier.
   *
   * Looks in `library` first, then in the library named by the identifier's
   * prefix. Each library is visited at most once.
   */
  resolveKind(identifier: string, library: IrLibrary): ResolvedKind {
    const visited = new Set<string>();
    let current = library;

    for (;;) {
      visited.add(current.name);
      const kind = current.declarationKind(identifier);
      if (kind !== undefined) {
        if (!isDeclarationKind(kind)) {
          throw DefinitionError.unsupportedKind(current.name, `declaration kind ${kind} (${identifier})`);
        }
        return {
          kind,
          identifier: normalizeIdentifier(identifier),
          rawIdentifier: current.rawIdentifier(identifier) ?? identifier,
          library: current,
          declaration: current.findDeclaration(kind, identifier),
        };
      }
      const target = libraryOf(identifier);
      if (visited.has(target)) break;
      visited.add(target);
      current = this.loader.load(target);
    }

    throw DefinitionError.unresolvedKind(identifier, library.name);
  }

  /** Resolve an identifier directly to a descriptor. */
  resolveIdentifier(identifier: string, library: IrLibrary, nullable = false): TypeDescriptor {
    const resolved = this.resolveKind(identifier, library);
    return {
      kind: "identifier",
      identifier: resolved.identifier,
      rawIdentifier: resolved.rawIdentifier,
      declKind: resolved.kind,
      library: resolved.library.name,
      nullable,
    };
  }

  /** Resolve a type reference found inside `library`. */
  resolveType(ref: IrTypeRef, library: IrLibrary): TypeDescriptor {
    const nullable = ref.nullable ?? false;
    switch (ref.kind_v2) {
      case "primitive":
        return { kind: "primitive", subtype: this.require(ref, "subtype", library), nullable };
      case "string":
        return { kind: "string", maxLength: ref.maybe_element_count ?? null, nullable };
      case "vector":
        return {
          kind: "vector",
          element: this.resolveType(this.elementOf(ref, library), library),
          maxCount: ref.maybe_element_count ?? null,
          nullable,
        };
      case "array":
        return {
          kind: "array",
          element: this.resolveType(this.elementOf(ref, library), library),
          count: ref.element_count ?? 0,
          nullable,
        };
      case "handle":
        return { kind: "handle", subtype: ref.subtype ?? "handle", nullable };
      case "identifier":
        return this.resolveIdentifier(this.require(ref, "identifier", library), library, nullable);
      case "endpoint": {
        const role = ref.role;
        if (role !== "client" && role !== "server") {
          throw DefinitionError.unsupportedKind(library.name, `endpoint role ${String(role)}`);
        }
        return { kind: "endpoint", role, protocol: this.require(ref, "protocol", library), nullable };
      }
      case "internal":
        return { kind: "internal", subtype: ref.subtype ?? "", nullable };
      default:
        throw DefinitionError.unsupportedKind(library.name, `type kind ${ref.kind_v2}`);
    }
  }

  private elementOf(ref: IrTypeRef, library: IrLibrary): IrTypeRef {
    if (!ref.element_type) {
      throw DefinitionError.unsupportedKind(library.name, `${ref.kind_v2} without element type`);
    }
    return ref.element_type;
  }

  private require(
    ref: IrTypeRef,
    field: "subtype" | "identifier" | "protocol",
    library: IrLibrary,
  ): string {
    const value = ref[field];
    if (value === undefined) {
      throw DefinitionError.unsupportedKind(library.name, `${ref.kind_v2} type without ${field}`);
    }
    return value;
  }
}
