// Shared shapes of compiled declarations.

import type { IrLibrary, IrTypeRef, Logger, TypeDescriptor } from "@wirebind/ir";
import type { WireCodec, WireMessage } from "../codec.ts";
import type { ReadinessNotifier } from "../transport.ts";
import type { AliasType } from "./alias.ts";
import type { ConstDeclaration } from "./const.ts";
import type { BitsType, EnumType } from "./enum.ts";
import type { ResourceType } from "./resource.ts";
import type { StructType, TableType } from "./struct.ts";
import type { UnionType } from "./union.ts";
import type { ProtocolType } from "../protocol/protocol.ts";

/**
 * What compiled declarations need from their registry.
 *
 * Identifier types are looked up lazily through `lookup`, so declarations can
 * reference each other in any order and across libraries.
 */
export interface CompileContext {
  readonly codec: WireCodec | null;
  readonly notifier: ReadinessNotifier;
  /** Logger for roles; null lets each role log under its own namespace. */
  readonly logger: Logger | null;
  resolveType(ref: IrTypeRef, library: IrLibrary): TypeDescriptor;
  resolveIdentifier(identifier: string, library: IrLibrary): TypeDescriptor;
  /** Compiled declaration of an identifier declared in `library`. */
  lookup(identifier: string, library: string): CompiledDeclaration;
  defaultFor(type: TypeDescriptor): unknown;
  construct(type: TypeDescriptor, value: unknown): unknown;
}

/** A struct, table or union member. */
export interface FieldInfo {
  /** Member name as exposed on values; reserved words get a `_` suffix. */
  readonly name: string;
  /** Member name as declared. */
  readonly irName: string;
  readonly type: TypeDescriptor;
  /** Table and union ordinal; 0 for struct members. */
  readonly ordinal: number;
  readonly doc: string | undefined;
}

/** Naming shared by every compiled declaration. */
export interface DeclarationInfo {
  /** Normalized qualified name, `x/EchoFailResult`. */
  readonly name: string;
  /** Qualified name as declared, `x/Echo_Fail_Result`. */
  readonly rawName: string;
  readonly library: string;
  readonly doc: string | undefined;
}

/** Compiled declarations whose values can be encoded on their own. */
export interface Encodable {
  encode(value: unknown): WireMessage;
}

export type CompiledDeclaration =
  | StructType
  | TableType
  | UnionType
  | EnumType
  | BitsType
  | ConstDeclaration
  | AliasType
  | ResourceType
  | ProtocolType;

export type DeclarationKindTag = CompiledDeclaration["kind"];
