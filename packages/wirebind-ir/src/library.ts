// Read-only views over a parsed IR document.

import { docOf, memberOf, normalizeIdentifier } from "./naming.ts";
import type {
  IrDeclarationKind,
  IrDeclarationMap,
  IrDocument,
  IrMethodRecord,
  IrProtocol,
  IrTypeRef,
} from "./schema.ts";

type DeclarationTable = { [K in IrDeclarationKind]: readonly IrDeclarationMap[K][] };

/** Any declaration record. */
export type IrDeclaration = IrDeclarationMap[IrDeclarationKind];

/**
 * One loaded library.
 *
 * Identifier lookups accept both raw and normalized spellings, so
 * `x/Echo_Say_Response` and `x/EchoSayResponse` find the same declaration.
 */
export class IrLibrary {
  readonly name: string;
  private readonly table: DeclarationTable;
  private readonly rawByNormalized = new Map<string, string>();
  private readonly orderIndex = new Map<string, number>();

  constructor(
    readonly document: IrDocument,
    /** Resolved path the document was read from, or a label for in-memory documents. */
    readonly path: string,
  ) {
    this.name = document.name;
    this.table = {
      bits: document.bits_declarations,
      enum: document.enum_declarations,
      struct: document.struct_declarations,
      table: document.table_declarations,
      union: document.union_declarations,
      const: document.const_declarations,
      alias: document.alias_declarations,
      protocol: document.protocol_declarations,
      experimental_resource: document.experimental_resource_declarations,
    };
    for (const raw of Object.keys(document.declarations)) {
      this.rawByNormalized.set(normalizeIdentifier(raw), raw);
    }
    document.declaration_order.forEach((identifier, index) => {
      this.orderIndex.set(normalizeIdentifier(identifier), index);
    });
  }

  /** Library-level documentation. */
  get doc(): string | undefined {
    return docOf(this.document.maybe_attributes);
  }

  /** Names of the libraries this one depends on. */
  get dependencies(): string[] {
    return this.document.library_dependencies.map((dep) => dep.name);
  }

  /** Raw spelling of an identifier declared in this library, if any. */
  rawIdentifier(identifier: string): string | undefined {
    if (Object.hasOwn(this.document.declarations, identifier)) return identifier;
    return this.rawByNormalized.get(normalizeIdentifier(identifier));
  }

  /** The declared kind string of an identifier, or undefined when not declared here. */
  declarationKind(identifier: string): string | undefined {
    const raw = this.rawIdentifier(identifier);
    return raw === undefined ? undefined : this.document.declarations[raw];
  }

  /** Declarations of one kind, in `declaration_order`. */
  declarationsOf<K extends IrDeclarationKind>(kind: K): IrDeclarationMap[K][] {
    const position = (decl: IrDeclarationMap[K]): number =>
      this.orderIndex.get(normalizeIdentifier(decl.name)) ?? Number.MAX_SAFE_INTEGER;
    const declarations: readonly IrDeclarationMap[K][] = this.table[kind];
    return [...declarations].sort((a, b) => position(a) - position(b));
  }

  /** Find one declaration of a given kind by raw or normalized identifier. */
  findDeclaration<K extends IrDeclarationKind>(
    kind: K,
    identifier: string,
  ): IrDeclarationMap[K] | undefined {
    const wanted = normalizeIdentifier(identifier);
    return this.table[kind].find((decl) => normalizeIdentifier(decl.name) === wanted);
  }

  /** Methods of a protocol declared in this library. */
  methodsOf(protocol: IrProtocol): IrMethod[] {
    return protocol.methods.map((record) => new IrMethod(record, protocol.name));
  }
}

/** Read-only view of one protocol method. */
export class IrMethod {
  readonly ordinal: bigint;
  readonly name: string;
  readonly hasRequest: boolean;
  readonly hasResponse: boolean;
  readonly strict: boolean;
  readonly hasError: boolean;

  constructor(
    readonly record: IrMethodRecord,
    /** Raw identifier of the owning protocol. */
    readonly protocol: string,
  ) {
    this.ordinal = record.ordinal;
    this.name = record.name;
    this.hasRequest = record.has_request;
    this.hasResponse = record.has_response;
    this.strict = record.strict;
    this.hasError = record.has_error;
  }

  /** Whether the response travels inside a result union. */
  get hasResult(): boolean {
    return this.hasError || (!this.strict && this.hasResponse);
  }

  /** A method without a request is an event sent by the server. */
  get isEvent(): boolean {
    return !this.hasRequest;
  }

  get requestPayload(): IrTypeRef | undefined {
    return this.record.maybe_request_payload;
  }

  get responsePayload(): IrTypeRef | undefined {
    return this.record.maybe_response_payload;
  }

  /** Raw identifier of the request payload type, or null. */
  get requestIdentifier(): string | null {
    return this.record.maybe_request_payload?.identifier ?? null;
  }

  /** Raw identifier of the response payload type, or null. */
  get responseIdentifier(): string | null {
    return this.record.maybe_response_payload?.identifier ?? null;
  }

  /** `Echo.Say` */
  get qualifiedName(): string {
    return `${memberOf(this.protocol)}.${this.name}`;
  }

  get doc(): string | undefined {
    return docOf(this.record.maybe_attributes);
  }
}
