// Method call shapes and dispatch metadata.

import {
  DefinitionError,
  memberOf,
  normalizeIdentifier,
  type IrMethod,
  type TypeDescriptor,
} from "@wirebind/ir";
import { isRecord } from "../declarations/base.ts";
import { StructType, TableType } from "../declarations/struct.ts";
import type { CompileContext } from "../declarations/types.ts";
import { UnionType } from "../declarations/union.ts";
import { ConstructionError } from "../errors.ts";

/** Dispatch metadata for one method, shared by every role instance. */
export interface MethodInfo {
  /** Role member name, `say`. */
  readonly name: string;
  /** Name as declared, `Say`. */
  readonly irName: string;
  readonly ordinal: bigint;
  /** Normalized identifier the inbound payload is constructed through; empty when there is none. */
  readonly requestIdent: string;
  readonly requiresResponse: boolean;
  readonly emptyResponse: boolean;
  readonly hasResult: boolean;
  /** Raw identifier of the response payload, or null. */
  readonly responseIdentifier: string | null;
}

/** How a method's keyword arguments map onto its payload. */
export type ParameterShape = "none" | "struct" | "table" | "union";

/**
 * Call signature of one method.
 *
 * For requests the payload is the request payload; for events it is the
 * payload the server sends.
 */
export class MethodSignature {
  readonly shape: ParameterShape;
  readonly qualifiedName: string;

  constructor(
    readonly name: string,
    readonly method: IrMethod,
    readonly payload: TypeDescriptor | null,
    private readonly ctx: CompileContext,
    library: string,
  ) {
    this.qualifiedName = `${memberOf(method.protocol)}.${method.name}`;
    this.shape = shapeOf(payload, this.qualifiedName, library);
  }

  get ordinal(): bigint {
    return this.method.ordinal;
  }

  get isEvent(): boolean {
    return this.method.isEvent;
  }

  /** Keyword parameter names, in declaration order. */
  parameters(): string[] {
    const decl = this.payloadType();
    if (decl instanceof UnionType) return decl.variantNames;
    return decl ? decl.fieldNames : [];
  }

  /**
   * Validate keyword arguments against the shape and build the payload.
   *
   * Struct payloads need every field, table payloads take any subset, union
   * payloads take exactly one variant, and no payload takes nothing.
   */
  buildPayload(args: unknown): unknown {
    const given = args ?? {};
    if (!isRecord(given)) {
      throw ConstructionError.invalidValue(this.qualifiedName, "expected keyword arguments");
    }
    const keys = Object.keys(given).filter((key) => given[key] !== undefined);
    const decl = this.payloadType();

    if (!decl) {
      if (keys.length > 0) throw ConstructionError.unknownField(this.qualifiedName, keys[0]);
      return null;
    }

    const known = new Set(this.parameters());
    for (const key of keys) {
      if (!known.has(key)) throw ConstructionError.unknownField(this.qualifiedName, key);
    }

    if (decl instanceof StructType) {
      for (const field of decl.fieldNames) {
        if (given[field] === undefined) throw ConstructionError.missingField(this.qualifiedName, field);
      }
    } else if (decl instanceof UnionType && keys.length !== 1) {
      throw ConstructionError.arity(this.qualifiedName, keys.length);
    }
    return decl.create(given);
  }

  /** Compiled payload type, or null for methods without a payload. */
  payloadType(): StructType | TableType | UnionType | null {
    const payload = this.payload;
    if (payload === null || payload.kind !== "identifier") return null;
    const decl = this.ctx.lookup(payload.identifier, payload.library);
    if (decl instanceof StructType || decl instanceof TableType || decl instanceof UnionType) return decl;
    throw DefinitionError.unknownType(payload.identifier, "method payload");
  }
}

function shapeOf(payload: TypeDescriptor | null, method: string, library: string): ParameterShape {
  if (payload === null) return "none";
  if (payload.kind === "identifier") {
    switch (payload.declKind) {
      case "struct":
      case "table":
      case "union":
        return payload.declKind;
    }
  }
  const kind = payload.kind === "identifier" ? payload.declKind : payload.kind;
  throw DefinitionError.unsupportedKind(library, `method parameter kind ${kind} for ${method}`);
}

/** Dispatch metadata for a request-bearing method. */
export function requestInfo(name: string, method: IrMethod): MethodInfo {
  const requestIdentifier = method.requestIdentifier;
  const responseIdentifier = method.hasResponse ? method.responseIdentifier : null;
  return Object.freeze({
    name,
    irName: method.name,
    ordinal: method.ordinal,
    requestIdent: requestIdentifier === null ? "" : normalizeIdentifier(requestIdentifier),
    requiresResponse: method.hasResponse && responseIdentifier !== null,
    emptyResponse: method.hasResponse && responseIdentifier === null,
    hasResult: method.hasResult,
    responseIdentifier,
  });
}

/** Dispatch metadata for an event: only the payload identifier is set. */
export function eventInfo(name: string, method: IrMethod): MethodInfo {
  return Object.freeze({
    name,
    irName: method.name,
    ordinal: method.ordinal,
    requestIdent: method.responseIdentifier ?? "",
    requiresResponse: false,
    emptyResponse: false,
    hasResult: false,
    responseIdentifier: null,
  });
}
