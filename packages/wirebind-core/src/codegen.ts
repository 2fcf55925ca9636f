/**
 * TypeScript declaration emitter.
 *
 * Turns a materialized library namespace into `.d.ts` text so callers can
 * type their handlers and calls against a library ahead of time:
 * - enums and bits become const objects plus a union of their values
 * - structs and tables become interfaces (table fields optional)
 * - unions become tagged alternatives mirroring UnionValue
 * - protocols become handler, call and event interfaces
 *
 * Identifiers declared in other libraries are reached through
 * `import type * as <library> from "./<library>.js"`.
 */

import { memberOf, type TypeDescriptor } from "@wirebind/ir";
import { AliasType } from "./declarations/alias.ts";
import { isWide } from "./declarations/base.ts";
import { ConstDeclaration } from "./declarations/const.ts";
import { BitsType, EnumType } from "./declarations/enum.ts";
import { ResourceType } from "./declarations/resource.ts";
import { StructType, TableType } from "./declarations/struct.ts";
import type { CompiledDeclaration, FieldInfo } from "./declarations/types.ts";
import { UnionType } from "./declarations/union.ts";
import type { LibraryNamespace } from "./namespace.ts";
import type { MethodSignature } from "./protocol/method.ts";
import type { ProtocolType } from "./protocol/protocol.ts";

export interface EmitOptions {
  /** Extension of emitted cross-library import paths. Defaults to ".js". */
  importExtension?: string;
}

export interface EmitContext {
  library: string;
  imports: Set<string>;
}

/** Emit declaration text for every declaration of a namespace, in export order. */
export function emitDeclarations(namespace: LibraryNamespace, options: EmitOptions = {}): string {
  const ctx: EmitContext = { library: namespace.name, imports: new Set() };
  const blocks = namespace.declarations().map((decl) => emitDeclaration(decl, ctx));

  const extension = options.importExtension ?? ".js";
  const header = [`// Declarations for library ${namespace.name}.`];
  for (const library of [...ctx.imports].sort()) {
    header.push(`import type * as ${importAlias(library)} from "./${library}${extension}";`);
  }
  return [header.join("\n"), ...blocks].join("\n\n") + "\n";
}

/** Emit one declaration. */
export function emitDeclaration(decl: CompiledDeclaration, ctx: EmitContext): string {
  const name = memberOf(decl.name);
  const doc = docComment(decl.doc, "");

  if (decl instanceof EnumType || decl instanceof BitsType) {
    const members = Object.entries(decl.members).map(
      ([member, value]) => `  readonly ${member}: ${literal(value)};`,
    );
    return [
      `${doc}export declare const ${name}: {`,
      ...members,
      "};",
      `export type ${name} = (typeof ${name})[keyof typeof ${name}];`,
    ].join("\n");
  }

  if (decl instanceof StructType || decl instanceof TableType) {
    const optional = decl instanceof TableType;
    if (decl.fields.length === 0) return `${doc}export type ${name} = Record<string, never>;`;
    const fields = decl.fields.map((field) => fieldLine(field, optional, ctx));
    return [`${doc}export interface ${name} {`, ...fields, "}"].join("\n");
  }

  if (decl instanceof UnionType) {
    const alternatives = decl.variants.map(
      (variant) => `  | { readonly tag: "${variant.name}"; readonly value: ${typeText(variant.type, ctx)} }`,
    );
    alternatives.push("  | { readonly tag: null; readonly value: null }");
    return [`${doc}export type ${name} =`, ...alternatives].join("\n") + ";";
  }

  if (decl instanceof ConstDeclaration) {
    return `${doc}export declare const ${name}: ${literal(decl.value)};`;
  }

  if (decl instanceof AliasType) {
    return `${doc}export type ${name} = ${typeText(decl.base, ctx)};`;
  }

  if (decl instanceof ResourceType) {
    return `${doc}export type ${name} = number;`;
  }

  return emitProtocol(decl, name, doc, ctx);
}

function emitProtocol(protocol: ProtocolType, name: string, doc: string, ctx: EmitContext): string {
  const requests = protocol.methods.filter((method) => !method.isEvent);
  const events = protocol.methods.filter((method) => method.isEvent);

  const handlers = requests.map((method) => {
    const params = method.payload ? `request: ${payloadText(method, ctx)}` : "";
    const returns = handlerReturn(protocol, method, ctx);
    return `${docComment(method.method.doc, "  ")}  ${method.name}(${params}): ${returns} | Promise<${returns}>;`;
  });
  const calls = requests.map((method) => {
    const params = method.payload ? `args${method.shape === "table" ? "?" : ""}: ${argsText(method, ctx)}` : "";
    return `${docComment(method.method.doc, "  ")}  ${method.name}(${params}): ${callReturn(protocol, method, ctx)};`;
  });
  const eventLines = events.map((method) => {
    const params = method.payload ? `event: ${payloadText(method, ctx)}` : "";
    return `${docComment(method.method.doc, "  ")}  ${method.name}(${params}): void | Promise<void>;`;
  });

  return [
    `${doc}export interface ${name}Handlers {`,
    ...handlers,
    "}",
    "",
    `export interface ${name}Calls {`,
    ...calls,
    "}",
    "",
    `export interface ${name}Events {`,
    ...eventLines,
    "}",
    "",
    `export declare const ${name}Marker: ${JSON.stringify(protocol.marker)};`,
  ].join("\n");
}

/** TypeScript type text of a resolved type. */
export function typeText(type: TypeDescriptor, ctx: EmitContext): string {
  const text = baseText(type, ctx);
  return type.nullable ? `${text} | null` : text;
}

function baseText(type: TypeDescriptor, ctx: EmitContext): string {
  switch (type.kind) {
    case "primitive":
      if (type.subtype === "bool") return "boolean";
      return isWide(type.subtype) ? "bigint" : "number";
    case "string":
      return "string";
    case "vector":
    case "array": {
      const element = typeText(type.element, ctx);
      return type.element.nullable ? `(${element})[]` : `${element}[]`;
    }
    case "handle":
    case "endpoint":
      return "number";
    case "internal":
      return "unknown";
    case "identifier": {
      if (type.declKind === "protocol") return "number";
      const member = memberOf(type.identifier);
      if (type.library === ctx.library) return member;
      ctx.imports.add(type.library);
      return `${importAlias(type.library)}.${member}`;
    }
  }
}

function fieldLine(field: FieldInfo, optional: boolean, ctx: EmitContext): string {
  const type = typeText(field.type, ctx);
  const line = optional
    ? `  ${field.name}?: ${field.type.nullable ? type : `${type} | null`};`
    : `  ${field.name}: ${type};`;
  return `${docComment(field.doc, "  ")}${line}`;
}

function payloadText(method: MethodSignature, ctx: EmitContext): string {
  return method.payload ? typeText(method.payload, ctx) : "void";
}

/** Keyword argument type: a union payload takes exactly one variant key. */
function argsText(method: MethodSignature, ctx: EmitContext): string {
  const decl = method.payloadType();
  if (decl instanceof UnionType) {
    return decl.variants.map((variant) => `{ ${variant.name}: ${typeText(variant.type, ctx)} }`).join(" | ");
  }
  return payloadText(method, ctx);
}

function handlerReturn(protocol: ProtocolType, method: MethodSignature, ctx: EmitContext): string {
  const info = protocol.methodMap.get(method.ordinal);
  if (!info?.requiresResponse || info.responseIdentifier === null) return "void";
  const response = protocol.context.resolveIdentifier(info.responseIdentifier, protocol.ir);
  if (info.hasResult && response.kind === "identifier") {
    const union = protocol.context.lookup(response.identifier, response.library);
    const variant = union instanceof UnionType ? union.field("response") : undefined;
    if (variant) return typeText(variant.type, ctx);
  }
  return typeText(response, ctx);
}

function callReturn(protocol: ProtocolType, method: MethodSignature, ctx: EmitContext): string {
  const info = protocol.methodMap.get(method.ordinal);
  if (!info || !method.method.hasResponse) return "void";
  if (info.responseIdentifier === null) return "Promise<null>";
  return `Promise<${typeText(protocol.context.resolveIdentifier(info.responseIdentifier, protocol.ir), ctx)}>`;
}

function importAlias(library: string): string {
  return library.replace(/\./g, "_");
}

function literal(value: unknown): string {
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}

function docComment(doc: string | undefined, indent: string): string {
  const lines = doc
    ?.trim()
    .split("\n")
    .map((line) => line.trim());
  if (!lines || lines.length === 0 || lines[0] === "") return "";
  if (lines.length === 1) return `${indent}/** ${lines[0]} */\n`;
  return `${indent}/**\n${lines.map((line) => `${indent} * ${line}`.trimEnd()).join("\n")}\n${indent} */\n`;
}
