// Protocol compilation.
//
// A protocol compiles into three role classes (Client, Server, EventHandler)
// with one generated member per method, plus immutable dispatch tables keyed
// by ordinal for requests and events.

import {
  DefinitionError,
  docOf,
  markerOf,
  memberOf,
  methodNameOf,
  normalizeIdentifier,
  type IrLibrary,
  type IrProtocol,
  type TypeDescriptor,
} from "@wirebind/ir";
import type { CompileContext, DeclarationInfo } from "../declarations/types.ts";
import { UnionType, type UnionValue } from "../declarations/union.ts";
import { NotImplementedError, ResultError } from "../errors.ts";
import type { ChannelTransport } from "../transport.ts";
import { ClientBase } from "./client.ts";
import { EventHandlerBase } from "./event_handler.ts";
import { MethodSignature, eventInfo, requestInfo, type MethodInfo } from "./method.ts";
import { ServerBase, type RoleOptions } from "./server.ts";

export type ServerClass = new (channel: ChannelTransport, options?: RoleOptions) => ServerBase;
export type ClientClass = new (channel: ChannelTransport, options?: RoleOptions) => ClientBase;
export type EventHandlerClass = new (client: ClientBase, options?: RoleOptions) => EventHandlerBase;

// Names generated members must not shadow: base methods and instance fields.
const TAKEN = new Set<string>([
  ...Object.getOwnPropertyNames(ServerBase.prototype),
  ...Object.getOwnPropertyNames(ClientBase.prototype),
  ...Object.getOwnPropertyNames(EventHandlerBase.prototype),
  "id",
  "protocol",
  "client",
  "codec",
  "notifier",
  "log",
  "_channel",
  "_state",
  "nextTxid",
  "peerClosed",
  "responses",
  "events",
  "pump",
  // Looked up by await and Promise.resolve.
  "then",
]);

/** Role member name of a method: lower camel case, suffixed when taken. */
export function roleMemberName(irName: string): string {
  const name = methodNameOf(irName);
  return TAKEN.has(name) ? `${name}_` : name;
}

type Member = (...args: never[]) => unknown;

function defineMember(target: object, name: string, value: Member): void {
  Object.defineProperty(target, name, { value, writable: true, configurable: true });
}

function notImplemented(name: string): Member {
  return function () {
    throw new NotImplementedError(name);
  };
}

export class ProtocolType implements DeclarationInfo {
  readonly kind = "protocol";
  readonly name: string;
  readonly rawName: string;
  readonly library: string;
  readonly doc: string | undefined;
  /** Discovery marker, `library.Protocol`. */
  readonly marker: string;
  readonly Client: ClientClass;
  readonly Server: ServerClass;
  readonly EventHandler: EventHandlerClass;
  /** Request-bearing methods by ordinal. */
  readonly methodMap: ReadonlyMap<bigint, MethodInfo>;
  /** Events by ordinal. */
  readonly eventMap: ReadonlyMap<bigint, MethodInfo>;
  readonly methods: readonly MethodSignature[];
  private readonly byName = new Map<string, MethodSignature>();
  private readonly descriptors = new Map<string, TypeDescriptor>();

  constructor(
    decl: IrProtocol,
    readonly ir: IrLibrary,
    readonly context: CompileContext,
  ) {
    this.name = normalizeIdentifier(decl.name);
    this.rawName = decl.name;
    this.library = ir.name;
    this.doc = docOf(decl.maybe_attributes);
    this.marker = markerOf(decl.name);

    const methodMap = new Map<bigint, MethodInfo>();
    const eventMap = new Map<bigint, MethodInfo>();
    const seen = new Map<bigint, string>();
    const methods: MethodSignature[] = [];

    for (const method of ir.methodsOf(decl)) {
      const previous = seen.get(method.ordinal);
      if (previous !== undefined) {
        throw DefinitionError.duplicateOrdinal(decl.name, method.ordinal, [previous, method.name]);
      }
      seen.set(method.ordinal, method.name);

      const name = roleMemberName(method.name);
      const ref = method.isEvent ? method.responsePayload : method.requestPayload;
      const payload = ref ? context.resolveType(ref, ir) : null;
      const signature = new MethodSignature(name, method, payload, context, ir.name);
      methods.push(signature);
      this.byName.set(name, signature);
      this.byName.set(method.name, signature);

      if (method.isEvent) {
        eventMap.set(method.ordinal, eventInfo(name, method));
      } else {
        methodMap.set(method.ordinal, requestInfo(name, method));
      }
    }

    this.methodMap = methodMap;
    this.eventMap = eventMap;
    this.methods = Object.freeze(methods);

    const protocol = this;
    const member = memberOf(decl.name);

    const Server = class extends ServerBase {
      constructor(channel: ChannelTransport, options?: RoleOptions) {
        super(protocol, channel, options);
      }
    };
    const Client = class extends ClientBase {
      constructor(channel: ChannelTransport, options?: RoleOptions) {
        super(protocol, channel, options);
      }
    };
    const EventHandler = class extends EventHandlerBase {
      constructor(client: ClientBase, options?: RoleOptions) {
        super(protocol, client, options);
      }
    };
    Object.defineProperty(Server, "name", { value: `${member}Server` });
    Object.defineProperty(Client, "name", { value: `${member}Client` });
    Object.defineProperty(EventHandler, "name", { value: `${member}EventHandler` });

    for (const signature of methods) {
      if (signature.isEvent) {
        defineMember(Server.prototype, signature.name, function (this: ServerBase, args?: Record<string, unknown>) {
          this.sendEvent(signature.ordinal, signature.buildPayload(args));
        });
        defineMember(EventHandler.prototype, signature.name, notImplemented(signature.name));
      } else {
        defineMember(Server.prototype, signature.name, notImplemented(signature.name));
        defineMember(Client.prototype, signature.name, function (this: ClientBase, args?: Record<string, unknown>) {
          return this.call(signature.name, args);
        });
      }
    }

    this.Server = Server;
    this.Client = Client;
    this.EventHandler = EventHandler;
  }

  /** Method signature by role member name or declared name. */
  signature(name: string): MethodSignature | undefined {
    return this.byName.get(name);
  }

  /** Construct a payload value through an identifier visible from this protocol's library. */
  constructPayload(identifier: string, value: unknown): unknown {
    return this.context.construct(this.descriptor(identifier), value);
  }

  /** A result union value holding one variant. */
  resultVariant(identifier: string, tag: string, value: unknown): UnionValue {
    const type = this.descriptor(identifier);
    const decl = type.kind === "identifier" ? this.context.lookup(type.identifier, type.library) : undefined;
    if (!(decl instanceof UnionType) || !decl.isResult) throw ResultError.notResult(identifier);
    return decl.variant(tag, value);
  }

  toString(): string {
    return `protocol ${this.name}`;
  }

  private descriptor(identifier: string): TypeDescriptor {
    let type = this.descriptors.get(identifier);
    if (!type) {
      type = this.context.resolveIdentifier(identifier, this.ir);
      this.descriptors.set(identifier, type);
    }
    return type;
  }
}

export function compileProtocol(decl: IrProtocol, library: IrLibrary, ctx: CompileContext): ProtocolType {
  return new ProtocolType(decl, library, ctx);
}
