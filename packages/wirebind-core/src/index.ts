// @wirebind/core - declaration and protocol compiler plus the dispatch engine
// This package turns loaded IR libraries into compiled types and role classes.

// IR loading and resolution, re-exported for convenience
export {
  DefinitionError,
  IrLoader,
  IrLibrary,
  IrMethod,
  IR_PATH_ENV,
  TypeResolver,
  createLogger,
  normalizeIdentifier,
  type IrLoaderOptions,
  type Logger,
  type LogSink,
  type TypeDescriptor,
} from "@wirebind/ir";

// Errors and control signals
export {
  ConstructionError,
  DispatchError,
  ResultError,
  NotImplementedError,
  StopServer,
  StopEventHandler,
  DomainError,
  FrameworkError,
} from "./errors.ts";

// Codec and transport boundaries
export type { WireCodec, WireMessage, DecodedMessage, EncodeRequest } from "./codec.ts";
export {
  ChannelWaker,
  type ChannelTransport,
  type ReadinessNotifier,
  type ReadResult,
} from "./transport.ts";

// Compiled declarations
export type {
  CompileContext,
  CompiledDeclaration,
  DeclarationInfo,
  DeclarationKindTag,
  Encodable,
  FieldInfo,
} from "./declarations/types.ts";
export { StructType, TableType, recordTypeOf, type RecordValue } from "./declarations/struct.ts";
export { UnionType, UnionValue, RESULT_VARIANTS } from "./declarations/union.ts";
export { EnumType, BitsType, EMPTY_MEMBER, type IntegerValue } from "./declarations/enum.ts";
export { ConstDeclaration } from "./declarations/const.ts";
export { AliasType } from "./declarations/alias.ts";
export { ResourceType } from "./declarations/resource.ts";
export { construct, defaultFor, declarationOf, describeType } from "./declarations/values.ts";

// Protocols and roles
export {
  ProtocolType,
  roleMemberName,
  type ServerClass,
  type ClientClass,
  type EventHandlerClass,
} from "./protocol/protocol.ts";
export { MethodSignature, type MethodInfo, type ParameterShape } from "./protocol/method.ts";
export { ServerBase, type ServerState, type RoleOptions } from "./protocol/server.ts";
export { ClientBase, type ReceivedEvent } from "./protocol/client.ts";
export { EventHandlerBase } from "./protocol/event_handler.ts";

// Namespaces, registry and declaration emitter
export {
  LibraryNamespace,
  EXPORT_ORDER,
  compileDeclaration,
  type NamespaceExport,
  type NamespaceState,
} from "./namespace.ts";
export { Registry, type RegistryOptions } from "./registry.ts";
export { emitDeclarations, type EmitOptions } from "./codegen.ts";
