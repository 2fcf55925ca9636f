// @wirebind/ir - IR documents, discovery and type resolution

export { DefinitionError } from "./errors.ts";

export {
  normalizeIdentifier,
  libraryOf,
  memberOf,
  markerOf,
  isReserved,
  memberNameOf,
  methodNameOf,
  docOf,
} from "./naming.ts";

export {
  IrTypeRefSchema,
  IrDocumentSchema,
  IrMethodSchema,
  DECLARATION_KINDS,
  isDeclarationKind,
  parseIrText,
  type IrTypeRef,
  type IrAttribute,
  type IrConstant,
  type IrDocument,
  type IrDeclarationMap,
  type IrDeclarationKind,
  type IrBits,
  type IrEnum,
  type IrEnumMember,
  type IrStruct,
  type IrStructMember,
  type IrTable,
  type IrUnion,
  type IrOrdinalMember,
  type IrConst,
  type IrAlias,
  type IrResource,
  type IrProtocol,
  type IrMethodRecord,
} from "./schema.ts";

export { IrLibrary, IrMethod, type IrDeclaration } from "./library.ts";

export { IrLoader, IR_PATH_ENV, type IrLoaderOptions } from "./loader.ts";

export {
  TypeResolver,
  type TypeDescriptor,
  type TypeDescriptorKind,
  type ResolvedKind,
} from "./resolver.ts";

export {
  createLogger,
  isEnabled,
  matchPattern,
  type Logger,
  type LoggerOptions,
  type LogSink,
} from "./logging.ts";
