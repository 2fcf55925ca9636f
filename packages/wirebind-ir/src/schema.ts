// Zod schemas for IR documents.
//
// Only the fields the compiler reads are described; everything else in the
// document is stripped during parsing.

import { z } from "zod";

// ============================================================================
// Type references
// ============================================================================

/**
 * A type reference as it appears on members, payloads and constants.
 *
 * `kind_v2` selects which of the optional fields are meaningful:
 * - primitive: `subtype`
 * - string: `nullable`, `maybe_element_count`
 * - vector / array: `element_type`, `element_count` (arrays), `nullable`
 * - handle: `subtype`, `nullable`
 * - identifier: `identifier`, `nullable`
 * - endpoint: `role`, `protocol`, `nullable`
 * - internal: `subtype`
 */
export interface IrTypeRef {
  kind_v2: string;
  subtype?: string;
  identifier?: string;
  nullable?: boolean;
  element_type?: IrTypeRef;
  element_count?: number;
  maybe_element_count?: number;
  role?: string;
  protocol?: string;
}

export const IrTypeRefSchema: z.ZodType<IrTypeRef> = z.lazy(() =>
  z.object({
    kind_v2: z.string(),
    subtype: z.string().optional(),
    identifier: z.string().optional(),
    nullable: z.boolean().optional(),
    element_type: IrTypeRefSchema.optional(),
    element_count: z.number().optional(),
    maybe_element_count: z.number().optional(),
    role: z.string().optional(),
    protocol: z.string().optional(),
  }),
);

// ============================================================================
// Attributes and constants
// ============================================================================

export const IrConstantSchema = z.object({
  kind: z.string(),
  value: z.string(),
  expression: z.string().optional(),
  identifier: z.string().optional(),
});
export type IrConstant = z.infer<typeof IrConstantSchema>;

export const IrAttributeSchema = z.object({
  name: z.string(),
  arguments: z
    .array(
      z.object({
        name: z.string(),
        value: IrConstantSchema,
      }),
    )
    .default([]),
});
export type IrAttribute = z.infer<typeof IrAttributeSchema>;

const attributes = z.array(IrAttributeSchema).optional();

/** Small member ordinals (tables, unions). */
const memberOrdinal = z.union([z.number(), z.string()]).transform((v) => Number(v));

/**
 * Method ordinals are 64-bit. The loader quotes them before JSON parsing so no
 * precision is lost; in-memory documents may use numbers or bigints.
 */
const methodOrdinal = z.union([z.string().regex(/^-?\d+$/), z.number(), z.bigint()]).transform(
  (v) => BigInt(v),
);

// ============================================================================
// Declarations
// ============================================================================

export const IrEnumMemberSchema = z.object({
  name: z.string(),
  value: IrConstantSchema,
  maybe_attributes: attributes,
});
export type IrEnumMember = z.infer<typeof IrEnumMemberSchema>;

export const IrBitsSchema = z.object({
  name: z.string(),
  type: IrTypeRefSchema,
  mask: z.string().default("0"),
  members: z.array(IrEnumMemberSchema),
  strict: z.boolean().default(true),
  maybe_attributes: attributes,
});
export type IrBits = z.infer<typeof IrBitsSchema>;

export const IrEnumSchema = z.object({
  name: z.string(),
  type: z.string(),
  members: z.array(IrEnumMemberSchema),
  strict: z.boolean().default(true),
  maybe_attributes: attributes,
});
export type IrEnum = z.infer<typeof IrEnumSchema>;

export const IrStructMemberSchema = z.object({
  name: z.string(),
  type: IrTypeRefSchema,
  maybe_attributes: attributes,
});
export type IrStructMember = z.infer<typeof IrStructMemberSchema>;

export const IrStructSchema = z.object({
  name: z.string(),
  members: z.array(IrStructMemberSchema),
  resource: z.boolean().default(false),
  maybe_attributes: attributes,
});
export type IrStruct = z.infer<typeof IrStructSchema>;

/** Table and union members; reserved members carry no name or type. */
export const IrOrdinalMemberSchema = z.object({
  ordinal: memberOrdinal,
  name: z.string().optional(),
  type: IrTypeRefSchema.optional(),
  reserved: z.boolean().optional(),
  maybe_attributes: attributes,
});
export type IrOrdinalMember = z.infer<typeof IrOrdinalMemberSchema>;

export const IrTableSchema = z.object({
  name: z.string(),
  members: z.array(IrOrdinalMemberSchema),
  strict: z.boolean().default(false),
  resource: z.boolean().default(false),
  maybe_attributes: attributes,
});
export type IrTable = z.infer<typeof IrTableSchema>;

export const IrUnionSchema = z.object({
  name: z.string(),
  members: z.array(IrOrdinalMemberSchema),
  strict: z.boolean().default(false),
  is_result: z.boolean().default(false),
  resource: z.boolean().default(false),
  maybe_attributes: attributes,
});
export type IrUnion = z.infer<typeof IrUnionSchema>;

export const IrConstSchema = z.object({
  name: z.string(),
  type: IrTypeRefSchema,
  value: IrConstantSchema,
  maybe_attributes: attributes,
});
export type IrConst = z.infer<typeof IrConstSchema>;

export const IrAliasSchema = z.object({
  name: z.string(),
  partial_type_ctor: z.object({
    name: z.string(),
    nullable: z.boolean().default(false),
  }),
  type: IrTypeRefSchema.optional(),
  maybe_attributes: attributes,
});
export type IrAlias = z.infer<typeof IrAliasSchema>;

export const IrResourceSchema = z.object({
  name: z.string(),
  type: IrTypeRefSchema,
  maybe_attributes: attributes,
});
export type IrResource = z.infer<typeof IrResourceSchema>;

export const IrMethodSchema = z.object({
  ordinal: methodOrdinal,
  name: z.string(),
  strict: z.boolean().default(true),
  has_request: z.boolean(),
  has_response: z.boolean(),
  has_error: z.boolean().default(false),
  maybe_request_payload: IrTypeRefSchema.optional(),
  maybe_response_payload: IrTypeRefSchema.optional(),
  maybe_attributes: attributes,
});
export type IrMethodRecord = z.infer<typeof IrMethodSchema>;

export const IrProtocolSchema = z.object({
  name: z.string(),
  methods: z.array(IrMethodSchema),
  openness: z.string().optional(),
  maybe_attributes: attributes,
});
export type IrProtocol = z.infer<typeof IrProtocolSchema>;

// ============================================================================
// Document
// ============================================================================

export const IrDocumentSchema = z.object({
  name: z.string(),
  maybe_attributes: attributes,
  library_dependencies: z
    .array(z.object({ name: z.string() }))
    .default([]),
  declarations: z.record(z.string()),
  declaration_order: z.array(z.string()),
  bits_declarations: z.array(IrBitsSchema).default([]),
  enum_declarations: z.array(IrEnumSchema).default([]),
  struct_declarations: z.array(IrStructSchema).default([]),
  table_declarations: z.array(IrTableSchema).default([]),
  union_declarations: z.array(IrUnionSchema).default([]),
  const_declarations: z.array(IrConstSchema).default([]),
  alias_declarations: z.array(IrAliasSchema).default([]),
  protocol_declarations: z.array(IrProtocolSchema).default([]),
  experimental_resource_declarations: z.array(IrResourceSchema).default([]),
});
export type IrDocument = z.infer<typeof IrDocumentSchema>;

/** Declaration kinds the compiler understands, keyed to their record types. */
export interface IrDeclarationMap {
  bits: IrBits;
  enum: IrEnum;
  struct: IrStruct;
  table: IrTable;
  union: IrUnion;
  const: IrConst;
  alias: IrAlias;
  protocol: IrProtocol;
  experimental_resource: IrResource;
}

export type IrDeclarationKind = keyof IrDeclarationMap;

export const DECLARATION_KINDS: readonly IrDeclarationKind[] = [
  "bits",
  "enum",
  "struct",
  "table",
  "union",
  "const",
  "alias",
  "protocol",
  "experimental_resource",
];

export function isDeclarationKind(kind: string): kind is IrDeclarationKind {
  return (DECLARATION_KINDS as readonly string[]).includes(kind);
}

/**
 * Parse raw IR JSON text.
 *
 * 64-bit method ordinals are quoted before `JSON.parse` so they survive as
 * exact decimal strings.
 */
export function parseIrText(text: string): unknown {
  return JSON.parse(text.replace(/"ordinal"(\s*):(\s*)(-?\d+)/g, '"ordinal"$1:$2"$3"'));
}
