// Union declarations.
//
// A union value holds at most one variant and never changes after
// construction. Result unions carry the response of a method declared with an
// error type (or a flexible two-way method) and can be unwrapped.

import { isDeepStrictEqual, inspect } from "node:util";
import { DefinitionError, type IrLibrary, type IrUnion } from "@wirebind/ir";
import type { WireMessage } from "../codec.ts";
import { ConstructionError, ResultError } from "../errors.ts";
import { declarationInfo, encodeWith, ordinalFields } from "./base.ts";
import type { CompileContext, DeclarationInfo, Encodable, FieldInfo } from "./types.ts";

/** Variants a result union may declare. */
export const RESULT_VARIANTS: ReadonlySet<string> = new Set(["response", "err", "framework_err"]);

export class UnionType implements DeclarationInfo, Encodable {
  readonly kind = "union";
  readonly name: string;
  readonly rawName: string;
  readonly library: string;
  readonly doc: string | undefined;
  readonly variants: readonly FieldInfo[];
  private readonly byName: ReadonlyMap<string, FieldInfo>;
  private readonly Value: typeof UnionValue;

  constructor(
    info: DeclarationInfo,
    variants: FieldInfo[],
    private readonly ctx: CompileContext,
    readonly isResult = false,
    readonly strict = false,
  ) {
    this.name = info.name;
    this.rawName = info.rawName;
    this.library = info.library;
    this.doc = info.doc;
    this.variants = Object.freeze(variants);
    this.byName = new Map(variants.map((variant) => [variant.name, variant]));
    this.Value = valueClassOf(this.variants);
  }

  field(name: string): FieldInfo | undefined {
    return this.byName.get(name);
  }

  get variantNames(): string[] {
    return this.variants.map((variant) => variant.name);
  }

  /** The empty union. */
  makeDefault(): UnionValue {
    return new this.Value(this, null, null);
  }

  /**
   * Build a value from at most one keyword variant.
   *
   * Keys whose value is undefined are ignored; no key gives the empty union.
   */
  create(init: Readonly<Record<string, unknown>> = {}): UnionValue {
    const set = Object.entries(init).filter(([, value]) => value !== undefined);
    if (set.length === 0) return this.makeDefault();
    if (set.length > 1) throw ConstructionError.arity(this.name, set.length);
    const [tag, value] = set[0];
    return this.variant(tag, value);
  }

  /** Build a value holding one variant. */
  variant(tag: string, value: unknown): UnionValue {
    const variant = this.byName.get(tag);
    if (!variant) throw ConstructionError.unknownField(this.name, tag);
    return new this.Value(this, tag, this.ctx.construct(variant.type, value));
  }

  is(value: unknown): value is UnionValue {
    return value instanceof UnionValue && value.type === this;
  }

  encode(value: unknown): WireMessage {
    return encodeWith(this.ctx, this, value);
  }

  toString(): string {
    return `union ${this.name}`;
  }
}

/**
 * An immutable union value.
 *
 * Values built by a UnionType also expose one read-only getter per variant,
 * `value.<variant>`, which is null unless that variant is held. A variant
 * named like a member of this class gets a `_` suffix.
 */
export class UnionValue {
  constructor(
    readonly type: UnionType,
    /** Name of the variant held, or null for the empty union. */
    readonly tag: string | null,
    readonly value: unknown,
  ) {
    Object.freeze(this);
  }

  get isEmpty(): boolean {
    return this.tag === null;
  }

  /** The value of a variant, or null when another variant is held. */
  variant(name: string): unknown {
    if (!this.type.field(name)) throw ConstructionError.unknownField(this.type.name, name);
    return this.tag === name ? this.value : null;
  }

  /**
   * The `response` variant of a result union.
   *
   * Throws ResultError when an error variant or nothing is held.
   */
  unwrap(): unknown {
    const type = this.type;
    if (!type.isResult) throw ResultError.notResult(type.rawName);
    if (this.tag === "framework_err") throw ResultError.frameworkErr(type.rawName, this.value);
    if (this.tag === "err") throw ResultError.err(type.rawName, this.value);
    if (this.tag === "response") return this.value;
    throw ResultError.noValue(type.rawName);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof UnionValue &&
      other.type === this.type &&
      other.tag === this.tag &&
      isDeepStrictEqual(other.value, this.value)
    );
  }

  toString(): string {
    if (this.tag === null) return `${this.type.name}()`;
    return `${this.type.name}(${this.tag}=${inspect(this.value, { breakLength: Infinity })})`;
  }

  toJSON(): Record<string, unknown> {
    return this.tag === null ? {} : { [this.tag]: this.value };
  }
}

/** UnionValue subclass carrying one getter per variant. */
function valueClassOf(variants: readonly FieldInfo[]): typeof UnionValue {
  const taken = new Set([...Object.getOwnPropertyNames(UnionValue.prototype), "type", "tag", "value"]);
  class CompiledUnionValue extends UnionValue {}
  for (const variant of variants) {
    const name = taken.has(variant.name) ? `${variant.name}_` : variant.name;
    Object.defineProperty(CompiledUnionValue.prototype, name, {
      get(this: UnionValue) {
        return this.variant(variant.name);
      },
      configurable: true,
    });
  }
  return CompiledUnionValue;
}

export function compileUnion(decl: IrUnion, library: IrLibrary, ctx: CompileContext): UnionType {
  const variants = ordinalFields(decl.name, decl.members, library, ctx);
  if (decl.is_result) {
    for (const variant of variants) {
      if (!RESULT_VARIANTS.has(variant.irName)) {
        throw DefinitionError.unsupportedKind(
          library.name,
          `result union ${decl.name} variant ${variant.irName}`,
        );
      }
    }
  }
  return new UnionType(declarationInfo(decl, library), variants, ctx, decl.is_result, decl.strict);
}
