// The registry owns the IR cache and the namespace cache.
//
// One registry is constructed per process (or per test) and handed to
// everything that compiles or looks up declarations.

import {
  IrLoader,
  TypeResolver,
  createLogger,
  normalizeIdentifier,
  type IrLibrary,
  type IrLoaderOptions,
  type IrTypeRef,
  type Logger,
  type TypeDescriptor,
} from "@wirebind/ir";
import type { WireCodec } from "./codec.ts";
import type { CompileContext, CompiledDeclaration } from "./declarations/types.ts";
import { construct, defaultFor } from "./declarations/values.ts";
import { LibraryNamespace } from "./namespace.ts";
import { ChannelWaker, type ReadinessNotifier } from "./transport.ts";

export interface RegistryOptions extends IrLoaderOptions {
  /** Codec used by roles and `encode` hooks. */
  codec?: WireCodec;
  /** Readiness notifier shared by every role. Defaults to a ChannelWaker. */
  notifier?: ReadinessNotifier;
}

/**
 * Compiles libraries on demand and caches one namespace per library name.
 *
 * @example
 * ```typescript
 * const registry = new Registry({ irPath: "./ir", codec });
 * const x = registry.load("x");
 * const Point = x.struct("Point");
 * const p = Point.create({ x: 1, y: 2 });
 * ```
 */
export class Registry implements CompileContext {
  readonly loader: IrLoader;
  readonly resolver: TypeResolver;
  readonly codec: WireCodec | null;
  readonly notifier: ReadinessNotifier;
  readonly logger: Logger | null;
  private readonly namespaces = new Map<string, LibraryNamespace>();
  private readonly log: Logger;

  constructor(options: RegistryOptions = {}) {
    this.loader = new IrLoader(options);
    this.resolver = new TypeResolver(this.loader);
    this.codec = options.codec ?? null;
    this.notifier = options.notifier ?? new ChannelWaker();
    this.logger = options.logger ?? null;
    this.log = options.logger ?? createLogger("wirebind:registry");
  }

  /** The materialized namespace of a library. */
  load(library: string): LibraryNamespace {
    const namespace = this.namespace(library);
    if (namespace.state === "pending") {
      try {
        namespace.materialize();
      } catch (e) {
        this.namespaces.delete(library);
        throw e;
      }
      this.log.debug("materialized", { library, exports: namespace.names().length });
    }
    return namespace;
  }

  /** Whether a namespace for the library has been created. */
  has(library: string): boolean {
    return this.namespaces.has(library);
  }

  lookup(identifier: string, library: string): CompiledDeclaration {
    const namespace = this.namespace(library);
    if (namespace.state === "pending") this.load(library);
    return namespace.declaration(normalizeIdentifier(identifier));
  }

  resolveType(ref: IrTypeRef, library: IrLibrary): TypeDescriptor {
    return this.resolver.resolveType(ref, library);
  }

  resolveIdentifier(identifier: string, library: IrLibrary): TypeDescriptor {
    return this.resolver.resolveIdentifier(identifier, library);
  }

  defaultFor(type: TypeDescriptor): unknown {
    return defaultFor(type, this);
  }

  construct(type: TypeDescriptor, value: unknown): unknown {
    return construct(type, value, this);
  }

  private namespace(library: string): LibraryNamespace {
    let namespace = this.namespaces.get(library);
    if (!namespace) {
      namespace = new LibraryNamespace(this.loader.load(library), this);
      this.namespaces.set(library, namespace);
    }
    return namespace;
  }
}
