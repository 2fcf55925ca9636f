// IR discovery, parsing and caching.
//
// Every sub-directory `d` of an IR root maps library `d` to
// `<root>/d/d.fidl.json`. Roots come from the `irPath` option, then from the
// WIREBIND_IR_PATH environment variable (a path.delimiter separated list).

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import path from "node:path";
import { DefinitionError } from "./errors.ts";
import { IrLibrary } from "./library.ts";
import { createLogger, type Logger } from "./logging.ts";
import { IrDocumentSchema, parseIrText } from "./schema.ts";

export const IR_PATH_ENV = "WIREBIND_IR_PATH";

const IR_SUFFIX = ".fidl.json";

export interface IrLoaderOptions {
  /** IR root directory or directories. Defaults to WIREBIND_IR_PATH. */
  irPath?: string | readonly string[];
  /** Explicit library name -> document path entries; these win over discovery. */
  libraries?: Readonly<Record<string, string>>;
  /** Environment to read WIREBIND_IR_PATH from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Loads IR documents by library name.
 *
 * Each document is parsed at most once per loader; repeated loads of the same
 * library return the identical IrLibrary instance.
 */
export class IrLoader {
  private readonly cache = new Map<string, IrLibrary>();
  private readonly explicit = new Map<string, string>();
  private discovered: Map<string, string> | null = null;
  private readonly roots: string[];
  private readonly log: Logger;

  constructor(options: IrLoaderOptions = {}) {
    const env = options.env ?? process.env;
    const configured = options.irPath ?? env[IR_PATH_ENV]?.split(path.delimiter) ?? [];
    this.roots = (typeof configured === "string" ? [configured] : [...configured])
      .filter((root) => root.length > 0)
      .map((root) => path.resolve(root));
    for (const [name, file] of Object.entries(options.libraries ?? {})) {
      this.explicit.set(name, path.resolve(file));
    }
    this.log = options.logger ?? createLogger("wirebind:loader");
  }

  /** Register (or replace) the document path of one library. */
  register(library: string, file: string): void {
    this.explicit.set(library, path.resolve(file));
  }

  /** Every known library name and the document path it maps to. */
  libraryPaths(): ReadonlyMap<string, string> {
    const paths = new Map(this.discover());
    for (const [name, file] of this.explicit) paths.set(name, file);
    return paths;
  }

  /** Load a library by name. */
  load(library: string): IrLibrary {
    const file = this.explicit.get(library) ?? this.discover().get(library);
    if (file === undefined) {
      throw DefinitionError.libraryNotFound(
        library,
        this.roots.map((root) => path.join(root, library, `${library}${IR_SUFFIX}`)),
      );
    }
    return this.loadFile(file);
  }

  /** Load a document by path. */
  loadFile(file: string): IrLibrary {
    const resolved = path.resolve(file);
    const cached = this.cache.get(resolved);
    if (cached) return cached;

    if (!existsSync(resolved)) {
      throw DefinitionError.libraryNotFound(path.basename(resolved, IR_SUFFIX), [resolved]);
    }

    let raw: unknown;
    try {
      raw = parseIrText(readFileSync(resolved, "utf8"));
    } catch (e) {
      throw DefinitionError.invalidDocument(resolved, e instanceof Error ? e.message : String(e));
    }

    const parsed = IrDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      throw DefinitionError.invalidDocument(resolved, `${where}${issue.message}`);
    }

    const library = new IrLibrary(parsed.data, resolved);
    this.cache.set(resolved, library);
    this.log.debug("loaded", { library: library.name, path: resolved });
    return library;
  }

  private discover(): Map<string, string> {
    if (this.discovered) return this.discovered;

    if (this.roots.length === 0 && this.explicit.size === 0) {
      throw DefinitionError.irPathNotFound(null, IR_PATH_ENV);
    }

    const found = new Map<string, string>();
    for (const root of this.roots) {
      if (!existsSync(root) || !statSync(root).isDirectory()) {
        throw DefinitionError.irPathNotFound(root, IR_PATH_ENV);
      }
      for (const entry of readdirSync(root, { withFileTypes: true })) {
        if (!entry.isDirectory() || found.has(entry.name)) continue;
        const file = path.join(root, entry.name, `${entry.name}${IR_SUFFIX}`);
        if (existsSync(file)) found.set(entry.name, file);
      }
    }
    this.log.debug("discovered libraries", { roots: this.roots, count: found.size });
    this.discovered = found;
    return found;
  }
}
