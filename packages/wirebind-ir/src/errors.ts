// Definition errors raised while loading and compiling IR.
//
// These indicate a defect in an IR document (or in whatever produced it) and
// are never retried.

/** Error raised while loading, validating or compiling a library's IR. */
export class DefinitionError extends Error {
  constructor(
    public kind:
      | "libraryNotFound"
      | "irPathNotFound"
      | "invalidDocument"
      | "unresolvedKind"
      | "unsupportedKind"
      | "duplicateOrdinal"
      | "unknownType",
    message: string,
  ) {
    super(message);
    this.name = "DefinitionError";
  }

  static libraryNotFound(library: string, searched: readonly string[]): DefinitionError {
    const where = searched.length === 0 ? "no IR roots configured" : searched.join(", ");
    return new DefinitionError(
      "libraryNotFound",
      `Unable to load library ${library} (searched: ${where}). ` +
        "Make sure the IR for this library has been generated.",
    );
  }

  static irPathNotFound(root: string | null, envVar: string): DefinitionError {
    const detail = root === null ? "no IR root configured" : `IR root '${root}' is not a directory`;
    return new DefinitionError(
      "irPathNotFound",
      `IR path not found: ${detail}. Set ${envVar} or pass irPath explicitly.`,
    );
  }

  static invalidDocument(path: string, detail: string): DefinitionError {
    return new DefinitionError("invalidDocument", `Invalid IR document at ${path}: ${detail}`);
  }

  static unresolvedKind(identifier: string, library: string): DefinitionError {
    return new DefinitionError(
      "unresolvedKind",
      `Unable to resolve the kind of ${identifier} referenced from library ${library}`,
    );
  }

  static unsupportedKind(library: string, what: string): DefinitionError {
    return new DefinitionError("unsupportedKind", `As yet unsupported ${what} in library ${library}`);
  }

  static duplicateOrdinal(protocol: string, ordinal: bigint, methods: [string, string]): DefinitionError {
    return new DefinitionError(
      "duplicateOrdinal",
      `Protocol ${protocol} declares ordinal ${ordinal} twice (${methods[0]} and ${methods[1]})`,
    );
  }

  static unknownType(identifier: string, expected?: string): DefinitionError {
    const suffix = expected ? ` as ${expected}` : "";
    return new DefinitionError("unknownType", `Unknown type ${identifier}${suffix}`);
  }
}
