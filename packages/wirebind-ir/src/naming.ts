// Identifier and member name helpers.
//
// IR identifiers look like "lib.name/Member". Result and response payload
// types are emitted with underscores ("lib/Proto_Method_Result"); those are
// normalized away so the same logical name comes out no matter how many times
// it is looked up.

import reservedWords from "./reserved_words.json";
import type { IrAttribute } from "./schema.ts";

const RESERVED = new Set<string>(reservedWords);

/**
 * Normalize an identifier.
 *
 * Only identifiers ending in `_Result` or `_Response` change: every underscore
 * is removed. Applying this twice yields the same string as applying it once.
 */
export function normalizeIdentifier(identifier: string): string {
  if (identifier.endsWith("_Result") || identifier.endsWith("_Response")) {
    return identifier.replaceAll("_", "");
  }
  return identifier;
}

/** `foo.bar/Baz` -> `foo.bar` */
export function libraryOf(identifier: string): string {
  return identifier.split("/")[0];
}

/** `foo.bar/Baz_Result` -> `BazResult` */
export function memberOf(identifier: string): string {
  const normalized = normalizeIdentifier(identifier);
  const slash = normalized.indexOf("/");
  return slash < 0 ? normalized : normalized.slice(slash + 1);
}

/** Protocol marker used for discovery: `foo.bar/Baz` -> `foo.bar.Baz` */
export function markerOf(identifier: string): string {
  return normalizeIdentifier(identifier).replace("/", ".");
}

/** Whether a name collides with a reserved word. */
export function isReserved(name: string): boolean {
  return RESERVED.has(name);
}

/** Struct, table and union member names, suffixed when they collide with a reserved word. */
export function memberNameOf(name: string): string {
  return isReserved(name) ? `${name}_` : name;
}

/**
 * Method names as exposed on role classes: lower camel case of the IR name.
 *
 * `Say` -> `say`, `GetURL` -> `getURL`, `URLFetch` -> `urlFetch`.
 */
export function methodNameOf(name: string): string {
  const leading = /^[A-Z]+/.exec(name);
  let result: string;
  if (!leading) {
    result = name;
  } else if (leading[0].length === name.length) {
    result = name.toLowerCase();
  } else if (leading[0].length === 1) {
    result = name[0].toLowerCase() + name.slice(1);
  } else {
    // Keep the last capital of the run: it starts the next word.
    const run = leading[0].length - 1;
    result = name.slice(0, run).toLowerCase() + name.slice(run);
  }
  return memberNameOf(result);
}

/** Extract the `doc` attribute of a declaration, trimmed. */
export function docOf(attributes: readonly IrAttribute[] | undefined): string | undefined {
  const doc = attributes?.find((attr) => attr.name === "doc");
  const value = doc?.arguments[0]?.value.value;
  return value === undefined ? undefined : value.trim();
}
