/**
 * JSON pointer helpers (RFC 6901) and `$ref` splitting.
 */

import { posix } from "node:path";

export function escapeToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

export function unescapeToken(token: string): string {
  return token.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Append tokens to a pointer: `join("/paths", "/users")` is `/paths/~1users`
 */
export function joinPointer(pointer: string, ...tokens: Array<string | number>): string {
  return tokens.reduce<string>((acc, token) => `${acc}/${escapeToken(String(token))}`, pointer);
}

export function parsePointer(pointer: string): string[] {
  if (pointer === "" || pointer === "/") return pointer === "/" ? [""] : [];
  const withoutLead = pointer.startsWith("/") ? pointer.slice(1) : pointer;
  return withoutLead.split("/").map((token) => unescapeToken(decodePercent(token)));
}

function decodePercent(token: string): string {
  return token.replace(/%([0-9a-f]{2})/gi, (_, hex: string) =>
    String.fromCharCode(Number.parseInt(hex, 16)),
  );
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type LookupResult = { found: true; value: unknown } | { found: false };

/**
 * Follow a pointer from a document root
 */
export function lookupPointer(root: unknown, pointer: string): LookupResult {
  let current: unknown = root;
  for (const token of parsePointer(pointer)) {
    if (Array.isArray(current)) {
      const index = Number(token);
      if (!Number.isInteger(index) || index < 0 || index >= current.length) {
        return { found: false };
      }
      current = current[index];
    } else if (isRecord(current) && Object.hasOwn(current, token)) {
      current = current[token];
    } else {
      return { found: false };
    }
  }
  return { found: true, value: current };
}

export interface RefTarget {
  /** Document URI the reference lands in */
  uri: string;
  /** Pointer within that document */
  pointer: string;
}

/**
 * Split a `$ref` into target document and pointer, resolving relative
 * document paths against the referencing document
 */
export function splitRef(ref: string, currentUri: string): RefTarget {
  const hashIndex = ref.indexOf("#");
  const documentPart = hashIndex === -1 ? ref : ref.slice(0, hashIndex);
  const pointer = hashIndex === -1 ? "" : ref.slice(hashIndex + 1);

  if (documentPart === "") {
    return { uri: currentUri, pointer };
  }
  if (/^[a-z][a-z0-9+.-]*:/i.test(documentPart) || documentPart.startsWith("/")) {
    return { uri: documentPart, pointer };
  }
  const base = posix.dirname(currentUri);
  return { uri: posix.normalize(posix.join(base, documentPart)), pointer };
}

/**
 * Collect the distinct external document URIs referenced from a document
 */
export function collectExternalRefs(root: unknown, currentUri: string): string[] {
  const uris = new Set<string>();
  const walk = (value: unknown): void => {
    if (Array.isArray(value)) {
      value.forEach(walk);
      return;
    }
    if (!isRecord(value)) return;
    const ref = value.$ref;
    if (typeof ref === "string" && !ref.startsWith("#")) {
      const target = splitRef(ref, currentUri);
      if (target.uri !== currentUri) uris.add(target.uri);
    }
    for (const child of Object.values(value)) walk(child);
  };
  walk(root);
  return [...uris].sort();
}
