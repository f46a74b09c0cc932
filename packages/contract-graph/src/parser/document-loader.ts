/**
 * Contract document parsing - YAML and JSON text into a document tree
 */

import { CORE_SCHEMA, load } from "js-yaml";
import { MalformedContractError } from "../errors.js";
import type { ContractDocument } from "./schema-resolver.js";

/**
 * Parse contract document text. `.json` files go through JSON.parse; anything
 * else is read as YAML (a superset of JSON).
 *
 * @throws MalformedContractError when the text cannot be parsed
 */
export function parseContractDocument(text: string, uri: string): ContractDocument {
  try {
    const root: unknown = uri.toLowerCase().endsWith(".json")
      ? JSON.parse(text)
      : load(text, { schema: CORE_SCHEMA, filename: uri });
    return { uri, root };
  } catch (err) {
    throw new MalformedContractError({
      message: `Cannot parse ${uri}: ${err instanceof Error ? err.message : String(err)}`,
      document: uri,
      pointer: "/",
    });
  }
}

