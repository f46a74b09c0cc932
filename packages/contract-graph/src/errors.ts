/**
 * Error taxonomy for contract analysis, versioning and impact queries.
 *
 * Parsing-level errors (malformed documents, unparsable sources, unresolved
 * references) degrade per item and are reported as warnings by the scanner.
 * Store-level errors are retried once (version conflicts) or surfaced.
 */

import { Data } from "effect";

/**
 * A contract document does not match the expected structure
 */
export class MalformedContractError extends Data.TaggedError(
  "MalformedContractError",
)<{
  message: string;
  /** Document URI */
  document: string;
  /** JSON pointer to the offending node */
  pointer: string;
}> {}

/**
 * A source file cannot be syntactically analyzed
 */
export class UnparsableSourceError extends Data.TaggedError(
  "UnparsableSourceError",
)<{
  message: string;
  file: string;
  /** 1-indexed line of the first syntax error */
  line?: number;
}> {}

/**
 * A reference points outside every known document
 */
export class UnresolvedReferenceError extends Data.TaggedError(
  "UnresolvedReferenceError",
)<{
  message: string;
  ref: string;
  document: string;
  pointer: string;
}> {}

/**
 * The latest version changed between read and append
 */
export class VersionConflictError extends Data.TaggedError(
  "VersionConflictError",
)<{
  message: string;
  repo: string;
  expected?: string;
  actual?: string;
}> {}

export class UnknownRepositoryError extends Data.TaggedError(
  "UnknownRepositoryError",
)<{
  message: string;
  repo: string;
}> {}

export class UnknownVersionError extends Data.TaggedError(
  "UnknownVersionError",
)<{
  message: string;
  repo: string;
  ref: string;
}> {}

export class StorageError extends Data.TaggedError("StorageError")<{
  message: string;
  cause?: unknown;
}> {}

/**
 * A non-fatal problem met while analyzing one file or reference
 */
export interface AnalysisWarning {
  kind:
    | "MalformedContractError"
    | "UnparsableSourceError"
    | "UnresolvedReferenceError"
    | "DuplicateEndpoint"
    | "ReadError";
  /** File the warning relates to, relative to the repository root */
  file?: string;
  message: string;
}

export function toWarning(
  error: MalformedContractError | UnparsableSourceError | UnresolvedReferenceError,
  file?: string,
): AnalysisWarning {
  return { kind: error._tag, file, message: error.message };
}
