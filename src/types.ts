/**
 * Core type definitions for alignment data structures
 *
 * Shared by the format parsers, the alignment container and the I/O layer.
 * Runtime validation lives next to the types as ArkType schemas.
 */

import { type } from "arktype";

/**
 * Whole-object annotations, such as alignment-level (#=GF) or
 * per-sequence (#=GS) features
 */
export type Metadata = Map<string, string>;

/**
 * Per-column annotations: one character per aligned position
 */
export type PositionalMetadata = Map<string, string[]>;

/**
 * An annotation mapping that is either present or explicitly absent
 *
 * Keeps "nothing was annotated" distinct from "an empty mapping was handed
 * over", so consumers never have to infer absence from emptiness.
 */
export type Presence<T> =
  | { readonly kind: "present"; readonly value: T }
  | { readonly kind: "absent" };

/**
 * The shared absent marker
 */
export const ABSENT: Presence<never> = { kind: "absent" };

/**
 * Wrap a value as present
 */
export function present<T>(value: T): Presence<T> {
  return { kind: "present", value };
}

/**
 * Present when the mapping holds at least one entry, absent otherwise
 */
export function presentIfPopulated<K, V>(mapping: Map<K, V>): Presence<Map<K, V>> {
  return mapping.size > 0 ? present(mapping) : ABSENT;
}

/**
 * Unwrap a presence, falling back when absent
 */
export function valueOr<T>(presence: Presence<T>, fallback: T): T {
  return presence.kind === "present" ? presence.value : fallback;
}

/**
 * Biological sequence kinds understood by the default sequence constructor
 */
export const SequenceType = {
  DNA: "dna",
  RNA: "rna",
  PROTEIN: "protein",
} as const;

/**
 * Type for sequence kind values
 */
export type SequenceType = (typeof SequenceType)[keyof typeof SequenceType];

/**
 * Parser configuration options shared by every format parser
 */
export interface ParserOptions {
  /** Skip alphabet validation of sequence characters */
  skipValidation?: boolean;
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to report line numbers in errors */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Branded file path that has passed validation
 */
export type FilePath = string & { readonly __brand: "FilePath" };

/**
 * File reading configuration
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads */
  bufferSize?: number;
  /** Text encoding */
  encoding?: "utf8" | "ascii" | "binary";
  /** Maximum file size in bytes */
  maxFileSize?: number;
}

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

// Validation schemas for file I/O types using ArkType

/**
 * File path validation schema
 * Rejects characters no supported platform accepts in a path
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }

  if (/[<>"|*?]/.test(path)) {
    throw new Error("File path contains invalid characters");
  }

  return path.replace(/[\\/]+/g, "/") as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024 <= number <= 1048576",
  "encoding?": '"utf8"|"binary"|"ascii"',
  "maxFileSize?": "number>=0",
});
