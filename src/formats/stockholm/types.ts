/**
 * Stockholm format type definitions
 *
 * Line kinds, the mutable parse session shared by the two passes, and the
 * parser configuration.
 *
 * @module stockholm/types
 */

import type { AlignedSequence } from "../../alignment/sequence";
import type { SequenceFactory } from "../../alignment/types";
import type { Metadata, ParserOptions, PositionalMetadata, SequenceType } from "../../types";

// =============================================================================
// LINE CLASSIFICATION
// =============================================================================

/**
 * Kinds of physical lines in a Stockholm file
 */
export const StockholmLineKind = {
  /** `<seqname> <aligned sequence>` */
  DATA: "data",
  GF: "gf",
  GS: "gs",
  GR: "gr",
  GC: "gc",
  /** `//` record terminator */
  TERMINATOR: "terminator",
  /** Blank lines, the signature and other comments */
  IGNORABLE: "ignorable",
} as const;

/**
 * Type for line kind values
 */
export type StockholmLineKind = (typeof StockholmLineKind)[keyof typeof StockholmLineKind];

/**
 * Line kinds carrying metadata
 */
export type MarkupLineKind = Extract<StockholmLineKind, "gf" | "gs" | "gr" | "gc">;

// =============================================================================
// PARSE SESSION
// =============================================================================

/**
 * Everything collected for one sequence label
 */
export interface SequenceRecord {
  readonly label: string;
  readonly sequence: string;
  /** #=GS features */
  readonly metadata: Metadata;
  /** #=GR features */
  readonly positionalMetadata: PositionalMetadata;
}

/**
 * Parsing states of the two-pass reader
 *
 * SCANNING_DATA → SCANNING_MARKUP → ASSEMBLING → COMPLETE
 */
export const StockholmParsingState = {
  SCANNING_DATA: "scanning-data",
  SCANNING_MARKUP: "scanning-markup",
  ASSEMBLING: "assembling",
  COMPLETE: "complete",
} as const;

/**
 * Type for parsing state values
 */
export type StockholmParsingState =
  (typeof StockholmParsingState)[keyof typeof StockholmParsingState];

/**
 * Mutable state owned by one parse
 */
export interface StockholmSession {
  state: StockholmParsingState;
  /** Records keyed by label, in order of first data line */
  readonly records: Map<string, SequenceRecord>;
  /** #=GF features */
  readonly metadata: Metadata;
  /** #=GC features */
  readonly columnMetadata: PositionalMetadata;
  /** Labels already warned about dropped #=GS lines */
  readonly droppedGsLabels: Set<string>;
}

/**
 * Where a line came from, for error reporting
 */
export interface LineLocation {
  readonly text: string;
  /** 1-based line number, undefined when line tracking is off */
  readonly lineNumber: number | undefined;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * How repeated #=GS lines for one sequence are merged
 *
 * - `when-empty`: a #=GS line is stored only while the sequence has no #=GS
 *   features yet; later lines for that sequence are dropped with a warning
 * - `concatenate`: repeated features are joined with a space, like #=GF
 * - `reject-duplicates`: a repeated feature is a format error
 */
export type GsMergeStrategy = "when-empty" | "concatenate" | "reject-duplicates";

/**
 * Settings consulted by the line handlers and the two-pass driver
 */
export interface StockholmReadOptions {
  gsMergeStrategy?: GsMergeStrategy;
  /** Fail when the first line is not the Stockholm signature */
  requireSignature?: boolean;
  maxLineLength?: number;
  trackLineNumbers?: boolean;
  onWarning?: (warning: string, lineNumber?: number) => void;
  /** Called once per line; throws to cancel the parse */
  checkAborted?: () => void;
}

/**
 * Stockholm parser configuration options
 *
 * @public
 */
export interface StockholmParserOptions extends ParserOptions {
  /** Kind of the sequences in the alignment (default: protein) */
  sequenceType?: SequenceType;
  /** Merge behaviour for repeated #=GS lines (default: when-empty) */
  gsMergeStrategy?: GsMergeStrategy;
  /** Fail when the first line is not `# STOCKHOLM 1.0` (default: false) */
  requireSignature?: boolean;
  /** Replace the default sequence constructor */
  sequenceFactory?: SequenceFactory<AlignedSequence>;
}
