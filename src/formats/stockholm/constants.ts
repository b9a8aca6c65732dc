/**
 * Constants for Stockholm format parsing
 *
 * Markers, the signature line and parser limits used throughout the
 * Stockholm module.
 */

// ============================================================================
// FILE STRUCTURE
// ============================================================================

/**
 * First line of every Stockholm file, including the format version
 */
export const STOCKHOLM_SIGNATURE = "# STOCKHOLM 1.0";

/**
 * Line prefix closing an alignment record
 */
export const STOCKHOLM_TERMINATOR = "//";

/**
 * Prefix shared by comment and markup lines
 */
export const COMMENT_PREFIX = "#";

/**
 * Markup line prefixes
 */
export const STOCKHOLM_MARKERS = {
  /** Alignment-level feature: #=GF <feature> <text> */
  GF: "#=GF",
  /** Per-sequence feature: #=GS <seqname> <feature> <text> */
  GS: "#=GS",
  /** Per-sequence per-column feature: #=GR <seqname> <feature> <column chars> */
  GR: "#=GR",
  /** Per-column feature: #=GC <feature> <column chars> */
  GC: "#=GC",
} as const;

// ============================================================================
// PARSING CONFIGURATION
// ============================================================================

/**
 * Default limits for Stockholm parsing
 */
export const STOCKHOLM_LIMITS = {
  /** Default maximum line length; one line carries a whole aligned sequence */
  MAX_LINE_LENGTH: 10_000_000,
  /** Upper bound accepted for the maxLineLength option */
  MAX_LINE_LENGTH_CEILING: 500_000_000,
  /** Characters of an over-long line kept in its error */
  LINE_PREVIEW_LENGTH: 100,
} as const;

/**
 * Separator used when joining repeated feature values
 */
export const FEATURE_VALUE_SEPARATOR = " ";
