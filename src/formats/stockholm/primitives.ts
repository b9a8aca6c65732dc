/**
 * Stockholm parsing primitives
 *
 * Pure line-level operations shared by both parsing passes and the sniffer.
 * Nothing here touches the parse session.
 */

import {
  COMMENT_PREFIX,
  STOCKHOLM_MARKERS,
  STOCKHOLM_SIGNATURE,
  STOCKHOLM_TERMINATOR,
} from "./constants";
import { type MarkupLineKind, StockholmLineKind } from "./types";

// ============================================================================
// LINE CLASSIFICATION
// ============================================================================

/**
 * Decide what a physical line is
 *
 * Markup is recognised by its four-character prefix. A data line is any line
 * that is not blank, not a `#` comment and not the `//` terminator.
 *
 * @example
 * ```typescript
 * classifyLine("#=GC SS_cons ..<<>>.."); // "gc"
 * classifyLine("seq1  ACGU-A");          // "data"
 * classifyLine("# STOCKHOLM 1.0");       // "ignorable"
 * ```
 */
export function classifyLine(line: string): StockholmLineKind {
  if (line.startsWith(STOCKHOLM_MARKERS.GF)) return StockholmLineKind.GF;
  if (line.startsWith(STOCKHOLM_MARKERS.GS)) return StockholmLineKind.GS;
  if (line.startsWith(STOCKHOLM_MARKERS.GR)) return StockholmLineKind.GR;
  if (line.startsWith(STOCKHOLM_MARKERS.GC)) return StockholmLineKind.GC;
  if (line.startsWith(STOCKHOLM_TERMINATOR)) return StockholmLineKind.TERMINATOR;
  if (line.startsWith(COMMENT_PREFIX) || isBlank(line)) return StockholmLineKind.IGNORABLE;
  return StockholmLineKind.DATA;
}

export function isDataLine(line: string): boolean {
  return classifyLine(line) === StockholmLineKind.DATA;
}

/**
 * Narrow a line kind to the four markup kinds
 */
export function isMarkupKind(kind: StockholmLineKind): kind is MarkupLineKind {
  return (
    kind === StockholmLineKind.GF ||
    kind === StockholmLineKind.GS ||
    kind === StockholmLineKind.GR ||
    kind === StockholmLineKind.GC
  );
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * True when the first 15 characters of a line are the Stockholm signature
 */
export function hasSignature(line: string): boolean {
  return line.slice(0, STOCKHOLM_SIGNATURE.length) === STOCKHOLM_SIGNATURE;
}

// ============================================================================
// FIELD SPLITTING
// ============================================================================

/**
 * Split a markup line into key fields and a verbatim remainder
 *
 * The first `count - 1` fields are whitespace-delimited tokens. The remainder
 * starts after the single space or tab that ends the last token and is kept
 * verbatim, including any further padding, so free-text values survive
 * untouched.
 *
 * @example
 * ```typescript
 * splitFields("#=GF RA    Deiman BA;", 3); // ["#=GF", "RA", "   Deiman BA;"]
 * splitFields("#=GS seq1   AC P12345", 4);  // ["#=GS", "seq1", "AC", "P12345"]
 * ```
 */
export function splitFields(line: string, count: number): string[] {
  const fields: string[] = [];
  let rest = line;

  while (fields.length < count - 1) {
    if (fields.length > 0) rest = rest.replace(/^[ \t]+/, "");
    const at = rest.search(/[ \t]/);
    if (at === -1) break;
    fields.push(rest.slice(0, at));
    rest = rest.slice(at + 1);
  }

  fields.push(rest);
  return fields;
}

/**
 * Split on runs of whitespace, ignoring leading and trailing whitespace
 */
export function splitWhitespace(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}

/**
 * One array element per character of a column annotation
 */
export function toColumns(token: string): string[] {
  return Array.from(token);
}

/**
 * Join a repeated feature value onto the existing one
 */
export function appendValue(existing: string | undefined, value: string, separator: string): string {
  return existing === undefined ? value : `${existing}${separator}${value}`;
}
