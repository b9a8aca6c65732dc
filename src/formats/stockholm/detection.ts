/**
 * Stockholm format detection
 *
 * @module stockholm/detection
 */

import { type LineSource, stripByteOrderMark } from "../../io/line-source";
import { hasSignature } from "./primitives";

/**
 * Check whether a line source holds Stockholm data
 *
 * Reads exactly one line. The source is left positioned after it; rewind
 * before parsing.
 *
 * @returns True when the first line starts with `# STOCKHOLM 1.0`
 */
export function sniffStockholm(source: LineSource): boolean {
  const first = source.next();
  return first !== undefined && hasSignature(first);
}

/**
 * Detect if a string contains Stockholm format data
 *
 * @example
 * ```typescript
 * if (detectStockholmFormat(fileContent)) {
 *   const msa = new StockholmParser({ sequenceType: "rna" }).parseAlignment(fileContent);
 * }
 * ```
 *
 * @public
 */
export function detectStockholmFormat(data: string): boolean {
  // A first line shorter than the signature puts its terminator inside the compared prefix
  return hasSignature(stripByteOrderMark(data));
}
