/**
 * Stockholm multiple sequence alignment format
 *
 * @module stockholm
 */

export { assembleAlignment } from "./assembly";
export {
  COMMENT_PREFIX,
  FEATURE_VALUE_SEPARATOR,
  STOCKHOLM_LIMITS,
  STOCKHOLM_MARKERS,
  STOCKHOLM_SIGNATURE,
  STOCKHOLM_TERMINATOR,
} from "./constants";
export { detectStockholmFormat, sniffStockholm } from "./detection";
export {
  type MarkupHandlerOptions,
  parseDataLine,
  parseGcLine,
  parseGfLine,
  parseGrLine,
  parseGsLine,
  parseMarkupLine,
} from "./markup";
export { StockholmParser } from "./parser";
export {
  classifyLine,
  hasSignature,
  isBlank,
  isDataLine,
  isMarkupKind,
  splitFields,
  splitWhitespace,
} from "./primitives";
export {
  createSession,
  type ResolvedStockholmReadOptions,
  readStockholm,
  resolveReadOptions,
  scanDataLines,
  scanMarkupLines,
} from "./state-machine";
export {
  type GsMergeStrategy,
  type LineLocation,
  type MarkupLineKind,
  type SequenceRecord,
  StockholmLineKind,
  type StockholmParserOptions,
  StockholmParsingState,
  type StockholmReadOptions,
  type StockholmSession,
} from "./types";
