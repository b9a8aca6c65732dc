/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { StockholmParser, detectStockholmFormat } from "../formats";
 * ```
 */

export { AbstractParser, type ResolvedParserOptions } from "./abstract-parser";
export {
  classifyLine,
  detectStockholmFormat,
  type GsMergeStrategy,
  readStockholm,
  sniffStockholm,
  STOCKHOLM_SIGNATURE,
  StockholmLineKind,
  StockholmParser,
  type StockholmParserOptions,
  type StockholmReadOptions,
} from "./stockholm";
