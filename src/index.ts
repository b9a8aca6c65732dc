/**
 * alignkit - multiple sequence alignment parsing for TypeScript
 *
 * Reads Stockholm alignments, annotations included, into typed alignment
 * containers with the messiness of real-world files reported as precise
 * errors.
 */

// Alignment containers
export {
  AlignedSequence,
  type AlignedSequenceOptions,
  type AlignmentFactories,
  type AlignmentFactory,
  type AlignmentInit,
  countGaps,
  GAP_CHARACTERS,
  type SequenceAnnotations,
  type SequenceFactory,
  SequenceValidator,
  TabularMSA,
  type TabularMSAOptions,
  ValidationMode,
} from "./alignment";
// Error types
export {
  AlignkitError,
  AlignmentShapeError,
  BufferError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  ParseError,
  SequenceError,
  StockholmFormatError,
  type StockholmViolation,
  StreamError,
  ValidationError,
} from "./errors";
// Stockholm format
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
} from "./formats";
// I/O
export { FileReader } from "./io/file-reader";
export {
  ArrayLineSource,
  type LineSource,
  lineSourceFromString,
  splitLines,
} from "./io/line-source";
export { StreamUtils } from "./io/stream-utils";
// Core types
export {
  ABSENT,
  type FileReaderOptions,
  type Metadata,
  type ParserOptions,
  type PositionalMetadata,
  type Presence,
  present,
  SequenceType,
  valueOr,
} from "./types";
