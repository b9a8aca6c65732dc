/**
 * Error handling for alignment parsing
 *
 * Provides clear, actionable error messages for malformed alignment files,
 * broken markup and sequence data that cannot be assembled into an alignment.
 */

/**
 * Base error class for all alignkit errors
 */
export class AlignkitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "AlignkitError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed or invalid data
 */
export class ValidationError extends AlignkitError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends AlignkitError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Rules a Stockholm file can break
 */
export type StockholmViolation =
  | "DuplicateSequenceLabel"
  | "UndeclaredSequenceReference"
  | "DuplicateColumnFeature"
  | "DuplicateSequenceColumnFeature"
  | "DuplicateSequenceFeature"
  | "MalformedMarkupLine"
  | "MalformedDataLine"
  | "EmptyAlignment"
  | "MissingSignature"
  | "LineTooLong";

/**
 * Stockholm format errors
 *
 * Every structural problem in a Stockholm file aborts the parse with one of
 * these. `violation` names the broken rule and `context` carries the text of
 * the offending line when there is one.
 *
 * @example
 * ```typescript
 * try {
 *   parser.parseAlignment(text);
 * } catch (error) {
 *   if (error instanceof StockholmFormatError && error.violation === "DuplicateSequenceLabel") {
 *     console.error(`Line ${error.lineNumber}: ${error.message}`);
 *   }
 * }
 * ```
 */
export class StockholmFormatError extends ParseError {
  constructor(
    message: string,
    public readonly violation: StockholmViolation,
    lineNumber?: number,
    public readonly line?: string
  ) {
    super(message, "Stockholm", lineNumber, line === undefined ? undefined : `Line: ${line}`);
    this.name = "StockholmFormatError";
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nViolation: ${this.violation}`;
    const suggestion = getErrorSuggestion(this);
    if (suggestion !== undefined) {
      msg += `\nSuggestion: ${suggestion}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with detailed context
 */
export class FileError extends AlignkitError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system file descriptor limits";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nFile: ${this.filePath}`;
    msg += `\nOperation: ${this.operation}`;
    return msg;
  }
}

/**
 * Sequence-specific validation errors
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Sequence '${sequenceId}': ${message}`, lineNumber, context);
    this.name = "SequenceError";
  }
}

/**
 * Alignment shape errors
 *
 * Raised while assembling a tabular alignment when the pieces do not line up:
 * sequences of unequal length, column annotations that do not cover every
 * position, or an index that does not match the sequences.
 */
export class AlignmentShapeError extends ValidationError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number,
    context?: string
  ) {
    super(message, undefined, context);
    this.name = "AlignmentShapeError";
  }

  /**
   * Create error for a sequence whose length differs from the first one
   */
  static forSequenceLength(label: string, expected: number, actual: number): AlignmentShapeError {
    return new AlignmentShapeError(
      `Sequence '${label}' has length ${actual}, expected ${expected} to match the alignment`,
      expected,
      actual,
      `Label: ${label}`
    );
  }

  /**
   * Create error for a per-column annotation of the wrong length
   */
  static forPositionalMetadata(
    feature: string,
    expected: number,
    actual: number,
    owner?: string
  ): AlignmentShapeError {
    const where = owner === undefined ? "alignment" : `sequence '${owner}'`;
    return new AlignmentShapeError(
      `Positional metadata '${feature}' on ${where} has ${actual} values, expected ${expected}`,
      expected,
      actual,
      `Feature: ${feature}`
    );
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nExpected: ${this.expected}`;
    msg += `\nActual: ${this.actual}`;
    return msg;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends AlignkitError {
  constructor(
    message: string,
    public readonly streamType: "read" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors
 */
export class BufferError extends AlignkitError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow" | "line-length",
    context?: string,
    /** Start of the offending line, for line-length failures */
    public readonly linePreview?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  DUPLICATE_LABEL:
    "Each sequence may have only one data line; concatenate wrapped blocks before parsing",
  UNDECLARED_REFERENCE: "Markup labels must match a sequence name used on a data line exactly",
  DUPLICATE_COLUMN_FEATURE: "Merge repeated #=GC lines for the same feature into one line",
  DUPLICATE_SEQUENCE_FEATURE: "Merge repeated #=GR or #=GS lines for the same sequence and feature",
  MALFORMED_MARKUP:
    "Markup lines need a marker, a feature (and a sequence name for #=GS/#=GR) and data",
  MALFORMED_DATA: "Data lines need a sequence name followed by the aligned sequence",
  EMPTY_ALIGNMENT: "The file contains no sequence data lines",
  MISSING_SIGNATURE: 'Stockholm files start with the line "# STOCKHOLM 1.0"',
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: AlignkitError): string | undefined {
  if (error instanceof StockholmFormatError) {
    switch (error.violation) {
      case "DuplicateSequenceLabel":
        return ERROR_SUGGESTIONS.DUPLICATE_LABEL;
      case "UndeclaredSequenceReference":
        return ERROR_SUGGESTIONS.UNDECLARED_REFERENCE;
      case "DuplicateColumnFeature":
        return ERROR_SUGGESTIONS.DUPLICATE_COLUMN_FEATURE;
      case "DuplicateSequenceColumnFeature":
      case "DuplicateSequenceFeature":
        return ERROR_SUGGESTIONS.DUPLICATE_SEQUENCE_FEATURE;
      case "MalformedMarkupLine":
        return ERROR_SUGGESTIONS.MALFORMED_MARKUP;
      case "MalformedDataLine":
        return ERROR_SUGGESTIONS.MALFORMED_DATA;
      case "EmptyAlignment":
        return ERROR_SUGGESTIONS.EMPTY_ALIGNMENT;
      case "MissingSignature":
        return ERROR_SUGGESTIONS.MISSING_SIGNATURE;
      case "LineTooLong":
        return undefined;
    }
  }

  const message = error.message.toLowerCase();
  if (message.includes("line")) {
    return ERROR_SUGGESTIONS.MALFORMED_LINE;
  }

  return undefined;
}
