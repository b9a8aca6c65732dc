/**
 * Abstract base parser with shared option defaults and interrupt handling
 *
 * Provides consistent AbortSignal support across format parsers without
 * imposing parsing implementation details. Each format keeps its own parsing
 * logic while gaining interrupt capabilities.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Base parser options once defaults are applied
 */
export type ResolvedParserOptions = Required<Omit<ParserOptions, "signal">> &
  Pick<ParserOptions, "signal">;

/**
 * Abstract parser base class
 *
 * @template T - The value this parser produces (an alignment, a record, ...)
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: ResolvedParserOptions = {
      skipValidation: false,
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  // ============================================================================
  // SHARED INTERRUPT HANDLING
  // ============================================================================

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops to enable Ctrl+C interruption
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Check abortion with format context
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  // ============================================================================
  // ABSTRACT METHODS
  // ============================================================================

  /**
   * Parse data from string with interrupt support
   * @param data - Raw format data string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse data from file with interrupt support
   * @param filePath - Path to the data file
   * @param options - File reading options
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse data from stream with interrupt support
   * @param stream - Binary data stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Get format name for error messages and logging
   * @returns Format identifier (e.g., "Stockholm")
   */
  protected abstract getFormatName(): string;
}

/**
 * Utility class for AbortSignal integration across format parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * Check if operation has been aborted
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }

  /**
   * Throw with context if aborted
   * @param context - Descriptive context for where abortion was checked
   * @throws {ParseError} If operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
