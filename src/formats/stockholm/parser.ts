/**
 * Stockholm alignment parser
 *
 * Wraps the two-pass reader in the shared parser interface: options are
 * validated once, sequences are built as AlignedSequence rows of a
 * TabularMSA, and string, file and stream inputs all end up as one
 * rewindable line source.
 *
 * @module stockholm/parser
 */

import { type } from "arktype";
import { SequenceTypeSchema } from "../../alignment/alphabet";
import { AlignedSequence } from "../../alignment/sequence";
import { TabularMSA } from "../../alignment/tabular-msa";
import type { AlignmentFactories } from "../../alignment/types";
import {
  AlignkitError,
  BufferError,
  ParseError,
  StockholmFormatError,
  ValidationError,
} from "../../errors";
import { readToString } from "../../io/file-reader";
import { ArrayLineSource, type LineSource, lineSourceFromString } from "../../io/line-source";
import { readLines } from "../../io/stream-utils";
import type { FileReaderOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { STOCKHOLM_LIMITS } from "./constants";
import { readStockholm } from "./state-machine";
import type { StockholmParserOptions, StockholmReadOptions } from "./types";

/**
 * ArkType validation for Stockholm parser options
 */
const StockholmParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "sequenceType?": SequenceTypeSchema,
  "gsMergeStrategy?": '"when-empty"|"concatenate"|"reject-duplicates"',
  "requireSignature?": "boolean",
}).narrow((options, ctx) => {
  if (
    options.maxLineLength !== undefined &&
    options.maxLineLength > STOCKHOLM_LIMITS.MAX_LINE_LENGTH_CEILING
  ) {
    return ctx.reject({
      expected: `maxLineLength <= ${STOCKHOLM_LIMITS.MAX_LINE_LENGTH_CEILING}`,
      actual: `${options.maxLineLength}`,
      path: ["maxLineLength"],
    });
  }

  return true;
});

/**
 * Stockholm multiple sequence alignment parser
 *
 * A Stockholm file holds a single alignment, so every parse method yields
 * exactly one TabularMSA. Use `parseAlignment` or `read` to get it directly.
 *
 * @example Basic usage
 * ```typescript
 * const parser = new StockholmParser({ sequenceType: "rna" });
 * const msa = parser.parseAlignment(text);
 * console.log(msa.index, msa.metadata.get("AC"));
 * ```
 *
 * @example Reading a file
 * ```typescript
 * for await (const msa of parser.parseFile("RF00001.sto")) {
 *   console.log(`${msa.sequenceCount} sequences x ${msa.positionCount} columns`);
 * }
 * ```
 */
export class StockholmParser extends AbstractParser<TabularMSA, StockholmParserOptions> {
  private readonly factories: AlignmentFactories<AlignedSequence, TabularMSA>;

  protected getDefaultOptions(): Partial<StockholmParserOptions> {
    return {
      maxLineLength: STOCKHOLM_LIMITS.MAX_LINE_LENGTH,
      sequenceType: "protein",
      gsMergeStrategy: "when-empty",
      requireSignature: false,
    };
  }

  constructor(options: StockholmParserOptions = {}) {
    const validationResult = StockholmParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid Stockholm parser options: ${validationResult.summary}`);
    }

    super(options);

    this.factories = {
      createSequence:
        this.options.sequenceFactory ??
        AlignedSequence.factory(
          this.options.sequenceType ?? "protein",
          this.options.skipValidation ? "permissive" : "normal"
        ),
      createAlignment: TabularMSA.factory,
    };
  }

  protected override getFormatName(): string {
    return "Stockholm";
  }

  /**
   * Parse the alignment from a rewindable line source
   *
   * @throws {StockholmFormatError} When the Stockholm structure is invalid
   * @throws {ValidationError} When the sequences do not form an alignment
   */
  read(source: LineSource): TabularMSA {
    return readStockholm(source, this.factories, this.readOptions());
  }

  /**
   * Parse the alignment held in a string
   */
  parseAlignment(data: string): TabularMSA {
    return this.read(lineSourceFromString(data));
  }

  /**
   * Parse Stockholm data from a string
   * @yields The single alignment in the data
   */
  override async *parseString(data: string): AsyncIterable<TabularMSA> {
    yield this.parseAlignment(data);
  }

  /**
   * Parse a Stockholm file
   *
   * The whole file is read before parsing since both passes need it.
   *
   * @yields The single alignment in the file
   * @throws {FileError} When file cannot be read
   * @throws {StockholmFormatError} When the Stockholm structure is invalid
   */
  override async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<TabularMSA> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }

    const text = await readToString(filePath, options);

    let alignment: TabularMSA;
    try {
      alignment = this.parseAlignment(text);
    } catch (error) {
      if (error instanceof AlignkitError) {
        throw error;
      }
      throw new ParseError(
        `Failed to parse Stockholm file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
        "Stockholm",
        undefined,
        error instanceof Error ? error.stack : undefined
      );
    }

    yield alignment;
  }

  /**
   * Parse Stockholm data from a ReadableStream
   *
   * Lines are buffered until the stream ends, then parsed. An over-long
   * line fails as soon as it is read, with its line number.
   *
   * @example
   * ```typescript
   * const stream = await createStream("family.sto", { bufferSize: 1024 * 1024 });
   * for await (const msa of new StockholmParser().parse(stream)) {
   *   console.log(msa.index);
   * }
   * ```
   *
   * @yields The single alignment in the stream
   */
  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<TabularMSA> {
    const lines: string[] = [];

    try {
      for await (const line of readLines(stream, "utf8", this.options.maxLineLength)) {
        this.throwIfAborted("stream read");
        lines.push(line);
      }
    } catch (error) {
      if (error instanceof BufferError && error.operation === "line-length") {
        // readLines yields every line before the failing one
        throw new StockholmFormatError(
          error.message,
          "LineTooLong",
          this.options.trackLineNumbers ? lines.length + 1 : undefined,
          error.linePreview
        );
      }
      throw error;
    }

    yield this.read(new ArrayLineSource(lines));
  }

  private readOptions(): StockholmReadOptions {
    return {
      gsMergeStrategy: this.options.gsMergeStrategy ?? "when-empty",
      requireSignature: this.options.requireSignature ?? false,
      maxLineLength: this.options.maxLineLength,
      trackLineNumbers: this.options.trackLineNumbers,
      onWarning: this.options.onWarning,
      checkAborted: (): void => this.checkAborted(),
    };
  }
}
