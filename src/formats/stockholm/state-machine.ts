/**
 * Two-pass state machine for Stockholm parsing
 *
 * Stockholm markup may come before or after the data lines it annotates, so
 * the input is read twice:
 *
 * 1. SCANNING_DATA collects one record per data line, in first-seen order,
 *    and ignores markup.
 * 2. SCANNING_MARKUP rewinds and applies every #=GF/#=GS/#=GR/#=GC line to
 *    the session, ignoring data lines.
 * 3. ASSEMBLING hands the session to the caller's factories.
 *
 * Because the data pass finishes before any markup is read, a #=GS or #=GR
 * line may precede its data line; a label that never appears on a data line
 * always fails.
 */

import type { AlignmentFactories } from "../../alignment/types";
import { ParseError, StockholmFormatError } from "../../errors";
import { iterateLines, type LineSource } from "../../io/line-source";
import { assembleAlignment } from "./assembly";
import { STOCKHOLM_LIMITS, STOCKHOLM_SIGNATURE } from "./constants";
import { parseDataLine, parseMarkupLine } from "./markup";
import { classifyLine, hasSignature, isMarkupKind } from "./primitives";
import {
  type LineLocation,
  StockholmLineKind,
  StockholmParsingState,
  type StockholmReadOptions,
  type StockholmSession,
} from "./types";

/**
 * Read options with every default filled in
 */
export type ResolvedStockholmReadOptions = Required<StockholmReadOptions>;

/**
 * Fill in defaults for the read options
 */
export function resolveReadOptions(
  options: StockholmReadOptions = {}
): ResolvedStockholmReadOptions {
  return {
    gsMergeStrategy: options.gsMergeStrategy ?? "when-empty",
    requireSignature: options.requireSignature ?? false,
    maxLineLength: options.maxLineLength ?? STOCKHOLM_LIMITS.MAX_LINE_LENGTH,
    trackLineNumbers: options.trackLineNumbers ?? true,
    onWarning:
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        console.warn(`Stockholm Warning (line ${lineNumber}): ${warning}`);
      }),
    checkAborted: options.checkAborted ?? ((): void => {}),
  };
}

/**
 * Fresh session in the SCANNING_DATA state
 */
export function createSession(): StockholmSession {
  return {
    state: StockholmParsingState.SCANNING_DATA,
    records: new Map(),
    metadata: new Map(),
    columnMetadata: new Map(),
    droppedGsLabels: new Set(),
  };
}

function transition(
  session: StockholmSession,
  from: StockholmParsingState,
  to: StockholmParsingState
): void {
  if (session.state !== from) {
    throw new ParseError(
      `Cannot move to ${to} from ${session.state}; expected ${from}`,
      "Stockholm"
    );
  }
  session.state = to;
}

function assertState(session: StockholmSession, expected: StockholmParsingState): void {
  if (session.state !== expected) {
    throw new ParseError(
      `Stockholm session is ${session.state}, expected ${expected}`,
      "Stockholm"
    );
  }
}

/**
 * Walk every line of the source from the start, with abort and length checks
 */
function* locatedLines(
  source: LineSource,
  options: ResolvedStockholmReadOptions
): IterableIterator<LineLocation> {
  source.rewind();
  let lineNumber = 0;

  for (const text of iterateLines(source)) {
    lineNumber++;
    options.checkAborted();

    const location: LineLocation = {
      text,
      lineNumber: options.trackLineNumbers ? lineNumber : undefined,
    };

    if (text.length > options.maxLineLength) {
      throw new StockholmFormatError(
        `Line too long (${text.length} > ${options.maxLineLength})`,
        "LineTooLong",
        location.lineNumber,
        text.slice(0, STOCKHOLM_LIMITS.LINE_PREVIEW_LENGTH)
      );
    }

    yield location;
  }
}

/**
 * First pass: collect the sequence records from the data lines
 *
 * Leaves the session in SCANNING_MARKUP.
 */
export function scanDataLines(
  session: StockholmSession,
  source: LineSource,
  options: ResolvedStockholmReadOptions
): void {
  assertState(session, StockholmParsingState.SCANNING_DATA);
  let seenFirstLine = false;

  for (const location of locatedLines(source, options)) {
    if (!seenFirstLine) {
      seenFirstLine = true;
      if (options.requireSignature && !hasSignature(location.text)) {
        throw new StockholmFormatError(
          `Missing "${STOCKHOLM_SIGNATURE}" signature on the first line`,
          "MissingSignature",
          location.lineNumber,
          location.text
        );
      }
    }

    if (classifyLine(location.text) === StockholmLineKind.DATA) {
      parseDataLine(session, location);
    }
  }

  if (!seenFirstLine && options.requireSignature) {
    throw new StockholmFormatError(
      `Missing "${STOCKHOLM_SIGNATURE}" signature: input is empty`,
      "MissingSignature"
    );
  }

  transition(session, StockholmParsingState.SCANNING_DATA, StockholmParsingState.SCANNING_MARKUP);
}

/**
 * Second pass: apply every markup line to the collected records
 *
 * Leaves the session in ASSEMBLING.
 */
export function scanMarkupLines(
  session: StockholmSession,
  source: LineSource,
  options: ResolvedStockholmReadOptions
): void {
  assertState(session, StockholmParsingState.SCANNING_MARKUP);

  for (const location of locatedLines(source, options)) {
    const kind = classifyLine(location.text);
    if (isMarkupKind(kind)) {
      parseMarkupLine(kind, session, location, options);
    }
  }

  transition(session, StockholmParsingState.SCANNING_MARKUP, StockholmParsingState.ASSEMBLING);
}

/**
 * Parse one Stockholm alignment from a rewindable line source
 *
 * Each call owns a fresh session and rewinds the source before each pass,
 * so the same source can be read again with identical results.
 *
 * @param source Rewindable lines of a Stockholm file
 * @param factories Sequence and alignment constructors
 * @param options Merge behaviour, limits and hooks
 * @returns The alignment built by `factories.createAlignment`
 * @throws {StockholmFormatError} On the first structural violation
 *
 * @example
 * ```typescript
 * const msa = readStockholm(lineSourceFromString(text), {
 *   createSequence: AlignedSequence.factory("rna"),
 *   createAlignment: TabularMSA.factory,
 * });
 * ```
 */
export function readStockholm<S, A>(
  source: LineSource,
  factories: AlignmentFactories<S, A>,
  options: StockholmReadOptions = {}
): A {
  const resolved = resolveReadOptions(options);
  const session = createSession();

  scanDataLines(session, source, resolved);
  scanMarkupLines(session, source, resolved);

  assertState(session, StockholmParsingState.ASSEMBLING);
  const alignment = assembleAlignment(session, factories);
  transition(session, StockholmParsingState.ASSEMBLING, StockholmParsingState.COMPLETE);

  return alignment;
}
