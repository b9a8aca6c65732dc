/**
 * Stockholm line handlers
 *
 * One handler per line kind. Each reads a single line and records what it
 * carries on the parse session, throwing StockholmFormatError on the first
 * rule it breaks.
 *
 * @module stockholm/markup
 */

import { StockholmFormatError, type StockholmViolation } from "../../errors";
import { FEATURE_VALUE_SEPARATOR } from "./constants";
import { appendValue, isBlank, splitFields, splitWhitespace, toColumns } from "./primitives";
import type {
  GsMergeStrategy,
  LineLocation,
  MarkupLineKind,
  SequenceRecord,
  StockholmSession,
} from "./types";

/**
 * Settings the markup handlers need from the driver
 */
export interface MarkupHandlerOptions {
  readonly gsMergeStrategy: GsMergeStrategy;
  readonly onWarning: (warning: string, lineNumber?: number) => void;
}

function formatError(
  message: string,
  violation: StockholmViolation,
  location: LineLocation
): StockholmFormatError {
  return new StockholmFormatError(message, violation, location.lineNumber, location.text);
}

function requireRecord(
  session: StockholmSession,
  label: string,
  location: LineLocation
): SequenceRecord {
  const record = session.records.get(label);
  if (record === undefined) {
    throw formatError(
      `Markup line references nonexistent data '${label}'`,
      "UndeclaredSequenceReference",
      location
    );
  }
  return record;
}

// ============================================================================
// DATA LINES
// ============================================================================

/**
 * Register the sequence on a data line
 *
 * Only the first two whitespace-separated fields are read: the label and the
 * aligned sequence. A label may appear on one data line only.
 */
export function parseDataLine(session: StockholmSession, location: LineLocation): void {
  const [label, sequence] = splitWhitespace(location.text);

  if (label === undefined || sequence === undefined) {
    throw formatError(
      `Data line for '${label ?? ""}' has no sequence`,
      "MalformedDataLine",
      location
    );
  }

  if (session.records.has(label)) {
    throw formatError(
      `Found multiple data lines under same name: '${label}'`,
      "DuplicateSequenceLabel",
      location
    );
  }

  session.records.set(label, {
    label,
    sequence,
    metadata: new Map(),
    positionalMetadata: new Map(),
  });
}

// ============================================================================
// MARKUP LINES
// ============================================================================

/**
 * `#=GF <feature> <text>`: alignment-level feature
 *
 * The text is everything after the single delimiter following the feature,
 * kept verbatim. A repeated feature is joined onto the earlier text with a
 * space.
 */
export function parseGfLine(session: StockholmSession, location: LineLocation): void {
  const [, feature, value] = splitFields(location.text, 3);

  if (feature === undefined || feature === "" || value === undefined || isBlank(value)) {
    throw formatError(
      "Malformed #=GF line: expected a feature and its data",
      "MalformedMarkupLine",
      location
    );
  }

  session.metadata.set(
    feature,
    appendValue(session.metadata.get(feature), value, FEATURE_VALUE_SEPARATOR)
  );
}

/**
 * `#=GS <seqname> <feature> <text>`: per-sequence feature
 */
export function parseGsLine(
  session: StockholmSession,
  location: LineLocation,
  options: MarkupHandlerOptions
): void {
  const [, label, feature, value] = splitFields(location.text, 4);

  if (
    label === undefined ||
    label === "" ||
    feature === undefined ||
    feature === "" ||
    value === undefined ||
    isBlank(value)
  ) {
    throw formatError(
      "Malformed #=GS line: expected a sequence name, a feature and its data",
      "MalformedMarkupLine",
      location
    );
  }

  const { metadata } = requireRecord(session, label, location);

  switch (options.gsMergeStrategy) {
    case "when-empty":
      if (metadata.size === 0) {
        metadata.set(feature, value);
      } else if (!session.droppedGsLabels.has(label)) {
        // One warning per sequence; later drops for the same label are silent
        session.droppedGsLabels.add(label);
        options.onWarning(
          `Ignoring further #=GS lines for '${label}': only the first #=GS line of a sequence is kept`,
          location.lineNumber
        );
      }
      break;

    case "concatenate":
      metadata.set(feature, appendValue(metadata.get(feature), value, FEATURE_VALUE_SEPARATOR));
      break;

    case "reject-duplicates":
      if (metadata.has(feature)) {
        throw formatError(
          `Found duplicate GS label '${feature}' associated with data label '${label}'`,
          "DuplicateSequenceFeature",
          location
        );
      }
      metadata.set(feature, value);
      break;
  }
}

/**
 * `#=GR <seqname> <feature> <column chars>`: per-sequence per-column feature
 */
export function parseGrLine(session: StockholmSession, location: LineLocation): void {
  const [, label, feature, columns] = splitWhitespace(location.text);

  if (label === undefined || feature === undefined || columns === undefined) {
    throw formatError(
      "Malformed #=GR line: expected a sequence name, a feature and column data",
      "MalformedMarkupLine",
      location
    );
  }

  const { positionalMetadata } = requireRecord(session, label, location);

  if (positionalMetadata.has(feature)) {
    throw formatError(
      `Found duplicate GR label '${feature}' associated with data label '${label}'`,
      "DuplicateSequenceColumnFeature",
      location
    );
  }

  positionalMetadata.set(feature, toColumns(columns));
}

/**
 * `#=GC <feature> <column chars>`: per-column feature of the alignment
 */
export function parseGcLine(session: StockholmSession, location: LineLocation): void {
  const [, feature, columns] = splitWhitespace(location.text);

  if (feature === undefined || columns === undefined) {
    throw formatError(
      "Malformed #=GC line: expected a feature and column data",
      "MalformedMarkupLine",
      location
    );
  }

  if (session.columnMetadata.has(feature)) {
    throw formatError(`Found duplicate GC label '${feature}'`, "DuplicateColumnFeature", location);
  }

  session.columnMetadata.set(feature, toColumns(columns));
}

/**
 * Dispatch a markup line to its handler
 */
export function parseMarkupLine(
  kind: MarkupLineKind,
  session: StockholmSession,
  location: LineLocation,
  options: MarkupHandlerOptions
): void {
  switch (kind) {
    case "gf":
      parseGfLine(session, location);
      break;
    case "gs":
      parseGsLine(session, location, options);
      break;
    case "gr":
      parseGrLine(session, location);
      break;
    case "gc":
      parseGcLine(session, location);
      break;
  }
}
